/*
 * transcode-orchestrator
 * Copyright (C) 2025 Roy OSSAI
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { spawn } from 'child_process';
import { ChildProcessWithoutNullStreams } from 'node:child_process';

import { createInternalError, TaskEither } from '@eleven-am/fp';

import { buildCommandOptions } from './options';
import { EncodeRequest, Progress } from './types';
import { ExtendedEventEmitter } from './utils';

export interface EncoderEventMap {
    'start': {
        command: string;
    };
    'progress': Progress;
    'end': void;
    'error': Error;
}

/**
 * A running (or runnable) encoder invocation, the task layer only talks to this
 */
export interface EncoderProcess {
    run(): void;
    kill(signal?: NodeJS.Signals): void;
    on<K extends keyof EncoderEventMap & string>(event: K, listener: (args: EncoderEventMap[K]) => void): this;
    once<K extends keyof EncoderEventMap & string>(event: K, listener: (args: EncoderEventMap[K]) => void): this;
    off<K extends keyof EncoderEventMap & string>(event: K, listener: (args: EncoderEventMap[K]) => void): this;
}

export type EncoderFactory = (request: EncodeRequest) => EncoderProcess;

export interface FfmpegCommandSettings {
    binaryPath: string;
    timeoutMs: number;
    expectedDuration: number;
}

const STDERR_TAIL_LINES = 5;

function toSeconds (hours: string, minutes: string, seconds: string): number {
	return (parseInt(hours, 10) * 3600) + (parseInt(minutes, 10) * 60) + parseFloat(seconds);
}

/**
 * Reads one ffmpeg status line, e.g.
 * frame=  240 fps= 48 q=28.0 size=1024kB time=00:00:10.00 bitrate= 838.9kbits/s speed=2.00x
 * @param line A line of ffmpeg's stderr
 * @param expectedDuration Seconds of media the command is expected to produce
 * @returns The progress snapshot, or null when the line is not a status line
 */
export function parseProgressLine (line: string, expectedDuration: number): Progress | null {
	const time = line.match(/time=\s*(\d+):(\d+):(\d+(?:\.\d+)?)/);

	if (!time) {
		return null;
	}

	const processedSeconds = toSeconds(time[1], time[2], time[3]);
	const frame = line.match(/frame=\s*(\d+)/);
	const bitrate = line.match(/bitrate=\s*(\S+)/);
	const speed = line.match(/speed=\s*(\d+(?:\.\d+)?)x/);
	const speedValue = speed ? parseFloat(speed[1]) : null;
	const fraction = expectedDuration > 0 ? Math.min(1, processedSeconds / expectedDuration) : 0;
	const etaSeconds = speedValue && expectedDuration > 0
		? Math.max(0, (expectedDuration - processedSeconds) / speedValue)
		: null;

	return {
		fraction,
		processedSeconds,
		speed: speedValue,
		etaSeconds,
		frames: frame ? parseInt(frame[1], 10) : null,
		bitrate: bitrate && bitrate[1] !== 'N/A' ? bitrate[1] : null,
	};
}

export class FfmpegCommand extends ExtendedEventEmitter<EncoderEventMap> implements EncoderProcess {
	private readonly inputPath: string;

	private readonly settings: FfmpegCommandSettings;

	private inputOpts: string[] = [];

	private outputOpts: string[] = [];

	private videoFilterOpts: string | undefined;

	private outputPath: string = '';

	private process: ChildProcessWithoutNullStreams | null = null;

	private isRunning: boolean = false;

	private settled: boolean = false;

	private timedOut: boolean = false;

	private processTimeout: NodeJS.Timeout | null = null;

	constructor (inputPath: string, settings: Partial<FfmpegCommandSettings> = {}) {
		super();
		this.inputPath = inputPath;
		this.settings = {
			binaryPath: 'ffmpeg',
			timeoutMs: 0,
			expectedDuration: 0,
			...settings,
		};
	}

	/**
     * Add input options to the command
     * @param options Array of input options
     */
	inputOptions (options: string[]): FfmpegCommand {
		this.inputOpts.push(...options);

		return this;
	}

	/**
     * Add output options to the command
     * @param options Array of output options
     */
	outputOptions (options: string[]): FfmpegCommand {
		this.outputOpts.push(...options);

		return this;
	}

	/**
     * Add video filters to the command
     * @param filters Video filter string
     */
	videoFilters (filters: string | undefined): FfmpegCommand {
		this.videoFilterOpts = filters;

		return this;
	}

	/**
     * Set the output path
     * @param outputPath Path for the output file
     */
	output (outputPath: string): FfmpegCommand {
		this.outputPath = outputPath;

		return this;
	}

	/**
     * Execute the FFmpeg command. Exactly one of 'end' or 'error' is emitted per run.
     */
	run (): void {
		if (this.isRunning) {
			return;
		}

		this.isRunning = true;
		this.settled = false;
		this.timedOut = false;

		const args = this.buildArgs();
		const stderrTail: string[] = [];
		let pending = '';

		this.process = spawn(this.settings.binaryPath, args);

		if (this.settings.timeoutMs > 0) {
			this.processTimeout = setTimeout(() => {
				if (this.isRunning) {
					this.timedOut = true;
					this.kill('SIGTERM');
				}
			}, this.settings.timeoutMs);
		}

		this.emit('start', {
			command: `${this.settings.binaryPath} ${args.join(' ')}`,
		});

		this.process.stderr.on('data', (data: Buffer) => {
			const lines = (pending + data.toString()).split(/[\r\n]+/);

			pending = lines.pop() ?? '';

			lines.filter((line) => line.trim() !== '').forEach((line) => {
				const progress = parseProgressLine(line, this.settings.expectedDuration);

				if (progress) {
					this.emit('progress', progress);

					return;
				}

				stderrTail.push(line.trim());

				if (stderrTail.length > STDERR_TAIL_LINES) {
					stderrTail.shift();
				}
			});
		});

		this.process.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
			this.cleanup();

			if (code === 0) {
				this.settle();

				return;
			}

			if (this.timedOut) {
				this.settle(new Error(`FFmpeg process timed out after ${this.settings.timeoutMs}ms`));
			} else if (signal) {
				this.settle(new Error(`FFmpeg process was terminated by ${signal}`));
			} else {
				this.settle(new Error(`FFmpeg process exited with code ${code}: ${stderrTail.join(' | ')}`));
			}
		});

		this.process.on('error', (err) => {
			this.cleanup();
			this.settle(err);
		});
	}

	/**
     * Signal the FFmpeg process, the outcome is reported through the 'error' event once it exits
     * @param signal Signal to send to the process
     */
	kill (signal: NodeJS.Signals = 'SIGKILL'): void {
		if (this.process && this.isRunning) {
			this.process.kill(signal);
		}
	}

	private settle (error?: Error): void {
		if (this.settled) {
			return;
		}

		this.settled = true;

		if (error) {
			this.emit('error', error);
		} else {
			this.emit('end', undefined);
		}
	}

	/**
     * Cleanup resources
     */
	private cleanup (): void {
		this.isRunning = false;

		if (this.processTimeout) {
			clearTimeout(this.processTimeout);
			this.processTimeout = null;
		}

		if (this.process) {
			this.process.removeAllListeners();
			this.process.stderr.removeAllListeners();
			this.process.stdout.removeAllListeners();
			this.process = null;
		}
	}

	/**
     * Build the complete FFmpeg command arguments
     */
	buildArgs (): string[] {
		const args = [
			'-hide_banner',
			...this.inputOpts,
			'-i',
			this.inputPath,
		];

		if (this.videoFilterOpts) {
			args.push('-vf', this.videoFilterOpts);
		}

		args.push(...this.outputOpts);

		if (this.outputPath) {
			args.push(this.outputPath);
		}

		return args;
	}
}

/**
 * Factory function that mimics the fluent-ffmpeg module's interface
 * @param inputPath Input file path
 * @param settings Binary, timeout and expected duration of the run
 */
export default function ffmpeg (inputPath: string, settings: Partial<FfmpegCommandSettings> = {}): FfmpegCommand {
	return new FfmpegCommand(inputPath, settings);
}

/**
 * Encoder factory that spawns real ffmpeg processes
 * @param binaryPath Path of the ffmpeg binary
 * @param timeoutMs Upper bound of a single run, 0 disables it
 */
export function createFfmpegFactory (binaryPath: string, timeoutMs: number): EncoderFactory {
	return (request) => {
		const { inputOptions, outputOptions, videoFilters } = buildCommandOptions(request.options);

		return ffmpeg(request.sourcePath, {
			binaryPath,
			timeoutMs,
			expectedDuration: request.expectedDuration,
		})
			.inputOptions(inputOptions)
			.outputOptions(outputOptions)
			.videoFilters(videoFilters)
			.output(request.outputPath);
	};
}

/**
 * Runs an encoder process to completion. A failed run becomes an error value carrying
 * the encoder's message, it never throws.
 * @param command The process to run
 * @param onProgress Called with every progress snapshot the process reports
 */
export function runCommand (command: EncoderProcess, onProgress: (progress: Progress) => void): TaskEither<void> {
	const promise = () => new Promise<void>((resolve, reject) => {
		const cleanup = () => {
			command.off('progress', onProgress);
			command.off('end', onEnd);
			command.off('error', onError);
		};

		const onEnd = () => {
			cleanup();
			resolve();
		};

		const onError = (error: Error) => {
			cleanup();
			reject(error);
		};

		command.on('progress', onProgress);
		command.once('end', onEnd);
		command.once('error', onError);
		command.run();
	});

	return TaskEither.tryCatch(
		promise,
		(err) => createInternalError(err.message),
	);
}
