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

import { createBadRequestError, Either, TaskEither } from '@eleven-am/fp';
import { z } from 'zod';

import { MediaDescriptor } from './types';

const probeStreamSchema = z.object({
	codec_type: z.string().optional(),
	codec_name: z.string().optional(),
	width: z.number().int().optional(),
	height: z.number().int().optional(),
});

const probeOutputSchema = z.object({
	format: z.object({
		duration: z.coerce.number().nonnegative().optional(),
		format_name: z.string().optional(),
	}),
	streams: z.array(probeStreamSchema).default([]),
});

export interface ProbeResult {
    duration: number;
    container: string | null;
    codec: string | null;
    width: number | null;
    height: number | null;
}

export type MediaDetails = Omit<MediaDescriptor, 'id' | 'sourcePath' | 'duration' | 'codec' | 'container' | 'width' | 'height'>;

/**
 * Reads the parts of ffprobe's JSON output the orchestrator cares about
 * @param output The stdout of `ffprobe -print_format json -show_format -show_streams`
 */
export function parseProbeOutput (output: string): TaskEither<ProbeResult> {
	return Either
		.tryCatch((): unknown => JSON.parse(output), 'FFprobe did not return valid JSON')
		.toTaskEither()
		.chain((json) => {
			const parsed = probeOutputSchema.safeParse(json);

			if (!parsed.success) {
				const issues = parsed.error.issues
					.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
					.join('; ');

				return TaskEither.error<ProbeResult>(createBadRequestError(`Unexpected FFprobe output: ${issues}`));
			}

			const { format, streams } = parsed.data;
			const video = streams.find((stream) => stream.codec_type === 'video');

			return TaskEither.of<ProbeResult>({
				duration: format.duration ?? 0,
				container: format.format_name ?? null,
				codec: video?.codec_name ?? null,
				width: video?.width ?? null,
				height: video?.height ?? null,
			});
		});
}

export class MetadataService {
	constructor (private readonly ffprobePath: string = 'ffprobe') {}

	/**
     * Probe a media file for its duration, container and video stream
     * @param sourcePath Absolute path of the media file
     */
	probe (sourcePath: string): TaskEither<ProbeResult> {
		return this.run([
			'-v',
			'error',
			'-print_format',
			'json',
			'-show_format',
			'-show_streams',
			sourcePath,
		])
			.chain(parseProbeOutput);
	}

	/**
     * Builds the descriptor the criteria matcher evaluates, probed values fill the technical fields
     * @param id Identifier of the media
     * @param sourcePath Absolute path of the media file
     * @param details Descriptive fields the probe cannot know, e.g. the title
     */
	describeMedia (id: string, sourcePath: string, details: MediaDetails = {}): TaskEither<MediaDescriptor> {
		return this.probe(sourcePath)
			.map((probe): MediaDescriptor => ({
				...details,
				id,
				sourcePath,
				duration: probe.duration,
				container: probe.container ?? undefined,
				codec: probe.codec ?? undefined,
				width: probe.width ?? undefined,
				height: probe.height ?? undefined,
			}));
	}

	/**
     * Run ffprobe with the given arguments
     * @param args Arguments to pass to ffprobe
     */
	private run (args: string[]): TaskEither<string> {
		const promise = () => new Promise<string>((resolve, reject) => {
			const process = spawn(this.ffprobePath, args);

			let stdout = '';
			let stderr = '';

			process.stdout.on('data', (data: Buffer) => {
				stdout += data.toString();
			});

			process.stderr.on('data', (data: Buffer) => {
				stderr += data.toString();
			});

			process.on('error', reject);

			process.on('close', (code) => {
				if (code !== 0) {
					reject(new Error(`FFprobe exited with code ${code}: ${stderr.trim()}`));

					return;
				}

				resolve(stdout);
			});
		});

		return TaskEither.tryCatch(
			() => promise(),
			(err) => createBadRequestError(`FFprobe error: ${err.message}`),
		);
	}
}
