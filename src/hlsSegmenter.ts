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

import * as path from 'path';

import { createBadRequestError, createInternalError, createNotFoundError, TaskEither } from '@eleven-am/fp';

import { HLS_SEGMENT_LENGTH } from './config';
import { EncoderSlots } from './encoderSlots';
import { EncoderFactory } from './ffmpeg';
import { FileStorage } from './fileStorage';
import { createLogger, Logger } from './logger';
import { MediaSource, OutputLayout } from './mediaSource';
import { mergeOptions } from './options';
import { TranscodeTask } from './transcodeTask';
import { EncoderOptions, MediaDescriptor, Target, TranscodeTaskStatus } from './types';
import { sleep } from './utils';

export interface HlsSegmenterOptions {
    storage: FileStorage;
    layout: OutputLayout;
    encoderFactory: EncoderFactory;
    segmentLength?: number;
    segmentTimeoutMs?: number;
    segmentPollIntervalMs?: number;
    // segment encodes take their slot from the same pool as queued transcodes
    slots?: EncoderSlots;
    logger?: Logger;
}

interface SegmentJob {
    mediaId: string;
    task: TranscodeTask;
    // resolves with the failure message, or null once the segment is written
    done: Promise<string | null>;
}

type WaitResult = 'ready' | 'failed' | 'timeout';

const segmentKey = (media: MediaDescriptor, target: Target, index: number) => `${media.id}:${target.id}:${index}`;

export function segmentCount (duration: number, segmentLength: number = HLS_SEGMENT_LENGTH): number {
	return duration > 0 ? Math.ceil(duration / segmentLength) : 0;
}

/**
 * Builds the VOD playlist of a media, every segment is segmentLength seconds long
 * except the last one which carries the remainder
 * @param duration Duration of the media in seconds
 * @param segmentLength Length of a segment in seconds
 */
export function buildManifest (duration: number, segmentLength: number = HLS_SEGMENT_LENGTH): string {
	const lines = [
		'#EXTM3U',
		'#EXT-X-PLAYLIST-TYPE:VOD',
		'#EXT-X-VERSION:3',
		`#EXT-X-TARGETDURATION:${segmentLength}`,
		'#EXT-X-MEDIA-SEQUENCE:0',
	];

	for (let index = 0; index * segmentLength < duration; index++) {
		const length = Math.min(segmentLength, duration - (index * segmentLength));

		lines.push(`#EXTINF:${length.toFixed(6)},`, `${index}.ts`);
	}

	lines.push('#EXT-X-ENDLIST');

	return `${lines.join('\n')}\n`;
}

export class HlsSegmenter {
	readonly #storage: FileStorage;

	readonly #layout: OutputLayout;

	readonly #encoderFactory: EncoderFactory;

	readonly #segmentLength: number;

	readonly #segmentTimeoutMs: number;

	readonly #segmentPollIntervalMs: number;

	readonly #slots: EncoderSlots;

	readonly #logger: Logger;

	readonly #inFlight = new Map<string, SegmentJob>();

	constructor (options: HlsSegmenterOptions) {
		this.#storage = options.storage;
		this.#layout = options.layout;
		this.#encoderFactory = options.encoderFactory;
		this.#segmentLength = options.segmentLength ?? HLS_SEGMENT_LENGTH;
		this.#segmentTimeoutMs = options.segmentTimeoutMs ?? 30000;
		this.#segmentPollIntervalMs = options.segmentPollIntervalMs ?? 1000;
		this.#slots = options.slots ?? new EncoderSlots();
		this.#logger = options.logger ?? createLogger('HlsSegmenter');
	}

	get segmentLength (): number {
		return this.#segmentLength;
	}

	/**
	 * Get the playlist of a media
	 * @param media The media to stream
	 */
	getManifest (media: MediaDescriptor): string {
		return buildManifest(media.duration, this.#segmentLength);
	}

	/**
	 * Options that make the encoder produce exactly one segment, derived from the
	 * target's own options which are left untouched. The segment is written under a
	 * temporary name and renamed once complete.
	 * @param media The media the segment belongs to
	 * @param target The target whose options are the base
	 * @param index The zero based segment index
	 * @param directory The directory the segment is written to
	 */
	getSegmentOptions (media: MediaDescriptor, target: Target, index: number, directory: string): EncoderOptions {
		const start = index * this.#segmentLength;

		return mergeOptions(target.options, {
			outputFormat: 'hls',
			hlsSegmentDuration: this.#segmentLength,
			hlsPlaylistType: 'vod',
			hlsListSize: 0,
			seekTime: start,
			duration: Math.min(this.#segmentLength, media.duration - start),
			startNumber: index,
			hlsSegmentFilename: path.join(directory, '%d.ts'),
			extraArgs: { '-hls_flags': 'temp_file' },
		});
	}

	/**
	 * Get the file of a segment, encoding it when it does not exist yet. A segment that
	 * is already on disk and not being encoded is returned as is, concurrent requests
	 * for the same segment share one encode.
	 * @param media The media to stream
	 * @param target The target the segment is encoded with
	 * @param index The zero based segment index
	 */
	getSegment (media: MediaDescriptor, target: Target, index: number): TaskEither<string> {
		if (!Number.isInteger(index) || index < 0) {
			return TaskEither.error(createBadRequestError(`Invalid segment index ${index}`));
		}

		if (index >= segmentCount(media.duration, this.#segmentLength)) {
			return TaskEither.error(createNotFoundError(`Segment ${index} is past the end of media ${media.id}`));
		}

		const source = new MediaSource(media, this.#storage, this.#layout);
		const segmentPath = source.getSegmentPath(target, index);
		const running = this.#inFlight.get(segmentKey(media, target, index));

		if (running) {
			return this.#waitForSegment(segmentPath, index, running);
		}

		return TaskEither
			.fromBind({
				directory: source.getStreamDirectory(target),
				exists: source.segmentExist(target, index),
			})
			.matchTask([
				{
					predicate: ({ exists }) => exists,
					run: () => TaskEither.of(segmentPath),
				},
				{
					predicate: ({ exists }) => !exists,
					run: ({ directory }) => this.#waitForSegment(
						segmentPath,
						index,
						this.#getOrStartJob(source, target, index, directory),
					),
				},
			]);
	}

	/**
	 * Cancels the segment encodes of a media and deletes its stream files
	 * @param media The media to clean up
	 */
	disposeMedia (media: MediaDescriptor): TaskEither<void> {
		this.#inFlight.forEach((job) => {
			if (job.mediaId === media.id) {
				job.task.cancel();
			}
		});

		return new MediaSource(media, this.#storage, this.#layout).deleteStreamFiles();
	}

	#getOrStartJob (source: MediaSource, target: Target, index: number, directory: string): SegmentJob {
		const media = source.getMedia();
		const key = segmentKey(media, target, index);
		const existing = this.#inFlight.get(key);

		if (existing) {
			return existing;
		}

		const task = new TranscodeTask({
			media,
			target,
			outputPath: source.getSegmentPlaylistPath(target, index),
			artifactPath: source.getSegmentPath(target, index),
			options: this.getSegmentOptions(media, target, index, directory),
			encoderFactory: this.#encoderFactory,
			storage: this.#storage,
			logger: this.#logger,
		});

		this.#logger.debug(`Encoding segment ${index} of media ${media.id} for target ${target.id}`);

		const done = this.#slots.acquire()
			.then(() => task.run()
				.map((status) => status === TranscodeTaskStatus.COMPLETE
					? null
					: task.getTrouble() ?? `Segment encode ended as ${status}`)
				.orElse((err) => TaskEither.of(err.error.message))
				.toPromise()
				.finally(() => this.#slots.release()))
			.finally(() => this.#inFlight.delete(key));

		const job: SegmentJob = { mediaId: media.id, task, done };

		this.#inFlight.set(key, job);

		return job;
	}

	/**
	 * Polls at a fixed interval until the encode producing the segment has settled or
	 * the wait budget is spent. The file is only handed out once the encode succeeded,
	 * since the encode has confirmed it is on disk by then.
	 */
	#waitForSegment (segmentPath: string, index: number, job: SegmentJob): TaskEither<string> {
		const deadline = Date.now() + this.#segmentTimeoutMs;
		const state: { failure?: string | null } = {};

		void job.done.then((failure) => {
			state.failure = failure;
		});

		const poll = async (): Promise<WaitResult> => {
			for (;;) {
				if (state.failure === null) {
					return 'ready';
				}

				if (typeof state.failure === 'string') {
					return 'failed';
				}

				if (Date.now() >= deadline) {
					return 'timeout';
				}

				await sleep(Math.min(this.#segmentPollIntervalMs, Math.max(0, deadline - Date.now())));
			}
		};

		return TaskEither
			.tryCatch(poll, `Failed waiting for segment ${index}`)
			.chain((result) => {
				switch (result) {
					case 'ready':
						return TaskEither.of(segmentPath);
					case 'failed':
						return TaskEither.error<string>(createInternalError(`Failed to produce segment ${index}: ${state.failure}`));
					default:
						return TaskEither.error<string>(createInternalError(`Timed out waiting for segment ${index} after ${this.#segmentTimeoutMs}ms`));
				}
			});
	}
}
