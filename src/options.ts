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

import { createBadRequestError, TaskEither } from '@eleven-am/fp';
import { z } from 'zod';

import { EncoderOptions, FFMPEGOptions, Target } from './types';

export const encoderOptionsSchema = z.object({
	outputFormat: z.string().min(1).optional(),
	videoCodec: z.string().min(1).optional(),
	audioCodec: z.string().min(1).optional(),
	videoBitrate: z.string().min(1).optional(),
	audioBitrate: z.string().min(1).optional(),
	preset: z.string().min(1).optional(),
	crf: z.number().int().nonnegative().optional(),
	resolution: z.string().regex(/^\d+x\d+$/).optional(),
	frameRate: z.number().positive().optional(),
	threads: z.number().int().nonnegative().optional(),
	videoFilter: z.string().min(1).optional(),
	seekTime: z.number().nonnegative().optional(),
	duration: z.number().positive().optional(),
	hlsSegmentDuration: z.number().positive().optional(),
	hlsPlaylistType: z.enum(['vod', 'event']).optional(),
	hlsListSize: z.number().int().nonnegative().optional(),
	hlsSegmentFilename: z.string().min(1).optional(),
	startNumber: z.number().int().nonnegative().optional(),
	overwrite: z.boolean().optional(),
	extraArgs: z.record(z.union([z.string(), z.number()])).optional(),
}).strict();

export const targetSchema = z.object({
	id: z.string().min(1),
	label: z.string().min(1),
	extension: z.string().regex(/^[a-z0-9]+$/i, 'extension must be alphanumeric'),
	options: encoderOptionsSchema.default({}),
});

type Flagged = Exclude<keyof EncoderOptions, 'seekTime' | 'videoFilter' | 'overwrite' | 'extraArgs'>;

const OUTPUT_FLAGS: [Flagged, string][] = [
	['duration', '-t'],
	['videoCodec', '-c:v'],
	['audioCodec', '-c:a'],
	['videoBitrate', '-b:v'],
	['audioBitrate', '-b:a'],
	['preset', '-preset'],
	['crf', '-crf'],
	['resolution', '-s'],
	['frameRate', '-r'],
	['threads', '-threads'],
	['outputFormat', '-f'],
	['hlsSegmentDuration', '-hls_time'],
	['hlsPlaylistType', '-hls_playlist_type'],
	['hlsListSize', '-hls_list_size'],
	['hlsSegmentFilename', '-hls_segment_filename'],
	['startNumber', '-start_number'],
];

/**
 * Field-wise merge of two option sets, a field left unset in the override falls
 * through to the base. Neither argument is modified.
 * @param base The options to start from
 * @param override The options that take precedence
 */
export function mergeOptions (base: EncoderOptions, override: EncoderOptions): EncoderOptions {
	const defined = Object.fromEntries(
		Object.entries(override).filter(([key, value]) => value !== undefined && key !== 'extraArgs'),
	);
	const merged: EncoderOptions = { ...base, ...defined };

	if (base.extraArgs || override.extraArgs) {
		merged.extraArgs = mergeExtraArgs(base.extraArgs ?? {}, override.extraArgs ?? {});
	}

	return merged;
}

function mergeExtraArgs (base: Record<string, string | number>, override: Record<string, string | number>): Record<string, string | number> {
	const merged = { ...base };

	Object.entries(override)
		.filter(([, value]) => value !== undefined)
		.forEach(([key, value]) => {
			merged[key] = value;
		});

	return merged;
}

/**
 * Turns an option set into encoder arguments, in a fixed order so equal options
 * always give the same command line
 * @param options The options to translate
 */
export function buildCommandOptions (options: EncoderOptions): FFMPEGOptions {
	const inputOptions: string[] = [];
	const outputOptions: string[] = [];

	if (options.overwrite !== false) {
		inputOptions.push('-y');
	}

	if (options.seekTime !== undefined) {
		inputOptions.push('-ss', formatNumber(options.seekTime));
	}

	OUTPUT_FLAGS.forEach(([key, flag]) => {
		const value = options[key];

		if (value !== undefined) {
			outputOptions.push(flag, typeof value === 'number' ? formatNumber(value) : value);
		}
	});

	Object.entries(options.extraArgs ?? {}).forEach(([flag, value]) => {
		outputOptions.push(flag, String(value));
	});

	return {
		inputOptions,
		outputOptions,
		videoFilters: options.videoFilter,
	};
}

function formatNumber (value: number): string {
	return Number.isInteger(value) ? value.toString() : value.toFixed(3);
}

/**
 * Validates an untrusted target definition
 * @param input The value to validate, e.g. a parsed request body
 */
export function validateTarget (input: unknown): TaskEither<Target> {
	const parsed = targetSchema.safeParse(input);

	if (parsed.success) {
		return TaskEither.of(parsed.data);
	}

	const issues = parsed.error.issues
		.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
		.join('; ');

	return TaskEither.error(createBadRequestError(`Invalid target: ${issues}`));
}
