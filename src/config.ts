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

import * as os from 'os';
import * as path from 'path';

import { createBadRequestError, TaskEither } from '@eleven-am/fp';
import { z } from 'zod';

import { resolveTempRoot } from './fileStorage';
import { OrchestratorConfig } from './types';

export const HLS_SEGMENT_LENGTH = 5;

export function defaultConfig (): OrchestratorConfig {
	const root = path.join(resolveTempRoot(), 'transcode-orchestrator');

	return {
		maxConcurrentTasks: Math.max(1, os.cpus().length - 1),
		maxQueueSize: 1000,
		outputDirectory: path.join(root, 'transcodes'),
		streamDirectory: path.join(root, 'streams'),
		ffmpegPath: 'ffmpeg',
		ffprobePath: 'ffprobe',
		commandTimeoutMs: 0,
		segmentLength: HLS_SEGMENT_LENGTH,
		segmentTimeoutMs: 30000,
		segmentPollIntervalMs: 1000,
		logLevel: 'info',
	};
}

const envSchema = z.object({
	ORCHESTRATOR_MAX_CONCURRENT_TASKS: z.coerce.number().int().positive().optional(),
	ORCHESTRATOR_MAX_QUEUE_SIZE: z.coerce.number().int().positive().optional(),
	ORCHESTRATOR_OUTPUT_DIR: z.string().min(1).optional(),
	ORCHESTRATOR_STREAM_DIR: z.string().min(1).optional(),
	ORCHESTRATOR_FFMPEG_PATH: z.string().min(1).optional(),
	ORCHESTRATOR_FFPROBE_PATH: z.string().min(1).optional(),
	ORCHESTRATOR_COMMAND_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
	ORCHESTRATOR_SEGMENT_LENGTH: z.coerce.number().int().positive().optional(),
	ORCHESTRATOR_SEGMENT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
	ORCHESTRATOR_SEGMENT_POLL_MS: z.coerce.number().int().positive().optional(),
	ORCHESTRATOR_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
});

/**
 * Fills the gaps of a partial configuration with the defaults
 * @param config Values that take precedence over the defaults
 */
export function resolveConfig (config: Partial<OrchestratorConfig> = {}): OrchestratorConfig {
	const defined = Object.fromEntries(
		Object.entries(config).filter(([, value]) => value !== undefined),
	);

	return {
		...defaultConfig(),
		...defined,
	};
}

/**
 * Reads the configuration from environment variables, unset variables keep their default
 * @param env The environment to read, process.env when omitted
 */
export function loadConfig (env: NodeJS.ProcessEnv = process.env): TaskEither<OrchestratorConfig> {
	const parsed = envSchema.safeParse(env);

	if (!parsed.success) {
		const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');

		return TaskEither.error(createBadRequestError(`Invalid configuration: ${keys}`));
	}

	const vars = parsed.data;

	return TaskEither.of(resolveConfig({
		maxConcurrentTasks: vars.ORCHESTRATOR_MAX_CONCURRENT_TASKS,
		maxQueueSize: vars.ORCHESTRATOR_MAX_QUEUE_SIZE,
		outputDirectory: vars.ORCHESTRATOR_OUTPUT_DIR,
		streamDirectory: vars.ORCHESTRATOR_STREAM_DIR,
		ffmpegPath: vars.ORCHESTRATOR_FFMPEG_PATH,
		ffprobePath: vars.ORCHESTRATOR_FFPROBE_PATH,
		commandTimeoutMs: vars.ORCHESTRATOR_COMMAND_TIMEOUT_MS,
		segmentLength: vars.ORCHESTRATOR_SEGMENT_LENGTH,
		segmentTimeoutMs: vars.ORCHESTRATOR_SEGMENT_TIMEOUT_MS,
		segmentPollIntervalMs: vars.ORCHESTRATOR_SEGMENT_POLL_MS,
		logLevel: vars.ORCHESTRATOR_LOG_LEVEL,
	}));
}
