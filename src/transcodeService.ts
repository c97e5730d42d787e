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

import { randomUUID } from 'crypto';

import { createBadRequestError, createNotFoundError, TaskEither } from '@eleven-am/fp';

import { resolveConfig } from './config';
import { diagnoseCriteria, isWorkflowEligible } from './criteria';
import { EncoderSlots } from './encoderSlots';
import { createFfmpegFactory, EncoderFactory } from './ffmpeg';
import { FileStorage } from './fileStorage';
import { FileTranscodeStore } from './fileTranscodeStore';
import { HlsSegmenter } from './hlsSegmenter';
import { createLogger, Logger } from './logger';
import { TaskScheduler, TaskStatus } from './taskScheduler';
import { isTerminal, TranscodeTask } from './transcodeTask';
import { TranscodeStore } from './transcodeStore';
import {
	MediaDescriptor,
	OrchestratorConfig,
	TaskSnapshot,
	Target,
	TranscodeRecord,
	Workflow,
} from './types';
import { ExtendedEventEmitter } from './utils';

export interface TranscodeServiceOptions {
    config?: Partial<OrchestratorConfig>;
    store?: TranscodeStore;
    encoderFactory?: EncoderFactory;
    logger?: Logger;
    // 0 leaves the concurrency where setMaxConcurrentTasks put it
    loadAdjustmentIntervalMs?: number;
}

interface TranscodeServiceEvents {
    'transcode:saved': TranscodeRecord;
    'task:failed': { task: TaskSnapshot, error: string };
    'task:cancelled': TaskSnapshot;
}

interface TargetLookup {
    targetId: string;
    target: Target | null;
    record: TranscodeRecord | null;
}

export class TranscodeService extends ExtendedEventEmitter<TranscodeServiceEvents> {
	readonly config: OrchestratorConfig;

	readonly #storage: FileStorage;

	readonly #store: TranscodeStore;

	readonly #scheduler: TaskScheduler;

	readonly #segmenter: HlsSegmenter;

	readonly #logger: Logger;

	readonly #loadAdjustmentIntervalMs: number;

	#loadAdjustmentInterval: NodeJS.Timeout | null = null;

	#initialized = false;

	constructor (options: TranscodeServiceOptions = {}) {
		super();
		this.config = resolveConfig(options.config);

		const logger = (scope: string) => options.logger ?? createLogger(scope, this.config.logLevel);
		const encoderFactory = options.encoderFactory ?? createFfmpegFactory(this.config.ffmpegPath, this.config.commandTimeoutMs);
		const layout = {
			outputDirectory: this.config.outputDirectory,
			streamDirectory: this.config.streamDirectory,
		};

		this.#logger = logger('TranscodeService');
		this.#loadAdjustmentIntervalMs = options.loadAdjustmentIntervalMs ?? 0;
		this.#storage = new FileStorage();
		this.#store = options.store ?? new FileTranscodeStore(this.#storage, this.config.outputDirectory);

		const slots = new EncoderSlots(this.config.maxConcurrentTasks);

		this.#scheduler = new TaskScheduler({
			encoderFactory,
			storage: this.#storage,
			layout,
			maxConcurrentTasks: this.config.maxConcurrentTasks,
			maxQueueSize: this.config.maxQueueSize,
			slots,
			logger: logger('TaskScheduler'),
		});

		this.#segmenter = new HlsSegmenter({
			encoderFactory,
			storage: this.#storage,
			layout,
			segmentLength: this.config.segmentLength,
			segmentTimeoutMs: this.config.segmentTimeoutMs,
			segmentPollIntervalMs: this.config.segmentPollIntervalMs,
			slots,
			logger: logger('HlsSegmenter'),
		});
	}

	/**
     * Creates the output directories and starts listening to the scheduler, calling it
     * again only re-creates the directories
     */
	initialize (): Promise<void> {
		if (!this.#initialized) {
			this.#initialized = true;
			this.#hookUpScheduler();
		}

		return TaskEither
			.fromBind({
				output: this.#storage.ensureDirectoryExists(this.config.outputDirectory),
				streams: this.#storage.ensureDirectoryExists(this.config.streamDirectory),
			})
			.map(({ output, streams }) => {
				this.#logger.info(`Writing transcodes to ${output} and streams to ${streams}`);
			})
			.toPromise();
	}

	/**
     * Runs a newly discovered media through the workflows. The first enabled workflow whose
     * criteria match dispatches a task per target, pairs that were already transcoded or
     * have a live task are skipped.
     * @param media The media to ingest
     * @returns The tasks that were dispatched
     */
	ingestMedia (media: MediaDescriptor): Promise<TaskSnapshot[]> {
		return TaskEither
			.tryCatch(
				() => this.#store.getWorkflows(),
				'Failed to load workflows',
			)
			.map((workflows) => this.#selectWorkflow(workflows, media))
			.map((workflow) => workflow?.targetIds ?? [])
			.chainItems((targetId) => this.#lookupTarget(media, targetId))
			.chainItems((lookup) => this.#dispatchLookup(media, lookup))
			.map((snapshots) => snapshots.filter((snapshot): snapshot is TaskSnapshot => snapshot !== null))
			.toPromise();
	}

	/**
     * Dispatches a task for one target regardless of the workflows
     * @param media The media to encode
     * @param targetId The target to encode it for
     */
	createTask (media: MediaDescriptor, targetId: string): Promise<TaskSnapshot> {
		return this.#lookupTarget(media, targetId)
			.chain(({ target, record }) => {
				if (target === null) {
					return TaskEither.error<TranscodeTask>(createNotFoundError(`Target ${targetId} not found`));
				}

				if (record !== null) {
					return TaskEither.error<TranscodeTask>(createBadRequestError(`Media ${media.id} has already been transcoded for target ${targetId}`));
				}

				return this.#scheduler.dispatch(media, target);
			})
			.map((task) => task.toJSON())
			.toPromise();
	}

	/**
     * Cancel a task
     * @param taskId The task to cancel
     * @returns true when a running encode had to be interrupted
     */
	cancelTask (taskId: string): Promise<boolean> {
		return this.#scheduler.cancel(taskId).toPromise();
	}

	/**
     * Cancel every live task of a media
     * @param mediaId The media whose tasks are cancelled
     * @returns The number of tasks that were cancelled
     */
	cancelTasksForMedia (mediaId: string): Promise<number> {
		return TaskEither
			.of(this.#scheduler.listTasks().filter((task) => task.media.id === mediaId && !isTerminal(task.status)))
			.chainItems((task) => this.#scheduler.cancel(task.id))
			.map((results) => results.length)
			.toPromise();
	}

	retryTask (taskId: string): Promise<TaskSnapshot> {
		return this.#scheduler.retry(taskId)
			.map((task) => task.toJSON())
			.toPromise();
	}

	getTaskStatus (taskId: string): Promise<TaskStatus> {
		return this.#scheduler.status(taskId).toPromise();
	}

	listTasks (): TaskSnapshot[] {
		return this.#scheduler.listTasks().map((task) => task.toJSON());
	}

	getTasksForMedia (mediaId: string): TaskSnapshot[] {
		return this.#scheduler.listTasks()
			.filter((task) => task.media.id === mediaId)
			.map((task) => task.toJSON());
	}

	setMaxConcurrentTasks (maxConcurrentTasks: number): void {
		this.#scheduler.setMaxConcurrentTasks(maxConcurrentTasks);
	}

	/**
     * Get the scheduler status for monitoring
     */
	getSchedulerStatus (): ReturnType<TaskScheduler['getStatus']> {
		return this.#scheduler.getStatus();
	}

	/**
     * Get the HLS playlist of a media
     * @param media The media to stream
     */
	getManifest (media: MediaDescriptor): string {
		return this.#segmenter.getManifest(media);
	}

	/**
     * Get the file of a segment, encoding it on demand
     * @param media The media to stream
     * @param targetId The target the segment is encoded with
     * @param index The zero based segment index
     */
	getSegment (media: MediaDescriptor, targetId: string, index: number): Promise<string> {
		return TaskEither
			.tryCatch(
				() => this.#store.getTarget(targetId),
				'Failed to load target',
			)
			.chain((target) => target === null
				? TaskEither.error<string>(createNotFoundError(`Target ${targetId} not found`))
				: this.#segmenter.getSegment(media, target, index))
			.toPromise();
	}

	/**
     * Cancels the segment encodes of a media and deletes its stream files
     * @param media The media to clean up
     */
	disposeMedia (media: MediaDescriptor): Promise<void> {
		return this.#segmenter.disposeMedia(media).toPromise();
	}

	/**
     * Cancel every task and stop listening to the scheduler
     */
	dispose (): void {
		if (this.#loadAdjustmentInterval) {
			clearInterval(this.#loadAdjustmentInterval);
			this.#loadAdjustmentInterval = null;
		}

		this.#scheduler.dispose();
		this.#scheduler.removeAllListeners();
		this.removeAllListeners();
	}

	/**
     * Picks the first enabled workflow whose criteria match, criteria that can
     * never match are reported on the way
     */
	#selectWorkflow (workflows: Workflow[], media: MediaDescriptor): Workflow | null {
		workflows.forEach((workflow) => {
			diagnoseCriteria(workflow.criteria).forEach((problem) => {
				this.#logger.warn(`Workflow ${workflow.id}: ${problem}`);
			});
		});

		const workflow = workflows.find((candidate) => isWorkflowEligible(candidate, media)) ?? null;

		if (workflow === null) {
			this.#logger.info(`No workflow matches media ${media.id}`);
		} else {
			this.#logger.info(`Media ${media.id} matched workflow ${workflow.id}`);
		}

		return workflow;
	}

	#lookupTarget (media: MediaDescriptor, targetId: string): TaskEither<TargetLookup> {
		return TaskEither
			.fromBind({
				target: TaskEither.tryCatch(
					() => this.#store.getTarget(targetId),
					'Failed to load target',
				),
				record: TaskEither.tryCatch(
					() => this.#store.getTranscode(media.id, targetId),
					'Failed to load transcode record',
				),
			})
			.map(({ target, record }) => ({
				targetId,
				target,
				record,
			}));
	}

	#dispatchLookup (media: MediaDescriptor, lookup: TargetLookup): TaskEither<TaskSnapshot | null> {
		if (lookup.target === null) {
			this.#logger.warn(`Skipping unknown target ${lookup.targetId} for media ${media.id}`);

			return TaskEither.of(null);
		}

		if (lookup.record !== null) {
			this.#logger.info(`Media ${media.id} was already transcoded for target ${lookup.targetId}`);

			return TaskEither.of(null);
		}

		return this.#scheduler.dispatch(media, lookup.target)
			.map((task): TaskSnapshot | null => task.toJSON())
			.orElse((err) => {
				this.#logger.warn(`Skipping target ${lookup.targetId} for media ${media.id}: ${err.error.message}`);

				return TaskEither.of(null);
			});
	}

	/**
     * Stores the record of a completed task
     */
	#persist (task: TranscodeTask): TaskEither<void> {
		const record: TranscodeRecord = {
			id: randomUUID(),
			mediaId: task.media.id,
			targetId: task.target.id,
			outputPath: task.outputPath,
			completedAt: new Date().toISOString(),
		};

		return TaskEither
			.tryCatch(
				() => this.#store.saveTranscode(record),
				'Failed to save transcode record',
			)
			.map((saved) => {
				this.emit('transcode:saved', saved);
			});
	}

	/**
     * Drops a task that reached COMPLETE or CANCELLED once its listeners have seen it
     */
	#release (task: TranscodeTask): Promise<void> {
		return this.#scheduler.release(task.id)
			.orElse((err) => {
				this.#logger.warn(`Could not release ${task.toString()}: ${err.error.message}`);

				return TaskEither.of(undefined);
			})
			.toPromise();
	}

	#hookUpScheduler (): void {
		this.#scheduler.on('task:started', (task) => {
			this.#logger.debug(`Started ${task.toString()}`);
		});

		this.#scheduler.on('task:completed', (task) => {
			this.#logger.info(`Completed ${task.toString()}`);

			void this.#persist(task)
				.orElse((err) => {
					this.#logger.error(`Could not persist ${task.toString()}: ${err.error.message}`);

					return TaskEither.of(undefined);
				})
				.toPromise()
				.then(() => this.#release(task));
		});

		this.#scheduler.on('task:failed', ({ task, error }) => {
			this.#logger.error(`Transcode task failed: ${task.id}`, error);
			this.emit('task:failed', { task: task.toJSON(),
				error });
		});

		this.#scheduler.on('task:cancelled', (task) => {
			this.#logger.info(`Cancelled ${task.toString()}`);
			this.emit('task:cancelled', task.toJSON());
			void this.#release(task);
		});

		this.#scheduler.on('queue:full', ({ size, maxSize }) => {
			this.#logger.warn(`Task queue is full: ${size}/${maxSize}`);
		});

		this.#scheduler.on('concurrency:changed', ({ current, max }) => {
			this.#logger.info(`Concurrency changed: ${current}/${max}`);
		});

		if (this.#loadAdjustmentIntervalMs > 0) {
			this.#loadAdjustmentInterval = setInterval(() => {
				this.#scheduler.adjustConcurrencyBasedOnLoad();
			}, this.#loadAdjustmentIntervalMs);
		}
	}
}
