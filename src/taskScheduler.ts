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

import { createBadRequestError, createNotFoundError, TaskEither } from '@eleven-am/fp';

import { EncoderSlots } from './encoderSlots';
import { EncoderFactory } from './ffmpeg';
import { FileStorage } from './fileStorage';
import { createLogger, Logger } from './logger';
import { MediaSource, OutputLayout } from './mediaSource';
import { isTerminal, TranscodeTask } from './transcodeTask';
import { MediaDescriptor, Progress, Target, TranscodeTaskStatus } from './types';
import { ExtendedEventEmitter, pairKey } from './utils';

interface TaskSchedulerEvents {
    'task:started': TranscodeTask;
    'task:completed': TranscodeTask;
    'task:failed': { task: TranscodeTask, error: string };
    'task:cancelled': TranscodeTask;
    'task:suspended': TranscodeTask;
    'queue:full': { size: number, maxSize: number };
    'concurrency:changed': { current: number, max: number };
}

export interface TaskSchedulerOptions {
    encoderFactory: EncoderFactory;
    storage: FileStorage;
    layout: OutputLayout;
    maxConcurrentTasks?: number;
    maxQueueSize?: number;
    // shared with every other component that spawns encoders
    slots?: EncoderSlots;
    logger?: Logger;
}

export interface TaskStatus {
    status: TranscodeTaskStatus;
    progress: Progress | null;
}

/**
 * TaskScheduler - Runs transcode tasks with concurrency control
 *
 * Waiting tasks are started in dispatch order while an encoder slot is free, the slots
 * may be shared with segment encodes. At most one live task exists per (media, target)
 * pair, the pair stays claimed until its task completes or is cancelled.
 */
export class TaskScheduler extends ExtendedEventEmitter<TaskSchedulerEvents> {
    private readonly queue: TranscodeTask[] = [];

    private readonly tasks = new Map<string, TranscodeTask>();

    private readonly registry = new Map<string, TranscodeTask>();

    private readonly working: TranscodeTask[] = [];

    private disposed: boolean = false;

    private readonly slots: EncoderSlots;

    private readonly maxQueueSize: number;

    private readonly encoderFactory: EncoderFactory;

    private readonly storage: FileStorage;

    private readonly layout: OutputLayout;

    private readonly logger: Logger;

    constructor (options: TaskSchedulerOptions) {
        super();
        this.slots = options.slots ?? new EncoderSlots();
        this.slots.setCapacity(options.maxConcurrentTasks ?? this.slots.capacity);
        this.slots.on('released', this.onSlotReleased);
        this.maxQueueSize = options.maxQueueSize ?? 1000;
        this.encoderFactory = options.encoderFactory;
        this.storage = options.storage;
        this.layout = options.layout;
        this.logger = options.logger ?? createLogger('TaskScheduler');
    }

    /**
     * Creates a task for the pair and queues it
     * @param media The media to encode
     * @param target The target to encode it for
     */
    public dispatch (media: MediaDescriptor, target: Target): TaskEither<TranscodeTask> {
        if (this.disposed) {
            return TaskEither.error(createBadRequestError('TaskScheduler has been disposed'));
        }

        const key = pairKey(media.id, target.id);

        if (this.registry.has(key)) {
            return TaskEither.error(createBadRequestError(`An active task for media ${media.id} and target ${target.id} already exists`));
        }

        if (this.queue.length >= this.maxQueueSize) {
            this.emit('queue:full', { size: this.queue.length,
                maxSize: this.maxQueueSize });

            return TaskEither.error(createBadRequestError('Task queue is full'));
        }

        const task = new TranscodeTask({
            media,
            target,
            outputPath: new MediaSource(media, this.storage, this.layout).getTranscodePath(target),
            encoderFactory: this.encoderFactory,
            storage: this.storage,
            logger: this.logger,
        });

        this.registry.set(key, task);
        this.tasks.set(task.id, task);
        this.queue.push(task);
        this.logger.debug(`Queued ${task.toString()}`);
        this.processNextTask();

        return TaskEither.of(task);
    }

    /**
     * Cancels a task wherever it is in its lifecycle
     * @param taskId The task to cancel
     * @returns true when a running encode had to be interrupted
     */
    public cancel (taskId: string): TaskEither<boolean> {
        return this.getTask(taskId)
            .map((task) => {
                const interrupted = task.cancel();

                if (task.status === TranscodeTaskStatus.CANCELLED) {
                    this.removeFromQueue(task);
                    this.releasePair(task);
                    this.emit('task:cancelled', task);
                }

                return interrupted;
            });
    }

    /**
     * Current status and last progress snapshot of a task
     * @param taskId The task to look up
     */
    public status (taskId: string): TaskEither<TaskStatus> {
        return this.getTask(taskId)
            .map((task) => ({
                status: task.status,
                progress: task.getProgress(),
            }));
    }

    /**
     * Puts a troubled task back at the end of the queue
     * @param taskId The task to retry
     */
    public retry (taskId: string): TaskEither<TranscodeTask> {
        return this.getTask(taskId)
            .chain((task) => task.retry().map(() => task))
            .ioSync((task) => {
                this.queue.push(task);
                this.processNextTask();
            });
    }

    public getTask (taskId: string): TaskEither<TranscodeTask> {
        return TaskEither
            .fromNullable(this.tasks.get(taskId))
            .orElse(() => TaskEither.error<TranscodeTask>(createNotFoundError(`Task ${taskId} not found`)));
    }

    public listTasks (): TranscodeTask[] {
        return [...this.tasks.values()];
    }

    /**
     * Drops a finished task from the task table
     * @param taskId The task to forget
     */
    public release (taskId: string): TaskEither<void> {
        return this.getTask(taskId)
            .filter(
                (task) => isTerminal(task.status),
                () => createBadRequestError(`Task ${taskId} is still live and cannot be released`),
            )
            .map((task) => {
                this.tasks.delete(task.id);
            });
    }

    /**
     * Get current queue status
     */
    public getStatus (): {
        queueLength: number;
        activeTasks: number;
        maxConcurrentTasks: number;
        isProcessing: boolean;
    } {
        return {
            queueLength: this.queue.length,
            activeTasks: this.working.length,
            maxConcurrentTasks: this.slots.capacity,
            isProcessing: this.working.length > 0,
        };
    }

    /**
     * Update the maximum number of concurrent encoders. Lowering it below the number of
     * slots in use suspends the most recently started tasks, segment encodes run to
     * their end.
     * @param newMax New maximum concurrent tasks
     */
    public setMaxConcurrentTasks (newMax: number): void {
        this.slots.setCapacity(newMax);

        const excess = Math.min(this.working.length, this.slots.inUse - this.slots.capacity);

        if (excess > 0) {
            this.working
                .slice(-excess)
                .forEach((task) => {
                    if (task.suspend()) {
                        this.logger.info(`Suspending ${task.toString()} to free a slot`);
                    }
                });
        }

        this.emit('concurrency:changed', { current: this.working.length,
            max: this.slots.capacity });
    }

    /**
     * Cancel everything and refuse new work
     */
    public dispose (): void {
        this.disposed = true;
        this.slots.off('released', this.onSlotReleased);
        this.queue.splice(0);
        this.tasks.forEach((task) => {
            if (!isTerminal(task.status)) {
                task.cancel();
            }
        });
        this.registry.clear();
    }

    /**
     * Dynamically adjust concurrency based on system load
     * Call this periodically if you want automatic adjustment
     */
    public adjustConcurrencyBasedOnLoad (): void {
        const load = this.getSystemLoad();
        const cpuCount = os.cpus().length;

        let targetConcurrency: number;

        if (load > 80) {
            targetConcurrency = Math.max(1, Math.floor(cpuCount * 0.25));
        } else if (load > 60) {
            targetConcurrency = Math.max(1, Math.floor(cpuCount * 0.5));
        } else if (load > 40) {
            targetConcurrency = Math.max(1, Math.floor(cpuCount * 0.75));
        } else {
            targetConcurrency = Math.max(1, cpuCount - 1);
        }

        if (targetConcurrency !== this.slots.capacity) {
            this.setMaxConcurrentTasks(targetConcurrency);
        }
    }

    private readonly onSlotReleased = (): void => {
        this.processNextTask();
    };

    /**
     * Start queued tasks while slots are free
     */
    private processNextTask (): void {
        while (!this.disposed && this.queue.length > 0) {
            const [task] = this.queue;

            if (task.status !== TranscodeTaskStatus.WAITING && task.status !== TranscodeTaskStatus.SUSPENDED) {
                this.queue.shift();
            } else if (this.slots.tryAcquire()) {
                this.queue.shift();
                this.executeTask(task);
            } else {
                return;
            }
        }
    }

    /**
     * Execute a single task
     */
    private executeTask (task: TranscodeTask): void {
        this.working.push(task);
        this.emit('task:started', task);

        void task.run()
            .map((status) => this.taskSettled(task, status))
            .orElse((err) => {
                // cancelled between being picked and claiming the encoder
                if (isTerminal(task.status)) {
                    this.logger.debug(`${task.toString()} ended before it started`);
                } else {
                    this.logger.error(`Could not run ${task.toString()}: ${err.error.message}`);
                    this.emit('task:failed', { task,
                        error: err.error.message });
                }

                this.taskFinished(task);

                return TaskEither.of(undefined);
            })
            .toPromise();
    }

    private taskSettled (task: TranscodeTask, status: TranscodeTaskStatus): void {
        switch (status) {
            case TranscodeTaskStatus.COMPLETE:
                this.releasePair(task);
                this.emit('task:completed', task);
                break;
            case TranscodeTaskStatus.CANCELLED:
                this.releasePair(task);
                this.emit('task:cancelled', task);
                break;
            case TranscodeTaskStatus.SUSPENDED:
                // back to the front, it was dispatched before everything still waiting
                this.queue.unshift(task);
                this.emit('task:suspended', task);
                break;
            default:
                this.emit('task:failed', { task,
                    error: task.getTrouble() ?? `Task ended as ${status}` });
                break;
        }

        this.taskFinished(task);
    }

    /**
     * Free the slot of a task, which starts the next one
     */
    private taskFinished (task: TranscodeTask): void {
        const index = this.working.indexOf(task);

        if (index !== -1) {
            this.working.splice(index, 1);
            this.slots.release();
        }
    }

    private removeFromQueue (task: TranscodeTask): void {
        const index = this.queue.indexOf(task);

        if (index !== -1) {
            this.queue.splice(index, 1);
        }
    }

    private releasePair (task: TranscodeTask): void {
        const key = pairKey(task.media.id, task.target.id);

        if (this.registry.get(key) === task) {
            this.registry.delete(key);
        }
    }

    /**
     * Get system load for dynamic concurrency adjustment
     * @returns System load percentage (0-100)
     */
    private getSystemLoad (): number {
        const cpus = os.cpus();
        let totalIdle = 0;
        let totalTick = 0;

        cpus.forEach((cpu) => {
            const { user, nice, sys, idle, irq } = cpu.times;

            totalTick += user + nice + sys + idle + irq;
            totalIdle += idle;
        });

        const idle = totalIdle / cpus.length;
        const total = totalTick / cpus.length;
        const usage = 100 - ~~(100 * idle / total);

        return Math.min(100, Math.max(0, usage));
    }
}
