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
import * as path from 'path';

import { createBadRequestError, TaskEither } from '@eleven-am/fp';

import { EncoderFactory, EncoderProcess, runCommand } from './ffmpeg';
import { FileStorage } from './fileStorage';
import { createLogger, Logger } from './logger';
import { EncoderOptions, MediaDescriptor, Progress, TaskSnapshot, Target, TranscodeTaskStatus } from './types';
import { ExtendedEventEmitter } from './utils';

export const TRANSITIONS: Record<TranscodeTaskStatus, TranscodeTaskStatus[]> = {
    [TranscodeTaskStatus.WAITING]: [TranscodeTaskStatus.WORKING, TranscodeTaskStatus.CANCELLED],
    [TranscodeTaskStatus.WORKING]: [
        TranscodeTaskStatus.COMPLETE,
        TranscodeTaskStatus.TROUBLED,
        TranscodeTaskStatus.SUSPENDED,
        TranscodeTaskStatus.CANCELLED,
    ],
    [TranscodeTaskStatus.SUSPENDED]: [TranscodeTaskStatus.WORKING, TranscodeTaskStatus.CANCELLED],
    [TranscodeTaskStatus.TROUBLED]: [TranscodeTaskStatus.WAITING, TranscodeTaskStatus.CANCELLED],
    [TranscodeTaskStatus.CANCELLED]: [],
    [TranscodeTaskStatus.COMPLETE]: [],
};

export function canTransition (from: TranscodeTaskStatus, to: TranscodeTaskStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export function isTerminal (status: TranscodeTaskStatus): boolean {
    return TRANSITIONS[status].length === 0;
}

interface TranscodeTaskEvents {
    'status': { task: TranscodeTask, previous: TranscodeTaskStatus, current: TranscodeTaskStatus };
    'progress': { task: TranscodeTask, progress: Progress };
}

export interface TranscodeTaskOptions {
    media: MediaDescriptor;
    target: Target;
    outputPath: string;
    encoderFactory: EncoderFactory;
    storage: FileStorage;
    options?: EncoderOptions;
    artifactPath?: string;
    logger?: Logger;
}

type Outcome = { kind: 'success' } | { kind: 'failure', message: string };

type StopRequest = 'cancel' | 'suspend' | null;

/**
 * One attempt to encode one media item for one target.
 *
 * The task owns at most one encoder process at a time. Stopping a run (cancel or
 * suspend) is confirmed only once the process exit has been observed, and a run
 * that reported success before that point completes. A suspended task restarts
 * its encode from the beginning when it runs again, the partial output of the
 * interrupted attempt is discarded.
 */
export class TranscodeTask extends ExtendedEventEmitter<TranscodeTaskEvents> {
    readonly id: string = randomUUID();

    readonly media: MediaDescriptor;

    readonly target: Target;

    readonly outputPath: string;

    readonly artifactPath: string;

    readonly options: EncoderOptions;

    #status: TranscodeTaskStatus = TranscodeTaskStatus.WAITING;

    #command: EncoderProcess | null = null;

    #claimed: boolean = false;

    #stopRequest: StopRequest = null;

    #progress: Progress | null = null;

    #trouble: string | null = null;

    readonly #encoderFactory: EncoderFactory;

    readonly #storage: FileStorage;

    readonly #logger: Logger;

    constructor (options: TranscodeTaskOptions) {
        super();
        this.media = options.media;
        this.target = options.target;
        this.outputPath = options.outputPath;
        this.artifactPath = options.artifactPath ?? options.outputPath;
        this.options = options.options ?? options.target.options;
        this.#encoderFactory = options.encoderFactory;
        this.#storage = options.storage;
        this.#logger = options.logger ?? createLogger('TranscodeTask');
    }

    get status (): TranscodeTaskStatus {
        return this.#status;
    }

    /**
     * Whether an encoder process is currently attached to the task
     */
    hasActiveCommand (): boolean {
        return this.#claimed || this.#command !== null;
    }

    getProgress (): Progress | null {
        return this.#progress;
    }

    getTrouble (): string | null {
        return this.#trouble;
    }

    /**
     * Runs the encode. Resolves with the status the run settled in: COMPLETE, TROUBLED,
     * CANCELLED or SUSPENDED. Fails without touching the status when the task already
     * owns a command or cannot move to WORKING.
     */
    run (): TaskEither<TranscodeTaskStatus> {
        return TaskEither
            .of(undefined)
            .chain(() => this.#claim())
            .chain(() => this.#prepare())
            .chain((failure) => failure === null
                ? this.#encode()
                : TaskEither.of<Outcome>({ kind: 'failure', message: failure }))
            .chain((outcome) => this.#settle(outcome));
    }

    /**
     * Cancels the task
     * @returns true when a running encode had to be interrupted, false when nothing was running
     */
    cancel (): boolean {
        switch (this.#status) {
            case TranscodeTaskStatus.WAITING:
            case TranscodeTaskStatus.TROUBLED:
                this.#transition(TranscodeTaskStatus.CANCELLED);

                return false;
            case TranscodeTaskStatus.WORKING:
                this.#requestStop('cancel');

                return true;
            case TranscodeTaskStatus.SUSPENDED:
                if (this.hasActiveCommand()) {
                    this.#requestStop('cancel');
                } else {
                    this.#transition(TranscodeTaskStatus.CANCELLED);
                }

                return true;
            default:
                return false;
        }
    }

    /**
     * Stops a running encode so its slot can be reused, the task keeps its identity
     * and restarts from the beginning on its next run
     * @returns true when a suspension was requested
     */
    suspend (): boolean {
        if (this.#status !== TranscodeTaskStatus.WORKING || this.#stopRequest === 'cancel') {
            return false;
        }

        this.#requestStop('suspend');

        return true;
    }

    /**
     * Puts a troubled task back in the waiting state
     */
    retry (): TaskEither<void> {
        if (this.#status !== TranscodeTaskStatus.TROUBLED) {
            return TaskEither.error(createBadRequestError(`Task ${this.id} is ${this.#status}, only TROUBLED tasks can be retried`));
        }

        this.#trouble = null;
        this.#transition(TranscodeTaskStatus.WAITING);

        return TaskEither.of(undefined);
    }

    toJSON (): TaskSnapshot {
        return {
            id: this.id,
            mediaId: this.media.id,
            targetId: this.target.id,
            status: this.#status,
            outputPath: this.outputPath,
            progress: this.#progress,
            trouble: this.#trouble,
        };
    }

    toString (): string {
        return `Task{ID=${this.id} MediaID=${this.media.id} TargetID=${this.target.id} Status=${this.#status}}`;
    }

    #claim (): TaskEither<void> {
        if (this.hasActiveCommand()) {
            return TaskEither.error(createBadRequestError(`Task ${this.id} already owns an active command`));
        }

        if (!canTransition(this.#status, TranscodeTaskStatus.WORKING)) {
            return TaskEither.error(createBadRequestError(`Task ${this.id} cannot start while ${this.#status}`));
        }

        this.#claimed = true;
        this.#stopRequest = null;
        this.#transition(TranscodeTaskStatus.WORKING);

        return TaskEither.of(undefined);
    }

    /**
     * Creates the output directory and clears output left behind by an earlier attempt
     * @returns null when ready, otherwise the reason the run cannot start
     */
    #prepare (): TaskEither<string | null> {
        return this.#storage
            .ensureDirectoryExists(path.dirname(this.outputPath))
            .chain(() => this.#removeOutput())
            .map((): string | null => null)
            .orElse((err) => TaskEither.of(err.error.message));
    }

    #encode (): TaskEither<Outcome> {
        if (this.#stopRequest !== null) {
            return TaskEither.of<Outcome>({ kind: 'failure', message: 'Stopped before the encoder started' });
        }

        const command = this.#encoderFactory({
            sourcePath: this.media.sourcePath,
            outputPath: this.outputPath,
            options: this.options,
            expectedDuration: this.options.duration ?? Math.max(0, this.media.duration - (this.options.seekTime ?? 0)),
        });

        this.#command = command;
        this.#logger.debug(`Starting encoder for ${this.toString()}`);

        return runCommand(command, (progress) => this.#recordProgress(progress))
            .map((): Outcome => ({ kind: 'success' }))
            .orElse((err) => TaskEither.of<Outcome>({ kind: 'failure', message: err.error.message }));
    }

    #settle (outcome: Outcome): TaskEither<TranscodeTaskStatus> {
        if (outcome.kind === 'success') {
            return this.#storage
                .exists(this.artifactPath)
                .map((exists) => exists
                    ? this.#finish(TranscodeTaskStatus.COMPLETE, null)
                    : this.#finish(TranscodeTaskStatus.TROUBLED, `Encoder finished but no output was found at ${this.artifactPath}`));
        }

        const stop = this.#stopRequest;
        const { message } = outcome;

        if (stop === null) {
            this.#logger.warn(`${this.toString()} failed: ${message}`);
        }

        return this.#discardOutput()
            .map(() => {
                switch (stop) {
                    case 'cancel':
                        return this.#finish(TranscodeTaskStatus.CANCELLED, null);
                    case 'suspend':
                        return this.#finish(TranscodeTaskStatus.SUSPENDED, null);
                    default:
                        return this.#finish(TranscodeTaskStatus.TROUBLED, message);
                }
            });
    }

    /**
     * Removes whatever an unfinished run left behind, so a partial file is never taken for output
     */
    #discardOutput (): TaskEither<void> {
        return this.#removeOutput()
            .orElse((err) => {
                this.#logger.warn(`Failed to discard partial output of ${this.toString()}: ${err.error.message}`);

                return TaskEither.of(undefined);
            });
    }

    #finish (status: TranscodeTaskStatus, trouble: string | null): TranscodeTaskStatus {
        this.#command = null;
        this.#claimed = false;
        this.#progress = null;
        this.#stopRequest = null;
        this.#trouble = trouble;
        this.#transition(status);

        return this.#status;
    }

    #requestStop (request: Exclude<StopRequest, null>): void {
        this.#stopRequest = request;
        this.#command?.kill();
    }

    #recordProgress (progress: Progress): void {
        const snapshot = Object.freeze({ ...progress });

        this.#progress = snapshot;
        this.emit('progress', { task: this, progress: snapshot });
    }

    #removeOutput (): TaskEither<void> {
        const removeArtifact = this.artifactPath === this.outputPath
            ? TaskEither.of(undefined)
            : this.#storage.deleteFile(this.artifactPath);

        return this.#storage
            .deleteFile(this.outputPath)
            .chain(() => removeArtifact);
    }

    #transition (next: TranscodeTaskStatus): boolean {
        const previous = this.#status;

        if (!canTransition(previous, next)) {
            this.#logger.error(`Rejected transition ${previous} -> ${next} for ${this.toString()}`);

            return false;
        }

        this.#status = next;
        this.emit('status', { task: this, previous, current: next });

        return true;
    }
}
