import * as os from 'os';
import * as path from 'path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { EncoderSlots } from '../src/encoderSlots';
import { FileStorage } from '../src/fileStorage';
import { TaskScheduler } from '../src/taskScheduler';
import { TranscodeTask } from '../src/transcodeTask';
import { TranscodeTaskStatus } from '../src/types';
import { sleep } from '../src/utils';
import {
    createFakeEncoderFactory,
    FakeEncoderFactory,
    makeMedia,
    makeTarget,
    makeTempDir,
    rejectionMessage,
    silentLogger,
} from './helpers';

describe('TaskScheduler', () => {
    let encoders: FakeEncoderFactory;
    let outputDirectory: string;
    let scheduler: TaskScheduler;

    const target = makeTarget();
    const first = makeMedia({ id: 'media-1' });
    const second = makeMedia({ id: 'media-2', sourcePath: '/library/shows/second.mkv' });

    function createScheduler (maxConcurrentTasks: number, maxQueueSize?: number, slots?: EncoderSlots) {
        const root = makeTempDir();

        outputDirectory = path.join(root, 'out');
        scheduler = new TaskScheduler({
            encoderFactory: encoders.factory,
            storage: new FileStorage(),
            layout: {
                outputDirectory,
                streamDirectory: path.join(root, 'streams'),
            },
            maxConcurrentTasks,
            maxQueueSize,
            slots,
            logger: silentLogger(),
        });
    }

    function completed (): Promise<TranscodeTask> {
        return new Promise((resolve) => scheduler.once('task:completed', resolve));
    }

    async function encoderCount (count: number) {
        await vi.waitFor(() => expect(encoders.encoders).toHaveLength(count));
    }

    beforeEach(() => {
        encoders = createFakeEncoderFactory();
        createScheduler(1);
    });

    afterEach(() => {
        scheduler.dispose();
    });

    it('writes each transcode under the media directory', async () => {
        const task = await scheduler.dispatch(first, target).toPromise();

        expect(task.outputPath).toBe(path.join(outputDirectory, 'media-1', 'target-1.mp4'));
    });

    it('starts tasks in dispatch order within the concurrency limit', async () => {
        await scheduler.dispatch(first, target).toPromise();
        const waiting = await scheduler.dispatch(second, target).toPromise();

        await encoderCount(1);

        expect(encoders.encoders[0].request.sourcePath).toBe('/library/shows/pilot.mkv');
        expect(waiting.status).toBe(TranscodeTaskStatus.WAITING);
        expect(scheduler.getStatus()).toEqual({
            queueLength: 1,
            activeTasks: 1,
            maxConcurrentTasks: 1,
            isProcessing: true,
        });

        const done = completed();

        encoders.encoders[0].finish();
        await done;
        await encoderCount(2);

        expect(encoders.encoders[1].request.sourcePath).toBe('/library/shows/second.mkv');
        expect(waiting.status).toBe(TranscodeTaskStatus.WORKING);
    });

    it('keeps one live task per media and target', async () => {
        const task = await scheduler.dispatch(first, target).toPromise();

        const message = await rejectionMessage(scheduler.dispatch(first, target).toPromise());

        expect(message).toBe('An active task for media media-1 and target target-1 already exists');

        await encoderCount(1);
        const done = completed();

        encoders.encoders[0].finish();

        expect(await done).toBe(task);

        const again = await scheduler.dispatch(first, target).toPromise();

        expect(again.id).not.toBe(task.id);
    });

    it('reports unknown tasks as not found', async () => {
        expect(await rejectionMessage(scheduler.cancel('missing').toPromise())).toBe('Task missing not found');
        expect(await rejectionMessage(scheduler.status('missing').toPromise())).toBe('Task missing not found');
    });

    it('cancels a waiting task and frees its pair', async () => {
        await scheduler.dispatch(first, target).toPromise();
        const waiting = await scheduler.dispatch(second, target).toPromise();
        const cancelled = vi.fn();

        scheduler.on('task:cancelled', cancelled);

        expect(await scheduler.cancel(waiting.id).toPromise()).toBe(false);
        expect(waiting.status).toBe(TranscodeTaskStatus.CANCELLED);
        expect(cancelled).toHaveBeenCalledWith(waiting);
        expect(scheduler.getStatus().queueLength).toBe(0);

        const again = await scheduler.dispatch(second, target).toPromise();

        expect(again.status).toBe(TranscodeTaskStatus.WAITING);
    });

    it('interrupts a working task and starts the next one', async () => {
        const working = await scheduler.dispatch(first, target).toPromise();

        await scheduler.dispatch(second, target).toPromise();
        await encoderCount(1);

        const cancelled = new Promise<TranscodeTask>((resolve) => scheduler.once('task:cancelled', resolve));

        expect(await scheduler.cancel(working.id).toPromise()).toBe(true);
        expect(await cancelled).toBe(working);
        expect(working.status).toBe(TranscodeTaskStatus.CANCELLED);

        await encoderCount(2);

        expect(encoders.encoders[1].request.sourcePath).toBe('/library/shows/second.mkv');
    });

    it('exposes status and progress', async () => {
        const task = await scheduler.dispatch(first, target).toPromise();

        await encoderCount(1);

        const progress = { fraction: 0.2, processedSeconds: 4.6, speed: 1, etaSeconds: 18.4, frames: 110, bitrate: null };

        encoders.encoders[0].report(progress);

        expect(await scheduler.status(task.id).toPromise()).toEqual({
            status: TranscodeTaskStatus.WORKING,
            progress,
        });
    });

    it('suspends the most recent tasks when the limit is lowered', async () => {
        createScheduler(2);

        await scheduler.dispatch(first, target).toPromise();
        const latest = await scheduler.dispatch(second, target).toPromise();

        await encoderCount(2);

        const suspended = new Promise<TranscodeTask>((resolve) => scheduler.once('task:suspended', resolve));

        scheduler.setMaxConcurrentTasks(1);

        expect(await suspended).toBe(latest);
        expect(latest.status).toBe(TranscodeTaskStatus.SUSPENDED);
        expect(scheduler.getStatus()).toEqual({
            queueLength: 1,
            activeTasks: 1,
            maxConcurrentTasks: 1,
            isProcessing: true,
        });

        encoders.encoders[0].finish();
        await encoderCount(3);

        expect(encoders.encoders[2].request.outputPath).toBe(latest.outputPath);

        const done = completed();

        encoders.encoders[2].finish();

        expect(await done).toBe(latest);
    });

    it('keeps a troubled task on its pair until it is retried', async () => {
        const task = await scheduler.dispatch(first, target).toPromise();
        const failed = new Promise<{ task: TranscodeTask, error: string }>((resolve) => scheduler.once('task:failed', resolve));

        await encoderCount(1);
        encoders.encoders[0].fail(new Error('FFmpeg process exited with code 1: Conversion failed!'));

        expect(await failed).toEqual({ task, error: 'FFmpeg process exited with code 1: Conversion failed!' });
        expect(await rejectionMessage(scheduler.dispatch(first, target).toPromise()))
            .toBe('An active task for media media-1 and target target-1 already exists');

        await scheduler.retry(task.id).toPromise();
        await encoderCount(2);

        const done = completed();

        encoders.encoders[1].finish();

        expect(await done).toBe(task);
        expect(task.status).toBe(TranscodeTaskStatus.COMPLETE);
    });

    it('only releases finished tasks', async () => {
        const task = await scheduler.dispatch(first, target).toPromise();

        expect(await rejectionMessage(scheduler.release(task.id).toPromise()))
            .toBe(`Task ${task.id} is still live and cannot be released`);

        await encoderCount(1);
        const done = completed();

        encoders.encoders[0].finish();
        await done;
        await scheduler.release(task.id).toPromise();

        expect(scheduler.listTasks()).toEqual([]);
        expect(await rejectionMessage(scheduler.getTask(task.id).toPromise())).toBe(`Task ${task.id} not found`);
    });

    it('refuses work once the queue is full', async () => {
        createScheduler(1, 1);

        const full = vi.fn();

        scheduler.on('queue:full', full);

        await scheduler.dispatch(first, target).toPromise();
        await scheduler.dispatch(second, target).toPromise();

        const message = await rejectionMessage(scheduler.dispatch(makeMedia({ id: 'media-3' }), target).toPromise());

        expect(message).toBe('Task queue is full');
        expect(full).toHaveBeenCalledWith({ size: 1, maxSize: 1 });
    });

    it('keeps the load based capacity within the cpu count', () => {
        scheduler.adjustConcurrencyBasedOnLoad();

        const { maxConcurrentTasks } = scheduler.getStatus();

        expect(maxConcurrentTasks).toBeGreaterThanOrEqual(1);
        expect(maxConcurrentTasks).toBeLessThanOrEqual(Math.max(1, os.cpus().length - 1));
    });

    it('does not report a task cancelled before it claimed its encoder as failed', async () => {
        const failed = vi.fn();

        scheduler.on('task:failed', failed);

        const dispatched = scheduler.dispatch(first, target);

        scheduler.dispose();

        const task = await dispatched.toPromise();

        await sleep(20);

        expect(failed).not.toHaveBeenCalled();
        expect(task.status).toBe(TranscodeTaskStatus.CANCELLED);
        expect(scheduler.getStatus().activeTasks).toBe(0);
        expect(encoders.encoders).toHaveLength(0);
    });

    it('waits for a slot held outside the scheduler', async () => {
        const slots = new EncoderSlots(1);

        scheduler.dispose();
        createScheduler(1, undefined, slots);

        expect(slots.tryAcquire()).toBe(true);

        const task = await scheduler.dispatch(first, target).toPromise();

        await sleep(20);

        expect(encoders.encoders).toHaveLength(0);
        expect(task.status).toBe(TranscodeTaskStatus.WAITING);

        slots.release();
        await encoderCount(1);

        expect(slots.inUse).toBe(1);

        const done = completed();

        encoders.encoders[0].finish();
        await done;

        expect(slots.inUse).toBe(0);
    });

    it('refuses work after disposal', async () => {
        scheduler.dispose();

        expect(await rejectionMessage(scheduler.dispatch(first, target).toPromise())).toBe('TaskScheduler has been disposed');
    });
});
