import * as path from 'path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { buildManifest } from '../src/hlsSegmenter';
import { TranscodeService } from '../src/transcodeService';
import { MemoryTranscodeStore } from '../src/transcodeStore';
import {
    CombineType,
    Criteria,
    CriteriaKey,
    CriteriaType,
    TaskSnapshot,
    TranscodeRecord,
    TranscodeTaskStatus,
    Workflow,
} from '../src/types';
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

function heightCriteria (workflowId: string, type: CriteriaType, value: string): Criteria {
    return {
        id: `${workflowId}-height`,
        workflowId,
        key: CriteriaKey.HEIGHT,
        type,
        value,
        combineType: CombineType.AND,
    };
}

function makeWorkflow (id: string, type: CriteriaType, value: string, targetIds: string[], enabled = true): Workflow {
    return {
        id,
        label: id,
        enabled,
        criteria: [heightCriteria(id, type, value)],
        targetIds,
    };
}

const previousRecord: TranscodeRecord = {
    id: 'record-1',
    mediaId: 'media-1',
    targetId: 'target-2',
    outputPath: '/data/out/media-1/target-2.webm',
    completedAt: '2024-05-01T10:00:00.000Z',
};

describe('TranscodeService', () => {
    const media = makeMedia();

    let service: TranscodeService;
    let store: MemoryTranscodeStore;
    let encoders: FakeEncoderFactory;
    let outputDirectory: string;

    async function createService (workflows: Workflow[], autoFinish: boolean, maxConcurrentTasks = 2): Promise<TranscodeService> {
        const root = makeTempDir();

        outputDirectory = path.join(root, 'out');
        encoders = createFakeEncoderFactory(autoFinish);
        store = new MemoryTranscodeStore({
            workflows,
            targets: [
                makeTarget(),
                makeTarget({ id: 'target-2', label: 'VP9', extension: 'webm' }),
            ],
        });

        service = new TranscodeService({
            config: {
                outputDirectory,
                streamDirectory: path.join(root, 'streams'),
                maxConcurrentTasks,
                segmentPollIntervalMs: 10,
            },
            store,
            encoderFactory: encoders.factory,
            logger: silentLogger(),
        });

        await service.initialize();

        return service;
    }

    afterEach(() => {
        service.dispose();
    });

    it('dispatches the targets of the first eligible workflow only', async () => {
        await createService([
            makeWorkflow('disabled', CriteriaType.IS_PRESENT, '', ['target-2'], false),
            makeWorkflow('sd', CriteriaType.LESS_THAN, '720', ['target-2']),
            makeWorkflow('hd', CriteriaType.GREATER_THAN, '720', ['target-1', 'missing']),
            makeWorkflow('any', CriteriaType.IS_PRESENT, '', ['target-2']),
        ], false);

        const snapshots = await service.ingestMedia(media);

        expect(snapshots).toHaveLength(1);
        expect(snapshots[0]).toMatchObject({
            mediaId: 'media-1',
            targetId: 'target-1',
            outputPath: path.join(outputDirectory, 'media-1', 'target-1.mp4'),
        });
        expect(service.getTasksForMedia('media-1').map((task) => task.targetId)).toEqual(['target-1']);
    });

    it('dispatches nothing when no workflow matches', async () => {
        await createService([makeWorkflow('sd', CriteriaType.LESS_THAN, '720', ['target-1'])], false);

        expect(await service.ingestMedia(media)).toEqual([]);
        expect(encoders.encoders).toHaveLength(0);
    });

    it('skips pairs that were already transcoded or are still live', async () => {
        await createService([makeWorkflow('hd', CriteriaType.EQUALS, '1080', ['target-1', 'target-2'])], false);
        await store.saveTranscode(previousRecord);

        expect((await service.ingestMedia(media)).map((task) => task.targetId)).toEqual(['target-1']);
        expect(await service.ingestMedia(media)).toEqual([]);
    });

    it('records a completed transcode and forgets its task', async () => {
        await createService([], true);

        const saved = new Promise<TranscodeRecord>((resolve) => service.once('transcode:saved', resolve));
        const snapshot = await service.createTask(media, 'target-1');
        const record = await saved;

        expect(record).toMatchObject({
            mediaId: 'media-1',
            targetId: 'target-1',
            outputPath: snapshot.outputPath,
        });
        expect(await store.getTranscode('media-1', 'target-1')).toBe(record);

        await vi.waitFor(() => expect(service.listTasks()).toEqual([]));

        expect(await rejectionMessage(service.createTask(media, 'target-1')))
            .toBe('Media media-1 has already been transcoded for target target-1');
    });

    it('rejects tasks for unknown targets and duplicate pairs', async () => {
        await createService([], false);

        expect(await rejectionMessage(service.createTask(media, 'missing'))).toBe('Target missing not found');

        await service.createTask(media, 'target-1');

        expect(await rejectionMessage(service.createTask(media, 'target-1')))
            .toBe('An active task for media media-1 and target target-1 already exists');
    });

    it('cancels every live task of a media and forgets them', async () => {
        await createService([], false, 1);

        const cancelled = vi.fn<(snapshot: TaskSnapshot) => void>();

        service.on('task:cancelled', cancelled);

        const working = await service.createTask(media, 'target-1');
        const waiting = await service.createTask(media, 'target-2');

        expect(service.listTasks()).toHaveLength(2);
        expect(await service.cancelTasksForMedia('media-1')).toBe(2);

        await vi.waitFor(() => expect(service.listTasks()).toEqual([]));

        expect(cancelled.mock.calls.map(([snapshot]) => snapshot.id).sort()).toEqual([working.id, waiting.id].sort());
        expect(cancelled.mock.calls.map(([snapshot]) => snapshot.status))
            .toEqual([TranscodeTaskStatus.CANCELLED, TranscodeTaskStatus.CANCELLED]);
        expect(await rejectionMessage(service.getTaskStatus(waiting.id))).toBe(`Task ${waiting.id} not found`);
        expect(await service.cancelTasksForMedia('media-1')).toBe(0);
    });

    it('forgets a completed task even when its record cannot be saved', async () => {
        await createService([], true);

        const save = vi.spyOn(store, 'saveTranscode').mockRejectedValue(new Error('disk full'));

        await service.createTask(media, 'target-1');
        await vi.waitFor(() => expect(service.listTasks()).toEqual([]));

        expect(save).toHaveBeenCalledTimes(1);
        expect(await store.getTranscode('media-1', 'target-1')).toBeNull();
    });

    it('persists each completion once when initialised twice', async () => {
        await createService([], true);
        await service.initialize();

        const save = vi.spyOn(store, 'saveTranscode');
        const saved = vi.fn<(record: TranscodeRecord) => void>();

        service.on('transcode:saved', saved);

        await service.createTask(media, 'target-1');
        await vi.waitFor(() => expect(service.listTasks()).toEqual([]));
        await sleep(20);

        expect(save).toHaveBeenCalledTimes(1);
        expect(saved).toHaveBeenCalledTimes(1);
    });

    it('shares encoder slots between transcodes and segments', async () => {
        await createService([], false, 1);
        await service.createTask(media, 'target-1');
        await vi.waitFor(() => expect(encoders.encoders).toHaveLength(1));

        const segment = service.getSegment(media, 'target-2', 0);

        await sleep(50);

        expect(encoders.encoders).toHaveLength(1);

        encoders.encoders[0].finish();
        await vi.waitFor(() => expect(encoders.encoders).toHaveLength(2));
        encoders.encoders[1].finish();

        expect(await segment).toBe(path.join(service.config.streamDirectory, 'media-1', 'target-2', '0.ts'));
    });

    it('serves manifests and refuses segments of unknown targets', async () => {
        await createService([], true);

        expect(service.getManifest(media)).toBe(buildManifest(23, 5));
        expect(await rejectionMessage(service.getSegment(media, 'missing', 0))).toBe('Target missing not found');
        expect(await service.getSegment(media, 'target-1', 4))
            .toBe(path.join(service.config.streamDirectory, 'media-1', 'target-1', '4.ts'));
    });
});
