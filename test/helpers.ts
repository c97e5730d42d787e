import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { EncoderEventMap, EncoderFactory, EncoderProcess } from '../src/ffmpeg';
import { createLogger, Logger } from '../src/logger';
import { EncodeRequest, MediaDescriptor, Progress, Target } from '../src/types';
import { ExtendedEventEmitter } from '../src/utils';

export class FakeEncoder extends ExtendedEventEmitter<EncoderEventMap> implements EncoderProcess {
    runs = 0;

    killSignals: string[] = [];

    private settled = false;

    constructor (readonly request: EncodeRequest, private readonly autoFinish: boolean) {
        super();
    }

    run (): void {
        this.runs++;

        if (this.autoFinish) {
            setImmediate(() => this.finish());
        }
    }

    /**
     * Mirrors a real process: the kill is only observed once the process exits
     */
    kill (signal: NodeJS.Signals = 'SIGKILL'): void {
        this.killSignals.push(signal);
        setImmediate(() => this.fail(new Error(`FFmpeg process was terminated by ${signal}`)));
    }

    report (progress: Progress): void {
        this.emit('progress', progress);
    }

    /**
     * Writes the files a real encode would leave behind and reports success
     */
    finish (): void {
        if (this.settled) {
            return;
        }

        this.settled = true;
        fs.mkdirSync(path.dirname(this.request.outputPath), { recursive: true });
        fs.writeFileSync(this.request.outputPath, 'encoded');

        const { hlsSegmentFilename, startNumber } = this.request.options;

        if (hlsSegmentFilename) {
            fs.writeFileSync(hlsSegmentFilename.replace('%d', String(startNumber ?? 0)), 'segment');
        }

        this.emit('end', undefined);
    }

    /**
     * Leaves half written files behind, the way an encode that dies midway does
     */
    writePartial (): void {
        fs.mkdirSync(path.dirname(this.request.outputPath), { recursive: true });
        fs.writeFileSync(this.request.outputPath, 'partial');

        const { hlsSegmentFilename, startNumber } = this.request.options;

        if (hlsSegmentFilename) {
            fs.writeFileSync(hlsSegmentFilename.replace('%d', String(startNumber ?? 0)), 'partial');
        }
    }

    fail (error: Error): void {
        if (this.settled) {
            return;
        }

        this.settled = true;
        this.emit('error', error);
    }
}

export interface FakeEncoderFactory {
    factory: EncoderFactory;
    encoders: FakeEncoder[];
}

export function createFakeEncoderFactory (autoFinish: boolean = false): FakeEncoderFactory {
    const encoders: FakeEncoder[] = [];

    return {
        encoders,
        factory: (request) => {
            const encoder = new FakeEncoder(request, autoFinish);

            encoders.push(encoder);

            return encoder;
        },
    };
}

export function silentLogger (): Logger {
    return createLogger('test', 'silent');
}

export function makeTempDir (): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'transcode-orchestrator-test-'));
}

export function makeMedia (overrides: Partial<MediaDescriptor> = {}): MediaDescriptor {
    return {
        id: 'media-1',
        sourcePath: '/library/shows/pilot.mkv',
        duration: 23,
        title: 'Pilot',
        height: 1080,
        codec: 'h264',
        container: 'matroska',
        ...overrides,
    };
}

export function makeTarget (overrides: Partial<Target> = {}): Target {
    return {
        id: 'target-1',
        label: 'H264 720p',
        extension: 'mp4',
        options: {
            videoCodec: 'libx264',
            audioCodec: 'aac',
            resolution: '1280x720',
        },
        ...overrides,
    };
}

/**
 * Message of whatever a rejected TaskEither promise carries
 */
export function errorMessage (reason: unknown): string {
    if (reason instanceof Error) {
        return reason.message;
    }

    if (typeof reason === 'object' && reason !== null && 'error' in reason) {
        return errorMessage(reason.error);
    }

    if (typeof reason === 'object' && reason !== null && 'message' in reason && typeof reason.message === 'string') {
        return reason.message;
    }

    return String(reason);
}

export async function rejectionMessage (promise: Promise<unknown>): Promise<string> {
    try {
        await promise;
    } catch (reason) {
        return errorMessage(reason);
    }

    throw new Error('Expected the promise to reject');
}
