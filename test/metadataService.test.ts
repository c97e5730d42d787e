import { describe, expect, it } from 'vitest';

import { parseProbeOutput } from '../src/metadataService';
import { rejectionMessage } from './helpers';

describe('parseProbeOutput', () => {
    it('takes the container and the first video stream', async () => {
        const output = JSON.stringify({
            format: { duration: '1320.512000', format_name: 'matroska,webm' },
            streams: [
                { index: 0, codec_type: 'audio', codec_name: 'aac' },
                { index: 1, codec_type: 'video', codec_name: 'hevc', width: 1920, height: 1080 },
                { index: 2, codec_type: 'video', codec_name: 'mjpeg', width: 320, height: 180 },
            ],
        });

        expect(await parseProbeOutput(output).toPromise()).toEqual({
            duration: 1320.512,
            container: 'matroska,webm',
            codec: 'hevc',
            width: 1920,
            height: 1080,
        });
    });

    it('leaves stream fields empty for audio only files', async () => {
        const output = JSON.stringify({ format: { duration: '180.0', format_name: 'mp3' }, streams: [{ codec_type: 'audio' }] });

        expect(await parseProbeOutput(output).toPromise()).toEqual({
            duration: 180,
            container: 'mp3',
            codec: null,
            width: null,
            height: null,
        });
    });

    it('rejects output without a format section', async () => {
        expect(await rejectionMessage(parseProbeOutput(JSON.stringify({ streams: [] })).toPromise()))
            .toBe('Unexpected FFprobe output: format: Required');
    });
});
