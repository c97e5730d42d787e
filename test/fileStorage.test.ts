import * as fs from 'fs';
import * as path from 'path';

import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';

import { FileStorage } from '../src/fileStorage';
import { MediaSource } from '../src/mediaSource';
import { makeMedia, makeTarget, makeTempDir, rejectionMessage } from './helpers';

describe('FileStorage', () => {
    const storage = new FileStorage();
    const schema = z.object({ name: z.string(), size: z.number() });

    let root: string;

    beforeEach(() => {
        root = makeTempDir();
    });

    it('only reports files as existing', async () => {
        fs.writeFileSync(path.join(root, 'a.txt'), 'a');

        expect(await storage.exists(path.join(root, 'a.txt')).toPromise()).toBe(true);
        expect(await storage.exists(root).toPromise()).toBe(false);
        expect(await storage.exists(path.join(root, 'missing.txt')).toPromise()).toBe(false);
    });

    it('deletes files and accepts files that are already gone', async () => {
        const file = path.join(root, 'a.txt');

        fs.writeFileSync(file, 'a');
        await storage.deleteFile(file).toPromise();
        await storage.deleteFile(file).toPromise();

        expect(fs.existsSync(file)).toBe(false);
    });

    it('lists files below a directory', async () => {
        fs.mkdirSync(path.join(root, 'nested'));
        fs.writeFileSync(path.join(root, 'a.txt'), 'a');
        fs.writeFileSync(path.join(root, 'nested', 'b.txt'), 'b');

        const files = await storage.listFiles(root).toPromise();

        expect([...files].sort()).toEqual([path.join(root, 'a.txt'), path.join(root, 'nested', 'b.txt')]);
    });

    it('round trips validated JSON', async () => {
        const file = path.join(root, 'deep', 'doc.json');

        await storage.writeJson(file, { name: 'clip', size: 3 }).toPromise();

        expect(await storage.readJson(file, schema).toPromise()).toEqual({ name: 'clip', size: 3 });
    });

    it('reports missing, malformed and invalid documents', async () => {
        const missing = path.join(root, 'missing.json');
        const malformed = path.join(root, 'malformed.json');
        const invalid = path.join(root, 'invalid.json');

        fs.writeFileSync(malformed, '{ name');
        fs.writeFileSync(invalid, JSON.stringify({ name: 'clip', size: 'big' }));

        expect(await rejectionMessage(storage.readJson(missing, schema).toPromise())).toBe(`File not found: ${missing}`);
        await expect(storage.readJson(malformed, schema).toPromise()).rejects.toBeDefined();
        expect(await rejectionMessage(storage.readJson(invalid, schema).toPromise()))
            .toBe(`Invalid content in ${invalid}: size: Expected number, received string`);
    });
});

describe('MediaSource', () => {
    const layout = { outputDirectory: '/data/out', streamDirectory: '/data/streams' };
    const target = makeTarget({ id: 'web/720' });
    const source = new MediaSource(makeMedia({ id: 'show 1' }), new FileStorage(), layout);

    it('lays out transcodes per media', () => {
        expect(source.getTranscodePath(target)).toBe(path.join('/data/out', 'show_1', 'web_720.mp4'));
    });

    it('lays out segments per media and target', () => {
        expect(source.getMediaStreamDirectory()).toBe(path.join('/data/streams', 'show_1'));
        expect(source.getSegmentPath(target, 3)).toBe(path.join('/data/streams', 'show_1', 'web_720', '3.ts'));
        expect(source.getSegmentPlaylistPath(target, 3)).toBe(path.join('/data/streams', 'show_1', 'web_720', '3.m3u8'));
    });
});
