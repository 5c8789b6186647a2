import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { fileIdentity, scan, summarizeWorkItems } from '../../transcripts/discovery';
import { NotADirectoryError, NotFoundError } from '../../shared/errors';
import { makeTempDir, removeDir, writeMedia } from '../helpers';

describe('discovery', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
        await writeMedia(root, 'b.mp4');
        await writeMedia(root, 'a.MP3', 'a');
        await writeMedia(root, 'notes.txt');
        await writeMedia(root, 'sub/deep/d.mkv');
        await writeMedia(root, 'sub/c.wav', 'ccc');
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('finds supported files recursively in sorted order', async () => {
        const items = await scan(root);
        expect(items.map(item => item.relativePath)).toEqual(['a.MP3', 'b.mp4', 'sub/c.wav', 'sub/deep/d.mkv']);
        expect(items[2].path).toBe(path.join(root, 'sub', 'c.wav'));
        expect(items[2].size).toBe(3);
    });

    it('orders by code unit, so uppercase names sort first', async () => {
        await writeMedia(root, 'Z.mp4');
        const items = await scan(root, { recursive: false });
        expect(items.map(item => item.relativePath)).toEqual(['Z.mp4', 'a.MP3', 'b.mp4']);
    });

    it('stays at the top level when not recursive', async () => {
        const items = await scan(root, { recursive: false });
        expect(items.map(item => item.relativePath)).toEqual(['a.MP3', 'b.mp4']);
    });

    it('honors a custom extension list', async () => {
        const items = await scan(root, { extensions: ['.WAV'] });
        expect(items.map(item => item.relativePath)).toEqual(['sub/c.wav']);
    });

    it('derives identity from absolute path and mtime', async () => {
        const [item] = await scan(root, { extensions: ['.mp4'], recursive: false });
        const expected = createHash('md5').update(`${item.path}_${item.mtimeMs}`).digest('hex');
        expect(item.identity).toBe(expected);
        expect(fileIdentity(item.path, item.mtimeMs)).toBe(expected);
    });

    it('follows links to files but not to directories', async () => {
        const outside = await makeTempDir();
        try {
            const target = await writeMedia(outside, 'real.mp4', 'linked');
            await fs.symlink(target, path.join(root, 'linked.mp4'));
            await fs.symlink(path.join(outside, 'gone.mp4'), path.join(root, 'gone.mp4'));
            await fs.symlink(outside, path.join(root, 'linkdir'));

            const items = await scan(root, { extensions: ['.mp4'] });

            expect(items.map(item => item.relativePath)).toEqual(['b.mp4', 'linked.mp4']);
            expect(items[1].path).toBe(path.join(root, 'linked.mp4'));
            expect(items[1].size).toBe(6);
        } finally {
            await removeDir(outside);
        }
    });

    it('rejects a missing root', async () => {
        await expect(scan(path.join(root, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects a root that is a file', async () => {
        await expect(scan(path.join(root, 'b.mp4'))).rejects.toBeInstanceOf(NotADirectoryError);
    });

    it('summarizes counts and sizes per extension', async () => {
        const summary = summarizeWorkItems(await scan(root));
        expect(summary.totalFiles).toBe(4);
        expect(summary.byExtension['.mp3']).toEqual({ count: 1, size: 1 });
        expect(summary.byExtension['.wav']).toEqual({ count: 1, size: 3 });
        expect(summary.totalSize).toBe(1 + 3 + 16 + 16);
    });
});
