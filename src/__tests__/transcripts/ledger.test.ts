import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Ledger } from '../../transcripts/ledger';
import { LedgerEntry } from '../../transcripts/types';
import { PersistenceError } from '../../shared/errors';
import { makeTempDir, removeDir } from '../helpers';

function entry(overrides: Partial<LedgerEntry> = {}): LedgerEntry {
    return {
        processedAt: '2024-03-01T10:00:00.000Z',
        sourceFile: '/media/a.mp4',
        outputFile: '/out/a.txt',
        duration: 60,
        processingTime: 12,
        modelUsed: 'base',
        success: true,
        error: '',
        ...overrides,
    };
}

describe('Ledger', () => {
    let dir: string;
    let ledgerPath: string;

    beforeEach(async () => {
        dir = await makeTempDir();
        ledgerPath = path.join(dir, '.processing_history.json');
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('starts empty when the file is missing', async () => {
        const ledger = await Ledger.open(ledgerPath);
        expect(ledger.size).toBe(0);
        expect(ledger.stats()).toEqual({ totalProcessed: 0, successful: 0, failed: 0, totalDuration: 0, totalProcessingTime: 0 });
    });

    it('treats a corrupt file as empty', async () => {
        await fs.writeFile(ledgerPath, '{ "processed": ');
        const ledger = await Ledger.open(ledgerPath);
        expect(ledger.size).toBe(0);
    });

    it('treats a file with the wrong shape as empty', async () => {
        await fs.writeFile(ledgerPath, JSON.stringify({ processed: [1, 2, 3] }));
        const ledger = await Ledger.open(ledgerPath);
        expect(ledger.size).toBe(0);
    });

    it('persists entries and statistics', async () => {
        const ledger = await Ledger.open(ledgerPath);
        await ledger.record('id-1', entry());
        await ledger.record('id-2', entry({ success: false, error: 'File is empty', errorKind: 'ValidationError', duration: 0, processingTime: 0.5 }));

        const reopened = await Ledger.open(ledgerPath);
        expect(reopened.size).toBe(2);
        expect(reopened.get('id-2')).toEqual(entry({
            success: false,
            error: 'File is empty',
            errorKind: 'ValidationError',
            duration: 0,
            processingTime: 0.5,
        }));
        expect(reopened.stats()).toEqual({ totalProcessed: 2, successful: 1, failed: 1, totalDuration: 60, totalProcessingTime: 12.5 });

        const raw = JSON.parse(await fs.readFile(ledgerPath, 'utf-8'));
        expect(raw.version).toBe(1);
        expect(Object.keys(raw.processed)).toEqual(['id-1', 'id-2']);
    });

    it('serializes concurrent records so none are lost', async () => {
        const ledger = await Ledger.open(ledgerPath);
        await Promise.all(
            Array.from({ length: 20 }, (_, i) => ledger.record(`id-${i}`, entry({ sourceFile: `/media/${i}.mp4` }))),
        );

        const reopened = await Ledger.open(ledgerPath);
        expect(reopened.size).toBe(20);
        expect(reopened.stats().totalProcessed).toBe(20);
        expect(reopened.get('id-13')?.sourceFile).toBe('/media/13.mp4');
    });

    it('keeps the newer attempt when an older one arrives late', async () => {
        const ledger = await Ledger.open(ledgerPath);
        await ledger.record('id-1', entry({ processedAt: '2024-03-02T00:00:00.000Z' }));
        await ledger.record('id-1', entry({ processedAt: '2024-03-01T00:00:00.000Z', success: false, error: 'late' }));

        expect(ledger.get('id-1')?.success).toBe(true);
        expect(ledger.stats().totalProcessed).toBe(1);
    });

    it('replaces a failed attempt with a later success', async () => {
        await fs.writeFile(ledgerPath, JSON.stringify({
            version: 1,
            processed: {
                'id-1': {
                    ...entry({ success: false, error: 'File is empty', errorKind: 'ValidationError' }),
                    reviewer: 'sam',
                },
            },
        }));

        const ledger = await Ledger.open(ledgerPath);
        await ledger.record('id-1', entry({ processedAt: '2024-03-02T00:00:00.000Z' }));

        expect(ledger.get('id-1')).toEqual(entry({ processedAt: '2024-03-02T00:00:00.000Z' }));
        const raw = JSON.parse(await fs.readFile(ledgerPath, 'utf-8'));
        expect(raw.processed['id-1']).toEqual({ ...entry({ processedAt: '2024-03-02T00:00:00.000Z' }), reviewer: 'sam' });
    });

    it('preserves fields it does not know about', async () => {
        await fs.writeFile(ledgerPath, JSON.stringify({
            version: 1,
            note: 'keep me',
            processed: { old: { ...entry(), reviewer: 'sam' } },
        }));

        const ledger = await Ledger.open(ledgerPath);
        await ledger.record('new', entry({ sourceFile: '/media/b.mp4' }));

        const raw = JSON.parse(await fs.readFile(ledgerPath, 'utf-8'));
        expect(raw.note).toBe('keep me');
        expect(raw.processed.old.reviewer).toBe('sam');
        expect(raw.processed.new.sourceFile).toBe('/media/b.mp4');
    });

    it('raises PersistenceError and keeps the last good state when writing fails', async () => {
        const blocker = path.join(dir, 'blocker');
        await fs.writeFile(blocker, 'not a directory');

        const ledger = await Ledger.open(path.join(blocker, 'ledger.json'));
        await expect(ledger.record('id-1', entry())).rejects.toBeInstanceOf(PersistenceError);
        expect(ledger.size).toBe(0);
        expect(ledger.get('id-1')).toBeUndefined();
    });

    describe('shouldSkip', () => {
        let outputPath: string;
        let ledger: Ledger;

        beforeEach(async () => {
            outputPath = path.join(dir, 'a.txt');
            await fs.writeFile(outputPath, 'hello\n');
            ledger = await Ledger.open(ledgerPath);
            await ledger.record('id-1', entry({ outputFile: outputPath }));
        });

        it('skips a successful entry whose output exists', async () => {
            expect(await ledger.shouldSkip('id-1', outputPath)).toBe(true);
        });

        it('does not skip unknown identities', async () => {
            expect(await ledger.shouldSkip('id-2', outputPath)).toBe(false);
        });

        it('does not skip once the output is deleted', async () => {
            await fs.rm(outputPath);
            expect(await ledger.shouldSkip('id-1', outputPath)).toBe(false);
        });

        it('does not skip an empty output', async () => {
            await fs.writeFile(outputPath, '');
            expect(await ledger.shouldSkip('id-1', outputPath)).toBe(false);
        });

        it('does not skip when the output path changed', async () => {
            expect(await ledger.shouldSkip('id-1', path.join(dir, 'a.srt'))).toBe(false);
        });

        it('does not skip failed attempts', async () => {
            await ledger.record('id-1', entry({
                processedAt: '2024-03-05T00:00:00.000Z',
                outputFile: outputPath,
                success: false,
                error: 'boom',
            }));
            expect(await ledger.shouldSkip('id-1', outputPath)).toBe(false);
        });
    });
});
