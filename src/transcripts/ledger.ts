/**
 * Processing ledger
 *
 * Persisted record of every attempt, keyed by file identity. It decides
 * which files a run may skip and carries the cross-run aggregate.
 *
 * All writes go through a single-concurrency queue. The in-memory snapshot
 * is only replaced once the new document is safely on disk.
 */

import * as fs from 'fs/promises';
import PQueue from 'p-queue';
import { z } from 'zod';
import { writeFileAtomic } from '../shared/atomic-write';
import { PersistenceError, hasErrorCode, isErrorKind, toErrorMessage } from '../shared/errors';
import { logWarn } from '../scheduler/logger';
import { LedgerEntry, LedgerStatistics } from './types';

export const LEDGER_VERSION = 1;

const ledgerEntrySchema = z.object({
    processedAt: z.string(),
    sourceFile: z.string(),
    outputFile: z.string(),
    duration: z.number(),
    processingTime: z.number(),
    modelUsed: z.string(),
    success: z.boolean(),
    error: z.string(),
    errorKind: z.string().optional(),
}).passthrough();

const ledgerStatisticsSchema = z.object({
    totalProcessed: z.number(),
    successful: z.number(),
    failed: z.number(),
    totalDuration: z.number(),
    totalProcessingTime: z.number(),
});

const ledgerDocumentSchema = z.object({
    version: z.number().optional(),
    processed: z.record(ledgerEntrySchema),
    statistics: ledgerStatisticsSchema.optional(),
}).passthrough();

type StoredEntry = z.infer<typeof ledgerEntrySchema>;
type LedgerDocument = z.infer<typeof ledgerDocumentSchema>;

function emptyStatistics(): LedgerStatistics {
    return { totalProcessed: 0, successful: 0, failed: 0, totalDuration: 0, totalProcessingTime: 0 };
}

function emptyDocument(): LedgerDocument {
    return { version: LEDGER_VERSION, processed: {}, statistics: emptyStatistics() };
}

const KNOWN_ENTRY_FIELDS = new Set(Object.keys(ledgerEntrySchema.shape));

/** Fields other tools added to an entry; they survive a new attempt */
function foreignFields(entry: StoredEntry | undefined): Record<string, unknown> {
    if (!entry) return {};
    return Object.fromEntries(Object.entries(entry).filter(([key]) => !KNOWN_ENTRY_FIELDS.has(key)));
}

async function fileHasContent(filePath: string): Promise<boolean> {
    try {
        const stats = await fs.stat(filePath);
        return stats.isFile() && stats.size > 0;
    } catch {
        return false;
    }
}

/** The write side the pipeline needs */
export interface LedgerWriter {
    record(identity: string, entry: LedgerEntry): Promise<void>;
}

export class Ledger implements LedgerWriter {
    private snapshot: LedgerDocument;
    private readonly writer = new PQueue({ concurrency: 1 });

    private constructor(readonly filePath: string, document: LedgerDocument) {
        this.snapshot = document;
    }

    /**
     * Open the ledger at filePath. Missing is empty; unreadable or invalid
     * content is logged and treated as empty.
     */
    static async open(filePath: string): Promise<Ledger> {
        let data: string;
        try {
            data = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            if (!hasErrorCode(error, 'ENOENT')) {
                logWarn(`Could not read ledger ${filePath}, starting empty: ${toErrorMessage(error)}`, 'ledger');
            }
            return new Ledger(filePath, emptyDocument());
        }

        let raw: unknown;
        try {
            raw = JSON.parse(data);
        } catch (error) {
            logWarn(`Ledger ${filePath} is not valid JSON, starting empty: ${toErrorMessage(error)}`, 'ledger');
            return new Ledger(filePath, emptyDocument());
        }

        const parsed = ledgerDocumentSchema.safeParse(raw);
        if (!parsed.success) {
            logWarn(`Ledger ${filePath} has an unexpected shape, starting empty`, 'ledger');
            return new Ledger(filePath, emptyDocument());
        }

        return new Ledger(filePath, {
            ...parsed.data,
            statistics: parsed.data.statistics ?? emptyStatistics(),
        });
    }

    /**
     * True only when the last attempt succeeded, wrote to outputPath, and
     * that file is still there with content
     */
    async shouldSkip(identity: string, outputPath: string): Promise<boolean> {
        const entry = this.snapshot.processed[identity];
        if (!entry || !entry.success || entry.outputFile !== outputPath) {
            return false;
        }
        return fileHasContent(entry.outputFile);
    }

    get(identity: string): LedgerEntry | undefined {
        const entry = this.snapshot.processed[identity];
        return entry ? toLedgerEntry(entry) : undefined;
    }

    get size(): number {
        return Object.keys(this.snapshot.processed).length;
    }

    stats(): LedgerStatistics {
        return { ...(this.snapshot.statistics ?? emptyStatistics()) };
    }

    /**
     * Store the outcome for identity and persist the whole ledger.
     * Calls are serialized; each resolves once its write is on disk.
     */
    record(identity: string, entry: LedgerEntry): Promise<void> {
        return this.writer.add(() => this.persist(identity, entry));
    }

    /** Resolves when every queued write has settled */
    async flush(): Promise<void> {
        await this.writer.onIdle();
    }

    private async persist(identity: string, entry: LedgerEntry): Promise<void> {
        const current = this.snapshot;
        const existing = current.processed[identity];

        // An older attempt never replaces a newer one
        if (existing && existing.processedAt > entry.processedAt) {
            return;
        }

        const statistics = { ...(current.statistics ?? emptyStatistics()) };
        statistics.totalProcessed++;
        if (entry.success) {
            statistics.successful++;
        } else {
            statistics.failed++;
        }
        statistics.totalDuration += entry.duration;
        statistics.totalProcessingTime += entry.processingTime;

        const next: LedgerDocument = {
            ...current,
            version: LEDGER_VERSION,
            processed: {
                ...current.processed,
                [identity]: { ...foreignFields(existing), ...entry },
            },
            statistics,
        };

        try {
            await writeFileAtomic(this.filePath, JSON.stringify(next, null, 2));
        } catch (error) {
            throw new PersistenceError(`Failed to write ledger ${this.filePath}: ${toErrorMessage(error)}`);
        }
        this.snapshot = next;
    }
}

function toLedgerEntry(entry: StoredEntry): LedgerEntry {
    const result: LedgerEntry = {
        processedAt: entry.processedAt,
        sourceFile: entry.sourceFile,
        outputFile: entry.outputFile,
        duration: entry.duration,
        processingTime: entry.processingTime,
        modelUsed: entry.modelUsed,
        success: entry.success,
        error: entry.error,
    };
    const kind = entry.errorKind;
    if (kind !== undefined && isErrorKind(kind)) {
        result.errorKind = kind;
    }
    return result;
}
