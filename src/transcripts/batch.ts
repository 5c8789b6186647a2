/**
 * Batch run
 *
 * setup checks → scan → skip filter → scheduled pipelines → temp sweep → report
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig, ResolvedPaths } from '../config/config';
import { SetupError, hasErrorCode, toErrorMessage } from '../shared/errors';
import { CancellationToken } from '../scheduler/cancellation';
import { log, logWarn } from '../scheduler/logger';
import { StatisticsAggregator } from '../scheduler/statistics';
import { TaskRunner, TaskRunnerStatus } from '../scheduler/task-runner';
import { scan, summarizeWorkItems } from './discovery';
import { AudioExtractionEngine, TranscriptionEngine } from './engines/types';
import { createOutputFormat } from './formats';
import { Ledger } from './ledger';
import { TaskPipeline } from './pipeline';
import { LedgerStatistics, RunStatistics, WorkItem } from './types';

/** Temp audio files left behind by earlier runs that the sweep keeps */
export const KEEP_RECENT_TEMP_FILES = 5;

export type BatchState = 'starting' | 'scanning' | 'running' | 'finishing' | 'finished' | 'failed';

export interface BatchOptions {
    config: AppConfig;
    paths: ResolvedPaths;
    audio: AudioExtractionEngine;
    transcriber: TranscriptionEngine;
    token?: CancellationToken;
}

export interface BatchResult {
    runId: string;
    statistics: RunStatistics;
    interrupted: boolean;

    /** Finished without being interrupted; per-file failures do not count */
    success: boolean;
    wallSeconds: number;
}

export interface BatchStatus {
    runId: string;
    state: BatchState;
    startedAt: Date;
    statistics: RunStatistics;
    tasks: TaskRunnerStatus;
}

function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    const units = ['KB', 'MB', 'GB', 'TB'];
    let value = bytes / 1024;
    let unit = 0;
    while (value >= 1024 && unit < units.length - 1) {
        value /= 1024;
        unit++;
    }
    return `${value.toFixed(1)} ${units[unit]}`;
}

async function ensureWritableDir(dir: string, what: string): Promise<void> {
    try {
        await fs.mkdir(dir, { recursive: true });
    } catch (error) {
        throw new SetupError(`Cannot create ${what} directory ${dir}: ${toErrorMessage(error)}`);
    }
}

/**
 * Fail fast before any task runs
 */
export async function validateSetup(paths: ResolvedPaths): Promise<void> {
    try {
        const stats = await fs.stat(paths.input);
        if (!stats.isDirectory()) {
            throw new SetupError(`Input path is not a directory: ${paths.input}`);
        }
    } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) {
            throw new SetupError(`Input directory does not exist: ${paths.input}`);
        }
        throw error;
    }

    await ensureWritableDir(paths.output, 'output');
    await ensureWritableDir(paths.tempAudio, 'temp');
    await ensureWritableDir(path.dirname(paths.ledger), 'ledger');
    if (paths.relocateTo) {
        await ensureWritableDir(paths.relocateTo, 'relocation');
    }
}

/**
 * Delete leftover .wav files in the temp audio directory, keeping the
 * `keepRecent` newest. Returns how many were removed.
 */
export async function cleanupStaleTempAudio(tempAudioDir: string, keepRecent = KEEP_RECENT_TEMP_FILES): Promise<number> {
    let names: string[];
    try {
        names = await fs.readdir(tempAudioDir);
    } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) return 0;
        logWarn(`Cannot read temp directory ${tempAudioDir}: ${toErrorMessage(error)}`, 'cleanup');
        return 0;
    }

    const files: Array<{ filePath: string; mtimeMs: number }> = [];
    for (const name of names.filter(n => n.toLowerCase().endsWith('.wav'))) {
        const filePath = path.join(tempAudioDir, name);
        try {
            const stats = await fs.stat(filePath);
            if (stats.isFile()) files.push({ filePath, mtimeMs: stats.mtimeMs });
        } catch (error) {
            logWarn(`Cannot stat ${filePath}: ${toErrorMessage(error)}`, 'cleanup');
        }
    }

    files.sort((a, b) => b.mtimeMs - a.mtimeMs);

    let deleted = 0;
    for (const { filePath } of files.slice(Math.max(0, keepRecent))) {
        try {
            await fs.rm(filePath, { force: true });
            deleted++;
        } catch (error) {
            logWarn(`Failed to delete temp file ${filePath}: ${toErrorMessage(error)}`, 'cleanup');
        }
    }

    if (deleted > 0) {
        log(`Cleaned up ${deleted} temporary files`, 'cleanup');
    }
    return deleted;
}

export class BatchRun {
    readonly runId = uuidv4();
    readonly token: CancellationToken;
    readonly startedAt = new Date();

    private state: BatchState = 'starting';
    private ledger: Ledger | null = null;
    private readonly statistics = new StatisticsAggregator();
    private readonly pipeline: TaskPipeline;
    readonly runner: TaskRunner;

    constructor(private readonly options: BatchOptions) {
        this.token = options.token ?? new CancellationToken();

        const { config, paths } = options;
        const format = createOutputFormat(config.processing.outputFormat, {
            includeTimestamps: config.processing.includeTimestamps,
        });

        this.pipeline = new TaskPipeline(
            {
                outputRoot: paths.output,
                tempAudioDir: paths.tempAudio,
                relocateTo: paths.relocateTo,
                format,
                language: config.processing.language,
                saveDetailedJson: config.processing.saveDetailedJson,
                keepTempAudio: config.processing.keepTempAudio,
            },
            {
                audio: options.audio,
                transcriber: options.transcriber,
                ledger: {
                    record: (identity, entry) => this.requireLedger().record(identity, entry),
                },
            },
        );

        this.runner = new TaskRunner(
            (item, token, report) => this.pipeline.run(item, token, report),
            this.statistics,
        );
    }

    getStatus(): BatchStatus {
        return {
            runId: this.runId,
            state: this.state,
            startedAt: this.startedAt,
            statistics: this.statistics.snapshot(),
            tasks: this.runner.getStatus(),
        };
    }

    /** Cross-run aggregate, once the ledger is open */
    getLedgerStatistics(): LedgerStatistics | null {
        return this.ledger?.stats() ?? null;
    }

    requestShutdown(): void {
        this.token.request();
    }

    async execute(): Promise<BatchResult> {
        const { config, paths } = this.options;

        try {
            await validateSetup(paths);
            this.ledger = await Ledger.open(paths.ledger);

            this.state = 'scanning';
            const items = await scan(paths.input, {
                recursive: config.processing.recursive,
                extensions: config.processing.extensions,
            });
            this.statistics.setDiscovered(items.length);
            this.printHeader(items);

            const pending = config.processing.skipExisting ? await this.filterProcessed(items, this.ledger) : items;

            this.state = 'running';
            if (pending.length > 0) {
                log(`Processing ${pending.length} files with concurrency ${config.processing.concurrency}`, 'batch');
            } else {
                log('No files to process', 'batch');
            }
            await this.runner.run(pending, config.processing.concurrency, this.token);

            this.state = 'finishing';
            await this.ledger.flush();
            if (!config.processing.keepTempAudio) {
                await cleanupStaleTempAudio(paths.tempAudio);
            }
        } catch (error) {
            this.state = 'failed';
            throw error;
        }

        this.state = 'finished';
        const interrupted = this.token.isCancellationRequested;
        return {
            runId: this.runId,
            statistics: this.statistics.snapshot(),
            interrupted,
            success: !interrupted,
            wallSeconds: (Date.now() - this.startedAt.getTime()) / 1000,
        };
    }

    private async filterProcessed(items: WorkItem[], ledger: Ledger): Promise<WorkItem[]> {
        const pending: WorkItem[] = [];
        let skipped = 0;

        for (const item of items) {
            if (await ledger.shouldSkip(item.identity, this.pipeline.outputPathFor(item))) {
                skipped++;
            } else {
                pending.push(item);
            }
        }

        if (skipped > 0) {
            this.statistics.recordSkipped(skipped);
            log(`Skipping ${skipped} already processed files`, 'batch');
        }
        return pending;
    }

    private printHeader(items: WorkItem[]): void {
        const summary = summarizeWorkItems(items);
        log(`Found ${summary.totalFiles} media files (${formatBytes(summary.totalSize)}) in ${this.options.paths.input}`, 'batch');
        for (const [ext, group] of Object.entries(summary.byExtension).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
            log(`  ${ext}: ${group.count} files (${formatBytes(group.size)})`, 'batch');
        }
    }

    private requireLedger(): Ledger {
        if (!this.ledger) {
            throw new SetupError('Ledger is not open');
        }
        return this.ledger;
    }
}

export async function runBatch(options: BatchOptions): Promise<BatchResult> {
    return new BatchRun(options).execute();
}
