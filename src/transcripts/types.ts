/**
 * Transcript types
 */

import type { ErrorKind } from '../shared/errors';

/**
 * A media file found by discovery. Never mutated after the scan.
 */
export interface WorkItem {
    /** Absolute path to the source file */
    readonly path: string;

    /** Path relative to the input root, forward slashes */
    readonly relativePath: string;

    readonly size: number;

    /** Modification time in milliseconds */
    readonly mtimeMs: number;

    /** Stable key: md5 of absolute path + mtime */
    readonly identity: string;
}

export interface WordTiming {
    word: string;
    start: number;
    end: number;

    /** Token confidence in [0, 1] */
    probability: number;
}

export interface TimedSegment {
    /** Seconds from the start of the media */
    start: number;
    end: number;
    text: string;
    words?: WordTiming[];
}

export interface TranscriptionResult {
    text: string;
    segments: TimedSegment[];

    /** Language reported by the engine (or the hint when it reports none) */
    language: string;

    /** Source media duration in seconds */
    duration: number;

    /** Engine wall time in seconds */
    processingTime: number;

    /** Model identifier used for the run */
    model: string;
}

/**
 * Ledger record of the latest attempt for one file identity
 */
export interface LedgerEntry {
    /** ISO timestamp of the attempt */
    processedAt: string;
    sourceFile: string;
    outputFile: string;

    /** Media duration in seconds (0 when unknown) */
    duration: number;

    /** Wall time spent on the attempt, in seconds */
    processingTime: number;
    modelUsed: string;
    success: boolean;

    /** Empty on success */
    error: string;
    errorKind?: ErrorKind;
}

/**
 * Cross-run aggregate stored in the ledger file
 */
export interface LedgerStatistics {
    totalProcessed: number;
    successful: number;
    failed: number;
    totalDuration: number;
    totalProcessingTime: number;
}

export interface FailedFile {
    path: string;
    errorKind: ErrorKind;
    error: string;
}

/**
 * Counters for a single batch run (not persisted)
 */
export interface RunStatistics {
    totalDiscovered: number;
    processed: number;
    successful: number;
    failed: number;
    skipped: number;
    cancelled: number;

    /** Seconds of media across successful files */
    totalDuration: number;

    /** Seconds of wall time across successful files */
    totalProcessingTime: number;

    /** processing time / media duration; null until some duration is known */
    realtimeFactor: number | null;
    failures: FailedFile[];
}

export type PipelineStage =
    | 'queued'
    | 'validated'
    | 'audio-extracted'
    | 'transcribed'
    | 'output-written'
    | 'ledger-updated'
    | 'relocated'
    | 'done'
    | 'failed'
    | 'cancelled';

export type TaskStatus = 'success' | 'failed' | 'cancelled' | 'skipped';

/**
 * What a task pipeline reports back to the scheduler
 */
export interface TaskOutcome {
    item: WorkItem;
    status: TaskStatus;

    /** Last stage reached */
    stage: PipelineStage;
    outputPath: string;
    duration: number;
    processingTime: number;
    errorKind?: ErrorKind;
    error?: string;
    relocatedTo?: string;
}

export interface TaskProgress {
    stage: PipelineStage;

    /** Overall task progress in [0, 1], never decreasing */
    ratio: number;
}

export type TaskProgressReporter = (progress: TaskProgress) => void;
