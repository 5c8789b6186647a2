/**
 * Task Pipeline
 *
 * One media file end to end:
 *   validate → extract audio → transcribe → write output → ledger → (relocate) → done
 *
 * Every failure is classified and recorded in the ledger. A cancellation
 * records nothing. Temp audio is removed on every path unless kept on purpose.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { writeFileAtomic } from '../shared/atomic-write';
import {
    CancelledError,
    EmptyResultError,
    EngineFailure,
    ExtractionError,
    PersistenceError,
    TranscriptionError,
    ValidationError,
    classifyError,
    hasErrorCode,
    toErrorMessage,
} from '../shared/errors';
import { log, logError, logWarn } from '../scheduler/logger';
import { CancellationToken } from '../scheduler/cancellation';
import { STAGE_WEIGHTS } from './constants';
import { AudioExtractionEngine, EngineTranscript, MediaInfo, TranscriptionEngine } from './engines/types';
import { MonotonicProgress } from './engines/progress';
import { JsonFormat, OutputFormat } from './formats';
import { LedgerWriter } from './ledger';
import { detailedJsonPathFor, outputPathFor, tempAudioPathFor } from './output-paths';
import { relocateFile } from './relocate';
import {
    LedgerEntry,
    PipelineStage,
    TaskOutcome,
    TaskProgressReporter,
    TranscriptionResult,
    WorkItem,
} from './types';

export interface PipelineOptions {
    outputRoot: string;
    tempAudioDir: string;

    /** Move sources here after success; null to leave them */
    relocateTo: string | null;
    format: OutputFormat;
    language: string;
    saveDetailedJson: boolean;
    keepTempAudio: boolean;
}

export interface PipelineDependencies {
    audio: AudioExtractionEngine;
    transcriber: TranscriptionEngine;
    ledger: LedgerWriter;
}

type StageWindow = { from: number; to: number };

function scaled(window: StageWindow, ratio: number): number {
    return window.from + (window.to - window.from) * ratio;
}

function elapsedSeconds(startedAt: number): number {
    return (Date.now() - startedAt) / 1000;
}

/** Engine failures become the error kind of the stage they happened in */
function wrapEngineError(error: unknown, wrap: (failure: EngineFailure) => EngineFailure): unknown {
    return error instanceof EngineFailure ? wrap(error) : error;
}

export class TaskPipeline {
    constructor(
        private readonly options: PipelineOptions,
        private readonly deps: PipelineDependencies,
    ) {}

    /** Where this item's output goes with the configured format */
    outputPathFor(item: WorkItem): string {
        return outputPathFor(item, this.options.outputRoot, this.options.format.extension);
    }

    async run(item: WorkItem, token: CancellationToken, report?: TaskProgressReporter): Promise<TaskOutcome> {
        const startedAt = Date.now();
        const label = item.relativePath;
        const outputPath = this.outputPathFor(item);
        const tempAudio = tempAudioPathFor(item, this.options.tempAudioDir);

        const state: { stage: PipelineStage } = { stage: 'queued' };
        let duration = 0;
        let extractionStarted = false;

        const progress = new MonotonicProgress(ratio => report?.({ stage: state.stage, ratio }));
        const enter = (next: PipelineStage) => {
            state.stage = next;
            report?.({ stage: next, ratio: progress.value });
        };

        try {
            token.throwIfCancellationRequested();
            const info = await this.validate(item, token);
            duration = info.duration;
            enter('validated');

            token.throwIfCancellationRequested();
            extractionStarted = true;
            await this.extract(item, tempAudio, info, token, label, progress);
            enter('audio-extracted');

            token.throwIfCancellationRequested();
            const result = await this.transcribe(tempAudio, info, token, label, progress);
            enter('transcribed');

            token.throwIfCancellationRequested();
            await this.writeOutput(outputPath, result);
            progress.complete();
            enter('output-written');

            // Past this point the work is done; cancellation no longer applies
            const processingTime = elapsedSeconds(startedAt);
            await this.deps.ledger.record(item.identity, {
                processedAt: new Date().toISOString(),
                sourceFile: item.path,
                outputFile: outputPath,
                duration,
                processingTime,
                modelUsed: this.deps.transcriber.model,
                success: true,
                error: '',
            });
            enter('ledger-updated');

            const relocatedTo = await this.relocate(item);
            if (relocatedTo) enter('relocated');

            enter('done');
            return {
                item,
                status: 'success',
                stage: state.stage,
                outputPath,
                duration,
                processingTime,
                ...(relocatedTo ? { relocatedTo } : {}),
            };
        } catch (error) {
            if (error instanceof CancelledError) {
                enter('cancelled');
                return { item, status: 'cancelled', stage: state.stage, outputPath, duration, processingTime: elapsedSeconds(startedAt) };
            }

            const failedAt = state.stage;
            const classified = classifyError(error);
            const processingTime = elapsedSeconds(startedAt);
            enter('failed');

            // Output is on disk; only the ledger write failed
            if (!(error instanceof PersistenceError && failedAt === 'output-written')) {
                await this.recordFailure(item, outputPath, duration, processingTime, classified.kind, classified.message);
            }

            return {
                item,
                status: 'failed',
                stage: failedAt,
                outputPath,
                duration,
                processingTime,
                errorKind: classified.kind,
                error: classified.message,
            };
        } finally {
            if (extractionStarted && !this.options.keepTempAudio) {
                await this.removeTempAudio(tempAudio);
            }
        }
    }

    private async validate(item: WorkItem, token: CancellationToken): Promise<MediaInfo> {
        let size: number;
        try {
            const stats = await fs.stat(item.path);
            if (!stats.isFile()) {
                throw new ValidationError(`Path is not a file: ${item.path}`);
            }
            size = stats.size;
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                throw new ValidationError(`File does not exist: ${item.path}`);
            }
            throw error;
        }

        if (size === 0) {
            throw new ValidationError(`File is empty: ${item.path}`);
        }

        let info: MediaInfo;
        try {
            info = await this.deps.audio.probe(item.path, { signal: token.signal });
        } catch (error) {
            if (error instanceof CancelledError) throw error;
            throw new ValidationError(`Failed to analyze media file: ${classifyError(error).message}`);
        }

        if (!info.hasAudio) {
            throw new ValidationError('No audio stream found in media file');
        }
        if (!(info.duration > 0)) {
            throw new ValidationError('Media duration is zero or unknown');
        }
        return info;
    }

    private async extract(
        item: WorkItem,
        tempAudio: string,
        info: MediaInfo,
        token: CancellationToken,
        label: string,
        progress: MonotonicProgress,
    ): Promise<void> {
        await fs.mkdir(path.dirname(tempAudio), { recursive: true });
        try {
            await this.deps.audio.extract(item.path, tempAudio, {
                durationHint: info.duration,
                signal: token.signal,
                logLabel: label,
                onProgress: ratio => progress.update(scaled(STAGE_WEIGHTS.extract, ratio)),
            });
        } catch (error) {
            throw wrapEngineError(error, ExtractionError.from);
        }
        progress.update(STAGE_WEIGHTS.extract.to);
    }

    private async transcribe(
        tempAudio: string,
        info: MediaInfo,
        token: CancellationToken,
        label: string,
        progress: MonotonicProgress,
    ): Promise<TranscriptionResult> {
        const startedAt = Date.now();
        let transcript: EngineTranscript;
        try {
            transcript = await this.deps.transcriber.transcribe(tempAudio, {
                language: this.options.language,
                durationHint: info.duration,
                signal: token.signal,
                logLabel: label,
                onProgress: ratio => progress.update(scaled(STAGE_WEIGHTS.transcribe, ratio)),
            });
        } catch (error) {
            throw wrapEngineError(error, TranscriptionError.from);
        }

        if (!transcript.text.trim()) {
            throw new EmptyResultError();
        }
        progress.update(STAGE_WEIGHTS.transcribe.to);

        return {
            text: transcript.text.trim(),
            segments: transcript.segments,
            language: transcript.language || this.options.language,
            duration: info.duration,
            processingTime: elapsedSeconds(startedAt),
            model: this.deps.transcriber.model,
        };
    }

    private async writeOutput(outputPath: string, result: TranscriptionResult): Promise<void> {
        try {
            await writeFileAtomic(outputPath, this.options.format.render(result));
            if (this.options.saveDetailedJson) {
                await writeFileAtomic(detailedJsonPathFor(outputPath), new JsonFormat().render(result));
            }
        } catch (error) {
            throw new PersistenceError(`Failed to write ${outputPath}: ${toErrorMessage(error)}`);
        }
    }

    private async relocate(item: WorkItem): Promise<string | null> {
        if (!this.options.relocateTo) return null;
        try {
            const destination = await relocateFile(item.path, this.options.relocateTo);
            log(`Moved ${item.relativePath} to ${destination}`, 'relocate');
            return destination;
        } catch (error) {
            logWarn(`Failed to move ${item.path}: ${toErrorMessage(error)}`, 'relocate');
            return null;
        }
    }

    private async recordFailure(
        item: WorkItem,
        outputPath: string,
        duration: number,
        processingTime: number,
        errorKind: LedgerEntry['errorKind'],
        message: string,
    ): Promise<void> {
        try {
            await this.deps.ledger.record(item.identity, {
                processedAt: new Date().toISOString(),
                sourceFile: item.path,
                outputFile: outputPath,
                duration,
                processingTime,
                modelUsed: this.deps.transcriber.model,
                success: false,
                error: message,
                errorKind,
            });
        } catch (error) {
            logError(`Could not record failure for ${item.path}: ${toErrorMessage(error)}`, 'ledger');
        }
    }

    private async removeTempAudio(tempAudio: string): Promise<void> {
        try {
            await fs.rm(tempAudio, { force: true });
        } catch (error) {
            logWarn(`Failed to remove temp audio ${tempAudio}: ${toErrorMessage(error)}`, 'cleanup');
        }
    }
}
