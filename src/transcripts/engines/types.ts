/**
 * Engine interfaces the pipeline depends on
 */

import { TimedSegment } from '../types';

export interface MediaInfo {
    /** Seconds; 0 when unknown */
    duration: number;
    hasAudio: boolean;
    formatName: string;
    sampleRate: number;
    channels: number;
}

export interface EngineCallOptions {
    signal?: AbortSignal;

    /** 0..1, monotonic */
    onProgress?: (ratio: number) => void;
    logLabel?: string;
}

export interface ExtractOptions extends EngineCallOptions {
    /** Media duration in seconds, for progress */
    durationHint: number;
}

export interface TranscribeOptions extends EngineCallOptions {
    /** 'auto' for detection */
    language: string;
    durationHint: number;
}

export interface EngineTranscript {
    text: string;
    segments: TimedSegment[];

    /** Empty when the engine did not report one */
    language: string;
}

export interface AudioExtractionEngine {
    probe(inputPath: string, options?: EngineCallOptions): Promise<MediaInfo>;
    extract(inputPath: string, outputPath: string, options: ExtractOptions): Promise<void>;
}

export interface TranscriptionEngine {
    /** Identifier recorded in the ledger */
    readonly model: string;
    transcribe(audioPath: string, options: TranscribeOptions): Promise<EngineTranscript>;
}

/** Process supervision settings shared by both engines */
export interface EngineLimits {
    stallTimeoutMs: number;
    killGraceMs: number;
    timeoutMs: number;
}
