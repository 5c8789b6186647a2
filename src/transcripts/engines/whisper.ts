/**
 * whisper.cpp (whisper-cli) adapter
 *
 * Runs the CLI with full JSON output (-ojf) next to the temp audio, then
 * reads and removes that JSON.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { EngineFailure, hasErrorCode, toErrorMessage } from '../../shared/errors';
import { TimedSegment, WordTiming } from '../types';
import { ProgressBridge } from './progress-bridge';
import { ProgressSignal } from './progress';
import { EngineLimits, EngineTranscript, TranscribeOptions, TranscriptionEngine } from './types';

const offsetsSchema = z.object({ from: z.number(), to: z.number() });

const tokenSchema = z.object({
    text: z.string(),
    offsets: offsetsSchema.optional(),
    p: z.number().optional(),
});

const segmentSchema = z.object({
    offsets: offsetsSchema,
    text: z.string(),
    tokens: z.array(tokenSchema).optional(),
});

const whisperOutputSchema = z.object({
    result: z.object({ language: z.string().optional() }).optional(),
    transcription: z.array(segmentSchema),
});

type WhisperSegment = z.infer<typeof segmentSchema>;

const PROGRESS_PATTERN = /progress\s*=\s*(\d+(?:\.\d+)?)%/;

export function parseWhisperProgress(line: string): ProgressSignal | null {
    const match = PROGRESS_PATTERN.exec(line);
    return match ? { type: 'ratio', value: Number(match[1]) / 100 } : null;
}

function toWords(segment: WhisperSegment): WordTiming[] {
    const words: WordTiming[] = [];
    for (const token of segment.tokens ?? []) {
        // Special tokens: [_BEG_], [_TT_150], ...
        if (token.text.startsWith('[_')) continue;
        const word = token.text.trim();
        if (!word) continue;

        const offsets = token.offsets ?? segment.offsets;
        words.push({
            word,
            start: offsets.from / 1000,
            end: offsets.to / 1000,
            probability: token.p ?? 0,
        });
    }
    return words;
}

/**
 * Convert whisper-cli's full JSON into segments and text
 */
export function parseWhisperOutput(raw: unknown, languageHint: string): EngineTranscript {
    const parsed = whisperOutputSchema.safeParse(raw);
    if (!parsed.success) {
        throw new EngineFailure('whisper-cli wrote an unexpected JSON document', 'whisper', 'output');
    }

    const segments: TimedSegment[] = [];
    for (const entry of parsed.data.transcription) {
        const text = entry.text.trim();
        if (!text) continue;

        const segment: TimedSegment = {
            start: entry.offsets.from / 1000,
            end: entry.offsets.to / 1000,
            text,
        };
        const words = toWords(entry);
        if (words.length > 0) segment.words = words;
        segments.push(segment);
    }

    const detected = parsed.data.result?.language;
    return {
        text: segments.map(segment => segment.text).join(' '),
        segments,
        language: detected || (languageHint === 'auto' ? '' : languageHint),
    };
}

export interface WhisperEngineOptions {
    whisperPath: string;
    modelPath: string;
    model: string;
    threads: number;
    limits: EngineLimits;
}

export class WhisperEngine implements TranscriptionEngine {
    readonly model: string;

    constructor(
        private readonly options: WhisperEngineOptions,
        private readonly bridge: ProgressBridge = new ProgressBridge(),
    ) {
        this.model = options.model;
    }

    async transcribe(audioPath: string, call: TranscribeOptions): Promise<EngineTranscript> {
        const outputBase = path.join(path.dirname(audioPath), path.basename(audioPath, path.extname(audioPath)));
        const jsonPath = `${outputBase}.json`;

        try {
            await this.bridge.run({
                engine: 'whisper',
                command: this.options.whisperPath,
                args: [
                    '-m', this.options.modelPath,
                    '-f', audioPath,
                    '-l', call.language,
                    '-t', String(this.options.threads),
                    '-ojf',
                    '-of', outputBase,
                    '-pp',
                ],
                durationHint: call.durationHint,
                parseProgress: parseWhisperProgress,
                onProgress: call.onProgress,
                stallTimeoutMs: this.options.limits.stallTimeoutMs,
                killGraceMs: this.options.limits.killGraceMs,
                timeoutMs: this.options.limits.timeoutMs,
                signal: call.signal,
                logLabel: call.logLabel,
            });

            return parseWhisperOutput(await readJson(jsonPath), call.language);
        } finally {
            await fs.rm(jsonPath, { force: true });
        }
    }
}

async function readJson(filePath: string): Promise<unknown> {
    let data: string;
    try {
        data = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        const detail = hasErrorCode(error, 'ENOENT') ? 'was not written' : toErrorMessage(error);
        throw new EngineFailure(`whisper-cli output ${filePath} ${detail}`, 'whisper', 'output');
    }
    try {
        return JSON.parse(data);
    } catch (error) {
        throw new EngineFailure(`whisper-cli output is not valid JSON: ${toErrorMessage(error)}`, 'whisper', 'output');
    }
}
