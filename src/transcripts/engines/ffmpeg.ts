/**
 * ffmpeg / ffprobe adapter
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { AudioConfig } from '../../config/config';
import { EngineFailure } from '../../shared/errors';
import { ProgressBridge } from './progress-bridge';
import { ProgressSignal } from './progress';
import { AudioExtractionEngine, EngineCallOptions, EngineLimits, ExtractOptions, MediaInfo } from './types';

const probeStreamSchema = z.object({
    codec_type: z.string().optional(),
    sample_rate: z.string().optional(),
    channels: z.number().optional(),
    duration: z.string().optional(),
});

const probeOutputSchema = z.object({
    streams: z.array(probeStreamSchema).default([]),
    format: z.object({
        format_name: z.string().optional(),
        duration: z.string().optional(),
    }).default({}),
});

function toSeconds(value: string | undefined): number {
    const parsed = Number(value);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

/**
 * Parse ffprobe's JSON report
 */
export function parseProbeOutput(stdout: string): MediaInfo {
    let raw: unknown;
    try {
        raw = JSON.parse(stdout);
    } catch {
        throw new EngineFailure('ffprobe returned invalid JSON', 'ffprobe', 'output');
    }

    const parsed = probeOutputSchema.safeParse(raw);
    if (!parsed.success) {
        throw new EngineFailure('ffprobe returned an unexpected report', 'ffprobe', 'output');
    }

    const { streams, format } = parsed.data;
    const audio = streams.find(stream => stream.codec_type === 'audio');

    return {
        duration: toSeconds(format.duration) || toSeconds(audio?.duration),
        hasAudio: audio !== undefined,
        formatName: format.format_name ?? '',
        sampleRate: toSeconds(audio?.sample_rate),
        channels: audio?.channels ?? 0,
    };
}

/**
 * Progress from `-progress pipe:1` key=value lines
 */
export function parseFfmpegProgress(line: string): ProgressSignal | null {
    const [key, value] = line.split('=', 2).map(part => part.trim());
    if (value === undefined) return null;

    switch (key) {
        case 'out_time_us':
        case 'out_time_ms': {
            // Both are microseconds despite the name
            const micros = Number(value);
            return Number.isFinite(micros) && micros >= 0 ? { type: 'elapsed', seconds: micros / 1_000_000 } : null;
        }
        case 'progress':
            return value === 'end' ? { type: 'end' } : null;
        default:
            return null;
    }
}

export interface FfmpegEngineOptions {
    ffmpegPath: string;
    ffprobePath: string;
    audio: AudioConfig;
    limits: EngineLimits;
}

export function buildExtractArgs(inputPath: string, outputPath: string, audio: AudioConfig): string[] {
    const filters: string[] = [];
    if (audio.normalize) filters.push('loudnorm');
    if (audio.removeSilence) filters.push('silenceremove=start_periods=1:start_duration=0.1:start_threshold=-50dB');

    return [
        '-nostdin', '-y',
        '-i', inputPath,
        '-vn',
        '-acodec', 'pcm_s16le',
        '-ar', String(audio.sampleRate),
        '-ac', String(audio.channels),
        ...(filters.length > 0 ? ['-af', filters.join(',')] : []),
        '-progress', 'pipe:1',
        '-nostats',
        outputPath,
    ];
}

export class FfmpegEngine implements AudioExtractionEngine {
    constructor(
        private readonly options: FfmpegEngineOptions,
        private readonly bridge: ProgressBridge = new ProgressBridge(),
    ) {}

    async probe(inputPath: string, call: EngineCallOptions = {}): Promise<MediaInfo> {
        const { stdout } = await this.bridge.run({
            engine: 'ffprobe',
            command: this.options.ffprobePath,
            args: ['-v', 'error', '-print_format', 'json', '-show_format', '-show_streams', inputPath],
            stallTimeoutMs: this.options.limits.stallTimeoutMs,
            killGraceMs: this.options.limits.killGraceMs,
            timeoutMs: this.options.limits.timeoutMs,
            signal: call.signal,
        });
        return parseProbeOutput(stdout);
    }

    async extract(inputPath: string, outputPath: string, call: ExtractOptions): Promise<void> {
        await this.bridge.run({
            engine: 'ffmpeg',
            command: this.options.ffmpegPath,
            args: buildExtractArgs(inputPath, outputPath, this.options.audio),
            durationHint: call.durationHint,
            parseProgress: parseFfmpegProgress,
            onProgress: call.onProgress,
            stallTimeoutMs: this.options.limits.stallTimeoutMs,
            killGraceMs: this.options.limits.killGraceMs,
            timeoutMs: this.options.limits.timeoutMs,
            signal: call.signal,
            logLabel: call.logLabel,
        });

        const size = await fs.stat(outputPath).then(stats => stats.size, () => 0);
        if (size === 0) {
            throw new EngineFailure(`ffmpeg produced no audio at ${outputPath}`, 'ffmpeg', 'output');
        }
    }
}
