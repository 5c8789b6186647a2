import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { AppConfig, DEFAULT_CONFIG } from '../config/config';
import { fileIdentity } from '../transcripts/discovery';
import {
    AudioExtractionEngine,
    EngineCallOptions,
    EngineTranscript,
    ExtractOptions,
    MediaInfo,
    TranscribeOptions,
    TranscriptionEngine,
} from '../transcripts/engines/types';
import { WorkItem } from '../transcripts/types';

export async function makeTempDir(prefix = 'mediascribe-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

/** Write a fake media file (any non-empty bytes) and return its path */
export async function writeMedia(root: string, relativePath: string, content = 'fake media bytes'): Promise<string> {
    const filePath = path.join(root, ...relativePath.split('/'));
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    return filePath;
}

export async function workItemFor(root: string, filePath: string): Promise<WorkItem> {
    const stats = await fs.stat(filePath);
    return {
        path: filePath,
        relativePath: path.relative(root, filePath).split(path.sep).join('/'),
        size: stats.size,
        mtimeMs: stats.mtimeMs,
        identity: fileIdentity(filePath, stats.mtimeMs),
    };
}

export function configFor(root: string, overrides: Partial<AppConfig['processing']> = {}): AppConfig {
    return {
        ...DEFAULT_CONFIG,
        storage: {
            input: path.join(root, 'input'),
            output: path.join(root, 'output'),
            temp: path.join(root, 'temp'),
            logs: path.join(root, 'logs'),
            relocateTo: path.join(root, 'done'),
        },
        processing: { ...DEFAULT_CONFIG.processing, ...overrides },
    };
}

export const DEFAULT_MEDIA_INFO: MediaInfo = {
    duration: 60,
    hasAudio: true,
    formatName: 'mov,mp4,m4a,3gp,3g2,mj2',
    sampleRate: 44100,
    channels: 2,
};

/**
 * In-process stand-in for ffmpeg/ffprobe: writes a small file as the
 * extracted audio
 */
export class FakeAudioEngine implements AudioExtractionEngine {
    probed: string[] = [];
    extracted: string[] = [];
    info: MediaInfo = { ...DEFAULT_MEDIA_INFO };
    extractError: Error | null = null;

    async probe(inputPath: string, _options?: EngineCallOptions): Promise<MediaInfo> {
        this.probed.push(inputPath);
        return { ...this.info };
    }

    async extract(inputPath: string, outputPath: string, options: ExtractOptions): Promise<void> {
        this.extracted.push(inputPath);
        if (this.extractError) throw this.extractError;
        options.onProgress?.(0.5);
        await fs.writeFile(outputPath, 'RIFF fake wav');
        options.onProgress?.(1);
    }
}

export type TranscribeHandler = (audioPath: string, options: TranscribeOptions) => Promise<EngineTranscript> | EngineTranscript;

export const HELLO_TRANSCRIPT: EngineTranscript = {
    text: 'hello world',
    segments: [{ start: 0, end: 1.5, text: 'hello world' }],
    language: 'en',
};

export class FakeTranscriber implements TranscriptionEngine {
    readonly model = 'fake-model';
    calls: string[] = [];

    constructor(private handler: TranscribeHandler = () => HELLO_TRANSCRIPT) {}

    async transcribe(audioPath: string, options: TranscribeOptions): Promise<EngineTranscript> {
        this.calls.push(audioPath);
        options.onProgress?.(0.5);
        const result = await this.handler(audioPath, options);
        options.onProgress?.(1);
        return result;
    }
}

export function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
