/**
 * Configuration types and loading
 *
 * Settings live in config.json (next to where the tool is run). Anything
 * missing falls back to the defaults below; a handful of engine settings can
 * be overridden from the environment (.env is loaded by the entry script).
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, hasErrorCode, toErrorMessage } from '../shared/errors';
import { OUTPUT_FORMAT_IDS } from '../transcripts/formats';
import { SUPPORTED_MEDIA_EXTENSIONS } from '../transcripts/constants';

// ============ SCHEMA ============

const storageSchema = z.object({
    input: z.string().min(1),
    output: z.string().min(1),
    temp: z.string().min(1),
    logs: z.string().min(1),
    /** Defaults to <output>/.processing_history.json */
    ledger: z.string().min(1).optional(),
    /** Where successfully processed sources are moved when processing.moveProcessed is on */
    relocateTo: z.string().min(1).optional(),
});

const processingSchema = z.object({
    concurrency: z.number().int().min(1).max(64),
    recursive: z.boolean(),
    skipExisting: z.boolean(),
    /** 'auto' lets the engine detect the language */
    language: z.string().min(1),
    outputFormat: z.enum(OUTPUT_FORMAT_IDS),
    includeTimestamps: z.boolean(),
    saveDetailedJson: z.boolean(),
    keepTempAudio: z.boolean(),
    moveProcessed: z.boolean(),
    extensions: z.array(z.string().regex(/^\.[^./\\]+$/)).min(1),
    stallTimeoutMs: z.number().int().positive(),
    killGraceMs: z.number().int().nonnegative(),
    /** Hard limit per engine invocation; 0 disables it */
    engineTimeoutMs: z.number().int().nonnegative(),
});

const audioSchema = z.object({
    sampleRate: z.number().int().positive(),
    channels: z.number().int().min(1).max(8),
    normalize: z.boolean(),
    removeSilence: z.boolean(),
});

const enginesSchema = z.object({
    ffmpegPath: z.string().min(1),
    ffprobePath: z.string().min(1),
    whisperPath: z.string().min(1),
    /** ggml model file passed to whisper-cli */
    modelPath: z.string().min(1),
    /** Identifier stored in the ledger; derived from modelPath when empty */
    modelName: z.string(),
    threads: z.number().int().min(1),
});

const statusApiSchema = z.object({
    enabled: z.boolean(),
    port: z.number().int().min(0).max(65535),
});

export const appConfigSchema = z.object({
    storage: storageSchema,
    processing: processingSchema,
    audio: audioSchema,
    engines: enginesSchema,
    statusApi: statusApiSchema,
});

// ============ INTERFACES ============

export type StorageConfig = z.infer<typeof storageSchema>;
export type ProcessingConfig = z.infer<typeof processingSchema>;
export type AudioConfig = z.infer<typeof audioSchema>;
export type EnginesConfig = z.infer<typeof enginesSchema>;
export type StatusApiConfig = z.infer<typeof statusApiSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

/** What config.json may contain: every section and field optional */
export const appConfigInputSchema = z.object({
    storage: storageSchema.partial().optional(),
    processing: processingSchema.partial().optional(),
    audio: audioSchema.partial().optional(),
    engines: enginesSchema.partial().optional(),
    statusApi: statusApiSchema.partial().optional(),
}).passthrough();

export type AppConfigInput = z.infer<typeof appConfigInputSchema>;

// ============ DEFAULTS ============

export const DEFAULT_CONFIG: AppConfig = {
    storage: {
        input: './videos_todo',
        output: './results',
        temp: './temp',
        logs: './logs',
        relocateTo: './videos_done',
    },
    processing: {
        concurrency: 1,
        recursive: true,
        skipExisting: true,
        language: 'auto',
        outputFormat: 'txt',
        includeTimestamps: false,
        saveDetailedJson: false,
        keepTempAudio: false,
        moveProcessed: false,
        extensions: [...SUPPORTED_MEDIA_EXTENSIONS],
        stallTimeoutMs: 5 * 60 * 1000,
        killGraceMs: 5000,
        engineTimeoutMs: 0,
    },
    audio: {
        sampleRate: 16000,
        channels: 1,
        normalize: false,
        removeSilence: false,
    },
    engines: {
        ffmpegPath: 'ffmpeg',
        ffprobePath: 'ffprobe',
        whisperPath: 'whisper-cli',
        modelPath: './models/ggml-medium.bin',
        modelName: '',
        threads: 4,
    },
    statusApi: {
        enabled: false,
        port: 3455,
    },
};

export const CONFIG_FILE = 'config.json';

const LEDGER_FILE = '.processing_history.json';

// ============ LOAD ============

/**
 * Merge user config with defaults, section by section
 */
export function mergeWithDefaults(input: AppConfigInput = {}): AppConfigInput {
    return {
        storage: { ...DEFAULT_CONFIG.storage, ...input.storage },
        processing: { ...DEFAULT_CONFIG.processing, ...input.processing },
        audio: { ...DEFAULT_CONFIG.audio, ...input.audio },
        engines: { ...DEFAULT_CONFIG.engines, ...input.engines },
        statusApi: { ...DEFAULT_CONFIG.statusApi, ...input.statusApi },
    };
}

function readIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new ConfigError(`Environment variable ${name} must be an integer, got "${raw}"`);
    }
    return value;
}

/**
 * Apply FFMPEG_PATH / FFPROBE_PATH / WHISPER_PATH / WHISPER_MODEL /
 * MEDIASCRIBE_CONCURRENCY on top of the file settings
 */
export function applyEnvOverrides(input: AppConfigInput, env: NodeJS.ProcessEnv = process.env): AppConfigInput {
    const engines = { ...input.engines };
    if (env.FFMPEG_PATH) engines.ffmpegPath = env.FFMPEG_PATH;
    if (env.FFPROBE_PATH) engines.ffprobePath = env.FFPROBE_PATH;
    if (env.WHISPER_PATH) engines.whisperPath = env.WHISPER_PATH;
    if (env.WHISPER_MODEL) engines.modelPath = env.WHISPER_MODEL;

    const processing = { ...input.processing };
    const concurrency = readIntEnv(env, 'MEDIASCRIBE_CONCURRENCY');
    if (concurrency !== undefined) processing.concurrency = concurrency;

    return { ...input, engines, processing };
}

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate a merged config object, turning zod issues into a ConfigError
 */
export function parseConfig(raw: unknown): AppConfig {
    const result = appConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError('Invalid configuration', formatIssues(result.error));
    }
    return result.data;
}

async function readConfigFile(configPath: string): Promise<AppConfigInput> {
    let data: string;
    try {
        data = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) {
            return {};
        }
        throw new ConfigError(`Cannot read ${configPath}: ${toErrorMessage(error)}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(data);
    } catch (error) {
        throw new ConfigError(`${configPath} is not valid JSON: ${toErrorMessage(error)}`);
    }
    const result = appConfigInputSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`Invalid configuration in ${configPath}`, formatIssues(result.error));
    }
    return result.data;
}

/**
 * Load app config from config.json (or return defaults)
 */
export async function loadConfig(
    configPath: string = path.join(process.cwd(), CONFIG_FILE),
    env: NodeJS.ProcessEnv = process.env,
): Promise<AppConfig> {
    const fromFile = await readConfigFile(configPath);
    return parseConfig(applyEnvOverrides(mergeWithDefaults(fromFile), env));
}

// ============ RESOLVED PATHS ============

export interface ResolvedPaths {
    input: string;
    output: string;
    temp: string;
    tempAudio: string;
    logs: string;
    ledger: string;
    relocateTo: string | null;
    modelPath: string;
}

/**
 * Get resolved absolute paths from config
 */
export function getResolvedPaths(config: AppConfig, root: string = process.cwd()): ResolvedPaths {
    const output = path.resolve(root, config.storage.output);
    const temp = path.resolve(root, config.storage.temp);

    return {
        input: path.resolve(root, config.storage.input),
        output,
        temp,
        tempAudio: path.join(temp, 'audio'),
        logs: path.resolve(root, config.storage.logs),
        ledger: config.storage.ledger ? path.resolve(root, config.storage.ledger) : path.join(output, LEDGER_FILE),
        relocateTo: config.processing.moveProcessed && config.storage.relocateTo
            ? path.resolve(root, config.storage.relocateTo)
            : null,
        modelPath: path.resolve(root, config.engines.modelPath),
    };
}

/**
 * Identifier recorded in the ledger for the transcription model
 */
export function getModelIdentifier(config: AppConfig): string {
    if (config.engines.modelName.trim()) return config.engines.modelName.trim();
    return path.basename(config.engines.modelPath).replace(/^ggml-/, '').replace(/\.bin$/, '');
}
