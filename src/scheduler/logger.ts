/**
 * Batch Logger
 * Writes everything to the console and, once initLogger() has run, to a
 * daily log file (<logs>/YYYY-MM-DD.log, appended):
 * - Run lifecycle and per-task results
 * - Engine output (stdout/stderr), file only
 */

import * as fs from 'fs/promises';
import { createWriteStream, WriteStream } from 'fs';
import * as path from 'path';

interface DailyLogStream {
    date: string;
    stream: WriteStream;
}

let logsDir: string | null = null;
let currentLogStream: DailyLogStream | null = null;
let consoleEnabled = true;

function getDateString(): string {
    return new Date().toISOString().split('T')[0]; // YYYY-MM-DD
}

function getTimestamp(): string {
    return new Date().toISOString();
}

function getLogFilePath(dir: string, dateStr: string): string {
    return path.join(dir, `${dateStr}.log`);
}

function getDailyLogStream(): WriteStream | null {
    if (!logsDir) return null;

    const today = getDateString();
    if (currentLogStream && currentLogStream.date === today) {
        return currentLogStream.stream;
    }

    if (currentLogStream) {
        currentLogStream.stream.end();
    }

    const stream = createWriteStream(getLogFilePath(logsDir, today), { flags: 'a' });
    currentLogStream = { date: today, stream };

    const header = `\n${'='.repeat(60)}\n📅 New Day: ${today}\n${'='.repeat(60)}\n\n`;
    stream.write(header);

    return stream;
}

function writeFile(line: string): void {
    getDailyLogStream()?.write(line);
}

/**
 * Start writing to <dir>/YYYY-MM-DD.log
 */
export async function initLogger(dir: string, options: { console?: boolean } = {}): Promise<string> {
    await closeLogger();
    await fs.mkdir(dir, { recursive: true });
    logsDir = dir;
    consoleEnabled = options.console ?? true;
    return getLogFilePath(dir, getDateString());
}

export function log(message: string, category?: string): void {
    const prefix = category ? `[${category}] ` : '';
    writeFile(`${getTimestamp()} ${prefix}${message}\n`);
    if (consoleEnabled) {
        console.log(`📝 ${prefix}${message}`);
    }
}

export function logWarn(message: string, category?: string): void {
    const prefix = category ? `[${category}] ` : '';
    writeFile(`${getTimestamp()} ${prefix}WARN ${message}\n`);
    if (consoleEnabled) {
        console.warn(`⚠️  ${prefix}${message}`);
    }
}

export function logError(message: string, category?: string): void {
    const prefix = category ? `[${category}] ` : '';
    writeFile(`${getTimestamp()} ${prefix}ERROR ${message}\n`);
    if (consoleEnabled) {
        console.error(`❌ ${prefix}${message}`);
    }
}

/**
 * Engine output goes to the file only; it is far too chatty for the console
 */
export function logEngineOutput(label: string, engine: string, data: string, isError = false): void {
    const timestamp = getTimestamp();
    const streamType = isError ? 'stderr' : 'stdout';
    const lines = data.split('\n').filter(line => line.trim());

    for (const line of lines) {
        writeFile(`${timestamp} [${label}:${engine}:${streamType}] ${line}\n`);
    }
}

export function logTaskStart(label: string, sourcePath: string): void {
    const separator = '-'.repeat(40);
    writeFile(`\n${separator}\n${getTimestamp()} [${label}] 🚀 Starting: ${sourcePath}\n${separator}\n`);
    if (consoleEnabled) {
        console.log(`🚀 [${label}] ${sourcePath}`);
    }
}

export function logTaskEnd(label: string, status: string, durationMs: number, detail?: string): void {
    const icon = status === 'success' ? '✅' : status === 'cancelled' ? '⏹️' : '❌';
    const durationSec = (durationMs / 1000).toFixed(2);
    const suffix = detail ? `: ${detail}` : '';
    const line = `[${label}] ${icon} ${status} (${durationSec}s)${suffix}`;

    writeFile(`${getTimestamp()} ${line}\n`);
    if (consoleEnabled) {
        console.log(line);
    }
}

export async function closeLogger(): Promise<void> {
    const current = currentLogStream;
    currentLogStream = null;
    logsDir = null;
    consoleEnabled = true;

    if (current) {
        await new Promise<void>(resolve => current.stream.end(resolve));
    }
}

export function getLogsDirectory(): string | null {
    return logsDir;
}
