/**
 * Progress Bridge
 *
 * Supervises one engine process:
 * - Line-buffers stdout/stderr and feeds each line to the engine's parser
 * - Reports monotonic 0..1 progress
 * - Kills the process when it goes quiet for too long, runs past its hard
 *   limit, or the abort signal fires (SIGTERM, then SIGKILL after a grace period)
 * - Keeps the last lines of output for error reports
 */

import { spawn } from 'child_process';
import { Readable } from 'stream';
import { CancelledError, EngineFailure, EngineFailureReason, EngineName, toErrorMessage } from '../../shared/errors';
import { logEngineOutput } from '../../scheduler/logger';
import { DIAGNOSTIC_TAIL_LINES } from '../constants';
import { MonotonicProgress, ProgressParser, signalToRatio } from './progress';

/**
 * The parts of a child process the bridge needs
 */
export interface EngineProcess {
    readonly stdout: Readable;
    readonly stderr: Readable;
    kill(signal: NodeJS.Signals): void;
    onClose(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
    onError(listener: (error: Error) => void): void;
}

export type SpawnEngine = (command: string, args: readonly string[]) => EngineProcess;

export const spawnEngine: SpawnEngine = (command, args) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
    return {
        stdout: child.stdout,
        stderr: child.stderr,
        kill: signal => {
            child.kill(signal);
        },
        onClose: listener => {
            child.once('close', listener);
        },
        onError: listener => {
            child.once('error', listener);
        },
    };
};

export interface BridgeRunOptions {
    engine: EngineName;
    command: string;
    args: readonly string[];

    /** Media duration in seconds, used for elapsed-time progress */
    durationHint?: number;
    parseProgress?: ProgressParser;
    onProgress?: (ratio: number) => void;

    /** Kill the process after this long without any output */
    stallTimeoutMs: number;

    /** Wait between SIGTERM and SIGKILL */
    killGraceMs: number;

    /** Hard wall-clock limit; 0 or undefined for none */
    timeoutMs?: number;
    signal?: AbortSignal;

    /** Prefix for engine output in the log file */
    logLabel?: string;
}

export interface BridgeRunResult {
    stdout: string;
    elapsedMs: number;
}

function createLineBuffer(onLine: (line: string) => void): { push: (chunk: string) => void; flush: () => void } {
    let buffer = '';
    return {
        push: (chunk: string) => {
            buffer += chunk;
            const parts = buffer.split(/\r?\n|\r/);
            buffer = parts.pop() ?? '';
            for (const line of parts) {
                const trimmed = line.trim();
                if (trimmed) onLine(trimmed);
            }
        },
        flush: () => {
            const trimmed = buffer.trim();
            if (trimmed) onLine(trimmed);
            buffer = '';
        },
    };
}

type Termination = { kind: 'failure'; reason: EngineFailureReason; message: string } | { kind: 'cancelled' };

export class ProgressBridge {
    constructor(private readonly spawnFn: SpawnEngine = spawnEngine) {}

    run(options: BridgeRunOptions): Promise<BridgeRunResult> {
        const { engine, command, args, signal } = options;

        if (signal?.aborted) {
            return Promise.reject(new CancelledError());
        }

        const startedAt = Date.now();
        const tail: string[] = [];
        const tracker = new MonotonicProgress(options.onProgress);
        let stdout = '';

        return new Promise<BridgeRunResult>((resolve, reject) => {
            let settled = false;
            let closed = false;
            let termination: Termination | null = null;
            let stallTimer: NodeJS.Timeout | null = null;
            let hardTimer: NodeJS.Timeout | null = null;
            let killTimer: NodeJS.Timeout | null = null;
            let child: EngineProcess;

            const clearTimers = () => {
                if (stallTimer) clearTimeout(stallTimer);
                if (hardTimer) clearTimeout(hardTimer);
                if (killTimer) clearTimeout(killTimer);
                signal?.removeEventListener('abort', onAbort);
            };

            const fail = (reason: EngineFailureReason, message: string) => {
                if (settled) return;
                settled = true;
                clearTimers();
                reject(new EngineFailure(message, engine, reason, [...tail]));
            };

            const terminate = (why: Termination) => {
                if (termination || closed) return;
                termination = why;
                if (stallTimer) clearTimeout(stallTimer);
                if (hardTimer) clearTimeout(hardTimer);
                child.kill('SIGTERM');
                killTimer = setTimeout(() => {
                    if (!closed) child.kill('SIGKILL');
                }, options.killGraceMs);
            };

            const armStallTimer = () => {
                if (termination || settled) return;
                if (stallTimer) clearTimeout(stallTimer);
                stallTimer = setTimeout(() => terminate({
                    kind: 'failure',
                    reason: 'stalled',
                    message: `${engine} produced no output for ${options.stallTimeoutMs}ms`,
                }), options.stallTimeoutMs);
            };

            function onAbort() {
                terminate({ kind: 'cancelled' });
            }

            const onLine = (line: string, isError: boolean) => {
                tail.push(line);
                if (tail.length > DIAGNOSTIC_TAIL_LINES) tail.shift();
                if (options.logLabel) logEngineOutput(options.logLabel, engine, line, isError);

                const parsed = options.parseProgress?.(line);
                if (!parsed) return;
                const ratio = signalToRatio(parsed, options.durationHint ?? 0);
                if (ratio !== null) tracker.update(ratio);
            };

            try {
                child = this.spawnFn(command, args);
            } catch (error) {
                fail('spawn', `Failed to start ${engine} (${command}): ${toErrorMessage(error)}`);
                return;
            }

            const stdoutLines = createLineBuffer(line => onLine(line, false));
            const stderrLines = createLineBuffer(line => onLine(line, true));

            child.stdout.on('data', (chunk: Buffer | string) => {
                const text = chunk.toString();
                stdout += text;
                stdoutLines.push(text);
                armStallTimer();
            });
            child.stderr.on('data', (chunk: Buffer | string) => {
                stderrLines.push(chunk.toString());
                armStallTimer();
            });

            child.onError(error => {
                fail('spawn', `Failed to start ${engine} (${command}): ${error.message}`);
            });

            child.onClose((code, exitSignal) => {
                closed = true;
                stdoutLines.flush();
                stderrLines.flush();
                if (settled) {
                    clearTimers();
                    return;
                }

                const ended: Termination | null = termination;
                if (ended && ended.kind === 'cancelled') {
                    settled = true;
                    clearTimers();
                    reject(new CancelledError());
                    return;
                }
                if (ended) {
                    fail(ended.reason, ended.message);
                    return;
                }
                if (code !== 0) {
                    const how = code === null ? `was killed by ${exitSignal ?? 'a signal'}` : `exited with code ${code}`;
                    fail('exit', `${engine} ${how}`);
                    return;
                }

                settled = true;
                clearTimers();
                tracker.complete();
                resolve({ stdout, elapsedMs: Date.now() - startedAt });
            });

            signal?.addEventListener('abort', onAbort, { once: true });
            armStallTimer();

            const timeoutMs = options.timeoutMs ?? 0;
            if (timeoutMs > 0) {
                hardTimer = setTimeout(() => terminate({
                    kind: 'failure',
                    reason: 'timeout',
                    message: `${engine} exceeded the ${timeoutMs}ms time limit`,
                }), timeoutMs);
            }
        });
    }
}
