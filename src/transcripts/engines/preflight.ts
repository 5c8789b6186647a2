/**
 * Check that the engine binaries run and the model file exists
 * before scheduling anything.
 */

import * as fs from 'fs/promises';
import { EnginesConfig } from '../../config/config';
import { EngineName, SetupError, classifyError } from '../../shared/errors';
import { ProgressBridge } from './progress-bridge';

const PREFLIGHT_TIMEOUT_MS = 10_000;

async function checkBinary(bridge: ProgressBridge, engine: EngineName, command: string, args: string[]): Promise<string | null> {
    try {
        await bridge.run({
            engine,
            command,
            args,
            stallTimeoutMs: PREFLIGHT_TIMEOUT_MS,
            killGraceMs: 1000,
            timeoutMs: PREFLIGHT_TIMEOUT_MS,
        });
        return null;
    } catch (error) {
        return `${command}: ${classifyError(error).message}`;
    }
}

export async function preflightEngines(
    engines: EnginesConfig,
    modelPath: string,
    bridge: ProgressBridge = new ProgressBridge(),
): Promise<void> {
    const problems: string[] = [];

    for (const [engine, command] of [['ffmpeg', engines.ffmpegPath], ['ffprobe', engines.ffprobePath]] as const) {
        const problem = await checkBinary(bridge, engine, command, ['-version']);
        if (problem) problems.push(problem);
    }

    const modelSize = await fs.stat(modelPath).then(stats => (stats.isFile() ? stats.size : 0), () => 0);
    if (modelSize === 0) {
        problems.push(`Model file not found or empty: ${modelPath}`);
    }

    if (problems.length > 0) {
        throw new SetupError(`Engine check failed:\n  - ${problems.join('\n  - ')}`);
    }
}
