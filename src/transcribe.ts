#!/usr/bin/env node
/**
 * Batch transcription entry point
 *
 * Usage: npm run transcribe [-- path/to/config.json]
 *
 * Ctrl+C once: finish running files, start nothing new.
 * Ctrl+C twice: stop the engines as well.
 */

import 'dotenv/config';
import * as path from 'path';
import { Server } from 'http';
import { CONFIG_FILE, getModelIdentifier, getResolvedPaths, loadConfig } from './config/config';
import { CancellationToken } from './scheduler/cancellation';
import { closeLogger, initLogger, log, logError, logWarn } from './scheduler/logger';
import { formatSummary } from './scheduler/statistics';
import { createStatusApi, startStatusApi, stopStatusApi } from './scheduler/status-api';
import { MediascribeError, toErrorMessage } from './shared/errors';
import { BatchRun } from './transcripts/batch';
import { FfmpegEngine } from './transcripts/engines/ffmpeg';
import { preflightEngines } from './transcripts/engines/preflight';
import { WhisperEngine } from './transcripts/engines/whisper';

const EXIT_INTERRUPTED = 130;

function installSignalHandlers(token: CancellationToken): () => void {
    const onSignal = (signal: NodeJS.Signals) => {
        if (!token.isCancellationRequested) {
            logWarn(`${signal} received: finishing running files, press Ctrl+C again to stop them`, 'shutdown');
            token.request();
        } else if (!token.isEscalated) {
            logWarn(`${signal} received again: stopping engines`, 'shutdown');
            token.escalate();
        }
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    return () => {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
    };
}

async function main(): Promise<number> {
    const configPath = path.resolve(process.argv[2] ?? CONFIG_FILE);
    const config = await loadConfig(configPath);
    const paths = getResolvedPaths(config);

    const logFile = await initLogger(paths.logs);

    console.log('═══════════════════════════════════════════════');
    console.log('  🎙️  Media Transcription');
    console.log('═══════════════════════════════════════════════\n');
    log(`Config: ${configPath}`, 'setup');
    log(`Input: ${paths.input}`, 'setup');
    log(`Output: ${paths.output} (${config.processing.outputFormat})`, 'setup');
    log(`Model: ${getModelIdentifier(config)} (${paths.modelPath})`, 'setup');
    log(`Log file: ${logFile}`, 'setup');

    await preflightEngines(config.engines, paths.modelPath);

    const limits = {
        stallTimeoutMs: config.processing.stallTimeoutMs,
        killGraceMs: config.processing.killGraceMs,
        timeoutMs: config.processing.engineTimeoutMs,
    };

    const token = new CancellationToken();
    const run = new BatchRun({
        config,
        paths,
        token,
        audio: new FfmpegEngine({
            ffmpegPath: config.engines.ffmpegPath,
            ffprobePath: config.engines.ffprobePath,
            audio: config.audio,
            limits,
        }),
        transcriber: new WhisperEngine({
            whisperPath: config.engines.whisperPath,
            modelPath: paths.modelPath,
            model: getModelIdentifier(config),
            threads: config.engines.threads,
            limits,
        }),
    });

    let server: Server | null = null;
    if (config.statusApi.enabled) {
        server = await startStatusApi(createStatusApi(run), config.statusApi.port);
    }

    const removeSignalHandlers = installSignalHandlers(token);
    try {
        const result = await run.execute();

        for (const line of formatSummary(result.statistics, result.wallSeconds)) {
            log(line, 'summary');
        }
        if (result.interrupted) {
            logWarn('Run was interrupted; rerun to pick up the remaining files', 'summary');
            return EXIT_INTERRUPTED;
        }
        return 0;
    } finally {
        removeSignalHandlers();
        if (server) {
            await stopStatusApi(server);
        }
    }
}

main()
    .then(async code => {
        await closeLogger();
        process.exit(code);
    })
    .catch(async (error: unknown) => {
        if (error instanceof MediascribeError) {
            logError(error.message, error.kind);
        } else {
            logError(`Unhandled error: ${error instanceof Error ? error.stack ?? error.message : toErrorMessage(error)}`);
        }
        await closeLogger();
        process.exit(1);
    });
