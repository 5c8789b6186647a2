/**
 * Status API Server
 *
 * Local HTTP API for watching a batch run and asking it to stop.
 */

import express, { Express, Request, Response } from 'express';
import { Server } from 'http';
import { LedgerStatistics } from '../transcripts/types';
import { BatchStatus } from '../transcripts/batch';
import { log } from './logger';

export interface StatusSource {
    getStatus(): BatchStatus;
    getLedgerStatistics(): LedgerStatistics | null;
    requestShutdown(): void;
}

export function createStatusApi(source: StatusSource): Express {
    const app = express();
    app.use(express.json());

    app.use((req, res, next) => {
        res.header('Access-Control-Allow-Origin', '*');
        res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.header('Access-Control-Allow-Headers', 'Content-Type');
        if (req.method === 'OPTIONS') {
            res.sendStatus(200);
            return;
        }
        next();
    });

    /**
     * GET /status
     * Run id, state, counters and the tasks currently running
     */
    app.get('/status', (req: Request, res: Response) => {
        const status = source.getStatus();
        res.json({
            runId: status.runId,
            state: status.state,
            startedAt: status.startedAt.toISOString(),
            uptime: process.uptime(),
            statistics: status.statistics,
            tasks: {
                queued: status.tasks.queued,
                active: status.tasks.active,
                recent: status.tasks.recentExecutions.map(outcome => ({
                    path: outcome.item.path,
                    status: outcome.status,
                    stage: outcome.stage,
                    processingTime: outcome.processingTime,
                    error: outcome.error,
                })),
            },
        });
    });

    /**
     * GET /ledger
     * Cross-run totals
     */
    app.get('/ledger', (req: Request, res: Response) => {
        const statistics = source.getLedgerStatistics();
        if (!statistics) {
            res.status(503).json({ error: 'Ledger not loaded yet' });
            return;
        }
        res.json(statistics);
    });

    /**
     * POST /shutdown
     * Stop scheduling; running tasks finish at their next checkpoint
     */
    app.post('/shutdown', (req: Request, res: Response) => {
        source.requestShutdown();
        res.json({ success: true, message: 'Shutdown requested' });
    });

    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok' });
    });

    return app;
}

export function startStatusApi(app: Express, port = 3455): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, '127.0.0.1');
        server.once('listening', () => {
            const address = server.address();
            const boundPort = typeof address === 'object' && address !== null ? address.port : port;
            log(`📊 Status API listening on http://localhost:${boundPort}`, 'status-api');
            resolve(server);
        });
        server.once('error', reject);
    });
}

export function stopStatusApi(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
    });
}
