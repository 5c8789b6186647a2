import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as http from 'http';
import { Server } from 'http';
import { createStatusApi, startStatusApi, stopStatusApi, StatusSource } from '../../scheduler/status-api';
import { BatchStatus } from '../../transcripts/batch';
import { LedgerStatistics } from '../../transcripts/types';

interface JsonResponse {
    status: number;
    body: unknown;
}

function request(port: number, method: string, path: string): Promise<JsonResponse> {
    return new Promise((resolve, reject) => {
        const req = http.request({ host: '127.0.0.1', port, method, path }, res => {
            let data = '';
            res.setEncoding('utf-8');
            res.on('data', chunk => (data += chunk));
            res.on('end', () => resolve({ status: res.statusCode ?? 0, body: JSON.parse(data) }));
        });
        req.on('error', reject);
        req.end();
    });
}

const status: BatchStatus = {
    runId: 'run-1',
    state: 'running',
    startedAt: new Date('2024-03-01T10:00:00.000Z'),
    statistics: {
        totalDiscovered: 3,
        processed: 1,
        successful: 1,
        failed: 0,
        skipped: 0,
        cancelled: 0,
        totalDuration: 60,
        totalProcessingTime: 6,
        realtimeFactor: 0.1,
        failures: [],
    },
    tasks: {
        running: true,
        queued: 1,
        active: [{ path: '/media/b.mp4', relativePath: 'b.mp4', stage: 'validated', progress: 0.2, startedAt: new Date('2024-03-01T10:01:00.000Z') }],
        recentExecutions: [],
    },
};

describe('status API', () => {
    let server: Server;
    let port: number;
    let ledgerStats: LedgerStatistics | null;
    const requestShutdown = vi.fn();

    beforeEach(async () => {
        ledgerStats = null;
        requestShutdown.mockReset();
        const source: StatusSource = {
            getStatus: () => status,
            getLedgerStatistics: () => ledgerStats,
            requestShutdown,
        };
        server = await startStatusApi(createStatusApi(source), 0);
        const address = server.address();
        port = typeof address === 'object' && address !== null ? address.port : 0;
    });

    afterEach(async () => {
        await stopStatusApi(server);
    });

    it('answers health checks', async () => {
        expect(await request(port, 'GET', '/health')).toEqual({ status: 200, body: { status: 'ok' } });
    });

    it('reports run progress', async () => {
        const res = await request(port, 'GET', '/status');
        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({
            runId: 'run-1',
            state: 'running',
            startedAt: '2024-03-01T10:00:00.000Z',
            statistics: { processed: 1, realtimeFactor: 0.1 },
            tasks: { queued: 1, active: [{ relativePath: 'b.mp4', stage: 'validated', progress: 0.2 }] },
        });
    });

    it('serves ledger totals once loaded', async () => {
        expect((await request(port, 'GET', '/ledger')).status).toBe(503);

        ledgerStats = { totalProcessed: 4, successful: 3, failed: 1, totalDuration: 240, totalProcessingTime: 30 };
        expect(await request(port, 'GET', '/ledger')).toEqual({ status: 200, body: ledgerStats });
    });

    it('requests a cooperative shutdown', async () => {
        const res = await request(port, 'POST', '/shutdown');
        expect(res.body).toEqual({ success: true, message: 'Shutdown requested' });
        expect(requestShutdown).toHaveBeenCalledTimes(1);
    });
});
