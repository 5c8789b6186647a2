/**
 * Task Runner
 *
 * Runs one pipeline per work item with bounded concurrency.
 * Features:
 * - Dispatch in discovery order (concurrency 1 is strictly sequential)
 * - Cooperative shutdown: a cancellation request drops everything not yet
 *   started and waits for running tasks to reach a checkpoint
 * - Live view of running tasks and recent results
 *
 * Events: taskStarted(item), taskProgress(item, progress), taskCompleted(outcome)
 */

import { EventEmitter } from 'events';
import PQueue from 'p-queue';
import { SetupError, classifyError } from '../shared/errors';
import { RunStatistics, TaskOutcome, TaskProgress, TaskProgressReporter, WorkItem } from '../transcripts/types';
import { CancellationToken } from './cancellation';
import { logError, logTaskEnd, logTaskStart } from './logger';
import { StatisticsAggregator } from './statistics';

export type TaskFn = (item: WorkItem, token: CancellationToken, report: TaskProgressReporter) => Promise<TaskOutcome>;

export interface ActiveTask {
    path: string;
    relativePath: string;
    stage: TaskProgress['stage'];
    progress: number;
    startedAt: Date;
}

export interface TaskRunnerStatus {
    running: boolean;
    queued: number;
    active: ActiveTask[];
    recentExecutions: TaskOutcome[];
}

export class TaskRunner extends EventEmitter {
    private active: Map<string, ActiveTask> = new Map();
    private recentExecutions: TaskOutcome[] = [];
    private maxExecutionHistory = 50;
    private queue: PQueue | null = null;

    constructor(
        private readonly task: TaskFn,
        private readonly statistics: StatisticsAggregator,
    ) {
        super();
    }

    /**
     * Run every item, at most `concurrency` at a time.
     * Resolves once every started task has finished.
     */
    async run(items: readonly WorkItem[], concurrency: number, token: CancellationToken): Promise<RunStatistics> {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new SetupError(`Concurrency must be a positive integer, got ${concurrency}`);
        }

        let started = 0;
        const queue = new PQueue({ concurrency });
        this.queue = queue;

        const onRequested = () => queue.clear();
        token.once('requested', onRequested);

        try {
            for (const item of items) {
                if (token.isCancellationRequested) break;
                queue.add(async () => {
                    // Requested between enqueue and start
                    if (token.isCancellationRequested) return;
                    started++;
                    await this.execute(item, token);
                }).catch(error => {
                    logError(`Task for ${item.path} crashed: ${classifyError(error).message}`, 'scheduler');
                });
            }
            await queue.onIdle();
        } finally {
            token.off('requested', onRequested);
            this.queue = null;
        }

        const notStarted = items.length - started;
        if (notStarted > 0) {
            this.statistics.recordCancelled(notStarted);
        }
        return this.statistics.snapshot();
    }

    getStatus(): TaskRunnerStatus {
        return {
            running: this.queue !== null,
            queued: this.queue?.size ?? 0,
            active: [...this.active.values()].map(task => ({ ...task })),
            recentExecutions: this.recentExecutions.slice(-20),
        };
    }

    private async execute(item: WorkItem, token: CancellationToken): Promise<void> {
        const activeTask: ActiveTask = {
            path: item.path,
            relativePath: item.relativePath,
            stage: 'queued',
            progress: 0,
            startedAt: new Date(),
        };
        this.active.set(item.identity, activeTask);
        this.emit('taskStarted', item);
        logTaskStart(item.relativePath, item.path);

        const report: TaskProgressReporter = progress => {
            activeTask.stage = progress.stage;
            activeTask.progress = progress.ratio;
            this.emit('taskProgress', item, progress);
        };

        let outcome: TaskOutcome;
        try {
            outcome = await this.task(item, token, report);
        } catch (error) {
            const classified = classifyError(error);
            outcome = {
                item,
                status: 'failed',
                stage: activeTask.stage,
                outputPath: '',
                duration: 0,
                processingTime: (Date.now() - activeTask.startedAt.getTime()) / 1000,
                errorKind: classified.kind,
                error: classified.message,
            };
        }

        this.active.delete(item.identity);
        this.statistics.recordOutcome(outcome);
        this.addExecution(outcome);
        this.emit('taskCompleted', outcome);
        logTaskEnd(item.relativePath, outcome.status, Date.now() - activeTask.startedAt.getTime(), outcome.error);
    }

    private addExecution(outcome: TaskOutcome): void {
        this.recentExecutions.push(outcome);
        if (this.recentExecutions.length > this.maxExecutionHistory) {
            this.recentExecutions.shift();
        }
    }
}
