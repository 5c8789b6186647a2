/**
 * Run statistics
 *
 * Single accumulation point for one batch. Only the scheduler's completion
 * handler (and the skip filter before scheduling) call into it.
 */

import { RunStatistics, TaskOutcome } from '../transcripts/types';

function emptyRunStatistics(totalDiscovered: number): RunStatistics {
    return {
        totalDiscovered,
        processed: 0,
        successful: 0,
        failed: 0,
        skipped: 0,
        cancelled: 0,
        totalDuration: 0,
        totalProcessingTime: 0,
        realtimeFactor: null,
        failures: [],
    };
}

export class StatisticsAggregator {
    private stats: RunStatistics;

    constructor(totalDiscovered = 0) {
        this.stats = emptyRunStatistics(totalDiscovered);
    }

    setDiscovered(count: number): void {
        this.stats.totalDiscovered = count;
    }

    recordSkipped(count = 1): void {
        this.stats.skipped += count;
    }

    recordCancelled(count = 1): void {
        this.stats.cancelled += count;
    }

    recordOutcome(outcome: TaskOutcome): void {
        const stats = this.stats;

        switch (outcome.status) {
            case 'skipped':
                stats.skipped++;
                return;
            case 'cancelled':
                stats.cancelled++;
                return;
            case 'success':
                stats.successful++;
                stats.totalDuration += outcome.duration;
                stats.totalProcessingTime += outcome.processingTime;
                stats.realtimeFactor = stats.totalDuration > 0 ? stats.totalProcessingTime / stats.totalDuration : null;
                break;
            case 'failed':
                stats.failed++;
                stats.failures.push({
                    path: outcome.item.path,
                    errorKind: outcome.errorKind ?? 'UnexpectedError',
                    error: outcome.error ?? '',
                });
                break;
        }

        stats.processed++;
    }

    snapshot(): RunStatistics {
        return { ...this.stats, failures: this.stats.failures.map(failure => ({ ...failure })) };
    }
}

/**
 * Human-readable end-of-run report
 */
export function formatSummary(stats: RunStatistics, wallSeconds?: number): string[] {
    const lines = [
        '='.repeat(60),
        'Processing Summary',
        '='.repeat(60),
        `Total files: ${stats.totalDiscovered}`,
        `Processed: ${stats.processed}`,
        `Successful: ${stats.successful}`,
        `Failed: ${stats.failed}`,
        `Skipped: ${stats.skipped}`,
    ];

    if (stats.cancelled > 0) {
        lines.push(`Cancelled: ${stats.cancelled}`);
    }
    if (stats.processed > 0) {
        lines.push(`Success rate: ${((stats.successful / stats.processed) * 100).toFixed(1)}%`);
    }

    lines.push('', 'Timing:');
    if (wallSeconds !== undefined) {
        lines.push(`Total time: ${wallSeconds.toFixed(1)}s`);
    }
    lines.push(`Total media duration: ${stats.totalDuration.toFixed(1)}s`);
    lines.push(`Total processing time: ${stats.totalProcessingTime.toFixed(1)}s`);
    if (stats.realtimeFactor !== null) {
        lines.push(`Average RTF: ${stats.realtimeFactor.toFixed(2)}`);
    }
    if (stats.successful > 0) {
        lines.push(`Average time per file: ${(stats.totalProcessingTime / stats.successful).toFixed(1)}s`);
    }

    if (stats.failures.length > 0) {
        lines.push('', 'Failures:');
        for (const failure of stats.failures) {
            lines.push(`  ${failure.path}: [${failure.errorKind}] ${failure.error}`);
        }
    }

    return lines;
}
