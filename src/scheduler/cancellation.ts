/**
 * Two-level cancellation
 *
 * request(): stop taking new work; tasks stop at their next checkpoint.
 * escalate(): additionally abort running engine processes.
 */

import { EventEmitter } from 'events';
import { CancelledError } from '../shared/errors';

export class CancellationToken extends EventEmitter {
    private requested = false;
    private readonly controller = new AbortController();

    get isCancellationRequested(): boolean {
        return this.requested;
    }

    get isEscalated(): boolean {
        return this.controller.signal.aborted;
    }

    /** Aborted on escalate(); handed to engine processes */
    get signal(): AbortSignal {
        return this.controller.signal;
    }

    request(): void {
        if (this.requested) return;
        this.requested = true;
        this.emit('requested');
    }

    escalate(): void {
        this.request();
        if (this.controller.signal.aborted) return;
        this.controller.abort();
        this.emit('escalated');
    }

    throwIfCancellationRequested(): void {
        if (this.requested) {
            throw new CancelledError();
        }
    }
}
