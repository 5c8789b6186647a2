/**
 * Progress normalization for engine output
 */

/** What a parser can read from one line of engine output */
export type ProgressSignal =
    | { type: 'elapsed'; seconds: number }
    | { type: 'ratio'; value: number }
    | { type: 'end' };

export type ProgressParser = (line: string) => ProgressSignal | null;

/**
 * Keeps reported progress within [0, 1] and never lets it go backwards.
 * The listener only hears about strict increases.
 */
export class MonotonicProgress {
    private current = 0;

    constructor(private readonly listener?: (ratio: number) => void) {}

    get value(): number {
        return this.current;
    }

    update(ratio: number): void {
        if (Number.isNaN(ratio)) return;
        const clamped = Math.min(1, Math.max(0, ratio));
        if (clamped <= this.current) return;

        this.current = clamped;
        this.listener?.(clamped);
    }

    complete(): void {
        this.update(1);
    }
}

/**
 * Turn a parsed signal into a ratio, given the media duration (seconds)
 */
export function signalToRatio(signal: ProgressSignal, durationHint: number): number | null {
    switch (signal.type) {
        case 'end':
            return 1;
        case 'ratio':
            return signal.value;
        case 'elapsed':
            return durationHint > 0 ? Math.min(signal.seconds / durationHint, 1) : null;
    }
}
