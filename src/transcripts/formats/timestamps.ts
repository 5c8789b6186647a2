/**
 * Timestamp formatting shared by the text and subtitle formats
 */

interface TimeParts {
    hours: number;
    minutes: number;
    seconds: number;
    millis: number;
}

function splitSeconds(value: number): TimeParts {
    const safe = Number.isFinite(value) ? Math.max(0, value) : 0;
    const whole = Math.trunc(safe);

    return {
        hours: Math.floor(whole / 3600),
        minutes: Math.floor((whole % 3600) / 60),
        seconds: whole % 60,
        millis: Math.floor((safe % 1) * 1000),
    };
}

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/** HH:MM:SS */
export function formatClock(seconds: number): string {
    const t = splitSeconds(seconds);
    return `${pad(t.hours)}:${pad(t.minutes)}:${pad(t.seconds)}`;
}

/** HH:MM:SS,mmm */
export function formatSrtTimestamp(seconds: number): string {
    const t = splitSeconds(seconds);
    return `${formatClock(seconds)},${pad(t.millis, 3)}`;
}

/** HH:MM:SS.mmm */
export function formatVttTimestamp(seconds: number): string {
    const t = splitSeconds(seconds);
    return `${formatClock(seconds)}.${pad(t.millis, 3)}`;
}
