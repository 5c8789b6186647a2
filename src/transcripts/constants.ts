/**
 * Media discovery defaults
 */

/**
 * Supported input extensions (video containers first, then audio-only)
 */
export const SUPPORTED_MEDIA_EXTENSIONS = [
    '.mp4', '.avi', '.mov', '.mkv', '.flv', '.webm', '.m4v', '.wmv', '.3gp', '.ogv',
    '.mp3', '.mpeg', '.mpga', '.m4a', '.wav', '.ogg', '.flac',
] as const;

/** Lines of engine output kept for failure diagnostics */
export const DIAGNOSTIC_TAIL_LINES = 40;

/** Share of a task's progress bar given to each stage */
export const STAGE_WEIGHTS = {
    extract: { from: 0, to: 0.3 },
    transcribe: { from: 0.3, to: 0.95 },
    write: { from: 0.95, to: 1 },
} as const;
