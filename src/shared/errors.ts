/**
 * Error taxonomy for batch transcription
 *
 * Every failure below the scheduler is converted into one of these kinds
 * and stored in the ledger by name.
 */

export const ERROR_KINDS = [
    'ValidationError',
    'ExtractionError',
    'TranscriptionError',
    'EmptyResultError',
    'PersistenceError',
    'CancelledError',
    'NotFoundError',
    'NotADirectoryError',
    'SetupError',
    'ConfigError',
    'UnexpectedError',
] as const;

export type ErrorKind = typeof ERROR_KINDS[number];

export function isErrorKind(value: string): value is ErrorKind {
    return ERROR_KINDS.some(kind => kind === value);
}

export type EngineName = 'ffmpeg' | 'ffprobe' | 'whisper';

/** Why an engine invocation ended badly */
export type EngineFailureReason = 'exit' | 'stalled' | 'timeout' | 'spawn' | 'output';

export abstract class MediascribeError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationError extends MediascribeError {
    readonly kind = 'ValidationError' as const;
}

/**
 * External engine failed, exited non-zero, or was killed after stalling.
 * `diagnostics` holds the tail of the engine's captured output.
 */
export class EngineFailure extends MediascribeError {
    readonly kind: 'ExtractionError' | 'TranscriptionError' = 'ExtractionError';

    constructor(
        message: string,
        readonly engine: EngineName,
        readonly reason: EngineFailureReason,
        readonly diagnostics: string[] = [],
    ) {
        super(message);
    }
}

export class ExtractionError extends EngineFailure {
    readonly kind = 'ExtractionError' as const;

    static from(failure: EngineFailure): ExtractionError {
        return new ExtractionError(failure.message, failure.engine, failure.reason, failure.diagnostics);
    }
}

export class TranscriptionError extends EngineFailure {
    readonly kind = 'TranscriptionError' as const;

    static from(failure: EngineFailure): TranscriptionError {
        return new TranscriptionError(failure.message, failure.engine, failure.reason, failure.diagnostics);
    }
}

/** Engine ran fine but produced no usable text */
export class EmptyResultError extends MediascribeError {
    readonly kind = 'EmptyResultError' as const;

    constructor(message = 'No text extracted from audio') {
        super(message);
    }
}

export class PersistenceError extends MediascribeError {
    readonly kind = 'PersistenceError' as const;
}

export class CancelledError extends MediascribeError {
    readonly kind = 'CancelledError' as const;

    constructor(message = 'Task cancelled by shutdown request') {
        super(message);
    }
}

export class NotFoundError extends MediascribeError {
    readonly kind = 'NotFoundError' as const;
}

export class NotADirectoryError extends MediascribeError {
    readonly kind = 'NotADirectoryError' as const;
}

/** Unrecoverable problem detected before any task is scheduled */
export class SetupError extends MediascribeError {
    readonly kind = 'SetupError' as const;
}

export class ConfigError extends MediascribeError {
    readonly kind = 'ConfigError' as const;

    constructor(message: string, readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    }
}

export interface ClassifiedError {
    kind: ErrorKind;
    message: string;
}

export function toErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Map anything thrown into a ledger-friendly kind + message.
 * Engine failures get their last diagnostic line appended.
 */
export function classifyError(error: unknown): ClassifiedError {
    if (error instanceof EngineFailure) {
        const tail = error.diagnostics[error.diagnostics.length - 1];
        const message = tail && !error.message.includes(tail) ? `${error.message} (${tail})` : error.message;
        return { kind: error.kind, message };
    }
    if (error instanceof MediascribeError) {
        return { kind: error.kind, message: error.message };
    }
    return { kind: 'UnexpectedError', message: toErrorMessage(error) };
}

/** Node fs errors carry a string `code` (ENOENT, EEXIST, ...) */
export function hasErrorCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}
