/**
 * Error taxonomy for a vault run.
 *
 * Vault-scoped failures (ConfigurationError, LockError) abort before any file
 * is touched. File-scoped failures (TemplateError, TranscriptionError,
 * NoteIOError) are logged and the run moves on to the next file or note.
 * Messages name the path and stage; they never carry transcript text.
 */

export type ErrorScope = 'vault' | 'file' | 'note';

export class ConfigurationError extends Error {
    public readonly scope: ErrorScope = 'vault';

    constructor(public readonly field: string, message: string) {
        super(`${field}: ${message}`);
        this.name = 'ConfigurationError';
    }
}

export class LockError extends Error {
    public readonly scope: ErrorScope = 'vault';

    constructor(
        public readonly lockFile: string,
        public readonly holderPid: number | null,
        message?: string
    ) {
        super(message ?? `Vault is locked by process ${holderPid ?? 'unknown'} (${lockFile})`);
        this.name = 'LockError';
    }
}

export class TemplateError extends Error {
    public readonly scope: ErrorScope = 'file';

    constructor(public readonly placeholder: string, message?: string) {
        super(message ?? `Missing required template binding: {${placeholder}}`);
        this.name = 'TemplateError';
    }
}

/** Stage of the per-file work a TranscriptionError came from */
export type TranscriptionStage = 'transcribe' | 'write';

export class TranscriptionError extends Error {
    public readonly scope: ErrorScope = 'file';

    constructor(
        public readonly mediaPath: string,
        public readonly stage: TranscriptionStage,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(`[${stage}] ${mediaPath}: ${message}`, options);
        this.name = 'TranscriptionError';
    }
}

export class NoteIOError extends Error {
    public readonly scope: ErrorScope = 'note';

    constructor(public readonly notePath: string, message: string, options?: { cause?: unknown }) {
        super(`${notePath}: ${message}`, options);
        this.name = 'NoteIOError';
    }
}

/**
 * Raised by a transcription provider. The writer wraps it into a
 * TranscriptionError so the run can skip the file.
 */
export class ProviderError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ProviderError';
    }
}

/** Node system errors carry a string code (ENOENT, EEXIST, ...) */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function hasErrorCode(error: unknown, code: string): boolean {
    return isErrnoException(error) && error.code === code;
}

/** Render any thrown value for a log line */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
