/**
 * Error raised when a single document cannot be run through stages 1–4.
 * The pipeline reports it and moves on to the next document.
 */
export class ExtractionError extends Error {
    constructor(
        message: string,
        public readonly documentId: string,
        public readonly stage: 'mentions' | 'relations' | 'temporal' | 'events',
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ExtractionError';
    }
}

/**
 * A merge or retire would break a graph invariant (dangling edge, unknown
 * node, redirect cycle). The offending operation is aborted with state untouched.
 */
export class InvariantViolationError extends Error {
    constructor(
        message: string,
        public readonly details: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'InvariantViolationError';
    }
}

/**
 * Graph store failure, classified as transient (retryable) or not.
 */
export class StorageError extends Error {
    constructor(
        message: string,
        public readonly retryable: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'StorageError';
    }
}

/**
 * Ingest was cancelled through its AbortSignal.
 */
export class CancelledError extends Error {
    constructor(message = 'Ingest cancelled') {
        super(message);
        this.name = 'CancelledError';
    }
}

/**
 * Configuration failed validation.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Error codes worth retrying: lock contention and dropped connections.
 */
const TRANSIENT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT']);

export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Wrap a storage failure as a `StorageError`, classified by its error code.
 */
export function toStorageError(error: unknown): StorageError {
    if (error instanceof StorageError) return error;
    const code = errorCode(error);
    const retryable = code !== undefined && (TRANSIENT_CODES.has(code) || code.startsWith('SQLITE_BUSY'));
    return new StorageError(`Storage failure: ${errorMessage(error)}`, retryable, { cause: error });
}
