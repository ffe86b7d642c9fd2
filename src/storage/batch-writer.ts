import type { GraphStore, GraphWriteBatch } from '../types/index.js';
import { StorageError, toStorageError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export interface RetryOptions {
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;

    /** Injected in tests to avoid real waits */
    sleep?: (ms: number) => Promise<void>;

    /** Source of jitter, in [0, 1) */
    random?: () => number;
}

/**
 * Writes batches through a `GraphStore`, retrying transient failures with
 * bounded exponential backoff. Non-retryable failures surface immediately.
 */
export class RetryingGraphWriter {
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;
    private retries = 0;

    constructor(
        private readonly store: GraphStore,
        private readonly options: RetryOptions
    ) {
        this.sleep = options.sleep ?? sleep;
        this.random = options.random ?? Math.random;
    }

    /** Retries performed since construction */
    get retryCount(): number {
        return this.retries;
    }

    async write(batch: GraphWriteBatch): Promise<void> {
        const { maxRetries, initialBackoffMs, maxBackoffMs } = this.options;

        for (let attempt = 0; ; attempt++) {
            try {
                await this.store.writeBatch(batch);
                return;
            } catch (error) {
                const storageError = toStorageError(error);

                if (storageError.retryable && attempt < maxRetries) {
                    const backoff = this.calculateBackoff(attempt, initialBackoffMs, maxBackoffMs);
                    logger.warn(
                        { documentId: batch.document.id, attempt: attempt + 1, backoffMs: backoff },
                        'Retryable storage error, backing off'
                    );
                    this.retries++;
                    await this.sleep(backoff);
                    continue;
                }

                if (storageError.retryable) {
                    throw new StorageError(
                        `Gave up after ${attempt + 1} attempts: ${storageError.message}`,
                        true,
                        { cause: storageError }
                    );
                }
                throw storageError;
            }
        }
    }

    private calculateBackoff(attempt: number, initial: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = initial * Math.pow(2, attempt);
        const jitter = this.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
