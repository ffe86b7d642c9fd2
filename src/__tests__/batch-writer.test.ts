import { describe, it, expect } from 'vitest';
import { RetryingGraphWriter } from '../storage/batch-writer.js';
import type { GraphSnapshot, GraphStore, GraphWriteBatch } from '../types/index.js';
import { StorageError, toStorageError } from '../utils/errors.js';

const batch: GraphWriteBatch = {
    document: { id: 'd1', category: null, referenceDate: null },
    entities: [],
    retirements: [],
    removedRelationKeys: [],
    relations: [],
    events: [],
    temporals: [],
    reviewItems: [],
};

const emptySnapshot: GraphSnapshot = { version: 1, entities: [], relations: [], events: [], temporals: [], redirects: {} };

function busy(): Error {
    return Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
}

/** Store whose writes fail `failures` times before succeeding */
function flakyStore(failures: number, error: () => unknown = busy): GraphStore & { attempts: number } {
    return {
        attempts: 0,
        writeBatch(): void {
            this.attempts++;
            if (this.attempts <= failures) throw error();
        },
        readSnapshot: () => emptySnapshot,
        readReviewItems: () => [],
        close: () => undefined,
    };
}

function writer(store: GraphStore, maxBackoffMs = 2000): { writer: RetryingGraphWriter; sleeps: number[] } {
    const sleeps: number[] = [];
    return {
        writer: new RetryingGraphWriter(store, {
            maxRetries: 3,
            initialBackoffMs: 100,
            maxBackoffMs,
            sleep: async (ms) => {
                sleeps.push(ms);
            },
            random: () => 0,
        }),
        sleeps,
    };
}

describe('RetryingGraphWriter', () => {
    it('should retry transient failures with exponential backoff', async () => {
        const store = flakyStore(2);
        const { writer: w, sleeps } = writer(store);

        await w.write(batch);

        expect(store.attempts).toBe(3);
        expect(sleeps).toEqual([100, 200]);
        expect(w.retryCount).toBe(2);
    });

    it('should give up after the retry budget', async () => {
        const store = flakyStore(Infinity);
        const { writer: w, sleeps } = writer(store);

        const failure = w.write(batch);
        await expect(failure).rejects.toBeInstanceOf(StorageError);
        await expect(failure).rejects.toMatchObject({
            retryable: true,
            message: 'Gave up after 4 attempts: Storage failure: database is locked',
        });
        expect(sleeps).toEqual([100, 200, 400]);
        expect(store.attempts).toBe(4);
    });

    it('should cap the backoff', async () => {
        const { writer: w, sleeps } = writer(flakyStore(Infinity), 150);
        await expect(w.write(batch)).rejects.toBeInstanceOf(StorageError);
        expect(sleeps).toEqual([100, 150, 150]);
    });

    it('should surface non-retryable failures at once', async () => {
        const store = flakyStore(1, () => Object.assign(new Error('FOREIGN KEY constraint failed'), { code: 'SQLITE_CONSTRAINT_FOREIGNKEY' }));
        const { writer: w, sleeps } = writer(store);

        await expect(w.write(batch)).rejects.toMatchObject({ retryable: false });
        expect(store.attempts).toBe(1);
        expect(sleeps).toEqual([]);
    });

    it('should add jitter of up to half the backoff', async () => {
        const sleeps: number[] = [];
        const w = new RetryingGraphWriter(flakyStore(1), {
            maxRetries: 3,
            initialBackoffMs: 100,
            maxBackoffMs: 2000,
            sleep: async (ms) => {
                sleeps.push(ms);
            },
            random: () => 0.5,
        });
        await w.write(batch);
        expect(sleeps).toEqual([125]);
    });
});

describe('toStorageError', () => {
    it('should classify by error code', () => {
        expect(toStorageError(busy()).retryable).toBe(true);
        expect(toStorageError(Object.assign(new Error('x'), { code: 'SQLITE_BUSY_SNAPSHOT' })).retryable).toBe(true);
        expect(toStorageError(Object.assign(new Error('x'), { code: 'ECONNRESET' })).retryable).toBe(true);
        expect(toStorageError(new Error('disk full')).retryable).toBe(false);
        expect(toStorageError('plain string').message).toBe('Storage failure: plain string');
    });

    it('should pass StorageErrors through', () => {
        const error = new StorageError('already wrapped', true);
        expect(toStorageError(error)).toBe(error);
    });
});
