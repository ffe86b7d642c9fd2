import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { KnowledgeGraphBuilder } from '../builder/pipeline.js';
import { KnowledgeGraphManager } from '../graph/knowledge-graph.js';
import { SqliteGraphStore } from '../storage/database.js';
import { createConfig } from '../utils/config.js';
import type { DocumentInput, GraphSnapshot, GraphStore, GraphWriteBatch, MentionExtractor } from '../types/index.js';
import { CancelledError } from '../utils/errors.js';
import { shortHash } from '../utils/hash.js';

const COOPERATION_NEWS: DocumentInput = {
    id: 'd1',
    text: '[Investment Cooperation] On August 15 2023, Company A announced a strategic cooperation with Company B',
};

/** Id the builder files COOPERATION_NEWS under */
const D1 = `d1@${shortHash(COOPERATION_NEWS.text, 8)}`;

const PARTNERSHIP: DocumentInput = { id: 'doc1', text: '[Cooperation] Company A signed a partnership with Company B.' };
const ACQUISITION: DocumentInput = { id: 'doc2', text: 'Co. A Ltd. acquired Company C.' };

const emptySnapshot: GraphSnapshot = { version: 1, entities: [], relations: [], events: [], temporals: [], redirects: {} };

/** In-memory store that records batches and can be told to fail */
function memoryStore(onWrite: (batch: GraphWriteBatch) => void = () => undefined): GraphStore & { batches: GraphWriteBatch[] } {
    const batches: GraphWriteBatch[] = [];
    return {
        batches,
        writeBatch(batch: GraphWriteBatch): void {
            onWrite(batch);
            batches.push(batch);
        },
        readSnapshot: () => emptySnapshot,
        readReviewItems: () => [],
        close: () => undefined,
    };
}

function aliasSets(builder: KnowledgeGraphBuilder): string[][] {
    return builder.graph
        .snapshot()
        .entities.map((e) => [...e.aliases])
        .sort((a, b) => (a[0] ?? '').localeCompare(b[0] ?? ''));
}

describe('KnowledgeGraphBuilder', () => {
    it('should build the graph for a single document', async () => {
        const builder = new KnowledgeGraphBuilder(createConfig());
        const report = await builder.ingest([COOPERATION_NEWS]);

        expect(report.documents).toHaveLength(1);
        expect(report.documents[0]).toMatchObject({
            documentId: D1,
            status: 'committed',
            mentions: 2,
            relations: 1,
            events: 1,
            created: { entities: 2, relations: 1, events: 1 },
        });
        expect(report.totals).toEqual({ entities: 2, relations: 1, events: 1 });
        expect(report.reviewItems).toEqual([]);

        const snapshot = builder.graph.snapshot();
        expect(snapshot.entities.map((e) => e.name).sort()).toEqual(['Company A', 'Company B']);
        expect(snapshot.relations[0]).toMatchObject({ predicate: 'cooperation', confidence: 0.85, temporalId: `${D1}#t3-17` });
        expect(snapshot.events[0]).toMatchObject({ type: 'cooperation-event', confidence: 0.9, temporalId: `${D1}#t3-17` });
        expect(snapshot.temporals.map((t) => t.value.start)).toEqual(['2023-08-15']);
        expect(builder.graph.validate()).toEqual([]);
    });

    it('should not create anything when a document is ingested again', async () => {
        const builder = new KnowledgeGraphBuilder(createConfig());
        await builder.ingest([COOPERATION_NEWS]);
        const before = builder.graph.snapshot();

        const report = await builder.ingest([COOPERATION_NEWS]);

        expect(report.documents[0]?.created).toEqual({ entities: 0, relations: 0, events: 0 });
        expect(builder.graph.snapshot().relations).toEqual(before.relations);
        expect(builder.graph.snapshot().events).toEqual(before.events);
    });

    it('should keep documents apart when a reused id arrives with new text', async () => {
        const builder = new KnowledgeGraphBuilder(createConfig());
        const first = await builder.ingest([{ id: 'news', text: 'Company X signed a partnership with Company Y.' }]);
        const second = await builder.ingest([{ id: 'news', text: 'Company Q signed a partnership with Company R.' }]);

        expect(second.documents[0]?.documentId).not.toBe(first.documents[0]?.documentId);
        expect(second.documents[0]?.created.entities).toBe(2);
        expect(builder.graph.snapshot().entities.map((e) => e.name).sort()).toEqual([
            'Company Q',
            'Company R',
            'Company X',
            'Company Y',
        ]);
        expect(builder.graph.validate()).toEqual([]);
    });

    it('should merge an abbreviated legal name above the merge threshold', async () => {
        const builder = new KnowledgeGraphBuilder(createConfig({ linking: { mergeThreshold: 0.8 } }));
        const report = await builder.ingest([PARTNERSHIP, ACQUISITION]);

        expect(report.totals.entities).toBe(3);
        expect(report.reviewItems).toEqual([]);
        expect(aliasSets(builder)).toEqual([['Co. A Ltd.', 'Company A'], ['Company B'], ['Company C']]);
        expect(builder.graph.snapshot().relations.map((r) => r.predicate).sort()).toEqual(['acquisition', 'cooperation']);
    });

    it('should leave a review item below the merge threshold', async () => {
        const builder = new KnowledgeGraphBuilder(createConfig({ linking: { mergeThreshold: 0.9 } }));
        const report = await builder.ingest([PARTNERSHIP, ACQUISITION]);

        expect(report.totals.entities).toBe(4);
        expect(report.reviewItems).toHaveLength(1);
        expect([...(report.reviewItems[0]?.surfaces ?? [])].sort()).toEqual(['Co. A Ltd.', 'Company A']);
    });

    it('should group entities the same way whatever the document order', async () => {
        const forward = new KnowledgeGraphBuilder(createConfig());
        await forward.ingest([PARTNERSHIP, ACQUISITION]);
        const backward = new KnowledgeGraphBuilder(createConfig());
        await backward.ingest([ACQUISITION, PARTNERSHIP]);

        expect(aliasSets(backward)).toEqual(aliasSets(forward));
    });

    it('should skip a document whose extraction fails', async () => {
        const failing: MentionExtractor = {
            name: 'failing',
            extract: () => {
                throw new Error('boom');
            },
        };
        const builder = new KnowledgeGraphBuilder(createConfig(), { mentionExtractor: failing });
        const report = await builder.ingest([COOPERATION_NEWS]);

        expect(report.documents[0]).toMatchObject({
            documentId: D1,
            status: 'skipped',
            error: 'Extraction failed at mentions: boom',
        });
        expect(report.totals).toEqual({ entities: 0, relations: 0, events: 0 });
    });

    it('should roll back a document whose write fails and continue', async () => {
        const bad: DocumentInput = { id: 'bad', text: 'Company X signed a partnership with Company Y.' };
        const badId = `bad@${shortHash(bad.text, 8)}`;
        const store = memoryStore((batch) => {
            if (batch.document.id === badId) throw new Error('disk full');
        });
        const builder = new KnowledgeGraphBuilder(createConfig(), { store });

        const report = await builder.ingest([bad, COOPERATION_NEWS]);

        expect(report.documents.map((d) => [d.documentId, d.status])).toEqual([
            [badId, 'failed'],
            [D1, 'committed'],
        ]);
        expect(report.documents[0]?.error).toBe('Storage failure: disk full');
        expect(builder.graph.entityCount).toBe(2);
        expect(builder.registry.live().map((e) => e.name).sort()).toEqual(['Company A', 'Company B']);
        expect(store.batches.map((b) => b.document.id)).toEqual([D1]);
    });

    it('should roll back a document that leaves the graph inconsistent', async () => {
        class DanglingRoleGraph extends KnowledgeGraphManager {
            override validate(): string[] {
                return this.eventCount > 0 ? ['event e1 role partner references missing entity ent_gone'] : [];
            }
        }
        const store = memoryStore();
        const builder = new KnowledgeGraphBuilder(createConfig(), { store, graph: new DanglingRoleGraph() });

        const report = await builder.ingest([COOPERATION_NEWS]);

        expect(report.documents[0]).toMatchObject({
            documentId: D1,
            status: 'failed',
            error: 'Graph invariants broken: event e1 role partner references missing entity ent_gone',
        });
        expect(store.batches).toEqual([]);
        expect(builder.graph.entityCount).toBe(0);
        expect(builder.graph.eventCount).toBe(0);
        expect(builder.registry.live()).toEqual([]);
    });

    it('should stop after the document in progress when cancelled', async () => {
        const controller = new AbortController();
        const onWrite = vi.fn(() => controller.abort());
        const builder = new KnowledgeGraphBuilder(createConfig(), { store: memoryStore(onWrite) });

        await expect(
            builder.ingest([COOPERATION_NEWS, PARTNERSHIP], { signal: controller.signal })
        ).rejects.toBeInstanceOf(CancelledError);
        expect(onWrite).toHaveBeenCalledTimes(1);
    });

    it('should not start when already cancelled', async () => {
        const controller = new AbortController();
        controller.abort();
        const builder = new KnowledgeGraphBuilder(createConfig());

        await expect(builder.ingest([COOPERATION_NEWS], { signal: controller.signal })).rejects.toBeInstanceOf(
            CancelledError
        );
        expect(builder.graph.entityCount).toBe(0);
    });

    it('should report retries from transient write failures', async () => {
        let failures = 1;
        const store = memoryStore(() => {
            if (failures-- > 0) throw Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
        });
        const sleeps: number[] = [];
        const builder = new KnowledgeGraphBuilder(createConfig(), {
            store,
            sleep: async (ms) => {
                sleeps.push(ms);
            },
        });

        const report = await builder.ingest([COOPERATION_NEWS]);

        expect(report.documents[0]?.status).toBe('committed');
        expect(report.retries).toBe(1);
        expect(sleeps).toHaveLength(1);
        expect(store.batches).toHaveLength(1);
    });

    it('should fail the document once retries run out', async () => {
        const store = memoryStore(() => {
            throw Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
        });
        const builder = new KnowledgeGraphBuilder(createConfig({ storage: { maxRetries: 1 } }), {
            store,
            sleep: async () => undefined,
        });

        const report = await builder.ingest([COOPERATION_NEWS]);

        expect(report.documents[0]).toMatchObject({
            status: 'failed',
            error: 'Gave up after 2 attempts: Storage failure: database is locked',
        });
        expect(builder.graph.entityCount).toBe(0);
    });
});

describe('KnowledgeGraphBuilder with SqliteGraphStore', () => {
    let tmpDir: string;
    let dbPath: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'finkg-pipeline-'));
        dbPath = path.join(tmpDir, 'graph.db');
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should persist exactly the in-memory graph', async () => {
        const store = new SqliteGraphStore(dbPath);
        try {
            const builder = new KnowledgeGraphBuilder(createConfig(), { store });
            await builder.ingest([COOPERATION_NEWS, PARTNERSHIP, ACQUISITION]);

            expect(KnowledgeGraphManager.fromSnapshot(store.readSnapshot()).snapshot()).toEqual(builder.graph.snapshot());
        } finally {
            store.close();
        }
    });

    it('should continue incrementally from a stored graph', async () => {
        const first = new SqliteGraphStore(dbPath);
        try {
            await new KnowledgeGraphBuilder(createConfig(), { store: first }).ingest([COOPERATION_NEWS]);
        } finally {
            first.close();
        }

        const second = new SqliteGraphStore(dbPath);
        try {
            const builder = new KnowledgeGraphBuilder(createConfig(), { store: second });
            expect(builder.graph.entityCount).toBe(2);

            const report = await builder.ingest([COOPERATION_NEWS]);
            expect(report.documents[0]?.created).toEqual({ entities: 0, relations: 0, events: 0 });
            expect(second.getStats()).toMatchObject({ documents: 1, entities: 2, relations: 1, events: 1 });
        } finally {
            second.close();
        }
    });
});
