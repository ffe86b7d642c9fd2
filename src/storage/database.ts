import Database from 'better-sqlite3';
import type {
    Entity,
    EventType,
    GraphEvent,
    GraphSnapshot,
    GraphStore,
    GraphWriteBatch,
    MentionType,
    Predicate,
    Relation,
    RelationMethod,
    ReviewItem,
    RunRecord,
    TemporalExpression,
    TemporalGranularity,
} from '../types/index.js';
import { SNAPSHOT_VERSION } from '../types/index.js';
import { toStorageError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * SQLite schema migration v1.
 * Entities are never deleted: a merge sets `retired_into` and adds a redirect.
 */
const MIGRATION_V1 = `
-- Runs: ingest session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  finkg_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Documents committed to the graph
CREATE TABLE IF NOT EXISTS documents (
  document_id TEXT PRIMARY KEY,
  category TEXT,
  reference_date TEXT,
  ingested_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Canonical entities
CREATE TABLE IF NOT EXISTS entities (
  entity_id TEXT PRIMARY KEY,
  type TEXT NOT NULL,
  name TEXT NOT NULL,
  aliases_json TEXT NOT NULL DEFAULT '[]',
  mention_ids_json TEXT NOT NULL DEFAULT '[]',
  confidence REAL NOT NULL,
  created_seq INTEGER NOT NULL,
  retired_into TEXT
);

-- Retired id → surviving id
CREATE TABLE IF NOT EXISTS redirects (
  retired_id TEXT PRIMARY KEY,
  survivor_id TEXT NOT NULL
);

-- Normalized time expressions
CREATE TABLE IF NOT EXISTS temporals (
  temporal_id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL,
  span_start INTEGER NOT NULL,
  span_end INTEGER NOT NULL,
  text TEXT NOT NULL,
  kind TEXT NOT NULL,
  value_start TEXT,
  value_end TEXT,
  granularity TEXT NOT NULL,
  basis TEXT NOT NULL,
  relative INTEGER NOT NULL,
  confidence REAL NOT NULL
);

-- Relations between live entities
CREATE TABLE IF NOT EXISTS relations (
  relation_key TEXT PRIMARY KEY,
  subject_id TEXT NOT NULL REFERENCES entities(entity_id),
  predicate TEXT NOT NULL,
  object_id TEXT NOT NULL REFERENCES entities(entity_id),
  confidence REAL NOT NULL,
  method TEXT NOT NULL,
  temporal_id TEXT REFERENCES temporals(temporal_id),
  document_id TEXT NOT NULL,
  span_start INTEGER NOT NULL,
  span_end INTEGER NOT NULL,
  evidence_text TEXT NOT NULL,
  fingerprint TEXT NOT NULL
);

-- Events (hyper-edges)
CREATE TABLE IF NOT EXISTS events (
  event_key TEXT PRIMARY KEY,
  type TEXT NOT NULL,
  attributes_json TEXT NOT NULL DEFAULT '{}',
  confidence REAL NOT NULL,
  complete INTEGER NOT NULL,
  temporal_id TEXT REFERENCES temporals(temporal_id),
  document_id TEXT NOT NULL,
  span_start INTEGER NOT NULL,
  span_end INTEGER NOT NULL,
  evidence_text TEXT NOT NULL,
  fingerprint TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS event_roles (
  event_key TEXT NOT NULL REFERENCES events(event_key) ON DELETE CASCADE,
  role TEXT NOT NULL,
  position INTEGER NOT NULL,
  entity_id TEXT REFERENCES entities(entity_id),
  PRIMARY KEY (event_key, role)
);

-- Merges the linker left for a reviewer
CREATE TABLE IF NOT EXISTS review_items (
  review_key TEXT PRIMARY KEY,
  entity_a TEXT NOT NULL,
  entity_b TEXT NOT NULL,
  surface_a TEXT NOT NULL,
  surface_b TEXT NOT NULL,
  score REAL NOT NULL,
  reason TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_entities_type ON entities(type);
CREATE INDEX IF NOT EXISTS idx_relations_subject ON relations(subject_id);
CREATE INDEX IF NOT EXISTS idx_relations_object ON relations(object_id);
CREATE INDEX IF NOT EXISTS idx_relations_predicate ON relations(predicate);
CREATE INDEX IF NOT EXISTS idx_events_type ON events(type);
CREATE INDEX IF NOT EXISTS idx_event_roles_entity ON event_roles(entity_id);
`;

interface EntityRow {
    entity_id: string;
    type: MentionType;
    name: string;
    aliases_json: string;
    mention_ids_json: string;
    confidence: number;
    created_seq: number;
    retired_into: string | null;
}

interface RelationRow {
    relation_key: string;
    subject_id: string;
    predicate: Predicate;
    object_id: string;
    confidence: number;
    method: RelationMethod;
    temporal_id: string | null;
    document_id: string;
    span_start: number;
    span_end: number;
    evidence_text: string;
    fingerprint: string;
}

interface EventRow {
    event_key: string;
    type: EventType;
    attributes_json: string;
    confidence: number;
    complete: number;
    temporal_id: string | null;
    document_id: string;
    span_start: number;
    span_end: number;
    evidence_text: string;
    fingerprint: string;
}

interface EventRoleRow {
    event_key: string;
    role: string;
    entity_id: string | null;
}

interface TemporalRow {
    temporal_id: string;
    document_id: string;
    span_start: number;
    span_end: number;
    text: string;
    kind: 'point' | 'interval';
    value_start: string | null;
    value_end: string | null;
    granularity: TemporalGranularity;
    basis: string;
    relative: number;
    confidence: number;
}

interface ReviewRow {
    review_key: string;
    entity_a: string;
    entity_b: string;
    surface_a: string;
    surface_b: string;
    score: number;
    reason: string;
}

interface CountRow {
    count: number;
}

function parseJson<T>(raw: string, fallback: T, guard: (value: unknown) => value is T): T {
    const value: unknown = JSON.parse(raw);
    return guard(value) ? value : fallback;
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
    return (
        typeof value === 'object' &&
        value !== null &&
        !Array.isArray(value) &&
        Object.values(value).every((v) => typeof v === 'string')
    );
}

/**
 * Graph store on better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and batch writes.
 */
export class SqliteGraphStore implements GraphStore {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        logger.debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger.debug('Database migrated to v1');
        }
    }

    // ─── Batch writes ─────────────────────────────────────────

    /**
     * Apply one committed document in a single transaction.
     */
    writeBatch(batch: GraphWriteBatch): void {
        const upsertDocument = this.db.prepare(`
      INSERT INTO documents (document_id, category, reference_date)
      VALUES (@id, @category, @referenceDate)
      ON CONFLICT(document_id) DO UPDATE SET category = excluded.category, reference_date = excluded.reference_date
    `);
        const insertTemporal = this.db.prepare(`
      INSERT OR IGNORE INTO temporals (temporal_id, document_id, span_start, span_end, text, kind, value_start, value_end, granularity, basis, relative, confidence)
      VALUES (@temporal_id, @document_id, @span_start, @span_end, @text, @kind, @value_start, @value_end, @granularity, @basis, @relative, @confidence)
    `);
        const upsertEntity = this.db.prepare(`
      INSERT INTO entities (entity_id, type, name, aliases_json, mention_ids_json, confidence, created_seq, retired_into)
      VALUES (@entity_id, @type, @name, @aliases_json, @mention_ids_json, @confidence, @created_seq, NULL)
      ON CONFLICT(entity_id) DO UPDATE SET
        name = excluded.name,
        aliases_json = excluded.aliases_json,
        mention_ids_json = excluded.mention_ids_json,
        confidence = excluded.confidence,
        retired_into = NULL
    `);
        const retireEntity = this.db.prepare('UPDATE entities SET retired_into = ? WHERE entity_id = ?');
        const repointRetired = this.db.prepare('UPDATE entities SET retired_into = ? WHERE retired_into = ?');
        const upsertRedirect = this.db.prepare(`
      INSERT INTO redirects (retired_id, survivor_id) VALUES (?, ?)
      ON CONFLICT(retired_id) DO UPDATE SET survivor_id = excluded.survivor_id
    `);
        const repointRedirects = this.db.prepare('UPDATE redirects SET survivor_id = ? WHERE survivor_id = ?');
        const deleteRelation = this.db.prepare('DELETE FROM relations WHERE relation_key = ?');
        const upsertRelation = this.db.prepare(`
      INSERT INTO relations (relation_key, subject_id, predicate, object_id, confidence, method, temporal_id, document_id, span_start, span_end, evidence_text, fingerprint)
      VALUES (@relation_key, @subject_id, @predicate, @object_id, @confidence, @method, @temporal_id, @document_id, @span_start, @span_end, @evidence_text, @fingerprint)
      ON CONFLICT(relation_key) DO UPDATE SET confidence = MAX(confidence, excluded.confidence)
    `);
        const upsertEvent = this.db.prepare(`
      INSERT INTO events (event_key, type, attributes_json, confidence, complete, temporal_id, document_id, span_start, span_end, evidence_text, fingerprint)
      VALUES (@event_key, @type, @attributes_json, @confidence, @complete, @temporal_id, @document_id, @span_start, @span_end, @evidence_text, @fingerprint)
      ON CONFLICT(event_key) DO UPDATE SET
        attributes_json = excluded.attributes_json,
        confidence = MAX(confidence, excluded.confidence),
        complete = excluded.complete,
        temporal_id = excluded.temporal_id
    `);
        const deleteRoles = this.db.prepare('DELETE FROM event_roles WHERE event_key = ?');
        const insertRole = this.db.prepare(
            'INSERT INTO event_roles (event_key, role, position, entity_id) VALUES (?, ?, ?, ?)'
        );
        const clearReviews = this.db.prepare('DELETE FROM review_items');
        const insertReview = this.db.prepare(`
      INSERT INTO review_items (review_key, entity_a, entity_b, surface_a, surface_b, score, reason)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

        const apply = this.db.transaction((b: GraphWriteBatch) => {
            upsertDocument.run(b.document);

            for (const t of b.temporals) {
                insertTemporal.run({
                    temporal_id: t.id,
                    document_id: t.documentId,
                    span_start: t.span.start,
                    span_end: t.span.end,
                    text: t.text,
                    kind: t.value.kind,
                    value_start: t.value.start,
                    value_end: t.value.end,
                    granularity: t.value.granularity,
                    basis: t.basis,
                    relative: t.relative ? 1 : 0,
                    confidence: t.confidence,
                });
            }

            for (const e of b.entities) {
                upsertEntity.run({
                    entity_id: e.id,
                    type: e.type,
                    name: e.name,
                    aliases_json: JSON.stringify(e.aliases),
                    mention_ids_json: JSON.stringify(e.mentionIds),
                    confidence: e.confidence,
                    created_seq: e.createdSeq,
                });
            }

            for (const key of b.removedRelationKeys) {
                deleteRelation.run(key);
            }

            for (const r of b.relations) {
                upsertRelation.run({
                    relation_key: r.key,
                    subject_id: r.subjectId,
                    predicate: r.predicate,
                    object_id: r.objectId,
                    confidence: r.confidence,
                    method: r.method,
                    temporal_id: r.temporalId,
                    document_id: r.evidence.documentId,
                    span_start: r.evidence.span.start,
                    span_end: r.evidence.span.end,
                    evidence_text: r.evidence.text,
                    fingerprint: r.evidence.fingerprint,
                });
            }

            for (const ev of b.events) {
                upsertEvent.run({
                    event_key: ev.key,
                    type: ev.type,
                    attributes_json: JSON.stringify(ev.attributes),
                    confidence: ev.confidence,
                    complete: ev.complete ? 1 : 0,
                    temporal_id: ev.temporalId,
                    document_id: ev.evidence.documentId,
                    span_start: ev.evidence.span.start,
                    span_end: ev.evidence.span.end,
                    evidence_text: ev.evidence.text,
                    fingerprint: ev.evidence.fingerprint,
                });
                deleteRoles.run(ev.key);
                Object.entries(ev.roles).forEach(([role, entityId], position) => {
                    insertRole.run(ev.key, role, position, entityId);
                });
            }

            for (const { retiredId, survivorId } of b.retirements) {
                retireEntity.run(survivorId, retiredId);
                repointRetired.run(survivorId, retiredId);
                repointRedirects.run(survivorId, retiredId);
                upsertRedirect.run(retiredId, survivorId);
            }

            clearReviews.run();
            for (const item of b.reviewItems) {
                insertReview.run(
                    item.key,
                    item.entityIds[0],
                    item.entityIds[1],
                    item.surfaces[0],
                    item.surfaces[1],
                    item.score,
                    item.reason
                );
            }
        });

        try {
            apply(batch);
        } catch (error) {
            throw toStorageError(error);
        }
    }

    // ─── Reads ────────────────────────────────────────────────

    /**
     * Rebuild the committed graph so a later run can continue incrementally.
     */
    readSnapshot(): GraphSnapshot {
        const entities: Entity[] = this.db
            .prepare<[], EntityRow>('SELECT * FROM entities WHERE retired_into IS NULL ORDER BY entity_id')
            .all()
            .map((row) => ({
                id: row.entity_id,
                name: row.name,
                type: row.type,
                aliases: parseJson(row.aliases_json, [], isStringArray),
                mentionIds: parseJson(row.mention_ids_json, [], isStringArray),
                confidence: row.confidence,
                createdSeq: row.created_seq,
                retiredInto: null,
            }));

        const relations: Relation[] = this.db
            .prepare<[], RelationRow>('SELECT * FROM relations ORDER BY relation_key')
            .all()
            .map((row) => ({
                key: row.relation_key,
                subjectId: row.subject_id,
                predicate: row.predicate,
                objectId: row.object_id,
                evidence: {
                    documentId: row.document_id,
                    span: { start: row.span_start, end: row.span_end },
                    text: row.evidence_text,
                    fingerprint: row.fingerprint,
                },
                confidence: row.confidence,
                method: row.method,
                temporalId: row.temporal_id,
            }));

        const roles = new Map<string, Record<string, string | null>>();
        for (const row of this.db
            .prepare<[], EventRoleRow>('SELECT event_key, role, entity_id FROM event_roles ORDER BY event_key, position')
            .all()) {
            const record = roles.get(row.event_key) ?? {};
            record[row.role] = row.entity_id;
            roles.set(row.event_key, record);
        }

        const events: GraphEvent[] = this.db
            .prepare<[], EventRow>('SELECT * FROM events ORDER BY event_key')
            .all()
            .map((row) => ({
                key: row.event_key,
                type: row.type,
                roles: roles.get(row.event_key) ?? {},
                attributes: parseJson(row.attributes_json, {}, isStringRecord),
                evidence: {
                    documentId: row.document_id,
                    span: { start: row.span_start, end: row.span_end },
                    text: row.evidence_text,
                    fingerprint: row.fingerprint,
                },
                temporalId: row.temporal_id,
                confidence: row.confidence,
                complete: row.complete === 1,
            }));

        const temporals: TemporalExpression[] = this.db
            .prepare<[], TemporalRow>('SELECT * FROM temporals ORDER BY temporal_id')
            .all()
            .map((row) => ({
                id: row.temporal_id,
                documentId: row.document_id,
                span: { start: row.span_start, end: row.span_end },
                text: row.text,
                value: { kind: row.kind, start: row.value_start, end: row.value_end, granularity: row.granularity },
                basis: row.basis,
                relative: row.relative === 1,
                confidence: row.confidence,
            }));

        const redirects: Record<string, string> = {};
        for (const row of this.db
            .prepare<[], { retired_id: string; survivor_id: string }>('SELECT * FROM redirects ORDER BY retired_id')
            .all()) {
            redirects[row.retired_id] = row.survivor_id;
        }

        return { version: SNAPSHOT_VERSION, entities, relations, events, temporals, redirects };
    }

    readReviewItems(): ReviewItem[] {
        return this.db
            .prepare<[], ReviewRow>('SELECT * FROM review_items ORDER BY review_key')
            .all()
            .map((row) => ({
                key: row.review_key,
                entityIds: [row.entity_a, row.entity_b],
                surfaces: [row.surface_a, row.surface_b],
                score: row.score,
                reason: row.reason,
            }));
    }

    hasDocument(documentId: string): boolean {
        const row = this.db.prepare<[string], { found: number }>('SELECT 1 AS found FROM documents WHERE document_id = ?').get(documentId);
        return row !== undefined;
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, finkg_version, config_json, stats_json)
      VALUES (@created_at, @finkg_version, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        documents: number;
        entities: number;
        retiredEntities: number;
        relations: number;
        events: number;
        temporals: number;
        reviewItems: number;
        runs: number;
        relationsByPredicate: Record<string, number>;
        eventsByType: Record<string, number>;
    } {
        const count = (sql: string): number => this.db.prepare<[], CountRow>(sql).get()?.count ?? 0;

        const relationsByPredicate: Record<string, number> = {};
        for (const row of this.db
            .prepare<[], { predicate: string; count: number }>('SELECT predicate, COUNT(*) as count FROM relations GROUP BY predicate')
            .all()) {
            relationsByPredicate[row.predicate] = row.count;
        }
        const eventsByType: Record<string, number> = {};
        for (const row of this.db
            .prepare<[], { type: string; count: number }>('SELECT type, COUNT(*) as count FROM events GROUP BY type')
            .all()) {
            eventsByType[row.type] = row.count;
        }

        return {
            documents: count('SELECT COUNT(*) as count FROM documents'),
            entities: count('SELECT COUNT(*) as count FROM entities WHERE retired_into IS NULL'),
            retiredEntities: count('SELECT COUNT(*) as count FROM entities WHERE retired_into IS NOT NULL'),
            relations: count('SELECT COUNT(*) as count FROM relations'),
            events: count('SELECT COUNT(*) as count FROM events'),
            temporals: count('SELECT COUNT(*) as count FROM temporals'),
            reviewItems: count('SELECT COUNT(*) as count FROM review_items'),
            runs: count('SELECT COUNT(*) as count FROM runs'),
            relationsByPredicate,
            eventsByType,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        logger.debug('Database closed');
    }
}
