import type { Document } from './document.js';
import type { Entity, ReviewItem } from './entity.js';
import type { MentionType } from './mention.js';
import type { Predicate, Relation } from './relation.js';
import type { EventType, GraphEvent } from './event.js';
import type { TemporalExpression } from './temporal.js';

/**
 * Immutable point-in-time copy of the graph, ordered deterministically.
 */
export interface GraphSnapshot {
    version: number;

    /** Live entities, sorted by id */
    entities: readonly Entity[];

    /** Relations, sorted by key */
    relations: readonly Relation[];

    /** Events, sorted by key */
    events: readonly GraphEvent[];

    /** Temporal expressions referenced by relations or events, sorted by id */
    temporals: readonly TemporalExpression[];

    /** Retired id → surviving id */
    redirects: Readonly<Record<string, string>>;
}

export const SNAPSHOT_VERSION = 1;

/**
 * Filter accepted by `KnowledgeGraphManager.query`. All fields are optional
 * and combine with AND.
 */
export interface GraphQueryFilter {
    kind?: 'entity' | 'relation' | 'event';
    entityType?: MentionType;
    predicate?: Predicate;
    eventType?: EventType;

    /** Only items touching this entity (the entity itself, or edges/events referencing it) */
    entityId?: string;

    minConfidence?: number;
}

export type GraphItem =
    | { kind: 'entity'; entity: Entity }
    | { kind: 'relation'; relation: Relation }
    | { kind: 'event'; event: GraphEvent };

/**
 * Node shape consumed by the HTML export collaborator.
 */
export interface ExportNode {
    id: string;
    label: string;
    type: string;
    colorHint: string;
}

/**
 * Edge shape consumed by the HTML export collaborator.
 */
export interface ExportEdge {
    source: string;
    target: string;
    label: string;
    type: string;
}

export interface ExportGraph {
    nodes: ExportNode[];
    edges: ExportEdge[];
}

/**
 * Everything one committed document changes, applied by a graph store in a
 * single all-or-nothing write.
 */
export interface GraphWriteBatch {
    document: Pick<Document, 'id' | 'category' | 'referenceDate'>;

    /** Live entities created or updated by this document */
    entities: Entity[];

    /** Entities retired by merges, with the id they now redirect to */
    retirements: Array<{ retiredId: string; survivorId: string }>;

    /** Relation keys that no longer exist after a retire rewrote them */
    removedRelationKeys: string[];

    relations: Relation[];
    events: GraphEvent[];
    temporals: TemporalExpression[];

    /** Complete set of pending review items after this document */
    reviewItems: ReviewItem[];
}

/**
 * Persistence collaborator for committed batches.
 */
export interface GraphStore {
    /** Apply the whole batch or none of it */
    writeBatch(batch: GraphWriteBatch): void | Promise<void>;

    readSnapshot(): GraphSnapshot;
    readReviewItems(): ReviewItem[];
    close(): void;
}
