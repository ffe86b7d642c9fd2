import type { Span } from './document.js';

/**
 * Predicate types for relations between entities.
 */
export type Predicate =
    | 'investment'
    | 'acquisition'
    | 'cooperation'
    | 'employment'
    | 'subsidiary'
    | 'competition'
    | 'supply'
    | 'product'
    | 'location'
    | 'related';

export const PREDICATES: readonly Predicate[] = [
    'investment',
    'acquisition',
    'cooperation',
    'employment',
    'subsidiary',
    'competition',
    'supply',
    'product',
    'location',
    'related',
];

/** How a relation candidate was produced */
export type RelationMethod = 'trigger' | 'type-pair' | 'co-occurrence';

/**
 * Where a relation or event was read from.
 */
export interface Evidence {
    documentId: string;
    span: Span;
    text: string;

    /** Hash of (type, span, document id), the idempotence key */
    fingerprint: string;
}

/**
 * Relation between two mentions, as produced by a relation extractor.
 */
export interface ExtractedRelation {
    id: string;
    subjectMentionId: string;
    predicate: Predicate;
    objectMentionId: string;
    evidence: Evidence;
    confidence: number;
    method: RelationMethod;

    /** Trigger word that fired, if any */
    trigger: string | null;

    /** Temporal expression qualifying the relation */
    temporalId: string | null;
}

/**
 * A relation candidate that did not survive filtering, with the reason.
 */
export interface DroppedRelation {
    relation: ExtractedRelation;
    reason: string;
}

/**
 * Relation between canonical entities, as stored in the graph.
 */
export interface Relation {
    /** `subjectId|predicate|objectId|fingerprint` */
    key: string;
    subjectId: string;
    predicate: Predicate;
    objectId: string;
    evidence: Evidence;
    confidence: number;
    method: RelationMethod;
    temporalId: string | null;
}
