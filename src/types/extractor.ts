import type { Document } from './document.js';
import type { Mention } from './mention.js';
import type { ExtractedRelation } from './relation.js';
import type { ExtractedEvent, RejectedEvent } from './event.js';
import type { TemporalExpression } from './temporal.js';

/**
 * Extraction contracts. Callers depend on these interfaces only; rule-based,
 * classifier-based and hybrid implementations are interchangeable.
 */

export interface MentionExtractor {
    readonly name: string;

    /**
     * Return mention candidates for the document. Candidates may overlap;
     * overlap resolution happens downstream.
     */
    extract(document: Document): Mention[];
}

export interface RelationExtractor {
    readonly name: string;

    /**
     * Return relation candidates for mention pairs. Filtering, de-duplication
     * and mutual exclusion happen downstream.
     */
    extract(document: Document, mentions: readonly Mention[]): ExtractedRelation[];
}

export interface EventExtractionInput {
    document: Document;
    mentions: readonly Mention[];
    relations: readonly ExtractedRelation[];
    temporals: readonly TemporalExpression[];
}

export interface EventExtractionResult {
    events: ExtractedEvent[];
    rejected: RejectedEvent[];
}

export interface EventExtractor {
    readonly name: string;
    extract(input: EventExtractionInput): EventExtractionResult;
}
