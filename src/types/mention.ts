import type { Span } from './document.js';

/**
 * Candidate types a mention can carry.
 */
export type MentionType = 'organization' | 'person' | 'product' | 'location' | 'other';

export const MENTION_TYPES: readonly MentionType[] = ['organization', 'person', 'product', 'location', 'other'];

/**
 * A single occurrence of an entity reference in a document.
 * Write-once: produced by a mention extractor and never mutated.
 */
export interface Mention {
    /** `<documentId>:<start>-<end>` */
    id: string;

    documentId: string;

    span: Span;

    /** Surface text, exactly `document.text.slice(span.start, span.end)` */
    text: string;

    type: MentionType;

    /** Extraction confidence (0.0 to 1.0) */
    confidence: number;

    /** Name of the extractor that produced the mention */
    source: string;
}
