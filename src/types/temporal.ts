import type { Span } from './document.js';

/**
 * Precision of a normalized time value.
 */
export type TemporalGranularity = 'day' | 'month' | 'year' | 'unknown';

/**
 * Normalized time value. Dates are formatted to the granularity:
 * `YYYY-MM-DD` (day), `YYYY-MM` (month), `YYYY` (year); null when unknown.
 */
export interface TemporalValue {
    kind: 'point' | 'interval';
    start: string | null;
    end: string | null;
    granularity: TemporalGranularity;
}

/**
 * A time expression found in a document together with its normalization.
 */
export interface TemporalExpression {
    /** `<documentId>#t<start>-<end>` */
    id: string;

    documentId: string;

    span: Span;

    /** Raw source text */
    text: string;

    value: TemporalValue;

    /** Reference date used to resolve the expression, or 'unknown' */
    basis: string;

    /** Whether the expression needed a reference date */
    relative: boolean;

    confidence: number;
}
