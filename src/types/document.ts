/**
 * Half-open character range `[start, end)` into a document's body text.
 */
export interface Span {
    start: number;
    end: number;
}

/**
 * Raw input handed to the pipeline, before the category tag is read.
 */
export interface DocumentInput {
    /** Stable document id. Defaults to a content hash of `text`. */
    id?: string;

    /** UTF-8 text, optionally prefixed with a `[Category]` tag */
    text: string;

    /** Reference date (YYYY-MM-DD) for resolving relative time expressions */
    referenceDate?: string | null;
}

/**
 * A document ready for extraction.
 */
export interface Document {
    id: string;

    /** Body text with any leading category tag removed. All spans index into this. */
    text: string;

    /** Label of the leading `[Category]` tag, used as a weak event-type prior */
    category: string | null;

    /** Reference date (YYYY-MM-DD) or null when the document declares none */
    referenceDate: string | null;
}
