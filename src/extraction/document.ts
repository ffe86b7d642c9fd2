import type { Document, DocumentInput } from '../types/index.js';
import { shortHash } from '../utils/hash.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const CATEGORY_TAG = /^\s*\[([^\]\n]{0,80})\]\s*/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Split a leading `[Category]` tag off the raw text.
 * Text without a tag is returned unchanged with a null category.
 */
export function readCategoryTag(raw: string): { category: string | null; body: string } {
    const match = CATEGORY_TAG.exec(raw);
    if (!match) return { category: null, body: raw };

    const label = (match[1] ?? '').trim();
    return {
        category: label.length > 0 ? label : null,
        body: raw.slice(match[0].length),
    };
}

/**
 * Stable id for a document: caller supplied, else a hash of the raw text.
 */
export function documentId(input: DocumentInput): string {
    return input.id ?? `doc_${shortHash(input.text)}`;
}

/**
 * Id the builder files a document under. A caller id is qualified with a
 * digest of the text, so a reused id with different text is a different
 * document and its mention, temporal and evidence ids cannot collide.
 */
export function revisionId(input: DocumentInput): string {
    return input.id === undefined ? documentId(input) : `${input.id}@${shortHash(input.text, 8)}`;
}

/**
 * Build a `Document` from raw input.
 */
export function prepareDocument(input: DocumentInput): Document {
    const { category, body } = readCategoryTag(input.text);

    let referenceDate = input.referenceDate ?? null;
    if (referenceDate !== null && !isValidIsoDate(referenceDate)) {
        logger.warn({ referenceDate, id: input.id }, 'Ignoring malformed reference date');
        referenceDate = null;
    }

    return {
        id: documentId(input),
        text: body,
        category,
        referenceDate,
    };
}

export function isValidIsoDate(value: string): boolean {
    if (!ISO_DATE.test(value)) return false;
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}
