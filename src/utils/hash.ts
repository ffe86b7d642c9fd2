import { createHash } from 'node:crypto';

/**
 * Deterministic hex digest prefix (SHA-256).
 */
export function shortHash(input: string, length = 16): string {
    return createHash('sha256').update(input).digest('hex').slice(0, length);
}

/**
 * Evidence fingerprint: hash of (type, document id, span). Identical evidence
 * read twice yields the same fingerprint, which makes graph writes idempotent.
 */
export function evidenceFingerprint(type: string, documentId: string, span: { start: number; end: number }): string {
    return shortHash(`${type}|${documentId}|${span.start}|${span.end}`);
}
