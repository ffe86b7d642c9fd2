import type { Lexicon } from './lexicon.js';

/**
 * Compute cosine similarity between two sparse vectors.
 * Returns value in [0, 1] for non-negative weights.
 */
export function cosineSimilarity(
    vecA: ReadonlyMap<string, number>,
    vecB: ReadonlyMap<string, number>
): number {
    if (vecA.size === 0 || vecB.size === 0) return 0;

    // Use the smaller vector for iteration efficiency
    const [smaller, larger] = vecA.size <= vecB.size ? [vecA, vecB] : [vecB, vecA];

    let dotProduct = 0;
    for (const [term, weightA] of smaller) {
        const weightB = larger.get(term);
        if (weightB !== undefined) {
            dotProduct += weightA * weightB;
        }
    }

    let normA = 0;
    for (const [, w] of vecA) normA += w * w;
    let normB = 0;
    for (const [, w] of vecB) normB += w * w;

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    if (denominator === 0) return 0;

    return dotProduct / denominator;
}

/**
 * Edit distance (insert, delete, substitute; unit cost).
 */
export function levenshtein(a: string, b: string): number {
    if (a === b) return 0;
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current.push(
                Math.min((previous[j] ?? 0) + 1, (current[j - 1] ?? 0) + 1, (previous[j - 1] ?? 0) + cost)
            );
        }
        previous = current;
    }
    return previous[b.length] ?? 0;
}

/**
 * 1 - distance / longer length. Two empty strings are identical.
 */
export function levenshteinSimilarity(a: string, b: string): number {
    const longest = Math.max(a.length, b.length);
    if (longest === 0) return 1;
    return 1 - levenshtein(a, b) / longest;
}

/**
 * |A ∩ B| / |A ∪ B|. Two empty sets are identical.
 */
export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    if (a.size === 0 && b.size === 0) return 1;
    let intersection = 0;
    for (const item of a) {
        if (b.has(item)) intersection++;
    }
    const union = a.size + b.size - intersection;
    return union === 0 ? 0 : intersection / union;
}

/**
 * Canonical comparison form of a name: NFC, lowercase, punctuation removed,
 * whitespace collapsed, abbreviations expanded ("Co." → "company").
 */
export function normalizeName(name: string, lexicon: Lexicon): string {
    const expansions = lexicon.abbreviationExpansions;
    const cleaned = name
        .normalize('NFC')
        .toLowerCase()
        .replace(/&/g, ` ${expansions.get('&') ?? 'and'} `)
        .replace(/[^\p{L}\p{N}\s]/gu, ' ');

    return cleaned
        .split(/\s+/)
        .filter(Boolean)
        .map((word) => expansions.get(word) ?? word)
        .join(' ');
}

/**
 * Tokens of a normalized name without legal-form words ("ltd", "inc", ...).
 */
export function coreTokens(normalized: string, lexicon: Lexicon): Set<string> {
    return new Set(normalized.split(' ').filter((t) => t && !lexicon.legalForms.has(t)));
}

/**
 * Core tokens that identify the entity, i.e. without generic words such as
 * "company" or "group".
 */
export function distinctiveTokens(core: ReadonlySet<string>, lexicon: Lexicon): Set<string> {
    return new Set([...core].filter((t) => !lexicon.genericOrgWords.has(t)));
}

/**
 * Similarity of two surface names in [0, 1].
 *
 * Names whose distinctive tokens are disjoint ("Company A" vs "Company B")
 * score 0. Otherwise the score is the mean of the core-token Jaccard index and
 * the Levenshtein similarity of the normalized forms.
 */
export function nameSimilarity(a: string, b: string, lexicon: Lexicon): number {
    const normA = normalizeName(a, lexicon);
    const normB = normalizeName(b, lexicon);
    if (normA === normB) return 1;

    const coreA = coreTokens(normA, lexicon);
    const coreB = coreTokens(normB, lexicon);
    const distinctA = distinctiveTokens(coreA, lexicon);
    const distinctB = distinctiveTokens(coreB, lexicon);

    if (distinctA.size > 0 && distinctB.size > 0 && jaccardSimilarity(distinctA, distinctB) === 0) {
        return 0;
    }

    return 0.5 * jaccardSimilarity(coreA, coreB) + 0.5 * levenshteinSimilarity(normA, normB);
}

/**
 * Character n-gram counts of a normalized name, padded with one space each side.
 */
export function charNgrams(text: string, n: number): Map<string, number> {
    const padded = ` ${text} `;
    const grams = new Map<string, number>();
    if (padded.length < n) {
        grams.set(padded, 1);
        return grams;
    }
    for (let i = 0; i + n <= padded.length; i++) {
        const gram = padded.slice(i, i + n);
        grams.set(gram, (grams.get(gram) ?? 0) + 1);
    }
    return grams;
}
