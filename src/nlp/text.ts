import type { Span } from '../types/index.js';

/**
 * A word with its offsets into the source text.
 */
export interface Token {
    text: string;
    lower: string;
    start: number;
    end: number;
}

const TOKEN_PATTERN = /[\p{L}\p{N}&][\p{L}\p{N}&'’.\-]*/gu;

/**
 * Split text into word tokens with character offsets.
 * - Trailing periods are stripped unless the word is a known abbreviation ("Co.", "Ltd.")
 * - Trailing hyphens and apostrophes are stripped
 */
export function tokenizeWithOffsets(text: string, abbreviations: ReadonlySet<string>): Token[] {
    if (!text) return [];

    const tokens: Token[] = [];
    for (const match of text.matchAll(TOKEN_PATTERN)) {
        const start = match.index ?? 0;
        let raw = match[0];

        const base = raw.replace(/[.'’\-]+$/, '');
        if (raw.endsWith('.') && abbreviations.has(base.toLowerCase()) && !base.includes('.')) {
            raw = `${base}.`;
        } else {
            raw = base;
        }
        if (!raw) continue;

        tokens.push({ text: raw, lower: raw.toLowerCase(), start, end: start + raw.length });
    }
    return tokens;
}

const BOUNDARY_PATTERN = /[.!?。！？]+(?=\s|$)|\n+/g;

/**
 * Split text into sentence spans. A period after a known abbreviation does not
 * end a sentence; a line break always does. Spans are trimmed of whitespace.
 */
export function splitSentences(text: string, abbreviations: ReadonlySet<string>): Span[] {
    const spans: Span[] = [];
    let start = 0;

    for (const match of text.matchAll(BOUNDARY_PATTERN)) {
        const index = match.index ?? 0;
        if (match[0] === '.') {
            const word = /([\p{L}]+)$/u.exec(text.slice(start, index));
            if (word?.[1] && abbreviations.has(word[1].toLowerCase())) continue;
        }

        const end = match[0].startsWith('\n') ? index : index + match[0].length;
        pushTrimmed(text, start, end, spans);
        start = index + match[0].length;
    }
    pushTrimmed(text, start, text.length, spans);

    return spans;
}

function pushTrimmed(text: string, start: number, end: number, spans: Span[]): void {
    let s = start;
    let e = end;
    while (s < e && /\s/.test(text.charAt(s))) s++;
    while (e > s && /\s/.test(text.charAt(e - 1))) e--;
    if (e > s) spans.push({ start: s, end: e });
}

/**
 * Index of the sentence containing `offset`, or -1.
 */
export function sentenceIndexAt(sentences: readonly Span[], offset: number): number {
    return sentences.findIndex((s) => offset >= s.start && offset < s.end);
}

/**
 * Find every whole-word, case-insensitive occurrence of `phrase` in `text`
 * between `from` and `to`.
 */
export function findPhrase(text: string, phrase: string, from = 0, to = text.length): Span[] {
    const hits: Span[] = [];
    const haystack = text.slice(from, to).toLowerCase();
    const needle = phrase.toLowerCase();
    if (!needle) return hits;

    let index = haystack.indexOf(needle);
    while (index !== -1) {
        const before = haystack.charAt(index - 1);
        const after = haystack.charAt(index + needle.length);
        if (!isWordChar(before) && !isWordChar(after)) {
            hits.push({ start: from + index, end: from + index + needle.length });
        }
        index = haystack.indexOf(needle, index + 1);
    }
    return hits;
}

function isWordChar(ch: string): boolean {
    return ch !== '' && /[\p{L}\p{N}]/u.test(ch);
}

/**
 * Character distance between two spans (0 when they overlap).
 */
export function spanGap(a: Span, b: Span): number {
    if (a.end <= b.start) return b.start - a.end;
    if (b.end <= a.start) return a.start - b.end;
    return 0;
}

/**
 * Smallest span covering all given spans.
 */
export function coverSpan(...spans: Span[]): Span {
    return {
        start: Math.min(...spans.map((s) => s.start)),
        end: Math.max(...spans.map((s) => s.end)),
    };
}
