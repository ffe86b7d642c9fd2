import * as chrono from 'chrono-node';
import type {
    Document,
    Span,
    TemporalConfig,
    TemporalExpression,
    TemporalValue,
} from '../types/index.js';
import { getLexicon, type Lexicon } from '../nlp/lexicon.js';
import { sentenceIndexAt, spanGap, splitSentences } from '../nlp/text.js';

const CONFIDENCE = {
    absolute: 0.95,
    chrono: 0.8,
    relative: 0.85,
    unresolved: 0.5,
} as const;

/** Reference used for chrono when there is no basis; only certain components are kept */
const NEUTRAL_REFERENCE = new Date(Date.UTC(2000, 0, 1));

const ORDINALS: Record<string, number> = {
    first: 1,
    second: 2,
    third: 3,
    fourth: 4,
};

const NUMBER_WORDS: Record<string, number> = {
    a: 1,
    an: 1,
    one: 1,
    two: 2,
    three: 3,
    four: 4,
    five: 5,
    six: 6,
    seven: 7,
    eight: 8,
    nine: 9,
    ten: 10,
    twelve: 12,
};

const DAY_OFFSETS: Record<string, number> = { today: 0, yesterday: -1, tomorrow: 1 };
const DELTAS: Record<string, number> = { last: -1, this: 0, next: 1 };

const UNKNOWN: TemporalValue = { kind: 'point', start: null, end: null, granularity: 'unknown' };

interface Resolution {
    value: TemporalValue;
    relative: boolean;
}

interface TemporalRule {
    pattern: RegExp;

    /** Capture group holding the expression when it is narrower than the match */
    group?: number;

    resolve(match: RegExpMatchArray, basis: Date | null): Resolution | null;
}

interface TemporalHit {
    span: Span;
    text: string;
    resolution: Resolution;
    confidence: number;
}

// ---- Date helpers (UTC) ----

function pad(n: number, width = 2): string {
    return String(n).padStart(width, '0');
}

function formatDay(date: Date): string {
    return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

function formatMonth(year: number, month: number): string {
    return `${pad(year, 4)}-${pad(month)}`;
}

function utcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

function addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * 86_400_000);
}

/** Shift (year, month) by `delta` months */
function shiftMonth(year: number, month: number, delta: number): { year: number; month: number } {
    const index = year * 12 + (month - 1) + delta;
    return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

function dayPoint(date: Date): TemporalValue {
    const day = formatDay(date);
    return { kind: 'point', start: day, end: day, granularity: 'day' };
}

function monthPoint(year: number, month: number): TemporalValue {
    const value = formatMonth(year, month);
    return { kind: 'point', start: value, end: value, granularity: 'month' };
}

function yearPoint(year: number): TemporalValue {
    const value = pad(year, 4);
    return { kind: 'point', start: value, end: value, granularity: 'year' };
}

function monthInterval(year: number, firstMonth: number, months: number): TemporalValue {
    const last = shiftMonth(year, firstMonth, months - 1);
    return {
        kind: 'interval',
        start: formatMonth(year, firstMonth),
        end: formatMonth(last.year, last.month),
        granularity: 'month',
    };
}

/**
 * Parse a YYYY-MM-DD basis into a UTC date, or null.
 */
export function parseBasis(basis: string | null | undefined): Date | null {
    if (!basis) return null;
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(basis);
    if (!match) return null;
    return utcDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

// ---- Rules ----

function buildRules(lexicon: Lexicon): TemporalRule[] {
    const monthOf = (name: string): number => lexicon.months.get(name.toLowerCase().replace(/\.$/, '')) ?? 0;
    const names = [...lexicon.months.keys()]
        .sort((a, b) => b.length - a.length)
        .map((m) => m.charAt(0).toUpperCase() + m.slice(1));
    const MONTH = `(${names.join('|')})\\.?`;
    const ORD = '(?:st|nd|rd|th)?';

    const relativeUnit = (unit: string, basis: Date, delta: number): TemporalValue => {
        const year = basis.getUTCFullYear();
        const month = basis.getUTCMonth() + 1;
        switch (unit) {
            case 'week': {
                const monday = addDays(basis, -((basis.getUTCDay() + 6) % 7) + 7 * delta);
                return { kind: 'interval', start: formatDay(monday), end: formatDay(addDays(monday, 6)), granularity: 'day' };
            }
            case 'month': {
                const shifted = shiftMonth(year, month, delta);
                return monthPoint(shifted.year, shifted.month);
            }
            case 'quarter': {
                const first = shiftMonth(year, Math.floor((month - 1) / 3) * 3 + 1, 3 * delta);
                return monthInterval(first.year, first.month, 3);
            }
            default:
                return yearPoint(year + delta);
        }
    };

    return [
        {
            // 2023-08-15
            pattern: /\b(\d{4})-(\d{2})-(\d{2})\b/g,
            resolve: (m) => {
                const date = utcDate(Number(m[1]), Number(m[2]), Number(m[3]));
                return date ? { value: dayPoint(date), relative: false } : null;
            },
        },
        {
            // August 15, 2023 / Aug. 15th 2023
            pattern: new RegExp(`\\b${MONTH}\\s+(\\d{1,2})${ORD},?\\s+(\\d{4})\\b`, 'g'),
            resolve: (m) => {
                const date = utcDate(Number(m[3]), monthOf(m[1] ?? ''), Number(m[2]));
                return date ? { value: dayPoint(date), relative: false } : null;
            },
        },
        {
            // 15 August 2023
            pattern: new RegExp(`\\b(\\d{1,2})${ORD}\\s+${MONTH},?\\s+(\\d{4})\\b`, 'g'),
            resolve: (m) => {
                const date = utcDate(Number(m[3]), monthOf(m[2] ?? ''), Number(m[1]));
                return date ? { value: dayPoint(date), relative: false } : null;
            },
        },
        {
            // August 2023
            pattern: new RegExp(`\\b${MONTH},?\\s+(\\d{4})\\b`, 'g'),
            resolve: (m) => ({ value: monthPoint(Number(m[2]), monthOf(m[1] ?? '')), relative: false }),
        },
        {
            // Q3 2023 / third quarter of 2023
            pattern: /\b(?:Q([1-4])|(first|second|third|fourth)\s+quarter(?:\s+of)?)\s*(?:FY\s?)?(\d{4})\b/gi,
            resolve: (m) => {
                const quarter = m[1] ? Number(m[1]) : (ORDINALS[(m[2] ?? '').toLowerCase()] ?? 1);
                return { value: monthInterval(Number(m[3]), (quarter - 1) * 3 + 1, 3), relative: false };
            },
        },
        {
            // H1 2023 / second half of 2023
            pattern: /\b(?:H([12])|(first|second)\s+half(?:\s+of)?)\s*(?:FY\s?)?(\d{4})\b/gi,
            resolve: (m) => {
                const half = m[1] ? Number(m[1]) : (ORDINALS[(m[2] ?? '').toLowerCase()] ?? 1);
                return { value: monthInterval(Number(m[3]), (half - 1) * 6 + 1, 6), relative: false };
            },
        },
        {
            // fiscal 2023 / FY2023
            pattern: /\b(?:fiscal(?:\s+year)?|FY)\s?(\d{4})\b/gi,
            resolve: (m) => ({ value: yearPoint(Number(m[1])), relative: false }),
        },
        {
            // in 2023 (the year alone is the expression)
            pattern: /\b(?:in|by|since|during|until)\s+((?:19|20)\d{2})\b/gi,
            group: 1,
            resolve: (m) => ({ value: yearPoint(Number(m[1])), relative: false }),
        },
        {
            pattern: /\b(today|yesterday|tomorrow)\b/gi,
            resolve: (m, basis) => {
                if (!basis) return { value: UNKNOWN, relative: true };
                const offset = DAY_OFFSETS[(m[1] ?? '').toLowerCase()] ?? 0;
                return { value: dayPoint(addDays(basis, offset)), relative: true };
            },
        },
        {
            pattern: /\b(last|this|next)\s+(week|month|quarter|year)\b/gi,
            resolve: (m, basis) => {
                if (!basis) return { value: UNKNOWN, relative: true };
                const delta = DELTAS[(m[1] ?? '').toLowerCase()] ?? 0;
                return { value: relativeUnit((m[2] ?? '').toLowerCase(), basis, delta), relative: true };
            },
        },
        {
            pattern: /\b(\d{1,3}|an?|one|two|three|four|five|six|seven|eight|nine|ten|twelve)\s+(day|week|month|year)s?\s+ago\b/gi,
            resolve: (m, basis) => {
                if (!basis) return { value: UNKNOWN, relative: true };
                const raw = (m[1] ?? '').toLowerCase();
                const n = /^\d+$/.test(raw) ? Number(raw) : (NUMBER_WORDS[raw] ?? 1);
                const unit = (m[2] ?? '').toLowerCase();
                if (unit === 'day') return { value: dayPoint(addDays(basis, -n)), relative: true };
                if (unit === 'week') return { value: dayPoint(addDays(basis, -7 * n)), relative: true };
                const year = basis.getUTCFullYear();
                if (unit === 'month') {
                    const shifted = shiftMonth(year, basis.getUTCMonth() + 1, -n);
                    return { value: monthPoint(shifted.year, shifted.month), relative: true };
                }
                return { value: yearPoint(year - n), relative: true };
            },
        },
        {
            // August 15 (year taken from the basis)
            pattern: new RegExp(`\\b${MONTH}\\s+(\\d{1,2})${ORD}\\b(?!,?\\s+\\d{4})`, 'g'),
            resolve: (m, basis) => {
                if (!basis) return { value: UNKNOWN, relative: true };
                const date = utcDate(basis.getUTCFullYear(), monthOf(m[1] ?? ''), Number(m[2]));
                return date ? { value: dayPoint(date), relative: true } : null;
            },
        },
    ];
}

function overlaps(a: Span, b: Span): boolean {
    return a.start < b.end && b.start < a.end;
}

/**
 * Keep the longest of overlapping hits (earliest on ties), in text order.
 */
function resolveHits(hits: TemporalHit[]): TemporalHit[] {
    const ranked = [...hits].sort(
        (a, b) => b.span.end - b.span.start - (a.span.end - a.span.start) || a.span.start - b.span.start
    );
    const kept: TemporalHit[] = [];
    for (const hit of ranked) {
        if (!kept.some((k) => overlaps(k.span, hit.span))) kept.push(hit);
    }
    return kept.sort((a, b) => a.span.start - b.span.start);
}

function chronoHits(text: string, basis: Date | null, taken: readonly TemporalHit[]): TemporalHit[] {
    const hits: TemporalHit[] = [];
    for (const result of chrono.strict.parse(text, basis ?? NEUTRAL_REFERENCE)) {
        const span = { start: result.index, end: result.index + result.text.length };
        if (taken.some((t) => overlaps(t.span, span))) continue;

        const start = certainValue(result.start);
        if (!start) continue;
        const end = result.end ? certainValue(result.end) : null;

        const value: TemporalValue = end
            ? { kind: 'interval', start: start.value, end: end.value, granularity: start.granularity }
            : { kind: 'point', start: start.value, end: start.value, granularity: start.granularity };
        hits.push({ span, text: result.text, resolution: { value, relative: false }, confidence: CONFIDENCE.chrono });
    }
    return hits;
}

function certainValue(
    components: chrono.ParsedComponents
): { value: string; granularity: 'day' | 'month' } | null {
    if (!components.isCertain('year') || !components.isCertain('month')) return null;
    const year = components.get('year');
    const month = components.get('month');
    if (year === null || month === null) return null;

    const day = components.isCertain('day') ? components.get('day') : null;
    if (day !== null) {
        const date = utcDate(year, month, day);
        return date ? { value: formatDay(date), granularity: 'day' } : null;
    }
    return { value: formatMonth(year, month), granularity: 'month' };
}

function findHits(text: string, basis: Date | null, rules: readonly TemporalRule[]): TemporalHit[] {
    const hits: TemporalHit[] = [];
    for (const rule of rules) {
        for (const match of text.matchAll(rule.pattern)) {
            const resolution = rule.resolve(match, basis);
            if (!resolution) continue;

            const matched = rule.group !== undefined ? (match[rule.group] ?? match[0]) : match[0];
            const offset = rule.group !== undefined ? match[0].lastIndexOf(matched) : 0;
            const start = (match.index ?? 0) + offset;
            const unresolved = resolution.value.granularity === 'unknown';

            hits.push({
                span: { start, end: start + matched.length },
                text: matched,
                resolution,
                confidence: unresolved
                    ? CONFIDENCE.unresolved
                    : resolution.relative
                      ? CONFIDENCE.relative
                      : CONFIDENCE.absolute,
            });
        }
    }

    const resolved = resolveHits(hits);
    return resolveHits([...resolved, ...chronoHits(text, basis, resolved)]);
}

let defaultRules: TemporalRule[] | null = null;

function rulesFor(lexicon: Lexicon): TemporalRule[] {
    if (lexicon === getLexicon()) {
        defaultRules ??= buildRules(lexicon);
        return defaultRules;
    }
    return buildRules(lexicon);
}

/**
 * Normalize a single time expression against a reference date.
 * Pure: the same input always yields the same value. Anything that cannot be
 * resolved has granularity 'unknown'.
 */
export function normalizeTemporal(expression: string, basis: string | null, lexicon: Lexicon = getLexicon()): TemporalValue {
    const hits = findHits(expression.trim(), parseBasis(basis), rulesFor(lexicon));
    const longest = hits.reduce<TemporalHit | null>(
        (best, hit) => (!best || hit.span.end - hit.span.start > best.span.end - best.span.start ? hit : best),
        null
    );
    return longest ? longest.resolution.value : UNKNOWN;
}

/**
 * Finds and normalizes time expressions in documents, and attaches them to
 * relation and event evidence.
 */
export class TemporalAnalyzer {
    private readonly rules: TemporalRule[];

    constructor(
        private readonly options: TemporalConfig,
        private readonly lexicon: Lexicon = getLexicon()
    ) {
        this.rules = rulesFor(lexicon);
    }

    /**
     * Reference date for a document under the configured policy, or null.
     */
    basisFor(document: Document): string | null {
        switch (this.options.referenceDatePolicy) {
            case 'fixed':
                return this.options.referenceDate ?? null;
            case 'none':
                return null;
            default:
                return document.referenceDate;
        }
    }

    /**
     * Time expressions in the document (or inside `scope`), in text order.
     */
    analyze(document: Document, scope?: Span): TemporalExpression[] {
        if (!document.text) return [];

        const basis = this.basisFor(document);
        const basisDate = parseBasis(basis);
        const from = scope ? Math.max(0, scope.start) : 0;
        const to = scope ? Math.min(document.text.length, scope.end) : document.text.length;
        const region = document.text.slice(from, to);

        return findHits(region, basisDate, this.rules).map((hit) => {
            const span = { start: hit.span.start + from, end: hit.span.end + from };
            return {
                id: `${document.id}#t${span.start}-${span.end}`,
                documentId: document.id,
                span,
                text: hit.text,
                value: hit.resolution.value,
                basis: basisDate && basis ? basis : 'unknown',
                relative: hit.resolution.relative,
                confidence: hit.confidence,
            };
        });
    }

    /**
     * The expression nearest to `span` inside the same sentence, or null.
     */
    qualify(span: Span, expressions: readonly TemporalExpression[], document: Document): TemporalExpression | null {
        const sentences = splitSentences(document.text, this.lexicon.abbreviations);
        return nearestInSentence(
            span,
            expressions.filter((e) => e.documentId === document.id),
            sentences
        );
    }
}

/**
 * The expression nearest to `span` within the sentence containing it
 * (earliest on ties), or null.
 */
export function nearestInSentence(
    span: Span,
    expressions: readonly TemporalExpression[],
    sentences: readonly Span[]
): TemporalExpression | null {
    const sentence = sentenceIndexAt(sentences, span.start);
    if (sentence === -1) return null;

    let best: TemporalExpression | null = null;
    let bestGap = Infinity;
    for (const expression of expressions) {
        if (sentenceIndexAt(sentences, expression.span.start) !== sentence) continue;
        const gap = spanGap(span, expression.span);
        if (gap < bestGap) {
            best = expression;
            bestGap = gap;
        }
    }
    return best;
}
