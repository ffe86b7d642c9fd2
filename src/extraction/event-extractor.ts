import type {
    EventExtractionInput,
    EventExtractionResult,
    EventExtractor,
    EventSchema,
    EventType,
    ExtractedEvent,
    ExtractedRelation,
    Mention,
    RejectedEvent,
    RoleSchema,
    Span,
} from '../types/index.js';
import { getLexicon, type Lexicon } from '../nlp/lexicon.js';
import { coverSpan, findPhrase, spanGap, splitSentences } from '../nlp/text.js';
import { evidenceFingerprint } from '../utils/hash.js';
import { nearestInSentence } from './temporal-analyzer.js';

/**
 * Event frames and their roles, in role order.
 */
export const EVENT_SCHEMAS: readonly EventSchema[] = [
    {
        type: 'investment-event',
        roles: [
            { name: 'investor', types: ['organization', 'person'], position: 'before', required: true },
            { name: 'investee', types: ['organization'], position: 'after', required: true },
        ],
        attributes: ['amount'],
    },
    {
        type: 'acquisition-event',
        roles: [
            { name: 'acquirer', types: ['organization', 'person'], position: 'before', required: true },
            { name: 'target', types: ['organization', 'product'], position: 'after', required: true },
        ],
        attributes: ['amount'],
    },
    {
        type: 'cooperation-event',
        roles: [
            { name: 'partner1', types: ['organization', 'person'], position: 'before', required: true },
            { name: 'partner2', types: ['organization', 'person'], position: 'after', required: true },
        ],
        attributes: [],
    },
    {
        type: 'product-launch',
        roles: [
            { name: 'company', types: ['organization'], position: 'before', required: true },
            { name: 'product', types: ['product'], position: 'after', required: true },
        ],
        attributes: [],
    },
    {
        type: 'personnel-change',
        roles: [
            { name: 'person', types: ['person'], position: 'any', required: true },
            { name: 'organization', types: ['organization'], position: 'any', required: true },
        ],
        attributes: [],
    },
    {
        type: 'financial-report',
        roles: [{ name: 'company', types: ['organization'], position: 'before', required: true }],
        attributes: ['amount'],
    },
];

const CONFIDENCE = {
    confirmedTrigger: 0.9,
    trigger: 0.75,
    categoryOnly: 0.6,
} as const;

const MONEY =
    /(?:US\$|HK\$|\$|€|£|¥|\b(?:USD|EUR|GBP|CNY|RMB|HKD|JPY)\s?)\d[\d,]*(?:\.\d+)?(?:\s?(?:million|billion|thousand|trillion|mn|bn|[mbk])\b)?|\b\d[\d,]*(?:\.\d+)?\s?(?:million|billion|thousand|trillion)\s(?:dollars|yuan|euros|pounds|yen|USD|EUR|RMB|CNY)\b/g;

const CURRENCIES: ReadonlyArray<[RegExp, string]> = [
    [/^HK\$|\bHKD/i, 'HKD'],
    [/^US\$|^\$|\bUSD|\bdollars\b/i, 'USD'],
    [/^€|\bEUR|\beuros\b/i, 'EUR'],
    [/^£|\bGBP|\bpounds\b/i, 'GBP'],
    [/\bJPY|\byen\b/i, 'JPY'],
    [/^¥|\bCNY|\bRMB|\byuan\b/i, 'CNY'],
];

const SCALES: ReadonlyArray<[RegExp, number]> = [
    [/\d\s?trillion\b/i, 1e12],
    [/\d\s?(?:billion|bn|b)\b/i, 1e9],
    [/\d\s?(?:million|mn|m)\b/i, 1e6],
    [/\d\s?(?:thousand|k)\b/i, 1e3],
];

/**
 * Numeric value (scale words applied, rounded to cents) and ISO currency of a
 * money expression such as "$50 million" or "RMB 1.2bn".
 */
export function parseAmount(text: string): { value: number; currency: string | null } | null {
    const number = /\d[\d,]*(?:\.\d+)?/.exec(text);
    if (!number) return null;
    const base = Number(number[0].replace(/,/g, ''));
    if (!Number.isFinite(base)) return null;

    const scale = SCALES.find(([pattern]) => pattern.test(text))?.[1] ?? 1;
    const currency = CURRENCIES.find(([pattern]) => pattern.test(text))?.[1] ?? null;
    return { value: Math.round(base * scale * 100) / 100, currency };
}

interface TriggerHit {
    type: EventType;
    phrase: string;
    span: Span;
    confidence: number;
}

function within(span: Span, outer: Span): boolean {
    return span.start >= outer.start && span.end <= outer.end;
}

function overlaps(a: Span, b: Span): boolean {
    return a.start < b.end && b.start < a.end;
}

/**
 * Event types hinted at by a `[Category]` label, in label order.
 */
export function categoryPrior(category: string | null, lexicon: Lexicon = getLexicon()): EventType[] {
    if (!category) return [];
    const prior: EventType[] = [];
    for (const word of category.toLowerCase().split(/[\s,/|;]+/)) {
        for (const type of lexicon.categoryLabels.get(word) ?? []) {
            if (!prior.includes(type)) prior.push(type);
        }
    }
    return prior;
}

/**
 * Schema-driven event extractor: trigger words pick the event type, the
 * nearest mentions of a matching type fill its roles.
 */
export class SchemaEventExtractor implements EventExtractor {
    readonly name = 'schema';

    private readonly schemas: readonly EventSchema[];

    /**
     * @param options.schemas - event frames to fill; defaults to `EVENT_SCHEMAS`
     */
    constructor(
        private readonly options: { confidenceFloor: number; schemas?: readonly EventSchema[] },
        private readonly lexicon: Lexicon = getLexicon()
    ) {
        this.schemas = options.schemas ?? EVENT_SCHEMAS;
    }

    extract(input: EventExtractionInput): EventExtractionResult {
        const { document, mentions } = input;
        const events: ExtractedEvent[] = [];
        const rejected: RejectedEvent[] = [];
        if (!document.text) return { events, rejected };

        const sentences = splitSentences(document.text, this.lexicon.abbreviations);
        const prior = categoryPrior(document.category, this.lexicon);

        const perSentence = sentences.map((sentence) => this.findTriggers(document.text, sentence, mentions, prior));

        const firstPrior = prior[0];
        if (firstPrior && perSentence.every((hits) => hits.length === 0)) {
            const index = sentences.findIndex((s) => mentions.some((m) => within(m.span, s)));
            const sentence = sentences[index];
            if (sentence) {
                perSentence[index] = [
                    {
                        type: firstPrior,
                        phrase: document.category ?? firstPrior,
                        span: { start: sentence.start, end: sentence.start },
                        confidence: CONFIDENCE.categoryOnly,
                    },
                ];
            }
        }

        perSentence.forEach((hits, index) => {
            const sentence = sentences[index];
            if (!sentence) return;
            for (const hit of hits) {
                const outcome = this.buildEvent(hit, sentence, sentences, input);
                if ('reason' in outcome) rejected.push(outcome);
                else events.push(outcome);
            }
        });

        return { events, rejected };
    }

    /**
     * One trigger per event type per sentence (the earliest), in text order.
     */
    private findTriggers(
        text: string,
        sentence: Span,
        mentions: readonly Mention[],
        prior: readonly EventType[]
    ): TriggerHit[] {
        const hits: TriggerHit[] = [];
        for (const [type, phrases] of this.lexicon.eventTriggers) {
            if (prior.length > 0 && !prior.includes(type)) continue;
            for (const phrase of phrases) {
                for (const span of findPhrase(text, phrase, sentence.start, sentence.end)) {
                    if (mentions.some((m) => overlaps(m.span, span))) continue;
                    hits.push({
                        type,
                        phrase,
                        span,
                        confidence: prior.includes(type) ? CONFIDENCE.confirmedTrigger : CONFIDENCE.trigger,
                    });
                }
            }
        }

        const kept: TriggerHit[] = [];
        const ranked = hits.sort(
            (a, b) => b.span.end - b.span.start - (a.span.end - a.span.start) || a.span.start - b.span.start
        );
        for (const hit of ranked) {
            if (kept.some((k) => overlaps(k.span, hit.span))) continue;
            kept.push(hit);
        }

        const firstPerType = new Map<EventType, TriggerHit>();
        for (const hit of kept.sort((a, b) => a.span.start - b.span.start)) {
            if (!firstPerType.has(hit.type)) firstPerType.set(hit.type, hit);
        }
        return [...firstPerType.values()];
    }

    private buildEvent(
        hit: TriggerHit,
        sentence: Span,
        sentences: readonly Span[],
        input: EventExtractionInput
    ): ExtractedEvent | RejectedEvent {
        const { document } = input;
        const schema = this.schemas.find((candidate) => candidate.type === hit.type);
        if (!schema) {
            return { type: hit.type, trigger: hit.phrase, reason: 'no schema for event type' };
        }

        const candidates = input.mentions
            .filter((m) => within(m.span, sentence))
            .sort((a, b) => a.span.start - b.span.start);

        const fillers = new Map<string, Mention>();
        for (const role of schema.roles) {
            const filler = pickFiller(role, hit.span, candidates, new Set([...fillers.values()].map((m) => m.id)));
            if (filler) fillers.set(role.name, filler);
        }

        if (fillers.size >= 2) {
            for (const [role, mention] of [...fillers]) {
                const others = [...fillers.values()].filter((m) => m.id !== mention.id);
                if (!others.some((other) => related(mention, other, input.relations))) {
                    fillers.delete(role);
                }
            }
        }

        if (fillers.size === 0) {
            return { type: hit.type, trigger: hit.phrase, reason: 'no role could be filled' };
        }

        const confidence = Math.min(hit.confidence, ...[...fillers.values()].map((m) => m.confidence));
        if (confidence < this.options.confidenceFloor) {
            return { type: hit.type, trigger: hit.phrase, reason: `below confidence floor ${this.options.confidenceFloor}` };
        }

        const roles: Record<string, string | null> = {};
        for (const role of schema.roles) {
            roles[role.name] = fillers.get(role.name)?.id ?? null;
        }

        const attributes: Record<string, string> = {};
        if (schema.attributes.includes('amount')) {
            const amount = nearestAmount(document.text, sentence, hit.span);
            if (amount) {
                attributes['amount'] = amount;
                const parsed = parseAmount(amount);
                if (parsed) attributes['amountValue'] = String(parsed.value);
                if (parsed?.currency) attributes['currency'] = parsed.currency;
            }
        }

        const span = coverSpan(hit.span, ...[...fillers.values()].map((m) => m.span));
        const fingerprint = evidenceFingerprint(hit.type, document.id, span);

        return {
            id: `evt_${fingerprint}`,
            type: hit.type,
            roles,
            attributes,
            trigger: hit.phrase,
            evidence: {
                documentId: document.id,
                span,
                text: document.text.slice(span.start, span.end),
                fingerprint,
            },
            temporalId: nearestInSentence(hit.span, input.temporals, sentences)?.id ?? null,
            confidence,
            complete: schema.roles.every((role) => !role.required || fillers.has(role.name)),
        };
    }
}

/**
 * Nearest unused mention of a matching type on the role's preferred side of
 * the trigger, else on the other side.
 */
function pickFiller(role: RoleSchema, trigger: Span, candidates: readonly Mention[], used: ReadonlySet<string>): Mention | null {
    const eligible = candidates.filter((m) => role.types.includes(m.type) && !used.has(m.id));
    const before = eligible.filter((m) => m.span.end <= trigger.start);
    const after = eligible.filter((m) => m.span.start >= trigger.end);
    const nearest = (list: readonly Mention[]): Mention | null =>
        list.reduce<Mention | null>(
            (best, m) => (!best || spanGap(m.span, trigger) < spanGap(best.span, trigger) ? m : best),
            null
        );

    switch (role.position) {
        case 'before':
            return nearest(before) ?? nearest(after);
        case 'after':
            return nearest(after) ?? nearest(before);
        default:
            return nearest(eligible);
    }
}

function related(a: Mention, b: Mention, relations: readonly ExtractedRelation[]): boolean {
    return relations.some(
        (r) =>
            (r.subjectMentionId === a.id && r.objectMentionId === b.id) ||
            (r.subjectMentionId === b.id && r.objectMentionId === a.id)
    );
}

function nearestAmount(text: string, sentence: Span, trigger: Span): string | null {
    let best: { text: string; gap: number } | null = null;
    for (const match of text.slice(sentence.start, sentence.end).matchAll(MONEY)) {
        const start = sentence.start + (match.index ?? 0);
        const gap = spanGap({ start, end: start + match[0].length }, trigger);
        if (!best || gap < best.gap) best = { text: match[0].trim(), gap };
    }
    return best?.text ?? null;
}
