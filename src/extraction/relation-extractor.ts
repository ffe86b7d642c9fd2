import type {
    Document,
    DroppedRelation,
    ExtractedRelation,
    Mention,
    MentionType,
    Predicate,
    RelationExtractor,
    RelationMethod,
    Span,
} from '../types/index.js';
import { PREDICATES } from '../types/index.js';
import { getLexicon, type Lexicon } from '../nlp/lexicon.js';
import { coverSpan, findPhrase, sentenceIndexAt, spanGap, splitSentences } from '../nlp/text.js';
import { evidenceFingerprint, shortHash } from '../utils/hash.js';

const CONFIDENCE = {
    triggerBetween: 0.85,
    triggerInSentence: 0.7,
    typePair: 0.55,
    cooccurrence: 0.5,
} as const;

/** Predicates whose direction carries no meaning; subject is the earlier mention */
const SYMMETRIC: ReadonlySet<Predicate> = new Set(['cooperation', 'competition', 'related']);

const ANY: readonly MentionType[] = ['organization', 'person', 'product', 'location', 'other'];

/**
 * Allowed (subject types, object types) per predicate.
 */
const TYPE_CONSTRAINTS: Record<Predicate, { subject: readonly MentionType[]; object: readonly MentionType[] }> = {
    investment: { subject: ['organization', 'person'], object: ['organization'] },
    acquisition: { subject: ['organization', 'person'], object: ['organization', 'product'] },
    cooperation: { subject: ['organization', 'person'], object: ['organization', 'person'] },
    employment: { subject: ['person'], object: ['organization'] },
    subsidiary: { subject: ['organization'], object: ['organization'] },
    competition: { subject: ['organization', 'product'], object: ['organization', 'product'] },
    supply: { subject: ['organization'], object: ['organization'] },
    product: { subject: ['organization'], object: ['product'] },
    location: { subject: ['organization', 'person'], object: ['location'] },
    related: { subject: ANY, object: ANY },
};

const METHOD_PRIORITY: Record<RelationMethod, number> = {
    trigger: 0,
    'type-pair': 1,
    'co-occurrence': 2,
};

/**
 * Pair-selection parameters shared by the relation extractors.
 */
export interface PairWindow {
    /** Maximum character gap between the two mentions */
    proximityWindow: number;

    /** Only pair mentions of the same sentence */
    sentenceScoped: boolean;
}

interface CandidatePair {
    first: Mention;
    second: Mention;

    /** Region searched for sentence-level triggers */
    scope: Span;

    /** Whether another mention sits between the two */
    interrupted: boolean;
}

/**
 * Every pair of mentions (in text order) that falls inside the window.
 */
export function candidatePairs(
    document: Document,
    mentions: readonly Mention[],
    window: PairWindow,
    lexicon: Lexicon
): CandidatePair[] {
    const sorted = [...mentions].sort((a, b) => a.span.start - b.span.start || a.span.end - b.span.end);
    const sentences = splitSentences(document.text, lexicon.abbreviations);
    const pairs: CandidatePair[] = [];

    for (let i = 0; i < sorted.length; i++) {
        for (let j = i + 1; j < sorted.length; j++) {
            const first = sorted[i];
            const second = sorted[j];
            if (!first || !second) continue;
            if (spanGap(first.span, second.span) > window.proximityWindow) continue;

            const sentenceA = sentenceIndexAt(sentences, first.span.start);
            const sentenceB = sentenceIndexAt(sentences, second.span.start);
            if (window.sentenceScoped && sentenceA !== sentenceB) continue;

            const sentence = sentenceA === sentenceB ? sentences[sentenceA] : undefined;
            pairs.push({
                first,
                second,
                scope: sentence ?? coverSpan(first.span, second.span),
                interrupted: sorted.slice(i + 1, j).some((m) => m.span.start >= first.span.end && m.span.end <= second.span.start),
            });
        }
    }

    return pairs;
}

function allows(predicate: Predicate, subject: Mention, object: Mention): boolean {
    const constraint = TYPE_CONSTRAINTS[predicate];
    return constraint.subject.includes(subject.type) && constraint.object.includes(object.type);
}

/**
 * Put the pair into (subject, object) order for `predicate`, trying the
 * preferred direction first. Null when no direction satisfies the type constraint.
 */
function orient(
    predicate: Predicate,
    first: Mention,
    second: Mention,
    passive: boolean
): { subject: Mention; object: Mention } | null {
    if (SYMMETRIC.has(predicate)) {
        return allows(predicate, first, second) ? { subject: first, object: second } : null;
    }
    const [preferred, fallback] = passive
        ? [{ subject: second, object: first }, { subject: first, object: second }]
        : [{ subject: first, object: second }, { subject: second, object: first }];
    if (allows(predicate, preferred.subject, preferred.object)) return preferred;
    if (allows(predicate, fallback.subject, fallback.object)) return fallback;
    return null;
}

function buildRelation(
    document: Document,
    predicate: Predicate,
    subject: Mention,
    object: Mention,
    evidenceSpan: Span,
    confidence: number,
    method: RelationMethod,
    trigger: string | null
): ExtractedRelation {
    const fingerprint = evidenceFingerprint(predicate, document.id, evidenceSpan);
    return {
        id: `rel_${shortHash(`${subject.id}|${predicate}|${object.id}|${fingerprint}`)}`,
        subjectMentionId: subject.id,
        predicate,
        objectMentionId: object.id,
        evidence: {
            documentId: document.id,
            span: evidenceSpan,
            text: document.text.slice(evidenceSpan.start, evidenceSpan.end),
            fingerprint,
        },
        confidence,
        method,
        trigger,
        temporalId: null,
    };
}

/**
 * Trigger-vocabulary extractor. A trigger between the two mentions scores
 * higher than one elsewhere in the sentence; "by"/"from" after the trigger
 * marks the passive voice and flips the direction.
 */
export class TriggerRelationExtractor implements RelationExtractor {
    readonly name = 'trigger';

    constructor(
        private readonly window: PairWindow,
        private readonly lexicon: Lexicon = getLexicon()
    ) {}

    extract(document: Document, mentions: readonly Mention[]): ExtractedRelation[] {
        if (!document.text || mentions.length < 2) return [];

        const text = document.text;
        const relations: ExtractedRelation[] = [];
        const outsideMentions = (hit: Span): boolean =>
            !mentions.some((m) => hit.start < m.span.end && m.span.start < hit.end);

        for (const pair of candidatePairs(document, mentions, this.window, this.lexicon)) {
            const { first, second } = pair;

            for (const [predicate, phrases] of this.lexicon.relationTriggers) {
                const match = this.findTrigger(text, phrases, pair, outsideMentions);
                if (!match) continue;

                const oriented = orient(predicate, first, second, match.passive);
                if (!oriented) continue;

                relations.push(
                    buildRelation(
                        document,
                        predicate,
                        oriented.subject,
                        oriented.object,
                        coverSpan(first.span, second.span, match.span),
                        match.between ? CONFIDENCE.triggerBetween : CONFIDENCE.triggerInSentence,
                        'trigger',
                        match.phrase
                    )
                );
            }
        }

        return relations;
    }

    private findTrigger(
        text: string,
        phrases: readonly string[],
        pair: CandidatePair,
        usable: (hit: Span) => boolean
    ): { phrase: string; span: Span; between: boolean; passive: boolean } | null {
        const { first, second, scope } = pair;

        for (const phrase of phrases) {
            const hit = findPhrase(text, phrase, first.span.end, second.span.start).find(usable);
            if (hit) {
                return { phrase, span: hit, between: !pair.interrupted, passive: isPassive(text, phrase, hit, second.span.start) };
            }
        }
        for (const phrase of phrases) {
            const hit = findPhrase(text, phrase, scope.start, scope.end).find(usable);
            if (hit) {
                return { phrase, span: hit, between: false, passive: false };
            }
        }
        return null;
    }
}

function isPassive(text: string, phrase: string, hit: Span, limit: number): boolean {
    if (/\b(?:by|from)$/.test(phrase)) return true;
    return /^\s+(?:by|from)\b/i.test(text.slice(hit.end, limit));
}

/**
 * Fallback by type pair: person + organization → employment,
 * organization + product → product.
 */
export class TypePairRelationExtractor implements RelationExtractor {
    readonly name = 'type-pair';

    constructor(
        private readonly window: PairWindow,
        private readonly lexicon: Lexicon = getLexicon()
    ) {}

    extract(document: Document, mentions: readonly Mention[]): ExtractedRelation[] {
        const relations: ExtractedRelation[] = [];

        for (const { first, second, interrupted } of candidatePairs(document, mentions, this.window, this.lexicon)) {
            if (interrupted) continue;
            for (const predicate of ['employment', 'product'] as const) {
                const oriented = orient(predicate, first, second, false);
                if (!oriented) continue;
                relations.push(
                    buildRelation(
                        document,
                        predicate,
                        oriented.subject,
                        oriented.object,
                        coverSpan(first.span, second.span),
                        CONFIDENCE.typePair,
                        'type-pair',
                        null
                    )
                );
            }
        }

        return relations;
    }
}

/**
 * Opt-in `related` relation for every pair in the window.
 */
export class CooccurrenceRelationExtractor implements RelationExtractor {
    readonly name = 'co-occurrence';

    constructor(
        private readonly window: PairWindow,
        private readonly lexicon: Lexicon = getLexicon()
    ) {}

    extract(document: Document, mentions: readonly Mention[]): ExtractedRelation[] {
        return candidatePairs(document, mentions, this.window, this.lexicon).map(({ first, second }) =>
            buildRelation(
                document,
                'related',
                first,
                second,
                coverSpan(first.span, second.span),
                CONFIDENCE.cooccurrence,
                'co-occurrence',
                null
            )
        );
    }
}

export interface RelationFilterOptions {
    confidenceFloor: number;
    mutuallyExclusive: readonly (readonly Predicate[])[];
}

export interface RelationExtractionResult {
    relations: ExtractedRelation[];
    dropped: DroppedRelation[];
}

function better(a: ExtractedRelation, b: ExtractedRelation): boolean {
    if (a.confidence !== b.confidence) return a.confidence > b.confidence;
    if (a.method !== b.method) return METHOD_PRIORITY[a.method] < METHOD_PRIORITY[b.method];
    return a.evidence.span.start < b.evidence.span.start;
}

function pairKey(relation: ExtractedRelation): string {
    return [relation.subjectMentionId, relation.objectMentionId].sort().join('|');
}

/**
 * Run the extractors and filter their candidates:
 * 1. duplicates of (subject, predicate, object) collapse to the highest confidence
 * 2. `related` gives way to any specific predicate on the same pair
 * 3. within each mutually exclusive predicate set only the strongest survives
 * 4. relations under the confidence floor are dropped
 * Dropped relations are returned with the reason.
 */
export function extractRelations(
    document: Document,
    mentions: readonly Mention[],
    extractors: readonly RelationExtractor[],
    options: RelationFilterOptions
): RelationExtractionResult {
    const dropped: DroppedRelation[] = [];

    const unique = new Map<string, ExtractedRelation>();
    for (const candidate of extractors.flatMap((extractor) => extractor.extract(document, mentions))) {
        const key = `${candidate.subjectMentionId}|${candidate.predicate}|${candidate.objectMentionId}`;
        const existing = unique.get(key);
        if (!existing || better(candidate, existing)) {
            unique.set(key, candidate);
        }
    }

    const byPair = new Map<string, ExtractedRelation[]>();
    for (const relation of unique.values()) {
        const group = byPair.get(pairKey(relation)) ?? [];
        group.push(relation);
        byPair.set(pairKey(relation), group);
    }

    const survivors: ExtractedRelation[] = [];
    for (const group of byPair.values()) {
        let remaining = group;

        const specific = remaining.find((r) => r.predicate !== 'related');
        if (specific) {
            for (const r of remaining.filter((r) => r.predicate === 'related')) {
                dropped.push({ relation: r, reason: `superseded by ${specific.predicate}` });
            }
            remaining = remaining.filter((r) => r.predicate !== 'related');
        }

        for (const exclusive of options.mutuallyExclusive) {
            const conflicting = remaining.filter((r) => exclusive.includes(r.predicate));
            if (conflicting.length < 2) continue;

            const winner = conflicting.reduce((best, r) => (better(r, best) ? r : best));
            for (const r of conflicting) {
                if (r !== winner) {
                    dropped.push({ relation: r, reason: `mutually exclusive with ${winner.predicate}` });
                }
            }
            remaining = remaining.filter((r) => r === winner || !exclusive.includes(r.predicate));
        }

        survivors.push(...remaining);
    }

    const relations: ExtractedRelation[] = [];
    for (const relation of survivors) {
        if (relation.confidence < options.confidenceFloor) {
            dropped.push({ relation, reason: `below confidence floor ${options.confidenceFloor}` });
        } else {
            relations.push(relation);
        }
    }

    return { relations: relations.sort(compareRelations), dropped: dropped.sort((a, b) => compareRelations(a.relation, b.relation)) };
}

function compareRelations(a: ExtractedRelation, b: ExtractedRelation): number {
    return (
        a.evidence.span.start - b.evidence.span.start ||
        a.evidence.span.end - b.evidence.span.end ||
        PREDICATES.indexOf(a.predicate) - PREDICATES.indexOf(b.predicate) ||
        a.subjectMentionId.localeCompare(b.subjectMentionId) ||
        a.objectMentionId.localeCompare(b.objectMentionId)
    );
}

/**
 * Default relation extractors for a configuration.
 */
export function createRelationExtractors(
    options: PairWindow & { cooccurrence: boolean },
    lexicon: Lexicon = getLexicon()
): RelationExtractor[] {
    const window: PairWindow = { proximityWindow: options.proximityWindow, sentenceScoped: options.sentenceScoped };
    const extractors: RelationExtractor[] = [
        new TriggerRelationExtractor(window, lexicon),
        new TypePairRelationExtractor(window, lexicon),
    ];
    if (options.cooccurrence) {
        extractors.push(new CooccurrenceRelationExtractor(window, lexicon));
    }
    return extractors;
}
