import type {
    Document,
    KnownEntity,
    Mention,
    MentionExtractor,
    MentionType,
    Span,
} from '../types/index.js';
import { getLexicon, type Lexicon } from '../nlp/lexicon.js';
import { tokenizeWithOffsets, type Token } from '../nlp/text.js';

/** Resolution order when two candidates tie on length and confidence */
const TYPE_PRIORITY: Record<MentionType, number> = {
    organization: 0,
    person: 1,
    product: 2,
    location: 3,
    other: 4,
};

const CONFIDENCE = {
    organization: 0.9,
    person: 0.85,
    productSuffix: 0.8,
    productLaunch: 0.7,
    location: 0.9,
    known: 0.95,
    other: 0.4,
} as const;

/** Words skipped when looking back from a name for a launch verb */
const DETERMINERS = new Set(['the', 'a', 'an', 'its', 'their', 'his', 'her', 'new']);

export function mentionId(documentId: string, span: Span): string {
    return `${documentId}:${span.start}-${span.end}`;
}

function makeMention(
    document: Document,
    span: Span,
    type: MentionType,
    confidence: number,
    source: string
): Mention {
    return {
        id: mentionId(document.id, span),
        documentId: document.id,
        span,
        text: document.text.slice(span.start, span.end),
        type,
        confidence,
        source,
    };
}

function baseWord(token: Token): string {
    return token.lower.replace(/\.$/, '');
}

function spansOverlap(a: Span, b: Span): boolean {
    return a.start < b.end && b.start < a.end;
}

/**
 * Rule-based extractor for capitalized name phrases.
 *
 * A phrase is a run of capitalized tokens separated by spaces, optionally
 * joined by "&" or, after an organization word, by "of" ("Bank of China").
 * The phrase is typed from its own words and its context:
 * - organization: starts with a head word ("Company A") or ends in a suffix ("Acme Holdings")
 * - person: preceded by a title ("CEO Jane Doe") or followed by ", <title>"
 * - product: ends in a product word ("Alpha Fund") or follows a launch verb
 * Anything else is `other` with a confidence below the default floor.
 */
export class PatternMentionExtractor implements MentionExtractor {
    readonly name = 'pattern';

    constructor(private readonly lexicon: Lexicon = getLexicon()) {}

    extract(document: Document): Mention[] {
        if (typeof document.text !== 'string' || document.text.trim() === '') return [];

        const text = document.text;
        const tokens = tokenizeWithOffsets(text, this.lexicon.abbreviations);
        const mentions: Mention[] = [];

        let i = 0;
        while (i < tokens.length) {
            const first = tokens[i];
            if (!first || !this.isNameToken(first)) {
                i++;
                continue;
            }

            let last = i;
            for (;;) {
                const next = this.extendRun(tokens, last, text);
                if (next === null) break;
                last = next;
            }

            const run = tokens.slice(i, last + 1);
            const span: Span = { start: first.start, end: run[run.length - 1]?.end ?? first.end };
            const { type, confidence } = this.classify(run, tokens, i, text);
            mentions.push(makeMention(document, span, type, confidence, this.name));

            i = last + 1;
        }

        return mentions;
    }

    private isNameToken(token: Token): boolean {
        if (!/^\p{Lu}/u.test(token.text)) return false;
        const word = baseWord(token);
        const lx = this.lexicon;
        if (lx.months.has(word) || lx.weekdays.has(word) || lx.titles.has(word) || lx.relativeWords.has(word)) {
            return false;
        }
        return !(word.length > 1 && lx.stopwords.has(word));
    }

    /**
     * Index of the token that extends the run ending at `last`, or null.
     */
    private extendRun(tokens: Token[], last: number, text: string): number | null {
        const current = tokens[last];
        const next = tokens[last + 1];
        if (!current || !next || !onlySpaces(text, current.end, next.start)) return null;

        if (this.isNameToken(next)) return last + 1;

        const after = tokens[last + 2];
        if (!after || !onlySpaces(text, next.end, after.start) || !this.isNameToken(after)) return null;

        if (next.lower === '&') return last + 2;
        if (next.lower === 'of') {
            const word = baseWord(current);
            if (this.lexicon.orgHeads.has(word) || this.lexicon.orgSuffixes.has(word)) return last + 2;
        }
        return null;
    }

    private classify(
        run: Token[],
        tokens: Token[],
        start: number,
        text: string
    ): { type: MentionType; confidence: number } {
        const lx = this.lexicon;
        const firstToken = run[0];
        const lastToken = run[run.length - 1];
        if (!firstToken || !lastToken) return { type: 'other', confidence: CONFIDENCE.other };
        const firstWord = baseWord(firstToken);
        const lastWord = baseWord(lastToken);

        if (run.length >= 2 && (lx.orgHeads.has(firstWord) || lx.orgSuffixes.has(lastWord))) {
            return { type: 'organization', confidence: CONFIDENCE.organization };
        }

        const previous = tokens[start - 1];
        if (previous && lx.titles.has(baseWord(previous)) && onlySpaces(text, previous.end, firstToken.start)) {
            return { type: 'person', confidence: CONFIDENCE.person };
        }
        const following = /^\s*,\s*([\p{L}-]+)/u.exec(text.slice(lastToken.end));
        if (following?.[1] && lx.titles.has(following[1].toLowerCase())) {
            return { type: 'person', confidence: CONFIDENCE.person };
        }

        if (run.length >= 2 && lx.productSuffixes.has(lastWord)) {
            return { type: 'product', confidence: CONFIDENCE.productSuffix };
        }
        if (this.followsLaunchVerb(tokens, start)) {
            return { type: 'product', confidence: CONFIDENCE.productLaunch };
        }

        return { type: 'other', confidence: CONFIDENCE.other };
    }

    private followsLaunchVerb(tokens: Token[], start: number): boolean {
        for (let k = start - 1; k >= 0 && k >= start - 3; k--) {
            const token = tokens[k];
            if (!token) return false;
            if (this.lexicon.launchVerbs.has(token.lower)) return true;
            if (!DETERMINERS.has(token.lower)) return false;
        }
        return false;
    }
}

function onlySpaces(text: string, from: number, to: number): boolean {
    return to > from && /^[ \t]+$/.test(text.slice(from, to));
}

interface DictionaryEntry {
    name: string;
    type: MentionType;
    confidence: number;
    caseSensitive: boolean;
}

/**
 * Gazetteer lookup: whole-word matches of known names.
 */
export class DictionaryMentionExtractor implements MentionExtractor {
    readonly name = 'dictionary';

    private readonly entries: DictionaryEntry[];

    constructor(entries: DictionaryEntry[]) {
        this.entries = [...entries].sort((a, b) => b.name.length - a.name.length || a.name.localeCompare(b.name));
    }

    /**
     * Built-in locations plus configured known entities (names and aliases).
     */
    static fromConfig(knownEntities: readonly KnownEntity[], lexicon: Lexicon = getLexicon()): DictionaryMentionExtractor {
        const entries: DictionaryEntry[] = lexicon.locations.map((name) => ({
            name,
            type: 'location',
            confidence: CONFIDENCE.location,
            caseSensitive: true,
        }));
        for (const known of knownEntities) {
            for (const name of [known.name, ...(known.aliases ?? [])]) {
                entries.push({ name, type: known.type, confidence: CONFIDENCE.known, caseSensitive: false });
            }
        }
        return new DictionaryMentionExtractor(entries);
    }

    extract(document: Document): Mention[] {
        if (typeof document.text !== 'string' || document.text === '') return [];

        const text = document.text;
        const lower = text.toLowerCase();
        const mentions: Mention[] = [];

        for (const entry of this.entries) {
            const haystack = entry.caseSensitive ? text : lower;
            const needle = entry.caseSensitive ? entry.name : entry.name.toLowerCase();
            if (!needle) continue;

            let index = haystack.indexOf(needle);
            while (index !== -1) {
                const span = { start: index, end: index + needle.length };
                if (isWordBoundary(text, span)) {
                    mentions.push(makeMention(document, span, entry.type, entry.confidence, this.name));
                }
                index = haystack.indexOf(needle, index + 1);
            }
        }

        return mentions.sort((a, b) => a.span.start - b.span.start || b.span.end - a.span.end);
    }
}

function isWordBoundary(text: string, span: Span): boolean {
    const before = text.charAt(span.start - 1);
    const after = text.charAt(span.end);
    const word = /[\p{L}\p{N}]/u;
    return !(before && word.test(before)) && !(after && word.test(after));
}

/**
 * Runs several extractors, drops low-confidence candidates and resolves
 * overlaps. Output is non-overlapping and ordered by span start.
 */
export class CompositeMentionExtractor implements MentionExtractor {
    readonly name = 'composite';

    constructor(
        private readonly extractors: readonly MentionExtractor[],
        private readonly confidenceFloor: number
    ) {}

    extract(document: Document): Mention[] {
        const candidates = this.extractors
            .flatMap((extractor) => extractor.extract(document))
            .filter((m) => m.confidence >= this.confidenceFloor);

        return resolveOverlaps(candidates);
    }
}

/**
 * Keep a maximal set of non-overlapping mentions. Longer spans win, then
 * higher confidence, then the earlier start, then type priority.
 */
export function resolveOverlaps(candidates: readonly Mention[]): Mention[] {
    const ranked = [...candidates].sort(
        (a, b) =>
            b.span.end - b.span.start - (a.span.end - a.span.start) ||
            b.confidence - a.confidence ||
            a.span.start - b.span.start ||
            TYPE_PRIORITY[a.type] - TYPE_PRIORITY[b.type] ||
            a.source.localeCompare(b.source)
    );

    const kept: Mention[] = [];
    for (const candidate of ranked) {
        if (!kept.some((m) => spansOverlap(m.span, candidate.span))) {
            kept.push(candidate);
        }
    }

    return kept.sort((a, b) => a.span.start - b.span.start);
}

/**
 * Default mention extraction: patterns plus the gazetteer.
 */
export function createMentionExtractor(
    options: { confidenceFloor: number; knownEntities: readonly KnownEntity[] },
    lexicon: Lexicon = getLexicon()
): CompositeMentionExtractor {
    return new CompositeMentionExtractor(
        [new PatternMentionExtractor(lexicon), DictionaryMentionExtractor.fromConfig(options.knownEntities, lexicon)],
        options.confidenceFloor
    );
}
