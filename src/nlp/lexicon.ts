import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { EventType, Predicate } from '../types/index.js';

const LEXICON_URL = new URL('../../data/lexicon.json', import.meta.url);

const wordList = z.array(z.string().min(1));
const eventType = z.enum([
    'investment-event',
    'acquisition-event',
    'cooperation-event',
    'product-launch',
    'personnel-change',
    'financial-report',
]);

const lexiconSchema = z.object({
    abbreviations: wordList,
    abbreviationExpansions: z.record(z.string(), z.string()),
    orgHeads: wordList,
    orgSuffixes: wordList,
    legalForms: wordList,
    genericOrgWords: wordList,
    titles: wordList,
    productSuffixes: wordList,
    launchVerbs: wordList,
    months: z.record(z.string(), z.number().int().min(1).max(12)),
    weekdays: wordList,
    relativeWords: wordList,
    stopwords: wordList,
    locations: wordList,
    relationTriggers: z.object({
        investment: wordList,
        acquisition: wordList,
        cooperation: wordList,
        employment: wordList,
        subsidiary: wordList,
        competition: wordList,
        supply: wordList,
        product: wordList,
        location: wordList,
    }),
    eventTriggers: z.object({
        'investment-event': wordList,
        'acquisition-event': wordList,
        'cooperation-event': wordList,
        'product-launch': wordList,
        'personnel-change': wordList,
        'financial-report': wordList,
    }),
    categoryLabels: z.record(z.string(), z.array(eventType)),
});

/**
 * Word lists shared by the rule-based extractors and the entity linker.
 * All single-word sets hold lowercase entries.
 */
export interface Lexicon {
    abbreviations: ReadonlySet<string>;
    abbreviationExpansions: ReadonlyMap<string, string>;
    orgHeads: ReadonlySet<string>;
    orgSuffixes: ReadonlySet<string>;
    legalForms: ReadonlySet<string>;
    genericOrgWords: ReadonlySet<string>;
    titles: ReadonlySet<string>;
    productSuffixes: ReadonlySet<string>;
    launchVerbs: ReadonlySet<string>;

    /** Month name or abbreviation → month number (1-12) */
    months: ReadonlyMap<string, number>;

    weekdays: ReadonlySet<string>;
    relativeWords: ReadonlySet<string>;
    stopwords: ReadonlySet<string>;

    /** Gazetteer, original casing */
    locations: readonly string[];

    /** Trigger phrases per predicate, longest first */
    relationTriggers: ReadonlyMap<Predicate, readonly string[]>;

    /** Trigger phrases per event type, longest first */
    eventTriggers: ReadonlyMap<EventType, readonly string[]>;

    /** Category label word → event types it hints at */
    categoryLabels: ReadonlyMap<string, readonly EventType[]>;
}

let lexiconInstance: Lexicon | null = null;

function lowerSet(words: string[]): ReadonlySet<string> {
    return new Set(words.map((w) => w.toLowerCase()));
}

function longestFirst(phrases: string[]): string[] {
    return [...phrases].map((p) => p.toLowerCase()).sort((a, b) => b.length - a.length || a.localeCompare(b));
}

/**
 * Parse and index a raw lexicon object.
 */
export function buildLexicon(raw: unknown): Lexicon {
    const data = lexiconSchema.parse(raw);

    const relationTriggers = new Map<Predicate, readonly string[]>();
    for (const [predicate, phrases] of Object.entries(data.relationTriggers)) {
        const key = RELATION_TRIGGER_KEYS.find((p) => p === predicate);
        if (key) relationTriggers.set(key, longestFirst(phrases));
    }

    const eventTriggers = new Map<EventType, readonly string[]>();
    for (const [type, phrases] of Object.entries(data.eventTriggers)) {
        const key = eventType.options.find((t) => t === type);
        if (key) eventTriggers.set(key, longestFirst(phrases));
    }

    return {
        abbreviations: lowerSet(data.abbreviations),
        abbreviationExpansions: new Map(Object.entries(data.abbreviationExpansions)),
        orgHeads: lowerSet(data.orgHeads),
        orgSuffixes: lowerSet(data.orgSuffixes),
        legalForms: lowerSet(data.legalForms),
        genericOrgWords: lowerSet(data.genericOrgWords),
        titles: lowerSet(data.titles),
        productSuffixes: lowerSet(data.productSuffixes),
        launchVerbs: lowerSet(data.launchVerbs),
        months: new Map(Object.entries(data.months)),
        weekdays: lowerSet(data.weekdays),
        relativeWords: lowerSet(data.relativeWords),
        stopwords: lowerSet(data.stopwords),
        locations: data.locations,
        relationTriggers,
        eventTriggers,
        categoryLabels: new Map(Object.entries(data.categoryLabels)),
    };
}

const RELATION_TRIGGER_KEYS: readonly Predicate[] = [
    'investment',
    'acquisition',
    'cooperation',
    'employment',
    'subsidiary',
    'competition',
    'supply',
    'product',
    'location',
];

/**
 * Get the bundled lexicon (data/lexicon.json), loaded once.
 */
export function getLexicon(): Lexicon {
    if (!lexiconInstance) {
        const raw: unknown = JSON.parse(readFileSync(LEXICON_URL, 'utf-8'));
        lexiconInstance = buildLexicon(raw);
    }
    return lexiconInstance;
}
