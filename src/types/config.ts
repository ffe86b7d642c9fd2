import type { MentionType } from './mention.js';
import type { Predicate } from './relation.js';

/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * How the temporal analyzer picks the reference date for relative expressions.
 */
export type ReferenceDatePolicy = 'document' | 'fixed' | 'none';

/**
 * A name the dictionary mention extractor should always recognize.
 */
export interface KnownEntity {
    name: string;
    type: MentionType;
    aliases?: string[];
}

/**
 * Extraction configuration (stages 1–4).
 */
export interface ExtractionConfig {
    /** Mentions under this confidence are dropped */
    mentionConfidenceFloor: number;

    /** Relations under this confidence are dropped */
    relationConfidenceFloor: number;

    /** Maximum character distance between two mentions considered for a relation */
    proximityWindow: number;

    /** Only pair mentions inside the same sentence */
    sentenceScoped: boolean;

    /** Emit low-confidence 'related' relations for co-occurring mentions */
    cooccurrence: boolean;

    /** Predicate sets that cannot hold together for the same pair of entities */
    mutuallyExclusive: Predicate[][];

    knownEntities: KnownEntity[];
}

export interface TemporalConfig {
    referenceDatePolicy: ReferenceDatePolicy;

    /** Reference date (YYYY-MM-DD) used when the policy is 'fixed' */
    referenceDate?: string;
}

export interface SemanticMatchConfig {
    enabled: boolean;

    /** Stricter threshold applied to semantic similarity */
    threshold: number;

    /** Character n-gram size of the built-in matcher */
    ngram: number;
}

/**
 * Entity linking configuration (stage 5).
 */
export interface LinkingConfig {
    /** Similarity at or above which a mention links to an entity */
    mergeThreshold: number;

    /** Similarity at or above which a non-linking pair is reported for review */
    reviewThreshold: number;

    semantic: SemanticMatchConfig;
}

export interface EventConfig {
    /** Events under this confidence are rejected */
    confidenceFloor: number;
}

/**
 * Graph store and batch-write configuration.
 */
export interface StorageConfig {
    path: string;
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
}

/**
 * Full configuration handed to the core as an explicit object.
 */
export interface KnowledgeGraphConfig {
    extraction: ExtractionConfig;
    temporal: TemporalConfig;
    linking: LinkingConfig;
    events: EventConfig;
    storage: StorageConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: KnowledgeGraphConfig = {
    extraction: {
        mentionConfidenceFloor: 0.5,
        relationConfidenceFloor: 0.5,
        proximityWindow: 150,
        sentenceScoped: true,
        cooccurrence: false,
        mutuallyExclusive: [['competition', 'subsidiary']],
        knownEntities: [],
    },
    temporal: {
        referenceDatePolicy: 'document',
    },
    linking: {
        mergeThreshold: 0.8,
        reviewThreshold: 0.5,
        semantic: {
            enabled: false,
            threshold: 0.92,
            ngram: 3,
        },
    },
    events: {
        confidenceFloor: 0.3,
    },
    storage: {
        path: './finkg.db',
        maxRetries: 3,
        initialBackoffMs: 100,
        maxBackoffMs: 2000,
    },
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    finkg_version: string;
    config_json: string;
    stats_json: string;
}
