/**
 * Barrel export for all shared types.
 */
export type { Span, Document, DocumentInput } from './document.js';
export { MENTION_TYPES } from './mention.js';
export type { Mention, MentionType } from './mention.js';
export type { Entity, MergeRecord, ReviewItem } from './entity.js';
export { PREDICATES } from './relation.js';
export type {
    Predicate,
    RelationMethod,
    Evidence,
    ExtractedRelation,
    DroppedRelation,
    Relation,
} from './relation.js';
export type {
    EventType,
    RolePosition,
    RoleSchema,
    EventSchema,
    ExtractedEvent,
    RejectedEvent,
    GraphEvent,
} from './event.js';
export type { TemporalGranularity, TemporalValue, TemporalExpression } from './temporal.js';
export { SNAPSHOT_VERSION } from './graph.js';
export type {
    GraphSnapshot,
    GraphQueryFilter,
    GraphItem,
    ExportNode,
    ExportEdge,
    ExportGraph,
    GraphWriteBatch,
    GraphStore,
} from './graph.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    KnowledgeGraphConfig,
    ExtractionConfig,
    TemporalConfig,
    LinkingConfig,
    SemanticMatchConfig,
    EventConfig,
    StorageConfig,
    KnownEntity,
    LogLevel,
    ReferenceDatePolicy,
    RunRecord,
} from './config.js';
export type {
    MentionExtractor,
    RelationExtractor,
    EventExtractor,
    EventExtractionInput,
    EventExtractionResult,
} from './extractor.js';
