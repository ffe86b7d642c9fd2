/**
 * Public API.
 */
export * from './types/index.js';

export { prepareDocument, readCategoryTag, documentId, revisionId } from './extraction/document.js';
export {
    PatternMentionExtractor,
    DictionaryMentionExtractor,
    CompositeMentionExtractor,
    createMentionExtractor,
    resolveOverlaps,
} from './extraction/mention-extractor.js';
export {
    TriggerRelationExtractor,
    TypePairRelationExtractor,
    CooccurrenceRelationExtractor,
    createRelationExtractors,
    extractRelations,
} from './extraction/relation-extractor.js';
export { TemporalAnalyzer, normalizeTemporal } from './extraction/temporal-analyzer.js';
export { SchemaEventExtractor, EVENT_SCHEMAS, categoryPrior, parseAmount } from './extraction/event-extractor.js';

export { EntityRegistry, type RegistrySnapshot } from './linking/entity-registry.js';
export { EntityLinker, NgramSemanticMatcher, type SemanticMatcher } from './linking/entity-linker.js';

export {
    KnowledgeGraphManager,
    relationKey,
    eventKey,
    type Timeline,
    type TimelineEntry,
    type TemporalOrderLink,
} from './graph/knowledge-graph.js';
export { toExportGraph } from './graph/export-graph.js';

export { SqliteGraphStore } from './storage/database.js';
export { RetryingGraphWriter } from './storage/batch-writer.js';

export {
    KnowledgeGraphBuilder,
    type IngestReport,
    type DocumentReport,
    type BuilderDependencies,
} from './builder/pipeline.js';

export { renderExport, importSnapshot, type ExportFormat } from './exporters/export.js';
export { renderViewerHtml, generateViewer } from './viewer/html-viewer.js';

export { createConfig, resolveConfig, type ConfigOverrides } from './utils/config.js';
export { getLexicon, type Lexicon } from './nlp/lexicon.js';
export { nameSimilarity, normalizeName } from './nlp/similarity.js';
export {
    ExtractionError,
    InvariantViolationError,
    StorageError,
    CancelledError,
    ConfigError,
} from './utils/errors.js';
export { initLogger, getLogger } from './utils/logger.js';
