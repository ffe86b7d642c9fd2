import type {
    Document,
    DocumentInput,
    DroppedRelation,
    EventExtractor,
    ExtractedEvent,
    ExtractedRelation,
    GraphEvent,
    GraphStore,
    GraphWriteBatch,
    KnowledgeGraphConfig,
    Mention,
    MentionExtractor,
    MergeRecord,
    Relation,
    RelationExtractor,
    RejectedEvent,
    ReviewItem,
    TemporalExpression,
} from '../types/index.js';
import { prepareDocument, revisionId } from '../extraction/document.js';
import { createMentionExtractor } from '../extraction/mention-extractor.js';
import { createRelationExtractors, extractRelations } from '../extraction/relation-extractor.js';
import { TemporalAnalyzer } from '../extraction/temporal-analyzer.js';
import { SchemaEventExtractor } from '../extraction/event-extractor.js';
import { EntityRegistry } from '../linking/entity-registry.js';
import { EntityLinker, type SemanticMatcher } from '../linking/entity-linker.js';
import { KnowledgeGraphManager, eventKey, relationKey } from '../graph/knowledge-graph.js';
import { RetryingGraphWriter } from '../storage/batch-writer.js';
import { getLexicon, type Lexicon } from '../nlp/lexicon.js';
import { CancelledError, ExtractionError, InvariantViolationError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export type DocumentStatus = 'committed' | 'skipped' | 'failed';

/**
 * Outcome of one document.
 */
export interface DocumentReport {
    documentId: string;
    status: DocumentStatus;

    /** Why the document was skipped or failed */
    error?: string;

    mentions: number;
    relations: number;
    events: number;

    droppedRelations: DroppedRelation[];
    rejectedEvents: RejectedEvent[];
    merges: MergeRecord[];

    /** Items added to the graph by this document (not counting unchanged ones) */
    created: { entities: number; relations: number; events: number };
}

export interface IngestReport {
    documents: DocumentReport[];

    /** Pending review items after the whole batch */
    reviewItems: ReviewItem[];

    totals: { entities: number; relations: number; events: number };
    retries: number;
    durationMs: number;
}

export interface IngestOptions {
    signal?: AbortSignal;
}

/**
 * Collaborators a builder can be given instead of the defaults built from config.
 */
export interface BuilderDependencies {
    store?: GraphStore;
    registry?: EntityRegistry;
    graph?: KnowledgeGraphManager;
    lexicon?: Lexicon;
    mentionExtractor?: MentionExtractor;
    relationExtractors?: RelationExtractor[];
    eventExtractor?: EventExtractor;
    semanticMatcher?: SemanticMatcher;

    /** Injected in tests to avoid real backoff waits */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Stages 1–4 output for one document, before linking.
 */
interface Extracted {
    document: Document;
    mentions: Mention[];
    relations: ExtractedRelation[];
    dropped: DroppedRelation[];
    temporals: TemporalExpression[];
    events: ExtractedEvent[];
    rejected: RejectedEvent[];
}

type ExtractionOutcome = { ok: true; value: Extracted } | { ok: false; documentId: string; error: ExtractionError };

/**
 * Main knowledge-graph builder. Orchestrates the pipeline:
 *
 * 1. Extract every document (mentions, relations, time, events), isolated per document
 * 2. For each document in input order:
 *    a. checkpoint registry and graph
 *    b. link mentions to canonical entities
 *    c. apply entities, merges, relations and events to the graph, then validate it
 *    d. write the batch to the store (retried on transient errors)
 *    e. on failure undo both checkpoints and move on, else release them
 */
export class KnowledgeGraphBuilder {
    readonly registry: EntityRegistry;
    readonly graph: KnowledgeGraphManager;

    private readonly lexicon: Lexicon;
    private readonly linker: EntityLinker;
    private readonly temporal: TemporalAnalyzer;
    private readonly mentionExtractor: MentionExtractor;
    private readonly relationExtractors: RelationExtractor[];
    private readonly eventExtractor: EventExtractor;
    private readonly writer: RetryingGraphWriter | null;

    constructor(
        private readonly config: KnowledgeGraphConfig,
        deps: BuilderDependencies = {}
    ) {
        this.lexicon = deps.lexicon ?? getLexicon();
        const { extraction } = config;

        if (deps.graph) {
            this.graph = deps.graph;
        } else if (deps.store) {
            this.graph = KnowledgeGraphManager.fromSnapshot(deps.store.readSnapshot(), this.lexicon);
        } else {
            this.graph = new KnowledgeGraphManager(this.lexicon);
        }

        if (deps.registry) {
            this.registry = deps.registry;
        } else {
            const snapshot = this.graph.snapshot();
            this.registry = EntityRegistry.fromSnapshot({
                entities: [...snapshot.entities],
                redirects: { ...snapshot.redirects },
                reviews: deps.store?.readReviewItems() ?? [],
            });
        }

        this.linker = new EntityLinker(this.registry, config.linking, this.lexicon, deps.semanticMatcher);
        this.temporal = new TemporalAnalyzer(config.temporal, this.lexicon);
        this.mentionExtractor =
            deps.mentionExtractor ??
            createMentionExtractor(
                { confidenceFloor: extraction.mentionConfidenceFloor, knownEntities: extraction.knownEntities },
                this.lexicon
            );
        this.relationExtractors =
            deps.relationExtractors ??
            createRelationExtractors(
                {
                    proximityWindow: extraction.proximityWindow,
                    sentenceScoped: extraction.sentenceScoped,
                    cooccurrence: extraction.cooccurrence,
                },
                this.lexicon
            );
        this.eventExtractor = deps.eventExtractor ?? new SchemaEventExtractor(config.events, this.lexicon);
        this.writer = deps.store
            ? new RetryingGraphWriter(deps.store, { ...config.storage, sleep: deps.sleep })
            : null;
    }

    /**
     * Run stages 1–4 on one document. Throws `ExtractionError` naming the failing stage.
     * The document is filed under its `revisionId`.
     */
    extract(input: DocumentInput): Extracted {
        const document = prepareDocument({ ...input, id: revisionId(input) });
        let stage: ExtractionError['stage'] = 'mentions';

        try {
            const mentions = this.mentionExtractor.extract(document);

            stage = 'relations';
            const { relations, dropped } = extractRelations(document, mentions, this.relationExtractors, {
                confidenceFloor: this.config.extraction.relationConfidenceFloor,
                mutuallyExclusive: this.config.extraction.mutuallyExclusive,
            });

            stage = 'temporal';
            const temporals = this.temporal.analyze(document);
            const qualified = relations.map((relation) => ({
                ...relation,
                temporalId: this.temporal.qualify(relation.evidence.span, temporals, document)?.id ?? null,
            }));

            stage = 'events';
            const { events, rejected } = this.eventExtractor.extract({
                document,
                mentions,
                relations: qualified,
                temporals,
            });

            return { document, mentions, relations: qualified, dropped, temporals, events, rejected };
        } catch (error) {
            throw new ExtractionError(`Extraction failed at ${stage}: ${errorMessage(error)}`, document.id, stage, {
                cause: error,
            });
        }
    }

    /**
     * Ingest a batch of documents. Extraction failures skip the document,
     * storage failures roll it back; either way later documents continue.
     * Cancellation rolls back the document in progress and throws `CancelledError`.
     */
    async ingest(inputs: readonly DocumentInput[], options: IngestOptions = {}): Promise<IngestReport> {
        const { signal } = options;
        const startTime = Date.now();
        const retriesBefore = this.writer?.retryCount ?? 0;

        logger.info({ documents: inputs.length }, 'Starting ingest');

        const outcomes: ExtractionOutcome[] = [];
        for (const input of inputs) {
            throwIfAborted(signal);
            try {
                outcomes.push({ ok: true, value: this.extract(input) });
            } catch (error) {
                const id = revisionId(input);
                const wrapped =
                    error instanceof ExtractionError
                        ? error
                        : new ExtractionError(errorMessage(error), id, 'mentions', { cause: error });
                logger.warn({ documentId: id, stage: wrapped.stage, error: wrapped.message }, 'Document skipped');
                outcomes.push({ ok: false, documentId: id, error: wrapped });
            }
        }

        const documents: DocumentReport[] = [];
        for (const outcome of outcomes) {
            throwIfAborted(signal);

            if (!outcome.ok) {
                documents.push({ ...emptyReport(outcome.documentId, 'skipped'), error: outcome.error.message });
                continue;
            }

            documents.push(await this.commit(outcome.value, signal));
            throwIfAborted(signal);
        }

        const report: IngestReport = {
            documents,
            reviewItems: this.registry.reviewItems(),
            totals: {
                entities: this.graph.entityCount,
                relations: this.graph.relationCount,
                events: this.graph.eventCount,
            },
            retries: (this.writer?.retryCount ?? 0) - retriesBefore,
            durationMs: Date.now() - startTime,
        };

        logger.info(
            {
                committed: documents.filter((d) => d.status === 'committed').length,
                skipped: documents.filter((d) => d.status === 'skipped').length,
                failed: documents.filter((d) => d.status === 'failed').length,
                ...report.totals,
                reviewItems: report.reviewItems.length,
            },
            'Ingest complete'
        );

        return report;
    }

    /**
     * Link one extracted document and apply it to the graph and the store as
     * a unit.
     */
    private async commit(extracted: Extracted, signal: AbortSignal | undefined): Promise<DocumentReport> {
        const { document } = extracted;
        const registryCheckpoint = this.registry.checkpoint();
        const graphCheckpoint = this.graph.checkpoint();
        const rollback = (): void => {
            this.registry.restore(registryCheckpoint);
            this.graph.restore(graphCheckpoint);
        };

        let batch: GraphWriteBatch;
        let report: DocumentReport;
        try {
            ({ batch, report } = this.apply(extracted));
            const problems = this.graph.validate();
            if (problems.length > 0) {
                throw new InvariantViolationError(`Graph invariants broken: ${problems.join('; ')}`, {
                    documentId: document.id,
                    problems,
                });
            }
        } catch (error) {
            rollback();
            logger.error({ documentId: document.id, error: errorMessage(error) }, 'Document could not be applied');
            return { ...emptyReport(document.id, 'failed'), error: errorMessage(error) };
        }

        if (signal?.aborted) {
            rollback();
            throw new CancelledError();
        }

        if (this.writer) {
            try {
                await this.writer.write(batch);
            } catch (error) {
                rollback();
                logger.error({ documentId: document.id, error: errorMessage(error) }, 'Document write failed');
                return { ...report, status: 'failed', error: errorMessage(error) };
            }
        }

        this.registry.release(registryCheckpoint);
        this.graph.release(graphCheckpoint);
        logger.debug({ documentId: document.id, ...report.created }, 'Document committed');
        return report;
    }

    /**
     * Stage 5 and 6 for one document: link mentions, then bring the graph up to date.
     */
    private apply(extracted: Extracted): { batch: GraphWriteBatch; report: DocumentReport } {
        const { document, mentions, relations, events, temporals } = extracted;
        const created = { entities: 0, relations: 0, events: 0 };

        const linked = this.linker.linkAll(mentions);

        for (const entity of linked.touched) {
            if (this.graph.upsertEntity(entity) === 'created') created.entities++;
        }

        const retirements: GraphWriteBatch['retirements'] = [];
        const removedRelationKeys = new Set<string>();
        const batchRelations = new Map<string, Relation>();
        const batchEvents = new Map<string, GraphEvent>();

        for (const retiredId of linked.merges.flatMap((merge) => merge.retiredIds)) {
            const survivorId = this.registry.resolve(retiredId);
            if (this.graph.resolve(retiredId) !== retiredId) continue;

            if (this.graph.hasEntity(retiredId)) {
                const result = this.graph.retire(retiredId, survivorId);
                result.removedRelationKeys.forEach((key) => {
                    removedRelationKeys.add(key);
                    batchRelations.delete(key);
                });
                result.rewrittenRelations.forEach((r) => batchRelations.set(r.key, r));
                result.updatedEvents.forEach((e) => batchEvents.set(e.key, e));
            } else {
                this.graph.addRedirect(retiredId, survivorId);
            }
            retirements.push({ retiredId, survivorId });
        }

        const referenced = new Set([...relations, ...events].map((item) => item.temporalId));
        const batchTemporals = temporals.filter((t) => referenced.has(t.id));
        batchTemporals.forEach((t) => this.graph.upsertTemporal(t));

        const entityOf = (mentionId: string | null): string | null =>
            mentionId === null ? null : (linked.mapping.get(mentionId) ?? null);

        for (const extractedRelation of relations) {
            const subjectId = entityOf(extractedRelation.subjectMentionId);
            const objectId = entityOf(extractedRelation.objectMentionId);
            if (subjectId === null || objectId === null) continue;

            const { status, relation } = this.graph.upsertRelation({
                key: relationKey(subjectId, extractedRelation.predicate, objectId, extractedRelation.evidence.fingerprint),
                subjectId,
                predicate: extractedRelation.predicate,
                objectId,
                evidence: extractedRelation.evidence,
                confidence: extractedRelation.confidence,
                method: extractedRelation.method,
                temporalId: extractedRelation.temporalId,
            });
            if (status === 'skipped') continue;
            if (status === 'created') created.relations++;
            batchRelations.set(relation.key, relation);
        }

        for (const extractedEvent of events) {
            const roles: Record<string, string | null> = {};
            for (const [role, mentionId] of Object.entries(extractedEvent.roles)) {
                roles[role] = entityOf(mentionId);
            }
            if (Object.values(roles).every((id) => id === null)) continue;

            const { status, event } = this.graph.upsertEvent({
                key: eventKey(extractedEvent.type, extractedEvent.evidence.fingerprint),
                type: extractedEvent.type,
                roles,
                attributes: extractedEvent.attributes,
                evidence: extractedEvent.evidence,
                temporalId: extractedEvent.temporalId,
                confidence: extractedEvent.confidence,
                complete: extractedEvent.complete,
            });
            if (status === 'created') created.events++;
            batchEvents.set(event.key, event);
        }

        const batch: GraphWriteBatch = {
            document: { id: document.id, category: document.category, referenceDate: document.referenceDate },
            entities: linked.touched,
            retirements,
            removedRelationKeys: [...removedRelationKeys],
            relations: [...batchRelations.values()],
            events: [...batchEvents.values()],
            temporals: batchTemporals,
            reviewItems: this.registry.reviewItems(),
        };

        const report: DocumentReport = {
            documentId: document.id,
            status: 'committed',
            mentions: mentions.length,
            relations: relations.length,
            events: events.length,
            droppedRelations: extracted.dropped,
            rejectedEvents: extracted.rejected,
            merges: linked.merges,
            created,
        };

        return { batch, report };
    }
}

function emptyReport(documentId: string, status: DocumentStatus): DocumentReport {
    return {
        documentId,
        status,
        mentions: 0,
        relations: 0,
        events: 0,
        droppedRelations: [],
        rejectedEvents: [],
        merges: [],
        created: { entities: 0, relations: 0, events: 0 },
    };
}

function throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) throw new CancelledError();
}
