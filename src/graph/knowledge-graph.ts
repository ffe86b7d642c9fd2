import { MultiDirectedGraph } from 'graphology';
import type {
    Entity,
    GraphEvent,
    GraphItem,
    GraphQueryFilter,
    GraphSnapshot,
    Predicate,
    Relation,
    TemporalExpression,
    TemporalGranularity,
} from '../types/index.js';
import { SNAPSHOT_VERSION } from '../types/index.js';
import { getLexicon, type Lexicon } from '../nlp/lexicon.js';
import { charNgrams, cosineSimilarity, normalizeName } from '../nlp/similarity.js';
import { InvariantViolationError } from '../utils/errors.js';
import { UndoLog, type UndoMark } from '../utils/undo-log.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

type NodeAttributes = { entity: Entity };
type EdgeAttributes = { relation: Relation };

export type UpsertStatus = 'created' | 'updated' | 'unchanged';

export interface RetireResult {
    retiredId: string;
    survivorId: string;

    /** Relation keys that no longer exist */
    removedRelationKeys: string[];

    /** Relations re-created under the survivor id */
    rewrittenRelations: Relation[];

    /** Events whose roles now reference the survivor */
    updatedEvents: GraphEvent[];
}

export interface RelationPath {
    entities: string[];
    relations: Relation[];
}

export interface EntityStatistics {
    degree: number;
    inDegree: number;
    outDegree: number;
    predicates: Partial<Record<Predicate, number>>;
    events: number;
}

export type DatedGranularity = Exclude<TemporalGranularity, 'unknown'>;

/**
 * A dated event on the timeline. `start` and `end` are formatted to `granularity`.
 */
export interface TimelineEntry {
    eventKey: string;
    type: GraphEvent['type'];
    temporalId: string;
    start: string;
    end: string;
    granularity: DatedGranularity;
}

/**
 * `from` ends strictly before `to` starts at the coarser of their granularities.
 */
export interface TemporalOrderLink {
    fromEventKey: string;
    toEventKey: string;
    order: 'before';

    /** Days between the first days of the two periods */
    days: number;

    /** `days` in the largest whole unit, e.g. "2 years", "3 months", "12 days" */
    timeDiff: string;
}

export interface Timeline {
    entries: TimelineEntry[];
    links: TemporalOrderLink[];
}

const GRANULARITY_WIDTH: Record<DatedGranularity, number> = { year: 4, month: 7, day: 10 };
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Whether `a` ends strictly before `b` starts. Both dates are cut to the
 * coarser granularity first, so "2023" and "2023-08-15" are not ordered.
 */
export function isBefore(a: TimelineEntry, b: TimelineEntry): boolean {
    const width = Math.min(GRANULARITY_WIDTH[a.granularity], GRANULARITY_WIDTH[b.granularity]);
    return a.end.slice(0, width) < b.start.slice(0, width);
}

function periodStartMs(date: string): number {
    const [year = 0, month = 1, day = 1] = date.split('-').map(Number);
    return Date.UTC(year, month - 1, day);
}

export function formatTimeDiff(days: number): string {
    const plural = (amount: number, unit: string): string => `${amount} ${unit}${amount === 1 ? '' : 's'}`;
    if (days > 365) return plural(Math.floor(days / 365), 'year');
    if (days > 30) return plural(Math.floor(days / 30), 'month');
    return plural(days, 'day');
}

/**
 * Keep an entity in the first role it fills and empty the later ones.
 */
function distinctRoles(roles: Record<string, string | null>): { roles: Record<string, string | null>; collapsed: boolean } {
    const seen = new Set<string>();
    const result: Record<string, string | null> = {};
    let collapsed = false;
    for (const [role, id] of Object.entries(roles)) {
        if (id !== null && seen.has(id)) {
            result[role] = null;
            collapsed = true;
            continue;
        }
        if (id !== null) seen.add(id);
        result[role] = id;
    }
    return { roles: result, collapsed };
}

export function relationKey(subjectId: string, predicate: Predicate, objectId: string, fingerprint: string): string {
    return `${subjectId}|${predicate}|${objectId}|${fingerprint}`;
}

export function eventKey(type: string, fingerprint: string): string {
    return `${type}|${fingerprint}`;
}

function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}

/**
 * In-memory knowledge graph: live entities as nodes, relations as keyed
 * multi-edges, events as hyper-edges beside them.
 *
 * No relation or event ever references a retired or missing entity. Every
 * write resolves ids through the redirect table first and rejects what would
 * dangle.
 */
export class KnowledgeGraphManager {
    private graph = new MultiDirectedGraph<NodeAttributes, EdgeAttributes>({ allowSelfLoops: false });
    private events = new Map<string, GraphEvent>();
    private temporals = new Map<string, TemporalExpression>();
    private redirects = new Map<string, string>();
    private readonly log = new UndoLog();

    constructor(private readonly lexicon: Lexicon = getLexicon()) {}

    /**
     * Rebuild a graph from a snapshot (e.g. one read back from storage).
     */
    static fromSnapshot(snapshot: GraphSnapshot, lexicon?: Lexicon): KnowledgeGraphManager {
        const manager = new KnowledgeGraphManager(lexicon);
        manager.load(snapshot);
        return manager;
    }

    get entityCount(): number {
        return this.graph.order;
    }

    get relationCount(): number {
        return this.graph.size;
    }

    get eventCount(): number {
        return this.events.size;
    }

    resolve(id: string): string {
        return this.redirects.get(id) ?? id;
    }

    hasEntity(id: string): boolean {
        return this.graph.hasNode(this.resolve(id));
    }

    getEntity(id: string): Entity | undefined {
        const node = this.resolve(id);
        return this.graph.hasNode(node) ? structuredClone(this.graph.getNodeAttribute(node, 'entity')) : undefined;
    }

    getEvent(key: string): GraphEvent | undefined {
        const event = this.events.get(key);
        return event ? structuredClone(event) : undefined;
    }

    // ---- Upserts ----

    upsertEntity(entity: Entity): UpsertStatus {
        if (entity.retiredInto !== null) {
            throw new InvariantViolationError(`Cannot upsert retired entity ${entity.id}`, { entityId: entity.id });
        }
        if (this.redirects.has(entity.id)) {
            throw new InvariantViolationError(`Entity ${entity.id} was retired into ${this.resolve(entity.id)}`, {
                entityId: entity.id,
            });
        }

        if (!this.graph.hasNode(entity.id)) {
            this.addNode(structuredClone(entity));
            return 'created';
        }
        const current = this.graph.getNodeAttribute(entity.id, 'entity');
        if (JSON.stringify(current) === JSON.stringify(entity)) return 'unchanged';
        this.setNode(structuredClone(entity));
        return 'updated';
    }

    upsertTemporal(expression: TemporalExpression): UpsertStatus {
        if (this.temporals.has(expression.id)) return 'unchanged';
        this.log.set(this.temporals, expression.id, structuredClone(expression));
        return 'created';
    }

    /**
     * Insert a relation, or raise the stored confidence if the same relation
     * (same key) is already present. Endpoints are resolved through redirects
     * and must exist. A relation whose endpoints resolve to one entity is skipped.
     */
    upsertRelation(relation: Relation): { status: UpsertStatus | 'skipped'; relation: Relation } {
        const subjectId = this.resolve(relation.subjectId);
        const objectId = this.resolve(relation.objectId);
        this.requireNode(subjectId, 'relation subject');
        this.requireNode(objectId, 'relation object');
        if (relation.temporalId !== null && !this.temporals.has(relation.temporalId)) {
            throw new InvariantViolationError(`Unknown temporal expression ${relation.temporalId}`, {
                temporalId: relation.temporalId,
            });
        }

        const resolved: Relation = {
            ...structuredClone(relation),
            subjectId,
            objectId,
            key: relationKey(subjectId, relation.predicate, objectId, relation.evidence.fingerprint),
        };
        if (subjectId === objectId) return { status: 'skipped', relation: resolved };

        return { status: this.putRelation(resolved), relation: resolved };
    }

    /**
     * Insert an event, or raise the stored confidence of the same event.
     * Role fillers are resolved through redirects and must exist.
     */
    upsertEvent(event: GraphEvent): { status: UpsertStatus; event: GraphEvent } {
        const roles: Record<string, string | null> = {};
        for (const [role, id] of Object.entries(event.roles)) {
            if (id === null) {
                roles[role] = null;
                continue;
            }
            const resolved = this.resolve(id);
            this.requireNode(resolved, `event role ${role}`);
            roles[role] = resolved;
        }
        if (event.temporalId !== null && !this.temporals.has(event.temporalId)) {
            throw new InvariantViolationError(`Unknown temporal expression ${event.temporalId}`, {
                temporalId: event.temporalId,
            });
        }

        const distinct = distinctRoles(roles);
        const resolved: GraphEvent = {
            ...structuredClone(event),
            roles: distinct.roles,
            complete: event.complete && !distinct.collapsed,
            key: eventKey(event.type, event.evidence.fingerprint),
        };
        const existing = this.events.get(resolved.key);
        if (existing && existing.confidence >= resolved.confidence && sameRoles(existing.roles, resolved.roles)) {
            return { status: 'unchanged', event: structuredClone(existing) };
        }
        this.log.set(this.events, resolved.key, resolved);
        return { status: existing ? 'updated' : 'created', event: structuredClone(resolved) };
    }

    /**
     * Retire `oldId` into `newId`: every relation endpoint and event role is
     * rewritten, colliding relations keep the higher confidence, self-loops are
     * dropped, the node is removed and a redirect recorded. Nothing changes if
     * a precondition fails.
     */
    retire(oldId: string, newId: string): RetireResult {
        const survivorId = this.resolve(newId);
        if (oldId === survivorId) {
            throw new InvariantViolationError(`Cannot retire ${oldId} into itself`, { oldId, newId });
        }
        this.requireNode(oldId, 'retired entity');
        this.requireNode(survivorId, 'survivor');

        const removedRelationKeys: string[] = [];
        const rewrittenRelations: Relation[] = [];
        const touching = this.graph.edges(oldId).map((edge) => this.graph.getEdgeAttribute(edge, 'relation'));

        for (const relation of touching) {
            this.dropEdge(relation);
            removedRelationKeys.push(relation.key);

            const subjectId = relation.subjectId === oldId ? survivorId : relation.subjectId;
            const objectId = relation.objectId === oldId ? survivorId : relation.objectId;
            if (subjectId === objectId) continue;

            const rewritten: Relation = {
                ...relation,
                subjectId,
                objectId,
                key: relationKey(subjectId, relation.predicate, objectId, relation.evidence.fingerprint),
            };
            this.putRelation(rewritten);
            rewrittenRelations.push(structuredClone(this.graph.getEdgeAttribute(rewritten.key, 'relation')));
        }

        const updatedEvents: GraphEvent[] = [];
        for (const event of this.events.values()) {
            if (!Object.values(event.roles).includes(oldId)) continue;
            const rewritten = Object.fromEntries(
                Object.entries(event.roles).map(([role, id]): [string, string | null] => [role, id === oldId ? survivorId : id])
            );
            const distinct = distinctRoles(rewritten);
            const updated: GraphEvent = {
                ...event,
                roles: distinct.roles,
                complete: event.complete && !distinct.collapsed,
            };
            this.log.set(this.events, event.key, updated);
            updatedEvents.push(structuredClone(updated));
        }

        this.dropNode(oldId);
        for (const [from, to] of this.redirects) {
            if (to === oldId) this.log.set(this.redirects, from, survivorId);
        }
        this.log.set(this.redirects, oldId, survivorId);

        const stillPresent = new Set(rewrittenRelations.map((r) => r.key));
        logger.debug({ oldId, survivorId, rewritten: rewrittenRelations.length }, 'Entity retired');
        return {
            retiredId: oldId,
            survivorId,
            removedRelationKeys: removedRelationKeys.filter((key) => !stillPresent.has(key)),
            rewrittenRelations,
            updatedEvents,
        };
    }

    /**
     * Record that an entity which never reached the graph (created and merged
     * within one batch) now redirects to `newId`.
     */
    addRedirect(oldId: string, newId: string): void {
        const survivorId = this.resolve(newId);
        if (this.graph.hasNode(oldId) || oldId === survivorId) {
            throw new InvariantViolationError(`Cannot redirect ${oldId} to ${survivorId}`, { oldId, newId });
        }
        this.requireNode(survivorId, 'survivor');
        for (const [from, to] of this.redirects) {
            if (to === oldId) this.log.set(this.redirects, from, survivorId);
        }
        this.log.set(this.redirects, oldId, survivorId);
    }

    // ---- Reads ----

    /**
     * Items matching the filter. The result is lazy and restartable: every
     * iteration walks the current graph again.
     */
    query(filter: GraphQueryFilter = {}): Iterable<GraphItem> {
        return { [Symbol.iterator]: () => this.walk(filter) };
    }

    getRelations(entityId: string): Relation[] {
        const id = this.resolve(entityId);
        if (!this.graph.hasNode(id)) return [];
        return this.graph
            .edges(id)
            .map((edge) => structuredClone(this.graph.getEdgeAttribute(edge, 'relation')))
            .sort((a, b) => a.key.localeCompare(b.key));
    }

    /**
     * Directed relation paths from one entity to another, up to `maxDepth` edges.
     */
    findPaths(fromId: string, toId: string, maxDepth = 2): RelationPath[] {
        const from = this.resolve(fromId);
        const to = this.resolve(toId);
        if (!this.graph.hasNode(from) || !this.graph.hasNode(to) || from === to) return [];

        const paths: RelationPath[] = [];
        const visit = (node: string, entities: string[], relations: Relation[]): void => {
            if (relations.length >= maxDepth) return;
            for (const edge of [...this.graph.outEdges(node)].sort()) {
                const relation = this.graph.getEdgeAttribute(edge, 'relation');
                const next = relation.objectId;
                if (entities.includes(next)) continue;
                if (next === to) {
                    paths.push({ entities: [...entities, next], relations: structuredClone([...relations, relation]) });
                } else {
                    visit(next, [...entities, next], [...relations, relation]);
                }
            }
        };
        visit(from, [from], []);

        return paths.sort((a, b) => a.relations.length - b.relations.length);
    }

    /**
     * Snapshot of the neighbourhood within `depth` hops (either direction).
     */
    subgraph(entityId: string, depth = 1): GraphSnapshot {
        const center = this.resolve(entityId);
        const nodes = new Set<string>();
        if (this.graph.hasNode(center)) {
            nodes.add(center);
            let frontier = [center];
            for (let d = 0; d < depth; d++) {
                const next: string[] = [];
                for (const node of frontier) {
                    for (const neighbor of this.graph.neighbors(node)) {
                        if (!nodes.has(neighbor)) {
                            nodes.add(neighbor);
                            next.push(neighbor);
                        }
                    }
                }
                frontier = next;
            }
        }

        const full = this.snapshot();
        const relations = full.relations.filter((r) => nodes.has(r.subjectId) && nodes.has(r.objectId));
        const events = full.events.filter((e) =>
            Object.values(e.roles).every((id) => id === null || nodes.has(id))
        );
        const temporalIds = new Set([...relations, ...events].map((item) => item.temporalId));
        return deepFreeze(
            structuredClone({
                ...full,
                entities: full.entities.filter((e) => nodes.has(e.id)),
                relations,
                events,
                temporals: full.temporals.filter((t) => temporalIds.has(t.id)),
            })
        );
    }

    entityStatistics(entityId: string): EntityStatistics | null {
        const id = this.resolve(entityId);
        if (!this.graph.hasNode(id)) return null;

        const predicates: Partial<Record<Predicate, number>> = {};
        for (const edge of this.graph.edges(id)) {
            const { predicate } = this.graph.getEdgeAttribute(edge, 'relation');
            predicates[predicate] = (predicates[predicate] ?? 0) + 1;
        }
        let events = 0;
        for (const event of this.events.values()) {
            if (Object.values(event.roles).includes(id)) events++;
        }

        return {
            degree: this.graph.degree(id),
            inDegree: this.graph.inDegree(id),
            outDegree: this.graph.outDegree(id),
            predicates,
            events,
        };
    }

    /**
     * Live entities with the most similar names (character trigram cosine).
     */
    findSimilarEntities(entityId: string, topK = 5): Array<{ entityId: string; similarity: number }> {
        const target = this.getEntity(entityId);
        if (!target) return [];

        const vector = charNgrams(normalizeName(target.name, this.lexicon), 3);
        const scored: Array<{ entityId: string; similarity: number }> = [];
        this.graph.forEachNode((node, { entity }) => {
            if (node === target.id) return;
            const other = charNgrams(normalizeName(entity.name, this.lexicon), 3);
            scored.push({ entityId: node, similarity: cosineSimilarity(vector, other) });
        });

        scored.sort((a, b) => b.similarity - a.similarity || a.entityId.localeCompare(b.entityId));
        return scored.slice(0, topK);
    }

    /**
     * Dated events in time order, with a `before` link from each event to the
     * earliest events that come strictly after it. Events with no temporal or
     * an unknown date are left out. With `entityId`, only events it takes part in.
     */
    timeline(entityId?: string): Timeline {
        const focus = entityId === undefined ? undefined : this.resolve(entityId);
        const entries: TimelineEntry[] = [];

        for (const event of this.events.values()) {
            if (event.temporalId === null) continue;
            if (focus !== undefined && !Object.values(event.roles).includes(focus)) continue;
            const value = this.temporals.get(event.temporalId)?.value;
            if (!value || value.granularity === 'unknown' || value.start === null) continue;
            entries.push({
                eventKey: event.key,
                type: event.type,
                temporalId: event.temporalId,
                start: value.start,
                end: value.end ?? value.start,
                granularity: value.granularity,
            });
        }
        entries.sort((a, b) => compareStrings(a.start, b.start) || compareStrings(a.eventKey, b.eventKey));

        const links: TemporalOrderLink[] = [];
        entries.forEach((from, i) => {
            const next = entries.slice(i + 1).find((candidate) => isBefore(from, candidate));
            if (!next) return;
            for (const to of entries.slice(i + 1)) {
                if (to.start !== next.start || !isBefore(from, to)) continue;
                const days = Math.round((periodStartMs(to.start) - periodStartMs(from.start)) / DAY_MS);
                links.push({
                    fromEventKey: from.eventKey,
                    toEventKey: to.eventKey,
                    order: 'before',
                    days,
                    timeDiff: formatTimeDiff(days),
                });
            }
        });

        return { entries, links };
    }

    /**
     * Deeply frozen, deterministically ordered copy of the graph.
     */
    snapshot(): GraphSnapshot {
        const entities = this.graph
            .mapNodes((_, attributes) => structuredClone(attributes.entity))
            .sort((a, b) => a.id.localeCompare(b.id));
        const relations = this.graph
            .mapEdges((_, attributes) => structuredClone(attributes.relation))
            .sort((a, b) => a.key.localeCompare(b.key));
        const events = [...this.events.values()]
            .map((e) => structuredClone(e))
            .sort((a, b) => a.key.localeCompare(b.key));
        const temporals = [...this.temporals.values()]
            .map((t) => structuredClone(t))
            .sort((a, b) => a.id.localeCompare(b.id));
        const redirects = Object.fromEntries([...this.redirects].sort(([a], [b]) => a.localeCompare(b)));

        return deepFreeze({ version: SNAPSHOT_VERSION, entities, relations, events, temporals, redirects });
    }

    /**
     * Run `fn`; if it throws, restore the graph to its state before the call.
     */
    transaction<T>(fn: (graph: KnowledgeGraphManager) => T): T {
        const checkpoint = this.checkpoint();
        let result: T;
        try {
            result = fn(this);
        } catch (error) {
            this.restore(checkpoint);
            throw error;
        }
        this.release(checkpoint);
        return result;
    }

    /**
     * Start recording undo steps for the writes that follow. Checkpoints nest.
     */
    checkpoint(): UndoMark {
        return this.log.checkpoint();
    }

    /**
     * Undo every write since `checkpoint`.
     */
    restore(checkpoint: UndoMark): void {
        this.log.rollback(checkpoint);
    }

    /**
     * Keep the writes since `checkpoint`.
     */
    release(checkpoint: UndoMark): void {
        this.log.release(checkpoint);
    }

    /**
     * Check the graph invariants. Returns one message per violation.
     */
    validate(): string[] {
        const problems: string[] = [];

        this.graph.forEachNode((node, { entity }) => {
            if (entity.id !== node) problems.push(`node ${node} carries entity ${entity.id}`);
            if (entity.retiredInto !== null) problems.push(`node ${node} is retired`);
            if (this.redirects.has(node)) problems.push(`node ${node} is also a redirect source`);
        });
        this.graph.forEachEdge((edge, { relation }, source, target) => {
            if (source === target) problems.push(`relation ${edge} is a self-loop`);
            if (relation.key !== edge) problems.push(`relation ${edge} stored under the wrong key`);
            if (relation.subjectId !== source || relation.objectId !== target) {
                problems.push(`relation ${edge} endpoints do not match its edge`);
            }
            if (relation.temporalId !== null && !this.temporals.has(relation.temporalId)) {
                problems.push(`relation ${edge} references missing temporal ${relation.temporalId}`);
            }
        });
        for (const event of this.events.values()) {
            for (const [role, id] of Object.entries(event.roles)) {
                if (id !== null && !this.graph.hasNode(id)) {
                    problems.push(`event ${event.key} role ${role} references missing entity ${id}`);
                }
            }
            if (distinctRoles(event.roles).collapsed) {
                problems.push(`event ${event.key} holds one entity in two roles`);
            }
            if (Object.values(event.roles).every((id) => id === null)) {
                problems.push(`event ${event.key} has no filled role`);
            }
        }
        for (const [from, to] of this.redirects) {
            if (!this.graph.hasNode(to)) problems.push(`redirect ${from} → ${to} does not end at a live entity`);
        }

        return problems;
    }

    // ---- Internals ----

    private *walk(filter: GraphQueryFilter): Generator<GraphItem> {
        const focus = filter.entityId !== undefined ? this.resolve(filter.entityId) : undefined;
        const minConfidence = filter.minConfidence ?? 0;

        if (!filter.kind || filter.kind === 'entity') {
            for (const node of [...this.graph.nodes()].sort()) {
                const entity = this.graph.getNodeAttribute(node, 'entity');
                if (focus !== undefined && node !== focus) continue;
                if (filter.entityType && entity.type !== filter.entityType) continue;
                if (entity.confidence < minConfidence) continue;
                yield { kind: 'entity', entity: structuredClone(entity) };
            }
        }

        if (!filter.kind || filter.kind === 'relation') {
            for (const edge of [...this.graph.edges()].sort()) {
                const relation = this.graph.getEdgeAttribute(edge, 'relation');
                if (focus !== undefined && relation.subjectId !== focus && relation.objectId !== focus) continue;
                if (filter.predicate && relation.predicate !== filter.predicate) continue;
                if (relation.confidence < minConfidence) continue;
                if (filter.entityType && !this.touchesType(filter.entityType, [relation.subjectId, relation.objectId])) {
                    continue;
                }
                yield { kind: 'relation', relation: structuredClone(relation) };
            }
        }

        if (!filter.kind || filter.kind === 'event') {
            for (const key of [...this.events.keys()].sort()) {
                const event = this.events.get(key);
                if (!event) continue;
                const fillers = Object.values(event.roles).filter((id): id is string => id !== null);
                if (focus !== undefined && !fillers.includes(focus)) continue;
                if (filter.eventType && event.type !== filter.eventType) continue;
                if (event.confidence < minConfidence) continue;
                if (filter.entityType && !this.touchesType(filter.entityType, fillers)) continue;
                yield { kind: 'event', event: structuredClone(event) };
            }
        }
    }

    private touchesType(type: Entity['type'], ids: readonly string[]): boolean {
        return ids.some((id) => this.graph.hasNode(id) && this.graph.getNodeAttribute(id, 'entity').type === type);
    }

    private requireNode(id: string, what: string): void {
        if (!this.graph.hasNode(id)) {
            throw new InvariantViolationError(`Unknown ${what}: ${id}`, { entityId: id });
        }
    }

    /**
     * Store a relation with resolved endpoints; on a key collision the higher
     * confidence wins.
     */
    private putRelation(relation: Relation): UpsertStatus {
        if (!this.graph.hasEdge(relation.key)) {
            this.graph.addDirectedEdgeWithKey(relation.key, relation.subjectId, relation.objectId, { relation });
            this.log.record(() => this.graph.dropEdge(relation.key));
            return 'created';
        }
        const current = this.graph.getEdgeAttribute(relation.key, 'relation');
        if (current.confidence >= relation.confidence) return 'unchanged';
        this.graph.setEdgeAttribute(relation.key, 'relation', relation);
        this.log.record(() => this.graph.setEdgeAttribute(relation.key, 'relation', current));
        return 'updated';
    }

    // Graph writes that record their own undo step

    private addNode(entity: Entity): void {
        this.graph.addNode(entity.id, { entity });
        this.log.record(() => this.graph.dropNode(entity.id));
    }

    private setNode(entity: Entity): void {
        const previous = this.graph.getNodeAttribute(entity.id, 'entity');
        this.graph.setNodeAttribute(entity.id, 'entity', entity);
        this.log.record(() => this.graph.setNodeAttribute(entity.id, 'entity', previous));
    }

    /**
     * Drop a node whose edges are already gone.
     */
    private dropNode(id: string): void {
        const entity = this.graph.getNodeAttribute(id, 'entity');
        this.graph.dropNode(id);
        this.log.record(() => this.graph.addNode(id, { entity }));
    }

    private dropEdge(relation: Relation): void {
        this.graph.dropEdge(relation.key);
        this.log.record(() =>
            this.graph.addDirectedEdgeWithKey(relation.key, relation.subjectId, relation.objectId, { relation })
        );
    }

    private load(snapshot: GraphSnapshot): void {
        this.graph = new MultiDirectedGraph<NodeAttributes, EdgeAttributes>({ allowSelfLoops: false });
        this.events = new Map();
        this.temporals = new Map();
        this.redirects = new Map(Object.entries(snapshot.redirects));

        for (const entity of snapshot.entities) {
            this.graph.addNode(entity.id, { entity: structuredClone(entity) });
        }
        for (const temporal of snapshot.temporals) {
            this.temporals.set(temporal.id, structuredClone(temporal));
        }
        for (const relation of snapshot.relations) {
            this.graph.addDirectedEdgeWithKey(relation.key, relation.subjectId, relation.objectId, {
                relation: structuredClone(relation),
            });
        }
        for (const event of snapshot.events) {
            this.events.set(event.key, structuredClone(event));
        }
    }
}

function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function sameRoles(a: Record<string, string | null>, b: Record<string, string | null>): boolean {
    const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
    return [...keys].every((key) => (a[key] ?? null) === (b[key] ?? null));
}
