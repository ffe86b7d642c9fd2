import type { Entity, MergeRecord, Mention, MentionType, ReviewItem } from '../types/index.js';
import { InvariantViolationError } from '../utils/errors.js';
import { shortHash } from '../utils/hash.js';
import { UndoLog, type UndoMark } from '../utils/undo-log.js';

interface SurfaceStats {
    count: number;

    /** Sequence number of the first mention using this surface */
    firstSeq: number;
}

interface EntityRecord {
    entity: Entity;
    surfaces: Map<string, SurfaceStats>;
    confidenceSum: number;
}

interface RegistryState {
    records: Map<string, EntityRecord>;

    /** Mention id → entity id at link time (resolve through redirects) */
    mentions: Map<string, string>;

    /** Retired id → surviving id, kept flat (never a chain) */
    redirects: Map<string, string>;

    reviews: Map<string, ReviewItem>;
    seq: number;
}

/**
 * Open checkpoint, closed by `restore()` or `release()`.
 */
export type RegistryCheckpoint = UndoMark;

export interface RegistrySnapshot {
    entities: Entity[];
    redirects: Record<string, string>;
    reviews: ReviewItem[];
}

function reviewKey(a: string, b: string): string {
    return a < b ? `${a}|${b}` : `${b}|${a}`;
}

function emptyState(): RegistryState {
    return { records: new Map(), mentions: new Map(), redirects: new Map(), reviews: new Map(), seq: 0 };
}

/**
 * Canonical entity registry: the one piece of shared state in the pipeline.
 *
 * It is an explicit object passed to the linker and mutated by a single
 * writer. Entities are never deleted; a merge marks the losing entity retired
 * and records a redirect to the survivor.
 */
export class EntityRegistry {
    private readonly state: RegistryState = emptyState();
    private readonly log = new UndoLog();

    /**
     * Rebuild a registry from persisted live entities, redirects and pending reviews.
     */
    static fromSnapshot(snapshot: Partial<RegistrySnapshot>): EntityRegistry {
        const registry = new EntityRegistry();
        const state = registry.state;

        const entities = [...(snapshot.entities ?? [])].sort((a, b) => a.createdSeq - b.createdSeq);
        for (const entity of entities) {
            const surfaces = new Map<string, SurfaceStats>();
            for (const alias of entity.aliases) {
                surfaces.set(alias, { count: alias === entity.name ? 2 : 1, firstSeq: entity.createdSeq });
            }
            state.records.set(entity.id, {
                entity: structuredClone(entity),
                surfaces,
                confidenceSum: entity.confidence * entity.mentionIds.length,
            });
            for (const mentionId of entity.mentionIds) {
                state.mentions.set(mentionId, entity.id);
            }
            state.seq = Math.max(state.seq, entity.createdSeq + 1);
        }
        for (const [retired, survivor] of Object.entries(snapshot.redirects ?? {})) {
            state.redirects.set(retired, survivor);
        }
        for (const item of snapshot.reviews ?? []) {
            state.reviews.set(item.key, structuredClone(item));
        }
        return registry;
    }

    // ---- Reads ----

    /**
     * Follow redirects to the live id.
     */
    resolve(id: string): string {
        return this.state.redirects.get(id) ?? id;
    }

    get(id: string): Entity | undefined {
        const record = this.state.records.get(this.resolve(id));
        return record ? structuredClone(record.entity) : undefined;
    }

    has(id: string): boolean {
        return this.state.records.has(id);
    }

    isLive(id: string): boolean {
        const record = this.state.records.get(id);
        return record !== undefined && record.entity.retiredInto === null;
    }

    /**
     * Live entities (optionally of one type), in creation order.
     */
    live(type?: MentionType): Entity[] {
        return this.liveRecords(type).map((r) => structuredClone(r.entity));
    }

    /**
     * Live entity id for a linked mention, or undefined.
     */
    entityForMention(mentionId: string): string | undefined {
        const id = this.state.mentions.get(mentionId);
        return id === undefined ? undefined : this.resolve(id);
    }

    /**
     * Known surface forms of a live entity.
     */
    aliasesOf(id: string): readonly string[] {
        return this.state.records.get(this.resolve(id))?.entity.aliases ?? [];
    }

    reviewItems(): ReviewItem[] {
        return [...this.state.reviews.values()]
            .map((item) => structuredClone(item))
            .sort((a, b) => a.key.localeCompare(b.key));
    }

    redirects(): Record<string, string> {
        return Object.fromEntries([...this.state.redirects].sort(([a], [b]) => a.localeCompare(b)));
    }

    toSnapshot(): RegistrySnapshot {
        return {
            entities: this.live().sort((a, b) => a.id.localeCompare(b.id)),
            redirects: this.redirects(),
            reviews: this.reviewItems(),
        };
    }

    // ---- Checkpointing ----

    /**
     * Start recording undo steps. Cheap: only what changes afterwards is copied.
     */
    checkpoint(): RegistryCheckpoint {
        return this.log.checkpoint();
    }

    /**
     * Undo every write since `checkpoint`.
     */
    restore(checkpoint: RegistryCheckpoint): void {
        this.log.rollback(checkpoint);
    }

    /**
     * Keep the writes since `checkpoint`.
     */
    release(checkpoint: RegistryCheckpoint): void {
        this.log.release(checkpoint);
    }

    // ---- Writes (single writer) ----

    /**
     * Create a live entity from its first mention.
     */
    createEntity(mention: Mention, normalizedName: string): Entity {
        const seq = this.nextSeq();
        const id = this.allocateId(mention.type, normalizedName);
        const entity: Entity = {
            id,
            name: mention.text,
            type: mention.type,
            aliases: [mention.text],
            mentionIds: [mention.id],
            confidence: mention.confidence,
            createdSeq: seq,
            retiredInto: null,
        };
        this.log.set(this.state.records, id, {
            entity,
            surfaces: new Map([[mention.text, { count: 1, firstSeq: seq }]]),
            confidenceSum: mention.confidence,
        });
        this.log.set(this.state.mentions, mention.id, id);
        return structuredClone(entity);
    }

    /**
     * Attach a mention to a live entity.
     */
    attach(entityId: string, mention: Mention): Entity {
        const record = this.requireLive(entityId);
        this.journal(record);
        const seq = this.nextSeq();
        const stats = record.surfaces.get(mention.text);
        if (stats) stats.count++;
        else record.surfaces.set(mention.text, { count: 1, firstSeq: seq });

        record.confidenceSum += mention.confidence;
        record.entity.mentionIds = [...new Set([...record.entity.mentionIds, mention.id])].sort();
        this.refresh(record);
        this.log.set(this.state.mentions, mention.id, record.entity.id);
        return structuredClone(record.entity);
    }

    /**
     * Merge `retiredIds` into `survivorId`. Every precondition is checked
     * before anything changes; on violation the registry is untouched.
     */
    merge(survivorId: string, retiredIds: readonly string[], confidence: number, mentionId: string | null): MergeRecord {
        const survivor = this.state.records.get(survivorId);
        if (!survivor || survivor.entity.retiredInto !== null) {
            throw new InvariantViolationError(`Merge survivor ${survivorId} is not a live entity`, { survivorId });
        }
        const unique = [...new Set(retiredIds)];
        const retired: EntityRecord[] = [];
        for (const id of unique) {
            const record = this.state.records.get(id);
            if (id === survivorId || !record || record.entity.retiredInto !== null) {
                throw new InvariantViolationError(`Cannot retire ${id} into ${survivorId}`, { survivorId, retiredId: id });
            }
            if (record.entity.type !== survivor.entity.type) {
                throw new InvariantViolationError(
                    `Cannot merge ${record.entity.type} ${id} into ${survivor.entity.type} ${survivorId}`,
                    { survivorId, retiredId: id }
                );
            }
            retired.push(record);
        }

        this.journal(survivor);
        for (const record of retired) {
            this.journal(record);
            for (const [surface, stats] of record.surfaces) {
                const existing = survivor.surfaces.get(surface);
                survivor.surfaces.set(
                    surface,
                    existing
                        ? { count: existing.count + stats.count, firstSeq: Math.min(existing.firstSeq, stats.firstSeq) }
                        : { ...stats }
                );
            }
            survivor.confidenceSum += record.confidenceSum;
            survivor.entity.mentionIds = [...new Set([...survivor.entity.mentionIds, ...record.entity.mentionIds])].sort();
            record.entity.retiredInto = survivorId;

            for (const [from, to] of this.state.redirects) {
                if (to === record.entity.id) this.log.set(this.state.redirects, from, survivorId);
            }
            this.log.set(this.state.redirects, record.entity.id, survivorId);
            for (const mention of record.entity.mentionIds) {
                this.log.set(this.state.mentions, mention, survivorId);
            }
        }
        this.refresh(survivor);
        this.rekeyReviews();

        return { survivorId, retiredIds: unique, confidence, mentionId };
    }

    /**
     * Record a pair the linker would not merge on its own. A pair already on
     * file keeps its higher score.
     */
    addReview(item: Omit<ReviewItem, 'key'>): void {
        const [a, b] = item.entityIds.map((id) => this.resolve(id));
        if (a === undefined || b === undefined || a === b) return;

        const key = reviewKey(a, b);
        const existing = this.state.reviews.get(key);
        if (existing && existing.score >= item.score) return;
        this.log.set(this.state.reviews, key, { ...item, key, entityIds: a < b ? [a, b] : [b, a], surfaces: a < b ? item.surfaces : [item.surfaces[1], item.surfaces[0]] });
    }

    /**
     * Drop a review item (after a reviewer accepted or rejected it).
     */
    dismissReview(key: string): boolean {
        return this.log.delete(this.state.reviews, key);
    }

    // ---- Internals ----

    private liveRecords(type?: MentionType): EntityRecord[] {
        return [...this.state.records.values()]
            .filter((r) => r.entity.retiredInto === null && (type === undefined || r.entity.type === type))
            .sort((a, b) => a.entity.createdSeq - b.entity.createdSeq);
    }

    private nextSeq(): number {
        const seq = this.state.seq;
        this.log.record(() => {
            this.state.seq = seq;
        });
        this.state.seq = seq + 1;
        return seq;
    }

    /**
     * Record a copy of `record` so a rollback can put it back; call before mutating it.
     */
    private journal(record: EntityRecord): void {
        if (!this.log.recording) return;
        const before = structuredClone(record);
        this.log.record(() => {
            this.state.records.set(before.entity.id, before);
        });
    }

    private requireLive(id: string): EntityRecord {
        const record = this.state.records.get(this.resolve(id));
        if (!record || record.entity.retiredInto !== null) {
            throw new InvariantViolationError(`Entity ${id} is not live`, { entityId: id });
        }
        return record;
    }

    private allocateId(type: MentionType, normalizedName: string): string {
        const base = `ent_${shortHash(`${type}|${normalizedName}`, 12)}`;
        let id = base;
        for (let n = 2; this.state.records.has(id) || this.state.redirects.has(id); n++) {
            id = `${base}_${n}`;
        }
        return id;
    }

    /**
     * Recompute the derived fields of an entity from its surface statistics.
     */
    private refresh(record: EntityRecord): void {
        const ranked = [...record.surfaces].sort(
            ([, a], [, b]) => b.count - a.count || a.firstSeq - b.firstSeq
        );
        record.entity.name = ranked[0]?.[0] ?? record.entity.name;
        record.entity.aliases = [...record.surfaces.keys()].sort();
        const count = record.entity.mentionIds.length;
        record.entity.confidence = count > 0 ? record.confidenceSum / count : 0;
    }

    /**
     * Re-key review items through redirects; drop those now inside one entity.
     */
    private rekeyReviews(): void {
        const items = [...this.state.reviews.values()];
        for (const key of [...this.state.reviews.keys()]) {
            this.log.delete(this.state.reviews, key);
        }
        for (const item of items) {
            this.addReview(item);
        }
    }
}
