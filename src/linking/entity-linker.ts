import type { Entity, LinkingConfig, MergeRecord, Mention, ReviewItem } from '../types/index.js';
import { getLexicon, type Lexicon } from '../nlp/lexicon.js';
import { charNgrams, cosineSimilarity, nameSimilarity, normalizeName } from '../nlp/similarity.js';
import { getLogger } from '../utils/logger.js';
import type { EntityRegistry } from './entity-registry.js';

const logger = getLogger();

/**
 * Pluggable semantic similarity between two surface names, in [0, 1].
 */
export interface SemanticMatcher {
    similarity(a: string, b: string): number;
}

/**
 * Character n-gram cosine over normalized names.
 */
export class NgramSemanticMatcher implements SemanticMatcher {
    private readonly cache = new Map<string, Map<string, number>>();

    constructor(
        private readonly n: number,
        private readonly lexicon: Lexicon = getLexicon()
    ) {}

    similarity(a: string, b: string): number {
        return cosineSimilarity(this.vector(a), this.vector(b));
    }

    private vector(name: string): Map<string, number> {
        let vector = this.cache.get(name);
        if (!vector) {
            vector = charNgrams(normalizeName(name, this.lexicon), this.n);
            this.cache.set(name, vector);
        }
        return vector;
    }
}

export interface LinkResult {
    mentionId: string;

    /** Live entity the mention belongs to after linking */
    entityId: string;

    /** A new entity was created for the mention */
    created: boolean;

    /** Merge applied while linking the mention, if any */
    merge: MergeRecord | null;
}

export interface LinkBatchResult {
    /** Mention id → live entity id, resolved after the whole batch */
    mapping: Map<string, string>;

    /** Live entities created or changed by the batch, sorted by id */
    touched: Entity[];

    merges: MergeRecord[];

    /** Pending review items involving touched entities */
    reviews: ReviewItem[];
}

interface Match {
    entityId: string;
    score: number;
    surface: string;
}

/**
 * Resolves mentions to canonical entities in an `EntityRegistry`.
 *
 * A mention links to every live entity of its type that has an alias scoring
 * at or above `mergeThreshold`; when it links to several, they are merged into
 * the earliest created one. Linking is therefore the connected components of
 * the pairwise link relation, and the resulting partition does not depend on
 * the order mentions arrive in. Scores in [reviewThreshold, mergeThreshold)
 * are recorded as review items and never applied.
 */
export class EntityLinker {
    private readonly semantic: SemanticMatcher | null;

    constructor(
        private readonly registry: EntityRegistry,
        private readonly options: LinkingConfig,
        private readonly lexicon: Lexicon = getLexicon(),
        semantic?: SemanticMatcher
    ) {
        this.semantic = options.semantic.enabled
            ? (semantic ?? new NgramSemanticMatcher(options.semantic.ngram, lexicon))
            : null;
    }

    link(mention: Mention): LinkResult {
        // A known mention id only short-circuits when it still names the same surface
        const existing = this.registry.entityForMention(mention.id);
        if (existing !== undefined && this.registry.aliasesOf(existing).includes(mention.text)) {
            return { mentionId: mention.id, entityId: existing, created: false, merge: null };
        }

        const { links, reviews } = this.score(mention);

        let entityId: string;
        let created = false;
        let merge: MergeRecord | null = null;

        if (links.length === 0) {
            entityId = this.registry.createEntity(mention, normalizeName(mention.text, this.lexicon)).id;
            created = true;
        } else {
            const targets = links
                .map((m) => this.registry.get(m.entityId))
                .filter((e): e is Entity => e !== undefined)
                .sort((a, b) => a.createdSeq - b.createdSeq);
            const survivor = targets[0];
            if (!survivor) throw new Error(`Linked entities vanished for mention ${mention.id}`);

            entityId = survivor.id;
            const retired = targets.slice(1).map((e) => e.id);
            if (retired.length > 0) {
                merge = this.registry.merge(
                    survivor.id,
                    retired,
                    Math.min(...links.map((m) => m.score)),
                    mention.id
                );
                logger.debug({ survivor: survivor.id, retired }, 'Merged entities');
            }
            this.registry.attach(entityId, mention);
        }

        for (const review of reviews) {
            this.registry.addReview({
                entityIds: [entityId, review.entityId],
                surfaces: [mention.text, review.surface],
                score: review.score,
                reason: 'needs-review',
            });
        }

        return { mentionId: mention.id, entityId: this.registry.resolve(entityId), created, merge };
    }

    /**
     * Link a batch of mentions in order.
     */
    linkAll(mentions: readonly Mention[]): LinkBatchResult {
        const merges: MergeRecord[] = [];
        const touchedIds = new Set<string>();

        for (const mention of mentions) {
            const result = this.link(mention);
            if (result.merge) merges.push(result.merge);
            touchedIds.add(result.entityId);
        }

        const mapping = new Map<string, string>();
        for (const mention of mentions) {
            const id = this.registry.entityForMention(mention.id);
            if (id !== undefined) mapping.set(mention.id, id);
        }

        const liveTouched = new Set([...touchedIds].map((id) => this.registry.resolve(id)));
        const touched = [...liveTouched]
            .map((id) => this.registry.get(id))
            .filter((e): e is Entity => e !== undefined)
            .sort((a, b) => a.id.localeCompare(b.id));
        const reviews = this.registry
            .reviewItems()
            .filter((item) => item.entityIds.some((id) => liveTouched.has(id)));

        return { mapping, touched, merges, reviews };
    }

    /**
     * Merge two entities by hand (e.g. an accepted review item). The earlier
     * created entity survives.
     */
    merge(a: string, b: string): MergeRecord | null {
        const first = this.registry.get(a);
        const second = this.registry.get(b);
        if (!first || !second) {
            throw new Error(`Unknown entity: ${!first ? a : b}`);
        }
        if (first.id === second.id) return null;

        const [survivor, retired] = first.createdSeq <= second.createdSeq ? [first, second] : [second, first];
        return this.registry.merge(survivor.id, [retired.id], 1, null);
    }

    /**
     * Best score per live entity of the mention's type, split into links and
     * review candidates.
     */
    private score(mention: Mention): { links: Match[]; reviews: Match[] } {
        const { mergeThreshold, reviewThreshold } = this.options;
        const normalized = normalizeName(mention.text, this.lexicon);
        const links: Match[] = [];
        const reviews: Match[] = [];

        for (const entity of this.registry.live(mention.type)) {
            let best: Match = { entityId: entity.id, score: 0, surface: entity.name };
            for (const alias of entity.aliases) {
                const score =
                    normalizeName(alias, this.lexicon) === normalized
                        ? 1
                        : nameSimilarity(mention.text, alias, this.lexicon);
                if (score > best.score) best = { entityId: entity.id, score, surface: alias };
            }

            // Semantic hits compete on the same scale; one below mergeThreshold is only reviewed
            if (best.score < mergeThreshold && this.semantic) {
                for (const alias of entity.aliases) {
                    const score = this.semantic.similarity(mention.text, alias);
                    if (score >= this.options.semantic.threshold && score > best.score) {
                        best = { entityId: entity.id, score, surface: alias };
                    }
                }
            }

            if (best.score >= mergeThreshold) links.push(best);
            else if (best.score >= reviewThreshold && best.score > 0) reviews.push(best);
        }

        return { links, reviews };
    }
}
