import { describe, it, expect } from 'vitest';
import { EntityLinker, NgramSemanticMatcher, type SemanticMatcher } from '../linking/entity-linker.js';
import { EntityRegistry } from '../linking/entity-registry.js';
import { DEFAULT_CONFIG, type LinkingConfig, type Mention, type MentionType } from '../types/index.js';
import { InvariantViolationError } from '../utils/errors.js';

let offset = 0;

function mention(text: string, type: MentionType = 'organization', documentId = 'd1'): Mention {
    const start = offset;
    offset += 100;
    return {
        id: `${documentId}:${start}-${start + text.length}`,
        documentId,
        span: { start, end: start + text.length },
        text,
        type,
        confidence: 0.9,
        source: 'test',
    };
}

function linking(overrides: Partial<LinkingConfig> = {}): LinkingConfig {
    return { ...DEFAULT_CONFIG.linking, ...overrides };
}

function permutations<T>(items: readonly T[]): T[][] {
    if (items.length <= 1) return [[...items]];
    return items.flatMap((item, i) =>
        permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest])
    );
}

describe('EntityLinker', () => {
    it('should create an entity for an unseen name', () => {
        const registry = new EntityRegistry();
        const result = new EntityLinker(registry, linking()).link(mention('Company A'));

        expect(result.created).toBe(true);
        expect(result.merge).toBeNull();
        expect(registry.get(result.entityId)).toMatchObject({
            name: 'Company A',
            aliases: ['Company A'],
            type: 'organization',
            confidence: 0.9,
            retiredInto: null,
        });
    });

    it('should link an exact alias to the same entity', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking());
        const first = linker.link(mention('Acme Holdings'));
        const second = linker.link(mention('ACME HOLDINGS'));

        expect(second.created).toBe(false);
        expect(second.entityId).toBe(first.entityId);
        expect(registry.get(first.entityId)?.mentionIds).toHaveLength(2);
    });

    it('should link an abbreviated legal name above the merge threshold', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking({ mergeThreshold: 0.8 }));
        const a = linker.link(mention('Company A'));
        const b = linker.link(mention('Co. A Ltd.', 'organization', 'd2'));

        expect(b.entityId).toBe(a.entityId);
        expect(registry.get(a.entityId)).toMatchObject({ name: 'Company A', aliases: ['Co. A Ltd.', 'Company A'] });
        expect(registry.reviewItems()).toEqual([]);
    });

    it('should record a review item between the thresholds instead of merging', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking({ mergeThreshold: 0.9, reviewThreshold: 0.5 }));
        const a = linker.link(mention('Company A'));
        const b = linker.link(mention('Co. A Ltd.'));

        expect(b.entityId).not.toBe(a.entityId);
        const items = registry.reviewItems();
        expect(items).toHaveLength(1);
        expect(items[0]?.score).toBeCloseTo(0.5 + 0.5 * (9 / 13), 6);
        expect(items[0]?.reason).toBe('needs-review');
        expect([...(items[0]?.entityIds ?? [])].sort()).toEqual([a.entityId, b.entityId].sort());
        expect([...(items[0]?.surfaces ?? [])].sort()).toEqual(['Co. A Ltd.', 'Company A']);
    });

    it('should never link names with different distinctive tokens', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking());
        const a = linker.link(mention('Company A'));
        const b = linker.link(mention('Company B'));

        expect(b.entityId).not.toBe(a.entityId);
        expect(registry.reviewItems()).toEqual([]);
    });

    it('should not link across types', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking());
        const org = linker.link(mention('Jordan', 'organization'));
        const person = linker.link(mention('Jordan', 'person'));

        expect(person.entityId).not.toBe(org.entityId);
        expect(person.created).toBe(true);
    });

    it('should be idempotent for a mention it has seen', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking());
        const m = mention('Acme Holdings');
        const first = linker.link(m);
        const again = linker.link(m);

        expect(again).toEqual({ mentionId: m.id, entityId: first.entityId, created: false, merge: null });
        expect(registry.get(first.entityId)?.mentionIds).toEqual([m.id]);
    });

    it('should link a reused mention id with new text on its own merits', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking());
        const first = linker.link(mention('Company X'));
        const reused: Mention = { ...mention('Company Q'), id: first.mentionId };

        const result = linker.link(reused);

        expect(result.created).toBe(true);
        expect(result.entityId).not.toBe(first.entityId);
        expect(registry.live().map((e) => e.name)).toEqual(['Company X', 'Company Q']);
    });

    it('should produce the same partition in every arrival order', () => {
        const mentions = [
            mention('Company A'),
            mention('Co. A Ltd.'),
            mention('Company B'),
            mention('Acme Holdings'),
            mention('Acme Holdings Ltd.'),
        ];

        const partition = (order: readonly Mention[]): string[][] => {
            const registry = new EntityRegistry();
            new EntityLinker(registry, linking({ mergeThreshold: 0.8 })).linkAll(order);
            return registry
                .live()
                .map((e) => [...e.mentionIds].sort())
                .sort((a, b) => (a[0] ?? '').localeCompare(b[0] ?? ''));
        };

        const expected = partition(mentions);
        expect(expected).toHaveLength(3);
        for (const order of permutations(mentions)) {
            expect(partition(order)).toEqual(expected);
        }
    });

    it('should merge two existing entities bridged by one mention', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking({ mergeThreshold: 0.55, reviewThreshold: 0.5 }));
        const a = linker.link(mention('Alpha Capital'));
        const b = linker.link(mention('Capital Partners Alpha Group'));
        expect(b.entityId).not.toBe(a.entityId);

        const bridge = linker.link(mention('Alpha Capital Partners'));
        expect(bridge.merge).toEqual({
            survivorId: a.entityId,
            retiredIds: [b.entityId],
            confidence: expect.any(Number),
            mentionId: bridge.mentionId,
        });
        expect(registry.resolve(b.entityId)).toBe(a.entityId);
        expect(registry.isLive(b.entityId)).toBe(false);
        expect(registry.live()).toHaveLength(1);
    });

    it('should link through a semantic matcher when enabled', () => {
        const matcher: SemanticMatcher = {
            similarity: (x, y) =>
                [x, y].sort().join('|') === 'IBM|International Business Machines' ? 0.95 : 0,
        };
        const registry = new EntityRegistry();
        const linker = new EntityLinker(
            registry,
            linking({ semantic: { enabled: true, threshold: 0.92, ngram: 3 } }),
            undefined,
            matcher
        );
        const a = linker.link(mention('International Business Machines'));
        const b = linker.link(mention('IBM'));

        expect(b.entityId).toBe(a.entityId);
    });

    it('should only review a semantic hit below the merge threshold', () => {
        const matcher: SemanticMatcher = {
            similarity: (x, y) => ([x, y].sort().join('|') === 'Big Blue|IBM' ? 0.5 : 0),
        };
        const registry = new EntityRegistry();
        const linker = new EntityLinker(
            registry,
            linking({ mergeThreshold: 0.95, reviewThreshold: 0.2, semantic: { enabled: true, threshold: 0.3, ngram: 3 } }),
            undefined,
            matcher
        );
        const a = linker.link(mention('IBM'));
        const b = linker.link(mention('Big Blue'));

        expect(b.entityId).not.toBe(a.entityId);
        expect(b.created).toBe(true);
        expect(registry.reviewItems().map((item) => item.score)).toEqual([0.5]);
    });

    it('should ignore the semantic matcher when disabled', () => {
        const matcher: SemanticMatcher = { similarity: () => 1 };
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking(), undefined, matcher);
        const a = linker.link(mention('International Business Machines'));
        const b = linker.link(mention('IBM'));

        expect(b.entityId).not.toBe(a.entityId);
    });

    it('should keep the earlier entity in a manual merge', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking());
        const a = linker.link(mention('Company A'));
        const b = linker.link(mention('Company B'));

        const record = linker.merge(b.entityId, a.entityId);
        expect(record).toEqual({ survivorId: a.entityId, retiredIds: [b.entityId], confidence: 1, mentionId: null });
        expect(registry.get(b.entityId)?.id).toBe(a.entityId);
        expect(linker.merge(a.entityId, b.entityId)).toBeNull();
    });

    it('should refuse to merge entities of different types', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking());
        const org = linker.link(mention('Acme Holdings'));
        const person = linker.link(mention('Jane Doe', 'person'));
        const before = registry.toSnapshot();

        expect(() => linker.merge(org.entityId, person.entityId)).toThrow(InvariantViolationError);
        expect(registry.toSnapshot()).toEqual(before);
    });
});

describe('NgramSemanticMatcher', () => {
    it('should score identical names as 1 and unrelated names low', () => {
        const matcher = new NgramSemanticMatcher(3);
        expect(matcher.similarity('Acme Holdings', 'ACME holdings')).toBeCloseTo(1);
        expect(matcher.similarity('Acme', 'Zyx')).toBe(0);
    });
});

describe('EntityRegistry', () => {
    it('should restore a checkpoint', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking());
        linker.link(mention('Company A'));
        const checkpoint = registry.checkpoint();

        linker.link(mention('Company B'));
        expect(registry.live()).toHaveLength(2);

        registry.restore(checkpoint);
        expect(registry.live().map((e) => e.name)).toEqual(['Company A']);
    });

    it('should undo merges and reviews back to a checkpoint', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking({ mergeThreshold: 0.55, reviewThreshold: 0.5 }));
        linker.link(mention('Alpha Capital'));
        linker.link(mention('Capital Partners Alpha Group'));
        const before = registry.toSnapshot();
        const checkpoint = registry.checkpoint();

        expect(linker.link(mention('Alpha Capital Partners')).merge).not.toBeNull();
        linker.link(mention('Company Z'));
        expect(registry.live()).toHaveLength(2);

        registry.restore(checkpoint);
        expect(registry.toSnapshot()).toEqual(before);
        expect(registry.live()).toHaveLength(2);
    });

    it('should keep released writes', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking());
        const checkpoint = registry.checkpoint();
        linker.link(mention('Company A'));

        registry.release(checkpoint);
        expect(() => registry.restore(checkpoint)).toThrow('Checkpoint is no longer open');
        expect(registry.live().map((e) => e.name)).toEqual(['Company A']);
    });

    it('should round-trip through a snapshot', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking({ mergeThreshold: 0.9 }));
        const a = linker.link(mention('Company A'));
        linker.link(mention('Co. A Ltd.'));

        const rebuilt = EntityRegistry.fromSnapshot(registry.toSnapshot());
        expect(rebuilt.toSnapshot()).toEqual(registry.toSnapshot());

        const again = new EntityLinker(rebuilt, linking({ mergeThreshold: 0.9 })).link(mention('Company A'));
        expect(again.entityId).toBe(a.entityId);
        expect(again.created).toBe(false);
    });

    it('should hand out copies', () => {
        const registry = new EntityRegistry();
        const { entityId } = new EntityLinker(registry, linking()).link(mention('Company A'));
        const copy = registry.get(entityId);
        copy?.aliases.push('mutated');
        expect(registry.aliasesOf(entityId)).toEqual(['Company A']);
    });

    it('should dismiss review items', () => {
        const registry = new EntityRegistry();
        const linker = new EntityLinker(registry, linking({ mergeThreshold: 0.9 }));
        linker.link(mention('Company A'));
        linker.link(mention('Co. A Ltd.'));
        const [item] = registry.reviewItems();

        expect(item && registry.dismissReview(item.key)).toBe(true);
        expect(registry.reviewItems()).toEqual([]);
    });
});
