import { describe, it, expect, beforeEach } from 'vitest';
import { KnowledgeGraphManager, eventKey, formatTimeDiff, relationKey } from '../graph/knowledge-graph.js';
import { toExportGraph } from '../graph/export-graph.js';
import type { Entity, GraphEvent, Predicate, Relation, TemporalExpression, TemporalValue } from '../types/index.js';
import { InvariantViolationError } from '../utils/errors.js';

function entity(id: string, name = id, type: Entity['type'] = 'organization'): Entity {
    return {
        id,
        name,
        type,
        aliases: [name],
        mentionIds: [`d1:${id}`],
        confidence: 0.9,
        createdSeq: Number(id.replace(/\D/g, '')) || 0,
        retiredInto: null,
    };
}

function relation(
    subjectId: string,
    predicate: Predicate,
    objectId: string,
    fingerprint: string,
    confidence = 0.85,
    temporalId: string | null = null
): Relation {
    return {
        key: relationKey(subjectId, predicate, objectId, fingerprint),
        subjectId,
        predicate,
        objectId,
        evidence: { documentId: 'd1', span: { start: 0, end: 10 }, text: 'evidence', fingerprint },
        confidence,
        method: 'trigger',
        temporalId,
    };
}

function event(roles: Record<string, string | null>, fingerprint = 'fe'): GraphEvent {
    return {
        key: eventKey('cooperation-event', fingerprint),
        type: 'cooperation-event',
        roles,
        attributes: {},
        evidence: { documentId: 'd1', span: { start: 0, end: 10 }, text: 'evidence', fingerprint },
        temporalId: null,
        confidence: 0.9,
        complete: true,
    };
}

const temporal: TemporalExpression = {
    id: 'd1#t3-17',
    documentId: 'd1',
    span: { start: 3, end: 17 },
    text: 'August 15 2023',
    value: { kind: 'point', start: '2023-08-15', end: '2023-08-15', granularity: 'day' },
    basis: 'unknown',
    relative: false,
    confidence: 0.95,
};

function dated(id: string, value: TemporalValue): TemporalExpression {
    return { ...temporal, id, value };
}

describe('KnowledgeGraphManager', () => {
    let graph: KnowledgeGraphManager;

    beforeEach(() => {
        graph = new KnowledgeGraphManager();
        graph.upsertEntity(entity('e1'));
        graph.upsertEntity(entity('e2'));
        graph.upsertEntity(entity('e3'));
    });

    describe('upserts', () => {
        it('should report created, unchanged and updated entities', () => {
            expect(graph.upsertEntity(entity('e4'))).toBe('created');
            expect(graph.upsertEntity(entity('e4'))).toBe('unchanged');
            expect(graph.upsertEntity({ ...entity('e4'), confidence: 0.5 })).toBe('updated');
            expect(graph.entityCount).toBe(4);
        });

        it('should keep the higher confidence for a repeated relation', () => {
            expect(graph.upsertRelation(relation('e1', 'investment', 'e2', 'f1', 0.7)).status).toBe('created');
            expect(graph.upsertRelation(relation('e1', 'investment', 'e2', 'f1', 0.6)).status).toBe('unchanged');
            expect(graph.upsertRelation(relation('e1', 'investment', 'e2', 'f1', 0.9)).status).toBe('updated');
            expect(graph.relationCount).toBe(1);
            expect(graph.getRelations('e1')[0]?.confidence).toBe(0.9);
        });

        it('should keep parallel relations with different evidence', () => {
            graph.upsertRelation(relation('e1', 'investment', 'e2', 'f1'));
            graph.upsertRelation(relation('e1', 'investment', 'e2', 'f2'));
            graph.upsertRelation(relation('e1', 'supply', 'e2', 'f1'));
            expect(graph.relationCount).toBe(3);
        });

        it('should reject relations with a missing endpoint', () => {
            expect(() => graph.upsertRelation(relation('e1', 'investment', 'ghost', 'f1'))).toThrow(
                InvariantViolationError
            );
            expect(graph.relationCount).toBe(0);
        });

        it('should reject relations with an unknown temporal', () => {
            expect(() => graph.upsertRelation(relation('e1', 'investment', 'e2', 'f1', 0.8, 'd1#t0-4'))).toThrow(
                'Unknown temporal expression d1#t0-4'
            );
            graph.upsertTemporal(temporal);
            expect(graph.upsertRelation(relation('e1', 'investment', 'e2', 'f1', 0.8, temporal.id)).status).toBe('created');
        });

        it('should reject events with a missing role filler', () => {
            expect(() => graph.upsertEvent(event({ partner1: 'e1', partner2: 'ghost' }))).toThrow(InvariantViolationError);
            expect(graph.eventCount).toBe(0);
        });

        it('should not re-store an identical event', () => {
            expect(graph.upsertEvent(event({ partner1: 'e1', partner2: 'e2' })).status).toBe('created');
            expect(graph.upsertEvent(event({ partner1: 'e1', partner2: 'e2' })).status).toBe('unchanged');
        });

        it('should keep an entity in only one role of an event', () => {
            const { event: stored } = graph.upsertEvent(event({ partner1: 'e1', partner2: 'e1' }));
            expect(stored.roles).toEqual({ partner1: 'e1', partner2: null });
            expect(stored.complete).toBe(false);
            expect(graph.validate()).toEqual([]);
        });

        it('should refuse retired entities', () => {
            expect(() => graph.upsertEntity({ ...entity('e9'), retiredInto: 'e1' })).toThrow(InvariantViolationError);
        });
    });

    describe('retire', () => {
        it('should rewrite relations and events onto the survivor', () => {
            const r1 = relation('e2', 'investment', 'e3', 'f1', 0.9);
            const r2 = relation('e1', 'investment', 'e3', 'f1', 0.7);
            const r3 = relation('e1', 'cooperation', 'e2', 'f2');
            graph.upsertRelation(r1);
            graph.upsertRelation(r2);
            graph.upsertRelation(r3);
            graph.upsertEvent(event({ partner1: 'e2', partner2: 'e3' }));

            const result = graph.retire('e2', 'e1');

            expect(result.retiredId).toBe('e2');
            expect(result.survivorId).toBe('e1');
            expect([...result.removedRelationKeys].sort()).toEqual([r1.key, r3.key].sort());
            expect(result.rewrittenRelations).toHaveLength(1);
            expect(result.rewrittenRelations[0]).toMatchObject({ key: r2.key, confidence: 0.9 });
            expect(result.updatedEvents.map((e) => e.roles)).toEqual([{ partner1: 'e1', partner2: 'e3' }]);

            expect(graph.entityCount).toBe(2);
            expect(graph.relationCount).toBe(1);
            expect(graph.resolve('e2')).toBe('e1');
            expect(graph.getEntity('e2')?.id).toBe('e1');
            expect(graph.validate()).toEqual([]);
        });

        it('should empty the duplicate role when both fillers merge', () => {
            graph.upsertEvent(event({ partner1: 'e1', partner2: 'e2' }));

            const result = graph.retire('e2', 'e1');

            expect(result.updatedEvents.map((e) => [e.roles, e.complete])).toEqual([
                [{ partner1: 'e1', partner2: null }, false],
            ]);
            expect(graph.getEvent(eventKey('cooperation-event', 'fe'))?.roles).toEqual({ partner1: 'e1', partner2: null });
            expect(graph.validate()).toEqual([]);
        });

        it('should resolve later writes through the redirect', () => {
            graph.retire('e2', 'e1');
            const { relation: stored } = graph.upsertRelation(relation('e2', 'supply', 'e3', 'f9'));
            expect(stored.subjectId).toBe('e1');
            expect(stored.key).toBe(relationKey('e1', 'supply', 'e3', 'f9'));
        });

        it('should flatten redirect chains', () => {
            graph.retire('e3', 'e2');
            graph.retire('e2', 'e1');
            expect(graph.snapshot().redirects).toEqual({ e2: 'e1', e3: 'e1' });
            expect(graph.validate()).toEqual([]);
        });

        it('should leave the graph untouched when the survivor is missing', () => {
            graph.upsertRelation(relation('e1', 'investment', 'e2', 'f1'));
            const before = graph.snapshot();
            expect(() => graph.retire('e2', 'ghost')).toThrow(InvariantViolationError);
            expect(graph.snapshot()).toEqual(before);
        });

        it('should not retire an entity into itself', () => {
            expect(() => graph.retire('e1', 'e1')).toThrow('Cannot retire e1 into itself');
        });

        it('should record redirects for entities that never reached the graph', () => {
            graph.addRedirect('e7', 'e1');
            expect(graph.resolve('e7')).toBe('e1');
            expect(() => graph.addRedirect('e2', 'e1')).toThrow(InvariantViolationError);
        });
    });

    describe('queries', () => {
        beforeEach(() => {
            graph.upsertEntity(entity('p1', 'Jane Doe', 'person'));
            graph.upsertRelation(relation('e1', 'investment', 'e2', 'f1', 0.9));
            graph.upsertRelation(relation('e2', 'supply', 'e3', 'f2', 0.6));
            graph.upsertRelation(relation('p1', 'employment', 'e1', 'f3', 0.55));
            graph.upsertEvent(event({ partner1: 'e1', partner2: 'e3' }));
        });

        it('should filter by kind and predicate', () => {
            const items = [...graph.query({ kind: 'relation', predicate: 'supply' })];
            expect(items).toHaveLength(1);
            expect(items[0]?.kind).toBe('relation');
        });

        it('should filter by entity type and confidence', () => {
            const people = [...graph.query({ kind: 'entity', entityType: 'person' })];
            expect(people.map((i) => (i.kind === 'entity' ? i.entity.id : null))).toEqual(['p1']);

            const strong = [...graph.query({ kind: 'relation', minConfidence: 0.8 })];
            expect(strong).toHaveLength(1);
        });

        it('should filter by entity', () => {
            const touching = [...graph.query({ entityId: 'e3' })].map((i) => i.kind);
            expect(touching).toEqual(['entity', 'relation', 'event']);
        });

        it('should be restartable', () => {
            const result = graph.query({ kind: 'relation' });
            expect([...result]).toHaveLength(3);
            expect([...result]).toHaveLength(3);
        });

        it('should find directed paths', () => {
            const paths = graph.findPaths('p1', 'e3', 3);
            expect(paths).toHaveLength(1);
            expect(paths[0]?.entities).toEqual(['p1', 'e1', 'e2', 'e3']);
            expect(graph.findPaths('e3', 'p1', 3)).toEqual([]);
        });

        it('should cut a neighbourhood subgraph', () => {
            const near = graph.subgraph('e1', 1);
            expect(near.entities.map((e) => e.id)).toEqual(['e1', 'e2', 'p1']);
            expect(near.relations).toHaveLength(2);
            expect(near.events).toEqual([]);

            const wider = graph.subgraph('e1', 2);
            expect(wider.entities.map((e) => e.id)).toEqual(['e1', 'e2', 'e3', 'p1']);
            expect(wider.relations).toHaveLength(3);
            expect(wider.events).toHaveLength(1);
        });

        it('should count degree per entity', () => {
            expect(graph.entityStatistics('e1')).toEqual({
                degree: 2,
                inDegree: 1,
                outDegree: 1,
                predicates: { investment: 1, employment: 1 },
                events: 1,
            });
            expect(graph.entityStatistics('ghost')).toBeNull();
        });

        it('should rank similar names', () => {
            graph.upsertEntity(entity('e10', 'Acme Holdings'));
            graph.upsertEntity(entity('e11', 'Acme Holding'));
            expect(graph.findSimilarEntities('e10', 1)[0]?.entityId).toBe('e11');
        });
    });

    describe('timeline', () => {
        beforeEach(() => {
            graph.upsertTemporal(dated('d1#t1', { kind: 'point', start: '2023-08-15', end: '2023-08-15', granularity: 'day' }));
            graph.upsertTemporal(dated('d1#t2', { kind: 'point', start: '2023', end: '2023', granularity: 'year' }));
            graph.upsertTemporal(dated('d1#t3', { kind: 'point', start: '2024-01', end: '2024-01', granularity: 'month' }));
            graph.upsertTemporal(dated('d1#t4', { kind: 'point', start: null, end: null, granularity: 'unknown' }));
            graph.upsertEvent({ ...event({ partner1: 'e1', partner2: 'e2' }, 'fa'), temporalId: 'd1#t1' });
            graph.upsertEvent({ ...event({ partner1: 'e1', partner2: 'e3' }, 'fb'), temporalId: 'd1#t2' });
            graph.upsertEvent({ ...event({ partner1: 'e2', partner2: 'e3' }, 'fc'), temporalId: 'd1#t3' });
            graph.upsertEvent({ ...event({ partner1: 'e1', partner2: 'e3' }, 'fd'), temporalId: 'd1#t4' });
            graph.upsertEvent(event({ partner1: 'e1', partner2: 'e2' }, 'fx'));
        });

        it('should order dated events and skip undated ones', () => {
            const { entries } = graph.timeline();
            expect(entries.map((e) => [e.eventKey, e.start, e.granularity])).toEqual([
                ['cooperation-event|fb', '2023', 'year'],
                ['cooperation-event|fa', '2023-08-15', 'day'],
                ['cooperation-event|fc', '2024-01', 'month'],
            ]);
        });

        it('should link only events strictly ordered at the coarser granularity', () => {
            expect(graph.timeline().links).toEqual([
                {
                    fromEventKey: 'cooperation-event|fb',
                    toEventKey: 'cooperation-event|fc',
                    order: 'before',
                    days: 365,
                    timeDiff: '12 months',
                },
                {
                    fromEventKey: 'cooperation-event|fa',
                    toEventKey: 'cooperation-event|fc',
                    order: 'before',
                    days: 139,
                    timeDiff: '4 months',
                },
            ]);
        });

        it('should restrict the timeline to one entity', () => {
            const timeline = graph.timeline('e1');
            expect(timeline.entries.map((e) => e.eventKey)).toEqual(['cooperation-event|fb', 'cooperation-event|fa']);
            expect(timeline.links).toEqual([]);
        });

        it('should describe gaps in the largest whole unit', () => {
            expect(formatTimeDiff(1)).toBe('1 day');
            expect(formatTimeDiff(45)).toBe('1 month');
            expect(formatTimeDiff(800)).toBe('2 years');
        });
    });

    describe('snapshots', () => {
        it('should be frozen copies', () => {
            const snapshot = graph.snapshot();
            expect(Object.isFrozen(snapshot)).toBe(true);
            expect(Object.isFrozen(snapshot.entities[0])).toBe(true);

            graph.upsertEntity(entity('e4'));
            expect(snapshot.entities).toHaveLength(3);
        });

        it('should round-trip through fromSnapshot', () => {
            graph.upsertTemporal(temporal);
            graph.upsertRelation(relation('e1', 'investment', 'e2', 'f1', 0.8, temporal.id));
            graph.upsertEvent(event({ partner1: 'e1', partner2: null }));
            graph.retire('e3', 'e1');

            const rebuilt = KnowledgeGraphManager.fromSnapshot(graph.snapshot());
            expect(rebuilt.snapshot()).toEqual(graph.snapshot());
            expect(rebuilt.validate()).toEqual([]);
        });

        it('should roll back a failed transaction', () => {
            const before = graph.snapshot();
            expect(() =>
                graph.transaction((g) => {
                    g.upsertEntity(entity('e4'));
                    g.upsertRelation(relation('e4', 'investment', 'ghost', 'f1'));
                })
            ).toThrow(InvariantViolationError);
            expect(graph.snapshot()).toEqual(before);
        });

        it('should undo a retire back to a checkpoint', () => {
            graph.upsertRelation(relation('e1', 'investment', 'e3', 'f1', 0.7));
            graph.upsertRelation(relation('e2', 'investment', 'e3', 'f1', 0.9));
            graph.upsertEvent(event({ partner1: 'e1', partner2: 'e2' }));
            const before = graph.snapshot();
            const checkpoint = graph.checkpoint();

            graph.retire('e2', 'e1');
            graph.upsertEntity(entity('e4'));
            graph.upsertTemporal(temporal);
            expect(graph.entityCount).toBe(3);

            graph.restore(checkpoint);
            expect(graph.snapshot()).toEqual(before);
            expect(graph.validate()).toEqual([]);
        });

        it('should undo only the inner of nested checkpoints', () => {
            const outer = graph.checkpoint();
            graph.upsertEntity(entity('e4'));
            const inner = graph.checkpoint();
            graph.upsertEntity(entity('e5'));

            graph.restore(inner);
            expect(graph.entityCount).toBe(4);
            graph.restore(outer);
            expect(graph.entityCount).toBe(3);
        });

        it('should commit a successful transaction', () => {
            const status = graph.transaction((g) => g.upsertEntity(entity('e4')));
            expect(status).toBe('created');
            expect(graph.entityCount).toBe(4);
        });
    });

    describe('toExportGraph', () => {
        it('should turn events into nodes with role edges', () => {
            graph.upsertRelation(relation('e1', 'cooperation', 'e2', 'f1'));
            graph.upsertEvent(event({ partner1: 'e1', partner2: 'e2' }));

            const exported = toExportGraph(graph.snapshot());
            expect(exported.nodes.map((n) => [n.id, n.type])).toEqual([
                ['e1', 'organization'],
                ['e2', 'organization'],
                ['e3', 'organization'],
                ['cooperation-event|fe', 'event'],
            ]);
            expect(exported.edges).toEqual([
                { source: 'e1', target: 'e2', label: 'cooperation', type: 'relation' },
                { source: 'cooperation-event|fe', target: 'e1', label: 'partner1', type: 'role' },
                { source: 'cooperation-event|fe', target: 'e2', label: 'partner2', type: 'role' },
            ]);
        });
    });
});
