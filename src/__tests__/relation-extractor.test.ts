import { describe, it, expect } from 'vitest';
import { createMentionExtractor } from '../extraction/mention-extractor.js';
import {
    CooccurrenceRelationExtractor,
    createRelationExtractors,
    extractRelations,
    type RelationFilterOptions,
} from '../extraction/relation-extractor.js';
import type { Document, ExtractedRelation, Mention, Predicate, RelationExtractor } from '../types/index.js';

const mentionExtractor = createMentionExtractor({ confidenceFloor: 0.5, knownEntities: [] });
const window = { proximityWindow: 150, sentenceScoped: true };
const filters: RelationFilterOptions = { confidenceFloor: 0.5, mutuallyExclusive: [['competition', 'subsidiary']] };

function doc(text: string, id = 'd1'): Document {
    return { id, text, category: null, referenceDate: null };
}

function run(text: string): { document: Document; mentions: Mention[]; relations: ExtractedRelation[] } {
    const document = doc(text);
    const mentions = mentionExtractor.extract(document);
    const { relations } = extractRelations(
        document,
        mentions,
        createRelationExtractors({ ...window, cooccurrence: false }),
        filters
    );
    return { document, mentions, relations };
}

describe('Relation extraction', () => {
    it('should read a cooperation from a trigger between the mentions', () => {
        const { relations } = run('On August 15 2023, Company A announced a strategic cooperation with Company B');

        expect(relations).toHaveLength(1);
        expect(relations[0]).toMatchObject({
            subjectMentionId: 'd1:19-28',
            predicate: 'cooperation',
            objectMentionId: 'd1:68-77',
            confidence: 0.85,
            method: 'trigger',
            trigger: 'cooperation with',
            temporalId: null,
        });
        expect(relations[0]?.evidence.span).toEqual({ start: 19, end: 77 });
        expect(relations[0]?.evidence.text).toBe('Company A announced a strategic cooperation with Company B');
    });

    it('should flip the direction for the passive voice', () => {
        const { relations } = run('Company B was acquired by Company A.');

        expect(relations).toHaveLength(1);
        expect(relations[0]).toMatchObject({
            subjectMentionId: 'd1:26-35',
            predicate: 'acquisition',
            objectMentionId: 'd1:0-9',
            confidence: 0.85,
        });
        expect(relations[0]?.evidence.span).toEqual({ start: 0, end: 35 });
    });

    it('should prefer a trigger over the type-pair fallback', () => {
        const { relations } = run('Jane Doe, CEO of Acme Holdings, spoke.');

        expect(relations).toHaveLength(1);
        expect(relations[0]).toMatchObject({
            predicate: 'employment',
            method: 'trigger',
            trigger: 'ceo of',
            confidence: 0.85,
            subjectMentionId: 'd1:0-8',
            objectMentionId: 'd1:17-30',
        });
    });

    it('should give the same fingerprint to the same evidence', () => {
        const first = run('Company B was acquired by Company A.').relations[0];
        const second = run('Company B was acquired by Company A.').relations[0];
        expect(first?.evidence.fingerprint).toBe(second?.evidence.fingerprint);
        expect(first?.id).toBe(second?.id);
    });

    it('should not pair mentions across sentences when sentence scoped', () => {
        const document = doc('Company A grew. Company B fell.');
        const mentions = mentionExtractor.extract(document);

        expect(new CooccurrenceRelationExtractor(window).extract(document, mentions)).toEqual([]);

        const unscoped = new CooccurrenceRelationExtractor({ proximityWindow: 150, sentenceScoped: false }).extract(
            document,
            mentions
        );
        expect(unscoped).toHaveLength(1);
        expect(unscoped[0]).toMatchObject({ predicate: 'related', confidence: 0.5, method: 'co-occurrence' });
    });

    it('should respect the proximity window', () => {
        const document = doc('Company A grew. Company B fell.');
        const mentions = mentionExtractor.extract(document);
        const narrow = new CooccurrenceRelationExtractor({ proximityWindow: 5, sentenceScoped: false });
        expect(narrow.extract(document, mentions)).toEqual([]);
    });

    it('should return nothing for fewer than two mentions', () => {
        expect(run('Company A grew.').relations).toEqual([]);
    });
});

describe('Relation filtering', () => {
    const document = doc('Alpha and Beta');

    const candidate = (
        predicate: Predicate,
        confidence: number,
        subject = 'd1:0-5',
        object = 'd1:10-14'
    ): ExtractedRelation => ({
        id: `${predicate}-${subject}`,
        subjectMentionId: subject,
        predicate,
        objectMentionId: object,
        evidence: { documentId: 'd1', span: { start: 0, end: 14 }, text: 'Alpha and Beta', fingerprint: predicate },
        confidence,
        method: 'trigger',
        trigger: null,
        temporalId: null,
    });

    const stub = (relations: ExtractedRelation[]): RelationExtractor => ({
        name: 'stub',
        extract: () => relations,
    });

    it('should keep only the strongest of mutually exclusive predicates', () => {
        const result = extractRelations(document, [], [stub([candidate('competition', 0.7), candidate('subsidiary', 0.85)])], filters);

        expect(result.relations.map((r) => r.predicate)).toEqual(['subsidiary']);
        expect(result.dropped).toEqual([
            { relation: candidate('competition', 0.7), reason: 'mutually exclusive with subsidiary' },
        ]);
    });

    it('should let a specific predicate supersede related, in either direction', () => {
        const result = extractRelations(
            document,
            [],
            [stub([candidate('related', 0.5), candidate('investment', 0.85, 'd1:10-14', 'd1:0-5')])],
            filters
        );

        expect(result.relations.map((r) => r.predicate)).toEqual(['investment']);
        expect(result.dropped.map((d) => d.reason)).toEqual(['superseded by investment']);
    });

    it('should drop relations under the confidence floor', () => {
        const result = extractRelations(document, [], [stub([candidate('supply', 0.4)])], filters);

        expect(result.relations).toEqual([]);
        expect(result.dropped.map((d) => d.reason)).toEqual(['below confidence floor 0.5']);
    });

    it('should collapse duplicates to the highest confidence', () => {
        const result = extractRelations(
            document,
            [],
            [stub([candidate('supply', 0.7)]), stub([candidate('supply', 0.85)])],
            filters
        );

        expect(result.relations).toHaveLength(1);
        expect(result.relations[0]?.confidence).toBe(0.85);
        expect(result.dropped).toEqual([]);
    });
});
