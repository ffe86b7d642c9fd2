import type { MentionType } from './mention.js';

/**
 * Canonical entity: the identity-resolved form of every mention that refers
 * to the same real-world thing.
 */
export interface Entity {
    /** Stable identifier, never reassigned */
    id: string;

    /** Canonical display name (most frequent surface form) */
    name: string;

    type: MentionType;

    /** Known surface forms, sorted */
    aliases: string[];

    /** Contributing mention ids, sorted */
    mentionIds: string[];

    /** Mean confidence of contributing mentions */
    confidence: number;

    /** Creation order inside the registry; lower survives a merge */
    createdSeq: number;

    /** Id of the entity this one was merged into, or null while live */
    retiredInto: string | null;
}

/**
 * Record of one applied merge.
 */
export interface MergeRecord {
    survivorId: string;
    retiredIds: string[];

    /** Lowest link score that justified the merge */
    confidence: number;

    /** Mention whose evidence triggered the merge, or null for a manual merge */
    mentionId: string | null;
}

/**
 * A merge the linker refused to apply on its own: the similarity sits between
 * the review threshold and the merge threshold.
 */
export interface ReviewItem {
    /** Order-independent key `<idA>|<idB>` with idA < idB */
    key: string;

    entityIds: [string, string];

    /** Surface forms whose comparison produced the score */
    surfaces: [string, string];

    score: number;

    reason: string;
}
