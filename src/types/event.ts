import type { MentionType } from './mention.js';
import type { Evidence } from './relation.js';

/**
 * Event types the extractor recognizes.
 */
export type EventType =
    | 'investment-event'
    | 'acquisition-event'
    | 'cooperation-event'
    | 'product-launch'
    | 'personnel-change'
    | 'financial-report';

/** Which side of the trigger a role filler is usually found on */
export type RolePosition = 'before' | 'after' | 'any';

export interface RoleSchema {
    name: string;
    types: MentionType[];
    position: RolePosition;
    required: boolean;
}

export interface EventSchema {
    type: EventType;
    roles: RoleSchema[];

    /** Non-entity slots the schema reads from the text (e.g. 'amount') */
    attributes: string[];
}

/**
 * Event frame over mentions, as produced by an event extractor.
 */
export interface ExtractedEvent {
    id: string;
    type: EventType;

    /** Role name → mention id (null when unfilled), in schema order */
    roles: Record<string, string | null>;

    attributes: Record<string, string>;
    trigger: string;
    evidence: Evidence;
    temporalId: string | null;
    confidence: number;

    /** False when a required role is unfilled */
    complete: boolean;
}

/**
 * An event candidate that was rejected, with the reason.
 */
export interface RejectedEvent {
    type: EventType;
    trigger: string;
    reason: string;
}

/**
 * Event over canonical entities, as stored in the graph.
 */
export interface GraphEvent {
    /** `type|fingerprint` */
    key: string;
    type: EventType;

    /** Role name → entity id (null when unfilled) */
    roles: Record<string, string | null>;

    attributes: Record<string, string>;
    evidence: Evidence;
    temporalId: string | null;
    confidence: number;
    complete: boolean;
}
