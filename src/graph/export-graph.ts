import type { EventType, ExportEdge, ExportGraph, ExportNode, GraphSnapshot, MentionType } from '../types/index.js';

/**
 * Node colors per entity type.
 */
export const ENTITY_COLORS: Record<MentionType, string> = {
    organization: '#6366f1',
    person: '#f59e0b',
    product: '#10b981',
    location: '#3b82f6',
    other: '#64748b',
};

export const EVENT_COLOR = '#ec4899';

/** Edge colors per predicate; role edges use EVENT_COLOR */
export const PREDICATE_COLORS: Record<string, string> = {
    investment: '#10b981',
    acquisition: '#ef4444',
    cooperation: '#6366f1',
    employment: '#f59e0b',
    subsidiary: '#8b5cf6',
    competition: '#f43f5e',
    supply: '#14b8a6',
    product: '#84cc16',
    location: '#3b82f6',
    related: '#64748b',
};

const EVENT_LABELS: Record<EventType, string> = {
    'investment-event': 'Investment',
    'acquisition-event': 'Acquisition',
    'cooperation-event': 'Cooperation',
    'product-launch': 'Product launch',
    'personnel-change': 'Personnel change',
    'financial-report': 'Financial report',
};

/**
 * Flatten a snapshot into the node/edge shape the HTML viewer renders.
 * Events become nodes of type 'event' with one edge per filled role.
 * Output order follows the snapshot order, so it is deterministic.
 */
export function toExportGraph(snapshot: GraphSnapshot): ExportGraph {
    const nodes: ExportNode[] = snapshot.entities.map((entity) => ({
        id: entity.id,
        label: entity.name,
        type: entity.type,
        colorHint: ENTITY_COLORS[entity.type],
    }));

    const edges: ExportEdge[] = snapshot.relations.map((relation) => ({
        source: relation.subjectId,
        target: relation.objectId,
        label: relation.predicate,
        type: 'relation',
    }));

    for (const event of snapshot.events) {
        nodes.push({
            id: event.key,
            label: EVENT_LABELS[event.type],
            type: 'event',
            colorHint: EVENT_COLOR,
        });
        for (const [role, entityId] of Object.entries(event.roles)) {
            if (entityId === null) continue;
            edges.push({ source: event.key, target: entityId, label: role, type: 'role' });
        }
    }

    return { nodes, edges };
}
