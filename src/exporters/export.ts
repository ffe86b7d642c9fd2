import { writeFileSync } from 'node:fs';
import { z } from 'zod';
import type { GraphSnapshot, GraphStore } from '../types/index.js';
import { SNAPSHOT_VERSION } from '../types/index.js';
import { KnowledgeGraphManager } from '../graph/knowledge-graph.js';
import { toExportGraph } from '../graph/export-graph.js';
import { InvariantViolationError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'json' | 'graphml' | 'csv' | 'mermaid';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'graphml', 'csv', 'mermaid'];

export const EXPORT_FORMAT_VERSION = '1.0.0';

// ─── Main Export Function ────────────────────────────────

/**
 * Export the committed graph from a store to a file.
 */
export function exportGraph(store: GraphStore, outputPath: string, format: ExportFormat): void {
    const snapshot = store.readSnapshot();
    const content = renderExport(snapshot, format);

    writeFileSync(outputPath, content, 'utf-8');
    logger.info(
        { format, outputPath, entities: snapshot.entities.length, relations: snapshot.relations.length, events: snapshot.events.length },
        'Graph exported'
    );
}

/**
 * Render a snapshot in one of the export formats.
 */
export function renderExport(snapshot: GraphSnapshot, format: ExportFormat): string {
    switch (format) {
        case 'json':
            return exportJson(snapshot);
        case 'graphml':
            return exportGraphML(snapshot);
        case 'csv':
            return exportCSV(snapshot);
        case 'mermaid':
            return exportMermaid(snapshot);
        default:
            throw new Error(`Unsupported export format: ${String(format)}`);
    }
}

// ─── Format Implementations ─────────────────────────────

function exportJson(snapshot: GraphSnapshot): string {
    return JSON.stringify(
        {
            finkg: {
                version: EXPORT_FORMAT_VERSION,
                exported_at: new Date().toISOString(),
            },
            snapshot,
        },
        null,
        2
    );
}

const esc = (s: string | null | undefined): string =>
    (s ?? '').replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

function exportGraphML(snapshot: GraphSnapshot): string {
    const { nodes, edges } = toExportGraph(snapshot);

    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <key id="label" for="node" attr.name="label" attr.type="string"/>
  <key id="type" for="node" attr.name="type" attr.type="string"/>
  <key id="color" for="node" attr.name="color" attr.type="string"/>
  <key id="edge_label" for="edge" attr.name="label" attr.type="string"/>
  <key id="edge_type" for="edge" attr.name="type" attr.type="string"/>
  <graph id="finkg" edgedefault="directed">
`;

    for (const node of nodes) {
        xml += `    <node id="${esc(node.id)}">
      <data key="label">${esc(node.label)}</data>
      <data key="type">${esc(node.type)}</data>
      <data key="color">${esc(node.colorHint)}</data>
    </node>
`;
    }

    for (const edge of edges) {
        xml += `    <edge source="${esc(edge.source)}" target="${esc(edge.target)}">
      <data key="edge_label">${esc(edge.label)}</data>
      <data key="edge_type">${esc(edge.type)}</data>
    </edge>
`;
    }

    xml += `  </graph>
</graphml>`;

    return xml;
}

const quote = (s: string | null | undefined): string => `"${(s ?? '').replace(/"/g, '""')}"`;

function exportCSV(snapshot: GraphSnapshot): string {
    const temporalText = new Map(snapshot.temporals.map((t) => [t.id, t.value.start ?? '']));

    let csv = 'entity_id,type,name,aliases,confidence\n';
    for (const entity of snapshot.entities) {
        csv += [entity.id, entity.type, quote(entity.name), quote(entity.aliases.join('; ')), entity.confidence].join(',') + '\n';
    }

    csv += '\n# RELATIONS\nsubject_id,predicate,object_id,confidence,method,date,document_id,evidence\n';
    for (const r of snapshot.relations) {
        csv +=
            [
                r.subjectId,
                r.predicate,
                r.objectId,
                r.confidence,
                r.method,
                r.temporalId === null ? '' : (temporalText.get(r.temporalId) ?? ''),
                r.evidence.documentId,
                quote(r.evidence.text),
            ].join(',') + '\n';
    }

    csv += '\n# EVENTS\nevent_key,type,roles,confidence,complete,date,document_id\n';
    for (const e of snapshot.events) {
        const roles = Object.entries(e.roles)
            .map(([role, id]) => `${role}=${id ?? ''}`)
            .join('; ');
        csv +=
            [
                quote(e.key),
                e.type,
                quote(roles),
                e.confidence,
                e.complete,
                e.temporalId === null ? '' : (temporalText.get(e.temporalId) ?? ''),
                e.evidence.documentId,
            ].join(',') + '\n';
    }

    return csv;
}

function exportMermaid(snapshot: GraphSnapshot): string {
    let diagram = 'graph LR\n';

    // Mermaid ids must be plain identifiers
    const ids = new Map<string, string>();
    snapshot.entities.forEach((entity, i) => ids.set(entity.id, `N${i}`));

    for (const entity of snapshot.entities) {
        const label = entity.name.slice(0, 40).replace(/"/g, "'");
        diagram += `  ${ids.get(entity.id)}["${label}"]\n`;
    }
    snapshot.events.forEach((event, i) => {
        diagram += `  V${i}{{"${event.type}"}}\n`;
    });

    diagram += '\n';

    // Limit edges to avoid overly complex diagrams
    const maxEdges = 100;
    const relationsToRender = snapshot.relations.slice(0, maxEdges);

    for (const relation of relationsToRender) {
        diagram += `  ${ids.get(relation.subjectId)} -->|${relation.predicate}| ${ids.get(relation.objectId)}\n`;
    }
    snapshot.events.forEach((event, i) => {
        for (const [role, entityId] of Object.entries(event.roles)) {
            const target = entityId === null ? undefined : ids.get(entityId);
            if (target) diagram += `  V${i} -.->|${role}| ${target}\n`;
        }
    });

    if (snapshot.relations.length > maxEdges) {
        diagram += `\n  %% Note: ${snapshot.relations.length - maxEdges} additional relations omitted\n`;
    }

    return diagram;
}

// ─── Import ──────────────────────────────────────────────

const spanSchema = z.object({ start: z.number().int().nonnegative(), end: z.number().int().nonnegative() });

const evidenceSchema = z.object({
    documentId: z.string(),
    span: spanSchema,
    text: z.string(),
    fingerprint: z.string(),
});

const entitySchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    type: z.enum(['organization', 'person', 'product', 'location', 'other']),
    aliases: z.array(z.string()),
    mentionIds: z.array(z.string()),
    confidence: z.number().min(0).max(1),
    createdSeq: z.number().int().nonnegative(),
    retiredInto: z.null(),
});

const relationSchema = z.object({
    key: z.string(),
    subjectId: z.string(),
    predicate: z.enum([
        'investment',
        'acquisition',
        'cooperation',
        'employment',
        'subsidiary',
        'competition',
        'supply',
        'product',
        'location',
        'related',
    ]),
    objectId: z.string(),
    evidence: evidenceSchema,
    confidence: z.number().min(0).max(1),
    method: z.enum(['trigger', 'type-pair', 'co-occurrence']),
    temporalId: z.string().nullable(),
});

const eventSchema = z.object({
    key: z.string(),
    type: z.enum([
        'investment-event',
        'acquisition-event',
        'cooperation-event',
        'product-launch',
        'personnel-change',
        'financial-report',
    ]),
    roles: z.record(z.string().nullable()),
    attributes: z.record(z.string()),
    evidence: evidenceSchema,
    temporalId: z.string().nullable(),
    confidence: z.number().min(0).max(1),
    complete: z.boolean(),
});

const temporalSchema = z.object({
    id: z.string(),
    documentId: z.string(),
    span: spanSchema,
    text: z.string(),
    value: z.object({
        kind: z.enum(['point', 'interval']),
        start: z.string().nullable(),
        end: z.string().nullable(),
        granularity: z.enum(['day', 'month', 'year', 'unknown']),
    }),
    basis: z.string(),
    relative: z.boolean(),
    confidence: z.number().min(0).max(1),
});

const snapshotSchema: z.ZodType<GraphSnapshot> = z.object({
    version: z.literal(SNAPSHOT_VERSION),
    entities: z.array(entitySchema),
    relations: z.array(relationSchema),
    events: z.array(eventSchema),
    temporals: z.array(temporalSchema),
    redirects: z.record(z.string()),
});

const exportFileSchema = z.union([z.object({ snapshot: snapshotSchema }), snapshotSchema.transform((snapshot) => ({ snapshot }))]);

/**
 * Read a JSON export (or a bare snapshot) back into a validated snapshot.
 * The shape is checked with zod; the graph invariants by rebuilding the graph.
 */
export function importSnapshot(json: string): GraphSnapshot {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new Error(`Snapshot is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = exportFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new Error(`Invalid snapshot: ${issues.slice(0, 5).join('; ')}`);
    }

    let manager: KnowledgeGraphManager;
    try {
        manager = KnowledgeGraphManager.fromSnapshot(parsed.data.snapshot);
    } catch (error) {
        throw new InvariantViolationError(`Snapshot references missing entities: ${errorMessage(error)}`);
    }
    const problems = manager.validate();
    if (problems.length > 0) {
        throw new InvariantViolationError(`Snapshot violates graph invariants: ${problems[0]}`, { problems });
    }

    return manager.snapshot();
}
