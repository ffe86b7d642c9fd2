import { writeFileSync } from 'node:fs';
import type { ExportGraph, GraphSnapshot } from '../types/index.js';
import { ENTITY_COLORS, EVENT_COLOR, PREDICATE_COLORS, toExportGraph } from '../graph/export-graph.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Generate a self-contained HTML viewer using Cytoscape.js.
 *
 * Features:
 * - Entity nodes colored by type, events drawn as diamonds
 * - Relation edges colored by predicate, role edges dashed
 * - Search / filter by name
 * - Click-to-show entity or event details
 */
export function generateViewer(snapshot: GraphSnapshot, outputPath: string): void {
    const html = renderViewerHtml(snapshot);

    writeFileSync(outputPath, html, 'utf-8');
    logger.info(
        { outputPath, entities: snapshot.entities.length, relations: snapshot.relations.length, events: snapshot.events.length },
        'HTML viewer generated'
    );
}

export function renderViewerHtml(snapshot: GraphSnapshot): string {
    const graph = toExportGraph(snapshot);
    return buildHtml(buildCytoscapeData(graph), snapshot.entities.length, snapshot.relations.length, snapshot.events.length);
}

/**
 * Cytoscape element list as a JSON literal that is safe to inline in a script tag.
 */
export function buildCytoscapeData(graph: ExportGraph): string {
    const nodes = graph.nodes.map((node) => ({
        data: {
            id: node.id,
            label: node.label.slice(0, 50),
            type: node.type,
            color: node.colorHint,
            shape: node.type === 'event' ? 'diamond' : 'ellipse',
        },
    }));

    const edges = graph.edges.map((edge, i) => ({
        data: {
            id: `e${i}`,
            source: edge.source,
            target: edge.target,
            label: edge.label,
            type: edge.type,
            color: edge.type === 'role' ? EVENT_COLOR : (PREDICATE_COLORS[edge.label] ?? '#64748b'),
        },
    }));

    return JSON.stringify([...nodes, ...edges]).replace(/</g, '\\u003c');
}

function legend(): string {
    const items = Object.entries(ENTITY_COLORS).map(
        ([type, color]) => `<div class="legend-item"><div class="legend-dot" style="background:${color}"></div> ${type}</div>`
    );
    items.push(`<div class="legend-item"><div class="legend-dot" style="background:${EVENT_COLOR}"></div> event</div>`);
    return items.join('\n    ');
}

function buildHtml(graphData: string, entityCount: number, relationCount: number, eventCount: number): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Knowledge Graph Viewer</title>
<script src="https://unpkg.com/cytoscape@3.30.4/dist/cytoscape.min.js"></script>
<style>
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: 'Inter', -apple-system, BlinkMacSystemFont, sans-serif;
    background: #0f172a;
    color: #e2e8f0;
    height: 100vh;
    overflow: hidden;
  }
  #cy { width: 100%; height: 100vh; position: absolute; top: 0; left: 0; }
  .panel {
    position: absolute;
    background: rgba(15, 23, 42, 0.85);
    backdrop-filter: blur(16px);
    border: 1px solid rgba(100, 116, 139, 0.3);
    border-radius: 12px;
    padding: 16px;
    z-index: 10;
  }
  .header { top: 16px; left: 16px; display: flex; align-items: center; gap: 12px; }
  .header h1 { font-size: 18px; font-weight: 700; color: #a5b4fc; }
  .stats { font-size: 12px; color: #94a3b8; }
  .search-panel { top: 16px; right: 16px; width: 300px; }
  .search-panel input {
    width: 100%;
    padding: 8px 12px;
    background: rgba(30, 41, 59, 0.8);
    border: 1px solid rgba(100, 116, 139, 0.3);
    border-radius: 8px;
    color: #e2e8f0;
    font-size: 14px;
    outline: none;
  }
  .detail-panel { bottom: 16px; right: 16px; width: 360px; max-height: 50vh; overflow-y: auto; display: none; }
  .detail-panel.active { display: block; }
  .detail-panel h3 { font-size: 15px; font-weight: 600; margin-bottom: 8px; }
  .detail-field {
    display: flex;
    justify-content: space-between;
    font-size: 12px;
    padding: 4px 0;
    border-bottom: 1px solid rgba(100, 116, 139, 0.15);
  }
  .detail-field .label { color: #94a3b8; }
  .legend { bottom: 16px; left: 16px; font-size: 11px; }
  .legend-item { display: flex; align-items: center; gap: 6px; margin: 3px 0; }
  .legend-dot { width: 8px; height: 8px; border-radius: 50%; flex-shrink: 0; }
</style>
</head>
<body>
  <div id="cy"></div>

  <div class="panel header">
    <h1>Knowledge Graph</h1>
    <span class="stats">${entityCount} entities · ${relationCount} relations · ${eventCount} events</span>
  </div>

  <div class="panel search-panel">
    <input type="text" id="search" placeholder="Search entities..." autocomplete="off" />
  </div>

  <div class="panel detail-panel" id="detail">
    <h3 id="detail-title"></h3>
    <div id="detail-fields"></div>
  </div>

  <div class="panel legend">
    ${legend()}
  </div>

<script>
const graphData = ${graphData};

const cy = cytoscape({
  container: document.getElementById('cy'),
  elements: graphData,
  style: [
    {
      selector: 'node',
      style: {
        'label': 'data(label)',
        'background-color': 'data(color)',
        'shape': 'data(shape)',
        'width': 28,
        'height': 28,
        'font-size': '9px',
        'color': '#e2e8f0',
        'text-outline-color': '#0f172a',
        'text-outline-width': 2,
        'text-valign': 'bottom',
        'text-margin-y': 5,
      },
    },
    {
      selector: 'edge',
      style: {
        'label': 'data(label)',
        'font-size': '7px',
        'color': '#94a3b8',
        'width': 1.5,
        'line-color': 'data(color)',
        'target-arrow-color': 'data(color)',
        'target-arrow-shape': 'triangle',
        'curve-style': 'bezier',
        'opacity': 0.7,
      },
    },
    { selector: 'edge[type = "role"]', style: { 'line-style': 'dashed' } },
    { selector: '.highlighted', style: { 'opacity': 1, 'border-width': 3, 'border-color': '#f59e0b' } },
    { selector: '.faded', style: { 'opacity': 0.15 } },
  ],
  layout: { name: 'cose', animate: false, nodeRepulsion: 8000, idealEdgeLength: 120 },
  wheelSensitivity: 0.3,
});

function escapeHtml(s) {
  return String(s).replace(/[&<>"]/g, (c) => ({ '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;' })[c]);
}

cy.on('tap', 'node', function(evt) {
  const node = evt.target;
  const d = node.data();
  document.getElementById('detail').classList.add('active');
  document.getElementById('detail-title').textContent = d.label;

  const fields = [['Type', d.type], ['Id', d.id]];
  node.connectedEdges().forEach((e) => {
    const other = e.source().id() === d.id ? e.target() : e.source();
    fields.push([e.data('label'), other.data('label')]);
  });

  document.getElementById('detail-fields').innerHTML = fields
    .map(([l, v]) => '<div class="detail-field"><span class="label">' + escapeHtml(l) + '</span><span class="value">' + escapeHtml(v) + '</span></div>')
    .join('');

  cy.elements().addClass('faded');
  node.closedNeighborhood().removeClass('faded').addClass('highlighted');
});

cy.on('tap', function(evt) {
  if (evt.target === cy) {
    document.getElementById('detail').classList.remove('active');
    cy.elements().removeClass('highlighted faded');
  }
});

document.getElementById('search').addEventListener('input', function(e) {
  const q = e.target.value.toLowerCase().trim();
  if (!q) {
    cy.elements().removeClass('highlighted faded');
    return;
  }
  cy.elements().addClass('faded');
  cy.nodes().filter((n) => (n.data('label') || '').toLowerCase().includes(q)).removeClass('faded').addClass('highlighted');
});
</script>
</body>
</html>`;
}
