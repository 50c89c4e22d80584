import { writeFile } from 'node:fs/promises';
import { GraphStore } from '../storage/graph-store.js';
import { analyzeConcepts } from '../graph/algorithms.js';
import type { ConceptAnalysis } from '../graph/algorithms.js';
import { TERMS, fullUri } from '../graph/vocabulary.js';
import type { Statement } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'turtle' | 'json' | 'graphml' | 'mermaid';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['turtle', 'json', 'graphml', 'mermaid'];

interface ConceptEdge {
    source: string;
    target: string;
}

interface ExportData {
    analysis: ConceptAnalysis;
    edges: ConceptEdge[];
    documents: number;
}

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

// ─── Main Export Function ────────────────────────────────

/**
 * Export the store at `location` to `outputPath`. The store is opened
 * read-only, so a running writer is not disturbed.
 */
export async function exportGraph(location: string, outputPath: string, format: ExportFormat): Promise<void> {
    const store = new GraphStore({ location, mode: 'read-only' });

    try {
        const content = await renderExport(store, format);
        await writeFile(outputPath, content, 'utf-8');
        getLogger().info({ format, outputPath }, 'Graph exported');
    } finally {
        store.close();
    }
}

/**
 * Render the store in the requested format.
 */
export async function renderExport(store: GraphStore, format: ExportFormat): Promise<string> {
    if (format === 'turtle') {
        return store.exportAll();
    }

    const data = collectConceptGraph(store.allStatements());

    switch (format) {
        case 'json':
            return exportJson(data);
        case 'graphml':
            return exportGraphML(data);
        case 'mermaid':
            return exportMermaid(data);
    }
}

function collectConceptGraph(statements: readonly Statement[]): ExportData {
    const analysis = analyzeConcepts(statements);
    const known = new Set(analysis.concepts.map((c) => c.id));
    const coOccursWith = fullUri(TERMS.coOccursWith);
    const rdfType = fullUri(TERMS.type);
    const documentClass = fullUri(TERMS.document);

    const seen = new Set<string>();
    const edges: ConceptEdge[] = [];
    for (const s of statements) {
        if (s.predicate !== coOccursWith || s.subject === s.object) continue;
        if (!known.has(s.subject) || !known.has(s.object)) continue;

        const key = `${s.subject}\n${s.object}`;
        if (seen.has(key)) continue;
        seen.add(key);
        edges.push({ source: s.subject, target: s.object });
    }

    const documents = new Set(
        statements.filter((s) => s.predicate === rdfType && s.object === documentClass).map((s) => s.subject)
    ).size;

    return { analysis, edges, documents };
}

// ─── Format Implementations ─────────────────────────────

function exportJson(data: ExportData): string {
    return JSON.stringify(
        {
            conceptgraph: {
                version: '1.0.0',
                exported_at: new Date().toISOString(),
                documents: data.documents,
            },
            concepts: data.analysis.concepts.map((c) => ({
                id: c.id,
                label: c.label,
                rank: c.rank,
                cluster: c.cluster,
                degree: c.degree,
            })),
            edges: data.edges,
        },
        null,
        2
    );
}

function escapeXml(value: string): string {
    return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function exportGraphML(data: ExportData): string {
    const index = new Map(data.analysis.concepts.map((c, i) => [c.id, i]));

    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <key id="label" for="node" attr.name="label" attr.type="string"/>
  <key id="uri" for="node" attr.name="uri" attr.type="string"/>
  <key id="rank" for="node" attr.name="rank" attr.type="double"/>
  <key id="cluster" for="node" attr.name="cluster" attr.type="int"/>
  <graph id="conceptgraph" edgedefault="directed">
`;

    for (const [i, concept] of data.analysis.concepts.entries()) {
        xml += `    <node id="n${i}">
      <data key="label">${escapeXml(concept.label)}</data>
      <data key="uri">${escapeXml(concept.id)}</data>
      <data key="rank">${concept.rank}</data>
      <data key="cluster">${concept.cluster}</data>
    </node>
`;
    }

    for (const edge of data.edges) {
        xml += `    <edge source="n${index.get(edge.source) ?? -1}" target="n${index.get(edge.target) ?? -1}"/>
`;
    }

    xml += `  </graph>
</graphml>`;

    return xml;
}

function exportMermaid(data: ExportData): string {
    const index = new Map(data.analysis.concepts.map((c, i) => [c.id, i]));
    let diagram = 'graph LR\n';

    for (const [i, concept] of data.analysis.concepts.entries()) {
        const label = concept.label.slice(0, 40).replace(/"/g, "'");
        diagram += `  C${i}["${label}"]\n`;
    }

    diagram += '\n';

    // Cap edges so large stores still render
    const maxEdges = 100;
    for (const edge of data.edges.slice(0, maxEdges)) {
        diagram += `  C${index.get(edge.source) ?? -1} --- C${index.get(edge.target) ?? -1}\n`;
    }

    if (data.edges.length > maxEdges) {
        diagram += `\n  %% Note: ${data.edges.length - maxEdges} additional edges omitted\n`;
    }

    return diagram;
}
