import Graph from 'graphology';
import pagerank from 'graphology-metrics/centrality/pagerank.js';
import louvain from 'graphology-communities-louvain';
import { toUndirected } from 'graphology-operators';
import type { Statement } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { TERMS, fullUri } from './vocabulary.js';

export interface ConceptAttributes {
    label: string;
}

export interface CoOccurrenceAttributes {
    weight: number;
}

export type ConceptGraph = Graph<ConceptAttributes, CoOccurrenceAttributes>;

export interface RankedConcept {
    id: string;
    label: string;
    rank: number;
    cluster: number;
    degree: number;
}

export interface ConceptAnalysis {
    concepts: RankedConcept[];
    clusterCount: number;
    edgeCount: number;
}

/**
 * Project concept nodes and co-occurrence edges out of a statement list.
 * Self-loops are left out.
 */
export function buildConceptGraph(statements: readonly Statement[]): ConceptGraph {
    const rdfType = fullUri(TERMS.type);
    const conceptClass = fullUri(TERMS.concept);
    const label = fullUri(TERMS.label);
    const coOccursWith = fullUri(TERMS.coOccursWith);

    const graph: ConceptGraph = new Graph<ConceptAttributes, CoOccurrenceAttributes>({ type: 'directed', allowSelfLoops: false });

    for (const s of statements) {
        if (s.predicate === rdfType && s.objectKind === 'node' && s.object === conceptClass) {
            graph.mergeNode(s.subject, { label: s.subject });
        }
    }

    // Labels after nodes, since a concept's statements may come in any order
    for (const s of statements) {
        if (s.predicate === label && s.objectKind === 'literal' && graph.hasNode(s.subject)) {
            graph.setNodeAttribute(s.subject, 'label', s.object);
        }
    }

    for (const s of statements) {
        if (s.predicate !== coOccursWith || s.objectKind !== 'node' || s.subject === s.object) continue;
        if (!graph.hasNode(s.subject) || !graph.hasNode(s.object)) continue;

        if (graph.hasEdge(s.subject, s.object)) {
            graph.updateEdgeAttribute(s.subject, s.object, 'weight', (weight) => (weight ?? 0) + 1);
        } else {
            graph.addEdge(s.subject, s.object, { weight: 1 });
        }
    }

    getLogger().debug({ nodeCount: graph.order, edgeCount: graph.size }, 'Concept graph built');
    return graph;
}

/**
 * PageRank over the directed co-occurrence graph.
 */
export function rankConcepts(graph: ConceptGraph): Map<string, number> {
    if (graph.order === 0) return new Map();

    const scores = pagerank(graph, { getEdgeWeight: 'weight', alpha: 0.85, maxIterations: 100, tolerance: 1e-6 });
    return new Map(Object.entries(scores));
}

/**
 * Louvain communities on the undirected projection.
 * Returns node → community index; isolated graphs give one community per node.
 */
export function clusterConcepts(graph: ConceptGraph): Map<string, number> {
    const clusters = new Map<string, number>();
    if (graph.order === 0) return clusters;

    if (graph.size === 0) {
        graph.forEachNode((node) => clusters.set(node, clusters.size));
        return clusters;
    }

    const communities = louvain(toUndirected(graph), { resolution: 1.0 });
    for (const [node, community] of Object.entries(communities)) {
        clusters.set(node, community);
    }

    getLogger().debug({ communities: new Set(clusters.values()).size, concepts: graph.order }, 'Louvain clustering computed');
    return clusters;
}

/**
 * Rank and cluster every concept, highest rank first.
 */
export function analyzeConcepts(statements: readonly Statement[]): ConceptAnalysis {
    const graph = buildConceptGraph(statements);
    const ranks = rankConcepts(graph);
    const clusters = clusterConcepts(graph);

    const concepts = graph
        .mapNodes((id, attributes): RankedConcept => ({
            id,
            label: attributes.label,
            rank: ranks.get(id) ?? 0,
            cluster: clusters.get(id) ?? -1,
            degree: graph.degree(id),
        }))
        .sort((a, b) => b.rank - a.rank || a.label.localeCompare(b.label));

    return {
        concepts,
        clusterCount: new Set(clusters.values()).size,
        edgeCount: graph.size,
    };
}
