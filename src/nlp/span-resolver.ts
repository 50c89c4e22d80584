import type { Domain, ResolvedConcept, Span } from '../types/index.js';
import { DEFAULT_LABEL_DOMAINS, domainForLabel } from '../graph/vocabulary.js';

/**
 * Half-open interval intersection. A zero-length span overlaps only spans
 * that strictly contain its position.
 */
export function spansOverlap(a: Pick<Span, 'start' | 'end'>, b: Pick<Span, 'start' | 'end'>): boolean {
    return !(a.end <= b.start || b.end <= a.start);
}

/**
 * Resolve overlapping spans by confidence and tag survivors with a domain.
 *
 * Spans are walked in start order (stable for ties). A candidate replaces
 * the accepted spans it overlaps only when it beats every one of them
 * strictly; on a tie the already-accepted span stays. The output is ordered
 * by start offset and contains no two overlapping spans.
 */
export function resolveSpans(
    spans: readonly Span[],
    labelDomains: ReadonlyMap<string, Domain> = DEFAULT_LABEL_DOMAINS
): ResolvedConcept[] {
    const ordered = [...spans].sort((a, b) => a.start - b.start);
    let accepted: Span[] = [];

    for (const candidate of ordered) {
        const rivals = accepted.filter((span) => spansOverlap(span, candidate));

        if (rivals.length === 0) {
            accepted.push(candidate);
            continue;
        }

        if (rivals.every((rival) => candidate.confidence > rival.confidence)) {
            accepted = accepted.filter((span) => !rivals.includes(span));
            accepted.push(candidate);
        }
    }

    return accepted.map((span) => ({
        ...span,
        domain: domainForLabel(span.label, labelDomains),
    }));
}

/**
 * Count resolved concepts per domain, in first-seen order.
 */
export function domainDistribution(concepts: readonly ResolvedConcept[]): Map<Domain, number> {
    const distribution = new Map<Domain, number>();
    for (const concept of concepts) {
        distribution.set(concept.domain, (distribution.get(concept.domain) ?? 0) + 1);
    }
    return distribution;
}
