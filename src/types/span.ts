/**
 * Coarse subject areas that extraction labels roll up into.
 */
export type Domain =
    | 'cs'
    | 'math'
    | 'social'
    | 'philosophy'
    | 'people'
    | 'entities'
    | 'references'
    | 'findings'
    | 'methods'
    | 'tools'
    | 'other';

/**
 * Span as returned by an extractor, before any validation.
 * Offsets are half-open character offsets into the source document.
 */
export interface RawSpan {
    text: string;
    label: string;
    start: number;
    end: number;
    confidence: number;
}

/**
 * A validated span with its disambiguation excerpt attached.
 */
export interface Span extends RawSpan {
    /** Bounded excerpt around the span; display only, never part of identity */
    context: string;
}

/**
 * A span that survived overlap resolution.
 */
export interface ResolvedConcept extends Span {
    domain: Domain;
}

/**
 * Black-box span producer (a model, a dictionary matcher, ...).
 */
export interface SpanExtractor {
    extract(content: string, labels: readonly string[]): RawSpan[];
}
