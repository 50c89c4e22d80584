import type { OperationError } from './result.js';

/**
 * `read-write` takes the location's exclusive lock and bootstraps the ontology;
 * `read-only` never locks, never mutates.
 */
export type StoreMode = 'read-write' | 'read-only';

export interface GraphStoreOptions {
    /** Directory holding the store's database and lock file */
    location: string;
    mode: StoreMode;
    /** Turtle text loaded into an empty store; defaults to the core ontology */
    bootstrap?: string;
    /** Result limit applied when a descriptor gives none */
    defaultLimit?: number;
    /** Upper bound on any descriptor's limit */
    maxLimit?: number;
}

/**
 * Fixed, parameterised query templates.
 */
export type QueryDescriptor =
    | { kind: 'documentsDiscussing'; concept: string; limit?: number }
    | { kind: 'coOccurringConcepts'; concept: string; limit?: number }
    | { kind: 'countByType'; types?: string[]; limit?: number };

export type QueryKind = QueryDescriptor['kind'];

export type Binding = Record<string, string>;

export type QueryResult =
    | { success: true; bindings: Binding[]; count: number; elapsedMs: number }
    | { success: false; bindings: Binding[]; count: 0; elapsedMs: number | null; error: OperationError };

export interface InsertSummary {
    inserted: number;
    duplicates: number;
    skipped: number;
}

export interface StoreStats {
    documents: number;
    concepts: number;
    statements: number;
    documentsByType: Record<string, number>;
}
