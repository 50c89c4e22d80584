/**
 * Barrel export for all shared types.
 */
export type { Domain, RawSpan, Span, ResolvedConcept, SpanExtractor } from './span.js';
export type { ObjectKind, Statement, NamespaceTable, StatementSet } from './statement.js';
export type { DocumentType, FeatureValue, DocumentMetadata } from './document.js';
export type { OperationErrorType, OperationError, Result } from './result.js';
export type {
    StoreMode,
    GraphStoreOptions,
    QueryDescriptor,
    QueryKind,
    Binding,
    QueryResult,
    InsertSummary,
    StoreStats,
} from './store.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    ConceptGraphConfig,
    LogLevel,
    ResolutionConfig,
    ExtractionConfig,
    QueryConfig,
} from './config.js';
