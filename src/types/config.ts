/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Span resolution and derivation knobs.
 */
export interface ResolutionConfig {
    /** Max start-offset distance (exclusive) for a co-occurrence edge */
    proximityWindow: number;
    /** Share a domain must exceed to be named primary */
    primaryDomainThreshold: number;
}

export interface ExtractionConfig {
    /** Characters of context kept on each side of a span */
    contextWindow: number;
}

export interface QueryConfig {
    timeoutMs: number;
    defaultLimit: number;
    maxLimit: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ConceptGraphConfig {
    storeDir: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    resolution: ResolutionConfig;
    extraction: ExtractionConfig;
    query: QueryConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ConceptGraphConfig = {
    storeDir: './.conceptgraph',
    logLevel: 'info',
    jsonLogs: false,
    resolution: {
        proximityWindow: 100,
        primaryDomainThreshold: 0.5,
    },
    extraction: {
        contextWindow: 50,
    },
    query: {
        timeoutMs: 5000,
        defaultLimit: 10,
        maxLimit: 1000,
    },
};
