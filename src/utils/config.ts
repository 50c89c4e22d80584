import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type ConceptGraphConfig } from '../types/index.js';
import { envLogLevel, getLogger } from './logger.js';

/**
 * Partial configuration, as it may appear on the command line.
 */
export interface ConfigOverrides {
    storeDir?: string;
    logLevel?: ConceptGraphConfig['logLevel'];
    jsonLogs?: boolean;
    resolution?: Partial<ConceptGraphConfig['resolution']>;
    extraction?: Partial<ConceptGraphConfig['extraction']>;
    query?: Partial<ConceptGraphConfig['query']>;
}

const configFileSchema = z
    .object({
        storeDir: z.string().min(1),
        logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
        resolution: z
            .object({
                proximityWindow: z.number().int().positive(),
                primaryDomainThreshold: z.number().min(0).max(1),
            })
            .partial(),
        extraction: z
            .object({
                contextWindow: z.number().int().nonnegative(),
            })
            .partial(),
        query: z
            .object({
                timeoutMs: z.number().int().positive(),
                defaultLimit: z.number().int().positive(),
                maxLimit: z.number().int().positive(),
            })
            .partial(),
    })
    .partial()
    .strict();

/**
 * Validate a parsed config file. Returns null (and logs) when it does not fit.
 */
export function parseConfigFile(raw: unknown, filepath = 'config'): ConfigOverrides | null {
    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
        getLogger().warn({ path: filepath, issues: parsed.error.issues }, 'Invalid config file, using defaults');
        return null;
    }
    return parsed.data;
}

/**
 * Load configuration from conceptgraph.config.json using cosmiconfig.
 * Returns null if no config file is found (which is fine — defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('conceptgraph', {
        searchPlaces: ['conceptgraph.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parseConfigFile(result.config, result.filepath);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const storeDir = process.env['CONCEPTGRAPH_STORE'];
    if (storeDir) env.storeDir = storeDir;

    const logLevel = envLogLevel();
    if (logLevel) env.logLevel = logLevel;

    return env;
}

/**
 * Merge layers left to right; later layers win.
 */
export function mergeConfig(...layers: Array<ConfigOverrides | null>): ConceptGraphConfig {
    const merged: ConceptGraphConfig = {
        ...DEFAULT_CONFIG,
        resolution: { ...DEFAULT_CONFIG.resolution },
        extraction: { ...DEFAULT_CONFIG.extraction },
        query: { ...DEFAULT_CONFIG.query },
    };

    for (const layer of layers) {
        if (!layer) continue;
        if (layer.storeDir !== undefined) merged.storeDir = layer.storeDir;
        if (layer.logLevel !== undefined) merged.logLevel = layer.logLevel;
        if (layer.jsonLogs !== undefined) merged.jsonLogs = layer.jsonLogs;
        merged.resolution = { ...merged.resolution, ...layer.resolution };
        merged.extraction = { ...merged.extraction, ...layer.extraction };
        merged.query = { ...merged.query, ...layer.query };
    }

    return merged;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    searchFrom?: string
): Promise<ConceptGraphConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();

    return mergeConfig(fileConfig, envConfig, cliFlags);
}
