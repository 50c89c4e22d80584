import { readFile, stat, writeFile } from 'node:fs/promises';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { processDirectory, processFile, type PipelineDeps } from '../builder/pipeline.js';
import { exportGraph, isExportFormat, EXPORT_FORMATS } from '../exporters/export.js';
import { analyzeConcepts } from '../graph/algorithms.js';
import { TripleBuilder } from '../graph/triple-builder.js';
import { GraphStore } from '../storage/graph-store.js';
import type { ConceptGraphConfig, LogLevel, QueryResult, StoreMode } from '../types/index.js';

const VERSION = '0.1.0';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

type GlobalOptions = {
    store?: string;
    logLevel?: string;
    jsonLogs?: boolean;
};

const program = new Command();

program
    .name('conceptgraph')
    .description('Extract concepts from documents into a queryable semantic graph.')
    .version(VERSION)
    .option('--store <dir>', 'Store directory')
    .addOption(new Option('--log-level <level>', 'Log level').choices(LOG_LEVELS))
    .option('--json-logs', 'Output JSON logs');

/**
 * Resolve configuration from global flags and set up logging.
 */
async function setup(): Promise<ConceptGraphConfig> {
    const opts = program.opts<GlobalOptions>();
    const flags: ConfigOverrides = {};

    if (opts.store) flags.storeDir = opts.store;
    const level = LOG_LEVELS.find((l) => l === opts.logLevel);
    if (level) flags.logLevel = level;
    if (opts.jsonLogs) flags.jsonLogs = true;

    const config = await resolveConfig(flags);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function openStore(config: ConceptGraphConfig, mode: StoreMode): GraphStore {
    return new GraphStore({
        location: config.storeDir,
        mode,
        defaultLimit: config.query.defaultLimit,
        maxLimit: config.query.maxLimit,
    });
}

function parseLimit(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const limit = parseInt(value, 10);
    return Number.isNaN(limit) ? undefined : limit;
}

function fail(message: string, error?: unknown): never {
    console.error(message, error instanceof Error ? error.message : (error ?? ''));
    process.exit(1);
}

function printBindings(result: QueryResult, columns: readonly string[]): void {
    if (!result.success) {
        fail(`Query failed (${result.error.type}):`, result.error.message);
    }

    if (result.count === 0) {
        console.log('No results.');
        return;
    }

    for (const binding of result.bindings) {
        console.log('  ' + columns.map((column) => binding[column] ?? '-').join('  |  '));
    }
    console.log(`\n  ${result.count} result(s) in ${result.elapsedMs.toFixed(1)}ms`);
}

const spansFileSchema = z.array(z.unknown());

// ─── INGEST command ───────────────────────────────────────

program
    .command('ingest')
    .description('Process a file or directory of documents into the store')
    .argument('<path>', 'File or directory')
    .option('--spans <file>', 'JSON file of extractor spans for a single document')
    .option('--no-store', 'Process without writing to the store')
    .action(async (path: string, opts: { spans?: string; store: boolean }) => {
        const config = await setup();
        const logger = getLogger();

        let spans: unknown[] | undefined;
        if (opts.spans) {
            const parsed = spansFileSchema.safeParse(JSON.parse(await readFile(opts.spans, 'utf-8')));
            if (!parsed.success) fail(`Spans file must contain a JSON array: ${opts.spans}`);
            spans = parsed.data;
        }

        let store: GraphStore | undefined;
        try {
            store = opts.store ? openStore(config, 'read-write') : undefined;
        } catch (error) {
            fail('Cannot open store:', error);
        }

        const deps: PipelineDeps = {
            store,
            extraction: config.extraction,
            builder: new TripleBuilder(config.resolution),
        };

        try {
            const info = await stat(path);
            const results = info.isDirectory()
                ? await processDirectory(path, deps)
                : { results: [await processFile(path, deps, spans)], failed: [] };

            for (const result of results.results) {
                const domain = Object.entries(result.domainDistribution).sort((a, b) => b[1] - a[1])[0];
                console.log(
                    `  ${result.documentId}  ${result.metadata.type}  concepts=${result.concepts.length}` +
                        `  statements=${result.statementSet.statements.length}` +
                        (domain ? `  top=${domain[0]}` : '') +
                        (result.storeError ? `  store-error=${result.storeError.type}` : '')
                );
            }

            if (results.failed.length > 0) {
                console.log(`\n  ${results.failed.length} file(s) failed`);
            }
            logger.info({ processed: results.results.length, failed: results.failed.length }, 'Ingest complete');
        } catch (error) {
            logger.error({ error }, 'Ingest failed');
            process.exitCode = 1;
        } finally {
            store?.close();
        }
    });

// ─── RELATED command ──────────────────────────────────────

program
    .command('related')
    .description('List documents discussing a concept')
    .argument('<concept>', 'Concept label text')
    .option('-n, --limit <n>', 'Maximum results')
    .action(async (concept: string, opts: { limit?: string }) => {
        const config = await setup();
        const store = openOrFail(config);
        try {
            const result = store.query(
                { kind: 'documentsDiscussing', concept, limit: parseLimit(opts.limit) },
                config.query.timeoutMs
            );
            printBindings(result, ['document', 'title', 'confidence', 'domain']);
        } finally {
            store.close();
        }
    });

// ─── COOCCUR command ──────────────────────────────────────

program
    .command('cooccur')
    .description('List concepts co-occurring with a concept')
    .argument('<concept>', 'Concept label text')
    .option('-n, --limit <n>', 'Maximum results')
    .action(async (concept: string, opts: { limit?: string }) => {
        const config = await setup();
        const store = openOrFail(config);
        try {
            const result = store.query(
                { kind: 'coOccurringConcepts', concept, limit: parseLimit(opts.limit) },
                config.query.timeoutMs
            );
            printBindings(result, ['concept', 'frequency']);
        } finally {
            store.close();
        }
    });

// ─── STATS command ────────────────────────────────────────

program
    .command('stats')
    .description('Show store statistics')
    .action(async () => {
        const config = await setup();
        const store = openOrFail(config);
        try {
            const stats = store.stats();
            if (!stats.success) fail(`Stats failed (${stats.error.type}):`, stats.error.message);

            console.log('\nStore Statistics\n');
            console.log(`  Documents:  ${stats.data.documents}`);
            console.log(`  Concepts:   ${stats.data.concepts}`);
            console.log(`  Statements: ${stats.data.statements}`);

            if (Object.keys(stats.data.documentsByType).length > 0) {
                console.log('\n  Document Types:');
                for (const [type, count] of Object.entries(stats.data.documentsByType)) {
                    console.log(`    ${type}: ${count}`);
                }
            }
            console.log('');
        } finally {
            store.close();
        }
    });

// ─── EXPORT-DOC command ───────────────────────────────────

program
    .command('export-doc')
    .description("Export a document's subgraph as Turtle")
    .argument('<documentId>', 'Document id (cg:doc-... or full URI)')
    .option('-o, --out <path>', 'Output file path (default: stdout)')
    .action(async (documentId: string, opts: { out?: string }) => {
        const config = await setup();
        const store = openOrFail(config);
        try {
            const turtle = await store.exportSubgraph(documentId);
            if (turtle === null) fail(`No statements for ${documentId}`);

            if (opts.out) {
                await writeFile(opts.out, turtle, 'utf-8');
                console.log(`Exported to ${opts.out}`);
            } else {
                console.log(turtle);
            }
        } finally {
            store.close();
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Export the store to Turtle, JSON, GraphML, or Mermaid')
    .requiredOption('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
    .option('-o, --out <path>', 'Output file path')
    .action(async (opts: { format: string; out?: string }) => {
        const config = await setup();
        const format = opts.format.toLowerCase();

        if (!isExportFormat(format)) {
            fail(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
        }

        const extensions: Record<string, string> = {
            turtle: '.ttl', json: '.json', graphml: '.graphml', mermaid: '.md',
        };
        const outputPath = opts.out ?? `conceptgraph${extensions[format] ?? '.out'}`;

        try {
            await exportGraph(config.storeDir, outputPath, format);
            console.log(`Exported to ${outputPath}`);
        } catch (error) {
            fail('Export failed:', error);
        }
    });

// ─── ANALYZE command ──────────────────────────────────────

program
    .command('analyze')
    .description('Rank concepts by PageRank and group them into communities')
    .option('-n, --top <n>', 'Number of concepts to show', '20')
    .action(async (opts: { top: string }) => {
        const config = await setup();
        const store = openOrFail(config);
        try {
            const analysis = analyzeConcepts(store.allStatements());
            const top = parseLimit(opts.top) ?? 20;

            console.log(`\n  ${analysis.concepts.length} concepts, ${analysis.edgeCount} edges, ${analysis.clusterCount} communities\n`);
            for (const concept of analysis.concepts.slice(0, top)) {
                console.log(`  ${concept.rank.toFixed(4)}  [${concept.cluster}]  ${concept.label}`);
            }
            console.log('');
        } finally {
            store.close();
        }
    });

// ─── CLEAR command ────────────────────────────────────────

program
    .command('clear')
    .description('Remove all statements and reload the core ontology')
    .action(async () => {
        const config = await setup();
        let store: GraphStore;
        try {
            store = openStore(config, 'read-write');
        } catch (error) {
            fail('Cannot open store:', error);
        }

        try {
            const result = store.clear();
            if (!result.success) fail(`Clear failed (${result.error.type}):`, result.error.message);
            console.log('Store cleared.');
        } finally {
            store.close();
        }
    });

function openOrFail(config: ConceptGraphConfig): GraphStore {
    try {
        return openStore(config, 'read-only');
    } catch (error) {
        fail('Cannot open store:', error);
    }
}

program.parseAsync().catch((error: unknown) => {
    getLogger().error({ error }, 'Command failed');
    process.exit(1);
});
