import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type {
    Domain,
    DocumentMetadata,
    ExtractionConfig,
    OperationError,
    ResolvedConcept,
    SpanExtractor,
    StatementSet,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { classifyDocument } from '../nlp/document-classifier.js';
import { DictionaryExtractor } from '../nlp/entity-extraction.js';
import { normalizeSpans } from '../nlp/span-boundary.js';
import { domainDistribution, resolveSpans } from '../nlp/span-resolver.js';
import { stableNameFromPath } from '../graph/identity.js';
import { TripleBuilder } from '../graph/triple-builder.js';
import { CONCEPT_LABELS, DEFAULT_LABEL_DOMAINS } from '../graph/vocabulary.js';
import type { GraphStore } from '../storage/graph-store.js';
import { getLogger } from '../utils/logger.js';

export const DEFAULT_EXTENSIONS: readonly string[] = ['.md', '.txt'];

export interface DocumentInput {
    content: string;
    /** File stem or other name the document id is derived from */
    stableName?: string;
    /** Extractor output supplied by the caller; skips the built-in extractor */
    spans?: readonly unknown[];
}

export interface PipelineDeps {
    /** When given, the statement set is inserted */
    store?: GraphStore;
    extractor?: SpanExtractor;
    builder?: TripleBuilder;
    extraction?: ExtractionConfig;
    labels?: readonly string[];
    labelDomains?: ReadonlyMap<string, Domain>;
}

export interface ProcessingResult {
    documentId: string;
    metadata: DocumentMetadata;
    concepts: ResolvedConcept[];
    statementSet: StatementSet;
    domainDistribution: Partial<Record<Domain, number>>;
    /** Raw spans rejected at the boundary */
    dropped: number;
    stored: boolean;
    storeError?: OperationError;
}

export interface DirectoryResult {
    results: ProcessingResult[];
    failed: Array<{ file: string; error: string }>;
}

/**
 * Classify, extract, resolve and map one document, then store it if a
 * store was supplied. Store failures are reported on the result.
 */
export function processDocument(input: DocumentInput, deps: PipelineDeps = {}): ProcessingResult {
    const { content, stableName } = input;
    const labels = deps.labels ?? CONCEPT_LABELS;
    const contextWindow = deps.extraction?.contextWindow ?? DEFAULT_CONFIG.extraction.contextWindow;

    const metadata = classifyDocument(content);

    const raw = input.spans ?? (deps.extractor ?? new DictionaryExtractor()).extract(content, labels);
    const { spans, dropped } = normalizeSpans(raw, content, contextWindow);
    const concepts = resolveSpans(spans, deps.labelDomains ?? DEFAULT_LABEL_DOMAINS);

    const builder = deps.builder ?? new TripleBuilder();
    const statementSet = builder.build(content, concepts, metadata, stableName);

    const result: ProcessingResult = {
        documentId: statementSet.documentId,
        metadata,
        concepts,
        statementSet,
        domainDistribution: Object.fromEntries(domainDistribution(concepts)),
        dropped,
        stored: false,
    };

    if (deps.store) {
        const inserted = deps.store.insert(statementSet);
        if (inserted.success) {
            result.stored = true;
        } else {
            result.storeError = inserted.error;
        }
    }

    getLogger().info(
        {
            documentId: result.documentId,
            type: metadata.type,
            concepts: concepts.length,
            statements: statementSet.statements.length,
            stored: result.stored,
        },
        'Document processed'
    );

    return result;
}

/**
 * Process a file, naming the document after the file stem.
 */
export async function processFile(
    filePath: string,
    deps: PipelineDeps = {},
    spans?: readonly unknown[]
): Promise<ProcessingResult> {
    const content = await readFile(filePath, 'utf-8');
    return processDocument({ content, stableName: stableNameFromPath(filePath), spans }, deps);
}

/**
 * Process every file in `dir` (not recursive) whose extension matches.
 * A file that fails is logged and skipped.
 */
export async function processDirectory(
    dir: string,
    deps: PipelineDeps = {},
    extensions: readonly string[] = DEFAULT_EXTENSIONS
): Promise<DirectoryResult> {
    const entries = await readdir(dir, { withFileTypes: true });
    const files = entries
        .filter((entry) => entry.isFile() && extensions.includes(extname(entry.name).toLowerCase()))
        .map((entry) => join(dir, entry.name))
        .sort();

    getLogger().info({ dir, files: files.length }, 'Processing directory');

    const outcome: DirectoryResult = { results: [], failed: [] };

    for (const file of files) {
        try {
            outcome.results.push(await processFile(file, deps));
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            getLogger().warn({ file, error: message }, 'Failed to process file');
            outcome.failed.push({ file, error: message });
        }
    }

    return outcome;
}
