import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { performance } from 'node:perf_hooks';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type {
    Binding,
    DocumentType,
    GraphStoreOptions,
    InsertSummary,
    NamespaceTable,
    ObjectKind,
    OperationError,
    OperationErrorType,
    QueryDescriptor,
    QueryResult,
    Result,
    Statement,
    StatementSet,
    StoreMode,
    StoreStats,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import {
    NAMESPACES,
    TERMS,
    XSD_STRING,
    documentClassFor,
    fullUri,
    isAbsoluteIri,
    isBlankNode,
    resolveIdentifier,
} from '../graph/vocabulary.js';
import { parseStatements, serializeStatements } from '../serializer/turtle.js';
import { getLogger } from '../utils/logger.js';
import { CORE_ONTOLOGY } from './core-ontology.js';
import { StoreInitError, StoreOpenError } from './errors.js';
import { compileQuery, queryDescriptorSchema } from './queries.js';
import type { QueryParams } from './queries.js';
import { StoreLock } from './store-lock.js';

export const DATABASE_FILE = 'graph.db';
export const LOCK_FILE = 'graph.lock';
export const DEFAULT_QUERY_TIMEOUT_MS = DEFAULT_CONFIG.query.timeoutMs;

/**
 * SQLite schema migration v1.
 * One row per statement; namespaces declared by inserted sets are kept for export.
 */
const MIGRATION_V1 = `
-- Statements: subject / predicate / object, all as full URIs or literal text
CREATE TABLE IF NOT EXISTS statements (
  statement_id INTEGER PRIMARY KEY,
  subject TEXT NOT NULL,
  predicate TEXT NOT NULL,
  object TEXT NOT NULL,
  object_kind TEXT NOT NULL CHECK (object_kind IN ('node', 'literal', 'typed')),
  datatype TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Namespaces: prefix table used when rendering exports
CREATE TABLE IF NOT EXISTS namespaces (
  prefix TEXT PRIMARY KEY,
  uri TEXT NOT NULL
);

-- A statement is stored once no matter how often it is inserted
CREATE UNIQUE INDEX IF NOT EXISTS idx_statements_unique
  ON statements(subject, predicate, object, object_kind, datatype);

-- Indexes for lookups by subject and by predicate/object
CREATE INDEX IF NOT EXISTS idx_statements_subject ON statements(subject);
CREATE INDEX IF NOT EXISTS idx_statements_predicate_object ON statements(predicate, object);
`;

const DOCUMENT_TYPES: readonly DocumentType[] = ['conversation', 'markdown', 'plain_text', 'structured', 'random'];

const OBJECT_KINDS: ReadonlySet<string> = new Set<ObjectKind>(['node', 'literal', 'typed']);

const identifierSchema = z
    .string()
    .min(1)
    .refine((id) => isAbsoluteIri(id) || isBlankNode(id), 'must be an absolute IRI or blank node');

/**
 * Shape every statement must have to be stored.
 */
const storableStatementSchema = z.discriminatedUnion('objectKind', [
    z.object({ subject: identifierSchema, predicate: identifierSchema, object: identifierSchema, objectKind: z.literal('node') }),
    z.object({ subject: identifierSchema, predicate: identifierSchema, object: z.string(), objectKind: z.literal('literal') }),
    z.object({
        subject: identifierSchema,
        predicate: identifierSchema,
        object: z.string(),
        objectKind: z.literal('typed'),
        datatype: identifierSchema,
    }),
]);

interface StatementRow {
    subject: string;
    predicate: string;
    object: string;
    object_kind: string;
    datatype: string;
}

interface InsertParams {
    subject: string;
    predicate: string;
    object: string;
    objectKind: ObjectKind;
    datatype: string;
}

function rowToStatement(row: StatementRow): Statement | null {
    if (!OBJECT_KINDS.has(row.object_kind)) return null;

    switch (row.object_kind) {
        case 'node':
            return { subject: row.subject, predicate: row.predicate, object: row.object, objectKind: 'node' };
        case 'literal':
            return { subject: row.subject, predicate: row.predicate, object: row.object, objectKind: 'literal' };
        default:
            return { subject: row.subject, predicate: row.predicate, object: row.object, objectKind: 'typed', datatype: row.datatype };
    }
}

function toBinding(row: Record<string, unknown>): Binding {
    const binding: Binding = {};
    for (const [key, value] of Object.entries(row)) {
        if (value === null || value === undefined) continue;
        binding[key] = String(value);
    }
    return binding;
}

function failure(type: OperationErrorType, message: string, cause?: unknown): { success: false; error: OperationError } {
    return { success: false, error: cause === undefined ? { type, message } : { type, message, cause } };
}

/**
 * Statement store over better-sqlite3.
 *
 * A read-write handle holds the location's lock for its whole lifetime and
 * loads the bootstrap ontology into an empty store. Read-only handles never
 * lock and never write; they see the writer's commits as WAL allows.
 * better-sqlite3 is synchronous, so calls on one handle never interleave.
 */
export class GraphStore {
    readonly location: string;
    readonly mode: StoreMode;

    private readonly db: Database.Database;
    private readonly lock: StoreLock | null;
    private readonly bootstrap: string;
    private readonly defaultLimit: number;
    private readonly maxLimit: number;
    private closed = false;

    constructor(options: GraphStoreOptions) {
        this.location = options.location;
        this.mode = options.mode;
        this.bootstrap = options.bootstrap ?? CORE_ONTOLOGY;
        this.defaultLimit = options.defaultLimit ?? DEFAULT_CONFIG.query.defaultLimit;
        this.maxLimit = options.maxLimit ?? DEFAULT_CONFIG.query.maxLimit;

        const dbPath = join(this.location, DATABASE_FILE);

        if (this.mode === 'read-only') {
            this.lock = null;
            this.db = GraphStore.openReadOnly(this.location, dbPath);
        } else {
            mkdirSync(this.location, { recursive: true });
            this.lock = new StoreLock(join(this.location, LOCK_FILE), this.location);
            this.lock.acquire();

            try {
                this.db = new Database(dbPath);
            } catch (error) {
                this.lock.release();
                throw new StoreOpenError(`Cannot open store database at ${dbPath}`, { cause: error });
            }

            try {
                this.db.pragma('journal_mode = WAL');
                this.migrate();
                if (this.statementCount() === 0) {
                    this.loadBootstrap();
                }
            } catch (error) {
                this.db.close();
                this.lock.release();
                if (error instanceof StoreInitError) throw error;
                throw new StoreOpenError(`Cannot initialize store at ${this.location}`, { cause: error });
            }
        }

        getLogger().debug({ location: this.location, mode: this.mode }, 'Graph store opened');
    }

    private static openReadOnly(location: string, dbPath: string): Database.Database {
        if (!existsSync(location)) {
            throw new StoreOpenError(`Store location does not exist: ${location}`);
        }

        let db: Database.Database;
        try {
            db = new Database(dbPath, { readonly: true, fileMustExist: true });
        } catch (error) {
            throw new StoreOpenError(`Cannot open store database at ${dbPath}`, { cause: error });
        }

        const version = db.pragma('user_version', { simple: true });
        if (typeof version !== 'number' || version < 1) {
            db.close();
            throw new StoreOpenError(`Store at ${location} has not been initialized`);
        }

        return db;
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info({ location: this.location }, 'Store migrated to v1');
        }
    }

    private loadBootstrap(): void {
        let set: StatementSet;
        try {
            set = parseStatements(this.bootstrap);
        } catch (error) {
            throw new StoreInitError('Bootstrap ontology could not be parsed', { cause: error });
        }

        const summary = this.writeStatements(set);
        getLogger().info({ location: this.location, statements: summary.inserted }, 'Bootstrap ontology loaded');
    }

    // ─── Insert ───────────────────────────────────────────────

    /**
     * Store every valid statement of the set. Duplicates are ignored and
     * malformed statements are skipped one by one.
     */
    insert(set: StatementSet): Result<InsertSummary> {
        const guard = this.writable('insert');
        if (guard) return guard;

        try {
            const summary = this.writeStatements(set);
            getLogger().debug({ documentId: set.documentId, ...summary }, 'Statement set inserted');
            return { success: true, data: summary };
        } catch (error) {
            getLogger().warn({ documentId: set.documentId, error }, 'Insert failed');
            return failure('BACKEND_ERROR', 'Insert failed', error);
        }
    }

    private writeStatements(set: StatementSet): InsertSummary {
        const insertStmt = this.db.prepare<InsertParams>(`
      INSERT OR IGNORE INTO statements (subject, predicate, object, object_kind, datatype)
      VALUES (@subject, @predicate, @object, @objectKind, @datatype)
    `);

        const namespaceStmt = this.db.prepare<[string, string]>(`
      INSERT INTO namespaces (prefix, uri) VALUES (?, ?)
      ON CONFLICT(prefix) DO UPDATE SET uri = excluded.uri
    `);

        const summary: InsertSummary = { inserted: 0, duplicates: 0, skipped: 0 };

        const insertAll = this.db.transaction((statements: readonly Statement[]) => {
            for (const statement of statements) {
                const parsed = storableStatementSchema.safeParse(statement);
                if (!parsed.success) {
                    summary.skipped++;
                    getLogger().warn({ statement, issues: parsed.error.issues }, 'Skipping malformed statement');
                    continue;
                }

                const valid = parsed.data;
                // xsd:string is the implicit datatype of a plain literal
                const plain = valid.objectKind === 'typed' && valid.datatype === XSD_STRING;
                try {
                    const result = insertStmt.run({
                        subject: valid.subject,
                        predicate: valid.predicate,
                        object: valid.object,
                        objectKind: plain ? 'literal' : valid.objectKind,
                        datatype: valid.objectKind === 'typed' && !plain ? valid.datatype : '',
                    });
                    if (result.changes > 0) {
                        summary.inserted++;
                    } else {
                        summary.duplicates++;
                    }
                } catch (error) {
                    summary.skipped++;
                    getLogger().warn({ statement, error }, 'Skipping statement the backend rejected');
                }
            }

            for (const [prefix, uri] of Object.entries(set.namespaces)) {
                namespaceStmt.run(prefix, uri);
            }
        });

        insertAll(set.statements);
        return summary;
    }

    // ─── Query ────────────────────────────────────────────────

    /**
     * Run one of the fixed query templates. Never throws: validation errors,
     * timeouts and backend faults come back as a failed result with no bindings.
     */
    query(descriptor: QueryDescriptor, timeoutMs: number = DEFAULT_QUERY_TIMEOUT_MS): QueryResult {
        const started = performance.now();
        const elapsed = (): number => performance.now() - started;

        const failed = (type: OperationErrorType, message: string, cause?: unknown): QueryResult => {
            const error: OperationError = cause === undefined ? { type, message } : { type, message, cause };
            getLogger().warn({ descriptor, type, message }, 'Query failed');
            return { success: false, bindings: [], count: 0, elapsedMs: elapsed(), error };
        };

        const parsed = queryDescriptorSchema.safeParse(descriptor);
        if (!parsed.success) {
            return failed('INVALID_QUERY', `Invalid query descriptor: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
        }
        if (!Number.isFinite(timeoutMs)) {
            return failed('INVALID_QUERY', `Invalid timeout: ${timeoutMs}`);
        }
        if (this.closed) {
            return failed('BACKEND_ERROR', 'Store is closed');
        }

        const limit = Math.min(parsed.data.limit ?? this.defaultLimit, this.maxLimit);
        const compiled = compileQuery(parsed.data, limit);
        if (!compiled.success) {
            return failed('INVALID_QUERY', compiled.message);
        }

        const deadline = started + timeoutMs;
        if (performance.now() >= deadline) {
            return failed('TIMEOUT', `Query timed out after ${timeoutMs}ms`);
        }

        const bindings: Binding[] = [];
        try {
            const stmt = this.db.prepare<QueryParams, Record<string, unknown>>(compiled.query.sql);
            for (const row of stmt.iterate(compiled.query.params)) {
                if (performance.now() >= deadline) {
                    return failed('TIMEOUT', `Query timed out after ${timeoutMs}ms`);
                }
                bindings.push(toBinding(row));
            }
        } catch (error) {
            return failed('BACKEND_ERROR', 'Query execution failed', error);
        }

        if (performance.now() >= deadline) {
            return failed('TIMEOUT', `Query timed out after ${timeoutMs}ms`);
        }

        const elapsedMs = elapsed();
        getLogger().debug({ kind: parsed.data.kind, count: bindings.length, elapsedMs }, 'Query completed');
        return { success: true, bindings, count: bindings.length, elapsedMs };
    }

    // ─── Stats ────────────────────────────────────────────────

    stats(): Result<StoreStats> {
        const documentClass = fullUri(TERMS.document);
        const conceptClass = fullUri(TERMS.concept);
        const classToType = new Map(DOCUMENT_TYPES.map((type) => [fullUri(documentClassFor(type)), type]));

        const totals = this.query({ kind: 'countByType', types: [documentClass, conceptClass] });
        if (!totals.success) return { success: false, error: totals.error };

        const byType = this.query({ kind: 'countByType', types: Array.from(classToType.keys()) });
        if (!byType.success) return { success: false, error: byType.error };

        const countOf = (bindings: Binding[], type: string): number =>
            Number(bindings.find((b) => b.type === type)?.count ?? 0);

        const documentsByType: Record<string, number> = {};
        for (const binding of byType.bindings) {
            const type = binding.type === undefined ? undefined : classToType.get(binding.type);
            if (type !== undefined) {
                documentsByType[type] = Number(binding.count ?? 0);
            }
        }

        try {
            return {
                success: true,
                data: {
                    documents: countOf(totals.bindings, documentClass),
                    concepts: countOf(totals.bindings, conceptClass),
                    statements: this.statementCount(),
                    documentsByType,
                },
            };
        } catch (error) {
            return failure('BACKEND_ERROR', 'Statement count failed', error);
        }
    }

    private statementCount(): number {
        const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM statements').get();
        return row?.count ?? 0;
    }

    // ─── Snapshot & export ────────────────────────────────────

    /**
     * Every stored statement in insertion order.
     */
    allStatements(): Statement[] {
        const rows = this.db
            .prepare<[], StatementRow>('SELECT subject, predicate, object, object_kind, datatype FROM statements ORDER BY statement_id')
            .all();
        return this.toStatements(rows);
    }

    /**
     * Prefix table: the standard namespaces plus any declared by inserted sets.
     */
    namespaces(): NamespaceTable {
        const rows = this.db.prepare<[], { prefix: string; uri: string }>('SELECT prefix, uri FROM namespaces ORDER BY prefix').all();
        const table: Record<string, string> = { ...NAMESPACES };
        for (const row of rows) {
            table[row.prefix] = row.uri;
        }
        return Object.freeze(table);
    }

    /**
     * Turtle for one subject's statements plus those of every node it
     * discusses. Resolves to null when the subject has no statements.
     */
    async exportSubgraph(subjectId: string): Promise<string | null> {
        const namespaces = this.namespaces();
        const subject = resolveIdentifier(subjectId, namespaces);
        if (subject === null) return null;

        const bySubject = this.db.prepare<[string], StatementRow>(
            'SELECT subject, predicate, object, object_kind, datatype FROM statements WHERE subject = ? ORDER BY statement_id'
        );

        const own = this.toStatements(bySubject.all(subject));
        if (own.length === 0) return null;

        const discusses = fullUri(TERMS.discusses);
        const related = own
            .filter((s) => s.predicate === discusses && s.objectKind === 'node')
            .flatMap((s) => this.toStatements(bySubject.all(s.object)));

        return serializeStatements([...own, ...related], namespaces);
    }

    /**
     * Turtle for the whole store.
     */
    async exportAll(): Promise<string> {
        return serializeStatements(this.allStatements(), this.namespaces());
    }

    private toStatements(rows: readonly StatementRow[]): Statement[] {
        const statements: Statement[] = [];
        for (const row of rows) {
            const statement = rowToStatement(row);
            if (statement === null) {
                getLogger().warn({ row }, 'Skipping malformed stored statement');
                continue;
            }
            statements.push(statement);
        }
        return statements;
    }

    // ─── Maintenance ──────────────────────────────────────────

    /**
     * Remove every statement and namespace, then reload the bootstrap ontology.
     */
    clear(): Result<void> {
        const guard = this.writable('clear');
        if (guard) return guard;

        try {
            this.db.transaction(() => {
                this.db.exec('DELETE FROM statements; DELETE FROM namespaces;');
            })();
            this.loadBootstrap();
            getLogger().info({ location: this.location }, 'Store cleared');
            return { success: true, data: undefined };
        } catch (error) {
            getLogger().warn({ location: this.location, error }, 'Clear failed');
            return failure('BACKEND_ERROR', 'Clear failed', error);
        }
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.db.close();
        this.lock?.release();
        getLogger().debug({ location: this.location }, 'Graph store closed');
    }

    private writable(operation: string): { success: false; error: OperationError } | null {
        if (this.mode === 'read-only') {
            return failure('READ_ONLY', `Cannot ${operation}: store opened read-only`);
        }
        if (this.closed) {
            return failure('BACKEND_ERROR', `Cannot ${operation}: store is closed`);
        }
        return null;
    }
}
