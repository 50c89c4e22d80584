import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { spawn } from 'node:child_process';
import { once } from 'node:events';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { GraphStore, LOCK_FILE } from '../storage/graph-store.js';
import { StoreInitError, StoreLockedError, StoreOpenError } from '../storage/errors.js';
import { buildStatementSet } from '../graph/triple-builder.js';
import { CG_NAMESPACE, NAMESPACES } from '../graph/vocabulary.js';
import { parseStatements } from '../serializer/turtle.js';
import type { DocumentMetadata, ResolvedConcept, Statement, StatementSet } from '../types/index.js';

const BOOTSTRAP_STATEMENTS = 61;

function makeConcept(text: string, start: number): ResolvedConcept {
    return { text, label: 'algorithm', start, end: start + text.length, confidence: 0.9, context: text, domain: 'cs' };
}

function metadata(confidence: number, title: string): DocumentMetadata {
    return { type: 'plain_text', confidence, features: { line_count: 3, avg_line_length: 12.5, has_headers: false }, title };
}

// Raft + Paxos, 29 statements
function notesSet(): StatementSet {
    return buildStatementSet('x'.repeat(100), [makeConcept('Raft', 10), makeConcept('Paxos', 50)], metadata(0.5, 'Notes'), 'notes');
}

// Raft only, higher confidence; 13 statements not already in notesSet()
function otherSet(): StatementSet {
    return buildStatementSet('y'.repeat(100), [makeConcept('Raft', 5)], metadata(0.9, 'Other'), 'other');
}

function multiset(statements: readonly Statement[]): string[] {
    return statements
        .map((s) => JSON.stringify([s.subject, s.predicate, s.object, s.objectKind, s.datatype ?? '']))
        .sort();
}

describe('GraphStore', () => {
    let tmpDir: string;
    let location: string;
    const opened: GraphStore[] = [];

    function open(mode: 'read-write' | 'read-only', bootstrap?: string): GraphStore {
        const store = new GraphStore({ location, mode, bootstrap });
        opened.push(store);
        return store;
    }

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'conceptgraph-test-'));
        location = path.join(tmpDir, 'store');
    });

    afterEach(() => {
        for (const store of opened.splice(0)) {
            store.close();
        }
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('opening', () => {
        it('should bootstrap the core ontology into a new store', () => {
            const store = open('read-write');
            const stats = store.stats();

            expect(stats).toEqual({
                success: true,
                data: { documents: 0, concepts: 0, statements: BOOTSTRAP_STATEMENTS, documentsByType: {} },
            });
        });

        it('should not bootstrap twice', () => {
            open('read-write').close();
            const store = open('read-write');
            expect(store.allStatements()).toHaveLength(BOOTSTRAP_STATEMENTS);
        });

        it('should fail a second read-write open with a lock error', () => {
            open('read-write');
            expect(() => open('read-write')).toThrow(StoreLockedError);
        });

        it('should allow read-only opens next to a writer', () => {
            const writer = open('read-write');
            const reader = open('read-only');
            const second = open('read-only');

            expect(writer.insert(notesSet()).success).toBe(true);
            expect(reader.query({ kind: 'documentsDiscussing', concept: 'Raft' }).count).toBe(1);
            expect(second.mode).toBe('read-only');
        });

        it('should release the lock on close', () => {
            open('read-write').close();
            expect(fs.existsSync(path.join(location, LOCK_FILE))).toBe(false);
            expect(() => open('read-write')).not.toThrow();
        });

        it('should reclaim a lock left by a dead process', () => {
            fs.mkdirSync(location, { recursive: true });
            fs.writeFileSync(
                path.join(location, LOCK_FILE),
                JSON.stringify({ pid: 2147483646, acquiredAt: '2024-01-01T00:00:00.000Z' })
            );

            expect(() => open('read-write')).not.toThrow();
        });

        it('should refuse a lock held by another process until it exits', async () => {
            fs.mkdirSync(location, { recursive: true });
            const lockPath = path.join(location, LOCK_FILE);

            // Takes the lock the same way a writer does, then stays alive
            const script = [
                "const fs = require('node:fs');",
                "fs.writeFileSync(process.argv[1], JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }), { flag: 'wx' });",
                "process.stdout.write('held');",
                'setInterval(() => {}, 1000);',
            ].join('\n');
            const holder = spawn(process.execPath, ['-e', script, lockPath], { stdio: ['ignore', 'pipe', 'inherit'] });

            try {
                await once(holder.stdout, 'data');

                let refused: unknown = null;
                try {
                    open('read-write');
                } catch (error) {
                    refused = error;
                }
                expect(refused).toBeInstanceOf(StoreLockedError);
                if (refused instanceof StoreLockedError) expect(refused.holderPid).toBe(holder.pid);
            } finally {
                const exited = once(holder, 'exit');
                holder.kill();
                await exited;
            }

            expect(() => open('read-write')).not.toThrow();
        });

        it('should refuse an unreadable lock file', () => {
            fs.mkdirSync(location, { recursive: true });
            fs.writeFileSync(path.join(location, LOCK_FILE), 'garbage');

            expect(() => open('read-write')).toThrow(StoreLockedError);
        });

        it('should fail a read-only open of a missing location', () => {
            expect(() => open('read-only')).toThrow(StoreOpenError);
        });

        it('should fail on an unparsable bootstrap and release the lock', () => {
            expect(() => open('read-write', 'this is not turtle')).toThrow(StoreInitError);
            expect(fs.existsSync(path.join(location, LOCK_FILE))).toBe(false);
        });
    });

    describe('insert', () => {
        it('should be idempotent', () => {
            const store = open('read-write');

            expect(store.insert(notesSet())).toEqual({ success: true, data: { inserted: 29, duplicates: 0, skipped: 0 } });
            expect(store.insert(notesSet())).toEqual({ success: true, data: { inserted: 0, duplicates: 29, skipped: 0 } });

            const result = store.query({ kind: 'documentsDiscussing', concept: 'Raft' });
            expect(result.bindings).toEqual([
                { document: `${CG_NAMESPACE}doc-notes`, title: 'Notes', confidence: '0.5', domain: 'cs' },
            ]);
        });

        it('should skip malformed statements one by one', () => {
            const store = open('read-write');
            const set: StatementSet = {
                documentId: '',
                statements: [
                    { subject: 'http://example.org/a', predicate: 'http://example.org/p', object: 'ok', objectKind: 'literal' },
                    { subject: 'not an iri', predicate: 'http://example.org/p', object: 'bad', objectKind: 'literal' },
                    { subject: 'http://example.org/a', predicate: 'http://example.org/p', object: '1', objectKind: 'typed' },
                ],
                namespaces: NAMESPACES,
                conceptsMapped: 0,
                relationshipsCreated: 0,
            };

            expect(store.insert(set)).toEqual({ success: true, data: { inserted: 1, duplicates: 0, skipped: 2 } });
        });

        it('should store statements with non-hierarchical IRIs and plain xsd:string literals', () => {
            const store = open('read-write');
            const set: StatementSet = {
                documentId: '',
                statements: [
                    { subject: 'urn:person:alice', predicate: 'http://xmlns.com/foaf/0.1/mbox', object: 'mailto:alice@example.org', objectKind: 'node' },
                    {
                        subject: 'urn:person:alice',
                        predicate: 'http://xmlns.com/foaf/0.1/nick',
                        object: 'al',
                        objectKind: 'typed',
                        datatype: 'http://www.w3.org/2001/XMLSchema#string',
                    },
                ],
                namespaces: NAMESPACES,
                conceptsMapped: 0,
                relationshipsCreated: 0,
            };

            expect(store.insert(set)).toEqual({ success: true, data: { inserted: 2, duplicates: 0, skipped: 0 } });
            expect(store.allStatements().filter((s) => s.subject === 'urn:person:alice')).toEqual([
                { subject: 'urn:person:alice', predicate: 'http://xmlns.com/foaf/0.1/mbox', object: 'mailto:alice@example.org', objectKind: 'node' },
                { subject: 'urn:person:alice', predicate: 'http://xmlns.com/foaf/0.1/nick', object: 'al', objectKind: 'literal' },
            ]);
        });

        it('should reject inserts on a read-only handle', () => {
            open('read-write').close();
            const reader = open('read-only');
            const result = reader.insert(notesSet());

            expect(result.success).toBe(false);
            if (!result.success) expect(result.error.type).toBe('READ_ONLY');
        });
    });

    describe('query', () => {
        let store: GraphStore;

        beforeEach(() => {
            store = open('read-write');
            store.insert(notesSet());
            store.insert(otherSet());
        });

        it('should order documents by confidence', () => {
            const result = store.query({ kind: 'documentsDiscussing', concept: 'Raft' });

            expect(result.success).toBe(true);
            expect(result.bindings.map((b) => b.document)).toEqual([`${CG_NAMESPACE}doc-other`, `${CG_NAMESPACE}doc-notes`]);
            expect(result.count).toBe(2);
        });

        it('should apply the limit', () => {
            const result = store.query({ kind: 'documentsDiscussing', concept: 'Raft', limit: 1 });
            expect(result.bindings.map((b) => b.document)).toEqual([`${CG_NAMESPACE}doc-other`]);
        });

        it('should match concept text exactly', () => {
            expect(store.query({ kind: 'documentsDiscussing', concept: 'raft' }).count).toBe(0);
        });

        it('should count co-occurring concepts in both directions', () => {
            expect(store.query({ kind: 'coOccurringConcepts', concept: 'Raft' }).bindings).toEqual([
                { concept: 'Paxos', frequency: '1' },
            ]);
            expect(store.query({ kind: 'coOccurringConcepts', concept: 'Paxos' }).bindings).toEqual([
                { concept: 'Raft', frequency: '1' },
            ]);
        });

        it('should count instances by type', () => {
            const result = store.query({ kind: 'countByType', types: ['cg:Concept', 'cg:Document'] });
            expect(result.bindings).toEqual([
                { type: `${CG_NAMESPACE}Concept`, count: '2' },
                { type: `${CG_NAMESPACE}Document`, count: '2' },
            ]);
        });

        it('should report statistics', () => {
            expect(store.stats()).toEqual({
                success: true,
                data: {
                    documents: 2,
                    concepts: 2,
                    statements: BOOTSTRAP_STATEMENTS + 29 + 13,
                    documentsByType: { plain_text: 2 },
                },
            });
        });

        it('should fail with TIMEOUT for a zero timeout', () => {
            const result = store.query({ kind: 'documentsDiscussing', concept: 'Raft' }, 0);

            expect(result.success).toBe(false);
            expect(result.bindings).toEqual([]);
            expect(result.count).toBe(0);
            if (!result.success) {
                expect(result.error.type).toBe('TIMEOUT');
                expect(typeof result.elapsedMs).toBe('number');
            }
        });

        it('should fail with INVALID_QUERY for malformed descriptors', () => {
            const empty = store.query({ kind: 'documentsDiscussing', concept: '' });
            const negative = store.query({ kind: 'coOccurringConcepts', concept: 'Raft', limit: -1 });
            const unknownType = store.query({ kind: 'countByType', types: ['nope:Thing'] });

            for (const result of [empty, negative, unknownType]) {
                expect(result.success).toBe(false);
                if (!result.success) expect(result.error.type).toBe('INVALID_QUERY');
            }
        });

        it('should fail with BACKEND_ERROR once closed', () => {
            store.close();
            const result = store.query({ kind: 'documentsDiscussing', concept: 'Raft' });

            expect(result.success).toBe(false);
            if (!result.success) expect(result.error.type).toBe('BACKEND_ERROR');
        });
    });

    describe('export and clear', () => {
        it('should export a document subgraph', async () => {
            const store = open('read-write');
            const set = notesSet();
            store.insert(set);

            const turtle = await store.exportSubgraph('cg:doc-notes');
            expect(turtle).not.toBeNull();
            expect(multiset(parseStatements(turtle ?? '').statements)).toEqual(multiset(set.statements));
        });

        it('should return null for unknown subjects', async () => {
            const store = open('read-write');

            expect(await store.exportSubgraph('cg:doc-missing')).toBeNull();
            expect(await store.exportSubgraph('nope:doc')).toBeNull();
        });

        it('should clear and reload the bootstrap ontology', () => {
            const store = open('read-write');
            store.insert(notesSet());

            expect(store.clear()).toEqual({ success: true, data: undefined });
            expect(store.allStatements()).toHaveLength(BOOTSTRAP_STATEMENTS);
            expect(store.query({ kind: 'documentsDiscussing', concept: 'Raft' }).count).toBe(0);
        });

        it('should reject clear on a read-only handle', () => {
            open('read-write').close();
            const result = open('read-only').clear();

            expect(result.success).toBe(false);
            if (!result.success) expect(result.error.type).toBe('READ_ONLY');
        });
    });
});
