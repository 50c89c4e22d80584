import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { processDirectory, processDocument } from '../builder/pipeline.js';
import { GraphStore } from '../storage/graph-store.js';
import { documentId } from '../graph/identity.js';
import { CG_NAMESPACE, fullUri } from '../graph/vocabulary.js';
import type { RawSpan, SpanExtractor } from '../types/index.js';

const CONTENT = 'Raft and Paxos solve consensus.';

describe('Document Pipeline', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'conceptgraph-pipeline-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('processDocument', () => {
        it('should classify, extract and map a document', () => {
            const result = processDocument({ content: CONTENT });

            expect(result.documentId).toBe(fullUri(documentId(CONTENT)));
            expect(result.metadata.type).toBe('plain_text');
            expect(result.concepts.map((c) => c.text)).toEqual(['Raft', 'Paxos', 'consensus']);
            expect(result.domainDistribution).toEqual({ cs: 3 });
            expect(result.dropped).toBe(0);
            expect(result.stored).toBe(false);
            expect(result.statementSet.conceptsMapped).toBe(3);
            expect(result.statementSet.statements).toHaveLength(43);
        });

        it('should use supplied spans instead of the extractor', () => {
            const result = processDocument({
                content: CONTENT,
                spans: [
                    { text: 'Paxos', label: 'algorithm', start: 9, end: 14, confidence: 0.7 },
                    { text: 'Paxos', label: 'algorithm', start: 9, end: 400, confidence: 0.7 },
                ],
            });

            expect(result.concepts.map((c) => c.text)).toEqual(['Paxos']);
            expect(result.concepts[0]?.context).toBe(CONTENT);
            expect(result.dropped).toBe(1);
        });

        it('should use an injected extractor', () => {
            const extractor: SpanExtractor = {
                extract: (): RawSpan[] => [{ text: 'solve', label: 'methodology', start: 15, end: 20, confidence: 0.4 }],
            };
            const result = processDocument({ content: CONTENT }, { extractor });

            expect(result.concepts).toHaveLength(1);
            expect(result.concepts[0]).toMatchObject({ text: 'solve', domain: 'methods' });
        });

        it('should insert into a store', () => {
            const store = new GraphStore({ location: path.join(tmpDir, 'store'), mode: 'read-write' });
            try {
                const result = processDocument({ content: CONTENT, stableName: 'notes' }, { store });

                expect(result.stored).toBe(true);
                expect(result.documentId).toBe(`${CG_NAMESPACE}doc-notes`);
                expect(store.query({ kind: 'documentsDiscussing', concept: 'consensus' }).bindings).toEqual([
                    { document: `${CG_NAMESPACE}doc-notes`, title: 'Raft and Paxos solve consensus.', confidence: '0.5', domain: 'cs' },
                ]);
            } finally {
                store.close();
            }
        });

        it('should report store failures on the result', () => {
            const location = path.join(tmpDir, 'store');
            new GraphStore({ location, mode: 'read-write' }).close();
            const store = new GraphStore({ location, mode: 'read-only' });

            try {
                const result = processDocument({ content: CONTENT }, { store });
                expect(result.stored).toBe(false);
                expect(result.storeError?.type).toBe('READ_ONLY');
            } finally {
                store.close();
            }
        });
    });

    describe('processDirectory', () => {
        it('should process matching files named after their stems', async () => {
            fs.writeFileSync(path.join(tmpDir, 'raft.md'), '# Raft\n\nRaft is used by etcd.');
            fs.writeFileSync(path.join(tmpDir, 'chat.txt'), 'Alice: what about Paxos?\nBob: Lamport wrote it.');
            fs.writeFileSync(path.join(tmpDir, 'data.json'), '{}');

            const { results, failed } = await processDirectory(tmpDir);

            expect(failed).toEqual([]);
            expect(results.map((r) => r.documentId)).toEqual([`${CG_NAMESPACE}doc-chat`, `${CG_NAMESPACE}doc-raft`]);
            expect(results[0]?.metadata.type).toBe('conversation');
            expect(results[0]?.concepts.map((c) => c.text)).toEqual(['Alice', 'Paxos', 'Bob', 'Lamport']);
            expect(results[1]?.metadata.title).toBe('Raft');
        });

        it('should record files that fail and carry on', async () => {
            fs.writeFileSync(path.join(tmpDir, 'bad.txt'), 'this one explodes');
            fs.writeFileSync(path.join(tmpDir, 'good.txt'), 'this one is fine');

            const extractor: SpanExtractor = {
                extract: (content: string): RawSpan[] => {
                    if (content.includes('explodes')) throw new Error('extractor crashed');
                    return [];
                },
            };

            const { results, failed } = await processDirectory(tmpDir, { extractor });

            expect(results.map((r) => r.documentId)).toEqual([`${CG_NAMESPACE}doc-good`]);
            expect(failed).toEqual([{ file: path.join(tmpDir, 'bad.txt'), error: 'extractor crashed' }]);
        });

        it('should honor custom extensions', async () => {
            fs.writeFileSync(path.join(tmpDir, 'notes.md'), 'Raft');
            fs.writeFileSync(path.join(tmpDir, 'notes.rst'), 'Paxos');

            const { results } = await processDirectory(tmpDir, {}, ['.rst']);
            expect(results.map((r) => r.concepts.map((c) => c.text))).toEqual([['Paxos']]);
        });
    });
});
