import { describe, it, expect } from 'vitest';
import { conceptId, documentId, stableNameFromPath, ID_DIGEST_LENGTH } from '../graph/identity.js';
import {
    CG_NAMESPACE,
    NAMESPACES,
    documentClassFor,
    domainForLabel,
    expandIdentifier,
    fullUri,
    isAbsoluteIri,
    pascalCase,
    resolveIdentifier,
} from '../graph/vocabulary.js';

describe('Identity', () => {
    describe('documentId', () => {
        it('should be the same for identical content', () => {
            const content = 'Raft is a consensus algorithm.';
            expect(documentId(content)).toBe(documentId(content));
        });

        it('should differ for different content', () => {
            expect(documentId('first document')).not.toBe(documentId('second document'));
        });

        it('should use a truncated hex digest', () => {
            expect(documentId('some content')).toMatch(new RegExp(`^cg:doc-[0-9a-f]{${ID_DIGEST_LENGTH}}$`));
        });

        it('should prefer the stable name over content', () => {
            expect(documentId('one', 'notes')).toBe('cg:doc-notes');
            expect(documentId('two', 'notes')).toBe('cg:doc-notes');
        });

        it('should percent-encode stable names', () => {
            expect(documentId('x', 'meeting notes')).toBe('cg:doc-meeting%20notes');
        });

        it('should fall back to content for an empty stable name', () => {
            expect(documentId('abc', '')).toBe(documentId('abc'));
        });
    });

    describe('conceptId', () => {
        it('should be deterministic', () => {
            expect(conceptId('Raft', 'algorithm')).toBe(conceptId('Raft', 'algorithm'));
        });

        it('should differ by text', () => {
            expect(conceptId('Raft', 'algorithm')).not.toBe(conceptId('Paxos', 'algorithm'));
        });

        it('should differ by label', () => {
            expect(conceptId('Raft', 'algorithm')).not.toBe(conceptId('Raft', 'software_system'));
        });

        it('should be case-sensitive', () => {
            expect(conceptId('raft', 'algorithm')).not.toBe(conceptId('Raft', 'algorithm'));
        });

        it('should keep text and label boundaries apart', () => {
            expect(conceptId('ab', 'c')).not.toBe(conceptId('a', 'bc'));
        });
    });

    it('should derive stable names from file stems', () => {
        expect(stableNameFromPath('/data/notes/raft-notes.md')).toBe('raft-notes');
        expect(stableNameFromPath('chat.log.txt')).toBe('chat.log');
    });
});

describe('Vocabulary', () => {
    describe('expandIdentifier', () => {
        it('should expand known prefixes', () => {
            expect(expandIdentifier('cg:Concept')).toBe(`${CG_NAMESPACE}Concept`);
            expect(expandIdentifier('rdf:type')).toBe('http://www.w3.org/1999/02/22-rdf-syntax-ns#type');
        });

        it('should pass absolute IRIs and blank nodes through', () => {
            expect(expandIdentifier('http://example.org/a')).toBe('http://example.org/a');
            expect(expandIdentifier('urn:example:a')).toBe('urn:example:a');
            expect(expandIdentifier('_:b0')).toBe('_:b0');
        });

        it('should return null for unknown or missing prefixes', () => {
            expect(expandIdentifier('nope:thing')).toBeNull();
            expect(expandIdentifier('nocolon')).toBeNull();
            expect(expandIdentifier(':local')).toBeNull();
        });

        it('should not resolve prototype keys as prefixes', () => {
            expect(expandIdentifier('toString:x')).toBeNull();
            expect(expandIdentifier('constructor:x')).toBeNull();
        });

        it('should leave non-hierarchical schemes unresolved', () => {
            expect(expandIdentifier('mailto:alice@example.org')).toBeNull();
        });

        it('should use a custom namespace table', () => {
            const table = { ...NAMESPACES, ex: 'http://example.org/' };
            expect(expandIdentifier('ex:item', table)).toBe('http://example.org/item');
            expect(expandIdentifier('ex:item')).toBeNull();
        });
    });

    describe('resolveIdentifier', () => {
        it('should expand short forms with a known prefix', () => {
            expect(resolveIdentifier('cg:Concept')).toBe(`${CG_NAMESPACE}Concept`);
        });

        it('should keep absolute IRIs of any scheme', () => {
            expect(resolveIdentifier('mailto:alice@example.org')).toBe('mailto:alice@example.org');
            expect(resolveIdentifier('http://example.org/a')).toBe('http://example.org/a');
            expect(resolveIdentifier('_:n1')).toBe('_:n1');
        });

        it('should reject identifiers that are not IRIs', () => {
            expect(resolveIdentifier('orphan')).toBeNull();
            expect(resolveIdentifier('has space:x y')).toBeNull();
            expect(resolveIdentifier('1abc:x')).toBeNull();
        });
    });

    it('isAbsoluteIri should accept any RFC 3987 scheme', () => {
        expect(isAbsoluteIri('urn:isbn:0451450523')).toBe(true);
        expect(isAbsoluteIri('mailto:alice@example.org')).toBe(true);
        expect(isAbsoluteIri('mailto:')).toBe(false);
        expect(isAbsoluteIri('http://example.org/a b')).toBe(false);
    });

    it('fullUri should throw for non-standard terms', () => {
        expect(fullUri('xsd:float')).toBe('http://www.w3.org/2001/XMLSchema#float');
        expect(() => fullUri('nope:x')).toThrow('Not a standard term: nope:x');
    });

    it('should build class names from document types', () => {
        expect(pascalCase('plain_text')).toBe('PlainText');
        expect(pascalCase('cs')).toBe('Cs');
        expect(documentClassFor('plain_text')).toBe('cg:PlainTextDocument');
        expect(documentClassFor('conversation')).toBe('cg:ConversationDocument');
    });

    it('should map unknown labels to the other domain', () => {
        expect(domainForLabel('algorithm')).toBe('cs');
        expect(domainForLabel('person_mention')).toBe('people');
        expect(domainForLabel('unheard_of')).toBe('other');
    });
});
