import type {
    DocumentMetadata,
    NamespaceTable,
    ResolvedConcept,
    Statement,
    StatementSet,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { domainDistribution } from '../nlp/span-resolver.js';
import { getLogger } from '../utils/logger.js';
import { conceptId, documentId } from './identity.js';
import {
    DEFAULT_LABEL_CLASSES,
    NAMESPACES,
    TERMS,
    XSD_STRING,
    documentClassFor,
    expandIdentifier,
    pascalCase,
} from './vocabulary.js';
import type { IdentifierResolver } from './vocabulary.js';

export interface TripleBuilderOptions {
    /** Start-offset distance below which two concepts co-occur */
    proximityWindow?: number;
    /** Share a domain must exceed to become the primary domain */
    primaryDomainThreshold?: number;
    labelClasses?: ReadonlyMap<string, string>;
    namespaces?: NamespaceTable;
}

function node(subject: string, predicate: string, object: string): Statement {
    return { subject, predicate, object, objectKind: 'node' };
}

function literal(subject: string, predicate: string, object: string): Statement {
    return { subject, predicate, object, objectKind: 'literal' };
}

function typed(subject: string, predicate: string, object: string, datatype: string): Statement {
    return { subject, predicate, object, objectKind: 'typed', datatype };
}

/**
 * Maps a document and its resolved concepts onto ontology statements.
 *
 * Output blocks, in order: document metadata, one block per concept,
 * co-occurrence edges, domain aggregates. Statements are built in short
 * form and expanded through the namespace table at the end; a statement
 * that cannot be expanded is dropped on its own.
 */
export class TripleBuilder {
    private readonly proximityWindow: number;
    private readonly primaryDomainThreshold: number;
    private readonly labelClasses: ReadonlyMap<string, string>;
    private readonly namespaces: NamespaceTable;

    constructor(options: TripleBuilderOptions = {}) {
        this.proximityWindow = options.proximityWindow ?? DEFAULT_CONFIG.resolution.proximityWindow;
        this.primaryDomainThreshold = options.primaryDomainThreshold ?? DEFAULT_CONFIG.resolution.primaryDomainThreshold;
        this.labelClasses = options.labelClasses ?? DEFAULT_LABEL_CLASSES;
        this.namespaces = Object.freeze({ ...(options.namespaces ?? NAMESPACES) });
    }

    build(
        content: string,
        concepts: readonly ResolvedConcept[],
        metadata: DocumentMetadata,
        stableName?: string
    ): StatementSet {
        const docId = documentId(content, stableName);
        const conceptIds = concepts.map((concept) => conceptId(concept.text, concept.label));

        const documentBlock = this.documentStatements(docId, metadata, stableName);
        const conceptBlock = concepts.flatMap((concept, i) => this.conceptStatements(docId, conceptIds[i] ?? '', concept));
        const coOccurrenceBlock = this.expandAll(this.coOccurrenceStatements(concepts, conceptIds));
        const domainBlock = this.expandAll(this.domainStatements(docId, concepts));

        const statements = [
            ...this.expandAll(documentBlock),
            ...this.expandAll(conceptBlock),
            ...coOccurrenceBlock,
            ...domainBlock,
        ];

        const set: StatementSet = {
            documentId: expandIdentifier(docId, this.namespaces) ?? docId,
            statements: Object.freeze(statements.map((statement) => Object.freeze(statement))),
            namespaces: this.namespaces,
            conceptsMapped: concepts.length,
            relationshipsCreated: coOccurrenceBlock.length + domainBlock.length,
        };

        getLogger().debug(
            { documentId: set.documentId, statements: statements.length, concepts: set.conceptsMapped, relationships: set.relationshipsCreated },
            'Statement set built'
        );

        return Object.freeze(set);
    }

    private documentStatements(docId: string, metadata: DocumentMetadata, stableName?: string): Statement[] {
        const statements: Statement[] = [
            node(docId, TERMS.type, TERMS.document),
            node(docId, TERMS.type, documentClassFor(metadata.type)),
            typed(docId, TERMS.typeConfidence, String(metadata.confidence), TERMS.xsdFloat),
        ];

        if (metadata.title) {
            statements.push(literal(docId, TERMS.title, metadata.title));
        }

        // Numeric and boolean features become data properties; anything else is skipped
        for (const [key, value] of Object.entries(metadata.features)) {
            if (typeof value === 'boolean') {
                statements.push(typed(docId, `cg:${key}`, String(value), TERMS.xsdBoolean));
            } else if (typeof value === 'number' && Number.isFinite(value)) {
                const datatype = Number.isInteger(value) ? TERMS.xsdInteger : TERMS.xsdFloat;
                statements.push(typed(docId, `cg:${key}`, String(value), datatype));
            }
        }

        if (stableName) {
            statements.push(literal(docId, TERMS.sourceName, stableName));
        }

        return statements;
    }

    private conceptStatements(docId: string, id: string, concept: ResolvedConcept): Statement[] {
        const statements: Statement[] = [node(id, TERMS.type, TERMS.concept)];

        const ontologyClass = this.labelClasses.get(concept.label);
        if (ontologyClass !== undefined) {
            statements.push(node(id, TERMS.type, ontologyClass));
        }

        statements.push(
            literal(id, TERMS.label, concept.text),
            literal(id, TERMS.extractionLabel, concept.label),
            typed(id, TERMS.confidence, String(concept.confidence), TERMS.xsdFloat),
            typed(id, TERMS.startPosition, String(concept.start), TERMS.xsdInteger),
            typed(id, TERMS.endPosition, String(concept.end), TERMS.xsdInteger),
            literal(id, TERMS.context, concept.context),
            node(docId, TERMS.discusses, id)
        );

        return statements;
    }

    /**
     * One directed edge per nearby pair, from the earlier concept to the later.
     */
    private coOccurrenceStatements(concepts: readonly ResolvedConcept[], ids: readonly string[]): Statement[] {
        const statements: Statement[] = [];

        concepts.forEach((a, i) => {
            concepts.slice(i + 1).forEach((b, offset) => {
                const j = i + 1 + offset;
                const first = ids[i];
                const second = ids[j];
                if (first === undefined || second === undefined) return;

                if (Math.abs(a.start - b.start) < this.proximityWindow) {
                    statements.push(node(first, TERMS.coOccursWith, second));
                }
            });
        });

        return statements;
    }

    private domainStatements(docId: string, concepts: readonly ResolvedConcept[]): Statement[] {
        const distribution = domainDistribution(concepts);
        const total = concepts.length;
        const statements: Statement[] = [];
        let primary: string | undefined;

        for (const [domain, count] of distribution) {
            const share = total > 0 ? count / total : 0;
            statements.push(typed(docId, `cg:covers${pascalCase(domain)}`, String(share), TERMS.xsdFloat));

            if (primary === undefined && share > this.primaryDomainThreshold) {
                primary = domain;
            }
        }

        if (primary !== undefined) {
            statements.push(literal(docId, TERMS.primaryDomain, primary));
        }

        return statements;
    }

    private expandAll(statements: readonly Statement[]): Statement[] {
        const expanded: Statement[] = [];

        for (const statement of statements) {
            const result = expandStatement(statement, this.namespaces);
            if (result === null) {
                getLogger().warn({ statement }, 'Dropping statement with unexpandable identifier');
                continue;
            }
            expanded.push(result);
        }

        return expanded;
    }
}

/**
 * Expand every identifier position of a statement to a full URI.
 * Returns null when any of them cannot be resolved. A literal typed
 * `xsd:string` comes back as a plain literal, which is what it parses as.
 */
export function expandStatement(
    statement: Statement,
    namespaces: NamespaceTable,
    resolve: IdentifierResolver = expandIdentifier
): Statement | null {
    const subject = resolve(statement.subject, namespaces);
    const predicate = resolve(statement.predicate, namespaces);
    if (subject === null || predicate === null) return null;

    switch (statement.objectKind) {
        case 'node': {
            const object = resolve(statement.object, namespaces);
            return object === null ? null : { subject, predicate, object, objectKind: 'node' };
        }
        case 'literal':
            return { subject, predicate, object: statement.object, objectKind: 'literal' };
        case 'typed': {
            if (statement.datatype === undefined) return null;
            const datatype = resolve(statement.datatype, namespaces);
            if (datatype === null) return null;
            if (datatype === XSD_STRING) {
                return { subject, predicate, object: statement.object, objectKind: 'literal' };
            }
            return { subject, predicate, object: statement.object, objectKind: 'typed', datatype };
        }
    }
}

const defaultBuilder = new TripleBuilder();

/**
 * Build with default tables and thresholds.
 */
export function buildStatementSet(
    content: string,
    concepts: readonly ResolvedConcept[],
    metadata: DocumentMetadata,
    stableName?: string
): StatementSet {
    return defaultBuilder.build(content, concepts, metadata, stableName);
}
