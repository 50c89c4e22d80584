import { DataFactory, Parser, Writer } from 'n3';
import type { Quad, Quad_Object, Quad_Subject } from 'n3';
import type { NamespaceTable, Statement, StatementSet } from '../types/index.js';
import { expandStatement } from '../graph/triple-builder.js';
import { NAMESPACES, XSD_STRING, fullUri, isBlankNode, resolveIdentifier } from '../graph/vocabulary.js';
import { getLogger } from '../utils/logger.js';

const { namedNode, blankNode, literal, quad } = DataFactory;

const RDF_LANG_STRING = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#langString';
const RDF_TYPE = fullUri('rdf:type');
const CG_DOCUMENT = fullUri('cg:Document');

function subjectTerm(id: string): Quad_Subject {
    return isBlankNode(id) ? blankNode(id.slice(2)) : namedNode(id);
}

function objectTerm(statement: Statement): Quad_Object {
    switch (statement.objectKind) {
        case 'node':
            return subjectTerm(statement.object);
        case 'literal':
            return literal(statement.object);
        case 'typed':
            return literal(statement.object, namedNode(statement.datatype ?? XSD_STRING));
    }
}

/**
 * Group statements by subject, keeping the order subjects first appear in.
 */
function groupBySubject(statements: readonly Statement[]): Statement[] {
    const groups = new Map<string, Statement[]>();
    for (const statement of statements) {
        const group = groups.get(statement.subject);
        if (group) {
            group.push(statement);
        } else {
            groups.set(statement.subject, [statement]);
        }
    }
    return Array.from(groups.values()).flat();
}

/**
 * Render statements as Turtle. Every namespace in the table is declared;
 * identifiers are abbreviated wherever a prefix applies and the local name
 * is valid Turtle. Short forms are expanded through the table; identifiers
 * that are already absolute IRIs are written as they are.
 */
export function serializeStatements(
    statements: readonly Statement[],
    namespaces: NamespaceTable = NAMESPACES
): Promise<string> {
    const writer = new Writer({ prefixes: { ...namespaces } });

    for (const statement of groupBySubject(statements)) {
        const expanded = expandStatement(statement, namespaces, resolveIdentifier);
        if (expanded === null) {
            getLogger().warn({ statement }, 'Skipping statement with unexpandable identifier');
            continue;
        }
        writer.addQuad(quad(subjectTerm(expanded.subject), namedNode(expanded.predicate), objectTerm(expanded)));
    }

    return new Promise((resolve, reject) => {
        writer.end((error, result) => {
            if (error) {
                reject(error);
            } else {
                resolve(result);
            }
        });
    });
}

export function serializeStatementSet(set: StatementSet): Promise<string> {
    return serializeStatements(set.statements, set.namespaces);
}

function termId(term: Quad['subject'] | Quad['object']): string | null {
    switch (term.termType) {
        case 'NamedNode':
            return term.value;
        case 'BlankNode':
            return `_:${term.value}`;
        default:
            return null;
    }
}

function toStatement(q: Quad): Statement | null {
    const subject = termId(q.subject);
    if (subject === null) return null;

    const predicate = q.predicate.value;
    const object = q.object;

    if (object.termType === 'Literal') {
        const datatype = object.datatype.value;
        if (datatype === XSD_STRING || datatype === RDF_LANG_STRING) {
            return { subject, predicate, object: object.value, objectKind: 'literal' };
        }
        return { subject, predicate, object: object.value, objectKind: 'typed', datatype };
    }

    const target = termId(object);
    return target === null ? null : { subject, predicate, object: target, objectKind: 'node' };
}

/**
 * Parse Turtle text into a statement set. Throws on malformed input.
 */
export function parseStatements(text: string): StatementSet {
    const prefixes: Record<string, string> = {};
    const quads = new Parser({ blankNodePrefix: '' }).parse(text, null, (prefix, iri) => {
        prefixes[prefix] = iri.value;
    });

    const statements: Statement[] = [];
    for (const q of quads) {
        const statement = toStatement(q);
        if (statement === null) {
            getLogger().debug({ subject: q.subject.value }, 'Skipping unsupported quad');
            continue;
        }
        statements.push(statement);
    }

    const documentNode = statements.find(
        (s) => s.predicate === RDF_TYPE && s.objectKind === 'node' && s.object === CG_DOCUMENT
    );

    return Object.freeze({
        documentId: documentNode?.subject ?? '',
        statements: Object.freeze(statements),
        namespaces: Object.freeze({ ...NAMESPACES, ...prefixes }),
        conceptsMapped: 0,
        relationshipsCreated: 0,
    });
}
