/**
 * Kind of object a statement points at:
 * - `node`: reference to another graph node
 * - `literal`: plain string literal
 * - `typed`: literal tagged with a datatype URI
 */
export type ObjectKind = 'node' | 'literal' | 'typed';

/**
 * Subject–predicate–object assertion. The graph's only storage unit.
 *
 * Identifiers may be in short form (`prefix:local`) while a set is being
 * built; statements handed to the store carry full URIs.
 */
export interface Statement {
    subject: string;
    predicate: string;
    object: string;
    objectKind: ObjectKind;
    /** Only set when `objectKind` is `typed` */
    datatype?: string;
}

/** Prefix → namespace URI */
export type NamespaceTable = Readonly<Record<string, string>>;

/**
 * Everything derived from one document's processing pass.
 * Frozen once built.
 */
export interface StatementSet {
    /** Full URI of the document node */
    readonly documentId: string;
    readonly statements: readonly Statement[];
    readonly namespaces: NamespaceTable;
    readonly conceptsMapped: number;
    readonly relationshipsCreated: number;
}
