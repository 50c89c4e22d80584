import type { Domain, DocumentType, NamespaceTable } from '../types/index.js';

export const CG_NAMESPACE = 'https://conceptgraph.dev/ontology#';
export const XSD_NAMESPACE = 'http://www.w3.org/2001/XMLSchema#';

/**
 * Standard namespace prefixes carried by every statement set.
 */
export const NAMESPACES: NamespaceTable = Object.freeze({
    cg: CG_NAMESPACE,
    rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
    rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
    owl: 'http://www.w3.org/2002/07/owl#',
    xsd: XSD_NAMESPACE,
    foaf: 'http://xmlns.com/foaf/0.1/',
    dct: 'http://purl.org/dc/terms/',
    cso: 'http://cso.kmi.open.ac.uk/',
    msc: 'http://msc2010.org/',
    schema: 'http://schema.org/',
});

export const XSD_FLOAT = `${XSD_NAMESPACE}float`;
export const XSD_INTEGER = `${XSD_NAMESPACE}integer`;
export const XSD_BOOLEAN = `${XSD_NAMESPACE}boolean`;
export const XSD_STRING = `${XSD_NAMESPACE}string`;

/**
 * Short-form terms used while building statements.
 */
export const TERMS = {
    type: 'rdf:type',
    label: 'rdfs:label',
    title: 'dct:title',
    document: 'cg:Document',
    concept: 'cg:Concept',
    discusses: 'cg:discusses',
    coOccursWith: 'cg:coOccursWith',
    typeConfidence: 'cg:typeConfidence',
    confidence: 'cg:confidence',
    extractionLabel: 'cg:extractionLabel',
    context: 'cg:context',
    startPosition: 'cg:startPosition',
    endPosition: 'cg:endPosition',
    primaryDomain: 'cg:primaryDomain',
    sourceName: 'cg:sourceName',
    xsdFloat: 'xsd:float',
    xsdInteger: 'xsd:integer',
    xsdBoolean: 'xsd:boolean',
} as const;

/**
 * Fixed label → domain table.
 */
export const DEFAULT_LABEL_DOMAINS: ReadonlyMap<string, Domain> = new Map<string, Domain>([
    // Computer Science
    ['computer_science_concept', 'cs'],
    ['algorithm', 'cs'],
    ['data_structure', 'cs'],
    ['programming_language', 'cs'],
    ['software_system', 'cs'],
    ['distributed_system', 'cs'],
    ['machine_learning_concept', 'cs'],

    // Mathematics
    ['mathematics_concept', 'math'],
    ['mathematical_theorem', 'math'],
    ['statistical_method', 'math'],
    ['mathematical_proof', 'math'],
    ['equation', 'math'],

    // Social Sciences
    ['social_science_concept', 'social'],
    ['research_method', 'social'],
    ['psychological_concept', 'social'],
    ['economic_concept', 'social'],
    ['organizational_behavior', 'social'],

    // Philosophy
    ['philosophical_concept', 'philosophy'],
    ['ethical_principle', 'philosophy'],
    ['logical_argument', 'philosophy'],
    ['epistemological_concept', 'philosophy'],

    // General
    ['person_mention', 'people'],
    ['organization', 'entities'],
    ['academic_paper', 'references'],
    ['research_finding', 'findings'],
    ['methodology', 'methods'],
    ['tool', 'tools'],
    ['framework', 'tools'],
]);

/**
 * Extraction label → standard ontology class. Labels without an entry get
 * only the generic Concept type.
 */
export const DEFAULT_LABEL_CLASSES: ReadonlyMap<string, string> = new Map([
    ['computer_science_concept', 'cso:ComputerScience'],
    ['algorithm', 'cso:Algorithm'],
    ['data_structure', 'cso:DataStructure'],
    ['programming_language', 'cso:ProgrammingLanguage'],
    ['software_system', 'cso:SoftwareSystem'],

    ['mathematics_concept', 'msc:Mathematics'],
    ['mathematical_theorem', 'msc:Theorem'],
    ['statistical_method', 'msc:Statistics'],
    ['mathematical_proof', 'msc:Proof'],
    ['equation', 'msc:Equation'],

    ['social_science_concept', 'schema:SocialScience'],
    ['research_method', 'schema:ResearchMethod'],
    ['psychological_concept', 'schema:Psychology'],
    ['economic_concept', 'schema:Economics'],
    ['organizational_behavior', 'schema:Organization'],

    ['philosophical_concept', 'schema:Philosophy'],
    ['ethical_principle', 'schema:Ethics'],
    ['logical_argument', 'schema:Logic'],
    ['epistemological_concept', 'schema:Epistemology'],

    ['person_mention', 'foaf:Person'],
    ['organization', 'foaf:Organization'],
    ['academic_paper', 'schema:ScholarlyArticle'],
    ['research_finding', 'schema:ResearchFindings'],
    ['methodology', 'schema:ResearchMethod'],
    ['tool', 'schema:SoftwareApplication'],
    ['framework', 'schema:SoftwareApplication'],
]);

/** The label vocabulary handed to extractors */
export const CONCEPT_LABELS: readonly string[] = Array.from(DEFAULT_LABEL_DOMAINS.keys());

export function domainForLabel(label: string, table: ReadonlyMap<string, Domain> = DEFAULT_LABEL_DOMAINS): Domain {
    return table.get(label) ?? 'other';
}

/**
 * `plain_text` → `PlainText`, `cs` → `Cs`
 */
export function pascalCase(value: string): string {
    return value
        .split(/[_\s-]+/)
        .filter((part) => part.length > 0)
        .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
        .join('');
}

export function documentClassFor(type: DocumentType): string {
    return `cg:${pascalCase(type)}Document`;
}

export function isBlankNode(id: string): boolean {
    return id.startsWith('_:');
}

/**
 * Any RFC 3987 scheme followed by a non-empty body free of the characters
 * an IRI may not contain (`mailto:a@b.org`, `urn:x:y`, `http://...`).
 */
export function isAbsoluteIri(id: string): boolean {
    return /^[A-Za-z][A-Za-z0-9+.-]*:[^\s<>"{}|\\^`]+$/.test(id);
}

function isHierarchicalIri(id: string): boolean {
    return /^[A-Za-z][A-Za-z0-9+.-]*:\/\//.test(id) || /^urn:/i.test(id);
}

function expandPrefixed(id: string, namespaces: NamespaceTable): string | null {
    const colon = id.indexOf(':');
    if (colon <= 0) return null;

    const prefix = id.slice(0, colon);
    const namespace = Object.hasOwn(namespaces, prefix) ? namespaces[prefix] : undefined;
    return namespace === undefined ? null : namespace + id.slice(colon + 1);
}

/**
 * Expand a `prefix:local` identifier through the namespace table.
 * Blank nodes, `scheme://` IRIs and URNs pass through; anything else
 * (unknown prefix, no prefix at all) yields null.
 */
export function expandIdentifier(id: string, namespaces: NamespaceTable = NAMESPACES): string | null {
    if (isBlankNode(id)) return id;
    return expandPrefixed(id, namespaces) ?? (isHierarchicalIri(id) ? id : null);
}

/**
 * Identifier of a statement that may already be expanded: short forms with
 * a known prefix are expanded, any other absolute IRI is kept as it is.
 */
export function resolveIdentifier(id: string, namespaces: NamespaceTable = NAMESPACES): string | null {
    if (isBlankNode(id)) return id;
    return expandPrefixed(id, namespaces) ?? (isAbsoluteIri(id) ? id : null);
}

export type IdentifierResolver = (id: string, namespaces: NamespaceTable) => string | null;

/**
 * Expand a term that is known to use a standard prefix.
 */
export function fullUri(term: string): string {
    const expanded = expandIdentifier(term);
    if (expanded === null) {
        throw new Error(`Not a standard term: ${term}`);
    }
    return expanded;
}
