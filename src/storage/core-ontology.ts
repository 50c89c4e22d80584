/**
 * Class and property declarations loaded into an empty store.
 */
export const CORE_ONTOLOGY = `
@prefix cg: <https://conceptgraph.dev/ontology#> .
@prefix rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
@prefix owl: <http://www.w3.org/2002/07/owl#> .
@prefix xsd: <http://www.w3.org/2001/XMLSchema#> .

# Classes
cg:Document a owl:Class ;
    rdfs:label "Document" ;
    rdfs:comment "A processed source document" .

cg:ConversationDocument a owl:Class ;
    rdfs:subClassOf cg:Document ;
    rdfs:label "Conversation Document" .

cg:MarkdownDocument a owl:Class ;
    rdfs:subClassOf cg:Document ;
    rdfs:label "Markdown Document" .

cg:PlainTextDocument a owl:Class ;
    rdfs:subClassOf cg:Document ;
    rdfs:label "Plain Text Document" .

cg:StructuredDocument a owl:Class ;
    rdfs:subClassOf cg:Document ;
    rdfs:label "Structured Document" .

cg:RandomDocument a owl:Class ;
    rdfs:subClassOf cg:Document ;
    rdfs:label "Unclassified Document" .

cg:Concept a owl:Class ;
    rdfs:label "Concept" ;
    rdfs:comment "A concept mentioned in one or more documents" .

# Object properties
cg:discusses a owl:ObjectProperty ;
    rdfs:domain cg:Document ;
    rdfs:range cg:Concept ;
    rdfs:label "discusses" .

cg:coOccursWith a owl:ObjectProperty ;
    rdfs:domain cg:Concept ;
    rdfs:range cg:Concept ;
    rdfs:label "co-occurs with" .

# Datatype properties
cg:typeConfidence a owl:DatatypeProperty ;
    rdfs:domain cg:Document ;
    rdfs:range xsd:float ;
    rdfs:label "type confidence" .

cg:confidence a owl:DatatypeProperty ;
    rdfs:domain cg:Concept ;
    rdfs:range xsd:float ;
    rdfs:label "confidence" .

cg:extractionLabel a owl:DatatypeProperty ;
    rdfs:domain cg:Concept ;
    rdfs:range xsd:string ;
    rdfs:label "extraction label" .

cg:context a owl:DatatypeProperty ;
    rdfs:domain cg:Concept ;
    rdfs:range xsd:string ;
    rdfs:label "context" .

cg:startPosition a owl:DatatypeProperty ;
    rdfs:domain cg:Concept ;
    rdfs:range xsd:integer ;
    rdfs:label "start position" .

cg:endPosition a owl:DatatypeProperty ;
    rdfs:domain cg:Concept ;
    rdfs:range xsd:integer ;
    rdfs:label "end position" .

cg:primaryDomain a owl:DatatypeProperty ;
    rdfs:domain cg:Document ;
    rdfs:range xsd:string ;
    rdfs:label "primary domain" .

cg:sourceName a owl:DatatypeProperty ;
    rdfs:domain cg:Document ;
    rdfs:range xsd:string ;
    rdfs:label "source name" .
`;
