/**
 * RDF term model. Only the two term kinds the pipeline emits are modelled:
 * IRIs and literals. Blank nodes never appear because every node has a
 * content-addressed IRI.
 */
export interface NamedNode {
    readonly termType: 'NamedNode';
    readonly value: string;
}

export interface Literal {
    readonly termType: 'Literal';
    /** Lexical form */
    readonly value: string;
    /** Datatype IRI; absent for plain string literals */
    readonly datatype?: string;
}

export type Term = NamedNode | Literal;

/**
 * A (subject, predicate, object) statement.
 */
export interface Triple {
    readonly subject: NamedNode;
    readonly predicate: NamedNode;
    readonly object: Term;
}

export type SerializationFormat = 'turtle' | 'ntriples';
