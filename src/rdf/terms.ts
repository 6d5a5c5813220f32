import type { Literal, NamedNode } from '../types/index.js';

export function namedNode(value: string): NamedNode {
    return { termType: 'NamedNode', value };
}

export function literal(value: string, datatype?: NamedNode): Literal {
    return datatype ? { termType: 'Literal', value, datatype: datatype.value } : { termType: 'Literal', value };
}

/**
 * Build a term factory for a namespace IRI.
 * `ns('Person')` → NamedNode for `<iri>Person`.
 */
export function namespace(iri: string): (local: string) => NamedNode {
    return (local: string) => namedNode(`${iri}${local}`);
}
