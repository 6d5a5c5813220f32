import type { NamedNode, Term, Triple } from '../types/index.js';
import { RDF } from './namespaces.js';
import { tripleToNTriples } from './serializers.js';

/**
 * In-memory triple accumulator with set semantics.
 *
 * Triples are keyed by their N-Triples form, so adding the same statement
 * twice leaves a single copy. One instance is owned by one batch and
 * discarded after serialization.
 */
export class TripleGraph implements Iterable<Triple> {
    private readonly triples = new Map<string, Triple>();

    /**
     * Add a statement. Returns false if it was already present.
     */
    add(subject: NamedNode, predicate: NamedNode, object: Term): boolean {
        const triple: Triple = { subject, predicate, object };
        const key = tripleToNTriples(triple);
        if (this.triples.has(key)) return false;
        this.triples.set(key, triple);
        return true;
    }

    has(subject: NamedNode, predicate: NamedNode, object: Term): boolean {
        return this.triples.has(tripleToNTriples({ subject, predicate, object }));
    }

    /**
     * Copy every triple of `other` into this graph.
     */
    merge(other: TripleGraph): void {
        for (const [key, triple] of other.triples) {
            this.triples.set(key, triple);
        }
    }

    /**
     * All triples with the given subject (and predicate, when supplied).
     */
    match(subject?: NamedNode, predicate?: NamedNode): Triple[] {
        const result: Triple[] = [];
        for (const triple of this.triples.values()) {
            if (subject && triple.subject.value !== subject.value) continue;
            if (predicate && triple.predicate.value !== predicate.value) continue;
            result.push(triple);
        }
        return result;
    }

    /**
     * Objects of every (subject, predicate, ?) statement.
     */
    objects(subject: NamedNode, predicate: NamedNode): Term[] {
        return this.match(subject, predicate).map((t) => t.object);
    }

    /**
     * Distinct subjects that carry `rdf:type <type>`.
     */
    subjectsOfType(typeIri: NamedNode): NamedNode[] {
        return this.match(undefined, RDF.type)
            .filter((t) => t.object.termType === 'NamedNode' && t.object.value === typeIri.value)
            .map((t) => t.subject);
    }

    get size(): number {
        return this.triples.size;
    }

    isEmpty(): boolean {
        return this.triples.size === 0;
    }

    [Symbol.iterator](): Iterator<Triple> {
        return this.triples.values();
    }
}
