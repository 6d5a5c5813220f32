import type { NamedNode, Term, Triple } from '../types/index.js';
import { PREFIXES, RDF, XSD } from './namespaces.js';

// ─── Escaping ────────────────────────────────────────────

const STRING_ESCAPES: Record<string, string> = {
    '\\': '\\\\',
    '"': '\\"',
    '\n': '\\n',
    '\r': '\\r',
    '\t': '\\t',
    '\b': '\\b',
    '\f': '\\f',
};

function escapeString(value: string): string {
    return value.replace(/[\\"\n\r\t\b\f]/g, (ch) => STRING_ESCAPES[ch] ?? ch);
}

function escapeIri(value: string): string {
    // Characters that may not appear inside <...>
    return value.replace(/[\u0000- <>"{}|^`\\]/g, (ch) => {
        const hex = ch.charCodeAt(0).toString(16).toUpperCase().padStart(4, '0');
        return `\\u${hex}`;
    });
}

// ─── N-Triples ───────────────────────────────────────────

export function termToNTriples(term: Term): string {
    if (term.termType === 'NamedNode') {
        return `<${escapeIri(term.value)}>`;
    }
    const lexical = `"${escapeString(term.value)}"`;
    return term.datatype ? `${lexical}^^<${escapeIri(term.datatype)}>` : lexical;
}

export function tripleToNTriples(triple: Triple): string {
    return `${termToNTriples(triple.subject)} ${termToNTriples(triple.predicate)} ${termToNTriples(triple.object)} .`;
}

/**
 * Canonical N-Triples document: full IRIs, one statement per line, lines
 * sorted so the output is independent of insertion order.
 */
export function toNTriples(triples: Iterable<Triple>): string {
    const lines = Array.from(triples, tripleToNTriples).sort();
    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

// ─── Turtle ──────────────────────────────────────────────

const PN_LOCAL = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const INTEGER = /^[+-]?\d+$/;

function compactIri(iri: string): string | null {
    for (const [prefix, base] of Object.entries(PREFIXES)) {
        if (iri.startsWith(base)) {
            const local = iri.slice(base.length);
            if (PN_LOCAL.test(local)) return `${prefix}:${local}`;
        }
    }
    return null;
}

function turtleIri(node: NamedNode | string): string {
    const iri = typeof node === 'string' ? node : node.value;
    return compactIri(iri) ?? `<${escapeIri(iri)}>`;
}

function turtleTerm(term: Term): string {
    if (term.termType === 'NamedNode') return turtleIri(term);

    if (term.datatype === XSD.integer.value && INTEGER.test(term.value)) {
        return term.value;
    }
    const lexical = `"${escapeString(term.value)}"`;
    return term.datatype ? `${lexical}^^${turtleIri(term.datatype)}` : lexical;
}

/**
 * Prefixed, human-readable Turtle document.
 *
 * Subjects and predicates are sorted (rdf:type first, written as `a`) so
 * the same graph always produces the same text.
 */
export function toTurtle(triples: Iterable<Triple>): string {
    const bySubject = new Map<string, Map<string, string[]>>();

    for (const triple of triples) {
        let predicates = bySubject.get(triple.subject.value);
        if (!predicates) {
            predicates = new Map();
            bySubject.set(triple.subject.value, predicates);
        }
        const objects = predicates.get(triple.predicate.value) ?? [];
        objects.push(turtleTerm(triple.object));
        predicates.set(triple.predicate.value, objects);
    }

    let out = Object.entries(PREFIXES)
        .map(([prefix, iri]) => `@prefix ${prefix}: <${iri}> .`)
        .join('\n');
    out += '\n';

    const subjects = [...bySubject.keys()].sort();
    for (const subject of subjects) {
        const predicates = bySubject.get(subject);
        if (!predicates) continue;

        const predicateIris = [...predicates.keys()].sort((a, b) => {
            if (a === RDF.type.value) return -1;
            if (b === RDF.type.value) return 1;
            return a < b ? -1 : a > b ? 1 : 0;
        });

        const lines = predicateIris.map((predicate) => {
            const objects = [...(predicates.get(predicate) ?? [])].sort();
            const verb = predicate === RDF.type.value ? 'a' : turtleIri(predicate);
            return `${verb} ${objects.join(',\n        ')}`;
        });

        out += `\n${turtleIri(subject)} ${lines.join(' ;\n    ')} .\n`;
    }

    return out;
}
