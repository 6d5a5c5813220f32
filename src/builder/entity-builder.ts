import type { NamedNode } from '../types/index.js';
import type { SciteAuthor } from '../sources/schemas.js';
import type { TripleGraph } from '../rdf/graph.js';
import { literal } from '../rdf/terms.js';
import { FOAF, RDF, RDFS, VIVO } from '../rdf/namespaces.js';
import { EntityPrefix, type IdentityResolver } from '../identity/resolver.js';
import { AUTHOR_NAME_CHAIN, ORCID_CHAIN, resolveFirst } from './fallback-chain.js';

/**
 * A built node together with the string its identity was derived from.
 */
export interface EntityRef {
    uri: NamedNode;
    key: string;
}

/**
 * Emits the triples for people, organizations and positions into a
 * caller-owned graph. Every method is idempotent: calling it twice with the
 * same input adds nothing the second time.
 */
export class EntityBuilder {
    constructor(
        private readonly graph: TripleGraph,
        private readonly ids: IdentityResolver
    ) {}

    /**
     * Build a Person from an author entry. When the entry carries an
     * affiliation, the Organization and the Position linking the two are
     * built as well. Returns undefined (and emits nothing) when no name
     * can be resolved.
     */
    buildPerson(author: SciteAuthor): EntityRef | undefined {
        const name = resolveFirst(author, AUTHOR_NAME_CHAIN);
        if (!name) return undefined;

        const uri = this.ids.resolve(EntityPrefix.Person, name.value);
        this.graph.add(uri, RDF.type, FOAF.Person);
        this.graph.add(uri, RDFS.label, literal(name.value));
        this.graph.add(uri, FOAF.name, literal(name.value));

        const orcid = resolveFirst(author, ORCID_CHAIN);
        if (orcid) {
            this.graph.add(uri, VIVO.orcidId, literal(orcid.value));
        }

        const person: EntityRef = { uri, key: name.value };

        if (author.affiliation) {
            const org = this.buildOrganization(author.affiliation);
            this.buildPosition(person, org);
        }

        return person;
    }

    buildOrganization(name: string): EntityRef {
        const uri = this.ids.resolve(EntityPrefix.Organization, name);
        this.graph.add(uri, RDF.type, FOAF.Organization);
        this.graph.add(uri, RDFS.label, literal(name));
        return { uri, key: name };
    }

    /**
     * Position relating one person to one organization, keyed on both names.
     */
    buildPosition(person: EntityRef, org: EntityRef): EntityRef {
        const key = `${person.key}-${org.key}`;
        const uri = this.ids.resolve(EntityPrefix.Position, key);
        this.graph.add(uri, RDF.type, VIVO.Position);
        this.graph.add(uri, VIVO.relates, person.uri);
        this.graph.add(uri, VIVO.relates, org.uri);
        return { uri, key };
    }
}
