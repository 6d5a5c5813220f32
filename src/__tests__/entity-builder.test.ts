import { describe, it, expect, beforeEach } from 'vitest';
import { TripleGraph } from '../rdf/graph.js';
import { literal } from '../rdf/terms.js';
import { FOAF, RDF, RDFS, VIVO } from '../rdf/namespaces.js';
import { IdentityResolver, EntityPrefix } from '../identity/resolver.js';
import { EntityBuilder } from '../builder/entity-builder.js';
import { AUTHOR_NAME_CHAIN, composeName, resolveFirst } from '../builder/fallback-chain.js';

const BASE = 'http://localhost:8080/vivo/individual/';

describe('fallback chains', () => {
    it('should prefer authorName over given + family', () => {
        expect(resolveFirst({ authorName: 'Ann Lee', given: 'A', family: 'L' }, AUTHOR_NAME_CHAIN)).toEqual({
            value: 'Ann Lee',
            source: 'authorName',
        });
    });

    it('should compose given + family when authorName is missing', () => {
        expect(resolveFirst({ given: 'Ann', family: 'Lee' }, AUTHOR_NAME_CHAIN)).toEqual({
            value: 'Ann Lee',
            source: 'given+family',
        });
    });

    it('should return undefined when no source yields a value', () => {
        expect(resolveFirst({}, AUTHOR_NAME_CHAIN)).toBeUndefined();
    });

    it('should only trim the ends of a composed name', () => {
        expect(composeName(undefined, 'Lee')).toBe('Lee');
        expect(composeName('Ann', undefined)).toBe('Ann');
        expect(composeName('Ann  Marie', 'Lee')).toBe('Ann  Marie Lee');
        expect(composeName(undefined, undefined)).toBeUndefined();
    });
});

describe('EntityBuilder', () => {
    let graph: TripleGraph;
    let ids: IdentityResolver;
    let builder: EntityBuilder;

    beforeEach(() => {
        graph = new TripleGraph();
        ids = new IdentityResolver({ base: BASE });
        builder = new EntityBuilder(graph, ids);
    });

    it('should build a person with type, label and name', () => {
        const person = builder.buildPerson({ authorName: 'A B' });
        expect(person?.uri.value).toBe(`${BASE}person-5ae395e8ab6a`);
        expect(person?.key).toBe('A B');
        expect(graph.size).toBe(3);
        if (!person) return;
        expect(graph.has(person.uri, RDF.type, FOAF.Person)).toBe(true);
        expect(graph.has(person.uri, RDFS.label, literal('A B'))).toBe(true);
        expect(graph.has(person.uri, FOAF.name, literal('A B'))).toBe(true);
    });

    it('should add an ORCID from orcid, falling back to author_orcid', () => {
        const a = builder.buildPerson({ authorName: 'A B', author_orcid: '0000-0000-0000-0001' });
        const b = builder.buildPerson({ authorName: 'C D', orcid: '0000-0000-0000-0002', author_orcid: 'ignored' });
        if (!a || !b) throw new Error('expected people');
        expect(graph.objects(a.uri, VIVO.orcidId)).toEqual([literal('0000-0000-0000-0001')]);
        expect(graph.objects(b.uri, VIVO.orcidId)).toEqual([literal('0000-0000-0000-0002')]);
    });

    it('should build organization and position for an affiliation', () => {
        const person = builder.buildPerson({ authorName: 'A B', affiliation: 'Org1' });
        if (!person) throw new Error('expected person');

        const org = ids.resolve(EntityPrefix.Organization, 'Org1');
        const position = ids.resolve(EntityPrefix.Position, 'A B-Org1');
        expect(org.value).toBe(`${BASE}org-021d3c84aaa2`);
        expect(position.value).toBe(`${BASE}position-55bfbff53f7d`);

        expect(graph.has(org, RDF.type, FOAF.Organization)).toBe(true);
        expect(graph.has(org, RDFS.label, literal('Org1'))).toBe(true);
        expect(graph.has(position, RDF.type, VIVO.Position)).toBe(true);
        expect(graph.has(position, VIVO.relates, person.uri)).toBe(true);
        expect(graph.has(position, VIVO.relates, org)).toBe(true);
        expect(graph.size).toBe(8);
    });

    it('should emit nothing for an author without a usable name', () => {
        expect(builder.buildPerson({ affiliation: 'Org1' })).toBeUndefined();
        expect(graph.size).toBe(0);
    });

    it('should be idempotent', () => {
        builder.buildPerson({ authorName: 'A B', affiliation: 'Org1' });
        const size = graph.size;
        builder.buildPerson({ authorName: 'A B', affiliation: 'Org1' });
        expect(graph.size).toBe(size);
    });

    it('should keep differently spelled names apart', () => {
        const a = builder.buildPerson({ authorName: 'A B' });
        const b = builder.buildPerson({ authorName: 'A. B' });
        expect(a?.uri.value).not.toBe(b?.uri.value);
        expect(graph.subjectsOfType(FOAF.Person)).toHaveLength(2);
    });

    it('should key a position on both names', () => {
        const person = builder.buildOrganization('Person-ish');
        const org = builder.buildOrganization('Org2');
        const position = builder.buildPosition(person, org);
        expect(position.key).toBe('Person-ish-Org2');
        expect(position.uri).toEqual(ids.resolve(EntityPrefix.Position, 'Person-ish-Org2'));
    });
});
