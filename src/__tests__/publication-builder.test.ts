import { describe, it, expect, beforeEach } from 'vitest';
import { TripleGraph } from '../rdf/graph.js';
import { literal, namedNode } from '../rdf/terms.js';
import { BIBO, FOAF, RDF, RDFS, VIVO, dateTimeLiteral, integerLiteral } from '../rdf/namespaces.js';
import { IdentityResolver, EntityPrefix } from '../identity/resolver.js';
import { PublicationBuilder } from '../builder/publication-builder.js';
import { parsePaper, type ScitePaper } from '../sources/schemas.js';

const BASE = 'http://localhost:8080/vivo/individual/';
const REPORTS = 'https://scite.ai/reports/';
const PUB = namedNode(`${BASE}pub-9c1df3312c8e`);

const CITE_PREDICATES = [
    VIVO.sciteSupportingCites,
    VIVO.sciteContrastingCites,
    VIVO.sciteMentioningCites,
    VIVO.sciteTotalCites,
];

describe('PublicationBuilder', () => {
    let graph: TripleGraph;
    let ids: IdentityResolver;
    let builder: PublicationBuilder;

    beforeEach(() => {
        graph = new TripleGraph();
        ids = new IdentityResolver({ base: BASE });
        builder = new PublicationBuilder(graph, ids, REPORTS);
    });

    it('should build the single-author scenario', () => {
        const outcome = builder.build(
            { doi: '10.1/x', title: 'T', authors: [{ authorName: 'A B', affiliation: 'Org1' }] },
            { supporting: 3 }
        );

        expect(outcome).toEqual({ status: 'built', uri: PUB, authorships: 1, skippedFields: [] });
        expect(graph.size).toBe(17);

        expect(graph.has(PUB, RDF.type, BIBO.AcademicArticle)).toBe(true);
        expect(graph.has(PUB, RDF.type, VIVO.InformationResource)).toBe(true);
        expect(graph.has(PUB, BIBO.doi, literal('10.1/x'))).toBe(true);
        expect(graph.has(PUB, RDFS.label, literal('T'))).toBe(true);
        expect(graph.has(PUB, BIBO.title, literal('T'))).toBe(true);
        expect(graph.has(PUB, VIVO.sciteSupportingCites, integerLiteral(3))).toBe(true);

        const person = namedNode(`${BASE}person-5ae395e8ab6a`);
        const authorship = namedNode(`${BASE}authorship-aa381f37f86f`);
        expect(graph.subjectsOfType(FOAF.Person)).toEqual([person]);
        expect(graph.subjectsOfType(FOAF.Organization)).toEqual([namedNode(`${BASE}org-021d3c84aaa2`)]);
        expect(graph.subjectsOfType(VIVO.Position)).toEqual([namedNode(`${BASE}position-55bfbff53f7d`)]);
        expect(graph.subjectsOfType(VIVO.Authorship)).toEqual([authorship]);
        expect(graph.has(authorship, VIVO.relates, PUB)).toBe(true);
        expect(graph.has(authorship, VIVO.relates, person)).toBe(true);
    });

    it('should skip a record without a DOI and emit nothing', () => {
        expect(builder.build({ title: 'No identifier' }, { supporting: 1 })).toEqual({
            status: 'skipped',
            reason: 'missing identifier',
        });
        expect(graph.size).toBe(0);
    });

    it('should emit only the core facts for a bare DOI', () => {
        builder.build({ doi: '10.1/x' });
        expect(graph.size).toBe(3);
        expect(graph.objects(PUB, RDFS.label)).toEqual([]);
        expect(graph.objects(PUB, BIBO.abstract)).toEqual([]);
    });

    it('should emit citation counts only for present, non-null tally fields', () => {
        builder.build({ doi: '10.1/x' }, { supporting: 3, contradicting: null, mentioning: 0 });

        expect(graph.objects(PUB, VIVO.sciteSupportingCites)).toEqual([integerLiteral(3)]);
        expect(graph.objects(PUB, VIVO.sciteMentioningCites)).toEqual([integerLiteral(0)]);
        expect(graph.objects(PUB, VIVO.sciteContrastingCites)).toEqual([]);
        expect(graph.objects(PUB, VIVO.sciteTotalCites)).toEqual([]);
    });

    it('should emit no citation counts without a tally', () => {
        builder.build({ doi: '10.1/x' }, null);
        for (const predicate of CITE_PREDICATES) {
            expect(graph.objects(PUB, predicate)).toEqual([]);
        }
    });

    it('should map all four tally fields', () => {
        builder.build({ doi: '10.1/x' }, { supporting: 1, contradicting: 2, mentioning: 3, total: 6 });
        expect(CITE_PREDICATES.map((p) => graph.objects(PUB, p))).toEqual([
            [integerLiteral(1)],
            [integerLiteral(2)],
            [integerLiteral(3)],
            [integerLiteral(6)],
        ]);
    });

    it('should build a year-precision date value', () => {
        builder.build({ doi: '10.1/x', year: 2020 });

        const date = namedNode(`${BASE}date-6233fd16df73`);
        expect(graph.objects(PUB, VIVO.dateTimeValue)).toEqual([date]);
        expect(graph.has(date, RDF.type, VIVO.DateTimeValue)).toBe(true);
        expect(graph.objects(date, VIVO.dateTime)).toEqual([dateTimeLiteral('2020-01-01T00:00:00')]);
        expect(graph.objects(date, VIVO.dateTimePrecision)).toEqual([VIVO.yearPrecision]);
    });

    it('should emit abstract, pmid, every issn and the report link', () => {
        builder.build({
            doi: '10.1/x',
            abstract: 'Abstract text',
            pmid: '12345',
            issns: ['1234-5678', '8765-4321'],
            slug: 'some-paper-slug',
        });

        expect(graph.objects(PUB, BIBO.abstract)).toEqual([literal('Abstract text')]);
        expect(graph.objects(PUB, BIBO.pmid)).toEqual([literal('12345')]);
        expect(graph.objects(PUB, BIBO.issn)).toEqual([literal('1234-5678'), literal('8765-4321')]);
        expect(graph.objects(PUB, VIVO.sciteReportUrl)).toEqual([literal('https://scite.ai/reports/some-paper-slug')]);
    });

    it('should create one authorship per named author, ranked only when a sequence is given', () => {
        const outcome = builder.build({
            doi: '10.1/x',
            authors: [
                { authorName: 'A B', authorSequenceNumber: 1 },
                { given: 'C', family: 'D' },
                { authorName: 'E F', authorSequenceNumber: 3 },
            ],
        });

        expect(outcome.status === 'built' && outcome.authorships).toBe(3);

        const authorships = graph.subjectsOfType(VIVO.Authorship);
        expect(authorships).toHaveLength(3);
        for (const authorship of authorships) {
            expect(graph.has(authorship, VIVO.relates, PUB)).toBe(true);
        }

        const ranks = authorships.map((a) => graph.objects(a, VIVO.rank));
        expect(ranks).toEqual([[integerLiteral(1)], [], [integerLiteral(3)]]);

        const composed = ids.resolve(EntityPrefix.Person, 'C D');
        expect(graph.has(composed, FOAF.name, literal('C D'))).toBe(true);
    });

    it('should give repeated names their own authorship but one person', () => {
        const outcome = builder.build({
            doi: '10.1/x',
            authors: [{ authorName: 'A B' }, { authorName: 'A B' }],
        });

        expect(outcome.status === 'built' && outcome.authorships).toBe(2);
        expect(graph.subjectsOfType(VIVO.Authorship).map((a) => a.value)).toEqual([
            `${BASE}authorship-aa381f37f86f`,
            ids.resolve(EntityPrefix.Authorship, '10.1/x-A B-2').value,
        ]);
        expect(graph.subjectsOfType(FOAF.Person)).toHaveLength(1);
    });

    it('should not let a suffixed repeat collide with a real name', () => {
        const outcome = builder.build({
            doi: '10.1/x',
            authors: [{ authorName: 'A B' }, { authorName: 'A B' }, { authorName: 'A B-2' }],
        });

        expect(outcome.status === 'built' && outcome.authorships).toBe(3);

        const authorships = graph.subjectsOfType(VIVO.Authorship);
        expect(authorships.map((a) => a.value)).toEqual([
            `${BASE}authorship-aa381f37f86f`,
            ids.resolve(EntityPrefix.Authorship, '10.1/x-A B-2').value,
            ids.resolve(EntityPrefix.Authorship, '10.1/x-A B-2-2').value,
        ]);
        expect(authorships.map((a) => graph.objects(a, VIVO.relates).length)).toEqual([2, 2, 2]);
        const [, , third] = authorships;
        if (third) {
            expect(graph.has(third, VIVO.relates, ids.resolve(EntityPrefix.Person, 'A B-2'))).toBe(true);
        }
    });

    it('should skip malformed and nameless authors individually', () => {
        const outcome = builder.build({
            doi: '10.1/x',
            authors: [null, { affiliation: 'Org1' }, { authorName: 'A B' }],
        });

        expect(outcome).toEqual({
            status: 'built',
            uri: PUB,
            authorships: 1,
            skippedFields: [
                { field: 'authors[0]', reason: 'malformed author entry' },
                { field: 'authors[1]', reason: 'no usable name' },
            ],
        });
        expect(graph.subjectsOfType(FOAF.Organization)).toEqual([]);
    });

    it('should produce the same triple set when run twice', () => {
        const paper: ScitePaper = {
            doi: '10.1/x',
            title: 'T',
            year: 2020,
            authors: [{ authorName: 'A B', affiliation: 'Org1', authorSequenceNumber: 1 }],
        };
        builder.build(paper, { total: 4 });
        const first = [...graph].length;
        builder.build(paper, { total: 4 });
        expect(graph.size).toBe(first);
    });

    it('should build from a raw record with malformed fields dropped', () => {
        const paper = parsePaper({
            doi: '10.1/x',
            title: 42,
            year: 'soon',
            pmid: 987,
            issns: ['1111-2222', '', 7],
            authors: ['not an author', { authorName: 'A B', authorSequenceNumber: 'first' }],
        });
        if (!paper) throw new Error('expected a parsed paper');

        const outcome = builder.build(paper);

        expect(outcome.status === 'built' && outcome.skippedFields).toEqual([
            { field: 'authors[0]', reason: 'malformed author entry' },
        ]);
        expect(graph.objects(PUB, RDFS.label)).toEqual([]);
        expect(graph.objects(PUB, VIVO.dateTimeValue)).toEqual([]);
        expect(graph.objects(PUB, BIBO.pmid)).toEqual([literal('987')]);
        expect(graph.objects(PUB, BIBO.issn)).toEqual([literal('1111-2222')]);

        const [authorship] = graph.subjectsOfType(VIVO.Authorship);
        expect(authorship).toBeDefined();
        if (authorship) {
            expect(graph.objects(authorship, VIVO.rank)).toEqual([]);
        }
    });
});
