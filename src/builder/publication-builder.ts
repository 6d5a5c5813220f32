import type { NamedNode } from '../types/index.js';
import type { CitationTally, ScitePaper } from '../sources/schemas.js';
import type { TripleGraph } from '../rdf/graph.js';
import { literal } from '../rdf/terms.js';
import { BIBO, RDF, RDFS, VIVO, dateTimeLiteral, integerLiteral } from '../rdf/namespaces.js';
import { EntityPrefix, type IdentityResolver } from '../identity/resolver.js';
import { EntityBuilder } from './entity-builder.js';

export const MISSING_IDENTIFIER = 'missing identifier';

/**
 * A part of a record that was left out of the graph.
 */
export interface SkippedField {
    field: string;
    reason: string;
}

export type PublicationOutcome =
    | {
          status: 'built';
          uri: NamedNode;
          authorships: number;
          skippedFields: SkippedField[];
      }
    | {
          status: 'skipped';
          reason: string;
      };

/**
 * Tally field → publication predicate.
 */
const TALLY_PREDICATES: ReadonlyArray<[keyof CitationTally, NamedNode]> = [
    ['supporting', VIVO.sciteSupportingCites],
    ['contradicting', VIVO.sciteContrastingCites],
    ['mentioning', VIVO.sciteMentioningCites],
    ['total', VIVO.sciteTotalCites],
];

/**
 * Builds the sub-graph of one publication: core facts, date, citation
 * tallies, report link, and one Authorship per named author.
 */
export class PublicationBuilder {
    private readonly entities: EntityBuilder;

    constructor(
        private readonly graph: TripleGraph,
        private readonly ids: IdentityResolver,
        private readonly reportBaseUrl: string
    ) {
        this.entities = new EntityBuilder(graph, ids);
    }

    build(paper: ScitePaper, tally?: CitationTally | null): PublicationOutcome {
        const doi = paper.doi;
        if (!doi) {
            return { status: 'skipped', reason: MISSING_IDENTIFIER };
        }

        const pub = this.ids.resolve(EntityPrefix.Publication, doi);
        const g = this.graph;

        g.add(pub, RDF.type, BIBO.AcademicArticle);
        g.add(pub, RDF.type, VIVO.InformationResource);
        g.add(pub, BIBO.doi, literal(doi));

        if (paper.title) {
            g.add(pub, RDFS.label, literal(paper.title));
            g.add(pub, BIBO.title, literal(paper.title));
        }
        if (paper.abstract) {
            g.add(pub, BIBO.abstract, literal(paper.abstract));
        }

        if (paper.year !== undefined) {
            this.buildYear(pub, doi, paper.year);
        }

        if (paper.pmid) {
            g.add(pub, BIBO.pmid, literal(paper.pmid));
        }
        for (const issn of paper.issns ?? []) {
            g.add(pub, BIBO.issn, literal(issn));
        }

        if (tally) {
            for (const [field, predicate] of TALLY_PREDICATES) {
                const value = tally[field];
                if (value !== undefined && value !== null) {
                    g.add(pub, predicate, integerLiteral(value));
                }
            }
        }

        if (paper.slug) {
            g.add(pub, VIVO.sciteReportUrl, literal(`${this.reportBaseUrl}${paper.slug}`));
        }

        const skippedFields: SkippedField[] = [];
        // Authorship keys taken in this paper; every author entry gets its own
        const usedKeys = new Set<string>();
        let authorships = 0;

        (paper.authors ?? []).forEach((author, index) => {
            const field = `authors[${index}]`;
            if (author === null) {
                skippedFields.push({ field, reason: 'malformed author entry' });
                return;
            }

            const person = this.entities.buildPerson(author);
            if (!person) {
                skippedFields.push({ field, reason: 'no usable name' });
                return;
            }

            const key = uniqueKey(`${doi}-${person.key}`, usedKeys);
            usedKeys.add(key);

            const authorship = this.ids.resolve(EntityPrefix.Authorship, key);
            g.add(authorship, RDF.type, VIVO.Authorship);
            g.add(authorship, VIVO.relates, pub);
            g.add(authorship, VIVO.relates, person.uri);

            if (author.authorSequenceNumber !== undefined && author.authorSequenceNumber !== null) {
                g.add(authorship, VIVO.rank, integerLiteral(author.authorSequenceNumber));
            }
            authorships++;
        });

        return { status: 'built', uri: pub, authorships, skippedFields };
    }

    /**
     * Year-precision DateTimeValue owned by the publication.
     */
    private buildYear(pub: NamedNode, doi: string, year: number): void {
        const date = this.ids.resolve(EntityPrefix.DateValue, `${doi}-${year}`);
        this.graph.add(date, RDF.type, VIVO.DateTimeValue);
        this.graph.add(date, VIVO.dateTime, dateTimeLiteral(`${year}-01-01T00:00:00`));
        this.graph.add(date, VIVO.dateTimePrecision, VIVO.yearPrecision);
        this.graph.add(pub, VIVO.dateTimeValue, date);
    }
}

/**
 * `base`, or `base-2`, `base-3`, ... whichever is first not in `used`.
 */
function uniqueKey(base: string, used: ReadonlySet<string>): string {
    if (!used.has(base)) return base;
    let n = 2;
    while (used.has(`${base}-${n}`)) n++;
    return `${base}-${n}`;
}
