import type { TallySource } from '../types/index.js';
import type { CitationTally, ScitePaper } from '../sources/schemas.js';
import { TripleGraph } from '../rdf/graph.js';
import type { IdentityResolver } from '../identity/resolver.js';
import { getLogger } from '../utils/logger.js';
import { PublicationBuilder, type SkippedField } from './publication-builder.js';

export interface SkippedPaper {
    /** Position of the paper in the input batch */
    index: number;
    doi?: string;
    reason: string;
}

export interface AssemblyReport {
    total: number;
    /** Papers that produced a Publication */
    processed: number;
    skipped: SkippedPaper[];
    /** Authors and sub-fields left out of otherwise built papers */
    skippedFields: Array<SkippedField & { doi: string }>;
    /** DOIs whose tally lookup failed */
    tallyFailures: string[];
    tripleCount: number;
}

export interface AssemblyResult {
    graph: TripleGraph;
    report: AssemblyReport;
}

export interface GraphAssemblerOptions {
    resolver: IdentityResolver;
    reportBaseUrl: string;
    /** Tally lookups are skipped when absent */
    tallySource?: TallySource;
}

/**
 * Turns a batch of paper records into one graph.
 *
 * Papers are handled strictly in order, one tally request at a time. Each
 * paper is built into its own sub-graph and merged only once it is complete,
 * so a paper that fails half-way contributes nothing.
 */
export class GraphAssembler {
    private readonly resolver: IdentityResolver;
    private readonly reportBaseUrl: string;
    private readonly tallySource?: TallySource;

    constructor(options: GraphAssemblerOptions) {
        this.resolver = options.resolver;
        this.reportBaseUrl = options.reportBaseUrl;
        this.tallySource = options.tallySource;
    }

    async assemble(papers: readonly ScitePaper[]): Promise<AssemblyResult> {
        const logger = getLogger();
        const graph = new TripleGraph();
        const report: AssemblyReport = {
            total: papers.length,
            processed: 0,
            skipped: [],
            skippedFields: [],
            tallyFailures: [],
            tripleCount: 0,
        };

        logger.info({ papers: papers.length }, 'Converting papers to RDF');

        for (const [index, paper] of papers.entries()) {
            const doi = paper.doi;
            if (!doi) {
                report.skipped.push({ index, reason: 'missing identifier' });
                logger.debug({ index }, 'Skipping paper without DOI');
                continue;
            }

            const tally = await this.lookupTally(doi, report);

            const paperGraph = new TripleGraph();
            try {
                const outcome = new PublicationBuilder(paperGraph, this.resolver, this.reportBaseUrl).build(paper, tally);
                if (outcome.status === 'skipped') {
                    report.skipped.push({ index, doi, reason: outcome.reason });
                    continue;
                }
                graph.merge(paperGraph);
                report.processed++;
                for (const field of outcome.skippedFields) {
                    report.skippedFields.push({ ...field, doi });
                }
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                report.skipped.push({ index, doi, reason });
                logger.warn({ doi, error }, 'Error processing paper');
            }

            if ((index + 1) % 10 === 0) {
                logger.info({ done: index + 1, total: papers.length }, 'Processed papers');
            }
        }

        report.tripleCount = graph.size;
        logger.info(
            { processed: report.processed, skipped: report.skipped.length, triples: report.tripleCount },
            'Generated RDF graph'
        );

        return { graph, report };
    }

    /**
     * A failed lookup only costs this paper its citation counts.
     */
    private async lookupTally(doi: string, report: AssemblyReport): Promise<CitationTally | null> {
        if (!this.tallySource) return null;

        try {
            return await this.tallySource.fetchTally(doi);
        } catch (error) {
            report.tallyFailures.push(doi);
            getLogger().warn({ doi, error }, 'Could not fetch tallies');
            return null;
        }
    }
}
