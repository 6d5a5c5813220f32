import type { CitationSource, TallySource } from '../types/index.js';
import { HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { SourceFetchError } from '../errors.js';
import {
    PapersResponseSchema,
    parsePaper,
    parseTally,
    type CitationTally,
    type ScitePaper,
} from './schemas.js';

export interface SciteClientOptions {
    baseUrl: string;
    httpClient: HttpClient;
    /** DOIs per POST /papers request */
    batchSize?: number;
    papersTimeout?: number;
    talliesTimeout?: number;
}

/**
 * Client for a Scite-compatible citation API.
 *
 * - `POST /papers` with a JSON array of DOIs → `{ papers: { doi: record | null } }`
 * - `GET /tallies/{doi}` → citation counts
 */
export class SciteClient implements CitationSource, TallySource {
    readonly name = 'Scite';
    private readonly baseUrl: string;
    private readonly httpClient: HttpClient;
    private readonly batchSize: number;
    private readonly papersTimeout: number;
    private readonly talliesTimeout: number;

    constructor(options: SciteClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.httpClient = options.httpClient;
        this.batchSize = options.batchSize ?? 500;
        this.papersTimeout = options.papersTimeout ?? 30000;
        this.talliesTimeout = options.talliesTimeout ?? 10000;
    }

    async fetchPapers(dois: string[]): Promise<ScitePaper[]> {
        const logger = getLogger();
        const papers: ScitePaper[] = [];

        for (let i = 0; i < dois.length; i += this.batchSize) {
            const batch = dois.slice(i, i + this.batchSize);
            const url = `${this.baseUrl}/papers`;
            logger.debug({ url, batchIndex: i, batchSize: batch.length }, 'Scite papers lookup');

            let data: unknown;
            try {
                const response = await this.httpClient.post(url, batch, {
                    timeout: this.papersTimeout,
                    source: 'scite',
                });
                data = response.data;
            } catch (error) {
                const status = error instanceof HttpError ? error.status : 0;
                const reason = error instanceof Error ? error.message : String(error);
                throw new SourceFetchError(`Paper lookup failed: ${reason}`, status, { cause: error });
            }

            const parsed = PapersResponseSchema.safeParse(data);
            if (!parsed.success) {
                throw new SourceFetchError(`Paper lookup returned an unexpected body: ${parsed.error.message}`, 200);
            }

            const entries = Object.entries(parsed.data.papers);
            let kept = 0;
            for (const [doi, raw] of entries) {
                const paper = parsePaper(raw);
                if (paper) {
                    papers.push(paper);
                    kept++;
                } else {
                    logger.debug({ doi }, 'No record for DOI');
                }
            }

            logger.info({ requested: batch.length, returned: entries.length, kept }, 'Retrieved papers from Scite');
        }

        return papers;
    }

    async fetchTally(doi: string): Promise<CitationTally | null> {
        // DOIs are sent unencoded; their slash is part of the route
        const url = `${this.baseUrl}/tallies/${doi}`;
        const response = await this.httpClient.get(url, { timeout: this.talliesTimeout, source: 'scite' });
        return parseTally(response.data);
    }
}
