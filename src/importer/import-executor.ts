import { mkdirSync } from 'node:fs';
import type { TripleGraph } from '../rdf/graph.js';
import { toNTriples } from '../rdf/serializers.js';
import { backupFilePath, exportGraph } from '../exporters/export.js';
import { HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { EmptyGraphError, ImportRejectedError } from '../errors.js';

export interface StoreCredentials {
    email: string;
    password: string;
}

export interface CommitReceipt {
    tripleCount: number;
    status: number;
}

export interface ImportExecutorOptions {
    /** SPARQL UPDATE endpoint */
    endpoint: string;
    /** Named graph every triple is inserted into */
    namedGraph: string;
    httpClient: HttpClient;
    fallbackDir: string;
    timeoutMs?: number;
    /** Clock for the fallback file name */
    now?: () => Date;
}

/**
 * `INSERT DATA` statement for one named graph. The body must be N-Triples:
 * prefixed names would need a prologue the statement does not carry.
 */
export function buildInsertData(graph: TripleGraph, namedGraph: string): string {
    const body = toNTriples(graph)
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line) => `        ${line}`)
        .join('\n');

    return `INSERT DATA {\n    GRAPH <${namedGraph}> {\n${body}\n    }\n}\n`;
}

/**
 * Submits a whole graph to the store as one authenticated bulk insert.
 *
 * There is no retry at this level and no post-commit verification. Any
 * non-2xx answer or transport failure writes the graph to a timestamped
 * Turtle file and throws `ImportRejectedError`.
 */
export class ImportExecutor {
    private readonly endpoint: string;
    private readonly namedGraph: string;
    private readonly httpClient: HttpClient;
    private readonly fallbackDir: string;
    private readonly timeoutMs: number;
    private readonly now: () => Date;

    constructor(options: ImportExecutorOptions) {
        this.endpoint = options.endpoint;
        this.namedGraph = options.namedGraph;
        this.httpClient = options.httpClient;
        this.fallbackDir = options.fallbackDir;
        this.timeoutMs = options.timeoutMs ?? 60000;
        this.now = options.now ?? (() => new Date());
    }

    async commit(graph: TripleGraph, credentials: StoreCredentials): Promise<CommitReceipt> {
        const logger = getLogger();
        if (graph.isEmpty()) {
            throw new EmptyGraphError();
        }

        logger.info({ triples: graph.size, endpoint: this.endpoint }, 'Importing triples');

        const form = new URLSearchParams({
            update: buildInsertData(graph, this.namedGraph),
            email: credentials.email,
            password: credentials.password,
        });

        try {
            const response = await this.httpClient.post(this.endpoint, form, {
                timeout: this.timeoutMs,
                source: 'vivo',
            });
            logger.info({ status: response.status, triples: graph.size }, 'Imported data');
            return { tripleCount: graph.size, status: response.status };
        } catch (error) {
            const status = error instanceof HttpError ? error.status : 0;
            const responseText =
                error instanceof HttpError && typeof error.response === 'string' ? error.response : undefined;
            const reason = error instanceof Error ? error.message : String(error);

            logger.error({ status, reason, response: responseText }, 'Import rejected');

            const fallbackPath = this.writeFallback(graph);
            throw new ImportRejectedError(`Import failed: ${reason}`, status, fallbackPath, responseText, {
                cause: error,
            });
        }
    }

    /**
     * Persist the attempted graph. Returns null if even that fails.
     */
    private writeFallback(graph: TripleGraph): string | null {
        const logger = getLogger();
        const path = backupFilePath(this.fallbackDir, this.now());
        try {
            mkdirSync(this.fallbackDir, { recursive: true });
            exportGraph(graph, path, 'turtle');
            logger.warn({ path }, 'Data saved for manual import');
            return path;
        } catch (error) {
            logger.error({ path, error }, 'Failed to write fallback file');
            return null;
        }
    }
}
