import type { CitationSource, ImportConfig, TallySource } from '../types/index.js';
import { individualBase, sparqlUpdateEndpoint } from '../types/index.js';
import { IdentityResolver } from '../identity/resolver.js';
import { GraphAssembler, type AssemblyReport } from '../builder/graph-assembler.js';
import { ImportExecutor, type StoreCredentials } from '../importer/import-executor.js';
import { exportGraph } from '../exporters/export.js';
import { SciteClient } from '../sources/scite.js';
import type { ScitePaper } from '../sources/schemas.js';
import type { RunLedger } from '../storage/run-ledger.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { ConfigError, ImportRejectedError, SourceFetchError } from '../errors.js';

export const TOOL_VERSION = '1.0.0';

/**
 * Per-run state machine:
 * idle → fetching → assembling → {empty | ready} → {saved | importing → {committed | fallback-written}}
 */
export type RunState =
    | 'idle'
    | 'fetching'
    | 'assembling'
    | 'empty'
    | 'ready'
    | 'saved'
    | 'importing'
    | 'committed'
    | 'fallback-written';

export type RunStatus = Extract<RunState, 'empty' | 'saved' | 'committed' | 'fallback-written'>;

export interface RunOutcome {
    status: RunStatus;
    requested: number;
    tripleCount: number;
    report: AssemblyReport | null;
    /** File written in save-only mode */
    outputPath?: string;
    /** Backup written after a rejected import */
    fallbackPath?: string | null;
    error?: ImportRejectedError;
}

/**
 * `save` writes the graph as Turtle to `output` instead of importing it.
 */
export type RunImportOptions =
    | { mode: 'save'; output: string }
    | { mode: 'import'; credentials: StoreCredentials };

export interface PipelineDeps {
    source: CitationSource;
    assembler: GraphAssembler;
    executor: ImportExecutor;
    ledger?: RunLedger;
    onStateChange?: (state: RunState) => void;
}

/**
 * Wire the pipeline components from a resolved config.
 */
export function createPipeline(config: ImportConfig, httpClient: HttpClient, ledger?: RunLedger): PipelineDeps {
    const scite = new SciteClient({
        baseUrl: config.sciteApiUrl,
        httpClient,
        batchSize: config.batchSize,
        papersTimeout: config.timeouts.papers,
        talliesTimeout: config.timeouts.tallies,
    });

    const tallySource: TallySource | undefined = config.fetchTallies ? scite : undefined;

    return {
        source: scite,
        assembler: new GraphAssembler({
            resolver: new IdentityResolver({ base: individualBase(config), hashLength: config.hashLength }),
            reportBaseUrl: config.reportBaseUrl,
            tallySource,
        }),
        executor: new ImportExecutor({
            endpoint: sparqlUpdateEndpoint(config),
            namedGraph: config.namedGraph,
            httpClient,
            fallbackDir: config.fallbackDir,
            timeoutMs: config.timeouts.import,
        }),
        ledger,
    };
}

/**
 * Fetch → assemble → save or import.
 *
 * Only a source failure (`SourceFetchError`) and a missing password
 * (`ConfigError`) are thrown. A rejected import is reported through the
 * `fallback-written` status with the error attached.
 */
export async function runImport(
    dois: string[],
    options: RunImportOptions,
    deps: PipelineDeps
): Promise<RunOutcome> {
    const logger = getLogger();
    const setState = (state: RunState): void => {
        logger.debug({ state }, 'Run state');
        deps.onStateChange?.(state);
    };

    if (options.mode === 'import' && !options.credentials.password) {
        throw new ConfigError('Password required for VIVO import. Provide via --password or VIVO_PASSWORD env var');
    }

    setState('idle');
    const base = { requested: dois.length, tripleCount: 0, report: null };

    if (dois.length === 0) {
        logger.warn('No DOIs to process');
        setState('empty');
        return finish(deps, { ...base, status: 'empty' });
    }

    setState('fetching');
    let papers: ScitePaper[];
    try {
        papers = await deps.source.fetchPapers(dois);
    } catch (error) {
        if (error instanceof SourceFetchError) {
            recordRun(deps, { ...base, status: 'empty' }, 'source-failed');
        }
        throw error;
    }

    if (papers.length === 0) {
        logger.warn('No papers retrieved from source');
        setState('empty');
        return finish(deps, { ...base, status: 'empty' });
    }

    setState('assembling');
    const { graph, report } = await deps.assembler.assemble(papers);
    const assembled = { ...base, tripleCount: graph.size, report };

    if (graph.isEmpty()) {
        logger.warn({ skipped: report.skipped.length }, 'No RDF generated');
        setState('empty');
        return finish(deps, { ...assembled, status: 'empty' });
    }
    setState('ready');

    if (options.mode === 'save') {
        exportGraph(graph, options.output, 'turtle');
        setState('saved');
        return finish(deps, { ...assembled, status: 'saved', outputPath: options.output });
    }

    setState('importing');
    try {
        await deps.executor.commit(graph, options.credentials);
        setState('committed');
        return finish(deps, { ...assembled, status: 'committed' });
    } catch (error) {
        if (!(error instanceof ImportRejectedError)) throw error;
        setState('fallback-written');
        return finish(deps, {
            ...assembled,
            status: 'fallback-written',
            fallbackPath: error.fallbackPath,
            error,
        });
    }
}

/**
 * Process exit code for a finished run.
 */
export function exitCodeFor(status: RunStatus): number {
    switch (status) {
        case 'committed':
        case 'saved':
            return 0;
        case 'empty':
            return 2;
        case 'fallback-written':
            return 1;
    }
}

function finish(deps: PipelineDeps, outcome: RunOutcome): RunOutcome {
    recordRun(deps, outcome, outcome.status);
    return outcome;
}

/**
 * The ledger is history only: a failed write is logged and the run outcome stands.
 */
function recordRun(deps: PipelineDeps, outcome: RunOutcome, status: string): void {
    if (!deps.ledger) return;

    try {
        deps.ledger.insertRun({
            created_at: new Date().toISOString(),
            tool_version: TOOL_VERSION,
            status,
            requested: outcome.requested,
            processed: outcome.report?.processed ?? 0,
            skipped: outcome.report?.skipped.length ?? 0,
            triple_count: outcome.tripleCount,
            output_path: outcome.fallbackPath ?? outcome.outputPath ?? null,
            report_json: JSON.stringify(outcome.report ?? {}),
        });
    } catch (error) {
        getLogger().warn({ error, status }, 'Could not record run in ledger');
    }
}
