/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Per-request timeouts in milliseconds.
 */
export interface TimeoutConfig {
    papers: number;
    tallies: number;
    import: number;
}

/**
 * Full import configuration merged from CLI flags, env vars, and config file.
 */
export interface ImportConfig {
    // Source
    sciteApiUrl: string;
    fetchTallies: boolean;
    batchSize: number;

    // Target store
    vivoBaseUrl: string;
    namedGraph: string;
    email: string;
    password?: string;

    // Identity
    hashLength: number;
    reportBaseUrl: string;

    // Output
    output?: string;
    fallbackDir: string;
    ledgerPath: string | null;

    // HTTP
    timeouts: TimeoutConfig;
    maxRetries: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ImportConfig = {
    sciteApiUrl: 'http://localhost:8000',
    fetchTallies: true,
    batchSize: 500,
    vivoBaseUrl: 'http://localhost:8080/vivo',
    namedGraph: 'http://vitro.mannlib.cornell.edu/default/vitro-kb-2',
    email: 'vivo_root@mydomain.edu',
    hashLength: 12,
    reportBaseUrl: 'https://scite.ai/reports/',
    fallbackDir: '.',
    ledgerPath: './scitevivo-runs.db',
    timeouts: {
        papers: 30000,
        tallies: 10000,
        import: 60000,
    },
    maxRetries: 0,
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * IRI prefix under which every generated individual lives.
 */
export function individualBase(config: Pick<ImportConfig, 'vivoBaseUrl'>): string {
    return `${config.vivoBaseUrl}/individual/`;
}

/**
 * SPARQL UPDATE endpoint of the target store.
 */
export function sparqlUpdateEndpoint(config: Pick<ImportConfig, 'vivoBaseUrl'>): string {
    return `${config.vivoBaseUrl}/api/sparqlUpdate`;
}

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    tool_version: string;
    status: string;
    requested: number;
    processed: number;
    skipped: number;
    triple_count: number;
    output_path: string | null;
    report_json: string;
}
