#!/usr/bin/env node

import { Command } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { collectDois } from '../sources/utils.js';
import { RunLedger, openRunLedger } from '../storage/run-ledger.js';
import { createPipeline, exitCodeFor, runImport, TOOL_VERSION, type RunImportOptions } from '../pipeline/run-import.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_CONFIG, type ImportConfig } from '../types/index.js';

const program = new Command();

program
    .name('scite-vivo')
    .description('Turn Scite citation records into VIVO RDF and import them via SPARQL UPDATE.')
    .version(TOOL_VERSION);

interface ImportCommandOptions {
    doi?: string[];
    csv?: string;
    column: string;
    limit?: string;
    output?: string;
    email?: string;
    password?: string;
    sciteUrl?: string;
    vivoUrl?: string;
    fallbackDir?: string;
    tallies: boolean;
    ledger: boolean;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface RunsCommandOptions {
    input: string;
    limit: string;
}

function parseInteger(value: string): number {
    const n = parseInt(value, 10);
    if (isNaN(n)) {
        throw new ConfigError(`Not a number: ${value}`);
    }
    return n;
}

// ─── IMPORT command ───────────────────────────────────────

program
    .command('import', { isDefault: true })
    .description('Fetch papers by DOI, build the graph, and import it (or save it with --output)')
    .option('--doi <dois...>', 'DOIs to import')
    .option('--csv <file>', 'CSV file with DOIs')
    .option('--column <name>', 'CSV column holding the DOIs', 'doi')
    .option('--limit <n>', 'Limit number of DOIs to process')
    .option('-o, --output <file>', 'Save RDF (Turtle) to a file instead of importing')
    .option('--email <email>', `VIVO admin email (default: ${DEFAULT_CONFIG.email})`)
    .option('--password <password>', 'VIVO admin password (or set VIVO_PASSWORD)')
    .option('--scite-url <url>', 'Scite API base URL')
    .option('--vivo-url <url>', 'VIVO base URL')
    .option('--fallback-dir <dir>', 'Directory for backup files written after a failed import')
    .option('--no-tallies', 'Skip per-paper citation tally lookups')
    .option('--no-ledger', 'Do not record the run in the run ledger')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: ImportCommandOptions) => {
        const cliConfig: ConfigOverrides = {
            sciteApiUrl: opts.sciteUrl,
            vivoBaseUrl: opts.vivoUrl,
            email: opts.email,
            password: opts.password,
            output: opts.output,
            fallbackDir: opts.fallbackDir,
            fetchTallies: opts.tallies ? undefined : false,
            ledgerPath: opts.ledger ? undefined : null,
            jsonLogs: opts.jsonLogs ? true : undefined,
        };

        let config: ImportConfig;
        try {
            cliConfig.logLevel = parseLogLevel(opts.logLevel);
            config = await resolveConfig(cliConfig);
        } catch (error) {
            getLogger().error({ error }, 'Invalid configuration');
            process.exitCode = 1;
            return;
        }

        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const logger = getLogger();

        const httpClient = createHttpClient({ version: TOOL_VERSION, maxRetries: config.maxRetries });
        let ledger: RunLedger | undefined;

        try {
            ledger = openRunLedger(config.ledgerPath);

            const dois = collectDois({
                dois: opts.doi,
                csv: opts.csv,
                column: opts.column,
                limit: opts.limit ? parseInteger(opts.limit) : undefined,
            });

            const mode: RunImportOptions = config.output
                ? { mode: 'save', output: config.output }
                : { mode: 'import', credentials: { email: config.email, password: config.password ?? '' } };

            logger.info({ dois: dois.length, mode: mode.mode }, 'Starting run');

            const outcome = await runImport(dois, mode, createPipeline(config, httpClient, ledger));

            logger.info(
                {
                    status: outcome.status,
                    triples: outcome.tripleCount,
                    processed: outcome.report?.processed ?? 0,
                    skipped: outcome.report?.skipped ?? [],
                    tallyFailures: outcome.report?.tallyFailures.length ?? 0,
                    requests: httpClient.getAllRequestCounts(),
                },
                'Run finished'
            );
            process.exitCode = exitCodeFor(outcome.status);
        } catch (error) {
            logger.error({ error }, 'Run failed');
            process.exitCode = 1;
        } finally {
            ledger?.close();
        }
    });

// ─── RUNS command ─────────────────────────────────────────

program
    .command('runs')
    .description('Show recent import runs')
    .option('-i, --input <dbPath>', 'Run ledger path', DEFAULT_CONFIG.ledgerPath ?? './scitevivo-runs.db')
    .option('-n, --limit <n>', 'Number of runs to show', '20')
    .action((opts: RunsCommandOptions) => {
        try {
            const ledger = new RunLedger(opts.input);
            const runs = ledger.getRecentRuns(parseInteger(opts.limit));
            const total = ledger.getRunCount();
            ledger.close();

            console.log(`\nImport runs (${runs.length} of ${total})\n`);
            for (const run of runs) {
                const path = run.output_path ? `  ${run.output_path}` : '';
                console.log(
                    `  #${run.run_id}  ${run.created_at}  ${run.status.padEnd(16)} ` +
                        `requested=${run.requested} processed=${run.processed} skipped=${run.skipped} ` +
                        `triples=${run.triple_count}${path}`
                );
            }
            console.log('');
        } catch (error) {
            console.error('Failed to read run ledger:', error);
            process.exitCode = 1;
        }
    });

await program.parseAsync(process.argv);
