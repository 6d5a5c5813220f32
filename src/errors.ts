/**
 * Run-level failures. Per-record problems (missing DOI, malformed author,
 * unavailable tally) are not errors: they are collected in the assembly
 * report instead.
 */

/**
 * The paper source could not be reached or answered with garbage.
 * Fatal: no graph can be built.
 */
export class SourceFetchError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'SourceFetchError';
    }
}

/**
 * Assembly produced zero triples, so there is nothing to import.
 */
export class EmptyGraphError extends Error {
    constructor(message = 'Graph is empty; nothing to import') {
        super(message);
        this.name = 'EmptyGraphError';
    }
}

/**
 * The store refused the bulk insert, or could not be reached.
 * The graph has been written to `fallbackPath` (null if that write failed too).
 */
export class ImportRejectedError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly fallbackPath: string | null,
        public readonly responseText?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ImportRejectedError';
    }
}

/**
 * Invalid invocation or configuration, detected before any network call.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
