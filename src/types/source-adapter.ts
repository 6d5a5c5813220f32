import type { CitationTally, ScitePaper } from '../sources/schemas.js';

/**
 * Provider of paper records keyed by DOI.
 */
export interface CitationSource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Fetch paper records for the given DOIs.
     * Unknown DOIs are dropped; the order of the result follows the response.
     * Throws `SourceFetchError` when the source cannot be reached.
     */
    fetchPapers(dois: string[]): Promise<ScitePaper[]>;
}

/**
 * Provider of per-paper citation tallies.
 */
export interface TallySource {
    /**
     * Fetch the tally for a DOI. Resolves to null when no tally is available.
     * May reject; callers treat a rejection as "no tally".
     */
    fetchTally(doi: string): Promise<CitationTally | null>;
}
