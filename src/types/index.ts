/**
 * Barrel export for all shared types.
 */
export type { NamedNode, Literal, Term, Triple, SerializationFormat } from './rdf.js';
export { DEFAULT_CONFIG, individualBase, sparqlUpdateEndpoint } from './config.js';
export type { ImportConfig, LogLevel, TimeoutConfig, RunRecord } from './config.js';
export type { CitationSource, TallySource } from './source-adapter.js';
