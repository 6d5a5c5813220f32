/**
 * Library entry point.
 */
export * from './types/index.js';
export { IdentityResolver, EntityPrefix } from './identity/resolver.js';
export { TripleGraph } from './rdf/graph.js';
export { toNTriples, toTurtle } from './rdf/serializers.js';
export { PREFIXES, RDF, RDFS, XSD, FOAF, BIBO, VIVO } from './rdf/namespaces.js';
export { EntityBuilder, type EntityRef } from './builder/entity-builder.js';
export { PublicationBuilder, type PublicationOutcome, type SkippedField } from './builder/publication-builder.js';
export { GraphAssembler, type AssemblyReport, type AssemblyResult, type SkippedPaper } from './builder/graph-assembler.js';
export { resolveFirst, AUTHOR_NAME_CHAIN, ORCID_CHAIN, type ValueSource } from './builder/fallback-chain.js';
export { ImportExecutor, buildInsertData, type CommitReceipt, type StoreCredentials } from './importer/import-executor.js';
export { SciteClient } from './sources/scite.js';
export { parsePaper, parseTally, type ScitePaper, type SciteAuthor, type CitationTally } from './sources/schemas.js';
export { exportGraph, serializeGraph } from './exporters/export.js';
export { runImport, createPipeline, exitCodeFor, type RunOutcome, type RunState, type RunStatus } from './pipeline/run-import.js';
export { RunLedger, openRunLedger } from './storage/run-ledger.js';
export { SourceFetchError, EmptyGraphError, ImportRejectedError, ConfigError } from './errors.js';
