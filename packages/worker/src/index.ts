// @trendwire/worker — source producers, ingestion run, CLI commands
export * from "./sources/index.js";
export {
  IngestionInProgressError,
  createIngestionGuard,
  runIngestion,
  type IngestionDeps,
  type IngestionGuard,
  type IngestionOptions,
  type IngestionReport,
  type SourceReport,
} from "./ingest.js";
export {
  createRuntime,
  ingestionDeps,
  ingestionOptions,
  vectorIndexPath,
  type Runtime,
  type RuntimeOptions,
} from "./runtime.js";
export {
  EXIT_WORDS,
  askCommand,
  digestCommand,
  formatRecords,
  formatReport,
  latestCommand,
  statsCommand,
  type AskDeps,
} from "./commands.js";
