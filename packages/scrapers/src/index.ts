export type { DetailSource, FirstPage, NextPage, PageSource } from "./scraper.js";
export { ConfigError, MalformedResponseError, TransportError } from "./errors.js";
export {
  GraphqlClient,
  USER_AGENT,
  type FetchImpl,
  type GraphqlClientDeps,
  type PlatformConfig,
} from "./graphql/client.js";
export {
  decodeUpstreamResponse,
  expectDetail,
  expectListPage,
  type UpstreamResponse,
} from "./graphql/decode.js";
export { listPeopleOperation, personDetailOperation } from "./graphql/operations.js";
export {
  DEFAULT_RUN_OPTIONS,
  PaginatedCollector,
  type CheckpointSink,
  type CollectionOutcome,
  type CollectionResult,
  type CollectorDeps,
  type RunOptions,
} from "./collector.js";
export { fileCheckpoint, readCheckpoint, writeCheckpoint } from "./checkpoint.js";
export { DEFAULT_ENRICH_OPTIONS, enrichAttendees, type EnrichOptions, type EnrichResult } from "./enrich.js";
export {
  createRunDirectory,
  updateLatestLink,
  writeJson,
  writeRunArtifacts,
  type RunDirectory,
} from "./output.js";
export { cleanupRuns, isRunComplete, scanRuns, type CleanupOptions, type RunInfo } from "./cleanup.js";
export { loadConfig, type AppConfig } from "./config.js";
export { runScrape, printSummary, type ScrapeSummary } from "./pipeline.js";
