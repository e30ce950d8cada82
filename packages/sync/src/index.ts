/**
 * @fitsync/sync - batch pulls of provider metrics into durable storage.
 */

export * from "./types";

export {
  MAX_SYNC_DAYS,
  calendarDateRange,
  formatCalendarDate,
  isCalendarDate,
  parseCalendarDate,
  yesterday,
} from "./dates";

export {
  BUILTIN_METRICS,
  DEFAULT_METRIC_KINDS,
  MetricCatalog,
  isValidMetricKind,
  type MetricDefinition,
  type MetricResolution,
} from "./metrics";

export {
  MetricFetcher,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  rateLimitHint,
  type MetricFetcherOptions,
} from "./fetcher";

export { ResultStore, accountDirName } from "./result-store";

export {
  SyncOrchestrator,
  toFailure,
  type SyncOrchestratorOptions,
} from "./orchestrator";

export {
  summarizeReport,
  type SyncReportSummary,
  type SyncResultSummary,
} from "./report";
