import type { SyncFailure, SyncReport, SyncStatus } from "./types";

export interface SyncResultSummary {
  metric: string;
  date: string;
  status: "succeeded" | "failed";
  empty?: boolean;
  skipped?: boolean;
  path?: string;
  error?: SyncFailure;
}

/**
 * A report without the raw provider documents, for HTTP and CLI output.
 */
export interface SyncReportSummary {
  accountKey: string;
  status: SyncStatus;
  dates: string[];
  metrics: string[];
  results: SyncResultSummary[];
  /** "date:metric" of every failed result */
  failed: string[];
  error?: SyncFailure;
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
}

export function summarizeReport(report: SyncReport): SyncReportSummary {
  const results = report.results.map((result): SyncResultSummary => {
    if (result.status === "failed") {
      return {
        metric: result.metric,
        date: result.date,
        status: result.status,
        error: result.error,
      };
    }
    return {
      metric: result.metric,
      date: result.date,
      status: result.status,
      empty: result.empty,
      skipped: result.skipped,
      path: result.artifact?.path,
    };
  });

  return {
    accountKey: report.accountKey,
    status: report.status,
    dates: report.dates,
    metrics: report.metrics,
    results,
    failed: results
      .filter((r) => r.status === "failed")
      .map((r) => `${r.date}:${r.metric}`),
    error: report.error,
    cancelled: report.cancelled,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
  };
}
