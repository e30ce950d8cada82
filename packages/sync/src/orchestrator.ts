/**
 * SyncOrchestrator - pulls the configured metrics for a date window and
 * stores each document.
 *
 * Metrics are fetched one at a time, dates ascending and metrics in configured
 * order. Every fetch asks the token manager for a credential first, so a token
 * that goes stale halfway through a long range is refreshed on the way. One
 * failing metric never stops the others; only losing the connection or a
 * cancellation ends the run early. `runSync` always resolves to a report.
 */

import createDebug from "debug";
import {
  AuthError,
  LogicError,
  NotConnectedError,
  RateLimitError,
  ensureClassified,
  isSyncCancelledError,
} from "@fitsync/proto";
import type { CredentialProvider } from "@fitsync/connectors";
import {
  MAX_SYNC_DAYS,
  calendarDateRange,
  parseCalendarDate,
  yesterday,
} from "./dates";
import type {
  ArtifactStore,
  FetchedMetric,
  MetricSource,
  SyncFailure,
  SyncReport,
  SyncRequest,
  SyncResult,
  SyncStatus,
  SyncSuccess,
} from "./types";

const debug = createDebug("fitsync:sync:orchestrator");

export interface SyncOrchestratorOptions {
  /** Metric kinds to sync, in order */
  metrics: string[];
  /** Default for requests that don't set skipExisting */
  skipExisting?: boolean;
  /** Longest accepted from..to range */
  maxDays?: number;
  now?: () => Date;
}

export class SyncOrchestrator {
  private metrics: string[];
  private skipExisting: boolean;
  private maxDays: number;
  private now: () => Date;

  constructor(
    private tokens: CredentialProvider,
    private source: MetricSource,
    private results: ArtifactStore,
    options: SyncOrchestratorOptions
  ) {
    this.metrics = [...options.metrics];
    this.skipExisting = options.skipExisting ?? false;
    this.maxDays = options.maxDays ?? MAX_SYNC_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  /** Configured metric kinds, in sync order */
  getMetrics(): string[] {
    return [...this.metrics];
  }

  async runSync(accountKey: string, request: SyncRequest = {}): Promise<SyncReport> {
    const startedAt = this.now().toISOString();
    const signal = request.signal;
    const skipExisting = request.skipExisting ?? this.skipExisting;

    const report = (
      dates: string[],
      results: SyncResult[],
      options: { error?: SyncFailure; cancelled?: boolean; notConnected?: boolean } = {}
    ): SyncReport => {
      const cancelled = options.cancelled ?? false;
      const status = computeStatus(results, {
        failedEarly: options.error !== undefined || cancelled,
        notConnected: options.notConnected ?? false,
      });
      debug(
        "Sync for %s finished: %s (%d results%s)",
        accountKey,
        status,
        results.length,
        cancelled ? ", cancelled" : ""
      );
      return {
        accountKey,
        status,
        dates,
        metrics: [...this.metrics],
        results,
        error: options.error,
        cancelled,
        startedAt,
        finishedAt: this.now().toISOString(),
      };
    };

    let dates: string[];
    try {
      dates = this.resolveDates(request);
    } catch (error) {
      return report([], [], { error: toFailure(error) });
    }

    debug("Sync for %s: %d date(s), metrics=%s", accountKey, dates.length, this.metrics.join(","));

    if (signal?.aborted) {
      return report(dates, [], { cancelled: true, error: cancelledFailure() });
    }

    // Short-circuit before any fetch when there is no usable credential
    try {
      await this.tokens.validCredential(accountKey);
    } catch (error) {
      return report(dates, [], {
        error: toFailure(error),
        notConnected: error instanceof NotConnectedError,
      });
    }

    const results: SyncResult[] = [];

    for (const date of dates) {
      for (const metric of this.metrics) {
        if (signal?.aborted) {
          return report(dates, results, { cancelled: true, error: cancelledFailure() });
        }

        try {
          results.push(await this.syncMetric(accountKey, metric, date, skipExisting, signal));
        } catch (error) {
          if (isSyncCancelledError(error)) {
            return report(dates, results, { cancelled: true, error: toFailure(error) });
          }

          const failure = toFailure(error);
          results.push({ metric, date, status: "failed", error: failure });

          if (error instanceof NotConnectedError) {
            debug("Connection lost for %s during sync, stopping", accountKey);
            return report(dates, results, { error: failure, notConnected: true });
          }

          debug("Metric %s for %s failed: %s", metric, date, failure.message);
        }
      }
    }

    return report(dates, results);
  }

  /**
   * Fetch and store one metric for one date. A 401 gets one retry with a
   * credential the manager has re-validated.
   */
  private async syncMetric(
    accountKey: string,
    metric: string,
    date: string,
    skipExisting: boolean,
    signal?: AbortSignal
  ): Promise<SyncSuccess> {
    if (skipExisting && (await this.results.exists(accountKey, metric, date))) {
      debug("Skipping %s for %s, already stored", metric, date);
      return { metric, date, status: "succeeded", payload: null, empty: false, skipped: true };
    }

    let credential = await this.tokens.validCredential(accountKey);
    let fetched: FetchedMetric;
    try {
      fetched = await this.source.fetch(metric, date, credential, signal);
    } catch (error) {
      if (!(error instanceof AuthError)) {
        throw error;
      }
      debug("Access token rejected fetching %s for %s, re-validating", metric, date);
      credential = await this.tokens.validCredential(accountKey, { rejected: credential });
      fetched = await this.source.fetch(metric, date, credential, signal);
    }

    const artifact = await this.results.save(accountKey, metric, date, fetched.document);
    return {
      metric,
      date,
      status: "succeeded",
      payload: fetched.document,
      empty: fetched.empty,
      skipped: false,
      artifact,
    };
  }

  private resolveDates(request: SyncRequest): string[] {
    const { date, from, to } = request;

    if (date !== undefined) {
      if (from !== undefined || to !== undefined) {
        throw new LogicError("Pass either a date or a from/to range, not both", {
          source: "SyncOrchestrator.resolveDates",
        });
      }
      parseCalendarDate(date);
      return [date];
    }

    if (from !== undefined || to !== undefined) {
      if (from === undefined || to === undefined) {
        throw new LogicError("A date range needs both from and to", {
          source: "SyncOrchestrator.resolveDates",
        });
      }
      return calendarDateRange(from, to, this.maxDays);
    }

    return [yesterday(this.now())];
  }
}

function computeStatus(
  results: SyncResult[],
  flags: { failedEarly: boolean; notConnected: boolean }
): SyncStatus {
  const succeeded = results.filter((r) => r.status === "succeeded").length;
  const failed = results.length - succeeded;

  if (succeeded === 0) {
    return flags.notConnected ? "not_connected" : "failed";
  }
  if (failed === 0 && !flags.failedEarly) {
    return "succeeded";
  }
  return "partial";
}

function cancelledFailure(): SyncFailure {
  return { type: "cancelled", message: "Sync was cancelled" };
}

/**
 * Reduce a thrown value to the failure recorded in the report.
 */
export function toFailure(error: unknown): SyncFailure {
  if (isSyncCancelledError(error)) {
    return { type: "cancelled", message: error.message };
  }
  const classified = ensureClassified(error, "SyncOrchestrator");
  if (classified instanceof RateLimitError && classified.retryAfterMs !== undefined) {
    return {
      type: classified.type,
      message: classified.message,
      retryAfterMs: classified.retryAfterMs,
    };
  }
  return { type: classified.type, message: classified.message };
}
