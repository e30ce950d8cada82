/**
 * Types for sync reports and stored artifacts.
 */

import type { Credential } from "@fitsync/connectors";
import type { ErrorType } from "@fitsync/proto";

/**
 * Durable representation of one successful fetch.
 * Unique per (accountKey, metric, date).
 */
export interface StoredArtifact {
  accountKey: string;
  metric: string;
  date: string;
  /** Absolute path of the artifact file */
  path: string;
  bytes: number;
  /** Unix ms */
  storedAt: number;
}

/**
 * Why a metric (or the whole sync) failed.
 */
export interface SyncFailure {
  type: ErrorType | "cancelled";
  message: string;
  /** Back-off hint from a rate-limited response */
  retryAfterMs?: number;
}

export interface SyncSuccess {
  metric: string;
  date: string;
  status: "succeeded";
  /** Raw provider document; null when the provider had no data for the date */
  payload: unknown;
  empty: boolean;
  /** True when an existing artifact made the fetch unnecessary */
  skipped: boolean;
  artifact?: StoredArtifact;
}

export interface SyncFailed {
  metric: string;
  date: string;
  status: "failed";
  error: SyncFailure;
}

/** Outcome of one metric for one date */
export type SyncResult = SyncSuccess | SyncFailed;

export type SyncStatus =
  | "succeeded" // every metric for every date succeeded
  | "partial" // some succeeded, some failed
  | "failed" // connected, nothing succeeded
  | "not_connected"; // no credential, nothing attempted

export interface SyncReport {
  accountKey: string;
  status: SyncStatus;
  dates: string[];
  metrics: string[];
  /** Ordered by date, then by configured metric order */
  results: SyncResult[];
  /** Failure that stopped the sync as a whole */
  error?: SyncFailure;
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
}

export interface SyncRequest {
  /** Single target date (YYYY-MM-DD) */
  date?: string;
  /** Inclusive range start; requires `to` */
  from?: string;
  /** Inclusive range end; requires `from` */
  to?: string;
  /** Skip metrics that already have an artifact for the date */
  skipExisting?: boolean;
  /** Cancels in-flight fetches; finished artifacts stay */
  signal?: AbortSignal;
}

/**
 * A fetched provider document for one metric and date.
 */
export interface FetchedMetric {
  metric: string;
  date: string;
  document: unknown;
  /** Provider had no data for the date (404) */
  empty: boolean;
}

/**
 * What the orchestrator needs from a metric fetcher.
 */
export interface MetricSource {
  fetch(
    metric: string,
    date: string,
    credential: Credential,
    signal?: AbortSignal
  ): Promise<FetchedMetric>;
}

/**
 * What the orchestrator needs from the artifact store.
 */
export interface ArtifactStore {
  save(
    accountKey: string,
    metric: string,
    date: string,
    document: unknown
  ): Promise<StoredArtifact>;
  exists(accountKey: string, metric: string, date: string): Promise<boolean>;
}
