/**
 * MetricFetcher - reads one metric for one date from the provider API.
 *
 * Transport failures (network, timeout, 408, 5xx, unreadable body) are retried
 * with exponential backoff up to `maxRetries`. Everything else is surfaced to
 * the caller right away:
 * - 401 → AuthError (caller re-validates the credential)
 * - 403 → PermissionError (missing scope or intraday access)
 * - 429 → RateLimitError carrying the provider's back-off hint
 * - 404 → successful empty result
 */

import createDebug from "debug";
import {
  NetworkError,
  RateLimitError,
  SyncCancelledError,
  classifyHttpError,
  parseRetryAfter,
} from "@fitsync/proto";
import type { Credential } from "@fitsync/connectors";
import type { MetricCatalog } from "./metrics";
import type { FetchedMetric, MetricSource } from "./types";

const debug = createDebug("fitsync:sync:fetcher");

export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;
export const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_BASE_DELAY_MS = 1_000;
const DEFAULT_MAX_DELAY_MS = 30_000;

export interface MetricFetcherOptions {
  apiBaseUrl: string;
  catalog: MetricCatalog;
  timeoutMs?: number;
  /** Retries after the first attempt for transport failures */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export class MetricFetcher implements MetricSource {
  private apiBaseUrl: string;
  private catalog: MetricCatalog;
  private timeoutMs: number;
  private maxRetries: number;
  private baseDelayMs: number;
  private maxDelayMs: number;

  constructor(options: MetricFetcherOptions) {
    this.apiBaseUrl = options.apiBaseUrl.replace(/\/+$/, "");
    this.catalog = options.catalog;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  }

  async fetch(
    metric: string,
    date: string,
    credential: Credential,
    signal?: AbortSignal
  ): Promise<FetchedMetric> {
    const definition = this.catalog.get(metric);
    const url = `${this.apiBaseUrl}${definition.path(date)}`;

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw new SyncCancelledError();
      }

      try {
        return await this.request(url, metric, date, credential, signal);
      } catch (error) {
        const retryable =
          error instanceof NetworkError && !(error instanceof RateLimitError);
        if (!retryable || attempt >= this.maxRetries) {
          throw error;
        }

        const delayMs = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** attempt);
        debug(
          "Transport failure for %s on %s (attempt %d/%d), retrying in %dms: %s",
          metric,
          date,
          attempt + 1,
          this.maxRetries + 1,
          delayMs,
          error
        );
        await sleep(delayMs, signal);
      }
    }
  }

  private async request(
    url: string,
    metric: string,
    date: string,
    credential: Credential,
    signal?: AbortSignal
  ): Promise<FetchedMetric> {
    const source = `MetricFetcher.${metric}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          headers: {
            Authorization: `Bearer ${credential.accessToken}`,
            Accept: "application/json",
          },
          signal: controller.signal,
        });
      } catch (error) {
        throw this.transportError(error, `Request for ${metric} on ${date} failed`, source, signal);
      }

      if (response.status === 404) {
        await response.text().catch(() => "");
        debug("No %s data for %s", metric, date);
        return { metric, date, document: null, empty: true };
      }

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        throw classifyHttpError(
          response.status,
          `${metric} on ${date}: HTTP ${response.status} ${body.slice(0, 500)}`.trim(),
          {
            source,
            retryAfterMs:
              response.status === 429 ? rateLimitHint(response.headers) : undefined,
          }
        );
      }

      let document: unknown;
      try {
        document = await response.json();
      } catch (error) {
        throw this.transportError(error, `Malformed ${metric} response for ${date}`, source, signal);
      }

      if (typeof document !== "object" || document === null) {
        throw new NetworkError(`${metric} response for ${date} is not a JSON document`, {
          source,
          statusCode: response.status,
        });
      }

      debug("Fetched %s for %s", metric, date);
      return { metric, date, document, empty: false };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Caller cancellation wins over timeouts and network failures.
   */
  private transportError(
    error: unknown,
    message: string,
    source: string,
    signal?: AbortSignal
  ): Error {
    if (signal?.aborted) {
      return new SyncCancelledError();
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new NetworkError(`${message}: ${detail}`, {
      source,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Back-off hint from Retry-After, falling back to Fitbit's reset header
 * (seconds until the hourly quota resets).
 */
export function rateLimitHint(headers: Headers): number | undefined {
  const retryAfter = parseRetryAfter(headers.get("Retry-After"));
  if (retryAfter !== undefined) {
    return retryAfter;
  }
  return parseRetryAfter(headers.get("Fitbit-Rate-Limit-Reset"));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SyncCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new SyncCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
