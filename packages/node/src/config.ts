import { z } from "zod";
import { LogicError } from "@fitsync/proto";
import { FITBIT_DEFAULT_SCOPES } from "@fitsync/connectors";
import { DEFAULT_METRIC_KINDS, MetricCatalog } from "@fitsync/sync";

export const DEFAULT_REDIRECT_URI = "http://localhost:5000/fitbit/callback";

/**
 * Settings for one fitsync process, resolved from the environment.
 */
export interface FitsyncConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string[];
  /** Root of the stored metric documents */
  dataDir: string;
  /** Root of the credential store */
  credentialsDir: string;
  /** Account key used when a caller doesn't name one */
  account: string;
  /** Metric kinds to sync, in order */
  metrics: string[];
  requestTimeoutMs: number;
  refreshMarginMs: number;
  maxRetries: number;
  /** Cron pattern for scheduled syncs of the default account */
  syncCron?: string;
  host: string;
  port: number;
}

const envSchema = z.object({
  FITBIT_CLIENT_ID: z.string({ required_error: "is required" }).trim().min(1),
  FITBIT_CLIENT_SECRET: z.string({ required_error: "is required" }).trim().min(1),
  FITBIT_REDIRECT_URI: z.string().url().default(DEFAULT_REDIRECT_URI),
  FITBIT_SCOPES: z.string().default(FITBIT_DEFAULT_SCOPES.join(" ")),
  FITBIT_DATA_DIR: z.string().default("fitbit_data"),
  FITSYNC_CREDENTIALS_DIR: z.string().default(".fitsync"),
  FITSYNC_ACCOUNT: z.string().trim().min(1).default("default"),
  FITSYNC_METRICS: z.string().default(DEFAULT_METRIC_KINDS.join(",")),
  FITSYNC_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  FITSYNC_REFRESH_MARGIN_SEC: z.coerce.number().int().nonnegative().default(60),
  FITSYNC_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  FITSYNC_SYNC_CRON: z.string().trim().optional(),
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
});

/**
 * Parse and validate configuration. Blank variables count as unset.
 *
 * @throws LogicError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  catalog: MetricCatalog = new MetricCatalog()
): FitsyncConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      present[key] = value;
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")} ${issue.message}`
    );
    throw new LogicError(`Invalid configuration: ${problems.join("; ")}`, {
      source: "config.loadConfig",
    });
  }
  const vars = parsed.data;

  const metrics = splitList(vars.FITSYNC_METRICS, /[\s,]+/);
  if (metrics.length === 0) {
    throw new LogicError("Invalid configuration: FITSYNC_METRICS names no metrics", {
      source: "config.loadConfig",
    });
  }
  const unknown = metrics.filter((kind) => !catalog.has(kind));
  if (unknown.length > 0) {
    throw new LogicError(
      `Invalid configuration: unknown metric kind(s) ${unknown.join(", ")}; ` +
        `available: ${catalog.kinds().join(", ")}`,
      { source: "config.loadConfig" }
    );
  }

  return {
    clientId: vars.FITBIT_CLIENT_ID,
    clientSecret: vars.FITBIT_CLIENT_SECRET,
    redirectUri: vars.FITBIT_REDIRECT_URI,
    scopes: splitList(vars.FITBIT_SCOPES, /[\s,]+/),
    dataDir: vars.FITBIT_DATA_DIR,
    credentialsDir: vars.FITSYNC_CREDENTIALS_DIR,
    account: vars.FITSYNC_ACCOUNT,
    metrics,
    requestTimeoutMs: vars.FITSYNC_REQUEST_TIMEOUT_MS,
    refreshMarginMs: vars.FITSYNC_REFRESH_MARGIN_SEC * 1000,
    maxRetries: vars.FITSYNC_MAX_RETRIES,
    syncCron: vars.FITSYNC_SYNC_CRON,
    host: vars.HOST,
    port: vars.PORT,
  };
}

/** Split, trim and de-duplicate, keeping first-seen order */
function splitList(value: string, separator: RegExp): string[] {
  return Array.from(new Set(value.split(separator).filter(Boolean)));
}
