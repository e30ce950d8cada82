import createDebug from "debug";
import * as path from "path";
import {
  AuthorizationFlow,
  CredentialStore,
  OAuthClient,
  TokenLifecycleManager,
  fitbitProvider,
} from "@fitsync/connectors";
import {
  MetricCatalog,
  MetricFetcher,
  ResultStore,
  SyncOrchestrator,
} from "@fitsync/sync";
import type { FitsyncConfig } from "./config";

const debug = createDebug("fitsync:node:runtime");

/**
 * Every long-lived component of a fitsync process, wired together.
 */
export interface Runtime {
  config: FitsyncConfig;
  credentials: CredentialStore;
  oauth: OAuthClient;
  tokens: TokenLifecycleManager;
  authorization: AuthorizationFlow;
  catalog: MetricCatalog;
  fetcher: MetricFetcher;
  results: ResultStore;
  orchestrator: SyncOrchestrator;
}

export interface RuntimeOptions {
  catalog?: MetricCatalog;
  /** Override the provider endpoints, e.g. to point at a local stub */
  apiBaseUrl?: string;
  now?: () => number;
}

export function createRuntime(config: FitsyncConfig, options: RuntimeOptions = {}): Runtime {
  const now = options.now ?? Date.now;
  const catalog = options.catalog ?? new MetricCatalog();
  const credentialsDir = path.resolve(config.credentialsDir);
  const dataDir = path.resolve(config.dataDir);

  debug("Credentials in %s, artifacts in %s", credentialsDir, dataDir);

  const credentials = new CredentialStore(credentialsDir);
  const oauth = new OAuthClient({
    config: { ...fitbitProvider.oauthConfig, scopes: config.scopes },
    app: { clientId: config.clientId, clientSecret: config.clientSecret },
    redirectUri: config.redirectUri,
    timeoutMs: config.requestTimeoutMs,
    now,
  });
  const tokens = new TokenLifecycleManager(credentials, oauth, {
    refreshMarginMs: config.refreshMarginMs,
    now,
  });
  const authorization = new AuthorizationFlow(oauth, tokens, { now });
  const fetcher = new MetricFetcher({
    apiBaseUrl: options.apiBaseUrl ?? fitbitProvider.apiBaseUrl,
    catalog,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
  });
  const results = new ResultStore(dataDir);
  const orchestrator = new SyncOrchestrator(tokens, fetcher, results, {
    metrics: config.metrics,
    now: () => new Date(now()),
  });

  return {
    config,
    credentials,
    oauth,
    tokens,
    authorization,
    catalog,
    fetcher,
    results,
    orchestrator,
  };
}
