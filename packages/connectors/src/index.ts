/**
 * @fitsync/connectors - OAuth2 connection management for the fitness-data provider.
 *
 * This package provides:
 * - OAuth2 client (authorization URL, code exchange, token refresh, revocation)
 * - File-based credential storage keyed by account key
 * - Token lifecycle manager with per-account serialized refresh
 * - Authorization flow with one-time CSRF state
 */

// Types
export * from "./types";

// OAuth client
export {
  OAuthClient,
  DEFAULT_OAUTH_TIMEOUT_MS,
  toCredential,
  parseScopes,
  parseOAuthErrorCode,
  type OAuthClientOptions,
  type TokenEndpoint,
} from "./oauth";

// Credential storage
export { CredentialStore } from "./store";
export { KeyedMutex } from "./mutex";
export {
  atomicWriteFile,
  encodeKey,
  decodeKey,
  isNotFound,
  TEMP_FILE_PREFIX,
} from "./files";

// Token lifecycle
export {
  TokenLifecycleManager,
  DEFAULT_REFRESH_MARGIN_MS,
  type CredentialProvider,
  type TokenLifecycleOptions,
  type ValidCredentialOptions,
} from "./manager";

// Authorization flow
export { AuthorizationFlow, type AuthorizationFlowOptions } from "./authorization";

// Provider definitions
export { fitbitProvider, FITBIT_DEFAULT_SCOPES } from "./services/fitbit";

// Re-export error classification utilities from @fitsync/proto for convenience
export {
  AuthError,
  NotConnectedError,
  isClassifiedError,
  ClassifiedError,
  type ErrorType,
} from "@fitsync/proto";
