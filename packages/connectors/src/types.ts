/**
 * Types for the connectors package.
 *
 * This package handles OAuth2 authentication against the fitness-data provider.
 * Credentials are stored in files, one per account key.
 */

import { z } from "zod";

/**
 * Stored OAuth credential for one account key.
 * Timestamps are Unix milliseconds.
 */
export const credentialSchema = z.object({
  accountKey: z.string().min(1),
  /** Provider-assigned user id */
  subjectId: z.string().min(1),
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresAt: z.number().int().nonnegative(),
  scopes: z.array(z.string()),
  tokenType: z.string().min(1),
  createdAt: z.number().int().nonnegative(),
  updatedAt: z.number().int().nonnegative(),
});

export type Credential = z.infer<typeof credentialSchema>;

/**
 * OAuth2 URL/scope configuration (static per provider).
 */
export interface OAuthConfig {
  authUrl: string;
  tokenUrl: string;
  /** Revocation endpoint; disconnect skips revocation without it */
  revokeUrl?: string;
  scopes: string[];
  /** Additional params to include in auth URL (e.g., prompt) */
  extraAuthParams?: Record<string, string>;
  /** If true, use Basic auth for token exchange (Fitbit uses this) */
  useBasicAuth?: boolean;
}

/**
 * OAuth app credentials (client ID and secret).
 */
export interface OAuthAppCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Raw token response from OAuth provider.
 */
export const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1).optional(),
    expires_in: z.number().positive(),
    token_type: z.string().optional(),
    scope: z.string().optional(),
    /** Fitbit user id */
    user_id: z.string().optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

/**
 * Normalized result of a successful token grant.
 */
export interface TokenGrant {
  accessToken: string;
  refreshToken?: string;
  /** Absolute expiry, Unix ms */
  expiresAt: number;
  scopes?: string[];
  tokenType?: string;
  subjectId?: string;
}

/**
 * Provider definition (one per external API).
 */
export interface ProviderDefinition {
  /** Provider ID, e.g., "fitbit" */
  id: string;
  /** Display name, e.g., "Fitbit" */
  name: string;
  /** OAuth configuration (URLs, default scopes) */
  oauthConfig: OAuthConfig;
  /** Base URL of the data API */
  apiBaseUrl: string;
}

/**
 * Connection status as seen by callers. Never carries secrets.
 */
export type ConnectionState =
  | "connected" // Credential exists and is fresh
  | "expired" // Credential exists but needs a refresh
  | "disconnected"; // No credential

export interface ConnectionStatus {
  accountKey: string;
  state: ConnectionState;
  subjectId?: string;
  scopes?: string[];
  expiresAt?: number;
  updatedAt?: number;
}

/**
 * Result of disconnecting an account.
 */
export interface DisconnectResult {
  /** Whether a stored credential was deleted */
  disconnected: boolean;
  /** Outcome of best-effort revocation at the provider */
  revoked: RevokeResult["reason"] | "skipped";
}

/**
 * Result of a token revocation attempt.
 * Provides clear distinction between actual revocation and other outcomes.
 */
export type RevokeResult = {
  success: boolean;
  reason: "revoked" | "not_supported" | "failed";
};
