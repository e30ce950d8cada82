/**
 * OAuth2 client for the authorization-code and refresh-token grants.
 *
 * Supports both Basic auth token exchange (Fitbit) and client credentials in
 * the request body. Stateless apart from the in-flight HTTP call; never touches
 * storage.
 */

import createDebug from "debug";
import { AuthError, NetworkError, classifyHttpError } from "@fitsync/proto";
import {
  tokenResponseSchema,
  type Credential,
  type OAuthAppCredentials,
  type OAuthConfig,
  type RevokeResult,
  type TokenGrant,
} from "./types";

const debug = createDebug("fitsync:connectors:oauth");

/** Default timeout for calls to the authorization server */
export const DEFAULT_OAUTH_TIMEOUT_MS = 15_000;

export interface OAuthClientOptions {
  config: OAuthConfig;
  app: OAuthAppCredentials;
  redirectUri: string;
  timeoutMs?: number;
  now?: () => number;
}

/**
 * The token-endpoint calls the lifecycle manager depends on.
 */
export type TokenEndpoint = Pick<OAuthClient, "refresh" | "revoke">;

export class OAuthClient {
  private config: OAuthConfig;
  private app: OAuthAppCredentials;
  private redirectUri: string;
  private timeoutMs: number;
  private now: () => number;

  constructor(options: OAuthClientOptions) {
    this.config = options.config;
    this.app = options.app;
    this.redirectUri = options.redirectUri;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_OAUTH_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Generate the OAuth authorization URL.
   * User should be redirected to this URL to start the OAuth flow.
   */
  getAuthUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.app.clientId,
      redirect_uri: this.redirectUri,
      response_type: "code",
      state,
    });

    if (this.config.scopes.length > 0) {
      params.set("scope", this.config.scopes.join(" "));
    }

    if (this.config.extraAuthParams) {
      for (const [key, value] of Object.entries(this.config.extraAuthParams)) {
        params.set(key, value);
      }
    }

    const url = `${this.config.authUrl}?${params.toString()}`;
    debug("Generated auth URL: %s", url.replace(this.app.clientId, "[CLIENT_ID]"));
    return url;
  }

  /**
   * Exchange authorization code for tokens.
   * Not retried: the code is single-use.
   */
  async exchangeCode(code: string, redirectUri = this.redirectUri): Promise<TokenGrant> {
    debug("Exchanging code for tokens");

    const grant = await this.requestToken(
      new URLSearchParams({
        code,
        redirect_uri: redirectUri,
        grant_type: "authorization_code",
      }),
      "oauth.exchangeCode"
    );

    debug("Token exchange successful");
    return grant;
  }

  /**
   * Refresh an expired access token.
   *
   * Throws AuthError with `revoked: true` when the provider rejects the
   * refresh token, `transient: true` for network, timeout, 408, 429 and 5xx.
   * Client configuration errors (`invalid_client` and the like) are neither.
   */
  async refresh(refreshToken: string): Promise<TokenGrant> {
    debug("Refreshing access token");

    const grant = await this.requestToken(
      new URLSearchParams({
        refresh_token: refreshToken,
        grant_type: "refresh_token",
      }),
      "oauth.refresh"
    );

    debug("Token refresh successful");
    return grant;
  }

  /**
   * Revoke a token at the OAuth provider.
   * Best-effort: failures don't throw, just return { success: false, reason: "failed" }.
   */
  async revoke(token: string): Promise<RevokeResult> {
    if (!this.config.revokeUrl) {
      debug("No revoke URL configured, skipping token revocation");
      return { success: true, reason: "not_supported" };
    }

    debug("Revoking token");

    try {
      const response = await fetch(this.config.revokeUrl, {
        method: "POST",
        ...this.withClientAuth(new URLSearchParams({ token })),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.ok) {
        debug("Token revocation successful");
        return { success: true, reason: "revoked" };
      }

      debug("Token revocation failed: %s", response.status);
      return { success: false, reason: "failed" };
    } catch (error) {
      // Network error - log and continue with disconnect
      debug("Token revocation error: %s", error);
      return { success: false, reason: "failed" };
    }
  }

  /**
   * Attach client credentials: Basic auth header or body params.
   */
  private withClientAuth(body: URLSearchParams): {
    headers: Record<string, string>;
    body: string;
  } {
    const headers: Record<string, string> = {
      "Content-Type": "application/x-www-form-urlencoded",
      Accept: "application/json",
    };

    if (this.config.useBasicAuth) {
      const basicAuth = Buffer.from(
        `${this.app.clientId}:${this.app.clientSecret}`
      ).toString("base64");
      headers["Authorization"] = `Basic ${basicAuth}`;
    } else {
      body.set("client_id", this.app.clientId);
      body.set("client_secret", this.app.clientSecret);
    }

    return { headers, body: body.toString() };
  }

  private async requestToken(body: URLSearchParams, source: string): Promise<TokenGrant> {
    let response: Response;
    try {
      response = await fetch(this.config.tokenUrl, {
        method: "POST",
        ...this.withClientAuth(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      debug("Token request could not reach the provider: %s", message);
      throw new AuthError(
        "The service is temporarily unavailable. Please try again later.",
        {
          source,
          transient: true,
          cause: new NetworkError(`Token request failed: ${message}`, {
            source,
            cause: error instanceof Error ? error : undefined,
          }),
        }
      );
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "");
      debug("Token request failed: %s %s", response.status, errorText);
      const errorCode = parseOAuthErrorCode(errorText);
      throw new AuthError(getOAuthUserMessage(errorCode), {
        source,
        errorCode,
        transient: isTransientStatus(response.status),
        revoked: isRevokedGrant(response.status, errorCode),
        cause: classifyHttpError(
          response.status,
          `Token request failed: ${response.status} - ${errorText}`,
          { source }
        ),
      });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new AuthError("Malformed token response from provider", {
        source,
        transient: true,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthError(`Unexpected token response: ${parsed.error.message}`, {
        source,
        transient: true,
      });
    }

    const data = parsed.data;
    return {
      accessToken: data.access_token,
      refreshToken: data.refresh_token,
      expiresAt: this.now() + Math.round(data.expires_in * 1000),
      scopes: data.scope ? parseScopes(data.scope) : undefined,
      tokenType: data.token_type,
      subjectId: data.user_id,
    };
  }
}

/**
 * Build the stored credential from a token grant.
 *
 * A refresh that does not rotate the refresh token keeps the previous one;
 * createdAt survives as long as the provider user stays the same.
 */
export function toCredential(
  accountKey: string,
  grant: TokenGrant,
  now: number,
  previous?: Credential | null
): Credential {
  const refreshToken = grant.refreshToken ?? previous?.refreshToken;
  if (!refreshToken) {
    throw new AuthError("The provider did not issue a refresh token.", {
      source: "oauth.toCredential",
    });
  }

  const subjectId = grant.subjectId ?? previous?.subjectId;
  if (!subjectId) {
    throw new AuthError("The provider did not identify the connected user.", {
      source: "oauth.toCredential",
    });
  }

  const sameSubject = previous?.subjectId === subjectId;

  return {
    accountKey,
    subjectId,
    accessToken: grant.accessToken,
    refreshToken,
    expiresAt: grant.expiresAt,
    scopes: grant.scopes ?? previous?.scopes ?? [],
    tokenType: grant.tokenType ?? previous?.tokenType ?? "Bearer",
    createdAt: sameSubject && previous ? previous.createdAt : now,
    updatedAt: Math.max(now, previous?.updatedAt ?? 0),
  };
}

/**
 * Split a space-delimited scope string into a de-duplicated list.
 */
export function parseScopes(scope: string): string[] {
  return Array.from(new Set(scope.split(/\s+/).filter(Boolean)));
}

/**
 * Whether a token endpoint status is worth retrying later.
 */
function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

/** Error codes meaning the grant itself is dead, not the client setup */
const REVOKED_GRANT_CODES = new Set(["invalid_grant", "invalid_token", "expired_token"]);

/**
 * Whether a failed token request rejected the grant (code or refresh token).
 * A 400 or 401 without a readable error code counts as a rejection.
 */
function isRevokedGrant(status: number, errorCode: string | undefined): boolean {
  if (isTransientStatus(status)) {
    return false;
  }
  if (errorCode !== undefined) {
    return REVOKED_GRANT_CODES.has(errorCode);
  }
  return status === 400 || status === 401;
}

/** Map of OAuth error codes to user-friendly messages */
const OAUTH_ERROR_MESSAGES = new Map<string, string>([
  ["invalid_grant", "Authorization expired or invalid. Please try connecting again."],
  ["invalid_token", "Authorization expired or invalid. Please try connecting again."],
  ["expired_token", "Authorization expired or invalid. Please try connecting again."],
  ["invalid_client", "OAuth configuration error. Please check the client credentials."],
  ["access_denied", "Access was denied. Please try again and approve all permissions."],
  ["invalid_request", "Invalid request. Please try connecting again."],
  ["unauthorized_client", "This app is not authorized for the requested grant."],
  ["unsupported_grant_type", "OAuth configuration error. Please check the client credentials."],
  ["invalid_scope", "The requested permissions are not available."],
  ["server_error", "The service is temporarily unavailable. Please try again later."],
  ["temporarily_unavailable", "The service is temporarily unavailable. Please try again later."],
]);

/** Default message for unknown OAuth errors */
const DEFAULT_OAUTH_ERROR_MESSAGE =
  "An authentication error occurred. Please try connecting again.";

/**
 * Parse OAuth error code from response body.
 * Handles both RFC 6749 (`{ error }`) and Fitbit (`{ errors: [{ errorType }] }`) bodies.
 * @internal
 */
export function parseOAuthErrorCode(responseBody: string): string | undefined {
  let data: unknown;
  try {
    data = JSON.parse(responseBody);
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null) {
    return undefined;
  }

  if ("error" in data && typeof data.error === "string") {
    return data.error;
  }
  if ("errors" in data && Array.isArray(data.errors)) {
    const first: unknown = data.errors[0];
    if (
      typeof first === "object" &&
      first !== null &&
      "errorType" in first &&
      typeof first.errorType === "string"
    ) {
      return first.errorType;
    }
  }
  return undefined;
}

/**
 * Get user-friendly message for OAuth error code.
 * @internal
 */
function getOAuthUserMessage(errorCode: string | undefined): string {
  return (errorCode && OAUTH_ERROR_MESSAGES.get(errorCode)) || DEFAULT_OAUTH_ERROR_MESSAGE;
}
