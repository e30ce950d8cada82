/**
 * AuthorizationFlow - the authorization-code round trip.
 *
 * `start` hands out the provider URL with a one-time CSRF state; `complete`
 * consumes that state, exchanges the code and stores the credential through
 * the lifecycle manager.
 */

import createDebug from "debug";
import { randomUUID } from "crypto";
import { AuthError } from "@fitsync/proto";
import type { OAuthClient } from "./oauth";
import type { TokenLifecycleManager } from "./manager";
import type { Credential } from "./types";

const debug = createDebug("fitsync:connectors:authorization");

/** OAuth state TTL: 5 minutes */
const STATE_TTL_MS = 5 * 60 * 1000;

/** Maximum pending OAuth states to prevent memory exhaustion */
const MAX_PENDING_STATES = 100;

/** Pending OAuth state stored in memory */
interface PendingState {
  accountKey: string;
  timestamp: number;
}

export interface AuthorizationFlowOptions {
  stateTtlMs?: number;
  maxPendingStates?: number;
  now?: () => number;
}

export class AuthorizationFlow {
  private pendingStates = new Map<string, PendingState>();
  private stateTtlMs: number;
  private maxPendingStates: number;
  private now: () => number;

  constructor(
    private oauth: Pick<OAuthClient, "getAuthUrl" | "exchangeCode">,
    private tokens: Pick<TokenLifecycleManager, "connect">,
    options: AuthorizationFlowOptions = {}
  ) {
    this.stateTtlMs = options.stateTtlMs ?? STATE_TTL_MS;
    this.maxPendingStates = options.maxPendingStates ?? MAX_PENDING_STATES;
    this.now = options.now ?? Date.now;
  }

  /**
   * Start the OAuth flow for an account.
   * Returns the authorization URL and state parameter.
   */
  start(accountKey: string): { authUrl: string; state: string } {
    this.cleanupExpiredStates();

    // Drop the oldest state once the cap is reached
    if (this.pendingStates.size >= this.maxPendingStates) {
      const oldest = this.pendingStates.keys().next();
      if (!oldest.done) {
        this.pendingStates.delete(oldest.value);
        debug("Pending states limit reached (%d), removed oldest state", this.maxPendingStates);
      }
    }

    const state = randomUUID();
    this.pendingStates.set(state, { accountKey, timestamp: this.now() });

    const authUrl = this.oauth.getAuthUrl(state);
    debug("Started OAuth flow for %s, state=%s", accountKey, state);
    return { authUrl, state };
  }

  /**
   * Complete the OAuth flow after the provider redirected back.
   *
   * @throws AuthError for an unknown, reused or expired state, or a failed exchange
   */
  async complete(code: string, state: string): Promise<Credential> {
    // Retrieve and delete state at once to prevent replay
    const pending = this.pendingStates.get(state);
    this.pendingStates.delete(state);

    if (!pending) {
      debug("Invalid or expired state: %s", state);
      throw new AuthError(
        "Security validation failed: the OAuth state does not match. Please try again.",
        { source: "AuthorizationFlow.complete", errorCode: "invalid_state" }
      );
    }

    if (this.now() - pending.timestamp > this.stateTtlMs) {
      debug("OAuth flow expired: %s", state);
      throw new AuthError("Authorization took too long. Please try again.", {
        source: "AuthorizationFlow.complete",
        errorCode: "expired_state",
      });
    }

    const grant = await this.oauth.exchangeCode(code);
    const credential = await this.tokens.connect(pending.accountKey, grant);
    debug("OAuth flow completed for %s", pending.accountKey);
    return credential;
  }

  /**
   * Clean up expired pending OAuth states.
   */
  private cleanupExpiredStates(): void {
    const now = this.now();
    for (const [state, data] of this.pendingStates) {
      if (now - data.timestamp > this.stateTtlMs) {
        this.pendingStates.delete(state);
      }
    }
  }
}
