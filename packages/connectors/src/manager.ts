/**
 * TokenLifecycleManager - decides when a credential is refreshed and hands
 * callers a credential that is valid for use.
 *
 * Refreshes are serialized per account key: the first caller refreshes while
 * the rest wait on the lock, re-read the store and pick up the new token. A
 * refresh token is therefore never sent twice, which matters for providers
 * that rotate refresh tokens on every use.
 */

import createDebug from "debug";
import { AuthError, NotConnectedError } from "@fitsync/proto";
import { KeyedMutex } from "./mutex";
import { toCredential, type TokenEndpoint } from "./oauth";
import type { CredentialStore } from "./store";
import type {
  ConnectionStatus,
  Credential,
  DisconnectResult,
  TokenGrant,
} from "./types";

const debug = createDebug("fitsync:connectors:manager");

/** Refresh margin: treat a token as stale 60 seconds before expiry */
export const DEFAULT_REFRESH_MARGIN_MS = 60 * 1000;

export interface TokenLifecycleOptions {
  refreshMarginMs?: number;
  now?: () => number;
}

export interface ValidCredentialOptions {
  /**
   * A credential the provider just rejected. Forces a refresh unless the
   * stored access token already differs from it.
   */
  rejected?: Credential;
}

/**
 * What the sync side needs from the manager.
 */
export interface CredentialProvider {
  validCredential(
    accountKey: string,
    options?: ValidCredentialOptions
  ): Promise<Credential>;
}

export class TokenLifecycleManager implements CredentialProvider {
  private locks = new KeyedMutex();
  private refreshMarginMs: number;
  private now: () => number;

  constructor(
    private store: CredentialStore,
    private oauth: TokenEndpoint,
    options: TokenLifecycleOptions = {}
  ) {
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Get a valid credential for an account, refreshing if needed.
   *
   * @throws NotConnectedError when nothing is stored, or the provider rejected
   *   the refresh token (the stored credential is deleted first)
   * @throws AuthError when a refresh failed for any other reason, transient or
   *   a client configuration error; storage is untouched
   */
  async validCredential(
    accountKey: string,
    options: ValidCredentialOptions = {}
  ): Promise<Credential> {
    const current = await this.store.get(accountKey);
    if (!current) {
      throw new NotConnectedError(accountKey, {
        source: "TokenLifecycleManager.validCredential",
      });
    }

    if (!options.rejected && !this.isStale(current)) {
      return current;
    }

    return this.locks.runExclusive(accountKey, async () => {
      // Another caller may have refreshed or disconnected while we waited
      const latest = await this.store.get(accountKey);
      if (!latest) {
        throw new NotConnectedError(accountKey, {
          source: "TokenLifecycleManager.validCredential",
        });
      }

      const mustRefresh = options.rejected
        ? latest.accessToken === options.rejected.accessToken
        : this.isStale(latest);

      if (!mustRefresh) {
        debug("Credential for %s already refreshed by another caller", accountKey);
        return latest;
      }

      return this.refresh(accountKey, latest);
    });
  }

  /**
   * Store the credential from a completed authorization-code exchange.
   * Serialized with refreshes of the same account; a re-connect of the same
   * provider user keeps the original createdAt.
   */
  async connect(accountKey: string, grant: TokenGrant): Promise<Credential> {
    return this.locks.runExclusive(accountKey, async () => {
      const previous = await this.store.get(accountKey).catch((error: unknown) => {
        debug("Replacing unreadable credential for %s: %s", accountKey, error);
        return null;
      });
      const credential = toCredential(accountKey, grant, this.now(), previous);
      await this.store.put(accountKey, credential);
      debug("Connected %s (subject=%s)", accountKey, credential.subjectId);
      return credential;
    });
  }

  /**
   * Disconnect an account: best-effort revocation, then delete the credential.
   * Runs under the refresh lock so an in-flight refresh cannot write the
   * credential back afterwards. Idempotent.
   */
  async disconnect(accountKey: string): Promise<DisconnectResult> {
    return this.locks.runExclusive(accountKey, async () => {
      const credential = await this.store.get(accountKey).catch((error: unknown) => {
        // Unreadable credential: still delete it
        debug("Could not read credential for %s before disconnect: %s", accountKey, error);
        return null;
      });

      let revoked: DisconnectResult["revoked"] = "skipped";
      if (credential) {
        const result = await this.oauth.revoke(credential.refreshToken);
        revoked = result.reason;
        debug("Revocation for %s: %s", accountKey, result.reason);
      }

      const disconnected = await this.store.delete(accountKey);
      debug("Disconnected %s (existed=%s)", accountKey, disconnected);
      return { disconnected, revoked };
    });
  }

  /**
   * Connection status for display. Never returns secrets.
   */
  async status(accountKey: string): Promise<ConnectionStatus> {
    const credential = await this.store.get(accountKey);
    if (!credential) {
      return { accountKey, state: "disconnected" };
    }
    return {
      accountKey,
      state: this.isStale(credential) ? "expired" : "connected",
      subjectId: credential.subjectId,
      scopes: credential.scopes,
      expiresAt: credential.expiresAt,
      updatedAt: credential.updatedAt,
    };
  }

  /**
   * Whether the credential expires within the refresh margin.
   */
  isStale(credential: Credential): boolean {
    return credential.expiresAt - this.refreshMarginMs <= this.now();
  }

  /**
   * Refresh under the account lock. Callers must hold it.
   */
  private async refresh(accountKey: string, current: Credential): Promise<Credential> {
    debug("Refreshing token for %s", accountKey);

    let refreshed: Credential;
    try {
      const grant = await this.oauth.refresh(current.refreshToken);
      refreshed = toCredential(accountKey, grant, this.now(), current);
    } catch (error) {
      if (error instanceof AuthError && error.revoked) {
        debug("Refresh token rejected for %s, deleting credential", accountKey);
        await this.store.delete(accountKey);
        throw new NotConnectedError(accountKey, {
          source: "TokenLifecycleManager.refresh",
          message: `Authorization for "${accountKey}" was revoked or expired. Please connect again.`,
          cause: error,
        });
      }
      debug("Refresh failed for %s, keeping credential: %s", accountKey, error);
      throw error;
    }

    const written = await this.store.put(accountKey, refreshed);
    if (!written) {
      // A newer credential (e.g. a fresh authorization) landed meanwhile
      const latest = await this.store.get(accountKey);
      if (!latest) {
        throw new NotConnectedError(accountKey, { source: "TokenLifecycleManager.refresh" });
      }
      return latest;
    }
    debug("Token refreshed for %s", accountKey);
    return refreshed;
  }
}
