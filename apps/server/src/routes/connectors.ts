/**
 * Connection routes: authorization round trip, disconnect and status.
 *
 * The provider redirects the browser to the callback, so the callback answers
 * with an HTML page. Everything else speaks JSON.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { AuthError } from "@fitsync/connectors";
import type { Runtime } from "@fitsync/node";
import createDebug from "debug";
import { renderErrorPage, renderSuccessPage } from "./pages";

const debug = createDebug("server:connectors");

/** OAuth error codes produced by a bad or replayed callback, not by the provider */
const STATE_ERROR_CODES = new Set(["invalid_state", "expired_state"]);

export const accountKeySchema = z.string().trim().min(1).max(200);

const disconnectBodySchema = z
  .object({ account: accountKeySchema.optional() })
  .strict();

/**
 * Register connection routes.
 *
 * @param fastify - Fastify instance
 * @param runtime - Wired components; `config.account` is the default account key
 */
export async function registerConnectorRoutes(
  fastify: FastifyInstance,
  runtime: Runtime
): Promise<void> {
  const defaultAccount = runtime.config.account;

  /**
   * GET /fitbit/authorize
   *
   * Redirect the browser to the provider's consent screen.
   */
  fastify.get<{ Querystring: { account?: string } }>(
    "/fitbit/authorize",
    async (request, reply) => {
      const parsed = accountKeySchema.optional().safeParse(request.query.account);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid account key" });
      }
      const accountKey = parsed.data ?? defaultAccount;

      const { authUrl } = runtime.authorization.start(accountKey);
      debug("Redirecting %s to the provider", accountKey);
      return reply.redirect(authUrl);
    }
  );

  /**
   * GET /fitbit/callback
   *
   * The provider redirects here after user consent.
   */
  fastify.get<{
    Querystring: { code?: string; state?: string; error?: string; error_description?: string };
  }>("/fitbit/callback", async (request, reply) => {
    const { code, state, error, error_description } = request.query;

    debug("OAuth callback: code=%s, error=%s", !!code, error);

    // User denied, or the provider refused the request
    if (error) {
      return reply
        .status(400)
        .type("text/html")
        .send(renderErrorPage(error_description ? `${error}: ${error_description}` : error));
    }

    if (!code || !state) {
      return reply
        .status(400)
        .type("text/html")
        .send(renderErrorPage("Missing authorization code or state parameter"));
    }

    try {
      const credential = await runtime.authorization.complete(code, state);
      debug("OAuth flow completed for %s", credential.accountKey);
      return reply.type("text/html").send(renderSuccessPage(credential));
    } catch (err) {
      debug("OAuth callback failed: %s", err);
      const message = err instanceof Error ? err.message : "Unknown error";
      const status =
        err instanceof AuthError && err.errorCode && STATE_ERROR_CODES.has(err.errorCode)
          ? 400
          : 500;
      return reply.status(status).type("text/html").send(renderErrorPage(message));
    }
  });

  /**
   * POST /disconnect
   *
   * Revoke (best-effort) and delete the stored credential. Idempotent.
   */
  fastify.post("/disconnect", async (request, reply) => {
    const parsed = disconnectBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid request", details: parsed.error.issues });
    }
    const accountKey = parsed.data.account ?? defaultAccount;

    try {
      const result = await runtime.tokens.disconnect(accountKey);
      debug("Disconnected %s: %o", accountKey, result);
      return { accountKey, ...result };
    } catch (error) {
      debug("Failed to disconnect %s: %s", accountKey, error);
      return reply.status(500).send({
        error: "Failed to disconnect",
        message: error instanceof Error ? error.message : "Unknown error",
      });
    }
  });

  /**
   * GET /status
   *
   * Connection state of an account. Never returns tokens.
   */
  fastify.get<{ Querystring: { account?: string } }>("/status", async (request, reply) => {
    const parsed = accountKeySchema.optional().safeParse(request.query.account);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid account key" });
    }
    const accountKey = parsed.data ?? defaultAccount;

    try {
      const status = await runtime.tokens.status(accountKey);
      return { ...status, metrics: runtime.orchestrator.getMetrics() };
    } catch (error) {
      debug("Status check failed for %s: %s", accountKey, error);
      return reply.status(500).send({
        error: "Failed to read connection status",
        message: error instanceof Error ? error.message : "Unknown error",
      });
    }
  });
}
