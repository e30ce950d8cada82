/**
 * Sync routes: trigger a sync and list stored artifacts.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { summarizeReport, type SyncReport } from "@fitsync/sync";
import type { Runtime } from "@fitsync/node";
import createDebug from "debug";
import { accountKeySchema } from "./connectors";

const debug = createDebug("server:sync");

const calendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

const syncBodySchema = z
  .object({
    account: accountKeySchema.optional(),
    date: calendarDate.optional(),
    from: calendarDate.optional(),
    to: calendarDate.optional(),
    skipExisting: z.boolean().optional(),
  })
  .strict();

/**
 * HTTP status for a finished sync.
 */
export function syncHttpStatus(report: SyncReport): number {
  switch (report.status) {
    case "succeeded":
      return 200;
    case "partial":
      return 207;
    case "not_connected":
      return 409;
    case "failed":
      // Bad dates are caught by the orchestrator, not by the body schema
      return report.error?.type === "logic" && report.results.length === 0 ? 400 : 502;
  }
}

export async function registerSyncRoutes(
  fastify: FastifyInstance,
  runtime: Runtime
): Promise<void> {
  const defaultAccount = runtime.config.account;

  /**
   * POST /sync
   *
   * Run a sync and answer with the report summary. The client going away
   * cancels the remaining fetches.
   */
  fastify.post("/sync", async (request, reply) => {
    const parsed = syncBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid request", details: parsed.error.issues });
    }
    const { account, ...window } = parsed.data;
    const accountKey = account ?? defaultAccount;

    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        debug("Client went away, cancelling sync for %s", accountKey);
        controller.abort();
      }
    };
    reply.raw.on("close", onClose);

    try {
      const report = await runtime.orchestrator.runSync(accountKey, {
        ...window,
        signal: controller.signal,
      });
      debug("Sync for %s: %s", accountKey, report.status);
      return reply.status(syncHttpStatus(report)).send(summarizeReport(report));
    } finally {
      reply.raw.off("close", onClose);
    }
  });

  /**
   * GET /artifacts
   *
   * Sync history: stored artifacts of an account, by date then metric.
   */
  fastify.get<{ Querystring: { account?: string } }>("/artifacts", async (request, reply) => {
    const parsed = accountKeySchema.optional().safeParse(request.query.account);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid account key" });
    }
    const accountKey = parsed.data ?? defaultAccount;

    try {
      const artifacts = await runtime.results.list(accountKey);
      return { accountKey, artifacts };
    } catch (error) {
      debug("Listing artifacts failed for %s: %s", accountKey, error);
      return reply.status(500).send({
        error: "Failed to list artifacts",
        message: error instanceof Error ? error.message : "Unknown error",
      });
    }
  });
}
