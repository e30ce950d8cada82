import fastify from "fastify";
import debug from "debug";
import type { Runtime } from "@fitsync/node";
import { registerConnectorRoutes } from "./routes/connectors";
import { registerSyncRoutes } from "./routes/sync";
import { SyncSchedule } from "./scheduler";

const debugServer = debug("server:server");

export interface ServerOptions {
  /** Fastify request logging */
  logger?: boolean;
  /** Start the cron schedule from `config.syncCron` */
  schedule?: boolean;
}

export async function createServer(runtime: Runtime, options: ServerOptions = {}) {
  const app = fastify({ logger: options.logger ?? true });
  const { config } = runtime;

  await registerConnectorRoutes(app, runtime);
  await registerSyncRoutes(app, runtime);

  app.get("/health", async () => ({ status: "ok", timestamp: new Date().toISOString() }));

  let schedule: SyncSchedule | undefined;
  if (options.schedule !== false && config.syncCron) {
    schedule = new SyncSchedule({
      pattern: config.syncCron,
      accountKey: config.account,
      orchestrator: runtime.orchestrator,
      onReport: (report) => {
        if (report.status !== "succeeded") {
          app.log.warn({ status: report.status, error: report.error }, "Scheduled sync did not fully succeed");
        }
      },
    });
  }

  return {
    app,
    schedule,
    async listen(overrides: { port?: number; host?: string } = {}) {
      const port = overrides.port ?? config.port;
      const host = overrides.host ?? config.host;

      await app.listen({ port, host });
      debugServer("Server listening on %s:%d", host, port);
      debugServer("Authorize at /fitbit/authorize, redirect URI %s", config.redirectUri);
      if (schedule) {
        schedule.start();
      }
      return { port, host };
    },
    async close() {
      schedule?.stop();
      await app.close();
    },
  };
}
