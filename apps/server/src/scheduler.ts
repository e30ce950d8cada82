import { Cron } from "croner";
import { LogicError } from "@fitsync/proto";
import type { SyncOrchestrator, SyncReport } from "@fitsync/sync";
import createDebug from "debug";

const debug = createDebug("server:scheduler");

export interface SyncScheduleOptions {
  pattern: string;
  accountKey: string;
  orchestrator: Pick<SyncOrchestrator, "runSync">;
  onReport?: (report: SyncReport) => void;
}

/**
 * Scheduled sync of one account. A run still in progress when the next tick
 * fires makes that tick a no-op.
 */
export class SyncSchedule {
  private job: Cron;
  private running?: AbortController;

  constructor(private options: SyncScheduleOptions) {
    try {
      this.job = new Cron(
        options.pattern,
        {
          paused: true,
          protect: true,
          catch: (error: unknown) => debug("Scheduled sync threw: %s", error),
        },
        async () => {
          await this.tick();
        }
      );
    } catch (error) {
      throw new LogicError(`Invalid sync schedule "${options.pattern}"`, {
        source: "SyncSchedule",
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  start(): void {
    this.job.resume();
    debug("Sync of %s scheduled (%s), next run %s", this.options.accountKey, this.options.pattern, this.nextRun());
  }

  /** Stop ticking and cancel a run in progress */
  stop(): void {
    this.job.stop();
    this.running?.abort();
  }

  nextRun(): Date | null {
    return this.job.nextRun();
  }

  /** Run once now; also what every tick does */
  async tick(): Promise<SyncReport> {
    const controller = new AbortController();
    this.running = controller;
    try {
      debug("Scheduled sync of %s starting", this.options.accountKey);
      const report = await this.options.orchestrator.runSync(this.options.accountKey, {
        signal: controller.signal,
      });
      debug("Scheduled sync of %s finished: %s", this.options.accountKey, report.status);
      this.options.onReport?.(report);
      return report;
    } finally {
      if (this.running === controller) {
        this.running = undefined;
      }
    }
  }
}
