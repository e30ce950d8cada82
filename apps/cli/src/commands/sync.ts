import { Command } from "commander";
import { summarizeReport, type SyncStatus } from "@fitsync/sync";
import type { Runtime } from "@fitsync/node";
import debug from "debug";
import { getRuntime } from "../runtime";

const debugSync = debug("cli:sync");

export interface SyncCommandOptions {
  account?: string;
  date?: string;
  from?: string;
  to?: string;
  skipExisting?: boolean;
}

/** Process exit code for a sync outcome */
export function exitCodeFor(status: SyncStatus): number {
  switch (status) {
    case "succeeded":
      return 0;
    case "partial":
      return 2;
    case "not_connected":
      return 3;
    case "failed":
      return 1;
  }
}

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Fetch the configured metrics (default: yesterday) and store them")
    .option("-a, --account <key>", "Account key (defaults to FITSYNC_ACCOUNT)")
    .option("-d, --date <YYYY-MM-DD>", "Single date to sync")
    .option("--from <YYYY-MM-DD>", "First date of an inclusive range")
    .option("--to <YYYY-MM-DD>", "Last date of an inclusive range")
    .option("--skip-existing", "Skip metrics already stored for a date")
    .action(async (options: SyncCommandOptions) => {
      const controller = new AbortController();
      const onInterrupt = () => {
        debugSync("Interrupted, cancelling sync");
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);
      try {
        process.exitCode = await runSyncCommand(getRuntime(), options, {
          signal: controller.signal,
        });
      } finally {
        process.off("SIGINT", onInterrupt);
      }
    });
}

/**
 * Run one sync and print the report summary as JSON.
 * Returns the exit code.
 */
export async function runSyncCommand(
  runtime: Pick<Runtime, "config" | "orchestrator">,
  options: SyncCommandOptions,
  context: { signal?: AbortSignal; print?: (line: string) => void } = {}
): Promise<number> {
  const print = context.print ?? ((line: string) => console.log(line));
  const accountKey = options.account ?? runtime.config.account;

  debugSync("Syncing %s: %o", accountKey, options);
  const report = await runtime.orchestrator.runSync(accountKey, {
    date: options.date,
    from: options.from,
    to: options.to,
    skipExisting: options.skipExisting,
    signal: context.signal,
  });

  print(JSON.stringify(summarizeReport(report), null, 2));
  return exitCodeFor(report.status);
}
