import { Command } from "commander";
import type { Runtime } from "@fitsync/node";
import debug from "debug";
import { getRuntime } from "../runtime";

const debugAccount = debug("cli:account");

type Print = (line: string) => void;

const printJson = (value: unknown, print: Print) => print(JSON.stringify(value, null, 2));

const defaultPrint: Print = (line) => console.log(line);

export function registerAccountCommands(program: Command): void {
  program
    .command("status")
    .description("Show whether an account is connected and when its token expires")
    .option("-a, --account <key>", "Account key (defaults to FITSYNC_ACCOUNT)")
    .action(async (options: { account?: string }) => {
      process.exitCode = await runStatusCommand(getRuntime(), options);
    });

  program
    .command("disconnect")
    .description("Revoke and delete the stored credential of an account")
    .option("-a, --account <key>", "Account key (defaults to FITSYNC_ACCOUNT)")
    .action(async (options: { account?: string }) => {
      process.exitCode = await runDisconnectCommand(getRuntime(), options);
    });

  program
    .command("history")
    .description("List stored artifacts of an account")
    .option("-a, --account <key>", "Account key (defaults to FITSYNC_ACCOUNT)")
    .action(async (options: { account?: string }) => {
      process.exitCode = await runHistoryCommand(getRuntime(), options);
    });
}

/** Exit code 3 when the account is not connected */
export async function runStatusCommand(
  runtime: Pick<Runtime, "config" | "tokens">,
  options: { account?: string },
  print: Print = defaultPrint
): Promise<number> {
  const accountKey = options.account ?? runtime.config.account;
  const status = await runtime.tokens.status(accountKey);
  printJson(
    {
      ...status,
      expiresAt: status.expiresAt !== undefined ? new Date(status.expiresAt).toISOString() : undefined,
      updatedAt: status.updatedAt !== undefined ? new Date(status.updatedAt).toISOString() : undefined,
    },
    print
  );
  return status.state === "disconnected" ? 3 : 0;
}

export async function runDisconnectCommand(
  runtime: Pick<Runtime, "config" | "tokens">,
  options: { account?: string },
  print: Print = defaultPrint
): Promise<number> {
  const accountKey = options.account ?? runtime.config.account;
  const result = await runtime.tokens.disconnect(accountKey);
  debugAccount("Disconnected %s: %o", accountKey, result);
  printJson({ accountKey, ...result }, print);
  return 0;
}

export async function runHistoryCommand(
  runtime: Pick<Runtime, "config" | "results">,
  options: { account?: string },
  print: Print = defaultPrint
): Promise<number> {
  const accountKey = options.account ?? runtime.config.account;
  const artifacts = await runtime.results.list(accountKey);
  printJson(
    {
      accountKey,
      artifacts: artifacts.map((a) => ({
        date: a.date,
        metric: a.metric,
        bytes: a.bytes,
        storedAt: new Date(a.storedAt).toISOString(),
        path: a.path,
      })),
    },
    print
  );
  return 0;
}
