import { createRuntime, loadConfig, type Runtime } from "@fitsync/node";

let runtime: Runtime | undefined;

/**
 * Build the runtime on first use, so `--help` works without configuration.
 */
export function getRuntime(): Runtime {
  if (!runtime) {
    runtime = createRuntime(loadConfig(process.env));
  }
  return runtime;
}
