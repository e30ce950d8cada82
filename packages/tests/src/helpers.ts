import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { Credential } from "@fitsync/connectors";

/** 2023-11-14T22:13:20.000Z */
export const T0 = 1_700_000_000_000;

export function makeCredential(overrides: Partial<Credential> = {}): Credential {
  return {
    accountKey: "default",
    subjectId: "SUBJ01",
    accessToken: "access-1",
    refreshToken: "refresh-1",
    expiresAt: T0 + 3600_000,
    scopes: ["activity", "heartrate"],
    tokenType: "Bearer",
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function makeTempDir(prefix = "fitsync-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string | undefined): void {
  if (dir && fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/** URL of a fetch call, whatever form the first argument took */
export function requestUrl(input: unknown): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  if (input instanceof Request) return input.url;
  throw new Error(`Unexpected fetch input: ${String(input)}`);
}
