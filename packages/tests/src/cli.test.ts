import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { exitCodeFor, runSyncCommand } from "@fitsync/cli";
import { runDisconnectCommand, runHistoryCommand, runStatusCommand } from "@fitsync/cli/account";
import { createRuntime, loadConfig, type Runtime } from "@fitsync/node";
import { jsonResponse, makeCredential, makeTempDir, removeDir, requestUrl } from "./helpers";

describe("exitCodeFor", () => {
  it.each([
    ["succeeded", 0],
    ["partial", 2],
    ["not_connected", 3],
    ["failed", 1],
  ] as const)("%s exits with %d", (status, code) => {
    expect(exitCodeFor(status)).toBe(code);
  });
});

describe("cli commands", () => {
  let dataDir: string;
  let credentialsDir: string;
  let runtime: Runtime;
  let lines: string[];
  const print = (line: string) => lines.push(line);
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    dataDir = makeTempDir("fitsync-data-");
    credentialsDir = makeTempDir("fitsync-creds-");
    runtime = createRuntime(
      loadConfig({
        FITBIT_CLIENT_ID: "test-client",
        FITBIT_CLIENT_SECRET: "test-secret",
        FITBIT_DATA_DIR: dataDir,
        FITSYNC_CREDENTIALS_DIR: credentialsDir,
        FITSYNC_METRICS: "steps",
      })
    );
    lines = [];

    fetchMock.mockReset();
    fetchMock.mockImplementation(async (input) => {
      const url = requestUrl(input);
      if (url === "https://api.fitbit.com/1/user/-/activities/steps/date/2024-03-09/1d.json") {
        return jsonResponse({ "activities-steps": [{ dateTime: "2024-03-09", value: "512" }] });
      }
      if (url === "https://api.fitbit.com/oauth2/revoke") {
        return new Response(null, { status: 200 });
      }
      return jsonResponse({}, 404);
    });
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    removeDir(dataDir);
    removeDir(credentialsDir);
  });

  const connect = (expiresAt = Date.now() + 3600_000) =>
    runtime.credentials.put("default", makeCredential({ expiresAt }));

  describe("status", () => {
    it("exits with 3 for a disconnected account", async () => {
      const code = await runStatusCommand(runtime, {}, print);

      expect(code).toBe(3);
      expect(lines).toEqual([JSON.stringify({ accountKey: "default", state: "disconnected" }, null, 2)]);
    });

    it("prints times as ISO strings and never the tokens", async () => {
      await connect(1_700_003_600_000);

      const code = await runStatusCommand(runtime, { account: "default" }, print);

      expect(code).toBe(0);
      expect(JSON.parse(lines[0])).toEqual({
        accountKey: "default",
        state: "expired",
        subjectId: "SUBJ01",
        scopes: ["activity", "heartrate"],
        expiresAt: "2023-11-14T23:13:20.000Z",
        updatedAt: "2023-11-14T22:13:20.000Z",
      });
      expect(lines[0]).not.toContain("access-1");
    });
  });

  describe("sync", () => {
    it("prints the summary and exits with 0 on success", async () => {
      await connect();

      const code = await runSyncCommand(runtime, { date: "2024-03-09" }, { print });

      expect(code).toBe(0);
      const summary = JSON.parse(lines[0]);
      expect(summary).toMatchObject({
        accountKey: "default",
        status: "succeeded",
        dates: ["2024-03-09"],
        metrics: ["steps"],
        failed: [],
      });
      expect(summary.results).toHaveLength(1);
      expect(lines[0]).not.toContain("512");
    });

    it("exits with 3 when the account is not connected", async () => {
      const code = await runSyncCommand(runtime, { date: "2024-03-09" }, { print });

      expect(code).toBe(3);
      expect(JSON.parse(lines[0])).toMatchObject({ status: "not_connected" });
    });

    it("exits with 1 for half a date range", async () => {
      await connect();

      const code = await runSyncCommand(runtime, { from: "2024-03-09" }, { print });

      expect(code).toBe(1);
      expect(JSON.parse(lines[0])).toMatchObject({ status: "failed", dates: [], error: { type: "logic" } });
    });

    it("exits with 1 when cancelled before starting", async () => {
      await connect();
      const controller = new AbortController();
      controller.abort();

      const code = await runSyncCommand(runtime, { date: "2024-03-09" }, { print, signal: controller.signal });

      expect(code).toBe(1);
      expect(JSON.parse(lines[0])).toMatchObject({ cancelled: true });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe("history and disconnect", () => {
    it("lists what a sync stored", async () => {
      await connect();
      await runSyncCommand(runtime, { date: "2024-03-09" }, { print: () => undefined });

      const code = await runHistoryCommand(runtime, {}, print);

      expect(code).toBe(0);
      const history = JSON.parse(lines[0]);
      expect(history.accountKey).toBe("default");
      expect(history.artifacts).toHaveLength(1);
      expect(history.artifacts[0]).toMatchObject({ date: "2024-03-09", metric: "steps" });
      expect(history.artifacts[0].storedAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it("revokes and deletes the credential", async () => {
      await connect();

      const code = await runDisconnectCommand(runtime, {}, print);

      expect(code).toBe(0);
      expect(JSON.parse(lines[0])).toEqual({ accountKey: "default", disconnected: true, revoked: "revoked" });
      expect(await runtime.credentials.get("default")).toBeNull();
    });
  });
});
