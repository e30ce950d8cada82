import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { CredentialStore, encodeKey, decodeKey } from "@fitsync/connectors";
import { LogicError, StorageError } from "@fitsync/proto";
import { T0, makeCredential, makeTempDir, removeDir } from "./helpers";

describe("CredentialStore", () => {
  let baseDir: string;
  let store: CredentialStore;

  beforeEach(() => {
    baseDir = makeTempDir("fitsync-store-");
    store = new CredentialStore(baseDir);
  });

  afterEach(() => {
    removeDir(baseDir);
  });

  const credentialFile = (accountKey: string) =>
    path.join(baseDir, "credentials", `${encodeKey(accountKey)}.json`);

  it("returns null when nothing is stored", async () => {
    expect(await store.get("default")).toBeNull();
  });

  it("stores and reads back a credential", async () => {
    const credential = makeCredential();
    expect(await store.put("default", credential)).toBe(true);
    expect(await store.get("default")).toEqual(credential);
  });

  it("restricts file and directory permissions", async () => {
    await store.put("default", makeCredential());
    expect(fs.statSync(credentialFile("default")).mode & 0o777).toBe(0o600);
    expect(fs.statSync(path.join(baseDir, "credentials")).mode & 0o777).toBe(0o700);
  });

  it("encodes account keys so they cannot escape the directory", async () => {
    await store.put("../evil", makeCredential({ accountKey: "../evil" }));
    expect(fs.existsSync(credentialFile("../evil"))).toBe(true);
    expect(fs.readdirSync(baseDir)).toEqual(["credentials"]);
    expect(decodeKey(encodeKey("../evil"))).toBe("../evil");
  });

  it("discards a write older than the stored record", async () => {
    await store.put("default", makeCredential({ accessToken: "newer", updatedAt: T0 + 10 }));

    const written = await store.put(
      "default",
      makeCredential({ accessToken: "older", updatedAt: T0 + 5 })
    );

    expect(written).toBe(false);
    expect((await store.get("default"))?.accessToken).toBe("newer");
  });

  it("accepts a write with the same updatedAt", async () => {
    await store.put("default", makeCredential({ accessToken: "first" }));
    expect(await store.put("default", makeCredential({ accessToken: "second" }))).toBe(true);
    expect((await store.get("default"))?.accessToken).toBe("second");
  });

  it("keeps the logically-last of many concurrent writes", async () => {
    const writes = [3, 9, 0, 7, 1, 8, 2, 6, 4, 5].map((i) =>
      store.put(
        "default",
        makeCredential({ accessToken: `access-${i}`, updatedAt: T0 + i })
      )
    );
    await Promise.all(writes);

    const stored = await store.get("default");
    expect(stored?.accessToken).toBe("access-9");
    expect(stored?.updatedAt).toBe(T0 + 9);
    const leftovers = fs
      .readdirSync(path.join(baseDir, "credentials"))
      .filter((f) => f.startsWith(".tmp-"));
    expect(leftovers).toEqual([]);
  });

  it("rejects a credential stored under another account key", async () => {
    await expect(
      store.put("other", makeCredential({ accountKey: "default" }))
    ).rejects.toBeInstanceOf(LogicError);
  });

  it("rejects credentials with empty tokens", async () => {
    await expect(
      store.put("default", makeCredential({ accessToken: "" }))
    ).rejects.toBeInstanceOf(LogicError);
    expect(await store.get("default")).toBeNull();
  });

  it("reports a corrupt record as StorageError and lets a new write replace it", async () => {
    fs.mkdirSync(path.join(baseDir, "credentials"), { recursive: true });
    fs.writeFileSync(credentialFile("default"), "{ not json");

    await expect(store.get("default")).rejects.toBeInstanceOf(StorageError);

    expect(await store.put("default", makeCredential())).toBe(true);
    expect(await store.get("default")).toEqual(makeCredential());
  });

  it("reports a record failing validation as StorageError", async () => {
    fs.mkdirSync(path.join(baseDir, "credentials"), { recursive: true });
    fs.writeFileSync(credentialFile("default"), JSON.stringify({ accountKey: "default" }));

    await expect(store.get("default")).rejects.toBeInstanceOf(StorageError);
  });

  it("deletes idempotently", async () => {
    await store.put("default", makeCredential());

    expect(await store.delete("default")).toBe(true);
    expect(await store.delete("default")).toBe(false);
    expect(await store.get("default")).toBeNull();
  });

  it("lists stored account keys in order", async () => {
    expect(await store.list()).toEqual([]);

    await store.put("user@example.com", makeCredential({ accountKey: "user@example.com" }));
    await store.put("default", makeCredential());

    expect(await store.list()).toEqual(["default", "user@example.com"]);
  });
});
