/**
 * File-based storage for fetched metric documents.
 *
 * Path pattern: {dataDir}/{account dir}/{date}_{metric}.json
 *
 * Account keys made of letters, digits, `_` and `-` name their directory as
 * they are; any other key is stored as `~` plus its base64url form.
 *
 * One file per (account, metric, date). A re-sync replaces the file through
 * temp-file-then-rename, so readers see the old document or the new one.
 */

import createDebug from "debug";
import * as fs from "fs/promises";
import * as path from "path";
import { LogicError, StorageError, classifyStorageFailure } from "@fitsync/proto";
import {
  TEMP_FILE_PREFIX,
  atomicWriteFile,
  encodeKey,
  isNotFound,
} from "@fitsync/connectors";
import { isCalendarDate } from "./dates";
import { isValidMetricKind } from "./metrics";
import type { ArtifactStore, StoredArtifact } from "./types";

const debug = createDebug("fitsync:sync:result-store");

const ARTIFACT_FILE = /^(\d{4}-\d{2}-\d{2})_([a-z0-9][a-z0-9-]*)\.json$/;

const PLAIN_ACCOUNT_KEY = /^[A-Za-z0-9_-]+$/;

/** Directory name for an account; `~` never occurs in a plain key */
export function accountDirName(accountKey: string): string {
  return PLAIN_ACCOUNT_KEY.test(accountKey) ? accountKey : `~${encodeKey(accountKey)}`;
}

export class ResultStore implements ArtifactStore {
  constructor(private dataDir: string) {}

  private accountDir(accountKey: string): string {
    if (!accountKey) {
      throw new LogicError("Account key must not be empty", {
        source: "ResultStore",
      });
    }
    return path.join(this.dataDir, accountDirName(accountKey));
  }

  /**
   * Artifact path for one metric and date. Rejects values that could escape
   * the account directory.
   */
  artifactPath(accountKey: string, metric: string, date: string): string {
    if (!isValidMetricKind(metric)) {
      throw new LogicError(`Invalid metric kind: ${metric}`, {
        source: "ResultStore.artifactPath",
      });
    }
    if (!isCalendarDate(date)) {
      throw new LogicError(`Invalid date "${date}", expected YYYY-MM-DD`, {
        source: "ResultStore.artifactPath",
      });
    }
    return path.join(this.accountDir(accountKey), `${date}_${metric}.json`);
  }

  async save(
    accountKey: string,
    metric: string,
    date: string,
    document: unknown
  ): Promise<StoredArtifact> {
    const filePath = this.artifactPath(accountKey, metric, date);
    const content = JSON.stringify(document, null, 2);

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await atomicWriteFile(filePath, content);
      const stat = await fs.stat(filePath);
      debug("Stored %s for %s (%d bytes)", metric, date, stat.size);
      return {
        accountKey,
        metric,
        date,
        path: path.resolve(filePath),
        bytes: stat.size,
        storedAt: stat.mtimeMs,
      };
    } catch (error) {
      throw classifyStorageFailure(error, "ResultStore.save");
    }
  }

  async exists(accountKey: string, metric: string, date: string): Promise<boolean> {
    try {
      await fs.access(this.artifactPath(accountKey, metric, date));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw classifyStorageFailure(error, "ResultStore.exists");
    }
  }

  /**
   * Read a stored document back. Returns undefined when nothing is stored;
   * a stored empty day reads back as null.
   */
  async read(accountKey: string, metric: string, date: string): Promise<unknown> {
    const filePath = this.artifactPath(accountKey, metric, date);

    let data: string;
    try {
      data = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw classifyStorageFailure(error, "ResultStore.read");
    }

    try {
      return JSON.parse(data);
    } catch (error) {
      throw new StorageError(`Corrupt artifact ${path.basename(filePath)}`, {
        source: "ResultStore.read",
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Sync history for an account, sorted by date, then metric.
   */
  async list(accountKey: string): Promise<StoredArtifact[]> {
    const dir = this.accountDir(accountKey);

    let files: string[];
    try {
      files = await fs.readdir(dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw classifyStorageFailure(error, "ResultStore.list");
    }

    const artifacts: StoredArtifact[] = [];
    for (const file of files) {
      if (file.startsWith(TEMP_FILE_PREFIX)) continue;
      const match = ARTIFACT_FILE.exec(file);
      if (!match) continue;

      const filePath = path.join(dir, file);
      try {
        const stat = await fs.stat(filePath);
        artifacts.push({
          accountKey,
          metric: match[2],
          date: match[1],
          path: path.resolve(filePath),
          bytes: stat.size,
          storedAt: stat.mtimeMs,
        });
      } catch (error) {
        // Replaced or removed between readdir and stat
        if (!isNotFound(error)) {
          throw classifyStorageFailure(error, "ResultStore.list");
        }
      }
    }

    return artifacts.sort((a, b) =>
      a.date === b.date ? a.metric.localeCompare(b.metric) : a.date.localeCompare(b.date)
    );
  }
}
