/**
 * File-based credential storage.
 *
 * Stores one OAuth credential per account key as a JSON file with restricted
 * permissions (0o600).
 * Path pattern: {basePath}/credentials/{base64url(accountKey)}.json
 *
 * Writes for the same account key are serialized and land through
 * temp-file-then-rename, so a reader never sees a half-written credential.
 */

import createDebug from "debug";
import * as fs from "fs/promises";
import * as path from "path";
import {
  LogicError,
  StorageError,
  classifyStorageFailure,
} from "@fitsync/proto";
import { KeyedMutex } from "./mutex";
import {
  TEMP_FILE_PREFIX,
  atomicWriteFile,
  decodeKey,
  encodeKey,
  isNotFound,
} from "./files";
import { credentialSchema, type Credential } from "./types";

const debug = createDebug("fitsync:connectors:store");

/** Required file permissions for credential files (owner read/write only) */
const CREDENTIAL_FILE_MODE = 0o600;

/** Required directory permissions (owner read/write/execute only) */
const CREDENTIAL_DIR_MODE = 0o700;

export class CredentialStore {
  private credentialsDir: string;
  private writes = new KeyedMutex();

  constructor(basePath: string) {
    this.credentialsDir = path.join(basePath, "credentials");
  }

  /**
   * Get the file path for an account's credential.
   * Uses base64url encoding to prevent path traversal and collisions.
   */
  private getFilePath(accountKey: string): string {
    if (!accountKey) {
      throw new LogicError("Account key must not be empty", {
        source: "CredentialStore",
      });
    }
    return path.join(this.credentialsDir, `${encodeKey(accountKey)}.json`);
  }

  /**
   * Ensure the credentials directory exists with correct permissions.
   */
  private async ensureDir(): Promise<void> {
    await fs.mkdir(this.credentialsDir, {
      recursive: true,
      mode: CREDENTIAL_DIR_MODE,
    });

    const stat = await fs.stat(this.credentialsDir);
    const currentMode = stat.mode & 0o777;
    if (currentMode !== CREDENTIAL_DIR_MODE) {
      debug(
        "Fixing directory permissions for %s: %o -> %o",
        this.credentialsDir,
        currentMode,
        CREDENTIAL_DIR_MODE
      );
      await fs.chmod(this.credentialsDir, CREDENTIAL_DIR_MODE);
    }
  }

  /**
   * Load the credential for an account.
   * Returns null if none is stored.
   */
  async get(accountKey: string): Promise<Credential | null> {
    const filePath = this.getFilePath(accountKey);

    let data: string;
    try {
      data = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw classifyStorageFailure(error, "CredentialStore.get");
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new StorageError(`Corrupt credential file for ${accountKey}`, {
        source: "CredentialStore.get",
        cause: error instanceof Error ? error : undefined,
      });
    }

    const result = credentialSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(
        `Invalid credential record for ${accountKey}: ${result.error.message}`,
        { source: "CredentialStore.get" }
      );
    }
    return result.data;
  }

  /**
   * Insert or replace the credential for an account.
   *
   * Returns false when the write was discarded because the stored record has a
   * newer updatedAt (a late writer never rolls the credential back).
   */
  async put(accountKey: string, credential: Credential): Promise<boolean> {
    if (credential.accountKey !== accountKey) {
      throw new LogicError(
        `Credential for "${credential.accountKey}" cannot be stored under "${accountKey}"`,
        { source: "CredentialStore.put" }
      );
    }
    const result = credentialSchema.safeParse(credential);
    if (!result.success) {
      throw new LogicError(`Invalid credential: ${result.error.message}`, {
        source: "CredentialStore.put",
      });
    }
    const record = result.data;
    const filePath = this.getFilePath(accountKey);

    return this.writes.runExclusive(accountKey, async () => {
      const existing = await this.getForOverwrite(accountKey);
      if (existing && existing.updatedAt > record.updatedAt) {
        debug(
          "Discarding stale write for %s (stored=%d, incoming=%d)",
          accountKey,
          existing.updatedAt,
          record.updatedAt
        );
        return false;
      }

      try {
        await this.ensureDir();
        await atomicWriteFile(
          filePath,
          JSON.stringify(record, null, 2),
          CREDENTIAL_FILE_MODE
        );
      } catch (error) {
        throw classifyStorageFailure(error, "CredentialStore.put");
      }

      debug("Credential saved for %s", accountKey);
      return true;
    });
  }

  /**
   * Delete the credential for an account.
   * No-op if none is stored; returns whether a record existed.
   */
  async delete(accountKey: string): Promise<boolean> {
    const filePath = this.getFilePath(accountKey);

    return this.writes.runExclusive(accountKey, async () => {
      try {
        await fs.unlink(filePath);
        debug("Deleted credential for %s", accountKey);
        return true;
      } catch (error) {
        if (isNotFound(error)) {
          return false;
        }
        throw classifyStorageFailure(error, "CredentialStore.delete");
      }
    });
  }

  /**
   * List account keys that have a stored credential.
   */
  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.credentialsDir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw classifyStorageFailure(error, "CredentialStore.list");
    }

    return files
      .filter((f) => f.endsWith(".json") && !f.startsWith(TEMP_FILE_PREFIX))
      .map((f) => decodeKey(f.slice(0, -5)))
      .sort();
  }

  /**
   * Read the stored record for the updatedAt guard. A corrupt record is
   * replaced rather than blocking every future write.
   */
  private async getForOverwrite(accountKey: string): Promise<Credential | null> {
    try {
      return await this.get(accountKey);
    } catch (error) {
      if (error instanceof StorageError) {
        debug("Overwriting unreadable credential for %s: %s", accountKey, error.message);
        return null;
      }
      throw error;
    }
  }
}
