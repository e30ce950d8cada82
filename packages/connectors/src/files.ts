/**
 * Filesystem helpers shared by the credential and artifact stores.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { randomUUID } from "crypto";

/** Prefix of in-flight temp files; listings skip them */
export const TEMP_FILE_PREFIX = ".tmp-";

/**
 * Encode a key for safe filesystem storage using base64url.
 * This encoding is reversible and collision-free.
 */
export function encodeKey(key: string): string {
  return Buffer.from(key, "utf-8")
    .toString("base64url")
    .replace(/=+$/, ""); // Remove padding for cleaner filenames
}

/**
 * Decode a key from its base64url filename form.
 */
export function decodeKey(encoded: string): string {
  const padded = encoded + "=".repeat((4 - (encoded.length % 4)) % 4);
  return Buffer.from(padded, "base64url").toString("utf-8");
}

/**
 * Atomic write: write to temp file in the same directory, then rename.
 * Readers see either the previous content or the new one, never a partial file.
 */
export async function atomicWriteFile(
  filePath: string,
  content: string,
  mode?: number
): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `${TEMP_FILE_PREFIX}${randomUUID()}`);

  try {
    await fs.writeFile(tempPath, content, { mode, encoding: "utf-8" });
    await fs.rename(tempPath, filePath);
  } catch (error) {
    // Clean up temp file on failure
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
