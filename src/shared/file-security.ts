/**
 * File Security Utilities
 *
 * Cookie files carry live session credentials. Only the owner may read them.
 *
 * Permissions:
 * - Directories: 0700 (owner: rwx, group: ---, others: ---)
 * - Files: 0600 (owner: rw-, group: ---, others: ---)
 *
 * chmod is a no-op on Windows, so the platform is checked first.
 */

import { chmod, mkdir } from "node:fs/promises";
import { createLogger } from "./logger.js";

const logger = createLogger("FileSecurity");

/** Mode for files holding cookies, locks and state */
export const SECURE_FILE_MODE = 0o600;

/** Mode for the store directory */
export const SECURE_DIRECTORY_MODE = 0o700;

function isUnixPlatform(): boolean {
  return process.platform !== "win32";
}

/**
 * Create a directory (recursively) and restrict it to the owner (0700).
 * Directories that already exist keep their permissions.
 */
export async function ensureSecureDirectory(dirPath: string): Promise<void> {
  const created = await mkdir(dirPath, { recursive: true, mode: SECURE_DIRECTORY_MODE });

  if (created === undefined || !isUnixPlatform()) {
    return;
  }

  try {
    await chmod(dirPath, SECURE_DIRECTORY_MODE);
  } catch (error) {
    logger.warn("Failed to set directory permissions", { path: dirPath, error: String(error) });
  }
}
