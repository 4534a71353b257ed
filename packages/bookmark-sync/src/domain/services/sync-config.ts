import path from "node:path";

import { isBookmarkOrigin, type BookmarkOrigin } from "../models/bookmark";
import {
  DEFAULT_BACKUP_DIR,
  DEFAULT_CHROME_BOOKMARKS_PATH,
  DEFAULT_SAFARI_BOOKMARKS_PATH,
  DEFAULT_SYNCED_FOLDER_NAME,
  SYNC_CONFIG_ENV_KEYS,
  type SyncConfig
} from "../models/sync-config";

export interface SyncConfigOptions {
  safariPath?: string;
  chromePath?: string;
  backupDir?: string;
  folderName?: string;
  primary?: string;
  dryRun?: boolean;
}

export type SyncConfigEnvironment = Record<string, string | undefined>;

function normalizeText(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function expandHomeDirectory(value: string, homeDir: string): string {
  if (value === "~") {
    return homeDir;
  }

  if (value.startsWith("~/")) {
    return path.join(homeDir, value.slice(2));
  }

  return value;
}

function normalizePrimary(value: unknown): BookmarkOrigin {
  const normalized = normalizeText(value)?.toLowerCase();
  return isBookmarkOrigin(normalized) ? normalized : "safari";
}

/**
 * Resolves the effective configuration. Explicit options take precedence over
 * environment variables, which take precedence over the built-in defaults.
 */
export function resolveSyncConfig(
  options: SyncConfigOptions,
  env: SyncConfigEnvironment,
  homeDir: string
): SyncConfig {
  const pick = (
    option: string | undefined,
    envKey: string,
    fallback: string
  ): string => {
    const value =
      normalizeText(option) ?? normalizeText(env[envKey]) ?? fallback;
    return expandHomeDirectory(value, homeDir);
  };

  return {
    safariPath: pick(
      options.safariPath,
      SYNC_CONFIG_ENV_KEYS.safariPath,
      DEFAULT_SAFARI_BOOKMARKS_PATH
    ),
    chromePath: pick(
      options.chromePath,
      SYNC_CONFIG_ENV_KEYS.chromePath,
      DEFAULT_CHROME_BOOKMARKS_PATH
    ),
    backupDir: pick(
      options.backupDir,
      SYNC_CONFIG_ENV_KEYS.backupDir,
      DEFAULT_BACKUP_DIR
    ),
    folderName: normalizeText(options.folderName) ?? DEFAULT_SYNCED_FOLDER_NAME,
    primary: normalizePrimary(options.primary),
    dryRun: options.dryRun === true
  };
}
