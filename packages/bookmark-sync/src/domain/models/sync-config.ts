import type { BookmarkOrigin } from "./bookmark";

export interface SyncConfig {
  safariPath: string;
  chromePath: string;
  backupDir: string;
  /** Name of the flat folder written into both browsers. */
  folderName: string;
  /** Browser read as the first merge list; its titles win on conflict. */
  primary: BookmarkOrigin;
  dryRun: boolean;
}

export const DEFAULT_SYNCED_FOLDER_NAME = "Synced";

export const DEFAULT_SAFARI_BOOKMARKS_PATH = "~/Library/Safari/Bookmarks.plist";
export const DEFAULT_CHROME_BOOKMARKS_PATH =
  "~/Library/Application Support/Google/Chrome/Default/Bookmarks";
export const DEFAULT_BACKUP_DIR = "~/Desktop/bookmark_sync_backups";

export const SYNC_CONFIG_ENV_KEYS = {
  safariPath: "BOOKMARK_SYNC_SAFARI_PATH",
  chromePath: "BOOKMARK_SYNC_CHROME_PATH",
  backupDir: "BOOKMARK_SYNC_BACKUP_DIR"
} as const;
