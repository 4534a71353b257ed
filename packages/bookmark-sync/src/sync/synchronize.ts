import { FileBackupService, type BackupService } from "../backup/backup-service";
import { SyncError, toSyncError } from "../domain/errors";
import type { BookmarkOrigin, BookmarkRecord } from "../domain/models/bookmark";
import type { SyncConfig } from "../domain/models/sync-config";
import { mergeBookmarks as defaultMergeBookmarks } from "../domain/services/merger";
import type { Logger } from "../shared/logger";
import { createBookmarkStores, type BookmarkStores } from "../stores";
import type { BookmarkStore } from "../stores/store";

export type SynchronizeBookmarksDependencies = {
  stores: BookmarkStores;
  backupService: BackupService;
  mergeBookmarks: typeof defaultMergeBookmarks;
  logger: Logger;
};

export interface StoreSyncReport {
  origin: BookmarkOrigin;
  label: string;
  path: string;
  backupPath: string;
  bookmarkCount: number;
  written: boolean;
}

export interface SyncReport {
  folderName: string;
  dryRun: boolean;
  mergedCount: number;
  duplicatesSkipped: number;
  /** Primary store first. */
  stores: StoreSyncReport[];
}

function getSecondaryOrigin(primary: BookmarkOrigin): BookmarkOrigin {
  return primary === "safari" ? "chrome" : "safari";
}

function createDefaultDependencies(config: SyncConfig): SynchronizeBookmarksDependencies {
  const logger: Logger = console;

  return {
    stores: createBookmarkStores(config),
    backupService: new FileBackupService(config.backupDir, logger),
    mergeBookmarks: defaultMergeBookmarks,
    logger
  };
}

function toWriteFailure(
  error: unknown,
  store: BookmarkStore,
  restoreFrom: string[]
): SyncError {
  const cause = toSyncError(error);

  return new SyncError(
    "write",
    `Failed to write ${store.label} bookmarks: ${cause.message}`,
    { path: store.path, restoreFrom, cause }
  );
}

/**
 * Backs up both native files, merges their bookmarks and writes the merged set
 * into each browser. Any failure aborts the run; once the first store fails to
 * write, the second is left untouched.
 */
export async function synchronizeBookmarks(
  config: SyncConfig,
  overrides: Partial<SynchronizeBookmarksDependencies> = {}
): Promise<SyncReport> {
  const { stores, backupService, mergeBookmarks, logger } = {
    ...createDefaultDependencies(config),
    ...overrides
  };

  const ordered = [stores[config.primary], stores[getSecondaryOrigin(config.primary)]];

  const backupPaths: string[] = [];
  for (const store of ordered) {
    backupPaths.push(await backupService.snapshot(store.path));
  }

  const lists: BookmarkRecord[][] = [];
  for (const store of ordered) {
    lists.push(await store.read());
  }

  const [primaryBookmarks, secondaryBookmarks] = lists;
  const merged = mergeBookmarks(primaryBookmarks, secondaryBookmarks);
  const duplicatesSkipped =
    primaryBookmarks.length + secondaryBookmarks.length - merged.length;

  logger.log(
    `Read ${primaryBookmarks.length} bookmarks from ${ordered[0].label} and ` +
      `${secondaryBookmarks.length} from ${ordered[1].label}; ` +
      `${merged.length} remain after removing ${duplicatesSkipped} duplicates.`
  );

  const written = ordered.map(() => false);

  if (!config.dryRun) {
    for (const [index, store] of ordered.entries()) {
      try {
        await store.appendFolder(config.folderName, merged);
      } catch (error) {
        throw toWriteFailure(error, store, backupPaths.slice(0, index + 1));
      }

      written[index] = true;
      logger.log(
        `Wrote ${merged.length} bookmarks to the "${config.folderName}" folder in ${store.label}.`
      );
    }
  }

  return {
    folderName: config.folderName,
    dryRun: config.dryRun,
    mergedCount: merged.length,
    duplicatesSkipped,
    stores: ordered.map((store, index) => ({
      origin: store.origin,
      label: store.label,
      path: store.path,
      backupPath: backupPaths[index],
      bookmarkCount: lists[index].length,
      written: written[index]
    }))
  };
}
