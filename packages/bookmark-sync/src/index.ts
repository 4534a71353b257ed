export { mergeBookmarks } from "./domain/services/merger";
export { resolveSyncConfig } from "./domain/services/sync-config";
export type { SyncConfigOptions } from "./domain/services/sync-config";
export { SyncError, classifyFsError, describeSyncError } from "./domain/errors";
export type { SyncErrorType } from "./domain/errors";
export type { BookmarkOrigin, BookmarkRecord } from "./domain/models/bookmark";
export { DEFAULT_SYNCED_FOLDER_NAME } from "./domain/models/sync-config";
export type { SyncConfig } from "./domain/models/sync-config";
export { SafariBookmarkStore } from "./stores/safari-store";
export { ChromeBookmarkStore } from "./stores/chrome-store";
export type { BookmarkStore, StoreReader, StoreWriter } from "./stores/store";
export { FileBackupService } from "./backup/backup-service";
export type { BackupService } from "./backup/backup-service";
export { synchronizeBookmarks } from "./sync/synchronize";
export type { SyncReport, StoreSyncReport } from "./sync/synchronize";
