import type { BookmarkOrigin } from "../domain/models/bookmark";
import type { SyncConfig } from "../domain/models/sync-config";
import { ChromeBookmarkStore } from "./chrome-store";
import { SafariBookmarkStore } from "./safari-store";
import type { BookmarkStore } from "./store";

export type BookmarkStores = Record<BookmarkOrigin, BookmarkStore>;

export function createBookmarkStores(
  config: Pick<SyncConfig, "safariPath" | "chromePath">
): BookmarkStores {
  return {
    safari: new SafariBookmarkStore(config.safariPath),
    chrome: new ChromeBookmarkStore(config.chromePath)
  };
}
