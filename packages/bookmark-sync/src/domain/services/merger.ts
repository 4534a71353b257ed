import type { BookmarkRecord } from "../models/bookmark";

/**
 * Union of two bookmark lists keyed by exact URL.
 *
 * Records from `listA` are visited before `listB`, so when both contain the
 * same URL the entry from `listA` is kept. Order of first appearance is
 * preserved and neither input is mutated.
 */
export function mergeBookmarks(
  listA: readonly BookmarkRecord[],
  listB: readonly BookmarkRecord[]
): BookmarkRecord[] {
  const merged: BookmarkRecord[] = [];
  const seenUrls = new Set<string>();

  for (const list of [listA, listB]) {
    for (const bookmark of list) {
      if (seenUrls.has(bookmark.url)) {
        continue;
      }

      seenUrls.add(bookmark.url);
      merged.push(bookmark);
    }
  }

  return merged;
}
