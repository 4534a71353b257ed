export type BookmarkOrigin = "safari" | "chrome";

export const BOOKMARK_ORIGINS: readonly BookmarkOrigin[] = ["safari", "chrome"];

export interface BookmarkRecord {
  title: string;
  /** Identity key. Compared byte-exact, never normalized. */
  url: string;
  origin: BookmarkOrigin;
}

export function isBookmarkOrigin(value: unknown): value is BookmarkOrigin {
  return value === "safari" || value === "chrome";
}
