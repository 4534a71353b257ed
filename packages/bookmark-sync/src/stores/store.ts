import type { BookmarkOrigin, BookmarkRecord } from "../domain/models/bookmark";

export interface StoreReader {
  /** Every bookmark in the native tree, flattened in document order. */
  read(): Promise<BookmarkRecord[]>;
}

export interface StoreWriter {
  /**
   * Writes `records` into a flat folder called `name`. A folder of the same
   * name left by a previous run at the insertion point is replaced; all other
   * native content is kept.
   */
  appendFolder(name: string, records: readonly BookmarkRecord[]): Promise<void>;
}

export interface BookmarkStore extends StoreReader, StoreWriter {
  readonly origin: BookmarkOrigin;
  readonly label: string;
  readonly path: string;
}
