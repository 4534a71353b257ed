import { randomUUID } from "node:crypto";

import { SyncError } from "../domain/errors";
import type { BookmarkRecord } from "../domain/models/bookmark";
import { readNativeFile, writeNativeFile } from "./native-file";
import type { BookmarkStore } from "./store";

export interface ChromeBookmarkNode {
  id?: string;
  guid?: string;
  name?: string;
  type?: string;
  url?: string;
  date_added?: string;
  date_modified?: string;
  children?: ChromeBookmarkNode[];
  [key: string]: unknown;
}

export interface ChromeBookmarkRoots {
  bookmark_bar: ChromeBookmarkNode;
  [key: string]: ChromeBookmarkNode | undefined;
}

export interface ChromeBookmarksDocument {
  checksum?: string;
  roots: ChromeBookmarkRoots;
  version?: number;
  [key: string]: unknown;
}

export interface ChromeFolderOptions {
  now: Date;
  createGuid: () => string;
}

// Milliseconds between 1601-01-01 (Chrome's epoch) and 1970-01-01.
const CHROME_EPOCH_OFFSET_MS = 11644473600000n;
const CHROME_JSON_INDENT = 3;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isChromeBookmarksDocument(value: unknown): value is ChromeBookmarksDocument {
  if (!isRecord(value) || !isRecord(value.roots)) {
    return false;
  }

  const bookmarkBar = value.roots.bookmark_bar;
  return isRecord(bookmarkBar) && Array.isArray(bookmarkBar.children);
}

/** Chrome stores timestamps as microseconds since 1601-01-01 UTC. */
export function toChromeTimestamp(date: Date): string {
  return ((BigInt(date.getTime()) + CHROME_EPOCH_OFFSET_MS) * 1000n).toString();
}

function forEachNode(
  roots: ChromeBookmarkRoots,
  callback: (node: ChromeBookmarkNode) => void
): void {
  const visit = (node: ChromeBookmarkNode): void => {
    callback(node);

    if (Array.isArray(node.children)) {
      for (const child of node.children) {
        visit(child);
      }
    }
  };

  for (const root of Object.values(roots)) {
    if (isRecord(root)) {
      visit(root);
    }
  }
}

export function flattenChromeRoots(roots: ChromeBookmarkRoots): BookmarkRecord[] {
  const bookmarks: BookmarkRecord[] = [];

  forEachNode(roots, (node) => {
    if (node.type !== "url" || typeof node.url !== "string" || node.url.length === 0) {
      return;
    }

    bookmarks.push({
      title: typeof node.name === "string" ? node.name : node.url,
      url: node.url,
      origin: "chrome"
    });
  });

  return bookmarks;
}

function findHighestId(roots: ChromeBookmarkRoots): number {
  let highest = 0;

  forEachNode(roots, (node) => {
    if (typeof node.id === "string" && /^\d+$/.test(node.id)) {
      highest = Math.max(highest, Number(node.id));
    }
  });

  return highest;
}

export function withChromeFolder(
  document: ChromeBookmarksDocument,
  name: string,
  records: readonly BookmarkRecord[],
  options: ChromeFolderOptions
): ChromeBookmarksDocument {
  const { roots } = document;
  const timestamp = toChromeTimestamp(options.now);
  let nextId = findHighestId(roots) + 1;
  const allocateId = (): string => String(nextId++);

  const folder: ChromeBookmarkNode = {
    children: [],
    date_added: timestamp,
    date_modified: timestamp,
    guid: options.createGuid(),
    id: allocateId(),
    name,
    type: "folder"
  };

  folder.children = records.map((record) => ({
    date_added: timestamp,
    guid: options.createGuid(),
    id: allocateId(),
    name: record.title,
    type: "url",
    url: record.url
  }));

  const kept = (roots.bookmark_bar.children ?? []).filter(
    (child) => !(child.type === "folder" && child.name === name)
  );

  const updated: ChromeBookmarksDocument = {
    ...document,
    roots: {
      ...roots,
      bookmark_bar: { ...roots.bookmark_bar, children: [...kept, folder] }
    }
  };

  // Chrome recomputes a missing checksum but distrusts a stale one.
  delete updated.checksum;

  return updated;
}

export function parseChromeBookmarks(contents: Buffer, path: string): ChromeBookmarksDocument {
  let document: unknown;
  try {
    document = JSON.parse(contents.toString("utf8"));
  } catch (error) {
    throw new SyncError("format", undefined, { path, cause: error });
  }

  if (!isChromeBookmarksDocument(document)) {
    throw new SyncError("format", `Missing roots.bookmark_bar in ${path}`, { path });
  }

  return document;
}

export class ChromeBookmarkStore implements BookmarkStore {
  readonly origin = "chrome";
  readonly label = "Chrome";

  constructor(
    readonly path: string,
    private readonly clock: () => Date = () => new Date(),
    private readonly createGuid: () => string = randomUUID
  ) {}

  private async loadDocument(): Promise<ChromeBookmarksDocument> {
    const contents = await readNativeFile(this.path);
    return parseChromeBookmarks(contents, this.path);
  }

  async read(): Promise<BookmarkRecord[]> {
    const document = await this.loadDocument();
    return flattenChromeRoots(document.roots);
  }

  async appendFolder(name: string, records: readonly BookmarkRecord[]): Promise<void> {
    const document = await this.loadDocument();
    const updated = withChromeFolder(document, name, records, {
      now: this.clock(),
      createGuid: this.createGuid
    });
    await writeNativeFile(this.path, JSON.stringify(updated, null, CHROME_JSON_INDENT));
  }
}
