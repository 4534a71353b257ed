import { randomUUID } from "node:crypto";
import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { build, type PlistArray, type PlistObject, type PlistValue } from "plist";
import { parse as decodePlist } from "simple-plist";

import { SyncError } from "../domain/errors";
import type { BookmarkRecord } from "../domain/models/bookmark";
import { readNativeFile, writeNativeFile } from "./native-file";
import type { BookmarkStore } from "./store";

const SAFARI_LEAF_TYPE = "WebBookmarkTypeLeaf";
const SAFARI_LIST_TYPE = "WebBookmarkTypeList";
const BINARY_PLIST_MAGIC = "bplist00";
const XML_MIME_TYPE = "text/xml";
const ELEMENT_NODE = 1;

/** A decoded `Bookmarks.plist` and the XML text it is written back from. */
export interface SafariBookmarksFile {
  root: PlistObject;
  xml: string;
}

function isPlistArray(value: PlistValue | undefined): value is PlistArray {
  return Array.isArray(value);
}

export function isPlistObject(value: PlistValue | undefined): value is PlistObject {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !Buffer.isBuffer(value)
  );
}

function getString(node: PlistObject, key: string): string | undefined {
  const value = node[key];
  return typeof value === "string" ? value : undefined;
}

function getChildren(node: PlistObject): readonly PlistValue[] {
  const children = node.Children;
  return isPlistArray(children) ? children : [];
}

function getLeafTitle(node: PlistObject, url: string): string {
  const uriDictionary = node.URIDictionary;
  if (isPlistObject(uriDictionary)) {
    const title = getString(uriDictionary, "title");
    if (title !== undefined) {
      return title;
    }
  }

  return url;
}

export function flattenSafariTree(root: PlistObject): BookmarkRecord[] {
  const bookmarks: BookmarkRecord[] = [];

  const visit = (value: PlistValue): void => {
    if (!isPlistObject(value)) {
      return;
    }

    if (getString(value, "WebBookmarkType") === SAFARI_LEAF_TYPE) {
      const url = getString(value, "URLString");
      if (url) {
        bookmarks.push({ title: getLeafTitle(value, url), url, origin: "safari" });
      }
      return;
    }

    for (const child of getChildren(value)) {
      visit(child);
    }
  };

  for (const child of getChildren(root)) {
    visit(child);
  }

  return bookmarks;
}

export function createSafariFolder(
  name: string,
  records: readonly BookmarkRecord[],
  createUuid: () => string
): PlistObject {
  return {
    Title: name,
    WebBookmarkType: SAFARI_LIST_TYPE,
    WebBookmarkUUID: createUuid(),
    Children: records.map(
      (record): PlistObject => ({
        URIDictionary: { title: record.title },
        URLString: record.url,
        WebBookmarkType: SAFARI_LEAF_TYPE,
        WebBookmarkUUID: createUuid()
      })
    )
  };
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function childElements(parent: Node): Element[] {
  return Array.from(parent.childNodes).filter(isElement);
}

function getDictEntry(dict: Element, key: string): Element | undefined {
  const entries = childElements(dict);
  for (let index = 0; index + 1 < entries.length; index += 2) {
    if (entries[index].tagName === "key" && entries[index].textContent === key) {
      return entries[index + 1];
    }
  }

  return undefined;
}

function getRootDict(document: Document): Element | undefined {
  const plistElement = document.documentElement;
  if (!plistElement) {
    return undefined;
  }

  return childElements(plistElement).find((element) => element.tagName === "dict");
}

function isSyncedFolderElement(element: Element, name: string): boolean {
  return (
    element.tagName === "dict" &&
    getDictEntry(element, "WebBookmarkType")?.textContent === SAFARI_LIST_TYPE &&
    getDictEntry(element, "Title")?.textContent === name
  );
}

function getRootChildrenArray(document: Document, rootDict: Element, path: string): Element {
  const existing = getDictEntry(rootDict, "Children");
  if (existing) {
    if (existing.tagName !== "array") {
      throw new SyncError("format", `Expected Children to be an array in ${path}`, { path });
    }
    return existing;
  }

  const key = document.createElement("key");
  key.appendChild(document.createTextNode("Children"));
  const array = document.createElement("array");
  rootDict.appendChild(key);
  rootDict.appendChild(array);
  return array;
}

/**
 * Replaces the top-level folder called `name` in a Safari XML plist and
 * returns the new XML. Only the root `Children` array is touched; every other
 * node is serialized as it was read, value types included.
 */
export function spliceSafariFolder(
  xml: string,
  name: string,
  folder: PlistObject,
  path: string
): string {
  const parser = new DOMParser();
  const document = parser.parseFromString(xml, XML_MIME_TYPE);
  const rootDict = getRootDict(document);
  if (!rootDict) {
    throw new SyncError("format", `Expected a dictionary at the root of ${path}`, { path });
  }

  const children = getRootChildrenArray(document, rootDict, path);
  for (const child of childElements(children)) {
    if (isSyncedFolderElement(child, name)) {
      children.removeChild(child);
    }
  }

  const folderDict = getRootDict(parser.parseFromString(build(folder), XML_MIME_TYPE));
  if (folderDict) {
    children.appendChild(document.importNode(folderDict, true));
  }

  return new XMLSerializer().serializeToString(document);
}

function isBinaryPlist(contents: Buffer): boolean {
  return contents.subarray(0, BINARY_PLIST_MAGIC.length).toString("latin1") === BINARY_PLIST_MAGIC;
}

function toPlistValue(value: unknown): PlistValue | undefined {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }

  if (typeof value === "bigint") {
    return Number(value);
  }

  if (Array.isArray(value)) {
    const items: PlistValue[] = [];
    for (const item of value) {
      const converted = toPlistValue(item);
      if (converted !== undefined) {
        items.push(converted);
      }
    }
    return items;
  }

  if (typeof value === "object" && value !== null) {
    const entries: Record<string, PlistValue> = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toPlistValue(item);
      if (converted !== undefined) {
        entries[key] = converted;
      }
    }
    return entries;
  }

  return undefined;
}

/**
 * Decodes an XML or binary (`bplist00`) property list. Binary input is
 * re-encoded as XML so the file is always written back in XML.
 */
export function parseSafariBookmarks(contents: Buffer, path: string): SafariBookmarksFile {
  let decoded: unknown;
  try {
    decoded = decodePlist(contents, path);
  } catch (error) {
    throw new SyncError("format", undefined, { path, cause: error });
  }

  const root = toPlistValue(decoded);
  if (!isPlistObject(root)) {
    throw new SyncError("format", `Expected a dictionary at the root of ${path}`, { path });
  }

  return {
    root,
    xml: isBinaryPlist(contents) ? build(root) : contents.toString("utf8")
  };
}

export function createSafariUuid(): string {
  return randomUUID().toUpperCase();
}

export class SafariBookmarkStore implements BookmarkStore {
  readonly origin = "safari";
  readonly label = "Safari";

  constructor(
    readonly path: string,
    private readonly createUuid: () => string = createSafariUuid
  ) {}

  private async load(): Promise<SafariBookmarksFile> {
    const contents = await readNativeFile(this.path);
    return parseSafariBookmarks(contents, this.path);
  }

  async read(): Promise<BookmarkRecord[]> {
    return flattenSafariTree((await this.load()).root);
  }

  async appendFolder(name: string, records: readonly BookmarkRecord[]): Promise<void> {
    const { xml } = await this.load();
    const folder = createSafariFolder(name, records, this.createUuid);
    await writeNativeFile(this.path, spliceSafariFolder(xml, name, folder, this.path));
  }
}
