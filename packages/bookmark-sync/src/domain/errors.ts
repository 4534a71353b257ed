export type SyncErrorType =
  | "notFound" // native bookmark file missing
  | "permission" // filesystem access denied
  | "io" // read or backup failure
  | "write" // failure while writing a native file back
  | "format" // native file could not be parsed
  | "unknown";

export interface SyncErrorOptions {
  path?: string;
  /** Backups the user should restore when a write left a store half-synced. */
  restoreFrom?: string[];
  cause?: unknown;
}

export class SyncError extends Error {
  readonly type: SyncErrorType;
  readonly path?: string;
  readonly restoreFrom: string[];

  constructor(type: SyncErrorType, message?: string, options: SyncErrorOptions = {}) {
    super(message ?? getDefaultMessage(type, options.path), { cause: options.cause });
    this.name = "SyncError";
    this.type = type;
    this.path = options.path;
    this.restoreFrom = options.restoreFrom ?? [];
  }
}

function getDefaultMessage(type: SyncErrorType, path?: string): string {
  const subject = path ?? "bookmark file";
  const messages: Record<SyncErrorType, string> = {
    notFound: `Bookmark file not found: ${subject}`,
    permission: `Permission denied: ${subject}`,
    io: `Failed to read ${subject}`,
    write: `Failed to write ${subject}`,
    format: `Unrecognized bookmark file format: ${subject}`,
    unknown: `Unexpected failure while syncing ${subject}`
  };
  return messages[type];
}

const PERMISSION_ERROR_CODES = new Set(["EACCES", "EPERM"]);

export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }

  const { code } = error;
  return typeof code === "string" ? code : undefined;
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a Node filesystem failure onto the sync error taxonomy. Errors that are
 * already classified pass through untouched.
 */
export function classifyFsError(
  error: unknown,
  path: string,
  fallback: Extract<SyncErrorType, "io" | "write">
): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  const code = getErrorCode(error);

  // A missing path while writing is a failed write, not a missing store.
  if (code === "ENOENT" && fallback === "io") {
    return new SyncError("notFound", undefined, { path, cause: error });
  }

  if (code && PERMISSION_ERROR_CODES.has(code)) {
    return new SyncError("permission", undefined, { path, cause: error });
  }

  const base = getDefaultMessage(fallback, path);
  return new SyncError(fallback, `${base}: ${getErrorMessage(error)}`, { path, cause: error });
}

export function toSyncError(error: unknown): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  return new SyncError("unknown", getErrorMessage(error), { cause: error });
}

function getHint(error: SyncError): string | undefined {
  switch (error.type) {
    case "notFound":
      return "Open the browser at least once so it creates its bookmark file, then try again.";
    case "permission":
      return "Grant your terminal filesystem access (Full Disk Access on macOS) and try again.";
    case "write":
      return error.restoreFrom.length > 0
        ? `Restore from backup:\n${error.restoreFrom.map((path) => `  ${path}`).join("\n")}`
        : undefined;
    case "format":
      return "Make sure the file is a valid bookmark file for this browser.";
    default:
      return undefined;
  }
}

/** User-facing rendering of a sync failure, including the recovery hint. */
export function describeSyncError(error: SyncError): string {
  const hint = getHint(error);
  return hint ? `${error.message}\n${hint}` : error.message;
}
