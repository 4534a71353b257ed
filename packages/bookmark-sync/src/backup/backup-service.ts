import { constants, copyFile, mkdir } from "node:fs/promises";
import path from "node:path";

import { SyncError, classifyFsError, getErrorCode } from "../domain/errors";
import type { Logger } from "../shared/logger";

export interface BackupService {
  /** Copies `sourcePath` unchanged and resolves with the backup location. */
  snapshot(sourcePath: string): Promise<string>;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function formatBackupTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

const MAX_BACKUP_ATTEMPTS = 100;

/** `attempt` numbers the names of backups taken within the same second. */
export function buildBackupPath(
  backupDir: string,
  sourcePath: string,
  date: Date,
  attempt = 0
): string {
  const suffix = attempt > 0 ? `.${attempt}` : "";
  return path.join(
    backupDir,
    `${path.basename(sourcePath)}.${formatBackupTimestamp(date)}${suffix}.bak`
  );
}

export class FileBackupService implements BackupService {
  constructor(
    private readonly backupDir: string,
    private readonly logger: Logger = console,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async snapshot(sourcePath: string): Promise<string> {
    const takenAt = this.clock();

    try {
      await mkdir(this.backupDir, { recursive: true });
    } catch (error) {
      throw classifyFsError(error, this.backupDir, "io");
    }

    for (let attempt = 0; attempt < MAX_BACKUP_ATTEMPTS; attempt += 1) {
      const backupPath = buildBackupPath(this.backupDir, sourcePath, takenAt, attempt);

      try {
        await copyFile(sourcePath, backupPath, constants.COPYFILE_EXCL);
      } catch (error) {
        if (getErrorCode(error) === "EEXIST") {
          continue;
        }
        throw classifyFsError(error, sourcePath, "io");
      }

      this.logger.log(`Backup created: ${backupPath}`);
      return backupPath;
    }

    throw new SyncError("io", `No free backup name for ${sourcePath} in ${this.backupDir}`, {
      path: this.backupDir
    });
  }
}
