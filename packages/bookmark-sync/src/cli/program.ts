import { Command, CommanderError, Option } from "commander";

import { describeSyncError, toSyncError } from "../domain/errors";
import { BOOKMARK_ORIGINS } from "../domain/models/bookmark";
import {
  DEFAULT_BACKUP_DIR,
  DEFAULT_CHROME_BOOKMARKS_PATH,
  DEFAULT_SAFARI_BOOKMARKS_PATH,
  DEFAULT_SYNCED_FOLDER_NAME,
  type SyncConfig
} from "../domain/models/sync-config";
import {
  resolveSyncConfig,
  type SyncConfigEnvironment
} from "../domain/services/sync-config";
import type { Logger } from "../shared/logger";
import type { SyncReport } from "../sync/synchronize";

export const CLI_NAME = "bookmark-sync";

export const CLOSE_BROWSERS_PROMPT =
  "*** Please close Safari and Chrome before running this sync! ***\n" +
  "Press Enter to continue if both browsers are closed...";

export interface CliOptions {
  safari?: string;
  chrome?: string;
  backupDir?: string;
  folder?: string;
  prefer?: string;
  dryRun?: boolean;
  yes?: boolean;
}

export interface CliContext {
  env: SyncConfigEnvironment;
  homeDir: string;
  logger: Logger;
  /** Resolves once the user confirms both browsers are closed. */
  confirm: (prompt: string) => Promise<void>;
  synchronize: (config: SyncConfig) => Promise<SyncReport>;
}

export function formatSyncReport(report: SyncReport): string {
  const labels = report.stores.map((store) => store.label).join(" and ");

  if (report.dryRun) {
    return (
      `Dry run: ${report.mergedCount} bookmarks would be written to the ` +
      `"${report.folderName}" folder in ${labels}. No files were changed.`
    );
  }

  return `Bookmarks synced! Check the "${report.folderName}" folder in ${labels}.`;
}

async function runSync(options: CliOptions, context: CliContext): Promise<number> {
  const config = resolveSyncConfig(
    {
      safariPath: options.safari,
      chromePath: options.chrome,
      backupDir: options.backupDir,
      folderName: options.folder,
      primary: options.prefer,
      dryRun: options.dryRun
    },
    context.env,
    context.homeDir
  );

  if (!options.yes) {
    await context.confirm(CLOSE_BROWSERS_PROMPT);
  }

  try {
    const report = await context.synchronize(config);
    context.logger.log(formatSyncReport(report));
    return 0;
  } catch (error) {
    context.logger.error(describeSyncError(toSyncError(error)));
    return 1;
  }
}

export function createProgram(
  context: CliContext,
  onExit: (code: number) => void
): Command {
  return new Command()
    .name(CLI_NAME)
    .description(
      "Merge Safari and Chrome bookmarks by URL and write the result into a folder in both browsers."
    )
    // No defaults on the paths: resolveSyncConfig applies them after environment variables.
    .option("--safari <path>", `Safari Bookmarks.plist (default: ${DEFAULT_SAFARI_BOOKMARKS_PATH})`)
    .option("--chrome <path>", `Chrome Bookmarks file (default: ${DEFAULT_CHROME_BOOKMARKS_PATH})`)
    .option("--backup-dir <dir>", `directory receiving backups (default: ${DEFAULT_BACKUP_DIR})`)
    .option("--folder <name>", "folder written into both browsers", DEFAULT_SYNCED_FOLDER_NAME)
    .addOption(
      new Option("--prefer <browser>", "browser whose titles win when URLs match")
        .choices(BOOKMARK_ORIGINS)
        .default("safari")
    )
    .option("--dry-run", "back up, read and merge without writing", false)
    .option("-y, --yes", "skip the close-your-browsers confirmation", false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => context.logger.log(text.trimEnd()),
      writeErr: (text) => context.logger.error(text.trimEnd())
    })
    .action(async (options: CliOptions) => {
      onExit(await runSync(options, context));
    });
}

/** Parses `argv` (without the node and script entries) and runs the sync. */
export async function runCli(argv: readonly string[], context: CliContext): Promise<number> {
  let exitCode = 0;
  const program = createProgram(context, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
