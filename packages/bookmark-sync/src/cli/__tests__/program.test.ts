import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { SyncError } from "../../domain/errors";
import type { SyncConfig } from "../../domain/models/sync-config";
import type { SyncReport } from "../../sync/synchronize";
import { CLOSE_BROWSERS_PROMPT, formatSyncReport, runCli, type CliContext } from "../program";

function createReport(overrides: Partial<SyncReport> = {}): SyncReport {
  return {
    folderName: "Synced",
    dryRun: false,
    mergedCount: 3,
    duplicatesSkipped: 1,
    stores: [
      {
        origin: "safari",
        label: "Safari",
        path: "/safari/Bookmarks.plist",
        backupPath: "/backups/Bookmarks.plist.bak",
        bookmarkCount: 2,
        written: true
      },
      {
        origin: "chrome",
        label: "Chrome",
        path: "/chrome/Bookmarks",
        backupPath: "/backups/Bookmarks.bak",
        bookmarkCount: 2,
        written: true
      }
    ],
    ...overrides
  };
}

function createContext(
  synchronize: CliContext["synchronize"] = async () => createReport()
) {
  const output: string[] = [];
  const errors: string[] = [];
  const prompts: string[] = [];
  const configs: SyncConfig[] = [];

  const context: CliContext = {
    env: { BOOKMARK_SYNC_CHROME_PATH: "/env/Bookmarks" },
    homeDir: "/home/tester",
    logger: {
      log: (message: string) => {
        output.push(message);
      },
      error: (message: string) => {
        errors.push(message);
      }
    },
    confirm: async (prompt) => {
      prompts.push(prompt);
    },
    synchronize: async (config) => {
      configs.push(config);
      return synchronize(config);
    }
  };

  return { context, output, errors, prompts, configs };
}

describe("runCli", () => {
  it("asks for confirmation, then syncs with the resolved configuration", async () => {
    const { context, output, prompts, configs } = createContext();

    const code = await runCli(["--folder", "Shared", "--prefer", "chrome"], context);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(prompts, [CLOSE_BROWSERS_PROMPT]);
    assert.deepStrictEqual(configs, [
      {
        safariPath: "/home/tester/Library/Safari/Bookmarks.plist",
        chromePath: "/env/Bookmarks",
        backupDir: "/home/tester/Desktop/bookmark_sync_backups",
        folderName: "Shared",
        primary: "chrome",
        dryRun: false
      }
    ]);
    assert.deepStrictEqual(output, [
      'Bookmarks synced! Check the "Synced" folder in Safari and Chrome.'
    ]);
  });

  it("skips the prompt with --yes and passes paths through", async () => {
    const { context, prompts, configs } = createContext();

    const code = await runCli(
      ["-y", "--dry-run", "--safari", "/s/Bookmarks.plist", "--chrome", "/c/Bookmarks", "--backup-dir", "/b"],
      context
    );

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(prompts, []);
    assert.strictEqual(configs[0].safariPath, "/s/Bookmarks.plist");
    assert.strictEqual(configs[0].chromePath, "/c/Bookmarks");
    assert.strictEqual(configs[0].backupDir, "/b");
    assert.strictEqual(configs[0].dryRun, true);
  });

  it("prints the failure with its hint and exits with 1", async () => {
    const { context, errors } = createContext(async () => {
      throw new SyncError("permission", undefined, { path: "/chrome/Bookmarks" });
    });

    const code = await runCli(["--yes"], context);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(errors, [
      "Permission denied: /chrome/Bookmarks\n" +
        "Grant your terminal filesystem access (Full Disk Access on macOS) and try again."
    ]);
  });

  it("rejects unknown browsers without syncing", async () => {
    const { context, configs, errors } = createContext();

    const code = await runCli(["--yes", "--prefer", "firefox"], context);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(configs, []);
    assert.strictEqual(errors.length, 1);
    assert.match(errors[0], /firefox/);
  });

  it("prints help and exits cleanly", async () => {
    const { context, output, configs } = createContext();

    const code = await runCli(["--help"], context);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(configs, []);
    assert.match(output.join("\n"), /Usage: bookmark-sync \[options\]/);
  });
});

describe("formatSyncReport", () => {
  it("describes a dry run without claiming changes", () => {
    assert.strictEqual(
      formatSyncReport(createReport({ dryRun: true })),
      'Dry run: 3 bookmarks would be written to the "Synced" folder in Safari and Chrome. No files were changed.'
    );
  });
});
