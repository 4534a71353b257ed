#!/usr/bin/env node
import { homedir } from "node:os";
import { stdin, stdout } from "node:process";
import { createInterface } from "node:readline/promises";

import { synchronizeBookmarks } from "../sync/synchronize";
import { runCli } from "./program";

async function confirm(prompt: string): Promise<void> {
  const readline = createInterface({ input: stdin, output: stdout });

  try {
    await readline.question(`${prompt} `);
  } finally {
    readline.close();
  }
}

runCli(process.argv.slice(2), {
  env: process.env,
  homeDir: homedir(),
  logger: console,
  confirm,
  synchronize: (config) => synchronizeBookmarks(config)
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Unexpected failure", error);
    process.exitCode = 1;
  }
);
