import { readFile, writeFile } from "node:fs/promises";

import { classifyFsError } from "../domain/errors";

export async function readNativeFile(path: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    throw classifyFsError(error, path, "io");
  }
}

export async function writeNativeFile(path: string, contents: string): Promise<void> {
  try {
    await writeFile(path, contents, "utf8");
  } catch (error) {
    throw classifyFsError(error, path, "write");
  }
}
