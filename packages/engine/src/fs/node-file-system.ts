import { access, chmod, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import fg from "fast-glob";

import type { FileSystemPort, WriteTextOptions } from "@iamspec/contracts";

import { fail, sourceNotFound } from "../errors.js";
import { dedupeStrings } from "../utils.js";

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const pathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

const expandPattern = async (baseDir: string, pattern: string): Promise<ReadonlyArray<string>> => {
  const matches = await fg(pattern, { cwd: baseDir, absolute: true, onlyFiles: true });
  if (matches.length > 0) {
    return [...matches].sort();
  }
  const literal = resolve(baseDir, pattern);
  return (await pathExists(literal)) ? [literal] : [];
};

export const createNodeFileSystem = (): FileSystemPort => ({
  async readText(path) {
    try {
      return await readFile(path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return fail(sourceNotFound(path, "file"));
      }
      throw error;
    }
  },
  exists: pathExists,
  async expandPatterns(baseDir, patterns) {
    const expanded: string[] = [];
    for (const pattern of patterns) {
      expanded.push(...(await expandPattern(baseDir, pattern)));
    }
    return dedupeStrings(expanded);
  },
  async writeText(path: string, contents: string, options: WriteTextOptions = {}) {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, contents, { encoding: "utf8", mode: options.mode });
    // `mode` only applies when the file is created.
    if (options.mode !== undefined) {
      await chmod(path, options.mode);
    }
  },
});
