import { readFile } from "node:fs/promises";
import { FilesystemError, isErrnoException, toErrorMessage } from "../errors/index.js";

export interface RepositoryListEntry {
  line: number;
  value: string;
}

export function parseRepositoryList(source: string): RepositoryListEntry[] {
  const entries: RepositoryListEntry[] = [];

  source.split(/\r?\n/).forEach((rawLine, index) => {
    const value = rawLine.trim();
    if (value === "" || value.startsWith("#")) {
      return;
    }
    entries.push({ line: index + 1, value });
  });

  return entries;
}

export async function readRepositoryList(path: string): Promise<RepositoryListEntry[]> {
  let source: string;
  try {
    source = await readFile(path, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new FilesystemError(path, `Cannot read repository list at '${path}': file does not exist.`, error);
    }
    throw new FilesystemError(path, `Cannot read repository list at '${path}': ${toErrorMessage(error)}`, error);
  }

  return parseRepositoryList(source);
}
