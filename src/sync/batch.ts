import { mkdir, rm } from "node:fs/promises";
import { FilesystemError, ParseError, toErrorMessage } from "../errors/index.js";
import type { VcsEngine } from "../git/engine.js";
import type { RepositoryListEntry } from "../repo/input.js";
import { parseRepositoryReference, type RepositoryReference } from "../repo/reference.js";
import {
  synchronizeRepository,
  type DirectoryState,
  type ProcessingResult,
  type SyncEvent,
  type SyncPolicy
} from "./synchronizer.js";

export interface BatchResult {
  success: boolean;
  succeeded: number;
  failed: number;
  results: ProcessingResult[];
}

export type BatchEvent =
  | SyncEvent
  | { type: "batch:clean"; outputDir: string }
  | { type: "batch:start"; outputDir: string; total: number }
  | { type: "entry:start"; index: number; total: number; line: number; value: string }
  | { type: "entry:invalid"; line: number; value: string; error: string }
  | { type: "batch:complete"; succeeded: number; failed: number };

export interface BatchFileSystem {
  removeDirectory: (path: string) => Promise<void>;
  ensureDirectory: (path: string) => Promise<void>;
}

export interface RunSyncBatchOptions extends Partial<SyncPolicy> {
  outputDir: string;
  engine: VcsEngine;
  /** Remove the whole output directory before processing. */
  clean?: boolean;
  fileSystem?: BatchFileSystem;
  inspectDirectory?: (directory: string) => Promise<DirectoryState>;
  onEvent?: (event: BatchEvent) => void;
}

const localFileSystem: BatchFileSystem = {
  removeDirectory: async (path) => {
    await rm(path, { recursive: true, force: true });
  },
  ensureDirectory: async (path) => {
    await mkdir(path, { recursive: true });
  }
};

export async function runSyncBatch(entries: RepositoryListEntry[], options: RunSyncBatchOptions): Promise<BatchResult> {
  const fileSystem = options.fileSystem ?? localFileSystem;
  const emit = (event: BatchEvent): void => options.onEvent?.(event);

  if (options.clean) {
    emit({ type: "batch:clean", outputDir: options.outputDir });
    try {
      await fileSystem.removeDirectory(options.outputDir);
    } catch (error) {
      throw new FilesystemError(options.outputDir, `Cannot remove '${options.outputDir}': ${toErrorMessage(error)}`, error);
    }
  }

  try {
    await fileSystem.ensureDirectory(options.outputDir);
  } catch (error) {
    throw new FilesystemError(options.outputDir, `Cannot create '${options.outputDir}': ${toErrorMessage(error)}`, error);
  }

  emit({ type: "batch:start", outputDir: options.outputDir, total: entries.length });

  const results: ProcessingResult[] = [];
  for (const [index, entry] of entries.entries()) {
    emit({ type: "entry:start", index: index + 1, total: entries.length, line: entry.line, value: entry.value });

    const parsed = parseEntry(entry);
    if (parsed instanceof ParseError) {
      const message = `line ${entry.line}: ${parsed.message}`;
      emit({ type: "entry:invalid", line: entry.line, value: entry.value, error: message });
      results.push({
        reference: entry.value,
        status: "failed",
        error: message,
        branches: [],
        tags: []
      });
      continue;
    }

    results.push(
      await synchronizeRepository(parsed, options.outputDir, {
        engine: options.engine,
        prune: options.prune,
        updateMode: options.updateMode,
        branchFailure: options.branchFailure,
        inspectDirectory: options.inspectDirectory,
        onEvent: emit
      })
    );
  }

  const succeeded = results.filter((result) => result.status === "succeeded").length;
  const failed = results.length - succeeded;
  emit({ type: "batch:complete", succeeded, failed });

  return {
    success: failed === 0,
    succeeded,
    failed,
    results
  };
}

function parseEntry(entry: RepositoryListEntry): RepositoryReference | ParseError {
  try {
    return parseRepositoryReference(entry.value);
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
}
