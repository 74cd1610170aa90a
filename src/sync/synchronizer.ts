import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { FilesystemError, isErrnoException, toErrorMessage } from "../errors/index.js";
import type { BranchUpdateMode, VcsEngine } from "../git/engine.js";
import type { RepositoryReference } from "../repo/reference.js";

export type BranchStatus = "new" | "updated" | "failed" | "pruned";
export type BranchFailurePolicy = "warn" | "fail";
export type SyncAction = "clone" | "update";
export type DirectoryState = "missing" | "empty" | "populated";

export interface BranchRecord {
  name: string;
  status: BranchStatus;
  error?: string;
}

export interface ProcessingResult {
  reference: string;
  directory?: string;
  action?: SyncAction;
  status: "succeeded" | "failed";
  error?: string;
  branches: BranchRecord[];
  tags: string[];
  defaultBranch?: string;
}

export interface SyncPolicy {
  /** Delete local branches whose upstream branch no longer exists on the remote. */
  prune: boolean;
  updateMode: BranchUpdateMode;
  branchFailure: BranchFailurePolicy;
}

export type SyncEvent =
  | { type: "repo:start"; reference: string; directory: string }
  | { type: "repo:clone"; reference: string; url: string; directory: string }
  | { type: "repo:update"; reference: string; directory: string }
  | { type: "branch:new"; reference: string; branch: string }
  | { type: "branch:updated"; reference: string; branch: string }
  | { type: "branch:pruned"; reference: string; branch: string }
  | { type: "branch:failed"; reference: string; branch: string; error: string }
  | { type: "repo:checkout"; reference: string; branch: string }
  | { type: "repo:success"; reference: string; result: ProcessingResult }
  | { type: "repo:failure"; reference: string; result: ProcessingResult };

export interface SynchronizeRepositoryOptions extends Partial<SyncPolicy> {
  engine: VcsEngine;
  inspectDirectory?: (directory: string) => Promise<DirectoryState>;
  onEvent?: (event: SyncEvent) => void;
}

export const defaultSyncPolicy: SyncPolicy = {
  prune: false,
  updateMode: "fast-forward",
  branchFailure: "warn"
};

/**
 * Converges `<root>/<owner>_<name>` onto the remote. Never rejects: every failure
 * ends up in the returned result.
 */
export async function synchronizeRepository(
  reference: RepositoryReference,
  root: string,
  options: SynchronizeRepositoryOptions
): Promise<ProcessingResult> {
  const { engine } = options;
  const policy: SyncPolicy = {
    prune: options.prune ?? defaultSyncPolicy.prune,
    updateMode: options.updateMode ?? defaultSyncPolicy.updateMode,
    branchFailure: options.branchFailure ?? defaultSyncPolicy.branchFailure
  };
  const inspectDirectory = options.inspectDirectory ?? inspectLocalDirectory;
  const emit = (event: SyncEvent): void => options.onEvent?.(event);

  const directory = join(root, reference.directoryName);
  const label = reference.input;
  const branches: BranchRecord[] = [];
  let action: SyncAction | undefined;
  let tags: string[] = [];
  let defaultBranch: string | undefined;

  emit({ type: "repo:start", reference: label, directory });

  try {
    const state = await inspectDirectory(directory);
    if (state === "populated" && !(await engine.isRepository(directory))) {
      throw new FilesystemError(directory, `Directory '${directory}' exists but is not a git repository.`);
    }

    if (state === "populated") {
      action = "update";
      emit({ type: "repo:update", reference: label, directory });
      await engine.cleanWorkingTree(directory);
    } else {
      action = "clone";
      emit({ type: "repo:clone", reference: label, url: reference.cloneUrl, directory });
      await engine.clone(reference.cloneUrl, directory);
    }

    await engine.fetchAll(directory);

    const remoteBranches = await engine.listRemoteBranches(directory);
    const record = (entry: BranchRecord): void => {
      branches.push(entry);
      switch (entry.status) {
        case "new":
          emit({ type: "branch:new", reference: label, branch: entry.name });
          return;
        case "updated":
          emit({ type: "branch:updated", reference: label, branch: entry.name });
          return;
        case "pruned":
          emit({ type: "branch:pruned", reference: label, branch: entry.name });
          return;
        case "failed":
          emit({ type: "branch:failed", reference: label, branch: entry.name, error: entry.error ?? "unknown error" });
      }
    };

    await reconcileBranches(engine, directory, remoteBranches, policy.updateMode, record);

    tags = await engine.listRemoteTags(directory);
    defaultBranch = await engine.getDefaultBranch(directory);
    if (defaultBranch !== undefined) {
      await engine.checkout(directory, defaultBranch);
      emit({ type: "repo:checkout", reference: label, branch: defaultBranch });
    }

    if (policy.prune) {
      await pruneBranches(engine, directory, remoteBranches, defaultBranch, record);
    }
  } catch (error) {
    const result: ProcessingResult = {
      reference: label,
      directory,
      action,
      status: "failed",
      error: toErrorMessage(error),
      branches,
      tags,
      defaultBranch
    };
    emit({ type: "repo:failure", reference: label, result });
    return result;
  }

  const failedBranches = branches.filter((branch) => branch.status === "failed");
  if (policy.branchFailure === "fail" && failedBranches.length > 0) {
    const result: ProcessingResult = {
      reference: label,
      directory,
      action,
      status: "failed",
      error: `${failedBranches.length} branch(es) failed to update: ${failedBranches.map((branch) => branch.name).join(", ")}`,
      branches,
      tags,
      defaultBranch
    };
    emit({ type: "repo:failure", reference: label, result });
    return result;
  }

  const result: ProcessingResult = {
    reference: label,
    directory,
    action,
    status: "succeeded",
    branches,
    tags,
    defaultBranch
  };
  emit({ type: "repo:success", reference: label, result });
  return result;
}

async function reconcileBranches(
  engine: VcsEngine,
  directory: string,
  remoteBranches: string[],
  updateMode: BranchUpdateMode,
  record: (entry: BranchRecord) => void
): Promise<void> {
  const localBranches = await engine.listLocalBranches(directory);
  const localNames = new Set(localBranches.map((branch) => branch.name));

  for (const branch of remoteBranches) {
    const remoteRef = `${engine.remote}/${branch}`;
    try {
      if (localNames.has(branch)) {
        await engine.updateLocalBranch(directory, branch, remoteRef, updateMode);
        record({ name: branch, status: "updated" });
      } else {
        await engine.createTrackingBranch(directory, branch, remoteRef);
        record({ name: branch, status: "new" });
      }
    } catch (error) {
      record({ name: branch, status: "failed", error: toErrorMessage(error) });
    }
  }
}

async function pruneBranches(
  engine: VcsEngine,
  directory: string,
  remoteBranches: string[],
  defaultBranch: string | undefined,
  record: (entry: BranchRecord) => void
): Promise<void> {
  const remaining = new Set(remoteBranches);
  const upstreamPrefix = `${engine.remote}/`;
  const localBranches = await engine.listLocalBranches(directory);

  for (const branch of localBranches) {
    // Branches created outside this tool have no upstream on our remote and are left alone.
    if (branch.upstream === undefined || !branch.upstream.startsWith(upstreamPrefix)) {
      continue;
    }
    if (remaining.has(branch.upstream.slice(upstreamPrefix.length))) {
      continue;
    }
    if (branch.current || branch.name === defaultBranch) {
      continue;
    }

    try {
      await engine.deleteLocalBranch(directory, branch.name);
      record({ name: branch.name, status: "pruned" });
    } catch (error) {
      record({ name: branch.name, status: "failed", error: toErrorMessage(error) });
    }
  }
}

export async function inspectLocalDirectory(directory: string): Promise<DirectoryState> {
  try {
    const entries = await readdir(directory);
    return entries.length === 0 ? "empty" : "populated";
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return "missing";
    }
    throw new FilesystemError(directory, `Cannot inspect '${directory}': ${toErrorMessage(error)}`, error);
  }
}
