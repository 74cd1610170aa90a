import { resolve } from "node:path";
import { resolveGitHubToken, type ResolveGitHubTokenOptions, type ResolvedToken } from "../auth/token.js";
import { loadConfigWithMetadata, type LoadConfigOptions, type LoadedRepoMirrorConfig } from "../config/load.js";
import { SimpleGitEngine, type BranchUpdateMode, type SimpleGitEngineOptions, type VcsEngine } from "../git/engine.js";
import { closeLogFile, logger, openLogFile } from "../logging/logger.js";
import { readRepositoryList, type RepositoryListEntry } from "../repo/input.js";
import { runSyncBatch, type BatchEvent, type BatchResult, type RunSyncBatchOptions } from "../sync/batch.js";
import { formatBatchTotals, formatProcessingResult } from "../sync/summary.js";
import type { BranchFailurePolicy } from "../sync/synchronizer.js";
import type { CommandResult } from "../types/index.js";
import { readFlagValue } from "./args.js";

export interface SyncCommandArgs {
  input?: string;
  output?: string;
  token?: string;
  configPath?: string;
  clean: boolean;
  prune?: boolean;
  updateMode?: BranchUpdateMode;
  branchFailure?: BranchFailurePolicy;
  logFile?: boolean;
}

export interface SyncCommandDeps {
  loadConfig: (options: LoadConfigOptions) => Promise<LoadedRepoMirrorConfig>;
  resolveToken: (env: Record<string, string | undefined>, options: ResolveGitHubTokenOptions) => Promise<ResolvedToken | undefined>;
  readRepositoryList: (path: string) => Promise<RepositoryListEntry[]>;
  createEngine: (options: SimpleGitEngineOptions) => VcsEngine;
  runSyncBatch: (entries: RepositoryListEntry[], options: RunSyncBatchOptions) => Promise<BatchResult>;
  openLogFile: (directory: string) => Promise<string>;
  closeLogFile: () => Promise<void>;
}

const defaultDeps: SyncCommandDeps = {
  loadConfig: loadConfigWithMetadata,
  resolveToken: resolveGitHubToken,
  readRepositoryList,
  createEngine: (options) => new SimpleGitEngine(options),
  runSyncBatch,
  openLogFile: (directory) => openLogFile(directory),
  closeLogFile
};

export async function runSyncCommand(args: string[], deps: SyncCommandDeps = defaultDeps): Promise<CommandResult> {
  const parsed = parseSyncArgs(args);
  if (!parsed.input) {
    throw new Error("Missing --input <file>: a file with one repository reference per line is required.");
  }

  const loaded = await deps.loadConfig({ configPath: parsed.configPath });
  const { config } = loaded;
  const outputDir = resolve(parsed.output ?? config.sync.output_dir);

  const writeLogFile = parsed.logFile ?? config.logging.file;
  if (writeLogFile) {
    const logPath = await deps.openLogFile(config.logging.dir);
    logger.info(`Writing log to ${logPath}`);
  }

  try {
    logger.info(`Input file: ${parsed.input}`);
    logger.info(`Output directory: ${outputDir}`);
    logger.verbose(`Clean mode: ${parsed.clean}`);

    // Optional for sync; the gh CLI is not consulted.
    const resolvedToken = await deps.resolveToken(loaded.env, { flagValue: parsed.token, useGhCli: false });
    if (resolvedToken) {
      logger.info(`Using GitHub token from ${resolvedToken.source} for HTTPS remotes.`);
    } else {
      logger.warn("No GitHub token provided: private HTTPS repositories will fail to clone.");
    }

    const entries = await deps.readRepositoryList(parsed.input);
    logger.info(`Found ${entries.length} repository reference(s) to process.`);

    const engine = deps.createEngine({
      token: resolvedToken?.token,
      authHosts: config.github.auth_hosts
    });

    const batch = await deps.runSyncBatch(entries, {
      outputDir,
      engine,
      clean: parsed.clean,
      prune: parsed.prune ?? config.sync.prune,
      updateMode: parsed.updateMode ?? config.sync.update_mode,
      branchFailure: parsed.branchFailure ?? config.sync.branch_failure,
      onEvent: logBatchEvent
    });

    for (const line of batch.results.flatMap(formatProcessingResult)) {
      logger.info(line);
    }

    return {
      message: formatBatchTotals(batch),
      exitCode: batch.success ? 0 : 1
    };
  } finally {
    if (writeLogFile) {
      await deps.closeLogFile();
    }
  }
}

export function logBatchEvent(event: BatchEvent): void {
  switch (event.type) {
    case "batch:clean":
      logger.info(`Clean mode enabled: removing ${event.outputDir}`);
      return;
    case "batch:start":
      logger.info(`Processing ${event.total} repositories into ${event.outputDir}`);
      return;
    case "entry:start":
      logger.info(`[${event.index}/${event.total}] ${event.value}`);
      return;
    case "entry:invalid":
      logger.error(`Skipping ${event.error}`);
      return;
    case "repo:start":
      logger.verbose(`Local directory: ${event.directory}`);
      return;
    case "repo:clone":
      logger.info(`Not present locally, cloning ${event.url}`);
      return;
    case "repo:update":
      logger.info("Present locally, cleaning working tree and fetching");
      return;
    case "branch:new":
      logger.verbose(`Created local branch ${event.branch}`);
      return;
    case "branch:updated":
      logger.verbose(`Updated branch ${event.branch}`);
      return;
    case "branch:pruned":
      logger.info(`Pruned branch ${event.branch} (deleted on remote)`);
      return;
    case "branch:failed":
      logger.warn(`Branch ${event.branch} failed: ${event.error}`);
      return;
    case "repo:checkout":
      logger.verbose(`Checked out default branch ${event.branch}`);
      return;
    case "repo:success": {
      const counts = countBranches(event.result.branches.map((branch) => branch.status));
      logger.info(`Done: ${counts}`);
      return;
    }
    case "repo:failure":
      logger.error(`Failed ${event.reference}: ${event.result.error ?? "unknown error"}`);
      return;
    case "batch:complete":
      logger.info(`Finished: ${event.succeeded} succeeded, ${event.failed} failed.`);
      return;
  }
}

function countBranches(statuses: string[]): string {
  if (statuses.length === 0) {
    return "no branches";
  }

  const counts = new Map<string, number>();
  for (const status of statuses) {
    counts.set(status, (counts.get(status) ?? 0) + 1);
  }
  return [...counts.entries()].map(([status, count]) => `${count} ${status}`).join(", ");
}

export function parseSyncArgs(args: string[]): SyncCommandArgs {
  const parsed: SyncCommandArgs = { clean: false };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];

    switch (token) {
      case "--input":
        parsed.input = readFlagValue(args, index, token);
        index += 1;
        break;
      case "--output":
        parsed.output = readFlagValue(args, index, token);
        index += 1;
        break;
      case "--token":
        parsed.token = readFlagValue(args, index, token);
        index += 1;
        break;
      case "--config":
        parsed.configPath = readFlagValue(args, index, token);
        index += 1;
        break;
      case "--clean":
        parsed.clean = true;
        break;
      case "--prune":
        parsed.prune = true;
        break;
      case "--no-prune":
        parsed.prune = false;
        break;
      case "--no-log-file":
        parsed.logFile = false;
        break;
      case "--update-mode": {
        const value = readFlagValue(args, index, token);
        if (value !== "fast-forward" && value !== "reset") {
          throw new Error("Invalid value for --update-mode. Expected one of fast-forward|reset.");
        }
        parsed.updateMode = value;
        index += 1;
        break;
      }
      case "--branch-failure": {
        const value = readFlagValue(args, index, token);
        if (value !== "warn" && value !== "fail") {
          throw new Error("Invalid value for --branch-failure. Expected one of warn|fail.");
        }
        parsed.branchFailure = value;
        index += 1;
        break;
      }
      default:
        throw new Error(`Unknown option for sync: ${token}.`);
    }
  }

  return parsed;
}
