import { dirname } from "node:path";
import { CheckRepoActions, simpleGit, type SimpleGit } from "simple-git";
import { VersionControlError, toErrorMessage } from "../errors/index.js";

export type BranchUpdateMode = "fast-forward" | "reset";

export interface LocalBranch {
  name: string;
  /** Short upstream name such as `origin/dev`, when one is configured. */
  upstream: string | undefined;
  current: boolean;
}

/**
 * Version-control operations the synchronizer depends on. Every method rejects
 * with a `VersionControlError` when the underlying tool reports a failure.
 */
export interface VcsEngine {
  readonly remote: string;
  isRepository(directory: string): Promise<boolean>;
  clone(url: string, directory: string): Promise<void>;
  fetchAll(directory: string): Promise<void>;
  listRemoteBranches(directory: string): Promise<string[]>;
  listRemoteTags(directory: string): Promise<string[]>;
  listLocalBranches(directory: string): Promise<LocalBranch[]>;
  createTrackingBranch(directory: string, branch: string, remoteRef: string): Promise<void>;
  updateLocalBranch(directory: string, branch: string, remoteRef: string, mode: BranchUpdateMode): Promise<void>;
  deleteLocalBranch(directory: string, branch: string): Promise<void>;
  cleanWorkingTree(directory: string): Promise<void>;
  checkout(directory: string, branch: string): Promise<void>;
  getDefaultBranch(directory: string): Promise<string | undefined>;
}

export type GitClient = Pick<SimpleGit, "raw" | "clone" | "checkIsRepo">;

export interface SimpleGitEngineOptions {
  token?: string;
  /** Hosts that receive the token as an HTTP authorization header. */
  authHosts?: string[];
  remote?: string;
  createGit?: (baseDir: string, config: string[]) => GitClient;
}

const DEFAULT_REMOTE = "origin";
const BRANCH_FORMAT = "%(refname:strip=2)%09%(upstream:short)%09%(HEAD)";

export class SimpleGitEngine implements VcsEngine {
  readonly remote: string;
  private readonly config: string[];
  private readonly createGit: (baseDir: string, config: string[]) => GitClient;

  constructor(options: SimpleGitEngineOptions = {}) {
    this.remote = options.remote ?? DEFAULT_REMOTE;
    this.config = buildAuthConfig(options.token, options.authHosts ?? ["github.com"]);
    this.createGit = options.createGit ?? ((baseDir, config) => simpleGit({ baseDir, config }));
  }

  async isRepository(directory: string): Promise<boolean> {
    try {
      return await this.git(directory).checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
    } catch (error) {
      throw new VersionControlError("rev-parse", toErrorMessage(error), { cause: error });
    }
  }

  async clone(url: string, directory: string): Promise<void> {
    try {
      await this.git(dirname(directory)).clone(url, directory, ["--origin", this.remote]);
    } catch (error) {
      throw new VersionControlError("clone", toErrorMessage(error), { cause: error });
    }
  }

  async fetchAll(directory: string): Promise<void> {
    // Remote-tracking refs follow the remote. Tags the remote moved are moved too; local-only tags stay.
    await this.run(directory, "fetch", ["fetch", this.remote, "--prune"]);
    await this.run(directory, "fetch", ["fetch", this.remote, "--tags", "--force"]);
  }

  async listRemoteBranches(directory: string): Promise<string[]> {
    const output = await this.run(directory, "for-each-ref", [
      "for-each-ref",
      "--format=%(refname:strip=3)",
      `refs/remotes/${this.remote}`
    ]);
    return splitLines(output).filter((branch) => branch !== "HEAD");
  }

  async listRemoteTags(directory: string): Promise<string[]> {
    const output = await this.run(directory, "for-each-ref", ["for-each-ref", "--format=%(refname:strip=2)", "refs/tags"]);
    return splitLines(output);
  }

  async listLocalBranches(directory: string): Promise<LocalBranch[]> {
    const output = await this.run(directory, "for-each-ref", ["for-each-ref", `--format=${BRANCH_FORMAT}`, "refs/heads"]);
    return splitLines(output).map((line) => {
      const [name, upstream = "", head = ""] = line.split("\t");
      return {
        name,
        upstream: upstream === "" ? undefined : upstream,
        current: head.trim() === "*"
      };
    });
  }

  async createTrackingBranch(directory: string, branch: string, remoteRef: string): Promise<void> {
    await this.run(directory, "branch", ["branch", "--track", branch, remoteRef], branch);
  }

  async updateLocalBranch(directory: string, branch: string, remoteRef: string, mode: BranchUpdateMode): Promise<void> {
    const branches = await this.listLocalBranches(directory);
    const isCurrent = branches.some((entry) => entry.current && entry.name === branch);

    if (isCurrent) {
      const args = mode === "reset" ? ["reset", "--hard", remoteRef] : ["merge", "--ff-only", remoteRef];
      await this.run(directory, args[0], args, branch);
      return;
    }

    if (mode === "reset") {
      await this.run(directory, "branch", ["branch", "--force", branch, remoteRef], branch);
      return;
    }

    // A local fetch refuses non-fast-forward updates, which is what diverged history should produce.
    await this.run(directory, "fetch", ["fetch", ".", `refs/remotes/${remoteRef}:refs/heads/${branch}`], branch);
  }

  async deleteLocalBranch(directory: string, branch: string): Promise<void> {
    await this.run(directory, "branch", ["branch", "-D", branch], branch);
  }

  async cleanWorkingTree(directory: string): Promise<void> {
    await this.run(directory, "reset", ["reset", "--hard"]);
    await this.run(directory, "clean", ["clean", "-fd"]);
  }

  async checkout(directory: string, branch: string): Promise<void> {
    await this.run(directory, "checkout", ["checkout", branch], branch);
  }

  async getDefaultBranch(directory: string): Promise<string | undefined> {
    const remoteHead = await this.queryRemoteHead(directory);
    return remoteHead ?? (await this.readCachedRemoteHead(directory));
  }

  private async queryRemoteHead(directory: string): Promise<string | undefined> {
    try {
      const output = await this.git(directory).raw(["ls-remote", "--symref", this.remote, "HEAD"]);
      const match = /^ref:\s+refs\/heads\/(\S+)\s+HEAD$/m.exec(output);
      return match ? match[1] : undefined;
    } catch {
      return undefined;
    }
  }

  private async readCachedRemoteHead(directory: string): Promise<string | undefined> {
    try {
      const output = await this.git(directory).raw(["symbolic-ref", "--short", `refs/remotes/${this.remote}/HEAD`]);
      const ref = output.trim();
      const prefix = `${this.remote}/`;
      return ref.startsWith(prefix) ? ref.slice(prefix.length) : undefined;
    } catch {
      return undefined;
    }
  }

  private git(directory: string): GitClient {
    return this.createGit(directory, this.config);
  }

  private async run(directory: string, operation: string, args: string[], branch?: string): Promise<string> {
    try {
      return await this.git(directory).raw(args);
    } catch (error) {
      throw new VersionControlError(operation, toErrorMessage(error), { branch, cause: error });
    }
  }
}

export function buildAuthConfig(token: string | undefined, hosts: string[]): string[] {
  const trimmed = token?.trim();
  if (!trimmed) {
    return [];
  }

  const credentials = Buffer.from(`x-access-token:${trimmed}`, "utf8").toString("base64");
  return hosts.map((host) => `http.https://${host}/.extraheader=AUTHORIZATION: basic ${credentials}`);
}

function splitLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}
