import { execFile } from "node:child_process";

export type TokenSource = "flag" | "GITHUB_TOKEN" | "GH_TOKEN" | "gh";

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

export interface ResolveGitHubTokenOptions {
  /** Value of `--token`, which wins over every other source. */
  flagValue?: string;
  /** Set to false to skip asking the GitHub CLI. */
  useGhCli?: boolean;
  execCommand?: (command: string, args: string[]) => Promise<{ stdout?: string }>;
}

const tokenEnvPriority = ["GITHUB_TOKEN", "GH_TOKEN"] as const;

export async function resolveGitHubToken(
  env: Record<string, string | undefined>,
  options: ResolveGitHubTokenOptions = {}
): Promise<ResolvedToken | undefined> {
  const flagToken = normalizeToken(options.flagValue);
  if (flagToken) {
    return { token: flagToken, source: "flag" };
  }

  for (const key of tokenEnvPriority) {
    const value = normalizeToken(env[key]);
    if (value) {
      return { token: value, source: key };
    }
  }

  if (options.useGhCli === false) {
    return undefined;
  }

  const runCommand = options.execCommand ?? runLocalCommand;
  try {
    const result = await runCommand("gh", ["auth", "token"]);
    const ghToken = normalizeToken(result.stdout);
    return ghToken ? { token: ghToken, source: "gh" } : undefined;
  } catch {
    return undefined;
  }
}

function normalizeToken(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed === "" ? undefined : trimmed;
}

async function runLocalCommand(command: string, args: string[]): Promise<{ stdout?: string }> {
  return new Promise((resolvePromise, rejectPromise) => {
    execFile(
      command,
      args,
      {
        encoding: "utf8",
        timeout: 10_000,
        maxBuffer: 1024 * 1024
      },
      (error, stdout) => {
        if (error) {
          rejectPromise(error);
          return;
        }

        resolvePromise({ stdout });
      }
    );
  });
}
