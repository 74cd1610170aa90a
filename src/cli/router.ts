import { isHelpFlag } from "./args.js";
import type { CliCommandName } from "../types/index.js";

export interface ResolvedCliCommand {
  command: CliCommandName;
  args: string[];
}

export interface GlobalCliOptions {
  args: string[];
  verbose: boolean;
}

const commands: readonly CliCommandName[] = ["list", "sync", "help"];

export function parseGlobalCliOptions(argv: string[]): GlobalCliOptions {
  let verbose = false;
  const args: string[] = [];

  for (const token of argv) {
    if (token === "--verbose") {
      verbose = true;
      continue;
    }

    args.push(token);
  }

  return { args, verbose };
}

export function resolveCliCommand(argv: string[]): ResolvedCliCommand {
  const [first, ...rest] = argv;

  if (!first || isHelpFlag(first)) {
    return { command: "help", args: [] };
  }

  const command = commands.find((candidate) => candidate === first);
  if (command) {
    return { command, args: rest };
  }

  throw new Error(`Unknown command: ${first}. Use --help for usage.`);
}

export function renderHelp(): string {
  return [
    "repo-mirror CLI",
    "",
    "Usage:",
    "  repo-mirror <command> [options]",
    "",
    "Config resolution:",
    "  --config <path> -> ./repo-mirror.config.toml -> user config repo-mirror.config.toml -> defaults",
    "  .env in the current directory is read; process env wins over it",
    "",
    "Commands:",
    "  list     List clone URLs of every repository in a GitHub organization",
    "  sync     Clone or update every repository listed in a file",
    "",
    "list options:",
    "  --org <name>              Organization (or ORGANIZATION)",
    "  --output <file>           Write URLs to a file instead of stdout",
    "  --protocol <ssh|https>    Clone URL protocol",
    "  --archived | --no-archived  Include or skip archived repositories",
    "",
    "sync options:",
    "  --input <file>            Repository list, one reference per line (# comments allowed)",
    "  --output <dir>            Destination root directory",
    "  --clean                   Delete the destination root before syncing",
    "  --prune | --no-prune      Delete local branches whose remote branch is gone",
    "  --update-mode <mode>      fast-forward|reset",
    "  --branch-failure <mode>   warn|fail: whether a failed branch fails its repository",
    "  --no-log-file             Do not write a log file",
    "",
    "Common options:",
    "  --token <token>           GitHub token (or GITHUB_TOKEN, GH_TOKEN, gh auth token)",
    "  --config <path>           Config file to load",
    "  --verbose                 Show every git step",
    "  -h, --help                Show help"
  ].join("\n");
}
