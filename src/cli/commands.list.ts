import { writeFile } from "node:fs/promises";
import { resolveGitHubToken, type ResolveGitHubTokenOptions, type ResolvedToken } from "../auth/token.js";
import { loadConfigWithMetadata, type LoadConfigOptions, type LoadedRepoMirrorConfig } from "../config/load.js";
import { AuthError, FilesystemError, toErrorMessage } from "../errors/index.js";
import { OctokitHostingClient, type HostingClient, type OctokitHostingClientOptions } from "../github/client.js";
import { collectOrganizationRepositories, selectCloneUrl } from "../github/lister.js";
import { logger } from "../logging/logger.js";
import type { ReferenceProtocol } from "../repo/reference.js";
import type { CommandResult } from "../types/index.js";
import { readFlagValue } from "./args.js";

export interface ListCommandArgs {
  organization?: string;
  output?: string;
  token?: string;
  protocol?: ReferenceProtocol;
  includeArchived?: boolean;
  configPath?: string;
}

export interface ListCommandDeps {
  loadConfig: (options: LoadConfigOptions) => Promise<LoadedRepoMirrorConfig>;
  resolveToken: (env: Record<string, string | undefined>, options: ResolveGitHubTokenOptions) => Promise<ResolvedToken | undefined>;
  createHostingClient: (options: OctokitHostingClientOptions) => HostingClient;
  writeFile: (path: string, content: string) => Promise<void>;
  startLoading: (message: string) => () => void;
}

const defaultDeps: ListCommandDeps = {
  loadConfig: loadConfigWithMetadata,
  resolveToken: resolveGitHubToken,
  createHostingClient: (options) => new OctokitHostingClient(options),
  writeFile: (path, content) => writeFile(path, content, "utf8"),
  startLoading: (message) => logger.startLoading(message)
};

export async function runListCommand(args: string[], deps: ListCommandDeps = defaultDeps): Promise<CommandResult> {
  const parsed = parseListArgs(args);
  const loaded = await deps.loadConfig({ configPath: parsed.configPath });
  const { config } = loaded;

  const organization = parsed.organization ?? config.github.organization;
  if (organization.trim() === "") {
    throw new Error("Missing organization: pass --org, set ORGANIZATION, or set github.organization in the config file.");
  }

  const resolvedToken = await deps.resolveToken(loaded.env, { flagValue: parsed.token });
  if (!resolvedToken) {
    throw new AuthError("A GitHub token is required to list organization repositories.");
  }
  logger.verbose(`Using GitHub token from ${resolvedToken.source}.`);

  const client = deps.createHostingClient({ token: resolvedToken.token, baseUrl: config.github.api_url });
  const protocol = parsed.protocol ?? config.list.protocol;

  const stopLoading = deps.startLoading(`Listing repositories of '${organization}'...`);
  const repositories = await collectOrganizationRepositories(client, organization, {
    exclude: config.list.exclude,
    includeArchived: parsed.includeArchived ?? config.list.include_archived,
    onPage: (pageNumber, pageSize) => logger.verbose(`Fetched page ${pageNumber} (${pageSize} repositories).`)
  }).finally(stopLoading);

  const urls = repositories.map((repository) => selectCloneUrl(repository, protocol));

  if (parsed.output) {
    const content = urls.length === 0 ? "" : `${urls.join("\n")}\n`;
    try {
      await deps.writeFile(parsed.output, content);
    } catch (error) {
      throw new FilesystemError(parsed.output, `Cannot write repository list to '${parsed.output}': ${toErrorMessage(error)}`, error);
    }

    return {
      message: `Saved ${urls.length} repository URL(s) of '${organization}' to ${parsed.output}.`,
      exitCode: 0
    };
  }

  if (urls.length === 0) {
    return {
      message: `No repositories found for organization '${organization}'.`,
      exitCode: 0
    };
  }

  return {
    message: `Found ${urls.length} repository URL(s) of '${organization}'.`,
    stdout: `${urls.join("\n")}\n`,
    exitCode: 0
  };
}

export function parseListArgs(args: string[]): ListCommandArgs {
  const parsed: ListCommandArgs = {};

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];

    switch (token) {
      case "--org":
        parsed.organization = readFlagValue(args, index, token);
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
      case "--protocol": {
        const value = readFlagValue(args, index, token);
        if (value !== "ssh" && value !== "https") {
          throw new Error("Invalid value for --protocol. Expected one of ssh|https.");
        }
        parsed.protocol = value;
        index += 1;
        break;
      }
      case "--archived":
        parsed.includeArchived = true;
        break;
      case "--no-archived":
        parsed.includeArchived = false;
        break;
      default:
        throw new Error(`Unknown option for list: ${token}.`);
    }
  }

  return parsed;
}
