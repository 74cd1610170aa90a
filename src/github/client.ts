import { Octokit } from "@octokit/rest";
import { AuthError, NetworkError, NotFoundError, RateLimitError, toErrorMessage } from "../errors/index.js";
import { logger } from "../logging/logger.js";

export interface RemoteRepository {
  owner: string;
  name: string;
  sshUrl: string;
  httpsUrl: string;
  defaultBranch: string | undefined;
  archived: boolean;
  private: boolean;
}

/**
 * The slice of the hosting API the lister needs. Each yielded array is one API page.
 */
export interface HostingClient {
  listRepositoryPages(organization: string): AsyncIterable<RemoteRepository[]>;
}

export interface OctokitHostingClientOptions {
  token: string;
  baseUrl?: string;
  userAgent?: string;
  perPage?: number;
  /** Replaces the global fetch used by Octokit. */
  fetch?: typeof fetch;
}

type OrgRepository = Awaited<ReturnType<Octokit["rest"]["repos"]["listForOrg"]>>["data"][number];

const DEFAULT_PER_PAGE = 100;
const GITHUB_API_VERSION = "2022-11-28";

export class OctokitHostingClient implements HostingClient {
  private readonly octokit: Octokit;
  private readonly perPage: number;

  constructor(options: OctokitHostingClientOptions) {
    this.octokit = new Octokit({
      auth: options.token,
      baseUrl: options.baseUrl,
      userAgent: options.userAgent ?? "repo-mirror",
      request: options.fetch ? { fetch: options.fetch } : undefined,
      log: {
        debug: () => {},
        info: (message: string) => logger.verbose(message),
        warn: (message: string) => logger.warn(message),
        error: (message: string) => logger.verbose(message)
      }
    });
    this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
  }

  async *listRepositoryPages(organization: string): AsyncGenerator<RemoteRepository[]> {
    const pages = this.octokit.paginate.iterator(this.octokit.rest.repos.listForOrg, {
      org: organization,
      type: "all",
      per_page: this.perPage,
      headers: { "X-GitHub-Api-Version": GITHUB_API_VERSION }
    });

    try {
      for await (const page of pages) {
        yield page.data.map((repo) => toRemoteRepository(repo, organization));
      }
    } catch (error) {
      throw toHostingError(error, organization);
    }
  }
}

export function toRemoteRepository(repo: OrgRepository, organization: string): RemoteRepository {
  const owner = repo.owner.login || organization;
  return {
    owner,
    name: repo.name,
    sshUrl: repo.ssh_url ?? `git@github.com:${owner}/${repo.name}.git`,
    httpsUrl: repo.clone_url ?? `https://github.com/${owner}/${repo.name}.git`,
    defaultBranch: repo.default_branch,
    archived: repo.archived ?? false,
    private: repo.private
  };
}

/**
 * Maps an Octokit request failure onto the lister's error kinds.
 */
export function toHostingError(error: unknown, organization: string): Error {
  const status = getStatus(error);
  const message = toErrorMessage(error, "GitHub API request failed");

  if (status === undefined) {
    return new NetworkError(`Cannot reach the GitHub API: ${message}`, error);
  }

  if (status === 401) {
    return new AuthError(`GitHub rejected the token (401): ${message}`, error);
  }

  if (status === 429 || (status === 403 && isRateLimited(error, message))) {
    return new RateLimitError(
      `GitHub API rate limit exceeded while listing '${organization}'.`,
      getRateLimitReset(error),
      error
    );
  }

  if (status === 403) {
    return new AuthError(`Token is not allowed to list repositories of '${organization}' (403): ${message}`, error);
  }

  if (status === 404) {
    return new NotFoundError(`Organization '${organization}'`, error);
  }

  return new NetworkError(`GitHub API responded with ${status}: ${message}`, error);
}

function isRateLimited(error: unknown, message: string): boolean {
  return getHeader(error, "x-ratelimit-remaining") === "0" || /rate limit/i.test(message);
}

function getRateLimitReset(error: unknown): Date | undefined {
  const reset = Number(getHeader(error, "x-ratelimit-reset"));
  if (!Number.isFinite(reset) || reset <= 0) {
    return undefined;
  }
  return new Date(reset * 1000);
}

function getStatus(error: unknown): number | undefined {
  if (!isRecord(error) || typeof error.status !== "number") {
    return undefined;
  }
  return error.status;
}

function getHeader(error: unknown, name: string): string | undefined {
  if (!isRecord(error) || !isRecord(error.response) || !isRecord(error.response.headers)) {
    return undefined;
  }

  const value = error.response.headers[name];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
