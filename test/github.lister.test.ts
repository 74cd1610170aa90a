import { describe, expect, it, vi } from "vitest";
import { RateLimitError } from "../src/errors/index.js";
import type { HostingClient, RemoteRepository } from "../src/github/client.js";
import {
  collectOrganizationRepositories,
  listOrganizationRepositories,
  selectCloneUrl
} from "../src/github/lister.js";

function remote(name: string, overrides: Partial<RemoteRepository> = {}): RemoteRepository {
  return {
    owner: "acme",
    name,
    sshUrl: `git@github.com:acme/${name}.git`,
    httpsUrl: `https://github.com/acme/${name}.git`,
    defaultBranch: "main",
    archived: false,
    private: false,
    ...overrides
  };
}

function createClient(pages: RemoteRepository[][], failAfterPage?: Error): HostingClient {
  return {
    async *listRepositoryPages() {
      for (const page of pages) {
        yield page;
      }
      if (failAfterPage) {
        throw failAfterPage;
      }
    }
  };
}

describe("listOrganizationRepositories", () => {
  it("yields every repository of every page in order", async () => {
    const client = createClient([[remote("alpha"), remote("beta")], [remote("gamma")], []]);

    const repositories = await collectOrganizationRepositories(client, "acme");

    expect(repositories.map((repository) => repository.name)).toEqual(["alpha", "beta", "gamma"]);
  });

  it("reports each page as it arrives", async () => {
    const onPage = vi.fn();
    const client = createClient([[remote("alpha"), remote("beta")], [remote("gamma")]]);

    await collectOrganizationRepositories(client, "acme", { onPage });

    expect(onPage.mock.calls).toEqual([
      [1, 2],
      [2, 1]
    ]);
  });

  it("drops excluded names case-insensitively and optionally archived repositories", async () => {
    const client = createClient([[remote("Alpha"), remote("legacy", { archived: true }), remote("gamma")]]);

    const withArchived = await collectOrganizationRepositories(client, "acme", { exclude: ["alpha"] });
    const withoutArchived = await collectOrganizationRepositories(client, "acme", {
      exclude: ["alpha"],
      includeArchived: false
    });

    expect(withArchived.map((repository) => repository.name)).toEqual(["legacy", "gamma"]);
    expect(withoutArchived.map((repository) => repository.name)).toEqual(["gamma"]);
  });

  it("returns an empty list for an organization without repositories", async () => {
    await expect(collectOrganizationRepositories(createClient([[]]), "acme")).resolves.toEqual([]);
  });

  it("rejects when a later page fails after yielding earlier ones", async () => {
    const failure = new RateLimitError("GitHub API rate limit exceeded while listing 'acme'.");
    const client = createClient([[remote("alpha")]], failure);
    const seen: string[] = [];

    const iterate = async () => {
      for await (const repository of listOrganizationRepositories(client, "acme")) {
        seen.push(repository.name);
      }
    };

    await expect(iterate()).rejects.toBe(failure);
    expect(seen).toEqual(["alpha"]);
    await expect(collectOrganizationRepositories(client, "acme")).rejects.toBe(failure);
  });
});

describe("selectCloneUrl", () => {
  it("picks the url matching the protocol", () => {
    const repository = remote("alpha");

    expect(selectCloneUrl(repository, "ssh")).toBe("git@github.com:acme/alpha.git");
    expect(selectCloneUrl(repository, "https")).toBe("https://github.com/acme/alpha.git");
  });
});
