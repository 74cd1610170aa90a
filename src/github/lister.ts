import type { ReferenceProtocol } from "../repo/reference.js";
import type { HostingClient, RemoteRepository } from "./client.js";

export interface ListOrganizationOptions {
  exclude?: string[];
  includeArchived?: boolean;
  onPage?: (pageNumber: number, pageSize: number) => void;
}

/**
 * Lazily walks every page of the organization's repositories. A failing page
 * rejects the iteration; nothing already yielded should be treated as complete.
 */
export async function* listOrganizationRepositories(
  client: HostingClient,
  organization: string,
  options: ListOrganizationOptions = {}
): AsyncGenerator<RemoteRepository> {
  const excluded = new Set((options.exclude ?? []).map((name) => name.toLowerCase()));
  const includeArchived = options.includeArchived ?? true;
  let pageNumber = 0;

  for await (const page of client.listRepositoryPages(organization)) {
    pageNumber += 1;
    options.onPage?.(pageNumber, page.length);

    for (const repository of page) {
      if (excluded.has(repository.name.toLowerCase())) {
        continue;
      }
      if (!includeArchived && repository.archived) {
        continue;
      }
      yield repository;
    }
  }
}

export async function collectOrganizationRepositories(
  client: HostingClient,
  organization: string,
  options: ListOrganizationOptions = {}
): Promise<RemoteRepository[]> {
  const repositories: RemoteRepository[] = [];
  for await (const repository of listOrganizationRepositories(client, organization, options)) {
    repositories.push(repository);
  }
  return repositories;
}

export function selectCloneUrl(repository: RemoteRepository, protocol: ReferenceProtocol): string {
  return protocol === "ssh" ? repository.sshUrl : repository.httpsUrl;
}
