import { ParseError } from "../errors/index.js";

export type ReferenceProtocol = "ssh" | "https";

export interface RepositoryReference {
  /** The string the reference was parsed from, trimmed. */
  input: string;
  protocol: ReferenceProtocol;
  host: string;
  owner: string;
  name: string;
  cloneUrl: string;
  directoryName: string;
}

const SCP_LIKE_PATTERN = /^(?:([A-Za-z0-9._-]+)@)?([A-Za-z0-9.-]+):(.*)$/;
// GitHub account name rules (no underscores), which keeps owner_name unambiguous.
const OWNER_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?$/;
const NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

export function parseRepositoryReference(value: string): RepositoryReference {
  const input = value.trim();
  if (input === "") {
    throw new ParseError(value, "reference is empty");
  }

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(input)) {
    return parseUrlReference(input);
  }

  const match = SCP_LIKE_PATTERN.exec(input);
  if (!match) {
    throw new ParseError(input, "expected git@<host>:<owner>/<name>.git or https://<host>/<owner>/<name>.git");
  }

  const [, user, host, path] = match;
  const { owner, name } = parseOwnerAndName(input, path);
  const normalizedHost = host.toLowerCase();

  return {
    input,
    protocol: "ssh",
    host: normalizedHost,
    owner,
    name,
    cloneUrl: `${user ?? "git"}@${normalizedHost}:${owner}/${name}.git`,
    directoryName: toDirectoryName(owner, name)
  };
}

export function toDirectoryName(owner: string, name: string): string {
  return `${owner}_${name}`;
}

function parseUrlReference(input: string): RepositoryReference {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    throw new ParseError(input, "not a valid URL");
  }

  if (url.hostname === "") {
    throw new ParseError(input, "missing host");
  }

  const { owner, name } = parseOwnerAndName(input, url.pathname);

  if (url.protocol === "https:") {
    return {
      input,
      protocol: "https",
      host: url.hostname,
      owner,
      name,
      cloneUrl: `https://${url.host}/${owner}/${name}.git`,
      directoryName: toDirectoryName(owner, name)
    };
  }

  if (url.protocol === "ssh:") {
    const user = url.username === "" ? "git" : url.username;
    return {
      input,
      protocol: "ssh",
      host: url.hostname,
      owner,
      name,
      cloneUrl: `ssh://${user}@${url.host}/${owner}/${name}.git`,
      directoryName: toDirectoryName(owner, name)
    };
  }

  throw new ParseError(input, `unsupported scheme '${url.protocol.replace(/:$/, "")}' (expected ssh or https)`);
}

function parseOwnerAndName(input: string, rawPath: string): { owner: string; name: string } {
  const segments = rawPath
    .replace(/^\/+/, "")
    .replace(/\/+$/, "")
    .split("/");

  if (segments.length > 2) {
    throw new ParseError(input, "expected a path of exactly <owner>/<name>");
  }
  if (segments.length < 2) {
    throw new ParseError(input, "missing owner or repository name segment");
  }

  const [owner, rawName] = segments;
  if (owner === "") {
    throw new ParseError(input, "missing owner segment");
  }
  if (!OWNER_PATTERN.test(owner)) {
    throw new ParseError(
      input,
      `owner '${owner}' does not follow GitHub's account name rules (letters, digits and single inner hyphens only)`
    );
  }

  const name = rawName.replace(/\.git$/i, "");
  if (name === "") {
    throw new ParseError(input, "missing repository name segment");
  }
  if (!NAME_PATTERN.test(name) || name === "." || name === "..") {
    throw new ParseError(input, `repository name '${name}' contains unsupported characters`);
  }

  return { owner, name };
}
