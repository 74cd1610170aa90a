import { access, readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { parse as parseDotEnv } from "dotenv";
import { parse as parseToml } from "smol-toml";
import { isErrnoException } from "../errors/index.js";
import type { ResolvedRepoMirrorConfig } from "./schema.js";
import { defaultConfig } from "./defaults.js";

type JsonRecord = Record<string, unknown>;

export interface LoadConfigOptions {
  configPath?: string;
  envPath?: string;
  cwd?: string;
  platform?: NodeJS.Platform;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedRepoMirrorConfig {
  config: ResolvedRepoMirrorConfig;
  configPath: string | undefined;
  scope: "explicit" | "local" | "global" | "defaults";
  /** `.env` values overlaid with the process environment. */
  env: Record<string, string | undefined>;
}

const PROTOCOLS = ["ssh", "https"] as const;
const UPDATE_MODES = ["fast-forward", "reset"] as const;
const BRANCH_FAILURE_POLICIES = ["warn", "fail"] as const;
const CONFIG_FILENAME = "repo-mirror.config.toml";

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedRepoMirrorConfig> {
  const loaded = await loadConfigWithMetadata(options);
  return loaded.config;
}

export async function loadConfigWithMetadata(options: LoadConfigOptions = {}): Promise<LoadedRepoMirrorConfig> {
  const cwd = options.cwd ?? process.cwd();
  const envPath = options.envPath ?? resolve(cwd, ".env");
  const located = await locateConfigFile(options);

  const rawConfig = located.path === undefined ? {} : await readTomlConfig(located.path);
  const parsedEnv = await readEnvFile(envPath);
  const mergedEnv: Record<string, string | undefined> = {
    ...parsedEnv,
    ...(options.env ?? process.env)
  };

  const githubRaw = getOptionalTable(rawConfig, "github", "github");
  const listRaw = getOptionalTable(rawConfig, "list", "list");
  const syncRaw = getOptionalTable(rawConfig, "sync", "sync");
  const loggingRaw = getOptionalTable(rawConfig, "logging", "logging");

  const resolved: ResolvedRepoMirrorConfig = {
    github: {
      organization:
        nonEmpty(mergedEnv.ORGANIZATION) ??
        getOptionalString(githubRaw, "organization", "github.organization") ??
        defaultConfig.github.organization,
      api_url:
        nonEmpty(mergedEnv.GITHUB_API_URL) ??
        getOptionalString(githubRaw, "api_url", "github.api_url") ??
        defaultConfig.github.api_url,
      auth_hosts:
        getOptionalStringArray(githubRaw, "auth_hosts", "github.auth_hosts") ?? defaultConfig.github.auth_hosts
    },
    list: {
      protocol: getOptionalEnum(listRaw, "protocol", "list.protocol", PROTOCOLS) ?? defaultConfig.list.protocol,
      exclude: getOptionalStringArray(listRaw, "exclude", "list.exclude") ?? defaultConfig.list.exclude,
      include_archived:
        getOptionalBoolean(listRaw, "include_archived", "list.include_archived") ?? defaultConfig.list.include_archived
    },
    sync: {
      output_dir: getOptionalString(syncRaw, "output_dir", "sync.output_dir") ?? defaultConfig.sync.output_dir,
      prune: getOptionalBoolean(syncRaw, "prune", "sync.prune") ?? defaultConfig.sync.prune,
      update_mode:
        getOptionalEnum(syncRaw, "update_mode", "sync.update_mode", UPDATE_MODES) ?? defaultConfig.sync.update_mode,
      branch_failure:
        getOptionalEnum(syncRaw, "branch_failure", "sync.branch_failure", BRANCH_FAILURE_POLICIES) ??
        defaultConfig.sync.branch_failure
    },
    logging: {
      dir: getOptionalString(loggingRaw, "dir", "logging.dir") ?? defaultConfig.logging.dir,
      file: getOptionalBoolean(loggingRaw, "file", "logging.file") ?? defaultConfig.logging.file
    }
  };

  if (!isHttpUrl(resolved.github.api_url)) {
    throw new Error("Invalid github.api_url: expected an http(s) URL.");
  }

  for (const [index, host] of resolved.github.auth_hosts.entries()) {
    if (host.trim() === "" || /[\s/]/.test(host)) {
      throw new Error(`Invalid github.auth_hosts[${index}]: expected a bare host name such as 'github.com'.`);
    }
  }

  if (resolved.sync.output_dir.trim() === "") {
    throw new Error("Invalid sync.output_dir: expected a non-empty path string.");
  }

  if (resolved.logging.dir.trim() === "") {
    throw new Error("Invalid logging.dir: expected a non-empty path string.");
  }

  return {
    config: resolved,
    configPath: located.path,
    scope: located.scope,
    env: mergedEnv
  };
}

async function locateConfigFile(
  options: LoadConfigOptions
): Promise<{ path: string | undefined; scope: LoadedRepoMirrorConfig["scope"] }> {
  if (options.configPath) {
    return { path: options.configPath, scope: "explicit" };
  }

  const cwd = options.cwd ?? process.cwd();
  const localPath = resolve(cwd, CONFIG_FILENAME);
  if (await pathExists(localPath)) {
    return { path: localPath, scope: "local" };
  }

  const globalPath = getGlobalConfigPath(options);
  if (await pathExists(globalPath)) {
    return { path: globalPath, scope: "global" };
  }

  return { path: undefined, scope: "defaults" };
}

export function getGlobalConfigPath(options: LoadConfigOptions = {}): string {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const resolvedHomeDir = options.homeDir ?? homedir();

  if (platform === "win32") {
    const appData = nonEmpty(env.APPDATA) ?? join(resolvedHomeDir, "AppData", "Roaming");
    return resolve(appData, "repo-mirror", CONFIG_FILENAME);
  }

  const xdgConfigHome = nonEmpty(env.XDG_CONFIG_HOME) ?? join(resolvedHomeDir, ".config");
  return resolve(xdgConfigHome, "repo-mirror", CONFIG_FILENAME);
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

async function readTomlConfig(configPath: string): Promise<JsonRecord> {
  let source: string;
  try {
    source = await readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new Error(`Cannot load config at '${configPath}': file does not exist.`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseToml(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot parse config at '${configPath}': ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new Error("Invalid config root: expected a TOML table.");
  }

  return parsed;
}

async function readEnvFile(envPath: string): Promise<Record<string, string>> {
  try {
    const source = await readFile(envPath, "utf8");
    return parseDotEnv(source);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return {};
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read env file at '${envPath}': ${reason}`);
  }
}

function getOptionalTable(parent: JsonRecord, key: string, path: string): JsonRecord | undefined {
  const value = parent[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error(`Invalid ${path}: expected a TOML table.`);
  }
  return value;
}

function getOptionalString(parent: JsonRecord | undefined, key: string, path: string): string | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`Invalid ${path}: expected a string.`);
  }
  return value;
}

function getOptionalBoolean(parent: JsonRecord | undefined, key: string, path: string): boolean | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new Error(`Invalid ${path}: expected a boolean.`);
  }
  return value;
}

function getOptionalEnum<T extends string>(
  parent: JsonRecord | undefined,
  key: string,
  path: string,
  values: readonly T[]
): T | undefined {
  const value = getOptionalString(parent, key, path);
  if (value === undefined) {
    return undefined;
  }
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Invalid ${path}: expected one of ${values.join("|")}.`);
  }
  return match;
}

function getOptionalStringArray(
  parent: JsonRecord | undefined,
  key: string,
  path: string
): string[] | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
    throw new Error(`Invalid ${path}: expected an array of strings.`);
  }
  return [...value];
}

function nonEmpty(value: string | undefined): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
