export type RepoMirrorErrorKind =
  | "parse"
  | "auth"
  | "rate-limit"
  | "not-found"
  | "network"
  | "version-control"
  | "filesystem";

/**
 * Base class for every failure the lister, synchronizer and batch driver report.
 */
export class RepoMirrorError extends Error {
  public readonly kind: RepoMirrorErrorKind;

  constructor(kind: RepoMirrorErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.kind = kind;
    if (cause !== undefined) {
      this.cause = cause;
    }
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed repository reference
 */
export class ParseError extends RepoMirrorError {
  public readonly input: string;

  constructor(input: string, reason: string) {
    super("parse", `Invalid repository reference '${input}': ${reason}.`);
    this.input = input;
  }
}

export class AuthError extends RepoMirrorError {
  constructor(message: string, cause?: unknown) {
    super("auth", message, cause);
  }
}

export class RateLimitError extends RepoMirrorError {
  public readonly resetAt: Date | undefined;

  constructor(message: string, resetAt?: Date, cause?: unknown) {
    super("rate-limit", message, cause);
    this.resetAt = resetAt;
  }
}

export class NotFoundError extends RepoMirrorError {
  constructor(resource: string, cause?: unknown) {
    super("not-found", `${resource} not found`, cause);
  }
}

/**
 * Unreachable host, DNS failure or timeout
 */
export class NetworkError extends RepoMirrorError {
  constructor(message: string, cause?: unknown) {
    super("network", message, cause);
  }
}

/**
 * A git invocation failed. `branch` is set when the failure is scoped to one branch.
 */
export class VersionControlError extends RepoMirrorError {
  public readonly operation: string;
  public readonly branch: string | undefined;

  constructor(operation: string, message: string, options: { branch?: string; cause?: unknown } = {}) {
    super("version-control", `git ${operation} failed: ${message}`, options.cause);
    this.operation = operation;
    this.branch = options.branch;
  }
}

export class FilesystemError extends RepoMirrorError {
  public readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super("filesystem", message, cause);
    this.path = path;
  }
}

export function toErrorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error && error.message.trim() !== "") {
    return error.message.trim();
  }
  if (typeof error === "string" && error.trim() !== "") {
    return error.trim();
  }
  return fallback;
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}
