import { RateLimitError, RepoMirrorError, toErrorMessage } from "../errors/index.js";

const TOKEN_HINT = "Provide a GitHub token with --token, GITHUB_TOKEN or GH_TOKEN.";

/**
 * Renders a command failure for the terminal, adding a next step where the error kind suggests one.
 */
export function formatCliFailure(error: unknown): string {
  const message = toErrorMessage(error, "Unexpected CLI failure");
  if (!(error instanceof RepoMirrorError)) {
    return message;
  }

  switch (error.kind) {
    case "auth":
      return `${message} ${TOKEN_HINT}`;
    case "rate-limit":
      if (error instanceof RateLimitError && error.resetAt) {
        return `${message} Limit resets at ${error.resetAt.toISOString()}.`;
      }
      return message;
    default:
      return message;
  }
}
