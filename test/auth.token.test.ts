import { describe, expect, it, vi } from "vitest";
import { resolveGitHubToken } from "../src/auth/token.js";

describe("resolveGitHubToken", () => {
  it("prefers the flag value over the environment", async () => {
    const execCommand = vi.fn();

    await expect(
      resolveGitHubToken({ GITHUB_TOKEN: "test-env" }, { flagValue: " test-flag ", execCommand })
    ).resolves.toEqual({ token: "test-flag", source: "flag" });
    expect(execCommand).not.toHaveBeenCalled();
  });

  it("checks GITHUB_TOKEN before GH_TOKEN and skips blank values", async () => {
    await expect(resolveGitHubToken({ GITHUB_TOKEN: "test-github", GH_TOKEN: "test-gh" })).resolves.toEqual({
      token: "test-github",
      source: "GITHUB_TOKEN"
    });
    await expect(resolveGitHubToken({ GITHUB_TOKEN: "   ", GH_TOKEN: "test-gh" }, { flagValue: "" })).resolves.toEqual({
      token: "test-gh",
      source: "GH_TOKEN"
    });
  });

  it("asks the GitHub CLI as a last resort", async () => {
    const execCommand = vi.fn().mockResolvedValue({ stdout: "test-cli\n" });

    await expect(resolveGitHubToken({}, { execCommand })).resolves.toEqual({ token: "test-cli", source: "gh" });
    expect(execCommand).toHaveBeenCalledWith("gh", ["auth", "token"]);
  });

  it("returns undefined when the GitHub CLI is unavailable or disabled", async () => {
    const failing = vi.fn().mockRejectedValue(new Error("spawn gh ENOENT"));
    const unused = vi.fn();

    await expect(resolveGitHubToken({}, { execCommand: failing })).resolves.toBeUndefined();
    await expect(resolveGitHubToken({}, { useGhCli: false, execCommand: unused })).resolves.toBeUndefined();
    expect(unused).not.toHaveBeenCalled();
  });
});
