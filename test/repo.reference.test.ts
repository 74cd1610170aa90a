import { describe, expect, it } from "vitest";
import { ParseError } from "../src/errors/index.js";
import { parseRepositoryReference, toDirectoryName } from "../src/repo/reference.js";

describe("parseRepositoryReference", () => {
  it("parses scp-style ssh references and strips .git", () => {
    const reference = parseRepositoryReference("git@github.com:acme/widget.git");

    expect(reference).toEqual({
      input: "git@github.com:acme/widget.git",
      protocol: "ssh",
      host: "github.com",
      owner: "acme",
      name: "widget",
      cloneUrl: "git@github.com:acme/widget.git",
      directoryName: "acme_widget"
    });
  });

  it("parses https references with and without the .git suffix", () => {
    const withSuffix = parseRepositoryReference("https://github.com/acme/widget.git");
    const withoutSuffix = parseRepositoryReference("https://github.com/acme/widget");

    expect(withSuffix.protocol).toBe("https");
    expect(withSuffix.cloneUrl).toBe("https://github.com/acme/widget.git");
    expect(withoutSuffix.cloneUrl).toBe("https://github.com/acme/widget.git");
    expect({ owner: withoutSuffix.owner, name: withoutSuffix.name }).toEqual({ owner: "acme", name: "widget" });
  });

  it("yields the same owner and name for the ssh and https forms of a repository", () => {
    const ssh = parseRepositoryReference("git@github.com:acme/data.pipeline.git");
    const https = parseRepositoryReference("https://github.com/acme/data.pipeline");

    expect([https.owner, https.name]).toEqual([ssh.owner, ssh.name]);
    expect(https.directoryName).toBe(ssh.directoryName);
    expect(ssh.name).toBe("data.pipeline");
  });

  it("accepts ssh:// urls, surrounding whitespace and a trailing slash", () => {
    const sshUrl = parseRepositoryReference("ssh://git@github.com:2222/acme/widget.git");
    const padded = parseRepositoryReference("  https://github.com/acme/widget/  ");

    expect(sshUrl.protocol).toBe("ssh");
    expect(sshUrl.host).toBe("github.com");
    expect(sshUrl.cloneUrl).toBe("ssh://git@github.com:2222/acme/widget.git");
    expect(padded.input).toBe("https://github.com/acme/widget/");
    expect(padded.name).toBe("widget");
  });

  it("keeps a non-default ssh user and lowercases the host", () => {
    const reference = parseRepositoryReference("deploy@GitHub.com:acme/widget");

    expect(reference.cloneUrl).toBe("deploy@github.com:acme/widget.git");
  });

  it.each([
    ["", "reference is empty"],
    ["git@github.com:widget.git", "missing owner or repository name segment"],
    ["https://github.com/acme", "missing owner or repository name segment"],
    ["https://github.com/acme/.git", "missing repository name segment"],
    ["https://github.com/acme/tools/widget", "expected a path of exactly <owner>/<name>"],
    ["ftp://github.com/acme/widget", "unsupported scheme 'ftp' (expected ssh or https)"],
    ["github.com/acme/widget", "expected git@<host>:<owner>/<name>.git or https://<host>/<owner>/<name>.git"],
    ["git@github.com:ac_me/widget.git", "owner 'ac_me' does not follow GitHub's account name rules"]
  ])("rejects %j", (input, reason) => {
    expect(() => parseRepositoryReference(input)).toThrow(ParseError);
    expect(() => parseRepositoryReference(input)).toThrow(reason);
  });

  it("names GitHub's owner rules when another host uses underscores", () => {
    expect(() => parseRepositoryReference("git@gitlab.com:my_group/proj.git")).toThrow(
      "Invalid repository reference 'git@gitlab.com:my_group/proj.git': owner 'my_group' does not follow GitHub's account name rules (letters, digits and single inner hyphens only)."
    );
  });

  it("keeps ports in clone urls but not in the host for both url schemes", () => {
    const https = parseRepositoryReference("https://Git.Example.com:8443/acme/widget");
    const ssh = parseRepositoryReference("ssh://git@git.example.com:2222/acme/widget.git");

    expect([https.host, https.cloneUrl]).toEqual(["git.example.com", "https://git.example.com:8443/acme/widget.git"]);
    expect([ssh.host, ssh.cloneUrl]).toEqual(["git.example.com", "ssh://git@git.example.com:2222/acme/widget.git"]);
  });

  it("names the offending input in the parse error", () => {
    expect(() => parseRepositoryReference("https://github.com/acme")).toThrow(
      "Invalid repository reference 'https://github.com/acme': missing owner or repository name segment."
    );
  });
});

describe("toDirectoryName", () => {
  it("joins owner and name with an underscore", () => {
    expect(toDirectoryName("acme", "widget")).toBe("acme_widget");
  });

  it("keeps distinct owner and name pairs distinct", () => {
    const pairs: Array<[string, string]> = [
      ["acme", "widget"],
      ["acme-labs", "widget"],
      ["acme", "labs-widget"],
      ["acme", "widget_v2"]
    ];

    const names = new Set(pairs.map(([owner, name]) => toDirectoryName(owner, name)));

    expect(names.size).toBe(pairs.length);
  });
});
