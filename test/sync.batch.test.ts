import { describe, expect, it, vi } from "vitest";
import { FilesystemError } from "../src/errors/index.js";
import { runSyncBatch, type BatchEvent, type BatchFileSystem } from "../src/sync/batch.js";
import { FakeVcsEngine } from "./support/fake-vcs.js";

function createFileSystem(): BatchFileSystem {
  return {
    removeDirectory: vi.fn().mockResolvedValue(undefined),
    ensureDirectory: vi.fn().mockResolvedValue(undefined)
  };
}

function createEngine(): FakeVcsEngine {
  const engine = new FakeVcsEngine();
  engine.addRemote("git@github.com:acme/widget.git", { branches: { main: "a1", dev: "a2" }, defaultBranch: "main" });
  engine.addRemote("git@github.com:acme/broken.git", { branches: { main: "b1" }, defaultBranch: "main" });
  engine.addRemote("https://github.com/acme/gadget.git", { branches: { trunk: "c1", release: "c2" }, defaultBranch: "trunk" });
  return engine;
}

describe("runSyncBatch", () => {
  it("keeps processing after a repository fails and counts the outcomes", async () => {
    const engine = createEngine();
    engine.failingClones.add("git@github.com:acme/broken.git");

    const result = await runSyncBatch(
      [
        { line: 1, value: "git@github.com:acme/widget.git" },
        { line: 2, value: "git@github.com:acme/broken.git" },
        { line: 4, value: "https://github.com/acme/gadget" }
      ],
      {
        outputDir: "/mirror",
        engine,
        fileSystem: createFileSystem(),
        inspectDirectory: (directory) => engine.inspectDirectory(directory)
      }
    );

    expect(result.success).toBe(false);
    expect(result.succeeded).toBe(2);
    expect(result.failed).toBe(1);
    expect(result.results.map((entry) => entry.status)).toEqual(["succeeded", "failed", "succeeded"]);
    expect(engine.localBranchNames("/mirror/acme_widget")).toEqual(["dev", "main"]);
    expect(engine.localBranchNames("/mirror/acme_gadget")).toEqual(["release", "trunk"]);
    expect(engine.workingCopies.has("/mirror/acme_broken")).toBe(false);
  });

  it("records an unparseable line as failed and moves on", async () => {
    const engine = createEngine();
    const events: BatchEvent[] = [];

    const result = await runSyncBatch(
      [
        { line: 3, value: "not a url" },
        { line: 5, value: "git@github.com:acme/widget.git" }
      ],
      {
        outputDir: "/mirror",
        engine,
        fileSystem: createFileSystem(),
        inspectDirectory: (directory) => engine.inspectDirectory(directory),
        onEvent: (event) => events.push(event)
      }
    );

    const expectedError =
      "line 3: Invalid repository reference 'not a url': expected git@<host>:<owner>/<name>.git or https://<host>/<owner>/<name>.git.";
    expect(result.results[0]).toEqual({
      reference: "not a url",
      status: "failed",
      error: expectedError,
      branches: [],
      tags: []
    });
    expect(result.results[1].status).toBe("succeeded");
    expect(events).toContainEqual({ type: "entry:invalid", line: 3, value: "not a url", error: expectedError });
    expect(events.at(-1)).toEqual({ type: "batch:complete", succeeded: 1, failed: 1 });
  });

  it("removes the output directory before creating it in clean mode", async () => {
    const engine = createEngine();
    const order: string[] = [];
    const fileSystem: BatchFileSystem = {
      removeDirectory: vi.fn().mockImplementation(async (path: string) => {
        order.push(`remove ${path}`);
      }),
      ensureDirectory: vi.fn().mockImplementation(async (path: string) => {
        order.push(`ensure ${path}`);
      })
    };

    const result = await runSyncBatch([], { outputDir: "/mirror", engine, clean: true, fileSystem });

    expect(order).toEqual(["remove /mirror", "ensure /mirror"]);
    expect(result).toEqual({ success: true, succeeded: 0, failed: 0, results: [] });
  });

  it("does not remove anything without clean mode", async () => {
    const fileSystem = createFileSystem();

    await runSyncBatch([], { outputDir: "/mirror", engine: createEngine(), fileSystem });

    expect(fileSystem.removeDirectory).not.toHaveBeenCalled();
    expect(fileSystem.ensureDirectory).toHaveBeenCalledWith("/mirror");
  });

  it("aborts the batch when the output directory cannot be created", async () => {
    const fileSystem: BatchFileSystem = {
      removeDirectory: vi.fn().mockResolvedValue(undefined),
      ensureDirectory: vi.fn().mockRejectedValue(new Error("EACCES: permission denied"))
    };

    const run = runSyncBatch([{ line: 1, value: "git@github.com:acme/widget.git" }], {
      outputDir: "/mirror",
      engine: createEngine(),
      fileSystem
    });

    await expect(run).rejects.toBeInstanceOf(FilesystemError);
    await expect(run).rejects.toThrow("Cannot create '/mirror': EACCES: permission denied");
  });

  it("passes the sync policy through to every repository", async () => {
    const engine = createEngine();
    const options = {
      outputDir: "/mirror",
      engine,
      fileSystem: createFileSystem(),
      inspectDirectory: (directory: string) => engine.inspectDirectory(directory)
    };
    await runSyncBatch([{ line: 1, value: "git@github.com:acme/widget.git" }], options);
    engine.divergedBranches.add("dev");

    const result = await runSyncBatch([{ line: 1, value: "git@github.com:acme/widget.git" }], {
      ...options,
      branchFailure: "fail"
    });

    expect(result.failed).toBe(1);
    expect(result.results[0].error).toBe("1 branch(es) failed to update: dev");
  });
});
