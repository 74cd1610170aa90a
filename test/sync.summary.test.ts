import { describe, expect, it } from "vitest";
import { formatBatchTotals, formatProcessingResult } from "../src/sync/summary.js";
import type { ProcessingResult } from "../src/sync/synchronizer.js";

const cloned: ProcessingResult = {
  reference: "git@github.com:acme/widget.git",
  directory: "/mirror/acme_widget",
  action: "clone",
  status: "succeeded",
  branches: [
    { name: "main", status: "updated" },
    { name: "dev", status: "new" }
  ],
  tags: ["v1.0.0"],
  defaultBranch: "main"
};

const partiallyFailed: ProcessingResult = {
  reference: "https://github.com/acme/gadget",
  directory: "/mirror/acme_gadget",
  action: "update",
  status: "failed",
  error: "1 branch(es) failed to update: release",
  branches: [
    { name: "trunk", status: "updated" },
    { name: "release", status: "failed", error: "git fetch failed: rejected release (non-fast-forward)" },
    { name: "old", status: "pruned" }
  ],
  tags: [],
  defaultBranch: undefined
};

const unreachable: ProcessingResult = {
  reference: "git@github.com:acme/broken.git",
  status: "failed",
  error: "git clone failed: could not read from remote repository",
  branches: [],
  tags: []
};

describe("formatProcessingResult", () => {
  it("lists each branch under a successful repository", () => {
    expect(formatProcessingResult(cloned)).toEqual([
      "[ok] git@github.com:acme/widget.git (cloned, default branch main, 1 tag)",
      "  - main (updated)",
      "  - dev (new)"
    ]);
  });

  it("shows branch errors for a repository that failed on branches", () => {
    expect(formatProcessingResult(partiallyFailed)).toEqual([
      "[failed] https://github.com/acme/gadget (updated, default branch unknown, 0 tags): 1 branch(es) failed to update: release",
      "  - trunk (updated)",
      "  - release (failed: git fetch failed: rejected release (non-fast-forward))",
      "  - old (pruned)"
    ]);
  });

  it("collapses a repository that failed before any branch work to one line", () => {
    expect(formatProcessingResult(unreachable)).toEqual([
      "[failed] git@github.com:acme/broken.git: git clone failed: could not read from remote repository"
    ]);
  });
});

describe("formatBatchTotals", () => {
  it("reports the batch totals", () => {
    expect(formatBatchTotals({ success: false, succeeded: 1, failed: 1, results: [cloned, unreachable] })).toBe(
      "Processed 2 repositories: 1 succeeded, 1 failed."
    );
  });
});
