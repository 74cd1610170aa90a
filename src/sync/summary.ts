import type { BatchResult } from "./batch.js";
import type { BranchRecord, ProcessingResult } from "./synchronizer.js";

export function formatProcessingResult(result: ProcessingResult): string[] {
  if (result.status === "failed" && result.branches.length === 0) {
    return [`[failed] ${result.reference}: ${result.error ?? "unknown error"}`];
  }

  const details = [
    result.action === "clone" ? "cloned" : "updated",
    `default branch ${result.defaultBranch ?? "unknown"}`,
    `${result.tags.length} ${result.tags.length === 1 ? "tag" : "tags"}`
  ].join(", ");

  const header =
    result.status === "succeeded"
      ? `[ok] ${result.reference} (${details})`
      : `[failed] ${result.reference} (${details}): ${result.error ?? "unknown error"}`;

  return [header, ...result.branches.map(formatBranchRecord)];
}

export function formatBatchTotals(batch: BatchResult): string {
  return `Processed ${batch.results.length} repositories: ${batch.succeeded} succeeded, ${batch.failed} failed.`;
}

function formatBranchRecord(branch: BranchRecord): string {
  if (branch.status === "failed") {
    return `  - ${branch.name} (failed: ${branch.error ?? "unknown error"})`;
  }
  return `  - ${branch.name} (${branch.status})`;
}
