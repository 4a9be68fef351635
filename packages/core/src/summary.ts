import type { RunSummary, UpsertOutcome } from "@collabrag/types";

export function emptySummary(): RunSummary {
  return { new: 0, updated: 0, skipped: 0, failed: 0 };
}

export function mergeSummaries(...summaries: RunSummary[]): RunSummary {
  const total = emptySummary();
  for (const summary of summaries) {
    total.new += summary.new;
    total.updated += summary.updated;
    total.skipped += summary.skipped;
    total.failed += summary.failed;
  }
  return total;
}

export function record(summary: RunSummary, outcome: UpsertOutcome, count = 1): void {
  summary[outcome] += count;
}
