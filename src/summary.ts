import chalk from "chalk";
import type { BatchRunSummary } from "./orchestrator/types.js";
import type { RunResult } from "./types.js";

export type SummaryStatus = "Success" | "Completed with errors" | "Failed";

export type RunTotals = {
  orgs: number;
  completed: number;
  skipped: number;
  failed: number;
  deleted: number;
  deletionFailures: number;
  notDeleted: number;
};

function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 1) return `${ms.toFixed(0)} ms`;
  return `${seconds.toFixed(1)} s`;
}

export function tallyResults(results: readonly RunResult[]): RunTotals {
  const totals: RunTotals = {
    orgs: results.length,
    completed: 0,
    skipped: 0,
    failed: 0,
    deleted: 0,
    deletionFailures: 0,
    notDeleted: 0
  };
  for (const result of results) {
    totals[result.status] += 1;
    for (const record of result.deletionRecords) {
      if (record.outcome.status === "deleted") totals.deleted += 1;
      else if (record.outcome.status === "failed") totals.deletionFailures += 1;
      else totals.notDeleted += 1;
    }
  }
  return totals;
}

export function computeStatus(results: readonly RunResult[]): SummaryStatus {
  const totals = tallyResults(results);
  const problems = totals.failed + totals.deletionFailures;
  if (totals.orgs > 0 && problems === 0) return "Success";
  if (problems > 0 && (totals.completed > 0 || totals.deleted > 0)) return "Completed with errors";
  return "Failed";
}

/** 0 when nothing failed, 1 when any org or any single deletion failed. */
export function exitCodeFor(results: readonly RunResult[]): 0 | 1 {
  const totals = tallyResults(results);
  return totals.failed + totals.deletionFailures === 0 ? 0 : 1;
}

export function describeTenant(result: RunResult): string {
  switch (result.status) {
    case "failed":
      return `✖ ${result.tenant}: failed (${result.fatalError?.code ?? "UNEXPECTED"}) ${result.fatalError?.message ?? ""}`.trimEnd();
    case "skipped":
      return `⏭ ${result.tenant}: skipped (${result.skipReason ?? "no reason given"})`;
    case "completed": {
      const totals = tallyResults([result]);
      const parts = [`${totals.deleted} deleted`, `${totals.deletionFailures} failed`];
      if (totals.notDeleted > 0) parts.push(`${totals.notDeleted} not deleted`);
      const mark = totals.deletionFailures === 0 ? "✔" : "✖";
      return `${mark} ${result.tenant}: ${parts.join(", ")}`;
    }
  }
}

export function renderSummaryBox(summary: BatchRunSummary): string {
  const status = computeStatus(summary.results);
  const totals = tallyResults(summary.results);

  const content = [
    "SUMMARY",
    `Status: ${status}`,
    `Orgs processed: ${totals.orgs}`,
    `Orgs completed: ${totals.completed}`,
    `Orgs skipped: ${totals.skipped}`,
    `Orgs failed: ${totals.failed}`,
    `Versions deleted: ${totals.deleted}`,
    `Deletions failed: ${totals.deletionFailures}`,
    `Duration: ${formatDuration(summary.endedAt - summary.startedAt)}`
  ];
  if (totals.notDeleted > 0) {
    content.splice(8, 0, `Versions not deleted: ${totals.notDeleted}`);
  }
  if (summary.results.length > 0) {
    content.push("", ...summary.results.map(describeTenant));
  }

  // Compute max content width and render a neatly padded box
  const maxLen = content.reduce((m, s) => Math.max(m, s.length), 0);
  const horizontal = "─".repeat(maxLen + 2);
  const top = `┌${horizontal}┐`;
  const bottom = `└${horizontal}┘`;
  const body = content.map(line => `│ ${line.padEnd(maxLen, " ")} │`);
  const box = [top, ...body, bottom].join("\n");

  return status === "Success" ? chalk.green(box) : chalk.red(box);
}
