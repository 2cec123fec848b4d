import chalk from "chalk";
import type { BatchSummary } from "./types.js";

export type RunStatus = "Success" | "Completed with errors" | "Failed";

export function runStatus({ succeeded, failed }: BatchSummary): RunStatus {
  if (succeeded === 0) return "Failed";
  return failed === 0 ? "Success" : "Completed with errors";
}

export function formatElapsed(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)} ms` : `${(ms / 1000).toFixed(1)} s`;
}

function countSteps(summary: BatchSummary, step: "policy" | "library" | "avatar"): string {
  const set = summary.accounts.filter((a) => a.steps[step] === "set").length;
  const failed = summary.accounts.filter((a) => a.steps[step] === "failed").length;
  return failed > 0 ? `${set} set, ${failed} failed` : `${set} set`;
}

export function summaryLines(summary: BatchSummary): string[] {
  const lines = [
    summary.dryRun ? "SUMMARY (dry run)" : "SUMMARY",
    `Status: ${runStatus(summary)}`,
    `Users created: ${summary.succeeded}/${summary.total}`,
    `Failed: ${summary.failed}`,
    `Duration: ${formatElapsed(summary.endedAt - summary.startedAt)}`
  ];
  if (!summary.dryRun) {
    lines.push(
      `Policies: ${countSteps(summary, "policy")}`,
      `Library access: ${countSteps(summary, "library")}`,
      `Profile images: ${countSteps(summary, "avatar")}`
    );
  }
  return lines;
}

/** Surround lines with a single-line box padded to the widest one */
export function frame(lines: readonly string[]): string {
  const width = Math.max(0, ...lines.map((line) => line.length));
  const rule = "─".repeat(width + 2);
  return [`┌${rule}┐`, ...lines.map((line) => `│ ${line.padEnd(width)} │`), `└${rule}┘`].join("\n");
}

/**
 * Boxed summary for stderr: green on success, red otherwise. Colour is off
 * unless stderr is a terminal and NO_COLOR is unset.
 */
export function renderSummaryBox(
  summary: BatchSummary,
  color: boolean = Boolean(process.stderr.isTTY) && !process.env.NO_COLOR
): string {
  const box = frame(summaryLines(summary));
  if (!color) return box;
  return runStatus(summary) === "Success" ? chalk.green(box) : chalk.red(box);
}
