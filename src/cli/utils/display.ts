/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { DatasetStatus } from "../../services/sync/status.js";
import type { RunSummary } from "../../types/index.js";

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${String(bytes)} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${String(seconds)}s`;
  return `${String(Math.floor(seconds / 60))}m ${String(seconds % 60)}s`;
}

/**
 * Display the outcome of one run
 */
export function displayRunSummary(summary: RunSummary): void {
  console.log(chalk.bold(`\n${summary.dataset}:\n`));
  console.log(`  Archive:   ${chalk.green(summary.archivePath)}`);
  console.log(`  Rows:      ${String(summary.rowCount)}`);
  console.log(`  Units:     ${String(summary.processedUnits)} parsed`);
  if (summary.erroredUnits > 0) {
    console.log(`  Skipped:   ${chalk.yellow(`${String(summary.erroredUnits)} unparseable (see log)`)}`);
  }
  console.log(`  Duration:  ${formatDuration(summary.durationMs)}`);
  console.log(`  Log:       ${chalk.gray(summary.logFile)}`);
  console.log();
}

/**
 * Display local dataset state in a formatted table
 */
export function displayStatusTable(statuses: DatasetStatus[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Dataset"),
      chalk.cyan("Archive"),
      chalk.cyan("Size"),
      chalk.cyan("Updated"),
      chalk.cyan("Last Log"),
    ],
    wordWrap: true,
  });

  for (const status of statuses) {
    const pending =
      status.pendingCheckpoint !== null
        ? chalk.yellow(` (resume at page ${status.pendingCheckpoint})`)
        : "";

    table.push([
      chalk.green(status.dataset) + pending,
      status.archiveBytes !== null ? status.archivePath : chalk.gray("not published"),
      status.archiveBytes !== null ? formatBytes(status.archiveBytes) : "-",
      status.updatedAt?.toISOString() ?? chalk.gray("Never"),
      status.lastLog ?? chalk.gray("-"),
    ]);
  }

  console.log(table.toString());
}
