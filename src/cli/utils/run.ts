import chalk from "chalk";
import ora from "ora";

import { loadConfig, type ConfigOverrides, type PipelineConfig } from "../../config.js";
import { errorMessage, exitCodeFor } from "../../errors.js";
import { logger } from "../../logger.js";
import {
  createRunContext,
  runPipeline,
  type DatasetPipeline,
  type RunContext,
} from "../../services/sync/pipeline.js";
import { displayRunSummary } from "./display.js";

import type { Command } from "commander";

export interface CommonOptions {
  rootDir?: string;
  dataDir?: string;
  logDir?: string;
  logLevel?: string;
  verbose?: boolean;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option("--root-dir <dir>", "Base directory for dataset data and logs")
    .option("--data-dir <dir>", "Directory for downloads and published archives")
    .option("--log-dir <dir>", "Directory for run logs")
    .option("--log-level <level>", "trace, debug, info, warn, error or fatal")
    .option("--verbose", "Mirror the run log to stdout");
}

/**
 * Load configuration, run one dataset and report. Failures set
 * process.exitCode from the error class.
 */
export async function runDatasetCommand(
  label: string,
  options: CommonOptions,
  overrides: ConfigOverrides,
  build: (config: PipelineConfig) => DatasetPipeline,
  testMode = false
): Promise<void> {
  const spinner = ora(`Updating ${label}...`).start();
  let ctx: RunContext | undefined;

  try {
    const config = loadConfig({
      ...overrides,
      rootDir: options.rootDir,
      logLevel: options.logLevel,
    });
    const pipeline = build(config);
    ctx = await createRunContext(pipeline, config, {
      dataDir: options.dataDir,
      logDir: options.logDir,
      testMode,
      stdout: options.verbose === true,
    });
    spinner.text = `Updating ${label} (log: ${ctx.logFile})`;

    const summary = await runPipeline(pipeline, ctx);

    if (summary.outcome === "success") {
      spinner.succeed(`${label} updated: ${String(summary.rowCount)} rows`);
    } else {
      spinner.warn(
        `${label} updated with ${chalk.yellow(String(summary.erroredUnits))} unparseable units`
      );
    }
    displayRunSummary(summary);
  } catch (error) {
    spinner.fail(`Failed: ${errorMessage(error)}`);
    // Once the run log is open, runPipeline has already recorded the failure
    if (ctx === undefined) {
      logger.error({ dataset: label, error: errorMessage(error) }, "Run could not start");
    }
    process.exitCode = exitCodeFor(error);
  }
}
