import { createEpssPipeline } from "../../services/sync/datasets/index.js";
import { addCommonOptions, runDatasetCommand, type CommonOptions } from "../utils/run.js";

import type { Command } from "commander";

// ============================================================================
// EPSS Command
// ============================================================================

export function registerEpssCommand(program: Command): void {
  addCommonOptions(
    program
      .command("epss")
      .description("Download one day of EPSS scores and publish epss_scores.csv.tar.gz")
      .argument("[date]", "Score date as YYYY-MM-DD (default: yesterday)")
  ).action(async (date: string | undefined, options: CommonOptions) => {
    await runDatasetCommand("epss", options, {}, () => createEpssPipeline({ date }));
  });
}
