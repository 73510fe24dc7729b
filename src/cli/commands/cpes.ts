import { createCpesPipeline } from "../../services/sync/datasets/index.js";
import { addCommonOptions, runDatasetCommand, type CommonOptions } from "../utils/run.js";

import type { Command } from "commander";

// ============================================================================
// CPE Catalog Command
// ============================================================================

export function registerCpesCommand(program: Command): void {
  addCommonOptions(
    program
      .command("cpes")
      .description("Download the NVD CPE catalog page by page and publish cpes.csv.tar.gz")
      .option("--test", "Fetch only the first few pages")
      .option("--api-key <key>", "NVD API key (defaults to NVD_API_KEY)")
  ).action(async (options: CommonOptions & { test?: boolean; apiKey?: string }) => {
    await runDatasetCommand(
      "cpes",
      options,
      { cpes: { apiKey: options.apiKey } },
      () => createCpesPipeline(),
      options.test === true
    );
  });
}
