import { createVulnrichmentPipeline } from "../../services/sync/datasets/index.js";
import { addCommonOptions, runDatasetCommand, type CommonOptions } from "../utils/run.js";

import type { Command } from "commander";

// ============================================================================
// Vulnrichment Command
// ============================================================================

export function registerVulnrichmentCommand(program: Command): void {
  addCommonOptions(
    program
      .command("vulnrichment")
      .description("Sync the CISA vulnrichment repository and publish cisa_vulnrichment.csv.tar.gz")
      .option("--repo-url <url>", "Git repository to mirror")
      .option("--branch <branch>", "Branch to track")
  ).action(async (options: CommonOptions & { repoUrl?: string; branch?: string }) => {
    await runDatasetCommand(
      "vulnrichment",
      options,
      { vulnrichment: { repoUrl: options.repoUrl, branch: options.branch } },
      () => createVulnrichmentPipeline()
    );
  });
}
