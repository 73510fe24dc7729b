import { DATASETS, loadConfig } from "../../config.js";
import { errorMessage, exitCodeFor } from "../../errors.js";
import { logger } from "../../logger.js";
import { datasetStatus } from "../../services/sync/status.js";
import { displayStatusTable } from "../utils/display.js";

import type { Command } from "commander";

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show published archives and the latest run log of each dataset")
    .option("--root-dir <dir>", "Base directory for dataset data and logs")
    .action(async (options: { rootDir?: string }) => {
      try {
        const config = loadConfig({ rootDir: options.rootDir });
        const statuses = await Promise.all(
          DATASETS.map((dataset) => datasetStatus(config, dataset))
        );
        displayStatusTable(statuses);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Status listing failed");
        process.exitCode = exitCodeFor(error);
      }
    });
}
