#!/usr/bin/env node

/**
 * secref CLI
 *
 * Keeps local, compressed CSV copies of public vulnerability reference
 * datasets: CISA vulnrichment, the NVD CPE catalog and EPSS scores.
 */

import { Command } from "commander";

import { registerCpesCommand } from "./commands/cpes.js";
import { registerEpssCommand } from "./commands/epss.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerVulnrichmentCommand } from "./commands/vulnrichment.js";

const program = new Command();

program
  .name("secref")
  .description("Security reference dataset loader")
  .version("0.1.0");

registerVulnrichmentCommand(program);
registerCpesCommand(program);
registerEpssCommand(program);
registerStatusCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
