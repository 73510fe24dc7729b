/**
 * CISA vulnrichment - CVE records from a git working copy
 */

import { readdir } from "node:fs/promises";
import { join, relative } from "node:path";

import { SourceUnavailableError, errorMessage } from "../../../errors.js";
import { sendRequest, withRetry } from "../../../scraper/client.js";
import {
  assertGitAvailable,
  execGit,
  syncRepository,
  type GitRunner,
} from "../../../scraper/git.js";
import { normalizeVulnrichmentRecord } from "../canonical/vulnrichment.js";
import { DATASET_INFO } from "./info.js";
import { readUnit, type DatasetPipeline, type FetchedUnit, type RunContext } from "../pipeline.js";

export const VULNRICHMENT_REPO_DIR = "vulnrichment_repo";

const RECORD_FILE_PATTERN = /^CVE-.*\.json$/;

export interface VulnrichmentPipelineOptions {
  git?: GitRunner;
}

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

async function sortedEntries(dir: string) {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.sort((a, b) => byName(a.name, b.name));
}

/**
 * Record files under `<year>/<bucket>/CVE-*.json`, in name order at every
 * level. Hidden directories (.git) are skipped.
 */
export async function listRecordFiles(repoDir: string): Promise<string[]> {
  const files: string[] = [];

  for (const year of await sortedEntries(repoDir)) {
    if (!year.isDirectory() || year.name.startsWith(".")) continue;
    const yearDir = join(repoDir, year.name);

    for (const bucket of await sortedEntries(yearDir)) {
      if (!bucket.isDirectory()) continue;
      const bucketDir = join(yearDir, bucket.name);

      for (const file of await sortedEntries(bucketDir)) {
        if (file.isFile() && RECORD_FILE_PATTERN.test(file.name)) {
          files.push(join(bucketDir, file.name));
        }
      }
    }
  }

  return files;
}

async function checkConnectivity(ctx: RunContext): Promise<void> {
  const { connectivityUrl } = ctx.config.vulnrichment;
  try {
    const response = await sendRequest(
      connectivityUrl,
      { method: "HEAD", timeoutMs: ctx.config.http.probeTimeoutMs },
      ctx.log
    );
    if (response.status >= 400) {
      throw new Error(`HTTP ${String(response.status)}`);
    }
  } catch (error) {
    throw new SourceUnavailableError(
      `Cannot reach ${connectivityUrl}: ${errorMessage(error)}`
    );
  }
  ctx.log.info({ url: connectivityUrl }, "Connectivity check passed");
}

export function createVulnrichmentPipeline(
  options: VulnrichmentPipelineOptions = {}
): DatasetPipeline {
  const git = options.git ?? execGit;

  return {
    dataset: "vulnrichment",
    ...DATASET_INFO.vulnrichment,
    logRetention: (config) => config.vulnrichment.logRetention,

    async fetch(ctx): Promise<FetchedUnit[]> {
      const { config, log } = ctx;

      await checkConnectivity(ctx);
      const version = await assertGitAvailable(git);
      log.info({ version }, "git available");

      const repoDir = join(ctx.dirs.dataDir, VULNRICHMENT_REPO_DIR);
      const mode = await withRetry(
        "repository sync",
        () =>
          syncRepository(
            { repoUrl: config.vulnrichment.repoUrl, branch: config.vulnrichment.branch, localDir: repoDir },
            git,
            log
          ),
        config.http,
        log,
        ctx.sleep
      );

      const files = await listRecordFiles(repoDir);
      log.info({ mode, records: files.length }, "Repository synchronized");

      return files.map((path) => ({ id: relative(repoDir, path), path }));
    },

    async normalize(unit) {
      return normalizeVulnrichmentRecord(await readUnit(unit));
    },
  };
}
