/**
 * Retention - best-effort removal of superseded artifacts and old run logs
 *
 * Nothing here throws: a failed listing or deletion is logged as a warning
 * and the run carries on.
 */

import { readdir, rm } from "node:fs/promises";
import { join } from "node:path";

import { errorMessage } from "../../errors.js";

import type { RunLogger } from "../../logger.js";

export interface PruneOptions {
  /** Number of newest matching files to keep */
  keep?: number;
  log: RunLogger;
}

export interface PruneResult {
  kept: string[];
  removed: string[];
  failed: string[];
}

/**
 * Delete every file in `dir` matching `pattern` except the `keep` greatest
 * names. Names embed a timestamp, so greatest means newest.
 */
export async function pruneMatching(
  dir: string,
  pattern: RegExp,
  options: PruneOptions
): Promise<PruneResult> {
  const keep = Math.max(0, options.keep ?? 0);
  const result: PruneResult = { kept: [], removed: [], failed: [] };

  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    options.log.warn({ dir, error: errorMessage(error) }, "Cannot list directory for cleanup");
    return result;
  }

  const matching = names.filter((name) => pattern.test(name)).sort().reverse();
  result.kept = matching.slice(0, keep);

  for (const name of matching.slice(keep)) {
    try {
      await rm(join(dir, name), { recursive: true });
      result.removed.push(name);
      options.log.info({ file: name }, "Removed old file");
    } catch (error) {
      result.failed.push(name);
      options.log.warn({ file: name, error: errorMessage(error) }, "Failed to remove old file");
    }
  }

  return result;
}

/**
 * Remove non-canonical artifacts (timestamped tables, raw downloads).
 */
export function pruneArtifacts(
  dir: string,
  pattern: RegExp,
  options: PruneOptions
): Promise<PruneResult> {
  return pruneMatching(dir, pattern, { keep: 0, ...options });
}

/**
 * Keep the newest `keep` run logs.
 */
export function pruneLogs(
  dir: string,
  pattern: RegExp,
  options: Required<PruneOptions>
): Promise<PruneResult> {
  return pruneMatching(dir, pattern, options);
}

/**
 * Remove a transient directory (e.g. a page work directory).
 */
export async function removeDirectory(dir: string, log: RunLogger): Promise<boolean> {
  try {
    await rm(dir, { recursive: true, force: true });
    log.info({ dir }, "Removed work directory");
    return true;
  } catch (error) {
    log.warn({ dir, error: errorMessage(error) }, "Failed to remove work directory");
    return false;
  }
}

export function logFilePattern(logPrefix: string): RegExp {
  return new RegExp(`^${logPrefix}_\\d{4}-\\d{2}-\\d{2}_\\d{6}\\.log$`);
}
