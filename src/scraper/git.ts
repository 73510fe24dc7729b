/**
 * Bulk source: a git working copy forced to the remote branch state.
 */

import { execFile } from "node:child_process";
import { rm } from "node:fs/promises";
import { join } from "node:path";

import { SourceUnavailableError, TransientError, errorMessage } from "../errors.js";
import { pathExists } from "../utils/fs.js";

import type { RunLogger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export interface GitResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs one git invocation; rejects when git exits non-zero.
 */
export type GitRunner = (args: string[]) => Promise<GitResult>;

export interface RepositoryTarget {
  repoUrl: string;
  branch: string;
  localDir: string;
}

export type SyncMode = "clone" | "reset";

// ============================================================================
// Runner
// ============================================================================

export const execGit: GitRunner = (args) =>
  new Promise((resolve, reject) => {
    execFile(
      "git",
      args,
      { maxBuffer: 16 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (error) {
          reject(new Error(`git ${args.join(" ")} failed: ${stderr.trim() || error.message}`));
          return;
        }
        resolve({ stdout, stderr });
      }
    );
  });

export async function assertGitAvailable(git: GitRunner): Promise<string> {
  try {
    const { stdout } = await git(["--version"]);
    return stdout.trim();
  } catch (error) {
    throw new SourceUnavailableError(
      `git is required but not available: ${errorMessage(error)}`
    );
  }
}

// ============================================================================
// Sync
// ============================================================================

/**
 * Bring `localDir` to exactly `origin/<branch>`.
 *
 * An existing working copy is fetched, hard-reset and cleaned of untracked
 * and ignored files; local divergence is discarded, never merged. Without a
 * working copy a shallow clone is made.
 */
export async function syncRepository(
  repo: RepositoryTarget,
  git: GitRunner,
  log: RunLogger
): Promise<SyncMode> {
  const hasWorkingCopy = await pathExists(join(repo.localDir, ".git"));

  try {
    if (hasWorkingCopy) {
      log.info({ localDir: repo.localDir, branch: repo.branch }, "Local repository exists, syncing with origin");
      await git(["-C", repo.localDir, "fetch", "--depth", "1", "origin", repo.branch]);
      // FETCH_HEAD also works when the branch differs from the one first cloned
      await git(["-C", repo.localDir, "reset", "--hard", "FETCH_HEAD"]);
      await git(["-C", repo.localDir, "clean", "-fdx"]);
      return "reset";
    }

    log.info({ repoUrl: repo.repoUrl, localDir: repo.localDir }, "Local repository not found, performing initial clone");
    // Leftovers of an interrupted clone would make git refuse the target
    await rm(repo.localDir, { recursive: true, force: true });
    await git([
      "clone",
      "--depth",
      "1",
      "--branch",
      repo.branch,
      repo.repoUrl,
      repo.localDir,
    ]);
    return "clone";
  } catch (error) {
    throw new TransientError(`Repository sync failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
