/**
 * NVD CPE catalog - paginated REST source with checkpointed resume
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { SourceUnavailableError, TransientError } from "../../../errors.js";
import { PoliteScheduler, fetchJson, withRetry } from "../../../scraper/client.js";
import { pathExists, writeFileDurable } from "../../../utils/fs.js";
import { isObject, safeString } from "../../../utils/safe-path.js";
import { FileCheckpointStore } from "../checkpoints.js";
import { normalizeCpePage } from "../canonical/cpes.js";
import { removeDirectory } from "../retention.js";
import { DATASET_INFO } from "./info.js";
import { readUnit, type DatasetPipeline, type FetchedUnit, type RunContext } from "../pipeline.js";

import type { CpesConfig } from "../../../config.js";

export const CPES_WORK_DIR = "cpes_work";
export const CHECKPOINT_FILE = "checkpoint.txt";

const ProbeSchema = Type.Object({
  totalResults: Type.Integer({ minimum: 1 }),
});

// ============================================================================
// Helpers
// ============================================================================

export function pageUrl(apiUrl: string, resultsPerPage: number, startIndex: number): string {
  const url = new URL(apiUrl);
  url.searchParams.set("resultsPerPage", String(resultsPerPage));
  url.searchParams.set("startIndex", String(startIndex));
  return url.toString();
}

export function pageFileName(index: number): string {
  return `page_${String(index)}.json`;
}

export function planPages(totalResults: number, resultsPerPage: number, testModePages?: number): number {
  const pages = Math.ceil(totalResults / resultsPerPage);
  return testModePages === undefined ? pages : Math.min(pages, testModePages);
}

function requestHeaders(config: CpesConfig, userAgent: string): Record<string, string> {
  const headers: Record<string, string> = { "User-Agent": userAgent };
  if (config.apiKey !== undefined) {
    headers.apiKey = config.apiKey;
  }
  return headers;
}

async function probeTotalResults(ctx: RunContext, headers: Record<string, string>): Promise<number> {
  const { config, log } = ctx;

  const body = await withRetry(
    "catalog probe",
    () =>
      fetchJson(
        pageUrl(config.cpes.apiUrl, 1, 0),
        { timeoutMs: config.http.probeTimeoutMs, headers },
        log
      ),
    config.http,
    log,
    ctx.sleep
  );

  if (!Value.Check(ProbeSchema, body)) {
    throw new SourceUnavailableError("Catalog probe did not report a positive totalResults");
  }

  log.info(
    {
      totalResults: body.totalResults,
      format: safeString(body, ["format"]),
      version: safeString(body, ["version"]),
      timestamp: safeString(body, ["timestamp"]),
    },
    "Catalog probe complete"
  );
  return body.totalResults;
}

/**
 * Pages before the checkpoint must still be on disk; otherwise the
 * checkpoint is stale and the fetch starts over.
 */
async function verifyStoredPages(workDir: string, upTo: number): Promise<boolean> {
  for (let index = 0; index < upTo; index++) {
    if (!(await pathExists(join(workDir, pageFileName(index))))) {
      return false;
    }
  }
  return true;
}

async function fetchPage(
  ctx: RunContext,
  index: number,
  totalPages: number,
  headers: Record<string, string>
): Promise<unknown> {
  const { config, log } = ctx;
  const { apiUrl, resultsPerPage } = config.cpes;
  const url = pageUrl(apiUrl, resultsPerPage, index * resultsPerPage);

  return withRetry(
    `page ${String(index + 1)}/${String(totalPages)}`,
    async () => {
      const body = await fetchJson(url, { timeoutMs: config.http.requestTimeoutMs, headers }, log);
      const products = isObject(body) ? body.products : undefined;
      if (!Array.isArray(products) || products.length === 0) {
        throw new TransientError(`Page ${String(index)} returned no products`);
      }
      return body;
    },
    config.http,
    log,
    ctx.sleep
  );
}

// ============================================================================
// Pipeline
// ============================================================================

export function createCpesPipeline(): DatasetPipeline {
  const workDirOf = (ctx: RunContext): string => join(ctx.dirs.dataDir, CPES_WORK_DIR);

  return {
    dataset: "cpes",
    ...DATASET_INFO.cpes,
    logRetention: (config) => config.cpes.logRetention,

    async fetch(ctx): Promise<FetchedUnit[]> {
      const { config, log } = ctx;
      const workDir = workDirOf(ctx);
      await mkdir(workDir, { recursive: true });

      const headers = requestHeaders(config.cpes, config.http.userAgent);
      const totalResults = await probeTotalResults(ctx, headers);
      const totalPages = planPages(
        totalResults,
        config.cpes.resultsPerPage,
        ctx.testMode ? config.cpes.testModePages : undefined
      );
      log.info({ totalResults, totalPages, testMode: ctx.testMode }, "Page plan");

      const checkpoint = new FileCheckpointStore(join(workDir, CHECKPOINT_FILE), log);
      let start = await checkpoint.load(totalPages);
      if (start > 0 && !(await verifyStoredPages(workDir, start))) {
        log.warn({ checkpoint: start }, "Stored pages missing, refetching from the first page");
        start = 0;
      }

      const scheduler = new PoliteScheduler(config.http.politenessDelayMs, ctx.sleep, log);

      for (let index = start; index < totalPages; index++) {
        const body = await fetchPage(ctx, index, totalPages, headers);
        await writeFileDurable(join(workDir, pageFileName(index)), JSON.stringify(body));
        await checkpoint.save(index + 1);
        log.info({ page: index + 1, totalPages }, "Page stored");

        if (index < totalPages - 1) {
          await scheduler.pause();
        }
      }

      return Array.from({ length: totalPages }, (_, index) => ({
        id: pageFileName(index),
        path: join(workDir, pageFileName(index)),
      }));
    },

    async normalize(unit) {
      return normalizeCpePage(await readUnit(unit));
    },

    async afterPublish(ctx) {
      // A stale checkpoint would let the next run republish these pages
      await new FileCheckpointStore(join(workDirOf(ctx), CHECKPOINT_FILE), ctx.log).clear();
      await removeDirectory(workDirOf(ctx), ctx.log);
    },
  };
}
