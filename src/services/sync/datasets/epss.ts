/**
 * EPSS daily scores - one dated gzip file per run
 */

import { createWriteStream } from "node:fs";
import { rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { promisify } from "node:util";
import { gunzip } from "node:zlib";

import { ConfigError, StructuralParseError, TransientError, errorMessage } from "../../../errors.js";
import { classifyResponse, sendRequest, withRetry } from "../../../scraper/client.js";
import { pathExists } from "../../../utils/fs.js";
import { isIsoDate, previousDay } from "../../../utils/time.js";
import { normalizeEpssFile } from "../canonical/epss.js";
import { DATASET_INFO } from "./info.js";
import { readUnitBytes, type DatasetPipeline, type FetchedUnit, type RunContext } from "../pipeline.js";

const gunzipAsync = promisify(gunzip);

export interface EpssPipelineOptions {
  /** YYYY-MM-DD; defaults to the day before `now` */
  date?: string;
  now?: Date;
}

export function epssFileName(date: string): string {
  return `epss_scores-${date}.csv.gz`;
}

export function resolveEpssDate(options: EpssPipelineOptions): string {
  const date = options.date ?? previousDay(options.now ?? new Date());
  if (!isIsoDate(date)) {
    throw new ConfigError(`Invalid date "${date}", expected YYYY-MM-DD`, { date });
  }
  return date;
}

/**
 * Stream `url` into `<dest>.part`, then rename into place.
 */
export async function downloadFile(url: string, dest: string, ctx: RunContext): Promise<void> {
  const partPath = `${dest}.part`;
  const response = classifyResponse(
    await sendRequest(
      url,
      { timeoutMs: ctx.config.http.requestTimeoutMs, headers: { "User-Agent": ctx.config.http.userAgent } },
      ctx.log
    ),
    url
  );

  if (response.body === null) {
    throw new TransientError(`Empty response body from ${url}`);
  }

  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(partPath));
    await rename(partPath, dest);
  } catch (error) {
    await rm(partPath, { force: true });
    throw new TransientError(`Download of ${url} failed: ${errorMessage(error)}`, { cause: error });
  }
}

export function createEpssPipeline(options: EpssPipelineOptions = {}): DatasetPipeline {
  const date = resolveEpssDate(options);

  return {
    dataset: "epss",
    ...DATASET_INFO.epss,
    logRetention: (config) => config.epss.logRetention,
    staleArtifacts: [/^epss_scores-.*\.csv\.gz(\.part)?$/],

    async fetch(ctx: RunContext): Promise<FetchedUnit[]> {
      const { config, log } = ctx;
      const fileName = epssFileName(date);
      const dest = join(ctx.dirs.dataDir, fileName);
      const url = `${config.epss.baseUrl}/${fileName}`;

      if (await pathExists(dest)) {
        log.info({ file: dest }, "Scores already downloaded, reusing file");
      } else {
        await withRetry(`download ${fileName}`, () => downloadFile(url, dest, ctx), config.http, log, ctx.sleep);
        log.info({ file: dest }, "Scores downloaded");
      }

      return [{ id: fileName, path: dest }];
    },

    async normalize(unit, ctx) {
      const compressed = await readUnitBytes(unit);
      let content: string;
      try {
        content = (await gunzipAsync(compressed)).toString("utf8");
      } catch (error) {
        throw new StructuralParseError(unit.id, `not a gzip file: ${errorMessage(error)}`);
      }

      const parsed = normalizeEpssFile(content);
      if (!parsed.ok) {
        return parsed;
      }

      ctx.log.info(
        {
          modelVersion: parsed.metadata.modelVersion,
          scoreDate: parsed.metadata.scoreDate,
          rows: parsed.rows.length,
          skipped: parsed.skipped,
        },
        "Score file parsed"
      );
      return { ok: true, rows: parsed.rows };
    },
  };
}
