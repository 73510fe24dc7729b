/**
 * Run orchestration - fetch, normalize, publish, prune
 *
 * Each dataset supplies its fetch phase and a per-unit normalizer; the
 * publication and retention steps are shared. A unit whose content cannot be
 * parsed is logged and counted, never fatal. Any other error, including a
 * unit that cannot be read back, aborts the run before the canonical
 * artifacts are touched.
 */

import { join } from "node:path";
import { readFile } from "node:fs/promises";

import {
  datasetDirs,
  ensureDatasetDirs,
  type DatasetDirs,
  type DatasetName,
  type PipelineConfig,
} from "../../config.js";
import {
  PipelineError,
  StructuralParseError,
  UnitReadError,
  errorMessage,
} from "../../errors.js";
import { createRunLogger, type RunLogger } from "../../logger.js";
import { formatRunTimestamp, sleep as realSleep } from "../../utils/time.js";
import {
  discardStaged,
  promoteTable,
  stageTable,
  timestampedTablePattern,
} from "./publisher.js";
import { logFilePattern, pruneArtifacts, pruneLogs } from "./retention.js";

import type { Sleep } from "../../scraper/client.js";
import type {
  NormalizeSummary,
  Row,
  RunSummary,
  TableSchema,
  UnitResult,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

/** One independently parseable piece of fetched data */
export interface FetchedUnit {
  id: string;
  path: string;
}

export interface RunContext {
  dataset: DatasetName;
  config: PipelineConfig;
  dirs: DatasetDirs;
  log: RunLogger;
  logFile: string;
  timestamp: string;
  testMode: boolean;
  sleep: Sleep;
}

export interface DatasetPipeline {
  dataset: DatasetName;
  /** Run log file prefix, e.g. "cpes_download" */
  logPrefix: string;
  schema: TableSchema;
  logRetention(config: PipelineConfig): number;
  /** Bring the local copy up to date and list the units to normalize, in order */
  fetch(ctx: RunContext): Promise<FetchedUnit[]>;
  normalize(unit: FetchedUnit, ctx: RunContext): Promise<UnitResult>;
  /** Raw downloads to delete once the canonical table is published */
  staleArtifacts?: RegExp[];
  afterPublish?(ctx: RunContext): Promise<void>;
}

export interface RunContextOptions {
  dataDir?: string;
  logDir?: string;
  testMode?: boolean;
  now?: Date;
  sleep?: Sleep;
  /** Mirror the run log to stdout */
  stdout?: boolean;
}

const PROGRESS_INTERVAL = 100;

// ============================================================================
// Setup
// ============================================================================

/**
 * Resolve directories, open the run log and stamp the run.
 */
export async function createRunContext(
  pipeline: DatasetPipeline,
  config: PipelineConfig,
  options: RunContextOptions = {}
): Promise<RunContext> {
  const dirs = datasetDirs(config, pipeline.dataset, {
    dataDir: options.dataDir,
    logDir: options.logDir,
  });
  await ensureDatasetDirs(dirs);

  const timestamp = formatRunTimestamp(options.now ?? new Date());
  const logFile = join(dirs.logDir, `${pipeline.logPrefix}_${timestamp}.log`);
  const log = createRunLogger({
    logFile,
    level: config.logLevel,
    dataset: pipeline.dataset,
    stdout: options.stdout,
  });

  return {
    dataset: pipeline.dataset,
    config,
    dirs,
    log,
    logFile,
    timestamp,
    testMode: options.testMode ?? false,
    sleep: options.sleep ?? realSleep,
  };
}

// ============================================================================
// Normalization
// ============================================================================

export async function readUnitBytes(unit: FetchedUnit): Promise<Buffer> {
  try {
    return await readFile(unit.path);
  } catch (error) {
    throw new UnitReadError(`Cannot read ${unit.id}: ${errorMessage(error)}`, { unit: unit.id });
  }
}

export async function readUnit(unit: FetchedUnit): Promise<string> {
  return (await readUnitBytes(unit)).toString("utf8");
}

async function normalizeUnit(
  pipeline: DatasetPipeline,
  unit: FetchedUnit,
  ctx: RunContext
): Promise<UnitResult> {
  try {
    return await pipeline.normalize(unit, ctx);
  } catch (error) {
    if (error instanceof StructuralParseError) {
      return { ok: false, error: errorMessage(error) };
    }
    throw error;
  }
}

/**
 * Yield rows unit by unit in the fetch order, tallying outcomes into
 * `summary` as it goes.
 */
export async function* normalizeUnits(
  pipeline: DatasetPipeline,
  units: FetchedUnit[],
  ctx: RunContext,
  summary: NormalizeSummary
): AsyncGenerator<Row> {
  for (const unit of units) {
    const result = await normalizeUnit(pipeline, unit, ctx);

    if (result.ok) {
      summary.processedUnits++;
      summary.rowCount += result.rows.length;
      yield* result.rows;
    } else {
      summary.erroredUnits++;
      summary.errors.push({ unit: unit.id, error: result.error });
      ctx.log.error({ unit: unit.id, error: result.error }, "Skipping unparseable unit");
    }

    const done = summary.processedUnits + summary.erroredUnits;
    if (done % PROGRESS_INTERVAL === 0 && done < units.length) {
      ctx.log.info({ done, total: units.length }, "Normalization progress");
    }
  }
}

// ============================================================================
// Run
// ============================================================================

async function prune(pipeline: DatasetPipeline, ctx: RunContext): Promise<void> {
  const { dirs, log, config } = ctx;

  await pruneArtifacts(dirs.dataDir, timestampedTablePattern(pipeline.schema.name), { log });
  for (const pattern of pipeline.staleArtifacts ?? []) {
    await pruneArtifacts(dirs.dataDir, pattern, { log });
  }
  await pruneLogs(dirs.logDir, logFilePattern(pipeline.logPrefix), {
    keep: pipeline.logRetention(config),
    log,
  });
}

export async function runPipeline(
  pipeline: DatasetPipeline,
  ctx: RunContext
): Promise<RunSummary> {
  const { log, dirs } = ctx;
  const startTime = performance.now();

  log.info(
    { dataDir: dirs.dataDir, logDir: dirs.logDir, testMode: ctx.testMode },
    "Run started"
  );

  try {
    const units = await pipeline.fetch(ctx);
    log.info({ units: units.length }, "Fetch phase complete");

    const normalized: NormalizeSummary = {
      processedUnits: 0,
      erroredUnits: 0,
      rowCount: 0,
      errors: [],
    };
    const publishOptions = {
      dataDir: dirs.dataDir,
      schema: pipeline.schema,
      timestamp: ctx.timestamp,
      log,
    };

    const staged = await stageTable(
      normalizeUnits(pipeline, units, ctx, normalized),
      publishOptions
    );

    // Publishing an empty table over a good one would lose data
    if (units.length > 0 && normalized.processedUnits === 0) {
      await discardStaged(staged, log);
      throw new StructuralParseError(
        pipeline.dataset,
        `none of ${String(units.length)} units could be parsed`
      );
    }

    const published = await promoteTable(staged, publishOptions);

    log.info(
      {
        processedUnits: normalized.processedUnits,
        erroredUnits: normalized.erroredUnits,
        rowCount: published.rowCount,
      },
      "Normalization summary"
    );

    await pipeline.afterPublish?.(ctx);
    await prune(pipeline, ctx);

    const summary: RunSummary = {
      dataset: pipeline.dataset,
      outcome: normalized.erroredUnits > 0 ? "completed_with_errors" : "success",
      processedUnits: normalized.processedUnits,
      erroredUnits: normalized.erroredUnits,
      rowCount: published.rowCount,
      archivePath: published.archivePath,
      logFile: ctx.logFile,
      durationMs: Math.round(performance.now() - startTime),
    };

    log.info(summary, "Run finished");
    return summary;
  } catch (error) {
    log.error(
      {
        code: error instanceof PipelineError ? error.code : "UNEXPECTED",
        error: errorMessage(error),
      },
      "Run failed"
    );
    throw error;
  }
}
