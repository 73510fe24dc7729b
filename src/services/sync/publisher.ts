/**
 * Publisher - canonical table swap and compression
 *
 * Order of operations:
 *   1. write <base>_<timestamp>.csv (exclusive create)
 *   2. replace <base>.csv with it
 *   3. pack <base>.csv into <base>.csv.tar.gz.part and verify the archive
 *   4. rename the archive over the previous <base>.csv.tar.gz
 *   5. delete <base>.csv
 * A failure before step 4 leaves the previous archive in place.
 */

import { createWriteStream } from "node:fs";
import { rename, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import { stringify } from "csv-stringify";
import { create as createArchive, list as listArchive } from "tar";

import { PipelineError, PublishError, errorMessage } from "../../errors.js";

import type { RunLogger } from "../../logger.js";
import type { PublishResult, Row, TableSchema } from "../../types/index.js";

// ============================================================================
// Paths
// ============================================================================

export interface ArtifactPaths {
  timestampedTable: string;
  canonicalTable: string;
  archive: string;
  archivePart: string;
}

export function artifactPaths(
  dataDir: string,
  baseName: string,
  timestamp: string
): ArtifactPaths {
  const archive = join(dataDir, `${baseName}.csv.tar.gz`);
  return {
    timestampedTable: join(dataDir, `${baseName}_${timestamp}.csv`),
    canonicalTable: join(dataDir, `${baseName}.csv`),
    archive,
    archivePart: `${archive}.part`,
  };
}

/**
 * Leftover timestamped tables of this dataset, e.g. cpes_2025-01-02_030405.csv
 */
export function timestampedTablePattern(baseName: string): RegExp {
  return new RegExp(`^${baseName}_\\d{4}-\\d{2}-\\d{2}_\\d{6}\\.csv$`);
}

// ============================================================================
// Table Writing
// ============================================================================

async function* withHeader(
  schema: TableSchema,
  rows: Iterable<Row> | AsyncIterable<Row>,
  counter: { rows: number }
): AsyncGenerator<Row> {
  yield schema.columns;

  for await (const row of rows) {
    if (row.length !== schema.columns.length) {
      throw new PublishError(
        `Row ${String(counter.rows + 1)} has ${String(row.length)} cells, schema ${schema.name} has ${String(schema.columns.length)}`
      );
    }
    counter.rows++;
    yield row;
  }
}

/**
 * Write the header and rows as CSV. Fields are quoted only when they
 * contain a comma, a quote or a line break. Refuses to overwrite.
 */
export async function writeTable(
  filePath: string,
  schema: TableSchema,
  rows: Iterable<Row> | AsyncIterable<Row>
): Promise<number> {
  const counter = { rows: 0 };

  await pipeline(
    Readable.from(withHeader(schema, rows, counter)),
    stringify({ record_delimiter: "unix" }),
    createWriteStream(filePath, { flags: "wx" })
  );

  return counter.rows;
}

// ============================================================================
// Archive
// ============================================================================

interface ArchiveEntry {
  path: string;
  size: number;
}

export async function listArchiveEntries(archivePath: string): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = [];
  await listArchive({
    file: archivePath,
    onReadEntry: (entry) => {
      entries.push({ path: entry.path, size: entry.size ?? 0 });
    },
  });
  return entries;
}

/**
 * Pack `fileName` (relative to `dir`) into a gzip tar and confirm the
 * archive holds exactly that file at its full size.
 */
export async function compressAndVerify(
  dir: string,
  fileName: string,
  archivePath: string
): Promise<void> {
  await createArchive({ gzip: true, file: archivePath, cwd: dir, portable: true }, [fileName]);

  const expectedSize = (await stat(join(dir, fileName))).size;
  const entries = await listArchiveEntries(archivePath);
  const [entry] = entries;

  if (entries.length !== 1 || entry === undefined) {
    throw new PublishError(`Archive ${archivePath} holds ${String(entries.length)} entries, expected 1`);
  }
  if (entry.path !== fileName || entry.size !== expectedSize) {
    throw new PublishError(
      `Archive entry ${entry.path} (${String(entry.size)} bytes) does not match ${fileName} (${String(expectedSize)} bytes)`
    );
  }
}

// ============================================================================
// Publish
// ============================================================================

export interface PublishOptions {
  dataDir: string;
  schema: TableSchema;
  timestamp: string;
  log: RunLogger;
}

function asPublishError(step: string, error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  return new PublishError(`${step}: ${errorMessage(error)}`, { step });
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

async function* trackSourceFailure(
  rows: Iterable<Row> | AsyncIterable<Row>,
  state: { failed: boolean }
): AsyncGenerator<Row> {
  try {
    yield* rows;
  } catch (error) {
    state.failed = true;
    throw error;
  }
}

export interface StagedTable {
  paths: ArtifactPaths;
  rowCount: number;
  bytes: number;
}

/**
 * Step 1: write the fresh timestamped table. Nothing visible to consumers
 * changes yet.
 */
export async function stageTable(
  rows: Iterable<Row> | AsyncIterable<Row>,
  options: PublishOptions
): Promise<StagedTable> {
  const { dataDir, schema, timestamp, log } = options;
  const paths = artifactPaths(dataDir, schema.name, timestamp);

  const source = { failed: false };
  let rowCount: number;
  try {
    rowCount = await writeTable(paths.timestampedTable, schema, trackSourceFailure(rows, source));
  } catch (error) {
    // Never delete a file this run did not create
    if (!isAlreadyExists(error)) {
      await rm(paths.timestampedTable, { force: true });
    }
    // Errors raised while producing rows belong to the caller
    if (source.failed) {
      throw error;
    }
    throw asPublishError(`Writing ${paths.timestampedTable}`, error);
  }

  const bytes = (await stat(paths.timestampedTable)).size;
  log.info({ file: paths.timestampedTable, rowCount, bytes }, "Table written");
  return { paths, rowCount, bytes };
}

export async function discardStaged(staged: StagedTable, log: RunLogger): Promise<void> {
  await rm(staged.paths.timestampedTable, { force: true });
  log.info({ file: staged.paths.timestampedTable }, "Discarded staged table");
}

/**
 * Steps 2-5: swap the staged table in, compress it, retire the
 * uncompressed copy.
 */
export async function promoteTable(
  staged: StagedTable,
  options: PublishOptions
): Promise<PublishResult> {
  const { dataDir, schema, log } = options;
  const { paths } = staged;
  const canonicalName = `${schema.name}.csv`;

  try {
    await rm(paths.canonicalTable, { force: true });
    await rename(paths.timestampedTable, paths.canonicalTable);
  } catch (error) {
    throw asPublishError(`Replacing ${paths.canonicalTable}`, error);
  }
  log.info({ file: paths.canonicalTable }, "Canonical table updated");

  try {
    await rm(paths.archivePart, { force: true });
    await compressAndVerify(dataDir, canonicalName, paths.archivePart);
    await rename(paths.archivePart, paths.archive);
  } catch (error) {
    await rm(paths.archivePart, { force: true });
    throw asPublishError(`Compressing ${paths.canonicalTable}`, error);
  }
  const archiveBytes = (await stat(paths.archive)).size;
  log.info({ archive: paths.archive, bytes: archiveBytes }, "Compressed canonical table");

  try {
    await rm(paths.canonicalTable);
    log.info({ file: paths.canonicalTable }, "Removed uncompressed table");
  } catch (error) {
    log.warn({ file: paths.canonicalTable, error: errorMessage(error) }, "Could not remove uncompressed table");
  }

  return { archivePath: paths.archive, rowCount: staged.rowCount, bytes: archiveBytes };
}

export async function publishTable(
  rows: Iterable<Row> | AsyncIterable<Row>,
  options: PublishOptions
): Promise<PublishResult> {
  const staged = await stageTable(rows, options);
  return promoteTable(staged, options);
}
