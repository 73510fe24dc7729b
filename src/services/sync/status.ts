/**
 * Local state of each dataset: published archive, last run log, pending
 * page checkpoint.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";

import { datasetDirs, type DatasetName, type PipelineConfig } from "../../config.js";
import { CHECKPOINT_FILE, CPES_WORK_DIR } from "./datasets/cpes.js";
import { DATASET_INFO } from "./datasets/info.js";
import { artifactPaths } from "./publisher.js";
import { logFilePattern } from "./retention.js";

export interface DatasetStatus {
  dataset: DatasetName;
  archivePath: string;
  archiveBytes: number | null;
  updatedAt: Date | null;
  lastLog: string | null;
  /** Next page index of an interrupted paginated fetch */
  pendingCheckpoint: string | null;
}

async function statOrNull(filePath: string) {
  try {
    return await stat(filePath);
  } catch {
    return null;
  }
}

async function latestLog(logDir: string, logPrefix: string): Promise<string | null> {
  const pattern = logFilePattern(logPrefix);
  let names: string[];
  try {
    names = await readdir(logDir);
  } catch {
    return null;
  }
  const [latest] = names.filter((name) => pattern.test(name)).sort().reverse();
  return latest ?? null;
}

async function readCheckpoint(dataDir: string): Promise<string | null> {
  try {
    return (await readFile(join(dataDir, CPES_WORK_DIR, CHECKPOINT_FILE), "utf8")).trim();
  } catch {
    return null;
  }
}

export async function datasetStatus(
  config: PipelineConfig,
  dataset: DatasetName
): Promise<DatasetStatus> {
  const info = DATASET_INFO[dataset];
  const dirs = datasetDirs(config, dataset);
  const { archive } = artifactPaths(dirs.dataDir, info.schema.name, "");
  const archiveStat = await statOrNull(archive);

  return {
    dataset,
    archivePath: archive,
    archiveBytes: archiveStat?.size ?? null,
    updatedAt: archiveStat?.mtime ?? null,
    lastLog: await latestLog(dirs.logDir, info.logPrefix),
    pendingCheckpoint: dataset === "cpes" ? await readCheckpoint(dirs.dataDir) : null,
  };
}
