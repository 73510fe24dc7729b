import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { loadConfig } from "../../../../src/config.js";
import { datasetStatus } from "../../../../src/services/sync/status.js";
import { makeTempDir, removeTempDir } from "../../../mocks/fs.js";

describe("services/sync/status", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it("should report a dataset that was never published", async () => {
    const status = await datasetStatus(loadConfig({ rootDir: root }, {}), "epss");

    expect(status).toEqual({
      dataset: "epss",
      archivePath: join(root, "epss", "data", "epss_scores.csv.tar.gz"),
      archiveBytes: null,
      updatedAt: null,
      lastLog: null,
      pendingCheckpoint: null,
    });
  });

  it("should report the archive, the newest log and a pending checkpoint", async () => {
    const dataDir = join(root, "cpes", "data");
    const logDir = join(root, "cpes", "logs");
    await mkdir(join(dataDir, "cpes_work"), { recursive: true });
    await mkdir(logDir, { recursive: true });
    await writeFile(join(dataDir, "cpes.csv.tar.gz"), "12345");
    await writeFile(join(dataDir, "cpes_work", "checkpoint.txt"), "7");
    await writeFile(join(logDir, "cpes_download_2025-06-01_000000.log"), "");
    await writeFile(join(logDir, "cpes_download_2025-06-02_000000.log"), "");
    await writeFile(join(logDir, "notes.txt"), "");

    const status = await datasetStatus(loadConfig({ rootDir: root }, {}), "cpes");

    expect(status).toMatchObject({
      archiveBytes: 5,
      lastLog: "cpes_download_2025-06-02_000000.log",
      pendingCheckpoint: "7",
    });
    expect(status.updatedAt).toBeInstanceOf(Date);
  });
});
