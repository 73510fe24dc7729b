import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import {
  logFilePattern,
  pruneArtifacts,
  pruneLogs,
  removeDirectory,
} from "../../../../src/services/sync/retention.js";
import { listSorted, makeTempDir, removeTempDir } from "../../../mocks/fs.js";
import { silentLogger } from "../../../mocks/logger.js";

const log = silentLogger();

describe("services/sync/retention", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function touch(...names: string[]): Promise<void> {
    for (const name of names) {
      await writeFile(join(dir, name), "");
    }
  }

  describe("pruneLogs", () => {
    it("should keep the newest N matching logs", async () => {
      await touch(
        "cpes_download_2025-01-01_000000.log",
        "cpes_download_2025-01-03_000000.log",
        "cpes_download_2025-01-02_120000.log",
        "cpes_download_2025-01-02_000000.log",
        "epss_download_2024-01-01_000000.log"
      );

      const result = await pruneLogs(dir, logFilePattern("cpes_download"), { keep: 2, log });

      expect(result.kept).toEqual([
        "cpes_download_2025-01-03_000000.log",
        "cpes_download_2025-01-02_120000.log",
      ]);
      expect(result.removed.sort()).toEqual([
        "cpes_download_2025-01-01_000000.log",
        "cpes_download_2025-01-02_000000.log",
      ]);
      await expect(listSorted(dir)).resolves.toEqual([
        "cpes_download_2025-01-02_120000.log",
        "cpes_download_2025-01-03_000000.log",
        "epss_download_2024-01-01_000000.log",
      ]);
    });

    it("should remove nothing when there are fewer logs than the bound", async () => {
      await touch("cpes_download_2025-01-01_000000.log");
      const result = await pruneLogs(dir, logFilePattern("cpes_download"), { keep: 3, log });
      expect(result.removed).toEqual([]);
    });
  });

  describe("pruneArtifacts", () => {
    it("should remove every match by default", async () => {
      await touch("epss_scores-2025-01-01.csv.gz", "epss_scores-2025-01-02.csv.gz", "epss_scores.csv.tar.gz");

      const result = await pruneArtifacts(dir, /^epss_scores-.*\.csv\.gz$/, { log });

      expect(result.kept).toEqual([]);
      await expect(listSorted(dir)).resolves.toEqual(["epss_scores.csv.tar.gz"]);
    });

    it("should warn instead of failing for a missing directory", async () => {
      const result = await pruneArtifacts(join(dir, "absent"), /.*/, { log });
      expect(result).toEqual({ kept: [], removed: [], failed: [] });
    });
  });

  describe("removeDirectory", () => {
    it("should remove a directory tree", async () => {
      await mkdir(join(dir, "work", "nested"), { recursive: true });
      await expect(removeDirectory(join(dir, "work"), log)).resolves.toBe(true);
      await expect(listSorted(dir)).resolves.toEqual([]);
    });
  });
});
