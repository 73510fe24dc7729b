import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { gzipSync } from "node:zlib";

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { loadConfig, type PipelineConfig } from "../../../../../src/config.js";
import {
  ConfigError,
  PermanentError,
  StructuralParseError,
} from "../../../../../src/errors.js";
import { createRunContext, runPipeline } from "../../../../../src/services/sync/pipeline.js";
import {
  createEpssPipeline,
  epssFileName,
  resolveEpssDate,
} from "../../../../../src/services/sync/datasets/epss.js";
import { readPublishedTable } from "../../../../mocks/archive.js";
import { fakeSleep, statusResponse, stubFetch } from "../../../../mocks/fetch.js";
import { listSorted, makeTempDir, removeTempDir } from "../../../../mocks/fs.js";
import { EPSS_CSV } from "../../../../fixtures/epss.js";

const BASE_URL = "https://epss.example.test";
const gzipped = () => new Uint8Array(gzipSync(EPSS_CSV));

describe("services/sync/datasets/epss", () => {
  let root: string;
  let config: PipelineConfig;

  beforeEach(async () => {
    root = await makeTempDir();
    config = loadConfig({ rootDir: root, epss: { baseUrl: BASE_URL } }, {});
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await removeTempDir(root);
  });

  async function runFor(date: string) {
    const pipeline = createEpssPipeline({ date });
    const ctx = await createRunContext(pipeline, config, {
      now: new Date(2025, 5, 2, 3, 4, 5),
      sleep: fakeSleep(),
      stdout: false,
    });
    return { ctx, result: runPipeline(pipeline, ctx) };
  }

  describe("resolveEpssDate", () => {
    it("should default to the previous day", () => {
      expect(resolveEpssDate({ now: new Date(2025, 0, 1, 8) })).toBe("2024-12-31");
    });

    it("should reject a malformed date", () => {
      expect(() => resolveEpssDate({ date: "2025/06/01" })).toThrow(ConfigError);
      expect(() => createEpssPipeline({ date: "2025-02-30" })).toThrow(ConfigError);
    });
  });

  it("should download, parse and publish the day's scores", async () => {
    const fetchMock = stubFetch(() => new Response(gzipped(), { status: 200 }));

    const { ctx, result } = await runFor("2025-06-01");
    const summary = await result;

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${BASE_URL}/epss_scores-2025-06-01.csv.gz`);
    expect(summary).toMatchObject({ outcome: "success", processedUnits: 1, rowCount: 3 });
    await expect(readPublishedTable(summary.archivePath, "epss_scores", join(root, "scratch"))).resolves.toBe(
      "cve,epss,percentile\nCVE-1999-0001,0.01102,0.77507\nCVE-2024-0001,0.94321,0.99950\nCVE-2024-0002,0.00043,\n"
    );
    // Raw download removed once published
    await expect(listSorted(ctx.dirs.dataDir)).resolves.toEqual(["epss_scores.csv.tar.gz"]);
  });

  it("should remove partial downloads left by an interrupted run", async () => {
    stubFetch(() => new Response(gzipped(), { status: 200 }));
    const pipeline = createEpssPipeline({ date: "2025-06-01" });
    const ctx = await createRunContext(pipeline, config, { sleep: fakeSleep(), stdout: false });
    await writeFile(join(ctx.dirs.dataDir, "epss_scores-2025-05-30.csv.gz.part"), "partial");

    await runPipeline(pipeline, ctx);

    await expect(listSorted(ctx.dirs.dataDir)).resolves.toEqual(["epss_scores.csv.tar.gz"]);
  });

  it("should reuse a file already downloaded", async () => {
    const fetchMock = stubFetch(() => statusResponse(500));
    const pipeline = createEpssPipeline({ date: "2025-06-01" });
    const ctx = await createRunContext(pipeline, config, { sleep: fakeSleep(), stdout: false });
    await writeFile(join(ctx.dirs.dataDir, epssFileName("2025-06-01")), gzipped());

    await expect(runPipeline(pipeline, ctx)).resolves.toMatchObject({ rowCount: 3 });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should not retry a date that does not exist upstream", async () => {
    const fetchMock = stubFetch(() => statusResponse(404, "Not Found"));

    const { ctx, result } = await runFor("2025-06-01");

    await expect(result).rejects.toBeInstanceOf(PermanentError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    await expect(listSorted(ctx.dirs.dataDir)).resolves.toEqual([]);
  });

  it("should refuse to publish a file that is not gzip", async () => {
    stubFetch(() => new Response("<html>maintenance</html>", { status: 200 }));

    const { ctx, result } = await runFor("2025-06-01");

    await expect(result).rejects.toBeInstanceOf(StructuralParseError);
    await expect(listSorted(ctx.dirs.dataDir)).resolves.toEqual(["epss_scores-2025-06-01.csv.gz"]);
  });
});
