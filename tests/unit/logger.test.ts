import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { createRunLogger, logger } from "../../src/logger.js";
import { isObject } from "../../src/utils/safe-path.js";
import { makeTempDir, removeTempDir } from "../mocks/fs.js";

describe("logger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("should take the base level from LOG_LEVEL", () => {
    expect(logger.level).toBe(process.env.LOG_LEVEL ?? "info");
  });

  it("should write run log lines with an ISO time, a level label and the dataset", async () => {
    const logFile = join(dir, "logs", "epss_download_2025-06-02_030405.log");
    const log = createRunLogger({ logFile, level: "info", dataset: "epss", stdout: false });

    log.debug("hidden");
    log.warn({ file: "a.csv" }, "Something odd");

    const lines = (await readFile(logFile, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toMatchObject({ level: "warn", dataset: "epss", file: "a.csv", msg: "Something odd" });
    const time = isObject(entry) ? entry.time : undefined;
    expect(typeof time === "string" && /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/.test(time)).toBe(true);
  });
});
