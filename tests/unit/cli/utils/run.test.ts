import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { runDatasetCommand } from "../../../../src/cli/utils/run.js";
import { ConfigError } from "../../../../src/errors.js";
import { logger } from "../../../../src/logger.js";
import { makeTempDir, removeTempDir } from "../../../mocks/fs.js";

describe("cli/utils/run", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await removeTempDir(root);
  });

  it("should log a failure that happens before the run log is open", async () => {
    const logError = vi.spyOn(logger, "error").mockImplementation(() => undefined);

    await runDatasetCommand("EPSS scores", { rootDir: root }, {}, () => {
      throw new ConfigError('Invalid date "2025-13-01", expected YYYY-MM-DD');
    });

    expect(process.exitCode).toBe(1);
    expect(logError).toHaveBeenCalledWith(
      { dataset: "EPSS scores", error: 'Invalid date "2025-13-01", expected YYYY-MM-DD' },
      "Run could not start"
    );
  });
});
