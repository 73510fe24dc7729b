/**
 * Checkpoint Store - resume position for paginated fetches
 *
 * Holds the index of the next page to fetch. The store is advanced only
 * after that page's payload is durably on disk, so a crash between the two
 * writes costs one refetch and never a skipped page.
 */

import { readFile, rm } from "node:fs/promises";

import { errorMessage } from "../../errors.js";
import { writeFileDurable } from "../../utils/fs.js";

import type { RunLogger } from "../../logger.js";

export interface CheckpointStore {
  /** Next unit index, or 0 when nothing usable is stored */
  load(totalUnits: number): Promise<number>;
  save(nextIndex: number): Promise<void>;
  clear(): Promise<void>;
}

const INTEGER_PATTERN = /^\d+$/;

export class FileCheckpointStore implements CheckpointStore {
  constructor(
    private readonly filePath: string,
    private readonly log: RunLogger
  ) {}

  /**
   * Missing, unreadable, malformed or out-of-range content degrades to 0.
   */
  async load(totalUnits: number): Promise<number> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        this.log.info({ checkpoint: this.filePath }, "No checkpoint, starting from the first page");
      } else {
        this.log.warn(
          { checkpoint: this.filePath, error: errorMessage(error) },
          "Checkpoint unreadable, starting from the first page"
        );
      }
      return 0;
    }

    const trimmed = content.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      this.log.warn({ checkpoint: this.filePath, content: trimmed.slice(0, 50) }, "Malformed checkpoint ignored");
      return 0;
    }

    const index = Number(trimmed);
    if (!Number.isSafeInteger(index) || index > totalUnits) {
      this.log.warn({ checkpoint: this.filePath, index, totalUnits }, "Checkpoint out of range ignored");
      return 0;
    }

    this.log.info({ checkpoint: this.filePath, index }, "Resuming from checkpoint");
    return index;
  }

  async save(nextIndex: number): Promise<void> {
    await writeFileDurable(this.filePath, String(nextIndex));
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
