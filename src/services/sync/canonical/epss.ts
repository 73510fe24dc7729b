/**
 * EPSS daily score file → canonical rows
 *
 * The upstream CSV starts with a `#model_version:...,score_date:...`
 * comment followed by a `cve,epss,percentile` header.
 */

import { parse } from "csv-parse/sync";

import { errorMessage } from "../../../errors.js";
import { safeString } from "../../../utils/safe-path.js";

import type { Row, TableSchema } from "../../../types/index.js";

export const EPSS_SCHEMA: TableSchema = {
  name: "epss_scores",
  columns: ["cve", "epss", "percentile"],
};

export interface EpssMetadata {
  modelVersion: string;
  scoreDate: string;
}

export type EpssParseResult =
  | { ok: true; rows: Row[]; skipped: number; metadata: EpssMetadata }
  | { ok: false; error: string };

/**
 * Read `key:value` pairs from the leading comment line.
 */
export function parseEpssMetadata(content: string): EpssMetadata {
  const [firstLine = ""] = content.split("\n", 1);
  const metadata: EpssMetadata = { modelVersion: "", scoreDate: "" };

  if (!firstLine.startsWith("#")) {
    return metadata;
  }

  for (const pair of firstLine.slice(1).split(",")) {
    const separator = pair.indexOf(":");
    if (separator === -1) continue;

    const key = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (key === "model_version") metadata.modelVersion = value;
    if (key === "score_date") metadata.scoreDate = value;
  }

  return metadata;
}

/**
 * Parse the decompressed file. Rows without a CVE id are skipped and
 * counted; missing score cells become "".
 */
export function normalizeEpssFile(content: string): EpssParseResult {
  let records: unknown[];
  try {
    records = parse(content, {
      columns: true,
      comment: "#",
      comment_no_infix: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }

  const rows: Row[] = [];
  let skipped = 0;

  for (const record of records) {
    const cve = safeString(record, ["cve"]);
    if (cve === "") {
      skipped++;
      continue;
    }
    rows.push([cve, safeString(record, ["epss"]), safeString(record, ["percentile"])]);
  }

  return { ok: true, rows, skipped, metadata: parseEpssMetadata(content) };
}
