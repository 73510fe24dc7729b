/**
 * NVD CPE catalog pages → canonical rows (one row per product)
 */

import { errorMessage } from "../../../errors.js";
import { isObject, safeArray, safeGet, safeString } from "../../../utils/safe-path.js";

import type { Row, TableSchema, UnitResult } from "../../../types/index.js";

export const CPES_SCHEMA: TableSchema = {
  name: "cpes",
  columns: ["deprecated", "cpeName", "cpeNameId", "lastModified", "created", "title", "refs"],
};

/**
 * English title among the per-language titles, "" when there is none
 */
export function englishTitle(titles: unknown): string {
  for (const entry of safeArray(titles)) {
    if (safeGet(entry, ["lang"]) === "en") {
      return safeString(entry, ["title"]);
    }
  }
  return "";
}

export function cpeRow(product: unknown): Row {
  const cpe = safeGet(product, ["cpe"], {});

  return [
    safeGet(cpe, ["deprecated"]) === true ? "true" : "false",
    safeString(cpe, ["cpeName"]),
    safeString(cpe, ["cpeNameId"]),
    safeString(cpe, ["lastModified"]),
    safeString(cpe, ["created"]),
    englishTitle(safeGet(cpe, ["titles"])),
    safeArray(cpe, ["refs"])
      .map((ref) => safeString(ref, ["ref"]))
      .join(" "),
  ];
}

/**
 * Normalize one stored page payload.
 */
export function normalizeCpePage(content: string): UnitResult {
  let page: unknown;
  try {
    page = JSON.parse(content);
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }

  const products = isObject(page) ? page.products : undefined;
  if (!Array.isArray(products)) {
    return { ok: false, error: "page has no products array" };
  }

  return { ok: true, rows: products.map(cpeRow) };
}
