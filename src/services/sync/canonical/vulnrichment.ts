/**
 * CISA vulnrichment records → canonical rows
 *
 * One unit is one CVE JSON 5 record. CISA's ADP containers are merged in
 * document order; for every field group the first container that yields a
 * value wins. The CNA container supplies its own CVSS columns and the CWE
 * fallback.
 */

import { errorMessage } from "../../../errors.js";
import {
  isObject,
  safeArray,
  safeGet,
  safeObject,
  safeString,
  type JsonObject,
} from "../../../utils/safe-path.js";

import type { Row, TableSchema, UnitResult } from "../../../types/index.js";

// ============================================================================
// Schema
// ============================================================================

export const VULNRICHMENT_SCHEMA: TableSchema = {
  name: "cisa_vulnrichment",
  columns: [
    "cve_id",
    "cisa_cvss_base_score",
    "cisa_cvss_base_severity",
    "cisa_cvss_vector_string",
    "cisa_cvss_version",
    "cwe_id",
    "cwe_description",
    "ssvc_exploitation",
    "ssvc_automatable",
    "ssvc_impact",
    "kev_entry",
    "kev_date",
    "cna_cvss_base_score",
    "cna_cvss_base_severity",
    "cna_cvss_vector_string",
    "cna_cvss_version",
    "cisa_adp",
    "vulnrichment",
  ],
};

const CISA_ADP_LABEL = "CISA ADP";
const VULNRICHMENT_LABEL = "Vulnrichment";

// Metric keys such as cvssV3_1, cvssV4_0
const CVSS_KEY_PATTERN = /^cvssV\d+_\d+$/;

// ============================================================================
// Types
// ============================================================================

interface CvssFields {
  baseScore: string;
  baseSeverity: string;
  vectorString: string;
  version: string;
}

interface SsvcFields {
  exploitation: string;
  automatable: string;
  impact: string;
}

interface KevFields {
  entry: string;
  dateAdded: string;
}

interface CweFields {
  id: string;
  description: string;
}

const EMPTY_CVSS: CvssFields = { baseScore: "", baseSeverity: "", vectorString: "", version: "" };
const EMPTY_SSVC: SsvcFields = { exploitation: "", automatable: "", impact: "" };
const EMPTY_KEV: KevFields = { entry: "", dateAdded: "" };
const EMPTY_CWE: CweFields = { id: "", description: "" };

// ============================================================================
// Field Extraction
// ============================================================================

/**
 * CVSS base scores keep one decimal place ("10.0", not "10").
 */
export function formatScore(value: unknown): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
  }
  return typeof value === "string" ? value : "";
}

/**
 * First metric entry whose key looks like `cvssV<major>_<minor>`.
 */
export function findCvss(metrics: unknown): CvssFields | null {
  for (const metric of safeArray(metrics)) {
    if (!isObject(metric)) continue;

    for (const [key, data] of Object.entries(metric)) {
      if (!CVSS_KEY_PATTERN.test(key) || !isObject(data)) continue;

      return {
        baseScore: formatScore(safeGet(data, ["baseScore"])),
        baseSeverity: safeString(data, ["baseSeverity"]),
        vectorString: safeString(data, ["vectorString"]),
        version: safeString(data, ["version"]),
      };
    }
  }
  return null;
}

/**
 * SSVC decision points from `metrics[].other.content.options` where
 * `other.type === "ssvc"`.
 */
export function findSsvc(metrics: unknown): SsvcFields | null {
  const found: SsvcFields = { ...EMPTY_SSVC };

  for (const metric of safeArray(metrics)) {
    const other = safeObject(metric, ["other"]);
    if (other.type !== "ssvc") continue;

    for (const option of safeArray(other, ["content", "options"])) {
      if (!isObject(option)) continue;

      if ("Exploitation" in option) found.exploitation = safeString(option, ["Exploitation"]);
      if ("Automatable" in option) found.automatable = safeString(option, ["Automatable"]);
      if ("Technical Impact" in option) found.impact = safeString(option, ["Technical Impact"]);
    }
  }

  return found.exploitation || found.automatable || found.impact ? found : null;
}

/**
 * Known-exploited marker from a metric with `other.type === "kev"`.
 */
export function findKev(metrics: unknown): KevFields | null {
  for (const metric of safeArray(metrics)) {
    const other = safeObject(metric, ["other"]);
    if (other.type === "kev") {
      return { entry: "kev", dateAdded: safeString(other, ["content", "dateAdded"]) };
    }
  }
  return null;
}

/**
 * First problem type description that names a CWE.
 */
export function findCwe(problemTypes: unknown): CweFields | null {
  for (const problemType of safeArray(problemTypes)) {
    for (const description of safeArray(problemType, ["descriptions"])) {
      const id = safeString(description, ["cweId"]);
      if (id !== "") {
        return { id, description: safeString(description, ["description"]) };
      }
    }
  }
  return null;
}

// ============================================================================
// Record Mapping
// ============================================================================

export function vulnrichmentRow(record: JsonObject): Row {
  let cisaCvss: CvssFields | null = null;
  let ssvc: SsvcFields | null = null;
  let kev: KevFields | null = null;
  let cwe: CweFields | null = null;

  for (const adp of safeArray(record, ["containers", "adp"])) {
    const metrics = safeGet(adp, ["metrics"]);
    cisaCvss ??= findCvss(metrics);
    ssvc ??= findSsvc(metrics);
    kev ??= findKev(metrics);
    cwe ??= findCwe(safeGet(adp, ["problemTypes"]));
  }

  const cna = safeObject(record, ["containers", "cna"]);
  const cnaCvss = findCvss(cna.metrics) ?? EMPTY_CVSS;
  cwe ??= findCwe(cna.problemTypes);

  const cisa = cisaCvss ?? EMPTY_CVSS;
  const decision = ssvc ?? EMPTY_SSVC;
  const known = kev ?? EMPTY_KEV;
  const weakness = cwe ?? EMPTY_CWE;

  return [
    safeString(record, ["cveMetadata", "cveId"]),
    cisa.baseScore,
    cisa.baseSeverity,
    cisa.vectorString,
    cisa.version,
    weakness.id,
    weakness.description,
    decision.exploitation,
    decision.automatable,
    decision.impact,
    known.entry,
    known.dateAdded,
    cnaCvss.baseScore,
    cnaCvss.baseSeverity,
    cnaCvss.vectorString,
    cnaCvss.version,
    CISA_ADP_LABEL,
    VULNRICHMENT_LABEL,
  ];
}

/**
 * Parse one record file. Only an unparseable document or a non-object top
 * level is an error; missing fields become empty cells.
 */
export function normalizeVulnrichmentRecord(content: string): UnitResult {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }

  if (!isObject(document)) {
    return { ok: false, error: "top-level value is not an object" };
  }

  return { ok: true, rows: [vulnrichmentRow(document)] };
}
