// Canonical table model and run results

// =====================
// Canonical Table
// =====================

export interface TableSchema {
  /** Base file name of the published table, e.g. "cpes" */
  name: string;
  columns: readonly string[];
}

/** One cell per schema column, empty string for absent values */
export type Row = readonly string[];

export type UnitResult =
  | { ok: true; rows: Row[] }
  | { ok: false; error: string };

export interface UnitFailure {
  unit: string;
  error: string;
}

export interface NormalizeSummary {
  processedUnits: number;
  erroredUnits: number;
  rowCount: number;
  errors: UnitFailure[];
}

// =====================
// Run Results
// =====================

export interface PublishResult {
  archivePath: string;
  rowCount: number;
  bytes: number;
}

/**
 * "completed_with_errors" means the table was published but some units
 * could not be parsed and contributed no rows.
 */
export type RunOutcome = "success" | "completed_with_errors";

export interface RunSummary {
  dataset: string;
  outcome: RunOutcome;
  processedUnits: number;
  erroredUnits: number;
  rowCount: number;
  archivePath: string;
  logFile: string;
  durationMs: number;
}
