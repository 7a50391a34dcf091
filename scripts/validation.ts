import { promises as fs } from "node:fs";
import path from "node:path";
import type { Row } from "./types";

// Shared validation and reporting utilities for the enrichment scripts

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface ProcessingResult<T> {
  success: boolean;
  data?: T;
  errors: string[];
}

export type StatusSummary = {
  column: string;
  total_rows: number;
  with_status: number;
  without_status: number;
  counts: Record<string, number>;
};

/**
 * Warn about source column groups absent from the header. Rows are still
 * processed; those fields simply read as blank.
 */
export function validateSourceColumns(
  header: readonly string[],
  groups: Record<string, readonly string[]>
): ValidationResult {
  const result: ValidationResult = { isValid: true, errors: [], warnings: [] };

  if (header.length === 0) {
    result.isValid = false;
    result.errors.push("Input has no header row");
    return result;
  }

  for (const [name, columns] of Object.entries(groups)) {
    if (!columns.some((c) => header.includes(c))) {
      result.warnings.push(`No ${name} column found (expected one of: ${columns.join(", ")})`);
    }
  }

  return result;
}

export function summarizeStatuses(rows: readonly Row[], statusColumn: string): StatusSummary {
  const counts: Record<string, number> = {};
  let withStatus = 0;
  for (const row of rows) {
    const status = row[statusColumn];
    if (!status) continue;
    withStatus++;
    counts[status] = (counts[status] ?? 0) + 1;
  }
  return {
    column: statusColumn,
    total_rows: rows.length,
    with_status: withStatus,
    without_status: rows.length - withStatus,
    counts,
  };
}

export function formatCounts(counts: Record<string, number>): string {
  const entries = Object.entries(counts).sort(([a], [b]) => a.localeCompare(b));
  return entries.length ? entries.map(([k, v]) => `${k}=${v}`).join(", ") : "none";
}

/**
 * Structured error handling wrapper for async functions
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: string
): Promise<ProcessingResult<T>> {
  try {
    const data = await operation();
    return { success: true, data, errors: [] };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`❌ ${context} failed:`, errorMessage);
    return { success: false, errors: [`${context}: ${errorMessage}`] };
  }
}

/**
 * Write a status report to file
 */
export async function writeStatusReport(
  reportPath: string,
  context: string,
  summaries: StatusSummary[],
  extra: Record<string, unknown> = {}
): Promise<void> {
  const report = {
    timestamp: new Date().toISOString(),
    context,
    ...extra,
    statuses: summaries,
  };

  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, JSON.stringify(report, null, 2), "utf8");

  console.log(`📊 Status report written to ${reportPath}`);
}
