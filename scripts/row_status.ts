import type { Row, RunStats, StatusColumns } from "./types";

// A row counts as done once its status column holds anything at all
export function shouldSkipRow(row: Row, columns: StatusColumns, force: boolean): boolean {
  if (force) return false;
  return Boolean(row[columns.status]);
}

/**
 * Returns a copy of `row` with a status and message set. `clear` lists output
 * columns that must be emptied alongside, so no stale value survives.
 */
export function withStatus<S extends string>(
  row: Row,
  columns: StatusColumns,
  status: S,
  error = "",
  clear: readonly string[] = []
): Row {
  const next: Row = { ...row };
  for (const column of clear) next[column] = "";
  next[columns.status] = status;
  next[columns.error] = error;
  return next;
}

export function emptyColumns(columns: readonly string[]): Row {
  const out: Row = {};
  for (const column of columns) out[column] = "";
  return out;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Stops a run after `max` rows reached the remote service; no cap when undefined. */
export class RunBudget {
  private used = 0;

  constructor(readonly max?: number) {}

  get exhausted(): boolean {
    return this.max !== undefined && this.used >= this.max;
  }

  get processed(): number {
    return this.used;
  }

  record(): void {
    this.used++;
  }
}

export function newRunStats(total: number): RunStats {
  return { total, skipped: 0, dispatched: 0, processed: 0, statusCounts: {} };
}

export function countStatus(stats: RunStats, status: string): void {
  stats.statusCounts[status] = (stats.statusCounts[status] ?? 0) + 1;
}
