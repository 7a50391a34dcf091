import { promises as fs } from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { isRecord } from "./extract";
import type { Row } from "./types";

export type LoadedCsv = {
  rows: Row[];
  header: string[];
};

function toRow(record: unknown, index: number): Row {
  if (!isRecord(record)) throw new Error(`Row ${index + 2}: unexpected CSV record`);
  const row: Row = {};
  for (const [key, value] of Object.entries(record)) {
    row[key] = value == null ? "" : String(value);
  }
  return row;
}

export async function loadRows(csvPath: string): Promise<LoadedCsv> {
  const csvText = await fs.readFile(csvPath, "utf8");
  let header: string[] = [];
  const records: unknown = parse(csvText, {
    bom: true,
    columns: (names: string[]) => {
      header = names;
      return names;
    },
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records)) throw new Error(`Could not parse ${csvPath} as CSV`);
  return { rows: records.map(toRow), header };
}

// Header in input order, followed by any output column the input lacks
export function ensureColumns(header: readonly string[], columns: readonly string[]): string[] {
  const names = [...header];
  for (const column of columns) {
    if (!names.includes(column)) names.push(column);
  }
  return names;
}

/**
 * Writes to a temp file beside the target, then renames it over the target so
 * readers never see a half-written CSV.
 */
export async function writeRows(outPath: string, rows: readonly Row[], header: readonly string[]): Promise<void> {
  const dir = path.dirname(path.resolve(outPath));
  await fs.mkdir(dir, { recursive: true });

  const csvText = stringify(
    rows.map((r) => header.map((column) => r[column] ?? "")),
    { header: true, columns: [...header], bom: true }
  );

  const tmpPath = path.join(dir, `.${path.basename(outPath)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fs.writeFile(tmpPath, csvText, "utf8");
    await fs.rename(tmpPath, outPath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

// Building outputs live next to their inputs and must not be picked up again
export async function discoverInputs(dir: string): Promise<string[]> {
  const files = await fs.readdir(dir);
  return files
    .filter((f) => f.toLowerCase().endsWith(".csv") && !f.toLowerCase().endsWith("_gebouwen.csv"))
    .sort()
    .map((f) => path.join(dir, f));
}
