import type { GebouwOptions } from "./config";
import { ensureColumns, loadRows, writeRows } from "./csv_io";
import { field, firstText, isRecord, valueAt, type Extractor } from "./extract";
import { getJson, type GetJsonOptions } from "./http";
import { RateLimiter, sleep } from "./rate_limiter";
import { countStatus, errorMessage, newRunStats, RunBudget, shouldSkipRow, withStatus } from "./row_status";
import {
  GEBOUW_COLUMNS,
  GEBOUW_STATUS_COLUMNS,
  type GebouwStatus,
  type JsonObject,
  type Row,
  type RunStats,
} from "./types";
import { formatCounts, summarizeStatuses, writeStatusReport } from "./validation";
import { geometryToWkt } from "./wkt";

export class BuildingLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BuildingLookupError";
  }
}

export const NO_UNIT_MESSAGE = "No building unit found for address";
export const NO_BUILDING_ID_MESSAGE = "No building id found for this building unit";
export const NO_GEOMETRY_MESSAGE = "Building found but no geometry available";

// Unit statuses skipped unless historic units are allowed
const RETIRED_UNIT_STATUSES = new Set(["gehistoreerd", "afgeschaft"]);

// Output columns a failed lookup must not leave behind
const RESULT_COLUMNS = ["gebouwregister_id", "gebouwregister_wkt"] as const;

type Stage = "units" | "select" | "unit_detail" | "building_id" | "building_detail" | "geometry";

export type LookupOutcome = {
  row: Row;
  state: "skipped" | "missing_adres_id" | "failed" | "processed";
  stage?: Stage;
};

function trimSlash(url: string) {
  return url.replace(/\/+$/, "");
}

function requestOptions(options: GebouwOptions): GetJsonOptions {
  const headers: Record<string, string> = {};
  if (options.auth) headers.Authorization = options.auth;
  return {
    headers,
    timeoutMs: options.timeoutMs,
    retries: options.retries,
    retryWaitMs: options.retryWaitMs,
  };
}

export async function fetchUnitsForAddress(adresId: string, options: GebouwOptions): Promise<JsonObject[]> {
  const data = await getJson(options.gebouweenhedenUrl, {
    ...requestOptions(options),
    params: { adresobjectId: adresId, limit: Math.max(1, options.buildingLimit) },
  });
  const units = data.gebouweenheden;
  return Array.isArray(units) ? units.filter(isRecord) : [];
}

const UNIT_STATUS: readonly Extractor[] = [field("gebouweenheidStatus"), field("status")];

/**
 * First unit that is still in use. With `includeHistoric` the first unit is
 * taken as-is; without it, a list of only retired units yields null.
 */
export function selectUnit(units: readonly JsonObject[], includeHistoric: boolean): JsonObject | null {
  if (units.length === 0) return null;
  if (includeHistoric) return units[0];
  return units.find((unit) => !RETIRED_UNIT_STATUSES.has(firstText(unit, UNIT_STATUS).toLowerCase())) ?? null;
}

const UNIT_OBJECT_ID: readonly Extractor[] = [field("identificator", "objectId"), field("identificator", "objectid")];

export function unitDetailUrl(unit: JsonObject, gebouweenhedenUrl: string): string {
  const detail = firstText(unit, [field("detail")]);
  if (detail) return detail;
  const objectId = firstText(unit, UNIT_OBJECT_ID);
  return objectId ? `${trimSlash(gebouweenhedenUrl)}/${objectId}` : "";
}

export async function fetchUnitDetail(unit: JsonObject, options: GebouwOptions): Promise<JsonObject> {
  const url = unitDetailUrl(unit, options.gebouweenhedenUrl);
  if (!url) throw new BuildingLookupError("Building unit detail URL missing");
  return getJson(url, requestOptions(options));
}

const BUILDING_ID: readonly Extractor[] = [
  field("gebouwId"),
  field("gebouwid"),
  field("gebouw", "identificator", "objectId"),
  field("gebouw", "identificator", "objectid"),
  field("gebouw", "id"),
  field("gebouw", "objectId"),
  field("gebouw", "objectid"),
  field("relatie", "gebouwId"),
  field("relatie", "gebouwid"),
];

export function extractBuildingId(unitDetail: JsonObject): string {
  return firstText(unitDetail, BUILDING_ID);
}

export async function fetchBuildingDetailById(gebouwId: string, options: GebouwOptions): Promise<JsonObject> {
  if (!gebouwId) throw new BuildingLookupError("Building id missing");
  return getJson(`${trimSlash(options.gebouwenUrl)}/${gebouwId}`, requestOptions(options));
}

// Polygon beats line beats point
const GEOMETRY_FIELDS = ["gebouwPolygoon", "gebouwLijn", "gebouwPunt"] as const;

export function extractGeometryWkt(detail: JsonObject): string {
  for (const key of GEOMETRY_FIELDS) {
    const wkt = geometryToWkt(valueAt(detail, [key, "geometrie"]));
    if (wkt) return wkt;
  }
  return "";
}

function failed(row: Row, status: GebouwStatus, message: string, stage?: Stage): LookupOutcome {
  return {
    row: withStatus<GebouwStatus>(row, GEBOUW_STATUS_COLUMNS, status, message, RESULT_COLUMNS),
    state: status === "missing_adres_id" ? "missing_adres_id" : "failed",
    stage,
  };
}

/**
 * Address → building units → unit detail → building detail. Each stage that
 * fails turns into a status on the row; nothing is thrown.
 */
export async function lookupBuilding(row: Row, options: GebouwOptions, limiter: RateLimiter): Promise<LookupOutcome> {
  if (shouldSkipRow(row, GEBOUW_STATUS_COLUMNS, options.force)) {
    return { row, state: "skipped" };
  }

  const adresId = (row[options.adresIdField] ?? "").trim();
  if (!adresId) {
    return failed(row, "missing_adres_id", `Missing ${options.adresIdField}`);
  }

  let units: JsonObject[];
  try {
    await limiter.wait();
    units = await fetchUnitsForAddress(adresId, options);
  } catch (e) {
    return failed(row, "error", errorMessage(e), "units");
  }

  const unit = selectUnit(units, options.includeHistoric);
  if (!unit) {
    return failed(row, "no_match", NO_UNIT_MESSAGE, "select");
  }

  let unitDetail: JsonObject;
  try {
    await limiter.wait();
    unitDetail = await fetchUnitDetail(unit, options);
  } catch (e) {
    return failed(row, "error", errorMessage(e), "unit_detail");
  }

  const gebouwId = extractBuildingId(unitDetail);
  if (!gebouwId) {
    return failed(row, "error", NO_BUILDING_ID_MESSAGE, "building_id");
  }

  let gebouwDetail: JsonObject;
  try {
    await limiter.wait();
    gebouwDetail = await fetchBuildingDetailById(gebouwId, options);
  } catch (e) {
    return failed(row, "error", errorMessage(e), "building_detail");
  }

  const wkt = extractGeometryWkt(gebouwDetail);
  const status: GebouwStatus = wkt ? "matched" : "matched_no_geometry";
  const next = withStatus<GebouwStatus>(row, GEBOUW_STATUS_COLUMNS, status, wkt ? "" : NO_GEOMETRY_MESSAGE);
  next.gebouwregister_id = gebouwId;
  next.gebouwregister_wkt = wkt;
  return { row: next, state: "processed", stage: wkt ? undefined : "geometry" };
}

export async function processRows(
  rows: Row[],
  options: GebouwOptions,
  limiter: RateLimiter = new RateLimiter(options.rateLimit)
): Promise<RunStats> {
  const stats = newRunStats(rows.length);
  const budget = new RunBudget(options.maxRows);

  for (let i = 0; i < rows.length; i++) {
    if (budget.exhausted) break;

    const { row, state, stage } = await lookupBuilding(rows[i], options, limiter);
    rows[i] = row;

    if (state === "skipped") {
      stats.skipped++;
      continue;
    }
    countStatus(stats, row.gebouwregister_status);
    if (state === "missing_adres_id") continue;

    stats.dispatched++;
    const label = `[${i + 1}/${rows.length}] adres ${row[options.adresIdField]}`;
    if (state === "failed") {
      if (row.gebouwregister_status === "error") {
        console.warn(`⚠️  ${label}: ${stage} failed: ${row.gebouwregister_error}`);
      } else {
        console.log(`${label} -> ❌ ${row.gebouwregister_status}`);
      }
      continue;
    }

    console.log(`${label} -> ✅ gebouw ${row.gebouwregister_id} (${row.gebouwregister_status})`);
    budget.record();
    if (options.delayMs) await sleep(options.delayMs);
  }

  stats.processed = budget.processed;
  return stats;
}

export async function runBuildingFile(
  csvPath: string,
  options: GebouwOptions,
  outputPath: string,
  reportPath?: string
): Promise<RunStats> {
  const { rows, header } = await loadRows(csvPath);
  console.log(`📊 Loaded ${rows.length} rows from ${csvPath}`);
  if (!header.includes(options.adresIdField)) {
    console.warn(`⚠️  Column '${options.adresIdField}' not found; every row will be marked missing_adres_id`);
  }

  const fieldnames = ensureColumns(header, GEBOUW_COLUMNS);
  const stats = await processRows(rows, options);
  await writeRows(outputPath, rows, fieldnames);

  console.log(`📊 Gebouwenregister: ${stats.processed} processed, ${stats.skipped} skipped (${formatCounts(stats.statusCounts)})`);
  if (reportPath) {
    await writeStatusReport(reportPath, "Gebouwenregister", [summarizeStatuses(rows, GEBOUW_STATUS_COLUMNS.status)], {
      input: csvPath,
      output: outputPath,
      run: stats,
    });
  }
  console.log(`Processed ${rows.length} rows. Output written to ${outputPath}.`);
  return stats;
}
