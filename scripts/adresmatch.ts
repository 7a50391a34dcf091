import { ADRESMATCH_SOURCE_COLUMNS, type AdresmatchOptions } from "./config";
import { ensureColumns, loadRows, writeRows } from "./csv_io";
import { field, firstRecord, firstText, isRecord, recordAt, stringField, type Extractor } from "./extract";
import { getJson } from "./http";
import { RateLimiter, sleep } from "./rate_limiter";
import {
  countStatus,
  emptyColumns,
  errorMessage,
  newRunStats,
  RunBudget,
  shouldSkipRow,
  withStatus,
} from "./row_status";
import {
  ADRESMATCH_COLUMNS,
  ADRESMATCH_STATUS_COLUMNS,
  type AdresmatchQuery,
  type AdresmatchStatus,
  type JsonObject,
  type Row,
  type RunStats,
} from "./types";
import { formatCounts, summarizeStatuses, validateSourceColumns, writeStatusReport } from "./validation";
import { parseGmlPos } from "./wkt";

export const MISSING_INPUT_MESSAGE = "Missing municipality/postcode, street, or house number";

export type RowState = "skipped" | "missing_input" | "failed" | "processed";

export type RowOutcome = {
  row: Row;
  state: RowState;
};

function columnValue(row: Row, columns: readonly string[]): string | undefined {
  for (const column of columns) {
    const value = (row[column] ?? "").trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Query parameters for the adresmatch endpoint, or null when the row lacks
 * a street, a house number, or both municipality and postcode.
 */
export function buildQueryParams(row: Row): AdresmatchQuery | null {
  const municipal = columnValue(row, ADRESMATCH_SOURCE_COLUMNS.municipality);
  const street = columnValue(row, ADRESMATCH_SOURCE_COLUMNS.street);
  const housenumber = columnValue(row, ADRESMATCH_SOURCE_COLUMNS.houseNumber);
  const bus = columnValue(row, ADRESMATCH_SOURCE_COLUMNS.box);
  const postal = columnValue(row, ADRESMATCH_SOURCE_COLUMNS.postalCode);

  if (!municipal && !postal) return null;
  if (!street || !housenumber) return null;

  const params: AdresmatchQuery = { straatnaam: street, huisnummer: housenumber };
  if (municipal) params.gemeentenaam = municipal;
  if (bus) params.busnummer = bus;
  if (postal) params.postcode = postal;
  return params;
}

export async function getAdresmatch(
  url: string,
  params: AdresmatchQuery,
  timeoutMs: number,
  authToken?: string
): Promise<JsonObject> {
  const headers: Record<string, string> = {};
  if (authToken) headers.Authorization = `Bearer ${authToken}`;
  return getJson(url, { params, headers, timeoutMs, snippetLength: 200 });
}

// The endpoint ranks candidates itself; the first one is taken as-is.
export function pickBestMatch(payload: JsonObject): JsonObject {
  const matches = payload.adresMatches;
  if (Array.isArray(matches) && matches.length > 0 && isRecord(matches[0])) {
    return matches[0];
  }
  return {};
}

const SPELLING: readonly Extractor[] = [stringField("geografischeNaam", "spelling"), stringField("spelling")];

export function extractSpelling(value: unknown): string {
  return isRecord(value) ? firstText(value, SPELLING) : "";
}

const ADRES_URI: readonly Extractor[] = [field("identificator", "id"), field("detail")];
const ADRES_ID: readonly Extractor[] = [field("identificator", "objectId"), field("identificator", "lokaleId")];
const NAMESPACE: readonly Extractor[] = [field("identificator", "naamruimte"), field("identificator", "namespace")];
const VERSION: readonly Extractor[] = [field("identificator", "versieId"), field("identificator", "versie")];

export function populateIdentificatorFields(adres: JsonObject): Row {
  return {
    adresmatch_adres_uri: firstText(adres, ADRES_URI),
    adresmatch_adres_id: firstText(adres, ADRES_ID),
    adresmatch_identificator_namespace: firstText(adres, NAMESPACE),
    adresmatch_identificator_version: firstText(adres, VERSION),
  };
}

function coordinateAt(index: number): Extractor {
  return (positie) => {
    const coords = recordAt(positie, ["geometrie"])?.coordinates;
    if (!Array.isArray(coords) || coords.length < 2) return undefined;
    const value: unknown = coords[index];
    // textOf would blank a 0 coordinate
    return typeof value === "number" ? String(value) : value;
  };
}

const POS_METHOD: readonly Extractor[] = [field("positieGeometrieMethode"), field("methode")];

// Each axis is resolved on its own: GML first, then GeoJSON coordinates, then the punt record.
const POS_LON: readonly Extractor[] = [
  (positie) => parseGmlPos(valueOfGml(positie)).x,
  coordinateAt(0),
  field("punt", "xcoordinaat"),
];
const POS_LAT: readonly Extractor[] = [
  (positie) => parseGmlPos(valueOfGml(positie)).y,
  coordinateAt(1),
  field("punt", "ycoordinaat"),
];

function valueOfGml(positie: JsonObject): unknown {
  return recordAt(positie, ["geometrie"])?.gml;
}

export function populatePositionFields(positie: JsonObject | null): Row {
  if (!positie) {
    return { adresmatch_pos_method: "", adresmatch_pos_lon: "", adresmatch_pos_lat: "" };
  }
  return {
    adresmatch_pos_method: firstText(positie, POS_METHOD),
    adresmatch_pos_lon: firstText(positie, POS_LON),
    adresmatch_pos_lat: firstText(positie, POS_LAT),
  };
}

/**
 * Flattens a match (or {} for no match) onto a copy of the row. Every
 * adresmatch column is cleared first so nothing from an earlier run leaks in.
 */
export function updateRowWithMatch(row: Row, match: JsonObject): Row {
  const next: Row = { ...row, ...emptyColumns(ADRESMATCH_COLUMNS) };
  const adres = recordAt(match, ["adres"]) ?? match;

  const score = match.score;
  next.adresmatch_score = typeof score === "number" && Number.isFinite(score) ? score.toFixed(4) : "";

  Object.assign(next, populateIdentificatorFields(adres));
  next.adresmatch_gemeente = extractSpelling(adres.gemeentenaam);
  next.adresmatch_straatnaam = extractSpelling(adres.straatnaam);
  next.adresmatch_huisnummer = firstText(adres, [field("huisnummer")]);
  next.adresmatch_busnummer = firstText(adres, [field("busnummer")]);
  next.adresmatch_postcode = firstText(adres, [field("postinfo", "postnummer")]);
  next.adresmatch_toevoeging = firstText(adres, [field("toevoeging")]);
  Object.assign(next, populatePositionFields(firstRecord(adres, [["adresPositie"], ["positie"]])));

  const status: AdresmatchStatus = Object.keys(match).length > 0 ? "matched" : "no_match";
  next.adresmatch_error = "";
  next.adresmatch_status = status;
  return next;
}

export async function processSingleRow(
  row: Row,
  options: AdresmatchOptions,
  limiter: RateLimiter
): Promise<RowOutcome> {
  if (shouldSkipRow(row, ADRESMATCH_STATUS_COLUMNS, options.force)) {
    return { row, state: "skipped" };
  }

  const params = buildQueryParams(row);
  if (!params) {
    return {
      row: withStatus<AdresmatchStatus>(row, ADRESMATCH_STATUS_COLUMNS, "missing_input", MISSING_INPUT_MESSAGE),
      state: "missing_input",
    };
  }

  let payload: JsonObject;
  try {
    await limiter.wait();
    payload = await getAdresmatch(options.apiUrl, params, options.timeoutMs, options.authToken);
  } catch (e) {
    // Only status and error change here; earlier match columns stay as they were.
    return { row: withStatus<AdresmatchStatus>(row, ADRESMATCH_STATUS_COLUMNS, "error", errorMessage(e)), state: "failed" };
  }

  return { row: updateRowWithMatch(row, pickBestMatch(payload)), state: "processed" };
}

function describeQuery(q: AdresmatchQuery): string {
  const street = [q.straatnaam, q.huisnummer, q.busnummer].filter(Boolean).join(" ");
  return [street, q.postcode, q.gemeentenaam].filter(Boolean).join(", ");
}

/**
 * Runs adresmatch over every row, replacing each element of `rows` with its
 * enriched copy. Stops once `maxRows` rows have been processed.
 */
export async function processRows(
  rows: Row[],
  options: AdresmatchOptions,
  limiter: RateLimiter = new RateLimiter(options.rateLimit)
): Promise<RunStats> {
  const stats = newRunStats(rows.length);
  const budget = new RunBudget(options.maxRows);

  for (let i = 0; i < rows.length; i++) {
    if (budget.exhausted) break;

    const query = buildQueryParams(rows[i]);
    const { row, state } = await processSingleRow(rows[i], options, limiter);
    rows[i] = row;

    if (state === "skipped") {
      stats.skipped++;
      continue;
    }
    countStatus(stats, row.adresmatch_status);

    if (state === "missing_input") continue;
    stats.dispatched++;
    if (state === "failed") {
      console.warn(`⚠️  [${i + 1}/${rows.length}] Adresmatch failed: ${row.adresmatch_error}`);
      continue;
    }

    console.log(
      `[${i + 1}/${rows.length}] ${query ? describeQuery(query) : ""} -> ${row.adresmatch_status}` +
        (row.adresmatch_score ? ` (${row.adresmatch_score})` : "")
    );
    budget.record();
    if (options.delayMs) await sleep(options.delayMs);
  }

  stats.processed = budget.processed;
  return stats;
}

export async function runAdresmatchFile(
  csvPath: string,
  options: AdresmatchOptions,
  outputPath: string = csvPath,
  reportPath?: string
): Promise<RunStats> {
  const { rows, header } = await loadRows(csvPath);
  console.log(`📊 Loaded ${rows.length} rows from ${csvPath}`);

  const check = validateSourceColumns(header, ADRESMATCH_SOURCE_COLUMNS);
  if (!check.isValid) throw new Error(check.errors.join("; "));
  for (const w of check.warnings) console.warn(`⚠️  ${w}`);

  const fieldnames = ensureColumns(header, ADRESMATCH_COLUMNS);
  const stats = await processRows(rows, options);
  await writeRows(outputPath, rows, fieldnames);

  console.log(`📊 Adresmatch: ${stats.processed} processed, ${stats.skipped} skipped (${formatCounts(stats.statusCounts)})`);
  if (reportPath) {
    await writeStatusReport(reportPath, "Adresmatch", [summarizeStatuses(rows, ADRESMATCH_STATUS_COLUMNS.status)], {
      input: csvPath,
      output: outputPath,
      run: stats,
    });
  }
  console.log(`Processed ${rows.length} rows. Updated file saved to ${outputPath}.`);
  return stats;
}
