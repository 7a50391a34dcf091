// Shared types for script files

export type Row = Record<string, string>;

export type JsonObject = Record<string, unknown>;

export const ADRESMATCH_STATUSES = ["matched", "no_match", "missing_input", "error"] as const;
export type AdresmatchStatus = (typeof ADRESMATCH_STATUSES)[number];

export const GEBOUW_STATUSES = [
  "matched",
  "matched_no_geometry",
  "no_match",
  "missing_adres_id",
  "error",
] as const;
export type GebouwStatus = (typeof GEBOUW_STATUSES)[number];

/** Column names a pipeline writes its status and error message to. */
export type StatusColumns = {
  status: string;
  error: string;
};

export const ADRESMATCH_COLUMNS = [
  "adresmatch_status",
  "adresmatch_score",
  "adresmatch_adres_uri",
  "adresmatch_adres_id",
  "adresmatch_identificator_namespace",
  "adresmatch_identificator_version",
  "adresmatch_gemeente",
  "adresmatch_straatnaam",
  "adresmatch_huisnummer",
  "adresmatch_busnummer",
  "adresmatch_postcode",
  "adresmatch_toevoeging",
  "adresmatch_pos_method",
  "adresmatch_pos_lon",
  "adresmatch_pos_lat",
  "adresmatch_error",
] as const;

export const GEBOUW_COLUMNS = [
  "gebouwregister_status",
  "gebouwregister_id",
  "gebouwregister_wkt",
  "gebouwregister_error",
] as const;

export const ADRESMATCH_STATUS_COLUMNS: StatusColumns = {
  status: "adresmatch_status",
  error: "adresmatch_error",
};

export const GEBOUW_STATUS_COLUMNS: StatusColumns = {
  status: "gebouwregister_status",
  error: "gebouwregister_error",
};

export type AdresmatchQuery = {
  straatnaam: string;
  huisnummer: string;
  gemeentenaam?: string;
  busnummer?: string;
  postcode?: string;
};

// Counters every pipeline run reports back to its caller
export type RunStats = {
  total: number;
  skipped: number;
  dispatched: number;
  processed: number;
  statusCounts: Record<string, number>;
};
