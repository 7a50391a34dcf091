import path from "node:path";

export const DEFAULT_ADRESMATCH_URL = "https://api.basisregisters.vlaanderen.be/v2/adresmatch";
export const DEFAULT_GEBOUWEN_URL = "https://api.basisregisters.vlaanderen.be/v2/gebouwen";
export const DEFAULT_GEBOUWEENHEDEN_URL = "https://api.basisregisters.vlaanderen.be/v2/gebouweenheden";

export const DEFAULT_ADRES_ID_FIELD = "adresmatch_adres_id";

// Requests per second; the building registry is queried three times per row
export const DEFAULT_ADRESMATCH_RATE_LIMIT = 25;
export const DEFAULT_GEBOUW_RATE_LIMIT = 5;

export const DEFAULT_TIMEOUT_S = 20;
export const DEFAULT_RETRIES = 3;
export const DEFAULT_RETRY_WAIT_S = 1;
export const DEFAULT_BUILDING_LIMIT = 5;

// Input columns, first non-blank column of each group wins
export const ADRESMATCH_SOURCE_COLUMNS = {
  municipality: ["LOM_MUN_NM"],
  street: ["LOM_ROAD_NM"],
  houseNumber: ["LOM_SOURCE_HNR", "LOM_HNR_FULL"],
  box: ["LOM_BOXNR"],
  postalCode: ["LOM_POSTAL_CD"],
} as const;

export type AdresmatchOptions = {
  apiUrl: string;
  authToken?: string;
  timeoutMs: number;
  delayMs: number;
  rateLimit: number;
  force: boolean;
  maxRows?: number;
};

export type GebouwOptions = {
  gebouwenUrl: string;
  gebouweenhedenUrl: string;
  adresIdField: string;
  buildingLimit: number;
  includeHistoric: boolean;
  timeoutMs: number;
  retries: number;
  retryWaitMs: number;
  rateLimit: number;
  delayMs: number;
  maxRows?: number;
  force: boolean;
  // Raw Authorization header value, e.g. "Bearer <token>"
  auth?: string;
};

export function defaultAdresmatchOptions(overrides: Partial<AdresmatchOptions> = {}): AdresmatchOptions {
  return {
    apiUrl: DEFAULT_ADRESMATCH_URL,
    timeoutMs: DEFAULT_TIMEOUT_S * 1000,
    delayMs: 0,
    rateLimit: DEFAULT_ADRESMATCH_RATE_LIMIT,
    force: false,
    ...overrides,
  };
}

export function defaultGebouwOptions(overrides: Partial<GebouwOptions> = {}): GebouwOptions {
  return {
    gebouwenUrl: DEFAULT_GEBOUWEN_URL,
    gebouweenhedenUrl: DEFAULT_GEBOUWEENHEDEN_URL,
    adresIdField: DEFAULT_ADRES_ID_FIELD,
    buildingLimit: DEFAULT_BUILDING_LIMIT,
    includeHistoric: false,
    timeoutMs: DEFAULT_TIMEOUT_S * 1000,
    retries: DEFAULT_RETRIES,
    retryWaitMs: DEFAULT_RETRY_WAIT_S * 1000,
    rateLimit: DEFAULT_GEBOUW_RATE_LIMIT,
    delayMs: 0,
    force: false,
    ...overrides,
  };
}

export function defaultBuildingOutputPath(csvPath: string): string {
  const ext = path.extname(csvPath);
  const base = ext ? csvPath.slice(0, -ext.length) : csvPath;
  return `${base}_gebouwen${ext || ".csv"}`;
}
