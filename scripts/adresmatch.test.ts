import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildQueryParams,
  extractSpelling,
  MISSING_INPUT_MESSAGE,
  pickBestMatch,
  populateIdentificatorFields,
  populatePositionFields,
  processRows,
  processSingleRow,
  runAdresmatchFile,
  updateRowWithMatch,
} from "./adresmatch";
import { defaultAdresmatchOptions } from "./config";
import { loadRows } from "./csv_io";
import { RateLimiter } from "./rate_limiter";
import { ADRESMATCH_COLUMNS, type Row } from "./types";

const API_URL = "http://example.test/adresmatch";

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const MINIMAL_MATCH = {
  adresMatches: [{ score: 0.9, adres: { straatnaam: { spelling: "Main" }, huisnummer: "1" } }],
};

describe("buildQueryParams", () => {
  it("should build params from trimmed source columns", () => {
    const row = { LOM_ROAD_NM: " Main ", LOM_SOURCE_HNR: "1", LOM_POSTAL_CD: "1000" };
    expect(buildQueryParams(row)).toEqual({ straatnaam: "Main", huisnummer: "1", postcode: "1000" });
  });

  it("should include municipality and box number when present", () => {
    const row = {
      LOM_MUN_NM: "Gent",
      LOM_ROAD_NM: "Korenmarkt",
      LOM_SOURCE_HNR: "12",
      LOM_BOXNR: "b2",
      LOM_POSTAL_CD: "",
    };
    expect(buildQueryParams(row)).toEqual({
      straatnaam: "Korenmarkt",
      huisnummer: "12",
      gemeentenaam: "Gent",
      busnummer: "b2",
    });
  });

  it("should fall back to LOM_HNR_FULL for the house number", () => {
    const row = { LOM_MUN_NM: "Gent", LOM_ROAD_NM: "Korenmarkt", LOM_SOURCE_HNR: "  ", LOM_HNR_FULL: "12A" };
    expect(buildQueryParams(row)?.huisnummer).toBe("12A");
  });

  const blanks: Row[] = [
    { LOM_MUN_NM: "Gent", LOM_ROAD_NM: "", LOM_SOURCE_HNR: "1", LOM_POSTAL_CD: "9000" },
    { LOM_MUN_NM: "Gent", LOM_ROAD_NM: "   ", LOM_SOURCE_HNR: "1", LOM_POSTAL_CD: "9000" },
    { LOM_MUN_NM: "Gent", LOM_ROAD_NM: "Korenmarkt", LOM_SOURCE_HNR: " ", LOM_POSTAL_CD: "9000" },
    { LOM_MUN_NM: "Gent", LOM_ROAD_NM: "Korenmarkt", LOM_BOXNR: "1", LOM_POSTAL_CD: "9000" },
  ];

  it.each(blanks)("should return null for a blank street or house number (%o)", (row) => {
    expect(buildQueryParams(row)).toBeNull();
  });

  it("should return null without municipality and postcode", () => {
    expect(buildQueryParams({ LOM_ROAD_NM: "Main", LOM_SOURCE_HNR: "1" })).toBeNull();
  });
});

describe("pickBestMatch", () => {
  it("should take the first candidate regardless of score", () => {
    const first = { score: 0.5, adres: { huisnummer: "1" } };
    const second = { score: 0.99, adres: { huisnummer: "2" } };
    expect(pickBestMatch({ adresMatches: [first, second] })).toBe(first);
  });

  it("should return an empty match when there are no candidates", () => {
    expect(pickBestMatch({})).toEqual({});
    expect(pickBestMatch({ adresMatches: [] })).toEqual({});
  });
});

describe("extractSpelling", () => {
  it("should prefer the nested geografischeNaam", () => {
    expect(extractSpelling({ geografischeNaam: { spelling: "Gent", taal: "nl" }, spelling: "Ghent" })).toBe("Gent");
  });

  it("should use a flat spelling", () => {
    expect(extractSpelling({ spelling: "Korenmarkt" })).toBe("Korenmarkt");
  });

  it("should return empty otherwise", () => {
    expect(extractSpelling("Gent")).toBe("");
    expect(extractSpelling({ spelling: 12 })).toBe("");
  });
});

describe("populateIdentificatorFields", () => {
  it("should read the identificator structure", () => {
    const row = populateIdentificatorFields({
      identificator: { id: "uri", objectId: "42", naamruimte: "ns", versieId: "v1" },
    });
    expect(row).toEqual({
      adresmatch_adres_uri: "uri",
      adresmatch_adres_id: "42",
      adresmatch_identificator_namespace: "ns",
      adresmatch_identificator_version: "v1",
    });
  });

  it("should try the alternate key names", () => {
    const row = populateIdentificatorFields({
      identificator: { lokaleId: "43", namespace: "ns2", versie: "v2" },
      detail: "https://example.test/adressen/43",
    });
    expect(row).toEqual({
      adresmatch_adres_uri: "https://example.test/adressen/43",
      adresmatch_adres_id: "43",
      adresmatch_identificator_namespace: "ns2",
      adresmatch_identificator_version: "v2",
    });
  });

  it("should fall back to detail when there is no identificator", () => {
    const row = populateIdentificatorFields({ detail: "https://example.test/adressen/44" });
    expect(row.adresmatch_adres_uri).toBe("https://example.test/adressen/44");
    expect(row.adresmatch_adres_id).toBe("");
  });
});

describe("populatePositionFields", () => {
  it("should read GML positions", () => {
    const row = populatePositionFields({
      positieGeometrieMethode: "method",
      geometrie: { gml: "<gml:pos>4.1 51.2</gml:pos>" },
    });
    expect(row).toEqual({ adresmatch_pos_method: "method", adresmatch_pos_lon: "4.1", adresmatch_pos_lat: "51.2" });
  });

  it("should read GeoJSON coordinates", () => {
    const row = populatePositionFields({ methode: "m", geometrie: { coordinates: [5.1, 52.2] } });
    expect(row).toEqual({ adresmatch_pos_method: "m", adresmatch_pos_lon: "5.1", adresmatch_pos_lat: "52.2" });
  });

  it("should keep a 0 coordinate instead of falling back to the punt record", () => {
    const row = populatePositionFields({
      geometrie: { coordinates: [0, 152345.0] },
      punt: { xcoordinaat: 9, ycoordinaat: 9 },
    });
    expect(row).toEqual({ adresmatch_pos_method: "", adresmatch_pos_lon: "0", adresmatch_pos_lat: "152345" });
  });

  it("should keep a 0 coordinate through the full match update", () => {
    const row = updateRowWithMatch({}, { adres: { adresPositie: { geometrie: { coordinates: [0, 152345.0] } } } });
    expect([row.adresmatch_pos_lon, row.adresmatch_pos_lat]).toEqual(["0", "152345"]);
  });

  it("should read the punt record", () => {
    const row = populatePositionFields({ punt: { xcoordinaat: 152000.5, ycoordinaat: 212000 } });
    expect(row).toEqual({ adresmatch_pos_method: "", adresmatch_pos_lon: "152000.5", adresmatch_pos_lat: "212000" });
  });

  it("should resolve each axis independently", () => {
    const row = populatePositionFields({
      geometrie: { gml: "<gml:pos>4.1</gml:pos>", coordinates: [5.1, 52.2] },
    });
    expect(row.adresmatch_pos_lon).toBe("4.1");
    expect(row.adresmatch_pos_lat).toBe("52.2");
  });

  it("should clear everything without a position", () => {
    expect(populatePositionFields(null)).toEqual({
      adresmatch_pos_method: "",
      adresmatch_pos_lon: "",
      adresmatch_pos_lat: "",
    });
  });
});

describe("updateRowWithMatch", () => {
  const fullMatch = {
    score: 87.5,
    adres: {
      identificator: {
        id: "https://data.vlaanderen.be/id/adres/200001",
        naamruimte: "https://data.vlaanderen.be/id/adres",
        objectId: "200001",
        versieId: "2023-01-01T00:00:00+01:00",
      },
      detail: "https://api.example.test/adressen/200001",
      gemeentenaam: { geografischeNaam: { spelling: "Gent", taal: "nl" } },
      straatnaam: { spelling: "Korenmarkt" },
      huisnummer: "1",
      busnummer: "A",
      postinfo: { postnummer: "9000" },
      adresPositie: {
        positieGeometrieMethode: "aangeduidDoorBeheerder",
        geometrie: { gml: "<gml:Point><gml:pos>104720.18 193988.61</gml:pos></gml:Point>" },
      },
    },
  };

  it("should flatten a full match", () => {
    const row = updateRowWithMatch({ LOM_ROAD_NM: "Korenmarkt" }, fullMatch);
    expect(row).toEqual({
      LOM_ROAD_NM: "Korenmarkt",
      adresmatch_status: "matched",
      adresmatch_score: "87.5000",
      adresmatch_adres_uri: "https://data.vlaanderen.be/id/adres/200001",
      adresmatch_adres_id: "200001",
      adresmatch_identificator_namespace: "https://data.vlaanderen.be/id/adres",
      adresmatch_identificator_version: "2023-01-01T00:00:00+01:00",
      adresmatch_gemeente: "Gent",
      adresmatch_straatnaam: "Korenmarkt",
      adresmatch_huisnummer: "1",
      adresmatch_busnummer: "A",
      adresmatch_postcode: "9000",
      adresmatch_toevoeging: "",
      adresmatch_pos_method: "aangeduidDoorBeheerder",
      adresmatch_pos_lon: "104720.18",
      adresmatch_pos_lat: "193988.61",
      adresmatch_error: "",
    });
  });

  it("should use the candidate itself when it has no adres body", () => {
    const row = updateRowWithMatch({}, { score: 1, huisnummer: "5" });
    expect(row.adresmatch_huisnummer).toBe("5");
    expect(row.adresmatch_score).toBe("1.0000");
    expect(row.adresmatch_status).toBe("matched");
  });

  it("should mark an empty match as no_match", () => {
    const row = updateRowWithMatch({}, {});
    expect(row.adresmatch_status).toBe("no_match");
    expect(row.adresmatch_score).toBe("");
  });

  it("should clear a previous match completely, every time", () => {
    const previous = updateRowWithMatch({ adresmatch_error: "old failure" }, fullMatch);
    const once = updateRowWithMatch(previous, {});
    const twice = updateRowWithMatch(once, {});

    for (const row of [once, twice]) {
      for (const column of ADRESMATCH_COLUMNS) {
        if (column === "adresmatch_status") continue;
        expect(row[column]).toBe("");
      }
      expect(row.adresmatch_status).toBe("no_match");
    }
  });

  it("should not mutate the input row", () => {
    const input: Row = { adresmatch_score: "0.1000" };
    updateRowWithMatch(input, {});
    expect(input).toEqual({ adresmatch_score: "0.1000" });
  });
});

describe("processSingleRow", () => {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse(MINIMAL_MATCH));
  const options = defaultAdresmatchOptions({ apiUrl: API_URL, rateLimit: 0 });

  beforeEach(() => {
    fetchMock.mockClear();
    fetchMock.mockImplementation(async () => jsonResponse(MINIMAL_MATCH));
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should match a row end to end", async () => {
    const row = { LOM_ROAD_NM: "Main", LOM_SOURCE_HNR: "1", LOM_POSTAL_CD: "1000" };
    const outcome = await processSingleRow(row, options, new RateLimiter(undefined));

    expect(outcome.state).toBe("processed");
    expect(outcome.row.adresmatch_status).toBe("matched");
    expect(outcome.row.adresmatch_score).toBe("0.9000");
    expect(outcome.row.adresmatch_straatnaam).toBe("Main");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const url = new URL(fetchMock.mock.calls[0][0]);
    expect(url.origin + url.pathname).toBe(API_URL);
    expect(url.searchParams.get("straatnaam")).toBe("Main");
    expect(url.searchParams.get("huisnummer")).toBe("1");
    expect(url.searchParams.get("postcode")).toBe("1000");
    expect(url.searchParams.get("gemeentenaam")).toBeNull();
  });

  it("should send the bearer token", async () => {
    const row = { LOM_ROAD_NM: "Main", LOM_SOURCE_HNR: "1", LOM_POSTAL_CD: "1000" };
    await processSingleRow(row, { ...options, authToken: "test-token" }, new RateLimiter(undefined));

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      Accept: "application/json",
      Authorization: "Bearer test-token",
    });
  });

  it("should mark missing input without calling the service", async () => {
    const outcome = await processSingleRow({ LOM_ROAD_NM: "Main" }, options, new RateLimiter(undefined));

    expect(outcome.state).toBe("missing_input");
    expect(outcome.row.adresmatch_status).toBe("missing_input");
    expect(outcome.row.adresmatch_error).toBe(MISSING_INPUT_MESSAGE);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should skip rows that already have a status", async () => {
    const row = { LOM_ROAD_NM: "Main", LOM_SOURCE_HNR: "1", LOM_POSTAL_CD: "1000", adresmatch_status: "no_match" };
    const outcome = await processSingleRow(row, options, new RateLimiter(undefined));

    expect(outcome.state).toBe("skipped");
    expect(outcome.row).toBe(row);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should record a failed call but keep the previous match columns", async () => {
    fetchMock.mockImplementation(async () => new Response("down", { status: 503 }));
    const row = {
      LOM_ROAD_NM: "Main",
      LOM_SOURCE_HNR: "1",
      LOM_POSTAL_CD: "1000",
      adresmatch_status: "matched",
      adresmatch_score: "0.5000",
    };
    const outcome = await processSingleRow(row, { ...options, force: true }, new RateLimiter(undefined));

    expect(outcome.state).toBe("failed");
    expect(outcome.row.adresmatch_status).toBe("error");
    expect(outcome.row.adresmatch_error).toBe(`Request to ${API_URL} failed with HTTP 503: down`);
    expect(outcome.row.adresmatch_score).toBe("0.5000");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("processRows", () => {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse(MINIMAL_MATCH));
  const validRow = (): Row => ({ LOM_ROAD_NM: "Main", LOM_SOURCE_HNR: "1", LOM_POSTAL_CD: "1000" });

  beforeEach(() => {
    fetchMock.mockClear();
    fetchMock.mockImplementation(async () => jsonResponse(MINIMAL_MATCH));
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("should stop once max rows have been processed", async () => {
    const rows = [validRow(), validRow(), validRow()];
    const stats = await processRows(rows, defaultAdresmatchOptions({ apiUrl: API_URL, rateLimit: 0, maxRows: 2 }));

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(stats.processed).toBe(2);
    expect(rows[0].adresmatch_status).toBe("matched");
    expect(rows[1].adresmatch_status).toBe("matched");
    expect(rows[2].adresmatch_status).toBeUndefined();
  });

  it("should not count missing input against max rows", async () => {
    const rows: Row[] = [{ LOM_ROAD_NM: "Main" }, validRow(), validRow()];
    const stats = await processRows(rows, defaultAdresmatchOptions({ apiUrl: API_URL, rateLimit: 0, maxRows: 1 }));

    expect(rows[0].adresmatch_status).toBe("missing_input");
    expect(rows[1].adresmatch_status).toBe("matched");
    expect(rows[2].adresmatch_status).toBeUndefined();
    expect(stats.statusCounts).toEqual({ missing_input: 1, matched: 1 });
    expect(stats.dispatched).toBe(1);
  });

  it("should keep going after a failed row", async () => {
    fetchMock.mockImplementationOnce(async () => new Response("boom", { status: 500 }));
    const rows = [validRow(), validRow()];
    const stats = await processRows(rows, defaultAdresmatchOptions({ apiUrl: API_URL, rateLimit: 0 }));

    expect(rows[0].adresmatch_status).toBe("error");
    expect(rows[1].adresmatch_status).toBe("matched");
    expect(stats.processed).toBe(1);
    expect(stats.dispatched).toBe(2);
  });
});

describe("runAdresmatchFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "adresmatch-"));
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse(MINIMAL_MATCH))
    );
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should enrich a CSV file and append the output columns", async () => {
    const input = path.join(dir, "addresses.csv");
    const output = path.join(dir, "addresses_out.csv");
    await fs.writeFile(
      input,
      "LOM_MUN_NM,LOM_ROAD_NM,LOM_SOURCE_HNR,LOM_BOXNR,LOM_POSTAL_CD\nGent,Main,1,,9000\n,,,,\n",
      "utf8"
    );

    const stats = await runAdresmatchFile(input, defaultAdresmatchOptions({ apiUrl: API_URL, rateLimit: 0 }), output);
    const { rows, header } = await loadRows(output);

    expect(stats.statusCounts).toEqual({ matched: 1, missing_input: 1 });
    expect(header).toEqual([
      "LOM_MUN_NM",
      "LOM_ROAD_NM",
      "LOM_SOURCE_HNR",
      "LOM_BOXNR",
      "LOM_POSTAL_CD",
      ...ADRESMATCH_COLUMNS,
    ]);
    expect(rows[0].adresmatch_status).toBe("matched");
    expect(rows[0].adresmatch_score).toBe("0.9000");
    expect(rows[1].adresmatch_status).toBe("missing_input");
    expect(rows[1].adresmatch_score).toBe("");
  });
});
