import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ADRESMATCH_SOURCE_COLUMNS } from "./config";
import { formatCounts, summarizeStatuses, validateSourceColumns, withErrorHandling, writeStatusReport } from "./validation";
import type { Row } from "./types";

describe("validateSourceColumns", () => {
  it("should accept a header with every group", () => {
    const header = ["LOM_MUN_NM", "LOM_ROAD_NM", "LOM_HNR_FULL", "LOM_BOXNR", "LOM_POSTAL_CD"];
    expect(validateSourceColumns(header, ADRESMATCH_SOURCE_COLUMNS)).toEqual({
      isValid: true,
      errors: [],
      warnings: [],
    });
  });

  it("should warn about a missing group", () => {
    const result = validateSourceColumns(["LOM_MUN_NM", "LOM_ROAD_NM", "LOM_SOURCE_HNR", "LOM_POSTAL_CD"], ADRESMATCH_SOURCE_COLUMNS);
    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual(["No box column found (expected one of: LOM_BOXNR)"]);
  });

  it("should reject an empty header", () => {
    expect(validateSourceColumns([], ADRESMATCH_SOURCE_COLUMNS)).toEqual({
      isValid: false,
      errors: ["Input has no header row"],
      warnings: [],
    });
  });
});

describe("summarizeStatuses", () => {
  it("should count filled statuses", () => {
    const rows: Row[] = [{ s: "matched" }, { s: "" }, { s: "matched" }, {}, { s: "error" }];
    expect(summarizeStatuses(rows, "s")).toEqual({
      column: "s",
      total_rows: 5,
      with_status: 3,
      without_status: 2,
      counts: { matched: 2, error: 1 },
    });
  });

  it("should format counts alphabetically", () => {
    expect(formatCounts({ no_match: 1, error: 2 })).toBe("error=2, no_match=1");
    expect(formatCounts({})).toBe("none");
  });
});

describe("withErrorHandling", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should wrap the result", async () => {
    expect(await withErrorHandling(async () => 42, "Answer")).toEqual({ success: true, data: 42, errors: [] });
  });

  it("should turn a thrown error into a failed result", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const result = await withErrorHandling(async () => {
      throw new Error("disk full");
    }, "Write");

    expect(result).toEqual({ success: false, errors: ["Write: disk full"] });
    expect(error).toHaveBeenCalledWith("❌ Write failed:", "disk full");
  });
});

describe("writeStatusReport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "report-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should write the summaries as JSON, creating the directory", async () => {
    const reportPath = path.join(dir, "nested", "report.json");
    const summary = summarizeStatuses([{ s: "matched" }], "s");

    await writeStatusReport(reportPath, "Adresmatch", [summary], { input: "in.csv" });

    const report: unknown = JSON.parse(await fs.readFile(reportPath, "utf8"));
    expect(report).toMatchObject({ context: "Adresmatch", input: "in.csv", statuses: [summary] });
  });
});
