import type { JsonObject } from "./types";

/**
 * Reads one candidate value out of a JSON payload. Payloads from the registry
 * APIs carry the same fact under different keys depending on version, so each
 * output field is resolved from an ordered list of extractors.
 */
export type Extractor = (source: JsonObject) => unknown;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * String form of a loosely typed JSON value. Missing, null, false, zero and
 * empty values all become "".
 */
export function textOf(value: unknown): string {
  if (value === null || value === undefined || value === false || value === 0 || value === "") return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return JSON.stringify(value);
}

/** Walks nested objects; any non-object along the way yields undefined. */
export function valueAt(source: unknown, path: readonly string[]): unknown {
  let current: unknown = source;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function field(...path: string[]): Extractor {
  return (source) => valueAt(source, path);
}

// Like field(), but only accepts string values
export function stringField(...path: string[]): Extractor {
  return (source) => {
    const value = valueAt(source, path);
    return typeof value === "string" ? value : undefined;
  };
}

export function recordAt(source: unknown, path: readonly string[]): JsonObject | null {
  const value = valueAt(source, path);
  return isRecord(value) ? value : null;
}

export function firstText(source: JsonObject, extractors: readonly Extractor[]): string {
  for (const extract of extractors) {
    const text = textOf(extract(source));
    if (text) return text;
  }
  return "";
}

export function firstRecord(source: JsonObject, paths: readonly (readonly string[])[]): JsonObject | null {
  for (const p of paths) {
    const found = recordAt(source, p);
    if (found) return found;
  }
  return null;
}
