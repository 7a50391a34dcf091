import { isRecord } from "./extract";

// Geometry → WKT conversion for building registry payloads (GeoJSON-like or GML)

type Ring = Array<[number, number]>;

const GML_POLYGON_RE = /<gml:Polygon[^>]*>([\s\S]*?)<\/gml:Polygon>/gi;
const GML_POSLIST_RE = /<gml:posList[^>]*>([^<]+)<\/gml:posList>/gi;
const GML_POS_RE = /<gml:pos>([^<]+)<\/gml:pos>/;

function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

export function formatCoord(value: number): string {
  if (!Number.isFinite(value)) return "";
  return value.toFixed(6).replace(/0+$/, "").replace(/\.$/, "");
}

function toPair(coord: unknown): [number, number] | null {
  if (!Array.isArray(coord) || coord.length < 2) return null;
  const x = toNumber(coord[0]);
  const y = toNumber(coord[1]);
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
  return [x, y];
}

/** Malformed pairs are dropped rather than failing the whole ring. */
export function ringToWkt(ring: unknown): string {
  if (!Array.isArray(ring)) return "";
  const parts: string[] = [];
  for (const coord of ring) {
    const pair = toPair(coord);
    if (!pair) continue;
    parts.push(`${formatCoord(pair[0])} ${formatCoord(pair[1])}`);
  }
  return parts.join(", ");
}

// "((ring), (hole), ...)" or "" when no ring survives
export function polygonToWkt(rings: unknown): string {
  if (!Array.isArray(rings)) return "";
  const bodies: string[] = [];
  for (const ring of rings) {
    const seq = ringToWkt(ring);
    if (seq) bodies.push(`(${seq})`);
  }
  return bodies.length ? `(${bodies.join(", ")})` : "";
}

function multiPolygonToWkt(polygons: unknown[]): string {
  const bodies = polygons.map((p) => polygonToWkt(p)).filter(Boolean);
  return bodies.length ? `MULTIPOLYGON (${bodies.join(", ")})` : "";
}

export function parseGmlPosList(text: string): Ring {
  const items = text.trim().split(/\s+/);
  const coords: Ring = [];
  for (let i = 0; i + 1 < items.length; i += 2) {
    const pair = toPair([items[i], items[i + 1]]);
    if (pair) coords.push(pair);
  }
  return coords;
}

/**
 * Each <gml:Polygon> block becomes one polygon whose posLists are its rings.
 * Markup without polygon blocks is read as a single block.
 */
export function gmlToWkt(gml: string): string {
  let blocks = Array.from(gml.matchAll(GML_POLYGON_RE), (m) => m[1]);
  if (blocks.length === 0) blocks = [gml];

  const polygons: Ring[][] = [];
  for (const block of blocks) {
    const rings = Array.from(block.matchAll(GML_POSLIST_RE), (m) => parseGmlPosList(m[1])).filter(
      (ring) => ring.length > 0
    );
    if (rings.length) polygons.push(rings);
  }

  if (polygons.length === 0) {
    // gebouwPunt payloads carry a single <gml:pos>
    const pos = parseGmlPos(gml);
    const pair = toPair([pos.x, pos.y]);
    return pair ? `POINT (${formatCoord(pair[0])} ${formatCoord(pair[1])})` : gml;
  }
  if (polygons.length === 1) {
    const body = polygonToWkt(polygons[0]);
    return body ? `POLYGON ${body}` : "";
  }
  return multiPolygonToWkt(polygons);
}

export function geometryToWkt(geometry: unknown): string {
  if (!isRecord(geometry)) return "";
  const type = geometry.type;
  const coords = geometry.coordinates;

  if (type === "Polygon" && Array.isArray(coords)) {
    const body = polygonToWkt(coords);
    return body ? `POLYGON ${body}` : "";
  }
  if (type === "MultiPolygon" && Array.isArray(coords)) {
    return multiPolygonToWkt(coords);
  }
  if (type === "Point" && Array.isArray(coords) && coords.length >= 2) {
    const pair = toPair(coords);
    return pair ? `POINT (${formatCoord(pair[0])} ${formatCoord(pair[1])})` : "";
  }

  if (typeof geometry.gml === "string") {
    return gmlToWkt(geometry.gml);
  }

  // Last resort: keep whatever the registry sent
  return JSON.stringify(geometry);
}

/** x/y strings from the first <gml:pos>; missing parts are "". */
export function parseGmlPos(gml: unknown): { x: string; y: string } {
  if (typeof gml !== "string") return { x: "", y: "" };
  const match = gml.match(GML_POS_RE);
  if (!match) return { x: "", y: "" };
  const parts = match[1].trim().split(/\s+/).filter(Boolean);
  return { x: parts[0] ?? "", y: parts[1] ?? "" };
}
