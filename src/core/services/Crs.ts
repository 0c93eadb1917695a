/**
 * Coordinate reference system lookup backed by proj4.
 *
 * proj4 knows EPSG:4326 and EPSG:3857 out of the box; the definitions
 * below add the systems layerflow workflows commonly use.
 *
 * @module
 */

import proj4 from "proj4";

const EXTRA_DEFINITIONS: Record<string, string> = {
  "EPSG:2056":
    "+proj=somerc +lat_0=46.95240555555556 +lon_0=7.439583333333333 +k_0=1 +x_0=2600000 +y_0=1200000 +ellps=bessel +towgs84=674.374,15.056,405.346,0,0,0,0 +units=m +no_defs",
  "EPSG:26913": "+proj=utm +zone=13 +datum=NAD83 +units=m +no_defs",
  "EPSG:32613": "+proj=utm +zone=13 +datum=WGS84 +units=m +no_defs",
  "EPSG:4269": "+proj=longlat +datum=NAD83 +no_defs",
};

let registered = false;

function ensureDefinitions(): void {
  if (registered) {
    return;
  }
  for (const [code, definition] of Object.entries(EXTRA_DEFINITIONS)) {
    proj4.defs(code, definition);
  }
  registered = true;
}

/**
 * Upper-cases the authority prefix and converts OGC URNs
 * (`urn:ogc:def:crs:EPSG::26913`) to `EPSG:26913`.
 */
export function normalizeCrsCode(code: string): string {
  const trimmed = code.trim();
  const urn = /^urn:ogc:def:crs:([a-z]+):[^:]*:(.+)$/i.exec(trimmed);
  if (urn) {
    return `${urn[1].toUpperCase()}:${urn[2]}`;
  }
  const separator = trimmed.indexOf(":");
  if (separator < 0) {
    return trimmed;
  }
  return `${trimmed.slice(0, separator).toUpperCase()}${trimmed.slice(separator)}`;
}

export function isKnownCrs(code: string): boolean {
  ensureDefinitions();
  return proj4.defs(normalizeCrsCode(code)) !== undefined;
}

/**
 * Transforms one `[x, y]` coordinate.
 */
export function transformCoordinate(
  sourceCrs: string,
  targetCrs: string,
  coordinate: [number, number],
): [number, number] {
  ensureDefinitions();
  const [x, y] = proj4(normalizeCrsCode(sourceCrs), normalizeCrsCode(targetCrs), coordinate);
  return [x, y];
}
