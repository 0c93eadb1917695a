/**
 * GeoLayer model.
 *
 * A GeoLayer wraps a GeoJSON feature collection together with the
 * identity and coordinate reference system commands check against.
 *
 * @module
 */

import type { FeatureCollection, Geometry } from "geojson";

export const GeometryKind = {
  POINT: "Point",
  LINE: "Line",
  POLYGON: "Polygon",
  MIXED: "Mixed",
  UNKNOWN: "Unknown",
} as const;

export type GeometryKind = (typeof GeometryKind)[keyof typeof GeometryKind];

export interface GeoLayer {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  /** CRS code such as "EPSG:4326" */
  readonly crs: string;
  readonly features: FeatureCollection;
  /** File the layer was read from, empty for derived layers */
  readonly sourcePath: string;
}

export const DEFAULT_CRS = "EPSG:4326";

function kindOf(geometry: Geometry | null): GeometryKind | undefined {
  switch (geometry?.type) {
    case "Point":
    case "MultiPoint":
      return GeometryKind.POINT;
    case "LineString":
    case "MultiLineString":
      return GeometryKind.LINE;
    case "Polygon":
    case "MultiPolygon":
      return GeometryKind.POLYGON;
    default:
      return undefined;
  }
}

/**
 * Summarizes the geometry types present in a layer.
 *
 * Empty layers and layers holding only null geometries or collections are
 * UNKNOWN; layers with more than one kind are MIXED.
 */
export function geometryKindOf(layer: Pick<GeoLayer, "features">): GeometryKind {
  const kinds = new Set<GeometryKind>();
  for (const feature of layer.features.features) {
    const kind = kindOf(feature.geometry);
    if (kind) {
      kinds.add(kind);
    }
  }
  if (kinds.size === 0) {
    return GeometryKind.UNKNOWN;
  }
  if (kinds.size > 1) {
    return GeometryKind.MIXED;
  }
  const [only] = kinds;
  return only ?? GeometryKind.UNKNOWN;
}

/**
 * Names of every attribute used by at least one feature.
 */
export function attributeNamesOf(layer: Pick<GeoLayer, "features">): Set<string> {
  const names = new Set<string>();
  for (const feature of layer.features.features) {
    for (const key of Object.keys(feature.properties ?? {})) {
      names.add(key);
    }
  }
  return names;
}

/**
 * Returns a copy with a new ID. Features are deep-copied.
 */
export function copyGeoLayer(layer: GeoLayer, id: string, name = layer.name): GeoLayer {
  return {
    ...layer,
    id,
    name,
    sourcePath: "",
    features: structuredClone(layer.features),
  };
}
