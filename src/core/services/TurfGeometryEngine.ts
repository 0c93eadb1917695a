/**
 * Geometry engine built on Turf and proj4.
 *
 * Algorithms and their parameters:
 *
 * | name        | inputs                                    | outputs  |
 * |-------------|-------------------------------------------|----------|
 * | `clip`      | INPUT, OVERLAY                            | OUTPUT   |
 * | `merge`     | INPUTS                                    | OUTPUT   |
 * | `simplify`  | INPUT, TOLERANCE, HIGH_QUALITY?           | OUTPUT   |
 * | `reproject` | INPUT, SOURCE_CRS, TARGET_CRS             | OUTPUT   |
 *
 * @module
 */

import * as turf from "@turf/turf";
import type { Feature, FeatureCollection, MultiPolygon, Polygon } from "geojson";
import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { isKnownCrs, transformCoordinate } from "./Crs.js";
import {
  isFeatureCollection,
  type AlgorithmOutputs,
  type AlgorithmParameters,
  type GeometryEngine,
} from "./GeometryEngine.js";

type Algorithm = (parameters: AlgorithmParameters) => AlgorithmOutputs;

// =============================================================================
// Parameter access
// =============================================================================

function invalidParameter(name: string, expected: string): WorkflowError {
  return new WorkflowError(
    `Algorithm parameter ${name} must be ${expected}`,
    ErrorCode.ALGORITHM_FAILED,
    { parameter: name },
  );
}

function layerParam(parameters: AlgorithmParameters, name: string): FeatureCollection {
  const value = parameters[name];
  if (!isFeatureCollection(value)) {
    throw invalidParameter(name, "a feature collection");
  }
  return value;
}

function layersParam(parameters: AlgorithmParameters, name: string): FeatureCollection[] {
  const value = parameters[name];
  if (!Array.isArray(value)) {
    throw invalidParameter(name, "a list of feature collections");
  }
  return value;
}

function numberParam(parameters: AlgorithmParameters, name: string): number {
  const value = parameters[name];
  if (typeof value !== "number") {
    throw invalidParameter(name, "a number");
  }
  return value;
}

function stringParam(parameters: AlgorithmParameters, name: string): string {
  const value = parameters[name];
  if (typeof value !== "string") {
    throw invalidParameter(name, "a string");
  }
  return value;
}

// =============================================================================
// Algorithms
// =============================================================================

function isPolygonal(feature: Feature): feature is Feature<Polygon | MultiPolygon> {
  const type = feature.geometry?.type;
  return type === "Polygon" || type === "MultiPolygon";
}

/**
 * Dissolves the polygons of a layer into a single mask.
 */
function polygonMask(layer: FeatureCollection): Feature<Polygon | MultiPolygon> | null {
  const polygons = layer.features.filter(isPolygonal);
  if (polygons.length === 0) {
    return null;
  }
  if (polygons.length === 1) {
    return polygons[0];
  }
  return turf.union(turf.featureCollection(polygons));
}

/**
 * Polygons are cut to the mask. Points and lines are kept whole when
 * they touch the mask.
 */
const clip: Algorithm = (parameters) => {
  const input = layerParam(parameters, "INPUT");
  const mask = polygonMask(layerParam(parameters, "OVERLAY"));
  const features: Feature[] = [];

  if (mask) {
    for (const feature of input.features) {
      if (isPolygonal(feature)) {
        const clipped = turf.intersect(turf.featureCollection([feature, mask]), {
          properties: { ...feature.properties },
        });
        if (clipped) {
          features.push(clipped);
        }
      } else if (turf.booleanIntersects(feature, mask)) {
        features.push(structuredClone(feature));
      }
    }
  }

  return { OUTPUT: turf.featureCollection(features) };
};

const merge: Algorithm = (parameters) => {
  const features = layersParam(parameters, "INPUTS").flatMap((layer) =>
    structuredClone(layer.features),
  );
  return { OUTPUT: turf.featureCollection(features) };
};

const simplify: Algorithm = (parameters) => {
  const input = layerParam(parameters, "INPUT");
  const tolerance = numberParam(parameters, "TOLERANCE");
  const highQuality = parameters.HIGH_QUALITY === true;
  return { OUTPUT: turf.simplify(input, { tolerance, highQuality, mutate: false }) };
};

const reproject: Algorithm = (parameters) => {
  const input = layerParam(parameters, "INPUT");
  const sourceCrs = stringParam(parameters, "SOURCE_CRS");
  const targetCrs = stringParam(parameters, "TARGET_CRS");
  for (const crs of [sourceCrs, targetCrs]) {
    if (!isKnownCrs(crs)) {
      throw new WorkflowError(`Unknown coordinate reference system "${crs}"`, ErrorCode.ALGORITHM_FAILED, {
        crs,
      });
    }
  }

  const output = structuredClone(input);
  turf.coordEach(output, (coordinate) => {
    const [x, y] = transformCoordinate(sourceCrs, targetCrs, [coordinate[0], coordinate[1]]);
    coordinate[0] = x;
    coordinate[1] = y;
  });
  return { OUTPUT: output };
};

const ALGORITHMS: Readonly<Record<string, Algorithm>> = { clip, merge, simplify, reproject };

// =============================================================================
// Engine
// =============================================================================

export class TurfGeometryEngine implements GeometryEngine {
  readonly algorithms = Object.keys(ALGORITHMS);

  async runAlgorithm(name: string, parameters: AlgorithmParameters): Promise<AlgorithmOutputs> {
    if (!Object.hasOwn(ALGORITHMS, name)) {
      throw new WorkflowError(
        `Algorithm "${name}" is not available`,
        ErrorCode.ALGORITHM_UNAVAILABLE,
        { algorithm: name, available: this.algorithms },
      );
    }
    return ALGORITHMS[name](parameters);
  }
}
