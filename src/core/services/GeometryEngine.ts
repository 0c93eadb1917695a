/**
 * Geometry engine contract.
 *
 * Commands hand named inputs to an algorithm and read named outputs back.
 * The engine is opaque to the core: it either returns an output map or
 * throws.
 *
 * @module
 */

import type { FeatureCollection } from "geojson";
import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

export type AlgorithmValue = string | number | boolean | FeatureCollection | FeatureCollection[];

export type AlgorithmParameters = Readonly<Record<string, AlgorithmValue>>;

export type AlgorithmOutputs = Readonly<Record<string, AlgorithmValue>>;

export interface GeometryEngine {
  /** Names accepted by runAlgorithm() */
  readonly algorithms: readonly string[];

  runAlgorithm(name: string, parameters: AlgorithmParameters): Promise<AlgorithmOutputs>;
}

export function isFeatureCollection(
  value: AlgorithmValue | undefined,
): value is FeatureCollection {
  return typeof value === "object" && !Array.isArray(value) && value.type === "FeatureCollection";
}

/**
 * Reads a feature collection output, failing when the engine did not
 * produce one.
 */
export function requireLayerOutput(
  outputs: AlgorithmOutputs,
  key: string,
  algorithm: string,
): FeatureCollection {
  const value = outputs[key];
  if (!isFeatureCollection(value)) {
    throw new WorkflowError(
      `Algorithm "${algorithm}" returned no "${key}" layer`,
      ErrorCode.ALGORITHM_FAILED,
      { algorithm, output: key },
    );
  }
  return value;
}
