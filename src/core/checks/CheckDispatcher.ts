/**
 * Runtime precondition checks.
 *
 * A check is one of a closed set of predicates, each producing a pass/fail
 * verdict with a message and recommendation worded for that predicate.
 * Evaluation is synchronous and reads only the check itself, the
 * registries passed in, and the filesystem for path checks.
 *
 * What a failure means is decided separately by `escalate()`: the caller
 * supplies a FailResponse, except where the predicate forces one
 * (output-ID collisions derive it from the collision policy; an
 * unrecognized check always fails).
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { DataStore } from "../model/DataStore.js";
import {
  attributeNamesOf,
  geometryKindOf,
  type GeoLayer,
  type GeometryKind,
} from "../model/GeoLayer.js";
import type { Table } from "../model/Table.js";
import { CollisionPolicy } from "../registry/CollisionPolicy.js";
import type { IdentifierRegistry } from "../registry/IdentifierRegistry.js";
import { isKnownCrs, normalizeCrsCode } from "../services/Crs.js";
import { Severity } from "../status/Severity.js";

// =============================================================================
// Types
// =============================================================================

export const FailResponse = {
  /** FAILURE record, effect blocked */
  FAIL: "FAIL",
  /** WARNING record, effect may run */
  WARN: "WARN",
  /** WARNING record, effect blocked */
  WARN_BUT_DO_NOT_RUN: "WARN_BUT_DO_NOT_RUN",
} as const;

export type FailResponse = (typeof FailResponse)[keyof typeof FailResponse];

export type RegistryKind = "geoLayers" | "tables" | "dataStores";

interface CheckBase {
  /** Parameter the checked value came from, used in messages */
  readonly parameter: string;
}

export type Check =
  | (CheckBase & { readonly kind: "fileExists"; readonly path: string })
  | (CheckBase & { readonly kind: "folderExists"; readonly path: string })
  | (CheckBase & { readonly kind: "parentFolderExists"; readonly path: string })
  | (CheckBase & {
      readonly kind: "valueInSet";
      readonly value: string;
      readonly allowed: readonly string[];
      readonly ignoreCase?: boolean;
    })
  | (CheckBase & { readonly kind: "idExists"; readonly registry: RegistryKind; readonly id: string })
  | (CheckBase & { readonly kind: "idUnique"; readonly registry: RegistryKind; readonly id: string })
  | (CheckBase & {
      readonly kind: "outputIdAvailable";
      readonly registry: RegistryKind;
      readonly id: string;
      readonly policy: CollisionPolicy;
    })
  | (CheckBase & {
      readonly kind: "matchingCrs";
      readonly id: string;
      readonly otherParameter: string;
      readonly otherId: string;
    })
  | (CheckBase & {
      readonly kind: "geometryKind";
      readonly id: string;
      readonly allowed: readonly GeometryKind[];
    })
  | (CheckBase & { readonly kind: "crsCodeValid"; readonly value: string })
  | (CheckBase & {
      readonly kind: "intInRange";
      readonly value: string;
      readonly min: number;
      readonly max: number;
    })
  | (CheckBase & {
      readonly kind: "listLength";
      readonly value: string;
      readonly expected: number;
      readonly delimiter?: string;
    })
  | (CheckBase & {
      readonly kind: "attributesExist";
      readonly id: string;
      readonly attributes: readonly string[];
    })
  | (CheckBase & { readonly kind: "urlValid"; readonly value: string });

export type CheckKind = Check["kind"];

export interface CheckResult {
  readonly passed: boolean;
  readonly message: string;
  readonly recommendation: string;

  /** Response that overrides the caller's */
  readonly forcedResponse?: FailResponse;

  /** True when the check kind is not one the dispatcher knows */
  readonly unrecognized?: boolean;
}

/**
 * Registries a check can consult.
 */
export interface CheckRegistries {
  readonly geoLayers: IdentifierRegistry<GeoLayer>;
  readonly tables: IdentifierRegistry<Table>;
  readonly dataStores: IdentifierRegistry<DataStore>;
}

export interface Escalation {
  readonly severity: Severity;
  /** The command's effect must not run */
  readonly blocking: boolean;
}

// =============================================================================
// Result helpers
// =============================================================================

const PASSED: CheckResult = { passed: true, message: "", recommendation: "" };

function failed(message: string, recommendation: string, forcedResponse?: FailResponse): CheckResult {
  return { passed: false, message, recommendation, forcedResponse };
}

function isFile(p: string): boolean {
  return fs.statSync(p, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isDirectory(p: string): boolean {
  return fs.statSync(p, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

const URL_PROTOCOLS = new Set(["http:", "https:", "ftp:"]);

function isUrl(value: string): boolean {
  try {
    return URL_PROTOCOLS.has(new URL(value).protocol);
  } catch {
    return false;
  }
}

function missingLayer(parameter: string, id: string): CheckResult {
  return failed(
    `The ${parameter} (${id}) is not a valid GeoLayer ID (was not matched).`,
    "Specify a valid GeoLayer ID.",
  );
}

function unrecognizedCheck(check: never): CheckResult {
  const raw: unknown = check;
  const kind =
    typeof raw === "object" && raw !== null && "kind" in raw ? String(raw.kind) : String(raw);
  return {
    passed: false,
    message: `Check ${kind} is not a valid check in the validators.`,
    recommendation: "This is a defect in the command. Report it to the layerflow maintainers.",
    forcedResponse: FailResponse.FAIL,
    unrecognized: true,
  };
}

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Evaluates one check.
 */
export function evaluate(check: Check, registries: CheckRegistries): CheckResult {
  switch (check.kind) {
    case "fileExists":
      return isFile(check.path)
        ? PASSED
        : failed(
            `The ${check.parameter} (${check.path}) is not a valid file.`,
            `Specify a valid file for the ${check.parameter} parameter.`,
          );

    case "folderExists":
      return isDirectory(check.path)
        ? PASSED
        : failed(
            `The ${check.parameter} (${check.path}) is not a valid folder.`,
            `Specify a valid folder for the ${check.parameter} parameter.`,
          );

    case "parentFolderExists": {
      const folder = path.dirname(check.path);
      return isDirectory(folder)
        ? PASSED
        : failed(
            `The folder of the ${check.parameter} (${folder}) is not a valid folder.`,
            `Specify a valid folder for the ${check.parameter} parameter.`,
          );
    }

    case "valueInSet": {
      const matches = check.ignoreCase
        ? check.allowed.some((a) => a.toLowerCase() === check.value.toLowerCase())
        : check.allowed.includes(check.value);
      return matches
        ? PASSED
        : failed(
            `The ${check.parameter} (${check.value}) is not one of ${check.allowed.join(", ")}.`,
            `Specify one of ${check.allowed.join(", ")} for ${check.parameter}.`,
          );
    }

    case "idExists": {
      const registry = registries[check.registry];
      return registry.exists(check.id)
        ? PASSED
        : failed(
            `The ${check.parameter} (${check.id}) is not a valid ${registry.label} ID.`,
            `Specify a valid ${registry.label} ID.`,
          );
    }

    case "idUnique": {
      const registry = registries[check.registry];
      return registry.exists(check.id)
        ? failed(
            `The ${check.parameter} (${check.id}) value is already in use as a ${registry.label} ID.`,
            `Specify a new ${check.parameter}.`,
          )
        : PASSED;
    }

    case "outputIdAvailable": {
      const registry = registries[check.registry];
      if (!registry.exists(check.id)) {
        return PASSED;
      }
      const message = `The ${check.parameter} (${check.id}) value is already in use as a ${registry.label} ID.`;
      const recommendation = `Specify a new ${check.parameter}.`;
      switch (check.policy) {
        case CollisionPolicy.REPLACE:
          return PASSED;
        case CollisionPolicy.REPLACE_AND_WARN:
          return failed(message, recommendation, FailResponse.WARN);
        case CollisionPolicy.WARN:
          return failed(message, recommendation, FailResponse.WARN_BUT_DO_NOT_RUN);
        case CollisionPolicy.FAIL:
          return failed(message, recommendation, FailResponse.FAIL);
      }
      return unrecognizedCheck(check.policy);
    }

    case "matchingCrs": {
      const first = registries.geoLayers.get(check.id);
      const second = registries.geoLayers.get(check.otherId);
      if (!first) return missingLayer(check.parameter, check.id);
      if (!second) return missingLayer(check.otherParameter, check.otherId);
      return normalizeCrsCode(first.crs) === normalizeCrsCode(second.crs)
        ? PASSED
        : failed(
            `The ${check.parameter} (${check.id}) and the ${check.otherParameter} (${check.otherId}) do not have the same coordinate reference system.`,
            "Specify GeoLayers that have the same coordinate reference system.",
          );
    }

    case "geometryKind": {
      const layer = registries.geoLayers.get(check.id);
      if (!layer) return missingLayer(check.parameter, check.id);
      return check.allowed.includes(geometryKindOf(layer))
        ? PASSED
        : failed(
            `The ${check.parameter} (${check.id}) does not have geometry in the correct format (${check.allowed.join(", ")}).`,
            `Specify a GeoLayerID of a GeoLayer with geometry in correct format (${check.allowed.join(", ")}).`,
          );
    }

    case "crsCodeValid":
      return isKnownCrs(check.value)
        ? PASSED
        : failed(
            `The ${check.parameter} (${check.value}) is not a valid CRS code.`,
            "Specify a valid CRS code (EPSG codes are an approved format).",
          );

    case "intInRange": {
      const text = check.value.trim();
      const value = Number(text);
      const valid = /^[+-]?\d+$/.test(text) && value >= check.min && value <= check.max;
      return valid
        ? PASSED
        : failed(
            `The ${check.parameter} (${check.value}) must be at or between ${check.min} & ${check.max}`,
            `Specify a valid ${check.parameter} value.`,
          );
    }

    case "listLength": {
      const items = check.value.split(check.delimiter ?? ",").filter((item) => item.trim() !== "");
      return items.length === check.expected
        ? PASSED
        : failed(
            `The ${check.parameter} (${check.value}) must have ${check.expected} number of items.`,
            `Specify a list of ${check.expected} items for the ${check.parameter} parameter.`,
          );
    }

    case "attributesExist": {
      const layer = registries.geoLayers.get(check.id);
      if (!layer) return missingLayer("GeoLayerID", check.id);
      const existing = attributeNamesOf(layer);
      const invalid = check.attributes.filter((a) => !existing.has(a));
      return invalid.length === 0
        ? PASSED
        : failed(
            `The following attributes (${invalid.join(", ")}) of the ${check.parameter} parameter do not exist within the GeoLayer (${check.id}).`,
            "Specify valid attribute names.",
          );
    }

    case "urlValid":
      return isUrl(check.value)
        ? PASSED
        : failed(
            `${check.parameter} (${check.value}) is not a valid URL.`,
            `Specify a valid URL for ${check.parameter}.`,
          );

    default:
      return unrecognizedCheck(check);
  }
}

// =============================================================================
// Escalation
// =============================================================================

/**
 * Maps a result to the record severity and whether it blocks the effect.
 *
 * Returns undefined for a passed check. A forced response on the result
 * wins over the caller's.
 */
export function escalate(result: CheckResult, response: FailResponse): Escalation | undefined {
  if (result.passed) {
    return undefined;
  }
  switch (result.forcedResponse ?? response) {
    case FailResponse.FAIL:
      return { severity: Severity.FAILURE, blocking: true };
    case FailResponse.WARN:
      return { severity: Severity.WARNING, blocking: false };
    case FailResponse.WARN_BUT_DO_NOT_RUN:
      return { severity: Severity.WARNING, blocking: true };
  }
}
