/**
 * Parameter metadata and typed parameter values.
 *
 * Raw parameter text is coerced once, during validation, into
 * `ParameterValue`s. Commands read them back through the typed accessors
 * of `ParameterValues`.
 *
 * @module
 */

import { FailResponse } from "../checks/CheckDispatcher.js";
import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import {
  COLLISION_POLICIES,
  CollisionPolicy,
  parseCollisionPolicy,
} from "../registry/CollisionPolicy.js";

// =============================================================================
// Metadata
// =============================================================================

export type ParameterType = "string" | "boolean" | "integer" | "list";

export interface ParameterSpec {
  readonly name: string;
  readonly description: string;
  /** Default: "string" */
  readonly type?: ParameterType;
  readonly required?: boolean;
  /** Raw text used when the parameter is absent or empty */
  readonly defaultValue?: string;
  /** Accepted values, compared case-insensitively */
  readonly allowedValues?: readonly string[];
}

/**
 * Metadata for an `If...Exists` parameter taking a collision policy.
 */
export function collisionPolicySpec(
  name: string,
  defaultValue: CollisionPolicy = CollisionPolicy.REPLACE,
): ParameterSpec {
  return {
    name,
    description: "Action when the output ID is already in use",
    allowedValues: COLLISION_POLICIES,
    defaultValue,
  };
}

export const MissingAction = {
  IGNORE: "Ignore",
  WARN: "Warn",
  FAIL: "Fail",
} as const;

export type MissingAction = (typeof MissingAction)[keyof typeof MissingAction];

/**
 * Metadata for an `If...NotFound` parameter.
 */
export function missingActionSpec(name: string, defaultValue: MissingAction = MissingAction.WARN): ParameterSpec {
  return {
    name,
    description: "Action when the input does not exist",
    allowedValues: Object.values(MissingAction),
    defaultValue,
  };
}

/**
 * Check response for a missing-input action. Ignore has none: the check
 * is not requested.
 */
export function responseForMissing(action: string): FailResponse | undefined {
  switch (action) {
    case MissingAction.WARN:
      return FailResponse.WARN_BUT_DO_NOT_RUN;
    case MissingAction.FAIL:
      return FailResponse.FAIL;
    default:
      return undefined;
  }
}

// =============================================================================
// Values
// =============================================================================

export type ParameterValue = string | boolean | number | readonly string[];

/**
 * Raw `Name="value"` pairs in the order they were written.
 */
export type RawParameters = readonly (readonly [string, string])[];

function wrongType(name: string, expected: string): WorkflowError {
  return new WorkflowError(
    `Parameter ${name} is not available as ${expected}`,
    ErrorCode.COMMAND_STATE_INVALID,
    { parameter: name, expected },
    undefined,
    undefined,
    undefined,
    false,
  );
}

export class ParameterValues {
  constructor(private readonly values: ReadonlyMap<string, ParameterValue> = new Map()) {}

  has(name: string): boolean {
    return this.values.has(name);
  }

  string(name: string): string {
    const value = this.optionalString(name);
    if (value === undefined) {
      throw wrongType(name, "a string");
    }
    return value;
  }

  optionalString(name: string): string | undefined {
    const value = this.values.get(name);
    if (value === undefined || typeof value === "string") {
      return value;
    }
    throw wrongType(name, "a string");
  }

  boolean(name: string, fallback = false): boolean {
    const value = this.values.get(name);
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== "boolean") {
      throw wrongType(name, "a boolean");
    }
    return value;
  }

  integer(name: string): number {
    const value = this.optionalInteger(name);
    if (value === undefined) {
      throw wrongType(name, "an integer");
    }
    return value;
  }

  optionalInteger(name: string): number | undefined {
    const value = this.values.get(name);
    if (value === undefined || typeof value === "number") {
      return value;
    }
    throw wrongType(name, "an integer");
  }

  /** Absent lists read as empty */
  list(name: string): readonly string[] {
    const value = this.values.get(name);
    if (value === undefined) {
      return [];
    }
    if (typeof value === "string" || typeof value === "boolean" || typeof value === "number") {
      throw wrongType(name, "a list");
    }
    return value;
  }

  policy(name: string): CollisionPolicy {
    const policy = parseCollisionPolicy(this.string(name));
    if (!policy) {
      throw wrongType(name, "a collision policy");
    }
    return policy;
  }
}
