/**
 * Workflow property store.
 *
 * Holds the named values commands read while resolving parameters, and
 * performs `${Name}` substitution. `WorkingDir` and `TempDir` are written
 * once when a run starts and are read-only afterwards.
 *
 * The store never logs. `expand()` reports unresolved names to the caller,
 * which decides how to record them.
 *
 * @module
 */

import { ImmutablePropertyError, MissingPropertyError } from "../errors/errors.js";

// =============================================================================
// Types
// =============================================================================

export type PropertyValue =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "path"; readonly value: string }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "list"; readonly value: readonly string[] };

export type PropertyKind = PropertyValue["kind"];

export interface ExpandResult {
  /** Input with every resolvable token substituted */
  readonly value: string;

  /** Names of `${...}` tokens left verbatim, in order of appearance */
  readonly unresolved: readonly string[];
}

export interface PropertyStoreOptions {
  /** Environment used for `${ENV:Name}` tokens (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

// =============================================================================
// Constants
// =============================================================================

export const BuiltinProperty = {
  WORKING_DIR: "WorkingDir",
  TEMP_DIR: "TempDir",
} as const;

const WRITE_ONCE = new Set<string>([BuiltinProperty.WORKING_DIR, BuiltinProperty.TEMP_DIR]);

export function isWriteOnce(name: string): boolean {
  return WRITE_ONCE.has(name);
}

const TOKEN_PATTERN = /\$\{([^}]+)\}/g;

const ENV_PREFIX = /^env:/i;

// =============================================================================
// Value helpers
// =============================================================================

export const stringValue = (value: string): PropertyValue => ({ kind: "string", value });
export const pathValue = (value: string): PropertyValue => ({ kind: "path", value });
export const booleanValue = (value: boolean): PropertyValue => ({ kind: "boolean", value });
export const integerValue = (value: number): PropertyValue => ({ kind: "integer", value });
export const listValue = (value: readonly string[]): PropertyValue => ({ kind: "list", value });

/**
 * Renders a property value the way it appears after substitution.
 */
export function formatPropertyValue(property: PropertyValue): string {
  switch (property.kind) {
    case "string":
    case "path":
      return property.value;
    case "boolean":
      return property.value ? "True" : "False";
    case "integer":
      return String(property.value);
    case "list":
      return property.value.join(",");
  }
}

// =============================================================================
// PropertyStore
// =============================================================================

export class PropertyStore {
  private readonly values = new Map<string, PropertyValue>();
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: PropertyStoreOptions = {}) {
    this.env = options.env ?? process.env;
  }

  /**
   * Returns the stored value.
   *
   * @throws MissingPropertyError when the property is absent and no default is given
   */
  get(name: string): PropertyValue;
  get<D>(name: string, defaultValue: D): PropertyValue | D;
  get<D>(name: string, ...fallback: [] | [D]): PropertyValue | D {
    const value = this.values.get(name);
    if (value !== undefined) {
      return value;
    }
    if (fallback.length === 1) {
      return fallback[0];
    }
    throw new MissingPropertyError(name);
  }

  /**
   * Returns the value rendered as text, or undefined when absent.
   */
  getText(name: string): string | undefined {
    const value = this.values.get(name);
    return value === undefined ? undefined : formatPropertyValue(value);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  /**
   * Sets a property, overwriting any previous value.
   *
   * @throws ImmutablePropertyError when rewriting WorkingDir or TempDir
   */
  set(name: string, value: PropertyValue): void {
    if (WRITE_ONCE.has(name) && this.values.has(name)) {
      throw new ImmutablePropertyError(name);
    }
    this.values.set(name, value);
  }

  /**
   * Removes a user property. Absent names are ignored.
   */
  delete(name: string): void {
    if (WRITE_ONCE.has(name)) {
      throw new ImmutablePropertyError(name);
    }
    this.values.delete(name);
  }

  names(): string[] {
    return [...this.values.keys()].sort();
  }

  /**
   * Name and value pairs in the order the properties were first set.
   */
  entries(): [string, PropertyValue][] {
    return [...this.values.entries()];
  }

  /**
   * Substitutes `${Name}` and `${ENV:Name}` tokens.
   *
   * Escaped quotes (`\"`, `\'`) are unescaped first. Substituted text is
   * not scanned again.
   */
  expand(raw: string): ExpandResult {
    const unresolved: string[] = [];
    const unescaped = raw.replace(/\\"/g, '"').replace(/\\'/g, "'");

    const value = unescaped.replace(TOKEN_PATTERN, (token, name: string) => {
      const resolved = this.resolveToken(name);
      if (resolved === undefined) {
        unresolved.push(name);
        return token;
      }
      return resolved;
    });

    return { value, unresolved };
  }

  private resolveToken(name: string): string | undefined {
    if (ENV_PREFIX.test(name)) {
      return this.env[name.replace(ENV_PREFIX, "")];
    }
    return this.getText(name);
  }
}
