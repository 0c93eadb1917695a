/**
 * Configuration loading for layerflow.
 *
 * ## Resolution
 *
 * 1. `--config <file>` when given (must exist)
 * 2. `layerflow.yaml` in the current folder
 * 3. `config.yaml` in the user config folder (see utils/paths)
 * 4. Built-in defaults
 *
 * ```yaml
 * logLevel: info
 * logFile: ./logs/layerflow.log
 * properties:
 *   DataFolder: ./data
 *   Years: [2020, 2021]
 * ```
 *
 * `LAYERFLOW_LOG_LEVEL` overrides `logLevel`; `-p Name=Value` on the
 * command line overrides `properties`.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { LogLevel } from "../logging/ContextualLogger.js";
import {
  booleanValue,
  integerValue,
  listValue,
  stringValue,
  type PropertyValue,
} from "../properties/PropertyStore.js";

// =============================================================================
// Constants
// =============================================================================

export const PROJECT_CONFIG_FILENAME = "layerflow.yaml";

export const LOG_LEVEL_ENV = "LAYERFLOW_LOG_LEVEL";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

// =============================================================================
// Zod Schemas
// =============================================================================

const PropertySchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.union([z.string(), z.number()]).transform(String)),
]);

const ConfigSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS).optional(),
    logFile: z.string().min(1).optional(),
    properties: z.record(z.string().min(1), PropertySchema).default({}),
  })
  .strict();

// =============================================================================
// Types
// =============================================================================

export type ConfigProperty = z.infer<typeof PropertySchema>;

export interface LayerflowConfig {
  readonly logLevel?: LogLevel;
  readonly logFile?: string;
  readonly properties: Readonly<Record<string, ConfigProperty>>;

  /** File the configuration came from, undefined for defaults */
  readonly configPath?: string;
}

export interface LoadConfigOptions {
  /** Path given with --config */
  readonly explicitPath?: string;
  readonly cwd?: string;
  /** User-level config file (default: none) */
  readonly userConfigFile?: string;
}

// =============================================================================
// ConfigLoader
// =============================================================================

export class ConfigLoader {
  async load(options: LoadConfigOptions = {}): Promise<LayerflowConfig> {
    const cwd = options.cwd ?? process.cwd();

    if (options.explicitPath) {
      const explicit = path.resolve(cwd, options.explicitPath);
      const content = await readIfExists(explicit);
      if (content === undefined) {
        throw new WorkflowError(
          "Configuration file not found",
          ErrorCode.CONFIG_NOT_FOUND,
          { path: explicit },
          undefined,
          `Check the --config path: ${explicit}`,
        );
      }
      return this.parse(content, explicit);
    }

    const candidates = [path.join(cwd, PROJECT_CONFIG_FILENAME), options.userConfigFile].filter(
      (p): p is string => p !== undefined,
    );
    for (const candidate of candidates) {
      const content = await readIfExists(candidate);
      if (content !== undefined) {
        return this.parse(content, candidate);
      }
    }

    return { properties: {} };
  }

  /**
   * Parses and validates configuration text. Relative `logFile` paths
   * resolve against the config file's folder.
   */
  parse(content: string, configPath: string): LayerflowConfig {
    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const position = error instanceof YAMLParseError ? error.linePos?.[0] : undefined;
      throw new WorkflowError(
        "Configuration file is not valid YAML",
        ErrorCode.CONFIG_PARSE_FAILED,
        { configPath, line: position?.line, column: position?.col },
        undefined,
        `Fix the YAML syntax in ${configPath}: ${cause.message}`,
        cause,
      );
    }

    const result = ConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
      const issues = result.error.issues.map((issue) => {
        const fieldPath = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${fieldPath}: ${issue.message}`;
      });
      throw new WorkflowError(
        "Invalid configuration",
        ErrorCode.CONFIG_INVALID,
        { configPath, issues },
        undefined,
        `The configuration at ${configPath} has validation errors: ${issues.join("; ")}.`,
      );
    }

    const { logLevel, logFile, properties } = result.data;
    return {
      logLevel,
      logFile: logFile === undefined ? undefined : path.resolve(path.dirname(configPath), logFile),
      properties,
      configPath,
    };
  }
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new WorkflowError(
      "Failed to read configuration file",
      ErrorCode.CONFIG_PARSE_FAILED,
      { path: filePath, reason: cause.message },
      undefined,
      undefined,
      cause,
    );
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Converts configured properties into typed property values.
 */
export function toPropertyValues(
  properties: Readonly<Record<string, ConfigProperty>>,
): Map<string, PropertyValue> {
  const values = new Map<string, PropertyValue>();
  for (const [name, value] of Object.entries(properties)) {
    if (Array.isArray(value)) {
      values.set(name, listValue(value));
    } else if (typeof value === "boolean") {
      values.set(name, booleanValue(value));
    } else if (typeof value === "number") {
      values.set(name, Number.isInteger(value) ? integerValue(value) : stringValue(String(value)));
    } else {
      values.set(name, stringValue(value));
    }
  }
  return values;
}

/**
 * Parses `Name=Value` assignments from the command line.
 *
 * @throws WorkflowError CONFIG_INVALID for an entry without a name
 */
export function parsePropertyAssignments(assignments: readonly string[]): Map<string, PropertyValue> {
  const values = new Map<string, PropertyValue>();
  for (const assignment of assignments) {
    const equals = assignment.indexOf("=");
    if (equals <= 0) {
      throw new WorkflowError(
        `Invalid property assignment "${assignment}"`,
        ErrorCode.CONFIG_INVALID,
        { assignment },
        undefined,
        "Use -p Name=Value.",
      );
    }
    values.set(assignment.slice(0, equals).trim(), stringValue(assignment.slice(equals + 1)));
  }
  return values;
}

/**
 * Picks the structured log level: environment, then config, then "info".
 */
export function resolveLogLevel(config: LayerflowConfig, env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === fromEnv);
  return match ?? config.logLevel ?? "info";
}
