/**
 * Shared setup for the CLI commands that process a command file.
 *
 * A session resolves configuration, the initial property set and the
 * structured logger once per invocation, so the `run` and `check`
 * handlers only deal with the workflow itself.
 *
 * @module
 */

import * as path from "node:path";
import {
  ConfigLoader,
  parsePropertyAssignments,
  resolveLogLevel,
  toPropertyValues,
  type LayerflowConfig,
} from "../../core/config/ConfigLoader.js";
import {
  createLogger,
  FileJsonSink,
  type ContextualLogger,
  type LogSink,
} from "../../core/logging/ContextualLogger.js";
import {
  createExecutionContext,
  executionLogContext,
  type ExecutionContext,
} from "../../core/logging/ExecutionContext.js";
import { Step } from "../../core/logging/Step.js";
import { StepTimer } from "../../core/logging/StepTimer.js";
import type { PropertyValue } from "../../core/properties/PropertyStore.js";
import { ensureDirectory, getAppPaths } from "../../core/utils/paths.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Global and per-command CLI options that shape a session.
 */
export interface SessionOptions {
  /** Path given with --config */
  readonly config?: string;
  /** `Name=Value` entries from -p/--property */
  readonly property?: readonly string[];
  /** Path given with --log-file */
  readonly logFile?: string;
  readonly debug?: boolean;
}

export interface SessionDependencies {
  readonly configLoader: ConfigLoader;
  readonly cwd: string;
  readonly env: NodeJS.ProcessEnv;
  /** User-level config file, tried after the project config */
  readonly userConfigFile?: string;
  /** Log file used when neither --log-file nor the config names one */
  readonly defaultLogFile: string;
  /** Replaces the log file sink (tests) */
  readonly sink?: LogSink;
}

export interface WorkflowSession {
  readonly config: LayerflowConfig;
  /** Configured properties overridden by command-line assignments */
  readonly properties: ReadonlyMap<string, PropertyValue>;
  readonly execution: ExecutionContext;
  readonly logger: ContextualLogger;
  readonly timer: StepTimer;
  /** Where structured logs go, undefined when a custom sink is used */
  readonly logFile?: string;
}

// =============================================================================
// Session
// =============================================================================

export function createDefaultSessionDependencies(): SessionDependencies {
  const appPaths = getAppPaths();
  return {
    configLoader: new ConfigLoader(),
    cwd: process.cwd(),
    env: process.env,
    userConfigFile: appPaths.configFile,
    defaultLogFile: appPaths.logFile,
  };
}

/**
 * Opens a session for one command file.
 *
 * @throws WorkflowError CONFIG_* when configuration cannot be loaded, or
 *   CONFIG_INVALID for a malformed -p assignment
 */
export async function openWorkflowSession(
  commandFile: string,
  options: SessionOptions,
  deps: SessionDependencies,
): Promise<WorkflowSession> {
  // Bad assignments fail before anything is written to the log
  const overrides = parsePropertyAssignments(options.property ?? []);

  const config = await deps.configLoader.load({
    explicitPath: options.config,
    cwd: deps.cwd,
    userConfigFile: deps.userConfigFile,
  });

  const logFile = deps.sink
    ? undefined
    : path.resolve(deps.cwd, options.logFile ?? config.logFile ?? deps.defaultLogFile);
  if (logFile) {
    ensureDirectory(path.dirname(logFile));
  }

  const execution = createExecutionContext({ commandFile: path.resolve(deps.cwd, commandFile) });
  const logger = createLogger({
    sink: deps.sink ?? (logFile ? new FileJsonSink(logFile) : undefined),
    minLevel: options.debug ? "debug" : resolveLogLevel(config, deps.env),
    debug: options.debug,
    context: executionLogContext(execution),
  });

  logger.withContext({ step: Step.CONFIG_LOAD }).info("Configuration resolved", {
    configPath: config.configPath,
    logLevel: resolveLogLevel(config, deps.env),
  });

  const properties = new Map<string, PropertyValue>(toPropertyValues(config.properties));
  for (const [name, value] of overrides) {
    properties.set(name, value);
  }

  return {
    config,
    properties,
    execution,
    logger,
    timer: new StepTimer(logger),
    logFile,
  };
}
