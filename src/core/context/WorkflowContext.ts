/**
 * Shared state for one processor run.
 *
 * A fresh context is created for every run and handed to each command
 * explicitly; nothing here is module-level.
 *
 * @module
 */

import * as os from "node:os";
import * as path from "node:path";
import type { AbstractCommand } from "../commands/AbstractCommand.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import type { DataStore } from "../model/DataStore.js";
import type { GeoLayer } from "../model/GeoLayer.js";
import type { Table } from "../model/Table.js";
import {
  BuiltinProperty,
  formatPropertyValue,
  isWriteOnce,
  PropertyStore,
  pathValue,
  stringValue,
  type PropertyValue,
} from "../properties/PropertyStore.js";
import { IdentifierRegistry } from "../registry/IdentifierRegistry.js";
import type { WorkflowServices } from "../services/WorkflowServices.js";
import type { Severity } from "../status/Severity.js";

/**
 * Result of running another command file from inside a workflow.
 */
export interface CommandFileRun {
  /** Highest severity over the commands that ran */
  readonly severity: Severity;
  readonly commands: readonly AbstractCommand[];
}

export type CommandFileRunner = (filePath: string) => Promise<CommandFileRun>;

export interface WorkflowContext {
  readonly properties: PropertyStore;
  readonly geoLayers: IdentifierRegistry<GeoLayer>;
  readonly tables: IdentifierRegistry<Table>;
  readonly dataStores: IdentifierRegistry<DataStore>;
  /** Files written by commands, in write order */
  readonly outputFiles: string[];
  readonly services: WorkflowServices;
  readonly logger: ContextualLogger;
  /** Commands of the running workflow, in file order */
  readonly commands: readonly AbstractCommand[];
  /** Absent when no processor drives the context */
  readonly runCommandFile?: CommandFileRunner;
}

export interface CreateWorkflowContextOptions {
  /** Folder relative paths resolve against (default: process.cwd()) */
  workingDir?: string;
  /** Default: os.tmpdir() */
  tempDir?: string;
  /** Initial user properties, applied after the built-ins */
  properties?: ReadonlyMap<string, PropertyValue>;
  services: WorkflowServices;
  logger: ContextualLogger;
  env?: NodeJS.ProcessEnv;
  commands?: readonly AbstractCommand[];
  runCommandFile?: CommandFileRunner;
}

function userName(): string {
  try {
    return os.userInfo().username;
  } catch {
    // userInfo() throws when the uid has no passwd entry
    return "";
  }
}

export function createWorkflowContext(options: CreateWorkflowContextOptions): WorkflowContext {
  const initial = options.properties ?? new Map<string, PropertyValue>();
  const configured = (name: string): string | undefined => {
    const value = initial.get(name);
    return value === undefined ? undefined : formatPropertyValue(value);
  };

  const properties = new PropertyStore({ env: options.env });
  properties.set(
    BuiltinProperty.WORKING_DIR,
    pathValue(path.resolve(options.workingDir ?? configured(BuiltinProperty.WORKING_DIR) ?? process.cwd())),
  );
  properties.set(
    BuiltinProperty.TEMP_DIR,
    pathValue(path.resolve(options.tempDir ?? configured(BuiltinProperty.TEMP_DIR) ?? os.tmpdir())),
  );
  properties.set("UserHomeDir", pathValue(os.homedir()));
  properties.set("UserName", stringValue(userName()));
  properties.set("ComputerName", stringValue(os.hostname()));

  for (const [name, value] of initial) {
    if (!properties.has(name) || !isWriteOnce(name)) {
      properties.set(name, value);
    }
  }

  return {
    properties,
    geoLayers: new IdentifierRegistry<GeoLayer>("GeoLayer"),
    tables: new IdentifierRegistry<Table>("Table"),
    dataStores: new IdentifierRegistry<DataStore>("DataStore"),
    outputFiles: [],
    services: options.services,
    logger: options.logger,
    commands: options.commands ?? [],
    runCommandFile: options.runCommandFile,
  };
}

/**
 * Resolves a path against WorkingDir.
 */
export function resolvePath(context: WorkflowContext, filePath: string): string {
  if (path.isAbsolute(filePath)) {
    return path.normalize(filePath);
  }
  const workingDir = context.properties.getText(BuiltinProperty.WORKING_DIR) ?? process.cwd();
  return path.resolve(workingDir, filePath);
}
