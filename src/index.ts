/**
 * Library entry point: run command files from code.
 *
 * @example
 * ```typescript
 * import { createLogger, createDefaultServices, loadCommandFile, WorkflowProcessor } from "layerflow";
 *
 * const commands = await loadCommandFile("clip.lf");
 * const processor = new WorkflowProcessor(commands, {
 *   services: createDefaultServices(),
 *   logger: createLogger(),
 * });
 * const summary = await processor.executeAll();
 * ```
 *
 * @module
 */

// Errors
export {
  WorkflowError,
  MissingPropertyError,
  ImmutablePropertyError,
  UnknownFormatterError,
  CommandParameterError,
  CommandRunError,
  toUserMessage,
} from "./core/errors/errors.js";
export { ErrorCode, getErrorCategory, getExitCode, type ErrorCategory } from "./core/errors/ErrorCode.js";

// Status
export { Severity, Phase, maxSeverity, compareSeverity, isAtLeast, parseSeverity } from "./core/status/Severity.js";
export { createLogRecord, type LogRecord } from "./core/status/LogRecord.js";
export { CommandStatus } from "./core/status/CommandStatus.js";

// Logging
export {
  ContextualLogger,
  createLogger,
  levelForSeverity,
  FileJsonSink,
  NullSink,
  StdoutJsonSink,
  type LogEntry,
  type LogLevel,
  type LogSink,
} from "./core/logging/ContextualLogger.js";
export { createExecutionContext, elapsedMs, type ExecutionContext } from "./core/logging/ExecutionContext.js";
export { Step } from "./core/logging/Step.js";
export { StepTimer } from "./core/logging/StepTimer.js";

// Properties and registries
export {
  PropertyStore,
  BuiltinProperty,
  stringValue,
  pathValue,
  booleanValue,
  integerValue,
  listValue,
  formatPropertyValue,
  type PropertyValue,
} from "./core/properties/PropertyStore.js";
export { FormatterCode, applyFormatter, formatPathTemplate } from "./core/properties/PathFormatter.js";
export { CollisionPolicy, parseCollisionPolicy } from "./core/registry/CollisionPolicy.js";
export { IdentifierRegistry, type RegisterOutcome } from "./core/registry/IdentifierRegistry.js";

// Model
export { GeometryKind, DEFAULT_CRS, copyGeoLayer, type GeoLayer } from "./core/model/GeoLayer.js";
export type { Table } from "./core/model/Table.js";
export type { DataStore } from "./core/model/DataStore.js";

// Checks and commands
export { FailResponse, evaluate, escalate, type Check, type CheckResult } from "./core/checks/CheckDispatcher.js";
export {
  AbstractCommand,
  CommandState,
  type CommandInit,
  type RunOutcome,
  type ValidateOutcome,
} from "./core/commands/AbstractCommand.js";
export { CommandFactory, type CommandConstructor } from "./core/commands/CommandFactory.js";
export { parseCommandString, renderCommandString } from "./core/commands/CommandString.js";

// Processing
export {
  createWorkflowContext,
  resolvePath,
  type CommandFileRun,
  type WorkflowContext,
} from "./core/context/WorkflowContext.js";
export { loadCommandFile, readCommandFile, splitCommandLines } from "./core/processor/CommandFileReader.js";
export {
  WorkflowProcessor,
  type ProcessorListener,
  type RunSummary,
  type DiscoverySummary,
  type WorkflowProcessorOptions,
} from "./core/processor/WorkflowProcessor.js";

// Services
export { createDefaultServices, type WorkflowServices } from "./core/services/WorkflowServices.js";
export type { GeometryEngine, AlgorithmParameters, AlgorithmOutputs } from "./core/services/GeometryEngine.js";
export type { LayerCodec } from "./core/services/LayerCodec.js";
export type { ArchiveService } from "./core/services/ArchiveService.js";
export type { DownloadService } from "./core/services/DownloadService.js";
export type { ProgramRunner } from "./core/services/ProgramRunner.js";
export { TurfGeometryEngine } from "./core/services/TurfGeometryEngine.js";

// Configuration
export { ConfigLoader, type LayerflowConfig } from "./core/config/ConfigLoader.js";
