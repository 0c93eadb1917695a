/**
 * Handler for `layerflow run <commandFile>`.
 *
 * Loads the command file, runs every command through the
 * WorkflowProcessor and returns a report of what each command recorded.
 * Printing is left to the caller (see printers/RunReportPrinter).
 *
 * @module
 */

import * as path from "node:path";
import type { AbstractCommand, CommandState } from "../../core/commands/AbstractCommand.js";
import { CommandFactory } from "../../core/commands/CommandFactory.js";
import { BuiltinProperty } from "../../core/properties/PropertyStore.js";
import { elapsedMs } from "../../core/logging/ExecutionContext.js";
import { Step } from "../../core/logging/Step.js";
import { loadCommandFile } from "../../core/processor/CommandFileReader.js";
import {
  WorkflowProcessor,
  type ProcessorListener,
  type RunSummary,
} from "../../core/processor/WorkflowProcessor.js";
import type { WorkflowServices } from "../../core/services/WorkflowServices.js";
import type { LogRecord } from "../../core/status/LogRecord.js";
import type { Severity } from "../../core/status/Severity.js";
import type { WorkflowSession } from "./workflowSession.js";

// =============================================================================
// Types
// =============================================================================

/**
 * One processed command. A command inside a For loop appears once per
 * pass.
 */
export interface CommandReport {
  /** One-based line in the command file */
  readonly line: number;
  readonly commandName: string;
  readonly commandString: string;
  readonly state: CommandState;
  readonly severity: Severity;
  readonly records: readonly LogRecord[];
}

export interface RunReport {
  readonly commandFile: string;
  readonly summary: RunSummary;
  readonly commands: readonly CommandReport[];
  readonly outputFiles: readonly string[];
  readonly durationMs: number;
  readonly logFile?: string;
}

export interface RunDependencies {
  readonly session: WorkflowSession;
  readonly services: WorkflowServices;
  readonly factory?: CommandFactory;
  /** Progress callbacks, e.g. a spinner */
  readonly listener?: ProcessorListener;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Runs a command file. Command problems never throw; they are in the
 * report. Only a missing or unreadable command file throws.
 *
 * @throws WorkflowError WORKFLOW_FILE_NOT_FOUND or WORKFLOW_READ_FAILED
 */
export async function handleRun(commandFile: string, deps: RunDependencies): Promise<RunReport> {
  const { session } = deps;
  const filePath = session.execution.commandFile ?? path.resolve(commandFile);

  const commands = await session.timer.run(
    Step.WORKFLOW_LOAD,
    () => loadCommandFile(filePath, deps.factory ?? new CommandFactory()),
    { commandFile: filePath },
  );

  const processor = new WorkflowProcessor(commands, {
    workingDir: workingDirFor(session, filePath),
    properties: session.properties,
    services: deps.services,
    logger: session.logger,
    callers: [filePath],
  });

  const reports: CommandReport[] = [];
  processor.addListener({
    commandCompleted: (index, _total, command) => {
      reports.push(toCommandReport(index, command));
    },
  });
  if (deps.listener) {
    processor.addListener(deps.listener);
  }

  const summary = await session.timer.run(Step.WORKFLOW_RUN, () => processor.executeAll(), {
    commandCount: commands.length,
  });

  const durationMs = elapsedMs(session.execution);
  session.logger.withContext({ step: Step.DONE }).info("Workflow finished", {
    executed: summary.executed,
    failed: summary.failed,
    severity: summary.severity,
    durationMs,
    steps: Object.fromEntries(session.timer.durations()),
  });

  return {
    commandFile: filePath,
    summary,
    commands: reports,
    outputFiles: [...(processor.context?.outputFiles ?? [])],
    durationMs,
    logFile: session.logFile,
  };
}

/**
 * WorkingDir defaults to the command file's folder unless the
 * configuration or the command line set it.
 */
export function workingDirFor(session: WorkflowSession, commandFile: string): string | undefined {
  return session.properties.has(BuiltinProperty.WORKING_DIR) ? undefined : path.dirname(commandFile);
}

export function toCommandReport(index: number, command: AbstractCommand): CommandReport {
  return {
    line: index + 1,
    commandName: command.name,
    commandString: command.toString().trim(),
    state: command.state,
    severity: command.status.overallSeverity(),
    records: command.status.records(),
  };
}
