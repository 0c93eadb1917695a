/**
 * Handler for `layerflow check <commandFile>`.
 *
 * Validates every command and lists the outputs each expects to create,
 * without running anything.
 *
 * @module
 */

import * as path from "node:path";
import type { DiscoveredOutput } from "../../core/commands/AbstractCommand.js";
import { CommandFactory } from "../../core/commands/CommandFactory.js";
import { Step } from "../../core/logging/Step.js";
import { loadCommandFile } from "../../core/processor/CommandFileReader.js";
import { WorkflowProcessor } from "../../core/processor/WorkflowProcessor.js";
import type { WorkflowServices } from "../../core/services/WorkflowServices.js";
import type { LogRecord } from "../../core/status/LogRecord.js";
import { workingDirFor } from "./runHandler.js";
import type { WorkflowSession } from "./workflowSession.js";

export interface CheckedCommand {
  readonly line: number;
  readonly commandName: string;
  readonly commandString: string;
  readonly valid: boolean;
  readonly records: readonly LogRecord[];
  readonly outputs: readonly DiscoveredOutput[];
}

export interface CheckReport {
  readonly commandFile: string;
  readonly commands: readonly CheckedCommand[];
  /** Commands whose validation failed */
  readonly failed: number;
}

export interface CheckDependencies {
  readonly session: WorkflowSession;
  readonly services: WorkflowServices;
  readonly factory?: CommandFactory;
}

/**
 * @throws WorkflowError WORKFLOW_FILE_NOT_FOUND or WORKFLOW_READ_FAILED
 */
export async function handleCheck(commandFile: string, deps: CheckDependencies): Promise<CheckReport> {
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
  });

  const discovery = await session.timer.run(Step.WORKFLOW_DISCOVER, () => processor.discoverAll());

  return {
    commandFile: filePath,
    commands: discovery.commands.map((entry) => ({
      line: entry.index + 1,
      commandName: entry.commandName,
      commandString: entry.commandString,
      valid: entry.validation.kind === "ready",
      records: commands[entry.index].status.records(),
      outputs: entry.outputs,
    })),
    failed: discovery.failed,
  };
}
