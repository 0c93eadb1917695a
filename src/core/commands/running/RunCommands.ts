/**
 * RunCommands(): runs another command file and reports the highest
 * severity of its commands.
 *
 * With ExpectedStatus the command succeeds only when that severity
 * matches, which lets a command file act as a regression test of the
 * files it runs. Without it, the warnings and failures of the commands
 * that ran are added to this command's RUN log.
 *
 * @module
 */

import {
  resolvePath,
  type CommandFileRun,
  type WorkflowContext,
} from "../../context/WorkflowContext.js";
import { WorkflowError } from "../../errors/errors.js";
import { SEVERITIES, Severity } from "../../status/Severity.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

export class RunCommandsCommand extends AbstractCommand {
  readonly name = "RunCommands";
  readonly description = "Run the commands of another command file";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "CommandFile", description: "Command file to run", required: true },
    {
      name: "ExpectedStatus",
      description: "Highest severity the commands should reach",
      allowedValues: SEVERITIES,
    },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const commandFile = resolvePath(context, this.params.string("CommandFile"));
    if (!this.checkAll(context, [{ kind: "fileExists", parameter: "CommandFile", path: commandFile }])) {
      return;
    }

    const runCommandFile = context.runCommandFile;
    if (!runCommandFile) {
      this.addRunLog(
        Severity.FAILURE,
        `Unable to run command file (${commandFile}) outside a workflow run.`,
        "Run the command file with the run command.",
      );
      return;
    }

    this.logger?.info("Running command file", { commandFile });
    let run: CommandFileRun;
    try {
      run = await runCommandFile(commandFile);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger?.error(`Unable to run command file (${commandFile}).`, { error: err });
      this.addRunLog(
        Severity.FAILURE,
        `Unable to run command file (${commandFile}): ${err.message}`,
        (err instanceof WorkflowError ? err.hint : undefined) ?? "Check the log file for details.",
      );
      return;
    }

    const expected = this.params.optionalString("ExpectedStatus");
    if (expected === undefined) {
      this.addRunLog(
        run.severity,
        `Severity for RunCommands (${run.severity}) is the highest of the commands in the command file.`,
        "Warnings and failures of the commands that ran follow.",
      );
      this.appendRecords(run);
    } else if (expected === run.severity) {
      this.addRunLog(
        Severity.SUCCESS,
        `Severity for RunCommands (${run.severity}) matches the expected status (${expected}).`,
      );
    } else {
      this.addRunLog(
        Severity.FAILURE,
        `Severity for RunCommands (${run.severity}) does not match the expected status (${expected}).`,
        "Check the commands in the command file or the ExpectedStatus.",
      );
    }
  }

  private appendRecords(run: CommandFileRun): void {
    run.commands.forEach((command, index) => {
      for (const record of command.status.records()) {
        if (record.severity === Severity.WARNING || record.severity === Severity.FAILURE) {
          this.addRunLog(
            record.severity,
            `${command.name} (command ${index + 1}): ${record.message}`,
            record.recommendation,
          );
        }
      }
    });
  }
}
