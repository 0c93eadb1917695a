/**
 * `layerflow run <commandFile>`: processes every command in a command
 * file, prints the problems each command recorded and a summary.
 *
 * Exit code 1 when any command failed validation or recorded a warning or
 * failure while running.
 *
 * @module
 */

import { Command } from "commander";
import { createDefaultServices } from "../../core/services/WorkflowServices.js";
import { handleRun, type RunReport } from "../handlers/runHandler.js";
import {
  createDefaultSessionDependencies,
  openWorkflowSession,
  type SessionOptions,
} from "../handlers/workflowSession.js";
import { WorkflowReportPrinter } from "../printers/WorkflowReportPrinter.js";
import { formatJsonOutput, toJsonRecord } from "../ux/CliJson.js";
import { createCliSpinner } from "../ux/CliSpinner.js";
import { getCliUx } from "../ux/CliUx.js";

interface RunOptions extends SessionOptions {
  readonly json?: boolean;
}

/**
 * JSON document written by `run --json`.
 */
export function runReportToJson(report: RunReport): Record<string, unknown> {
  return {
    commandFile: report.commandFile,
    executed: report.summary.executed,
    failed: report.summary.failed,
    severity: report.summary.severity,
    durationMs: report.durationMs,
    commands: report.commands.map((command) => ({
      line: command.line,
      command: command.commandString,
      state: command.state,
      severity: command.severity,
      records: command.records.map(toJsonRecord),
    })),
    outputFiles: report.outputFiles,
  };
}

export function buildRunCommand(): Command {
  return new Command("run")
    .description("Run every command in a command file")
    .argument("<commandFile>", "Command file to run")
    .option("--json", "Write the run report as JSON", false)
    .action(async (commandFile: string, _options: unknown, command: Command) => {
      const options: RunOptions = command.optsWithGlobals();
      const ux = getCliUx();
      const session = await openWorkflowSession(commandFile, options, createDefaultSessionDependencies());

      const spinner = createCliSpinner({ ux, isTTY: options.json ? false : undefined });
      const quiet = options.json === true;
      if (!quiet) {
        spinner.start(`Running ${commandFile}`);
      }

      let report: RunReport;
      try {
        report = await handleRun(commandFile, {
          session,
          services: createDefaultServices(),
          listener: quiet ? undefined : spinner.listener(),
        });
      } catch (error) {
        if (spinner.isRunning) {
          spinner.fail(`Could not run ${commandFile}`);
        }
        throw error;
      }

      if (quiet) {
        process.stdout.write(formatJsonOutput(runReportToJson(report), { trailingNewline: true }));
      } else {
        spinner.finish(report.summary);
        ux.newline();
        new WorkflowReportPrinter({
          verbose: ux.detailed,
          output: (line) => ux.print(line),
          paintSeverity: (severity, text) => ux.severity(severity, text),
        }).printRun(report);
      }

      if (report.summary.failed > 0) {
        process.exitCode = 1;
      }
    });
}
