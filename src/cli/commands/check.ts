/**
 * `layerflow check <commandFile>`: validates a command file and lists the
 * outputs each command would create, without running anything.
 *
 * @module
 */

import { Command } from "commander";
import { createDefaultServices } from "../../core/services/WorkflowServices.js";
import { handleCheck, type CheckReport } from "../handlers/checkHandler.js";
import {
  createDefaultSessionDependencies,
  openWorkflowSession,
  type SessionOptions,
} from "../handlers/workflowSession.js";
import { WorkflowReportPrinter } from "../printers/WorkflowReportPrinter.js";
import { formatJsonOutput, toJsonRecord } from "../ux/CliJson.js";
import { getCliUx } from "../ux/CliUx.js";

interface CheckOptions extends SessionOptions {
  readonly json?: boolean;
}

export function checkReportToJson(report: CheckReport): Record<string, unknown> {
  return {
    commandFile: report.commandFile,
    failed: report.failed,
    commands: report.commands.map((command) => ({
      line: command.line,
      command: command.commandString,
      valid: command.valid,
      records: command.records.map(toJsonRecord),
      outputs: command.outputs,
    })),
  };
}

export function buildCheckCommand(): Command {
  return new Command("check")
    .description("Validate a command file without running it")
    .argument("<commandFile>", "Command file to check")
    .option("--json", "Write the check report as JSON", false)
    .action(async (commandFile: string, _options: unknown, command: Command) => {
      const options: CheckOptions = command.optsWithGlobals();
      const session = await openWorkflowSession(commandFile, options, createDefaultSessionDependencies());
      const report = await handleCheck(commandFile, { session, services: createDefaultServices() });

      if (options.json) {
        process.stdout.write(formatJsonOutput(checkReportToJson(report), { trailingNewline: true }));
      } else {
        const ux = getCliUx();
        new WorkflowReportPrinter({
          verbose: ux.detailed,
          output: (line) => ux.print(line),
          paintSeverity: (severity, text) => ux.severity(severity, text),
        }).printCheck(report);
      }

      if (report.failed > 0) {
        process.exitCode = 1;
      }
    });
}
