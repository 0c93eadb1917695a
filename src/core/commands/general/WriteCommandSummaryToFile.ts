/**
 * WriteCommandSummaryToFile(): writes an HTML table with the status of
 * every command in the running workflow.
 *
 * Commands after this one have not run yet and show UNKNOWN.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { Phase } from "../../status/Severity.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

const STYLE = `  html * { font-family: Arial, Helvetica, sans-serif; }
  code { font-family: monospace; }
  table { border-collapse: collapse; }
  th, td { border: 1px solid #3a3a3a; padding: 4px; }
  .UNKNOWN { background-color: rgb(200,200,200); }
  .SUCCESS { background-color: rgb(0,255,0); }
  .WARNING { background-color: rgb(255,255,0); }
  .FAILURE { background-color: rgb(255,0,0); }`;

const ENTITIES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
};

function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (c) => ENTITIES[c] ?? c);
}

function statusCell(severity: string): string {
  return `<td class="${severity}">${severity}</td>`;
}

/**
 * The summary page for a list of commands.
 */
export function renderCommandSummary(commands: readonly AbstractCommand[]): string {
  const rows = commands.map((command, index) =>
    [
      "<tr>",
      `<td>${index + 1}</td>`,
      statusCell(command.status.overallSeverity()),
      statusCell(command.status.phaseSeverity(Phase.INITIALIZATION)),
      statusCell(command.status.phaseSeverity(Phase.RUN)),
      `<td><code>${escapeHtml(command.toString().trim())}</code></td>`,
      "</tr>",
    ].join(""),
  );

  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    "<style>",
    STYLE,
    "</style>",
    "<title>Command Summary</title>",
    "</head>",
    "<body>",
    "<h1>Command Summary</h1>",
    "<table>",
    "<tr><th>Command #</th><th>Status (all)</th><th>Status (init)</th><th>Status (run)</th><th>Command</th></tr>",
    ...rows,
    "</table>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

export class WriteCommandSummaryToFileCommand extends AbstractCommand {
  readonly name = "WriteCommandSummaryToFile";
  readonly description = "Write the status of every command to an HTML file";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "OutputFile", description: "HTML file to write", required: true },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const outputFile = resolvePath(context, this.params.string("OutputFile"));
    if (!this.checkAll(context, [{ kind: "parentFolderExists", parameter: "OutputFile", path: outputFile }])) {
      return;
    }

    const written = await this.runEffect(`Unable to write command summary to file (${outputFile}).`, () =>
      fs.writeFile(outputFile, renderCommandSummary(context.commands), "utf8"),
    );
    if (written) {
      context.outputFiles.push(outputFile);
    }
  }
}
