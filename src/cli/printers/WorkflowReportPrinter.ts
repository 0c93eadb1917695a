/**
 * Plain-text reports for the `run`, `check` and `commands` CLI commands.
 *
 * ## Run report
 *
 * ```
 * Workflow: /work/clip.lf
 *
 * Problems (1 command)
 *   Line 2: ReadGeoLayerFromGeoJSON(InputFile="counties.geojson")
 *     FAILURE [RUN] Input file "/work/counties.geojson" does not exist.
 *       Specify an existing input file.
 *
 * Summary: 4 executed, 1 failed, severity FAILURE
 *
 * Output files (1)
 *   + /work/out/clipped.geojson
 * ```
 *
 * @module
 */

import type { LogRecord } from "../../core/status/LogRecord.js";
import { Severity } from "../../core/status/Severity.js";
import type { CheckReport } from "../handlers/checkHandler.js";
import type { CommandDescription } from "../handlers/commandsHandler.js";
import type { CommandReport, RunReport } from "../handlers/runHandler.js";

export interface ReportPrinterOptions {
  /** Include SUCCESS records and per-command output lists */
  readonly verbose?: boolean;
  /** Custom output function (default: console.log) */
  readonly output?: (line: string) => void;
  /** Colors severity labels and marks (default: none) */
  readonly paintSeverity?: (severity: Severity, text: string) => string;
}

const SYMBOLS = {
  output: "+",
  ok: "✓",
  failed: "✗",
} as const;

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function isProblem(record: LogRecord): boolean {
  return record.severity === Severity.WARNING || record.severity === Severity.FAILURE;
}

// =============================================================================
// WorkflowReportPrinter Class
// =============================================================================

export class WorkflowReportPrinter {
  private readonly output: (line: string) => void;
  private readonly verbose: boolean;
  private readonly paint: (severity: Severity, text: string) => string;

  constructor(options: ReportPrinterOptions = {}) {
    this.output = options.output ?? console.log.bind(console);
    this.verbose = options.verbose ?? false;
    this.paint = options.paintSeverity ?? ((_severity, text) => text);
  }

  printRun(report: RunReport): void {
    this.emit(this.formatRun(report));
  }

  printCheck(report: CheckReport): void {
    this.emit(this.formatCheck(report));
  }

  printCommands(commands: readonly CommandDescription[]): void {
    this.emit(this.formatCommands(commands));
  }

  formatRun(report: RunReport): string[] {
    const lines: string[] = [`Workflow: ${report.commandFile}`, ""];

    const withProblems = report.commands.filter((c) => c.records.some(isProblem));
    if (withProblems.length === 0) {
      lines.push("No problems reported.", "");
    } else {
      lines.push(`Problems (${plural(withProblems.length, "command")})`);
      for (const command of withProblems) {
        lines.push(...this.formatCommand(command));
      }
      lines.push("");
    }

    const { summary } = report;
    lines.push(
      `Summary: ${summary.executed} executed, ${summary.failed} failed, severity ${this.paint(summary.severity, summary.severity)}`,
    );

    if (report.outputFiles.length > 0) {
      lines.push("", `Output files (${report.outputFiles.length})`);
      for (const file of report.outputFiles) {
        lines.push(`  ${SYMBOLS.output} ${file}`);
      }
    }

    if (report.logFile) {
      lines.push("", `Log file: ${report.logFile}`);
    }
    return lines;
  }

  formatCheck(report: CheckReport): string[] {
    const lines: string[] = [`Workflow: ${report.commandFile}`, ""];

    for (const command of report.commands) {
      const mark = command.valid
        ? this.paint(Severity.SUCCESS, SYMBOLS.ok)
        : this.paint(Severity.FAILURE, SYMBOLS.failed);
      lines.push(`${mark} Line ${command.line}: ${command.commandString}`);
      lines.push(...this.formatRecords(command.records, "    "));
      for (const output of command.outputs) {
        lines.push(`    ${SYMBOLS.output} ${output.registry}: ${output.id}`);
      }
    }

    lines.push(
      "",
      `Summary: ${plural(report.commands.length, "command")} checked, ${report.failed} invalid`,
    );
    return lines;
  }

  formatCommands(commands: readonly CommandDescription[]): string[] {
    const lines: string[] = [];

    for (const command of commands) {
      lines.push(`${command.name}: ${command.description}`);
      if (!this.verbose) {
        continue;
      }
      for (const param of command.parameters) {
        const traits = [param.type];
        if (param.required) traits.push("required");
        if (param.defaultValue !== undefined) traits.push(`default "${param.defaultValue}"`);
        lines.push(`  ${param.name} (${traits.join(", ")}): ${param.description}`);
        if (param.allowedValues) {
          lines.push(`    one of: ${param.allowedValues.join(", ")}`);
        }
      }
    }

    if (commands.length === 0) {
      lines.push("No matching commands.");
    }
    return lines;
  }

  private formatCommand(command: CommandReport): string[] {
    return [
      `  Line ${command.line}: ${command.commandString}`,
      ...this.formatRecords(command.records, "    "),
    ];
  }

  private formatRecords(records: readonly LogRecord[], indent: string): string[] {
    const lines: string[] = [];
    for (const record of records) {
      if (!this.verbose && !isProblem(record)) {
        continue;
      }
      lines.push(`${indent}${this.paint(record.severity, record.severity)} [${record.phase}] ${record.message}`);
      if (record.recommendation) {
        lines.push(`${indent}  ${record.recommendation}`);
      }
    }
    return lines;
  }

  private emit(lines: readonly string[]): void {
    for (const line of lines) {
      this.output(line);
    }
  }
}
