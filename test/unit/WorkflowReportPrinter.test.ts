/**
 * Unit tests for the plain-text run, check and commands reports.
 *
 * @module
 */

import { describe, expect, it } from "vitest";
import type { CheckReport } from "../../src/cli/handlers/checkHandler.js";
import type { CommandDescription } from "../../src/cli/handlers/commandsHandler.js";
import type { RunReport } from "../../src/cli/handlers/runHandler.js";
import { WorkflowReportPrinter } from "../../src/cli/printers/WorkflowReportPrinter.js";
import { CommandState } from "../../src/core/commands/AbstractCommand.js";
import { createLogRecord } from "../../src/core/status/LogRecord.js";
import { Phase, Severity } from "../../src/core/status/Severity.js";

function printerLines(verbose = false) {
  const lines: string[] = [];
  const printer = new WorkflowReportPrinter({ verbose, output: (line) => lines.push(line) });
  return { printer, lines };
}

const runReport: RunReport = {
  commandFile: "/work/clip.lf",
  summary: { executed: 3, failed: 1, failures: [], severity: Severity.FAILURE },
  commands: [
    {
      line: 1,
      commandName: "CreateFolder",
      commandString: 'CreateFolder(Folder="out")',
      state: CommandState.COMPLETED,
      severity: Severity.SUCCESS,
      records: [createLogRecord(Phase.RUN, Severity.SUCCESS, "Created")],
    },
    {
      line: 2,
      commandName: "ReadGeoLayerFromGeoJSON",
      commandString: 'ReadGeoLayerFromGeoJSON(InputFile="counties.geojson")',
      state: CommandState.SKIPPED,
      severity: Severity.FAILURE,
      records: [
        createLogRecord(
          Phase.RUN,
          Severity.FAILURE,
          'Input file "/work/counties.geojson" does not exist.',
          "Specify an existing input file.",
        ),
      ],
    },
  ],
  outputFiles: ["/work/out/clipped.geojson"],
  durationMs: 12,
  logFile: "/logs/layerflow.log",
};

describe("WorkflowReportPrinter", () => {
  describe("run report", () => {
    it("lists problems, summary, outputs and the log file", () => {
      const { printer, lines } = printerLines();

      printer.printRun(runReport);

      expect(lines).toEqual([
        "Workflow: /work/clip.lf",
        "",
        "Problems (1 command)",
        '  Line 2: ReadGeoLayerFromGeoJSON(InputFile="counties.geojson")',
        '    FAILURE [RUN] Input file "/work/counties.geojson" does not exist.',
        "      Specify an existing input file.",
        "",
        "Summary: 3 executed, 1 failed, severity FAILURE",
        "",
        "Output files (1)",
        "  + /work/out/clipped.geojson",
        "",
        "Log file: /logs/layerflow.log",
      ]);
    });

    it("says so when nothing went wrong", () => {
      const { printer } = printerLines();
      const clean: RunReport = {
        ...runReport,
        summary: { executed: 1, failed: 0, failures: [], severity: Severity.SUCCESS },
        commands: runReport.commands.slice(0, 1),
        outputFiles: [],
        logFile: undefined,
      };

      expect(printer.formatRun(clean)).toEqual([
        "Workflow: /work/clip.lf",
        "",
        "No problems reported.",
        "",
        "Summary: 1 executed, 0 failed, severity SUCCESS",
      ]);
    });
  });

  describe("check report", () => {
    const checkReport: CheckReport = {
      commandFile: "/work/clip.lf",
      failed: 1,
      commands: [
        {
          line: 2,
          commandName: "ReadGeoLayerFromGeoJSON",
          commandString: 'ReadGeoLayerFromGeoJSON(InputFile="a.geojson")',
          valid: true,
          records: [],
          outputs: [{ registry: "geoLayers", id: "a" }],
        },
        {
          line: 3,
          commandName: "Frobnicate",
          commandString: "Frobnicate()",
          valid: false,
          records: [createLogRecord(Phase.INITIALIZATION, Severity.FAILURE, 'Unrecognized command "Frobnicate".')],
          outputs: [],
        },
      ],
    };

    it("marks each command and its outputs", () => {
      const { printer, lines } = printerLines();

      printer.printCheck(checkReport);

      expect(lines).toEqual([
        "Workflow: /work/clip.lf",
        "",
        '✓ Line 2: ReadGeoLayerFromGeoJSON(InputFile="a.geojson")',
        "    + geoLayers: a",
        "✗ Line 3: Frobnicate()",
        '    FAILURE [INITIALIZATION] Unrecognized command "Frobnicate".',
        "",
        "Summary: 2 commands checked, 1 invalid",
      ]);
    });
  });

  describe("commands list", () => {
    const commands: CommandDescription[] = [
      {
        name: "CreateFolder",
        description: "Create a folder",
        parameters: [
          { name: "Folder", description: "Folder to create", type: "string", required: true },
          {
            name: "IfFolderExists",
            description: "Action when the folder already exists",
            type: "string",
            required: false,
            defaultValue: "Ignore",
            allowedValues: ["Ignore", "Warn", "Fail"],
          },
        ],
      },
    ];

    it("shows names only by default", () => {
      const { printer } = printerLines();

      expect(printer.formatCommands(commands)).toEqual(["CreateFolder: Create a folder"]);
    });

    it("shows parameters when verbose", () => {
      const { printer, lines } = printerLines(true);

      printer.printCommands(commands);

      expect(lines).toEqual([
        "CreateFolder: Create a folder",
        "  Folder (string, required): Folder to create",
        '  IfFolderExists (string, default "Ignore"): Action when the folder already exists',
        "    one of: Ignore, Warn, Fail",
      ]);
    });

    it("reports an empty list", () => {
      const { printer } = printerLines();

      expect(printer.formatCommands([])).toEqual(["No matching commands."]);
    });
  });
});
