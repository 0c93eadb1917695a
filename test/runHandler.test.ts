/**
 * Tests for the `run` handler and its JSON report.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runReportToJson } from "../src/cli/commands/run.js";
import { handleRun, workingDirFor } from "../src/cli/handlers/runHandler.js";
import { CommandState } from "../src/core/commands/AbstractCommand.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";
import { pathValue } from "../src/core/properties/PropertyStore.js";
import { Severity } from "../src/core/status/Severity.js";
import {
  createFakeServices,
  makeTempDir,
  openTestSession,
  removeTempDir,
  writeCommandFile,
} from "./helpers/workflowFixtures.js";

describe("handleRun", () => {
  let dir: string;
  let commandFile: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    commandFile = path.join(dir, "copy.lf");
    await fs.writeFile(path.join(dir, "in.txt"), "hello");
    await writeCommandFile(commandFile, [
      "# copy the input",
      'CreateFolder(Folder="out")',
      'CopyFile(SourceFile="in.txt",DestinationFile="out/%f_copy%E")',
      'CopyFile(SourceFile="missing.txt",DestinationFile="out/x.txt")',
    ]);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("runs every command relative to the command file", async () => {
    const { session } = await openTestSession(dir, "copy.lf");

    const report = await handleRun("copy.lf", { session, services: createFakeServices() });

    const copied = path.join(dir, "out", "in_copy.txt");
    expect(await fs.readFile(copied, "utf8")).toBe("hello");
    expect(report.commandFile).toBe(commandFile);
    expect(report.outputFiles).toEqual([copied]);
    expect(report.summary.executed).toBe(3);
    expect(report.summary.failed).toBe(1);
    expect(report.summary.severity).toBe(Severity.FAILURE);
  });

  it("reports each processed command with its line", async () => {
    const { session } = await openTestSession(dir, "copy.lf");

    const report = await handleRun("copy.lf", { session, services: createFakeServices() });

    expect(report.commands.map((c) => [c.line, c.commandName, c.state, c.severity])).toEqual([
      [2, "CreateFolder", CommandState.COMPLETED, Severity.SUCCESS],
      [3, "CopyFile", CommandState.COMPLETED, Severity.SUCCESS],
      [4, "CopyFile", CommandState.SKIPPED, Severity.FAILURE],
    ]);
    expect(report.commands[2].records.map((r) => r.message)).toEqual([
      `The SourceFile (${path.join(dir, "missing.txt")}) is not a valid file.`,
    ]);
  });

  it("notifies the extra listener", async () => {
    const { session } = await openTestSession(dir, "copy.lf");
    const commandStarted = vi.fn();

    await handleRun("copy.lf", { session, services: createFakeServices(), listener: { commandStarted } });

    expect(commandStarted.mock.calls.map(([index, total]) => [index, total])).toEqual([
      [1, 4],
      [2, 4],
      [3, 4],
    ]);
  });

  it("logs the stages and a final entry", async () => {
    const { session, sink } = await openTestSession(dir, "copy.lf");

    await handleRun("copy.lf", { session, services: createFakeServices() });

    const done = sink.entries.find((e) => e.msg === "Workflow finished");
    expect(done).toMatchObject({ step: "done", executed: 3, failed: 1, severity: "FAILURE" });
    expect(Object.keys(Object(done?.steps))).toEqual(["workflow.load", "workflow.run"]);
    expect(sink.entries.filter((e) => e.level === "error").map((e) => [e.command, e.msg])).toEqual([
      ["CopyFile", `The SourceFile (${path.join(dir, "missing.txt")}) is not a valid file.`],
    ]);
    expect(sink.entries.find((e) => e.msg === "<- End processing command 4 of 4")).toMatchObject({
      command: "CopyFile",
      position: 4,
      outcome: "skipped",
      warnings: 1,
    });
  });

  it("throws for a missing command file", async () => {
    const { session } = await openTestSession(dir, "absent.lf");

    await expect(handleRun("absent.lf", { session, services: createFakeServices() })).rejects.toMatchObject({
      code: ErrorCode.WORKFLOW_FILE_NOT_FOUND,
    });
  });

  it("serializes the report for --json", async () => {
    const { session } = await openTestSession(dir, "copy.lf");
    const report = await handleRun("copy.lf", { session, services: createFakeServices() });

    const json = runReportToJson(report);

    expect(json).toMatchObject({ commandFile, executed: 3, failed: 1, severity: "FAILURE" });
    expect(json.commands).toContainEqual({
      line: 4,
      command: 'CopyFile(SourceFile="missing.txt",DestinationFile="out/x.txt")',
      state: "SKIPPED",
      severity: "FAILURE",
      records: [
        {
          phase: "RUN",
          severity: "FAILURE",
          message: `The SourceFile (${path.join(dir, "missing.txt")}) is not a valid file.`,
          recommendation: expect.any(String),
        },
      ],
    });
  });
});

describe("workingDirFor", () => {
  it("uses the command file folder unless WorkingDir is set", async () => {
    const dir = await makeTempDir();
    try {
      const { session } = await openTestSession(dir, "a.lf");
      expect(workingDirFor(session, "/work/flows/a.lf")).toBe(path.dirname("/work/flows/a.lf"));

      const configured = { ...session, properties: new Map([["WorkingDir", pathValue("/elsewhere")]]) };
      expect(workingDirFor(configured, "/work/flows/a.lf")).toBeUndefined();
    } finally {
      await removeTempDir(dir);
    }
  });
});
