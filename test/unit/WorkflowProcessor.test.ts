/**
 * Unit tests for WorkflowProcessor: run order, failure accounting and
 * control flow.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { AbstractCommand, CommandState } from "../../src/core/commands/AbstractCommand.js";
import { CommandFactory } from "../../src/core/commands/CommandFactory.js";
import type { ParameterSpec } from "../../src/core/commands/CommandParameters.js";
import { createLogger } from "../../src/core/logging/ContextualLogger.js";
import { stringValue, type PropertyValue } from "../../src/core/properties/PropertyStore.js";
import { WorkflowProcessor } from "../../src/core/processor/WorkflowProcessor.js";
import { Phase, Severity } from "../../src/core/status/Severity.js";
import {
  createFakeServices,
  createTestContext,
  InMemoryLogSink,
  makeTempDir,
  removeTempDir,
  runCommandLine,
  runMessages,
  writeCommandFile,
} from "../helpers/workflowFixtures.js";

// =============================================================================
// Test Helpers
// =============================================================================

class ExplodingCommand extends AbstractCommand {
  readonly name = "Explode";
  readonly description = "Throws while running";
  readonly parameterSpecs: readonly ParameterSpec[] = [];

  protected async execute(): Promise<void> {
    throw new Error("kaboom");
  }
}

function createProcessor(
  lines: readonly string[],
  properties?: ReadonlyMap<string, PropertyValue>,
): { processor: WorkflowProcessor; commands: AbstractCommand[]; sink: InMemoryLogSink } {
  const factory = new CommandFactory();
  const commands = lines.map((line) => factory.create(line));
  const sink = new InMemoryLogSink();
  const processor = new WorkflowProcessor(commands, {
    workingDir: os.tmpdir(),
    tempDir: os.tmpdir(),
    properties,
    services: createFakeServices(),
    logger: createLogger({ sink, minLevel: "debug" }),
    env: {},
  });
  return { processor, commands, sink };
}

function runRecords(command: AbstractCommand): [Severity, string][] {
  return command.status.records(Phase.RUN).map((r) => [r.severity, r.message]);
}

function property(processor: WorkflowProcessor, name: string): string | undefined {
  return processor.context?.properties.getText(name);
}

// =============================================================================
// Tests
// =============================================================================

describe("WorkflowProcessor", () => {
  describe("executeAll", () => {
    it("keeps going after a failed command and counts it once", async () => {
      const { processor } = createProcessor([
        'SetProperty(PropertyName="A",PropertyValue="1")',
        'Message(Message="boom",CommandStatus="FAILURE")',
        'SetProperty(PropertyName="B",PropertyValue="2")',
      ]);

      const summary = await processor.executeAll();

      expect(summary.executed).toBe(3);
      expect(summary.failed).toBe(1);
      expect(summary.severity).toBe(Severity.FAILURE);
      expect(summary.failures[0]).toMatchObject({
        index: 1,
        commandName: "Message",
        commandString: 'Message(Message="boom",CommandStatus="FAILURE")',
      });
      expect(summary.failures[0].error.message).toBe("There were 1 warnings processing the command.");
      expect(property(processor, "B")).toBe("2");
    });

    it("runs the command after one with a parameter error", async () => {
      const { processor, commands } = createProcessor([
        'SetProperty(PropertyName="A",PropertyValue="1")',
        'Message(Message="x",Bogus="y")',
        'SetProperty(PropertyName="B",PropertyValue="2")',
      ]);

      const summary = await processor.executeAll();

      expect(summary.executed).toBe(3);
      expect(summary.failed).toBe(1);
      expect(summary.failures.map((f) => [f.index, f.error.message])).toEqual([
        [1, "Message: 1 parameter problem found"],
      ]);
      expect(commands.map((c) => c.state)).toEqual([
        CommandState.COMPLETED,
        CommandState.VALIDATION_FAILED,
        CommandState.COMPLETED,
      ]);
      expect(property(processor, "B")).toBe("2");
    });

    it("reports SUCCESS when nothing went wrong", async () => {
      const { processor } = createProcessor(['Message(Message="hello")']);

      expect(await processor.executeAll()).toEqual({
        executed: 1,
        failed: 0,
        failures: [],
        severity: Severity.SUCCESS,
      });
    });

    it("neither runs nor counts comments, blank lines and comment blocks", async () => {
      const { processor } = createProcessor([
        "# a comment",
        "",
        "/*",
        'Message(Message="hidden",CommandStatus="FAILURE")',
        "*/",
        'Message(Message="visible")',
      ]);
      const started = vi.fn();
      processor.addListener({ commandStarted: started });

      const summary = await processor.executeAll();

      expect(summary.executed).toBe(1);
      expect(summary.failed).toBe(0);
      expect(started).toHaveBeenCalledTimes(1);
      expect(started.mock.calls[0].slice(0, 2)).toEqual([5, 6]);
    });

    it("counts unknown commands and syntax errors as validation failures", async () => {
      const { processor, commands } = createProcessor(['Frobnicate(A="1")', 'Message(Message="x"']);

      const summary = await processor.executeAll();

      expect(summary.failed).toBe(2);
      expect(summary.failures[0].error.message).toBe("Frobnicate: 1 parameter problem found");
      expect(commands[0].status.records()[0].message).toBe('Unrecognized command "Frobnicate".');
      expect(commands[1].state).toBe(CommandState.VALIDATION_FAILED);
    });

    it("turns an error thrown by a command into a failure and continues", async () => {
      const factory = new CommandFactory();
      const exploding = new ExplodingCommand({ commandString: "Explode()", parameters: [] });
      const after = factory.create('SetProperty(PropertyName="After",PropertyValue="yes")');
      const sink = new InMemoryLogSink();
      const processor = new WorkflowProcessor([exploding, after], {
        workingDir: os.tmpdir(),
        services: createFakeServices(),
        logger: createLogger({ sink }),
        env: {},
      });
      const completed = vi.fn();
      processor.addListener({ commandCompleted: completed });

      const summary = await processor.executeAll();

      expect(summary.failed).toBe(1);
      expect(summary.failures[0].error.message).toBe("kaboom");
      expect(exploding.state).toBe(CommandState.COMPLETED);
      expect(exploding.status.overallSeverity()).toBe(Severity.FAILURE);
      expect(completed.mock.calls[0][3]).toMatchObject({ kind: "error" });
      expect(property(processor, "After")).toBe("yes");
      expect(sink.messages()).toContain("Unexpected error processing command");
    });

    it("can run the same commands twice", async () => {
      const { processor } = createProcessor([
        'Message(Message="careful",CommandStatus="WARNING")',
        'Message(Message="fine")',
      ]);

      const first = await processor.executeAll();
      const second = await processor.executeAll();

      expect([second.executed, second.failed, second.severity]).toEqual([
        first.executed,
        first.failed,
        first.severity,
      ]);
      expect(second.failed).toBe(1);
      expect(second.severity).toBe(Severity.WARNING);
    });

    it("applies initial properties", async () => {
      const { processor } = createProcessor(
        ['SetProperty(PropertyName="Copy",PropertyValue="${Seed}")'],
        new Map([["Seed", stringValue("42")]]),
      );

      await processor.executeAll();

      expect(property(processor, "Copy")).toBe("42");
    });
  });

  // ===========================================================================
  // If blocks
  // ===========================================================================

  describe("If blocks", () => {
    it("runs the body of a true If and skips the body of a false one", async () => {
      const { processor, commands } = createProcessor([
        'SetProperty(PropertyName="Count",PropertyType="Integer",PropertyValue="3")',
        'If(Name="Big",Condition="${Count} > 2")',
        'SetProperty(PropertyName="Result",PropertyValue="big")',
        'EndIf(Name="Big")',
        'If(Name="Small",Condition="${Count} < 2")',
        'SetProperty(PropertyName="Result",PropertyValue="small")',
        'EndIf(Name="Small")',
      ]);

      const summary = await processor.executeAll();

      expect(summary.executed).toBe(6);
      expect(summary.failed).toBe(0);
      expect(property(processor, "Result")).toBe("big");
      expect(commands[5].state).toBe(CommandState.CREATED);
    });

    it("pairs blocks by name when they nest", async () => {
      const { processor } = createProcessor([
        'If(Name="Outer",Condition="True")',
        'If(Name="Inner",Condition="False")',
        'SetProperty(PropertyName="Inner",PropertyValue="ran")',
        'EndIf(Name="Inner")',
        'SetProperty(PropertyName="Outer",PropertyValue="ran")',
        'EndIf(Name="Outer")',
      ]);

      await processor.executeAll();

      expect(property(processor, "Inner")).toBeUndefined();
      expect(property(processor, "Outer")).toBe("ran");
    });

    it("skips the rest of the file after a false If without an EndIf", async () => {
      const { processor, commands } = createProcessor([
        'If(Name="Never",Condition="1 > 2")',
        'Message(Message="skipped")',
        'Message(Message="also skipped")',
      ]);

      const summary = await processor.executeAll();

      expect(summary.executed).toBe(1);
      expect(summary.failed).toBe(1);
      expect(commands[0].status.records()[0].message).toBe("If (Never) does not have a matching EndIf.");
      expect(commands[2].state).toBe(CommandState.CREATED);
    });

    it("fails an EndIf without an If", async () => {
      const { processor, commands } = createProcessor(['EndIf(Name="Orphan")']);

      const summary = await processor.executeAll();

      expect(summary.failed).toBe(1);
      expect(commands[0].status.records()[0].message).toBe("EndIf (Orphan) does not have a matching If.");
    });

    it("fails an If whose condition cannot be evaluated and skips its body", async () => {
      const { processor, commands } = createProcessor([
        'If(Name="Bad",Condition="no operator")',
        'SetProperty(PropertyName="Body",PropertyValue="ran")',
        'EndIf(Name="Bad")',
      ]);

      const summary = await processor.executeAll();

      expect(summary.failed).toBe(1);
      expect(commands[0].status.records()[0].message).toBe(
        'Condition "no operator" is not of the form "Value1 Operator Value2".',
      );
      expect(property(processor, "Body")).toBeUndefined();
    });
  });

  // ===========================================================================
  // For loops
  // ===========================================================================

  describe("For loops", () => {
    it("runs the body once per list value with the iterator bound", async () => {
      const { processor } = createProcessor(
        [
          'For(Name="item",List="a,b,c")',
          'SetProperty(PropertyName="Names",PropertyValue="${Names}${item}")',
          'EndFor(Name="item")',
        ],
        new Map([["Names", stringValue("-")]]),
      );

      const summary = await processor.executeAll();

      expect(summary.executed).toBe(5);
      expect(summary.failed).toBe(0);
      expect(property(processor, "Names")).toBe("-abc");
      expect(property(processor, "item")).toBe("c");
    });

    it("iterates a numeric sequence", async () => {
      const { processor } = createProcessor(
        [
          'For(Name="i",SequenceStart="1",SequenceEnd="5",SequenceIncrement="2")',
          'SetProperty(PropertyName="Seen",PropertyValue="${Seen},${i}")',
          'EndFor(Name="i")',
        ],
        new Map([["Seen", stringValue("")]]),
      );

      const summary = await processor.executeAll();

      expect(summary.executed).toBe(5);
      expect(property(processor, "Seen")).toBe(",1,3,5");
    });

    it("iterates the values of a list property", async () => {
      const { processor } = createProcessor([
        'SetProperty(PropertyName="Files",PropertyType="List",PropertyValue="x.csv, y.csv")',
        'For(Name="f",ListProperty="Files",IteratorProperty="File")',
        'SetProperty(PropertyName="Last",PropertyValue="${File}")',
        'EndFor(Name="f")',
      ]);

      const summary = await processor.executeAll();

      expect(summary.executed).toBe(5);
      expect(property(processor, "Last")).toBe("y.csv");
    });

    it("fails a For without an EndFor and runs its body once", async () => {
      const { processor, commands } = createProcessor([
        'For(Name="loop",List="x,y")',
        'SetProperty(PropertyName="Body",PropertyValue="ran")',
      ]);

      const summary = await processor.executeAll();

      expect(summary.executed).toBe(2);
      expect(summary.failed).toBe(1);
      expect(commands[0].status.records()[0].message).toBe("For (loop) does not have a matching EndFor.");
      expect(property(processor, "Body")).toBe("ran");
    });

    it("rejects a For with more than one value source", async () => {
      const { processor, commands } = createProcessor([
        'For(Name="loop",List="x",SequenceStart="1",SequenceEnd="2")',
        'EndFor(Name="loop")',
      ]);

      const summary = await processor.executeAll();

      expect(summary.failed).toBe(1);
      expect(commands[0].status.records()[0].message).toBe(
        "For requires exactly one of List, ListProperty or SequenceStart.",
      );
    });
  });

  // ===========================================================================
  // Discovery
  // ===========================================================================

  describe("discoverAll", () => {
    it("validates every command and lists expected outputs without running", async () => {
      const { processor, commands } = createProcessor([
        "# inputs",
        'ReadGeoLayerFromGeoJSON(InputFile="data/counties.geojson")',
        "Frobnicate()",
      ]);

      const summary = await processor.discoverAll();

      expect(summary.failed).toBe(1);
      expect(summary.commands.map((c) => c.index)).toEqual([1, 2]);
      expect(summary.commands[0].outputs).toEqual([{ registry: "geoLayers", id: "counties" }]);
      expect(summary.commands[1].validation.kind).toBe("validationFailed");
      expect(commands[1].state).toBe(CommandState.READY);
    });
  });

  // ===========================================================================
  // Nested command files and summaries
  // ===========================================================================

  describe("RunCommands", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it("reports the highest severity of the nested commands and their problems", async () => {
      const child = path.join(dir, "child.lf");
      await writeCommandFile(child, [
        'Message(Message="inner",CommandStatus="WARNING")',
        'SetProperty(PropertyName="Inner",PropertyValue="yes")',
      ]);
      const { processor, commands } = createProcessor([`RunCommands(CommandFile="${child}")`]);

      const summary = await processor.executeAll();

      expect(summary.failed).toBe(1);
      expect(summary.severity).toBe(Severity.WARNING);
      expect(runRecords(commands[0])).toEqual([
        [Severity.WARNING, "Severity for RunCommands (WARNING) is the highest of the commands in the command file."],
        [Severity.WARNING, "Message (command 1): inner"],
      ]);
      expect(property(processor, "Inner")).toBeUndefined();
    });

    it("succeeds when the nested severity matches ExpectedStatus", async () => {
      const child = path.join(dir, "child.lf");
      await writeCommandFile(child, ['Message(Message="broken",CommandStatus="FAILURE")']);
      const { processor, commands } = createProcessor([
        `RunCommands(CommandFile="${child}",ExpectedStatus="Failure")`,
      ]);

      const summary = await processor.executeAll();

      expect(summary.failed).toBe(0);
      expect(runRecords(commands[0])).toEqual([
        [Severity.SUCCESS, "Severity for RunCommands (FAILURE) matches the expected status (FAILURE)."],
      ]);
    });

    it("fails when the nested severity differs from ExpectedStatus", async () => {
      const child = path.join(dir, "child.lf");
      await writeCommandFile(child, ['SetProperty(PropertyName="A",PropertyValue="1")']);
      const { processor, commands } = createProcessor([
        `RunCommands(CommandFile="${child}",ExpectedStatus="Warning")`,
      ]);

      const summary = await processor.executeAll();

      expect(summary.failed).toBe(1);
      expect(runRecords(commands[0])).toEqual([
        [Severity.FAILURE, "Severity for RunCommands (SUCCESS) does not match the expected status (WARNING)."],
      ]);
    });

    it("runs the nested file from its own folder", async () => {
      const child = path.join(dir, "nested", "child.lf");
      await writeCommandFile(child, ['WritePropertiesToFile(OutputFile="wd.txt",IncludeProperties="WorkingDir")']);
      const { processor } = createProcessor([`RunCommands(CommandFile="${child}")`]);

      await processor.executeAll();

      expect(await fs.readFile(path.join(dir, "nested", "wd.txt"), "utf8")).toBe(
        `WorkingDir="${path.join(dir, "nested")}"\n`,
      );
    });

    it("refuses a command file that runs itself", async () => {
      const child = path.join(dir, "child.lf");
      await writeCommandFile(child, ['RunCommands(CommandFile="child.lf")']);
      const { processor, commands } = createProcessor([`RunCommands(CommandFile="${child}")`]);

      await processor.executeAll();

      expect(runRecords(commands[0])).toEqual([
        [Severity.FAILURE, "Severity for RunCommands (FAILURE) is the highest of the commands in the command file."],
        [
          Severity.FAILURE,
          `RunCommands (command 1): Unable to run command file (${child}): Command file is already running`,
        ],
      ]);
    });

    it("fails when no processor drives the context", async () => {
      const child = path.join(dir, "child.lf");
      await writeCommandFile(child, ['Message(Message="x")']);
      const { context } = createTestContext(dir);

      const result = await runCommandLine(context, 'RunCommands(CommandFile="child.lf")');

      expect(runMessages(result)).toEqual([`Unable to run command file (${child}) outside a workflow run.`]);
    });
  });

  describe("WriteCommandSummaryToFile", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it("writes one row per command with the status reached so far", async () => {
      const output = path.join(dir, "summary.html");
      const { processor } = createProcessor([
        'Message(Message="a<b",CommandStatus="WARNING")',
        `WriteCommandSummaryToFile(OutputFile="${output}")`,
        'Message(Message="later")',
      ]);

      await processor.executeAll();

      const rows = (await fs.readFile(output, "utf8")).split("\n").filter((line) => line.startsWith("<tr><td>"));
      expect(rows).toEqual([
        '<tr><td>1</td><td class="WARNING">WARNING</td><td class="SUCCESS">SUCCESS</td>' +
          '<td class="WARNING">WARNING</td><td><code>Message(Message=&quot;a&lt;b&quot;,CommandStatus=&quot;WARNING&quot;)</code></td></tr>',
        '<tr><td>2</td><td class="SUCCESS">SUCCESS</td><td class="SUCCESS">SUCCESS</td>' +
          `<td class="UNKNOWN">UNKNOWN</td><td><code>WriteCommandSummaryToFile(OutputFile=&quot;${output}&quot;)</code></td></tr>`,
        '<tr><td>3</td><td class="UNKNOWN">UNKNOWN</td><td class="UNKNOWN">UNKNOWN</td>' +
          '<td class="UNKNOWN">UNKNOWN</td><td><code>Message(Message=&quot;later&quot;)</code></td></tr>',
      ]);
    });
  });
});
