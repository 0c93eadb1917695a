/**
 * Tests for CLI Spinner module in its non-TTY fallback.
 *
 * @module
 */

import * as os from "node:os";
import { describe, it, expect } from "vitest";
import { createCliSpinner } from "../src/cli/ux/CliSpinner.js";
import { createCliUx, type UxLevel } from "../src/cli/ux/CliUx.js";
import { CommandFactory } from "../src/core/commands/CommandFactory.js";
import { NullSink, createLogger } from "../src/core/logging/ContextualLogger.js";
import { WorkflowProcessor } from "../src/core/processor/WorkflowProcessor.js";
import { Severity } from "../src/core/status/Severity.js";
import { createFakeServices } from "./helpers/workflowFixtures.js";

function spinnerWithOutput(level: UxLevel = "info") {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const ux = createCliUx({
    level,
    colors: false,
    stdout: (msg) => stdout.push(msg),
    stderr: (msg) => stderr.push(msg),
  });
  return { spinner: createCliSpinner({ ux, isTTY: false }), stdout, stderr };
}

describe("CliSpinner", () => {
  it("writes one line per update", () => {
    const { spinner, stdout } = spinnerWithOutput();

    spinner.start("Running clip.lf");
    spinner.progress(1, 2, "ReadGeoLayerFromGeoJSON");
    spinner.progress(2, 2, "ClipGeoLayer");
    spinner.succeed("Workflow finished");

    expect(stdout).toEqual([
      "→ Running clip.lf\n",
      "[1/2] ReadGeoLayerFromGeoJSON\n",
      "[2/2] ClipGeoLayer\n",
      "✓ Workflow finished\n",
    ]);
  });

  it("tracks whether it is running", () => {
    const { spinner } = spinnerWithOutput();

    expect(spinner.isRunning).toBe(false);
    spinner.start("Checking");
    expect(spinner.isRunning).toBe(true);
    spinner.succeed();
    expect(spinner.isRunning).toBe(false);
  });

  it("ignores progress when not started", () => {
    const { spinner, stdout } = spinnerWithOutput();

    spinner.progress(1, 1, "CopyFile");

    expect(stdout).toEqual([]);
  });

  it("reuses the start message on failure", () => {
    const { spinner, stderr } = spinnerWithOutput();

    spinner.start("Running clip.lf");
    spinner.fail();

    expect(stderr).toEqual(["✗ Running clip.lf\n"]);
  });

  it("stays quiet in silent mode apart from failures", () => {
    const { spinner, stdout, stderr } = spinnerWithOutput("silent");

    spinner.start("Running");
    spinner.progress(1, 1, "CopyFile");
    spinner.fail("Workflow finished with 1 failed command(s)");

    expect(stdout).toEqual([]);
    expect(stderr).toEqual(["✗ Workflow finished with 1 failed command(s)\n"]);
  });

  it("follows a processor and counts commands with problems", async () => {
    const { spinner, stdout } = spinnerWithOutput();
    const factory = new CommandFactory();
    const processor = new WorkflowProcessor(
      ["# notes", 'Message(Message="hello")', "Frobnicate()"].map((line) => factory.create(line)),
      {
        workingDir: os.tmpdir(),
        services: createFakeServices(),
        logger: createLogger({ sink: new NullSink() }),
        env: {},
      },
    );
    processor.addListener(spinner.listener());

    spinner.start("Running notes.lf");
    const summary = await processor.executeAll();
    spinner.finish(summary);

    expect(spinner.problemCount).toBe(1);
    expect(stdout).toEqual(["→ Running notes.lf\n", "[2/3] Message\n", "[3/3] Frobnicate\n"]);
  });

  it("finishes according to the summary", () => {
    const { spinner, stdout, stderr } = spinnerWithOutput();

    spinner.start("a");
    spinner.finish({ executed: 2, failed: 0, failures: [], severity: Severity.SUCCESS });
    spinner.start("b");
    spinner.finish({ executed: 2, failed: 0, failures: [], severity: Severity.WARNING });
    spinner.start("c");
    spinner.finish({ executed: 2, failed: 2, failures: [], severity: Severity.FAILURE });

    expect(stdout.filter((line) => line.startsWith("✓"))).toEqual([
      "✓ Workflow finished\n",
      "✓ Workflow finished with warnings\n",
    ]);
    expect(stderr).toEqual(["✗ Workflow finished with 2 failed command(s)\n"]);
  });
});
