/**
 * Tests for CLI UX messaging module.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { createCliUx, getCliUx, parseUxLevel, setDefaultCliUx, type UxLevel } from "../src/cli/ux/CliUx.js";
import { Severity } from "../src/core/status/Severity.js";

// =============================================================================
// Test Helpers
// =============================================================================

interface Captured {
  readonly stdout: string[];
  readonly stderr: string[];
}

function captureUx(level: UxLevel, colors = false) {
  const captured: Captured = { stdout: [], stderr: [] };
  const ux = createCliUx({
    level,
    colors,
    stdout: (msg) => captured.stdout.push(msg),
    stderr: (msg) => captured.stderr.push(msg),
  });
  return { ux, captured };
}

// =============================================================================
// Tests
// =============================================================================

describe("CliUx", () => {
  describe("messages", () => {
    it("writes success lines with details", () => {
      const { ux, captured } = captureUx("info");

      ux.success("Workflow finished", { executed: 4 });

      expect(captured.stdout).toEqual(["✓ Workflow finished\n", "  executed: 4\n"]);
    });

    it("writes errors with code and hint to stderr", () => {
      const { ux, captured } = captureUx("info");

      ux.error("Command file not found", { code: "WORKFLOW_FILE_NOT_FOUND", hint: "Check the path." });

      expect(captured.stderr).toEqual([
        "✗ WORKFLOW_FILE_NOT_FOUND: Command file not found\n",
        "  Hint: Check the path.\n",
      ]);
      expect(captured.stdout).toEqual([]);
    });

    it("writes warnings to stderr", () => {
      const { ux, captured } = captureUx("info");

      ux.warn("2 commands recorded warnings");

      expect(captured.stderr).toEqual(["⚠ 2 commands recorded warnings\n"]);
    });

    it("numbers steps", () => {
      const { ux, captured } = captureUx("info");

      ux.step(3, 12, "ClipGeoLayer");
      ux.info("Reading clip.lf");
      ux.print("plain");
      ux.header("Summary");
      ux.newline();

      expect(captured.stdout).toEqual([
        "[3/12] ClipGeoLayer\n",
        "→ Reading clip.lf\n",
        "plain\n",
        "\nSummary\n",
        "\n",
      ]);
    });
  });

  describe("levels", () => {
    it("silent keeps only errors", () => {
      const { ux, captured } = captureUx("silent");

      ux.success("done");
      ux.warn("careful");
      ux.info("note");
      ux.print("line");
      ux.error("broken");

      expect(captured.stdout).toEqual([]);
      expect(captured.stderr).toEqual(["✗ broken\n"]);
    });

    it("reports detail only for verbose and debug", () => {
      expect(captureUx("info").ux.detailed).toBe(false);
      expect(captureUx("verbose").ux.detailed).toBe(true);
      expect(captureUx("debug").ux.detailed).toBe(true);
      expect(captureUx("silent").ux.quiet).toBe(true);
    });
  });

  describe("severity", () => {
    it("returns the text unchanged without colors", () => {
      const { ux } = captureUx("info");

      expect(ux.severity(Severity.FAILURE, "FAILURE")).toBe("FAILURE");
    });
  });

  describe("default instance", () => {
    it("returns the instance set last", () => {
      const { ux } = captureUx("verbose");

      setDefaultCliUx(ux);

      expect(getCliUx()).toBe(ux);
    });
  });
});

describe("parseUxLevel", () => {
  it("returns info by default", () => {
    expect(parseUxLevel({ verbose: false, debug: false, silent: false })).toBe("info");
  });

  it("returns verbose for --verbose", () => {
    expect(parseUxLevel({ verbose: true, debug: false, silent: false })).toBe("verbose");
  });

  it("silent takes precedence over verbose", () => {
    expect(parseUxLevel({ verbose: true, debug: false, silent: true })).toBe("silent");
  });

  it("debug takes precedence over silent", () => {
    expect(parseUxLevel({ verbose: true, debug: true, silent: true })).toBe("debug");
  });
});
