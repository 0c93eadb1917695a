/**
 * Tests for CLI JSON output module.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { formatJsonError, formatJsonOutput, toJsonRecord } from "../src/cli/ux/CliJson.js";
import { WorkflowError } from "../src/core/errors/errors.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";
import { createLogRecord } from "../src/core/status/LogRecord.js";
import { Phase, Severity } from "../src/core/status/Severity.js";

// =============================================================================
// Tests
// =============================================================================

describe("CliJson", () => {
  // ===========================================================================
  // formatJsonOutput
  // ===========================================================================

  describe("formatJsonOutput", () => {
    it("formats with two-space indentation", () => {
      expect(formatJsonOutput({ executed: 3, failed: 1 })).toBe('{\n  "executed": 3,\n  "failed": 1\n}');
    });

    it("adds a trailing newline only when requested", () => {
      expect(formatJsonOutput([], { trailingNewline: true })).toBe("[]\n");
      expect(formatJsonOutput([])).toBe("[]");
    });
  });

  // ===========================================================================
  // formatJsonError
  // ===========================================================================

  describe("formatJsonError", () => {
    it("flattens a WorkflowError with its details", () => {
      const error = new WorkflowError(
        "Command file not found",
        ErrorCode.WORKFLOW_FILE_NOT_FOUND,
        { path: "/data/clip.lf" },
        undefined,
        "Check the path.",
      );

      expect(JSON.parse(formatJsonError(error))).toEqual({
        error: {
          message: "Command file not found",
          code: "WORKFLOW_FILE_NOT_FOUND",
          hint: "Check the path.",
          path: "/data/clip.lf",
        },
      });
    });

    it("does not let details replace the message or code", () => {
      const error = new WorkflowError("Real message", ErrorCode.CONFIG_INVALID, { message: "other", code: "X" });

      expect(JSON.parse(formatJsonError(error)).error).toEqual({
        message: "Real message",
        code: "CONFIG_INVALID",
      });
    });

    it("uses INTERNAL_ERROR for other errors", () => {
      expect(JSON.parse(formatJsonError(new Error("boom")))).toEqual({
        error: { message: "boom", code: "INTERNAL_ERROR" },
      });
      expect(JSON.parse(formatJsonError("plain")).error.message).toBe("plain");
    });

    it("includes the stack only in debug mode", () => {
      const error = new Error("boom");

      expect(JSON.parse(formatJsonError(error)).error.stack).toBeUndefined();
      expect(JSON.parse(formatJsonError(error, { debug: true })).error.stack).toBe(error.stack);
    });

    it("adds a trailing newline when requested", () => {
      expect(formatJsonError(new Error("x"), { trailingNewline: true }).endsWith("}\n")).toBe(true);
    });
  });

  // ===========================================================================
  // toJsonRecord
  // ===========================================================================

  describe("toJsonRecord", () => {
    it("keeps a recommendation", () => {
      const record = createLogRecord(Phase.RUN, Severity.FAILURE, "Layer missing", "Read it first.");

      expect(toJsonRecord(record)).toEqual({
        phase: "RUN",
        severity: "FAILURE",
        message: "Layer missing",
        recommendation: "Read it first.",
      });
    });

    it("omits an empty recommendation", () => {
      const record = createLogRecord(Phase.INITIALIZATION, Severity.WARNING, "Unused parameter");

      expect(toJsonRecord(record)).toStrictEqual({
        phase: "INITIALIZATION",
        severity: "WARNING",
        message: "Unused parameter",
      });
    });
  });
});
