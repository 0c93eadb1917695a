/**
 * Tests for error codes, error classes and CLI error presentation.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { ErrorCode, getErrorCategory, getExitCode } from "../../src/core/errors/ErrorCode.js";
import {
  CommandParameterError,
  CommandRunError,
  ImmutablePropertyError,
  MissingPropertyError,
  toUserMessage,
  UnknownFormatterError,
  WorkflowError,
} from "../../src/core/errors/errors.js";
import { ErrorPresenter, exitCodeFor, formatError } from "../../src/cli/errors/ErrorPresenter.js";

// =============================================================================
// ErrorCode
// =============================================================================

describe("ErrorCode", () => {
  it("uses each code as its own value", () => {
    for (const [key, value] of Object.entries(ErrorCode)) {
      expect(value).toBe(key);
    }
  });

  describe("exit codes", () => {
    it.each([
      [ErrorCode.COMMAND_PARAMETER_ERROR, 10],
      [ErrorCode.PROPERTY_NOT_FOUND, 20],
      [ErrorCode.WORKFLOW_FILE_NOT_FOUND, 30],
      [ErrorCode.CONFIG_INVALID, 42],
      [ErrorCode.LAYER_READ_FAILED, 50],
      [ErrorCode.DOWNLOAD_FAILED, 62],
      [ErrorCode.FS_NOT_FOUND, 71],
      [ErrorCode.INTERNAL_ERROR, 1],
    ])("%s exits with %i", (code, exitCode) => {
      expect(getExitCode(code)).toBe(exitCode);
    });

    it("keeps every category inside its range", () => {
      const ranges = {
        command: [10, 19],
        property: [20, 29],
        workflow: [30, 39],
        config: [40, 49],
        codec: [50, 59],
        collaborator: [60, 69],
        fs: [70, 79],
        internal: [1, 1],
      } as const;

      for (const code of Object.values(ErrorCode)) {
        const [min, max] = ranges[getErrorCategory(code)];
        const exitCode = getExitCode(code);
        expect(exitCode).toBeGreaterThanOrEqual(min);
        expect(exitCode).toBeLessThanOrEqual(max);
      }
    });
  });

  describe("categories", () => {
    it("groups formatter and registry codes with properties", () => {
      expect(getErrorCategory(ErrorCode.FORMATTER_UNKNOWN)).toBe("property");
      expect(getErrorCategory(ErrorCode.REGISTRY_INVARIANT_VIOLATED)).toBe("property");
    });

    it("groups external services as collaborators", () => {
      expect(getErrorCategory(ErrorCode.ARCHIVE_UNSUPPORTED)).toBe("collaborator");
      expect(getErrorCategory(ErrorCode.ALGORITHM_FAILED)).toBe("collaborator");
    });
  });
});

// =============================================================================
// Error classes
// =============================================================================

describe("WorkflowError", () => {
  it("carries code, details and hint", () => {
    const cause = new Error("ENOENT");
    const error = new WorkflowError(
      "Command file not found",
      ErrorCode.WORKFLOW_FILE_NOT_FOUND,
      { path: "/work/a.lf" },
      undefined,
      "Check the path.",
      cause,
    );

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("WorkflowError");
    expect(error.code).toBe("WORKFLOW_FILE_NOT_FOUND");
    expect(error.details).toEqual({ path: "/work/a.lf" });
    expect(error.hint).toBe("Check the path.");
    expect(error.cause).toBe(cause);
    expect(error.isOperational).toBe(true);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("builds property errors", () => {
    const missing = new MissingPropertyError("DataFolder");
    const immutable = new ImmutablePropertyError("WorkingDir");

    expect(missing.message).toBe('Property "DataFolder" is not defined');
    expect(missing.hint).toBe("Set the property with SetProperty() or pass -p DataFolder=<value>.");
    expect(immutable.code).toBe(ErrorCode.PROPERTY_IMMUTABLE);
    expect(immutable.isOperational).toBe(false);
  });

  it("builds formatter and command errors", () => {
    expect(new UnknownFormatterError("%Q").message).toBe('Unknown path formatter "%Q"');
    expect(new CommandParameterError("CopyFile", 1).message).toBe("CopyFile: 1 parameter problem found");
    expect(new CommandParameterError("CopyFile", 3).message).toBe("CopyFile: 3 parameter problems found");
    expect(new CommandRunError("CopyFile", 2).message).toBe("There were 2 warnings processing the command.");
  });

  it("converts anything to a user message", () => {
    expect(toUserMessage(new MissingPropertyError("X"))).toEqual({
      message: 'Property "X" is not defined',
      code: "PROPERTY_NOT_FOUND",
    });
    expect(toUserMessage(new Error("plain"))).toEqual({ message: "plain" });
    expect(toUserMessage(42)).toEqual({ message: "42" });
  });
});

// =============================================================================
// ErrorPresenter
// =============================================================================

describe("ErrorPresenter", () => {
  describe("formatError", () => {
    it("shows code, details and hint", () => {
      const error = new WorkflowError(
        "Command file not found",
        ErrorCode.WORKFLOW_FILE_NOT_FOUND,
        { path: "/work/missing.lf" },
        undefined,
        "Check that /work/missing.lf exists.",
      );

      expect(formatError(error)).toBe(
        [
          "Error [WORKFLOW_FILE_NOT_FOUND]: Command file not found",
          "",
          "Path: /work/missing.lf",
          "",
          "Hint:",
          "  Check that /work/missing.lf exists.",
        ].join("\n"),
      );
    });

    it("lists array details and title-cases keys", () => {
      const error = new WorkflowError("Invalid configuration", ErrorCode.CONFIG_INVALID, {
        configPath: "/cfg/layerflow.yaml",
        issues: ["logLevel: bad", "color: unknown"],
        empty: [],
        skipped: undefined,
        nested: { a: 1 },
      });

      expect(formatError(error)).toBe(
        [
          "Error [CONFIG_INVALID]: Invalid configuration",
          "",
          "Config Path: /cfg/layerflow.yaml",
          "Issues:",
          "  - logLevel: bad",
          "  - color: unknown",
          'Nested: {"a":1}',
        ].join("\n"),
      );
    });

    it("reports unknown errors as internal", () => {
      expect(formatError(new TypeError("bad call"))).toBe("Error [INTERNAL_ERROR]: bad call");
      expect(formatError("text")).toBe("Error [INTERNAL_ERROR]: text");
    });

    it("adds stack and cause in debug mode only", () => {
      const error = new WorkflowError(
        "Failed to read command file",
        ErrorCode.WORKFLOW_READ_FAILED,
        undefined,
        undefined,
        undefined,
        new Error("EISDIR"),
      );

      expect(formatError(error)).not.toContain("Stack trace:");
      const debugOutput = formatError(error, { debug: true }).split("\n");
      expect(debugOutput).toContain("Stack trace:");
      expect(debugOutput).toContain("Caused by:");
      expect(debugOutput).toContain("  EISDIR");
    });

    it("maps Node filesystem errors to FS codes", () => {
      const missing = Object.assign(new Error("ENOENT: no such file or directory"), {
        code: "ENOENT",
        path: "/data/in.geojson",
      });
      const denied = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });

      expect(formatError(missing)).toBe(
        [
          "Error [FS_NOT_FOUND]: ENOENT: no such file or directory",
          "",
          "Path: /data/in.geojson",
          "",
          "Hint:",
          "  Check that the path exists.",
        ].join("\n"),
      );
      expect(formatError(denied)).toBe(
        ["Error [FS_PERMISSION_DENIED]: EACCES: permission denied", "", "Hint:", "  Check the permissions of the path."].join(
          "\n",
        ),
      );
      expect(exitCodeFor(missing)).toBe(71);
      expect(exitCodeFor(denied)).toBe(70);
    });

    it("walks the whole cause chain in debug mode", () => {
      const root = new Error("disk full");
      const middle = new WorkflowError("Could not write layer", ErrorCode.LAYER_WRITE_FAILED, undefined, undefined, undefined, root);
      const error = new WorkflowError("Command failed", ErrorCode.COMMAND_RUN_ERROR, undefined, undefined, undefined, middle);

      const lines = formatError(error, { debug: true }).split("\n");
      const causeStart = lines.indexOf("Caused by:");

      expect(lines.slice(causeStart)).toEqual(["Caused by:", "  Could not write layer [LAYER_WRITE_FAILED]", "  disk full"]);
    });
  });

  describe("present", () => {
    it("writes each line and returns the exit code", () => {
      const lines: string[] = [];
      const presenter = new ErrorPresenter({ output: (line) => lines.push(line) });

      const exitCode = presenter.present(
        new WorkflowError("Configuration file not found", ErrorCode.CONFIG_NOT_FOUND, undefined, undefined, "Check it."),
      );

      expect(exitCode).toBe(40);
      expect(lines).toEqual(["Error [CONFIG_NOT_FOUND]: Configuration file not found", "", "Hint:", "  Check it."]);
    });
  });

  describe("exitCodeFor", () => {
    it("returns 1 for unknown codes and plain errors", () => {
      expect(exitCodeFor(new WorkflowError("x", "SOMETHING_ELSE"))).toBe(1);
      expect(exitCodeFor(new Error("x"))).toBe(1);
    });
  });
});
