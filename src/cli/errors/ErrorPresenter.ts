/**
 * Turns an error that escaped a CLI command into the text printed on
 * stderr and the process exit code.
 *
 * ```
 * Error [WORKFLOW_FILE_NOT_FOUND]: Command file not found
 *
 * Path: /work/missing.lf
 *
 * Hint:
 *   Check that /work/missing.lf exists.
 * ```
 *
 * Node filesystem errors (ENOENT, EACCES, EPERM) that reach the CLI are
 * reported under the FS_* codes; anything else unknown is INTERNAL_ERROR.
 * Stack traces and the cause chain only appear with `--debug`.
 *
 * @module
 */

import { WorkflowError } from "../../core/errors/errors.js";
import { ErrorCode, getExitCode } from "../../core/errors/ErrorCode.js";

export interface FormatErrorOptions {
  debug?: boolean;
}

export interface ErrorPresenterOptions {
  /** Default: console.error */
  output?: (line: string) => void;
  debug?: boolean;
}

/** Causes deeper than this are summarized as "..." */
const MAX_CAUSE_DEPTH = 5;

const FS_CODES: Readonly<Record<string, ErrorCode>> = {
  ENOENT: ErrorCode.FS_NOT_FOUND,
  EACCES: ErrorCode.FS_PERMISSION_DENIED,
  EPERM: ErrorCode.FS_PERMISSION_DENIED,
};

export class ErrorPresenter {
  private readonly output: (line: string) => void;
  private readonly debug: boolean;

  constructor(options: ErrorPresenterOptions = {}) {
    this.output = options.output ?? console.error;
    this.debug = options.debug ?? false;
  }

  /**
   * Writes the formatted error and returns the exit code to use.
   */
  present(error: unknown): number {
    formatError(error, { debug: this.debug })
      .split("\n")
      .forEach((line) => this.output(line));
    return exitCodeFor(error);
  }
}

export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const normalized = toWorkflowError(error);
  const sections = [
    [`Error [${normalized.code}]: ${normalized.message}`],
    detailLines(normalized.details ?? {}),
    hintLines(normalized.hint),
    options.debug ? stackLines(normalized) : [],
    options.debug ? causeLines(normalized.cause) : [],
  ];
  return sections
    .filter((section) => section.length > 0)
    .map((section) => section.join("\n"))
    .join("\n\n");
}

/**
 * The category exit code of a WorkflowError or a Node filesystem error,
 * 1 for anything else.
 */
export function exitCodeFor(error: unknown): number {
  const code = Object.values(ErrorCode).find((c) => c === toWorkflowError(error).code);
  return code === undefined ? 1 : getExitCode(code);
}

// =============================================================================
// Normalization
// =============================================================================

function systemErrorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

function toWorkflowError(error: unknown): WorkflowError {
  if (error instanceof WorkflowError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new WorkflowError(String(error), ErrorCode.INTERNAL_ERROR, undefined, undefined, undefined, undefined, false);
  }

  const systemCode = systemErrorCode(error);
  const fsCode = systemCode === undefined ? undefined : FS_CODES[systemCode];
  const filePath = "path" in error && typeof error.path === "string" ? error.path : undefined;
  const cause = error.cause instanceof Error ? error.cause : undefined;
  const normalized =
    fsCode === undefined
      ? new WorkflowError(error.message, ErrorCode.INTERNAL_ERROR, undefined, undefined, undefined, cause, false)
      : new WorkflowError(
          error.message,
          fsCode,
          { path: filePath },
          undefined,
          fsCode === ErrorCode.FS_NOT_FOUND
            ? "Check that the path exists."
            : "Check the permissions of the path.",
          cause,
        );
  normalized.stack = error.stack;
  return normalized;
}

// =============================================================================
// Sections
// =============================================================================

function detailLines(details: Record<string, unknown>): string[] {
  return Object.entries(details).flatMap(([key, value]): string[] => {
    if (value === undefined) {
      return [];
    }
    if (Array.isArray(value)) {
      return value.length === 0 ? [] : [`${titleCase(key)}:`, ...value.map((item) => `  - ${String(item)}`)];
    }
    if (typeof value === "object" && value !== null) {
      return [`${titleCase(key)}: ${JSON.stringify(value)}`];
    }
    return [`${titleCase(key)}: ${String(value)}`];
  });
}

function hintLines(hint: string | undefined): string[] {
  return hint ? ["Hint:", ...hint.split("\n").map((line) => `  ${line}`)] : [];
}

function stackLines(error: Error): string[] {
  // The first stack line repeats the message
  const frames = error.stack?.split("\n").slice(1) ?? [];
  return frames.length > 0 ? ["Stack trace:", ...frames] : [];
}

/**
 * Walks `cause` links, including the ones inside wrapped WorkflowErrors.
 */
function causeLines(first: Error | undefined): string[] {
  const lines: string[] = [];
  let cause = first;
  for (let depth = 0; cause !== undefined; depth++) {
    if (depth === MAX_CAUSE_DEPTH) {
      lines.push("  ...");
      break;
    }
    const code = cause instanceof WorkflowError ? ` [${cause.code}]` : "";
    lines.push(`  ${cause.message}${code}`);
    cause = cause.cause instanceof Error ? cause.cause : undefined;
  }
  return lines.length > 0 ? ["Caused by:", ...lines] : [];
}

/**
 * `configPath` → `Config Path`
 */
function titleCase(key: string): string {
  return key
    .replace(/([A-Z])/g, " $1")
    .replace(/^./, (first) => first.toUpperCase())
    .trim();
}
