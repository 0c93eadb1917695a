/**
 * JSON output for `--json` mode.
 *
 * In JSON mode a command writes exactly one JSON document to stdout and
 * nothing else; progress and human messages are suppressed.
 *
 * @module
 */

import type { LogRecord } from "../../core/status/LogRecord.js";
import { WorkflowError } from "../../core/errors/errors.js";

// =============================================================================
// Types
// =============================================================================

export interface JsonOutputOptions {
  /** Whether to add a trailing newline (default: false) */
  readonly trailingNewline?: boolean;
}

export interface JsonErrorOptions extends JsonOutputOptions {
  /** Include the stack trace */
  readonly debug?: boolean;
}

export interface JsonRecord {
  readonly phase: string;
  readonly severity: string;
  readonly message: string;
  readonly recommendation?: string;
}

// =============================================================================
// Output Functions
// =============================================================================

/**
 * Formats data as pretty-printed JSON with 2-space indentation.
 *
 * @example
 * ```typescript
 * formatJsonOutput({ executed: 3, failed: 1 });
 * // => '{\n  "executed": 3,\n  "failed": 1\n}'
 * ```
 */
export function formatJsonOutput(data: unknown, options?: JsonOutputOptions): string {
  const json = JSON.stringify(data, null, 2);
  return options?.trailingNewline ? json + "\n" : json;
}

/**
 * Formats an error inside an `error` wrapper:
 *
 * ```json
 * { "error": { "message": "...", "code": "...", "hint": "...", ...details } }
 * ```
 *
 * Errors that are not WorkflowErrors get the code INTERNAL_ERROR.
 */
export function formatJsonError(error: unknown, options: JsonErrorOptions = {}): string {
  const errorObj: Record<string, unknown> = {};

  if (error instanceof WorkflowError) {
    errorObj.message = error.message;
    errorObj.code = error.code;
    if (error.hint) {
      errorObj.hint = error.hint;
    }
    for (const [key, value] of Object.entries(error.details ?? {})) {
      errorObj[key] ??= value;
    }
  } else {
    errorObj.message = error instanceof Error ? error.message : String(error);
    errorObj.code = "INTERNAL_ERROR";
  }

  if (options.debug && error instanceof Error && error.stack) {
    errorObj.stack = error.stack;
  }

  return formatJsonOutput({ error: errorObj }, options);
}

/**
 * Converts a command log record to its JSON form. An empty recommendation
 * is left out.
 */
export function toJsonRecord(record: LogRecord): JsonRecord {
  return record.recommendation
    ? {
        phase: record.phase,
        severity: record.severity,
        message: record.message,
        recommendation: record.recommendation,
      }
    : { phase: record.phase, severity: record.severity, message: record.message };
}
