import type { Phase, Severity } from "./Severity.js";

/**
 * A single problem or note recorded by a command.
 */
export interface LogRecord {
  readonly phase: Phase;
  readonly severity: Severity;
  readonly message: string;
  readonly recommendation: string;
}

/**
 * Creates a frozen log record.
 */
export function createLogRecord(
  phase: Phase,
  severity: Severity,
  message: string,
  recommendation = "",
): LogRecord {
  return Object.freeze({ phase, severity, message, recommendation });
}
