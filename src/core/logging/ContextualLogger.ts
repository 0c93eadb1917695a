/**
 * Structured JSON logging for workflow runs.
 *
 * Every entry is one JSON object carrying the invocation's correlation ID,
 * the pipeline step and, inside a command, the command's name and its
 * position in the command file. Command log records map onto levels:
 * FAILURE is `error`, WARNING is `warn`, anything else `info`.
 *
 * @module
 */

import * as fs from "node:fs";
import { WorkflowError } from "../errors/errors.js";
import type { LogRecord } from "../status/LogRecord.js";
import { Severity } from "../status/Severity.js";
import type { Step } from "./Step.js";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  /** ISO timestamp */
  ts: string;
  level: LogLevel;
  msg: string;
  correlationId?: string;
  step?: string;

  /** Name of the command being processed */
  command?: string;

  /** 1-based position of that command in its command file */
  position?: number;

  errorCode?: string;
  errorMessage?: string;

  /** Only with `debug: true` */
  stack?: string;
  cause?: string;

  [key: string]: unknown;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LogContext {
  correlationId?: string;
  step?: Step;
  command?: string;
  position?: number;
  [key: string]: unknown;
}

export interface CreateLoggerOptions {
  /** Default: JSON lines on stdout */
  sink?: LogSink;

  /** Default: "info" */
  minLevel?: LogLevel;

  /** Adds stack traces and causes to error entries */
  debug?: boolean;

  context?: LogContext;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// =============================================================================
// Sinks
// =============================================================================

export class StdoutJsonSink implements LogSink {
  write(entry: LogEntry): void {
    process.stdout.write(JSON.stringify(entry) + "\n");
  }
}

/**
 * Appends one JSON entry per line. Synchronous, so entries logged right
 * before a crash still land in the file.
 */
export class FileJsonSink implements LogSink {
  constructor(private readonly filePath: string) {}

  write(entry: LogEntry): void {
    fs.appendFileSync(this.filePath, JSON.stringify(entry) + "\n", "utf8");
  }
}

export class NullSink implements LogSink {
  write(_entry: LogEntry): void {}
}

// =============================================================================
// ContextualLogger
// =============================================================================

/**
 * @example
 * ```typescript
 * const logger = createLogger({ sink: new FileJsonSink("run.log") });
 * const commandLogger = logger.withContext({ step: Step.COMMAND }).forCommand("ClipGeoLayer", 3);
 * commandLogger.logRecord(record);
 * ```
 */
export class ContextualLogger {
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly debugMode: boolean;
  private readonly context: LogContext;

  constructor(options: CreateLoggerOptions = {}) {
    this.sink = options.sink ?? new StdoutJsonSink();
    this.minLevel = options.minLevel ?? "info";
    this.debugMode = options.debug ?? false;
    this.context = options.context ?? {};
  }

  withContext(ctx: LogContext): ContextualLogger {
    return new ContextualLogger({
      sink: this.sink,
      minLevel: this.minLevel,
      debug: this.debugMode,
      context: { ...this.context, ...ctx },
    });
  }

  /**
   * Child logger for one command; `position` is left unset when unknown.
   */
  forCommand(command: string, position?: number): ContextualLogger {
    return this.withContext(position === undefined ? { command } : { command, position });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  debug(msg: string, fields?: Record<string, unknown>): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: Record<string, unknown>): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: Record<string, unknown>): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: Record<string, unknown>): void {
    this.write("error", msg, fields);
  }

  /**
   * Writes a command's log record at the level matching its severity.
   * An empty recommendation is left out of the entry.
   */
  logRecord(record: LogRecord): void {
    const fields: Record<string, unknown> = { phase: record.phase, severity: record.severity };
    if (record.recommendation) {
      fields.recommendation = record.recommendation;
    }
    this.write(levelForSeverity(record.severity), record.message, fields);
  }

  private write(level: LogLevel, msg: string, fields?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = { ts: new Date().toISOString(), level, msg };

    const { correlationId, step, command, position } = this.context;
    if (correlationId) entry.correlationId = correlationId;
    if (step) entry.step = step;
    if (command) entry.command = command;
    if (position !== undefined) entry.position = position;

    for (const [key, value] of Object.entries(this.context)) {
      if (value !== undefined && !(key in entry)) {
        entry[key] = value;
      }
    }

    for (const [key, value] of Object.entries(fields ?? {})) {
      if (key === "error" && value instanceof Error) {
        Object.assign(entry, errorFields(value, this.debugMode));
      } else if (value !== undefined) {
        entry[key] = value;
      }
    }

    this.sink.write(entry);
  }
}

export function levelForSeverity(severity: Severity): LogLevel {
  switch (severity) {
    case Severity.FAILURE:
      return "error";
    case Severity.WARNING:
      return "warn";
    default:
      return "info";
  }
}

function errorFields(error: Error, debug: boolean): Partial<LogEntry> {
  const fields: Partial<LogEntry> = { errorMessage: error.message };
  if (error instanceof WorkflowError) {
    fields.errorCode = error.code;
  }
  if (debug) {
    if (error.stack) {
      fields.stack = error.stack;
    }
    if (error instanceof WorkflowError && error.cause) {
      fields.cause = error.cause.message;
    }
  }
  return fields;
}

export function createLogger(options: CreateLoggerOptions = {}): ContextualLogger {
  return new ContextualLogger(options);
}
