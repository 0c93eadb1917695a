/**
 * One CLI invocation as seen by the structured log.
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import type { LogContext } from "./ContextualLogger.js";

export interface ExecutionContext {
  /** Bound into every log entry of the invocation */
  readonly correlationId: string;
  /** Absolute path of the command file, when there is one */
  readonly commandFile?: string;
  readonly startedAt: Date;
}

export interface CreateExecutionContextOptions {
  correlationId?: string;
  commandFile?: string;
  startedAt?: Date;
}

export function createExecutionContext(options: CreateExecutionContextOptions = {}): ExecutionContext {
  return {
    correlationId: options.correlationId ?? randomUUID(),
    commandFile: options.commandFile,
    startedAt: options.startedAt ?? new Date(),
  };
}

/**
 * Fields a logger binds for the invocation.
 */
export function executionLogContext(execution: ExecutionContext): LogContext {
  return execution.commandFile === undefined
    ? { correlationId: execution.correlationId }
    : { correlationId: execution.correlationId, commandFile: execution.commandFile };
}

export function elapsedMs(execution: ExecutionContext, now: number = Date.now()): number {
  return Math.max(0, now - execution.startedAt.getTime());
}
