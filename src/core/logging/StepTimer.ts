/**
 * Times the load, discover and run stages of an invocation.
 *
 * @module
 */

import type { ContextualLogger } from "./ContextualLogger.js";
import type { Step } from "./Step.js";

/**
 * Wraps each stage in `step.start` / `step.end` log entries and keeps the
 * duration of every stage that finished, failed or not.
 *
 * @example
 * ```typescript
 * const timer = new StepTimer(logger);
 * const commands = await timer.run(Step.WORKFLOW_LOAD, () => loadCommandFile(file));
 * timer.durations(); // Map { "workflow.load" => 12 }
 * ```
 */
export class StepTimer {
  private readonly finished = new Map<Step, number>();

  constructor(
    private readonly logger: ContextualLogger,
    private readonly clock: () => number = Date.now,
  ) {}

  /**
   * Runs `fn` as `step`. A thrown error is logged at error level and rethrown.
   */
  async run<T>(step: Step, fn: () => Promise<T>, fields?: Record<string, unknown>): Promise<T> {
    const stepLogger = this.logger.withContext({ step });
    const startedAt = this.clock();
    stepLogger.info("Step started", { event: "step.start", ...fields });

    try {
      const result = await fn();
      stepLogger.info("Step completed", { event: "step.end", durationMs: this.record(step, startedAt) });
      return result;
    } catch (error) {
      stepLogger.error("Step failed", {
        event: "step.end",
        durationMs: this.record(step, startedAt),
        error: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }
  }

  /**
   * Durations in milliseconds, in the order the steps finished. A step run
   * twice keeps its last duration.
   */
  durations(): ReadonlyMap<Step, number> {
    return new Map(this.finished);
  }

  private record(step: Step, startedAt: number): number {
    const durationMs = this.clock() - startedAt;
    this.finished.delete(step);
    this.finished.set(step, durationMs);
    return durationMs;
  }
}
