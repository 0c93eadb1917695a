/**
 * Progress display for a workflow run.
 *
 * In a TTY the @clack/prompts spinner rewrites one line as commands start;
 * elsewhere (CI, pipes) each command gets its own `[n/total]` line.
 *
 * @module
 */

import * as clack from "@clack/prompts";
import type { ProcessorListener, RunSummary } from "../../core/processor/WorkflowProcessor.js";
import { isAtLeast, Severity } from "../../core/status/Severity.js";
import type { CliUx } from "./CliUx.js";

export interface CliSpinnerOptions {
  readonly ux: CliUx;
  /** Overrides TTY detection (tests, --json) */
  readonly isTTY?: boolean;
}

/**
 * @example
 * ```typescript
 * const spinner = createCliSpinner({ ux });
 * spinner.start("Running clip.lf");
 * processor.addListener(spinner.listener());
 * spinner.finish(await processor.executeAll());
 * ```
 */
export class CliSpinner {
  private readonly ux: CliUx;
  private readonly animated: boolean;
  private clackSpinner: ReturnType<typeof clack.spinner> | null = null;
  private startMessage = "";
  private problems = 0;

  constructor(options: CliSpinnerOptions) {
    this.ux = options.ux;
    this.animated = (options.isTTY ?? process.stdout.isTTY ?? false) && !options.ux.quiet;
  }

  get isRunning(): boolean {
    return this.startMessage !== "";
  }

  /** Commands that ended with a warning or failure since start() */
  get problemCount(): number {
    return this.problems;
  }

  start(message: string): void {
    this.startMessage = message;
    this.problems = 0;

    if (this.animated) {
      this.clackSpinner = clack.spinner();
      this.clackSpinner.start(message);
    } else {
      this.ux.info(message);
    }
  }

  progress(current: number, total: number, label: string): void {
    if (!this.isRunning) return;

    const suffix = this.problems > 0 ? ` (${this.problems} with problems)` : "";
    if (this.clackSpinner) {
      this.clackSpinner.message(`[${current}/${total}] ${label}${suffix}`);
    } else {
      this.ux.step(current, total, label);
    }
  }

  /**
   * Processor listener that reports each command as it starts and counts
   * the ones that end at WARNING or above.
   */
  listener(): ProcessorListener {
    return {
      commandStarted: (index, total, command) => {
        this.progress(index + 1, total, command.name);
      },
      commandCompleted: (_index, _total, command) => {
        if (isAtLeast(command.status.overallSeverity(), Severity.WARNING)) {
          this.problems++;
        }
      },
    };
  }

  succeed(message?: string): void {
    const text = message ?? this.startMessage;
    this.stop(text);
    this.ux.success(text);
  }

  fail(message?: string): void {
    const text = message ?? this.startMessage;
    this.stop(text);
    this.ux.error(text);
  }

  /**
   * Ends the run with a line that matches its summary.
   */
  finish(summary: RunSummary): void {
    if (summary.failed > 0) {
      this.fail(`Workflow finished with ${summary.failed} failed command(s)`);
    } else if (summary.severity === Severity.WARNING) {
      this.succeed("Workflow finished with warnings");
    } else {
      this.succeed("Workflow finished");
    }
  }

  private stop(message: string): void {
    this.clackSpinner?.stop(message);
    this.clackSpinner = null;
    this.startMessage = "";
  }
}

export function createCliSpinner(options: CliSpinnerOptions): CliSpinner {
  return new CliSpinner(options);
}
