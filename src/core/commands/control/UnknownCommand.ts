/**
 * Placeholder for a line that could not be turned into a known command.
 *
 * Validation always fails, so the processor counts the line as failed
 * and moves on.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import { AbstractCommand, type CommandInit } from "../AbstractCommand.js";
import type { ParameterSpec, ParameterValues } from "../CommandParameters.js";

export class UnknownCommand extends AbstractCommand {
  readonly name: string;
  readonly description = "Unrecognized command";
  readonly parameterSpecs: readonly ParameterSpec[] = [];
  protected override readonly strictParameters = false;

  private readonly problem: { message: string; recommendation: string };

  /**
   * @param name - Command name as written, or "Unknown" when it could not be parsed
   * @param syntaxError - Parse error message, when the line is malformed
   */
  constructor(init: CommandInit, name: string, syntaxError?: { message: string; hint?: string }) {
    super(init);
    this.name = name;
    this.problem = syntaxError
      ? {
          message: `Command "${init.commandString.trim()}" could not be parsed: ${syntaxError.message}.`,
          recommendation: syntaxError.hint ?? "Correct the command syntax.",
        }
      : {
          message: `Unrecognized command "${name}".`,
          recommendation: "Check the command name spelling. Run 'layerflow commands' for the list.",
        };
  }

  protected override checkParameters(_params: ParameterValues): void {
    this.initFailure(this.problem.message, this.problem.recommendation);
  }

  protected async execute(_context: WorkflowContext): Promise<void> {}

  override toString(): string {
    return this.commandString;
  }
}
