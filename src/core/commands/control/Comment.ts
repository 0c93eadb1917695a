/**
 * Lines that carry no work: comments, blank lines and comment-block markers.
 *
 * The processor recognizes these and never validates or runs them.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

abstract class NoOpCommand extends AbstractCommand {
  readonly parameterSpecs: readonly ParameterSpec[] = [];
  protected override readonly strictParameters = false;

  protected async execute(_context: WorkflowContext): Promise<void> {}

  override toString(): string {
    return this.commandString;
  }
}

export class CommentCommand extends NoOpCommand {
  readonly name = "#";
  readonly description = "Comment line";
}

export class BlankCommand extends NoOpCommand {
  readonly name = "Blank";
  readonly description = "Empty line";

  constructor(commandString: string) {
    super({ commandString, parameters: [] });
  }
}

export class CommentBlockStartCommand extends NoOpCommand {
  readonly name = "/*";
  readonly description = "Start of a comment block";
}

export class CommentBlockEndCommand extends NoOpCommand {
  readonly name = "*/";
  readonly description = "End of a comment block";
}

export function isNoOpCommand(command: AbstractCommand): boolean {
  return command instanceof NoOpCommand;
}
