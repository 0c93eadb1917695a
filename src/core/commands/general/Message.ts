/**
 * Message(): writes a message to the log, optionally as a warning or
 * failure of the command.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import { Severity } from "../../status/Severity.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

export class MessageCommand extends AbstractCommand {
  readonly name = "Message";
  readonly description = "Print a message";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "Message", description: "Text to print", required: true },
    {
      name: "CommandStatus",
      description: "Status given to the command",
      allowedValues: [Severity.SUCCESS, Severity.WARNING, Severity.FAILURE],
      defaultValue: Severity.SUCCESS,
    },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const message = this.params.string("Message");
    const status = this.params.string("CommandStatus");

    if (status === Severity.WARNING || status === Severity.FAILURE) {
      this.addRunLog(status, message);
    } else {
      context.logger.info(message, { command: this.name });
    }
  }
}
