/**
 * If() / EndIf() blocks.
 *
 * The processor pairs each If with the EndIf of the same Name and skips
 * the block body when the condition is false. A command only reports the
 * problems it can see itself: a bad condition, or a missing partner.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import { Severity } from "../../status/Severity.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";
import { evaluateCondition } from "./Condition.js";

export class IfCommand extends AbstractCommand {
  readonly name = "If";
  readonly description = "Run the following commands when a condition is true";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "Name", description: "Block name, matched by EndIf", required: true },
    { name: "Condition", description: "Value1 Operator Value2, or True/False", required: true },
    {
      name: "CompareAsStrings",
      description: "Compare numeric-looking operands as text",
      type: "boolean",
      defaultValue: "False",
    },
  ];

  /** Set by the processor when an EndIf with the same Name follows */
  matched = false;

  private result = false;

  /** Condition value from the last run; false when it could not be evaluated */
  get conditionResult(): boolean {
    return this.result;
  }

  protected async execute(_context: WorkflowContext): Promise<void> {
    this.result = false;
    const blockName = this.params.string("Name");

    if (!this.matched) {
      this.addRunLog(
        Severity.FAILURE,
        `If (${blockName}) does not have a matching EndIf.`,
        `Add EndIf(Name="${blockName}") after the block.`,
      );
    }

    const evaluated = evaluateCondition(
      this.params.string("Condition"),
      this.params.boolean("CompareAsStrings"),
    );
    if (!evaluated.ok) {
      this.addRunLog(Severity.FAILURE, evaluated.message, "Correct the Condition parameter.");
      return;
    }
    this.result = evaluated.value;
  }
}

export class EndIfCommand extends AbstractCommand {
  readonly name = "EndIf";
  readonly description = "End of an If block";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "Name", description: "Name of the If being closed", required: true },
  ];

  matched = false;

  protected async execute(_context: WorkflowContext): Promise<void> {
    if (!this.matched) {
      const blockName = this.params.string("Name");
      this.addRunLog(
        Severity.FAILURE,
        `EndIf (${blockName}) does not have a matching If.`,
        `Add If(Name="${blockName}",...) before the EndIf or remove the EndIf.`,
      );
    }
  }
}
