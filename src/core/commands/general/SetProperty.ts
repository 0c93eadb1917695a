/**
 * SetProperty(): defines or overwrites a workflow property.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import {
  booleanValue,
  integerValue,
  isWriteOnce,
  listValue,
  pathValue,
  stringValue,
  type PropertyValue,
} from "../../properties/PropertyStore.js";
import { CollisionPolicy } from "../../registry/CollisionPolicy.js";
import { Severity } from "../../status/Severity.js";
import { AbstractCommand } from "../AbstractCommand.js";
import {
  collisionPolicySpec,
  type ParameterSpec,
  type ParameterValues,
} from "../CommandParameters.js";

const PROPERTY_TYPES = ["String", "Path", "Boolean", "Integer", "List"] as const;

export class SetPropertyCommand extends AbstractCommand {
  readonly name = "SetProperty";
  readonly description = "Set a workflow property";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "PropertyName", description: "Property to set", required: true },
    {
      name: "PropertyType",
      description: "Type of the value",
      allowedValues: PROPERTY_TYPES,
      defaultValue: "String",
    },
    { name: "PropertyValue", description: "Value, converted to PropertyType", required: true },
    collisionPolicySpec("IfPropertyExists"),
  ];

  protected override checkParameters(params: ParameterValues): void {
    const name = params.string("PropertyName");
    if (isWriteOnce(name)) {
      this.initFailure(
        `Property ${name} is set when the workflow starts and cannot be changed.`,
        "Use a different PropertyName.",
      );
    }
    if (this.convert(params) === undefined) {
      this.initFailure(
        `The PropertyValue (${params.string("PropertyValue")}) is not a valid ${params.string("PropertyType")}.`,
        `Specify a PropertyValue of type ${params.string("PropertyType")}.`,
      );
    }
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const name = this.params.string("PropertyName");
    const value = this.convert(this.params);
    if (value === undefined) {
      return;
    }

    if (context.properties.has(name)) {
      switch (this.params.policy("IfPropertyExists")) {
        case CollisionPolicy.REPLACE_AND_WARN:
          this.addRunLog(Severity.WARNING, `Property ${name} already existed and was replaced.`);
          break;
        case CollisionPolicy.WARN:
          this.addRunLog(
            Severity.WARNING,
            `Property ${name} already exists and was not replaced.`,
            'Use IfPropertyExists="Replace" to overwrite it.',
          );
          return;
        case CollisionPolicy.FAIL:
          this.addRunLog(
            Severity.FAILURE,
            `Property ${name} already exists.`,
            "Use a different PropertyName.",
          );
          return;
        case CollisionPolicy.REPLACE:
          break;
      }
    }

    context.properties.set(name, value);
  }

  private convert(params: ParameterValues): PropertyValue | undefined {
    const text = params.string("PropertyValue");
    switch (params.string("PropertyType")) {
      case "Boolean":
        return /^(true|false)$/i.test(text.trim()) ? booleanValue(text.trim().toLowerCase() === "true") : undefined;
      case "Integer":
        return /^[+-]?\d+$/.test(text.trim()) ? integerValue(Number(text.trim())) : undefined;
      case "List":
        return listValue(
          text
            .split(",")
            .map((item) => item.trim())
            .filter((item) => item !== ""),
        );
      case "Path":
        return pathValue(text);
      default:
        return stringValue(text);
    }
  }
}
