/**
 * For() / EndFor() loops.
 *
 * For() computes the values to iterate over; the processor runs the body
 * once per value after binding it to the iterator property.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import {
  integerValue,
  isWriteOnce,
  stringValue,
  type PropertyStore,
} from "../../properties/PropertyStore.js";
import { Severity } from "../../status/Severity.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec, ParameterValues } from "../CommandParameters.js";

const NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export class ForCommand extends AbstractCommand {
  readonly name = "For";
  readonly description = "Repeat the commands up to the matching EndFor";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "Name", description: "Loop name, matched by EndFor", required: true },
    { name: "IteratorProperty", description: "Property set to each value (default: Name)" },
    { name: "List", description: "Comma-separated values", type: "list" },
    { name: "ListProperty", description: "Property holding the values" },
    { name: "SequenceStart", description: "First value of a numeric sequence" },
    { name: "SequenceEnd", description: "Last value of a numeric sequence" },
    { name: "SequenceIncrement", description: "Sequence step (default: 1)" },
  ];

  matched = false;

  private values: readonly string[] = [];

  /** Values computed by the last run */
  get iterationValues(): readonly string[] {
    return this.values;
  }

  /**
   * Sets the iterator property for one pass through the body.
   */
  bindIterator(properties: PropertyStore, value: string): void {
    const name = this.params.optionalString("IteratorProperty") ?? this.params.string("Name");
    properties.set(name, /^[+-]?\d+$/.test(value) ? integerValue(Number(value)) : stringValue(value));
  }

  protected override checkParameters(params: ParameterValues): void {
    const iterator = params.optionalString("IteratorProperty") ?? params.string("Name");
    if (isWriteOnce(iterator)) {
      this.initFailure(
        `The iterator property ${iterator} is set when the workflow starts and cannot be changed.`,
        "Specify a different IteratorProperty.",
      );
    }

    const sources = [params.has("List"), params.has("ListProperty"), params.has("SequenceStart")].filter(
      Boolean,
    ).length;
    if (sources !== 1) {
      this.initFailure(
        "For requires exactly one of List, ListProperty or SequenceStart.",
        "Specify the values with one of List, ListProperty or SequenceStart.",
      );
    }

    if (!params.has("SequenceStart")) {
      return;
    }
    for (const name of ["SequenceStart", "SequenceEnd", "SequenceIncrement"]) {
      const value = params.optionalString(name);
      if (value !== undefined && !NUMBER.test(value.trim())) {
        this.initFailure(`The ${name} parameter value (${value}) is not a number.`, `Specify a number for ${name}.`);
      }
    }
    if (!params.has("SequenceEnd")) {
      this.initFailure("Required SequenceEnd parameter has no value.", "Specify the SequenceEnd parameter.");
    }
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    this.values = [];
    const loopName = this.params.string("Name");

    if (!this.matched) {
      this.addRunLog(
        Severity.FAILURE,
        `For (${loopName}) does not have a matching EndFor.`,
        `Add EndFor(Name="${loopName}") after the loop body.`,
      );
      return;
    }

    if (this.params.has("List")) {
      this.values = this.params.list("List");
    } else if (this.params.has("ListProperty")) {
      this.values = this.valuesFromProperty(context, this.params.string("ListProperty"));
    } else {
      this.values = this.sequence();
    }
  }

  private valuesFromProperty(context: WorkflowContext, name: string): readonly string[] {
    const property = context.properties.get(name, undefined);
    if (property === undefined) {
      this.addRunLog(
        Severity.FAILURE,
        `ListProperty (${name}) is not a defined property.`,
        "Set the property before the For command.",
      );
      return [];
    }
    if (property.kind === "list") {
      return property.value;
    }
    if (property.kind === "string" || property.kind === "path") {
      return property.value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item !== "");
    }
    return [String(property.value)];
  }

  private sequence(): readonly string[] {
    const start = Number(this.params.string("SequenceStart"));
    const end = Number(this.params.string("SequenceEnd"));
    const increment = Number(this.params.optionalString("SequenceIncrement") ?? "1");

    if (increment === 0 || (end - start) * increment < 0) {
      this.addRunLog(
        Severity.FAILURE,
        `SequenceIncrement (${increment}) does not lead from ${start} to ${end}.`,
        "Specify a non-zero SequenceIncrement with the sign of SequenceEnd - SequenceStart.",
      );
      return [];
    }

    const values: string[] = [];
    const steps = Math.floor((end - start) / increment + 1e-9);
    for (let k = 0; k <= steps; k++) {
      values.push(String(Number((start + k * increment).toFixed(10))));
    }
    return values;
  }
}

export class EndForCommand extends AbstractCommand {
  readonly name = "EndFor";
  readonly description = "End of a For loop";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "Name", description: "Name of the For being closed", required: true },
  ];

  matched = false;

  protected async execute(_context: WorkflowContext): Promise<void> {
    if (!this.matched) {
      const loopName = this.params.string("Name");
      this.addRunLog(
        Severity.FAILURE,
        `EndFor (${loopName}) does not have a matching For.`,
        `Add For(Name="${loopName}",...) before the EndFor or remove the EndFor.`,
      );
    }
  }
}
