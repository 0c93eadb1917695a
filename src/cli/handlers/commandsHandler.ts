/**
 * Handler for `layerflow commands`: describes every command type the
 * factory knows.
 *
 * @module
 */

import { CommandFactory } from "../../core/commands/CommandFactory.js";

export interface ParameterDescription {
  readonly name: string;
  readonly description: string;
  readonly type: string;
  readonly required: boolean;
  readonly defaultValue?: string;
  readonly allowedValues?: readonly string[];
}

export interface CommandDescription {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ParameterDescription[];
}

/**
 * Lists command types sorted by name, optionally filtered by a
 * case-insensitive substring of the name.
 */
export function handleCommands(
  filter?: string,
  factory: CommandFactory = new CommandFactory(),
): CommandDescription[] {
  const needle = filter?.trim().toLowerCase() ?? "";

  return factory
    .describe()
    .filter((command) => command.name.toLowerCase().includes(needle))
    .map((command) => ({
      name: command.name,
      description: command.description,
      parameters: command.parameterSpecs.map((spec) => ({
        name: spec.name,
        description: spec.description,
        type: spec.type ?? "string",
        required: spec.required ?? false,
        defaultValue: spec.defaultValue,
        allowedValues: spec.allowedValues,
      })),
    }));
}
