/**
 * Textual command format.
 *
 * ```text
 * CommandName(Param1="value1",Param2="value2")
 * ```
 *
 * The parameter list is the text between the first `(` and the final `)`.
 * Values are double-quoted; commas, `=` and parentheses inside quotes are
 * part of the value, and `\"` stands for a literal quote.
 *
 * @module
 */

import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { RawParameters } from "./CommandParameters.js";

export interface ParsedCommand {
  readonly name: string;
  readonly parameters: RawParameters;
  /** Leading whitespace, kept when rendering */
  readonly indent: string;
}

function syntaxError(message: string, text: string, hint: string): WorkflowError {
  return new WorkflowError(message, ErrorCode.COMMAND_SYNTAX_INVALID, { commandString: text }, undefined, hint);
}

/**
 * Splits on commas that are not inside double quotes.
 */
function splitParameters(parameterText: string): string[] {
  const parts: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < parameterText.length; i++) {
    const ch = parameterText[i];
    if (ch === "\\" && parameterText[i + 1] === '"') {
      current += '\\"';
      i++;
      continue;
    }
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (ch === "," && !inQuotes) {
      parts.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  parts.push(current);

  return parts.map((p) => p.trim()).filter((p) => p !== "");
}

function unquote(value: string): string {
  const inner = value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
  return inner.replace(/\\"/g, '"');
}

/**
 * Parses one command line.
 *
 * @throws WorkflowError (COMMAND_SYNTAX_INVALID) for a malformed line
 */
export function parseCommandString(text: string): ParsedCommand {
  const indent = /^\s*/.exec(text)?.[0] ?? "";
  const trimmed = text.trim();
  const open = trimmed.indexOf("(");

  if (open < 0) {
    throw syntaxError(
      `Command "${trimmed}" has no parameter list`,
      text,
      `Write the command as ${trimmed}() even when it has no parameters.`,
    );
  }
  if (!trimmed.endsWith(")")) {
    throw syntaxError(
      "Command is missing the closing parenthesis",
      text,
      "End the command with ).",
    );
  }

  const name = trimmed.slice(0, open).trim();
  const parameters: (readonly [string, string])[] = [];

  for (const part of splitParameters(trimmed.slice(open + 1, -1))) {
    const equals = part.indexOf("=");
    if (equals <= 0) {
      throw syntaxError(
        `Parameter "${part}" is not in Name="value" form`,
        text,
        'Write each parameter as Name="value".',
      );
    }
    parameters.push([part.slice(0, equals).trim(), unquote(part.slice(equals + 1).trim())]);
  }

  return { name, parameters, indent };
}

/**
 * Renders a command line. Empty values are omitted.
 */
export function renderCommandString(name: string, parameters: RawParameters, indent = ""): string {
  const rendered = parameters
    .filter(([, value]) => value !== "")
    .map(([key, value]) => `${key}="${value.replace(/"/g, '\\"')}"`);
  return `${indent}${name}(${rendered.join(",")})`;
}
