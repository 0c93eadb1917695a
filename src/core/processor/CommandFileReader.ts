/**
 * Reads command files into command lists.
 *
 * A command file is UTF-8 text with one command per line. A leading BOM
 * and CRLF line endings are accepted.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import type { AbstractCommand } from "../commands/AbstractCommand.js";
import { CommandFactory } from "../commands/CommandFactory.js";
import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

/**
 * Splits file content into lines. A trailing newline does not produce an
 * extra blank line.
 */
export function splitCommandLines(content: string): string[] {
  const text = content.startsWith("\uFEFF") ? content.slice(1) : content;
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Reads the lines of a command file.
 *
 * @throws WorkflowError WORKFLOW_FILE_NOT_FOUND or WORKFLOW_READ_FAILED
 */
export async function readCommandFile(filePath: string): Promise<string[]> {
  try {
    return splitCommandLines(await fs.readFile(filePath, "utf8"));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    const missing = "code" in cause && cause.code === "ENOENT";
    throw new WorkflowError(
      missing ? "Command file not found" : "Failed to read command file",
      missing ? ErrorCode.WORKFLOW_FILE_NOT_FOUND : ErrorCode.WORKFLOW_READ_FAILED,
      { path: filePath, reason: cause.message },
      undefined,
      missing ? `Check that ${filePath} exists.` : undefined,
      cause,
    );
  }
}

/**
 * Reads a command file and builds one command per line.
 */
export async function loadCommandFile(
  filePath: string,
  factory: CommandFactory = new CommandFactory(),
): Promise<AbstractCommand[]> {
  const lines = await readCommandFile(filePath);
  return lines.map((line) => factory.create(line));
}
