/**
 * WritePropertiesToFile(): writes workflow properties to a text file, one
 * `Name=value` line each.
 *
 * `IncludeProperties` entries may use `*`, which matches any run of
 * characters except `/`. Without a SortOrder, properties named exactly in
 * IncludeProperties come first, in the order given, followed by the rest
 * in the order they were set.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import type { PropertyValue } from "../../properties/PropertyStore.js";
import { Severity } from "../../status/Severity.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

export const PropertyFileFormat = {
  NAME_TYPE_VALUE: "NameTypeValue",
  NAME_VALUE: "NameValue",
} as const;

export type PropertyFileFormat = (typeof PropertyFileFormat)[keyof typeof PropertyFileFormat];

function quote(text: string): string {
  return `"${text.replace(/"/g, '\\"')}"`;
}

/**
 * One output line. NameTypeValue keeps lists as lists; NameValue writes
 * them as comma-separated text.
 */
export function formatPropertyLine(name: string, value: PropertyValue, format: PropertyFileFormat): string {
  switch (value.kind) {
    case "string":
    case "path":
      return `${name}=${quote(value.value)}`;
    case "boolean":
      return `${name}=${value.value ? "True" : "False"}`;
    case "integer":
      return `${name}=${value.value}`;
    case "list":
      return format === PropertyFileFormat.NAME_TYPE_VALUE
        ? `${name}=[${value.value.map(quote).join(",")}]`
        : `${name}=${quote(value.value.join(","))}`;
  }
}

function includePattern(include: string): RegExp {
  const escaped = include
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join("[^/]*");
  return new RegExp(`^${escaped}$`);
}

export class WritePropertiesToFileCommand extends AbstractCommand {
  readonly name = "WritePropertiesToFile";
  readonly description = "Write properties to a file";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "OutputFile", description: "File to write", required: true },
    {
      name: "IncludeProperties",
      description: "Properties to write, * matching any characters (default: all)",
      type: "list",
    },
    {
      name: "WriteMode",
      description: "Replace the file or add to its end",
      allowedValues: ["Overwrite", "Append"],
      defaultValue: "Overwrite",
    },
    {
      name: "FileFormat",
      description: "Line format",
      allowedValues: Object.values(PropertyFileFormat),
      defaultValue: PropertyFileFormat.NAME_TYPE_VALUE,
    },
    {
      name: "SortOrder",
      description: "Order of the lines by name (default: include order)",
      allowedValues: ["Ascending", "Descending"],
    },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const outputFile = resolvePath(context, this.params.string("OutputFile"));
    if (!this.checkAll(context, [{ kind: "parentFolderExists", parameter: "OutputFile", path: outputFile }])) {
      return;
    }

    const includes = this.params.list("IncludeProperties");
    const patterns = includes.map(includePattern);
    const matched = new Set<number>();

    const lines: string[] = [];
    for (const [name, value] of this.orderedEntries(context, includes)) {
      const hits = patterns.flatMap((pattern, i) => (pattern.test(name) ? [i] : []));
      if (patterns.length > 0 && hits.length === 0) {
        continue;
      }
      hits.forEach((i) => matched.add(i));
      lines.push(formatPropertyLine(name, value, this.fileFormat()));
    }

    includes.forEach((include, i) => {
      if (!matched.has(i)) {
        this.addRunLog(
          Severity.FAILURE,
          `Unable to match property "${include}" to write.`,
          "Check the IncludeProperties names.",
        );
      }
    });

    const text = lines.map((line) => `${line}\n`).join("");
    const written = await this.runEffect(`Unable to write properties to file (${outputFile}).`, () =>
      this.params.string("WriteMode") === "Append"
        ? fs.appendFile(outputFile, text, "utf8")
        : fs.writeFile(outputFile, text, "utf8"),
    );
    if (written) {
      context.outputFiles.push(outputFile);
    }
  }

  private fileFormat(): PropertyFileFormat {
    return this.params.string("FileFormat") === PropertyFileFormat.NAME_VALUE
      ? PropertyFileFormat.NAME_VALUE
      : PropertyFileFormat.NAME_TYPE_VALUE;
  }

  private orderedEntries(context: WorkflowContext, includes: readonly string[]): [string, PropertyValue][] {
    const entries = context.properties.entries();
    const sortOrder = this.params.optionalString("SortOrder");
    if (sortOrder !== undefined) {
      entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      return sortOrder === "Descending" ? entries.reverse() : entries;
    }

    const named = includes.filter((include) => !include.includes("*"));
    const first = named.flatMap((name) => entries.filter(([n]) => n === name));
    return [...new Map([...first, ...entries]).entries()];
  }
}
