/**
 * WriteTableToDelimitedFile(): writes a Table to a delimited text file.
 *
 * @module
 */

import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

export class WriteTableToDelimitedFileCommand extends AbstractCommand {
  readonly name = "WriteTableToDelimitedFile";
  readonly description = "Write a Table to a delimited file";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "TableID", description: "Table to write", required: true },
    { name: "OutputFile", description: "File to write", required: true },
    { name: "Delimiter", description: "Column delimiter", defaultValue: "," },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const id = this.params.string("TableID");
    const outputFile = resolvePath(context, this.params.string("OutputFile"));

    const ready = this.checkAll(context, [
      { kind: "idExists", parameter: "TableID", registry: "tables", id },
      { kind: "parentFolderExists", parameter: "OutputFile", path: outputFile },
    ]);
    const table = context.tables.get(id);
    if (!ready || !table) {
      return;
    }

    const written = await this.runEffect(
      `Unable to write Table (${id}) to delimited file (${outputFile}).`,
      () => context.services.codec.writeTable(table, outputFile, { delimiter: this.params.string("Delimiter") }),
    );
    if (written) {
      context.outputFiles.push(outputFile);
    }
  }
}
