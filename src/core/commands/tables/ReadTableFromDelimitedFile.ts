/**
 * ReadTableFromDelimitedFile(): reads a delimited text file into a Table.
 *
 * @module
 */

import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { formatPathTemplate } from "../../properties/PathFormatter.js";
import { AbstractCommand, type DiscoveredOutput } from "../AbstractCommand.js";
import { collisionPolicySpec, type ParameterSpec } from "../CommandParameters.js";

export class ReadTableFromDelimitedFileCommand extends AbstractCommand {
  readonly name = "ReadTableFromDelimitedFile";
  readonly description = "Read a Table from a delimited file";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "InputFile", description: "Delimited file to read", required: true },
    { name: "TableID", description: "ID of the new Table (formatter codes allowed)", defaultValue: "%f" },
    { name: "Delimiter", description: "Column delimiter", defaultValue: "," },
    { name: "CommentLineIndicator", description: "Lines starting with this text are skipped" },
    collisionPolicySpec("IfTableIDExists"),
  ];

  protected override async discoverOutputs(context: WorkflowContext): Promise<readonly DiscoveredOutput[]> {
    return [{ registry: "tables", id: this.tableId(context) }];
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const inputFile = resolvePath(context, this.params.string("InputFile"));
    const id = this.tableId(context);

    const ready = this.checkAll(context, [
      { kind: "fileExists", parameter: "InputFile", path: inputFile },
      {
        kind: "outputIdAvailable",
        parameter: "TableID",
        registry: "tables",
        id,
        policy: this.params.policy("IfTableIDExists"),
      },
    ]);
    if (!ready) {
      return;
    }

    await this.runEffect(`Unable to read Table from delimited file (${inputFile}).`, async () => {
      const data = await context.services.codec.readTable(inputFile, {
        delimiter: this.params.string("Delimiter"),
        comment: this.params.optionalString("CommentLineIndicator"),
      });
      this.registerOutput(
        context.tables,
        id,
        { id, ...data, sourcePath: inputFile },
        this.params.policy("IfTableIDExists"),
      );
    });
  }

  private tableId(context: WorkflowContext): string {
    const inputFile = resolvePath(context, this.params.string("InputFile"));
    return formatPathTemplate(this.params.string("TableID"), inputFile);
  }
}
