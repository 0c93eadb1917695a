/**
 * RemoveFile(): deletes a file.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { AbstractCommand } from "../AbstractCommand.js";
import { missingActionSpec, responseForMissing, type ParameterSpec } from "../CommandParameters.js";

export class RemoveFileCommand extends AbstractCommand {
  readonly name = "RemoveFile";
  readonly description = "Remove a file";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "SourceFile", description: "File to remove", required: true },
    missingActionSpec("IfSourceFileNotFound"),
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const source = resolvePath(context, this.params.string("SourceFile"));
    const response = responseForMissing(this.params.string("IfSourceFileNotFound"));

    if (response === undefined) {
      await this.runEffect(`Unable to remove file (${source}).`, () => fs.rm(source, { force: true }));
      return;
    }

    const ready = this.checkAll(context, [
      { check: { kind: "fileExists", parameter: "SourceFile", path: source }, response },
    ]);
    if (ready) {
      await this.runEffect(`Unable to remove file (${source}).`, () => fs.rm(source));
    }
  }
}
