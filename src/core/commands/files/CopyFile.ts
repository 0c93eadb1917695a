/**
 * CopyFile(): copies a file.
 *
 * DestinationFile may use path formatter codes, which are applied to the
 * resolved SourceFile, e.g. `DestinationFile="backup/%f_copy%E"`.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { formatPathTemplate, unknownFormatterCodes } from "../../properties/PathFormatter.js";
import { AbstractCommand } from "../AbstractCommand.js";
import {
  missingActionSpec,
  responseForMissing,
  type ParameterSpec,
  type ParameterValues,
} from "../CommandParameters.js";

export class CopyFileCommand extends AbstractCommand {
  readonly name = "CopyFile";
  readonly description = "Copy a file";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "SourceFile", description: "File to copy", required: true },
    { name: "DestinationFile", description: "Copy to create (formatter codes allowed)", required: true },
    missingActionSpec("IfSourceFileNotFound", "Fail"),
  ];

  protected override checkParameters(params: ParameterValues): void {
    const unknown = unknownFormatterCodes(params.string("DestinationFile"));
    if (unknown.length > 0) {
      this.initFailure(
        `The DestinationFile (${params.string("DestinationFile")}) uses unknown formatter code(s) ${unknown.join(", ")}.`,
        "Use only %F, %f, %P, %p, %E or %%.",
      );
    }
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const source = resolvePath(context, this.params.string("SourceFile"));
    const destination = resolvePath(
      context,
      formatPathTemplate(this.params.string("DestinationFile"), source),
    );
    const response = responseForMissing(this.params.string("IfSourceFileNotFound"));
    if (response === undefined && !(await isFile(source))) {
      return;
    }

    const ready = this.checkAll(context, [
      response !== undefined && {
        check: { kind: "fileExists", parameter: "SourceFile", path: source },
        response,
      },
      { kind: "parentFolderExists", parameter: "DestinationFile", path: destination },
    ]);
    if (!ready) {
      return;
    }

    const copied = await this.runEffect(
      `Unable to copy file (${source}) to (${destination}).`,
      () => fs.copyFile(source, destination),
    );
    if (copied) {
      context.outputFiles.push(destination);
    }
  }
}

async function isFile(filePath: string): Promise<boolean> {
  return fs.stat(filePath).then(
    (stat) => stat.isFile(),
    () => false,
  );
}
