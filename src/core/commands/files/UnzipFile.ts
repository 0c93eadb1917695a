/**
 * UnzipFile(): extracts a zip or tar archive.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

export class UnzipFileCommand extends AbstractCommand {
  readonly name = "UnzipFile";
  readonly description = "Extract a .zip, .tar, .tar.gz or .tgz archive";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "File", description: "Archive to extract", required: true },
    { name: "OutputFolder", description: "Destination folder (default: the archive's folder)" },
    {
      name: "DeleteFile",
      description: "Remove the archive after extracting",
      type: "boolean",
      defaultValue: "False",
    },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const archive = resolvePath(context, this.params.string("File"));
    const output = resolvePath(context, this.params.optionalString("OutputFolder") ?? path.dirname(archive));
    const { extensions } = context.services.archives;
    const lower = archive.toLowerCase();
    const suffix = extensions.find((ext) => lower.endsWith(ext)) ?? path.extname(lower);

    const ready = this.checkAll(context, [
      { kind: "fileExists", parameter: "File", path: archive },
      { kind: "valueInSet", parameter: "File extension", value: suffix, allowed: extensions, ignoreCase: true },
    ]);
    if (!ready) {
      return;
    }

    const extracted = await this.runEffect(`Unable to extract archive (${archive}).`, () =>
      context.services.archives.extract(archive, output),
    );
    if (extracted && this.params.boolean("DeleteFile")) {
      await this.runEffect(`Unable to delete archive (${archive}).`, () => fs.rm(archive));
    }
  }
}
