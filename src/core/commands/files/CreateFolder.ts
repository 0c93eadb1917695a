/**
 * CreateFolder(): creates a folder and any missing parents.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { Severity } from "../../status/Severity.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

export class CreateFolderCommand extends AbstractCommand {
  readonly name = "CreateFolder";
  readonly description = "Create a folder";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "Folder", description: "Folder to create", required: true },
    {
      name: "IfFolderExists",
      description: "Action when the folder already exists",
      allowedValues: ["Ignore", "Warn", "Fail"],
      defaultValue: "Ignore",
    },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const folder = resolvePath(context, this.params.string("Folder"));
    const existing = await fs.stat(folder).catch(() => undefined);

    if (existing) {
      if (!existing.isDirectory()) {
        this.addRunLog(
          Severity.FAILURE,
          `The Folder (${folder}) exists and is not a folder.`,
          "Specify a path that is not an existing file.",
        );
        return;
      }
      switch (this.params.string("IfFolderExists")) {
        case "Warn":
          this.addRunLog(Severity.WARNING, `The Folder (${folder}) already exists.`);
          return;
        case "Fail":
          this.addRunLog(Severity.FAILURE, `The Folder (${folder}) already exists.`, "Specify a new folder.");
          return;
        default:
          return;
      }
    }

    await this.runEffect(`Unable to create folder (${folder}).`, async () => {
      await fs.mkdir(folder, { recursive: true });
    });
  }
}
