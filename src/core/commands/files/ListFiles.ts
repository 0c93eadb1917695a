/**
 * ListFiles(): stores the names of matching folder entries in a list
 * property.
 *
 * @module
 */

import fg from "fast-glob";
import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { listValue } from "../../properties/PropertyStore.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec, ParameterValues } from "../CommandParameters.js";

export class ListFilesCommand extends AbstractCommand {
  readonly name = "ListFiles";
  readonly description = "List the files and folders in a folder";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "Folder", description: "Folder to list", required: true },
    { name: "IncludePatterns", description: "Glob patterns to include", type: "list", defaultValue: "*" },
    { name: "ExcludePatterns", description: "Glob patterns to exclude", type: "list" },
    { name: "ListProperty", description: "List property receiving the names", required: true },
    { name: "ListFiles", description: "Include files", type: "boolean", defaultValue: "True" },
    { name: "ListFolders", description: "Include folders", type: "boolean", defaultValue: "False" },
  ];

  protected override checkParameters(params: ParameterValues): void {
    if (!params.boolean("ListFiles") && !params.boolean("ListFolders")) {
      this.initFailure(
        "Both ListFiles and ListFolders are False; nothing would be listed.",
        "Set ListFiles or ListFolders to True.",
      );
    }
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const folder = resolvePath(context, this.params.string("Folder"));
    const listFiles = this.params.boolean("ListFiles");
    const listFolders = this.params.boolean("ListFolders");

    if (!this.checkAll(context, [{ kind: "folderExists", parameter: "Folder", path: folder }])) {
      return;
    }

    await this.runEffect(`Unable to list folder (${folder}).`, async () => {
      const entries = await fg([...this.params.list("IncludePatterns")], {
        cwd: folder,
        ignore: [...this.params.list("ExcludePatterns")],
        onlyFiles: listFiles && !listFolders,
        onlyDirectories: listFolders && !listFiles,
        dot: false,
        deep: 1,
      });
      context.properties.set(this.params.string("ListProperty"), listValue(entries.sort()));
    });
  }
}
