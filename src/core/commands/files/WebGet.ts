/**
 * WebGet(): downloads a URL to a file.
 *
 * @module
 */

import * as path from "node:path";
import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { stringValue } from "../../properties/PropertyStore.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec, ParameterValues } from "../CommandParameters.js";

/**
 * Last path segment of a URL, or "index.html" for a bare host.
 */
export function urlFileName(url: string): string {
  try {
    const name = path.posix.basename(new URL(url).pathname);
    return name === "" ? "index.html" : decodeURIComponent(name);
  } catch {
    return "index.html";
  }
}

export class WebGetCommand extends AbstractCommand {
  readonly name = "WebGet";
  readonly description = "Download a file from a URL";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "URL", description: "http, https or ftp URL", required: true },
    { name: "OutputFile", description: "File to write (default: the URL's file name in WorkingDir)" },
    { name: "StatusCodeProperty", description: "Property receiving the HTTP status" },
  ];

  protected override checkParameters(params: ParameterValues): void {
    this.rejectWriteOnceProperty(params, "StatusCodeProperty");
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const url = this.params.string("URL");
    const output = resolvePath(context, this.params.optionalString("OutputFile") ?? urlFileName(url));

    const ready = this.checkAll(context, [
      { kind: "urlValid", parameter: "URL", value: url },
      { kind: "parentFolderExists", parameter: "OutputFile", path: output },
    ]);
    if (!ready) {
      return;
    }

    await this.runEffect(`Unable to download (${url}) to (${output}).`, async () => {
      const result = await context.services.downloads.download(url, output);
      context.outputFiles.push(output);
      this.logger?.debug("Downloaded", { url, bytes: result.bytes });
      const property = this.params.optionalString("StatusCodeProperty");
      if (property) {
        context.properties.set(property, stringValue(String(result.status)));
      }
    });
  }
}
