/**
 * RunProgram(): runs a command line through the shell.
 *
 * @module
 */

import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { BuiltinProperty, stringValue } from "../../properties/PropertyStore.js";
import { Severity } from "../../status/Severity.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec, ParameterValues } from "../CommandParameters.js";

export class RunProgramCommand extends AbstractCommand {
  readonly name = "RunProgram";
  readonly description = "Run an external program";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "CommandLine", description: "Program and arguments", required: true },
    { name: "WorkingFolder", description: "Folder to run in (default: WorkingDir)" },
    {
      name: "Timeout",
      description: "Seconds before the program is stopped (0: none)",
      type: "integer",
      defaultValue: "0",
    },
    {
      name: "EnvironmentVariables",
      description: "Name=Value pairs added to the environment",
      type: "list",
    },
    { name: "OutputProperty", description: "Property receiving standard output" },
    {
      name: "IfNonZeroExitCode",
      description: "Action when the program exits with a non-zero code",
      allowedValues: ["Ignore", "Warn", "Fail"],
      defaultValue: "Fail",
    },
  ];

  protected override checkParameters(params: ParameterValues): void {
    if (params.integer("Timeout") < 0) {
      this.initFailure(
        `The Timeout (${params.integer("Timeout")}) must be 0 or more.`,
        "Specify a Timeout of 0 or more seconds.",
      );
    }
    for (const pair of params.list("EnvironmentVariables")) {
      if (pair.indexOf("=") <= 0) {
        this.initFailure(
          `EnvironmentVariables entry "${pair}" is not in Name=Value form.`,
          "Write each entry as Name=Value.",
        );
      }
    }
    this.rejectWriteOnceProperty(params, "OutputProperty");
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const folder = resolvePath(
      context,
      this.params.optionalString("WorkingFolder") ??
        context.properties.getText(BuiltinProperty.WORKING_DIR) ??
        process.cwd(),
    );

    if (!this.checkAll(context, [{ kind: "folderExists", parameter: "WorkingFolder", path: folder }])) {
      return;
    }

    const env = Object.fromEntries(
      this.params.list("EnvironmentVariables").map((pair) => {
        const equals = pair.indexOf("=");
        return [pair.slice(0, equals), pair.slice(equals + 1)];
      }),
    );
    const commandLine = this.params.string("CommandLine");

    await this.runEffect(`Unable to run program (${commandLine}).`, async () => {
      const result = await context.services.programs.run(commandLine, {
        cwd: folder,
        env,
        timeoutMs: this.params.integer("Timeout") * 1000,
      });
      this.logger?.debug("Program finished", { exitCode: result.exitCode, stderr: result.stderr });

      const property = this.params.optionalString("OutputProperty");
      if (property) {
        context.properties.set(property, stringValue(result.stdout.trim()));
      }

      if (result.timedOut) {
        this.addRunLog(
          Severity.FAILURE,
          `Program (${commandLine}) did not finish within ${this.params.integer("Timeout")} seconds.`,
          "Increase the Timeout or check the program.",
        );
        return;
      }

      const action = this.params.string("IfNonZeroExitCode");
      if (result.exitCode !== 0 && action !== "Ignore") {
        this.addRunLog(
          action === "Warn" ? Severity.WARNING : Severity.FAILURE,
          `Program (${commandLine}) exited with code ${result.exitCode}.`,
          "Check the program output in the log file.",
        );
      }
    });
  }
}
