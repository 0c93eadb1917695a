/**
 * `layerflow commands [filter]`: lists the command types a command file
 * may use. `--verbose` adds each command's parameters.
 *
 * @module
 */

import { Command } from "commander";
import { handleCommands } from "../handlers/commandsHandler.js";
import { WorkflowReportPrinter } from "../printers/WorkflowReportPrinter.js";
import { formatJsonOutput } from "../ux/CliJson.js";
import { getCliUx } from "../ux/CliUx.js";

interface CommandsOptions {
  readonly json?: boolean;
}

export function buildCommandsCommand(): Command {
  return new Command("commands")
    .description("List available command types and their parameters")
    .argument("[filter]", "Only list commands whose name contains this text")
    .option("--json", "Write the command list as JSON", false)
    .action((filter: string | undefined, _options: unknown, command: Command) => {
      const options: CommandsOptions = command.optsWithGlobals();
      const commands = handleCommands(filter);

      if (options.json) {
        process.stdout.write(formatJsonOutput({ commands }, { trailingNewline: true }));
        return;
      }

      const ux = getCliUx();
      ux.header(`Commands (${commands.length})`);
      new WorkflowReportPrinter({ verbose: ux.detailed, output: (line) => ux.print(line) }).printCommands(
        commands,
      );
    });
}
