#!/usr/bin/env node
import { Command } from "commander";
import { buildCheckCommand } from "./commands/check.js";
import { buildCommandsCommand } from "./commands/commands.js";
import { buildRunCommand } from "./commands/run.js";
import { ErrorPresenter, exitCodeFor } from "./errors/ErrorPresenter.js";
import { formatJsonError } from "./ux/CliJson.js";
import { createCliUx, parseUxLevel, setDefaultCliUx } from "./ux/CliUx.js";
import { VERSION } from "./version.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function main(): Promise<void> {
  const program = new Command()
    .name("layerflow")
    .description("layerflow - run command-file workflows over GeoLayers, tables and files")
    .version(VERSION)
    .option("--verbose", "Show additional context and details", false)
    .option("--debug", "Show all output including debug traces", false)
    .option("--silent", "Suppress all output except errors", false)
    .option("-c, --config <file>", "Configuration file (default: ./layerflow.yaml)")
    .option("-p, --property <Name=Value>", "Set an initial workflow property (repeatable)", collect, [])
    .option("--log-file <file>", "Write structured logs to this file");

  // Set up CliUx before any command runs
  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    setDefaultCliUx(
      createCliUx({
        level: parseUxLevel({
          verbose: opts.verbose === true,
          debug: opts.debug === true,
          silent: opts.silent === true,
        }),
      }),
    );
  });

  program.addCommand(buildRunCommand());
  program.addCommand(buildCheckCommand());
  program.addCommand(buildCommandsCommand());

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const debug = program.opts().debug === true;
    const json = process.argv.includes("--json");

    if (json) {
      process.stdout.write(formatJsonError(err, { debug, trailingNewline: true }));
      process.exitCode = exitCodeFor(err);
      return;
    }
    process.exitCode = new ErrorPresenter({ debug }).present(err);
  }
}

await main();
