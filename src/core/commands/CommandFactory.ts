/**
 * Builds command instances from command file lines.
 *
 * Names are matched case-insensitively. Lines that cannot be parsed, or
 * that name no known command, become an UnknownCommand so the processor
 * can report them in place.
 *
 * @module
 */

import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { AbstractCommand, CommandInit } from "./AbstractCommand.js";
import { parseCommandString } from "./CommandString.js";
import {
  BlankCommand,
  CommentBlockEndCommand,
  CommentBlockStartCommand,
  CommentCommand,
} from "./control/Comment.js";
import { EndForCommand, ForCommand } from "./control/For.js";
import { EndIfCommand, IfCommand } from "./control/If.js";
import { UnknownCommand } from "./control/UnknownCommand.js";
import { CloseDataStoreCommand, OpenDataStoreCommand } from "./datastores/OpenDataStore.js";
import { CopyFileCommand } from "./files/CopyFile.js";
import { CreateFolderCommand } from "./files/CreateFolder.js";
import { ListFilesCommand } from "./files/ListFiles.js";
import { RemoveFileCommand } from "./files/RemoveFile.js";
import { RunProgramCommand } from "./files/RunProgram.js";
import { UnzipFileCommand } from "./files/UnzipFile.js";
import { WebGetCommand } from "./files/WebGet.js";
import { MessageCommand } from "./general/Message.js";
import { SetPropertyCommand } from "./general/SetProperty.js";
import { WriteCommandSummaryToFileCommand } from "./general/WriteCommandSummaryToFile.js";
import { WritePropertiesToFileCommand } from "./general/WritePropertiesToFile.js";
import { ClipGeoLayerCommand } from "./geolayers/ClipGeoLayer.js";
import { CopyGeoLayerCommand } from "./geolayers/CopyGeoLayer.js";
import { FreeGeoLayersCommand } from "./geolayers/FreeGeoLayers.js";
import { MergeGeoLayersCommand } from "./geolayers/MergeGeoLayers.js";
import { ReadGeoLayerFromGeoJSONCommand } from "./geolayers/ReadGeoLayerFromGeoJSON.js";
import { SetGeoLayerCRSCommand } from "./geolayers/SetGeoLayerCRS.js";
import { SimplifyGeoLayerGeometryCommand } from "./geolayers/SimplifyGeoLayerGeometry.js";
import { WriteGeoLayerToGeoJSONCommand } from "./geolayers/WriteGeoLayerToGeoJSON.js";
import { RunCommandsCommand } from "./running/RunCommands.js";
import { ReadTableFromDelimitedFileCommand } from "./tables/ReadTableFromDelimitedFile.js";
import { WriteTableToDelimitedFileCommand } from "./tables/WriteTableToDelimitedFile.js";

export type CommandConstructor = new (init: CommandInit) => AbstractCommand;

const COMMANDS: readonly CommandConstructor[] = [
  IfCommand,
  EndIfCommand,
  ForCommand,
  EndForCommand,
  SetPropertyCommand,
  MessageCommand,
  WritePropertiesToFileCommand,
  WriteCommandSummaryToFileCommand,
  RunCommandsCommand,
  CreateFolderCommand,
  CopyFileCommand,
  RemoveFileCommand,
  ListFilesCommand,
  UnzipFileCommand,
  WebGetCommand,
  RunProgramCommand,
  ReadGeoLayerFromGeoJSONCommand,
  WriteGeoLayerToGeoJSONCommand,
  CopyGeoLayerCommand,
  FreeGeoLayersCommand,
  ClipGeoLayerCommand,
  MergeGeoLayersCommand,
  SimplifyGeoLayerGeometryCommand,
  SetGeoLayerCRSCommand,
  ReadTableFromDelimitedFileCommand,
  WriteTableToDelimitedFileCommand,
  OpenDataStoreCommand,
  CloseDataStoreCommand,
];

const EMPTY_INIT: CommandInit = { commandString: "", parameters: [] };

export class CommandFactory {
  private readonly byName = new Map<string, CommandConstructor>();

  constructor(commands: readonly CommandConstructor[] = COMMANDS) {
    for (const ctor of commands) {
      this.byName.set(new ctor(EMPTY_INIT).name.toLowerCase(), ctor);
    }
  }

  /**
   * Prototype instances of every known command, sorted by name. Used to
   * list names, descriptions and parameters.
   */
  describe(): AbstractCommand[] {
    return [...this.byName.values()]
      .map((ctor) => new ctor(EMPTY_INIT))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Creates the command for one line of a command file.
   */
  create(line: string): AbstractCommand {
    const trimmed = line.trim();
    const bare: CommandInit = { commandString: line, parameters: [] };

    if (trimmed === "") return new BlankCommand(line);
    if (trimmed.startsWith("#")) return new CommentCommand(bare);
    if (trimmed.startsWith("/*")) return new CommentBlockStartCommand(bare);
    if (trimmed.startsWith("*/")) return new CommentBlockEndCommand(bare);

    let parsed: ReturnType<typeof parseCommandString>;
    try {
      parsed = parseCommandString(line);
    } catch (error) {
      if (error instanceof WorkflowError && error.code === ErrorCode.COMMAND_SYNTAX_INVALID) {
        const name = trimmed.split("(")[0].trim() || "Unknown";
        return new UnknownCommand(bare, name, { message: error.message, hint: error.hint });
      }
      throw error;
    }

    const init: CommandInit = {
      commandString: line,
      parameters: parsed.parameters,
      indent: parsed.indent,
    };
    const ctor = this.byName.get(parsed.name.toLowerCase());
    return ctor ? new ctor(init) : new UnknownCommand(init, parsed.name);
  }
}
