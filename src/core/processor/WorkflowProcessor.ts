/**
 * Runs a list of commands in order against a fresh WorkflowContext.
 *
 * ## Execution model
 *
 * ```
 * for each command (in list order):
 *   ├── comment, blank line or inside /* ... *\/  → skipped, not counted
 *   ├── validate(raw, properties)
 *   │     └── validationFailed → failure recorded, continue
 *   ├── run(context)
 *   │     └── warningCount > 0 → failure recorded, continue
 *   └── thrown error → RUN FAILURE record, failure recorded, continue
 * ```
 *
 * If blocks whose condition is false are skipped up to their EndIf; For
 * loops run their body once per value. A command inside a loop is reset
 * before each pass.
 *
 * The processor never stops early and never runs two commands at once.
 * RunCommands() runs another command file through a nested processor
 * that shares this one's services, logger and initial properties.
 *
 * @module
 */

import * as path from "node:path";
import {
  CommandState,
  type AbstractCommand,
  type DiscoveredOutput,
  type RunOutcome,
  type ValidateOutcome,
} from "../commands/AbstractCommand.js";
import {
  CommentBlockEndCommand,
  CommentBlockStartCommand,
  isNoOpCommand,
} from "../commands/control/Comment.js";
import { EndForCommand, ForCommand } from "../commands/control/For.js";
import { EndIfCommand, IfCommand } from "../commands/control/If.js";
import {
  createWorkflowContext,
  type CommandFileRun,
  type CreateWorkflowContextOptions,
  type WorkflowContext,
} from "../context/WorkflowContext.js";
import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { Step } from "../logging/Step.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import { maxSeverity, Severity } from "../status/Severity.js";
import { loadCommandFile } from "./CommandFileReader.js";

// =============================================================================
// Types
// =============================================================================

/**
 * What happened to one processed command.
 */
export type CommandOutcome =
  | Extract<ValidateOutcome, { kind: "validationFailed" }>
  | RunOutcome
  | { readonly kind: "error"; readonly error: Error };

export interface CommandFailure {
  /** Zero-based position in the command list */
  readonly index: number;
  readonly commandName: string;
  readonly commandString: string;
  readonly error: Error;
}

export interface RunSummary {
  /** Commands validated (and run when READY), counting every loop pass */
  readonly executed: number;
  readonly failed: number;
  readonly failures: readonly CommandFailure[];
  /** Highest severity over all processed commands */
  readonly severity: Severity;
}

export interface CommandDiscovery {
  readonly index: number;
  readonly commandName: string;
  readonly commandString: string;
  readonly validation: ValidateOutcome;
  readonly outputs: readonly DiscoveredOutput[];
}

export interface DiscoverySummary {
  readonly commands: readonly CommandDiscovery[];
  /** Commands whose validation failed */
  readonly failed: number;
}

export interface ProcessorListener {
  commandStarted?(index: number, total: number, command: AbstractCommand): void;
  commandCompleted?(index: number, total: number, command: AbstractCommand, outcome: CommandOutcome): void;
}

export interface WorkflowProcessorOptions extends CreateWorkflowContextOptions {
  /** Absolute paths of the command files running above this processor */
  callers?: readonly string[];
}

interface RunState {
  executed: number;
  failures: CommandFailure[];
  severity: Severity;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function failureOf(outcome: CommandOutcome): Error | undefined {
  return outcome.error;
}

// =============================================================================
// WorkflowProcessor
// =============================================================================

export class WorkflowProcessor {
  private readonly listeners: ProcessorListener[] = [];
  private readonly commented: readonly boolean[];
  private readonly blockEnds: ReadonlyMap<number, number>;
  private lastContext: WorkflowContext | undefined;

  constructor(
    readonly commands: readonly AbstractCommand[],
    private readonly options: WorkflowProcessorOptions,
  ) {
    this.commented = markCommented(commands);
    this.blockEnds = pairBlocks(commands, this.commented);
  }

  /** Context of the most recent executeAll() */
  get context(): WorkflowContext | undefined {
    return this.lastContext;
  }

  addListener(listener: ProcessorListener): void {
    this.listeners.push(listener);
  }

  /**
   * Validates and runs every command.
   */
  async executeAll(): Promise<RunSummary> {
    const context = createWorkflowContext({
      ...this.options,
      commands: this.commands,
      runCommandFile: (filePath) => this.runCommandFile(filePath),
    });
    this.lastContext = context;
    const state: RunState = { executed: 0, failures: [], severity: Severity.SUCCESS };
    const logger = context.logger.withContext({ step: Step.COMMAND });

    await this.executeRange(context, logger, state, 0, this.commands.length);

    return {
      executed: state.executed,
      failed: state.failures.length,
      failures: state.failures,
      severity: state.severity,
    };
  }

  /**
   * Validates every command and collects the outputs each expects to
   * create, without running anything.
   */
  async discoverAll(): Promise<DiscoverySummary> {
    const context = createWorkflowContext(this.options);
    const results: CommandDiscovery[] = [];

    for (const [index, command] of this.commands.entries()) {
      if (this.isSkipped(index)) {
        continue;
      }
      if (command.state !== CommandState.CREATED) {
        command.reset();
      }
      const validation = command.validate(command.rawParameters, context.properties);
      const outputs = validation.kind === "ready" ? await command.discover(context) : [];
      results.push({
        index,
        commandName: command.name,
        commandString: command.toString().trim(),
        validation,
        outputs,
      });
    }

    return {
      commands: results,
      failed: results.filter((r) => r.validation.kind === "validationFailed").length,
    };
  }

  /**
   * Loads and runs another command file. WorkingDir becomes the folder of
   * the file.
   *
   * @throws WorkflowError WORKFLOW_FAILED when the file is already running
   */
  private async runCommandFile(filePath: string): Promise<CommandFileRun> {
    const callers = this.options.callers ?? [];
    if (callers.includes(filePath)) {
      throw new WorkflowError(
        "Command file is already running",
        ErrorCode.WORKFLOW_FAILED,
        { path: filePath, callers: [...callers] },
        undefined,
        "Do not run a command file from itself or from a file it runs.",
      );
    }

    const commands = await loadCommandFile(filePath);
    const nested = new WorkflowProcessor(commands, {
      ...this.options,
      workingDir: path.dirname(filePath),
      callers: [...callers, filePath],
    });
    const summary = await nested.executeAll();
    return { severity: summary.severity, commands };
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  private isSkipped(index: number): boolean {
    return this.commented[index] || isNoOpCommand(this.commands[index]);
  }

  private async executeRange(
    context: WorkflowContext,
    logger: ContextualLogger,
    state: RunState,
    start: number,
    end: number,
  ): Promise<void> {
    let index = start;
    while (index < end) {
      const command = this.commands[index];
      if (this.isSkipped(index)) {
        index++;
        continue;
      }

      await this.processCommand(context, logger, state, index);
      const blockEnd = this.blockEnds.get(index);

      if (command instanceof IfCommand) {
        const enter = command.state === CommandState.COMPLETED && command.conditionResult;
        if (enter) {
          index++;
        } else {
          // Resume at the EndIf, or stop the range when there is none
          index = blockEnd ?? end;
        }
        continue;
      }

      if (command instanceof ForCommand && blockEnd !== undefined) {
        if (command.state === CommandState.COMPLETED) {
          for (const value of command.iterationValues) {
            command.bindIterator(context.properties, value);
            logger.debug("For loop pass", { loop: command.rawValue("Name"), value });
            await this.executeRange(context, logger, state, index + 1, blockEnd);
          }
        }
        index = blockEnd;
        continue;
      }

      index++;
    }
  }

  private async processCommand(
    context: WorkflowContext,
    logger: ContextualLogger,
    state: RunState,
    index: number,
  ): Promise<CommandOutcome> {
    const command = this.commands[index];
    const position = index + 1;
    const total = this.commands.length;

    if (command.state !== CommandState.CREATED) {
      command.reset();
    }
    state.executed++;
    for (const listener of this.listeners) {
      listener.commandStarted?.(index, total, command);
    }
    const commandLogger = logger.forCommand(command.name, position);
    commandLogger.info(`-> Start processing command ${position} of ${total}: ${command.toString().trim()}`);

    let outcome: CommandOutcome;
    try {
      const validation = command.validate(command.rawParameters, context.properties);
      if (validation.kind === "ready") {
        outcome = await command.run(context);
      } else {
        validation.records.forEach((record) => commandLogger.logRecord(record));
        outcome = validation;
      }
    } catch (error) {
      const err = toError(error);
      commandLogger.error("Unexpected error processing command", { error: err });
      command.recordUnexpectedError();
      outcome = { kind: "error", error: err };
    }

    const failure = failureOf(outcome);
    if (failure) {
      state.failures.push({
        index,
        commandName: command.name,
        commandString: command.toString().trim(),
        error: failure,
      });
    }
    state.severity = maxSeverity(state.severity, command.status.overallSeverity());

    commandLogger.info(`<- End processing command ${position} of ${total}`, {
      outcome: outcome.kind,
      warnings: "warningCount" in outcome ? outcome.warningCount : undefined,
    });
    for (const listener of this.listeners) {
      listener.commandCompleted?.(index, total, command, outcome);
    }
    return outcome;
  }
}

// =============================================================================
// Block structure
// =============================================================================

/**
 * Flags the commands that sit inside a comment block, markers included.
 */
function markCommented(commands: readonly AbstractCommand[]): boolean[] {
  let inBlock = false;
  return commands.map((command) => {
    if (command instanceof CommentBlockStartCommand) {
      inBlock = true;
      return true;
    }
    if (command instanceof CommentBlockEndCommand) {
      inBlock = false;
      return true;
    }
    return inBlock;
  });
}

/**
 * Pairs If/EndIf and For/EndFor by Name, marks each paired command as
 * matched, and returns the closing index for every opening index.
 */
function pairBlocks(commands: readonly AbstractCommand[], commented: readonly boolean[]): Map<number, number> {
  const ends = new Map<number, number>();
  const open: { index: number; kind: "If" | "For"; name: string }[] = [];

  for (const [index, command] of commands.entries()) {
    if (commented[index]) {
      continue;
    }
    const name = (command.rawValue("Name") ?? "").trim();

    if (command instanceof IfCommand || command instanceof ForCommand) {
      open.push({ index, kind: command instanceof IfCommand ? "If" : "For", name });
      continue;
    }

    const closing =
      command instanceof EndIfCommand ? "If" : command instanceof EndForCommand ? "For" : undefined;
    if (!closing) {
      continue;
    }

    let at = open.length - 1;
    while (at >= 0 && !(open[at].kind === closing && open[at].name === name)) {
      at--;
    }
    if (at < 0) {
      continue;
    }
    const [block] = open.splice(at, 1);
    ends.set(block.index, index);

    const opener = commands[block.index];
    if (opener instanceof IfCommand || opener instanceof ForCommand) {
      opener.matched = true;
    }
    if (command instanceof EndIfCommand || command instanceof EndForCommand) {
      command.matched = true;
    }
  }

  return ends;
}
