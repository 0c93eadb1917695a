/**
 * Base class for workflow commands.
 *
 * Every command moves through a fixed set of states:
 *
 * ```text
 * CREATED -> VALIDATING -> VALIDATION_FAILED
 *                       -> READY -> RUNNING -> COMPLETED
 *                                           -> SKIPPED
 * ```
 *
 * `validate()` resolves raw parameter text into typed values and records
 * every problem at INITIALIZATION. `run()` evaluates runtime checks,
 * performs the effect through the context's services, and records every
 * problem at RUN. Both return outcome values; exceptions are reserved for
 * misuse such as running a command that is not READY.
 *
 * @module
 */

import { escalate, evaluate, FailResponse, type Check } from "../checks/CheckDispatcher.js";
import type { WorkflowContext } from "../context/WorkflowContext.js";
import {
  CommandParameterError,
  CommandRunError,
  WorkflowError,
} from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import { isWriteOnce, type PropertyStore } from "../properties/PropertyStore.js";
import type { CollisionPolicy } from "../registry/CollisionPolicy.js";
import type { IdentifierRegistry } from "../registry/IdentifierRegistry.js";
import { CommandStatus } from "../status/CommandStatus.js";
import type { LogRecord } from "../status/LogRecord.js";
import { Phase, Severity } from "../status/Severity.js";
import {
  ParameterValues,
  type ParameterSpec,
  type ParameterValue,
  type RawParameters,
} from "./CommandParameters.js";
import { renderCommandString } from "./CommandString.js";

// =============================================================================
// Types
// =============================================================================

export const CommandState = {
  CREATED: "CREATED",
  VALIDATING: "VALIDATING",
  VALIDATION_FAILED: "VALIDATION_FAILED",
  READY: "READY",
  RUNNING: "RUNNING",
  COMPLETED: "COMPLETED",
  SKIPPED: "SKIPPED",
} as const;

export type CommandState = (typeof CommandState)[keyof typeof CommandState];

export type ValidateOutcome =
  | { readonly kind: "ready" }
  | {
      readonly kind: "validationFailed";
      readonly error: CommandParameterError;
      readonly records: readonly LogRecord[];
    };

export interface RunOutcome {
  readonly kind: "completed" | "skipped";
  readonly warningCount: number;
  readonly records: readonly LogRecord[];
  /** Present when warningCount > 0 */
  readonly error?: CommandRunError;
}

/**
 * A check paired with the response its failure gets. Bare checks use FAIL.
 */
export type CheckRequest = Check | { readonly check: Check; readonly response: FailResponse };

/**
 * An entity a command expects to create, reported by discover().
 */
export interface DiscoveredOutput {
  readonly registry: "geoLayers" | "tables" | "dataStores";
  readonly id: string;
}

export interface CommandInit {
  /** Text the command was parsed from */
  readonly commandString: string;
  readonly parameters: RawParameters;
  readonly indent?: string;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const BOOLEAN_PATTERN = /^(true|false)$/i;

// =============================================================================
// AbstractCommand
// =============================================================================

export abstract class AbstractCommand {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly parameterSpecs: readonly ParameterSpec[];

  readonly status = new CommandStatus();
  readonly commandString: string;
  readonly rawParameters: RawParameters;
  private readonly indent: string;

  private currentState: CommandState = CommandState.CREATED;
  private count = 0;
  private blocked = false;

  /** Typed values, available once validate() reached READY */
  protected params = new ParameterValues();

  /** Bound to the run's logger while run() is active */
  protected logger: ContextualLogger | undefined;

  /** When false, parameters without metadata are accepted */
  protected readonly strictParameters: boolean = true;

  constructor(init: CommandInit) {
    this.commandString = init.commandString;
    this.rawParameters = init.parameters;
    this.indent = init.indent ?? "";
  }

  get state(): CommandState {
    return this.currentState;
  }

  /** FAILURE and WARNING records added during the current run */
  get warningCount(): number {
    return this.count;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Returns the command to CREATED so it can be validated and run again,
   * as commands inside a For loop are.
   */
  reset(): void {
    this.currentState = CommandState.CREATED;
    this.status.clearLog();
    this.count = 0;
    this.blocked = false;
    this.params = new ParameterValues();
  }

  validate(raw: RawParameters, properties: PropertyStore): ValidateOutcome {
    this.requireState(CommandState.CREATED, "validate");
    this.currentState = CommandState.VALIDATING;
    this.status.clearLog(Phase.INITIALIZATION);

    const values = new Map<string, ParameterValue>();
    const seen = new Set<string>();
    const known = new Set(this.parameterSpecs.map((p) => p.name));

    for (const [name] of raw) {
      if (seen.has(name)) {
        this.initFailure(`Parameter ${name} is specified more than once.`, `Specify ${name} once.`);
      }
      seen.add(name);
      if (this.strictParameters && !known.has(name)) {
        this.initFailure(
          `Invalid parameter "${name}".`,
          `Remove ${name}. Valid parameters are: ${[...known].join(", ") || "(none)"}.`,
        );
      }
    }

    for (const spec of this.parameterSpecs) {
      const coerced = this.resolveParameter(spec, raw, properties);
      if (coerced !== undefined) {
        values.set(spec.name, coerced);
      }
    }

    if (this.status.getLogCount(Phase.INITIALIZATION, Severity.FAILURE) === 0) {
      this.params = new ParameterValues(values);
      this.checkParameters(this.params);
    }

    const failures = this.status.getLogCount(Phase.INITIALIZATION, Severity.FAILURE);
    if (failures > 0) {
      this.currentState = CommandState.VALIDATION_FAILED;
      return {
        kind: "validationFailed",
        error: new CommandParameterError(this.name, failures),
        records: this.status.records(Phase.INITIALIZATION),
      };
    }

    this.status.refreshPhaseSeverity(Phase.INITIALIZATION, Severity.SUCCESS);
    this.currentState = CommandState.READY;
    return { kind: "ready" };
  }

  async run(context: WorkflowContext): Promise<RunOutcome> {
    this.requireState(CommandState.READY, "run");
    this.currentState = CommandState.RUNNING;
    this.status.clearLog(Phase.RUN);
    this.count = 0;
    this.blocked = false;
    this.logger = context.logger.withContext({ command: this.name });

    try {
      await this.execute(context);
    } finally {
      this.logger = undefined;
    }

    if (this.count === 0) {
      this.status.refreshPhaseSeverity(Phase.RUN, Severity.SUCCESS);
    }
    this.currentState = this.blocked ? CommandState.SKIPPED : CommandState.COMPLETED;

    return {
      kind: this.blocked ? "skipped" : "completed",
      warningCount: this.count,
      records: this.status.records(Phase.RUN),
      error: this.count > 0 ? new CommandRunError(this.name, this.count) : undefined,
    };
  }

  /**
   * Lists the entities the command expects to create, without running it.
   * Only available in READY.
   */
  async discover(context: WorkflowContext): Promise<readonly DiscoveredOutput[]> {
    this.requireState(CommandState.READY, "discover");
    this.status.clearLog(Phase.DISCOVERY);
    const outputs = await this.discoverOutputs(context);
    this.status.refreshPhaseSeverity(Phase.DISCOVERY, Severity.SUCCESS);
    return outputs;
  }

  /**
   * Records an error that escaped run(). The command ends COMPLETED with a
   * RUN failure.
   */
  recordUnexpectedError(): void {
    this.addRunLog(
      Severity.FAILURE,
      "Unexpected error processing command - unable to complete command.",
      "See the log file for details.",
    );
    this.currentState = CommandState.COMPLETED;
  }

  /**
   * Raw text of a parameter as written, before expansion.
   */
  rawValue(name: string): string | undefined {
    return [...this.rawParameters].reverse().find(([key]) => key === name)?.[1];
  }

  /**
   * Renders the command string with parameters in metadata order. Unknown
   * parameters follow in the order written.
   */
  toString(): string {
    const order = this.parameterSpecs.map((p) => p.name);
    const rank = (name: string): number => {
      const index = order.indexOf(name);
      return index < 0 ? order.length : index;
    };
    const sorted = [...this.rawParameters].sort((a, b) => rank(a[0]) - rank(b[0]));
    return renderCommandString(this.name, sorted, this.indent);
  }

  // ===========================================================================
  // Subclass hooks
  // ===========================================================================

  /**
   * Performs the command. Call checkAll() before the effect and return
   * when it reports the command must not run.
   */
  protected abstract execute(context: WorkflowContext): Promise<void>;

  /**
   * Cross-parameter validation. Record problems with initFailure().
   */
  protected checkParameters(_params: ParameterValues): void {}

  protected async discoverOutputs(_context: WorkflowContext): Promise<readonly DiscoveredOutput[]> {
    return [];
  }

  // ===========================================================================
  // Helpers for subclasses
  // ===========================================================================

  protected initFailure(message: string, recommendation: string): void {
    this.status.addLog(Phase.INITIALIZATION, Severity.FAILURE, message, recommendation);
  }

  /**
   * Records an INITIALIZATION failure when the property named by
   * `parameter` is WorkingDir or TempDir.
   */
  protected rejectWriteOnceProperty(params: ParameterValues, parameter: string): void {
    const name = params.optionalString(parameter);
    if (name !== undefined && isWriteOnce(name)) {
      this.initFailure(
        `The ${parameter} (${name}) is set when the workflow starts and cannot be changed.`,
        `Specify a different ${parameter}.`,
      );
    }
  }

  /**
   * Adds a RUN record, counting FAILURE and WARNING records.
   */
  protected addRunLog(severity: Severity, message: string, recommendation = ""): void {
    const record = this.status.addLog(Phase.RUN, severity, message, recommendation);
    if (severity === Severity.FAILURE || severity === Severity.WARNING) {
      this.count++;
      this.logger?.logRecord(record);
    }
  }

  /**
   * Evaluates checks in order and records each failure.
   *
   * @returns false when a failure blocks the effect; the command is then SKIPPED
   */
  protected checkAll(context: WorkflowContext, requests: readonly (CheckRequest | false)[]): boolean {
    let canRun = true;
    for (const request of requests) {
      if (request === false) {
        continue;
      }
      const [check, response] =
        "check" in request ? [request.check, request.response] : [request, FailResponse.FAIL];
      const result = evaluate(check, context);
      const escalation = escalate(result, response);
      if (!escalation) {
        continue;
      }
      if (result.unrecognized) {
        this.logger?.error("Command requested an unrecognized check", { check: check.kind });
      }
      this.addRunLog(escalation.severity, result.message, result.recommendation);
      if (escalation.blocking) {
        canRun = false;
      }
    }
    if (!canRun) {
      this.blocked = true;
    }
    return canRun;
  }

  /**
   * Stores a command output under the user's collision policy. A collision
   * the `outputIdAvailable` check already reported is not logged again;
   * an entry that the policy keeps out is.
   *
   * @returns true when the entry was stored
   */
  protected registerOutput<T>(
    registry: IdentifierRegistry<T>,
    id: string,
    item: T,
    policy: CollisionPolicy,
  ): boolean {
    const outcome = registry.register(id, item, policy);
    if (!outcome.inserted) {
      this.addRunLog(
        outcome.failed ? Severity.FAILURE : Severity.WARNING,
        `The ${registry.label} ID (${id}) is already in use and was not replaced.`,
        `Specify a new ${registry.label} ID or use a collision policy that replaces it.`,
      );
    }
    return outcome.inserted;
  }

  /**
   * Runs an effect, turning any thrown error into a RUN failure.
   *
   * @returns true when the effect finished
   */
  protected async runEffect(failureMessage: string, effect: () => Promise<void>): Promise<boolean> {
    try {
      await effect();
      return true;
    } catch (error) {
      this.logger?.error(failureMessage, {
        error: error instanceof Error ? error : new Error(String(error)),
      });
      this.addRunLog(Severity.FAILURE, failureMessage, "Check the log file for details.");
      return false;
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private requireState(expected: CommandState, action: string): void {
    if (this.currentState !== expected) {
      throw new WorkflowError(
        `Cannot ${action} ${this.name} in state ${this.currentState}`,
        ErrorCode.COMMAND_STATE_INVALID,
        { command: this.name, state: this.currentState, expected },
        undefined,
        undefined,
        undefined,
        false,
      );
    }
  }

  private resolveParameter(
    spec: ParameterSpec,
    raw: RawParameters,
    properties: PropertyStore,
  ): ParameterValue | undefined {
    // The last occurrence wins when a name is repeated
    const given = [...raw].reverse().find(([name]) => name === spec.name)?.[1];
    const text = given !== undefined && given !== "" ? given : spec.defaultValue;

    if (text === undefined || text === "") {
      if (spec.required) {
        this.initFailure(
          `Required ${spec.name} parameter has no value.`,
          `Specify the ${spec.name} parameter.`,
        );
      }
      return undefined;
    }

    const { value, unresolved } = properties.expand(text);
    for (const token of unresolved) {
      this.status.addLog(
        Phase.INITIALIZATION,
        Severity.WARNING,
        `Property ${token} used in ${spec.name} is not defined; "\${${token}}" was left as is.`,
        `Define ${token} before this command or correct the property name.`,
      );
    }

    return this.coerce(spec, value);
  }

  private coerce(spec: ParameterSpec, value: string): ParameterValue | undefined {
    switch (spec.type ?? "string") {
      case "boolean":
        if (!BOOLEAN_PATTERN.test(value.trim())) {
          this.initFailure(
            `The ${spec.name} parameter value (${value}) must be True or False.`,
            `Specify True or False for ${spec.name}.`,
          );
          return undefined;
        }
        return value.trim().toLowerCase() === "true";

      case "integer":
        if (!INTEGER_PATTERN.test(value.trim())) {
          this.initFailure(
            `The ${spec.name} parameter value (${value}) is not an integer.`,
            `Specify an integer for ${spec.name}.`,
          );
          return undefined;
        }
        return Number(value.trim());

      case "list":
        return value
          .split(",")
          .map((item) => item.trim())
          .filter((item) => item !== "");

      case "string": {
        if (!spec.allowedValues) {
          return value;
        }
        const match = spec.allowedValues.find((a) => a.toLowerCase() === value.trim().toLowerCase());
        if (match === undefined) {
          this.initFailure(
            `The ${spec.name} parameter value (${value}) is not valid.`,
            `Specify one of: ${spec.allowedValues.join(", ")}.`,
          );
        }
        return match;
      }
    }
  }
}
