import { ErrorCode } from "./ErrorCode.js";

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    public readonly data?: Record<string, unknown>,
    public readonly hint?: string,
    public readonly cause?: Error,
    public readonly isOperational: boolean = true,
    public readonly timestamp: Date = new Date(),
  ) {
    super(message);
    this.name = "WorkflowError";
  }
}

// =============================================================================
// Programmer errors
// =============================================================================

export class MissingPropertyError extends WorkflowError {
  constructor(public readonly propertyName: string) {
    super(
      `Property "${propertyName}" is not defined`,
      ErrorCode.PROPERTY_NOT_FOUND,
      { propertyName },
      undefined,
      `Set the property with SetProperty() or pass -p ${propertyName}=<value>.`,
    );
    this.name = "MissingPropertyError";
  }
}

export class ImmutablePropertyError extends WorkflowError {
  constructor(public readonly propertyName: string) {
    super(
      `Property "${propertyName}" is set once at workflow start and cannot be changed`,
      ErrorCode.PROPERTY_IMMUTABLE,
      { propertyName },
      undefined,
      undefined,
      undefined,
      false,
    );
    this.name = "ImmutablePropertyError";
  }
}

export class UnknownFormatterError extends WorkflowError {
  constructor(public readonly formatterCode: string) {
    super(
      `Unknown path formatter "${formatterCode}"`,
      ErrorCode.FORMATTER_UNKNOWN,
      { formatterCode },
      undefined,
      "Use one of %F, %f, %P, %p or %E.",
      undefined,
      false,
    );
    this.name = "UnknownFormatterError";
  }
}

// =============================================================================
// Command outcomes surfaced to the processor
// =============================================================================

export class CommandParameterError extends WorkflowError {
  constructor(commandName: string, failureCount: number) {
    super(
      `${commandName}: ${failureCount} parameter problem${failureCount === 1 ? "" : "s"} found`,
      ErrorCode.COMMAND_PARAMETER_ERROR,
      { commandName, failureCount },
    );
    this.name = "CommandParameterError";
  }
}

export class CommandRunError extends WorkflowError {
  constructor(
    commandName: string,
    public readonly warningCount: number,
  ) {
    super(
      `There were ${warningCount} warnings processing the command.`,
      ErrorCode.COMMAND_RUN_ERROR,
      { commandName, warningCount },
    );
    this.name = "CommandRunError";
  }
}

export function toUserMessage(err: unknown): { message: string; code?: string } {
  if (err instanceof WorkflowError) {
    return { message: err.message, code: err.code };
  } else if (err instanceof Error) {
    return { message: err.message };
  } else {
    return { message: String(err) };
  }
}
