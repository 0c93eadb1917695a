/**
 * Standardized error codes for layerflow.
 *
 * Error codes are stable public API contracts. They should be:
 * - SCREAMING_SNAKE_CASE
 * - Grouped by domain
 *
 * @module
 */

// =============================================================================
// Error Code Enum
// =============================================================================

/**
 * All official layerflow error codes.
 *
 * Codes are grouped by domain:
 * - COMMAND_* : Command parsing, validation and execution
 * - PROPERTY_* / FORMATTER_* : Property store and path formatters
 * - REGISTRY_* : Identifier registries
 * - WORKFLOW_* : Command files and the processor
 * - CONFIG_* : Configuration loading
 * - LAYER_* / TABLE_* : Codec operations
 * - ARCHIVE_*, DOWNLOAD_*, PROGRAM_*, ALGORITHM_* : External collaborators
 * - FS_* : Filesystem operations
 * - INTERNAL_* : Internal errors
 */
export const ErrorCode = {
  // Command errors (10-19)
  COMMAND_PARAMETER_ERROR: "COMMAND_PARAMETER_ERROR",
  COMMAND_RUN_ERROR: "COMMAND_RUN_ERROR",
  COMMAND_STATE_INVALID: "COMMAND_STATE_INVALID",
  COMMAND_SYNTAX_INVALID: "COMMAND_SYNTAX_INVALID",
  COMMAND_UNKNOWN: "COMMAND_UNKNOWN",

  // Property errors (20-29)
  PROPERTY_NOT_FOUND: "PROPERTY_NOT_FOUND",
  PROPERTY_IMMUTABLE: "PROPERTY_IMMUTABLE",
  PROPERTY_INVALID: "PROPERTY_INVALID",
  FORMATTER_UNKNOWN: "FORMATTER_UNKNOWN",

  // Registry errors (20-29, same category)
  REGISTRY_INVARIANT_VIOLATED: "REGISTRY_INVARIANT_VIOLATED",

  // Workflow errors (30-39)
  WORKFLOW_FILE_NOT_FOUND: "WORKFLOW_FILE_NOT_FOUND",
  WORKFLOW_READ_FAILED: "WORKFLOW_READ_FAILED",
  WORKFLOW_FAILED: "WORKFLOW_FAILED",

  // Config errors (40-49)
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  CONFIG_PARSE_FAILED: "CONFIG_PARSE_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",

  // Codec errors (50-59)
  LAYER_READ_FAILED: "LAYER_READ_FAILED",
  LAYER_WRITE_FAILED: "LAYER_WRITE_FAILED",
  TABLE_READ_FAILED: "TABLE_READ_FAILED",
  TABLE_WRITE_FAILED: "TABLE_WRITE_FAILED",

  // Collaborator errors (60-69)
  ARCHIVE_UNSUPPORTED: "ARCHIVE_UNSUPPORTED",
  ARCHIVE_EXTRACT_FAILED: "ARCHIVE_EXTRACT_FAILED",
  DOWNLOAD_FAILED: "DOWNLOAD_FAILED",
  PROGRAM_FAILED: "PROGRAM_FAILED",
  ALGORITHM_UNAVAILABLE: "ALGORITHM_UNAVAILABLE",
  ALGORITHM_FAILED: "ALGORITHM_FAILED",

  // Filesystem errors (70-79)
  FS_PERMISSION_DENIED: "FS_PERMISSION_DENIED",
  FS_NOT_FOUND: "FS_NOT_FOUND",

  // Internal errors (1)
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Error Categories
// =============================================================================

/**
 * Error category for grouping related errors.
 */
export type ErrorCategory =
  | "command"
  | "property"
  | "workflow"
  | "config"
  | "codec"
  | "collaborator"
  | "fs"
  | "internal";

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (code.startsWith("COMMAND_")) return "command";
  if (
    code.startsWith("PROPERTY_") ||
    code.startsWith("FORMATTER_") ||
    code.startsWith("REGISTRY_")
  )
    return "property";
  if (code.startsWith("WORKFLOW_")) return "workflow";
  if (code.startsWith("CONFIG_")) return "config";
  if (code.startsWith("LAYER_") || code.startsWith("TABLE_")) return "codec";
  if (
    code.startsWith("ARCHIVE_") ||
    code.startsWith("DOWNLOAD_") ||
    code.startsWith("PROGRAM_") ||
    code.startsWith("ALGORITHM_")
  )
    return "collaborator";
  if (code.startsWith("FS_")) return "fs";
  return "internal";
}

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Exit code ranges by category:
 * - 1: Internal/generic error
 * - 10-19: Command errors
 * - 20-29: Property/formatter/registry errors
 * - 30-39: Workflow errors
 * - 40-49: Config errors
 * - 50-59: Codec errors
 * - 60-69: Collaborator errors
 * - 70-79: Filesystem errors
 */
const EXIT_CODE_MAP: Record<ErrorCode, number> = {
  [ErrorCode.COMMAND_PARAMETER_ERROR]: 10,
  [ErrorCode.COMMAND_RUN_ERROR]: 11,
  [ErrorCode.COMMAND_STATE_INVALID]: 12,
  [ErrorCode.COMMAND_SYNTAX_INVALID]: 13,
  [ErrorCode.COMMAND_UNKNOWN]: 14,

  [ErrorCode.PROPERTY_NOT_FOUND]: 20,
  [ErrorCode.PROPERTY_IMMUTABLE]: 21,
  [ErrorCode.PROPERTY_INVALID]: 22,
  [ErrorCode.FORMATTER_UNKNOWN]: 23,
  [ErrorCode.REGISTRY_INVARIANT_VIOLATED]: 24,

  [ErrorCode.WORKFLOW_FILE_NOT_FOUND]: 30,
  [ErrorCode.WORKFLOW_READ_FAILED]: 31,
  [ErrorCode.WORKFLOW_FAILED]: 32,

  [ErrorCode.CONFIG_NOT_FOUND]: 40,
  [ErrorCode.CONFIG_PARSE_FAILED]: 41,
  [ErrorCode.CONFIG_INVALID]: 42,

  [ErrorCode.LAYER_READ_FAILED]: 50,
  [ErrorCode.LAYER_WRITE_FAILED]: 51,
  [ErrorCode.TABLE_READ_FAILED]: 52,
  [ErrorCode.TABLE_WRITE_FAILED]: 53,

  [ErrorCode.ARCHIVE_UNSUPPORTED]: 60,
  [ErrorCode.ARCHIVE_EXTRACT_FAILED]: 61,
  [ErrorCode.DOWNLOAD_FAILED]: 62,
  [ErrorCode.PROGRAM_FAILED]: 63,
  [ErrorCode.ALGORITHM_UNAVAILABLE]: 64,
  [ErrorCode.ALGORITHM_FAILED]: 65,

  [ErrorCode.FS_PERMISSION_DENIED]: 70,
  [ErrorCode.FS_NOT_FOUND]: 71,

  [ErrorCode.INTERNAL_ERROR]: 1,
};

/**
 * Gets the exit code for an error code.
 */
export function getExitCode(code: ErrorCode): number {
  return EXIT_CODE_MAP[code] ?? 1;
}
