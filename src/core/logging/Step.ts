/**
 * Stages of a CLI invocation, bound into log entries as `step`.
 *
 * @module
 */

export const Step = {
  CONFIG_LOAD: "config.load",

  /** Reading and parsing the command file */
  WORKFLOW_LOAD: "workflow.load",

  /** `layerflow check`: validation and output discovery, nothing runs */
  WORKFLOW_DISCOVER: "workflow.discover",

  WORKFLOW_RUN: "workflow.run",

  /** Inside one command; entries also carry `command` and `position` */
  COMMAND: "command",

  DONE: "done",
} as const;

export type Step = (typeof Step)[keyof typeof Step];
