/**
 * Terminal output for layerflow: what the user reads, as opposed to the
 * structured log written through ContextualLogger.
 *
 * Errors always go to stderr. Everything else is dropped under `--silent`.
 * Colors follow the TTY unless set explicitly.
 *
 * @module
 */

import pc from "picocolors";
import { Severity } from "../../core/status/Severity.js";

// =============================================================================
// Types
// =============================================================================

/**
 * `verbose` and `debug` print everything `info` does; commands use the
 * level to decide how much detail to pass in.
 */
export type UxLevel = "silent" | "info" | "verbose" | "debug";

export interface CliUxOptions {
  readonly level: UxLevel;
  /** Default: stdout is a TTY */
  readonly colors?: boolean;
  /** Replaces process.stdout (tests) */
  readonly stdout?: (msg: string) => void;
  /** Replaces process.stderr (tests) */
  readonly stderr?: (msg: string) => void;
}

export interface ErrorDetails {
  readonly code?: string;
  readonly hint?: string;
}

type Paint = (text: string) => string;

const SEVERITY_COLORS: Record<Severity, Paint> = {
  [Severity.UNKNOWN]: pc.dim,
  [Severity.SUCCESS]: pc.green,
  [Severity.WARNING]: pc.yellow,
  [Severity.FAILURE]: pc.red,
};

const MARKS = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  info: "→",
} as const;

// =============================================================================
// CliUx
// =============================================================================

/**
 * @example
 * ```typescript
 * const ux = createCliUx({ level: "info" });
 * ux.step(3, 12, "ClipGeoLayer");
 * ux.print(`Summary: severity ${ux.severity(Severity.WARNING, "WARNING")}`);
 * ux.error("Command file not found", { code: "WORKFLOW_FILE_NOT_FOUND" });
 * ```
 */
export class CliUx {
  private readonly level: UxLevel;
  private readonly useColors: boolean;
  private readonly writeStdout: (msg: string) => void;
  private readonly writeStderr: (msg: string) => void;

  constructor(options: CliUxOptions) {
    this.level = options.level;
    this.useColors = options.colors ?? process.stdout.isTTY ?? false;
    this.writeStdout = options.stdout ?? ((msg) => process.stdout.write(msg));
    this.writeStderr = options.stderr ?? ((msg) => process.stderr.write(msg));
  }

  get outputLevel(): UxLevel {
    return this.level;
  }

  get quiet(): boolean {
    return this.level === "silent";
  }

  /** True under --verbose or --debug: reports include every record */
  get detailed(): boolean {
    return this.level === "verbose" || this.level === "debug";
  }

  /**
   * Colors `text` for a command severity, e.g. the `FAILURE` label of a
   * record line.
   */
  severity(severity: Severity, text: string): string {
    return this.paint(SEVERITY_COLORS[severity], text);
  }

  success(message: string, details?: Readonly<Record<string, unknown>>): void {
    this.out(`${this.paint(pc.green, MARKS.success)} ${message}`);
    for (const [key, value] of Object.entries(details ?? {})) {
      this.out(`  ${this.paint(pc.dim, `${key}:`)} ${String(value)}`);
    }
  }

  error(message: string, details: ErrorDetails = {}): void {
    const code = details.code ? `${this.paint(pc.red, details.code)}: ` : "";
    this.writeStderr(`${this.paint(pc.red, MARKS.error)} ${code}${message}\n`);
    if (details.hint) {
      this.writeStderr(`  ${this.paint(pc.dim, "Hint:")} ${details.hint}\n`);
    }
  }

  warn(message: string): void {
    if (!this.quiet) {
      this.writeStderr(`${this.paint(pc.yellow, MARKS.warning)} ${message}\n`);
    }
  }

  info(message: string): void {
    this.out(`${this.paint(pc.cyan, MARKS.info)} ${message}`);
  }

  /**
   * `[3/12] ClipGeoLayer`
   */
  step(current: number, total: number, label: string): void {
    this.out(`${this.paint(pc.dim, `[${current}/${total}]`)} ${label}`);
  }

  print(line: string): void {
    this.out(line);
  }

  newline(): void {
    this.out("");
  }

  header(title: string): void {
    this.out(`\n${this.paint(pc.bold, title)}`);
  }

  private out(line: string): void {
    if (!this.quiet) {
      this.writeStdout(`${line}\n`);
    }
  }

  private paint(color: Paint, text: string): string {
    return this.useColors ? color(text) : text;
  }
}

// =============================================================================
// Default instance
// =============================================================================

export function createCliUx(options: CliUxOptions): CliUx {
  return new CliUx(options);
}

let defaultInstance: CliUx | null = null;

/**
 * The instance the CLI's preAction hook configured, or an `info` one.
 */
export function getCliUx(): CliUx {
  defaultInstance ??= createCliUx({ level: "info" });
  return defaultInstance;
}

export function setDefaultCliUx(ux: CliUx): void {
  defaultInstance = ux;
}

export interface UxLevelFlags {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly silent: boolean;
}

/**
 * `--debug` wins over `--silent`, which wins over `--verbose`.
 */
export function parseUxLevel(flags: UxLevelFlags): UxLevel {
  if (flags.debug) return "debug";
  if (flags.silent) return "silent";
  if (flags.verbose) return "verbose";
  return "info";
}
