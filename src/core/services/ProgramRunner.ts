/**
 * Runs external programs through the shell with execa.
 *
 * Non-zero exit codes are returned, not thrown; the calling command
 * decides what an exit code means.
 *
 * @module
 */

import { execa } from "execa";

export interface ProgramRunOptions {
  readonly cwd: string;
  readonly env?: Readonly<Record<string, string>>;
  /** Kill the program after this many milliseconds (0: no limit) */
  readonly timeoutMs?: number;
}

export interface ProgramResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
}

export interface ProgramRunner {
  run(commandLine: string, options: ProgramRunOptions): Promise<ProgramResult>;
}

export class ExecaProgramRunner implements ProgramRunner {
  async run(commandLine: string, options: ProgramRunOptions): Promise<ProgramResult> {
    const result = await execa(commandLine, {
      cwd: options.cwd,
      shell: true,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      timeout: options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined,
      // Non-zero exits are reported through exitCode
      reject: false,
    });

    return {
      exitCode: result.exitCode ?? (result.failed ? 1 : 0),
      stdout: result.stdout,
      stderr: result.stderr,
      timedOut: result.timedOut,
    };
  }
}
