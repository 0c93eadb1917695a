/**
 * Per-command status aggregation.
 *
 * A CommandStatus collects the log records a command produces in each
 * phase and reduces them to a worst severity per phase. It is the sink for
 * every other component's problems and never throws.
 *
 * @module
 */

import { createLogRecord, type LogRecord } from "./LogRecord.js";
import { maxSeverity, PHASES, Severity, type Phase } from "./Severity.js";

interface PhaseLog {
  records: LogRecord[];
  /** Lower bound raised by refreshPhaseSeverity() */
  floor: Severity;
}

function emptyPhaseLog(): PhaseLog {
  return { records: [], floor: Severity.UNKNOWN };
}

export class CommandStatus {
  private readonly phases: Record<Phase, PhaseLog> = {
    INITIALIZATION: emptyPhaseLog(),
    DISCOVERY: emptyPhaseLog(),
    RUN: emptyPhaseLog(),
  };

  /**
   * Appends a record to a phase and returns it.
   */
  addLog(phase: Phase, severity: Severity, message: string, recommendation = ""): LogRecord {
    const record = createLogRecord(phase, severity, message, recommendation);
    this.phases[phase].records.push(record);
    return record;
  }

  /**
   * Raises the phase severity to at least `floor`. Used to mark a phase
   * SUCCESS once it completed without problems.
   */
  refreshPhaseSeverity(phase: Phase, floor: Severity): void {
    const log = this.phases[phase];
    log.floor = maxSeverity(log.floor, floor);
  }

  phaseSeverity(phase: Phase): Severity {
    const log = this.phases[phase];
    return log.records.reduce<Severity>((worst, r) => maxSeverity(worst, r.severity), log.floor);
  }

  overallSeverity(): Severity {
    return PHASES.reduce<Severity>(
      (worst, phase) => maxSeverity(worst, this.phaseSeverity(phase)),
      Severity.UNKNOWN,
    );
  }

  /**
   * Resets one phase, or every phase when none is given.
   */
  clearLog(phase?: Phase): void {
    for (const p of phase ? [phase] : PHASES) {
      this.phases[p] = emptyPhaseLog();
    }
  }

  records(phase?: Phase): readonly LogRecord[] {
    if (phase) {
      return [...this.phases[phase].records];
    }
    return PHASES.flatMap((p) => this.phases[p].records);
  }

  getLogCount(phase?: Phase, severity?: Severity): number {
    return this.records(phase).filter((r) => severity === undefined || r.severity === severity)
      .length;
  }
}
