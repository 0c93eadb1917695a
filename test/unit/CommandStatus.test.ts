/**
 * Unit tests for severities, log records and per-command status.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { CommandStatus } from "../../src/core/status/CommandStatus.js";
import { createLogRecord } from "../../src/core/status/LogRecord.js";
import {
  compareSeverity,
  isAtLeast,
  maxSeverity,
  parseSeverity,
  Phase,
  SEVERITIES,
  Severity,
} from "../../src/core/status/Severity.js";

// =============================================================================
// Severity
// =============================================================================

describe("Severity", () => {
  it("orders UNKNOWN < SUCCESS < WARNING < FAILURE", () => {
    expect(SEVERITIES).toEqual(["UNKNOWN", "SUCCESS", "WARNING", "FAILURE"]);
    expect(compareSeverity(Severity.UNKNOWN, Severity.SUCCESS)).toBeLessThan(0);
    expect(compareSeverity(Severity.WARNING, Severity.SUCCESS)).toBeGreaterThan(0);
    expect(compareSeverity(Severity.FAILURE, Severity.FAILURE)).toBe(0);
  });

  it("maxSeverity is commutative, associative and idempotent", () => {
    for (const a of SEVERITIES) {
      expect(maxSeverity(a, a)).toBe(a);
      for (const b of SEVERITIES) {
        expect(maxSeverity(a, b)).toBe(maxSeverity(b, a));
        for (const c of SEVERITIES) {
          expect(maxSeverity(maxSeverity(a, b), c)).toBe(maxSeverity(a, maxSeverity(b, c)));
        }
      }
    }
  });

  it("UNKNOWN is the identity of maxSeverity", () => {
    for (const s of SEVERITIES) {
      expect(maxSeverity(Severity.UNKNOWN, s)).toBe(s);
    }
  });

  it("isAtLeast compares against a threshold", () => {
    expect(isAtLeast(Severity.FAILURE, Severity.WARNING)).toBe(true);
    expect(isAtLeast(Severity.WARNING, Severity.WARNING)).toBe(true);
    expect(isAtLeast(Severity.SUCCESS, Severity.WARNING)).toBe(false);
  });

  it("parses names case-insensitively", () => {
    expect(parseSeverity(" warning ")).toBe(Severity.WARNING);
    expect(parseSeverity("Failure")).toBe(Severity.FAILURE);
    expect(parseSeverity("fatal")).toBeUndefined();
  });
});

// =============================================================================
// LogRecord
// =============================================================================

describe("createLogRecord", () => {
  it("defaults the recommendation to an empty string and freezes the record", () => {
    const record = createLogRecord(Phase.RUN, Severity.WARNING, "Layer is empty.");

    expect(record).toEqual({
      phase: "RUN",
      severity: "WARNING",
      message: "Layer is empty.",
      recommendation: "",
    });
    expect(Object.isFrozen(record)).toBe(true);
  });
});

// =============================================================================
// CommandStatus
// =============================================================================

describe("CommandStatus", () => {
  it("starts UNKNOWN in every phase", () => {
    const status = new CommandStatus();

    expect(status.phaseSeverity(Phase.INITIALIZATION)).toBe(Severity.UNKNOWN);
    expect(status.phaseSeverity(Phase.RUN)).toBe(Severity.UNKNOWN);
    expect(status.overallSeverity()).toBe(Severity.UNKNOWN);
  });

  it("phase severity is the worst record in that phase", () => {
    const status = new CommandStatus();
    status.addLog(Phase.RUN, Severity.SUCCESS, "ok");
    status.addLog(Phase.RUN, Severity.FAILURE, "bad", "fix it");
    status.addLog(Phase.RUN, Severity.WARNING, "hmm");
    status.addLog(Phase.INITIALIZATION, Severity.WARNING, "early");

    expect(status.phaseSeverity(Phase.RUN)).toBe(Severity.FAILURE);
    expect(status.phaseSeverity(Phase.INITIALIZATION)).toBe(Severity.WARNING);
    expect(status.phaseSeverity(Phase.DISCOVERY)).toBe(Severity.UNKNOWN);
    expect(status.overallSeverity()).toBe(Severity.FAILURE);
  });

  it("matches the maximum over randomly generated records", () => {
    const status = new CommandStatus();
    let expected: Severity = Severity.UNKNOWN;
    let seed = 7;
    for (let i = 0; i < 50; i++) {
      seed = (seed * 31 + 11) % 97;
      const severity = SEVERITIES[seed % SEVERITIES.length];
      status.addLog(Phase.DISCOVERY, severity, `record ${i}`);
      expected = maxSeverity(expected, severity);
      expect(status.phaseSeverity(Phase.DISCOVERY)).toBe(expected);
    }
  });

  it("refreshPhaseSeverity raises the floor without adding records", () => {
    const status = new CommandStatus();
    status.refreshPhaseSeverity(Phase.INITIALIZATION, Severity.SUCCESS);

    expect(status.phaseSeverity(Phase.INITIALIZATION)).toBe(Severity.SUCCESS);
    expect(status.records()).toHaveLength(0);

    status.addLog(Phase.INITIALIZATION, Severity.WARNING, "w");
    expect(status.phaseSeverity(Phase.INITIALIZATION)).toBe(Severity.WARNING);
  });

  it("clears one phase or all of them", () => {
    const status = new CommandStatus();
    status.addLog(Phase.INITIALIZATION, Severity.FAILURE, "a");
    status.addLog(Phase.RUN, Severity.WARNING, "b");

    status.clearLog(Phase.RUN);
    expect(status.records().map((r) => r.message)).toEqual(["a"]);

    status.clearLog();
    expect(status.records()).toEqual([]);
    expect(status.overallSeverity()).toBe(Severity.UNKNOWN);
  });

  it("counts records by phase and severity", () => {
    const status = new CommandStatus();
    status.addLog(Phase.RUN, Severity.WARNING, "a");
    status.addLog(Phase.RUN, Severity.WARNING, "b");
    status.addLog(Phase.RUN, Severity.FAILURE, "c");
    status.addLog(Phase.INITIALIZATION, Severity.WARNING, "d");

    expect(status.getLogCount()).toBe(4);
    expect(status.getLogCount(Phase.RUN)).toBe(3);
    expect(status.getLogCount(Phase.RUN, Severity.WARNING)).toBe(2);
    expect(status.getLogCount(undefined, Severity.WARNING)).toBe(3);
  });

  it("returns records in phase order", () => {
    const status = new CommandStatus();
    status.addLog(Phase.RUN, Severity.FAILURE, "run");
    status.addLog(Phase.INITIALIZATION, Severity.WARNING, "init");

    expect(status.records().map((r) => r.message)).toEqual(["init", "run"]);
  });
});
