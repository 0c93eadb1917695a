/**
 * Severity and phase enumerations for command status reporting.
 *
 * Severities are totally ordered: UNKNOWN < SUCCESS < WARNING < FAILURE.
 *
 * @module
 */

// =============================================================================
// Severity
// =============================================================================

export const Severity = {
  UNKNOWN: "UNKNOWN",
  SUCCESS: "SUCCESS",
  WARNING: "WARNING",
  FAILURE: "FAILURE",
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

const SEVERITY_RANK: Record<Severity, number> = {
  UNKNOWN: 0,
  SUCCESS: 1,
  WARNING: 2,
  FAILURE: 3,
};

/**
 * Severities from lowest to highest.
 */
export const SEVERITIES: readonly Severity[] = [
  Severity.UNKNOWN,
  Severity.SUCCESS,
  Severity.WARNING,
  Severity.FAILURE,
];

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

/**
 * True when `severity` is at least `threshold`.
 */
export function isAtLeast(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

export function parseSeverity(value: string): Severity | undefined {
  const upper = value.trim().toUpperCase();
  return SEVERITIES.find((s) => s === upper);
}

// =============================================================================
// Phase
// =============================================================================

export const Phase = {
  INITIALIZATION: "INITIALIZATION",
  DISCOVERY: "DISCOVERY",
  RUN: "RUN",
} as const;

export type Phase = (typeof Phase)[keyof typeof Phase];

export const PHASES: readonly Phase[] = [Phase.INITIALIZATION, Phase.DISCOVERY, Phase.RUN];
