/**
 * Dev Assertions Mode
 *
 * Re-checks the record sequence after every mutation and counts query candidates on every
 * lookup. Throws hard errors in dev mode when a check fails.
 */

import { observability } from "@framevis/core";
import { areDevAssertionsEnabled } from "@framevis/shared";
import { type InvariantViolation, checkInvariants } from "./invariants";
import type { StateRecord } from "./types";

/** Dev assertion result */
export type DevAssertionResult = {
  passed: boolean;
  violations: InvariantViolation[];
  details: string[];
};

/** Dev assertions config */
export type DevAssertionsConfig = {
  /** Enable dev assertions */
  enabled: boolean;
  /** Throw on assertion failure */
  throwOnFailure: boolean;
  /** Log failures through the logger */
  logToConsole: boolean;
  /** Callback on assertion failure */
  onFailure?: (result: DevAssertionResult) => void;
};

/** Default dev assertions config */
export const DEFAULT_DEV_ASSERTIONS_CONFIG: DevAssertionsConfig = {
  enabled: false,
  throwOnFailure: true,
  logToConsole: true,
};

function passedResult(): DevAssertionResult {
  return { passed: true, violations: [], details: [] };
}

/**
 * Dev assertion error
 */
export class InvariantViolationError extends Error {
  constructor(
    message: string,
    public readonly result: DevAssertionResult
  ) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

function report(
  result: DevAssertionResult,
  config: DevAssertionsConfig,
  logger: observability.StructuredLogger
): DevAssertionResult {
  if (result.passed) {
    return result;
  }

  if (config.logToConsole) {
    logger.error("assertion", "Frame visibility dev assertion failed", undefined, {
      details: result.details,
    });
  }

  if (config.onFailure) {
    config.onFailure(result);
  }

  if (config.throwOnFailure) {
    throw new InvariantViolationError(
      `Frame Visibility Assertion Failed: ${result.details.join("; ")}`,
      result
    );
  }

  return result;
}

/**
 * Assert that a record sequence satisfies every consistency rule
 */
export function assertSequenceInvariants<T>(
  records: readonly StateRecord<T>[],
  config: DevAssertionsConfig = DEFAULT_DEV_ASSERTIONS_CONFIG,
  logger: observability.StructuredLogger = observability.getLogger(),
  frames?: Iterable<number>
): DevAssertionResult {
  if (!config.enabled) {
    return passedResult();
  }

  const violations = checkInvariants(records, frames);
  return report(
    {
      passed: violations.length === 0,
      violations,
      details: violations.map((v) => `[${v.rule}] ${v.message}`),
    },
    config,
    logger
  );
}

/**
 * Assert that a frame lookup found at most one visible record
 */
export function assertSingleCandidate<T>(
  frame: number,
  candidates: readonly StateRecord<T>[],
  config: DevAssertionsConfig = DEFAULT_DEV_ASSERTIONS_CONFIG,
  logger: observability.StructuredLogger = observability.getLogger()
): DevAssertionResult {
  if (!config.enabled || candidates.length <= 1) {
    return passedResult();
  }

  const recordIds = candidates.map((r) => r.id);
  const violation: InvariantViolation = {
    rule: "one-state-per-frame",
    message: `${candidates.length} records are visible in frame ${frame}`,
    recordIds,
    frame,
  };
  return report(
    {
      passed: false,
      violations: [violation],
      details: [`[${violation.rule}] ${violation.message}: ${recordIds.join(", ")}`],
    },
    config,
    logger
  );
}

export type DevAssertionsRunner = {
  runAfterMutation: <T>(
    records: readonly StateRecord<T>[],
    frames?: Iterable<number>
  ) => DevAssertionResult;
  checkQuery: <T>(frame: number, candidates: readonly StateRecord<T>[]) => DevAssertionResult;
  isEnabled: () => boolean;
  setEnabled: (enabled: boolean) => void;
};

/**
 * Create a dev assertions runner
 */
export function createDevAssertionsRunner(
  config: DevAssertionsConfig,
  logger: observability.StructuredLogger = observability.getLogger()
): DevAssertionsRunner {
  let currentConfig = { ...config };

  return {
    runAfterMutation: (records, frames) =>
      assertSequenceInvariants(records, currentConfig, logger, frames),
    checkQuery: (frame, candidates) => assertSingleCandidate(frame, candidates, currentConfig, logger),
    isEnabled: () => currentConfig.enabled,
    setEnabled: (enabled: boolean) => {
      currentConfig = { ...currentConfig, enabled };
    },
  };
}

/**
 * Format assertion result for display
 */
export function formatAssertionResult(result: DevAssertionResult): string {
  if (result.passed) {
    return "✓ Dev assertion passed: record sequence is consistent";
  }

  const lines = ["✗ Dev assertion FAILED", ...result.details.map((d) => `  ${d}`)];

  return lines.join("\n");
}

/**
 * Whether dev assertions should be enabled based on environment
 */
export function shouldEnableDevAssertions(): boolean {
  return areDevAssertionsEnabled();
}
