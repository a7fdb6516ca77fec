import type { BatchCounts } from "../core/types.js";

export const ExitCode = {
  OK: 0,
  /** Configuration, connection or chain identity failure */
  FATAL: 1,
  /** Nothing auditable: empty input, or every hash malformed */
  NO_INPUT: 2,
  /** At least one failed, not_found, provider_error or invalid_input entry */
  FAILURES: 3,
  /** At least one cross-provider mismatch */
  MISMATCH: 4,
  ABORTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Mismatch outranks every other per-transaction problem
 */
export function exitCodeForSummary(counts: BatchCounts): ExitCode {
  if (counts.total === 0 || counts.invalid_input === counts.total) {
    return ExitCode.NO_INPUT;
  }
  if (counts.mismatch > 0) {
    return ExitCode.MISMATCH;
  }
  if (counts.failed + counts.not_found + counts.provider_error + counts.invalid_input > 0) {
    return ExitCode.FAILURES;
  }
  return ExitCode.OK;
}
