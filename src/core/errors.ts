/**
 * Audit error taxonomy
 * NotFound and Mismatch are verdicts, not exceptions; everything below is thrown.
 */

export const ErrorCode = {
  INVALID_INPUT: "INVALID_INPUT",
  COMMITMENT_INPUT: "COMMITMENT_INPUT",
  PROVIDER_ERROR: "PROVIDER_ERROR",
  CHAIN_MISMATCH: "CHAIN_MISMATCH",
  ABORTED: "ABORTED",
  CONFIG: "CONFIG_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for every error raised by the auditor
 */
export class AuditError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "AuditError";
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Malformed transaction hash; never reaches a provider
 */
export class InvalidInputError extends AuditError {
  constructor(public readonly value: string) {
    super(`Invalid transaction hash: ${value}. Expected 0x + 64 hex characters.`, ErrorCode.INVALID_INPUT, { value });
    this.name = "InvalidInputError";
  }
}

/**
 * A commitment field that does not fit the fixed preimage layout
 */
export class CommitmentInputError extends AuditError {
  constructor(
    public readonly field: string,
    reason: string,
  ) {
    super(`Invalid commitment field ${field}: ${reason}`, ErrorCode.COMMITMENT_INPUT, { field });
    this.name = "CommitmentInputError";
  }
}

export interface ProviderErrorDetails {
  provider: string;
  operation: string;
  attempts: number;
}

/**
 * Provider call failed after retries, or answered with an unusable shape
 */
export class ProviderError extends AuditError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly attempts: number,
  ) {
    super(message, ErrorCode.PROVIDER_ERROR, { provider, operation, attempts } satisfies ProviderErrorDetails);
    this.name = "ProviderError";
  }
}

export interface ChainEndpoint {
  label: string;
  chainId: number;
}

/**
 * Two configured providers report different chain identities
 */
export class ChainMismatchError extends AuditError {
  constructor(
    public readonly primary: ChainEndpoint,
    public readonly secondary: ChainEndpoint,
  ) {
    super(
      `chainId mismatch between ${primary.label} (${primary.chainId}) and ${secondary.label} (${secondary.chainId}) RPCs`,
      ErrorCode.CHAIN_MISMATCH,
      { primary, secondary },
    );
    this.name = "ChainMismatchError";
  }
}

/**
 * User-initiated cancellation
 */
export class AuditAbortedError extends AuditError {
  constructor(message = "Aborted by user") {
    super(message, ErrorCode.ABORTED);
    this.name = "AuditAbortedError";
  }
}

export class ConfigError extends AuditError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.CONFIG, details);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
