import type { Hex } from "viem";
import { InvalidInputError } from "../core/errors.js";

const TX_HASH_PATTERN = /^0x[0-9a-f]{64}$/;

/**
 * Validate canonical transaction hash format (0x followed by 64 lowercase hex chars)
 */
export function isValidTxHash(hash: string): hash is Hex {
  return TX_HASH_PATTERN.test(hash);
}

/**
 * Normalize a user-supplied hash: trim, lowercase, add a missing 0x prefix.
 * Returns null when the result is still not a valid hash.
 */
export function normalizeTxHash(raw: string): Hex | null {
  let hash = raw.trim().toLowerCase();
  if (!hash) return null;
  if (!hash.startsWith("0x")) {
    hash = `0x${hash}`;
  }
  return isValidTxHash(hash) ? hash : null;
}

/**
 * Validate transaction hash input
 */
export function validateTxHash(raw: string): { valid: true; hash: Hex } | { valid: false; error: string } {
  const hash = normalizeTxHash(raw);
  if (!hash) {
    return { valid: false, error: new InvalidInputError(raw.trim()).message };
  }
  return { valid: true, hash };
}
