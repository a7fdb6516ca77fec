/**
 * Single-transaction audit
 *
 * Fetches receipt + transaction from every session independently, derives a
 * commitment per provider and compares them. A failure on one provider never
 * hides the other provider's bundle.
 */

import type { Hex } from "viem";
import { executeWithRetry, type RetryListener, type RetryPolicy, type Sleep } from "../rpc/retry.js";
import { debug } from "../utils/debug.js";
import { validateTxHash } from "../utils/validate.js";
import { deriveCommitment } from "./commitment.js";
import { AuditAbortedError, AuditError, ConfigError, ErrorCode, errorMessage } from "./errors.js";
import type { ProviderSession } from "./session.js";
import type {
  AuditVerdict,
  FeeSource,
  FieldComparison,
  ProviderOutcome,
  ProviderReceipt,
  ProviderTransaction,
  ReceiptBundle,
  TxAuditResult,
} from "./types.js";

export interface AuditOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: RetryListener;
  /** Also fetch the inclusion block's timestamp (one extra call per provider) */
  withBlockTimestamp?: boolean;
  now?: () => number;
}

export interface FeeInfo {
  effectiveGasPrice: bigint | null;
  feeSource: FeeSource | null;
  totalFeeWei: bigint | null;
}

/**
 * Receipt price first; the declared gasPrice only when the receipt omits it
 */
export function resolveFee(receipt: ProviderReceipt, tx: ProviderTransaction): FeeInfo {
  if (receipt.effectiveGasPrice !== null) {
    return {
      effectiveGasPrice: receipt.effectiveGasPrice,
      feeSource: "receipt",
      totalFeeWei: receipt.gasUsed * receipt.effectiveGasPrice,
    };
  }
  if (tx.gasPrice !== null) {
    return {
      effectiveGasPrice: tx.gasPrice,
      feeSource: "transaction_fallback",
      totalFeeWei: receipt.gasUsed * tx.gasPrice,
    };
  }
  return { effectiveGasPrice: null, feeSource: null, totalFeeWei: null };
}

/**
 * Timestamp lookups are best effort: a failure leaves the bundle without one
 */
async function fetchBlockTimestamp(
  session: ProviderSession,
  blockNumber: bigint,
  options: AuditOptions,
): Promise<number | undefined> {
  try {
    const block = await executeWithRetry(
      (signal) => session.adapter.getBlockTimestamp(blockNumber, signal),
      options.policy,
      {
        provider: session.label,
        operation: "eth_getBlockByNumber",
        signal: options.signal,
        sleep: options.sleep,
        onRetry: options.onRetry,
      },
    );
    return block.kind === "ok" ? block.value : undefined;
  } catch (error) {
    if (error instanceof AuditAbortedError) throw error;
    debug(`block ${blockNumber} timestamp unavailable on ${session.label}: ${errorMessage(error)}`);
    return undefined;
  }
}

async function fetchBundle(session: ProviderSession, hash: Hex, options: AuditOptions): Promise<ProviderOutcome> {
  const retry = (operation: string) => ({
    provider: session.label,
    operation,
    signal: options.signal,
    sleep: options.sleep,
    onRetry: options.onRetry,
  });

  try {
    const receipt = await executeWithRetry(
      (signal) => session.adapter.getReceipt(hash, signal),
      options.policy,
      retry("eth_getTransactionReceipt"),
    );
    if (receipt.kind === "not_found") {
      return { status: "not_found" };
    }

    const tx = await executeWithRetry(
      (signal) => session.adapter.getTransaction(hash, signal),
      options.policy,
      retry("eth_getTransactionByHash"),
    );
    if (tx.kind === "not_found") {
      return { status: "not_found" };
    }

    const blockTimestamp = options.withBlockTimestamp
      ? await fetchBlockTimestamp(session, receipt.value.blockNumber, options)
      : undefined;

    const commitment = deriveCommitment({
      chainId: session.chainId,
      txHash: hash,
      blockNumber: receipt.value.blockNumber,
      status: receipt.value.status,
      gasUsed: receipt.value.gasUsed,
    });

    const bundle: ReceiptBundle = {
      provider: session.label,
      chainId: session.chainId,
      network: session.network,
      txHash: hash,
      blockNumber: receipt.value.blockNumber,
      status: receipt.value.status,
      gasUsed: receipt.value.gasUsed,
      ...resolveFee(receipt.value, tx.value),
      from: tx.value.from,
      to: tx.value.to,
      ...(blockTimestamp !== undefined ? { blockTimestamp } : {}),
      commitment,
    };
    return { status: "ok", bundle };
  } catch (error) {
    if (error instanceof AuditAbortedError) throw error;
    // ProviderError, or a CommitmentInputError caused by an out-of-range field from the provider
    const code = error instanceof AuditError ? error.code : ErrorCode.PROVIDER_ERROR;
    return { status: "error", code, error: errorMessage(error) };
  }
}

export function compareBundles(a: ReceiptBundle, b: ReceiptBundle): FieldComparison {
  return {
    chainId: a.chainId === b.chainId,
    blockNumber: a.blockNumber === b.blockNumber,
    status: a.status === b.status,
    gasUsed: a.gasUsed === b.gasUsed,
    commitment: a.commitment === b.commitment,
  };
}

/**
 * Combine per-provider outcomes into one verdict
 */
export function decideVerdict(outcomes: readonly ProviderOutcome[]): {
  verdict: AuditVerdict;
  match: boolean | null;
  fields: FieldComparison | null;
} {
  const [first, second] = outcomes;

  if (!second) {
    if (first.status === "ok") return { verdict: "ok", match: null, fields: null };
    if (first.status === "not_found") return { verdict: "not_found", match: null, fields: null };
    return { verdict: "provider_error", match: null, fields: null };
  }

  if (first.status === "ok" && second.status === "ok") {
    const fields = compareBundles(first.bundle, second.bundle);
    return { verdict: fields.commitment ? "ok" : "mismatch", match: fields.commitment, fields };
  }
  if (first.status === "error" || second.status === "error") {
    return { verdict: "provider_error", match: null, fields: null };
  }
  if (first.status === "not_found" && second.status === "not_found") {
    return { verdict: "not_found", match: null, fields: null };
  }
  // One provider includes the transaction, the other does not know it
  return { verdict: "mismatch", match: false, fields: null };
}

export async function auditTransaction(
  rawHash: string,
  sessions: readonly ProviderSession[],
  options: AuditOptions,
): Promise<TxAuditResult> {
  if (sessions.length < 1 || sessions.length > 2) {
    throw new ConfigError(`Expected 1 or 2 provider sessions, got ${sessions.length}`);
  }

  const validation = validateTxHash(rawHash);
  if (!validation.valid) {
    return {
      txHash: rawHash.trim(),
      verdict: "invalid_input",
      primary: null,
      secondary: null,
      match: null,
      fields: null,
      elapsedMs: 0,
      error: validation.error,
    };
  }

  const now = options.now ?? Date.now;
  const start = now();
  const outcomes = await Promise.all(sessions.map((session) => fetchBundle(session, validation.hash, options)));
  const { verdict, match, fields } = decideVerdict(outcomes);

  return {
    txHash: validation.hash,
    verdict,
    primary: outcomes[0] ?? null,
    secondary: outcomes[1] ?? null,
    match,
    fields,
    elapsedMs: now() - start,
  };
}
