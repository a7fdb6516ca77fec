import type { Address, Hex } from "viem";
import type { ErrorCode } from "./errors.js";

export type ProviderLabel = "primary" | "secondary";

/** 1 = success, 0 = reverted */
export type ReceiptStatus = 0 | 1;

/**
 * Where the fee price came from. Receipts of post fee-market chains carry
 * effectiveGasPrice; older nodes omit it and the declared gasPrice is used.
 */
export type FeeSource = "receipt" | "transaction_fallback";

export interface ProviderReceipt {
  blockNumber: bigint;
  status: ReceiptStatus;
  gasUsed: bigint;
  effectiveGasPrice: bigint | null;
  from: Address;
  to: Address | null;
}

export interface ProviderTransaction {
  hash: Hex;
  from: Address;
  to: Address | null;
  gasPrice: bigint | null;
  blockNumber: bigint | null;
}

export interface ReceiptBundle {
  readonly provider: ProviderLabel;
  readonly chainId: number;
  readonly network: string;
  readonly txHash: Hex;
  readonly blockNumber: bigint;
  readonly status: ReceiptStatus;
  readonly gasUsed: bigint;
  readonly effectiveGasPrice: bigint | null;
  readonly feeSource: FeeSource | null;
  readonly totalFeeWei: bigint | null;
  readonly from: Address;
  readonly to: Address | null;
  readonly blockTimestamp?: number;
  readonly commitment: Hex;
}

export type AuditVerdict = "ok" | "mismatch" | "provider_error" | "not_found" | "invalid_input";

export type ProviderOutcome =
  | { status: "ok"; bundle: ReceiptBundle }
  | { status: "not_found" }
  | { status: "error"; code: ErrorCode; error: string };

export interface FieldComparison {
  chainId: boolean;
  blockNumber: boolean;
  status: boolean;
  gasUsed: boolean;
  commitment: boolean;
}

export interface TxAuditResult {
  /** Normalised hash, or the trimmed raw input when it failed validation */
  readonly txHash: string;
  readonly verdict: AuditVerdict;
  readonly primary: ProviderOutcome | null;
  readonly secondary: ProviderOutcome | null;
  /** null when fewer than two bundles were available to compare */
  readonly match: boolean | null;
  readonly fields: FieldComparison | null;
  readonly elapsedMs: number;
  readonly error?: string;
}

export interface ProviderIdentity {
  label: ProviderLabel;
  url: string;
  chainId: number;
  network: string;
}

export interface BatchCounts {
  total: number;
  success: number;
  failed: number;
  not_found: number;
  provider_error: number;
  mismatch: number;
  invalid_input: number;
}

export interface BatchSummary {
  readonly startedAtIso: string;
  readonly elapsedMs: number;
  readonly providers: readonly ProviderIdentity[];
  readonly counts: BatchCounts;
  readonly results: readonly TxAuditResult[];
}
