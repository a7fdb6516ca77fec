/**
 * Structured (JSON) rendering of batch results
 * bigint quantities become numbers when they are safe integers, decimal strings otherwise;
 * wei amounts are always strings.
 */

import { formatEther } from "viem";
import { redactRpcUrl } from "../core/config.js";
import type {
  BatchCounts,
  BatchSummary,
  FieldComparison,
  ProviderIdentity,
  ProviderOutcome,
  ReceiptBundle,
  TxAuditResult,
} from "../core/types.js";

export interface JsonBundle {
  chainId: number;
  network: string;
  txHash: string;
  blockNumber: number | string;
  status: number;
  gasUsed: number | string;
  effectiveGasPrice: string | null;
  feeSource: string | null;
  totalFeeWei: string | null;
  totalFeeEth: string | null;
  from: string;
  to: string | null;
  blockTimestamp: number | null;
  commitment: string;
}

export type JsonOutcome =
  | { status: "ok"; bundle: JsonBundle }
  | { status: "not_found" }
  | { status: "error"; code: string; error: string };

export interface JsonResult {
  txHash: string;
  verdict: string;
  primary: JsonOutcome | null;
  secondary: JsonOutcome | null;
  match: boolean | null;
  fields: FieldComparison | null;
  elapsedMs: number;
  error?: string;
}

export interface JsonProvider {
  rpc: string;
  chainId: number;
  network: string;
}

export interface JsonReport {
  primary: JsonProvider | null;
  secondary: JsonProvider | null;
  startedAt: string;
  elapsedMs: number;
  summary: BatchCounts;
  results: JsonResult[];
}

export function toJsonInteger(value: bigint): number | string {
  return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
    ? Number(value)
    : value.toString();
}

export function bundleToJson(bundle: ReceiptBundle): JsonBundle {
  return {
    chainId: bundle.chainId,
    network: bundle.network,
    txHash: bundle.txHash,
    blockNumber: toJsonInteger(bundle.blockNumber),
    status: bundle.status,
    gasUsed: toJsonInteger(bundle.gasUsed),
    effectiveGasPrice: bundle.effectiveGasPrice?.toString() ?? null,
    feeSource: bundle.feeSource,
    totalFeeWei: bundle.totalFeeWei?.toString() ?? null,
    totalFeeEth: bundle.totalFeeWei !== null ? formatEther(bundle.totalFeeWei) : null,
    from: bundle.from,
    to: bundle.to,
    blockTimestamp: bundle.blockTimestamp ?? null,
    commitment: bundle.commitment,
  };
}

export function outcomeToJson(outcome: ProviderOutcome | null): JsonOutcome | null {
  if (!outcome) return null;
  switch (outcome.status) {
    case "ok":
      return { status: "ok", bundle: bundleToJson(outcome.bundle) };
    case "not_found":
      return { status: "not_found" };
    case "error":
      return { status: "error", code: outcome.code, error: outcome.error };
  }
}

export function resultToJson(result: TxAuditResult): JsonResult {
  return {
    txHash: result.txHash,
    verdict: result.verdict,
    primary: outcomeToJson(result.primary),
    secondary: outcomeToJson(result.secondary),
    match: result.match,
    fields: result.fields,
    elapsedMs: result.elapsedMs,
    ...(result.error ? { error: result.error } : {}),
  };
}

function providerToJson(identity: ProviderIdentity | undefined): JsonProvider | null {
  if (!identity) return null;
  return { rpc: redactRpcUrl(identity.url), chainId: identity.chainId, network: identity.network };
}

export function buildJsonReport(summary: BatchSummary): JsonReport {
  return {
    primary: providerToJson(summary.providers.find((p) => p.label === "primary")),
    secondary: providerToJson(summary.providers.find((p) => p.label === "secondary")),
    startedAt: summary.startedAtIso,
    elapsedMs: summary.elapsedMs,
    summary: summary.counts,
    results: summary.results.map(resultToJson),
  };
}

export function renderJson(summary: BatchSummary): string {
  return JSON.stringify(buildJsonReport(summary), null, 2);
}
