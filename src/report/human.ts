/**
 * Human-readable output formatting
 * Line-oriented; the same information as the JSON report, with status icons.
 */

import { formatEther } from "viem";
import type {
  BatchSummary,
  FieldComparison,
  ProviderIdentity,
  ProviderOutcome,
  ReceiptBundle,
  TxAuditResult,
} from "../core/types.js";
import { formatElapsed, formatUnixUtc } from "../utils/time.js";

export interface IconSet {
  ok: string;
  err: string;
  warn: string;
  info: string;
  match: string;
  mismatch: string;
}

export const EMOJI_ICONS: IconSet = {
  ok: "✅",
  err: "❌",
  warn: "⚠️",
  info: "ℹ️",
  match: "🔒",
  mismatch: "⚠️",
};

/** For CI logs */
export const PLAIN_ICONS: IconSet = {
  ok: "OK",
  err: "ERR",
  warn: "WARN",
  info: "INFO",
  match: "MATCH",
  mismatch: "MISMATCH",
};

export function iconSet(emoji: boolean): IconSet {
  return emoji ? EMOJI_ICONS : PLAIN_ICONS;
}

export const TABLE_HEADER = "# tx | status | chain | block | fee(ETH) | commitment | time | cross-check";

const FIELD_LABELS = [
  ["chainId", "chainId"],
  ["blockNumber", "block"],
  ["status", "status"],
  ["gasUsed", "gasUsed"],
] as const satisfies ReadonlyArray<readonly [keyof FieldComparison, string]>;

export function formatFeeEth(wei: bigint | null): string {
  return wei === null ? "-" : Number(formatEther(wei)).toFixed(6);
}

export function formatProviderHeader(identity: ProviderIdentity): string {
  const label = identity.label === "primary" ? "Primary" : "Secondary";
  return `${label}: ${identity.network} (chainId ${identity.chainId})`;
}

export function differingFields(fields: FieldComparison): string[] {
  const differing = FIELD_LABELS.filter(([key]) => !fields[key]).map(([, label]) => label);
  return differing.length > 0 ? differing : ["commitment"];
}

function describeFailure(outcome: ProviderOutcome | null, label: string): string {
  if (!outcome || outcome.status === "not_found") return `not-found on ${label}`;
  if (outcome.status === "error") return `error on ${label}: ${outcome.error}`;
  return `ok on ${label}`;
}

function crossNote(result: TxAuditResult, icons: IconSet): string {
  const secondary = result.secondary;
  if (!secondary) return "-";
  if (secondary.status !== "ok") return `${icons.warn} ${describeFailure(secondary, "secondary")}`;
  if (result.match === true) return `${icons.match} ok`;
  if (result.fields) return `${icons.mismatch} mismatch (${differingFields(result.fields).join(", ")})`;
  if (result.verdict === "mismatch") return `${icons.mismatch} mismatch (found only on secondary)`;
  return `${icons.ok} secondary ok`;
}

export function formatResultRow(result: TxAuditResult, icons: IconSet): string {
  if (result.verdict === "invalid_input") {
    return `${icons.err} ${result.txHash} | invalid tx hash`;
  }

  const primary = result.primary;
  if (!primary || primary.status !== "ok") {
    return [
      `${icons.err} ${result.txHash}`,
      describeFailure(primary, "primary"),
      formatElapsed(result.elapsedMs),
      crossNote(result, icons),
    ].join(" | ");
  }

  const b = primary.bundle;
  const icon = b.status === 1 ? icons.ok : icons.err;
  return [
    `${icon} ${result.txHash}`,
    b.status === 1 ? "success" : "failed",
    String(b.chainId),
    b.blockNumber.toString(),
    formatFeeEth(b.totalFeeWei),
    b.commitment,
    formatElapsed(result.elapsedMs),
    crossNote(result, icons),
  ].join(" | ");
}

export function formatBatchHuman(summary: BatchSummary, icons: IconSet): string {
  const lines: string[] = [];
  for (const provider of summary.providers) {
    lines.push(formatProviderHeader(provider));
  }
  lines.push("");
  lines.push(TABLE_HEADER);
  for (const result of summary.results) {
    lines.push(formatResultRow(result, icons));
  }
  lines.push("");

  const c = summary.counts;
  lines.push(`Processed ${c.total} tx(s) in ${formatElapsed(summary.elapsedMs)}.`);
  lines.push(
    `Summary: success=${c.success}, failed=${c.failed}, not_found=${c.not_found}, ` +
      `provider_error=${c.provider_error}, mismatch=${c.mismatch}, invalid_input=${c.invalid_input}`,
  );
  return lines.join("\n");
}

function formatBundle(bundle: ReceiptBundle): string[] {
  const lines = [
    `Network: ${bundle.network} (chainId ${bundle.chainId})`,
    `Tx: ${bundle.txHash}`,
    `From: ${bundle.from}`,
    `To: ${bundle.to ?? "(contract creation)"}`,
    `Block: ${bundle.blockNumber}`,
  ];
  if (bundle.blockTimestamp !== undefined) {
    lines.push(`Block timestamp: ${formatUnixUtc(bundle.blockTimestamp)}`);
  }
  lines.push(`Status: ${bundle.status}  GasUsed: ${bundle.gasUsed}`);
  lines.push(
    bundle.totalFeeWei !== null && bundle.feeSource !== null
      ? `Fee: ${formatFeeEth(bundle.totalFeeWei)} ETH (${bundle.feeSource})`
      : "Fee: unavailable",
  );
  lines.push(`Commitment: ${bundle.commitment}`);
  return lines;
}

function formatOutcome(title: string, outcome: ProviderOutcome, icons: IconSet): string[] {
  const lines = [`--- ${title} ---`];
  switch (outcome.status) {
    case "ok":
      lines.push(...formatBundle(outcome.bundle));
      break;
    case "not_found":
      lines.push(`${icons.err} Receipt not found (transaction pending or unknown).`);
      break;
    case "error":
      lines.push(`${icons.err} ${outcome.error}`);
      break;
  }
  return lines;
}

/**
 * Detailed single-transaction view with a field-by-field cross-check
 */
export function formatTransactionDetail(result: TxAuditResult, icons: IconSet): string {
  if (result.verdict === "invalid_input") {
    return `${icons.err} ${result.error ?? `Invalid transaction hash: ${result.txHash}`}`;
  }

  const lines: string[] = [];
  if (result.primary) lines.push(...formatOutcome("PRIMARY", result.primary, icons));

  if (!result.secondary) {
    lines.push(`${icons.info} Set RPC_URL_2 (or --rpc2) to enable cross-provider soundness checks.`);
  } else {
    lines.push(...formatOutcome("SECONDARY", result.secondary, icons));
    lines.push("--- CROSS-CHECK ---");
    if (result.fields) {
      const mark = (same: boolean) => (same ? icons.ok : icons.err);
      lines.push(`Chain IDs match: ${mark(result.fields.chainId)}`);
      lines.push(`Block numbers match: ${mark(result.fields.blockNumber)}`);
      lines.push(`Status matches: ${mark(result.fields.status)}`);
      lines.push(`GasUsed matches: ${mark(result.fields.gasUsed)}`);
      lines.push(`Commitments match: ${mark(result.fields.commitment)}`);
    }
    if (result.verdict === "ok") {
      lines.push(`${icons.match} Soundness confirmed across providers.`);
    } else if (result.verdict === "mismatch") {
      lines.push(`${icons.mismatch} Inconsistency detected. Check providers, block tags, or re-run.`);
    } else {
      lines.push(`${icons.warn} Cross-check incomplete: ${result.verdict.replace("_", " ")}.`);
    }
  }

  lines.push(`Elapsed: ${formatElapsed(result.elapsedMs)}`);
  return lines.join("\n");
}
