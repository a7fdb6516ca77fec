/**
 * Batch orchestration
 *
 * Every deduplicated, capped hash yields exactly one TxAuditResult, reported
 * in first-seen input order regardless of concurrency. One transaction's
 * failure never aborts the batch; cancellation aborts it and nothing partial
 * is returned.
 */

import type { ProviderAdapter } from "../rpc/provider.js";
import { getIsoTimestamp } from "../utils/time.js";
import { normalizeTxHash } from "../utils/validate.js";
import { auditTransaction, type AuditOptions } from "./auditor.js";
import { AuditAbortedError } from "./errors.js";
import { openSessions, sessionIdentity, type ProviderSession } from "./session.js";
import type { BatchCounts, BatchSummary, TxAuditResult } from "./types.js";

export interface BatchOptions extends AuditOptions {
  /** Cap after dedup; 0 or undefined = unlimited */
  maxItems?: number;
  /** Parallel audits; default 1 */
  concurrency?: number;
  /** Called as each transaction finishes, in completion order */
  onResult?: (result: TxAuditResult, index: number) => void;
}

/**
 * Drop blanks, dedup preserving first-seen order, then cap.
 * Valid hashes dedup on their normalised form, invalid ones on the trimmed text.
 */
export function prepareHashes(rawHashes: readonly string[], maxItems = 0): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const raw of rawHashes) {
    const trimmed = raw.trim();
    if (!trimmed) continue;
    const key = normalizeTxHash(trimmed) ?? trimmed;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(trimmed);
  }

  return maxItems > 0 ? unique.slice(0, maxItems) : unique;
}

export function emptyCounts(): BatchCounts {
  return { total: 0, success: 0, failed: 0, not_found: 0, provider_error: 0, mismatch: 0, invalid_input: 0 };
}

export function countVerdicts(results: readonly TxAuditResult[]): BatchCounts {
  const counts = emptyCounts();
  for (const result of results) {
    counts.total += 1;
    switch (result.verdict) {
      case "ok": {
        // ok means both bundles agree, so the primary status speaks for both
        const status = result.primary?.status === "ok" ? result.primary.bundle.status : 1;
        if (status === 1) counts.success += 1;
        else counts.failed += 1;
        break;
      }
      case "mismatch":
        counts.mismatch += 1;
        break;
      case "not_found":
        counts.not_found += 1;
        break;
      case "provider_error":
        counts.provider_error += 1;
        break;
      case "invalid_input":
        counts.invalid_input += 1;
        break;
    }
  }
  return counts;
}

/**
 * Audit hashes against already-open sessions
 */
export async function runBatch(
  rawHashes: readonly string[],
  sessions: readonly ProviderSession[],
  options: BatchOptions,
): Promise<BatchSummary> {
  const now = options.now ?? Date.now;
  const startedAtIso = getIsoTimestamp();
  const start = now();

  const hashes = prepareHashes(rawHashes, options.maxItems ?? 0);
  const results: TxAuditResult[] = new Array<TxAuditResult>(hashes.length);
  const workers = Math.max(1, Math.min(options.concurrency ?? 1, hashes.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < hashes.length) {
      if (options.signal?.aborted) {
        throw new AuditAbortedError();
      }
      const index = next++;
      const result = await auditTransaction(hashes[index], sessions, options);
      results[index] = result;
      options.onResult?.(result, index);
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));

  return {
    startedAtIso,
    elapsedMs: now() - start,
    providers: sessions.map(sessionIdentity),
    counts: countVerdicts(results),
    results,
  };
}

/**
 * Open provider sessions (chain identity check included) and run the batch.
 * ChainMismatchError is thrown before any transaction is processed.
 */
export async function runAudit(
  rawHashes: readonly string[],
  adapters: readonly ProviderAdapter[],
  options: BatchOptions,
): Promise<BatchSummary> {
  const sessions = await openSessions(adapters, options);
  return runBatch(rawHashes, sessions, options);
}
