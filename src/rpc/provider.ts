/**
 * Provider adapter contract
 *
 * Every call resolves to a result variant instead of throwing, so callers can
 * tell a legitimate "not found" apart from a transport failure without
 * inspecting exception types.
 */

import type { Hex } from "viem";
import type { ProviderLabel, ProviderReceipt, ProviderTransaction } from "../core/types.js";

export type ProviderCallResult<T> =
  | { kind: "ok"; value: T }
  | { kind: "not_found" }
  | { kind: "transient"; error: string }
  | { kind: "fatal"; error: string };

/**
 * The optional signal cancels the request itself, not only the wait for it.
 */
export interface ProviderAdapter {
  readonly label: ProviderLabel;
  readonly url: string;
  getChainId(signal?: AbortSignal): Promise<ProviderCallResult<number>>;
  getTransaction(hash: Hex, signal?: AbortSignal): Promise<ProviderCallResult<ProviderTransaction>>;
  getReceipt(hash: Hex, signal?: AbortSignal): Promise<ProviderCallResult<ProviderReceipt>>;
  /** Block timestamp in unix seconds */
  getBlockTimestamp(blockNumber: bigint, signal?: AbortSignal): Promise<ProviderCallResult<number>>;
}

export function ok<T>(value: T): ProviderCallResult<T> {
  return { kind: "ok", value };
}

export const NOT_FOUND = { kind: "not_found" } as const;

export function transient(error: string): ProviderCallResult<never> {
  return { kind: "transient", error };
}

export function fatal(error: string): ProviderCallResult<never> {
  return { kind: "fatal", error };
}
