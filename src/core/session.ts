/**
 * Provider sessions: one per configured adapter, opened once per run.
 * Chain identity is read here and never again per transaction.
 */

import type { ProviderAdapter } from "../rpc/provider.js";
import { executeWithRetry, type RetryListener, type RetryPolicy, type Sleep } from "../rpc/retry.js";
import { networkName } from "../report/networks.js";
import { ChainMismatchError, ConfigError, ProviderError } from "./errors.js";
import type { ProviderIdentity, ProviderLabel } from "./types.js";

export interface ProviderSession {
  readonly label: ProviderLabel;
  readonly adapter: ProviderAdapter;
  readonly chainId: number;
  readonly network: string;
}

export interface SessionOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: RetryListener;
}

async function openSession(adapter: ProviderAdapter, options: SessionOptions): Promise<ProviderSession> {
  const outcome = await executeWithRetry((signal) => adapter.getChainId(signal), options.policy, {
    provider: adapter.label,
    operation: "eth_chainId",
    signal: options.signal,
    sleep: options.sleep,
    onRetry: options.onRetry,
  });
  if (outcome.kind === "not_found") {
    throw new ProviderError(`${adapter.label} RPC returned no chain id`, adapter.label, "eth_chainId", 1);
  }
  return {
    label: adapter.label,
    adapter,
    chainId: outcome.value,
    network: networkName(outcome.value),
  };
}

/**
 * Connect to every adapter and make sure they agree on the chain.
 * Throws ChainMismatchError before any transaction is audited.
 */
export async function openSessions(
  adapters: readonly ProviderAdapter[],
  options: SessionOptions,
): Promise<ProviderSession[]> {
  if (adapters.length < 1 || adapters.length > 2) {
    throw new ConfigError(`Expected 1 or 2 providers, got ${adapters.length}`);
  }

  const sessions: ProviderSession[] = [];
  for (const adapter of adapters) {
    sessions.push(await openSession(adapter, options));
  }

  const [primary, secondary] = sessions;
  if (secondary && secondary.chainId !== primary.chainId) {
    throw new ChainMismatchError(
      { label: primary.label, chainId: primary.chainId },
      { label: secondary.label, chainId: secondary.chainId },
    );
  }
  return sessions;
}

export function sessionIdentity(session: ProviderSession): ProviderIdentity {
  return {
    label: session.label,
    url: session.adapter.url,
    chainId: session.chainId,
    network: session.network,
  };
}
