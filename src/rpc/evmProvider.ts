/**
 * EVM JSON-RPC provider adapter (viem PublicClient over HTTP)
 *
 * viem's transport-level retries are disabled; attempts and delays are
 * owned by executeWithRetry. A call given an AbortSignal runs on a client
 * whose fetch is bound to that signal, so aborting closes the request.
 */

import {
  BaseError,
  BlockNotFoundError,
  createPublicClient,
  http,
  InvalidParamsRpcError,
  MethodNotFoundRpcError,
  MethodNotSupportedRpcError,
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
  type Hex,
  type Transport,
} from "viem";
import type { ProviderLabel, ProviderReceipt, ProviderTransaction, ReceiptStatus } from "../core/types.js";
import { fatal, NOT_FOUND, ok, transient, type ProviderAdapter, type ProviderCallResult } from "./provider.js";

export interface EvmProviderOptions {
  label: ProviderLabel;
  url: string;
  /** Per-request timeout in milliseconds (default 30000) */
  timeoutMs?: number;
  /** Replaces the HTTP transport built from url (e.g. a viem custom transport) */
  transport?: Transport;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Map a thrown viem error onto a call result.
 * Missing data is a terminal answer; malformed requests will not heal on retry.
 */
export function classifyRpcError(error: unknown): ProviderCallResult<never> {
  if (
    error instanceof TransactionNotFoundError ||
    error instanceof TransactionReceiptNotFoundError ||
    error instanceof BlockNotFoundError
  ) {
    return NOT_FOUND;
  }

  const message = error instanceof BaseError ? error.shortMessage : error instanceof Error ? error.message : String(error);

  if (
    error instanceof InvalidParamsRpcError ||
    error instanceof MethodNotFoundRpcError ||
    error instanceof MethodNotSupportedRpcError
  ) {
    return fatal(message);
  }
  return transient(message);
}

function toReceiptStatus(status: string): ReceiptStatus | null {
  if (status === "success") return 1;
  if (status === "reverted") return 0;
  return null;
}

function createClient(options: EvmProviderOptions, fetchSignal?: AbortSignal) {
  return createPublicClient({
    transport:
      options.transport ??
      http(options.url, {
        retryCount: 0,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        ...(fetchSignal ? { fetchOptions: { signal: fetchSignal } } : {}),
      }),
  });
}

type EvmClient = ReturnType<typeof createClient>;

export class EvmProviderAdapter implements ProviderAdapter {
  public readonly label: ProviderLabel;
  public readonly url: string;
  private readonly options: EvmProviderOptions;
  private readonly client: EvmClient;

  constructor(options: EvmProviderOptions) {
    this.label = options.label;
    this.url = options.url;
    this.options = options;
    this.client = createClient(options);
  }

  /**
   * Run one request. With a signal, the request gets its own controller that
   * fires on the caller's abort or on the timeout, whichever comes first;
   * viem drops its own timeout signal once fetchOptions carries one.
   */
  private async request<T>(signal: AbortSignal | undefined, run: (client: EvmClient) => Promise<T>): Promise<T> {
    if (!signal || this.options.transport) {
      return run(this.client);
    }

    const controller = new AbortController();
    const abort = () => controller.abort(signal.reason);
    if (signal.aborted) {
      abort();
    } else {
      signal.addEventListener("abort", abort, { once: true });
    }
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

    try {
      return await run(createClient(this.options, controller.signal));
    } finally {
      clearTimeout(timer);
      signal.removeEventListener("abort", abort);
    }
  }

  async getChainId(signal?: AbortSignal): Promise<ProviderCallResult<number>> {
    try {
      return ok(await this.request(signal, (client) => client.getChainId()));
    } catch (error) {
      return classifyRpcError(error);
    }
  }

  async getTransaction(hash: Hex, signal?: AbortSignal): Promise<ProviderCallResult<ProviderTransaction>> {
    try {
      const tx = await this.request(signal, (client) => client.getTransaction({ hash }));
      if (!tx.from) {
        return fatal("transaction response is missing the sender address");
      }
      return ok({
        hash: tx.hash,
        from: tx.from,
        to: tx.to ?? null,
        gasPrice: tx.gasPrice ?? null,
        blockNumber: tx.blockNumber ?? null,
      });
    } catch (error) {
      return classifyRpcError(error);
    }
  }

  async getReceipt(hash: Hex, signal?: AbortSignal): Promise<ProviderCallResult<ProviderReceipt>> {
    try {
      const receipt = await this.request(signal, (client) => client.getTransactionReceipt({ hash }));
      const status = toReceiptStatus(receipt.status);
      if (status === null) {
        return fatal(`receipt has an unexpected status: ${String(receipt.status)}`);
      }
      if (typeof receipt.blockNumber !== "bigint" || typeof receipt.gasUsed !== "bigint") {
        return fatal("receipt is missing blockNumber or gasUsed");
      }
      return ok({
        blockNumber: receipt.blockNumber,
        status,
        gasUsed: receipt.gasUsed,
        // Typed as always present, but older nodes leave it out
        effectiveGasPrice: typeof receipt.effectiveGasPrice === "bigint" ? receipt.effectiveGasPrice : null,
        from: receipt.from,
        to: receipt.to ?? null,
      });
    } catch (error) {
      return classifyRpcError(error);
    }
  }

  async getBlockTimestamp(blockNumber: bigint, signal?: AbortSignal): Promise<ProviderCallResult<number>> {
    try {
      const block = await this.request(signal, (client) => client.getBlock({ blockNumber }));
      return ok(Number(block.timestamp));
    } catch (error) {
      return classifyRpcError(error);
    }
  }
}
