/**
 * Bounded retry for provider calls
 *
 * Delays:
 *   fixed:        delay = ms
 *   exponential:  delay = min(maxMs, baseMs * 2^(attempt - 1))
 *
 * not_found is a terminal answer and is returned on the first attempt.
 * The signal is handed to each attempt so the adapter can cancel the request
 * in flight. Cancellation always surfaces as AuditAbortedError, never
 * ProviderError.
 */

import { AuditAbortedError, errorMessage, ProviderError } from "../core/errors.js";
import type { ProviderCallResult } from "./provider.js";

export type DelayStrategy =
  | { kind: "fixed"; ms: number }
  | { kind: "exponential"; baseMs: number; maxMs: number };

export interface RetryPolicy {
  maxAttempts: number;
  delay: DelayStrategy;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delay: { kind: "fixed", ms: 1000 },
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryEvent {
  provider: string;
  operation: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: string;
}

export type RetryListener = (event: RetryEvent) => void;

export interface RetryOptions {
  provider: string;
  operation: string;
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: RetryListener;
}

export type RetryOutcome<T> = { kind: "ok"; value: T } | { kind: "not_found" };

/**
 * Delay to wait after the given failed attempt (1-indexed)
 */
export function delayForAttempt(policy: RetryPolicy, attempt: number): number {
  const { delay } = policy;
  if (delay.kind === "fixed") {
    return delay.ms;
  }
  return Math.min(delay.maxMs, delay.baseMs * Math.pow(2, attempt - 1));
}

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AuditAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AuditAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Settle with the promise, or reject with AuditAbortedError as soon as the signal fires
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new AuditAbortedError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AuditAbortedError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export async function executeWithRetry<T>(
  call: (signal?: AbortSignal) => Promise<ProviderCallResult<T>>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const sleep = options.sleep ?? abortableSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError = "unknown error";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw new AuditAbortedError();
    }

    let result: ProviderCallResult<T>;
    try {
      result = await raceAbort(call(options.signal), options.signal);
    } catch (error) {
      if (error instanceof AuditAbortedError) throw error;
      // Adapters should not throw; treat it like a transport failure
      result = { kind: "transient", error: errorMessage(error) };
    }

    switch (result.kind) {
      case "ok":
        return { kind: "ok", value: result.value };
      case "not_found":
        return { kind: "not_found" };
      case "fatal":
        throw new ProviderError(
          `${options.operation} failed on ${options.provider} RPC: ${result.error}`,
          options.provider,
          options.operation,
          attempt,
        );
      case "transient":
        lastError = result.error;
        break;
    }

    if (attempt < maxAttempts) {
      const delayMs = delayForAttempt(policy, attempt);
      options.onRetry?.({
        provider: options.provider,
        operation: options.operation,
        attempt,
        maxAttempts,
        delayMs,
        error: lastError,
      });
      await sleep(delayMs, options.signal);
    }
  }

  throw new ProviderError(
    `${options.operation} failed on ${options.provider} RPC after ${maxAttempts} attempts: ${lastError}`,
    options.provider,
    options.operation,
    maxAttempts,
  );
}
