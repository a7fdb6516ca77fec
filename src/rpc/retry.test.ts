import { describe, it, expect, vi } from "vitest";
import { AuditAbortedError, ProviderError } from "../core/errors.js";
import { recordingSleep } from "../test/fakeProvider.js";
import type { ProviderCallResult } from "./provider.js";
import {
  DEFAULT_RETRY_POLICY,
  delayForAttempt,
  executeWithRetry,
  raceAbort,
  type RetryEvent,
  type RetryPolicy,
} from "./retry.js";

function scripted<T>(...results: ProviderCallResult<T>[]) {
  let i = 0;
  return vi.fn(async (): Promise<ProviderCallResult<T>> => results[Math.min(i++, results.length - 1)]);
}

const OPTIONS = { provider: "primary", operation: "eth_getTransactionReceipt" };

describe("retry", () => {
  describe("delayForAttempt", () => {
    it("should return the same delay for a fixed strategy", () => {
      expect(delayForAttempt(DEFAULT_RETRY_POLICY, 1)).toBe(1000);
      expect(delayForAttempt(DEFAULT_RETRY_POLICY, 2)).toBe(1000);
    });

    it("should double and cap for an exponential strategy", () => {
      const policy: RetryPolicy = { maxAttempts: 5, delay: { kind: "exponential", baseMs: 100, maxMs: 250 } };
      expect([1, 2, 3, 4].map((a) => delayForAttempt(policy, a))).toEqual([100, 200, 250, 250]);
    });
  });

  describe("executeWithRetry", () => {
    it("should return the first successful result without sleeping", async () => {
      const { delays, sleep } = recordingSleep();
      const call = scripted<number>({ kind: "ok", value: 7 });

      const outcome = await executeWithRetry(call, DEFAULT_RETRY_POLICY, { ...OPTIONS, sleep });

      expect(outcome).toEqual({ kind: "ok", value: 7 });
      expect(call).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([]);
    });

    it("should retry transient failures and report each retry", async () => {
      const { delays, sleep } = recordingSleep();
      const events: RetryEvent[] = [];
      const call = scripted<number>(
        { kind: "transient", error: "timeout" },
        { kind: "transient", error: "connection reset" },
        { kind: "ok", value: 1 },
      );

      const outcome = await executeWithRetry(call, DEFAULT_RETRY_POLICY, {
        ...OPTIONS,
        sleep,
        onRetry: (e) => events.push(e),
      });

      expect(outcome).toEqual({ kind: "ok", value: 1 });
      expect(call).toHaveBeenCalledTimes(3);
      expect(delays).toEqual([1000, 1000]);
      expect(events.map((e) => [e.attempt, e.error])).toEqual([
        [1, "timeout"],
        [2, "connection reset"],
      ]);
      expect(events[0]).toMatchObject({ provider: "primary", maxAttempts: 3, delayMs: 1000 });
    });

    it("should throw ProviderError after the last attempt without a trailing sleep", async () => {
      const { delays, sleep } = recordingSleep();
      const call = scripted<number>({ kind: "transient", error: "connection reset" });

      const error = await executeWithRetry(call, DEFAULT_RETRY_POLICY, { ...OPTIONS, sleep }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({
        message: "eth_getTransactionReceipt failed on primary RPC after 3 attempts: connection reset",
        attempts: 3,
        code: "PROVIDER_ERROR",
      });
      expect(call).toHaveBeenCalledTimes(3);
      expect(delays).toEqual([1000, 1000]);
    });

    it("should not retry fatal failures", async () => {
      const { delays, sleep } = recordingSleep();
      const call = scripted<number>({ kind: "fatal", error: "invalid params" });

      await expect(executeWithRetry(call, DEFAULT_RETRY_POLICY, { ...OPTIONS, sleep })).rejects.toThrow(
        "eth_getTransactionReceipt failed on primary RPC: invalid params",
      );
      expect(call).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([]);
    });

    it("should return not_found immediately", async () => {
      const call = scripted<number>({ kind: "not_found" });
      const outcome = await executeWithRetry(call, DEFAULT_RETRY_POLICY, { ...OPTIONS, sleep: recordingSleep().sleep });
      expect(outcome).toEqual({ kind: "not_found" });
      expect(call).toHaveBeenCalledTimes(1);
    });

    it("should treat a thrown error as transient", async () => {
      const { sleep } = recordingSleep();
      let calls = 0;
      const call = async (): Promise<ProviderCallResult<string>> => {
        calls++;
        if (calls === 1) throw new Error("socket hang up");
        return { kind: "ok", value: "done" };
      };

      const outcome = await executeWithRetry(call, DEFAULT_RETRY_POLICY, { ...OPTIONS, sleep });
      expect(outcome).toEqual({ kind: "ok", value: "done" });
      expect(calls).toBe(2);
    });

    it("should hand the caller's signal to every attempt", async () => {
      const controller = new AbortController();
      const call = vi.fn(
        async (_signal?: AbortSignal): Promise<ProviderCallResult<number>> => ({ kind: "transient", error: "timeout" }),
      );

      await expect(
        executeWithRetry(call, DEFAULT_RETRY_POLICY, { ...OPTIONS, signal: controller.signal, sleep: recordingSleep().sleep }),
      ).rejects.toBeInstanceOf(ProviderError);
      expect(call).toHaveBeenCalledTimes(3);
      expect(call.mock.calls.map(([signal]) => signal)).toEqual([controller.signal, controller.signal, controller.signal]);
    });

    it("should not call the provider once the signal is aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const call = scripted<number>({ kind: "ok", value: 1 });

      await expect(
        executeWithRetry(call, DEFAULT_RETRY_POLICY, { ...OPTIONS, signal: controller.signal }),
      ).rejects.toBeInstanceOf(AuditAbortedError);
      expect(call).not.toHaveBeenCalled();
    });

    it("should abort a pending retry sleep", async () => {
      const controller = new AbortController();
      const call = scripted<number>({ kind: "transient", error: "timeout" });

      await expect(
        executeWithRetry(
          call,
          { maxAttempts: 3, delay: { kind: "fixed", ms: 60_000 } },
          { ...OPTIONS, signal: controller.signal, onRetry: () => controller.abort() },
        ),
      ).rejects.toBeInstanceOf(AuditAbortedError);
      expect(call).toHaveBeenCalledTimes(1);
    });
  });

  describe("raceAbort", () => {
    it("should reject a pending call when the signal fires", async () => {
      const controller = new AbortController();
      const pending = raceAbort(new Promise<never>(() => {}), controller.signal);
      controller.abort();
      await expect(pending).rejects.toBeInstanceOf(AuditAbortedError);
    });

    it("should pass results through when not aborted", async () => {
      const controller = new AbortController();
      await expect(raceAbort(Promise.resolve(5), controller.signal)).resolves.toBe(5);
    });
  });
});
