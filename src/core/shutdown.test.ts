import { afterEach, describe, it, expect } from "vitest";
import {
  installInterruptHandler,
  isShutdownRequested,
  requestShutdown,
  resetShutdown,
  shutdownSignal,
} from "./shutdown.js";

describe("shutdown", () => {
  afterEach(() => {
    resetShutdown();
    process.exitCode = undefined;
  });

  it("should abort the shared signal and set exit code 130", () => {
    const signal = shutdownSignal();
    requestShutdown("test");

    expect(signal.aborted).toBe(true);
    expect(isShutdownRequested()).toBe(true);
    expect(process.exitCode).toBe(130);
  });

  it("should be idempotent", () => {
    requestShutdown("first");
    process.exitCode = 0;
    requestShutdown("second");
    expect(process.exitCode).toBe(0);
  });

  it("should install its SIGINT listener only once", () => {
    const before = process.listenerCount("SIGINT");
    installInterruptHandler();
    installInterruptHandler();
    expect(process.listenerCount("SIGINT")).toBe(before + 1);
  });

  it("should hand out a fresh signal after reset", () => {
    requestShutdown();
    resetShutdown();
    expect(shutdownSignal().aborted).toBe(false);
    expect(isShutdownRequested()).toBe(false);
  });
});
