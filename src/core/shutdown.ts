/**
 * Idempotent interrupt handling for the CLI
 * The first SIGINT/SIGTERM aborts in-flight audits and sets exit code 130;
 * a second one falls through to Node's default handler and kills the process.
 */

import { ExitCode } from "../cli/exitCodes.js";
import { debug } from "../utils/debug.js";

let controller = new AbortController();
let requested = false;
let handler: ((signal: NodeJS.Signals) => void) | null = null;

export function shutdownSignal(): AbortSignal {
  return controller.signal;
}

export function isShutdownRequested(): boolean {
  return requested;
}

/**
 * Abort everything listening on shutdownSignal(). Safe to call more than once.
 */
export function requestShutdown(reason = "interrupted"): void {
  if (requested) {
    return;
  }
  requested = true;
  process.exitCode = ExitCode.ABORTED;
  debug(`Shutdown requested (${reason})`);
  controller.abort();
}

export function installInterruptHandler(): AbortSignal {
  if (!handler) {
    handler = (signal) => requestShutdown(signal);
    process.once("SIGINT", handler);
    process.once("SIGTERM", handler);
  }
  return controller.signal;
}

export function removeInterruptHandler(): void {
  if (handler) {
    process.off("SIGINT", handler);
    process.off("SIGTERM", handler);
    handler = null;
  }
}

/**
 * Reset state (useful for tests)
 */
export function resetShutdown(): void {
  removeInterruptHandler();
  controller = new AbortController();
  requested = false;
}
