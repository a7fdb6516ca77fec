/**
 * Command handlers behind the txaudit CLI
 *
 * Each handler returns the process exit code instead of exiting, and takes
 * its environment, adapters and output streams as dependencies so tests can
 * drive it without a network.
 */

import { auditTransaction, type AuditOptions } from "../core/auditor.js";
import { countVerdicts, prepareHashes, runBatch } from "../core/batch.js";
import { loadConfig, placeholderWarnings, redactRpcUrl, type AuditConfig, type ConfigOverrides } from "../core/config.js";
import { AuditAbortedError, errorMessage, InvalidInputError } from "../core/errors.js";
import { openSessions, type ProviderSession } from "../core/session.js";
import { isShutdownRequested, shutdownSignal } from "../core/shutdown.js";
import type { TxAuditResult } from "../core/types.js";
import { formatBatchHuman, formatTransactionDetail, iconSet, type IconSet } from "../report/human.js";
import { renderJson, resultToJson } from "../report/json.js";
import { EvmProviderAdapter, type EvmProviderOptions } from "../rpc/evmProvider.js";
import type { ProviderAdapter } from "../rpc/provider.js";
import type { RetryEvent, Sleep } from "../rpc/retry.js";
import { debug } from "../utils/debug.js";
import { normalizeTxHash, validateTxHash } from "../utils/validate.js";
import { ExitCode, exitCodeForSummary } from "./exitCodes.js";
import { collectHashes, nodeReaders, type InputReaders } from "./input.js";

export interface Output {
  out(text: string): void;
  err(text: string): void;
}

export const consoleOutput: Output = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export interface CommandDeps {
  env: Record<string, string | undefined>;
  createAdapter(options: EvmProviderOptions): ProviderAdapter;
  readers: InputReaders;
  output: Output;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => number;
}

export function defaultDeps(): CommandDeps {
  return {
    env: process.env,
    createAdapter: (options) => new EvmProviderAdapter(options),
    readers: nodeReaders,
    output: consoleOutput,
    signal: shutdownSignal(),
  };
}

/**
 * Flags shared by every command. Values stay strings until loadConfig validates them.
 */
export interface CommonFlags {
  rpc?: string;
  rpc2?: string;
  retries?: string;
  retryDelay?: string;
  backoff?: string;
  timeout?: string;
  json?: boolean;
  /** false when --no-emoji is given */
  emoji?: boolean;
}

export interface BatchFlags extends CommonFlags {
  tx?: string[];
  file?: string;
  max?: string;
  concurrency?: string;
}

function toOverrides(flags: CommonFlags & { max?: string; concurrency?: string }): ConfigOverrides {
  return {
    rpcUrl: flags.rpc,
    rpc2Url: flags.rpc2,
    retries: flags.retries,
    retryDelayMs: flags.retryDelay,
    backoff: flags.backoff,
    timeoutMs: flags.timeout,
    concurrency: flags.concurrency,
    maxItems: flags.max,
  };
}

function buildAdapters(config: AuditConfig, deps: CommandDeps): ProviderAdapter[] {
  const adapters = [deps.createAdapter({ label: "primary", url: config.rpcUrl, timeoutMs: config.timeoutMs })];
  if (config.rpc2Url) {
    adapters.push(deps.createAdapter({ label: "secondary", url: config.rpc2Url, timeoutMs: config.timeoutMs }));
  }
  return adapters;
}

function retryReporter(output: Output, icons: IconSet) {
  return (event: RetryEvent): void => {
    output.err(
      `${icons.warn} ${event.operation} on ${event.provider} RPC failed ` +
        `(attempt ${event.attempt}/${event.maxAttempts}): ${event.error}. Retrying in ${event.delayMs}ms...`,
    );
  };
}

function loadCommandConfig(
  flags: CommonFlags & { max?: string; concurrency?: string },
  deps: CommandDeps,
  icons: IconSet,
): AuditConfig {
  const config = loadConfig(deps.env, toOverrides(flags));
  for (const warning of placeholderWarnings(config)) {
    deps.output.err(`${icons.warn} ${warning}`);
  }
  return config;
}

/**
 * Open provider sessions; the chain identity check happens here
 */
async function connect(
  config: AuditConfig,
  deps: CommandDeps,
  icons: IconSet,
): Promise<{ sessions: ProviderSession[]; audit: AuditOptions }> {
  const audit: AuditOptions = {
    policy: config.retry,
    signal: deps.signal,
    sleep: deps.sleep,
    now: deps.now,
    onRetry: retryReporter(deps.output, icons),
  };
  const sessions = await openSessions(buildAdapters(config, deps), audit);
  for (const session of sessions) {
    debug(`${session.label} RPC ${redactRpcUrl(session.adapter.url)} -> chainId ${session.chainId} (${session.network})`);
  }
  return { sessions, audit };
}

function reportFailure(error: unknown, output: Output, icons: IconSet, json = false): ExitCode {
  if (error instanceof InvalidInputError) {
    output.err(`${icons.err} ${error.message}`);
    if (json) {
      output.out(JSON.stringify({ error: error.toJSON() }, null, 2));
    }
    return ExitCode.NO_INPUT;
  }
  if (error instanceof AuditAbortedError) {
    output.err(`${icons.warn} ${error.message}.`);
    return ExitCode.ABORTED;
  }
  output.err(`${icons.err} ${errorMessage(error)}`);
  return ExitCode.FATAL;
}

/**
 * An interrupt that lands after the handler finished still ends the process with 130
 */
export function finalExitCode(code: ExitCode): ExitCode {
  return isShutdownRequested() ? ExitCode.ABORTED : code;
}

function logResult(result: TxAuditResult): void {
  debug(`${result.txHash} -> ${result.verdict} (${result.elapsedMs}ms)`);
}

/**
 * txaudit [batch] [hashes...]
 */
export async function runBatchCommand(args: readonly string[], flags: BatchFlags, deps: CommandDeps): Promise<ExitCode> {
  const icons = iconSet(flags.emoji !== false);
  try {
    const config = loadCommandConfig(flags, deps, icons);
    const raw = await collectHashes({ args, tx: flags.tx, file: flags.file }, deps.readers);
    const hashes = prepareHashes(raw, config.maxItems);

    if (hashes.length === 0) {
      deps.output.err(`${icons.err} No transaction hashes provided. Pass them as arguments, with --tx, or via --file.`);
      return ExitCode.NO_INPUT;
    }

    const invalid = hashes.filter((hash) => normalizeTxHash(hash) === null);
    for (const hash of invalid) {
      deps.output.err(`${icons.warn} Invalid tx hash: ${hash}`);
    }
    if (invalid.length === hashes.length) {
      deps.output.err(`${icons.err} No valid transaction hashes to audit.`);
      return ExitCode.NO_INPUT;
    }

    const { sessions, audit } = await connect(config, deps, icons);
    const summary = await runBatch(hashes, sessions, {
      ...audit,
      concurrency: config.concurrency,
      onResult: logResult,
    });

    deps.output.out(flags.json ? renderJson(summary) : formatBatchHuman(summary, icons));
    return exitCodeForSummary(summary.counts);
  } catch (error) {
    return reportFailure(error, deps.output, icons);
  }
}

/**
 * txaudit check <hash>: one transaction, block timestamp included
 */
export async function runCheckCommand(hash: string, flags: CommonFlags, deps: CommandDeps): Promise<ExitCode> {
  const icons = iconSet(flags.emoji !== false);

  try {
    const validation = validateTxHash(hash);
    if (!validation.valid) {
      throw new InvalidInputError(hash.trim());
    }
    const config = loadCommandConfig(flags, deps, icons);
    const { sessions, audit } = await connect(config, deps, icons);
    const result = await auditTransaction(validation.hash, sessions, { ...audit, withBlockTimestamp: true });
    logResult(result);

    deps.output.out(
      flags.json ? JSON.stringify(resultToJson(result), null, 2) : formatTransactionDetail(result, icons),
    );
    return exitCodeForSummary(countVerdicts([result]));
  } catch (error) {
    return reportFailure(error, deps.output, icons, flags.json);
  }
}
