#!/usr/bin/env node
// src/cli/txaudit.ts
// txaudit CLI - batch audit (default) and single-transaction check

import { Command } from "commander";
import dotenv from "dotenv";

import { installInterruptHandler, removeInterruptHandler } from "../core/shutdown.js";
import { defaultDeps, finalExitCode, runBatchCommand, runCheckCommand, type BatchFlags, type CommonFlags } from "./run.js";

dotenv.config();

const VERSION = "0.1.0";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withCommonOptions(command: Command): Command {
  return command
    .option("--rpc <url>", "Primary RPC URL (env RPC_URL)")
    .option("--rpc2 <url>", "Secondary RPC URL for cross-provider checks (env RPC_URL_2)")
    .option("--retries <n>", "Attempts per RPC call (env TXAUDIT_RETRIES, default 3)")
    .option("--retry-delay <ms>", "Delay between attempts in ms (env TXAUDIT_RETRY_DELAY_MS, default 1000)")
    .option("--backoff <kind>", "fixed | exponential (env TXAUDIT_BACKOFF, default fixed)")
    .option("--timeout <ms>", "Per-request timeout in ms (env TXAUDIT_TIMEOUT_MS, default 30000)")
    .option("--json", "Emit structured JSON")
    .option("--no-emoji", "Plain ASCII status tags (useful for CI logs)");
}

const program = new Command();

program
  .name("txaudit")
  .description("Cross-provider soundness auditor for EVM transaction receipts")
  .version(VERSION);

withCommonOptions(
  program
    .command("batch", { isDefault: true })
    .description("Audit a batch of transaction hashes")
    .argument("[hashes...]", "Transaction hashes (0x + 64 hex)")
    .option("--tx <hash>", "Transaction hash (repeatable)", collect, [])
    .option("--file <path>", "File with one tx hash per line (use '-' for stdin)")
    .option("--max <n>", "Process at most N unique hashes (env TXAUDIT_MAX)")
    .option("--concurrency <n>", "Transactions audited in parallel (env TXAUDIT_CONCURRENCY, default 1)"),
).action(async (hashes: string[], opts: BatchFlags) => {
  process.exitCode = finalExitCode(await runBatchCommand(hashes, opts, defaultDeps()));
});

withCommonOptions(
  program
    .command("check")
    .description("Detailed view of one transaction, with block timestamp and field-by-field cross-check")
    .argument("<hash>", "Transaction hash (0x + 64 hex)"),
).action(async (hash: string, opts: CommonFlags) => {
  process.exitCode = finalExitCode(await runCheckCommand(hash, opts, defaultDeps()));
});

installInterruptHandler();
try {
  await program.parseAsync(process.argv);
} finally {
  removeInterruptHandler();
}
