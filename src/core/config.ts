/**
 * Audit configuration
 *
 * Precedence: explicit overrides (CLI flags) > environment > DEFAULT_CONFIG.
 * Placeholder detection runs once here; nothing downstream compares URL strings.
 */

import { DEFAULT_RETRY_POLICY, type DelayStrategy, type RetryPolicy } from "../rpc/retry.js";
import { ConfigError } from "./errors.js";

export const PLACEHOLDER_RPC_URL = "https://mainnet.infura.io/v3/your_api_key";

const PLACEHOLDER_PATTERNS = [/your_api_key/i, /your_key/i, /<[^>]*>/];

export type BackoffKind = DelayStrategy["kind"];

export interface AuditConfig {
  rpcUrl: string;
  rpc2Url: string | null;
  retry: RetryPolicy;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Transactions audited in parallel; 1 = sequential */
  concurrency: number;
  /** Cap on hashes processed after dedup; 0 = no limit */
  maxItems: number;
}

export const DEFAULT_CONFIG: AuditConfig = {
  rpcUrl: PLACEHOLDER_RPC_URL,
  rpc2Url: null,
  retry: DEFAULT_RETRY_POLICY,
  timeoutMs: 30_000,
  concurrency: 1,
  maxItems: 0,
};

/** Upper bound for exponential backoff delays */
export const DEFAULT_MAX_BACKOFF_MS = 30_000;

/**
 * Raw string values as they arrive from flags or the environment
 */
export interface ConfigOverrides {
  rpcUrl?: string;
  rpc2Url?: string;
  retries?: string;
  retryDelayMs?: string;
  backoff?: string;
  timeoutMs?: string;
  concurrency?: string;
  maxItems?: string;
}

type Env = Record<string, string | undefined>;

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const v of values) {
    if (v !== undefined && v.trim().length > 0) return v.trim();
  }
  return undefined;
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined) return fallback;
  const v = Number(raw);
  if (!Number.isInteger(v) || v < min) {
    throw new ConfigError(`Invalid ${name}: "${raw}". Must be an integer >= ${min}`, { name, raw });
  }
  return v;
}

function parseBackoff(raw: string | undefined): BackoffKind {
  if (raw === undefined) return DEFAULT_CONFIG.retry.delay.kind;
  const v = raw.toLowerCase();
  if (v === "fixed" || v === "exponential") return v;
  throw new ConfigError(`Invalid backoff "${raw}". Expected one of: fixed | exponential`, { raw });
}

/**
 * Validate RPC URL - reject malformed URLs and non-http(s) schemes
 */
export function validateRpcUrl(url: string): { valid: boolean; error?: string } {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { valid: false, error: `unsupported protocol ${parsed.protocol}` };
    }
    if (!parsed.hostname) {
      return { valid: false, error: "missing hostname" };
    }
    return { valid: true };
  } catch {
    return { valid: false, error: "malformed URL" };
  }
}

export function isPlaceholderRpcUrl(url: string): boolean {
  return PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(url));
}

/**
 * One warning per configured endpoint that still carries a placeholder
 */
export function placeholderWarnings(config: AuditConfig): string[] {
  const warnings: string[] = [];
  if (isPlaceholderRpcUrl(config.rpcUrl)) {
    warnings.push("Primary RPC URL still contains a placeholder. Set RPC_URL (or --rpc) for real usage.");
  }
  if (config.rpc2Url && isPlaceholderRpcUrl(config.rpc2Url)) {
    warnings.push("Secondary RPC URL still contains a placeholder. Set RPC_URL_2 (or --rpc2) for real usage.");
  }
  return warnings;
}

export function loadConfig(env: Env, overrides: ConfigOverrides = {}): AuditConfig {
  const rpcUrl = firstNonEmpty(overrides.rpcUrl, env.RPC_URL) ?? DEFAULT_CONFIG.rpcUrl;
  const rpc2Url = firstNonEmpty(overrides.rpc2Url, env.RPC_URL_2) ?? null;

  for (const [name, url] of [
    ["RPC URL", rpcUrl],
    ["secondary RPC URL", rpc2Url],
  ] as const) {
    if (url === null) continue;
    const check = validateRpcUrl(url);
    if (!check.valid) {
      throw new ConfigError(`Invalid ${name} "${url}": ${check.error}`, { url });
    }
  }

  const maxAttempts = parseInteger(
    "retries",
    firstNonEmpty(overrides.retries, env.TXAUDIT_RETRIES),
    DEFAULT_CONFIG.retry.maxAttempts,
    1,
  );
  const defaultDelay = DEFAULT_CONFIG.retry.delay.kind === "fixed" ? DEFAULT_CONFIG.retry.delay.ms : 1000;
  const delayMs = parseInteger(
    "retry delay",
    firstNonEmpty(overrides.retryDelayMs, env.TXAUDIT_RETRY_DELAY_MS),
    defaultDelay,
    0,
  );
  const backoff = parseBackoff(firstNonEmpty(overrides.backoff, env.TXAUDIT_BACKOFF));

  return {
    rpcUrl,
    rpc2Url,
    retry: {
      maxAttempts,
      delay:
        backoff === "fixed"
          ? { kind: "fixed", ms: delayMs }
          : { kind: "exponential", baseMs: delayMs, maxMs: Math.max(delayMs, DEFAULT_MAX_BACKOFF_MS) },
    },
    timeoutMs: parseInteger(
      "timeout",
      firstNonEmpty(overrides.timeoutMs, env.TXAUDIT_TIMEOUT_MS),
      DEFAULT_CONFIG.timeoutMs,
      1,
    ),
    concurrency: parseInteger(
      "concurrency",
      firstNonEmpty(overrides.concurrency, env.TXAUDIT_CONCURRENCY),
      DEFAULT_CONFIG.concurrency,
      1,
    ),
    maxItems: parseInteger("max", firstNonEmpty(overrides.maxItems, env.TXAUDIT_MAX), DEFAULT_CONFIG.maxItems, 0),
  };
}

/**
 * Strip credentials from an RPC URL before it is printed: userinfo, query
 * string, and any long opaque path segment (API keys usually live there).
 */
export function redactRpcUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const path = parsed.pathname
      .split("/")
      .map((segment) => (/^[A-Za-z0-9_-]{20,}$/.test(segment) ? "***" : segment))
      .join("/");
    return `${parsed.protocol}//${parsed.host}${path === "/" ? "" : path}${parsed.search ? "?***" : ""}`;
  } catch {
    return "[invalid url]";
  }
}
