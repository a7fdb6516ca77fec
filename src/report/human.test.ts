import { describe, it, expect } from "vitest";
import type { BatchSummary, ReceiptBundle, TxAuditResult } from "../core/types.js";
import { HASH_A, HASH_B, RECIPIENT, SENDER } from "../test/fakeProvider.js";
import {
  EMOJI_ICONS,
  formatBatchHuman,
  formatFeeEth,
  formatResultRow,
  formatTransactionDetail,
  iconSet,
  PLAIN_ICONS,
} from "./human.js";

const C1 = "0xe8f239da584aad9a3a490fb3667ad4cea09f04f2cd9fabd26c2d493310169b1d";
const C2 = "0x6b265825c9f46e953f1f899a51e220d1f3c9d9c621d8e5d398ded9097ea938e5";

const PRIMARY: ReceiptBundle = {
  provider: "primary",
  chainId: 1,
  network: "Ethereum Mainnet",
  txHash: HASH_A,
  blockNumber: 100n,
  status: 1,
  gasUsed: 21000n,
  effectiveGasPrice: 20_000_000_000n,
  feeSource: "receipt",
  totalFeeWei: 420_000_000_000_000n,
  from: SENDER,
  to: RECIPIENT,
  blockTimestamp: 1700000000,
  commitment: C1,
};

const SECONDARY: ReceiptBundle = { ...PRIMARY, provider: "secondary" };

function result(overrides: Partial<TxAuditResult> = {}): TxAuditResult {
  return {
    txHash: HASH_A,
    verdict: "ok",
    primary: { status: "ok", bundle: PRIMARY },
    secondary: null,
    match: null,
    fields: null,
    elapsedMs: 12,
    ...overrides,
  };
}

const ALL_MATCH = { chainId: true, blockNumber: true, status: true, gasUsed: true, commitment: true };
const GAS_DIFFERS = { ...ALL_MATCH, gasUsed: false, commitment: false };

describe("human report", () => {
  it("should pick icon sets", () => {
    expect(iconSet(true)).toBe(EMOJI_ICONS);
    expect(iconSet(false)).toBe(PLAIN_ICONS);
  });

  it("should format fees with six decimals", () => {
    expect(formatFeeEth(420_000_000_000_000n)).toBe("0.000420");
    expect(formatFeeEth(null)).toBe("-");
  });

  describe("formatResultRow", () => {
    it("should render a single-provider row", () => {
      expect(formatResultRow(result(), PLAIN_ICONS)).toBe(`OK ${HASH_A} | success | 1 | 100 | 0.000420 | ${C1} | 12ms | -`);
    });

    it("should mark a reverted transaction as failed", () => {
      const reverted = result({ primary: { status: "ok", bundle: { ...PRIMARY, status: 0 } } });
      expect(formatResultRow(reverted, PLAIN_ICONS)).toBe(`ERR ${HASH_A} | failed | 1 | 100 | 0.000420 | ${C1} | 12ms | -`);
    });

    it("should show cross-provider agreement", () => {
      const row = formatResultRow(
        result({ secondary: { status: "ok", bundle: SECONDARY }, match: true, fields: ALL_MATCH }),
        EMOJI_ICONS,
      );
      expect(row).toBe(`✅ ${HASH_A} | success | 1 | 100 | 0.000420 | ${C1} | 12ms | 🔒 ok`);
    });

    it("should name the fields behind a mismatch", () => {
      const row = formatResultRow(
        result({
          verdict: "mismatch",
          secondary: { status: "ok", bundle: { ...SECONDARY, gasUsed: 21001n, commitment: C2 } },
          match: false,
          fields: GAS_DIFFERS,
        }),
        PLAIN_ICONS,
      );
      expect(row.endsWith("| MISMATCH mismatch (gasUsed)")).toBe(true);
    });

    it("should report secondary problems", () => {
      const row = formatResultRow(
        result({ verdict: "provider_error", secondary: { status: "error", code: "PROVIDER_ERROR", error: "timeout" } }),
        PLAIN_ICONS,
      );
      expect(row.endsWith("| WARN error on secondary: timeout")).toBe(true);
    });

    it("should show how long each transaction took", () => {
      expect(formatResultRow(result({ elapsedMs: 2500 }), PLAIN_ICONS)).toBe(
        `OK ${HASH_A} | success | 1 | 100 | 0.000420 | ${C1} | 2.50s | -`,
      );
    });

    it("should render primary failures and invalid input", () => {
      expect(formatResultRow(result({ txHash: HASH_B, verdict: "not_found", primary: { status: "not_found" } }), PLAIN_ICONS)).toBe(
        `ERR ${HASH_B} | not-found on primary | 12ms | -`,
      );
      expect(
        formatResultRow(
          result({ txHash: "0xnotahash", verdict: "invalid_input", primary: null, error: "bad" }),
          PLAIN_ICONS,
        ),
      ).toBe("ERR 0xnotahash | invalid tx hash");
    });

    it("should flag a transaction only the secondary knows", () => {
      const row = formatResultRow(
        result({
          verdict: "mismatch",
          primary: { status: "not_found" },
          secondary: { status: "ok", bundle: SECONDARY },
          match: false,
        }),
        PLAIN_ICONS,
      );
      expect(row).toBe(`ERR ${HASH_A} | not-found on primary | 12ms | MISMATCH mismatch (found only on secondary)`);
    });
  });

  describe("formatBatchHuman", () => {
    it("should render header, rows and summary", () => {
      const summary: BatchSummary = {
        startedAtIso: "2024-01-01T00:00:00.000Z",
        elapsedMs: 1500,
        providers: [{ label: "primary", url: "https://primary.rpc.test", chainId: 1, network: "Ethereum Mainnet" }],
        counts: { total: 2, success: 1, failed: 0, not_found: 0, provider_error: 0, mismatch: 0, invalid_input: 1 },
        results: [
          result(),
          result({ txHash: "0xnotahash", verdict: "invalid_input", primary: null, elapsedMs: 0, error: "bad" }),
        ],
      };

      expect(formatBatchHuman(summary, PLAIN_ICONS).split("\n")).toEqual([
        "Primary: Ethereum Mainnet (chainId 1)",
        "",
        "# tx | status | chain | block | fee(ETH) | commitment | time | cross-check",
        `OK ${HASH_A} | success | 1 | 100 | 0.000420 | ${C1} | 12ms | -`,
        "ERR 0xnotahash | invalid tx hash",
        "",
        "Processed 2 tx(s) in 1.50s.",
        "Summary: success=1, failed=0, not_found=0, provider_error=0, mismatch=0, invalid_input=1",
      ]);
    });
  });

  describe("formatTransactionDetail", () => {
    it("should print the bundle and suggest a second provider", () => {
      expect(formatTransactionDetail(result(), PLAIN_ICONS).split("\n")).toEqual([
        "--- PRIMARY ---",
        "Network: Ethereum Mainnet (chainId 1)",
        `Tx: ${HASH_A}`,
        `From: ${SENDER}`,
        `To: ${RECIPIENT}`,
        "Block: 100",
        "Block timestamp: 2023-11-14 22:13:20 UTC",
        "Status: 1  GasUsed: 21000",
        "Fee: 0.000420 ETH (receipt)",
        `Commitment: ${C1}`,
        "INFO Set RPC_URL_2 (or --rpc2) to enable cross-provider soundness checks.",
        "Elapsed: 12ms",
      ]);
    });

    it("should list the field-by-field cross-check", () => {
      const lines = formatTransactionDetail(
        result({
          verdict: "mismatch",
          secondary: { status: "ok", bundle: { ...SECONDARY, gasUsed: 21001n, commitment: C2 } },
          match: false,
          fields: GAS_DIFFERS,
        }),
        PLAIN_ICONS,
      ).split("\n");

      const crossCheck = lines.slice(lines.indexOf("--- CROSS-CHECK ---"));
      expect(crossCheck).toEqual([
        "--- CROSS-CHECK ---",
        "Chain IDs match: OK",
        "Block numbers match: OK",
        "Status matches: OK",
        "GasUsed matches: ERR",
        "Commitments match: ERR",
        "MISMATCH Inconsistency detected. Check providers, block tags, or re-run.",
        "Elapsed: 12ms",
      ]);
      expect(lines).toContain(`Commitment: ${C2}`);
    });

    it("should show an unavailable fee and contract creation", () => {
      const bundle = { ...PRIMARY, to: null, effectiveGasPrice: null, feeSource: null, totalFeeWei: null };
      const lines = formatTransactionDetail(result({ primary: { status: "ok", bundle } }), PLAIN_ICONS).split("\n");
      expect(lines).toContain("To: (contract creation)");
      expect(lines).toContain("Fee: unavailable");
    });

    it("should print the validation error for invalid input", () => {
      expect(
        formatTransactionDetail(result({ verdict: "invalid_input", primary: null, error: "Invalid transaction hash: x." }), PLAIN_ICONS),
      ).toBe("ERR Invalid transaction hash: x.");
    });
  });
});
