import { describe, it, expect } from "vitest";
import { isValidTxHash, normalizeTxHash, validateTxHash } from "./validate.js";

const HASH = `0x${"ab".repeat(32)}`;

describe("validate", () => {
  describe("normalizeTxHash", () => {
    it("should trim and lowercase", () => {
      expect(normalizeTxHash(`  0x${"AB".repeat(32)}\n`)).toBe(HASH);
    });

    it("should add a missing 0x prefix", () => {
      expect(normalizeTxHash("ab".repeat(32))).toBe(HASH);
    });

    it("should return null for malformed input", () => {
      expect(normalizeTxHash("0xnotahash")).toBeNull();
      expect(normalizeTxHash(`0x${"a".repeat(63)}`)).toBeNull();
      expect(normalizeTxHash(`0x${"a".repeat(65)}`)).toBeNull();
      expect(normalizeTxHash("   ")).toBeNull();
    });
  });

  describe("isValidTxHash", () => {
    it("should only accept the canonical lowercase form", () => {
      expect(isValidTxHash(HASH)).toBe(true);
      expect(isValidTxHash(HASH.toUpperCase())).toBe(false);
      expect(isValidTxHash("ab".repeat(32))).toBe(false);
    });
  });

  describe("validateTxHash", () => {
    it("should return the normalised hash", () => {
      expect(validateTxHash(` ${HASH} `)).toEqual({ valid: true, hash: HASH });
    });

    it("should explain what is wrong", () => {
      expect(validateTxHash(" 0xnotahash ")).toEqual({
        valid: false,
        error: "Invalid transaction hash: 0xnotahash. Expected 0x + 64 hex characters.",
      });
    });
  });
});
