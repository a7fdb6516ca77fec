/**
 * Receipt commitment derivation
 *
 * keccak256(chainId[8] || txHash[32] || blockNumber[8] || status[1] || gasUsed[8])
 *
 * All integers are unsigned big-endian; the 57-byte preimage has no delimiters.
 * Changing field order, widths or the hash function breaks compatibility with
 * every other producer of these commitments, so bump COMMITMENT_VERSION if it
 * ever changes.
 */

import { bytesToBigInt, bytesToHex, concat, hexToBytes, keccak256, numberToBytes, type Hex } from "viem";
import { CommitmentInputError } from "./errors.js";

export const COMMITMENT_VERSION = 1;
export const COMMITMENT_PREIMAGE_LENGTH = 57;

const MAX_UINT64 = 2n ** 64n - 1n;
const TX_HASH_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export interface CommitmentFields {
  chainId: number | bigint;
  txHash: Hex;
  blockNumber: number | bigint;
  status: number;
  gasUsed: number | bigint;
}

export interface DecodedPreimage {
  chainId: bigint;
  txHash: Hex;
  blockNumber: bigint;
  status: number;
  gasUsed: bigint;
}

function toUint64(field: string, value: number | bigint): bigint {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new CommitmentInputError(field, `${value} is not a safe integer`);
  }
  const v = BigInt(value);
  if (v < 0n) {
    throw new CommitmentInputError(field, `${v} is negative`);
  }
  if (v > MAX_UINT64) {
    throw new CommitmentInputError(field, `${v} does not fit in 64 bits`);
  }
  return v;
}

/**
 * Build the 57-byte preimage
 */
export function encodeCommitmentPreimage(fields: CommitmentFields): Uint8Array {
  if (fields.status !== 0 && fields.status !== 1) {
    throw new CommitmentInputError("status", `expected 0 or 1, got ${fields.status}`);
  }
  if (!TX_HASH_PATTERN.test(fields.txHash)) {
    throw new CommitmentInputError("txHash", "expected 32 bytes of hex");
  }

  return concat([
    numberToBytes(toUint64("chainId", fields.chainId), { size: 8 }),
    hexToBytes(fields.txHash),
    numberToBytes(toUint64("blockNumber", fields.blockNumber), { size: 8 }),
    numberToBytes(fields.status, { size: 1 }),
    numberToBytes(toUint64("gasUsed", fields.gasUsed), { size: 8 }),
  ]);
}

/**
 * Split a preimage back into its fields
 */
export function decodeCommitmentPreimage(preimage: Uint8Array): DecodedPreimage {
  if (preimage.length !== COMMITMENT_PREIMAGE_LENGTH) {
    throw new CommitmentInputError(
      "preimage",
      `expected ${COMMITMENT_PREIMAGE_LENGTH} bytes, got ${preimage.length}`,
    );
  }
  return {
    chainId: bytesToBigInt(preimage.subarray(0, 8)),
    txHash: bytesToHex(preimage.subarray(8, 40)),
    blockNumber: bytesToBigInt(preimage.subarray(40, 48)),
    status: preimage[48],
    gasUsed: bytesToBigInt(preimage.subarray(49, 57)),
  };
}

export function deriveCommitment(fields: CommitmentFields): Hex {
  return keccak256(encodeCommitmentPreimage(fields));
}
