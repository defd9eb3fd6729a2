import { bytesToHex, hexToBigInt, hexToBytes, isHex, numberToHex, type Hex } from "viem";

import type { Address } from "./types.js";

const ADDRESS_RE = /^0x[0-9a-fA-F]{1,40}$/;
const DECIMAL_RE = /^[0-9]+$/;

/**
 * Parse a non-negative integer quantity.
 *
 * Accepts decimal strings (`"100"`), hex strings (`"0x64"`), safe integer
 * numbers and bigints. Returns `null` for anything else.
 */
export function parseQuantity(value: unknown): bigint | null {
  if (typeof value === "bigint") return value >= 0n ? value : null;

  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) return null;
    return BigInt(value);
  }

  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (DECIMAL_RE.test(trimmed)) return BigInt(trimmed);
  if (isHex(trimmed, { strict: true }) && trimmed.length > 2) return hexToBigInt(trimmed);
  return null;
}

/** Parse `0x`-prefixed byte data (even number of digits), lowercased. */
export function parseHexData(value: unknown): Hex | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!isHex(trimmed, { strict: true })) return null;
  if ((trimmed.length - 2) % 2 !== 0) return null;
  return `0x${trimmed.slice(2).toLowerCase()}`;
}

/** Parse an account address into its canonical lowercase form. */
export function parseAddress(value: unknown): Address | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!ADDRESS_RE.test(trimmed)) return null;
  return `0x${trimmed.slice(2).toLowerCase()}`;
}

/** Minimal lowercase hex for a quantity (`0x0` for zero). */
export function quantityToHex(value: bigint): Hex {
  return numberToHex(value);
}

export function hexToInput(data: Hex): Uint8Array {
  return hexToBytes(data);
}

export function inputToHex(input: Uint8Array): Hex {
  return bytesToHex(input);
}
