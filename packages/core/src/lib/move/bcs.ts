/**
 * BCS decoding of pure Move values.
 */

import { bytesToHex } from "viem";

export type MoveValueType = "bool" | "u8" | "u16" | "u32" | "u64" | "u128" | "u256" | "address";
export type MoveValue = bigint | boolean | string;

const INTEGER_WIDTHS: Record<string, number> = {
  u8: 1,
  u16: 2,
  u32: 4,
  u64: 8,
  u128: 16,
  u256: 32,
};

export class BcsDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BcsDecodeError";
  }
}

/** Little-endian unsigned integer. */
export function readUnsignedLE(bytes: Uint8Array): bigint {
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i]);
  }
  return value;
}

export function decodePure(type: MoveValueType, bytes: Uint8Array): MoveValue {
  if (type === "bool") {
    if (bytes.length !== 1 || bytes[0] > 1) {
      throw new BcsDecodeError(`Invalid bool encoding (${bytes.length} bytes)`);
    }
    return bytes[0] === 1;
  }
  if (type === "address") {
    if (bytes.length !== 32) {
      throw new BcsDecodeError(`Expected 32 address bytes, got ${bytes.length}`);
    }
    return bytesToHex(bytes);
  }

  const width = INTEGER_WIDTHS[type];
  if (bytes.length !== width) {
    throw new BcsDecodeError(`Expected ${width} bytes for ${type}, got ${bytes.length}`);
  }
  return readUnsignedLE(bytes);
}
