/**
 * Little-endian readers over instruction data. Each returns null when the
 * data is too short.
 */

import bs58 from "bs58";

export function readUintLE(data: Uint8Array, offset: number, width: number): bigint | null {
  if (offset + width > data.length) return null;
  let value = 0n;
  for (let i = offset + width - 1; i >= offset; i--) {
    value = (value << 8n) | BigInt(data[i]);
  }
  return value;
}

export function readPubkey(data: Uint8Array, offset: number): string | null {
  return offset + 32 > data.length ? null : bs58.encode(data.subarray(offset, offset + 32));
}

/** `COption<Pubkey>`: a one-byte tag (0 none, 1 some) then the key. */
export function readOptionalPubkey(data: Uint8Array, offset: number): { value: string | null } | null {
  const tag = data[offset];
  if (tag === 0) return { value: null };
  if (tag !== 1) return null;
  const key = readPubkey(data, offset + 1);
  return key === null ? null : { value: key };
}

export function accountAt(accounts: readonly string[], index: number): string {
  return accounts[index] ?? "(missing account)";
}
