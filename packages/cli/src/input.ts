import { hexToBytes } from "viem";

export type InputEncoding = "hex" | "base64";

export type DecodedInput =
  | { success: true; encoding: InputEncoding; bytes: Uint8Array }
  | { success: false; error: string };

const HEX_PATTERN = /^(0x)?([0-9a-fA-F]*)$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function isInputEncoding(value: string): value is InputEncoding {
  return value === "hex" || value === "base64";
}

/** All-hex input (with or without 0x) is hex; anything else is base64. */
export function detectEncoding(raw: string): InputEncoding {
  return HEX_PATTERN.test(raw.trim()) ? "hex" : "base64";
}

function decodeHex(raw: string): DecodedInput {
  const match = HEX_PATTERN.exec(raw);
  if (!match) return { success: false, error: "Input is not hex" };
  const digits = match[2];
  if (digits.length % 2 !== 0) {
    return { success: false, error: `Hex input has an odd number of digits (${digits.length})` };
  }
  return { success: true, encoding: "hex", bytes: hexToBytes(`0x${digits}`) };
}

function decodeBase64(raw: string): DecodedInput {
  if (raw.length % 4 !== 0 || !BASE64_PATTERN.test(raw)) {
    return { success: false, error: "Input is neither hex nor base64" };
  }
  return { success: true, encoding: "base64", bytes: new Uint8Array(Buffer.from(raw, "base64")) };
}

export function decodeInput(raw: string, encoding: InputEncoding = detectEncoding(raw)): DecodedInput {
  const trimmed = raw.trim();
  return encoding === "hex" ? decodeHex(trimmed) : decodeBase64(trimmed);
}
