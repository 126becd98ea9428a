/**
 * Selector normalization.
 *
 * Build time (descriptor keys) and run time (calldata prefixes) must land in
 * the same selector space: `0x` followed by 8 lowercase hex digits.
 */

import { bytesToHex, keccak256, toBytes } from "viem";

const SELECTOR_PATTERN = /^0x[0-9a-fA-F]{8}$/;
const TYPE_ALIASES: Record<string, string> = {
  uint: "uint256",
  int: "int256",
  byte: "bytes1",
};

/**
 * Check if a string is already a 4-byte hex selector (e.g. "0x12345678").
 */
export function isSelector(key: string): boolean {
  return SELECTOR_PATTERN.test(key);
}

// ── Signature canonicalization ──────────────────────────────────────

class SignatureReader {
  private pos = 0;

  constructor(private readonly input: string) {}

  get done(): boolean {
    return this.pos >= this.input.length;
  }

  skipSpaces(): void {
    while (!this.done && /\s/.test(this.input[this.pos])) this.pos++;
  }

  peek(): string {
    return this.input[this.pos] ?? "";
  }

  take(expected: string): boolean {
    if (this.peek() !== expected) return false;
    this.pos++;
    return true;
  }

  identifier(): string | null {
    const match = /^[A-Za-z_$][A-Za-z0-9_$]*/.exec(this.input.slice(this.pos));
    if (!match) return null;
    this.pos += match[0].length;
    return match[0];
  }

  arraySuffixes(): string | null {
    let suffix = "";
    while (this.peek() === "[") {
      const match = /^\[\d*\]/.exec(this.input.slice(this.pos));
      if (!match) return null;
      suffix += match[0];
      this.pos += match[0].length;
    }
    return suffix;
  }
}

function readType(reader: SignatureReader): string | null {
  reader.skipSpaces();
  let base: string | null;

  if (reader.peek() === "(") {
    base = readParameterList(reader);
  } else {
    const name = reader.identifier();
    if (!name) return null;
    if (name === "tuple" && reader.peek() === "(") {
      base = readParameterList(reader);
    } else {
      base = TYPE_ALIASES[name] ?? name;
    }
  }
  if (base === null) return null;

  const suffix = reader.arraySuffixes();
  return suffix === null ? null : base + suffix;
}

function readParameter(reader: SignatureReader): string | null {
  const type = readType(reader);
  if (type === null) return null;

  // Everything after the type up to "," or ")" is modifiers and a name.
  reader.skipSpaces();
  while (reader.peek() !== "," && reader.peek() !== ")") {
    if (!reader.identifier()) return null;
    reader.skipSpaces();
  }
  return type;
}

/** Reads "(...)" and returns the canonical "(type,type)" form. */
function readParameterList(reader: SignatureReader): string | null {
  if (!reader.take("(")) return null;
  reader.skipSpaces();
  if (reader.take(")")) return "()";

  const types: string[] = [];
  for (;;) {
    const type = readParameter(reader);
    if (type === null) return null;
    types.push(type);
    reader.skipSpaces();
    if (reader.take(")")) break;
    if (!reader.take(",")) return null;
  }
  return `(${types.join(",")})`;
}

/**
 * Canonicalize a human-readable function signature to its ABI form.
 *
 * Parameter names, data-location keywords and whitespace are dropped, `uint`
 * and `int` expand to their 256-bit names, tuples keep their array suffixes.
 * Returns null for anything that is not a signature.
 *
 * Examples:
 *   "transfer(address,uint256)"                    -> "transfer(address,uint256)"
 *   "swap(uint256 amount, address to)"             -> "swap(uint256,address)"
 *   "create((uint256 salt, uint256 maker) order)"  -> "create((uint256,uint256))"
 *   "foo((uint a)[] orders)"                       -> "foo((uint256)[])"
 */
export function canonicalizeSignature(signature: string): string | null {
  const reader = new SignatureReader(signature.trim().replace(/^function\s+/, ""));
  const name = reader.identifier();
  if (!name) return null;

  reader.skipSpaces();
  const params = readParameterList(reader);
  if (params === null) return null;

  reader.skipSpaces();
  return reader.done ? name + params : null;
}

// ── Selector computation ────────────────────────────────────────────

/**
 * Compute the 4-byte selector of a function signature.
 * Example: "transfer(address,uint256)" -> "0xa9059cbb"
 */
export function computeSelector(signature: string): string | null {
  const canonical = canonicalizeSignature(signature);
  if (canonical === null) return null;
  return keccak256(toBytes(canonical)).slice(0, 10);
}

/**
 * Normalize a descriptor format key to a 4-byte selector.
 *
 * Hex selectors are lowercased, signatures are hashed, anything else is null.
 * Feeding the result back in returns it unchanged.
 */
export function normalizeSelector(key: string): string | null {
  const trimmed = key.trim();
  if (isSelector(trimmed)) {
    return trimmed.toLowerCase();
  }
  return computeSelector(trimmed);
}

/**
 * Selector of a calldata payload, or null when it has fewer than 4 bytes.
 */
export function selectorFromCalldata(calldata: Uint8Array): string | null {
  if (calldata.length < 4) return null;
  return bytesToHex(calldata.subarray(0, 4));
}
