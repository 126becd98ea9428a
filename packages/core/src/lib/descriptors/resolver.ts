/**
 * Argument resolution: turns the bytes after a selector into a decoded,
 * path-addressable argument tree.
 *
 * The resolver is consulted per format, so two formats sharing a selector
 * can disagree on whether the same calldata decodes.
 */

import { decodeAbiParameters, parseAbiItem, toFunctionSelector } from "viem";
import type { AbiFunction, Hex } from "viem";
import { buildMembers } from "./arguments";
import type { ArgumentNode } from "./arguments";
import type { Format } from "./types";

export interface ArgumentRequest {
  selector: string;
  /** Calldata after the 4-byte selector. */
  args: Hex;
  format: Format;
}

export type ArgumentResolution =
  | { success: true; signature: string; root: ArgumentNode }
  | { success: false; error: string };

export interface ArgumentResolver {
  resolve(request: ArgumentRequest): ArgumentResolution;
}

export interface AbiResolverOptions {
  /**
   * Extra human-readable signatures per selector, tried when a format
   * carries no signature of its own (formats keyed by raw selector).
   */
  signatures?: Record<string, readonly string[]>;
}

const functionCache = new Map<string, AbiFunction | null>();

/**
 * Parse a human-readable signature into an ABI function, or null.
 * The `tuple(...)` spelling is accepted alongside bare `(...)`.
 */
export function parseFunctionSignature(signature: string): AbiFunction | null {
  const cached = functionCache.get(signature);
  if (cached !== undefined) return cached;

  let parsed: AbiFunction | null = null;
  try {
    const source = signature.trim().replace(/^function\s+/, "").replace(/\btuple\(/g, "(");
    const item = parseAbiItem(`function ${source}`);
    if (item.type === "function") parsed = item;
  } catch {
    parsed = null;
  }
  functionCache.set(signature, parsed);
  return parsed;
}

function decodeWith(signature: string, request: ArgumentRequest): ArgumentResolution {
  const fn = parseFunctionSignature(signature);
  if (!fn) {
    return { success: false, error: `Unparseable signature "${signature}"` };
  }
  if (toFunctionSelector(fn) !== request.selector) {
    return { success: false, error: `Signature "${signature}" does not match ${request.selector}` };
  }

  try {
    const values = decodeAbiParameters(fn.inputs, request.args);
    return {
      success: true,
      signature,
      root: { kind: "tuple", abiType: "tuple", members: buildMembers(fn.inputs, values) },
    };
  } catch (err) {
    return { success: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Resolver backed by ABI decoding. Candidate signatures are the format's
 * own signature first, then those registered for the selector.
 */
export function createAbiResolver(options: AbiResolverOptions = {}): ArgumentResolver {
  const signatures = new Map<string, readonly string[]>();
  for (const [selector, list] of Object.entries(options.signatures ?? {})) {
    signatures.set(selector.toLowerCase(), list);
  }

  return {
    resolve(request) {
      const candidates = [
        ...(request.format.signature ? [request.format.signature] : []),
        ...(signatures.get(request.selector) ?? []),
      ];
      if (candidates.length === 0) {
        return { success: false, error: `No signature known for ${request.selector}` };
      }

      const errors: string[] = [];
      for (const signature of candidates) {
        const resolution = decodeWith(signature, request);
        if (resolution.success) return resolution;
        errors.push(resolution.error);
      }
      return { success: false, error: errors.join("; ") };
    },
  };
}
