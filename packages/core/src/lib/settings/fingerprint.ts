import { sha256, stringToBytes } from "viem";
import type { SettingsConfig } from "./types";

/** Deep-sort object keys; arrays keep their order. */
function sortedReplacer(_key: string, value: unknown): unknown {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }
  return value;
}

/**
 * SHA-256 of the settings with keys sorted at every level, as 0x hex.
 * Two configs that differ only in key order share a fingerprint.
 */
export function computeSettingsFingerprint(config: SettingsConfig): `0x${string}` {
  return sha256(stringToBytes(JSON.stringify(config, sortedReplacer)));
}
