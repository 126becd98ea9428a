/**
 * Projection of decoded argument nodes into payload fields.
 */

import { formatUnits, getAddress } from "viem";
import { addressField, amountField, listLayout, numberField, textField } from "../payload";
import type { PayloadField } from "../payload";
import type { ArgumentNode, ScalarValue } from "./arguments";
import type { FieldSpec } from "./types";

const DEFAULT_PERCENTAGE_BASE = 10_000n;

function integerParam(params: Record<string, unknown> | undefined, key: string): bigint | null {
  const value = params?.[key];
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  return null;
}

function stringParam(params: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = params?.[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** `value / base` as a percentage with two decimals, truncated toward zero. */
export function formatPercentage(value: bigint, base: bigint): string {
  const negative = value < 0n;
  const hundredths = ((negative ? -value : value) * 10_000n) / base;
  const whole = hundredths / 100n;
  const fraction = (hundredths % 100n).toString().padStart(2, "0");
  return `${negative ? "-" : ""}${whole}.${fraction}%`;
}

/** ISO-8601 UTC rendering of a unix timestamp, or null when out of range. */
export function formatUnixTimestamp(seconds: bigint): string | null {
  const date = new Date(Number(seconds) * 1000);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function projectInteger(spec: FieldSpec, label: string, value: bigint): PayloadField {
  switch (spec.format) {
    case "amount":
      return amountField(label, formatUnits(value, 18), "ETH");

    case "tokenAmount": {
      const decimals = integerParam(spec.params, "decimals");
      if (decimals === null) return numberField(label, value);
      const ticker = stringParam(spec.params, "ticker") ?? stringParam(spec.params, "symbol");
      return amountField(label, formatUnits(value, Number(decimals)), ticker);
    }

    case "percentage": {
      const base = integerParam(spec.params, "base") ?? DEFAULT_PERCENTAGE_BASE;
      if (base <= 0n) return numberField(label, value);
      return textField(label, formatPercentage(value, base));
    }

    case "date": {
      const text = formatUnixTimestamp(value);
      return text === null ? numberField(label, value) : textField(label, text);
    }

    default:
      return numberField(label, value);
  }
}

function projectScalar(spec: FieldSpec, label: string, abiType: string, value: ScalarValue): PayloadField {
  if (abiType === "address" && typeof value === "string") {
    return addressField(label, getAddress(value));
  }
  if (typeof value === "bigint" || typeof value === "number") {
    return projectInteger(spec, label, BigInt(value));
  }
  return textField(label, String(value));
}

/**
 * Project a decoded node under a field spec. Arrays and tuples become list
 * layouts whose children are labeled `label[i]` and `label.member`.
 */
export function projectField(spec: FieldSpec, node: ArgumentNode, label: string = spec.label): PayloadField {
  switch (node.kind) {
    case "value":
      return projectScalar(spec, label, node.abiType, node.value);
    case "array":
      return listLayout(
        label,
        node.items.map((item, i) => projectField(spec, item, `${label}[${i}]`))
      );
    case "tuple":
      return listLayout(
        label,
        node.members.map((member) => projectField(spec, member.node, `${label}.${member.name}`))
      );
  }
}
