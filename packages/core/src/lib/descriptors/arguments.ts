/**
 * Decoded argument tree.
 *
 * Every node keeps its ABI type so the field projector can tell an address
 * from a string or a uint from a bool without re-parsing the signature.
 */

import type { AbiParameter } from "viem";

export type ScalarValue = bigint | number | boolean | string;

export type ArgumentNode =
  | { kind: "value"; abiType: string; value: ScalarValue }
  | { kind: "array"; abiType: string; items: ArgumentNode[] }
  | { kind: "tuple"; abiType: string; members: ArgumentMember[] };

export interface ArgumentMember {
  /** Parameter name, or `arg<i>` when the ABI leaves it unnamed. */
  name: string;
  node: ArgumentNode;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is ScalarValue {
  return (
    typeof value === "bigint" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "string"
  );
}

function componentsOf(param: AbiParameter): readonly AbiParameter[] {
  return "components" in param ? param.components : [];
}

/**
 * Build tuple members from ABI parameters and the values decoded for them.
 * Values arrive either positionally or, for named tuple components, keyed
 * by name.
 */
export function buildMembers(params: readonly AbiParameter[], values: unknown): ArgumentMember[] {
  return params.map((param, i) => {
    let value: unknown;
    if (Array.isArray(values)) {
      value = values[i];
    } else if (isRecord(values) && param.name) {
      value = values[param.name];
    }
    return { name: param.name || `arg${i}`, node: buildNode(param, value) };
  });
}

export function buildNode(param: AbiParameter, value: unknown): ArgumentNode {
  const arrayMatch = /^(.*)\[\d*\]$/.exec(param.type);
  if (arrayMatch) {
    if (!Array.isArray(value)) {
      throw new TypeError(`Expected an array for ${param.type}`);
    }
    const element: AbiParameter = { ...param, type: arrayMatch[1] };
    return { kind: "array", abiType: param.type, items: value.map((item) => buildNode(element, item)) };
  }

  if (param.type === "tuple") {
    return { kind: "tuple", abiType: param.type, members: buildMembers(componentsOf(param), value) };
  }

  if (!isScalar(value)) {
    throw new TypeError(`Unexpected decoded value for ${param.type}`);
  }
  return { kind: "value", abiType: param.type, value };
}
