import { bytesToHex } from "viem";
import { textField } from "../payload";
import type { TextField } from "../payload";
import { currentElement } from "./types";
import type { Visualizer } from "./types";

export const CONTRACT_CALL_DATA_LABEL = "Contract Call Data";

/**
 * Universal fallback: the bytes as `0x`-prefixed lowercase hex.
 */
export function visualizeRawHex(bytes: Uint8Array, label: string = CONTRACT_CALL_DATA_LABEL): TextField {
  return textField(label, bytesToHex(bytes));
}

/**
 * A visualizer that claims every element and renders its bytes as hex.
 * Register it last.
 */
export function createRawHexVisualizer<TElement, TInput = never>(
  bytesOf: (element: TElement) => Uint8Array,
  options: { name?: string; label?: string } = {}
): Visualizer<TElement, TInput> {
  return {
    name: options.name ?? "raw-hex",
    canHandle: () => true,
    visualize(context) {
      const element = currentElement(context);
      return element === null ? null : visualizeRawHex(bytesOf(element), options.label);
    },
  };
}
