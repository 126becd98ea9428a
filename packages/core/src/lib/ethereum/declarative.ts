/**
 * Adapter exposing the declarative calldata decoder as a visualizer.
 */

import type { CalldataDecoder } from "../descriptors";
import { listLayout, previewLayout } from "../payload";
import { currentElement } from "../visualizer";
import type { EthereumVisualizer } from "./types";

export const DECODED_INPUT_LABEL = "Decoded Input";

export function createDeclarativeVisualizer(decoder: CalldataDecoder): EthereumVisualizer {
  return {
    name: "declarative",
    canHandle: (call) => decoder.hasFormats(call.data),
    visualize(context) {
      const call = currentElement(context);
      const decoded = call && decoder.decodeCalldataDetailed(call.data);
      if (!decoded) return null;

      const summary = `Decoded ${decoded.fields.length} field(s)`;
      if (decoded.format.intent) {
        return previewLayout(DECODED_INPUT_LABEL, {
          title: decoded.format.intent,
          subtitle: decoded.signature,
          fallbackText: `${decoded.format.intent}: ${summary}`,
          expanded: decoded.fields,
        });
      }
      return listLayout(DECODED_INPUT_LABEL, decoded.fields, summary);
    },
  };
}
