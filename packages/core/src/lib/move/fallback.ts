import { textField } from "../payload";
import { currentElement } from "../visualizer";
import type { MoveVisualizer } from "./types";

export const MOVE_CALL_LABEL = "Move Call";

/** Claims any `MoveCall` and names its target. */
export function createMoveCallFallbackVisualizer(): MoveVisualizer {
  return {
    name: "move-call",
    canHandle: (command) => command.kind === "moveCall",
    visualize(context) {
      const command = currentElement(context);
      if (!command || command.kind !== "moveCall") return null;
      const generics = command.typeArguments.length > 0 ? `<${command.typeArguments.join(", ")}>` : "";
      return textField(MOVE_CALL_LABEL, `${command.package}::${command.module}::${command.function}${generics}`);
    },
  };
}
