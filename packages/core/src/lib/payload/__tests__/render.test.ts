import { describe, it, expect } from "vitest";
import { amountField, listLayout, previewLayout, textField } from "../builders";
import { renderFallbackText } from "../render";

describe("renderFallbackText", () => {
  it("renders a leaf as a single line", () => {
    expect(renderFallbackText(textField("Method", "swap"))).toEqual(["Method: swap"]);
  });

  it("indents children two spaces per level and prefers expanded fields", () => {
    const tree = listLayout("Call", [
      textField("Method", "swap"),
      previewLayout("Swap", {
        fallbackText: "Swap 1 ETH",
        condensed: [textField("Pair", "ETH/USDC")],
        expanded: [amountField("Amount in", "1", "ETH")],
      }),
    ]);

    expect(renderFallbackText(tree)).toEqual([
      "Call: swap, Swap 1 ETH",
      "  Method: swap",
      "  Swap: Swap 1 ETH",
      "    Amount in: 1 ETH",
    ]);
  });

  it("falls back to condensed fields when a preview has no expanded section", () => {
    const preview = previewLayout("Swap", { fallbackText: "Swap", condensed: [textField("Pair", "ETH/USDC")] });
    expect(renderFallbackText(preview, 1)).toEqual(["  Swap: Swap", "    Pair: ETH/USDC"]);
  });
});
