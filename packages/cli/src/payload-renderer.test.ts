import { addressField, amountField, listLayout, numberField, previewLayout, textField } from "@clearview/core";
import { beforeEach, describe, expect, it } from "vitest";
import { setColorEnabled } from "./formatter";
import { renderPayloadField } from "./payload-renderer";

beforeEach(() => {
  setColorEnabled(false);
});

describe("renderPayloadField", () => {
  it("renders leaves on one line", () => {
    expect(renderPayloadField(textField("Note", "hello"))).toEqual(["Note: hello"]);
    expect(renderPayloadField(amountField("Amount", "1.5", "ETH"))).toEqual(["Amount: 1.5 ETH"]);
    expect(renderPayloadField(numberField("Count", 7n))).toEqual(["Count: 7"]);
    expect(
      renderPayloadField(addressField("Spender", "0x1111111111111111111111111111111111111111", { badgeText: "Unlimited approval" }))
    ).toEqual(["Spender: 0x1111111111111111111111111111111111111111 [Unlimited approval]"]);
  });

  it("indents nested layouts", () => {
    const field = previewLayout("Swap", {
      title: "Swap",
      subtitle: "Swap 1 WETH",
      fallbackText: "Swap 1 WETH",
      expanded: [listLayout("Route", [textField("Hop 1", "WETH"), textField("Hop 2", "USDC")])],
    });

    expect(renderPayloadField(field)).toEqual([
      "Swap: Swap",
      "  Swap 1 WETH",
      "  Route: WETH, USDC",
      "    Hop 1: WETH",
      "    Hop 2: USDC",
    ]);
  });
});
