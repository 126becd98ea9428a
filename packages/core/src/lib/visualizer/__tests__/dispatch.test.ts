import { describe, it, expect, vi } from "vitest";
import type { Mock } from "vitest";
import { textField } from "../../payload";
import type { PayloadField } from "../../payload";
import { VisualizerChainBuilder } from "../chain";
import { visualizeWithAny } from "../dispatch";
import { createRawHexVisualizer, visualizeRawHex } from "../fallback";
import type { Visualizer, VisualizerContext } from "../types";

type Element = { kind: string; bytes: Uint8Array };

function context(elements: Element[], index = 0): VisualizerContext<Element> {
  return { sender: "0xsender", index, elements, inputs: [] };
}

function visualizer(
  name: string,
  handles: (element: Element) => boolean,
  result: PayloadField | null
): Visualizer<Element> & { visualize: Mock<(ctx: VisualizerContext<Element>) => PayloadField | null> } {
  return {
    name,
    canHandle: handles,
    visualize: vi.fn((_ctx: VisualizerContext<Element>): PayloadField | null => result),
  };
}

const ELEMENT: Element = { kind: "call", bytes: new Uint8Array([0x12, 0x34]) };

describe("visualizeWithAny", () => {
  it("never invokes a lower-priority visualizer after a success", () => {
    const first = visualizer("first", () => true, textField("First", "a"));
    const second = visualizer("second", () => true, textField("Second", "b"));

    expect(visualizeWithAny([first, second], context([ELEMENT]))).toEqual(textField("First", "a"));
    expect(second.visualize).not.toHaveBeenCalled();
  });

  it("continues when a visualizer claims the element but produces nothing", () => {
    const claimsButFails = visualizer("claims", () => true, null);
    const next = visualizer("next", () => true, textField("Next", "b"));

    expect(visualizeWithAny([claimsButFails, next], context([ELEMENT]))?.label).toBe("Next");
    expect(claimsButFails.visualize).toHaveBeenCalledTimes(1);
  });

  it("skips visualizers that do not claim the element", () => {
    const other = visualizer("other", (element) => element.kind === "other", textField("Other", "x"));
    const call = visualizer("call", (element) => element.kind === "call", textField("Call", "y"));

    expect(visualizeWithAny([other, call], context([ELEMENT]))?.label).toBe("Call");
    expect(other.visualize).not.toHaveBeenCalled();
  });

  it("treats a throwing visualizer as declined", () => {
    const broken: Visualizer<Element> = {
      name: "broken",
      canHandle: () => true,
      visualize: () => {
        throw new Error("boom");
      },
    };
    const next = visualizer("next", () => true, textField("Next", "b"));

    expect(visualizeWithAny([broken, next], context([ELEMENT]))?.label).toBe("Next");
  });

  it("returns null for an out-of-range index", () => {
    const any = visualizer("any", () => true, textField("Any", "a"));
    expect(visualizeWithAny([any], context([ELEMENT], 1))).toBeNull();
    expect(visualizeWithAny([any], context([ELEMENT], -1))).toBeNull();
    expect(any.visualize).not.toHaveBeenCalled();
  });

  it("returns null when nobody claims the element", () => {
    expect(visualizeWithAny([], context([ELEMENT]))).toBeNull();
  });
});

describe("VisualizerChainBuilder", () => {
  it("uses registration order as priority", () => {
    const chain = new VisualizerChainBuilder<Element>()
      .register(visualizer("a", () => true, textField("A", "a")))
      .register(visualizer("b", () => true, textField("B", "b")))
      .build();

    expect(chain.names()).toEqual(["a", "b"]);
    expect(chain.visualize(context([ELEMENT]))?.label).toBe("A");
  });

  it("leaves out disabled visualizers", () => {
    const chain = new VisualizerChainBuilder<Element>()
      .register(visualizer("a", () => true, textField("A", "a")))
      .register(visualizer("b", () => true, textField("B", "b")))
      .build({ disabled: ["a", "unknown"] });

    expect(chain.names()).toEqual(["b"]);
    expect(chain.visualize(context([ELEMENT]))?.label).toBe("B");
  });

  it("rejects duplicate names", () => {
    const builder = new VisualizerChainBuilder<Element>().register(visualizer("a", () => true, null));
    expect(() => builder.register(visualizer("a", () => true, null))).toThrow('Visualizer "a" is already registered');
  });

  it("builds frozen chains unaffected by later registrations", () => {
    const builder = new VisualizerChainBuilder<Element>().register(visualizer("a", () => true, null));
    const chain = builder.build();
    builder.register(visualizer("b", () => true, null));

    expect(chain.names()).toEqual(["a"]);
    expect(Object.isFrozen(chain.visualizers)).toBe(true);
  });

  it("visualizes every element with its own index", () => {
    const byKind = visualizer("kind", (element) => element.kind === "call", null);
    byKind.visualize.mockImplementation((ctx: VisualizerContext<Element>) => textField("Index", String(ctx.index)));
    const chain = new VisualizerChainBuilder<Element>().register(byKind).build();

    const results = chain.visualizeAll({
      sender: "0xsender",
      elements: [ELEMENT, { kind: "other", bytes: new Uint8Array() }, ELEMENT],
    });

    expect(results.map((field) => field?.fallbackText ?? null)).toEqual(["0", null, "2"]);
  });
});

describe("raw hex fallback", () => {
  it("renders empty bytes as 0x", () => {
    expect(visualizeRawHex(new Uint8Array([]))).toEqual({
      type: "text",
      label: "Contract Call Data",
      fallbackText: "0x",
      text: "0x",
    });
  });

  it("renders bytes as lowercase hex", () => {
    const field = visualizeRawHex(new Uint8Array([0x12, 0x34, 0x56, 0x78, 0xab, 0xcd, 0xef]));
    expect(field.text).toBe("0x12345678abcdef");
    expect(field.fallbackText).toBe("0x12345678abcdef");
  });

  it("claims every element as a visualizer", () => {
    const raw = createRawHexVisualizer<Element>((element) => element.bytes, { label: "Instruction Data" });
    expect(raw.canHandle(ELEMENT, context([ELEMENT]))).toBe(true);
    expect(raw.visualize(context([ELEMENT]))).toEqual({
      type: "text",
      label: "Instruction Data",
      fallbackText: "0x1234",
      text: "0x1234",
    });
  });
});
