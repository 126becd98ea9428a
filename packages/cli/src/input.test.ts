import { describe, expect, it } from "vitest";
import { decodeInput, detectEncoding } from "./input";

describe("detectEncoding", () => {
  it("treats all-hex input as hex", () => {
    expect(detectEncoding("0xa9059cbb")).toBe("hex");
    expect(detectEncoding("a9059cbb")).toBe("hex");
    expect(detectEncoding("0x")).toBe("hex");
  });

  it("treats anything else as base64", () => {
    expect(detectEncoding("qQWcuw==")).toBe("base64");
  });
});

describe("decodeInput", () => {
  it("decodes hex with or without a prefix", () => {
    expect(decodeInput("0xA9059CBB")).toEqual({ success: true, encoding: "hex", bytes: Uint8Array.of(0xa9, 0x05, 0x9c, 0xbb) });
    expect(decodeInput(" a9059cbb\n")).toEqual({
      success: true,
      encoding: "hex",
      bytes: Uint8Array.of(0xa9, 0x05, 0x9c, 0xbb),
    });
  });

  it("decodes base64", () => {
    expect(decodeInput("qQWcuw==")).toEqual({ success: true, encoding: "base64", bytes: Uint8Array.of(0xa9, 0x05, 0x9c, 0xbb) });
  });

  it("honors an explicit encoding", () => {
    expect(decodeInput("abcd", "base64")).toEqual({ success: true, encoding: "base64", bytes: Uint8Array.of(0x69, 0xb7, 0x1d) });
  });

  it("rejects malformed input", () => {
    expect(decodeInput("0xabc")).toEqual({ success: false, error: "Hex input has an odd number of digits (3)" });
    expect(decodeInput("not calldata!")).toEqual({ success: false, error: "Input is neither hex nor base64" });
  });
});
