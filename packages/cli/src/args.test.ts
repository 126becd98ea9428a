import { describe, expect, it } from "vitest";
import { getFlag, getPositionals, hasFlag } from "./args";

describe("CLI args parsing", () => {
  it("returns positionals while skipping flag values", () => {
    const args = ["--chain-id", "10", "0xa9059cbb", "--to", "0x1111111111111111111111111111111111111111"];
    expect(getPositionals(args)).toEqual(["0xa9059cbb"]);
  });

  it("handles multiple flags and preserves additional positionals", () => {
    const args = ["--encoding", "base64", "--format", "json", "extra", "--no-settings"];

    expect(getPositionals(args)).toEqual(["extra"]);
    expect(getFlag(args, "--encoding")).toBe("base64");
    expect(getFlag(args, "--format")).toBe("json");
    expect(hasFlag(args, "--no-settings")).toBe(true);
  });

  it("keeps values of unknown flags as positionals", () => {
    const args = ["--unknown", "value", "positional"];
    expect(getPositionals(args)).toEqual(["value", "positional"]);
  });
});
