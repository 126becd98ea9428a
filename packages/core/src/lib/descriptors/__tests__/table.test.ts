import { describe, it, expect } from "vitest";
import { FormatTable } from "../table";
import type { DescriptorEntry } from "../types";

function entry(selector: string, formatId: string, overrides: Partial<DescriptorEntry> = {}): DescriptorEntry {
  return {
    selector,
    formatId,
    sourceFile: `${formatId}.json`,
    formatKey: selector,
    fields: [{ label: "Value", path: "value", params: { nested: { decimals: 6 } } }],
    ...overrides,
  };
}

describe("FormatTable", () => {
  const table = FormatTable.fromEntries([
    entry("0x12345678", "first"),
    entry("0xabcdef01", "other"),
    entry("0x12345678", "second"),
  ]);

  it("groups formats by selector in insertion order", () => {
    expect(table.lookup("0x12345678").map((format) => format.id)).toEqual(["first", "second"]);
    expect(table.size).toBe(2);
    expect(table.formatCount).toBe(3);
  });

  it("matches selectors case-insensitively", () => {
    expect(table.lookup("0xABCDEF01").map((format) => format.id)).toEqual(["other"]);
    expect(table.has("0xABCDEF01")).toBe(true);
  });

  it("returns an empty list for unknown selectors", () => {
    expect(table.lookup("0x00000000")).toEqual([]);
    expect(table.has("0x00000000")).toBe(false);
  });

  it("deep-freezes formats", () => {
    const [format] = table.lookup("0x12345678");
    expect(Object.isFrozen(table.lookup("0x12345678"))).toBe(true);
    expect(Object.isFrozen(format)).toBe(true);
    expect(Object.isFrozen(format.fields)).toBe(true);
    expect(Object.isFrozen(format.fields[0])).toBe(true);
    expect(Object.isFrozen(format.fields[0].params)).toBe(true);
    expect(Object.isFrozen(format.fields[0].params?.nested)).toBe(true);
  });

  it("does not share state with the entries it was built from", () => {
    const source = entry("0x11111111", "mutable");
    const built = FormatTable.fromEntries([source]);
    source.fields.push({ label: "Late", path: "late" });
    expect(built.lookup("0x11111111")[0].fields).toHaveLength(1);
  });

  it("builds from a compiled table", () => {
    const compiled = FormatTable.fromCompiled({
      entries: [entry("0x12345678", "a"), entry("0x12345678", "b")],
      groups: [{ selector: "0x12345678", formatIndexes: [1, 0] }],
      sourceFiles: ["a.json", "b.json"],
    });
    expect(compiled.lookup("0x12345678").map((format) => format.id)).toEqual(["b", "a"]);
  });

  it("rejects compiled groups that point at another selector's entry", () => {
    expect(() =>
      FormatTable.fromCompiled({
        entries: [entry("0xabcdef01", "a")],
        groups: [{ selector: "0x12345678", formatIndexes: [0] }],
        sourceFiles: ["a.json"],
      })
    ).toThrow(/foreign entry 0/);
  });

  it("merges tables with earlier formats first", () => {
    const extra = FormatTable.fromEntries([entry("0x12345678", "third")]);
    const merged = FormatTable.merge(table, extra);
    expect(merged.lookup("0x12345678").map((format) => format.id)).toEqual(["first", "second", "third"]);
    expect(merged.size).toBe(2);
  });

  it("wraps a selector map and rejects invalid keys", () => {
    const [format] = table.lookup("0xabcdef01");
    const wrapped = FormatTable.fromSelectorMap(new Map([["0xABCDEF01", [format]]]));
    expect(wrapped.lookup("0xabcdef01")).toEqual([format]);
    expect(() => FormatTable.fromSelectorMap(new Map([["transfer", [format]]]))).toThrow(/Invalid selector/);
  });

  it("rejects entries with malformed selectors", () => {
    expect(() => FormatTable.fromEntries([entry("0x1234", "short")])).toThrow(/Invalid selector "0x1234"/);
  });
});
