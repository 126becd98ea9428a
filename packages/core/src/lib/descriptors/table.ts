/**
 * Immutable selector → formats table.
 *
 * Formats under one selector keep descriptor discovery order; the decode
 * engine tries them in that order.
 */

import { isSelector } from "./selector";
import type { CompiledTable, DescriptorEntry, FieldSpec, Format } from "./types";

const NO_FORMATS: readonly Format[] = Object.freeze([]);

function freezeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(freezeValue));
  }
  if (typeof value === "object" && value !== null) {
    const copy: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      copy[key] = freezeValue(inner);
    }
    return Object.freeze(copy);
  }
  return value;
}

function freezeParams(params: Record<string, unknown>): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    copy[key] = freezeValue(value);
  }
  return Object.freeze(copy);
}

function freezeField(field: FieldSpec): FieldSpec {
  return Object.freeze({
    label: field.label,
    path: field.path,
    ...(field.format !== undefined && { format: field.format }),
    ...(field.params !== undefined && { params: freezeParams(field.params) }),
  });
}

function freezeEntry(entry: DescriptorEntry): Format {
  return Object.freeze({
    id: entry.formatId,
    selector: entry.selector,
    sourceFile: entry.sourceFile,
    ...(entry.signature !== undefined && { signature: entry.signature }),
    ...(entry.intent !== undefined && { intent: entry.intent }),
    fields: Object.freeze(entry.fields.map(freezeField)),
  });
}

export class FormatTable {
  private constructor(private readonly bySelector: ReadonlyMap<string, readonly Format[]>) {}

  /**
   * Build a table from entries, grouping by selector in the order given.
   */
  static fromEntries(entries: readonly DescriptorEntry[]): FormatTable {
    const grouped = new Map<string, Format[]>();
    for (const entry of entries) {
      const selector = entry.selector.toLowerCase();
      if (!isSelector(selector)) {
        throw new Error(`Invalid selector "${entry.selector}" in ${entry.sourceFile}`);
      }
      const formats = grouped.get(selector) ?? [];
      formats.push(freezeEntry({ ...entry, selector }));
      grouped.set(selector, formats);
    }
    return FormatTable.sealed(grouped);
  }

  static fromCompiled(compiled: CompiledTable): FormatTable {
    const grouped = new Map<string, Format[]>();
    for (const group of compiled.groups) {
      const formats = group.formatIndexes.map((index) => {
        const entry = compiled.entries[index];
        if (!entry || entry.selector !== group.selector) {
          throw new Error(`Compiled table group ${group.selector} points at a foreign entry ${index}`);
        }
        return freezeEntry(entry);
      });
      grouped.set(group.selector, formats);
    }
    return FormatTable.sealed(grouped);
  }

  /**
   * Wrap an already-grouped map, e.g. the one a rendered table module builds.
   */
  static fromSelectorMap(map: ReadonlyMap<string, readonly Format[]>): FormatTable {
    const grouped = new Map<string, Format[]>();
    for (const [key, formats] of map) {
      const selector = key.toLowerCase();
      if (!isSelector(selector)) {
        throw new Error(`Invalid selector "${key}" in format table`);
      }
      grouped.set(selector, [...(grouped.get(selector) ?? []), ...formats]);
    }
    return FormatTable.sealed(grouped);
  }

  /**
   * Concatenate tables. Under a shared selector, earlier tables' formats come first.
   */
  static merge(...tables: FormatTable[]): FormatTable {
    const grouped = new Map<string, Format[]>();
    for (const table of tables) {
      for (const [selector, formats] of table.bySelector) {
        grouped.set(selector, [...(grouped.get(selector) ?? []), ...formats]);
      }
    }
    return FormatTable.sealed(grouped);
  }

  private static sealed(grouped: Map<string, Format[]>): FormatTable {
    const sealed = new Map<string, readonly Format[]>();
    for (const [selector, formats] of grouped) {
      sealed.set(selector, Object.freeze(formats));
    }
    return new FormatTable(sealed);
  }

  /** Formats registered under a selector, or an empty list. */
  lookup(selector: string): readonly Format[] {
    return this.bySelector.get(selector.toLowerCase()) ?? NO_FORMATS;
  }

  has(selector: string): boolean {
    return this.bySelector.has(selector.toLowerCase());
  }

  /** Number of distinct selectors. */
  get size(): number {
    return this.bySelector.size;
  }

  get formatCount(): number {
    let count = 0;
    for (const formats of this.bySelector.values()) count += formats.length;
    return count;
  }
}
