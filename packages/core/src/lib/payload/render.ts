import type { PayloadField } from "./types";

function childFields(field: PayloadField): PayloadField[] {
  switch (field.type) {
    case "list_layout":
      return field.fields;
    case "preview_layout":
      return field.expanded?.fields ?? field.condensed?.fields ?? [];
    default:
      return [];
  }
}

/**
 * Flatten a field tree into indented `label: fallbackText` lines.
 */
export function renderFallbackText(field: PayloadField, depth: number = 0): string[] {
  const prefix = "  ".repeat(depth);
  const lines = [`${prefix}${field.label}: ${field.fallbackText}`];
  for (const child of childFields(field)) {
    lines.push(...renderFallbackText(child, depth + 1));
  }
  return lines;
}

