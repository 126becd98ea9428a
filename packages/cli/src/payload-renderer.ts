/**
 * Terminal rendering of payload field trees.
 */

import type { PayloadField } from "@clearview/core";
import { badge, badgeVariant, code, colors, label } from "./formatter";

const INDENT = "  ";

function leafValue(field: PayloadField): string {
  switch (field.type) {
    case "text":
      return field.text;
    case "number":
      return code(field.number);
    case "amount":
      return field.abbreviation ? `${code(field.amount)} ${field.abbreviation}` : code(field.amount);
    case "address": {
      const address = field.name ? `${field.name} (${code(field.address)})` : code(field.address);
      return field.badgeText ? `${address} ${badge(field.badgeText, badgeVariant(field.badgeText))}` : address;
    }
    default:
      return field.fallbackText;
  }
}

/**
 * One line per field, children indented under their parent. Preview
 * layouts show their title, then the subtitle dimmed, then the expanded
 * fields (or the condensed ones when nothing is expanded).
 */
export function renderPayloadField(field: PayloadField, depth: number = 0): string[] {
  const prefix = INDENT.repeat(depth);

  switch (field.type) {
    case "list_layout":
      return [
        `${prefix}${label(field.label)}: ${field.fallbackText}`,
        ...field.fields.flatMap((child) => renderPayloadField(child, depth + 1)),
      ];
    case "preview_layout": {
      const lines = [`${prefix}${label(field.label)}: ${colors.bold(field.title ?? field.fallbackText)}`];
      if (field.subtitle) lines.push(`${prefix}${INDENT}${colors.dim(field.subtitle)}`);
      const children = field.expanded?.fields ?? field.condensed?.fields ?? [];
      return [...lines, ...children.flatMap((child) => renderPayloadField(child, depth + 1))];
    }
    default:
      return [`${prefix}${label(field.label)}: ${leafValue(field)}`];
  }
}
