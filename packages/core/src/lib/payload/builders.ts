import type {
  AddressField,
  AmountField,
  ListLayoutField,
  NumberField,
  PayloadField,
  PreviewLayoutField,
  TextField,
} from "./types";

/** Shown when a field would otherwise have nothing to display. */
export const EMPTY_FALLBACK = "(empty)";

function ensureFallback(text: string | undefined): string {
  return text && text.length > 0 ? text : EMPTY_FALLBACK;
}

export function textField(label: string, text: string): TextField {
  return { type: "text", label, fallbackText: ensureFallback(text), text };
}

export function addressField(
  label: string,
  address: string,
  options: { name?: string; badgeText?: string } = {}
): AddressField {
  const fallback = options.name ? `${options.name} (${address})` : address;
  return {
    type: "address",
    label,
    fallbackText: ensureFallback(fallback),
    address,
    ...(options.name ? { name: options.name } : {}),
    ...(options.badgeText ? { badgeText: options.badgeText } : {}),
  };
}

export function amountField(
  label: string,
  amount: string,
  abbreviation?: string
): AmountField {
  const fallback = abbreviation ? `${amount} ${abbreviation}` : amount;
  return {
    type: "amount",
    label,
    fallbackText: ensureFallback(fallback),
    amount,
    ...(abbreviation ? { abbreviation } : {}),
  };
}

export function numberField(label: string, value: bigint | number | string): NumberField {
  const number = String(value);
  return { type: "number", label, fallbackText: ensureFallback(number), number };
}

export function listLayout(
  label: string,
  fields: PayloadField[],
  fallbackText?: string
): ListLayoutField {
  const fallback =
    fallbackText ?? fields.map((field) => field.fallbackText).join(", ");
  return {
    type: "list_layout",
    label,
    fallbackText: ensureFallback(fallback),
    fields,
  };
}

export function previewLayout(
  label: string,
  options: {
    fallbackText: string;
    title?: string;
    subtitle?: string;
    condensed?: PayloadField[];
    expanded?: PayloadField[];
  }
): PreviewLayoutField {
  return {
    type: "preview_layout",
    label,
    fallbackText: ensureFallback(options.fallbackText),
    ...(options.title !== undefined ? { title: options.title } : {}),
    ...(options.subtitle !== undefined ? { subtitle: options.subtitle } : {}),
    ...(options.condensed ? { condensed: { fields: options.condensed } } : {}),
    ...(options.expanded && options.expanded.length > 0
      ? { expanded: { fields: options.expanded } }
      : {}),
  };
}
