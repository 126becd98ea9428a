/**
 * Payload field model.
 *
 * The tree every visualizer produces and every renderer consumes. Each
 * variant carries a `label` and a non-empty `fallbackText`, so a text-only
 * renderer can always show something.
 */

// ── Shared ──────────────────────────────────────────────────────────

export interface FieldCommon {
  label: string;
  /** Plain-text rendering of the field. Never empty. */
  fallbackText: string;
}

export interface FieldList {
  fields: PayloadField[];
}

// ── Variants ────────────────────────────────────────────────────────

export interface TextField extends FieldCommon {
  type: "text";
  text: string;
}

export interface AddressField extends FieldCommon {
  type: "address";
  address: string;
  /** Known name for the address (token symbol, protocol, ...). */
  name?: string;
  badgeText?: string;
}

export interface AmountField extends FieldCommon {
  type: "amount";
  /** Decimal string, already scaled when the unit is known. */
  amount: string;
  abbreviation?: string;
}

export interface NumberField extends FieldCommon {
  type: "number";
  /** Base-10 string. */
  number: string;
}

export interface ListLayoutField extends FieldCommon {
  type: "list_layout";
  fields: PayloadField[];
}

export interface PreviewLayoutField extends FieldCommon {
  type: "preview_layout";
  title?: string;
  subtitle?: string;
  condensed?: FieldList;
  expanded?: FieldList;
}

export type PayloadField =
  | TextField
  | AddressField
  | AmountField
  | NumberField
  | ListLayoutField
  | PreviewLayoutField;

export type PayloadFieldType = PayloadField["type"];
