export type {
  FieldCommon,
  FieldList,
  TextField,
  AddressField,
  AmountField,
  NumberField,
  ListLayoutField,
  PreviewLayoutField,
  PayloadField,
  PayloadFieldType,
} from "./types";
export {
  EMPTY_FALLBACK,
  textField,
  addressField,
  amountField,
  numberField,
  listLayout,
  previewLayout,
} from "./builders";
export { renderFallbackText } from "./render";
