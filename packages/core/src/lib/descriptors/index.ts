export type {
  CompiledTable,
  DescriptorEntry,
  FieldFormat,
  FieldSpec,
  Format,
  SelectorGroup,
} from "./types";
export {
  canonicalizeSignature,
  computeSelector,
  isSelector,
  normalizeSelector,
  selectorFromCalldata,
} from "./selector";
export { parseDescriptorDocument, parseDescriptorFromString } from "./parser";
export type { DescriptorDocument, DescriptorField, DescriptorFormat, ParseError, ParseResult } from "./parser";
export {
  DescriptorCompileError,
  compileDescriptorDirectory,
  compileDescriptors,
  renderTableModule,
} from "./compiler";
export type { DescriptorSource, RenderTableOptions } from "./compiler";
export { FormatTable } from "./table";
export { BUNDLED_DESCRIPTOR_DIR, loadBundledFormatTable, resetBundledFormatTable } from "./bundled";
export type { ArgumentMember, ArgumentNode, ScalarValue } from "./arguments";
export { parsePath, resolvePath } from "./path";
export type { PathSegment } from "./path";
export { createAbiResolver } from "./resolver";
export type { AbiResolverOptions, ArgumentRequest, ArgumentResolution, ArgumentResolver } from "./resolver";
export { formatPercentage, formatUnixTimestamp, projectField } from "./project";
export { createCalldataDecoder } from "./engine";
export type { CalldataDecoder, CalldataDecoderOptions, DecodedCalldata } from "./engine";
