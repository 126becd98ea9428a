/**
 * Descriptor and format types.
 *
 * A descriptor file declares, per selector or function signature, which
 * decoded arguments a signer should see and under which label. The compiler
 * turns each declaration into a `DescriptorEntry`; the format table holds
 * the frozen `Format` form of each entry.
 */

/** Display hints understood by the field projector. Unknown hints render raw. */
export type FieldFormat =
  | "raw"
  | "addressName"
  | "amount"
  | "tokenAmount"
  | "percentage"
  | "date"
  | (string & {});

export interface FieldSpec {
  label: string;
  /** Dot-delimited path into the decoded argument tree, e.g. `params.amountIn`. */
  path: string;
  format?: FieldFormat;
  params?: Record<string, unknown>;
}

export interface DescriptorEntry {
  selector: string;
  formatId: string;
  /** Descriptor file, relative to the compiled directory (POSIX separators). */
  sourceFile: string;
  /** The key as written in the descriptor. */
  formatKey: string;
  /** Present when the key was a function signature; used as the argument shape. */
  signature?: string;
  intent?: string;
  fields: FieldSpec[];
}

export interface Format {
  readonly id: string;
  readonly selector: string;
  readonly sourceFile: string;
  readonly signature?: string;
  readonly intent?: string;
  readonly fields: readonly FieldSpec[];
}

export interface SelectorGroup {
  selector: string;
  /** Indexes into `CompiledTable.entries`, in discovery order. */
  formatIndexes: number[];
}

export interface CompiledTable {
  entries: DescriptorEntry[];
  /** Sorted by selector. */
  groups: SelectorGroup[];
  sourceFiles: string[];
}
