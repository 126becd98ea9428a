/**
 * Declarative calldata decode engine.
 *
 * Selector lookup in the format table, then each candidate format in
 * discovery order: resolve arguments, project the format's fields. The
 * first format that yields at least one field wins.
 */

import { bytesToHex } from "viem";
import { logger } from "../logger";
import type { PayloadField } from "../payload";
import { projectField } from "./project";
import { resolvePath } from "./path";
import type { ArgumentResolver } from "./resolver";
import { selectorFromCalldata } from "./selector";
import type { FormatTable } from "./table";
import type { Format } from "./types";

export interface CalldataDecoderOptions {
  table: FormatTable;
  resolver: ArgumentResolver;
}

export interface DecodedCalldata {
  format: Format;
  /** Signature the arguments were decoded with. */
  signature: string;
  fields: PayloadField[];
}

export interface CalldataDecoder {
  readonly table: FormatTable;
  /** True when the table has at least one format for the calldata's selector. */
  hasFormats(calldata: Uint8Array): boolean;
  decodeCalldata(calldata: Uint8Array): PayloadField[] | null;
  decodeCalldataDetailed(calldata: Uint8Array): DecodedCalldata | null;
}

export function createCalldataDecoder(options: CalldataDecoderOptions): CalldataDecoder {
  const { table, resolver } = options;

  function decodeCalldataDetailed(calldata: Uint8Array): DecodedCalldata | null {
    const selector = selectorFromCalldata(calldata);
    if (selector === null) return null;

    const formats = table.lookup(selector);
    if (formats.length === 0) {
      logger.debug({ selector }, "no descriptor format for selector");
      return null;
    }

    const args = bytesToHex(calldata.subarray(4));
    for (const format of formats) {
      const resolution = resolver.resolve({ selector, args, format });
      if (!resolution.success) {
        logger.debug({ selector, format: format.id, error: resolution.error }, "arguments did not resolve");
        continue;
      }

      const fields: PayloadField[] = [];
      for (const spec of format.fields) {
        const node = resolvePath(resolution.root, spec.path);
        if (node) fields.push(projectField(spec, node));
      }
      if (fields.length > 0) {
        return { format, signature: resolution.signature, fields };
      }
      logger.debug({ selector, format: format.id }, "no field paths resolved");
    }
    return null;
  }

  return {
    table,
    hasFormats(calldata) {
      const selector = selectorFromCalldata(calldata);
      return selector !== null && table.has(selector);
    },
    decodeCalldata(calldata) {
      return decodeCalldataDetailed(calldata)?.fields ?? null;
    },
    decodeCalldataDetailed,
  };
}
