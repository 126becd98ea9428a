/**
 * Bundled format table.
 *
 * Compiles the descriptors shipped in `packages/core/descriptors/` once per
 * process and hands out the same frozen table afterwards.
 */

import { fileURLToPath } from "node:url";
import { compileDescriptorDirectory } from "./compiler";
import { FormatTable } from "./table";

export const BUNDLED_DESCRIPTOR_DIR = fileURLToPath(new URL("../../../descriptors", import.meta.url));

let bundledTable: FormatTable | null = null;

/**
 * Get or create the bundled format table.
 */
export function loadBundledFormatTable(): FormatTable {
  if (!bundledTable) {
    bundledTable = FormatTable.fromCompiled(compileDescriptorDirectory(BUNDLED_DESCRIPTOR_DIR));
  }
  return bundledTable;
}

/**
 * Drop the cached table (tests, or after descriptors change on disk).
 */
export function resetBundledFormatTable(): void {
  bundledTable = null;
}
