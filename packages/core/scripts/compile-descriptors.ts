/**
 * Compile a descriptor directory into a TypeScript module exporting
 * `FORMAT_TABLE`, for builds that want the table without reading JSON at
 * run time.
 *
 * Usage:
 *   tsx scripts/compile-descriptors.ts [descriptor-dir] [out-file]
 *
 * Defaults to the bundled descriptors, printing to stdout.
 */

import { writeFileSync } from "node:fs";
import { BUNDLED_DESCRIPTOR_DIR, DescriptorCompileError, compileDescriptorDirectory, renderTableModule } from "../src";
import { logger } from "../src/lib/logger";

function main() {
  const [dir = BUNDLED_DESCRIPTOR_DIR, outFile] = process.argv.slice(2);

  const compiled = compileDescriptorDirectory(dir);
  const source = renderTableModule(compiled);

  if (outFile) {
    writeFileSync(outFile, source, "utf-8");
    logger.info({ outFile, formats: compiled.entries.length, selectors: compiled.groups.length }, "wrote format table");
  } else {
    process.stdout.write(source);
  }
}

try {
  main();
} catch (err) {
  if (err instanceof DescriptorCompileError) {
    logger.error({ sourceFile: err.sourceFile }, err.message);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
