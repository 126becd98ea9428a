/**
 * Descriptor compiler.
 *
 * Walks a directory of descriptor JSON files and compiles every display
 * format into a `DescriptorEntry`, grouped by normalized selector. The
 * result can be loaded directly (`FormatTable.fromCompiled`) or rendered
 * as a TypeScript module that builds the same table without reading disk.
 */

import { readdirSync, readFileSync } from "node:fs";
import type { Dirent } from "node:fs";
import path from "node:path";
import { logger } from "../logger";
import { parseDescriptorFromString } from "./parser";
import { parseFunctionSignature } from "./resolver";
import type { DescriptorDefinition, DescriptorDocument, DescriptorField } from "./parser";
import { isSelector, normalizeSelector } from "./selector";
import type { CompiledTable, DescriptorEntry, FieldSpec, SelectorGroup } from "./types";

export class DescriptorCompileError extends Error {
  constructor(
    readonly sourceFile: string,
    message: string,
    readonly formatKey?: string
  ) {
    super(formatKey ? `${sourceFile} [${formatKey}]: ${message}` : `${sourceFile}: ${message}`);
    this.name = "DescriptorCompileError";
  }
}

export interface DescriptorSource {
  sourceFile: string;
  contents: string;
}

// ── Field flattening ────────────────────────────────────────────────

function definitionFor(
  ref: string,
  definitions: Record<string, DescriptorDefinition> | undefined
): DescriptorDefinition | undefined {
  const key = ref.split(/[./]/).pop() ?? "";
  return definitions?.[key];
}

function joinPath(prefix: string | undefined, child: string | undefined): string {
  if (!prefix) return child ?? "";
  if (!child) return prefix;
  return `${prefix}.${child}`;
}

function flattenFields(
  fields: DescriptorField[],
  definitions: Record<string, DescriptorDefinition> | undefined,
  sourceFile: string,
  prefix?: string
): FieldSpec[] {
  const specs: FieldSpec[] = [];

  for (const field of fields) {
    const fieldPath = joinPath(prefix, field.path);

    if (field.fields) {
      specs.push(...flattenFields(field.fields, definitions, sourceFile, fieldPath));
      continue;
    }

    const definition = field.$ref ? definitionFor(field.$ref, definitions) : undefined;
    if (field.$ref && !definition) {
      logger.warn({ sourceFile, ref: field.$ref }, "descriptor $ref not found in definitions");
    }

    const format = field.format ?? definition?.format;
    const params =
      definition?.params || field.params ? { ...definition?.params, ...field.params } : undefined;

    const spec: FieldSpec = {
      label: field.label ?? definition?.label ?? fieldPath,
      path: fieldPath,
    };
    if (format) spec.format = format;
    if (params) spec.params = params;
    specs.push(spec);
  }

  return specs;
}

// ── Compilation ─────────────────────────────────────────────────────

function compileDocument(document: DescriptorDocument, sourceFile: string): DescriptorEntry[] {
  const display = document.display;
  if (!display) return [];

  const entries: DescriptorEntry[] = [];
  for (const [formatKey, format] of Object.entries(display.formats)) {
    const selector = normalizeSelector(formatKey);
    if (selector === null) {
      throw new DescriptorCompileError(
        sourceFile,
        "format key is neither a 4-byte selector nor a function signature",
        formatKey
      );
    }

    const signature = isSelector(formatKey.trim()) ? undefined : formatKey.trim();
    if (signature !== undefined && parseFunctionSignature(signature) === null) {
      throw new DescriptorCompileError(sourceFile, "function signature cannot be decoded as an ABI", formatKey);
    }

    const entry: DescriptorEntry = {
      selector,
      formatId: format.$id ?? `${sourceFile}#${formatKey}`,
      sourceFile,
      formatKey,
      fields: flattenFields(format.fields, display.definitions, sourceFile),
    };
    if (signature !== undefined) entry.signature = signature;
    if (typeof format.intent === "string") entry.intent = format.intent;
    entries.push(entry);
  }
  return entries;
}

/**
 * Compile descriptor sources, in the order given, into a selector table.
 */
export function compileDescriptors(sources: readonly DescriptorSource[]): CompiledTable {
  const entries: DescriptorEntry[] = [];
  const bySelector = new Map<string, number[]>();

  for (const source of sources) {
    const parsed = parseDescriptorFromString(source.contents);
    if (!parsed.success) {
      throw new DescriptorCompileError(source.sourceFile, parsed.error);
    }

    for (const entry of compileDocument(parsed.document, source.sourceFile)) {
      const indexes = bySelector.get(entry.selector) ?? [];
      indexes.push(entries.length);
      bySelector.set(entry.selector, indexes);
      entries.push(entry);
    }
  }

  const groups: SelectorGroup[] = [...bySelector.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([selector, formatIndexes]) => ({ selector, formatIndexes }));

  for (const group of groups) {
    if (group.formatIndexes.length > 1) {
      logger.warn(
        { selector: group.selector, formats: group.formatIndexes.map((i) => entries[i].formatId) },
        "selector collision; formats will be tried in discovery order"
      );
    }
  }
  logger.info(
    { files: sources.length, formats: entries.length, selectors: groups.length },
    "compiled descriptors"
  );

  return { entries, groups, sourceFiles: sources.map((source) => source.sourceFile) };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function listJsonFiles(root: string, dir = root): string[] {
  let dirents: Dirent[];
  try {
    dirents = readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    const relative = path.relative(root, dir).split(path.sep).join("/");
    throw new DescriptorCompileError(relative || root, `cannot read descriptor directory: ${errorMessage(err)}`);
  }

  const files: string[] = [];
  for (const dirent of dirents) {
    const fullPath = path.join(dir, dirent.name);
    if (dirent.isDirectory()) {
      files.push(...listJsonFiles(root, fullPath));
    } else if (dirent.isFile() && dirent.name.endsWith(".json")) {
      files.push(path.relative(root, fullPath).split(path.sep).join("/"));
    }
  }
  return files;
}

function readSource(dir: string, sourceFile: string): string {
  try {
    return readFileSync(path.join(dir, ...sourceFile.split("/")), "utf-8");
  } catch (err) {
    throw new DescriptorCompileError(sourceFile, `cannot read descriptor file: ${errorMessage(err)}`);
  }
}

/**
 * Compile every `*.json` file under `dir`, visited in sorted path order so
 * repeated builds produce the same table.
 */
export function compileDescriptorDirectory(dir: string): CompiledTable {
  const sources = listJsonFiles(dir)
    .sort()
    .map((sourceFile) => ({ sourceFile, contents: readSource(dir, sourceFile) }));
  return compileDescriptors(sources);
}

// ── Module rendering ────────────────────────────────────────────────

export interface RenderTableOptions {
  /** Module the rendered code imports `FormatTable` from. */
  importFrom?: string;
}

function renderField(field: FieldSpec): string {
  const parts = [`label: ${JSON.stringify(field.label)}`, `path: ${JSON.stringify(field.path)}`];
  if (field.format !== undefined) parts.push(`format: ${JSON.stringify(field.format)}`);
  if (field.params !== undefined) parts.push(`params: ${JSON.stringify(field.params)}`);
  return `Object.freeze({ ${parts.join(", ")} })`;
}

function renderFormat(entry: DescriptorEntry, index: number): string[] {
  const fields = entry.fields.map((field) => `  ${renderField(field)},`);
  const props = [
    `  id: ${JSON.stringify(entry.formatId)},`,
    `  selector: ${JSON.stringify(entry.selector)},`,
    `  sourceFile: ${JSON.stringify(entry.sourceFile)},`,
  ];
  if (entry.signature !== undefined) props.push(`  signature: ${JSON.stringify(entry.signature)},`);
  if (entry.intent !== undefined) props.push(`  intent: ${JSON.stringify(entry.intent)},`);
  props.push(`  fields: FIELDS_${index},`);

  return [
    `const FIELDS_${index}: readonly FieldSpec[] = Object.freeze([`,
    ...fields,
    "]);",
    `const FORMAT_${index}: Format = Object.freeze({`,
    ...props,
    "});",
    "",
  ];
}

/**
 * Render a compiled table as a TypeScript module exporting `FORMAT_TABLE`.
 * The output depends only on the compiled table, so identical inputs render
 * byte-identical modules.
 */
export function renderTableModule(compiled: CompiledTable, options: RenderTableOptions = {}): string {
  const importFrom = options.importFrom ?? "@clearview/core";
  const groups = compiled.groups.map((group, i) => {
    const members = group.formatIndexes.map((index) => `FORMAT_${index}`).join(", ");
    return `const GROUP_${i}: readonly Format[] = Object.freeze([${members}]);`;
  });
  const mapEntries = compiled.groups.map(
    (group, i) => `  [${JSON.stringify(group.selector)}, GROUP_${i}],`
  );

  return [
    "// @generated by `clearview compile`. Do not edit.",
    `import { FormatTable } from ${JSON.stringify(importFrom)};`,
    `import type { FieldSpec, Format } from ${JSON.stringify(importFrom)};`,
    "",
    ...compiled.entries.flatMap((entry, index) => renderFormat(entry, index)),
    ...groups,
    "",
    "export const FORMAT_TABLE = FormatTable.fromSelectorMap(",
    "  new Map<string, readonly Format[]>([",
    ...mapEntries.map((line) => `  ${line}`),
    "  ])",
    ");",
    "",
  ].join("\n");
}
