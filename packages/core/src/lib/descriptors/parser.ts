/**
 * Descriptor file parser.
 *
 * Uses Zod for runtime validation. Only the parts of a descriptor that feed
 * the format table are modelled; context, metadata and EIP-712 sections are
 * accepted and ignored.
 */

import { z } from "zod";

export interface DescriptorField {
  label?: string;
  path?: string;
  format?: string;
  params?: Record<string, unknown>;
  $ref?: string;
  /** Nested group; child paths are relative to the group's path. */
  fields?: DescriptorField[];
}

export interface DescriptorFormat {
  $id?: string;
  intent?: string | Record<string, unknown>;
  fields: DescriptorField[];
}

export interface DescriptorDefinition {
  label?: string;
  format?: string;
  params?: Record<string, unknown>;
}

export interface DescriptorDocument {
  display?: {
    formats: Record<string, DescriptorFormat>;
    definitions?: Record<string, DescriptorDefinition>;
  };
}

// ── Zod schemas ─────────────────────────────────────────────────────

const FieldSchema: z.ZodType<DescriptorField> = z.lazy(() =>
  z.object({
    label: z.string().optional(),
    path: z.string().optional(),
    format: z.string().optional(),
    params: z.record(z.unknown()).optional(),
    $ref: z.string().optional(),
    fields: z.array(FieldSchema).optional(),
  })
);

const FormatSchema = z.object({
  $id: z.string().optional(),
  intent: z.union([z.string(), z.record(z.unknown())]).optional(),
  fields: z.array(FieldSchema).default([]),
});

const DefinitionSchema = z.object({
  label: z.string().optional(),
  format: z.string().optional(),
  params: z.record(z.unknown()).optional(),
});

export const DescriptorDocumentSchema = z.object({
  display: z
    .object({
      formats: z.record(FormatSchema).default({}),
      definitions: z.record(DefinitionSchema).optional(),
    })
    .optional(),
});

// ── Parser functions ────────────────────────────────────────────────

export interface ParseResult {
  success: true;
  document: DescriptorDocument;
}

export interface ParseError {
  success: false;
  error: string;
}

/**
 * Validate an already-parsed descriptor document.
 */
export function parseDescriptorDocument(json: unknown): ParseResult | ParseError {
  const result = DescriptorDocumentSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return {
      success: false,
      error: `Invalid descriptor${where}: ${issue?.message ?? result.error.message}`,
    };
  }
  return { success: true, document: result.data };
}

/**
 * Parse a descriptor document from a JSON string.
 */
export function parseDescriptorFromString(jsonString: string): ParseResult | ParseError {
  let json: unknown;
  try {
    json = JSON.parse(jsonString);
  } catch (err) {
    return {
      success: false,
      error: `JSON parse error: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  return parseDescriptorDocument(json);
}
