import type { ZodError } from "zod";
import { logger } from "../logger";
import { DEFAULT_SETTINGS_CONFIG } from "./defaults";
import { settingsConfigSchema } from "./types";
import type { SettingsConfig } from "./types";

/** Where settings live. The CLI backs this with a file; tests with memory. */
export interface SettingsStore {
  read(): Promise<string | null> | string | null;
  write(payload: string): Promise<void> | void;
  remove(): Promise<void> | void;
}

export type SettingsLoadWarningKind = "read_error" | "parse_error" | "schema_error";

export interface SettingsLoadWarning {
  kind: SettingsLoadWarningKind;
  message: string;
}

export interface SettingsLoadResult {
  config: SettingsConfig;
  warning?: SettingsLoadWarning;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** "contracts.0.chainId: Expected number, received string; ..." */
export function describeSchemaIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function fallbackWith(fallback: SettingsConfig, kind: SettingsLoadWarningKind, message: string): SettingsLoadResult {
  logger.warn({ kind }, message);
  return { config: fallback, warning: { kind, message } };
}

/**
 * Load and validate settings. Never throws: anything wrong with the stored
 * payload yields `fallback` and a warning. A missing payload is not a
 * problem and yields `fallback` alone.
 */
export async function loadSettingsConfig(
  store: SettingsStore,
  fallback: SettingsConfig = DEFAULT_SETTINGS_CONFIG
): Promise<SettingsLoadResult> {
  let raw: string | null;
  try {
    raw = await store.read();
  } catch (err) {
    return fallbackWith(fallback, "read_error", `Failed to read settings: ${errorMessage(err)}`);
  }

  if (raw === null || raw.trim() === "") return { config: fallback };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return fallbackWith(fallback, "parse_error", `Settings file contains invalid JSON: ${errorMessage(err)}`);
  }

  const result = settingsConfigSchema.safeParse(parsed);
  if (!result.success) {
    return fallbackWith(
      fallback,
      "schema_error",
      `Settings file failed schema validation: ${describeSchemaIssues(result.error)}`
    );
  }
  return { config: result.data };
}

export async function saveSettingsConfig(store: SettingsStore, config: SettingsConfig): Promise<void> {
  const validated = settingsConfigSchema.parse(config);
  await store.write(`${JSON.stringify(validated, null, 2)}\n`);
}

export async function resetSettingsConfig(
  store: SettingsStore,
  fallback: SettingsConfig = DEFAULT_SETTINGS_CONFIG
): Promise<SettingsConfig> {
  await store.remove();
  return fallback;
}

/**
 * Validate a JSON payload and store it. Unlike `loadSettingsConfig` this
 * throws, since the caller is handing over a payload it expects to be valid.
 */
export async function importSettingsConfig(store: SettingsStore, json: string): Promise<SettingsConfig> {
  const result = settingsConfigSchema.safeParse(JSON.parse(json));
  if (!result.success) {
    throw new Error(`Invalid settings: ${describeSchemaIssues(result.error)}`);
  }
  await saveSettingsConfig(store, result.data);
  return result.data;
}
