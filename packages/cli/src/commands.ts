/**
 * Command implementations. Output goes through `CliIO` so the whole CLI
 * runs in-process under test; each command returns its exit code.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { isAddress } from "viem";
import {
  DEFAULT_SETTINGS_CONFIG,
  DescriptorCompileError,
  chainName,
  compileDescriptorDirectory,
  computeSettingsFingerprint,
  createRuntime,
  loadSettingsConfig,
  normalizeSelector,
  renderTableModule,
  saveSettingsConfig,
  selectorFromCalldata,
  visualizeEthereumCall,
} from "@clearview/core";
import type { SettingsConfig } from "@clearview/core";
import { getFlag, getPositionals, hasFlag } from "./args";
import { heading, label } from "./formatter";
import { decodeInput, isInputEncoding } from "./input";
import { renderPayloadField } from "./payload-renderer";
import { createNodeSettingsStore, resolveSettingsPath } from "./storage";

export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

type OutputFormat = "text" | "json";

const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";

export const HELP_TEXT = `clearview - clear-signing calldata decoder

Usage:
  clearview decode <calldata> [--chain-id N] [--to ADDR] [--from ADDR] [--encoding hex|base64]
                              [--format text|json] [--settings <path>] [--no-settings]
  clearview selector <signature-or-selector>
  clearview compile <descriptor-dir> [--out <file>] [--import-from <module>]
  clearview settings init [--path <file>]
  clearview settings show [--path <file>]

Examples:
  clearview decode 0xa9059cbb000000000000000000000000... --to 0xA0b86991c6218b36c1d19d4a2e9eB0cE3606eB48
  clearview selector "transfer(address to, uint256 amount)"
  clearview compile ./descriptors --out formats.generated.ts
`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function getOutputFormat(args: string[]): OutputFormat {
  const value = getFlag(args, "--format")?.toLowerCase();
  if (value === undefined || value === "text") return "text";
  if (value === "json") return "json";
  throw new UsageError(`Unknown --format value "${value}". Supported values: text, json.`);
}

function getChainId(args: string[]): number {
  const value = getFlag(args, "--chain-id");
  if (value === undefined) return 1;
  const chainId = Number(value);
  if (!Number.isSafeInteger(chainId) || chainId < 0) {
    throw new UsageError(`Invalid --chain-id "${value}"`);
  }
  return chainId;
}

function getAddressFlag(args: string[], flag: string): string | undefined {
  const value = getFlag(args, flag);
  if (value !== undefined && !isAddress(value, { strict: false })) {
    throw new UsageError(`Invalid ${flag} address "${value}"`);
  }
  return value;
}

async function loadSettingsForDecode(args: string[], io: CliIO): Promise<{ settings: SettingsConfig; baseDir: string }> {
  if (hasFlag(args, "--no-settings")) {
    return { settings: DEFAULT_SETTINGS_CONFIG, baseDir: process.cwd() };
  }
  const settingsPath = resolveSettingsPath(getFlag(args, "--settings"));
  const { config, warning } = await loadSettingsConfig(createNodeSettingsStore(settingsPath));
  if (warning) io.stderr(`Warning: ${warning.message} (using defaults)`);
  return { settings: config, baseDir: path.dirname(settingsPath) };
}

// ── decode ──────────────────────────────────────────────────────────

async function runDecode(args: string[], io: CliIO): Promise<number> {
  const [raw] = getPositionals(args);
  if (raw === undefined) throw new UsageError("Missing calldata.");

  const encodingFlag = getFlag(args, "--encoding");
  if (encodingFlag !== undefined && !isInputEncoding(encodingFlag)) {
    throw new UsageError(`Unknown --encoding value "${encodingFlag}". Supported values: hex, base64.`);
  }
  const format = getOutputFormat(args);
  const chainId = getChainId(args);
  const to = getAddressFlag(args, "--to") ?? ZERO_ADDRESS;
  const from = getAddressFlag(args, "--from");

  const input = decodeInput(raw, encodingFlag);
  if (!input.success) {
    io.stderr(input.error);
    return 1;
  }

  const { settings, baseDir } = await loadSettingsForDecode(args, io);
  const runtime = createRuntime({ settings, baseDir });
  const field = visualizeEthereumCall(runtime, {
    chainId,
    to,
    data: input.bytes,
    ...(from !== undefined && { from }),
  });
  const selector = selectorFromCalldata(input.bytes);

  if (format === "json") {
    io.stdout(JSON.stringify({ chainId, to, ...(from !== undefined && { from }), selector, field }, null, 2));
    return 0;
  }

  io.stdout(heading("Decoded calldata"));
  io.stdout(`${label("Chain")}: ${chainName(chainId)} (${chainId})`);
  io.stdout(`${label("To")}: ${to}`);
  if (from !== undefined) io.stdout(`${label("From")}: ${from}`);
  io.stdout(`${label("Selector")}: ${selector ?? "(none)"}`);
  io.stdout(`${label("Bytes")}: ${input.bytes.length} (${input.encoding})`);
  io.stdout("");
  for (const line of renderPayloadField(field)) io.stdout(line);
  return 0;
}

// ── selector ────────────────────────────────────────────────────────

function runSelector(args: string[], io: CliIO): number {
  const key = getPositionals(args).join(" ");
  if (!key) throw new UsageError("Missing signature or selector.");
  const selector = normalizeSelector(key);
  if (selector === null) {
    io.stderr(`Not a selector or function signature: ${key}`);
    return 1;
  }
  io.stdout(selector);
  return 0;
}

// ── compile ─────────────────────────────────────────────────────────

async function runCompile(args: string[], io: CliIO): Promise<number> {
  const [dir] = getPositionals(args);
  if (dir === undefined) throw new UsageError("Missing descriptor directory.");

  let source: string;
  try {
    const compiled = compileDescriptorDirectory(path.resolve(dir));
    const importFrom = getFlag(args, "--import-from");
    source = renderTableModule(compiled, importFrom !== undefined ? { importFrom } : {});
  } catch (err) {
    if (err instanceof DescriptorCompileError) {
      io.stderr(`Descriptor compilation failed: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const outPath = getFlag(args, "--out");
  if (outPath === undefined) {
    io.stdout(source.trimEnd());
    return 0;
  }
  await fs.mkdir(path.dirname(path.resolve(outPath)), { recursive: true });
  await fs.writeFile(outPath, source, "utf-8");
  io.stdout(`Wrote ${outPath}`);
  return 0;
}

// ── settings ────────────────────────────────────────────────────────

async function runSettings(args: string[], io: CliIO): Promise<number> {
  const [sub] = getPositionals(args);
  const pathFlag = getFlag(args, "--path");
  const store = createNodeSettingsStore(pathFlag);

  if (sub === "init") {
    await saveSettingsConfig(store, DEFAULT_SETTINGS_CONFIG);
    io.stdout(`Settings written to ${resolveSettingsPath(pathFlag)}`);
    return 0;
  }

  if (sub === "show") {
    if ((await store.read()) === null) {
      io.stdout("No settings found.");
      return 0;
    }
    const { config, warning } = await loadSettingsConfig(store);
    if (warning) {
      io.stderr(warning.message);
      return 1;
    }
    io.stdout(JSON.stringify(config, null, 2));
    io.stderr(`Fingerprint: ${computeSettingsFingerprint(config)}`);
    return 0;
  }

  throw new UsageError("Unknown settings command. Use: settings init | settings show");
}

// ── Entry ───────────────────────────────────────────────────────────

export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const [command, ...args] = argv;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    io.stdout(HELP_TEXT.trimEnd());
    return 0;
  }

  try {
    switch (command) {
      case "decode":
        return await runDecode(args, io);
      case "selector":
        return runSelector(args, io);
      case "compile":
        return await runCompile(args, io);
      case "settings":
        return await runSettings(args, io);
      default:
        io.stderr(`Unknown command: ${command}`);
        io.stderr(HELP_TEXT.trimEnd());
        return 1;
    }
  } catch (err) {
    io.stderr(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
