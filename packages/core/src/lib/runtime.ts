/**
 * Runtime assembly.
 *
 * Everything a decode needs is built here once from the bundled data plus
 * the user's settings, then frozen. Visualizers only ever read from it.
 */

import { isAbsolute, resolve } from "node:path";
import {
  FormatTable,
  compileDescriptorDirectory,
  createAbiResolver,
  createCalldataDecoder,
  loadBundledFormatTable,
} from "./descriptors";
import type { CalldataDecoder } from "./descriptors";
import { createEthereumVisualizerChain, registerEthereumProtocols } from "./ethereum";
import type { EthereumCall } from "./ethereum";
import { logger } from "./logger";
import { SUI_MAINNET_CHAIN_ID, createMoveVisualizerChain, normalizeMoveId, registerMoveProtocols } from "./move";
import type { MoveVisualizerChain } from "./move";
import { ContractRegistry } from "./registry";
import { DEFAULT_SETTINGS_CONFIG } from "./settings";
import type { SettingsConfig } from "./settings";
import { createSolanaVisualizerChain } from "./solana";
import type { SolanaVisualizerChain } from "./solana";
import type { VisualizerChain } from "./visualizer";

export interface Runtime {
  readonly settings: SettingsConfig;
  readonly formatTable: FormatTable;
  readonly registry: ContractRegistry;
  readonly decoder: CalldataDecoder;
  readonly ethereum: VisualizerChain<EthereumCall>;
  readonly move: MoveVisualizerChain;
  readonly solana: SolanaVisualizerChain;
}

export interface CreateRuntimeOptions {
  settings?: SettingsConfig;
  /** Replaces the bundled table; settings directories are still merged in. */
  formatTable?: FormatTable;
  /** Base for relative `descriptorDirs`. Defaults to the working directory. */
  baseDir?: string;
}

function buildFormatTable(base: FormatTable, settings: SettingsConfig, baseDir: string): FormatTable {
  const extra = settings.descriptorDirs.map((dir) => {
    const path = isAbsolute(dir) ? dir : resolve(baseDir, dir);
    return FormatTable.fromCompiled(compileDescriptorDirectory(path));
  });
  return extra.length === 0 ? base : FormatTable.merge(base, ...extra);
}

function buildRegistry(settings: SettingsConfig): ContractRegistry {
  const builder = ContractRegistry.builder();
  registerEthereumProtocols(builder);
  registerMoveProtocols(builder);
  for (const entry of settings.contracts) {
    // Move package ids are registered in full-length form, as lookups use it.
    const addresses =
      entry.chainId === SUI_MAINNET_CHAIN_ID ? entry.addresses.map(normalizeMoveId) : entry.addresses;
    builder.registerContract(entry.chainId, entry.type, addresses);
  }
  return builder.build();
}

/**
 * Build a runtime. Throws `DescriptorCompileError` when a settings
 * descriptor directory does not compile and `ContractRegistryError` when
 * settings retag a known contract.
 */
export function createRuntime(options: CreateRuntimeOptions = {}): Runtime {
  const settings = options.settings ?? DEFAULT_SETTINGS_CONFIG;
  const formatTable = buildFormatTable(
    options.formatTable ?? loadBundledFormatTable(),
    settings,
    options.baseDir ?? process.cwd()
  );
  const registry = buildRegistry(settings);
  const decoder = createCalldataDecoder({
    table: formatTable,
    resolver: createAbiResolver({ signatures: settings.signatures }),
  });
  const disabled = settings.disabledVisualizers;

  logger.debug(
    { selectors: formatTable.size, formats: formatTable.formatCount, contracts: registry.size, disabled },
    "runtime ready"
  );

  return Object.freeze({
    settings,
    formatTable,
    registry,
    decoder,
    ethereum: createEthereumVisualizerChain({ registry, decoder, disabled }),
    move: createMoveVisualizerChain({ registry, disabled }),
    solana: createSolanaVisualizerChain({ disabled }),
  });
}

// ── Default runtime ─────────────────────────────────────────────────

let defaultRuntime: Runtime | null = null;

/** Runtime over bundled data and default settings, built on first use. */
export function getDefaultRuntime(): Runtime {
  if (!defaultRuntime) defaultRuntime = createRuntime();
  return defaultRuntime;
}

export function resetDefaultRuntime(): void {
  defaultRuntime = null;
}
