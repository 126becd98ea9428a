export * from "./lib/payload";
export * from "./lib/descriptors";
export * from "./lib/registry";
export * from "./lib/visualizer";
export * from "./lib/ethereum";
export * from "./lib/move";
export * from "./lib/solana";
export * from "./lib/settings";
export { EVM_CHAINS, SOLANA_CHAIN_ID, chainName } from "./lib/chains";
export { createRuntime, getDefaultRuntime, resetDefaultRuntime } from "./lib/runtime";
export type { CreateRuntimeOptions, Runtime } from "./lib/runtime";
export { logger } from "./lib/logger";
