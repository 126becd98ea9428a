/**
 * Chain names for display.
 */

import type { Chain } from "viem";
import { arbitrum, base, gnosis, mainnet, optimism, polygon, sepolia } from "viem/chains";
import { SUI_MAINNET_CHAIN_ID } from "./move";

export const EVM_CHAINS: Record<number, Chain> = {
  1: mainnet,
  10: optimism,
  100: gnosis,
  137: polygon,
  8453: base,
  42161: arbitrum,
  11155111: sepolia,
};

/** SLIP-44 coin type of Solana, its id in the contract registry. */
export const SOLANA_CHAIN_ID = 501;

const NON_EVM_NAMES: Record<number, string> = {
  [SUI_MAINNET_CHAIN_ID]: "Sui",
  [SOLANA_CHAIN_ID]: "Solana",
};

export function chainName(chainId: number): string {
  return EVM_CHAINS[chainId]?.name ?? NON_EVM_NAMES[chainId] ?? `Chain ${chainId}`;
}
