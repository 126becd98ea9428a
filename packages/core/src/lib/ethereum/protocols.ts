/**
 * Protocol deployments registered in the contract registry.
 */

import type { ContractRegistryBuilder } from "../registry";
import { registerKnownTokens } from "./tokens";

export const UNISWAP_CHAIN_IDS = [1, 10, 137, 8453, 42161] as const;

export const UNISWAP_UNIVERSAL_ROUTER_TYPE = "UniswapUniversalRouter";
export const UNISWAP_UNIVERSAL_ROUTER_ADDRESS = "0x3fC91A3afd70395Cd496C647d5a6CC9D4B2b7FAD";

export const UNISWAP_PERMIT2_TYPE = "UniswapPermit2";
export const UNISWAP_PERMIT2_ADDRESS = "0x000000000022D473030F116dDEE9F6B43aC78BA3";

export function registerEthereumProtocols(builder: ContractRegistryBuilder): void {
  for (const chainId of UNISWAP_CHAIN_IDS) {
    builder
      .registerContract(chainId, UNISWAP_UNIVERSAL_ROUTER_TYPE, [UNISWAP_UNIVERSAL_ROUTER_ADDRESS])
      .registerContract(chainId, UNISWAP_PERMIT2_TYPE, [UNISWAP_PERMIT2_ADDRESS]);
  }
  registerKnownTokens(builder);
}
