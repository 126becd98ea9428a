export type { EthereumCall, EthereumContext, EthereumVisualizer } from "./types";
export {
  ERC20_TOKEN_TYPE,
  KNOWN_TOKENS,
  describeTokenAmount,
  formatTokenAmount,
  registerKnownTokens,
  resolveToken,
} from "./tokens";
export type { TokenInfo } from "./tokens";
export {
  UNISWAP_CHAIN_IDS,
  UNISWAP_PERMIT2_ADDRESS,
  UNISWAP_PERMIT2_TYPE,
  UNISWAP_UNIVERSAL_ROUTER_ADDRESS,
  UNISWAP_UNIVERSAL_ROUTER_TYPE,
  registerEthereumProtocols,
} from "./protocols";
export { UNKNOWN_TOKEN_BADGE, createErc20Visualizer } from "./erc20";
export { createSafePolicyVisualizer } from "./safe-policy";
export { createPermit2Visualizer, formatExpiration } from "./permit2";
export { commandName, createUniversalRouterVisualizer, decodeV3Path } from "./universal-router";
export { DECODED_INPUT_LABEL, createDeclarativeVisualizer } from "./declarative";
export { createEthereumVisualizerChain, visualizeEthereumCall, visualizeEthereumCalls } from "./chain";
export type { EthereumChainOptions } from "./chain";
