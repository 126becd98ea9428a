/**
 * Ethereum visualizer chain.
 *
 * ┌─────────────────────────────────────────────────────────────────┐
 * │  DISPATCH ORDER                                                 │
 * │                                                                 │
 * │  name                      │ claims                             │
 * │  ──────────────────────────┼─────────────────────────────────   │
 * │  erc20                     │ transfer / approve / transferFrom  │
 * │  safe-policy               │ Safe owner, module, guard changes  │
 * │  uniswap-permit2           │ approve on registered Permit2      │
 * │  uniswap-universal-router  │ execute on registered routers      │
 * │  declarative               │ selectors in the format table      │
 * │  raw-hex                   │ everything else                    │
 * └─────────────────────────────────────────────────────────────────┘
 */

import type { CalldataDecoder } from "../descriptors";
import type { PayloadField } from "../payload";
import type { ContractRegistry } from "../registry";
import { VisualizerChainBuilder, createRawHexVisualizer, visualizeRawHex } from "../visualizer";
import type { VisualizerChain } from "../visualizer";
import { createDeclarativeVisualizer } from "./declarative";
import { createErc20Visualizer } from "./erc20";
import { createPermit2Visualizer } from "./permit2";
import { createSafePolicyVisualizer } from "./safe-policy";
import type { EthereumCall } from "./types";
import { createUniversalRouterVisualizer } from "./universal-router";

export interface EthereumChainOptions {
  registry: ContractRegistry;
  decoder: CalldataDecoder;
  disabled?: readonly string[];
}

export function createEthereumVisualizerChain(options: EthereumChainOptions): VisualizerChain<EthereumCall> {
  return new VisualizerChainBuilder<EthereumCall>()
    .register(createErc20Visualizer(options.registry))
    .register(createSafePolicyVisualizer())
    .register(createPermit2Visualizer(options.registry))
    .register(createUniversalRouterVisualizer(options.registry))
    .register(createDeclarativeVisualizer(options.decoder))
    .register(createRawHexVisualizer<EthereumCall>((call) => call.data))
    .build({ disabled: options.disabled });
}

/**
 * Visualize one call. Falls back to raw hex even when the chain's own
 * fallback has been disabled, so the result is never empty.
 */
export function visualizeEthereumCall(
  runtime: { readonly ethereum: VisualizerChain<EthereumCall> },
  call: EthereumCall
): PayloadField {
  const field = runtime.ethereum.visualize({
    chainId: call.chainId,
    sender: call.from ?? "",
    index: 0,
    elements: [call],
    inputs: [],
  });
  return field ?? visualizeRawHex(call.data);
}

/** Visualize a batch of calls (e.g. a multisend), one field per call. */
export function visualizeEthereumCalls(
  runtime: { readonly ethereum: VisualizerChain<EthereumCall> },
  calls: readonly EthereumCall[]
): PayloadField[] {
  return calls.map((call, index) => {
    const field = runtime.ethereum.visualize({
      chainId: call.chainId,
      sender: call.from ?? "",
      index,
      elements: calls,
      inputs: [],
    });
    return field ?? visualizeRawHex(call.data);
  });
}
