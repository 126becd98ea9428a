/**
 * Move visualizer chain.
 *
 * ┌─────────────────────────────────────────────────────────────────┐
 * │  DISPATCH ORDER                                                 │
 * │                                                                 │
 * │  name                │ claims                                   │
 * │  ────────────────────┼───────────────────────────────────────   │
 * │  cetus-swap          │ swaps on the registered Cetus package    │
 * │  momentum-liquidity  │ Momentum remove liquidity / close        │
 * │  sui-native-staking  │ 0x3::sui_system stake / withdraw         │
 * │  coin-transfer       │ TransferObjects of split-off coins       │
 * │  move-call           │ any other MoveCall                       │
 * └─────────────────────────────────────────────────────────────────┘
 *
 * Commands nobody claims (a bare SplitCoins, say) produce no field.
 */

import type { PayloadField } from "../payload";
import type { ContractRegistry, ContractRegistryBuilder } from "../registry";
import { VisualizerChainBuilder } from "../visualizer";
import type { VisualizerChain } from "../visualizer";
import { createCetusSwapVisualizer, registerCetus } from "./cetus";
import { createCoinTransferVisualizer } from "./coin-transfer";
import { createMoveCallFallbackVisualizer } from "./fallback";
import { createMomentumVisualizer, registerMomentum } from "./momentum";
import { createNativeStakingVisualizer } from "./staking";
import type { MoveCommand, MoveInput, MoveTransaction } from "./types";

export type MoveVisualizerChain = VisualizerChain<MoveCommand, MoveInput>;

export function registerMoveProtocols(builder: ContractRegistryBuilder): void {
  registerCetus(builder);
  registerMomentum(builder);
}

export function createMoveVisualizerChain(options: {
  registry: ContractRegistry;
  disabled?: readonly string[];
}): MoveVisualizerChain {
  return new VisualizerChainBuilder<MoveCommand, MoveInput>()
    .register(createCetusSwapVisualizer(options.registry))
    .register(createMomentumVisualizer(options.registry))
    .register(createNativeStakingVisualizer())
    .register(createCoinTransferVisualizer())
    .register(createMoveCallFallbackVisualizer())
    .build({ disabled: options.disabled });
}

export function visualizeMoveTransaction(
  runtime: { readonly move: MoveVisualizerChain },
  transaction: MoveTransaction
): PayloadField[] {
  const fields = runtime.move.visualizeAll({
    sender: transaction.sender,
    elements: transaction.commands,
    inputs: transaction.inputs,
    ...(transaction.chainId !== undefined && { chainId: transaction.chainId }),
  });
  return fields.filter((field): field is PayloadField => field !== null);
}
