import type { PayloadField } from "../payload";
import { VisualizerChainBuilder, createRawHexVisualizer, visualizeRawHex } from "../visualizer";
import type { VisualizerChain } from "../visualizer";
import { createSplTokenVisualizer } from "./spl-token";
import { createSystemProgramVisualizer } from "./system";
import type { SolanaInstruction } from "./types";

export const INSTRUCTION_DATA_LABEL = "Instruction Data";

export type SolanaVisualizerChain = VisualizerChain<SolanaInstruction>;

export function createSolanaVisualizerChain(options: { disabled?: readonly string[] } = {}): SolanaVisualizerChain {
  return new VisualizerChainBuilder<SolanaInstruction>()
    .register(createSystemProgramVisualizer())
    .register(createSplTokenVisualizer())
    .register(createRawHexVisualizer<SolanaInstruction>((instruction) => instruction.data, { label: INSTRUCTION_DATA_LABEL }))
    .build({ disabled: options.disabled });
}

/** One field per instruction; unclaimed instructions show their data as hex. */
export function visualizeSolanaInstructions(
  runtime: { readonly solana: SolanaVisualizerChain },
  instructions: readonly SolanaInstruction[],
  sender: string = instructions[0]?.accounts[0] ?? ""
): PayloadField[] {
  return runtime.solana
    .visualizeAll({ sender, elements: instructions })
    .map((field, index) => field ?? visualizeRawHex(instructions[index].data, INSTRUCTION_DATA_LABEL));
}
