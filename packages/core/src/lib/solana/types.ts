import type { Visualizer, VisualizerContext } from "../visualizer";

/** A compiled instruction with its account keys resolved to base58. */
export interface SolanaInstruction {
  programId: string;
  accounts: string[];
  data: Uint8Array;
}

export type SolanaContext = VisualizerContext<SolanaInstruction>;
export type SolanaVisualizer = Visualizer<SolanaInstruction>;
