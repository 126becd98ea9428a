import type { Visualizer, VisualizerContext } from "../visualizer";

/** A single contract call on an EVM chain. */
export interface EthereumCall {
  chainId: number;
  to: string;
  from?: string;
  /** Native value in wei. */
  value?: bigint;
  data: Uint8Array;
}

export type EthereumContext = VisualizerContext<EthereumCall>;
export type EthereumVisualizer = Visualizer<EthereumCall>;
