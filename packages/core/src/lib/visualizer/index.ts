export type { Visualizer, VisualizerContext } from "./types";
export { currentElement } from "./types";
export { visualizeWithAny } from "./dispatch";
export { VisualizerChain, VisualizerChainBuilder } from "./chain";
export type { BuildChainOptions, VisualizeAllOptions } from "./chain";
export { CONTRACT_CALL_DATA_LABEL, createRawHexVisualizer, visualizeRawHex } from "./fallback";
