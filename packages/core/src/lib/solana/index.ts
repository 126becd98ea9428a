export type { SolanaContext, SolanaInstruction, SolanaVisualizer } from "./types";
export { SOL_DECIMALS, SYSTEM_PROGRAM_ID, createSystemProgramVisualizer, formatLamports } from "./system";
export { TOKEN_2022_PROGRAM_ID, TOKEN_PROGRAM_ID, createSplTokenVisualizer } from "./spl-token";
export { INSTRUCTION_DATA_LABEL, createSolanaVisualizerChain, visualizeSolanaInstructions } from "./chain";
export type { SolanaVisualizerChain } from "./chain";
