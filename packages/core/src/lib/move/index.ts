export type {
  MoveArgument,
  MoveCallCommand,
  MoveCommand,
  MoveContext,
  MoveInput,
  MoveTransaction,
  MoveVisualizer,
  SplitCoinsCommand,
  TransferObjectsCommand,
} from "./types";
export { SUI_MAINNET_CHAIN_ID, normalizeMoveId } from "./types";
export { BcsDecodeError, decodePure, readUnsignedLE } from "./bcs";
export type { MoveValue, MoveValueType } from "./bcs";
export {
  UnsupportedNameError,
  defineMovePackage,
  isPackageCall,
  parameterIndex,
  readBoolParameter,
  readIntegerParameter,
  readParameter,
  resolveFunction,
  resolveModule,
} from "./config";
export type { MoveFunctionSpec, MoveModuleSpec, MovePackageConfig, MoveParameterSpec } from "./config";
export { SUI_COIN_TYPE, SUI_DECIMALS, coinSymbol, formatSplitAmount, resolveSplitAmount } from "./coins";
export type { SplitAmount } from "./coins";
export { CETUS_CONFIG, CETUS_PACKAGE_TYPE, createCetusSwapVisualizer, registerCetus } from "./cetus";
export { MOMENTUM_CONFIG, MOMENTUM_PACKAGE_TYPE, createMomentumVisualizer, registerMomentum } from "./momentum";
export { SUI_SYSTEM_CONFIG, createNativeStakingVisualizer } from "./staking";
export { createCoinTransferVisualizer } from "./coin-transfer";
export { MOVE_CALL_LABEL, createMoveCallFallbackVisualizer } from "./fallback";
export { createMoveVisualizerChain, registerMoveProtocols, visualizeMoveTransaction } from "./chain";
export type { MoveVisualizerChain } from "./chain";
