/**
 * Move programmable-transaction model.
 *
 * A transaction is a list of commands over shared inputs; commands refer to
 * inputs and to earlier commands' results by index.
 */

import type { Visualizer, VisualizerContext } from "../visualizer";

export type MoveArgument =
  | { kind: "gasCoin" }
  | { kind: "input"; index: number }
  | { kind: "result"; index: number }
  | { kind: "nestedResult"; index: number; resultIndex: number };

export interface MoveCallCommand {
  kind: "moveCall";
  package: string;
  module: string;
  function: string;
  typeArguments: string[];
  arguments: MoveArgument[];
}

export interface SplitCoinsCommand {
  kind: "splitCoins";
  coin: MoveArgument;
  amounts: MoveArgument[];
}

export interface TransferObjectsCommand {
  kind: "transferObjects";
  objects: MoveArgument[];
  address: MoveArgument;
}

export type MoveCommand = MoveCallCommand | SplitCoinsCommand | TransferObjectsCommand;

/** Pure inputs hold BCS bytes; their type comes from the consuming call. */
export type MoveInput = { kind: "pure"; bytes: Uint8Array } | { kind: "object"; objectId: string };

export interface MoveTransaction {
  sender: string;
  chainId?: number;
  commands: MoveCommand[];
  inputs: MoveInput[];
}

export type MoveContext = VisualizerContext<MoveCommand, MoveInput>;
export type MoveVisualizer = Visualizer<MoveCommand, MoveInput>;

/** SLIP-44 coin type of Sui, used as its chain id in the contract registry. */
export const SUI_MAINNET_CHAIN_ID = 784;

/**
 * Full-length lowercase form of a Move address or package id ("0x3" and
 * "0x0...03" are the same package).
 */
export function normalizeMoveId(id: string): string {
  const hex = id.trim().replace(/^0x/i, "").toLowerCase();
  return `0x${hex.padStart(64, "0")}`;
}
