/**
 * Coin amounts traced through `SplitCoins`.
 */

import { formatUnits } from "viem";
import { readUnsignedLE } from "./bcs";
import type { MoveArgument, MoveCommand, MoveInput } from "./types";

export const SUI_COIN_TYPE = "0x2::sui::SUI";
export const SUI_DECIMALS = 9;

export interface SplitAmount {
  amount: bigint;
  /** True when the coin was split off the gas coin, i.e. the amount is SUI. */
  fromGas: boolean;
}

function pureU64(inputs: readonly MoveInput[], argument: MoveArgument): bigint | null {
  if (argument.kind !== "input") return null;
  const input = inputs[argument.index];
  if (!input || input.kind !== "pure" || input.bytes.length !== 8) return null;
  return readUnsignedLE(input.bytes);
}

/**
 * The amount of a coin produced by an earlier `SplitCoins`, or null when
 * the argument does not point at one.
 */
export function resolveSplitAmount(
  commands: readonly MoveCommand[],
  inputs: readonly MoveInput[],
  argument: MoveArgument
): SplitAmount | null {
  let commandIndex: number;
  let resultIndex: number;
  switch (argument.kind) {
    case "result":
      commandIndex = argument.index;
      resultIndex = 0;
      break;
    case "nestedResult":
      commandIndex = argument.index;
      resultIndex = argument.resultIndex;
      break;
    default:
      return null;
  }

  const command = commands[commandIndex];
  if (!command || command.kind !== "splitCoins") return null;
  const amountArgument = command.amounts[resultIndex];
  if (!amountArgument) return null;

  const amount = pureU64(inputs, amountArgument);
  return amount === null ? null : { amount, fromGas: command.coin.kind === "gasCoin" };
}

/** "1.5" scaled to SUI for gas-coin splits, base units otherwise. */
export function formatSplitAmount(split: SplitAmount): string {
  return split.fromGas ? formatUnits(split.amount, SUI_DECIMALS) : split.amount.toString();
}

/** Last path segment of a Move type, "0x2::sui::SUI" -> "SUI". */
export function coinSymbol(coinType: string): string {
  const generic = coinType.indexOf("<");
  const base = generic === -1 ? coinType : coinType.slice(0, generic);
  const segments = base.split("::");
  return segments[segments.length - 1] || coinType;
}
