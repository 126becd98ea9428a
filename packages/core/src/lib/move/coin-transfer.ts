/**
 * Coin transfer visualizer.
 *
 * Claims `TransferObjects` whose every object is a coin split off by an
 * earlier `SplitCoins` in the same transaction.
 */

import { formatUnits } from "viem";
import { addressField, amountField, numberField, previewLayout } from "../payload";
import type { PayloadField } from "../payload";
import { currentElement } from "../visualizer";
import { decodePure } from "./bcs";
import { SUI_DECIMALS, formatSplitAmount, resolveSplitAmount } from "./coins";
import type { SplitAmount } from "./coins";
import type { MoveArgument, MoveContext, MoveInput, MoveVisualizer, TransferObjectsCommand } from "./types";

function recipientOf(inputs: readonly MoveInput[], argument: MoveArgument): string | null {
  if (argument.kind !== "input") return null;
  const input = inputs[argument.index];
  if (!input || input.kind !== "pure") return null;
  const value = decodePure("address", input.bytes);
  return typeof value === "string" ? value : null;
}

function splitsOf(context: MoveContext, command: TransferObjectsCommand): SplitAmount[] | null {
  const splits: SplitAmount[] = [];
  for (const object of command.objects) {
    const split = resolveSplitAmount(context.elements, context.inputs, object);
    if (!split) return null;
    splits.push(split);
  }
  return splits.length > 0 ? splits : null;
}

function amountFieldFor(label: string, split: SplitAmount): PayloadField {
  return split.fromGas ? amountField(label, formatSplitAmount(split), "SUI") : numberField(label, split.amount);
}

export function createCoinTransferVisualizer(): MoveVisualizer {
  return {
    name: "coin-transfer",
    canHandle(command, context) {
      return command.kind === "transferObjects" && splitsOf(context, command) !== null;
    },
    visualize(context) {
      const command = currentElement(context);
      if (!command || command.kind !== "transferObjects") return null;

      const splits = splitsOf(context, command);
      const recipient = recipientOf(context.inputs, command.address);
      if (!splits || recipient === null) return null;

      const allGas = splits.every((split) => split.fromGas);
      const total = splits.reduce((sum, split) => sum + split.amount, 0n);
      const what = allGas
        ? `${formatUnits(total, SUI_DECIMALS)} SUI`
        : splits.length === 1
          ? `${total} base units`
          : `${splits.length} coins`;
      const summary = `Transfer ${what} to ${recipient}`;

      const amounts =
        splits.length === 1
          ? [amountFieldFor("Amount", splits[0])]
          : splits.map((split, i) => amountFieldFor(`Amount ${i + 1}`, split));

      return previewLayout("Coin Transfer", {
        title: "Transfer",
        subtitle: summary,
        fallbackText: summary,
        expanded: [addressField("From", context.sender), addressField("To", recipient), ...amounts],
      });
    },
  };
}
