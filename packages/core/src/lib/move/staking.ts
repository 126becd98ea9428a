/**
 * Sui native staking visualizer (`0x3::sui_system`).
 */

import { addressField, amountField, numberField, previewLayout, textField } from "../payload";
import type { PayloadField } from "../payload";
import { currentElement } from "../visualizer";
import { formatSplitAmount, resolveSplitAmount } from "./coins";
import { UnsupportedNameError, defineMovePackage, isPackageCall, readParameter, resolveFunction } from "./config";
import type { MoveCallCommand, MoveContext, MoveVisualizer } from "./types";

export const SUI_SYSTEM_CONFIG = defineMovePackage({
  key: "sui_system",
  packageId: "0x3",
  modules: [
    {
      name: "sui_system",
      functions: [
        {
          name: "request_add_stake",
          parameters: [{ name: "validator", index: 2, type: "address" }],
        },
        { name: "request_withdraw_stake", parameters: [] },
      ],
    },
  ],
});

function visualizeAddStake(call: MoveCallCommand, context: MoveContext): PayloadField {
  const fn = resolveFunction(SUI_SYSTEM_CONFIG, call.module, call.function);
  const validator = String(readParameter(fn, call, context.inputs, "validator"));
  const stakeArgument = call.arguments[1];
  const split = stakeArgument ? resolveSplitAmount(context.elements, context.inputs, stakeArgument) : null;

  const fields: PayloadField[] = [addressField("Validator", validator)];
  let summary = `Stake SUI with ${validator}`;
  if (split) {
    const amount = formatSplitAmount(split);
    fields.push(split.fromGas ? amountField("Amount", amount, "SUI") : numberField("Amount", split.amount));
    if (split.fromGas) summary = `Stake ${amount} SUI with ${validator}`;
  }

  return previewLayout("Stake SUI", { title: "Stake", subtitle: summary, fallbackText: summary, expanded: fields });
}

function visualizeWithdrawStake(call: MoveCallCommand, context: MoveContext): PayloadField {
  resolveFunction(SUI_SYSTEM_CONFIG, call.module, call.function);
  const stake = call.arguments[1];
  const input = stake?.kind === "input" ? context.inputs[stake.index] : undefined;
  const expanded =
    input?.kind === "object" ? [addressField("Staked SUI object", input.objectId)] : [textField("Staked SUI object", "(command result)")];
  return previewLayout("Withdraw Stake", {
    title: "Withdraw Stake",
    fallbackText: "Withdraw staked SUI",
    expanded,
  });
}

export function createNativeStakingVisualizer(): MoveVisualizer {
  return {
    name: "sui-native-staking",
    canHandle(command) {
      return command.kind === "moveCall" && isPackageCall(SUI_SYSTEM_CONFIG, command);
    },
    visualize(context) {
      const command = currentElement(context);
      if (!command || command.kind !== "moveCall") return null;
      try {
        switch (command.function) {
          case "request_add_stake":
            return visualizeAddStake(command, context);
          case "request_withdraw_stake":
            return visualizeWithdrawStake(command, context);
          default:
            return null;
        }
      } catch (error) {
        if (error instanceof UnsupportedNameError) return null;
        throw error;
      }
    },
  };
}
