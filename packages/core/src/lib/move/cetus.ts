/**
 * Cetus CLMM swap visualizer.
 *
 * ┌─────────────────────────────────────────────────────────────────┐
 * │  SUPPORTED CALLS                                                │
 * │                                                                 │
 * │  module          │ function                  │ direction        │
 * │  ────────────────┼───────────────────────────┼────────────────  │
 * │  pool_script_v2  │ swap_a2b                  │ A -> B           │
 * │  pool_script_v2  │ swap_b2a                  │ B -> A           │
 * │  pool_script_v2  │ swap_a2b_with_partner     │ A -> B           │
 * │  pool_script_v2  │ swap_b2a_with_partner     │ B -> A           │
 * │  router          │ swap                      │ is_a2b argument  │
 * └─────────────────────────────────────────────────────────────────┘
 *
 * Coin types come from the call's type arguments: `<CoinA, CoinB>`.
 */

import { numberField, previewLayout, textField } from "../payload";
import type { PayloadField } from "../payload";
import type { ContractRegistry, ContractRegistryBuilder } from "../registry";
import { currentElement } from "../visualizer";
import { coinSymbol } from "./coins";
import {
  UnsupportedNameError,
  defineMovePackage,
  readBoolParameter,
  readIntegerParameter,
  resolveFunction,
} from "./config";
import type { MoveParameterSpec } from "./config";
import type { MoveCallCommand, MoveInput, MoveVisualizer } from "./types";
import { SUI_MAINNET_CHAIN_ID, normalizeMoveId } from "./types";

export const CETUS_PACKAGE_TYPE = "CetusClmm";

function poolSwapParameters(offset: number): MoveParameterSpec[] {
  return [
    { name: "by_amount_in", index: 4 + offset, type: "bool" },
    { name: "amount", index: 5 + offset, type: "u64" },
    { name: "amount_limit", index: 6 + offset, type: "u64" },
    { name: "sqrt_price_limit", index: 7 + offset, type: "u128" },
  ];
}

export const CETUS_CONFIG = defineMovePackage({
  key: "cetus",
  packageId: "0xb2db7142fa83210a7d78d9c12ac49c043b3cbbd482224fea6e3da00aa5a5ae2d",
  modules: [
    {
      name: "pool_script_v2",
      functions: [
        { name: "swap_a2b", parameters: poolSwapParameters(0) },
        { name: "swap_b2a", parameters: poolSwapParameters(0) },
        { name: "swap_a2b_with_partner", parameters: poolSwapParameters(1) },
        { name: "swap_b2a_with_partner", parameters: poolSwapParameters(1) },
      ],
    },
    {
      name: "router",
      functions: [
        {
          name: "swap",
          parameters: [
            { name: "is_a2b", index: 4, type: "bool" },
            { name: "by_amount_in", index: 5, type: "bool" },
            { name: "amount", index: 6, type: "u64" },
            { name: "sqrt_price_limit", index: 7, type: "u128" },
            { name: "use_all_coin", index: 8, type: "bool" },
          ],
        },
      ],
    },
  ],
});

export function registerCetus(builder: ContractRegistryBuilder): void {
  builder.registerContract(SUI_MAINNET_CHAIN_ID, CETUS_PACKAGE_TYPE, [CETUS_CONFIG.packageId]);
}

interface SwapTerms {
  aToB: boolean;
  byAmountIn: boolean;
  amount: bigint;
  amountLimit?: bigint;
  sqrtPriceLimit: bigint;
}

function readSwapTerms(call: MoveCallCommand, inputs: readonly MoveInput[]): SwapTerms {
  const fn = resolveFunction(CETUS_CONFIG, call.module, call.function);
  const common = {
    byAmountIn: readBoolParameter(fn, call, inputs, "by_amount_in"),
    amount: readIntegerParameter(fn, call, inputs, "amount"),
    sqrtPriceLimit: readIntegerParameter(fn, call, inputs, "sqrt_price_limit"),
  };
  if (call.module === "router") {
    return { aToB: readBoolParameter(fn, call, inputs, "is_a2b"), ...common };
  }
  return {
    aToB: call.function.startsWith("swap_a2b"),
    amountLimit: readIntegerParameter(fn, call, inputs, "amount_limit"),
    ...common,
  };
}

function swapField(call: MoveCallCommand, terms: SwapTerms): PayloadField {
  const [coinA = "A", coinB = "B"] = call.typeArguments.map(coinSymbol);
  const [coinIn, coinOut] = terms.aToB ? [coinA, coinB] : [coinB, coinA];

  const fields: PayloadField[] = [textField("Coin in", coinIn), textField("Coin out", coinOut)];
  let summary: string;
  if (terms.byAmountIn) {
    summary = `Swap ${terms.amount} ${coinIn} for ${coinOut}`;
    fields.push(numberField("Amount in", terms.amount));
    if (terms.amountLimit !== undefined) fields.push(numberField("Minimum amount out", terms.amountLimit));
  } else {
    summary = `Swap ${coinIn} for ${terms.amount} ${coinOut}`;
    fields.push(numberField("Amount out", terms.amount));
    if (terms.amountLimit !== undefined) fields.push(numberField("Maximum amount in", terms.amountLimit));
  }
  fields.push(numberField("Sqrt price limit", terms.sqrtPriceLimit));

  return previewLayout("Cetus Swap", {
    title: "Swap",
    subtitle: summary,
    fallbackText: summary,
    expanded: fields,
  });
}

export function createCetusSwapVisualizer(registry: ContractRegistry): MoveVisualizer {
  return {
    name: "cetus-swap",
    canHandle(command, context) {
      return (
        command.kind === "moveCall" &&
        registry.isType(context.chainId ?? SUI_MAINNET_CHAIN_ID, normalizeMoveId(command.package), CETUS_PACKAGE_TYPE)
      );
    },
    visualize(context) {
      const command = currentElement(context);
      if (!command || command.kind !== "moveCall") return null;
      try {
        return swapField(command, readSwapTerms(command, context.inputs));
      } catch (error) {
        if (error instanceof UnsupportedNameError) return null;
        throw error;
      }
    },
  };
}
