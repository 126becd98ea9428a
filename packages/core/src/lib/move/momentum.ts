/**
 * Momentum CLMM liquidity visualizer: `liquidity::remove_liquidity` and
 * `liquidity::close_position` on the registered Momentum package.
 */

import { addressField, previewLayout, textField } from "../payload";
import type { PayloadField } from "../payload";
import type { ContractRegistry, ContractRegistryBuilder } from "../registry";
import { currentElement } from "../visualizer";
import { coinSymbol } from "./coins";
import { UnsupportedNameError, defineMovePackage, resolveFunction } from "./config";
import type { MoveCallCommand, MoveVisualizer } from "./types";
import { SUI_MAINNET_CHAIN_ID, normalizeMoveId } from "./types";

export const MOMENTUM_PACKAGE_TYPE = "MomentumClmm";

export const MOMENTUM_CONFIG = defineMovePackage({
  key: "momentum",
  packageId: "0xcf60a40f45d46fc1e828871a647c1e25a0915dec860d2662eb10fdb382c3c1d1",
  modules: [
    {
      name: "liquidity",
      functions: [
        { name: "remove_liquidity", parameters: [] },
        { name: "close_position", parameters: [] },
      ],
    },
  ],
});

export function registerMomentum(builder: ContractRegistryBuilder): void {
  builder.registerContract(SUI_MAINNET_CHAIN_ID, MOMENTUM_PACKAGE_TYPE, [MOMENTUM_CONFIG.packageId]);
}

function removeLiquidityField(call: MoveCallCommand, sender: string): PayloadField {
  const [coinA = "Unknown", coinB = "Unknown"] = call.typeArguments;
  const summary = `Remove liquidity from pair ${coinSymbol(coinA)}/${coinSymbol(coinB)}`;
  return previewLayout("Momentum Remove Liquidity", {
    title: "Remove Liquidity",
    subtitle: summary,
    fallbackText: summary,
    expanded: [addressField("Sender", sender), textField("Coin 1", coinA), textField("Coin 2", coinB)],
  });
}

function closePositionField(sender: string): PayloadField {
  const summary = `Close position for ${sender}`;
  return previewLayout("Momentum Close Position", {
    title: "Close Position",
    subtitle: summary,
    fallbackText: summary,
    expanded: [addressField("Sender", sender)],
  });
}

export function createMomentumVisualizer(registry: ContractRegistry): MoveVisualizer {
  return {
    name: "momentum-liquidity",
    canHandle(command, context) {
      return (
        command.kind === "moveCall" &&
        registry.isType(context.chainId ?? SUI_MAINNET_CHAIN_ID, normalizeMoveId(command.package), MOMENTUM_PACKAGE_TYPE)
      );
    },
    visualize(context) {
      const command = currentElement(context);
      if (!command || command.kind !== "moveCall") return null;
      try {
        const fn = resolveFunction(MOMENTUM_CONFIG, command.module, command.function);
        return fn.name === "remove_liquidity"
          ? removeLiquidityField(command, context.sender)
          : closePositionField(context.sender);
      } catch (error) {
        if (error instanceof UnsupportedNameError) return null;
        throw error;
      }
    },
  };
}
