/**
 * Uniswap Permit2 allowance visualizer.
 *
 * Claims `approve(address token, address spender, uint160 amount, uint48 expiration)`
 * only on addresses registered as Permit2 for the call's chain.
 */

import { bytesToHex, decodeAbiParameters, getAddress, maxUint160, parseAbiParameters, toFunctionSelector } from "viem";
import { formatUnixTimestamp, selectorFromCalldata } from "../descriptors";
import { addressField, amountField, previewLayout, textField } from "../payload";
import type { ContractRegistry } from "../registry";
import { currentElement } from "../visualizer";
import { UNISWAP_PERMIT2_TYPE } from "./protocols";
import { describeTokenAmount, formatTokenAmount, resolveToken } from "./tokens";
import type { EthereumVisualizer } from "./types";

const PERMIT2_APPROVE = toFunctionSelector(
  "function approve(address token, address spender, uint160 amount, uint48 expiration)"
);
const PERMIT2_APPROVE_PARAMS = parseAbiParameters(
  "address token, address spender, uint160 amount, uint48 expiration"
);

export function formatExpiration(expiration: number): string {
  if (expiration === 0) return "Never";
  return formatUnixTimestamp(BigInt(expiration)) ?? String(expiration);
}

export function createPermit2Visualizer(registry: ContractRegistry): EthereumVisualizer {
  return {
    name: "uniswap-permit2",
    canHandle(call) {
      return (
        selectorFromCalldata(call.data) === PERMIT2_APPROVE &&
        registry.isType(call.chainId, call.to, UNISWAP_PERMIT2_TYPE)
      );
    },
    visualize(context) {
      const call = currentElement(context);
      if (!call) return null;

      const [tokenAddress, spender, amount, expiration] = decodeAbiParameters(
        PERMIT2_APPROVE_PARAMS,
        bytesToHex(call.data.subarray(4))
      );
      const token = resolveToken(call.chainId, tokenAddress);
      const unlimited = amount === maxUint160;
      const formatted = unlimited ? "Unlimited" : formatTokenAmount(amount, token);
      const summary = `Allow ${spender} to spend ${describeTokenAmount(formatted, token)} via Permit2`;

      return previewLayout("Permit2 Approval", {
        title: "Permit2 Approve",
        subtitle: summary,
        fallbackText: summary,
        expanded: [
          addressField("Token", getAddress(tokenAddress), token.symbol ? { name: token.symbol } : {}),
          addressField("Spender", spender, unlimited ? { badgeText: "Unlimited approval" } : {}),
          amountField("Amount", formatted, token.symbol),
          textField("Expires", formatExpiration(expiration)),
        ],
      });
    },
  };
}
