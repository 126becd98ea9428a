/**
 * ERC-20 visualizer.
 *
 * Detects standard ERC-20 token operations by selector:
 * - transfer(address to, uint256 amount)
 * - approve(address spender, uint256 amount)
 * - transferFrom(address from, address to, uint256 amount)
 *
 * Token contracts not registered as `ERC20Token` for the chain are badged.
 */

import { bytesToHex, decodeAbiParameters, getAddress, maxUint256, parseAbiParameters, toFunctionSelector } from "viem";
import { selectorFromCalldata } from "../descriptors";
import { addressField, amountField, previewLayout } from "../payload";
import type { PayloadField } from "../payload";
import type { ContractRegistry } from "../registry";
import { currentElement } from "../visualizer";
import { ERC20_TOKEN_TYPE, describeTokenAmount, formatTokenAmount, resolveToken } from "./tokens";
import type { TokenInfo } from "./tokens";
import type { EthereumVisualizer } from "./types";

const TRANSFER = toFunctionSelector("function transfer(address to, uint256 amount)");
const APPROVE = toFunctionSelector("function approve(address spender, uint256 amount)");
const TRANSFER_FROM = toFunctionSelector("function transferFrom(address from, address to, uint256 amount)");

const TRANSFER_PARAMS = parseAbiParameters("address to, uint256 amount");
const APPROVE_PARAMS = parseAbiParameters("address spender, uint256 amount");
const TRANSFER_FROM_PARAMS = parseAbiParameters("address from, address to, uint256 amount");

const ERC20_SELECTORS = new Set<string>([TRANSFER, APPROVE, TRANSFER_FROM]);

export const UNKNOWN_TOKEN_BADGE = "Unknown token";

interface TokenContext {
  token: TokenInfo;
  registered: boolean;
}

// ── Helpers ─────────────────────────────────────────────────────────

function tokenField({ token, registered }: TokenContext): PayloadField {
  return addressField("Token", getAddress(token.address), {
    ...(token.symbol ? { name: token.symbol } : {}),
    ...(registered ? {} : { badgeText: UNKNOWN_TOKEN_BADGE }),
  });
}

function visualizeTransfer(context: TokenContext, args: `0x${string}`): PayloadField {
  const { token } = context;
  const [to, amount] = decodeAbiParameters(TRANSFER_PARAMS, args);
  const formatted = formatTokenAmount(amount, token);
  const summary = `Transfer ${describeTokenAmount(formatted, token)} to ${to}`;

  return previewLayout("ERC-20 Transfer", {
    title: "Transfer",
    subtitle: summary,
    fallbackText: summary,
    expanded: [tokenField(context), addressField("To", to), amountField("Amount", formatted, token.symbol)],
  });
}

function visualizeApprove(context: TokenContext, args: `0x${string}`): PayloadField {
  const { token } = context;
  const [spender, amount] = decodeAbiParameters(APPROVE_PARAMS, args);
  const unlimited = amount === maxUint256;
  const formatted = unlimited ? "Unlimited" : formatTokenAmount(amount, token);
  const summary = `Approve ${describeTokenAmount(formatted, token)} for ${spender}`;

  return previewLayout("ERC-20 Approval", {
    title: "Approve",
    subtitle: summary,
    fallbackText: summary,
    expanded: [
      tokenField(context),
      addressField("Spender", spender, unlimited ? { badgeText: "Unlimited approval" } : {}),
      amountField("Amount", formatted, token.symbol),
    ],
  });
}

function visualizeTransferFrom(context: TokenContext, args: `0x${string}`): PayloadField {
  const { token } = context;
  const [from, to, amount] = decodeAbiParameters(TRANSFER_FROM_PARAMS, args);
  const formatted = formatTokenAmount(amount, token);
  const summary = `Transfer ${describeTokenAmount(formatted, token)} from ${from} to ${to}`;

  return previewLayout("ERC-20 Transfer From", {
    title: "Transfer From",
    subtitle: summary,
    fallbackText: summary,
    expanded: [
      tokenField(context),
      addressField("From", from),
      addressField("To", to),
      amountField("Amount", formatted, token.symbol),
    ],
  });
}

// ── Visualizer ──────────────────────────────────────────────────────

export function createErc20Visualizer(registry: ContractRegistry): EthereumVisualizer {
  return {
    name: "erc20",
    canHandle(call) {
      const selector = selectorFromCalldata(call.data);
      return selector !== null && ERC20_SELECTORS.has(selector);
    },
    visualize(context) {
      const call = currentElement(context);
      if (!call) return null;

      const token: TokenContext = {
        token: resolveToken(call.chainId, call.to),
        registered: registry.isType(call.chainId, call.to, ERC20_TOKEN_TYPE),
      };
      const args = bytesToHex(call.data.subarray(4));
      switch (selectorFromCalldata(call.data)) {
        case TRANSFER:
          return visualizeTransfer(token, args);
        case APPROVE:
          return visualizeApprove(token, args);
        case TRANSFER_FROM:
          return visualizeTransferFrom(token, args);
        default:
          return null;
      }
    },
  };
}
