/**
 * Uniswap Universal Router visualizer.
 *
 * `execute` carries a byte string of command ids and one ABI-encoded input
 * per command. Each command is listed by name; exact-in swaps also show
 * their amounts and route.
 */

import {
  bytesToHex,
  decodeAbiParameters,
  getAddress,
  hexToBytes,
  parseAbiParameters,
  sliceHex,
  toFunctionSelector,
} from "viem";
import type { Hex } from "viem";
import { formatUnixTimestamp, selectorFromCalldata } from "../descriptors";
import { addressField, listLayout, numberField, previewLayout, textField } from "../payload";
import type { PayloadField } from "../payload";
import type { ContractRegistry } from "../registry";
import { currentElement } from "../visualizer";
import { UNISWAP_UNIVERSAL_ROUTER_TYPE } from "./protocols";
import type { EthereumVisualizer } from "./types";

const EXECUTE = toFunctionSelector("function execute(bytes commands, bytes[] inputs)");
const EXECUTE_WITH_DEADLINE = toFunctionSelector("function execute(bytes commands, bytes[] inputs, uint256 deadline)");

const EXECUTE_PARAMS = parseAbiParameters("bytes commands, bytes[] inputs");
const EXECUTE_WITH_DEADLINE_PARAMS = parseAbiParameters("bytes commands, bytes[] inputs, uint256 deadline");

const COMMAND_TYPE_MASK = 0x3f;
const FLAG_ALLOW_REVERT = 0x80;

const COMMAND_NAMES: Record<number, string> = {
  0x00: "V3_SWAP_EXACT_IN",
  0x01: "V3_SWAP_EXACT_OUT",
  0x02: "PERMIT2_TRANSFER_FROM",
  0x03: "PERMIT2_PERMIT_BATCH",
  0x04: "SWEEP",
  0x05: "TRANSFER",
  0x06: "PAY_PORTION",
  0x08: "V2_SWAP_EXACT_IN",
  0x09: "V2_SWAP_EXACT_OUT",
  0x0a: "PERMIT2_PERMIT",
  0x0b: "WRAP_ETH",
  0x0c: "UNWRAP_WETH",
  0x0d: "PERMIT2_TRANSFER_FROM_BATCH",
  0x0e: "BALANCE_CHECK_ERC20",
  0x10: "V4_SWAP",
  0x11: "V3_POSITION_MANAGER_PERMIT",
  0x12: "V3_POSITION_MANAGER_CALL",
  0x13: "V4_INITIALIZE_POOL",
  0x14: "V4_POSITION_MANAGER_CALL",
  0x21: "EXECUTE_SUB_PLAN",
};

const V3_SWAP_EXACT_IN_PARAMS = parseAbiParameters(
  "address recipient, uint256 amountIn, uint256 amountOutMin, bytes path, bool payerIsUser"
);
const V2_SWAP_EXACT_IN_PARAMS = parseAbiParameters(
  "address recipient, uint256 amountIn, uint256 amountOutMin, address[] path, bool payerIsUser"
);
const WRAP_PARAMS = parseAbiParameters("address recipient, uint256 amount");

export function commandName(command: number): string {
  const type = command & COMMAND_TYPE_MASK;
  return COMMAND_NAMES[type] ?? `UNKNOWN_0x${type.toString(16).padStart(2, "0")}`;
}

/**
 * Tokens along a V3 path: 20-byte address, then (3-byte fee, 20-byte address) pairs.
 */
export function decodeV3Path(path: Hex): string[] | null {
  const length = hexToBytes(path).length;
  if (length < 20 || (length - 20) % 23 !== 0) return null;

  const tokens: string[] = [];
  for (let offset = 0; offset < length; offset += 23) {
    tokens.push(getAddress(sliceHex(path, offset, offset + 20)));
  }
  return tokens;
}

function swapFields(recipient: string, amountIn: bigint, amountOutMin: bigint, route: readonly string[] | null) {
  const fields: PayloadField[] = [
    addressField("Recipient", recipient),
    numberField("Amount in", amountIn),
    numberField("Minimum amount out", amountOutMin),
  ];
  if (route && route.length > 0) {
    fields.push(addressField("Token in", route[0]), addressField("Token out", route[route.length - 1]));
  }
  return fields;
}

function commandField(index: number, command: number, input: Hex | undefined): PayloadField {
  const name = commandName(command);
  const label = `Command ${index + 1}`;
  const text = command & FLAG_ALLOW_REVERT ? `${name} (may revert)` : name;
  if (input === undefined) return textField(label, text);

  try {
    switch (command & COMMAND_TYPE_MASK) {
      case 0x00: {
        const [recipient, amountIn, amountOutMin, path] = decodeAbiParameters(V3_SWAP_EXACT_IN_PARAMS, input);
        return listLayout(label, swapFields(recipient, amountIn, amountOutMin, decodeV3Path(path)), text);
      }
      case 0x08: {
        const [recipient, amountIn, amountOutMin, path] = decodeAbiParameters(V2_SWAP_EXACT_IN_PARAMS, input);
        return listLayout(label, swapFields(recipient, amountIn, amountOutMin, path), text);
      }
      case 0x0b:
      case 0x0c: {
        const [recipient, amount] = decodeAbiParameters(WRAP_PARAMS, input);
        return listLayout(label, [addressField("Recipient", recipient), numberField("Amount", amount)], text);
      }
      default:
        return textField(label, text);
    }
  } catch {
    return textField(label, text);
  }
}

export function createUniversalRouterVisualizer(registry: ContractRegistry): EthereumVisualizer {
  return {
    name: "uniswap-universal-router",
    canHandle(call) {
      const selector = selectorFromCalldata(call.data);
      return (
        (selector === EXECUTE || selector === EXECUTE_WITH_DEADLINE) &&
        registry.isType(call.chainId, call.to, UNISWAP_UNIVERSAL_ROUTER_TYPE)
      );
    },
    visualize(context) {
      const call = currentElement(context);
      if (!call) return null;

      const args = bytesToHex(call.data.subarray(4));
      const withDeadline = selectorFromCalldata(call.data) === EXECUTE_WITH_DEADLINE;
      let commands: Hex;
      let inputs: readonly Hex[];
      let deadline: bigint | undefined = undefined;
      if (withDeadline) {
        [commands, inputs, deadline] = decodeAbiParameters(EXECUTE_WITH_DEADLINE_PARAMS, args);
      } else {
        [commands, inputs] = decodeAbiParameters(EXECUTE_PARAMS, args);
      }

      const commandBytes = hexToBytes(commands);
      const fields = Array.from(commandBytes, (command, i) => commandField(i, command, inputs[i]));
      const names = Array.from(commandBytes, commandName);
      const summary = `Execute ${names.length} command(s): ${names.join(", ")}`;

      const expanded: PayloadField[] = [listLayout("Commands", fields)];
      if (deadline !== undefined) {
        expanded.push(textField("Deadline", formatUnixTimestamp(deadline) ?? deadline.toString()));
      }

      return previewLayout("Uniswap Universal Router", {
        title: "Execute",
        subtitle: summary,
        fallbackText: summary,
        expanded,
      });
    },
  };
}
