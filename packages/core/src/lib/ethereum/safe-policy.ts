/**
 * Safe policy change visualizer.
 *
 * Detects calls that modify a Safe's own configuration:
 * - changeThreshold: change the signing threshold
 * - addOwnerWithThreshold: add a new owner and set the threshold
 * - removeOwner: remove an existing owner and set the threshold
 * - swapOwner: replace one owner with another
 * - enableModule / setGuard: attach code that can bypass or veto owners
 *
 * A Safe changes its policy by calling itself, so when the sender is known
 * it must equal the target.
 */

import { bytesToHex, decodeAbiParameters, parseAbiParameters, toFunctionSelector } from "viem";
import type { Hex } from "viem";
import { selectorFromCalldata } from "../descriptors";
import { addressField, numberField, previewLayout } from "../payload";
import type { PayloadField } from "../payload";
import { normalizeAddressKey } from "../registry";
import { currentElement } from "../visualizer";
import type { EthereumCall, EthereumVisualizer } from "./types";

const CRITICAL = "critical";

type PolicyDecoder = (args: Hex) => { summary: string; fields: PayloadField[] };

const POLICY_METHODS: Record<string, { action: string; decode: PolicyDecoder }> = {
  [toFunctionSelector("function changeThreshold(uint256 _threshold)")]: {
    action: "Change Threshold",
    decode(args) {
      const [threshold] = decodeAbiParameters(parseAbiParameters("uint256 _threshold"), args);
      return {
        summary: `Change signing threshold to ${threshold}`,
        fields: [numberField("New threshold", threshold)],
      };
    },
  },
  [toFunctionSelector("function addOwnerWithThreshold(address owner, uint256 _threshold)")]: {
    action: "Add Owner",
    decode(args) {
      const [owner, threshold] = decodeAbiParameters(parseAbiParameters("address owner, uint256 _threshold"), args);
      return {
        summary: `Add owner ${owner} and set threshold to ${threshold}`,
        fields: [addressField("New owner", owner, { badgeText: CRITICAL }), numberField("New threshold", threshold)],
      };
    },
  },
  [toFunctionSelector("function removeOwner(address prevOwner, address owner, uint256 _threshold)")]: {
    action: "Remove Owner",
    decode(args) {
      const [, owner, threshold] = decodeAbiParameters(
        parseAbiParameters("address prevOwner, address owner, uint256 _threshold"),
        args
      );
      return {
        summary: `Remove owner ${owner} and set threshold to ${threshold}`,
        fields: [addressField("Removed owner", owner, { badgeText: CRITICAL }), numberField("New threshold", threshold)],
      };
    },
  },
  [toFunctionSelector("function swapOwner(address prevOwner, address oldOwner, address newOwner)")]: {
    action: "Swap Owner",
    decode(args) {
      const [, oldOwner, newOwner] = decodeAbiParameters(
        parseAbiParameters("address prevOwner, address oldOwner, address newOwner"),
        args
      );
      return {
        summary: `Replace owner ${oldOwner} with ${newOwner}`,
        fields: [
          addressField("Removed owner", oldOwner),
          addressField("New owner", newOwner, { badgeText: CRITICAL }),
        ],
      };
    },
  },
  [toFunctionSelector("function enableModule(address module)")]: {
    action: "Enable Module",
    decode(args) {
      const [module] = decodeAbiParameters(parseAbiParameters("address module"), args);
      return {
        summary: `Enable module ${module}`,
        fields: [addressField("Module", module, { badgeText: CRITICAL })],
      };
    },
  },
  [toFunctionSelector("function setGuard(address guard)")]: {
    action: "Set Guard",
    decode(args) {
      const [guard] = decodeAbiParameters(parseAbiParameters("address guard"), args);
      return {
        summary: `Set transaction guard to ${guard}`,
        fields: [addressField("Guard", guard, { badgeText: CRITICAL })],
      };
    },
  },
};

function isSelfCall(call: EthereumCall): boolean {
  return call.from === undefined || normalizeAddressKey(call.from) === normalizeAddressKey(call.to);
}

export function createSafePolicyVisualizer(): EthereumVisualizer {
  return {
    name: "safe-policy",
    canHandle(call) {
      const selector = selectorFromCalldata(call.data);
      return selector !== null && selector in POLICY_METHODS && isSelfCall(call);
    },
    visualize(context) {
      const call = currentElement(context);
      const selector = call && selectorFromCalldata(call.data);
      const method = selector ? POLICY_METHODS[selector] : undefined;
      if (!call || !method) return null;

      const { summary, fields } = method.decode(bytesToHex(call.data.subarray(4)));
      return previewLayout("Safe Policy Change", {
        title: method.action,
        subtitle: summary,
        fallbackText: summary,
        expanded: [addressField("Safe", call.to), ...fields],
      });
    },
  };
}
