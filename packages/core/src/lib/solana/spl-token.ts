/**
 * SPL Token program visualizer.
 *
 * Token instructions start with a one-byte tag followed by the variant's
 * fields; amounts are u64 little-endian. Only the "checked" variants carry
 * the mint's decimals, so only their amounts are scaled. Token-2022 shares
 * the layout for every tag handled here.
 */

import { formatUnits } from "viem";
import { addressField, amountField, numberField, previewLayout, textField } from "../payload";
import type { PayloadField } from "../payload";
import { currentElement } from "../visualizer";
import { accountAt, readOptionalPubkey, readUintLE } from "./bytes";
import type { SolanaInstruction, SolanaVisualizer } from "./types";

export const TOKEN_PROGRAM_ID = "TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA";
export const TOKEN_2022_PROGRAM_ID = "TokenzQdBNbLqP5VEhdkAS6EPFLC1PHnBqCXEpPxuEb";

const TOKEN_PROGRAMS = new Set<string>([TOKEN_PROGRAM_ID, TOKEN_2022_PROGRAM_ID]);

const TokenInstructionKind = {
  Transfer: 3,
  Approve: 4,
  Revoke: 5,
  SetAuthority: 6,
  MintTo: 7,
  Burn: 8,
  CloseAccount: 9,
  FreezeAccount: 10,
  ThawAccount: 11,
  TransferChecked: 12,
  ApproveChecked: 13,
  MintToChecked: 14,
  BurnChecked: 15,
} as const;

const AUTHORITY_TYPES = ["Mint Tokens", "Freeze Account", "Account Owner", "Close Account"];

// ── Instruction table ───────────────────────────────────────────────

type AmountEncoding = "none" | "raw" | "checked";

interface TokenInstructionSpec {
  title: string;
  amount: AmountEncoding;
  /** Labels of the leading accounts, in instruction order. */
  accounts: readonly string[];
  summary: (accounts: readonly string[], amount: string) => string;
}

const TRANSFER_SUMMARY = (source: string, destination: string, amount: string) =>
  `Transfer ${amount} from ${source} to ${destination}`;

const INSTRUCTIONS: Record<number, TokenInstructionSpec> = {
  [TokenInstructionKind.Transfer]: {
    title: "Transfer",
    amount: "raw",
    accounts: ["Source", "Destination", "Owner"],
    summary: ([source, destination], amount) => TRANSFER_SUMMARY(source, destination, amount),
  },
  [TokenInstructionKind.TransferChecked]: {
    title: "Transfer (Checked)",
    amount: "checked",
    accounts: ["Source", "Token mint", "Destination", "Owner"],
    summary: ([source, , destination], amount) => TRANSFER_SUMMARY(source, destination, amount),
  },
  [TokenInstructionKind.Approve]: {
    title: "Approve",
    amount: "raw",
    accounts: ["Source", "Delegate", "Owner"],
    summary: ([source, delegate], amount) => `Approve ${delegate} to spend ${amount} from ${source}`,
  },
  [TokenInstructionKind.ApproveChecked]: {
    title: "Approve (Checked)",
    amount: "checked",
    accounts: ["Source", "Token mint", "Delegate", "Owner"],
    summary: ([source, , delegate], amount) => `Approve ${delegate} to spend ${amount} from ${source}`,
  },
  [TokenInstructionKind.Revoke]: {
    title: "Revoke",
    amount: "none",
    accounts: ["Source", "Owner"],
    summary: ([source]) => `Revoke the delegate of ${source}`,
  },
  [TokenInstructionKind.MintTo]: {
    title: "Mint To",
    amount: "raw",
    accounts: ["Token mint", "Destination", "Mint authority"],
    summary: ([, destination], amount) => `Mint ${amount} to ${destination}`,
  },
  [TokenInstructionKind.MintToChecked]: {
    title: "Mint To (Checked)",
    amount: "checked",
    accounts: ["Token mint", "Destination", "Mint authority"],
    summary: ([, destination], amount) => `Mint ${amount} to ${destination}`,
  },
  [TokenInstructionKind.Burn]: {
    title: "Burn",
    amount: "raw",
    accounts: ["Account", "Token mint", "Owner"],
    summary: ([account], amount) => `Burn ${amount} from ${account}`,
  },
  [TokenInstructionKind.BurnChecked]: {
    title: "Burn (Checked)",
    amount: "checked",
    accounts: ["Account", "Token mint", "Owner"],
    summary: ([account], amount) => `Burn ${amount} from ${account}`,
  },
  [TokenInstructionKind.CloseAccount]: {
    title: "Close Account",
    amount: "none",
    accounts: ["Account", "Destination", "Owner"],
    summary: ([account, destination]) => `Close ${account} and send its rent to ${destination}`,
  },
  [TokenInstructionKind.FreezeAccount]: {
    title: "Freeze Account",
    amount: "none",
    accounts: ["Account", "Token mint", "Freeze authority"],
    summary: ([account]) => `Freeze ${account}`,
  },
  [TokenInstructionKind.ThawAccount]: {
    title: "Thaw Account",
    amount: "none",
    accounts: ["Account", "Token mint", "Freeze authority"],
    summary: ([account]) => `Thaw ${account}`,
  },
};

/** Instructions shown by name only. */
const NAMED_INSTRUCTIONS: Record<number, string> = {
  0: "Initialize Mint",
  1: "Initialize Token Account",
  2: "Initialize Multisig",
  16: "Initialize Token Account (v2)",
  17: "Sync Native",
  18: "Initialize Token Account (v3)",
  19: "Initialize Multisig (v2)",
  20: "Initialize Mint (v2)",
  21: "Get Account Data Size",
  22: "Initialize Immutable Owner",
  23: "Amount To UI Amount",
  24: "UI Amount To Amount",
};

// ── Helpers ─────────────────────────────────────────────────────────

function preview(title: string, summary: string, fields: PayloadField[]): PayloadField {
  return previewLayout(`SPL Token ${title}`, { title, subtitle: summary, fallbackText: summary, expanded: fields });
}

function readAmount(data: Uint8Array, encoding: AmountEncoding): { text: string; fields: PayloadField[] } | null {
  if (encoding === "none") return { text: "", fields: [] };

  const amount = readUintLE(data, 1, 8);
  if (amount === null) return null;
  if (encoding === "raw") return { text: amount.toString(), fields: [numberField("Amount", amount)] };

  const decimals = readUintLE(data, 9, 1);
  if (decimals === null) return null;
  const scaled = formatUnits(amount, Number(decimals));
  return { text: scaled, fields: [amountField("Amount", scaled), numberField("Decimals", decimals)] };
}

function visualizeSetAuthority(instruction: SolanaInstruction): PayloadField | null {
  const { data } = instruction;
  const kind = readUintLE(data, 1, 1);
  const next = readOptionalPubkey(data, 2);
  if (kind === null || next === null) return null;

  const authority = AUTHORITY_TYPES[Number(kind)] ?? `Authority ${kind}`;
  const account = accountAt(instruction.accounts, 0);
  const summary =
    next.value === null
      ? `Remove the ${authority} authority of ${account}`
      : `Set the ${authority} authority of ${account} to ${next.value}`;

  return preview("Set Authority", summary, [
    addressField("Account", account),
    addressField("Current authority", accountAt(instruction.accounts, 1)),
    textField("Authority type", authority),
    next.value === null ? textField("New authority", "None") : addressField("New authority", next.value),
  ]);
}

function visualizeInstruction(instruction: SolanaInstruction): PayloadField | null {
  const kind = instruction.data[0];
  if (kind === undefined) return null;
  if (kind === TokenInstructionKind.SetAuthority) return visualizeSetAuthority(instruction);

  const spec: TokenInstructionSpec | undefined = INSTRUCTIONS[kind];
  if (spec) {
    const amount = readAmount(instruction.data, spec.amount);
    if (amount === null) return null;
    const accounts = spec.accounts.map((_, index) => accountAt(instruction.accounts, index));
    return preview(spec.title, spec.summary(accounts, amount.text), [
      ...spec.accounts.map((label, index) => addressField(label, accounts[index])),
      ...amount.fields,
    ]);
  }

  const name: string | undefined = NAMED_INSTRUCTIONS[kind];
  return name ? preview(name, name, [textField("Instruction", name)]) : null;
}

export function createSplTokenVisualizer(): SolanaVisualizer {
  return {
    name: "spl-token",
    canHandle: (instruction) => TOKEN_PROGRAMS.has(instruction.programId),
    visualize(context) {
      const instruction = currentElement(context);
      return instruction ? visualizeInstruction(instruction) : null;
    },
  };
}
