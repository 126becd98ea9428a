/**
 * System program visualizer.
 *
 * Instructions are bincode-encoded: a u32 little-endian discriminator, then
 * the variant's fields. Lamports are shown in SOL.
 */

import { formatUnits } from "viem";
import { addressField, amountField, numberField, previewLayout } from "../payload";
import type { PayloadField } from "../payload";
import { currentElement } from "../visualizer";
import { accountAt, readPubkey, readUintLE } from "./bytes";
import type { SolanaInstruction, SolanaVisualizer } from "./types";

export const SYSTEM_PROGRAM_ID = "11111111111111111111111111111111";
export const SOL_DECIMALS = 9;

const SystemInstructionKind = {
  CreateAccount: 0,
  Assign: 1,
  Transfer: 2,
  AdvanceNonceAccount: 4,
  WithdrawNonceAccount: 5,
  Allocate: 8,
} as const;

export function formatLamports(lamports: bigint): string {
  return formatUnits(lamports, SOL_DECIMALS);
}

function account(instruction: SolanaInstruction, index: number): string {
  return accountAt(instruction.accounts, index);
}

function solAmount(label: string, lamports: bigint): PayloadField {
  return amountField(label, formatLamports(lamports), "SOL");
}

function preview(label: string, summary: string, fields: PayloadField[]): PayloadField {
  return previewLayout(label, { title: label, subtitle: summary, fallbackText: summary, expanded: fields });
}

// ── Instructions ────────────────────────────────────────────────────

function visualizeInstruction(instruction: SolanaInstruction): PayloadField | null {
  const { data } = instruction;
  const kind = readUintLE(data, 0, 4);
  if (kind === null) return null;

  switch (Number(kind)) {
    case SystemInstructionKind.Transfer: {
      const lamports = readUintLE(data, 4, 8);
      if (lamports === null) return null;
      const from = account(instruction, 0);
      const to = account(instruction, 1);
      return preview("Transfer", `Transfer ${formatLamports(lamports)} SOL to ${to}`, [
        addressField("From", from),
        addressField("To", to),
        solAmount("Amount", lamports),
      ]);
    }
    case SystemInstructionKind.CreateAccount: {
      const lamports = readUintLE(data, 4, 8);
      const space = readUintLE(data, 12, 8);
      const owner = readPubkey(data, 20);
      if (lamports === null || space === null || owner === null) return null;
      const created = account(instruction, 1);
      return preview("Create Account", `Create account ${created} owned by ${owner}`, [
        addressField("Funder", account(instruction, 0)),
        addressField("New account", created),
        solAmount("Lamports", lamports),
        numberField("Space", space),
        addressField("Owner", owner),
      ]);
    }
    case SystemInstructionKind.Assign: {
      const owner = readPubkey(data, 4);
      if (owner === null) return null;
      const target = account(instruction, 0);
      return preview("Assign", `Assign ${target} to ${owner}`, [
        addressField("Account", target),
        addressField("Owner", owner),
      ]);
    }
    case SystemInstructionKind.Allocate: {
      const space = readUintLE(data, 4, 8);
      if (space === null) return null;
      const target = account(instruction, 0);
      return preview("Allocate", `Allocate ${space} bytes for ${target}`, [
        addressField("Account", target),
        numberField("Space", space),
      ]);
    }
    case SystemInstructionKind.AdvanceNonceAccount: {
      const nonce = account(instruction, 0);
      return preview("Advance Nonce Account", `Advance nonce account ${nonce}`, [addressField("Nonce account", nonce)]);
    }
    case SystemInstructionKind.WithdrawNonceAccount: {
      const lamports = readUintLE(data, 4, 8);
      if (lamports === null) return null;
      const to = account(instruction, 1);
      return preview("Withdraw Nonce Account", `Withdraw ${formatLamports(lamports)} SOL to ${to}`, [
        addressField("Nonce account", account(instruction, 0)),
        addressField("To", to),
        solAmount("Amount", lamports),
      ]);
    }
    default:
      return null;
  }
}

export function createSystemProgramVisualizer(): SolanaVisualizer {
  return {
    name: "solana-system",
    canHandle: (instruction) => instruction.programId === SYSTEM_PROGRAM_ID,
    visualize(context) {
      const instruction = currentElement(context);
      return instruction ? visualizeInstruction(instruction) : null;
    },
  };
}
