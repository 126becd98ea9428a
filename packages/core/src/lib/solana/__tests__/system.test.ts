import { describe, it, expect } from "vitest";
import type { PayloadField } from "../../payload";
import { createSolanaVisualizerChain, visualizeSolanaInstructions } from "../chain";
import { SYSTEM_PROGRAM_ID } from "../system";
import type { SolanaInstruction } from "../types";

const ALICE = "A1iceTestAccount11111111111111111111111111";
const BOB = "BobTestAccount1111111111111111111111111111";

function u32(value: number): number[] {
  return [value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff, (value >>> 24) & 0xff];
}

function u64(value: bigint): number[] {
  const bytes: number[] = [];
  let rest = value;
  for (let i = 0; i < 8; i++) {
    bytes.push(Number(rest & 0xffn));
    rest >>= 8n;
  }
  return bytes;
}

function system(data: number[], accounts: string[] = [ALICE, BOB]): SolanaInstruction {
  return { programId: SYSTEM_PROGRAM_ID, accounts, data: Uint8Array.from(data) };
}

function expanded(field: PayloadField): PayloadField[] {
  return field.type === "preview_layout" ? field.expanded?.fields ?? [] : [];
}

const runtime = { solana: createSolanaVisualizerChain() };

describe("system program", () => {
  it("decodes a transfer into SOL", () => {
    const [field] = visualizeSolanaInstructions(runtime, [system([...u32(2), ...u64(1_500_000_000n)])]);

    expect(field).toMatchObject({ type: "preview_layout", label: "Transfer", fallbackText: `Transfer 1.5 SOL to ${BOB}` });
    expect(expanded(field)).toEqual([
      { type: "address", label: "From", fallbackText: ALICE, address: ALICE },
      { type: "address", label: "To", fallbackText: BOB, address: BOB },
      { type: "amount", label: "Amount", fallbackText: "1.5 SOL", amount: "1.5", abbreviation: "SOL" },
    ]);
  });

  it("decodes create account with a base58 owner", () => {
    const data = [...u32(0), ...u64(2_039_280n), ...u64(165n), ...new Array<number>(32).fill(0)];
    const [field] = visualizeSolanaInstructions(runtime, [system(data)]);

    expect(field.fallbackText).toBe(`Create account ${BOB} owned by ${SYSTEM_PROGRAM_ID}`);
    expect(expanded(field).map((f) => `${f.label}=${f.fallbackText}`)).toEqual([
      `Funder=${ALICE}`,
      `New account=${BOB}`,
      "Lamports=0.00203928 SOL",
      "Space=165",
      `Owner=${SYSTEM_PROGRAM_ID}`,
    ]);
  });

  it("falls back to hex for truncated and unsupported instructions", () => {
    const fields = visualizeSolanaInstructions(runtime, [system([2, 0, 0, 0, 1]), system([...u32(3)])]);
    expect(fields).toEqual([
      { type: "text", label: "Instruction Data", fallbackText: "0x0200000001", text: "0x0200000001" },
      { type: "text", label: "Instruction Data", fallbackText: "0x03000000", text: "0x03000000" },
    ]);
  });

  it("leaves other programs to the raw fallback", () => {
    const other: SolanaInstruction = { programId: "Memo1111111111111111111111111111", accounts: [], data: Uint8Array.of(0xca, 0xfe) };
    expect(visualizeSolanaInstructions(runtime, [other])).toEqual([
      { type: "text", label: "Instruction Data", fallbackText: "0xcafe", text: "0xcafe" },
    ]);
  });

  it("still shows hex when every visualizer is disabled", () => {
    const bare = { solana: createSolanaVisualizerChain({ disabled: ["solana-system", "raw-hex"] }) };
    const [field] = visualizeSolanaInstructions(bare, [system([...u32(2), ...u64(1n)])]);
    expect(field).toEqual({
      type: "text",
      label: "Instruction Data",
      fallbackText: "0x020000000100000000000000",
      text: "0x020000000100000000000000",
    });
  });
});
