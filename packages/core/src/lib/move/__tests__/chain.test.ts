import { describe, it, expect } from "vitest";
import type { PayloadField } from "../../payload";
import { ContractRegistry } from "../../registry";
import { CETUS_CONFIG } from "../cetus";
import { createMoveVisualizerChain, registerMoveProtocols, visualizeMoveTransaction } from "../chain";
import { MOMENTUM_CONFIG } from "../momentum";
import type { MoveArgument, MoveCommand, MoveInput, MoveTransaction } from "../types";

const SENDER = `0x${"22".repeat(32)}`;
const RECIPIENT = `0x${"11".repeat(32)}`;
const VALIDATOR = `0x${"44".repeat(32)}`;
const USDC_TYPE = `0x${"dd".repeat(32)}::usdc::USDC`;

function uint(value: bigint, width: number): MoveInput {
  const bytes = new Uint8Array(width);
  let rest = value;
  for (let i = 0; i < width; i++) {
    bytes[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return { kind: "pure", bytes };
}

function bool(value: boolean): MoveInput {
  return { kind: "pure", bytes: Uint8Array.of(value ? 1 : 0) };
}

function address(hex: string): MoveInput {
  const bytes = new Uint8Array(32);
  for (let i = 0; i < 32; i++) bytes[i] = parseInt(hex.slice(2 + i * 2, 4 + i * 2), 16);
  return { kind: "pure", bytes };
}

function object(objectId: string): MoveInput {
  return { kind: "object", objectId };
}

function input(index: number): MoveArgument {
  return { kind: "input", index };
}

function runtime(disabled: string[] = []) {
  const builder = ContractRegistry.builder();
  registerMoveProtocols(builder);
  return { move: createMoveVisualizerChain({ registry: builder.build(), disabled }) };
}

function transaction(commands: MoveCommand[], inputs: MoveInput[]): MoveTransaction {
  return { sender: SENDER, commands, inputs };
}

function expanded(field: PayloadField): PayloadField[] {
  return field.type === "preview_layout" ? field.expanded?.fields ?? [] : [];
}

function cetusSwap(fn: string, inputs: MoveInput[]): MoveTransaction {
  return transaction(
    [
      {
        kind: "moveCall",
        package: CETUS_CONFIG.packageId,
        module: "pool_script_v2",
        function: fn,
        typeArguments: ["0x2::sui::SUI", USDC_TYPE],
        arguments: inputs.map((_, index) => input(index)),
      },
    ],
    inputs
  );
}

const POOL_OBJECTS = [object("0x5"), object("0x6"), object("0x7"), object("0x8")];

describe("cetus-swap", () => {
  it("renders an exact-in a2b swap", () => {
    const tx = cetusSwap("swap_a2b", [
      ...POOL_OBJECTS,
      bool(true),
      uint(1_000_000_000n, 8),
      uint(2_500_000n, 8),
      uint(4_295_048_016n, 16),
      object("0x6"),
    ]);

    const [field] = visualizeMoveTransaction(runtime(), tx);
    expect(field).toMatchObject({ label: "Cetus Swap", title: "Swap", fallbackText: "Swap 1000000000 SUI for USDC" });
    expect(expanded(field)).toEqual([
      { type: "text", label: "Coin in", fallbackText: "SUI", text: "SUI" },
      { type: "text", label: "Coin out", fallbackText: "USDC", text: "USDC" },
      { type: "number", label: "Amount in", fallbackText: "1000000000", number: "1000000000" },
      { type: "number", label: "Minimum amount out", fallbackText: "2500000", number: "2500000" },
      { type: "number", label: "Sqrt price limit", fallbackText: "4295048016", number: "4295048016" },
    ]);
  });

  it("renders an exact-out b2a swap with partner", () => {
    const tx = cetusSwap("swap_b2a_with_partner", [
      ...POOL_OBJECTS,
      object("0x9"),
      bool(false),
      uint(500n, 8),
      uint(700n, 8),
      uint(1n, 16),
    ]);

    const [field] = visualizeMoveTransaction(runtime(), tx);
    expect(field.fallbackText).toBe("Swap USDC for 500 SUI");
    expect(expanded(field).map((f) => `${f.label}=${f.fallbackText}`)).toEqual([
      "Coin in=USDC",
      "Coin out=SUI",
      "Amount out=500",
      "Maximum amount in=700",
      "Sqrt price limit=1",
    ]);
  });

  it("leaves unsupported functions to the call fallback", () => {
    const tx = cetusSwap("add_liquidity", [...POOL_OBJECTS]);
    expect(visualizeMoveTransaction(runtime(), tx)).toEqual([
      {
        type: "text",
        label: "Move Call",
        fallbackText: `${CETUS_CONFIG.packageId}::pool_script_v2::add_liquidity<0x2::sui::SUI, ${USDC_TYPE}>`,
        text: `${CETUS_CONFIG.packageId}::pool_script_v2::add_liquidity<0x2::sui::SUI, ${USDC_TYPE}>`,
      },
    ]);
  });

  it("does not claim calls when disabled", () => {
    const tx = cetusSwap("swap_a2b", [...POOL_OBJECTS, bool(true), uint(1n, 8), uint(1n, 8), uint(1n, 16)]);
    const [field] = visualizeMoveTransaction(runtime(["cetus-swap"]), tx);
    expect(field.label).toBe("Move Call");
  });
});

function momentumCall(fn: string): MoveTransaction {
  return transaction(
    [
      {
        kind: "moveCall",
        package: MOMENTUM_CONFIG.packageId,
        module: "liquidity",
        function: fn,
        typeArguments: ["0x2::sui::SUI", USDC_TYPE],
        arguments: [input(0), input(1)],
      },
    ],
    [object("0x5"), object("0x6")]
  );
}

describe("momentum-liquidity", () => {
  it("names the pair liquidity is removed from", () => {
    const [field] = visualizeMoveTransaction(runtime(), momentumCall("remove_liquidity"));
    expect(field).toMatchObject({
      label: "Momentum Remove Liquidity",
      title: "Remove Liquidity",
      fallbackText: "Remove liquidity from pair SUI/USDC",
    });
    expect(expanded(field)).toEqual([
      { type: "address", label: "Sender", fallbackText: SENDER, address: SENDER },
      { type: "text", label: "Coin 1", fallbackText: "0x2::sui::SUI", text: "0x2::sui::SUI" },
      { type: "text", label: "Coin 2", fallbackText: USDC_TYPE, text: USDC_TYPE },
    ]);
  });

  it("renders a position close for the sender", () => {
    const [field] = visualizeMoveTransaction(runtime(), momentumCall("close_position"));
    expect(field).toMatchObject({ label: "Momentum Close Position", fallbackText: `Close position for ${SENDER}` });
  });

  it("leaves other liquidity functions to the call fallback", () => {
    const [field] = visualizeMoveTransaction(runtime(), momentumCall("add_liquidity"));
    expect(field.label).toBe("Move Call");
  });
});

describe("coin-transfer", () => {
  it("traces the amount through a gas coin split", () => {
    const tx = transaction(
      [
        { kind: "splitCoins", coin: { kind: "gasCoin" }, amounts: [input(0)] },
        { kind: "transferObjects", objects: [{ kind: "nestedResult", index: 0, resultIndex: 0 }], address: input(1) },
      ],
      [uint(1_500_000_000n, 8), address(RECIPIENT)]
    );

    const fields = visualizeMoveTransaction(runtime(), tx);
    expect(fields).toHaveLength(1);
    expect(fields[0]).toMatchObject({ label: "Coin Transfer", fallbackText: `Transfer 1.5 SUI to ${RECIPIENT}` });
    expect(expanded(fields[0])).toEqual([
      { type: "address", label: "From", fallbackText: SENDER, address: SENDER },
      { type: "address", label: "To", fallbackText: RECIPIENT, address: RECIPIENT },
      { type: "amount", label: "Amount", fallbackText: "1.5 SUI", amount: "1.5", abbreviation: "SUI" },
    ]);
  });

  it("keeps base units for coins other than gas", () => {
    const tx = transaction(
      [
        { kind: "splitCoins", coin: input(0), amounts: [input(1)] },
        { kind: "transferObjects", objects: [{ kind: "result", index: 0 }], address: input(2) },
      ],
      [object("0x99"), uint(250n, 8), address(RECIPIENT)]
    );

    const [field] = visualizeMoveTransaction(runtime(), tx);
    expect(field.fallbackText).toBe(`Transfer 250 base units to ${RECIPIENT}`);
  });

  it("ignores transfers of objects that were not split off", () => {
    const tx = transaction(
      [{ kind: "transferObjects", objects: [input(0)], address: input(1) }],
      [object("0x99"), address(RECIPIENT)]
    );
    expect(visualizeMoveTransaction(runtime(), tx)).toEqual([]);
  });
});

describe("sui-native-staking", () => {
  it("shows the stake amount and validator", () => {
    const tx = transaction(
      [
        { kind: "splitCoins", coin: { kind: "gasCoin" }, amounts: [input(0)] },
        {
          kind: "moveCall",
          package: "0x3",
          module: "sui_system",
          function: "request_add_stake",
          typeArguments: [],
          arguments: [input(1), { kind: "result", index: 0 }, input(2)],
        },
      ],
      [uint(2_000_000_000n, 8), object("0x5"), address(VALIDATOR)]
    );

    const [field] = visualizeMoveTransaction(runtime(), tx);
    expect(field).toMatchObject({ label: "Stake SUI", fallbackText: `Stake 2 SUI with ${VALIDATOR}` });
    expect(expanded(field)).toEqual([
      { type: "address", label: "Validator", fallbackText: VALIDATOR, address: VALIDATOR },
      { type: "amount", label: "Amount", fallbackText: "2 SUI", amount: "2", abbreviation: "SUI" },
    ]);
  });

  it("names the staked object on withdrawal", () => {
    const stakedSui = `0x${"77".repeat(32)}`;
    const tx = transaction(
      [
        {
          kind: "moveCall",
          package: `0x${"0".repeat(63)}3`,
          module: "sui_system",
          function: "request_withdraw_stake",
          typeArguments: [],
          arguments: [input(0), input(1)],
        },
      ],
      [object("0x5"), object(stakedSui)]
    );

    const [field] = visualizeMoveTransaction(runtime(), tx);
    expect(field.fallbackText).toBe("Withdraw staked SUI");
    expect(expanded(field)).toEqual([
      { type: "address", label: "Staked SUI object", fallbackText: stakedSui, address: stakedSui },
    ]);
  });
});
