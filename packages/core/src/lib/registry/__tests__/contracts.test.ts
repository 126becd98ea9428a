import { describe, it, expect } from "vitest";
import { ContractRegistry, ContractRegistryError, normalizeAddressKey } from "../contracts";

const PERMIT2 = "0x000000000022D473030F116dDEE9F6B43aC78BA3";

describe("normalizeAddressKey", () => {
  it("lowercases hex of any length", () => {
    expect(normalizeAddressKey(PERMIT2)).toBe("0x000000000022d473030f116ddee9f6b43ac78ba3");
    expect(normalizeAddressKey(" 0xB2DB ")).toBe("0xb2db");
  });

  it("keeps other encodings exact", () => {
    expect(normalizeAddressKey("11111111111111111111111111111111")).toBe("11111111111111111111111111111111");
    expect(normalizeAddressKey("So11111111111111111111111111111111111111112")).toBe(
      "So11111111111111111111111111111111111111112"
    );
  });
});

describe("ContractRegistry", () => {
  const registry = ContractRegistry.builder()
    .registerContract(1, "UniswapPermit2", [PERMIT2])
    .registerContract(10, "UniswapPermit2", [PERMIT2])
    .registerContract(1, "SafeWallet", ["0xd9Db270c1B5E3Bd161E8c8503c55cEABeE709552", "0x41675C099F32341bf84BFc5382aF534df5C7461a"])
    .build();

  it("looks up type tags case-insensitively per chain", () => {
    expect(registry.lookup(1, PERMIT2.toLowerCase())).toBe("UniswapPermit2");
    expect(registry.lookup(10, PERMIT2.toUpperCase().replace("0X", "0x"))).toBe("UniswapPermit2");
    expect(registry.lookup(137, PERMIT2)).toBeNull();
  });

  it("checks a type tag", () => {
    expect(registry.isType(1, PERMIT2, "UniswapPermit2")).toBe(true);
    expect(registry.isType(1, PERMIT2, "SafeWallet")).toBe(false);
  });

  it("lists addresses of a type in registration order", () => {
    expect(registry.addressesOf(1, "SafeWallet")).toEqual([
      "0xd9db270c1b5e3bd161e8c8503c55ceabee709552",
      "0x41675c099f32341bf84bfc5382af534df5c7461a",
    ]);
    expect(registry.addressesOf(8453, "SafeWallet")).toEqual([]);
    expect(registry.size).toBe(4);
  });

  it("treats re-registration with the same tag as a no-op", () => {
    const built = ContractRegistry.builder()
      .registerContract(1, "UniswapPermit2", [PERMIT2])
      .registerContract(1, "UniswapPermit2", [PERMIT2.toLowerCase()])
      .build();
    expect(built.addressesOf(1, "UniswapPermit2")).toHaveLength(1);
  });

  it("rejects a conflicting tag for the same address", () => {
    const builder = ContractRegistry.builder().registerContract(1, "UniswapPermit2", [PERMIT2]);
    expect(() => builder.registerContract(1, "SafeWallet", [PERMIT2.toLowerCase()])).toThrow(ContractRegistryError);
  });

  it("is unaffected by later registrations on its builder", () => {
    const builder = ContractRegistry.builder().registerContract(1, "A", ["0x01"]);
    const built = builder.build();
    builder.registerContract(1, "B", ["0x02"]);
    expect(built.lookup(1, "0x02")).toBeNull();
  });
});
