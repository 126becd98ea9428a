/**
 * Contract type registry.
 *
 * Maps (chain id, address) to a contract type tag such as
 * "UniswapPermit2" or "ERC20Token". Visualizers use it to claim calls only
 * on the deployments they understand. Built once, then read-only.
 */

export class ContractRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractRegistryError";
  }
}

const HEX_PATTERN = /^0x[0-9a-fA-F]+$/;

/**
 * Canonical lookup key for an address. Hex of any length (EVM addresses,
 * Move package ids) is case-insensitive; other encodings are kept exact.
 */
export function normalizeAddressKey(address: string): string {
  const trimmed = address.trim();
  return HEX_PATTERN.test(trimmed) ? trimmed.toLowerCase() : trimmed;
}

function makeKey(chainId: number, address: string): string {
  return `${chainId}:${normalizeAddressKey(address)}`;
}

export class ContractRegistry {
  private constructor(
    private readonly types: ReadonlyMap<string, string>,
    private readonly byType: ReadonlyMap<string, readonly string[]>
  ) {}

  static builder(): ContractRegistryBuilder {
    return new ContractRegistryBuilder();
  }

  /** @internal */
  static fromEntries(entries: ReadonlyMap<string, { chainId: number; address: string; typeTag: string }>): ContractRegistry {
    const types = new Map<string, string>();
    const byType = new Map<string, string[]>();
    for (const [key, { chainId, address, typeTag }] of entries) {
      types.set(key, typeTag);
      const typeKey = `${chainId}:${typeTag}`;
      byType.set(typeKey, [...(byType.get(typeKey) ?? []), address]);
    }
    const frozen = new Map<string, readonly string[]>();
    for (const [typeKey, addresses] of byType) frozen.set(typeKey, Object.freeze(addresses));
    return new ContractRegistry(types, frozen);
  }

  /** Type tag registered for an address on a chain, or null. */
  lookup(chainId: number, address: string): string | null {
    return this.types.get(makeKey(chainId, address)) ?? null;
  }

  isType(chainId: number, address: string, typeTag: string): boolean {
    return this.lookup(chainId, address) === typeTag;
  }

  /** Addresses registered under a type tag on a chain, in registration order. */
  addressesOf(chainId: number, typeTag: string): readonly string[] {
    return this.byType.get(`${chainId}:${typeTag}`) ?? [];
  }

  get size(): number {
    return this.types.size;
  }
}

export class ContractRegistryBuilder {
  private readonly entries = new Map<string, { chainId: number; address: string; typeTag: string }>();

  /**
   * Register addresses under a type tag. Re-registering an address with the
   * same tag is a no-op; with a different tag it throws.
   */
  registerContract(chainId: number, typeTag: string, addresses: Iterable<string>): this {
    for (const address of addresses) {
      const key = makeKey(chainId, address);
      const existing = this.entries.get(key);
      if (existing) {
        if (existing.typeTag !== typeTag) {
          throw new ContractRegistryError(
            `${address} on chain ${chainId} is already registered as ${existing.typeTag}, not ${typeTag}`
          );
        }
        continue;
      }
      this.entries.set(key, { chainId, address: normalizeAddressKey(address), typeTag });
    }
    return this;
  }

  build(): ContractRegistry {
    return ContractRegistry.fromEntries(new Map(this.entries));
  }
}
