/**
 * Well-known ERC-20 token metadata.
 *
 * Amounts of tokens outside this list render in base units; there are no
 * chain lookups for decimals.
 */

import { formatUnits } from "viem";
import type { ContractRegistryBuilder } from "../registry";

export const ERC20_TOKEN_TYPE = "ERC20Token";

export interface TokenInfo {
  address: string;
  symbol?: string;
  decimals?: number;
}

type TokenMetadata = { symbol: string; decimals: number };

// ── Well-known tokens per chain ─────────────────────────────────────

const WETH: TokenMetadata = { symbol: "WETH", decimals: 18 };
const USDC: TokenMetadata = { symbol: "USDC", decimals: 6 };

export const KNOWN_TOKENS: Record<number, Record<string, TokenMetadata>> = {
  1: {
    "0xc02aaa39b223fe8d0a0e5c4f27ead9083c756cc2": WETH,
    "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48": USDC,
    "0xdac17f958d2ee523a2206206994597c13d831ec7": { symbol: "USDT", decimals: 6 },
    "0x6b175474e89094c44da98b954eedeac495271d0f": { symbol: "DAI", decimals: 18 },
  },
  10: {
    "0x4200000000000000000000000000000000000006": WETH,
    "0x0b2c639c533813f4aa9d7837caf62653d097ff85": USDC,
  },
  137: {
    "0x7ceb23fd6bc0add59e62ac25578270cff1b9f619": WETH,
    "0x3c499c542cef5e3811e1192ce70d8cc03d5c3359": USDC,
  },
  8453: {
    "0x4200000000000000000000000000000000000006": WETH,
    "0x833589fcd6edb6e08f4c7c32d4f71b54bda02913": USDC,
  },
  42161: {
    "0x82af49447d8a07e3bd95bd0d56f35241523fbab1": WETH,
    "0xaf88d065e77c8cc2239327c5edb3a432268e5831": USDC,
  },
};

/** Resolve a token address to metadata (symbol, decimals). */
export function resolveToken(chainId: number, address: string): TokenInfo {
  const known = KNOWN_TOKENS[chainId]?.[address.toLowerCase()];
  return known ? { address, symbol: known.symbol, decimals: known.decimals } : { address };
}

/** Base units scaled by the token's decimals, or unscaled when unknown. */
export function formatTokenAmount(raw: bigint, token: TokenInfo): string {
  return token.decimals === undefined ? raw.toString() : formatUnits(raw, token.decimals);
}

/** "1.5 USDC", or the bare amount for unknown tokens. */
export function describeTokenAmount(amount: string, token: TokenInfo): string {
  return token.symbol ? `${amount} ${token.symbol}` : amount;
}

export function registerKnownTokens(builder: ContractRegistryBuilder): void {
  for (const [chainId, tokens] of Object.entries(KNOWN_TOKENS)) {
    builder.registerContract(Number(chainId), ERC20_TOKEN_TYPE, Object.keys(tokens));
  }
}
