import BigNumber from "bignumber.js";
import type { Address } from "viem";
import { BPS } from "../constants";

export const isSameAddress = (a: string, b: string) =>
  a.toLowerCase() === b.toLowerCase();

/**
 * Order two token addresses by numeric value, as the pool contracts require
 * @returns [token0, token1]
 */
export const sortTokens = (tokenA: Address, tokenB: Address): [Address, Address] =>
  BigInt(tokenA) < BigInt(tokenB) ? [tokenA, tokenB] : [tokenB, tokenA];

/**
 * Lower bound accepted for `amount` given a slippage tolerance in percent.
 * Integer basis-point arithmetic, so wei-sized amounts keep full precision.
 */
export const applySlippage = (amount: bigint, slippagePercent: number): bigint => {
  const slippageBps = BigInt(Math.round(slippagePercent * 100));
  return (amount * (BPS - slippageBps)) / BPS;
};

/**
 * Multiply a wei amount by a float factor, rounding up
 */
export const scaleAmount = (amount: bigint, factor: number): bigint =>
  BigInt(
    new BigNumber(amount.toString())
      .multipliedBy(factor)
      .integerValue(BigNumber.ROUND_CEIL)
      .toFixed(0)
  );

export const shortAddress = (address: string) =>
  address.length > 12 ? `${address.slice(0, 6)}...${address.slice(-4)}` : address;
