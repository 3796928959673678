import Decimal from "decimal.js";
import { FEE_TIER_TICK_SPACING, MAX_TICK, MIN_TICK, Q96 } from "../constants";
import { isFeeTier } from "../config/feeTiers";
import { PriceRange } from "../types";
import {
  InvalidPriceError,
  InvalidRangeError,
  UnknownFeeTierError,
} from "./errors";

/**
 * Tick math for Uniswap-V3-style pools: price = 1.0001^tick.
 *
 * Logarithms are taken with decimal.js at 60 significant digits so that
 * prices sitting exactly on a tick boundary land on that tick instead of
 * the one below it.
 */

const TickDecimal = Decimal.clone({ precision: 60 });

const TICK_BASE = new TickDecimal("1.0001");
const LN_TICK_BASE = TickDecimal.ln(TICK_BASE);
const Q96_DECIMAL = new TickDecimal(Q96.toString());

// Ratios closer than this to an integer are treated as that integer
const TICK_SNAP_DECIMALS = 40;

function toPositiveDecimal(value: Decimal.Value): Decimal {
  let decimal: Decimal;
  try {
    decimal = new TickDecimal(value);
  } catch (error) {
    throw new InvalidPriceError(String(value));
  }
  if (!decimal.isFinite() || decimal.lte(0)) {
    throw new InvalidPriceError(String(value));
  }
  return decimal;
}

function decimalShift(exponent: number): Decimal {
  return TickDecimal.pow(10, exponent);
}

export function getTickSpacing(fee: number): number {
  if (!isFeeTier(fee)) {
    throw new UnknownFeeTierError(fee);
  }
  return FEE_TIER_TICK_SPACING[fee];
}

/**
 * Convert a human price (token1 per token0) to the tick at or below it
 * @param price - Price in whole-token units
 * @param decimalsToken0 - Decimals of token0
 * @param decimalsToken1 - Decimals of token1
 */
export function priceToTick(
  price: Decimal.Value,
  decimalsToken0: number,
  decimalsToken1: number
): number {
  const adjusted = toPositiveDecimal(price).mul(
    decimalShift(decimalsToken1 - decimalsToken0)
  );

  return TickDecimal.ln(adjusted)
    .div(LN_TICK_BASE)
    .toDecimalPlaces(TICK_SNAP_DECIMALS)
    .floor()
    .toNumber();
}

/**
 * Round a tick down (toward negative infinity) to the fee tier's spacing.
 * Both range bounds go through here, so neither ever moves above its raw tick.
 */
export function alignToSpacing(tick: number, feeTier: number): number {
  const spacing = getTickSpacing(feeTier);
  return Math.floor(tick / spacing) * spacing;
}

/**
 * Derive aligned tick bounds from the current price and multiplicative factors
 * @returns [tickLower, tickUpper]
 */
export function computeRange(
  currentPrice: Decimal.Value,
  priceRange: PriceRange,
  decimals0: number,
  decimals1: number,
  feeTier: number
): [number, number] {
  getTickSpacing(feeTier);

  const current = toPositiveDecimal(currentPrice);
  const lowerPrice = current.mul(toPositiveDecimal(priceRange.lowerFactor));
  const upperPrice = current.mul(toPositiveDecimal(priceRange.upperFactor));

  const tickLower = alignToSpacing(
    priceToTick(lowerPrice, decimals0, decimals1),
    feeTier
  );
  const tickUpper = alignToSpacing(
    priceToTick(upperPrice, decimals0, decimals1),
    feeTier
  );

  if (tickLower >= tickUpper || tickLower < MIN_TICK || tickUpper > MAX_TICK) {
    throw new InvalidRangeError(tickLower, tickUpper);
  }

  return [tickLower, tickUpper];
}

/**
 * Human price (token1 per token0) at a tick
 */
export function tickToPrice(
  tick: number,
  decimals0: number,
  decimals1: number
): Decimal {
  return TICK_BASE.pow(tick).div(decimalShift(decimals1 - decimals0));
}

/**
 * Raw price (smallest units of token1 per smallest unit of token0)
 */
export function sqrtPriceX96ToRawPrice(sqrtPriceX96: bigint): Decimal {
  return new TickDecimal(sqrtPriceX96.toString()).div(Q96_DECIMAL).pow(2);
}

/**
 * Human price (token1 per token0) from a pool's sqrtPriceX96
 */
export function sqrtPriceX96ToPrice(
  sqrtPriceX96: bigint,
  decimals0: number,
  decimals1: number
): Decimal {
  return sqrtPriceX96ToRawPrice(sqrtPriceX96).mul(
    decimalShift(decimals0 - decimals1)
  );
}

export interface NotionalAmountsInput {
  sqrtPriceX96: bigint;
  tickLower: number;
  tickUpper: number;
  /** Target value in whole units of the reference token */
  notional: Decimal.Value;
  /** true when the notional is expressed in token0, false for token1 */
  notionalInToken0: boolean;
  decimals0: number;
  decimals1: number;
}

/**
 * Split a notional value into the token0/token1 amounts a position over
 * [tickLower, tickUpper] takes at the current price.
 *
 * Per unit of liquidity L:
 *   amount0 = 1/sqrtP - 1/sqrtPb
 *   amount1 = sqrtP - sqrtPa
 * with sqrtP clamped into [sqrtPa, sqrtPb]. L is then scaled so the
 * combined value (in token1) equals the notional.
 *
 * @returns raw amounts, rounded down
 */
export function getAmountsForNotional({
  sqrtPriceX96,
  tickLower,
  tickUpper,
  notional,
  notionalInToken0,
  decimals0,
  decimals1,
}: NotionalAmountsInput): { amount0: bigint; amount1: bigint } {
  if (sqrtPriceX96 <= 0n) {
    throw new InvalidPriceError(sqrtPriceX96.toString());
  }
  if (tickLower >= tickUpper) {
    throw new InvalidRangeError(tickLower, tickUpper);
  }
  const value = toPositiveDecimal(notional);

  const sqrtPrice = new TickDecimal(sqrtPriceX96.toString()).div(Q96_DECIMAL);
  const rawPrice = sqrtPrice.pow(2);
  const sqrtLower = TICK_BASE.pow(tickLower).sqrt();
  const sqrtUpper = TICK_BASE.pow(tickUpper).sqrt();
  const sqrtClamped = TickDecimal.min(
    TickDecimal.max(sqrtPrice, sqrtLower),
    sqrtUpper
  );

  const per0 = new TickDecimal(1).div(sqrtClamped).minus(new TickDecimal(1).div(sqrtUpper));
  const per1 = sqrtClamped.minus(sqrtLower);
  const valuePerLiquidity = per0.mul(rawPrice).plus(per1);

  const notionalRaw = notionalInToken0
    ? value.mul(decimalShift(decimals0)).mul(rawPrice)
    : value.mul(decimalShift(decimals1));
  const liquidity = notionalRaw.div(valuePerLiquidity);

  return {
    amount0: BigInt(liquidity.mul(per0).floor().toFixed(0)),
    amount1: BigInt(liquidity.mul(per1).floor().toFixed(0)),
  };
}
