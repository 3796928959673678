import Decimal from "decimal.js";
import { FeeTier, WriteMethod } from "./types";

export const FEE_TIER_TICK_SPACING: Readonly<Record<FeeTier, number>> = {
  100: 1,
  500: 10,
  3000: 60,
  10000: 200,
};

export const MIN_TICK = -887272;
export const MAX_TICK = 887272;

export const Q96 = 2n ** 96n;
export const MAX_UINT128 = 2n ** 128n - 1n;

// Conservative fixed gas limits per operation
export const GAS_LIMITS: Readonly<Record<WriteMethod, bigint>> = {
  mint: 600_000n,
  increaseLiquidity: 400_000n,
  decreaseLiquidity: 350_000n,
  collect: 250_000n,
  burn: 150_000n,
  approve: 80_000n,
};

export const DEFAULT_DEADLINE_SECONDS = 3600;
export const DEFAULT_MAX_SLIPPAGE_PERCENT = 30;
export const BPS = 10_000n;

// Enough significant digits for any uint256 amount
export const PreciseDecimal = Decimal.clone({ precision: 80 });
