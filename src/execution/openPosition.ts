/**
 * Open Position Execution
 * Builds and validates `mint` parameters for a new position
 */

import type { Address } from "viem";
import { FEE_TIER_TICK_SPACING, MAX_TICK, MIN_TICK } from "../constants";
import { isFeeTier } from "../config/feeTiers";
import { MintParams } from "../types";
import { getLogger } from "../utils/Logger";
import { applySlippage } from "../utils/tokenHelper";

const logger = getLogger(module);

/**
 * Position parameters for opening
 */
export interface OpenPositionParams {
  token0: Address;
  token1: Address;
  fee: number;
  tickLower: number;
  tickUpper: number;
  amount0: bigint;
  amount1: bigint;
  recipient: Address;
  deadline: bigint;
  slippagePercent: number;
}

export interface ValidationResult {
  isValid: boolean;
  error?: string;
}

/**
 * Mint parameters with slippage floors applied to both desired amounts
 */
export function buildMintParams(params: OpenPositionParams): MintParams {
  const { token0, token1, fee, tickLower, tickUpper, amount0, amount1 } = params;

  const mintParams: MintParams = {
    token0,
    token1,
    fee,
    tickLower,
    tickUpper,
    amount0Desired: amount0,
    amount1Desired: amount1,
    amount0Min: applySlippage(amount0, params.slippagePercent),
    amount1Min: applySlippage(amount1, params.slippagePercent),
    recipient: params.recipient,
    deadline: params.deadline,
  };

  logger.info(
    `OpenPosition: Range [${tickLower}, ${tickUpper}], ` +
      `desired ${amount0}/${amount1}, ` +
      `min ${mintParams.amount0Min}/${mintParams.amount1Min}`
  );

  return mintParams;
}

/**
 * Validate position parameters before opening
 */
export function validatePositionParams(params: OpenPositionParams): ValidationResult {
  const { fee, tickLower, tickUpper, amount0, amount1 } = params;

  if (!isFeeTier(fee)) {
    return { isValid: false, error: `Unknown fee tier: ${fee}` };
  }

  if (tickLower >= tickUpper) {
    return {
      isValid: false,
      error: `Invalid tick range: lower (${tickLower}) >= upper (${tickUpper})`,
    };
  }

  if (tickLower < MIN_TICK || tickUpper > MAX_TICK) {
    return {
      isValid: false,
      error: `Tick range [${tickLower}, ${tickUpper}] outside [${MIN_TICK}, ${MAX_TICK}]`,
    };
  }

  const spacing = FEE_TIER_TICK_SPACING[fee];
  if (tickLower % spacing !== 0 || tickUpper % spacing !== 0) {
    return {
      isValid: false,
      error: `Ticks must be aligned with tick spacing (${spacing})`,
    };
  }

  if (amount0 === 0n && amount1 === 0n) {
    return {
      isValid: false,
      error: "At least one token amount must be non-zero",
    };
  }

  if (params.slippagePercent < 0 || params.slippagePercent > 100) {
    return {
      isValid: false,
      error: `Slippage must be within [0, 100], got ${params.slippagePercent}`,
    };
  }

  return { isValid: true };
}
