/**
 * Increase Liquidity Execution
 */

import { IncreaseLiquidityParams } from "../types";
import { applySlippage } from "../utils/tokenHelper";

export function buildIncreaseParams(
  tokenId: bigint,
  amount0: bigint,
  amount1: bigint,
  slippagePercent: number,
  deadline: bigint
): IncreaseLiquidityParams {
  return {
    tokenId,
    amount0Desired: amount0,
    amount1Desired: amount1,
    amount0Min: applySlippage(amount0, slippagePercent),
    amount1Min: applySlippage(amount1, slippagePercent),
    deadline,
  };
}
