/**
 * Collect Fees Execution
 */

import type { Address } from "viem";
import { MAX_UINT128 } from "../constants";
import { CollectParams, Position } from "../types";

/**
 * `collect` parameters that sweep everything owed to the position
 */
export function buildCollectAllParams(tokenId: bigint, recipient: Address): CollectParams {
  return {
    tokenId,
    recipient,
    amount0Max: MAX_UINT128,
    amount1Max: MAX_UINT128,
  };
}

export function hasUncollectedTokens(
  position: Pick<Position, "tokensOwed0" | "tokensOwed1">
): boolean {
  return position.tokensOwed0 > 0n || position.tokensOwed1 > 0n;
}

/**
 * A position may only be burned once it holds no liquidity and owes nothing
 */
export function isBurnable(
  position: Pick<Position, "liquidity" | "tokensOwed0" | "tokensOwed1">
): boolean {
  return position.liquidity === 0n && !hasUncollectedTokens(position);
}
