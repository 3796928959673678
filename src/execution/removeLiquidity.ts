/**
 * Remove Liquidity Execution
 */

import { DecreaseLiquidityParams, Position } from "../types";
import { getLogger } from "../utils/Logger";

const logger = getLogger(module);

/**
 * `decreaseLiquidity` parameters that withdraw the position's full
 * liquidity. Minimum amounts are zero: a full close must not be blocked by
 * price movement between the read and the send.
 */
export function buildRemoveAllParams(
  position: Pick<Position, "tokenId" | "liquidity">,
  deadline: bigint
): DecreaseLiquidityParams {
  logger.info(
    `RemoveLiquidity: Removing ${position.liquidity} liquidity from position ${position.tokenId}`
  );

  return {
    tokenId: position.tokenId,
    liquidity: position.liquidity,
    amount0Min: 0n,
    amount1Min: 0n,
    deadline,
  };
}
