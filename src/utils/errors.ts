/**
 * Error taxonomy for position discovery and liquidity workflows.
 *
 * Every error carries a `context` record (token ID, address, step) so a
 * halted workflow can be resumed by hand from the last completed state.
 */

export type ErrorContext = Record<string, string | number | bigint | undefined>;

export class LiquidityManagerError extends Error {
  constructor(
    message: string,
    public readonly context: ErrorContext = {},
    cause?: unknown
  ) {
    super(message);
    this.name = "LiquidityManagerError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class InvalidPriceError extends LiquidityManagerError {
  constructor(public readonly price: string) {
    super(`Invalid price: ${price} (must be a finite number > 0)`, { price });
    this.name = "InvalidPriceError";
  }
}

export class UnknownFeeTierError extends LiquidityManagerError {
  constructor(public readonly fee: number) {
    super(`Unknown fee tier: ${fee}`, { fee });
    this.name = "UnknownFeeTierError";
  }
}

export class InvalidRangeError extends LiquidityManagerError {
  constructor(
    public readonly tickLower: number,
    public readonly tickUpper: number
  ) {
    super(
      `Invalid tick range: lower (${tickLower}) >= upper (${tickUpper}); widen the price range factors`,
      { tickLower, tickUpper }
    );
    this.name = "InvalidRangeError";
  }
}

/**
 * Transport failure or contract revert on a read or send.
 */
export class ContractCallError extends LiquidityManagerError {
  constructor(message: string, context: ErrorContext, cause?: unknown) {
    super(message, context, cause);
    this.name = "ContractCallError";
  }
}

export class InsufficientBalanceError extends LiquidityManagerError {
  constructor(
    public readonly token: string,
    public readonly required: bigint,
    public readonly available: bigint
  ) {
    super(
      `Insufficient balance of ${token}: required ${required}, available ${available}`,
      { token, required, available }
    );
    this.name = "InsufficientBalanceError";
  }
}

export class PositionNotFoundError extends LiquidityManagerError {
  constructor(public readonly tokenId: bigint, cause?: unknown) {
    super(`Position ${tokenId} not found`, { tokenId }, cause);
    this.name = "PositionNotFoundError";
  }
}

export class PoolNotFoundError extends LiquidityManagerError {
  constructor(tokenA: string, tokenB: string, fee: number) {
    super(`No pool for ${tokenA}/${tokenB} at fee ${fee}`, {
      tokenA,
      tokenB,
      fee,
    });
    this.name = "PoolNotFoundError";
  }
}

/**
 * The transaction was sent but no receipt arrived in time. It may still
 * confirm: re-check on-chain state before sending again.
 */
export class UnconfirmedTransactionError extends LiquidityManagerError {
  constructor(
    public readonly transactionHash: string,
    public readonly step: string,
    timeoutMs: number
  ) {
    super(
      `Transaction ${transactionHash} (${step}) not confirmed after ${timeoutMs}ms`,
      { transactionHash, step, timeoutMs }
    );
    this.name = "UnconfirmedTransactionError";
  }
}

export class TransactionRevertedError extends LiquidityManagerError {
  constructor(
    public readonly transactionHash: string,
    public readonly step: string,
    blockNumber: bigint
  ) {
    super(`Transaction ${transactionHash} (${step}) reverted in block ${blockNumber}`, {
      transactionHash,
      step,
      blockNumber,
    });
    this.name = "TransactionRevertedError";
  }
}

export class BurnPreconditionError extends LiquidityManagerError {
  constructor(
    public readonly tokenId: bigint,
    liquidity: bigint,
    tokensOwed0: bigint,
    tokensOwed1: bigint
  ) {
    super(
      `Refusing to burn position ${tokenId}: liquidity ${liquidity}, owed ${tokensOwed0}/${tokensOwed1}`,
      { tokenId, liquidity, tokensOwed0, tokensOwed1, step: "burn" }
    );
    this.name = "BurnPreconditionError";
  }
}

export class ConfigError extends LiquidityManagerError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
