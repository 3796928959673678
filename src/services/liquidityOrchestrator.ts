import invariant from "tiny-invariant";
import { Address, hexToBigInt, isAddressEqual, padHex, zeroAddress } from "viem";
import {
  buildCollectAllParams,
  buildIncreaseParams,
  buildMintParams,
  buildRemoveAllParams,
  isBurnable,
  validatePositionParams,
} from "../execution";
import {
  AddLiquidityOutcome,
  AddLiquidityParams,
  AddLiquidityState,
  ClosePositionState,
  GasOptions,
  IncreaseLiquidityRequest,
  IncreaseLiquidityState,
  ManagerConfig,
  TokenRequirement,
  TransactionReceipt,
  WorkflowResult,
} from "../types";
import {
  BurnPreconditionError,
  InsufficientBalanceError,
  LiquidityManagerError,
  toError,
} from "../utils/errors";
import { Logger, getLogger } from "../utils/Logger";
import { computeRange, getAmountsForNotional, sqrtPriceX96ToPrice } from "../utils/tickMath";
import { sortTokens } from "../utils/tokenHelper";
import { WorkflowLogger } from "../utils/workflowLogger";
import { BalanceOracle } from "./balanceOracle";
import { IContractGateway, TRANSFER_EVENT_TOPIC } from "./contractGateway";
import { ITransactionExecutor } from "./transactionExecutor";

export type OrchestratorConfig = Pick<
  ManagerConfig,
  "maxSlippagePercent" | "gasPriceMultiplier" | "deadlineSeconds"
>;

export type AddLiquidityResult = WorkflowResult<AddLiquidityState, AddLiquidityOutcome>;
export type ClosePositionResult = WorkflowResult<ClosePositionState, { tokenId: bigint }>;
export type IncreaseLiquidityResult = WorkflowResult<
  IncreaseLiquidityState,
  { tokenId: bigint; amount0: bigint; amount1: bigint }
>;

const ZERO_TOPIC = padHex(zeroAddress, { size: 32 });

/**
 * Token ID of the position minted in `receipt`: the Transfer log emitted by
 * the position manager from the zero address.
 */
export function extractMintedTokenId(
  receipt: TransactionReceipt,
  positionManager: Address
): bigint | undefined {
  for (const log of receipt.logs) {
    const [signature, from, , tokenId] = log.topics;
    if (
      isAddressEqual(log.address, positionManager) &&
      signature === TRANSFER_EVENT_TOPIC &&
      from === ZERO_TOPIC &&
      tokenId !== undefined
    ) {
      return hexToBigInt(tokenId);
    }
  }
  return undefined;
}

/**
 * Multi-step liquidity workflows. Each step waits for its receipt before the
 * next one is built; a failure halts the workflow and reports the last state
 * reached. Nothing is retried.
 */
export class LiquidityOrchestrator {
  constructor(
    private readonly gateway: IContractGateway,
    private readonly balances: BalanceOracle,
    private readonly executor: ITransactionExecutor,
    private readonly config: OrchestratorConfig,
    private readonly logger: Logger = getLogger(module)
  ) {
    invariant(
      config.maxSlippagePercent >= 0 && config.maxSlippagePercent <= 100,
      "maxSlippagePercent must be within [0, 100]"
    );
  }

  /**
   * Open a new position worth `notional` units of `notionalToken`, ranged
   * around the live pool price by the given factors.
   */
  async addLiquidity(params: AddLiquidityParams): Promise<AddLiquidityResult> {
    const wlog = new WorkflowLogger(this.logger, "addLiquidity");
    const receipts: TransactionReceipt[] = [];
    const gas = this.gasOptions(params.gasPriceMultiplier);
    const slippagePercent = params.maxSlippagePercent ?? this.config.maxSlippagePercent;
    let state: AddLiquidityState | null = null;

    try {
      wlog.beginStep(AddLiquidityState.PRICE_DISCOVERED, "read pool price and token decimals");
      const [token0, token1] = sortTokens(params.tokenA, params.tokenB);
      const notionalInToken0 = isAddressEqual(params.notionalToken, token0);
      if (!notionalInToken0 && !isAddressEqual(params.notionalToken, token1)) {
        throw new LiquidityManagerError(
          `Notional token ${params.notionalToken} is not one of the pool tokens`,
          { token: params.notionalToken, step: "addLiquidity" }
        );
      }

      const poolAddress = await this.gateway.getPool(token0, token1, params.fee);
      const [slot0, decimals0, decimals1] = await Promise.all([
        this.gateway.getSlot0(poolAddress),
        this.balances.decimalsOf(token0),
        this.balances.decimalsOf(token1),
      ]);
      const currentPrice = sqrtPriceX96ToPrice(slot0.sqrtPriceX96, decimals0, decimals1);
      wlog.info(
        `Pool ${poolAddress}: tick ${slot0.tick}, price ${currentPrice.toSignificantDigits(8)} token1/token0`
      );
      state = AddLiquidityState.PRICE_DISCOVERED;
      wlog.endStep();

      wlog.beginStep(AddLiquidityState.RANGE_COMPUTED);
      const [tickLower, tickUpper] = computeRange(
        currentPrice,
        params.priceRange,
        decimals0,
        decimals1,
        params.fee
      );
      const { amount0, amount1 } = getAmountsForNotional({
        sqrtPriceX96: slot0.sqrtPriceX96,
        tickLower,
        tickUpper,
        notional: params.notional,
        notionalInToken0,
        decimals0,
        decimals1,
      });
      wlog.info(`Range [${tickLower}, ${tickUpper}], amounts ${amount0}/${amount1}`);
      state = AddLiquidityState.RANGE_COMPUTED;
      wlog.endStep();

      wlog.beginStep(AddLiquidityState.BALANCE_VERIFIED);
      const requirements: TokenRequirement[] = [
        { token: token0, amount: amount0 },
        { token: token1, amount: amount1 },
      ];
      await this.verifyBalances(requirements);
      state = AddLiquidityState.BALANCE_VERIFIED;
      wlog.endStep();

      wlog.beginStep(AddLiquidityState.APPROVED);
      await this.approveShortfalls(requirements, gas, wlog, receipts);
      state = AddLiquidityState.APPROVED;
      wlog.endStep();

      wlog.beginStep(AddLiquidityState.MINTED);
      const openParams = {
        token0,
        token1,
        fee: params.fee,
        tickLower,
        tickUpper,
        amount0,
        amount1,
        recipient: this.executor.address,
        deadline: await this.deadline(),
        slippagePercent,
      };
      const validation = validatePositionParams(openParams);
      if (!validation.isValid) {
        throw new LiquidityManagerError(validation.error ?? "Invalid position parameters", {
          step: "mint",
        });
      }
      const mintIntent = await this.gateway.buildMint(buildMintParams(openParams), gas);
      const mintReceipt = await this.executor.execute(mintIntent, "mint");
      receipts.push(mintReceipt);

      const tokenId = extractMintedTokenId(mintReceipt, this.gateway.positionManagerAddress);
      if (tokenId === undefined) {
        wlog.warn(`No mint Transfer log in ${mintReceipt.transactionHash}`);
      } else {
        wlog.info(`Minted position ${tokenId}`);
      }
      state = AddLiquidityState.MINTED;
      wlog.endStep();

      return {
        success: true,
        state,
        receipts,
        tokenId,
        tickLower,
        tickUpper,
        amount0,
        amount1,
      };
    } catch (error) {
      const err = toError(error);
      wlog.halted(state, err);
      return { success: false, state, error: err, receipts };
    }
  }

  /**
   * Withdraw all liquidity, collect everything owed and burn the NFT.
   */
  async closePosition(
    tokenId: bigint,
    options: GasOptions = {}
  ): Promise<ClosePositionResult> {
    const wlog = new WorkflowLogger(this.logger, `closePosition #${tokenId}`);
    const receipts: TransactionReceipt[] = [];
    const gas = this.gasOptions(options.gasPriceMultiplier);
    let state: ClosePositionState | null = null;

    try {
      wlog.beginStep(ClosePositionState.LIQUIDITY_QUERIED);
      const position = await this.gateway.getPosition(tokenId);
      wlog.info(
        `Liquidity ${position.liquidity}, owed ${position.tokensOwed0}/${position.tokensOwed1}`
      );
      state = ClosePositionState.LIQUIDITY_QUERIED;
      wlog.endStep();

      if (position.liquidity > 0n) {
        wlog.beginStep(ClosePositionState.LIQUIDITY_DECREASED);
        const intent = await this.gateway.buildDecreaseLiquidity(
          buildRemoveAllParams(position, await this.deadline()),
          gas
        );
        receipts.push(await this.executor.execute(intent, "decreaseLiquidity"));
        state = ClosePositionState.LIQUIDITY_DECREASED;
        wlog.endStep();
      } else {
        wlog.info("No liquidity to remove; skipping decreaseLiquidity");
      }

      wlog.beginStep(ClosePositionState.FEES_COLLECTED);
      const collectIntent = await this.gateway.buildCollect(
        buildCollectAllParams(tokenId, this.executor.address),
        gas
      );
      receipts.push(await this.executor.execute(collectIntent, "collect"));
      state = ClosePositionState.FEES_COLLECTED;
      wlog.endStep();

      wlog.beginStep(ClosePositionState.BURNED);
      const drained = await this.gateway.getPosition(tokenId);
      if (!isBurnable(drained)) {
        throw new BurnPreconditionError(
          tokenId,
          drained.liquidity,
          drained.tokensOwed0,
          drained.tokensOwed1
        );
      }
      const burnIntent = await this.gateway.buildBurn(tokenId, gas);
      receipts.push(await this.executor.execute(burnIntent, "burn"));
      state = ClosePositionState.BURNED;
      wlog.endStep();

      return { success: true, state, receipts, tokenId };
    } catch (error) {
      const err = toError(error);
      wlog.halted(state, err);
      return { success: false, state, error: err, receipts };
    }
  }

  /**
   * Add the given raw amounts to an existing position
   */
  async increaseLiquidity(
    request: IncreaseLiquidityRequest
  ): Promise<IncreaseLiquidityResult> {
    const { tokenId, amount0Desired, amount1Desired } = request;
    const wlog = new WorkflowLogger(this.logger, `increaseLiquidity #${tokenId}`);
    const receipts: TransactionReceipt[] = [];
    const gas = this.gasOptions(request.gasPriceMultiplier);
    const slippagePercent = request.maxSlippagePercent ?? this.config.maxSlippagePercent;
    let state: IncreaseLiquidityState | null = null;

    try {
      if (amount0Desired <= 0n && amount1Desired <= 0n) {
        throw new LiquidityManagerError("At least one token amount must be non-zero", {
          tokenId,
          step: "increaseLiquidity",
        });
      }

      wlog.beginStep(IncreaseLiquidityState.LIQUIDITY_QUERIED);
      const position = await this.gateway.getPosition(tokenId);
      wlog.info(
        `Pair ${position.token0}/${position.token1}, liquidity ${position.liquidity}`
      );
      state = IncreaseLiquidityState.LIQUIDITY_QUERIED;
      wlog.endStep();

      wlog.beginStep(IncreaseLiquidityState.BALANCE_VERIFIED);
      const requirements: TokenRequirement[] = [
        { token: position.token0, amount: amount0Desired },
        { token: position.token1, amount: amount1Desired },
      ];
      await this.verifyBalances(requirements);
      state = IncreaseLiquidityState.BALANCE_VERIFIED;
      wlog.endStep();

      wlog.beginStep(IncreaseLiquidityState.APPROVED);
      await this.approveShortfalls(requirements, gas, wlog, receipts);
      state = IncreaseLiquidityState.APPROVED;
      wlog.endStep();

      wlog.beginStep(IncreaseLiquidityState.LIQUIDITY_INCREASED);
      const intent = await this.gateway.buildIncreaseLiquidity(
        buildIncreaseParams(
          tokenId,
          amount0Desired,
          amount1Desired,
          slippagePercent,
          await this.deadline()
        ),
        gas
      );
      receipts.push(await this.executor.execute(intent, "increaseLiquidity"));
      state = IncreaseLiquidityState.LIQUIDITY_INCREASED;
      wlog.endStep();

      return {
        success: true,
        state,
        receipts,
        tokenId,
        amount0: amount0Desired,
        amount1: amount1Desired,
      };
    } catch (error) {
      const err = toError(error);
      wlog.halted(state, err);
      return { success: false, state, error: err, receipts };
    }
  }

  private async verifyBalances(requirements: TokenRequirement[]): Promise<void> {
    const owner = this.executor.address;
    for (const { token, amount } of requirements) {
      if (amount === 0n) {
        continue;
      }
      const available = await this.balances.rawBalanceOf(owner, token);
      if (available < amount) {
        throw new InsufficientBalanceError(token, amount, available);
      }
    }
  }

  /**
   * Approve the position manager for exactly the required amount of each
   * token whose current allowance falls short. Each confirmed approval is
   * appended to `receipts` as it lands.
   */
  private async approveShortfalls(
    requirements: TokenRequirement[],
    gas: GasOptions,
    wlog: WorkflowLogger,
    receipts: TransactionReceipt[]
  ): Promise<void> {
    const owner = this.executor.address;
    const spender = this.gateway.positionManagerAddress;

    for (const { token, amount } of requirements) {
      if (amount === 0n) {
        continue;
      }
      const allowance = await this.gateway.getAllowance(owner, spender, token);
      if (allowance >= amount) {
        wlog.info(`Allowance for ${token} sufficient (${allowance})`);
        continue;
      }
      const intent = await this.gateway.buildApprove(token, spender, amount, gas);
      receipts.push(await this.executor.execute(intent, `approve ${token}`));
    }
  }

  private async deadline(): Promise<bigint> {
    const now = await this.gateway.getBlockTimestamp();
    return now + BigInt(this.config.deadlineSeconds);
  }

  private gasOptions(override?: number): GasOptions {
    return { gasPriceMultiplier: override ?? this.config.gasPriceMultiplier };
  }
}
