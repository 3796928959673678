import {
  Address,
  Hex,
  decodeFunctionResult,
  encodeFunctionData,
  keccak256,
  padHex,
  toBytes,
  zeroAddress,
} from "viem";
import {
  ERC20_ABI,
  FACTORY_ABI,
  POOL_ABI,
  POSITION_MANAGER_ABI,
} from "../abis";
import { GAS_LIMITS } from "../constants";
import {
  CollectParams,
  DecreaseLiquidityParams,
  GasOptions,
  IncreaseLiquidityParams,
  LogEntry,
  ManagerConfig,
  MintParams,
  Position,
  RpcTransport,
  Slot0,
  TransactionIntent,
  WriteMethod,
} from "../types";
import {
  ContractCallError,
  ErrorContext,
  LiquidityManagerError,
  PoolNotFoundError,
  PositionNotFoundError,
  toError,
} from "../utils/errors";
import { Logger, getLogger } from "../utils/Logger";
import { scaleAmount } from "../utils/tokenHelper";

export const TRANSFER_EVENT_TOPIC = keccak256(
  toBytes("Transfer(address,address,uint256)")
);

const INVALID_TOKEN_ID = /invalid token id/i;

export type GatewayConfig = Pick<
  ManagerConfig,
  "chainId" | "positionManagerAddress" | "factoryAddress" | "gasPriceMultiplier"
>;

/**
 * Typed reads over the position manager, factory, pool and ERC-20 contracts,
 * and builders for unsigned write intents.
 */
export interface IContractGateway {
  readonly positionManagerAddress: Address;

  getPosition(tokenId: bigint): Promise<Position>;
  getPool(tokenA: Address, tokenB: Address, fee: number): Promise<Address>;
  getSlot0(poolAddress: Address): Promise<Slot0>;
  getTokenDecimals(token: Address): Promise<number>;
  getTokenBalance(owner: Address, token: Address): Promise<bigint>;
  getAllowance(owner: Address, spender: Address, token: Address): Promise<bigint>;
  ownerOf(tokenId: bigint): Promise<Address>;
  getTransferLogs(recipient: Address): Promise<LogEntry[]>;
  getLatestBlock(): Promise<bigint>;
  getBlockTimestamp(): Promise<bigint>;
  getNativeBalance(owner: Address): Promise<bigint>;

  buildMint(params: MintParams, options?: GasOptions): Promise<TransactionIntent>;
  buildIncreaseLiquidity(
    params: IncreaseLiquidityParams,
    options?: GasOptions
  ): Promise<TransactionIntent>;
  buildDecreaseLiquidity(
    params: DecreaseLiquidityParams,
    options?: GasOptions
  ): Promise<TransactionIntent>;
  buildCollect(params: CollectParams, options?: GasOptions): Promise<TransactionIntent>;
  buildBurn(tokenId: bigint, options?: GasOptions): Promise<TransactionIntent>;
  buildApprove(
    token: Address,
    spender: Address,
    amount: bigint,
    options?: GasOptions
  ): Promise<TransactionIntent>;
}

export class ContractGateway implements IContractGateway {
  readonly positionManagerAddress: Address;
  private readonly factoryAddress: Address;

  constructor(
    private readonly transport: RpcTransport,
    private readonly config: GatewayConfig,
    private readonly logger: Logger = getLogger(module)
  ) {
    this.positionManagerAddress = config.positionManagerAddress;
    this.factoryAddress = config.factoryAddress;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async getPosition(tokenId: bigint): Promise<Position> {
    const data = encodeFunctionData({
      abi: POSITION_MANAGER_ABI,
      functionName: "positions",
      args: [tokenId],
    });

    let raw: Hex;
    try {
      raw = await this.read(
        { method: "positions", tokenId },
        () => this.transport.call(this.positionManagerAddress, data)
      );
    } catch (error) {
      if (error instanceof ContractCallError && INVALID_TOKEN_ID.test(error.message)) {
        throw new PositionNotFoundError(tokenId, error);
      }
      throw error;
    }

    const [
      nonce,
      operator,
      token0,
      token1,
      fee,
      tickLower,
      tickUpper,
      liquidity,
      ,
      ,
      tokensOwed0,
      tokensOwed1,
    ] = await this.read({ method: "positions", tokenId }, async () =>
      decodeFunctionResult({
        abi: POSITION_MANAGER_ABI,
        functionName: "positions",
        data: raw,
      })
    );

    return {
      tokenId,
      nonce,
      operator,
      token0,
      token1,
      fee,
      tickLower,
      tickUpper,
      liquidity,
      tokensOwed0,
      tokensOwed1,
    };
  }

  async getPool(tokenA: Address, tokenB: Address, fee: number): Promise<Address> {
    const data = encodeFunctionData({
      abi: FACTORY_ABI,
      functionName: "getPool",
      args: [tokenA, tokenB, fee],
    });
    const context = { method: "getPool", tokenA, tokenB, fee };

    const pool = await this.read(context, async () =>
      decodeFunctionResult({
        abi: FACTORY_ABI,
        functionName: "getPool",
        data: await this.transport.call(this.factoryAddress, data),
      })
    );

    if (pool === zeroAddress) {
      throw new PoolNotFoundError(tokenA, tokenB, fee);
    }
    return pool;
  }

  async getSlot0(poolAddress: Address): Promise<Slot0> {
    const data = encodeFunctionData({ abi: POOL_ABI, functionName: "slot0" });

    const [sqrtPriceX96, tick] = await this.read(
      { method: "slot0", pool: poolAddress },
      async () =>
        decodeFunctionResult({
          abi: POOL_ABI,
          functionName: "slot0",
          data: await this.transport.call(poolAddress, data),
        })
    );

    return { sqrtPriceX96, tick };
  }

  async getTokenDecimals(token: Address): Promise<number> {
    const data = encodeFunctionData({ abi: ERC20_ABI, functionName: "decimals" });

    return this.read({ method: "decimals", token }, async () =>
      decodeFunctionResult({
        abi: ERC20_ABI,
        functionName: "decimals",
        data: await this.transport.call(token, data),
      })
    );
  }

  async getTokenBalance(owner: Address, token: Address): Promise<bigint> {
    const data = encodeFunctionData({
      abi: ERC20_ABI,
      functionName: "balanceOf",
      args: [owner],
    });

    return this.read({ method: "balanceOf", owner, token }, async () =>
      decodeFunctionResult({
        abi: ERC20_ABI,
        functionName: "balanceOf",
        data: await this.transport.call(token, data),
      })
    );
  }

  async getAllowance(owner: Address, spender: Address, token: Address): Promise<bigint> {
    const data = encodeFunctionData({
      abi: ERC20_ABI,
      functionName: "allowance",
      args: [owner, spender],
    });

    return this.read({ method: "allowance", owner, spender, token }, async () =>
      decodeFunctionResult({
        abi: ERC20_ABI,
        functionName: "allowance",
        data: await this.transport.call(token, data),
      })
    );
  }

  async ownerOf(tokenId: bigint): Promise<Address> {
    const data = encodeFunctionData({
      abi: POSITION_MANAGER_ABI,
      functionName: "ownerOf",
      args: [tokenId],
    });

    return this.read({ method: "ownerOf", tokenId }, async () =>
      decodeFunctionResult({
        abi: POSITION_MANAGER_ABI,
        functionName: "ownerOf",
        data: await this.transport.call(this.positionManagerAddress, data),
      })
    );
  }

  /**
   * Transfer events of the position manager whose `to` topic is `recipient`,
   * from genesis to the latest block, in log order
   */
  async getTransferLogs(recipient: Address): Promise<LogEntry[]> {
    const toBlock = await this.getLatestBlock();
    const topics = [TRANSFER_EVENT_TOPIC, null, padHex(recipient, { size: 32 })];

    this.logger.debug(
      `Scanning Transfer logs to ${recipient} over blocks [0, ${toBlock}]`
    );

    return this.read({ method: "getLogs", recipient }, () =>
      this.transport.getLogs({
        address: this.positionManagerAddress,
        topics,
        fromBlock: 0n,
        toBlock,
      })
    );
  }

  getLatestBlock(): Promise<bigint> {
    return this.read({ method: "blockNumber" }, () => this.transport.getBlockNumber());
  }

  getBlockTimestamp(): Promise<bigint> {
    return this.read({ method: "blockTimestamp" }, () =>
      this.transport.getBlockTimestamp()
    );
  }

  getNativeBalance(owner: Address): Promise<bigint> {
    return this.read({ method: "getBalance", owner }, () =>
      this.transport.getBalance(owner)
    );
  }

  // ---------------------------------------------------------------------------
  // Write intents (never signed or sent here)
  // ---------------------------------------------------------------------------

  buildMint(params: MintParams, options?: GasOptions): Promise<TransactionIntent> {
    const data = encodeFunctionData({
      abi: POSITION_MANAGER_ABI,
      functionName: "mint",
      args: [params],
    });
    return this.buildIntent(this.positionManagerAddress, "mint", [params], data, options);
  }

  buildIncreaseLiquidity(
    params: IncreaseLiquidityParams,
    options?: GasOptions
  ): Promise<TransactionIntent> {
    const data = encodeFunctionData({
      abi: POSITION_MANAGER_ABI,
      functionName: "increaseLiquidity",
      args: [params],
    });
    return this.buildIntent(
      this.positionManagerAddress,
      "increaseLiquidity",
      [params],
      data,
      options
    );
  }

  buildDecreaseLiquidity(
    params: DecreaseLiquidityParams,
    options?: GasOptions
  ): Promise<TransactionIntent> {
    const data = encodeFunctionData({
      abi: POSITION_MANAGER_ABI,
      functionName: "decreaseLiquidity",
      args: [params],
    });
    return this.buildIntent(
      this.positionManagerAddress,
      "decreaseLiquidity",
      [params],
      data,
      options
    );
  }

  buildCollect(params: CollectParams, options?: GasOptions): Promise<TransactionIntent> {
    const data = encodeFunctionData({
      abi: POSITION_MANAGER_ABI,
      functionName: "collect",
      args: [params],
    });
    return this.buildIntent(this.positionManagerAddress, "collect", [params], data, options);
  }

  buildBurn(tokenId: bigint, options?: GasOptions): Promise<TransactionIntent> {
    const data = encodeFunctionData({
      abi: POSITION_MANAGER_ABI,
      functionName: "burn",
      args: [tokenId],
    });
    return this.buildIntent(this.positionManagerAddress, "burn", [tokenId], data, options);
  }

  buildApprove(
    token: Address,
    spender: Address,
    amount: bigint,
    options?: GasOptions
  ): Promise<TransactionIntent> {
    const data = encodeFunctionData({
      abi: ERC20_ABI,
      functionName: "approve",
      args: [spender, amount],
    });
    return this.buildIntent(token, "approve", [spender, amount], data, options);
  }

  private async buildIntent(
    to: Address,
    method: WriteMethod,
    args: readonly unknown[],
    data: Hex,
    options?: GasOptions
  ): Promise<TransactionIntent> {
    const multiplier = options?.gasPriceMultiplier ?? this.config.gasPriceMultiplier;
    const liveGasPrice = await this.read({ method: "gasPrice", step: method }, () =>
      this.transport.getGasPrice()
    );

    return {
      to,
      method,
      args,
      data,
      value: 0n,
      gas: GAS_LIMITS[method],
      gasPrice: multiplier === 1 ? liveGasPrice : scaleAmount(liveGasPrice, multiplier),
      chainId: this.config.chainId,
    };
  }

  /**
   * Run a remote read, turning any transport or decoding failure into
   * ContractCallError carrying `context`
   */
  private async read<T>(context: ErrorContext, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof LiquidityManagerError) {
        throw error;
      }
      const cause = toError(error);
      throw new ContractCallError(
        `${String(context.method)} failed: ${cause.message}`,
        context,
        cause
      );
    }
  }
}
