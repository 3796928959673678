import type { Address, Hash, Hex } from "viem";

export type FeeTier = 100 | 500 | 3000 | 10000;

export interface ManagerConfig {
  network: string;
  chainId: number;
  rpcUrl: string;
  priceOracleUrl: string;
  positionManagerAddress: Address;
  factoryAddress: Address;
  /** Only handed to the wallet signer; absent for read-only commands */
  privateKey?: Hex;
  maxSlippagePercent: number;
  gasPriceMultiplier: number;
  deadlineSeconds: number;
  receiptTimeoutMs: number;
  receiptConfirmations: number;
  readConcurrency: number;
}

export interface NetworkConfig {
  chainId: number;
  rpcUrl: string;
  /** Token-price endpoint for this chain */
  priceOracleUrl: string;
  positionManagerAddress: Address;
  factoryAddress: Address;
  nativeSymbol: string;
}

export interface Position {
  tokenId: bigint;
  nonce: bigint;
  operator: Address;
  token0: Address;
  token1: Address;
  fee: number;
  tickLower: number;
  tickUpper: number;
  liquidity: bigint;
  tokensOwed0: bigint;
  tokensOwed1: bigint;
}

export interface Slot0 {
  sqrtPriceX96: bigint;
  tick: number;
}

export interface PriceRange {
  lowerFactor: number | string;
  upperFactor: number | string;
}

export type PositionStatus = "open" | "closed";

export interface PositionClassification {
  status: PositionStatus;
  inRange: boolean;
}

export type WriteMethod =
  | "mint"
  | "increaseLiquidity"
  | "decreaseLiquidity"
  | "collect"
  | "burn"
  | "approve";

export interface TransactionIntent {
  to: Address;
  method: WriteMethod;
  args: readonly unknown[];
  data: Hex;
  value: bigint;
  gas: bigint;
  gasPrice: bigint;
  chainId: number;
  nonce?: number;
}

export type SignableTransaction = TransactionIntent & { nonce: number };

export interface LogFilter {
  address: Address;
  topics: (Hex | null)[];
  fromBlock: bigint;
  toBlock: bigint;
}

export interface LogEntry {
  address: Address;
  topics: Hex[];
  data: Hex;
  blockNumber: bigint;
  transactionHash: Hash;
  transactionIndex: number;
  logIndex: number;
}

export interface TransactionReceipt {
  transactionHash: Hash;
  blockNumber: bigint;
  status: "success" | "reverted";
  gasUsed: bigint;
  logs: LogEntry[];
}

export interface WaitReceiptOptions {
  confirmations: number;
  timeoutMs: number;
}

/**
 * Remote chain endpoint. Every read reflects the latest block at call time.
 */
export interface RpcTransport {
  call(to: Address, data: Hex): Promise<Hex>;
  sendRaw(signedTx: Hex): Promise<Hash>;
  waitReceipt(hash: Hash, options: WaitReceiptOptions): Promise<TransactionReceipt>;
  getLogs(filter: LogFilter): Promise<LogEntry[]>;
  getBlockNumber(): Promise<bigint>;
  getBlockTimestamp(): Promise<bigint>;
  getGasPrice(): Promise<bigint>;
  getTransactionCount(address: Address): Promise<number>;
  getBalance(address: Address): Promise<bigint>;
}

export interface TransactionSigner {
  readonly address: Address;
  sign(tx: SignableTransaction): Promise<Hex>;
}

export interface GasOptions {
  gasPriceMultiplier?: number;
}

export interface MintParams {
  token0: Address;
  token1: Address;
  fee: number;
  tickLower: number;
  tickUpper: number;
  amount0Desired: bigint;
  amount1Desired: bigint;
  amount0Min: bigint;
  amount1Min: bigint;
  recipient: Address;
  deadline: bigint;
}

export interface IncreaseLiquidityParams {
  tokenId: bigint;
  amount0Desired: bigint;
  amount1Desired: bigint;
  amount0Min: bigint;
  amount1Min: bigint;
  deadline: bigint;
}

export interface DecreaseLiquidityParams {
  tokenId: bigint;
  liquidity: bigint;
  amount0Min: bigint;
  amount1Min: bigint;
  deadline: bigint;
}

export interface CollectParams {
  tokenId: bigint;
  recipient: Address;
  amount0Max: bigint;
  amount1Max: bigint;
}

// Workflow states
export enum AddLiquidityState {
  PRICE_DISCOVERED = "PriceDiscovered",
  RANGE_COMPUTED = "RangeComputed",
  BALANCE_VERIFIED = "BalanceVerified",
  APPROVED = "Approved",
  MINTED = "Minted",
}

export enum ClosePositionState {
  LIQUIDITY_QUERIED = "LiquidityQueried",
  LIQUIDITY_DECREASED = "LiquidityDecreased",
  FEES_COLLECTED = "FeesCollected",
  BURNED = "Burned",
}

export enum IncreaseLiquidityState {
  LIQUIDITY_QUERIED = "LiquidityQueried",
  BALANCE_VERIFIED = "BalanceVerified",
  APPROVED = "Approved",
  LIQUIDITY_INCREASED = "LiquidityIncreased",
}

export type WorkflowResult<S, T extends object = object> =
  | ({ success: true; state: S; receipts: TransactionReceipt[] } & T)
  | {
      success: false;
      /** Last state reached before the failing step, null when none was */
      state: S | null;
      error: Error;
      receipts: TransactionReceipt[];
    };

export interface AddLiquidityParams {
  tokenA: Address;
  tokenB: Address;
  fee: number;
  /** Target value, in units of `notionalToken` */
  notional: number | string;
  notionalToken: Address;
  priceRange: PriceRange;
  maxSlippagePercent?: number;
  gasPriceMultiplier?: number;
}

export interface AddLiquidityOutcome {
  tokenId?: bigint;
  tickLower: number;
  tickUpper: number;
  amount0: bigint;
  amount1: bigint;
}

export interface IncreaseLiquidityRequest {
  tokenId: bigint;
  amount0Desired: bigint;
  amount1Desired: bigint;
  maxSlippagePercent?: number;
  gasPriceMultiplier?: number;
}

export interface TokenRequirement {
  token: Address;
  amount: bigint;
}
