import {
  Address,
  Hash,
  Hex,
  PublicClient,
  RpcLog,
  WaitForTransactionReceiptTimeoutError,
  createPublicClient,
  hexToBigInt,
  hexToNumber,
  http,
  numberToHex,
} from "viem";
import {
  LogEntry,
  LogFilter,
  RpcTransport,
  TransactionReceipt,
  WaitReceiptOptions,
} from "../types";
import { UnconfirmedTransactionError } from "../utils/errors";
import { Logger, getLogger } from "../utils/Logger";

/**
 * JSON-RPC transport backed by a viem public client.
 * Failures are thrown as-is; ContractGateway attaches call context.
 */
export class JsonRpcTransport implements RpcTransport {
  private readonly client: PublicClient;

  constructor(
    rpcUrl: string,
    private readonly logger: Logger = getLogger(module)
  ) {
    this.client = createPublicClient({ transport: http(rpcUrl) });
    this.logger.info(`RPC transport initialized with ${rpcUrl}`);
  }

  async call(to: Address, data: Hex): Promise<Hex> {
    const result = await this.client.call({ to, data });
    return result.data ?? "0x";
  }

  sendRaw(signedTx: Hex): Promise<Hash> {
    return this.client.sendRawTransaction({ serializedTransaction: signedTx });
  }

  async waitReceipt(
    hash: Hash,
    { confirmations, timeoutMs }: WaitReceiptOptions
  ): Promise<TransactionReceipt> {
    try {
      const receipt = await this.client.waitForTransactionReceipt({
        hash,
        confirmations,
        timeout: timeoutMs,
      });

      return {
        transactionHash: receipt.transactionHash,
        blockNumber: receipt.blockNumber,
        status: receipt.status,
        gasUsed: receipt.gasUsed,
        logs: receipt.logs.map((log) => ({
          address: log.address,
          topics: [...log.topics],
          data: log.data,
          blockNumber: log.blockNumber,
          transactionHash: log.transactionHash,
          transactionIndex: log.transactionIndex,
          logIndex: log.logIndex,
        })),
      };
    } catch (error) {
      if (error instanceof WaitForTransactionReceiptTimeoutError) {
        throw new UnconfirmedTransactionError(hash, "waitReceipt", timeoutMs);
      }
      throw error;
    }
  }

  async getLogs(filter: LogFilter): Promise<LogEntry[]> {
    const logs = await this.client.request({
      method: "eth_getLogs",
      params: [
        {
          address: filter.address,
          topics: filter.topics,
          fromBlock: numberToHex(filter.fromBlock),
          toBlock: numberToHex(filter.toBlock),
        },
      ],
    });

    const entries: LogEntry[] = [];
    for (const log of logs) {
      const entry = toLogEntry(log);
      if (entry) {
        entries.push(entry);
      } else {
        this.logger.debug("Skipping pending log without block data");
      }
    }
    return entries;
  }

  getBlockNumber(): Promise<bigint> {
    return this.client.getBlockNumber({ cacheTime: 0 });
  }

  async getBlockTimestamp(): Promise<bigint> {
    const block = await this.client.getBlock({ blockTag: "latest" });
    return block.timestamp;
  }

  getGasPrice(): Promise<bigint> {
    return this.client.getGasPrice();
  }

  getTransactionCount(address: Address): Promise<number> {
    return this.client.getTransactionCount({ address, blockTag: "pending" });
  }

  getBalance(address: Address): Promise<bigint> {
    return this.client.getBalance({ address });
  }
}

function toLogEntry(log: RpcLog): LogEntry | null {
  if (
    log.blockNumber === null ||
    log.transactionHash === null ||
    log.transactionIndex === null ||
    log.logIndex === null
  ) {
    return null;
  }
  return {
    address: log.address,
    topics: [...log.topics],
    data: log.data,
    blockNumber: hexToBigInt(log.blockNumber),
    transactionHash: log.transactionHash,
    transactionIndex: hexToNumber(log.transactionIndex),
    logIndex: hexToNumber(log.logIndex),
  };
}
