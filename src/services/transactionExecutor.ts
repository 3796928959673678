import type { Address } from "viem";
import {
  RpcTransport,
  TransactionIntent,
  TransactionReceipt,
  TransactionSigner,
} from "../types";
import {
  TransactionRevertedError,
  UnconfirmedTransactionError,
} from "../utils/errors";
import { Logger, getLogger } from "../utils/Logger";
import { KeyedMutex } from "../utils/ParallelQueue";
import { TIMED_OUT, withTimeout } from "../utils/promiseWithResolver";

export interface ExecutorOptions {
  receiptTimeoutMs: number;
  receiptConfirmations: number;
}

export interface ITransactionExecutor {
  readonly address: Address;
  execute(intent: TransactionIntent, step: string): Promise<TransactionReceipt>;
}

// Shared across executors so two executors for one wallet never race on nonces
const walletLocks = new KeyedMutex();

/**
 * Sends one intent: fresh nonce → sign → send → wait for receipt.
 *
 * The whole sequence holds the wallet's lock, so concurrent workflows from
 * the same address are serialised. No step is retried.
 */
export class TransactionExecutor implements ITransactionExecutor {
  constructor(
    private readonly transport: RpcTransport,
    private readonly signer: TransactionSigner,
    private readonly options: ExecutorOptions,
    private readonly logger: Logger = getLogger(module),
    private readonly locks: KeyedMutex = walletLocks
  ) {}

  get address(): Address {
    return this.signer.address;
  }

  execute(intent: TransactionIntent, step: string): Promise<TransactionReceipt> {
    return this.locks.runExclusive(this.signer.address, () => this.send(intent, step));
  }

  private async send(intent: TransactionIntent, step: string): Promise<TransactionReceipt> {
    const nonce = await this.transport.getTransactionCount(this.signer.address);
    const signed = await this.signer.sign({ ...intent, nonce });
    const hash = await this.transport.sendRaw(signed);

    this.logger.info(
      `${step}: sent ${intent.method} to ${intent.to} (nonce ${nonce}), tx ${hash}`
    );

    const receipt = await withTimeout(
      this.transport.waitReceipt(hash, {
        confirmations: this.options.receiptConfirmations,
        timeoutMs: this.options.receiptTimeoutMs,
      }),
      this.options.receiptTimeoutMs
    ).catch((error: unknown): typeof TIMED_OUT => {
      // transport-side timeout: report it against this step
      if (error instanceof UnconfirmedTransactionError) {
        return TIMED_OUT;
      }
      throw error;
    });

    if (receipt === TIMED_OUT) {
      this.logger.warn(`${step}: tx ${hash} unconfirmed after ${this.options.receiptTimeoutMs}ms`);
      throw new UnconfirmedTransactionError(hash, step, this.options.receiptTimeoutMs);
    }

    if (receipt.status !== "success") {
      this.logger.error(`${step}: tx ${hash} reverted in block ${receipt.blockNumber}`);
      throw new TransactionRevertedError(hash, step, receipt.blockNumber);
    }

    this.logger.info(
      `${step}: tx ${hash} confirmed in block ${receipt.blockNumber} (gas used ${receipt.gasUsed})`
    );
    return receipt;
  }
}
