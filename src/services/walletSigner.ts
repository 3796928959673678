import { Address, Hex } from "viem";
import { PrivateKeyAccount, privateKeyToAccount } from "viem/accounts";
import { SignableTransaction, TransactionSigner } from "../types";
import { ConfigError } from "../utils/errors";
import { Logger, getLogger } from "../utils/Logger";

const PRIVATE_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;

/**
 * Local-key signer. The private key never leaves this object.
 */
export class WalletSigner implements TransactionSigner {
  private readonly account: PrivateKeyAccount;

  constructor(privateKey: Hex, logger: Logger = getLogger(module)) {
    if (!PRIVATE_KEY_PATTERN.test(privateKey)) {
      throw new ConfigError("Invalid private key format: must be 0x-prefixed 64 hex chars");
    }
    this.account = privateKeyToAccount(privateKey);
    logger.info(`Wallet address: ${this.account.address}`);
  }

  get address(): Address {
    return this.account.address;
  }

  sign(tx: SignableTransaction): Promise<Hex> {
    return this.account.signTransaction({
      type: "legacy",
      chainId: tx.chainId,
      to: tx.to,
      data: tx.data,
      value: tx.value,
      gas: tx.gas,
      gasPrice: tx.gasPrice,
      nonce: tx.nonce,
    });
  }
}
