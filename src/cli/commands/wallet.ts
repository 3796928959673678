import { Command } from 'commander';
import { Address, formatEther } from 'viem';
import { loadConfig, validateConfig } from '../../config';
import { NETWORKS } from '../../config/networks';
import { ConfigError } from '../../utils/errors';
import { getLogger } from '../../utils/Logger';
import { WalletSigner } from '../../services/walletSigner';
import { createReadContext } from '../context';
import { parseAddress } from '../parsers';

const logger = getLogger(module);

interface WalletOptions {
  address?: Address;
  token: Address[];
}

function collectAddress(value: string, previous: Address[]): Address[] {
  return [...previous, parseAddress(value)];
}

/**
 * wallet [--address <addr>] [--token <addr>...]
 */
export const walletCommand = new Command('wallet')
  .description('Show the wallet address, native balance and token balances')
  .option('-a, --address <address>', 'Wallet to inspect (defaults to PRIVATE_KEY)', parseAddress)
  .option('-t, --token <address>', 'ERC-20 token to show (repeatable)', collectAddress, [])
  .action(async (options: WalletOptions) => {
    const config = loadConfig();
    validateConfig(config);
    const { gateway, balances } = createReadContext(config);

    let owner = options.address;
    if (!owner) {
      if (!config.privateKey) {
        throw new ConfigError('Pass --address or set PRIVATE_KEY');
      }
      owner = new WalletSigner(config.privateKey).address;
    }

    const native = await gateway.getNativeBalance(owner);
    const symbol = NETWORKS[config.network]?.nativeSymbol ?? 'native';
    logger.info(`Wallet ${owner} on ${config.network}`);
    logger.info(`  ${symbol}: ${formatEther(native)}`);

    for (const token of options.token) {
      const balance = await balances.balanceOf(owner, token);
      logger.info(`  ${token}: ${balance.toString()}`);
    }
  });
