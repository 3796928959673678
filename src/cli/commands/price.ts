import { Command } from 'commander';
import { Address } from 'viem';
import { loadConfig } from '../../config';
import { AxiosProviderConnector } from '../../entities/connector';
import { CoinGeckoPriceProvider } from '../../entities/pricing';
import { getLogger } from '../../utils/Logger';
import { parseAddress } from '../parsers';

const logger = getLogger(module);

/**
 * price <token> [--network <name>]
 */
export const priceCommand = new Command('price')
  .description('Look up the USD price of a token')
  .argument('<token>', 'Token address', parseAddress)
  .option('-n, --network <name>', 'Network the token lives on (default NETWORK)')
  .action(async (token: Address, options: { network?: string }) => {
    const network = options.network ?? loadConfig().network;
    const provider = new CoinGeckoPriceProvider(new AxiosProviderConnector());

    const price = await provider.priceUSD(network, token);
    if (price === null) {
      process.exitCode = 1;
      return;
    }
    logger.info(`${token} on ${network}: $${price}`);
  });
