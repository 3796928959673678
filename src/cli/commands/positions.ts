import { Command } from 'commander';
import { Address } from 'viem';
import { loadConfig, validateConfig } from '../../config';
import { Position } from '../../types';
import { ConfigError } from '../../utils/errors';
import { getLogger } from '../../utils/Logger';
import { WalletSigner } from '../../services/walletSigner';
import { tickToPrice } from '../../utils/tickMath';
import { shortAddress } from '../../utils/tokenHelper';
import { createReadContext } from '../context';
import { parseAddress } from '../parsers';

const logger = getLogger(module);

interface PositionsOptions {
  owner?: Address;
  active?: boolean;
  owned?: boolean;
}

/**
 * positions [--owner <addr>] [--active] [--owned]
 */
export const positionsCommand = new Command('positions')
  .description('List positions received by a wallet, with range status')
  .option('-o, --owner <address>', 'Wallet to scan (defaults to PRIVATE_KEY)', parseAddress)
  .option('--active', 'Only positions with liquidity')
  .option('--owned', 'Only positions the wallet still holds')
  .action(async (options: PositionsOptions) => {
    const config = loadConfig();
    validateConfig(config);
    const { registry, balances } = createReadContext(config);

    let owner = options.owner;
    if (!owner) {
      if (!config.privateKey) {
        throw new ConfigError('Pass --owner or set PRIVATE_KEY');
      }
      owner = new WalletSigner(config.privateKey).address;
    }

    let positions: Map<bigint, Position>;
    if (options.owned) {
      positions = await registry.getOwnedPositions(owner);
    } else if (options.active) {
      positions = await registry.getActivePositions(owner);
    } else {
      positions = await registry.getPositions(owner);
    }

    for (const position of positions.values()) {
      if (options.owned && options.active && position.liquidity === 0n) {
        continue;
      }
      const [{ status, inRange }, decimals0, decimals1] = await Promise.all([
        registry.classify(position),
        balances.decimalsOf(position.token0),
        balances.decimalsOf(position.token1),
      ]);
      const lower = tickToPrice(position.tickLower, decimals0, decimals1).toSignificantDigits(6);
      const upper = tickToPrice(position.tickUpper, decimals0, decimals1).toSignificantDigits(6);
      const rangeStatus = status === 'open' ? (inRange ? ' in range' : ' out of range') : '';

      logger.info(
        `#${position.tokenId} ${shortAddress(position.token0)}/${shortAddress(position.token1)} ` +
          `fee ${position.fee} ticks [${position.tickLower}, ${position.tickUpper}] ` +
          `price [${lower}, ${upper}] liquidity ${position.liquidity} ${status}${rangeStatus}`
      );
    }
    logger.info(`${positions.size} position(s)`);
  });
