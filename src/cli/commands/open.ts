import { Command } from 'commander';
import { Address } from 'viem';
import { loadConfig, validateConfig } from '../../config';
import { FeeTier } from '../../types';
import { getLogger } from '../../utils/Logger';
import { createWriteContext } from '../context';
import {
  parseAddress,
  parseFeeTier,
  parsePercent,
  parsePositiveNumber,
} from '../parsers';
import { reportWorkflow } from '../report';

const logger = getLogger(module);

interface OpenOptions {
  notionalToken?: Address;
  lower: number;
  upper: number;
  slippage?: number;
  gasMultiplier?: number;
}

/**
 * open <tokenA> <tokenB> <fee> <notional> [--notional-token <addr>] [--lower 0.95] [--upper 1.05]
 */
export const openCommand = new Command('open')
  .description('Mint a new position around the current pool price')
  .argument('<tokenA>', 'First pool token', parseAddress)
  .argument('<tokenB>', 'Second pool token', parseAddress)
  .argument('<fee>', 'Fee tier (100, 500, 3000, 10000)', parseFeeTier)
  .argument('<notional>', 'Position value in whole units of the notional token', parsePositiveNumber)
  .option('--notional-token <address>', 'Token the notional is expressed in (default tokenA)', parseAddress)
  .option('--lower <factor>', 'Lower bound as a factor of the current price', parsePositiveNumber, 0.95)
  .option('--upper <factor>', 'Upper bound as a factor of the current price', parsePositiveNumber, 1.05)
  .option('--slippage <percent>', 'Max slippage percent (default MAX_SLIPPAGE_PERCENT)', parsePercent)
  .option('--gas-multiplier <factor>', 'Gas price multiplier for this run', parsePositiveNumber)
  .action(
    async (tokenA: Address, tokenB: Address, fee: FeeTier, notional: number, options: OpenOptions) => {
      const config = loadConfig({ requirePrivateKey: true });
      validateConfig(config);
      const { orchestrator, signer } = createWriteContext(config);

      const result = await orchestrator.addLiquidity({
        tokenA,
        tokenB,
        fee,
        notional,
        notionalToken: options.notionalToken ?? tokenA,
        priceRange: { lowerFactor: options.lower, upperFactor: options.upper },
        maxSlippagePercent: options.slippage,
        gasPriceMultiplier: options.gasMultiplier,
      });

      if (result.success) {
        logger.info(
          `Position ${result.tokenId ?? '(unknown id)'} over [${result.tickLower}, ${result.tickUpper}] ` +
            `with ${result.amount0}/${result.amount1}`
        );
      }
      reportWorkflow(logger, 'addLiquidity', result, {
        tokenId: result.success ? result.tokenId : undefined,
        address: signer.address,
      });
    }
  );
