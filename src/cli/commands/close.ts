import { Command } from 'commander';
import { loadConfig, validateConfig } from '../../config';
import { getLogger } from '../../utils/Logger';
import { createWriteContext } from '../context';
import { parseBigInt, parsePositiveNumber } from '../parsers';
import { reportWorkflow } from '../report';

const logger = getLogger(module);

/**
 * close <tokenId> [--gas-multiplier <factor>]
 */
export const closeCommand = new Command('close')
  .description('Remove all liquidity, collect fees and burn a position')
  .argument('<tokenId>', 'Position token ID', parseBigInt)
  .option('--gas-multiplier <factor>', 'Gas price multiplier for this run', parsePositiveNumber)
  .action(async (tokenId: bigint, options: { gasMultiplier?: number }) => {
    const config = loadConfig({ requirePrivateKey: true });
    validateConfig(config);
    const { orchestrator, signer } = createWriteContext(config);

    const result = await orchestrator.closePosition(tokenId, {
      gasPriceMultiplier: options.gasMultiplier,
    });
    reportWorkflow(logger, 'closePosition', result, { tokenId, address: signer.address });
  });
