import { Command } from 'commander';
import { loadConfig, validateConfig } from '../../config';
import { getLogger } from '../../utils/Logger';
import { createWriteContext } from '../context';
import { parseBigInt, parsePercent, parsePositiveNumber } from '../parsers';
import { reportWorkflow } from '../report';

const logger = getLogger(module);

interface IncreaseOptions {
  slippage?: number;
  gasMultiplier?: number;
}

/**
 * increase <tokenId> <amount0> <amount1>
 */
export const increaseCommand = new Command('increase')
  .description('Add raw token amounts to an existing position')
  .argument('<tokenId>', 'Position token ID', parseBigInt)
  .argument('<amount0>', 'Raw amount of token0', parseBigInt)
  .argument('<amount1>', 'Raw amount of token1', parseBigInt)
  .option('--slippage <percent>', 'Max slippage percent (default MAX_SLIPPAGE_PERCENT)', parsePercent)
  .option('--gas-multiplier <factor>', 'Gas price multiplier for this run', parsePositiveNumber)
  .action(async (tokenId: bigint, amount0: bigint, amount1: bigint, options: IncreaseOptions) => {
    const config = loadConfig({ requirePrivateKey: true });
    validateConfig(config);
    const { orchestrator, signer } = createWriteContext(config);

    const result = await orchestrator.increaseLiquidity({
      tokenId,
      amount0Desired: amount0,
      amount1Desired: amount1,
      maxSlippagePercent: options.slippage,
      gasPriceMultiplier: options.gasMultiplier,
    });
    reportWorkflow(logger, 'increaseLiquidity', result, { tokenId, address: signer.address });
  });
