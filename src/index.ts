#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

// Initialize Sentry as early as possible for proper error tracking
import { initSentry, captureException, flushSentry } from './utils/sentry';
initSentry();

import { Command } from 'commander';
import {
  closeCommand,
  increaseCommand,
  openCommand,
  positionsCommand,
  priceCommand,
  walletCommand,
} from './cli/commands';
import { LiquidityManagerError, toError } from './utils/errors';
import { getLogger } from './utils/Logger';

const logger = getLogger(module);

const program = new Command();

program
  .name('clmm')
  .description('Concentrated-liquidity position manager for Uniswap V3 style pools')
  .version('1.0.0');

program.addCommand(walletCommand);
program.addCommand(positionsCommand);
program.addCommand(openCommand);
program.addCommand(increaseCommand);
program.addCommand(closeCommand);
program.addCommand(priceCommand);

program.addHelpText('after', `

Examples:
  $ clmm wallet --token 0x2791...4174             Wallet and token balances
  $ clmm positions --active                       Positions holding liquidity
  $ clmm open 0xA... 0xB... 3000 100              Mint a position worth 100 tokenA
  $ clmm close 12345                              Withdraw, collect and burn
  $ clmm price 0x2791...4174 --network polygon    USD price of a token
`);

async function shutdown(signal: string): Promise<void> {
  logger.warn(`Received ${signal}; a transaction already sent may still confirm`);
  await flushSentry();
  process.exit(1);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    const err = toError(error);
    logger.error(`Fatal: ${err.message}`);
    if (!(err instanceof LiquidityManagerError)) {
      captureException(err);
    }
    process.exitCode = 1;
  } finally {
    await flushSentry();
  }
}

void main();
