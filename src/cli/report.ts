import { TransactionReceipt, WorkflowResult } from '../types';
import { LiquidityManagerError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { addSentryBreadcrumb, captureException } from '../utils/sentry';

/**
 * Log a workflow outcome. A halted workflow is reported to Sentry and sets
 * a non-zero exit code.
 */
export function reportWorkflow<S extends string>(
  logger: Logger,
  workflow: string,
  result: WorkflowResult<S>,
  context: { tokenId?: bigint; address?: string } = {}
): void {
  result.receipts.forEach((receipt: TransactionReceipt) => {
    logger.info(`  tx ${receipt.transactionHash} (block ${receipt.blockNumber})`);
    addSentryBreadcrumb(`${workflow}: ${receipt.transactionHash}`, { workflow, ...context });
  });

  if (result.success) {
    logger.info(`${workflow} completed in state ${result.state}`);
    return;
  }

  const { error } = result;
  const step =
    error instanceof LiquidityManagerError && typeof error.context.step === 'string'
      ? error.context.step
      : undefined;

  logger.error(
    `${workflow} failed after state ${result.state ?? '(none)'}${step ? ` during ${step}` : ''}: ${error.message}`
  );
  captureException(error, { workflow, step: step ?? result.state ?? undefined, ...context });
  process.exitCode = 1;
}
