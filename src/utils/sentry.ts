import * as Sentry from '@sentry/node';
import { getLogger } from './Logger';

const logger = getLogger(module);

export interface WorkflowContext {
  workflow?: string;
  tokenId?: bigint;
  address?: string;
  step?: string;
}

function toSentryContext(context: WorkflowContext): Record<string, string | undefined> {
  return {
    workflow: context.workflow,
    tokenId: context.tokenId?.toString(),
    address: context.address,
    step: context.step,
  };
}

/**
 * Initialize Sentry for error tracking. Without SENTRY_DSN reporting stays off.
 */
export function initSentry(env: Record<string, string | undefined> = process.env): boolean {
  const sentryDsn = env.SENTRY_DSN;

  if (!sentryDsn) {
    logger.debug('SENTRY_DSN not configured - Sentry error tracking disabled');
    return false;
  }

  let tracesSampleRate = 0;
  if (env.SENTRY_TRACES_SAMPLE_RATE) {
    const parsed = parseFloat(env.SENTRY_TRACES_SAMPLE_RATE);
    if (isNaN(parsed) || parsed < 0 || parsed > 1) {
      logger.warn(
        `Invalid SENTRY_TRACES_SAMPLE_RATE: ${env.SENTRY_TRACES_SAMPLE_RATE}. ` +
          `Must be between 0 and 1. Using default: ${tracesSampleRate}`
      );
    } else {
      tracesSampleRate = parsed;
    }
  }

  Sentry.init({
    dsn: sentryDsn,
    environment: env.NODE_ENV || 'production',
    tracesSampleRate,
    release: env.npm_package_version,
  });

  logger.info('Sentry initialized');
  return true;
}

/**
 * Record one completed workflow step, so a reported failure shows the path to it
 */
export function addSentryBreadcrumb(message: string, context: WorkflowContext): void {
  if (!Sentry.isEnabled()) {
    return;
  }

  Sentry.addBreadcrumb({
    message,
    category: 'workflow',
    level: 'info',
    data: toSentryContext(context),
  });
}

export function captureException(error: unknown, context?: WorkflowContext): void {
  if (!Sentry.isEnabled()) {
    return;
  }

  if (!context) {
    Sentry.captureException(error);
    return;
  }

  Sentry.withScope((scope) => {
    const sentryContext = toSentryContext(context);
    scope.setContext('workflow', sentryContext);
    for (const [key, value] of Object.entries(sentryContext)) {
      if (value !== undefined) {
        scope.setTag(key, value);
      }
    }
    Sentry.captureException(error);
  });
}

export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!Sentry.isEnabled()) {
    return true;
  }

  try {
    return await Sentry.flush(timeout);
  } catch (error) {
    logger.error('Failed to flush Sentry events', error);
    return false;
  }
}
