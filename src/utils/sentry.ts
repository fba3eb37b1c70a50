import * as Sentry from '@sentry/node';
import { getLogger } from './Logger';

const logger = getLogger(module);

/**
 * Context attached to events reported during a run
 */
export interface RunContext {
  inputFile?: string;
  stage?: string;
}

/**
 * Initialize Sentry for error tracking
 *
 * Should be called as early as possible in the application lifecycle.
 * Without SENTRY_DSN every function in this module is a no-op.
 */
export function initSentry(): void {
  const sentryDsn = process.env.SENTRY_DSN;

  if (!sentryDsn) {
    logger.debug('SENTRY_DSN not configured - Sentry error tracking disabled');
    return;
  }

  let tracesSampleRate = 0.1;
  if (process.env.SENTRY_TRACES_SAMPLE_RATE) {
    const parsed = parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE);
    if (isNaN(parsed) || parsed < 0 || parsed > 1) {
      logger.warn(
        `Invalid SENTRY_TRACES_SAMPLE_RATE: ${process.env.SENTRY_TRACES_SAMPLE_RATE}. ` +
        `Must be between 0 and 1. Using default: ${tracesSampleRate}`
      );
    } else {
      tracesSampleRate = parsed;
    }
  }

  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.NODE_ENV || 'production',
    tracesSampleRate,
    release: process.env.npm_package_version,
    beforeSend(event, hint) {
      logger.debug('Sending error to Sentry', {
        eventId: event.event_id,
        exception: hint.originalException,
      });
      return event;
    },
  });

  logger.info('Sentry initialized successfully');
}

/**
 * Add a breadcrumb for tracking the sequence of operations
 */
export function addSentryBreadcrumb(
  message: string,
  category: string,
  data?: Record<string, unknown>
): void {
  if (!Sentry.isInitialized()) {
    return;
  }

  Sentry.addBreadcrumb({
    message,
    category,
    level: 'info',
    data,
  });
}

/**
 * Capture an exception in Sentry
 */
export function captureException(error: unknown, context?: RunContext): void {
  if (!Sentry.isInitialized()) {
    return;
  }

  if (context) {
    Sentry.withScope((scope) => {
      scope.setContext('run', { ...context });
      if (context.inputFile) {
        scope.setTag('input_file', context.inputFile);
      }
      if (context.stage) {
        scope.setTag('stage', context.stage);
      }
      Sentry.captureException(error);
    });
  } else {
    Sentry.captureException(error);
  }
}

/**
 * Flush all pending Sentry events before shutting down
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!Sentry.isInitialized()) {
    return true;
  }

  try {
    return await Sentry.flush(timeout);
  } catch (error) {
    logger.error('Failed to flush Sentry events', error);
    return false;
  }
}
