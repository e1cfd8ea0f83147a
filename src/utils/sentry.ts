import * as Sentry from '@sentry/node';
import { logger } from './logger.js';

let sentryEnabled = false;

/**
 * Start error reporting when a DSN is configured
 * Called once configuration (and .env) has been loaded; returns whether reporting is on
 */
export function initSentry(env: NodeJS.ProcessEnv = process.env): boolean {
  const sentryDsn = env.SENTRY_DSN?.trim() || '';
  if (!sentryDsn || sentryEnabled) {
    return sentryEnabled;
  }

  Sentry.init({
    dsn: sentryDsn,
    environment: env.SENTRY_ENVIRONMENT || 'development',
    sampleRate: 1.0,
    tracesSampleRate: 0,
    release: env.SCRAPER_RELEASE || undefined,
    serverName: 'dev-directory-scraper',
  });
  sentryEnabled = true;

  logger.info('Sentry initialized for error tracking');
  return true;
}

// Manual error capture helper
export function captureError(error: Error, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

// Capture message helper (for non-error notifications such as an aborted run)
export function captureMessage(
  message: string,
  level: 'info' | 'warning' | 'error' = 'info',
  context?: Record<string, unknown>
): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    scope.setLevel(level);
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureMessage(message);
  });
}

// Breadcrumbs give captured errors the crawl position that led to them
export function addBreadcrumb(breadcrumb: {
  category?: string;
  message: string;
  level?: 'debug' | 'info' | 'warning' | 'error';
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;
  Sentry.addBreadcrumb(breadcrumb);
}

/**
 * Wait for queued events to be sent before the process exits
 */
export async function flushErrors(timeoutMs = 2000): Promise<void> {
  if (!sentryEnabled) return;
  await Sentry.flush(timeoutMs);
}
