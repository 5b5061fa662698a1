import * as Sentry from '@sentry/node';

/**
 * Initializes Sentry for CLI runs when `SENTRY_DSN` is set.
 *
 * @param commandName - Tag identifying the CLI entry point
 * @returns true when Sentry was initialized
 */
export function initSentry(commandName: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const sentryDsn = env.SENTRY_DSN;
  if (!sentryDsn) {
    return false;
  }

  Sentry.init({
    dsn: sentryDsn,
    environment: env.NODE_ENV || 'unknown',
    tracesSampleRate: 0,
    attachStacktrace: true,
    release: env.SENTRY_RELEASE,
    initialScope: {
      tags: {
        command: commandName,
        runtime: 'cli',
      },
    },

    beforeSend(event, hint) {
      const error = hint.originalException;
      if (error && typeof error === 'object' && 'message' in error) {
        const message = String(error.message);

        // Unreachable service: still report, at lower severity
        if (message.includes('ECONNREFUSED') || message.includes('ENOTFOUND')) {
          event.level = 'warning';
        }
      }
      return event;
    },
  });

  return true;
}

/** Flushes pending events before the process exits. */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  await Sentry.close(timeoutMs);
}
