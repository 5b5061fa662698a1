import * as Sentry from '@sentry/node';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamp?: boolean;
  /** Enable Sentry integration for breadcrumbs and error tracking */
  sentryEnabled?: boolean;
}

export interface SimpleLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface Logger extends SimpleLogger {
  debug(message: string, ...args: unknown[]): void;
  success(message: string, ...args: unknown[]): void;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
}

export function getLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const {
    level = parseLogLevel(process.env.LOG_LEVEL),
    prefix = namespace,
    timestamp = true,
    sentryEnabled = !!process.env.SENTRY_DSN, // Auto-enable if DSN is configured
  } = options;

  const logAtLevel = (messageLevel: LogLevel, message: string, ...args: unknown[]) => {
    if (levelPriority[messageLevel] < levelPriority[level]) {
      return;
    }

    const time = timestamp ? `[${new Date().toISOString()}] ` : '';
    const prefixStr = prefix ? `[${prefix}] ` : '';

    let logFn: (...data: unknown[]) => void;
    let colorFn: (text: string) => string;

    switch (messageLevel) {
      case 'debug':
        logFn = console.debug;
        colorFn = chalk.gray;
        break;
      case 'info':
        logFn = console.info;
        colorFn = chalk.blue;
        break;
      case 'warn':
        logFn = console.warn;
        colorFn = chalk.yellow;
        break;
      default:
        logFn = console.error;
        colorFn = chalk.red;
        break;
    }

    const formattedArgs = args.map(arg =>
      typeof arg === 'object' && !(arg instanceof Error) ? JSON.stringify(arg, null, 2) : arg
    );

    logFn(colorFn(`${time}${prefixStr}${message}`), ...formattedArgs);

    if (sentryEnabled) {
      recordSentryBreadcrumb(namespace, messageLevel, message, args);
    }
  };

  return {
    debug: (message, ...args) => logAtLevel('debug', message, ...args),
    info: (message, ...args) => logAtLevel('info', message, ...args),
    warn: (message, ...args) => logAtLevel('warn', message, ...args),
    error: (message, ...args) => logAtLevel('error', message, ...args),
    success: (message, ...args) => logAtLevel('info', message, ...args),
  };
}

function recordSentryBreadcrumb(namespace: string, messageLevel: LogLevel, message: string, args: unknown[]) {
  try {
    const breadcrumbData: Record<string, unknown> = { namespace };
    args.forEach((arg, idx) => {
      if (typeof arg === 'object' && arg !== null) {
        breadcrumbData[`data_${idx}`] = arg;
      } else {
        breadcrumbData[`arg_${idx}`] = arg;
      }
    });

    Sentry.addBreadcrumb({
      message: `[${namespace}] ${message}`,
      level: messageLevel === 'warn' ? 'warning' : messageLevel,
      category: namespace,
      data: breadcrumbData,
      timestamp: Date.now() / 1000,
    });

    // For errors, also capture as Sentry exception if it's an Error object
    if (messageLevel === 'error') {
      const potentialError = args.find((arg): arg is Error => arg instanceof Error);
      if (potentialError) {
        Sentry.captureException(potentialError, {
          contexts: {
            logger: {
              namespace,
              message,
              additionalData: args.filter(arg => !(arg instanceof Error)),
            },
          },
        });
      }
    }
  } catch (sentryError) {
    // Logging must keep working when Sentry does not
    console.debug('[Logger] Sentry integration error:', sentryError);
  }
}
