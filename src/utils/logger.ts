import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { cfg } from '../config/index.js';
import { extractErrorDetails } from '../errors/base.js';

/**
 * Logger configuration and setup for keyed-tree
 *
 * Features:
 * - Environment-aware configuration (development vs production)
 * - Pretty-printed output in development
 * - JSON output in production for log aggregation
 */

/**
 * Create logger options based on environment and configuration
 */
function createLoggerOptions(): LoggerOptions {
  const isDevelopment = cfg.NODE_ENV === 'development';
  const isTest = cfg.NODE_ENV === 'test';

  const baseOptions: LoggerOptions = {
    level: cfg.LOG_LEVEL,
    base: {
      pid: process.pid,
      hostname: process.env.HOSTNAME || 'unknown',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  // Test environment: minimal output
  if (isTest) {
    return {
      ...baseOptions,
      level: 'warn',
    };
  }

  // Development environment: pretty printing on stderr
  if (isDevelopment) {
    return {
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'yyyy-mm-dd HH:MM:ss',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    };
  }

  return baseOptions;
}

/**
 * Main library logger instance
 */
export const logger: Logger = pino(createLoggerOptions());

/**
 * Create a child logger with additional context
 *
 * @example
 * ```typescript
 * const treeLogger = createLogger({ module: 'tree', tree: 'sidebar' });
 * treeLogger.debug('Subtree attached');
 * ```
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Create a module-specific logger
 */
export function createModuleLogger(moduleName: string): Logger {
  return createLogger({ module: moduleName });
}

/**
 * Error logging utility with stack trace handling
 *
 * @example
 * ```typescript
 * try {
 *   root.elementAt('menu.missing');
 * } catch (error) {
 *   logError(log, error, { path: 'menu.missing' });
 *   throw error;
 * }
 * ```
 */
export function logError(
  logger: Logger,
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  if (typeof error === 'string') {
    logger.error(context, error);
    return;
  }

  const details = extractErrorDetails(error);
  logger.error(
    {
      ...context,
      error: details,
    },
    details.message
  );
}
