import pino from 'pino';
import type { LoggerOptions } from 'pino';
import { extractErrorDetails } from '../errors/base.js';
import { type AppConfig, cfg } from './config.js';

/**
 * Logger configuration and setup for Canopy
 *
 * - Pretty-printed output in development
 * - JSON output in production
 * - Warnings and errors only under test
 */
export class LoggerFactory {
  private readonly appConfig: AppConfig;
  private readonly mainLogger: pino.Logger;

  constructor(appConfig: AppConfig) {
    this.appConfig = appConfig;
    this.mainLogger = pino(this.createLoggerOptions(), process.stderr);
  }

  private createLoggerOptions(): LoggerOptions {
    const isDevelopment = this.appConfig.NODE_ENV === 'development';
    const logLevel = this.appConfig.NODE_ENV === 'test' ? 'warn' : this.appConfig.LOG_LEVEL;

    const baseOptions: LoggerOptions = {
      level: logLevel,
      base: {
        pid: process.pid,
        hostname: process.env.HOSTNAME || 'unknown',
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    };

    if (isDevelopment) {
      return {
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
            singleLine: false,
            destination: 2, // stderr
          },
        },
      };
    }

    return baseOptions;
  }

  getLogger(): pino.Logger {
    return this.mainLogger;
  }

  /**
   * Create a module-specific logger
   *
   * @param moduleName - Name of the module/component
   */
  createModuleLogger(moduleName: string): pino.Logger {
    return this.mainLogger.child({ module: moduleName });
  }
}

const defaultFactory = new LoggerFactory(cfg);

/**
 * Main library logger. Always writes to stderr so stdout stays free for
 * whatever the host program prints (tree outlines included).
 */
export const logger = defaultFactory.getLogger();

export function createModuleLogger(moduleName: string): pino.Logger {
  return defaultFactory.createModuleLogger(moduleName);
}

/**
 * Log a failure with its module, operation and context when it is a library
 * error. Stack traces are kept for error level only.
 */
export function logError(
  logger: pino.Logger,
  error: unknown,
  context: Record<string, unknown> = {},
  level: pino.Level = 'error'
): void {
  const { stack, ...details } = extractErrorDetails(error);
  const errorInfo = level === 'error' || level === 'fatal' ? { ...details, stack } : details;

  logger[level]({ ...context, error: errorInfo }, details.message);
}

export default logger;
