// src/utils/logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigurableLogger, createLogger, fileLoggingEnabled, LogFilePaths } from './configurable-logger';
import { LoggingConfig } from '../types/config.types';

let loggingConfig: LoggingConfig | undefined;

if (process.env.LOGGING_CONFIG) {
  try {
    loggingConfig = JSON.parse(process.env.LOGGING_CONFIG);
  } catch (e) {
    console.warn(`Failed to parse LOGGING_CONFIG from environment: ${e}`);
  }
}

let logger: winston.Logger;

if (loggingConfig) {
  logger = createLogger(loggingConfig);
} else {
  logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss'
      }),
      winston.format.errors({ stack: true }),
      winston.format.simple()
    ),
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level, message, timestamp }) => {
            return `${timestamp} [${level}]: ${message}`;
          })
        )
      })
    ]
  });

  if (fileLoggingEnabled()) {
    const logsDir = path.join(process.cwd(), 'logs');
    try {
      fs.mkdirSync(logsDir, { recursive: true });
      logger.add(new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error'
      }));
      logger.add(new winston.transports.File({
        filename: path.join(logsDir, 'combined.log')
      }));
    } catch (error) {
      console.warn(`Could not create logs directory, using console only: ${error}`);
    }
  }
}

export default logger;
export { logger };

/**
 * Context-prefixed logging: new Logger('DiscussionConverter').info('...')
 * writes "[DiscussionConverter] ..." through the shared winston instance.
 */
export class Logger {
  private context: string;
  static globalConfig: LoggingConfig | undefined;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Swap the shared logger's transports for those of the given configuration.
   * Call this once at application startup.
   */
  static initialize(config: LoggingConfig): void {
    Logger.globalConfig = config;
    const configured = createLogger(config);

    logger.clear();
    configured.transports.forEach(transport => {
      logger.add(transport);
    });
    logger.level = configured.level;
    logger.format = configured.format;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.error(`[${this.context}] ${message}: ${detail}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export function getLogFilePaths(): LogFilePaths | null {
  if (!fileLoggingEnabled()) {
    return null;
  }
  if (Logger.globalConfig) {
    return ConfigurableLogger.getLogFilePaths();
  }
  const logsDir = path.join(process.cwd(), 'logs');
  return {
    combined: path.join(logsDir, 'combined.log'),
    error: path.join(logsDir, 'error.log')
  };
}
