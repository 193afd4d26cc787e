// src/utils/configurable-logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig, LoggingProfile } from '../types/config.types';

const DEFAULT_PROFILES: { [key: string]: LoggingProfile } = {
  Default: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  AppendDatetime: {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  }
};

export interface LogFilePaths {
  combined: string;
  error: string;
  warning?: string;
}

const lineFormat = winston.format.printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

export class ConfigurableLogger {
  private static profile: LoggingProfile = DEFAULT_PROFILES.AppendDatetime;
  private static startedAt: Date = new Date();

  /**
   * Build a winston logger for the given configuration
   */
  static initialize(config?: LoggingConfig): winston.Logger {
    const profile = this.resolveConfig(config);
    this.profile = profile;
    this.startedAt = new Date();

    const logger = winston.createLogger({
      level: profile.logLevel,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), lineFormat)
        })
      ]
    });

    const logsDir = path.join(process.cwd(), profile.logDirectory);
    if (fileLoggingEnabled() && ensureDirectory(logsDir)) {
      const files = this.getLogFilePaths();

      logger.add(new winston.transports.File({
        filename: files.combined,
        format: winston.format.combine(winston.format.timestamp(), lineFormat)
      }));

      logger.add(new winston.transports.File({
        filename: files.error,
        level: 'error',
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.printf(({ level, message, timestamp, stack }) => {
            return `${timestamp} [${level}]: ${message}${stack ? `\n${stack}` : ''}`;
          })
        )
      }));

      if (files.warning) {
        logger.add(new winston.transports.File({
          filename: files.warning,
          level: 'warn',
          format: winston.format.combine(winston.format.timestamp(), lineFormat)
        }));
      }
    }

    return logger;
  }

  /**
   * Resolve the effective logging profile: named profile, inline settings, or AppendDatetime
   */
  static resolveConfig(config?: LoggingConfig): LoggingProfile {
    if (!config) {
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.profile) {
      const profile = config.profiles?.[config.profile] ?? DEFAULT_PROFILES[config.profile];
      if (profile) {
        return profile;
      }
      console.warn(`Logging profile '${config.profile}' not found, using AppendDatetime`);
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.appendTimestamp !== undefined) {
      return {
        appendTimestamp: config.appendTimestamp,
        timestampFormat: config.timestampFormat || 'YYYY-MM-DD-HHmmss',
        logLevel: config.logLevel || 'info',
        enableWarningLog: config.enableWarningLog !== false,
        logDirectory: config.logDirectory || 'logs'
      };
    }

    return DEFAULT_PROFILES.AppendDatetime;
  }

  /**
   * Log file name for the active profile, e.g. combined-2025-07-09-141522.log
   */
  static generateLogFilename(baseName: string, profile: LoggingProfile, now: Date = this.startedAt): string {
    if (!profile.appendTimestamp) {
      return baseName;
    }

    let timestamp: string;
    if (profile.timestampFormat === 'YYYY-MM-DD-HHmmss') {
      const pad = (value: number) => String(value).padStart(2, '0');
      timestamp = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}-` +
        `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    } else {
      timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5);
    }

    const ext = path.extname(baseName);
    const name = path.basename(baseName, ext);
    return `${name}-${timestamp}${ext}`;
  }

  static getLogFilePaths(): LogFilePaths {
    const logsDir = path.join(process.cwd(), this.profile.logDirectory);
    const result: LogFilePaths = {
      combined: path.join(logsDir, this.generateLogFilename('combined.log', this.profile)),
      error: path.join(logsDir, this.generateLogFilename('error.log', this.profile))
    };

    if (this.profile.enableWarningLog) {
      result.warning = path.join(logsDir, this.generateLogFilename('warning.log', this.profile));
    }
    return result;
  }
}

// Jest runs keep logs on the console only
export function fileLoggingEnabled(): boolean {
  return process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false';
}

function ensureDirectory(dir: string): boolean {
  try {
    fs.mkdirSync(dir, { recursive: true });
    return true;
  } catch (error) {
    console.warn(`Could not create logs directory ${dir}, using console only: ${error}`);
    return false;
  }
}

export function createLogger(config?: LoggingConfig): winston.Logger {
  return ConfigurableLogger.initialize(config);
}
