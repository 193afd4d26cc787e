// src/utils/log-config-loader.ts
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig } from '../types/config.types';
import { Logger } from './logger';

/**
 * Load logging configuration from config/log-config.json in the working directory.
 * Falls back to the given configuration when the file is missing or unreadable.
 */
export function loadLoggingConfig(fallbackConfig?: LoggingConfig): LoggingConfig | undefined {
  const logConfigPath = path.join(process.cwd(), 'config', 'log-config.json');

  try {
    if (fs.existsSync(logConfigPath)) {
      const logConfig: LoggingConfig = JSON.parse(fs.readFileSync(logConfigPath, 'utf-8'));
      return logConfig;
    }
  } catch (error) {
    console.warn(`Failed to load log-config.json: ${error}`);
  }

  return fallbackConfig;
}

/**
 * Initialize the shared logger; call at the start of every CLI command
 */
export function initializeLogger(fallbackConfig?: LoggingConfig): void {
  const loggingConfig = loadLoggingConfig(fallbackConfig);

  if (loggingConfig) {
    Logger.initialize(loggingConfig);
    new Logger('LogConfigLoader').debug(
      `Initialized logger with profile: ${loggingConfig.profile || 'default'}`
    );
  }
}
