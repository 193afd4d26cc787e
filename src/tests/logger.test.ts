// src/tests/logger.test.ts
import { ConfigurableLogger } from '../utils/configurable-logger';
import logger, { Logger } from '../utils/logger';
import { LoggingProfile } from '../types/config.types';

describe('Logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix messages with the context', () => {
    const info = jest.spyOn(logger, 'info');
    new Logger('ColorRunParser').info('Parsed 3 turns');
    expect(info).toHaveBeenCalledWith('[ColorRunParser] Parsed 3 turns');
  });

  it('should append the error message to error logs', () => {
    const error = jest.spyOn(logger, 'error');
    new Logger('DiscussionConverter').error('Aborting batch', new Error('bad color'));
    expect(error).toHaveBeenCalledWith('[DiscussionConverter] Aborting batch: bad color');
  });
});

describe('ConfigurableLogger', () => {
  const timestamped: LoggingProfile = {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should add a timestamp to log file names when the profile asks for it', () => {
    const now = new Date(2025, 6, 9, 14, 15, 22);
    expect(ConfigurableLogger.generateLogFilename('combined.log', timestamped, now))
      .toBe('combined-2025-07-09-141522.log');
    expect(ConfigurableLogger.generateLogFilename('combined.log', { ...timestamped, appendTimestamp: false }, now))
      .toBe('combined.log');
  });

  it('should resolve named and inline profiles', () => {
    expect(ConfigurableLogger.resolveConfig({ profile: 'Default' }).appendTimestamp).toBe(false);
    expect(ConfigurableLogger.resolveConfig({ appendTimestamp: false, logLevel: 'debug' })).toEqual({
      appendTimestamp: false,
      timestampFormat: 'YYYY-MM-DD-HHmmss',
      logLevel: 'debug',
      enableWarningLog: true,
      logDirectory: 'logs'
    });
    expect(ConfigurableLogger.resolveConfig({ profile: 'Quiet', profiles: { Quiet: { ...timestamped, logLevel: 'error' } } }).logLevel)
      .toBe('error');
  });

  it('should fall back to timestamped files for an unknown profile', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(ConfigurableLogger.resolveConfig({ profile: 'Missing' })).toEqual(timestamped);
    expect(warn).toHaveBeenCalledWith("Logging profile 'Missing' not found, using AppendDatetime");
  });
});
