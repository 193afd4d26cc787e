// src/types/config.types.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ErrorPolicy = 'skip' | 'abort';

export interface LoggingProfile {
  appendTimestamp: boolean;
  timestampFormat: string;
  logLevel: LogLevel;
  enableWarningLog: boolean;
  logDirectory: string;
}

export interface LoggingConfig {
  profile?: string;
  profiles?: { [name: string]: LoggingProfile };
  appendTimestamp?: boolean;
  timestampFormat?: string;
  logLevel?: LogLevel;
  enableWarningLog?: boolean;
  logDirectory?: string;
}

export interface ConverterConfig {
  inputDir: string;
  outputFile?: string;
  jsonlDir?: string;
  extension: string;
  // Color spec (RGB(r,g,b) or #rrggbb) -> speaker label
  labelMap: { [colorSpec: string]: string };
  errorPolicy: ErrorPolicy;
  sortFiles: boolean;
  forceOverwrite: boolean;
  logging?: LoggingConfig;
}
