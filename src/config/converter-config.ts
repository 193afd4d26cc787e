// src/config/converter-config.ts
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/TranscriptErrors';
import { ConverterConfig } from '../types/config.types';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const LoggingProfileSchema = z.object({
  appendTimestamp: z.boolean(),
  timestampFormat: z.string(),
  logLevel: LogLevelSchema,
  enableWarningLog: z.boolean(),
  logDirectory: z.string()
});

const LoggingConfigSchema = z.object({
  profile: z.string().optional(),
  profiles: z.record(LoggingProfileSchema).optional(),
  appendTimestamp: z.boolean().optional(),
  timestampFormat: z.string().optional(),
  logLevel: LogLevelSchema.optional(),
  enableWarningLog: z.boolean().optional(),
  logDirectory: z.string().optional()
});

// Color specs themselves are checked by LabelMap.fromEntries
export const ConverterConfigSchema = z.object({
  inputDir: z.string().min(1).default('./rtf'),
  outputFile: z.string().min(1).optional(),
  jsonlDir: z.string().min(1).optional(),
  extension: z.string().min(1).default('.rtf'),
  labelMap: z.record(z.string()).default({}),
  errorPolicy: z.enum(['skip', 'abort']).default('skip'),
  sortFiles: z.boolean().default(false),
  forceOverwrite: z.boolean().default(false),
  logging: LoggingConfigSchema.optional()
});

export type ConverterConfigInput = z.input<typeof ConverterConfigSchema>;

export function parseConverterConfig(raw: unknown, source = 'configuration'): ConverterConfig {
  const result = ConverterConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Load and validate a converter configuration file.
 * Relative directories in the file are resolved against the file's own directory.
 */
export function loadConverterConfig(configPath: string): ConverterConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(`Configuration file not found: ${resolved}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${resolved} is not valid JSON: ${error}`);
  }

  const config = parseConverterConfig(raw, `configuration file ${resolved}`);
  const baseDir = path.dirname(resolved);
  const resolvePath = (value: string) => path.resolve(baseDir, value);

  return {
    ...config,
    inputDir: resolvePath(config.inputDir),
    outputFile: config.outputFile ? resolvePath(config.outputFile) : undefined,
    jsonlDir: config.jsonlDir ? resolvePath(config.jsonlDir) : undefined
  };
}
