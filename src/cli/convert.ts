#!/usr/bin/env node
// src/cli/convert.ts
import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import * as path from 'path';
import { loadConverterConfig, parseConverterConfig, ConverterConfigInput } from '../config/converter-config';
import { LabelMap } from '../parsers/LabelMap';
import { DiscussionConverter } from '../services/DiscussionConverter';
import { ConverterConfig } from '../types/config.types';
import { ConversionResult } from '../types/transcript.types';
import { initializeLogger } from '../utils/log-config-loader';
import logger, { getLogFilePaths, Logger, setLogLevel } from '../utils/logger';
import { collectValues, parseLabelOptions, reportFailure } from './cli-utils';

export interface ConvertCliOptions {
  config?: string;
  directory?: string;
  output?: string;
  jsonlDir?: string;
  ext?: string;
  label: string[];
  policy?: string;
  sort?: boolean;
  force?: boolean;
  logLevel?: string;
}

/**
 * Merge the configuration file (if any) with command-line overrides and validate the result
 */
export function buildConverterConfig(options: ConvertCliOptions): ConverterConfig {
  const base: ConverterConfigInput = options.config ? loadConverterConfig(options.config) : {};

  const merged: Record<string, unknown> = {
    ...base,
    labelMap: { ...base.labelMap, ...parseLabelOptions(options.label) }
  };
  if (options.directory) merged.inputDir = path.resolve(options.directory);
  if (options.output) merged.outputFile = path.resolve(options.output);
  if (options.jsonlDir) merged.jsonlDir = path.resolve(options.jsonlDir);
  if (options.ext) merged.extension = options.ext;
  if (options.policy) merged.errorPolicy = options.policy;
  if (options.sort) merged.sortFiles = true;
  if (options.force) merged.forceOverwrite = true;

  return parseConverterConfig(merged, 'converter options');
}

export function runConvert(config: ConverterConfig): ConversionResult {
  // Validated once, before any document is read
  const labelMap = LabelMap.fromEntries(config.labelMap);
  if (labelMap.isEmpty()) {
    logger.warn('No color labels configured; turns will be split by color but unlabeled');
  }

  const converter = new DiscussionConverter({
    inputDir: config.inputDir,
    labelMap,
    extension: config.extension,
    errorPolicy: config.errorPolicy,
    sortFiles: config.sortFiles,
    jsonlDir: config.jsonlDir,
    outputFile: config.outputFile,
    forceOverwrite: config.forceOverwrite
  });
  return converter.convertDirectory();
}

function printSummary(result: ConversionResult, config: ConverterConfig): void {
  console.log(chalk.cyan('\n════════════════════════════════════════'));
  console.log(chalk.cyan('  Conversion Summary'));
  console.log(chalk.cyan('════════════════════════════════════════'));
  console.log(chalk.white(`  Files found:     ${result.filesProcessed}`));
  console.log(chalk.white(`  Cases converted: ${result.discussion.length}`));
  console.log(chalk.white(`  Output:          ${config.outputFile || 'N/A'}`));
  const logFiles = getLogFilePaths();
  if (logFiles) {
    console.log(chalk.gray(`  Log file:        ${logFiles.combined}`));
  }

  if (result.skipped.length > 0) {
    console.log(chalk.yellow(`\n  Skipped ${result.skipped.length} files:`));
    for (const { fileName, error } of result.skipped) {
      console.log(chalk.yellow(`    ${fileName.padEnd(30)} ${error.message}`));
    }
  } else {
    console.log(chalk.green('\n✓ All files converted'));
  }
}

export function createConvertProgram(): Command {
  const program = new Command();

  program
    .name('convert-discussions')
    .description('Convert a directory of color-coded RTF dialogues into one JSON discussion file')
    .version('1.0.0')
    .option('-c, --config <path>', 'Path to converter configuration file')
    .option('-d, --directory <path>', 'Directory containing the RTF files')
    .option('-o, --output <path>', 'Combined JSON output file')
    .option('--jsonl-dir <path>', 'Directory for per-document .jsonl files')
    .option('--ext <extension>', 'Extension of the files to convert (default .rtf)')
    .option('-l, --label <color=label>', 'Color to speaker label, e.g. "RGB(74,21,148)=Expert" (repeatable)', collectValues, [])
    .option('--policy <policy>', 'On a failing document: skip or abort')
    .option('--sort', 'Process files in name order')
    .option('--force', 'Overwrite an existing output file')
    .option('--log-level <level>', 'Log level (debug, info, warn, error)')
    .action((options: ConvertCliOptions) => {
      const cliLogger = new Logger('convert');
      try {
        const config = buildConverterConfig(options);
        if (config.logging) {
          Logger.initialize(config.logging);
        }
        if (options.logLevel) {
          setLogLevel(options.logLevel);
        }

        cliLogger.info(`Input directory: ${config.inputDir}`);
        const result = runConvert(config);
        printSummary(result, config);
      } catch (error) {
        reportFailure('Conversion failed', error);
        process.exit(1);
      }
    });

  return program;
}

if (require.main === module) {
  dotenv.config();
  initializeLogger();
  createConvertProgram().parse(process.argv);
}
