#!/usr/bin/env node
// src/cli/script.ts
import { Command } from 'commander';
import dotenv from 'dotenv';
import * as fs from 'fs';
import { ConfigurationError } from '../errors/TranscriptErrors';
import { ColorRunParser } from '../parsers/ColorRunParser';
import { LabelMap } from '../parsers/LabelMap';
import { ScriptFormat, TranscriptExportService } from '../services/TranscriptExportService';
import { initializeLogger } from '../utils/log-config-loader';
import { setLogLevel } from '../utils/logger';
import { collectValues, parseLabelOptions, parseLabelPairs, reportFailure } from './cli-utils';

export interface ScriptCliOptions {
  label: string[];
  format: string;
  logLevel?: string;
}

/**
 * Render one RTF file as a script. The positional arguments are optional
 * color/name pairs followed by the file name, e.g.
 *   RGB(20,154,200) Fred #B3a8C4 Susie path/to/dialogue.rtf
 */
export function renderScript(args: string[], options: ScriptCliOptions): string {
  if (args.length === 0) {
    throw new ConfigurationError('No arguments provided; a file name is required');
  }
  if (options.format !== 'script' && options.format !== 'jsonl') {
    throw new ConfigurationError(`Unknown format '${options.format}'; use script or jsonl`);
  }
  const format: ScriptFormat = options.format;

  const filePath = args[args.length - 1];
  const labelMap = LabelMap.fromEntries({
    ...parseLabelPairs(args.slice(0, -1)),
    ...parseLabelOptions(options.label)
  });

  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`File '${filePath}' does not exist`);
  }

  const { turns } = new ColorRunParser(labelMap).parseFile(filePath);
  return new TranscriptExportService().render(turns, format);
}

export function createScriptProgram(): Command {
  const program = new Command();

  program
    .name('rtf-script')
    .description(
      'Parse one color-coded RTF file and print a movie-script-like transcript.\n' +
      'Example: rtf-script RGB(20,154,200) Fred rgb(30,53,24) Susie #B3a8C4 Bob path/to/file.rtf'
    )
    .version('1.0.0')
    .argument('<args...>', 'Color-name pairs followed by the RTF file name')
    .option('-l, --label <color=label>', 'Color to speaker label (repeatable)', collectValues, [])
    .option('-f, --format <format>', 'Output format: script or jsonl', 'script')
    .option('--log-level <level>', 'Log level (debug, info, warn, error)')
    .action((args: string[], options: ScriptCliOptions) => {
      try {
        if (options.logLevel) {
          setLogLevel(options.logLevel);
        }
        process.stdout.write(renderScript(args, options));
      } catch (error) {
        reportFailure('Script rendering failed', error);
        process.exit(1);
      }
    });

  return program;
}

if (require.main === module) {
  dotenv.config();
  initializeLogger();
  createScriptProgram().parse(process.argv);
}
