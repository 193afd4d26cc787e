// src/cli/cli-utils.ts
import chalk from 'chalk';
import { ColorTranscriptError, ConfigurationError, InvalidLabelMapError } from '../errors/TranscriptErrors';
import logger from '../utils/logger';

/**
 * Commander collector for repeatable options
 */
export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Turn ["RGB(74,21,148)=Expert", "#0B5DA2=AI"] into a color -> label record.
 * The split is at the first '=', so labels may contain '='.
 */
export function parseLabelOptions(specs: string[]): { [colorSpec: string]: string } {
  const labels: { [colorSpec: string]: string } = {};
  for (const spec of specs) {
    const separator = spec.indexOf('=');
    if (separator <= 0) {
      throw new InvalidLabelMapError(`'${spec}'`, 'expected <color>=<label>');
    }
    labels[spec.slice(0, separator).trim()] = spec.slice(separator + 1);
  }
  return labels;
}

/**
 * Turn positional color/name pairs, e.g. RGB(20,154,200) Fred #B3a8C4 Susie,
 * into a color -> label record
 */
export function parseLabelPairs(pairs: string[]): { [colorSpec: string]: string } {
  if (pairs.length % 2 !== 0) {
    throw new ConfigurationError(
      `The number of color-name arguments must be even to form complete pairs; received ${pairs.length}: ${pairs.join(' ')}`
    );
  }

  const labels: { [colorSpec: string]: string } = {};
  for (let i = 0; i < pairs.length; i += 2) {
    labels[pairs[i]] = pairs[i + 1];
  }
  return labels;
}

export function reportFailure(context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof ColorTranscriptError ? ` [${error.code}]` : '';
  logger.error(`${context}${code}: ${message}`);
  console.error(chalk.red(`✗ ${message}`));
}
