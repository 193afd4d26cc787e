// src/errors/TranscriptErrors.ts
import { Rgb } from '../types/transcript.types';

export type TranscriptErrorCode =
  | 'MALFORMED_DOCUMENT'
  | 'INVALID_LABEL_MAP'
  | 'NO_SAFE_MARKER_CHAR'
  | 'UNRESOLVED_COLOR'
  | 'UNPARSABLE_FILENAME'
  | 'DOCUMENT_CONVERSION_FAILED'
  | 'OUTPUT_EXISTS'
  | 'INVALID_CONFIGURATION';

export class ColorTranscriptError extends Error {
  code: TranscriptErrorCode;

  constructor(code: TranscriptErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'ColorTranscriptError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedDocumentError extends ColorTranscriptError {
  constructor(message: string) {
    super('MALFORMED_DOCUMENT', message);
    this.name = 'MalformedDocumentError';
  }
}

export class InvalidLabelMapError extends ColorTranscriptError {
  entry: string;

  constructor(entry: string, reason: string) {
    super('INVALID_LABEL_MAP', `Invalid label map entry ${entry}: ${reason}`);
    this.entry = entry;
    this.name = 'InvalidLabelMapError';
  }
}

export class NoSafeMarkerCharError extends ColorTranscriptError {
  constructor(candidateCount: number) {
    super(
      'NO_SAFE_MARKER_CHAR',
      `Document already contains all ${candidateCount} reserved marker characters`
    );
    this.name = 'NoSafeMarkerCharError';
  }
}

export class UnresolvedColorError extends ColorTranscriptError {
  offset: number;
  slot: number;
  rgb?: Rgb;

  constructor(offset: number, slot: number, rgb?: Rgb) {
    const what = rgb
      ? `color RGB(${rgb.red},${rgb.green},${rgb.blue}) (slot ${slot}) has no label`
      : `color slot ${slot} is not declared in the color table`;
    super('UNRESOLVED_COLOR', `Unresolved color at offset ${offset}: ${what}`);
    this.offset = offset;
    this.slot = slot;
    this.rgb = rgb;
    this.name = 'UnresolvedColorError';
  }
}

export class UnparsableFilenameError extends ColorTranscriptError {
  fileName: string;

  constructor(fileName: string) {
    super(
      'UNPARSABLE_FILENAME',
      `File name ${fileName} is not partitionable into a client name and a category`
    );
    this.fileName = fileName;
    this.name = 'UnparsableFilenameError';
  }
}

export class DocumentConversionError extends ColorTranscriptError {
  fileName: string;
  cause: Error;

  constructor(fileName: string, cause: Error) {
    super('DOCUMENT_CONVERSION_FAILED', `Failed to convert ${fileName}: ${cause.message}`);
    this.fileName = fileName;
    this.cause = cause;
    this.name = 'DocumentConversionError';
  }
}

export class OutputExistsError extends ColorTranscriptError {
  outputPath: string;

  constructor(outputPath: string) {
    super('OUTPUT_EXISTS', `Output file ${outputPath} already exists; use --force to overwrite`);
    this.outputPath = outputPath;
    this.name = 'OutputExistsError';
  }
}

export class ConfigurationError extends ColorTranscriptError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
