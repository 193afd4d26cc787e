// src/services/DiscussionConverter.ts
import * as fs from 'fs';
import * as path from 'path';
import {
  ConfigurationError,
  DocumentConversionError,
  OutputExistsError,
  toError
} from '../errors/TranscriptErrors';
import { CaseFileNameParser } from '../parsers/CaseFileNameParser';
import { ColorRunParser } from '../parsers/ColorRunParser';
import { LabelMap } from '../parsers/LabelMap';
import { ErrorPolicy } from '../types/config.types';
import { CaseRecord, ConversionResult, DiscussionSet, SkippedDocument } from '../types/transcript.types';
import { FileHelpers } from '../utils/file-helpers';
import { Logger } from '../utils/logger';
import { TranscriptExportService } from './TranscriptExportService';

export interface DiscussionConverterOptions {
  inputDir: string;
  labelMap: LabelMap;
  extension?: string;
  errorPolicy?: ErrorPolicy;
  // Directory-listing order differs between platforms; sort for stable output
  sortFiles?: boolean;
  jsonlDir?: string;
  outputFile?: string;
  forceOverwrite?: boolean;
}

export interface DiscussionConverterDependencies {
  parser?: ColorRunParser;
  fileNameParser?: CaseFileNameParser;
  exporter?: TranscriptExportService;
}

/**
 * Runs through the color-coded RTF files of a directory and combines them
 * into one discussion:
 *
 *   [
 *     { "clientName": "Megan", "category": "denial",
 *       "conversation": [ {"Expert": "..."}, {"AI": "..."}, ... ] },
 *     ...
 *   ]
 *
 * Each file name is a camel-cased concatenation of client name and category.
 */
export class DiscussionConverter {
  private readonly logger = new Logger('DiscussionConverter');
  private readonly parser: ColorRunParser;
  private readonly fileNameParser: CaseFileNameParser;
  private readonly exporter: TranscriptExportService;

  constructor(
    private readonly options: DiscussionConverterOptions,
    dependencies: DiscussionConverterDependencies = {}
  ) {
    this.parser = dependencies.parser ?? new ColorRunParser(options.labelMap);
    this.fileNameParser = dependencies.fileNameParser ?? new CaseFileNameParser();
    this.exporter = dependencies.exporter ?? new TranscriptExportService();
  }

  convertDirectory(): ConversionResult {
    const { inputDir, outputFile } = this.options;
    const extension = this.options.extension ?? '.rtf';
    const errorPolicy = this.options.errorPolicy ?? 'skip';

    if (outputFile && fs.existsSync(outputFile) && !this.options.forceOverwrite) {
      throw new OutputExistsError(outputFile);
    }
    if (!fs.existsSync(inputDir) || !fs.statSync(inputDir).isDirectory()) {
      throw new ConfigurationError(`Input directory not found: ${inputDir}`);
    }

    let files = FileHelpers.getFilesByExtension(inputDir, extension);
    if (this.options.sortFiles) {
      files = [...files].sort();
    }
    this.logger.info(`Converting ${files.length} ${extension} files from ${inputDir} (error policy: ${errorPolicy})`);

    const discussion: DiscussionSet = [];
    const skipped: SkippedDocument[] = [];

    for (const fileName of files) {
      try {
        discussion.push(this.convertFile(path.join(inputDir, fileName)));
      } catch (error) {
        const cause = toError(error);
        if (errorPolicy === 'abort') {
          this.logger.error(`Aborting batch at ${fileName}`, cause);
          throw new DocumentConversionError(fileName, cause);
        }
        this.logger.warn(`Skipping ${fileName}: ${cause.message}`);
        skipped.push({ fileName, error: cause });
      }
    }

    if (skipped.length > 0) {
      this.logger.warn(`Skipped ${skipped.length} of ${files.length} files: ${skipped.map(s => s.fileName).join(', ')}`);
    }
    this.logger.info(`Converted ${discussion.length} of ${files.length} files`);

    if (outputFile) {
      this.exporter.writeDiscussion(outputFile, discussion);
    }

    return { discussion, skipped, filesProcessed: files.length };
  }

  /**
   * Convert one file into its case record; writes the .jsonl intermediate when configured
   */
  convertFile(filePath: string): CaseRecord {
    const { clientName, category } = this.fileNameParser.parse(filePath);
    const { turns } = this.parser.parseFile(filePath);

    if (this.options.jsonlDir) {
      this.exporter.writeJsonl(this.options.jsonlDir, path.basename(filePath), turns);
    }

    this.logger.debug(`${path.basename(filePath)}: ${clientName}/${category}, ${turns.length} turns`);
    return { clientName, category, turns };
  }
}
