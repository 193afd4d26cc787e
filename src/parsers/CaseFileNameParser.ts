// src/parsers/CaseFileNameParser.ts
import * as path from 'path';
import { UnparsableFilenameError } from '../errors/TranscriptErrors';
import { CaseKey } from '../types/transcript.types';

export class CaseFileNameParser {
  // Each run is all lower case, or one capital followed by lower case
  private readonly runPattern = /[a-z]+|[A-Z][a-z]*/g;

  /**
   * Split a camel-cased file name such as /foo/bar/adamDenial.rtf into
   * client 'Adam' and category 'denial'. Later runs all belong to the
   * category: marcelCharacterDefense.rtf -> 'Marcel', 'characterdefense'.
   */
  parse(fileName: string): CaseKey {
    const stem = path.parse(fileName).name;
    const runs: string[] = stem.match(this.runPattern) ?? [];

    if (runs.length < 2) {
      throw new UnparsableFilenameError(path.basename(fileName));
    }

    return {
      clientName: capitalize(runs[0]),
      category: runs.slice(1).join('').toLowerCase()
    };
  }
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}
