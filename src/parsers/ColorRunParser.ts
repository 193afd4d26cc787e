// src/parsers/ColorRunParser.ts
import * as fs from 'fs';
import { Turn } from '../types/transcript.types';
import { ColorTableParser, Palette } from './ColorTableParser';
import { LabelMap } from './LabelMap';
import { MarkerProtector } from './MarkerProtector';
import { RtfTextConverter } from './RtfTextConverter';
import { TurnSegmenter } from './TurnSegmenter';
import { Logger } from '../utils/logger';

// Example of RTF material being processed here:
//        ...
//      {\colortbl;\red255\green0\blue0;\red11\green93\blue162;}
//        \cf1 I'm looking for my glasses.\
//        \cf2 They are on your head.
//        ...
//
// With {'RGB(255,0,0)': 'Fred', '#0B5DA2': 'Susie'} this yields
//   { label: 'Fred',  text: "I'm looking for my glasses.\n" }
//   { label: 'Susie', text: 'They are on your head.' }

export interface ColorRunParseResult {
  turns: Turn[];
  palette: Palette;
  markerCount: number;
}

export interface ColorRunParserDependencies {
  colorTableParser?: ColorTableParser;
  markerProtector?: MarkerProtector;
  converter?: RtfTextConverter;
  segmenter?: TurnSegmenter;
}

/**
 * Turns one color-coded RTF document into labeled turns.
 * Holds no per-document state; one instance can parse any number of documents.
 */
export class ColorRunParser {
  private readonly logger = new Logger('ColorRunParser');
  private readonly colorTableParser: ColorTableParser;
  private readonly markerProtector: MarkerProtector;
  private readonly converter: RtfTextConverter;
  private readonly segmenter: TurnSegmenter;

  constructor(
    private readonly labelMap: LabelMap,
    dependencies: ColorRunParserDependencies = {}
  ) {
    this.colorTableParser = dependencies.colorTableParser ?? new ColorTableParser();
    this.markerProtector = dependencies.markerProtector ?? new MarkerProtector();
    this.converter = dependencies.converter ?? new RtfTextConverter();
    this.segmenter = dependencies.segmenter ?? new TurnSegmenter();
  }

  parse(rtf: string): ColorRunParseResult {
    const { palette, body } = this.colorTableParser.extract(rtf);
    const { text: protectedRtf, marker, markerCount } = this.markerProtector.protect(body);
    this.logger.debug(`Protected ${markerCount} color markers with U+${marker.charCodeAt(0).toString(16).padStart(4, '0')}`);

    const text = this.converter.convert(protectedRtf, { preserve: marker });
    const turns = this.segmenter.segment({ text, marker, palette, labelMap: this.labelMap });

    return { turns, palette, markerCount };
  }

  parseFile(filePath: string): ColorRunParseResult {
    const rtf = fs.readFileSync(filePath, 'utf-8');
    const result = this.parse(rtf);
    this.logger.debug(`Parsed ${filePath}: ${result.turns.length} turns`);
    return result;
  }
}
