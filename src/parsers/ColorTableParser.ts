// src/parsers/ColorTableParser.ts
import { MalformedDocumentError } from '../errors/TranscriptErrors';
import { Rgb } from '../types/transcript.types';
import { Validators } from '../utils/validation';
import logger from '../utils/logger';

// Example of a color table in RTF files (line breaks for clarity only):
//
//   {\colortbl;\red255\green255\blue255;
//    \red74\green21\blue148;
//    \red11\green93\blue162;}
//
// The empty entry before the first ';' is the "auto" color, slot 0.
// The entries after it are referenced from the body as \cf1, \cf2, ...

/**
 * Immutable slot -> RGB table of one document
 */
export class Palette {
  private readonly slots: ReadonlyMap<number, Readonly<Rgb>>;

  constructor(entries: Iterable<[number, Rgb]>) {
    const slots = new Map<number, Readonly<Rgb>>();
    for (const [slot, rgb] of entries) {
      slots.set(slot, Object.freeze({ ...rgb }));
    }
    this.slots = slots;
  }

  get(slot: number): Readonly<Rgb> | undefined {
    return this.slots.get(slot);
  }

  get size(): number {
    return this.slots.size;
  }

  entries(): Array<[number, Readonly<Rgb>]> {
    return Array.from(this.slots.entries()).sort((a, b) => a[0] - b[0]);
  }
}

export interface ColorTableResult {
  palette: Palette;
  // Document text with the color table group removed
  body: string;
}

export class ColorTableParser {
  private readonly tablePattern = /\{\s*\\colortbl\b([^}]*)\}/;
  private readonly componentPattern = /\\(red|green|blue)(-?\d+)/g;

  /**
   * Find the color table, build the palette, and cut the table out of the text.
   * The table must go before any further scanning: its trailing bytes
   * would otherwise be tokenized together with the body.
   */
  extract(rtf: string): ColorTableResult {
    const match = this.tablePattern.exec(rtf);
    if (!match) {
      throw new MalformedDocumentError('Document does not contain an RTF color table');
    }

    const entries: Array<[number, Rgb]> = [];
    const segments = match[1].split(';');

    segments.forEach((segment, slot) => {
      const rgb = this.parseEntry(segment, slot);
      if (rgb) {
        entries.push([slot, rgb]);
      }
    });

    const palette = new Palette(entries);
    logger.debug(`Color table has ${palette.size} colors: ${palette.entries()
      .map(([slot, rgb]) => `${slot}=${Validators.formatRgb(rgb)}`)
      .join(' ')}`);

    const body = rtf.slice(0, match.index) + rtf.slice(match.index + match[0].length);
    return { palette, body };
  }

  private parseEntry(segment: string, slot: number): Rgb | null {
    const rgb: Rgb = { red: 0, green: 0, blue: 0 };
    let found = false;

    for (const component of segment.matchAll(this.componentPattern)) {
      const name = component[1];
      const value = Number(component[2]);
      if (!Validators.isColorComponent(value)) {
        throw new MalformedDocumentError(
          `Color table entry ${slot} has ${name} component ${component[2]} outside 0..255`
        );
      }
      if (name === 'red') rgb.red = value;
      else if (name === 'green') rgb.green = value;
      else rgb.blue = value;
      found = true;
    }

    return found ? rgb : null;
  }
}
