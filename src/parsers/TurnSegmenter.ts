// src/parsers/TurnSegmenter.ts
import { UnresolvedColorError } from '../errors/TranscriptErrors';
import { ColorRun, Turn } from '../types/transcript.types';
import { Palette } from './ColorTableParser';
import { LabelMap } from './LabelMap';

export interface SegmentInput {
  // Converted plain text that still carries the protected color markers
  text: string;
  marker: string;
  palette: Palette;
  labelMap: LabelMap;
}

/**
 * Splits cleaned text into labeled turns at each color marker.
 *
 * The label found at a marker belongs to the text that follows it, so the
 * text before the first marker has no label, and the text after the last
 * marker is flushed once the scan ends:
 *
 *   "Hi<m>cf1 Hello<m>cf2 Bye"  ->  ["", "Hi"], [label(1), "Hello"], [label(2), "Bye"]
 */
export class TurnSegmenter {
  segment(input: SegmentInput): Turn[] {
    const { text, marker, palette, labelMap } = input;
    const turns: Turn[] = [];
    let label = '';
    let spanStart = 0;
    let afterMarker = false;

    for (const run of this.findColorRuns(text, marker)) {
      this.pushTurn(turns, label, text.slice(spanStart, run.startOffset), afterMarker);
      label = this.resolveLabel(run, palette, labelMap);
      spanStart = run.startOffset + run.length;
      afterMarker = true;
    }

    this.pushTurn(turns, label, text.slice(spanStart), afterMarker);
    return turns;
  }

  /**
   * Lazily yield every `<marker>cf<digits>` in document order
   */
  *findColorRuns(text: string, marker: string): Generator<ColorRun> {
    const prefix = `${marker}cf`;
    let cursor = 0;

    while (cursor < text.length) {
      const start = text.indexOf(prefix, cursor);
      if (start === -1) return;

      const digitsStart = start + prefix.length;
      let end = digitsStart;
      while (end < text.length && text.charAt(end) >= '0' && text.charAt(end) <= '9') end++;

      if (end === digitsStart) {
        cursor = start + 1;
        continue;
      }

      yield {
        startOffset: start,
        length: end - start,
        paletteSlot: parseInt(text.slice(digitsStart, end), 10)
      };
      cursor = end;
    }
  }

  resolveLabel(run: ColorRun, palette: Palette, labelMap: LabelMap): string {
    if (labelMap.isEmpty()) {
      return '';
    }

    const rgb = palette.get(run.paletteSlot);
    if (!rgb) {
      throw new UnresolvedColorError(run.startOffset, run.paletteSlot);
    }

    const label = labelMap.labelFor(rgb);
    if (label === undefined) {
      throw new UnresolvedColorError(run.startOffset, run.paletteSlot, rgb);
    }
    return label;
  }

  private pushTurn(turns: Turn[], label: string, span: string, afterMarker: boolean): void {
    // The control word's delimiter space is not part of the text
    const text = afterMarker && span.startsWith(' ') ? span.slice(1) : span;
    if (text.length > 0) {
      turns.push({ label, text });
    }
  }
}
