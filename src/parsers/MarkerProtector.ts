// src/parsers/MarkerProtector.ts
import { NoSafeMarkerCharError } from '../errors/TranscriptErrors';

// Non-printable characters an RTF converter passes through as text
export const MARKER_CANDIDATES: readonly string[] = [
  '\x01', '\x02', '\x03', '\x04', '\x05', '\x06', '\x07', '\x08'
];

export interface ProtectedText {
  text: string;
  marker: string;
  markerCount: number;
}

/**
 * Shields \cf<n> color controls from control-word stripping by replacing
 * their backslash with a character the document does not otherwise use.
 */
export class MarkerProtector {
  constructor(private readonly candidates: readonly string[] = MARKER_CANDIDATES) {}

  chooseMarker(text: string): string {
    const marker = this.candidates.find(candidate => !text.includes(candidate));
    if (marker === undefined) {
      throw new NoSafeMarkerCharError(this.candidates.length);
    }
    return marker;
  }

  protect(rtf: string): ProtectedText {
    const marker = this.chooseMarker(rtf);
    let text = '';
    let markerCount = 0;
    let copiedTo = 0;
    let cursor = 0;

    while (cursor < rtf.length) {
      const escape = rtf.indexOf('\\', cursor);
      if (escape === -1) break;

      const next = rtf.charAt(escape + 1);
      if (next === '\\' || next === '{' || next === '}') {
        // Escaped literal; the pair is text, not a control word
        cursor = escape + 2;
        continue;
      }

      if (next === 'c' && rtf.charAt(escape + 2) === 'f' && isDigit(rtf.charAt(escape + 3))) {
        let end = escape + 3;
        while (isDigit(rtf.charAt(end))) end++;

        text += rtf.slice(copiedTo, escape) + marker + rtf.slice(escape + 1, end);
        // Always leave the delimiter space, so following digits never join the color number
        if (rtf.charAt(end) !== ' ') text += ' ';
        copiedTo = end;
        cursor = end;
        markerCount++;
        continue;
      }
      cursor = escape + 1;
    }

    text += rtf.slice(copiedTo);
    return { text, marker, markerCount };
  }
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9' && ch.length === 1;
}
