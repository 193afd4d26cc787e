// src/parsers/RtfTextConverter.ts
import * as iconv from 'iconv-lite';
import destinationData from './data/rtf-destinations.json';
import logger from '../utils/logger';

/*
 * Plain-text rendering of RTF. Only the text survives:
 *
 *   {\rtf1\ansi{\fonttbl\f0 Helvetica;}\f0\fs24 This is \b bold\b0 .\par}
 *
 * becomes "This is bold.\n". Destination groups (font table, stylesheet,
 * document info, pictures, \* groups) are skipped entirely; every other
 * control word is dropped together with its delimiter space.
 */

export interface RtfTextConverterConfig {
  // Windows code page used for \'hh escapes until \ansicpgN says otherwise
  defaultCodePage?: number;
}

export interface ConvertOptions {
  // Characters passed through only where they appear literally: never
  // swallowed as \uN fallback text, never produced by decoding an escape
  preserve?: string;
}

interface GroupState {
  ignorable: boolean;
  ucSkip: number;
}

type ControlToken =
  | { kind: 'word'; name: string; param?: number; end: number }
  | { kind: 'hex'; byte: number; end: number }
  | { kind: 'symbol'; symbol: string; end: number };

const DESTINATIONS: ReadonlySet<string> = new Set(destinationData.destinations);

const SPECIAL_WORDS: { [word: string]: string } = {
  par: '\n',
  line: '\n',
  sect: '\n\n',
  page: '\n\n',
  row: '\n',
  cell: '\t',
  tab: '\t',
  emdash: '\u2014',
  endash: '\u2013',
  emspace: '\u2003',
  enspace: '\u2002',
  qmspace: '\u2005',
  bullet: '\u2022',
  lquote: '\u2018',
  rquote: '\u2019',
  ldblquote: '\u201C',
  rdblquote: '\u201D'
};

const SPECIAL_SYMBOLS: { [symbol: string]: string } = {
  '\\': '\\',
  '{': '{',
  '}': '}',
  '~': '\u00A0',
  '_': '\u2011',
  '\n': '\n',
  '\r': '\n'
};

export class RtfTextConverter {
  private readonly defaultCodePage: number;

  constructor(config: RtfTextConverterConfig = {}) {
    this.defaultCodePage = config.defaultCodePage ?? 1252;
  }

  convert(rtf: string, options: ConvertOptions = {}): string {
    const preserve = new Set(options.preserve ?? '');
    const out: string[] = [];
    const stack: GroupState[] = [];
    let state: GroupState = { ignorable: false, ucSkip: 1 };
    let encoding = this.encodingFor(this.defaultCodePage);
    // Consecutive \'hh bytes, decoded together so double-byte code pages work
    let bytes: number[] = [];
    let pendingSkip = 0;
    let cursor = 0;

    const decoded = (text: string) => Array.from(text).filter(c => !preserve.has(c)).join('');
    const flushBytes = () => {
      if (bytes.length > 0) {
        out.push(decoded(iconv.decode(Buffer.from(bytes), encoding)));
        bytes = [];
      }
    };
    const emit = (text: string) => {
      flushBytes();
      out.push(text);
    };

    while (cursor < rtf.length) {
      const ch = rtf.charAt(cursor);

      if (ch === '{') {
        flushBytes();
        stack.push(state);
        state = { ...state };
        pendingSkip = 0;
        cursor++;
        continue;
      }

      if (ch === '}') {
        flushBytes();
        state = stack.pop() ?? state;
        pendingSkip = 0;
        cursor++;
        continue;
      }

      if (ch === '\r' || ch === '\n') {
        cursor++;
        continue;
      }

      if (ch !== '\\') {
        if (preserve.has(ch)) {
          // A preserved character ends any pending \uN fallback
          pendingSkip = 0;
          if (!state.ignorable) emit(ch);
        } else if (pendingSkip > 0) {
          pendingSkip--;
        } else if (!state.ignorable) {
          emit(ch);
        }
        cursor++;
        continue;
      }

      const token = this.readControl(rtf, cursor);
      cursor = token.end;

      switch (token.kind) {
        case 'hex':
          if (pendingSkip > 0) {
            pendingSkip--;
          } else if (!state.ignorable) {
            bytes.push(token.byte);
          }
          break;

        case 'symbol':
          if (token.symbol === '*') {
            state.ignorable = true;
          } else if (!state.ignorable && SPECIAL_SYMBOLS[token.symbol] !== undefined) {
            emit(SPECIAL_SYMBOLS[token.symbol]);
          }
          break;

        case 'word':
          if (token.name === 'bin' && token.param !== undefined && token.param > 0) {
            // Binary payload; its bytes are not RTF
            cursor += token.param;
          } else if (DESTINATIONS.has(token.name)) {
            state.ignorable = true;
          } else if (token.name === 'ansicpg' && token.param !== undefined) {
            flushBytes();
            encoding = this.encodingFor(token.param);
          } else if (token.name === 'uc') {
            state.ucSkip = token.param ?? 1;
          } else if (state.ignorable) {
            break;
          } else if (token.name === 'u' && token.param !== undefined) {
            const code = token.param < 0 ? token.param + 0x10000 : token.param;
            emit(decoded(String.fromCharCode(code)));
            pendingSkip = state.ucSkip;
          } else if (SPECIAL_WORDS[token.name] !== undefined) {
            emit(SPECIAL_WORDS[token.name]);
          }
          break;
      }
    }

    flushBytes();
    return out.join('');
  }

  /**
   * Read the control sequence starting at the backslash at `start`
   */
  private readControl(rtf: string, start: number): ControlToken {
    const next = rtf.charAt(start + 1);

    if (/[a-zA-Z]/.test(next)) {
      let end = start + 1;
      while (end < rtf.length && end - start <= 32 && /[a-zA-Z]/.test(rtf.charAt(end))) end++;
      const name = rtf.slice(start + 1, end);

      const paramMatch = /^-?\d{1,10}/.exec(rtf.slice(end, end + 11));
      let param: number | undefined;
      if (paramMatch) {
        param = Number(paramMatch[0]);
        end += paramMatch[0].length;
      }

      // A single space delimits the control word and belongs to it
      if (rtf.charAt(end) === ' ') end++;
      return { kind: 'word', name, param, end };
    }

    if (next === "'") {
      const hex = rtf.slice(start + 2, start + 4);
      if (/^[0-9a-fA-F]{2}$/.test(hex)) {
        return { kind: 'hex', byte: parseInt(hex, 16), end: start + 4 };
      }
    }

    return { kind: 'symbol', symbol: next, end: Math.min(start + 2, rtf.length) };
  }

  private encodingFor(codePage: number): string {
    const encoding = `windows-${codePage}`;
    if (iconv.encodingExists(encoding)) {
      return encoding;
    }
    logger.warn(`Code page ${codePage} is not supported, decoding as windows-${this.defaultCodePage}`);
    return `windows-${this.defaultCodePage}`;
  }
}
