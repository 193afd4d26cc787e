// src/tests/RtfTextConverter.test.ts
import { RtfTextConverter } from '../parsers/RtfTextConverter';

describe('RtfTextConverter', () => {
  let converter: RtfTextConverter;

  beforeEach(() => {
    converter = new RtfTextConverter();
  });

  it('should keep only the text of a simple document', () => {
    const rtf = '{\\rtf1\\ansi{\\fonttbl\\f0 Helvetica;}\\f0\\fs24 This is \\b bold\\b0 .\\par}';
    expect(converter.convert(rtf)).toBe('This is bold.\n');
  });

  it('should decode hex escapes with the document code page', () => {
    const rtf = "{\\rtf1\\ansi\\ansicpg1252 It\\'92s caf\\'e9}";
    expect(converter.convert(rtf)).toBe('It\u2019s caf\u00e9');
  });

  it('should map windows-1252 punctuation bytes to their characters', () => {
    const rtf = "{\\rtf1\\ansi\\ansicpg1252 \\'93quoted\\'94 \\'96 \\'80\\'85}";
    expect(converter.convert(rtf)).toBe('\u201cquoted\u201d \u2013 \u20ac\u2026');
  });

  it('should decode consecutive bytes together for double-byte code pages', () => {
    const rtf = "{\\rtf1\\ansi\\ansicpg932 \\'82\\'a0\\'82\\'a2!}";
    expect(converter.convert(rtf)).toBe('\u3042\u3044!');
  });

  it('should fall back to the default code page when one is unsupported', () => {
    const rtf = "{\\rtf1\\ansicpg99999 caf\\'e9}";
    expect(converter.convert(rtf)).toBe('caf\u00e9');
  });

  it('should decode unicode escapes and skip their fallback characters', () => {
    expect(converter.convert('Caf\\u233 e and \\u8212?x')).toBe('Caf\u00e9 and \u2014x');
    expect(converter.convert("Caf\\u233 \\'e9!")).toBe('Caf\u00e9!');
    expect(converter.convert('\\uc0\\u8364 EUR')).toBe('\u20acEUR');
  });

  it('should never swallow a preserved character as fallback text', () => {
    const text = converter.convert('\\u8220 \x01cf1 Hi', { preserve: '\x01' });
    expect(text).toBe('\u201c\x01cf1 Hi');
  });

  it('should drop preserved characters that only come from escapes', () => {
    expect(converter.convert("\\'01cf2 x", { preserve: '\x01' })).toBe('cf2 x');
    expect(converter.convert('a\\u1 ?b', { preserve: '\x01' })).toBe('ab');
    expect(converter.convert("\\'01", { preserve: '\x02' })).toBe('\x01');
  });

  it('should drop destination groups and \\* groups', () => {
    const rtf = '{\\rtf1{\\info{\\title Secret}}{\\*\\unknownthing data}Visible}';
    expect(converter.convert(rtf)).toBe('Visible');
  });

  it('should translate special control words and symbols', () => {
    expect(converter.convert('a\\tab b\\line c\\emdash d\\~e')).toBe('a\tb\nc\u2014d\u00a0e');
  });

  it('should ignore raw line breaks but keep escaped ones', () => {
    expect(converter.convert('one\ntwo\\\nthree\r\n')).toBe('onetwo\nthree');
  });

  it('should unescape backslashes and braces', () => {
    expect(converter.convert('\\\\ \\{x\\}')).toBe('\\ {x}');
  });

  it('should skip binary payloads', () => {
    expect(converter.convert('a\\bin3 xyzb')).toBe('ab');
  });

  it('should not eat text after a control word without a delimiter space', () => {
    expect(converter.convert('\\b\\i Bold')).toBe('Bold');
  });
});
