// src/tests/LabelMap.test.ts
import { InvalidLabelMapError } from '../errors/TranscriptErrors';
import { LabelMap } from '../parsers/LabelMap';

describe('LabelMap', () => {
  it('should accept RGB and hex specs and key them by normalized color', () => {
    const labels = LabelMap.fromEntries({
      'RGB(20,154,200)': 'Fred',
      'rgb(30,53,24)': 'Susie',
      '#B3a8C4': 'Bob'
    });

    expect(labels.size).toBe(3);
    expect(labels.labelFor({ red: 20, green: 154, blue: 200 })).toBe('Fred');
    expect(labels.labelFor({ red: 30, green: 53, blue: 24 })).toBe('Susie');
    expect(labels.labelFor({ red: 0xb3, green: 0xa8, blue: 0xc4 })).toBe('Bob');
    expect(labels.labelFor({ red: 1, green: 2, blue: 3 })).toBeUndefined();
  });

  it('should accept a Map as input', () => {
    const labels = LabelMap.fromEntries(new Map([['#0B5DA2', 'AI']]));
    expect(labels.entries()).toEqual([['#0B5DA2', 'AI']]);
  });

  it('should treat the same color written twice with one label as one entry', () => {
    const labels = LabelMap.fromEntries({ 'RGB(11,93,162)': 'AI', '#0b5da2': 'AI' });
    expect(labels.size).toBe(1);
  });

  it('should reject a color given two different labels', () => {
    expect(() => LabelMap.fromEntries({ 'RGB(11,93,162)': 'AI', '#0B5DA2': 'Bot' }))
      .toThrow("Invalid label map entry '#0B5DA2': color #0B5DA2 is already labeled 'AI'");
  });

  it('should reject out-of-range components', () => {
    expect(() => LabelMap.fromEntries({ 'RGB(256,0,0)': 'Fred' }))
      .toThrow(InvalidLabelMapError);
  });

  it('should reject malformed hex and unknown notations', () => {
    expect(() => LabelMap.fromEntries({ '#12': 'Fred' }))
      .toThrow("Invalid label map entry '#12': '#12' is not of form '#rrggbb' of hex numbers");
    expect(() => LabelMap.fromEntries({ 'teal': 'Fred' }))
      .toThrow(InvalidLabelMapError);
  });

  it('should reject non-string keys and labels', () => {
    expect(() => LabelMap.fromEntries(new Map<unknown, unknown>([[42, 'Fred']])))
      .toThrow('Invalid label map entry 42: color specifications must be strings');
    expect(() => LabelMap.fromEntries({ 'RGB(1,2,3)': 7 }))
      .toThrow("Invalid label map entry 'RGB(1,2,3)': labels must be strings");
  });

  it('should carry the offending entry on the error', () => {
    let caught: unknown;
    try {
      LabelMap.fromEntries({ 'RGB(1,2)': 'Fred' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidLabelMapError);
    if (caught instanceof InvalidLabelMapError) {
      expect(caught.entry).toBe("'RGB(1,2)'");
      expect(caught.code).toBe('INVALID_LABEL_MAP');
    }
  });

  it('should start empty', () => {
    expect(LabelMap.empty().isEmpty()).toBe(true);
    expect(LabelMap.fromEntries({}).isEmpty()).toBe(true);
  });
});
