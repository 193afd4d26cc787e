// src/parsers/LabelMap.ts
import { InvalidLabelMapError } from '../errors/TranscriptErrors';
import { Rgb } from '../types/transcript.types';
import { Validators } from '../utils/validation';

export type LabelMapInput = { [colorSpec: string]: unknown } | Map<unknown, unknown>;

/**
 * Validated mapping from a color to a speaker label.
 * Only `fromEntries` builds one, so every instance has passed validation.
 */
export class LabelMap {
  private readonly labels: ReadonlyMap<string, string>;

  private constructor(labels: Map<string, string>) {
    this.labels = labels;
  }

  static fromEntries(input: LabelMapInput): LabelMap {
    const entries: Array<[unknown, unknown]> =
      input instanceof Map ? Array.from(input.entries()) : Object.entries(input);
    const labels = new Map<string, string>();

    for (const [spec, label] of entries) {
      if (typeof spec !== 'string') {
        throw new InvalidLabelMapError(String(spec), 'color specifications must be strings');
      }
      const problem = Validators.colorSpecProblem(spec);
      const rgb = Validators.parseColorSpec(spec);
      if (problem !== null || rgb === null) {
        throw new InvalidLabelMapError(`'${spec}'`, problem ?? 'unrecognized color');
      }
      if (typeof label !== 'string') {
        throw new InvalidLabelMapError(`'${spec}'`, 'labels must be strings');
      }

      const key = Validators.toHex(rgb);
      const existing = labels.get(key);
      if (existing !== undefined && existing !== label) {
        throw new InvalidLabelMapError(
          `'${spec}'`,
          `color ${key} is already labeled '${existing}'`
        );
      }
      labels.set(key, label);
    }

    return new LabelMap(labels);
  }

  static empty(): LabelMap {
    return new LabelMap(new Map());
  }

  get size(): number {
    return this.labels.size;
  }

  isEmpty(): boolean {
    return this.labels.size === 0;
  }

  labelFor(rgb: Rgb): string | undefined {
    return this.labels.get(Validators.toHex(rgb));
  }

  entries(): Array<[string, string]> {
    return Array.from(this.labels.entries());
  }
}
