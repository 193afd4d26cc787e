// src/types/transcript.types.ts

export interface Rgb {
  red: number;
  green: number;
  blue: number;
}

/**
 * One color-change marker found in the cleaned text.
 * `startOffset` and `length` cover the whole marker (protect char, `cf`, digits).
 */
export interface ColorRun {
  readonly startOffset: number;
  readonly length: number;
  readonly paletteSlot: number;
}

export interface Turn {
  label: string;
  text: string;
}

export interface CaseRecord {
  clientName: string;
  category: string;
  turns: Turn[];
}

export type DiscussionSet = CaseRecord[];

export interface CaseKey {
  clientName: string;
  category: string;
}

// Serialized form of a CaseRecord
export interface ConversationRecord {
  clientName: string;
  category: string;
  conversation: Array<Record<string, string>>;
}

export interface SkippedDocument {
  fileName: string;
  error: Error;
}

export interface ConversionResult {
  discussion: DiscussionSet;
  skipped: SkippedDocument[];
  filesProcessed: number;
}
