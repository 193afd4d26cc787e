// src/index.ts
export * from './errors/TranscriptErrors';
export * from './types/transcript.types';
export * from './types/config.types';
export { LabelMap, LabelMapInput } from './parsers/LabelMap';
export { ColorTableParser, Palette, ColorTableResult } from './parsers/ColorTableParser';
export { MarkerProtector, MARKER_CANDIDATES, ProtectedText } from './parsers/MarkerProtector';
export { RtfTextConverter } from './parsers/RtfTextConverter';
export { TurnSegmenter } from './parsers/TurnSegmenter';
export { ColorRunParser, ColorRunParseResult } from './parsers/ColorRunParser';
export { CaseFileNameParser } from './parsers/CaseFileNameParser';
export { DiscussionConverter, DiscussionConverterOptions } from './services/DiscussionConverter';
export { TranscriptExportService, ScriptFormat } from './services/TranscriptExportService';
export { loadConverterConfig, parseConverterConfig } from './config/converter-config';
export { Validators } from './utils/validation';
