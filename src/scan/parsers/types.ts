import type { MarkerPolicy, ParsedScanFile, RaggedPolicy } from '../types.js';

export type ScanParseOptions = {
  /** Default: 'discard' */
  markerPolicy?: MarkerPolicy;
  /** Default: 'reject' */
  raggedPolicy?: RaggedPolicy;
};

export type ScanParserInfo = {
  parserId: string;
  parserVersion: string;
};

export type ScanFileParser = ScanParserInfo & {
  parse: (content: string, options?: ScanParseOptions) => ParsedScanFile;
};
