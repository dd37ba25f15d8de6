/**
 * Error types raised while reading scan files.
 *
 * Every error carries a machine-readable `code` and the HTTP status the API
 * layer answers with.
 */

export class ScanServiceError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode: number) {
    super(message);
    this.name = 'ScanServiceError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * A recognized block contains a field that is not a number, or its X and Y
 * rows disagree in length.
 */
export class FormatError extends ScanServiceError {
  readonly line: number;

  constructor(message: string, line: number) {
    super('FORMAT_ERROR', `line ${line}: ${message}`, 422);
    this.name = 'FormatError';
    this.line = line;
  }
}

/**
 * File bytes are not valid UTF-8.
 */
export class EncodingError extends ScanServiceError {
  constructor() {
    super('ENCODING_ERROR', 'file is not valid UTF-8', 422);
    this.name = 'EncodingError';
  }
}

export type BlockPart = 'marker line' | 'X row' | 'Y row';

/**
 * Input ended after a metadata line but before the block was complete.
 */
export class TruncatedBlockError extends ScanServiceError {
  readonly line: number;
  readonly expected: BlockPart;

  constructor(line: number, expected: BlockPart) {
    super('TRUNCATED_BLOCK', `block starting at line ${line} ends before its ${expected}`, 422);
    this.name = 'TruncatedBlockError';
    this.line = line;
    this.expected = expected;
  }
}

/**
 * Blocks in one file produced coordinate rows of different lengths.
 */
export class RaggedTableError extends ScanServiceError {
  readonly blockIndex: number;
  readonly expectedLength: number;
  readonly actualLength: number;

  constructor(blockIndex: number, expectedLength: number, actualLength: number) {
    super(
      'RAGGED_TABLE',
      `block ${blockIndex} has ${actualLength} coordinates, expected ${expectedLength} like block 0`,
      422
    );
    this.name = 'RaggedTableError';
    this.blockIndex = blockIndex;
    this.expectedLength = expectedLength;
    this.actualLength = actualLength;
  }
}
