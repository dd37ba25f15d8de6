import { EncodingError } from '../errors.js';

export const FIELD_DELIMITER = ';';

export const MARKER_LINE = 'SCAN';

const TIMESTAMP_PREFIX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/;

const DIGITS = String.raw`\d(?:_?\d)*`;

const NUMBER_PATTERN = new RegExp(
  String.raw`^[+-]?(?:${DIGITS}(?:\.(?:${DIGITS})?)?|\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`
);

const SPECIAL_PATTERN = /^([+-]?)(nan|inf|infinity)$/i;

/**
 * Split text into lines on `\r\n`, `\n` or a bare `\r`. A final line break
 * does not produce an extra empty line.
 */
export function splitLines(content: string): string[] {
  const lines = content.replace(/^\uFEFF/, '').split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function splitFields(line: string): string[] {
  return line.split(FIELD_DELIMITER).map((field) => field.trim());
}

export function looksLikeTimestamp(text: string): boolean {
  return TIMESTAMP_PREFIX.test(text);
}

/**
 * Parse a floating-point field. Accepts decimal and exponent notation with
 * `_` between digits, and `nan`, `inf`, `infinity` in any case with an
 * optional sign. Overflowing values become `Infinity`. Returns null for
 * empty cells and anything else.
 */
export function parseFloatField(text: string): number | null {
  const trimmed = text.trim();
  const special = SPECIAL_PATTERN.exec(trimmed);
  if (special) {
    if (special[2]?.toLowerCase() === 'nan') return Number.NaN;
    return special[1] === '-' ? -Infinity : Infinity;
  }
  if (!NUMBER_PATTERN.test(trimmed)) return null;
  return Number(trimmed.replaceAll('_', ''));
}

/**
 * Parse a finite number. Returns null where `parseFloatField` does and for
 * NaN or infinite values.
 */
export function parseNumber(text: string): number | null {
  const value = parseFloatField(text);
  return value !== null && Number.isFinite(value) ? value : null;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode file bytes as UTF-8, rejecting malformed sequences.
 */
export function decodeScanText(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) {
      throw new EncodingError();
    }
    throw err;
  }
}
