/**
 * Line/Row Extractor
 * Turns uploaded bytes into an ordered list of candidate lines
 */

import { parse } from 'csv-parse/sync';
import type { ExtractOptions, FileFormat } from '../types/batch.js';
import { InputParseError, UnsupportedFormatError, toErrorMessage } from '../errors.js';

const TEXT_COLUMN = 'text';

/**
 * Detect file format from the upload's file name
 */
export function detectFileFormat(filename: string): FileFormat {
  const extension = filename.toLowerCase().split('.').pop() || '';

  switch (extension) {
    case 'txt':
      return 'txt';
    case 'csv':
      return 'csv';
    default:
      throw new UnsupportedFormatError(extension);
  }
}

export function isSupportedFormat(filename: string): boolean {
  const extension = filename.toLowerCase().split('.').pop() || '';
  return ['txt', 'csv'].includes(extension);
}

function decodeSegment(bytes: Uint8Array, leading: boolean): string {
  const decoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: !leading });
  return decoder.decode(bytes).replace(/\uFFFD/g, '');
}

/**
 * Decode UTF-8 without ever throwing.
 * The BOM is stripped and invalid sequences are dropped. A U+FFFD that is
 * spelled out in the input (EF BF BD) is kept, so the input is split around
 * those bytes before decoding.
 */
export function decodeUpload(buffer: Uint8Array): string {
  const pieces: string[] = [];
  let start = 0;

  for (let i = 0; i + 2 < buffer.length; i++) {
    if (buffer[i] === 0xef && buffer[i + 1] === 0xbf && buffer[i + 2] === 0xbd) {
      pieces.push(decodeSegment(buffer.subarray(start, i), start === 0));
      start = i + 3;
      i += 2;
    }
  }
  pieces.push(decodeSegment(buffer.subarray(start), start === 0));

  return pieces.join('\uFFFD');
}

/**
 * Split plain text into trimmed lines.
 * A trailing line break does not add an empty last line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];

  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  return lines.map(line => line.trim());
}

function parseRows(text: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw new InputParseError(toErrorMessage(error), { cause: error });
  }

  if (!Array.isArray(parsed)) {
    throw new InputParseError('CSV parser returned no rows');
  }

  return parsed.map((row: unknown, index) => {
    if (!Array.isArray(row) || !row.every((cell): cell is string => typeof cell === 'string')) {
      throw new InputParseError(`Malformed CSV row ${index + 1}`);
    }
    return row;
  });
}

/**
 * Index of the `text` column in a header row, or -1
 */
export function findTextColumn(header: string[]): number {
  return header.findIndex(cell => cell.trim().toLowerCase() === TEXT_COLUMN);
}

/**
 * Extract candidates from CSV rows.
 *
 * A first row holding a `text` column selects that column for the rows
 * after it. Otherwise the first cell of every row is used; the first row
 * is only skipped when the caller says the file has a header.
 */
export function extractCsvCandidates(text: string, options: ExtractOptions = {}): string[] {
  const rows = parseRows(text);
  if (rows.length === 0) return [];

  const textColumn = findTextColumn(rows[0]);
  if (textColumn !== -1) {
    return rows.slice(1).map(row => (row[textColumn] ?? '').trim());
  }

  const dataRows = options.hasHeader ? rows.slice(1) : rows;
  return dataRows
    .filter(row => row.length > 0)
    .map(row => row[0].trim());
}

/**
 * Extract candidate lines from an uploaded file.
 * Blank candidates are kept; the batch driver skips them.
 */
export function extractCandidates(
  buffer: Uint8Array,
  format: FileFormat,
  options: ExtractOptions = {}
): string[] {
  const text = decodeUpload(buffer);

  switch (format) {
    case 'txt':
      return splitLines(text);
    case 'csv':
      return extractCsvCandidates(text, options);
  }
}
