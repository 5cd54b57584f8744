/**
 * @fileoverview Shared reading of delimited text files for the format
 * converters: strict UTF-8 decoding, csv-parse tokenizing and header lookup.
 * @module src/services/motif/converters/tabular
 */
import { parse } from 'csv-parse/sync';

import { JsonRpcErrorCode, McpError, errorMessage } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';

/**
 * Header row plus data rows, every cell trimmed.
 */
export interface TabularFile {
  header: string[];
  rows: string[][];
}

/**
 * Decodes `bytes` as UTF-8, dropping a leading byte-order mark.
 * @throws {McpError} MalformedData on an invalid byte sequence.
 */
export function decodeUtf8(bytes: Uint8Array, fileName: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(
      bytes,
    );
  } catch (error) {
    throw new McpError(
      JsonRpcErrorCode.MalformedData,
      `${fileName} is not valid UTF-8.`,
      { fileName },
      { cause: error },
    );
  }
}

/**
 * First non-blank line, used to sniff the delimiter.
 */
export function firstLine(text: string): string {
  for (const line of text.split(/\r?\n/)) {
    if (line.trim()) return line;
  }
  return '';
}

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === 'string');
}

/**
 * Tokenizes delimited text into rows of trimmed cells. Blank lines are
 * dropped and rows may differ in length.
 * @throws {McpError} MalformedData when the text cannot be tokenized.
 */
export function tokenize(
  text: string,
  delimiter: string,
  fileName: string,
): string[][] {
  let records: unknown;
  try {
    records = parse(text, {
      delimiter,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new McpError(
      JsonRpcErrorCode.MalformedData,
      `Could not tokenize ${fileName}: ${errorMessage(error)}`,
      { fileName },
      { cause: error },
    );
  }

  if (!Array.isArray(records) || !records.every(isStringRow)) {
    throw new McpError(
      JsonRpcErrorCode.MalformedData,
      `Unexpected record shape in ${fileName}.`,
      { fileName },
    );
  }
  return records;
}

/**
 * Tokenizes delimited text whose first record is the header.
 * @throws {McpError} MalformedData when the text cannot be tokenized or has
 *   no header.
 */
export function readTabular(
  text: string,
  delimiter: string,
  fileName: string,
): TabularFile {
  const [header, ...rows] = tokenize(text, delimiter, fileName);
  if (!header || header.every((value) => value === '')) {
    throw new McpError(
      JsonRpcErrorCode.MalformedData,
      `${fileName} has no header row.`,
      { fileName },
    );
  }
  return { header, rows };
}

/**
 * Column positions by header name. Lookups are exact after trimming; the
 * first occurrence of a repeated name wins.
 */
export class ColumnIndex {
  private readonly positions = new Map<string, number>();

  constructor(header: readonly string[]) {
    header.forEach((name, index) => {
      const key = name.trim();
      if (key && !this.positions.has(key)) this.positions.set(key, index);
    });
  }

  /** Position of the first alias present in the header. */
  find(...aliases: string[]): number | undefined {
    for (const alias of aliases) {
      const position = this.positions.get(alias);
      if (position !== undefined) return position;
    }
    return undefined;
  }
}

/**
 * Cell at `index`, or an empty string when the row is short or the column
 * is absent.
 */
export function cell(row: readonly string[], index: number | undefined): string {
  if (index === undefined) return '';
  return row[index] ?? '';
}

/**
 * Parses a whole base-10 integer, rejecting fractions and trailing junk.
 */
export function parseInteger(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  return Number.parseInt(trimmed, 10);
}

export function parseFiniteNumber(value: string): number | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Raises MalformedData for required columns absent from the header.
 */
export function requireColumns(
  columns: Record<string, number | undefined>,
  fileName: string,
  tool: string,
): void {
  const missing = Object.entries(columns)
    .filter(([, position]) => position === undefined)
    .map(([name]) => name);
  if (missing.length > 0) {
    throw new McpError(
      JsonRpcErrorCode.MalformedData,
      `${fileName} is missing required column(s): ${missing.join(', ')}`,
      { fileName, tool, missingColumns: missing },
    );
  }
}

export function warnSkippedRow(
  tool: string,
  fileName: string,
  rowNumber: number,
  reason: string,
  context: RequestContext,
): void {
  logger.warning(`Skipping row ${rowNumber} of ${fileName}: ${reason}`, {
    ...context,
    tool,
    fileName,
    rowNumber,
  });
}
