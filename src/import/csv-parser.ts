/**
 * CSV Parser - Parse CSV/TSV/pipe-delimited text into a header + records table
 *
 * Handles:
 * - Auto-detection of delimiter (comma, tab, pipe)
 * - UTF-8 BOM stripping
 * - Windows (\r\n), old Mac (\r) and Unix (\n) line endings
 * - Quoted fields with embedded delimiters/newlines and escaped quotes ("")
 */

import { createLogger } from '../utils/logger';
import type { ReferenceTable } from '../types';
import type { Delimiter } from './types';

const logger = createLogger('csv-parser');

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

const DELIMITER_MAP: Record<Exclude<Delimiter, 'auto'>, string> = {
  comma: ',',
  tab: '\t',
  pipe: '|',
};

function hasUnquoted(line: string, delim: string): boolean {
  let inQuotes = false;
  for (const ch of line) {
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (ch === delim && !inQuotes) {
      return true;
    }
  }
  return false;
}

/**
 * Auto-detect delimiter from the first few lines.
 * A tab outside quotes wins outright: spreadsheet copies are tab-separated and
 * their cells may hold thousands separators ("1,200"). Otherwise occurrences
 * are counted, preferring comma > pipe if counts are equal.
 */
export function detectDelimiter(text: string): string {
  const sampleLines = text.split(/\r?\n/).slice(0, 10).filter(Boolean);
  if (sampleLines.length === 0) return ',';
  if (sampleLines.some((line) => hasUnquoted(line, '\t'))) return '\t';

  const candidates = [',', '|'];
  let bestDelimiter = ',';
  let bestScore = -1;

  for (const delim of candidates) {
    const counts = sampleLines.map((line) => {
      let count = 0;
      let inQuotes = false;
      for (const ch of line) {
        if (ch === '"') {
          inQuotes = !inQuotes;
        } else if (ch === delim && !inQuotes) {
          count++;
        }
      }
      return count;
    });

    // Same count on every line earns a consistency bonus
    const uniqueCounts = new Set(counts);
    const avgCount = counts.reduce((a, b) => a + b, 0) / counts.length;
    const consistencyBonus = uniqueCounts.size === 1 ? 10 : 0;
    const score = avgCount + consistencyBonus;

    if (score > bestScore && avgCount > 0) {
      bestScore = score;
      bestDelimiter = delim;
    }
  }

  return bestDelimiter;
}

// ---------------------------------------------------------------------------
// Record tokenizer (handles quoted fields spanning lines)
// ---------------------------------------------------------------------------

export class CsvParseError extends Error {
  readonly line: number;

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`);
    this.name = 'CsvParseError';
    this.line = line;
  }
}

/**
 * Split text into records of fields. Fields are trimmed; a quote only opens a
 * quoted field at the start of a field.
 */
export function parseRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let quoteLine = 0;
  let line = 1;
  let i = 0;

  const endField = () => {
    fields.push(current.trim());
    current = '';
  };
  const endRecord = () => {
    endField();
    records.push(fields);
    fields = [];
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      if (ch === '\n') line++;
      current += ch;
      i++;
      continue;
    }

    if (ch === '"' && current.trim().length === 0) {
      current = '';
      inQuotes = true;
      quoteLine = line;
      i++;
      continue;
    }
    if (ch === delimiter) {
      endField();
      i++;
      continue;
    }
    if (ch === '\n') {
      endRecord();
      line++;
      i++;
      continue;
    }
    current += ch;
    i++;
  }

  if (inQuotes) {
    throw new CsvParseError('Unterminated quoted field', quoteLine);
  }
  if (current.length > 0 || fields.length > 0) {
    endRecord();
  }

  // Drop completely empty lines
  return records.filter((record) => record.some((field) => field.length > 0));
}

// ---------------------------------------------------------------------------
// Main parse function
// ---------------------------------------------------------------------------

export interface ParseOptions {
  delimiter?: Delimiter;
}

function prepareText(raw: string): string {
  let data = raw;
  // Strip UTF-8 BOM
  if (data.charCodeAt(0) === 0xfeff) {
    data = data.slice(1);
  }
  return data.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

export function resolveDelimiter(data: string, option: Delimiter = 'auto'): string {
  return option === 'auto' ? detectDelimiter(data) : DELIMITER_MAP[option];
}

/**
 * Parse delimited text into raw rows (no header handling).
 */
export function parseCsvRows(csvData: string, options: ParseOptions = {}): string[][] {
  const data = prepareText(csvData);
  return parseRecords(data, resolveDelimiter(data, options.delimiter));
}

/**
 * Parse delimited text whose first record is a header into a column list and
 * one record per data line, keyed by header name. Missing trailing cells read
 * as "". Duplicate header names keep the last column, matching how the
 * reference sheet is looked up by name.
 */
export function parseCsvTable(csvData: string, options: ParseOptions = {}): ReferenceTable {
  const data = prepareText(csvData);
  const delimiter = resolveDelimiter(data, options.delimiter);
  const rows = parseRecords(data, delimiter);

  if (rows.length === 0) {
    logger.warn('CSV has no header row');
    return { columns: [], records: [] };
  }

  const [header, ...body] = rows;
  const columns = header.map((name) => name.trim());

  const records = body.map((fields) => {
    const record: Record<string, string> = {};
    columns.forEach((column, index) => {
      record[column] = fields[index] ?? '';
    });
    return record;
  });

  logger.debug(
    { delimiter: delimiter === '\t' ? 'tab' : delimiter, columns, rows: records.length },
    'CSV parsing complete',
  );

  return { columns, records };
}
