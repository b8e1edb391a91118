/**
 * Paste reader - SKU / New Price pairs copied from a spreadsheet
 *
 * Two columns copied out of Excel or Sheets arrive tab-separated; a CSV file
 * with the same two columns works too. Cells are kept raw so the validator can
 * report bad prices instead of them silently vanishing here.
 */

import { createLogger } from '../utils/logger';
import { parseCsvRows } from './csv-parser';
import type { Delimiter, PasteResult, PricePair } from './types';

const logger = createLogger('paste');

const HEADER_SKU_NAMES = new Set(['sku', 'seller sku', 'item sku', 'sku id']);

function looksLikeHeader(fields: string[]): boolean {
  const first = (fields[0] ?? '').trim().toLowerCase();
  return HEADER_SKU_NAMES.has(first);
}

export function parsePastedPairs(text: string, delimiter: Delimiter = 'auto'): PasteResult {
  const rows = parseCsvRows(text, { delimiter });
  if (rows.length === 0) {
    return { pairs: [], headerSkipped: false };
  }

  const headerSkipped = looksLikeHeader(rows[0]);
  const body = headerSkipped ? rows.slice(1) : rows;

  const pairs: PricePair[] = body.map((fields) => ({
    sku: fields[0] ?? '',
    newPrice: fields[1] ?? '',
  }));

  const extraColumns = body.filter((fields) => fields.length > 2).length;
  if (extraColumns > 0) {
    logger.warn({ rows: extraColumns }, 'Pasted rows have more than two columns; extra columns ignored');
  }

  return { pairs, headerSkipped };
}
