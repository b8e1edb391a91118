/**
 * Row table operations
 *
 * Pure functions over RowTable: every operation returns a new table and leaves
 * its input untouched, so a session can swap tables atomically.
 */

import { RowCountError } from '../errors';
import { isBlankRow, isUnpublished, normalizeRow } from '../normalize/index';
import { SKU_NOT_FOUND } from '../reference/resolver';
import type { PricePair } from '../import/types';
import { MAX_ROWS } from '../types';
import type { EditableField, Row, RowTable, UnpublishedPolicy } from '../types';

export function emptyRow(): Row {
  return { sku: '', newPrice: '', publishStatus: '', currentPrice: '' };
}

/**
 * Throw unless `count` is an integer in [1, max].
 */
export function assertRowCount(count: number, max: number = MAX_ROWS): number {
  if (!Number.isInteger(count) || count < 1 || count > max) {
    throw new RowCountError(count, max);
  }
  return count;
}

export function createEmptyTable(count: number, max: number = MAX_ROWS): RowTable {
  assertRowCount(count, max);
  return Array.from({ length: count }, emptyRow);
}

/** Grow with empty rows or truncate from the bottom. */
export function resizeTable(table: RowTable, count: number, max: number = MAX_ROWS): RowTable {
  assertRowCount(count, max);
  if (table.length >= count) {
    return table.slice(0, count).map((row) => ({ ...row }));
  }
  return [...table.map((row) => ({ ...row })), ...createEmptyTable(count - table.length, max)];
}

export interface PasteOutcome {
  table: RowTable;
  written: number;
  /** Pairs that did not fit in the table */
  dropped: number;
}

/**
 * Write pairs into the table from the top. Status and current price of every
 * written row are reset, since they described the previous SKU.
 */
export function applyPastedRows(table: RowTable, pairs: PricePair[], startIndex = 0): PasteOutcome {
  const next = table.map((row) => ({ ...row }));
  let written = 0;
  for (const pair of pairs) {
    const index = startIndex + written;
    if (index >= next.length) break;
    next[index] = { sku: pair.sku, newPrice: pair.newPrice, publishStatus: '', currentPrice: '' };
    written++;
  }
  return { table: next, written, dropped: pairs.length - written };
}

export function updateCell(table: RowTable, index: number, field: EditableField, value: string): RowTable {
  if (!Number.isInteger(index) || index < 0 || index >= table.length) {
    throw new RangeError(`Row index ${index} is outside the table (0..${table.length - 1})`);
  }
  return table.map((row, i) => (i === index ? { ...row, [field]: value } : { ...row }));
}

// =============================================================================
// Quick info
// =============================================================================

export type SummaryLevel = 'ok' | 'warning' | 'error';

export interface TableSummary {
  filledCount: number;
  notFoundCount: number;
  unpublishedCount: number;
  level: SummaryLevel;
  message: string;
}

/**
 * Counts shown next to the table. Not-found outranks unpublished.
 */
export function summarizeTable(table: RowTable, policy: UnpublishedPolicy = 'warn-require-confirm'): TableSummary {
  const filled = table.map(normalizeRow).filter((row) => !isBlankRow(row));
  const notFoundCount = filled.filter((row) => row.status === SKU_NOT_FOUND).length;
  const unpublishedCount =
    policy === 'ignore' ? 0 : filled.filter((row) => isUnpublished(row.status)).length;

  if (notFoundCount > 0) {
    return { filledCount: filled.length, notFoundCount, unpublishedCount, level: 'error', message: `${notFoundCount} SKU Not Found` };
  }
  if (unpublishedCount > 0) {
    return { filledCount: filled.length, notFoundCount, unpublishedCount, level: 'warning', message: `${unpublishedCount} Unpublished SKU` };
  }
  return { filledCount: filled.length, notFoundCount, unpublishedCount, level: 'ok', message: 'All OK' };
}
