/**
 * Normalizer - canonical forms for SKU and price cells
 *
 * Pasted spreadsheet data arrives as strings, numbers, or empty cells that an
 * upstream parser may have turned into "nan"/"None". Everything here is pure
 * and total: no input throws.
 */

import type { Row } from '../types';

const EMPTY_SKU_TOKENS = new Set(['nan', 'none']);

/** Currency glyphs and thousands separators removed before parsing */
const PRICE_NOISE = /[,₹$]/g;

/** Plain decimal: optional sign, digits with optional fraction, optional exponent */
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function isMissing(raw: unknown): boolean {
  return raw === null || raw === undefined || (typeof raw === 'number' && Number.isNaN(raw));
}

/**
 * Trim a SKU cell. null, NaN, "nan" and "none" (any case) become "".
 */
export function normalizeSku(raw: unknown): string {
  if (isMissing(raw)) return '';
  const value = String(raw).trim();
  if (EMPTY_SKU_TOKENS.has(value.toLowerCase())) return '';
  return value;
}

/**
 * Parse a price cell into a number.
 *
 * "₹1,200" -> 1200, " $19.99 " -> 19.99, 12.5 -> 12.5, "" -> null, "abc" -> null.
 * Numbers are stringified first so they follow the same path as text.
 */
export function parsePrice(raw: unknown): number | null {
  const text = (isMissing(raw) ? '' : String(raw)).trim().replace(PRICE_NOISE, '').trim();
  if (!text || !DECIMAL_PATTERN.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * True when a publish status mentions "unpublished", in any case.
 */
export function isUnpublished(status: unknown): boolean {
  if (isMissing(status)) return false;
  return String(status).trim().toLowerCase().includes('unpublished');
}

export interface NormalizedRow {
  /** Position in the source table */
  index: number;
  sku: string;
  price: number | null;
  status: string;
}

export function normalizeRow(row: Row, index: number): NormalizedRow {
  return {
    index,
    sku: normalizeSku(row.sku),
    price: parsePrice(row.newPrice),
    status: isMissing(row.publishStatus) ? '' : String(row.publishStatus).trim(),
  };
}

/** A row counts as filled when it has a SKU or a parseable price. */
export function isBlankRow(row: NormalizedRow): boolean {
  return row.sku === '' && row.price === null;
}
