/**
 * Reference Resolver - joins the status sheet onto the row table
 *
 * Flow:
 * 1. shared link -> CSV export URL (rejected when no sheet id)
 * 2. fetch + parse, cached by URL for the TTL window
 * 3. check required columns, build a SKU -> entry map (last occurrence wins)
 * 4. overwrite Publish Status / Current Price on every row
 *
 * Nothing here mutates the caller's table; a failed refresh leaves it as it was.
 */

import { createLogger } from '../utils/logger';
import { fetchText, HttpStatusError } from '../utils/http';
import { normalizeSku, parsePrice } from '../normalize/index';
import { parseCsvTable } from '../import/csv-parser';
import { FetchError, InvalidSheetLinkError, SchemaError } from '../errors';
import type { ReferenceEntry, ReferenceMap, ReferenceTable, Row, RowTable } from '../types';
import type { ReferenceCache } from './cache';
import { buildCsvExportUrl } from './sheet-url';

const logger = createLogger('reference');

// =============================================================================
// CONSTANTS
// =============================================================================

export const SHEET_SKU_COLUMN = 'SKU';
export const SHEET_STATUS_COLUMN = 'Publish Status';
export const SHEET_PRICE_COLUMN = 'Price';

export const REQUIRED_COLUMNS = [SHEET_SKU_COLUMN, SHEET_STATUS_COLUMN, SHEET_PRICE_COLUMN] as const;

export const SKU_NOT_FOUND = 'SKU Not Found';

// =============================================================================
// TYPES
// =============================================================================

export interface ResolverDeps {
  cache?: ReferenceCache;
  timeoutMs?: number;
  attempts?: number;
  fetchImpl?: typeof fetch;
}

// =============================================================================
// FETCH
// =============================================================================

/**
 * Download and parse the reference sheet, serving a cached copy while it is fresh.
 */
export async function loadReferenceTable(csvUrl: string, deps: ResolverDeps = {}): Promise<ReferenceTable> {
  const cached = deps.cache?.get(csvUrl);
  if (cached) {
    logger.debug({ url: csvUrl, rows: cached.records.length }, 'Reference sheet served from cache');
    return cached;
  }

  let text: string;
  try {
    text = await fetchText(csvUrl, {
      timeoutMs: deps.timeoutMs,
      attempts: deps.attempts,
      fetchImpl: deps.fetchImpl,
    });
  } catch (err) {
    const status = err instanceof HttpStatusError ? err.status : undefined;
    logger.error({ url: csvUrl, status, err }, 'Reference sheet download failed');
    throw new FetchError(csvUrl, err, status);
  }

  let table: ReferenceTable;
  try {
    table = parseCsvTable(text, { delimiter: 'comma' });
  } catch (err) {
    logger.error({ url: csvUrl, err }, 'Reference sheet could not be parsed');
    throw new FetchError(csvUrl, err);
  }

  deps.cache?.set(csvUrl, table);
  logger.info({ url: csvUrl, rows: table.records.length }, 'Reference sheet loaded');
  return table;
}

// =============================================================================
// LOOKUP MAP
// =============================================================================

/** Reference price cell: number when numeric, "" when blank, otherwise the text as-is. */
function referencePrice(raw: string | undefined): number | string {
  const text = (raw ?? '').trim();
  if (!text || text.toLowerCase() === 'nan') return '';
  const value = parsePrice(text);
  return value === null ? text : value;
}

/**
 * Build the SKU -> (status, price) map. Throws SchemaError naming any missing
 * required column.
 */
export function buildReferenceMap(table: ReferenceTable): ReferenceMap {
  const present = new Set(table.columns);
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    logger.warn({ missing, columns: table.columns }, 'Reference sheet is missing required columns');
    throw new SchemaError(REQUIRED_COLUMNS, missing);
  }

  const map: ReferenceMap = new Map();
  for (const record of table.records) {
    const sku = normalizeSku(record[SHEET_SKU_COLUMN]);
    if (!sku) continue;
    const entry: ReferenceEntry = {
      sku,
      status: (record[SHEET_STATUS_COLUMN] ?? '').trim(),
      price: referencePrice(record[SHEET_PRICE_COLUMN]),
    };
    // Re-inserting keeps the last occurrence
    map.set(sku, entry);
  }
  return map;
}

// =============================================================================
// JOIN
// =============================================================================

function lookupRow(row: Row, map: ReferenceMap): Row {
  const sku = normalizeSku(row.sku);
  if (!sku) {
    return { ...row, publishStatus: '', currentPrice: '' };
  }
  const entry = map.get(sku);
  if (!entry) {
    return { ...row, publishStatus: SKU_NOT_FOUND, currentPrice: '' };
  }
  return { ...row, publishStatus: entry.status, currentPrice: entry.price };
}

/**
 * Return a copy of `rows` with status and current price taken from the
 * reference table. SKU and New Price are left exactly as entered.
 */
export function applyStatusLookup(rows: RowTable, table: ReferenceTable): RowTable {
  const map = buildReferenceMap(table);
  const out = rows.map((row) => lookupRow(row, map));

  const notFound = out.filter((row) => row.publishStatus === SKU_NOT_FOUND).length;
  logger.info({ rows: rows.length, referenceSkus: map.size, notFound }, 'Status lookup applied');
  return out;
}

/**
 * Resolve a shared sheet link and join it onto the table.
 */
export async function refreshReferenceStatus(
  rows: RowTable,
  sheetLink: string,
  deps: ResolverDeps = {},
): Promise<RowTable> {
  const csvUrl = buildCsvExportUrl(sheetLink);
  if (!csvUrl) {
    throw new InvalidSheetLinkError(sheetLink);
  }
  const table = await loadReferenceTable(csvUrl, deps);
  return applyStatusLookup(rows, table);
}
