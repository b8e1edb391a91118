/**
 * Shared types for pricesheet
 */

// =============================================================================
// ROW TABLE
// =============================================================================

/**
 * One line of the price-update table. Everything is kept as the user typed it;
 * normalization happens in the validator, not on edit.
 */
export interface Row {
  sku: string;
  /** Raw user input, e.g. "₹1,200" or "19.99" */
  newPrice: string;
  publishStatus: string;
  currentPrice: string | number;
}

/** Rows are identified by position, not by SKU. */
export type RowTable = Row[];

/** Columns a user may edit. Status and current price come from the reference sheet. */
export type EditableField = 'sku' | 'newPrice';

// =============================================================================
// REFERENCE SHEET
// =============================================================================

export interface ReferenceTable {
  columns: string[];
  records: Array<Record<string, string>>;
}

export interface ReferenceEntry {
  sku: string;
  status: string;
  price: number | string;
}

export type ReferenceMap = Map<string, ReferenceEntry>;

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * How rows whose publish status mentions "unpublished" are treated.
 * - ignore: not tracked at all
 * - warn-require-confirm: listed, and a download needs explicit confirmation
 */
export type UnpublishedPolicy = 'ignore' | 'warn-require-confirm';

export const UNPUBLISHED_POLICIES: readonly UnpublishedPolicy[] = ['ignore', 'warn-require-confirm'];

export interface WritableRow {
  sku: string;
  newPrice: number;
}

export interface ValidationResult {
  hardErrors: string[];
  notFoundSKUs: string[];
  unpublishedSKUs: string[];
  duplicateSKUs: string[];
  /** Number of non-blank rows */
  filledCount: number;
  writableRows: WritableRow[];
}

// =============================================================================
// TEMPLATE
// =============================================================================

export interface TemplateLayout {
  /** 1-based row of the first data line */
  startRow: number;
  skuColumn: string;
  /** Columns that all receive the same new price */
  priceColumns: string[];
}

/** SKU in D, the same price in E, F and G, data from row 7 */
export const DEFAULT_LAYOUT: TemplateLayout = {
  startRow: 7,
  skuColumn: 'D',
  priceColumns: ['E', 'F', 'G'],
};

/** Upper bound of the row-count control */
export const MAX_ROWS = 1000;

// =============================================================================
// CONFIG
// =============================================================================

export interface Config {
  sheet: {
    /** Shared link of the reference sheet ("Anyone with the link" viewer access) */
    url: string;
    fetchTimeoutMs: number;
    cacheTtlMs: number;
    attempts: number;
  };
  template: {
    path: string;
    layout: TemplateLayout;
  };
  table: {
    defaultRows: number;
    maxRows: number;
  };
  validation: {
    unpublishedPolicy: UnpublishedPolicy;
  };
  output: {
    filenamePrefix: string;
    dir: string;
  };
}
