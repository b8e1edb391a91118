/**
 * Validator - classifies the row table before a file is generated
 *
 * Hard fails block the download outright:
 * - blank SKU, blank/non-numeric price, zero or negative price
 * - SKU Not Found (status from the last reference refresh)
 * - duplicate SKU
 *
 * Soft fail (policy dependent): SKUs whose status mentions "unpublished".
 * They stay writable; the orchestrator asks for confirmation.
 *
 * Every check runs; messages are collected, never short-circuited.
 */

import { isBlankRow, isUnpublished, normalizeRow } from '../normalize/index';
import type { NormalizedRow } from '../normalize/index';
import { SKU_NOT_FOUND } from '../reference/resolver';
import type { RowTable, UnpublishedPolicy, ValidationResult, WritableRow } from '../types';

export const MESSAGES = {
  noRows: 'No rows found.',
  allBlank: 'All rows are blank.',
  blankSku: 'Some SKU values are blank.',
  invalidPrice: 'Some New Price values are blank or not a number.',
  nonPositivePrice: 'Some New Price values are 0 or negative.',
  notFound: (count: number) => `SKU Not Found: ${count}`,
  duplicate: (count: number) => `Duplicate SKU found: ${count}`,
} as const;

export interface ValidateOptions {
  unpublishedPolicy?: UnpublishedPolicy;
}

function emptyResult(hardErrors: string[]): ValidationResult {
  return {
    hardErrors,
    notFoundSKUs: [],
    unpublishedSKUs: [],
    duplicateSKUs: [],
    filledCount: 0,
    writableRows: [],
  };
}

function isNotFound(row: NormalizedRow): boolean {
  return row.status === SKU_NOT_FOUND;
}

/** Distinct SKU values that occur more than once, in first-seen order. */
function findDuplicates(rows: NormalizedRow[]): string[] {
  const counts = new Map<string, number>();
  for (const row of rows) {
    if (!row.sku) continue;
    counts.set(row.sku, (counts.get(row.sku) ?? 0) + 1);
  }
  return [...counts].filter(([, count]) => count > 1).map(([sku]) => sku);
}

export function validateRows(rows: RowTable, options: ValidateOptions = {}): ValidationResult {
  const policy = options.unpublishedPolicy ?? 'warn-require-confirm';

  if (rows.length === 0) {
    return emptyResult([MESSAGES.noRows]);
  }

  const filled = rows.map(normalizeRow).filter((row) => !isBlankRow(row));
  if (filled.length === 0) {
    return emptyResult([MESSAGES.allBlank]);
  }

  const hardErrors: string[] = [];

  if (filled.some((row) => row.sku === '')) {
    hardErrors.push(MESSAGES.blankSku);
  }
  if (filled.some((row) => row.price === null)) {
    hardErrors.push(MESSAGES.invalidPrice);
  }
  if (filled.some((row) => row.price !== null && row.price <= 0)) {
    hardErrors.push(MESSAGES.nonPositivePrice);
  }

  const notFoundSKUs = filled.filter(isNotFound).map((row) => row.sku);
  if (notFoundSKUs.length > 0) {
    hardErrors.push(MESSAGES.notFound(notFoundSKUs.length));
  }

  const duplicateSKUs = findDuplicates(filled);
  if (duplicateSKUs.length > 0) {
    hardErrors.push(MESSAGES.duplicate(duplicateSKUs.length));
  }

  const unpublishedSKUs =
    policy === 'ignore'
      ? []
      : filled.filter((row) => isUnpublished(row.status) && !isNotFound(row)).map((row) => row.sku);

  const duplicated = new Set(duplicateSKUs);
  const writableRows: WritableRow[] = [];
  for (const row of filled) {
    if (row.sku === '' || row.price === null || row.price <= 0) continue;
    if (isNotFound(row) || duplicated.has(row.sku)) continue;
    writableRows.push({ sku: row.sku, newPrice: row.price });
  }

  return {
    hardErrors,
    notFoundSKUs,
    unpublishedSKUs,
    duplicateSKUs,
    filledCount: filled.length,
    writableRows,
  };
}

/**
 * Headline shown above the download action.
 */
export function describeValidation(result: ValidationResult): string {
  if (result.hardErrors.length > 0) {
    return 'Hard Fail. Fix these issues before downloading:';
  }
  if (result.unpublishedSKUs.length > 0) {
    return `${result.unpublishedSKUs.length} SKU are Unpublished. Do you still want to proceed?`;
  }
  return 'No issues found. Ready to download.';
}
