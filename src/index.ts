/**
 * pricesheet - bulk price-update preparation
 *
 * Public API. The CLI in ./cli is one consumer; a web handler holding one
 * session per user is another.
 */

export * from './types';
export * from './errors';
export { normalizeSku, parsePrice, isUnpublished, normalizeRow, isBlankRow } from './normalize/index';
export type { NormalizedRow } from './normalize/index';
export { parseCsvTable, parseCsvRows, detectDelimiter, CsvParseError } from './import/csv-parser';
export { parsePastedPairs } from './import/paste';
export type { Delimiter, PricePair, PasteResult } from './import/types';
export { extractSheetId, buildCsvExportUrl } from './reference/sheet-url';
export { createReferenceCache, DEFAULT_REFERENCE_TTL_MS } from './reference/cache';
export type { ReferenceCache, ReferenceCacheOptions } from './reference/cache';
export {
  loadReferenceTable,
  buildReferenceMap,
  applyStatusLookup,
  refreshReferenceStatus,
  REQUIRED_COLUMNS,
  SKU_NOT_FOUND,
} from './reference/resolver';
export type { ResolverDeps } from './reference/resolver';
export { validateRows, describeValidation, MESSAGES } from './validation/validator';
export type { ValidateOptions } from './validation/validator';
export {
  fillTemplate,
  templateExists,
  createBlankTemplate,
} from './template/writer';
export type { FillTemplateOptions } from './template/writer';
export {
  sanitizeFilename,
  defaultFilename,
  ensureXlsxSuffix,
  resolveDownloadFilename,
} from './export/filename';
export * from './session/index';
export { loadConfig, getDefaultConfig } from './utils/config';
export { createLogger } from './utils/logger';
