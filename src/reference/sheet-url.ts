/**
 * Shared sheet links -> CSV export URLs
 *
 * https://docs.google.com/spreadsheets/d/<id>/edit?usp=sharing
 *   -> https://docs.google.com/spreadsheets/d/<id>/export?format=csv
 */

const EXPORT_HOST = 'https://docs.google.com';

/** The path segment after "/d/", or "" when the link has none. */
export function extractSheetId(link: string): string {
  const parts = (link ?? '').split('/d/');
  if (parts.length < 2) return '';
  return parts[1].split('/')[0].split(/[?#]/)[0].trim();
}

/** CSV export URL for a shared link, or "" for a link without a sheet id. */
export function buildCsvExportUrl(link: string): string {
  const sheetId = extractSheetId(link);
  if (!sheetId) return '';
  return `${EXPORT_HOST}/spreadsheets/d/${encodeURIComponent(sheetId)}/export?format=csv`;
}
