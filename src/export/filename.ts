/**
 * Output file naming
 */

const XLSX_SUFFIX = '.xlsx';

/**
 * Keep word characters, hyphens and spaces; spaces become underscores.
 * "My File!! 2024" -> "My_File_2024"
 */
export function sanitizeFilename(name: string | null | undefined): string {
  const trimmed = (name ?? '').trim();
  if (!trimmed) return '';
  return trimmed.replace(/[^\w\- ]+/g, '').replace(/\s+/g, '_');
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** `<prefix>_YYYYMMDD` in local time */
export function defaultFilename(prefix: string, date: Date = new Date()): string {
  const stamp = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  return `${prefix}_${stamp}`;
}

export function ensureXlsxSuffix(name: string): string {
  return name.toLowerCase().endsWith(XLSX_SUFFIX) ? name : `${name}${XLSX_SUFFIX}`;
}

/**
 * Sanitized custom name, falling back when nothing survives sanitizing.
 * An ".xlsx" the user typed is kept as typed; otherwise one is appended.
 */
export function resolveDownloadFilename(custom: string | null | undefined, fallback: string): string {
  const trimmed = (custom ?? '').trim();
  const typedSuffix = /\.xlsx$/i.exec(trimmed)?.[0];
  const base = typedSuffix ? trimmed.slice(0, -typedSuffix.length) : trimmed;

  const safe = sanitizeFilename(base);
  if (!safe) return ensureXlsxSuffix(sanitizeFilename(fallback));
  return `${safe}${typedSuffix ?? XLSX_SUFFIX}`;
}
