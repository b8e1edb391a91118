/**
 * Error types
 *
 * Every failure the pipeline reports is a PriceSheetError with a stable `code`,
 * so callers (the CLI, a web handler) can branch without string matching.
 */

export type PriceSheetErrorCode =
  | 'SCHEMA'
  | 'FETCH'
  | 'INVALID_SHEET_LINK'
  | 'VALIDATION'
  | 'UNPUBLISHED_CONFIRMATION'
  | 'TEMPLATE_MISSING'
  | 'ROW_COUNT'
  | 'SESSION_NOT_FOUND'
  | 'CONFIG';

export class PriceSheetError extends Error {
  readonly code: PriceSheetErrorCode;

  constructor(code: PriceSheetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PriceSheetError';
    this.code = code;
  }
}

/**
 * The reference sheet lacks one or more required columns.
 */
export class SchemaError extends PriceSheetError {
  readonly missing: string[];

  constructor(required: readonly string[], missing: string[]) {
    super(
      'SCHEMA',
      `Reference sheet must have columns: ${required.join(', ')} (missing: ${missing.join(', ')})`,
    );
    this.name = 'SchemaError';
    this.missing = missing;
  }
}

/**
 * Network, HTTP or parse failure while retrieving the reference sheet.
 */
export class FetchError extends PriceSheetError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, cause: unknown, status?: number) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('FETCH', `Failed to read reference sheet ${url}: ${reason}`, { cause });
    this.name = 'FetchError';
    this.url = url;
    this.status = status;
  }
}

export class InvalidSheetLinkError extends PriceSheetError {
  readonly link: string;

  constructor(link: string) {
    super('INVALID_SHEET_LINK', `Invalid sheet link: "${link}". Expected a link containing /d/<sheet id>/`);
    this.name = 'InvalidSheetLinkError';
    this.link = link;
  }
}

/**
 * Hard-fail validation messages. Blocks the download until the rows are fixed.
 */
export class ValidationHardError extends PriceSheetError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('VALIDATION', `Hard Fail. Fix these issues before downloading: ${errors.join('; ')}`);
    this.name = 'ValidationHardError';
    this.errors = errors;
  }
}

export class UnpublishedConfirmationError extends PriceSheetError {
  readonly skus: string[];

  constructor(skus: string[]) {
    super(
      'UNPUBLISHED_CONFIRMATION',
      `${skus.length} SKU are Unpublished. Confirm to include them in the file.`,
    );
    this.name = 'UnpublishedConfirmationError';
    this.skus = skus;
  }
}

export class TemplateMissingError extends PriceSheetError {
  readonly path: string;

  constructor(path: string) {
    super('TEMPLATE_MISSING', `Template missing. Add file at: ${path}`);
    this.name = 'TemplateMissingError';
    this.path = path;
  }
}

export class RowCountError extends PriceSheetError {
  constructor(value: unknown, max: number) {
    super('ROW_COUNT', `Row count must be an integer between 1 and ${max}, got ${String(value)}`);
    this.name = 'RowCountError';
  }
}

export class ConfigError extends PriceSheetError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG', message, { cause });
    this.name = 'ConfigError';
  }
}

export class SessionNotFoundError extends PriceSheetError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `No session with id ${sessionId}`);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}
