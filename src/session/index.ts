/**
 * Session Manager for pricesheet
 *
 * Owns one row table per session and drives the pipeline:
 * - paste / edit / resize / clear the table
 * - refresh status from the reference sheet (explicit, never automatic)
 * - evaluate: validation + quick-info counts on the current table
 * - prepare a download, gated on template presence, hard errors and the
 *   unpublished confirmation
 *
 * Sessions share nothing but the reference cache, whose values are never mutated.
 */

import { randomUUID } from 'crypto';
import type { Config, EditableField, RowTable, ValidationResult } from '../types';
import { createLogger } from '../utils/logger';
import {
  SessionNotFoundError,
  TemplateMissingError,
  UnpublishedConfirmationError,
  ValidationHardError,
} from '../errors';
import { parsePastedPairs } from '../import/paste';
import type { PricePair } from '../import/types';
import type { ReferenceCache } from '../reference/cache';
import { refreshReferenceStatus } from '../reference/resolver';
import { buildCsvExportUrl } from '../reference/sheet-url';
import { describeValidation, validateRows } from '../validation/validator';
import { fillTemplate, templateExists } from '../template/writer';
import { defaultFilename, resolveDownloadFilename } from '../export/filename';
import {
  applyPastedRows,
  createEmptyTable,
  resizeTable,
  summarizeTable,
  updateCell,
} from './table';
import type { PasteOutcome, TableSummary } from './table';

const logger = createLogger('sessions');

// =============================================================================
// Types
// =============================================================================

export interface PriceSession {
  id: string;
  rows: RowTable;
  rowCount: number;
  sheetLink: string;
  lastRefreshAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface Readiness {
  templateFound: boolean;
  templatePath: string;
  sheetLinkValid: boolean;
  csvUrl: string;
}

export interface Evaluation {
  validation: ValidationResult;
  summary: TableSummary;
  headline: string;
  readiness: Readiness;
  /** True when a download would succeed once any needed confirmation is given */
  downloadable: boolean;
  needsConfirmation: boolean;
}

export interface DownloadRequest {
  filename?: string;
  confirmUnpublished?: boolean;
}

export interface DownloadFile {
  filename: string;
  bytes: Buffer;
  rowCount: number;
}

export interface SessionManagerDeps {
  config: Config;
  cache?: ReferenceCache;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

export interface SessionManager {
  getOrCreateSession: (id?: string) => PriceSession;
  getSession: (id: string) => PriceSession | undefined;
  deleteSession: (id: string) => boolean;
  listSessions: () => PriceSession[];
  setRowCount: (id: string, count: number) => PriceSession;
  setSheetLink: (id: string, link: string) => PriceSession;
  paste: (id: string, input: string | PricePair[]) => PasteOutcome;
  editCell: (id: string, index: number, field: EditableField, value: string) => PriceSession;
  clear: (id: string) => PriceSession;
  refreshStatus: (id: string) => Promise<PriceSession>;
  evaluate: (id: string) => Evaluation;
  checkReadiness: (id: string) => Readiness;
  prepareDownload: (id: string, request?: DownloadRequest) => Promise<DownloadFile>;
}

// =============================================================================
// Factory
// =============================================================================

export function createSessionManager(deps: SessionManagerDeps): SessionManager {
  const { config } = deps;
  const now = deps.now ?? (() => new Date());
  const maxRows = config.table.maxRows;
  const policy = config.validation.unpublishedPolicy;
  const sessions = new Map<string, PriceSession>();

  function requireSession(id: string): PriceSession {
    const session = sessions.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  function replaceRows(session: PriceSession, rows: RowTable): PriceSession {
    session.rows = rows;
    session.rowCount = rows.length;
    session.updatedAt = now();
    return session;
  }

  function getOrCreateSession(id?: string): PriceSession {
    if (id) {
      const existing = sessions.get(id);
      if (existing) return existing;
    }
    const created = now();
    const session: PriceSession = {
      id: id ?? randomUUID(),
      rows: createEmptyTable(config.table.defaultRows, maxRows),
      rowCount: config.table.defaultRows,
      sheetLink: config.sheet.url,
      createdAt: created,
      updatedAt: created,
    };
    sessions.set(session.id, session);
    logger.debug({ sessionId: session.id, rows: session.rowCount }, 'Session created');
    return session;
  }

  function setRowCount(id: string, count: number): PriceSession {
    const session = requireSession(id);
    return replaceRows(session, resizeTable(session.rows, count, maxRows));
  }

  function setSheetLink(id: string, link: string): PriceSession {
    const session = requireSession(id);
    session.sheetLink = link.trim();
    session.updatedAt = now();
    return session;
  }

  function paste(id: string, input: string | PricePair[]): PasteOutcome {
    const session = requireSession(id);
    const pairs = typeof input === 'string' ? parsePastedPairs(input).pairs : input;
    const outcome = applyPastedRows(session.rows, pairs);
    replaceRows(session, outcome.table);
    if (outcome.dropped > 0) {
      logger.warn(
        { sessionId: id, dropped: outcome.dropped, rows: session.rowCount },
        'Pasted rows exceed the table size; increase the row count to keep them',
      );
    }
    return outcome;
  }

  function editCell(id: string, index: number, field: EditableField, value: string): PriceSession {
    const session = requireSession(id);
    return replaceRows(session, updateCell(session.rows, index, field, value));
  }

  function clear(id: string): PriceSession {
    const session = requireSession(id);
    return replaceRows(session, createEmptyTable(session.rowCount, maxRows));
  }

  async function refreshStatus(id: string): Promise<PriceSession> {
    const session = requireSession(id);
    const rows = await refreshReferenceStatus(session.rows, session.sheetLink, {
      cache: deps.cache,
      timeoutMs: config.sheet.fetchTimeoutMs,
      attempts: config.sheet.attempts,
      fetchImpl: deps.fetchImpl,
    });
    replaceRows(session, rows);
    session.lastRefreshAt = now();
    logger.info({ sessionId: id }, 'Status updated from reference sheet');
    return session;
  }

  function checkReadiness(id: string): Readiness {
    const session = requireSession(id);
    const csvUrl = buildCsvExportUrl(session.sheetLink);
    return {
      templateFound: templateExists(config.template.path),
      templatePath: config.template.path,
      sheetLinkValid: csvUrl !== '',
      csvUrl,
    };
  }

  function evaluate(id: string): Evaluation {
    const session = requireSession(id);
    const validation = validateRows(session.rows, { unpublishedPolicy: policy });
    const readiness = checkReadiness(id);
    const clean = validation.hardErrors.length === 0 && validation.writableRows.length > 0;
    return {
      validation,
      summary: summarizeTable(session.rows, policy),
      headline: describeValidation(validation),
      readiness,
      downloadable: readiness.templateFound && clean,
      needsConfirmation: clean && validation.unpublishedSKUs.length > 0,
    };
  }

  async function prepareDownload(id: string, request: DownloadRequest = {}): Promise<DownloadFile> {
    const session = requireSession(id);

    if (!templateExists(config.template.path)) {
      throw new TemplateMissingError(config.template.path);
    }

    const validation = validateRows(session.rows, { unpublishedPolicy: policy });
    if (validation.hardErrors.length > 0) {
      throw new ValidationHardError(validation.hardErrors);
    }
    if (validation.writableRows.length === 0) {
      throw new ValidationHardError(['No writable rows.']);
    }
    if (validation.unpublishedSKUs.length > 0 && !request.confirmUnpublished) {
      throw new UnpublishedConfirmationError(validation.unpublishedSKUs);
    }

    const bytes = await fillTemplate(validation.writableRows, {
      templatePath: config.template.path,
      layout: config.template.layout,
    });
    const fallback = defaultFilename(config.output.filenamePrefix, now());
    const filename = resolveDownloadFilename(request.filename, fallback);

    logger.info({ sessionId: id, filename, rows: validation.writableRows.length }, 'Download prepared');
    return { filename, bytes, rowCount: validation.writableRows.length };
  }

  return {
    getOrCreateSession,
    getSession: (id) => sessions.get(id),
    deleteSession: (id) => sessions.delete(id),
    listSessions: () => [...sessions.values()],
    setRowCount,
    setSheetLink,
    paste,
    editCell,
    clear,
    refreshStatus,
    evaluate,
    checkReadiness,
    prepareDownload,
  };
}

export * from './table';
