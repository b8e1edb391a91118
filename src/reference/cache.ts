/**
 * Reference Cache - time-boxed memo of fetched reference sheets
 *
 * Keyed by the exact export URL. Entries expire; there is no manual
 * invalidation. Injected into the resolver so tests can pass their own clock
 * or skip caching entirely.
 */

import { createLogger } from '../utils/logger';
import type { ReferenceTable } from '../types';

const logger = createLogger('reference-cache');

/** 30 minutes in milliseconds */
export const DEFAULT_REFERENCE_TTL_MS = 30 * 60 * 1000;

/** Upper bound on distinct cached URLs */
const MAX_ENTRIES = 100;

export interface ReferenceCache {
  get: (url: string) => ReferenceTable | undefined;
  set: (url: string, table: ReferenceTable) => void;
  size: () => number;
}

export interface ReferenceCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

interface CachedTable {
  table: ReferenceTable;
  expiresAt: number;
}

export function createReferenceCache(options: ReferenceCacheOptions = {}): ReferenceCache {
  const ttlMs = options.ttlMs ?? DEFAULT_REFERENCE_TTL_MS;
  const now = options.now ?? Date.now;
  const entries = new Map<string, CachedTable>();

  function evictExpired(at: number): void {
    for (const [url, entry] of entries) {
      if (entry.expiresAt <= at) entries.delete(url);
    }
  }

  return {
    get(url) {
      const entry = entries.get(url);
      if (!entry) return undefined;
      if (entry.expiresAt <= now()) {
        entries.delete(url);
        logger.debug({ url }, 'Reference cache entry expired');
        return undefined;
      }
      return entry.table;
    },

    set(url, table) {
      if (ttlMs <= 0) return;
      const at = now();
      evictExpired(at);
      if (!entries.has(url) && entries.size >= MAX_ENTRIES) {
        const oldest = entries.keys().next().value;
        if (oldest !== undefined) entries.delete(oldest);
      }
      entries.set(url, { table, expiresAt: at + ttlMs });
    },

    size() {
      return entries.size;
    },
  };
}
