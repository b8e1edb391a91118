import { describe, it, expect } from 'vitest';
import { createReferenceCache } from './cache';
import type { ReferenceTable } from '../types';

const TABLE: ReferenceTable = {
  columns: ['SKU', 'Publish Status', 'Price'],
  records: [{ SKU: 'A', 'Publish Status': 'Published', Price: '1' }],
};

describe('createReferenceCache', () => {
  it('serves an entry until its TTL elapses', () => {
    let t = 0;
    const cache = createReferenceCache({ ttlMs: 1000, now: () => t });

    cache.set('https://sheet/a', TABLE);
    expect(cache.get('https://sheet/a')).toBe(TABLE);

    t = 999;
    expect(cache.get('https://sheet/a')).toBe(TABLE);

    t = 1000;
    expect(cache.get('https://sheet/a')).toBeUndefined();
    expect(cache.size()).toBe(0);
  });

  it('keys on the exact URL', () => {
    const cache = createReferenceCache({ ttlMs: 1000, now: () => 0 });
    cache.set('https://sheet/a', TABLE);

    expect(cache.get('https://sheet/a?x=1')).toBeUndefined();
  });

  it('stores nothing when the TTL is 0', () => {
    const cache = createReferenceCache({ ttlMs: 0, now: () => 0 });
    cache.set('https://sheet/a', TABLE);

    expect(cache.get('https://sheet/a')).toBeUndefined();
    expect(cache.size()).toBe(0);
  });
});
