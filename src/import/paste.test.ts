import { describe, it, expect } from 'vitest';
import { parsePastedPairs } from './paste';
import { validateRows } from '../validation/validator';

describe('parsePastedPairs', () => {
  it('reads two tab-separated columns and skips the header', () => {
    const result = parsePastedPairs('SKU\tNew Price\nA1\t10\nB2\t₹1,200\n');

    expect(result.headerSkipped).toBe(true);
    expect(result.pairs).toEqual([
      { sku: 'A1', newPrice: '10' },
      { sku: 'B2', newPrice: '₹1,200' },
    ]);
  });

  it('keeps rows without a header and with a missing price', () => {
    const result = parsePastedPairs('A1,10\nB2\n');

    expect(result.headerSkipped).toBe(false);
    expect(result.pairs).toEqual([
      { sku: 'A1', newPrice: '10' },
      { sku: 'B2', newPrice: '' },
    ]);
  });

  it('keeps a thousands separator inside a tab-separated price', () => {
    expect(parsePastedPairs('A1\t₹1,200\n').pairs).toEqual([{ sku: 'A1', newPrice: '₹1,200' }]);
  });

  it('reads spreadsheet rows whose prices all carry separators', () => {
    const { pairs } = parsePastedPairs('A1\t1,200\nB2\t2,500\n');

    expect(pairs).toEqual([
      { sku: 'A1', newPrice: '1,200' },
      { sku: 'B2', newPrice: '2,500' },
    ]);

    const rows = pairs.map((pair) => ({ ...pair, publishStatus: '', currentPrice: '' }));
    expect(validateRows(rows).writableRows).toEqual([
      { sku: 'A1', newPrice: 1200 },
      { sku: 'B2', newPrice: 2500 },
    ]);
  });

  it('returns nothing for empty input', () => {
    expect(parsePastedPairs('')).toEqual({ pairs: [], headerSkipped: false });
  });
});
