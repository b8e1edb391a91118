import { describe, it, expect } from 'vitest';
import {
  applyPastedRows,
  assertRowCount,
  createEmptyTable,
  emptyRow,
  resizeTable,
  summarizeTable,
  updateCell,
} from './table';
import { RowCountError } from '../errors';
import type { Row } from '../types';

function row(sku: string, newPrice: string, publishStatus = '', currentPrice: string | number = ''): Row {
  return { sku, newPrice, publishStatus, currentPrice };
}

describe('assertRowCount', () => {
  it('accepts integers between 1 and the maximum', () => {
    expect(assertRowCount(1)).toBe(1);
    expect(assertRowCount(1000)).toBe(1000);
  });

  it('rejects everything else', () => {
    expect(() => assertRowCount(0)).toThrow(RowCountError);
    expect(() => assertRowCount(1001)).toThrow(RowCountError);
    expect(() => assertRowCount(2.5)).toThrow(RowCountError);
    expect(() => assertRowCount(5, 4)).toThrow('Row count must be an integer between 1 and 4, got 5');
  });
});

describe('createEmptyTable / resizeTable', () => {
  it('creates independent empty rows', () => {
    const table = createEmptyTable(3);

    expect(table).toEqual([emptyRow(), emptyRow(), emptyRow()]);
    expect(table[0]).not.toBe(table[1]);
  });

  it('grows with empty rows and keeps existing ones', () => {
    const table = resizeTable([row('A', '1')], 3);

    expect(table).toEqual([row('A', '1'), emptyRow(), emptyRow()]);
  });

  it('truncates from the bottom', () => {
    const table = resizeTable([row('A', '1'), row('B', '2'), row('C', '3')], 2);

    expect(table).toEqual([row('A', '1'), row('B', '2')]);
  });
});

describe('applyPastedRows', () => {
  it('writes from the top and reports what did not fit', () => {
    const table = [row('OLD', '9', 'Published', 90), emptyRow()];

    const outcome = applyPastedRows(table, [
      { sku: 'A', newPrice: '1' },
      { sku: 'B', newPrice: '2' },
      { sku: 'C', newPrice: '3' },
    ]);

    expect(outcome.written).toBe(2);
    expect(outcome.dropped).toBe(1);
    expect(outcome.table).toEqual([row('A', '1'), row('B', '2')]);
    expect(table[0]).toEqual(row('OLD', '9', 'Published', 90));
  });
});

describe('updateCell', () => {
  it('changes one field of one row', () => {
    const table = [row('A', '1', 'Published', 5), row('B', '2')];

    const next = updateCell(table, 0, 'newPrice', '7');

    expect(next).toEqual([row('A', '7', 'Published', 5), row('B', '2')]);
    expect(table[0].newPrice).toBe('1');
  });

  it('rejects an index outside the table', () => {
    expect(() => updateCell([emptyRow()], 1, 'sku', 'X')).toThrow(RangeError);
    expect(() => updateCell([emptyRow()], -1, 'sku', 'X')).toThrow(RangeError);
  });
});

describe('summarizeTable', () => {
  it('puts not-found ahead of unpublished', () => {
    const summary = summarizeTable([row('A', '1', 'SKU Not Found'), row('B', '1', 'Unpublished'), emptyRow()]);

    expect(summary).toEqual({
      filledCount: 2,
      notFoundCount: 1,
      unpublishedCount: 1,
      level: 'error',
      message: '1 SKU Not Found',
    });
  });

  it('warns about unpublished SKUs', () => {
    const summary = summarizeTable([row('B', '1', 'Unpublished'), row('C', '1', 'unpublished')]);

    expect(summary.level).toBe('warning');
    expect(summary.message).toBe('2 Unpublished SKU');
  });

  it('reports All OK, ignoring unpublished under the ignore policy', () => {
    const summary = summarizeTable([row('B', '1', 'Unpublished')], 'ignore');

    expect(summary.level).toBe('ok');
    expect(summary.message).toBe('All OK');
    expect(summary.unpublishedCount).toBe(0);
  });
});
