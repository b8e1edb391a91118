import { describe, it, expect } from 'vitest';
import { CsvParseError, detectDelimiter, parseCsvRows, parseCsvTable } from './csv-parser';

describe('detectDelimiter', () => {
  it('prefers a consistently used tab over a stray comma', () => {
    expect(detectDelimiter('SKU\tNew Price\nA1\t10\nB2\t1,200')).toBe('\t');
  });

  it('falls back to comma for single-column text', () => {
    expect(detectDelimiter('A1\nB2')).toBe(',');
  });

  it('picks tab when every comma sits inside a tab-separated cell', () => {
    expect(detectDelimiter('A1\t1,200\nB2\t2,500')).toBe('\t');
  });

  it('ignores tabs inside quoted fields', () => {
    expect(detectDelimiter('"a\tb",c\n"d\te",f')).toBe(',');
  });

  it('detects pipes', () => {
    expect(detectDelimiter('a|b\nc|d')).toBe('|');
  });
});

describe('parseCsvTable', () => {
  it('maps records by header name', () => {
    const table = parseCsvTable('SKU,Publish Status,Price\nA1,Published,10\nB2,Unpublished,\n');

    expect(table.columns).toEqual(['SKU', 'Publish Status', 'Price']);
    expect(table.records).toEqual([
      { SKU: 'A1', 'Publish Status': 'Published', Price: '10' },
      { SKU: 'B2', 'Publish Status': 'Unpublished', Price: '' },
    ]);
  });

  it('handles quoted fields with delimiters and escaped quotes', () => {
    const table = parseCsvTable('SKU,Publish Status,Price\n"A,1","Published ""live""",1200\n');

    expect(table.records[0]).toEqual({ SKU: 'A,1', 'Publish Status': 'Published "live"', Price: '1200' });
  });

  it('keeps newlines inside quoted fields', () => {
    const table = parseCsvTable('SKU,Publish Status,Price\nA,"line1\nline2",3\n');

    expect(table.records).toHaveLength(1);
    expect(table.records[0]['Publish Status']).toBe('line1\nline2');
  });

  it('strips the BOM and handles CRLF with tabs', () => {
    const table = parseCsvTable('\uFEFFSKU\tPublish Status\tPrice\r\nX\tLive\t5\r\n');

    expect(table.columns).toEqual(['SKU', 'Publish Status', 'Price']);
    expect(table.records).toEqual([{ SKU: 'X', 'Publish Status': 'Live', Price: '5' }]);
  });

  it('fills missing trailing cells with ""', () => {
    const table = parseCsvTable('SKU,Publish Status,Price\nA\n');

    expect(table.records).toEqual([{ SKU: 'A', 'Publish Status': '', Price: '' }]);
  });

  it('skips blank lines', () => {
    const table = parseCsvTable('SKU,Publish Status,Price\n\nA,Published,1\n\n');

    expect(table.records).toHaveLength(1);
  });

  it('returns an empty table for empty input', () => {
    expect(parseCsvTable('')).toEqual({ columns: [], records: [] });
  });

  it('throws on an unterminated quote', () => {
    expect(() => parseCsvTable('SKU,Publish Status,Price\n"A,Published,1\n')).toThrow(CsvParseError);
  });
});

describe('parseCsvRows', () => {
  it('honors an explicit delimiter', () => {
    expect(parseCsvRows('a;b|c', { delimiter: 'pipe' })).toEqual([['a;b', 'c']]);
  });
});
