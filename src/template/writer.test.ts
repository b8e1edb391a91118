import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import ExcelJS from 'exceljs';
import { createBlankTemplate, fillTemplate, templateExists } from './writer';
import { TemplateMissingError } from '../errors';
import type { TemplateLayout } from '../types';

async function readBack(dir: string, bytes: Buffer): Promise<ExcelJS.Worksheet> {
  const file = join(dir, 'out.xlsx');
  await writeFile(file, bytes);
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(file);
  const sheet = workbook.worksheets.at(0);
  if (!sheet) throw new Error('output has no worksheet');
  return sheet;
}

describe('template writer', () => {
  let dir: string;
  let templatePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pricesheet-template-'));
    templatePath = join(dir, 'templates', 'price_update_template.xlsx');
    await createBlankTemplate(templatePath);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates a template with headers above the data row', async () => {
    expect(templateExists(templatePath)).toBe(true);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(templatePath);
    const sheet = workbook.worksheets.at(0);

    expect(sheet?.getCell('A1').value).toBe('Price Update');
    expect(sheet?.getCell('D6').value).toBe('SKU');
    expect(sheet?.getCell('E6').value).toBe('Price');
    expect(sheet?.getCell('F6').value).toBe('Price 2');
    expect(sheet?.getCell('G6').value).toBe('Price 3');
  });

  it('writes the SKU into D and the same price into E, F and G from row 7', async () => {
    const bytes = await fillTemplate(
      [
        { sku: ' A ', newPrice: 9.99 },
        { sku: 'B', newPrice: 1200 },
      ],
      { templatePath },
    );
    const sheet = await readBack(dir, bytes);

    expect(sheet.getCell('D7').value).toBe('A');
    expect(sheet.getCell('E7').value).toBe(9.99);
    expect(sheet.getCell('F7').value).toBe(9.99);
    expect(sheet.getCell('G7').value).toBe(9.99);
    expect(sheet.getCell('D8').value).toBe('B');
    expect(sheet.getCell('G8').value).toBe(1200);
    expect(sheet.getCell('D9').value).toBeNull();
    expect(sheet.getCell('D6').value).toBe('SKU');
  });

  it('clears stale values left in the template, beyond the written rows', async () => {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(templatePath);
    const stale = workbook.worksheets.at(0);
    if (!stale) throw new Error('template has no worksheet');
    stale.getCell('D7').value = 'OLD-1';
    stale.getCell('E7').value = 1;
    stale.getCell('D12').value = 'OLD-2';
    stale.getCell('G80').value = 5;
    await workbook.xlsx.writeFile(templatePath);

    const bytes = await fillTemplate([{ sku: 'NEW', newPrice: 2 }], { templatePath });
    const sheet = await readBack(dir, bytes);

    expect(sheet.getCell('D7').value).toBe('NEW');
    expect(sheet.getCell('E7').value).toBe(2);
    expect(sheet.getCell('D12').value).toBeNull();
    expect(sheet.getCell('G80').value).toBeNull();
  });

  it('honors a custom layout', async () => {
    const layout: TemplateLayout = { startRow: 3, skuColumn: 'B', priceColumns: ['C'] };
    const customPath = join(dir, 'custom.xlsx');
    await createBlankTemplate(customPath, layout);

    const bytes = await fillTemplate(
      [
        { sku: 'X', newPrice: 1 },
        { sku: 'Y', newPrice: 2 },
      ],
      { templatePath: customPath, layout },
    );
    const sheet = await readBack(dir, bytes);

    expect(sheet.getCell('B2').value).toBe('SKU');
    expect(sheet.getCell('B3').value).toBe('X');
    expect(sheet.getCell('C3').value).toBe(1);
    expect(sheet.getCell('B4').value).toBe('Y');
    expect(sheet.getCell('C4').value).toBe(2);
    expect(sheet.getCell('D3').value).toBeNull();
  });

  it('fails with TemplateMissingError when the file is absent', async () => {
    const missing = join(dir, 'nope.xlsx');

    await expect(fillTemplate([{ sku: 'A', newPrice: 1 }], { templatePath: missing })).rejects.toThrow(
      `Template missing. Add file at: ${missing}`,
    );
    await expect(fillTemplate([], { templatePath: missing })).rejects.toBeInstanceOf(TemplateMissingError);
  });
});
