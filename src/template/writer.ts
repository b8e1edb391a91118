/**
 * Template Writer - projects writable rows onto the upload template
 *
 * The template's first worksheet carries the marketplace header block; data
 * starts at a fixed row. Each record writes its SKU into the SKU column and the
 * same price into every price column.
 */

import { existsSync } from 'fs';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import ExcelJS from 'exceljs';
import { createLogger } from '../utils/logger';
import { TemplateMissingError } from '../errors';
import { DEFAULT_LAYOUT } from '../types';
import type { TemplateLayout, WritableRow } from '../types';

const logger = createLogger('template');

/** Rows cleared past the last written record, so leftovers never survive */
const CLEAR_MARGIN = 50;

export interface FillTemplateOptions {
  templatePath: string;
  layout?: TemplateLayout;
}

export function templateExists(templatePath: string): boolean {
  return existsSync(templatePath);
}

async function loadTemplate(templatePath: string): Promise<ExcelJS.Workbook> {
  if (!templateExists(templatePath)) {
    throw new TemplateMissingError(templatePath);
  }
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(templatePath);
  return workbook;
}

function firstWorksheet(workbook: ExcelJS.Workbook, templatePath: string): ExcelJS.Worksheet {
  const sheet = workbook.worksheets.at(0);
  if (!sheet) {
    throw new TemplateMissingError(`${templatePath} (no worksheet)`);
  }
  return sheet;
}

function clearRegion(sheet: ExcelJS.Worksheet, layout: TemplateLayout, lastRow: number): void {
  for (let r = layout.startRow; r <= lastRow; r++) {
    sheet.getCell(`${layout.skuColumn}${r}`).value = null;
    for (const column of layout.priceColumns) {
      sheet.getCell(`${column}${r}`).value = null;
    }
  }
}

/**
 * Fill the template with `rows` and return the complete workbook bytes.
 */
export async function fillTemplate(rows: WritableRow[], options: FillTemplateOptions): Promise<Buffer> {
  const layout = options.layout ?? DEFAULT_LAYOUT;
  const workbook = await loadTemplate(options.templatePath);
  const sheet = firstWorksheet(workbook, options.templatePath);

  const lastRow = Math.max(sheet.rowCount, layout.startRow + rows.length + CLEAR_MARGIN);
  clearRegion(sheet, layout, lastRow);

  rows.forEach((row, i) => {
    const r = layout.startRow + i;
    sheet.getCell(`${layout.skuColumn}${r}`).value = row.sku.trim();
    for (const column of layout.priceColumns) {
      sheet.getCell(`${column}${r}`).value = row.newPrice;
    }
  });

  const out = await workbook.xlsx.writeBuffer();
  logger.info({ rows: rows.length, cleared: lastRow - layout.startRow + 1 }, 'Template filled');
  return Buffer.from(out);
}

/**
 * Write a starter template: a title, the column headers on the row above the
 * data, and nothing else. Used when no marketplace template is on disk yet.
 */
export async function createBlankTemplate(
  templatePath: string,
  layout: TemplateLayout = DEFAULT_LAYOUT,
): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Price Update');

  sheet.getCell('A1').value = 'Price Update';
  sheet.getCell('A1').font = { bold: true, size: 14 };

  const headerRow = Math.max(1, layout.startRow - 1);
  const sku = sheet.getCell(`${layout.skuColumn}${headerRow}`);
  sku.value = 'SKU';
  sku.font = { bold: true };
  sheet.getColumn(layout.skuColumn).width = 24;

  layout.priceColumns.forEach((column, i) => {
    const cell = sheet.getCell(`${column}${headerRow}`);
    cell.value = i === 0 ? 'Price' : `Price ${i + 1}`;
    cell.font = { bold: true };
    sheet.getColumn(column).width = 14;
  });

  await mkdir(dirname(templatePath), { recursive: true });
  await workbook.xlsx.writeFile(templatePath);
  logger.info({ templatePath }, 'Blank template written');
}
