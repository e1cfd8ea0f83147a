import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { buildWorkbook, countByCompany, countBySubcategory, exportXlsx } from './xlsx-exporter.js';
import { createReviewerInfo, createScrapedData, toFlatRows } from '../scraper/records.js';

const records = [
  createScrapedData({
    subcategory: 'PHP',
    competitor: { name: 'Acme' },
    reviewers: [createReviewerInfo({ name: 'Jane Doe' }), createReviewerInfo({ name: 'Sam Lee' })],
  }),
  createScrapedData({ subcategory: 'Laravel', competitor: { name: 'Blue River' } }),
  createScrapedData({ subcategory: null, competitor: { name: 'Cobalt Works' } }),
  createScrapedData({
    subcategory: 'Laravel',
    competitor: { name: 'Cobalt Works' },
    reviewers: [createReviewerInfo({ name: 'Ann Park' })],
  }),
];

const rows = records.flatMap(toFlatRows);

describe('xlsx exporter', () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('should count rows per subcategory by name', () => {
    expect(countBySubcategory(rows)).toEqual([
      ['Laravel', 2],
      ['PHP', 2],
    ]);
  });

  it('should count rows per company, most first', () => {
    expect(countByCompany(rows)).toEqual([
      ['Acme', 2],
      ['Cobalt Works', 2],
      ['Blue River', 1],
    ]);
  });

  it('should build the data and summary sheets', () => {
    const workbook = buildWorkbook(records);

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual([
      'All Data',
      'Summary by Category',
      'Companies Summary',
    ]);

    const allData = workbook.getWorksheet('All Data');
    expect(allData?.rowCount).toBe(6);
    expect(allData?.getRow(1).getCell(1).value).toBe('category');
    expect(allData?.getRow(2).getCell(8).value).toBe('Jane Doe');

    const byCompany = workbook.getWorksheet('Companies Summary');
    expect(byCompany?.getRow(2).getCell(1).value).toBe('Acme');
    expect(byCompany?.getRow(2).getCell(2).value).toBe(2);
  });

  it('should write a workbook that reads back', async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'directory-xlsx-'));
    const filePath = path.join(tempDir, 'run.xlsx');

    await exportXlsx(records, filePath);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    expect(workbook.getWorksheet('Summary by Category')?.getRow(2).getCell(1).value).toBe('Laravel');
  });
});
