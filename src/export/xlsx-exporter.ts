import ExcelJS from 'exceljs';
import { FlatRow, ScrapedData } from '../types/index.js';
import { FLAT_COLUMNS, toFlatRows } from '../scraper/records.js';
import { flatRowCells } from './csv-exporter.js';

/**
 * Row count per subcategory, sorted by name; rows without one are left out
 */
export function countBySubcategory(rows: FlatRow[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const row of rows) {
    if (row.subcategory !== null) {
      counts.set(row.subcategory, (counts.get(row.subcategory) ?? 0) + 1);
    }
  }
  return [...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Row count per company, most rows first; ties keep first appearance
 */
export function countByCompany(rows: FlatRow[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const row of rows) {
    if (row.competitor_name !== null) {
      counts.set(row.competitor_name, (counts.get(row.competitor_name) ?? 0) + 1);
    }
  }
  return [...counts.entries()].sort(([, a], [, b]) => b - a);
}

export function buildWorkbook(records: ScrapedData[]): ExcelJS.Workbook {
  const rows = records.flatMap(toFlatRows);
  const workbook = new ExcelJS.Workbook();

  const allData = workbook.addWorksheet('All Data');
  allData.addRow([...FLAT_COLUMNS]);
  for (const row of rows) {
    allData.addRow(flatRowCells(row));
  }

  const bySubcategory = workbook.addWorksheet('Summary by Category');
  bySubcategory.addRow(['subcategory', 'count']);
  bySubcategory.addRows(countBySubcategory(rows));

  const byCompany = workbook.addWorksheet('Companies Summary');
  byCompany.addRow(['company', 'review_count']);
  byCompany.addRows(countByCompany(rows));

  return workbook;
}

export async function exportXlsx(records: ScrapedData[], filePath: string): Promise<void> {
  await buildWorkbook(records).xlsx.writeFile(filePath);
}
