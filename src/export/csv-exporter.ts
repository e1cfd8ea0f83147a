import { writeFile } from 'node:fs/promises';
import { FlatRow, ScrapedData } from '../types/index.js';
import { FLAT_COLUMNS, toFlatRows } from '../scraper/records.js';
import { errorMessage, ExportError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

type Cell = string | number | null;

/**
 * Quote a cell when it contains a delimiter, quote or line break
 */
export function escapeCsvCell(value: Cell): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function generateCsv(headers: readonly string[], rows: Cell[][]): string {
  const csvRows = [headers.map(escapeCsvCell).join(',')];

  for (const row of rows) {
    csvRows.push(row.map(escapeCsvCell).join(','));
  }

  return csvRows.join('\n') + '\n';
}

export function flatRowCells(row: FlatRow): Cell[] {
  return FLAT_COLUMNS.map((column) => row[column]);
}

/**
 * One line per reviewer, in the shared column order
 */
export function generateRecordsCsv(records: ScrapedData[]): string {
  const rows = records.flatMap(toFlatRows).map(flatRowCells);
  return generateCsv(FLAT_COLUMNS, rows);
}

export async function exportCsv(records: ScrapedData[], filePath: string): Promise<void> {
  await writeFile(filePath, generateRecordsCsv(records), 'utf-8');
}

export interface CsvFilters {
  subcategory?: string;
  companyName?: string;
  /** Keeps only reviewers whose project score reaches this value */
  minScore?: number;
}

export function filterRecords(records: ScrapedData[], filters: CsvFilters): ScrapedData[] {
  const filtered: ScrapedData[] = [];

  for (const record of records) {
    if (filters.subcategory !== undefined && record.subcategory !== filters.subcategory) continue;
    if (filters.companyName !== undefined && record.competitor.name !== filters.companyName) continue;

    const minScore = filters.minScore;
    if (minScore === undefined) {
      filtered.push(record);
      continue;
    }

    const reviewers = record.reviewers.filter(
      (reviewer) => reviewer.project.score !== null && reviewer.project.score >= minScore
    );
    if (reviewers.length > 0) {
      filtered.push({ ...record, reviewers });
    }
  }

  return filtered;
}

/**
 * Write only the records matching every given filter; resolves to the number written
 */
export async function exportFilteredCsv(
  records: ScrapedData[],
  filters: CsvFilters,
  filePath: string
): Promise<number> {
  const filtered = filterRecords(records, filters);

  try {
    await exportCsv(filtered, filePath);
  } catch (error) {
    throw new ExportError(`Filtered export failed: ${errorMessage(error)}`, 'csv', filePath);
  }

  logger.info('Exported filtered records', { file: filePath, records: filtered.length, total: records.length });
  return filtered.length;
}
