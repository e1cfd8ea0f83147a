/**
 * Export Module
 * Writes a run's records to every selected output format
 */

import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { ExportFormat, ScrapedData } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage, ExportError } from '../utils/errors.js';
import { exportCsv } from './csv-exporter.js';
import { exportJson } from './json-exporter.js';
import { exportSqlite } from './sqlite-exporter.js';
import { exportSummary } from './summary-report.js';
import { exportXlsx } from './xlsx-exporter.js';

export interface ExportOptions {
  outputDirectory: string;
  formats: ExportFormat[];
  /** File name without extension; defaults to a timestamped name */
  baseFilename?: string;
  generatedAt?: Date;
}

export interface ExportResult {
  files: Partial<Record<ExportFormat, string>>;
  failures: ExportError[];
}

const FILE_SUFFIXES: Record<ExportFormat, string> = {
  json: '.json',
  csv: '.csv',
  xlsx: '.xlsx',
  sqlite: '.db',
  summary: '_summary.txt',
};

type Writer = (records: ScrapedData[], filePath: string, generatedAt: Date) => Promise<void>;

const WRITERS: Record<ExportFormat, Writer> = {
  json: exportJson,
  csv: exportCsv,
  xlsx: exportXlsx,
  sqlite: exportSqlite,
  summary: exportSummary,
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * e.g. directory_development_data_20240301_141500
 */
export function defaultBaseFilename(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `directory_development_data_${day}_${time}`;
}

export function exportFilePath(outputDirectory: string, baseFilename: string, format: ExportFormat): string {
  return path.join(outputDirectory, `${baseFilename}${FILE_SUFFIXES[format]}`);
}

/**
 * Write each format to its own file; one format failing does not stop the others.
 * Failures come back in the result, this never rejects on I/O errors.
 */
export async function exportAllFormats(records: ScrapedData[], options: ExportOptions): Promise<ExportResult> {
  const generatedAt = options.generatedAt ?? new Date();
  const baseFilename = options.baseFilename ?? defaultBaseFilename(generatedAt);
  const result: ExportResult = { files: {}, failures: [] };

  try {
    await mkdir(options.outputDirectory, { recursive: true });
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Output directory unusable', { directory: options.outputDirectory, error: message });
    for (const format of options.formats) {
      const filePath = exportFilePath(options.outputDirectory, baseFilename, format);
      result.failures.push(new ExportError(`${format} export failed: ${message}`, format, filePath));
    }
    return result;
  }

  for (const format of options.formats) {
    const filePath = exportFilePath(options.outputDirectory, baseFilename, format);
    try {
      await WRITERS[format](records, filePath, generatedAt);
      result.files[format] = filePath;
      logger.info('Export written', { format, file: filePath, records: records.length });
    } catch (error) {
      const failure = new ExportError(`${format} export failed: ${errorMessage(error)}`, format, filePath);
      result.failures.push(failure);
      logger.error('Export failed', { format, file: filePath, error: failure.message });
    }
  }

  return result;
}

export { generateCsv, generateRecordsCsv, escapeCsvCell, exportFilteredCsv, filterRecords } from './csv-exporter.js';
export type { CsvFilters } from './csv-exporter.js';
export { generateSummaryReport } from './summary-report.js';
export { buildWorkbook, countByCompany, countBySubcategory } from './xlsx-exporter.js';
export { createTableSql, SQLITE_TABLE } from './sqlite-exporter.js';
