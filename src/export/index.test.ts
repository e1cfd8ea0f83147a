import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { defaultBaseFilename, exportAllFormats, exportFilePath } from './index.js';
import { createScrapedData } from '../scraper/records.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const records = [
  createScrapedData({
    subcategory: 'PHP',
    competitor: { name: 'Acme', locations: ['Austin, TX'] },
    scrapedAt: '2024-03-01T12:00:00.000Z',
    sourceUrl: 'https://clutch.co/profile/acme',
  }),
];

describe('exportAllFormats', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'directory-export-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should name files after the run timestamp', () => {
    expect(defaultBaseFilename(new Date(2024, 2, 1, 14, 5, 9))).toBe('directory_development_data_20240301_140509');
    expect(exportFilePath('out', 'run', 'summary')).toBe(path.join('out', 'run_summary.txt'));
    expect(exportFilePath('out', 'run', 'sqlite')).toBe(path.join('out', 'run.db'));
  });

  it('should write each selected format into a new directory', async () => {
    const outputDirectory = path.join(tempDir, 'nested', 'output');

    const result = await exportAllFormats(records, {
      outputDirectory,
      formats: ['json', 'csv', 'summary'],
      baseFilename: 'run',
      generatedAt: new Date('2024-03-01T12:00:00.000Z'),
    });

    expect(result.failures).toEqual([]);
    expect(result.files).toEqual({
      json: path.join(outputDirectory, 'run.json'),
      csv: path.join(outputDirectory, 'run.csv'),
      summary: path.join(outputDirectory, 'run_summary.txt'),
    });

    const json: unknown = JSON.parse(await readFile(path.join(outputDirectory, 'run.json'), 'utf-8'));
    expect(json).toEqual(records);

    const summary = await readFile(path.join(outputDirectory, 'run_summary.txt'), 'utf-8');
    expect(summary.split('\n')[3]).toBe('Generated: 2024-03-01T12:00:00.000Z');
  });

  it('should keep going when one format fails', async () => {
    await mkdir(path.join(tempDir, 'run.csv'));

    const result = await exportAllFormats(records, {
      outputDirectory: tempDir,
      formats: ['csv', 'json'],
      baseFilename: 'run',
    });

    expect(result.files).toEqual({ json: path.join(tempDir, 'run.json') });
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].format).toBe('csv');
    expect(result.failures[0].filename).toBe(path.join(tempDir, 'run.csv'));
    expect(result.failures[0].message.startsWith('csv export failed: ')).toBe(true);
  });

  it('should report every format as failed when the output directory is a file', async () => {
    const outputDirectory = path.join(tempDir, 'occupied');
    await writeFile(outputDirectory, 'not a directory', 'utf-8');

    const result = await exportAllFormats(records, {
      outputDirectory,
      formats: ['json', 'csv'],
      baseFilename: 'run',
    });

    expect(result.files).toEqual({});
    expect(result.failures.map((failure) => failure.format)).toEqual(['json', 'csv']);
    expect(result.failures[0].filename).toBe(path.join(outputDirectory, 'run.json'));
    expect(result.failures[0].message.startsWith('json export failed: ')).toBe(true);
    expect(result.failures[1].message.startsWith('csv export failed: ')).toBe(true);
  });
});
