import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  escapeCsvCell,
  exportFilteredCsv,
  filterRecords,
  flatRowCells,
  generateCsv,
  generateRecordsCsv,
} from './csv-exporter.js';
import { createReviewerInfo, createScrapedData, FLAT_COLUMNS, toFlatRows } from '../scraper/records.js';
import { ExportError } from '../utils/errors.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const acme = createScrapedData({
  subcategory: 'PHP',
  competitor: { name: 'Acme, Inc', locations: ['Austin, TX', 'Denver, CO'] },
  scrapedAt: '2024-03-01T12:00:00.000Z',
  sourceUrl: 'https://clutch.co/profile/acme',
});

describe('csv exporter', () => {
  describe('escapeCsvCell', () => {
    it('should leave plain values unquoted', () => {
      expect(escapeCsvCell('plain')).toBe('plain');
      expect(escapeCsvCell(4.5)).toBe('4.5');
      expect(escapeCsvCell(null)).toBe('');
    });

    it('should quote delimiters, quotes and line breaks', () => {
      expect(escapeCsvCell('a,b')).toBe('"a,b"');
      expect(escapeCsvCell('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsvCell('line\nbreak')).toBe('"line\nbreak"');
    });
  });

  it('should join rows with a trailing newline', () => {
    expect(
      generateCsv(
        ['a', 'b'],
        [
          ['1', null],
          ['x,y', 2],
        ]
      )
    ).toBe('a,b\n1,\n"x,y",2\n');
  });

  it('should write one row for a company without reviewers', () => {
    const lines = generateRecordsCsv([acme]).split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(FLAT_COLUMNS.join(','));
    expect(lines[1]).toBe(
      [
        'Development',
        'PHP',
        '2024-03-01T12:00:00.000Z',
        'https://clutch.co/profile/acme',
        'https://clutch.co/profile/acme#reviews',
        '"Acme, Inc"',
        '"Austin, TX, Denver, CO"',
        ...Array<string>(15).fill(''),
      ].join(',')
    );
    expect(lines[2]).toBe('');
  });

  it('should write one row per reviewer', () => {
    const record = {
      ...acme,
      reviewers: [
        createReviewerInfo({
          name: 'Jane Doe',
          jobTitle: 'CTO',
          project: { serviceProvided: 'Web Development', score: 4.5, scoreCost: 4 },
        }),
        createReviewerInfo({ name: 'Sam Lee' }),
      ],
    };

    const rows = toFlatRows(record);

    expect(generateRecordsCsv([record]).split('\n')).toHaveLength(4);
    expect(flatRowCells(rows[0]).slice(7)).toEqual([
      'Jane Doe',
      'CTO',
      null,
      null,
      null,
      null,
      'Web Development',
      null,
      null,
      null,
      4.5,
      null,
      null,
      4,
      null,
    ]);
    expect(flatRowCells(rows[1])[7]).toBe('Sam Lee');
  });
});

describe('filtered csv export', () => {
  const strong = createReviewerInfo({ name: 'Jane Doe', project: { score: 4.8 } });
  const weak = createReviewerInfo({ name: 'Sam Lee', project: { score: 3.5 } });
  const unscored = createReviewerInfo({ name: 'Ana Ruiz' });

  const php = createScrapedData({
    subcategory: 'PHP',
    competitor: { name: 'Northwind' },
    reviewers: [strong, weak, unscored],
    scrapedAt: '2024-03-01T12:00:00.000Z',
  });
  const laravel = createScrapedData({
    subcategory: 'Laravel',
    competitor: { name: 'Harbor Goods' },
    reviewers: [weak],
    scrapedAt: '2024-03-01T12:00:00.000Z',
  });

  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'directory-filtered-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should keep records matching subcategory and company name', () => {
    expect(filterRecords([php, laravel], { subcategory: 'Laravel' })).toEqual([laravel]);
    expect(filterRecords([php, laravel], { companyName: 'Northwind' })).toEqual([php]);
    expect(filterRecords([php, laravel], { subcategory: 'PHP', companyName: 'Harbor Goods' })).toEqual([]);
    expect(filterRecords([php, laravel], {})).toEqual([php, laravel]);
  });

  it('should keep only reviewers reaching the minimum score', () => {
    const filtered = filterRecords([php, laravel], { minScore: 4 });

    expect(filtered).toHaveLength(1);
    expect(filtered[0].competitor.name).toBe('Northwind');
    expect(filtered[0].reviewers).toEqual([strong]);
    expect(php.reviewers).toHaveLength(3);
  });

  it('should write the matching rows and return their count', async () => {
    const filePath = path.join(tempDir, 'filtered.csv');

    const written = await exportFilteredCsv([php, laravel], { minScore: 3.5 }, filePath);

    expect(written).toBe(2);
    const lines = (await readFile(filePath, 'utf-8')).split('\n');
    expect(lines[0]).toBe(FLAT_COLUMNS.join(','));
    expect(lines).toHaveLength(5);
  });

  it('should raise an export error when the file cannot be written', async () => {
    const filePath = path.join(tempDir, 'taken.csv');
    await mkdir(filePath);

    const failure = exportFilteredCsv([php], {}, filePath);

    await expect(failure).rejects.toBeInstanceOf(ExportError);
    await expect(failure).rejects.toThrow(/^Filtered export failed: /);
  });
});
