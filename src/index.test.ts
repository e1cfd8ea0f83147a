import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { applyCliOptions, buildProgram, formatCategoryList, main, runScraper } from './index.js';
import { FakeFetcher, loadDirectoryFixture, page } from './crawler/__fixtures__/fake-fetcher.js';
import { DEFAULT_CONFIG } from './utils/config.js';
import { ConfigurationError } from './utils/errors.js';
import { setLogFile } from './utils/logger.js';
import { initSentry } from './utils/sentry.js';

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

vi.mock('./utils/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('./utils/logger.js')>()),
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('./utils/sentry.js', () => ({
  addBreadcrumb: vi.fn(),
  captureError: vi.fn(),
  captureMessage: vi.fn(),
  initSentry: vi.fn(() => false),
  flushErrors: vi.fn(async () => undefined),
}));

const TARGETS = { categories: [], skipCategories: [] };

function parse(args: string[]) {
  return buildProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined })
    .parse(['node', 'dev-directory-scraper', ...args])
    .opts();
}

describe('command line', () => {
  it('should parse flags into options', () => {
    expect(
      parse([
        '--categories', 'PHP', 'Laravel',
        '--max-pages', '2',
        '--min-delay', '0.5',
        '--formats', 'json,csv',
        '--log-file', 'logs/run.log',
      ])
    ).toEqual({
      categories: ['PHP', 'Laravel'],
      maxPages: 2,
      minDelay: 0.5,
      formats: 'json,csv',
      logFile: 'logs/run.log',
    });
  });

  it('should reject invalid numbers and log levels', () => {
    expect(() => parse(['--max-pages', '0'])).toThrow('Must be a positive integer.');
    expect(() => parse(['--min-delay', '-1'])).toThrow('Must be a non-negative number of seconds.');
    expect(() => parse(['--log-level', 'verbose'])).toThrow();
  });

  describe('applyCliOptions', () => {
    it('should override configuration with flags', () => {
      const { config, targets } = applyCliOptions(
        DEFAULT_CONFIG,
        { categories: ['PHP'], skipCategories: ['Laravel'] },
        { maxPages: 2, maxCompanies: 3, minDelay: 0.25, maxDelay: 1.5, formats: 'CSV,summary', logLevel: 'DEBUG', skipCategories: [] }
      );

      expect(config).toMatchObject({
        maxPagesPerCategory: 2,
        maxCompaniesPerPage: 3,
        maxReviewsPerCompany: DEFAULT_CONFIG.maxReviewsPerCompany,
        minDelayMs: 250,
        maxDelayMs: 1500,
        formats: ['csv', 'summary'],
        logLevel: 'debug',
      });
      expect(targets).toEqual({ categories: ['PHP'], skipCategories: [] });
    });

    it('should take the log file from the flag', () => {
      const { config } = applyCliOptions({ ...DEFAULT_CONFIG, logFile: 'env.log' }, TARGETS, { logFile: 'flag.log' });
      expect(config.logFile).toBe('flag.log');
    });

    it('should reject unknown formats', () => {
      expect(() => applyCliOptions(DEFAULT_CONFIG, TARGETS, { formats: 'json,parquet' })).toThrow(ConfigurationError);
    });
  });

  it('should list categories with their URLs', () => {
    const lines = formatCategoryList('https://clutch.co').split('\n');

    expect(lines.slice(0, 4)).toEqual([
      'Available Development Categories:',
      '-'.repeat(40),
      'Mobile Apps',
      '  URL: https://clutch.co/directory/mobile-application-developers',
    ]);
  });
});

describe('main', () => {
  it('should start error reporting after loading configuration', async () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    try {
      expect(await main(['node', 'dev-directory-scraper', '--list-categories'])).toBe(0);
    } finally {
      stdout.mockRestore();
    }

    expect(initSentry).toHaveBeenCalledTimes(1);
    expect(stdout).toHaveBeenCalledWith(expect.stringMatching(/^Available Development Categories:\n/));
  });
});

describe('runScraper', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'directory-run-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should crawl, export and print the summary', async () => {
    const profileHtml = loadDirectoryFixture('profile-page.html');
    const fetcher = new FakeFetcher({
      'https://clutch.co/developers': page(loadDirectoryFixture('category-page.html')),
      'https://clutch.co/profile/acme-labs': page(profileHtml),
      'https://clutch.co/profile/acme-labs#reviews': page(profileHtml),
    });
    const output: string[] = [];

    const success = await runScraper(
      { ...DEFAULT_CONFIG, maxRetries: 1, outputDirectory: tempDir, formats: ['json', 'summary'] },
      { categories: ['Software Developers'], skipCategories: [] },
      { fetcher, sleep: vi.fn(async () => undefined), write: (text) => output.push(text) }
    );

    expect(success).toBe(true);
    const files = (await readdir(tempDir)).sort();
    expect(files).toHaveLength(2);
    expect(files[0]).toMatch(/^directory_development_data_\d{8}_\d{6}\.json$/);
    expect(files[1]).toMatch(/^directory_development_data_\d{8}_\d{6}_summary\.txt$/);
    expect(output).toHaveLength(1);
    expect(output[0].split('\n')[3]).toBe('Total records scraped: 2');
  });

  it('should report failure when nothing was scraped', async () => {
    const output: string[] = [];

    const success = await runScraper(
      { ...DEFAULT_CONFIG, maxRetries: 1, outputDirectory: tempDir },
      { categories: ['Laravel'], skipCategories: [] },
      { fetcher: new FakeFetcher(), write: (text) => output.push(text) }
    );

    expect(success).toBe(false);
    expect(await readdir(tempDir)).toEqual([]);
    expect(output[0].split('\n')[3]).toBe('Total records scraped: 0');
  });

  it('should print the summary when the output directory is unusable', async () => {
    const occupied = path.join(tempDir, 'occupied');
    await writeFile(occupied, 'not a directory', 'utf-8');
    const profileHtml = loadDirectoryFixture('profile-page.html');
    const fetcher = new FakeFetcher({
      'https://clutch.co/developers': page(loadDirectoryFixture('category-page.html')),
      'https://clutch.co/profile/acme-labs': page(profileHtml),
      'https://clutch.co/profile/acme-labs#reviews': page(profileHtml),
    });
    const output: string[] = [];

    const success = await runScraper(
      { ...DEFAULT_CONFIG, maxRetries: 1, outputDirectory: occupied, formats: ['json', 'csv'] },
      { categories: ['Software Developers'], skipCategories: [] },
      { fetcher, sleep: vi.fn(async () => undefined), write: (text) => output.push(text) }
    );

    expect(success).toBe(false);
    expect(output).toHaveLength(1);
    expect(output[0].split('\n')[3]).toBe('Total records scraped: 2');
  });

  it('should create the log file directory', async () => {
    const logFile = path.join(tempDir, 'logs', 'run.log');

    try {
      await runScraper(
        { ...DEFAULT_CONFIG, maxRetries: 1, outputDirectory: path.join(tempDir, 'out'), logFile },
        { categories: ['Laravel'], skipCategories: [] },
        { fetcher: new FakeFetcher(), write: () => undefined }
      );
    } finally {
      setLogFile(null);
    }

    expect(await readdir(path.join(tempDir, 'logs'))).toEqual([]);
  });

  it('should refuse an invalid configuration', async () => {
    await expect(
      runScraper({ ...DEFAULT_CONFIG, maxPagesPerCategory: 0 }, TARGETS, { fetcher: new FakeFetcher() })
    ).rejects.toThrow(ConfigurationError);
  });
});
