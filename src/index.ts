#!/usr/bin/env node

import { pathToFileURL } from 'node:url';
import { Command, InvalidArgumentError, Option } from 'commander';
import { PageFetcher, ScraperConfig, ScrapingTargets } from './types/index.js';
import {
  CancellationToken,
  CrawlerOrchestrator,
  createCrawlContext,
  DEVELOPMENT_SUBCATEGORIES,
  formatRunSummary,
  subcategoryUrl,
} from './crawler/index.js';
import { exportAllFormats } from './export/index.js';
import { HttpClient } from './scraper/http-client.js';
import { assertValidConfig, loadConfig, loadTargets, parseFormats } from './utils/config.js';
import { ConfigurationError, errorMessage, toError } from './utils/errors.js';
import { isLogLevel, logger, setLogFile, setLogLevel } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { Sleep } from './utils/retry.js';
import { captureError, flushErrors, initSentry } from './utils/sentry.js';

export interface CliOptions {
  categories?: string[];
  skipCategories?: string[];
  maxPages?: number;
  maxCompanies?: number;
  maxReviews?: number;
  minDelay?: number;
  maxDelay?: number;
  outputDir?: string;
  formats?: string;
  logLevel?: string;
  logFile?: string;
  listCategories?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative number of seconds.');
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command()
    .name('dev-directory-scraper')
    .description('Scrape development company profiles and reviews from a business directory')
    .option('--categories <names...>', 'Specific categories to scrape (default: all)')
    .option('--skip-categories <names...>', 'Categories to skip when scraping all')
    .option('--max-pages <n>', 'Maximum listing pages per category', parsePositiveInt)
    .option('--max-companies <n>', 'Maximum companies per listing page', parsePositiveInt)
    .option('--max-reviews <n>', 'Maximum reviews per company', parsePositiveInt)
    .option('--min-delay <seconds>', 'Minimum delay between requests', parseSeconds)
    .option('--max-delay <seconds>', 'Maximum delay between requests', parseSeconds)
    .option('--output-dir <dir>', 'Output directory for exported files')
    .option('--formats <list>', 'Comma-separated export formats (json,csv,xlsx,sqlite,summary)')
    .addOption(new Option('--log-level <level>', 'Logging level').choices(['debug', 'info', 'warn', 'error']))
    .option('--log-file <path>', 'Also append log lines to this file')
    .option('--list-categories', 'List all available categories and exit');
}

/**
 * Command line flags take precedence over environment configuration
 */
export function applyCliOptions(
  config: ScraperConfig,
  targets: ScrapingTargets,
  options: CliOptions
): { config: ScraperConfig; targets: ScrapingTargets } {
  const merged: ScraperConfig = { ...config };

  if (options.maxPages !== undefined) merged.maxPagesPerCategory = options.maxPages;
  if (options.maxCompanies !== undefined) merged.maxCompaniesPerPage = options.maxCompanies;
  if (options.maxReviews !== undefined) merged.maxReviewsPerCompany = options.maxReviews;
  if (options.minDelay !== undefined) merged.minDelayMs = Math.round(options.minDelay * 1000);
  if (options.maxDelay !== undefined) merged.maxDelayMs = Math.round(options.maxDelay * 1000);
  if (options.outputDir !== undefined) merged.outputDirectory = options.outputDir;
  if (options.logFile !== undefined) merged.logFile = options.logFile;

  if (options.formats !== undefined) {
    const { formats, unknown } = parseFormats(options.formats);
    if (unknown.length > 0) {
      throw new ConfigurationError([`unknown export formats: ${unknown.join(', ')}`]);
    }
    merged.formats = formats;
  }

  if (options.logLevel !== undefined) {
    const level = options.logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigurationError([`unknown log level: ${options.logLevel}`]);
    }
    merged.logLevel = level;
  }

  return {
    config: merged,
    targets: {
      categories: options.categories ?? targets.categories,
      skipCategories: options.skipCategories ?? targets.skipCategories,
    },
  };
}

export function formatCategoryList(baseUrl: string): string {
  const lines = ['Available Development Categories:', '-'.repeat(40)];
  for (const subcategory of DEVELOPMENT_SUBCATEGORIES) {
    lines.push(subcategory.name, `  URL: ${subcategoryUrl(subcategory, baseUrl)}`);
  }
  return lines.join('\n');
}

export interface RunDependencies {
  fetcher?: PageFetcher;
  sleep?: Sleep;
  cancellation?: CancellationToken;
  write?: (text: string) => void;
}

/**
 * Crawl, export and print the summary
 * Succeeds only when records were collected and every export was written
 */
export async function runScraper(
  config: ScraperConfig,
  targets: ScrapingTargets,
  deps: RunDependencies = {}
): Promise<boolean> {
  assertValidConfig(config);
  setLogLevel(config.logLevel);
  try {
    setLogFile(config.logFile);
  } catch (error) {
    throw new ConfigurationError([`log file ${config.logFile} is not writable: ${errorMessage(error)}`]);
  }

  const write = deps.write ?? ((text: string) => process.stdout.write(text + '\n'));
  const fetcher =
    deps.fetcher ??
    new HttpClient({
      timeoutMs: config.timeoutMs,
      userAgents: config.userAgents,
      rateLimiter: new RateLimiter({ minDelayMs: config.minDelayMs, maxDelayMs: config.maxDelayMs }),
    });

  const context = createCrawlContext(config, fetcher, { sleep: deps.sleep, cancellation: deps.cancellation });
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info('Received signal, finishing current category', { signal });
    context.cancellation.cancel(signal);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const result = await new CrawlerOrchestrator(context).run(targets);

    let exportsSucceeded = true;
    if (result.records.length > 0) {
      try {
        const exported = await exportAllFormats(result.records, {
          outputDirectory: config.outputDirectory,
          formats: config.formats,
        });
        for (const failure of exported.failures) {
          captureError(failure, { format: failure.format, file: failure.filename });
        }
        exportsSucceeded = exported.failures.length === 0;
      } catch (error) {
        exportsSucceeded = false;
        logger.error('Export failed', { error: errorMessage(error) });
        captureError(toError(error), { directory: config.outputDirectory });
      }
    } else {
      logger.warn('No data was scraped');
    }

    write(formatRunSummary(result));
    return result.records.length > 0 && exportsSucceeded;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram().parse(argv);
  const options = program.opts<CliOptions>();

  try {
    const { config, targets } = applyCliOptions(loadConfig(), loadTargets(), options);
    initSentry();

    if (options.listCategories) {
      process.stdout.write(formatCategoryList(config.baseUrl) + '\n');
      return 0;
    }

    const success = await runScraper(config, targets);
    return success ? 0 : 1;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('Configuration errors', { errors: error.errors });
    } else {
      logger.error('Fatal error in scraping process', {
        error: errorMessage(error),
        stack: toError(error).stack,
      });
      captureError(toError(error));
    }
    return 1;
  } finally {
    await flushErrors();
  }
}

// Run if called directly
const entry = process.argv[1];
const isMainModule = entry !== undefined && import.meta.url === pathToFileURL(entry).href;

if (isMainModule) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Unexpected failure', { error: errorMessage(error) });
      process.exitCode = 1;
    });
}
