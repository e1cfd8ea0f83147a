/**
 * Crawler Orchestrator
 * Runs the selected categories in order, one request in flight at a time,
 * then merges duplicate companies and builds the run summary
 */

import { ScrapedData, ScrapingTargets } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage, toError } from '../utils/errors.js';
import { addBreadcrumb, captureError, captureMessage } from '../utils/sentry.js';
import { CategoryCrawler } from './category-crawler.js';
import { CrawlContext } from './crawl-context.js';
import { deduplicateRecords } from './deduplicator.js';
import { DEVELOPMENT_SUBCATEGORIES, Subcategory, selectSubcategories, subcategoryUrl } from './subcategories.js';

export interface RunSummary {
  totalRecords: number;
  /** Records collected before duplicates were merged */
  rawRecords: number;
  uniqueCompanies: number;
  categoryCounts: Record<string, number>;
  errorSummary: Record<string, number>;
  cancelled: boolean;
  aborted: boolean;
}

export interface RunResult extends RunSummary {
  records: ScrapedData[];
  categoriesCrawled: string[];
}

const SUMMARY_RULE = '='.repeat(60);

export function buildRunSummary(
  records: ScrapedData[],
  rawRecords: number,
  errorSummary: Record<string, number>,
  flags: { cancelled: boolean; aborted: boolean }
): RunSummary {
  const categoryCounts: Record<string, number> = {};
  const companies = new Set<string>();

  for (const record of records) {
    const subcategory = record.subcategory ?? 'Unknown';
    categoryCounts[subcategory] = (categoryCounts[subcategory] ?? 0) + 1;
    if (record.competitor.name) {
      companies.add(record.competitor.name);
    }
  }

  return {
    totalRecords: records.length,
    rawRecords,
    uniqueCompanies: companies.size,
    categoryCounts,
    errorSummary,
    ...flags,
  };
}

export function formatRunSummary(summary: RunSummary): string {
  const lines = [SUMMARY_RULE, 'DIRECTORY SCRAPING SUMMARY', SUMMARY_RULE];
  lines.push(`Total records scraped: ${summary.totalRecords}`);

  if (summary.totalRecords > 0) {
    const categories = Object.keys(summary.categoryCounts).sort();
    lines.push(`Unique companies: ${summary.uniqueCompanies}`);
    lines.push(`Categories scraped: ${categories.length}`);
    lines.push('', 'Breakdown by category:');
    for (const category of categories) {
      lines.push(`  ${category}: ${summary.categoryCounts[category]} records`);
    }
  }

  const errorKinds = Object.keys(summary.errorSummary).sort();
  if (errorKinds.length > 0) {
    lines.push('', 'Errors encountered:');
    for (const kind of errorKinds) {
      lines.push(`  ${kind}: ${summary.errorSummary[kind]}`);
    }
  }

  if (summary.cancelled) {
    lines.push('', 'Run was interrupted; partial results were kept.');
  }
  if (summary.aborted) {
    lines.push('', 'Run was stopped early after too many failures.');
  }

  lines.push(SUMMARY_RULE);
  return lines.join('\n');
}

export class CrawlerOrchestrator {
  private categoryCrawler: CategoryCrawler;

  constructor(
    private readonly context: CrawlContext,
    categoryCrawler?: CategoryCrawler,
    private readonly catalogue: readonly Subcategory[] = DEVELOPMENT_SUBCATEGORIES
  ) {
    this.categoryCrawler = categoryCrawler ?? new CategoryCrawler(context);
  }

  async run(targets: ScrapingTargets): Promise<RunResult> {
    const { config, breaker, cancellation, errors } = this.context;
    const { selected, unknown } = selectSubcategories(targets.categories, targets.skipCategories, this.catalogue);

    for (const name of unknown) {
      logger.warn('Unknown category ignored', { category: name });
    }
    logger.info('Starting crawl', { categories: selected.map((entry) => entry.name) });

    const collected: ScrapedData[] = [];
    const categoriesCrawled: string[] = [];

    for (const subcategory of selected) {
      if (cancellation.isCancelled()) {
        logger.info('Crawl cancelled', { reason: cancellation.getReason() });
        break;
      }
      if (breaker.isRunOpen()) {
        logger.error('Too many failures, stopping crawl', { totalFailures: breaker.getTotalFailures() });
        break;
      }

      breaker.startCategory();
      addBreadcrumb({ category: 'crawl', message: `Category ${subcategory.name}` });

      try {
        const records = await this.categoryCrawler.crawlCategory(
          subcategoryUrl(subcategory, config.baseUrl),
          subcategory.name
        );
        collected.push(...records);
        categoriesCrawled.push(subcategory.name);
        logger.info('Category completed', { category: subcategory.name, records: records.length });
      } catch (error) {
        const kind = errors.record(error);
        breaker.recordFailure();
        logger.error('Category failed', { category: subcategory.name, kind, error: errorMessage(error) });
        captureError(toError(error), { category: subcategory.name });
      }
    }

    const records = deduplicateRecords(collected);
    logger.info('Crawl finished', { records: collected.length, afterDeduplication: records.length });

    const aborted = breaker.isRunOpen();
    if (aborted) {
      captureMessage('Crawl aborted by circuit breaker', 'warning', { totalFailures: breaker.getTotalFailures() });
    }

    return {
      ...buildRunSummary(records, collected.length, errors.summary(), {
        cancelled: cancellation.isCancelled(),
        aborted,
      }),
      records,
      categoriesCrawled,
    };
  }
}
