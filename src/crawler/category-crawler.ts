/**
 * Category Crawler
 * Walks the listing pages of one subcategory and collects company records
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { ScrapedData } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage, toError } from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';
import { addBreadcrumb, captureError } from '../utils/sentry.js';
import { extractListingInfo, findListingElements } from '../scraper/listing-extractor.js';
import { createScrapedData } from '../scraper/records.js';
import { CompanyFetcher } from './company-fetcher.js';
import { CrawlContext, retryOptionsFor } from './crawl-context.js';
import { resolvePagination } from './pagination.js';

export class CategoryCrawler {
  private companyFetcher: CompanyFetcher;

  constructor(
    private readonly context: CrawlContext,
    companyFetcher?: CompanyFetcher
  ) {
    this.companyFetcher = companyFetcher ?? new CompanyFetcher(context);
  }

  /**
   * Crawl from the category's first page until pages run out, the page
   * limit is reached, a page cannot be fetched or the breaker opens
   */
  async crawlCategory(url: string, subcategory: string): Promise<ScrapedData[]> {
    const { config, breaker } = this.context;
    const records: ScrapedData[] = [];

    let currentUrl: string | null = url;
    let pageNumber = 1;

    while (currentUrl && pageNumber <= config.maxPagesPerCategory) {
      if (breaker.isCategoryOpen()) {
        logger.warn('Circuit breaker open, leaving category', { subcategory, state: breaker.getState() });
        break;
      }

      logger.info('Scraping listing page', { subcategory, page: pageNumber, url: currentUrl });
      addBreadcrumb({ category: 'crawl', message: `${subcategory} page ${pageNumber}`, data: { url: currentUrl } });

      const $ = await this.fetchListingPage(currentUrl, subcategory);
      if (!$) {
        break;
      }

      records.push(...(await this.extractCompanies($, subcategory, currentUrl)));

      const pagination = resolvePagination($, config.baseUrl);
      currentUrl = pagination.hasNext ? pagination.nextUrl : null;
      pageNumber++;
    }

    logger.info('Category finished', { subcategory, records: records.length, pages: pageNumber - 1 });
    return records;
  }

  private async fetchListingPage(url: string, subcategory: string): Promise<CheerioAPI | null> {
    const { fetcher, breaker, errors } = this.context;

    try {
      const page = await withRetry(() => fetcher.fetchPage(url), retryOptionsFor(this.context, 'Listing page'));
      if (!page.ok) {
        logger.warn('Listing page unavailable', { subcategory, url, status: page.status, reason: page.reason });
        breaker.recordFailure();
        return null;
      }
      breaker.recordSuccess();
      return cheerio.load(page.html);
    } catch (error) {
      const kind = errors.record(error);
      breaker.recordFailure();
      logger.error('Listing page failed', { subcategory, url, kind, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Listing elements with a profile link are fetched in full; the rest
   * become minimal records pointing at the listing page
   */
  async extractCompanies($: CheerioAPI, subcategory: string, pageUrl: string): Promise<ScrapedData[]> {
    const { config, breaker, errors } = this.context;
    const elements = findListingElements($).slice(0, config.maxCompaniesPerPage);
    const records: ScrapedData[] = [];

    logger.info('Company elements on page', { subcategory, count: elements.length });

    for (const element of elements) {
      if (breaker.isCategoryOpen()) {
        break;
      }

      const listing = extractListingInfo($, element, config.baseUrl);
      if (!listing) {
        continue;
      }

      if (!listing.url) {
        records.push(
          createScrapedData({
            subcategory,
            competitor: { name: listing.name, locations: listing.locations },
            sourceUrl: pageUrl,
          })
        );
        continue;
      }

      try {
        const record = await this.companyFetcher.fetchCompany(listing.url, subcategory);
        if (record) {
          records.push(record);
        }
        breaker.recordSuccess();
      } catch (error) {
        const kind = errors.record(error);
        breaker.recordFailure();
        logger.error('Company failed', { subcategory, company: listing.name, url: listing.url, kind, error: errorMessage(error) });
        captureError(toError(error), { subcategory, company: listing.name, url: listing.url });
      }
    }

    return records;
  }
}
