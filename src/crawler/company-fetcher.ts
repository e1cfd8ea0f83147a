/**
 * Company Fetcher
 * Fetches a company's profile and reviews view and assembles one record
 */

import * as cheerio from 'cheerio';
import { ReviewerInfo, ScrapedData } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { buildReviewsUrl, isSiteUrl } from '../utils/canonicalize.js';
import { errorMessage } from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';
import { extractCompanyDetails } from '../scraper/company-extractor.js';
import { extractReviews } from '../scraper/review-extractor.js';
import { createScrapedData } from '../scraper/records.js';
import { CrawlContext, retryOptionsFor } from './crawl-context.js';

export class CompanyFetcher {
  constructor(private readonly context: CrawlContext) {}

  /**
   * Returns null when the URL is off-site or the profile page is
   * terminally unavailable. Retryable failures of the profile fetch
   * propagate once retries are exhausted.
   */
  async fetchCompany(url: string, subcategory: string): Promise<ScrapedData | null> {
    const { config, fetcher } = this.context;

    if (!isSiteUrl(url, config.baseUrl)) {
      logger.warn('Skipping company outside the directory site', { url });
      return null;
    }

    const detail = await withRetry(() => fetcher.fetchPage(url), retryOptionsFor(this.context, 'Company page'));
    if (!detail.ok) {
      logger.warn('Company page unavailable', { url, status: detail.status, reason: detail.reason });
      return null;
    }

    const details = extractCompanyDetails(cheerio.load(detail.html));
    const reviewsUrl = buildReviewsUrl(url);
    const reviewers = await this.fetchReviews(reviewsUrl);

    logger.info('Company scraped', {
      url,
      name: details.name,
      locations: details.locations.length,
      reviewers: reviewers.length,
    });

    return createScrapedData({
      subcategory,
      competitor: { name: details.name, locations: details.locations },
      reviewers,
      sourceUrl: url,
      sourceUrlReview: reviewsUrl,
    });
  }

  /**
   * A failed reviews fetch leaves the company without reviewers
   */
  private async fetchReviews(reviewsUrl: string): Promise<ReviewerInfo[]> {
    const { fetcher, config, errors } = this.context;

    try {
      const page = await withRetry(
        () => fetcher.fetchPage(reviewsUrl),
        retryOptionsFor(this.context, 'Reviews page')
      );
      if (!page.ok) {
        logger.warn('Reviews page unavailable', { url: reviewsUrl, status: page.status });
        return [];
      }
      return extractReviews(cheerio.load(page.html), config.maxReviewsPerCompany);
    } catch (error) {
      const kind = errors.record(error);
      logger.warn('Reviews fetch failed', { url: reviewsUrl, kind, error: errorMessage(error) });
      return [];
    }
  }
}
