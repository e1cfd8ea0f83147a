/**
 * Crawler Module
 * Exports all crawler-related functionality
 */

// Run orchestration
export {
  CrawlerOrchestrator,
  buildRunSummary,
  formatRunSummary,
  type RunResult,
  type RunSummary,
} from './crawler-orchestrator.js';

// Per-run state
export { CancellationToken, createCrawlContext, retryOptionsFor, type CrawlContext } from './crawl-context.js';

// Category and company crawling
export { CategoryCrawler } from './category-crawler.js';
export { CompanyFetcher } from './company-fetcher.js';
export { resolvePagination } from './pagination.js';
export { deduplicateRecords } from './deduplicator.js';

// Category catalogue
export {
  DEVELOPMENT_SUBCATEGORIES,
  selectSubcategories,
  subcategoryUrl,
  type Subcategory,
} from './subcategories.js';
