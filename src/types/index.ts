// Record Models
export const DEFAULT_CATEGORY = 'Development';

export interface ProjectInfo {
  serviceProvided: string | null;
  projectSize: string | null;
  /** Free text such as "Jan 2023", never parsed to a Date */
  startDate: string | null;
  endDate: string | null;
  score: number | null;
  scoreQuality: number | null;
  scoreSchedule: number | null;
  scoreCost: number | null;
  scoreWillingToRefer: number | null;
}

export interface ReviewerInfo {
  name: string | null;
  jobTitle: string | null;
  company: string | null;
  industry: string | null;
  location: string | null;
  /** Employer size bucket, e.g. "50-100 employees" */
  companySize: string | null;
  project: ProjectInfo;
}

export interface CompetitorInfo {
  name: string | null;
  locations: string[];
}

export interface ScrapedData {
  category: string;
  subcategory: string | null;
  competitor: CompetitorInfo;
  reviewers: ReviewerInfo[];
  scrapedAt: string;
  sourceUrl: string | null;
  sourceUrlReview: string | null;
}

/**
 * One export row. Column names are the stable contract shared by
 * the CSV, XLSX and SQLite writers.
 */
export interface FlatRow {
  category: string;
  subcategory: string | null;
  scraped_at: string;
  source_url: string | null;
  source_url_review: string | null;
  competitor_name: string | null;
  competitor_locations: string | null;
  reviewer_name: string | null;
  reviewer_job_title: string | null;
  reviewer_company: string | null;
  reviewer_industry: string | null;
  reviewer_location: string | null;
  reviewer_company_size: string | null;
  project_service_provided: string | null;
  project_size: string | null;
  project_start_date: string | null;
  project_end_date: string | null;
  project_score: number | null;
  project_score_quality: number | null;
  project_score_schedule: number | null;
  project_score_cost: number | null;
  project_score_willing_to_refer: number | null;
}

export type FlatColumn = keyof FlatRow;

// Extraction Types
export interface ListingInfo {
  name: string;
  url: string | null;
  locations: string[];
}

export interface CompanyDetails {
  name: string | null;
  locations: string[];
}

export interface PaginationInfo {
  currentPage: number;
  hasNext: boolean;
  nextUrl: string | null;
}

export interface DateRange {
  start: string | null;
  end: string | null;
}

// Fetch Types
export type FetchFailureReason = 'forbidden' | 'not_found' | 'client_error';

export type FetchResult =
  | { ok: true; status: number; html: string }
  | { ok: false; status: number; reason: FetchFailureReason };

/**
 * Fetch capability the crawler depends on. Terminal outcomes come back
 * as `ok: false`; retryable ones are thrown as NetworkError/RateLimitError.
 */
export interface PageFetcher {
  fetchPage(url: string): Promise<FetchResult>;
}

// Export Types
export const EXPORT_FORMATS = ['json', 'csv', 'xlsx', 'sqlite', 'summary'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

// Configuration
export interface ScraperConfig {
  /** Root address used to resolve relative links and validate company URLs */
  baseUrl: string;
  minDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  rateLimitMaxRetries: number;
  rateLimitBaseDelayMs: number;
  maxRateLimitDelayMs: number;
  maxPagesPerCategory: number;
  maxCompaniesPerPage: number;
  maxReviewsPerCompany: number;
  maxConsecutiveFailures: number;
  maxTotalFailures: number;
  outputDirectory: string;
  formats: ExportFormat[];
  logLevel: LogLevel;
  /** Log lines are also appended here when set */
  logFile: string | null;
  userAgents: string[];
}

export interface ScrapingTargets {
  /** Category names to crawl; empty means every category */
  categories: string[];
  skipCategories: string[];
}

// Utility Types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
