import { config as dotenvConfig } from 'dotenv';
import {
  EXPORT_FORMATS,
  ExportFormat,
  ScraperConfig,
  ScrapingTargets,
} from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { isLogLevel } from './logger.js';

dotenvConfig();

type Env = Record<string, string | undefined>;

const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16.1 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:109.0) Gecko/20100101 Firefox/119.0',
];

export const DEFAULT_CONFIG: ScraperConfig = {
  baseUrl: 'https://clutch.co',
  minDelayMs: 1000,
  maxDelayMs: 3000,
  timeoutMs: 30000,
  maxRetries: 3,
  retryDelayMs: 2000,
  rateLimitMaxRetries: 3,
  rateLimitBaseDelayMs: 30000,
  maxRateLimitDelayMs: 300000,
  maxPagesPerCategory: 5,
  maxCompaniesPerPage: 20,
  maxReviewsPerCompany: 10,
  maxConsecutiveFailures: 5,
  maxTotalFailures: 20,
  outputDirectory: 'output',
  formats: [...EXPORT_FORMATS],
  logLevel: 'info',
  logFile: null,
  userAgents: DEFAULT_USER_AGENTS,
};

function getEnvVar(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Read a number, keeping NaN so validateConfig can report the bad value
 */
function getNumber(env: Env, key: string, fallback: number): number {
  const value = getEnvVar(env, key);
  return value === undefined ? fallback : Number(value);
}

function getSeconds(env: Env, key: string, fallbackMs: number): number {
  const value = getEnvVar(env, key);
  return value === undefined ? fallbackMs : Math.round(Number(value) * 1000);
}

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/**
 * Parse a comma-separated format list; unknown names are kept as an error list
 */
export function parseFormats(value: string | undefined): { formats: ExportFormat[]; unknown: string[] } {
  const names = parseList(value).map((name) => name.toLowerCase());
  return {
    formats: names.filter(isExportFormat),
    unknown: names.filter((name) => !isExportFormat(name)),
  };
}

/**
 * Build scraper configuration from environment variables (delays in seconds)
 * Names that cannot be parsed throw here; numeric ranges are checked by validateConfig
 */
export function loadConfig(env: Env = process.env): ScraperConfig {
  const formatsVar = getEnvVar(env, 'SCRAPER_FORMATS');
  const parsedFormats = parseFormats(formatsVar);
  const levelVar = (getEnvVar(env, 'LOG_LEVEL') ?? DEFAULT_CONFIG.logLevel).toLowerCase();

  const problems: string[] = [];
  if (parsedFormats.unknown.length > 0) {
    problems.push(`unknown export formats: ${parsedFormats.unknown.join(', ')}`);
  }
  if (!isLogLevel(levelVar)) {
    problems.push(`unknown log level: ${levelVar}`);
  }
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return {
    baseUrl: getEnvVar(env, 'SCRAPER_BASE_URL') ?? DEFAULT_CONFIG.baseUrl,
    minDelayMs: getSeconds(env, 'SCRAPER_MIN_DELAY', DEFAULT_CONFIG.minDelayMs),
    maxDelayMs: getSeconds(env, 'SCRAPER_MAX_DELAY', DEFAULT_CONFIG.maxDelayMs),
    timeoutMs: getSeconds(env, 'SCRAPER_TIMEOUT', DEFAULT_CONFIG.timeoutMs),
    maxRetries: getNumber(env, 'SCRAPER_MAX_RETRIES', DEFAULT_CONFIG.maxRetries),
    retryDelayMs: getSeconds(env, 'SCRAPER_RETRY_DELAY', DEFAULT_CONFIG.retryDelayMs),
    rateLimitMaxRetries: getNumber(env, 'SCRAPER_RATE_LIMIT_RETRIES', DEFAULT_CONFIG.rateLimitMaxRetries),
    rateLimitBaseDelayMs: DEFAULT_CONFIG.rateLimitBaseDelayMs,
    maxRateLimitDelayMs: DEFAULT_CONFIG.maxRateLimitDelayMs,
    maxPagesPerCategory: getNumber(env, 'SCRAPER_MAX_PAGES', DEFAULT_CONFIG.maxPagesPerCategory),
    maxCompaniesPerPage: getNumber(env, 'SCRAPER_MAX_COMPANIES', DEFAULT_CONFIG.maxCompaniesPerPage),
    maxReviewsPerCompany: getNumber(env, 'SCRAPER_MAX_REVIEWS', DEFAULT_CONFIG.maxReviewsPerCompany),
    maxConsecutiveFailures: getNumber(
      env,
      'SCRAPER_MAX_CONSECUTIVE_FAILURES',
      DEFAULT_CONFIG.maxConsecutiveFailures
    ),
    maxTotalFailures: getNumber(env, 'SCRAPER_MAX_TOTAL_FAILURES', DEFAULT_CONFIG.maxTotalFailures),
    outputDirectory: getEnvVar(env, 'SCRAPER_OUTPUT_DIR') ?? DEFAULT_CONFIG.outputDirectory,
    formats: formatsVar === undefined ? [...DEFAULT_CONFIG.formats] : parsedFormats.formats,
    logLevel: isLogLevel(levelVar) ? levelVar : DEFAULT_CONFIG.logLevel,
    logFile: getEnvVar(env, 'SCRAPER_LOG_FILE') ?? DEFAULT_CONFIG.logFile,
    userAgents: DEFAULT_CONFIG.userAgents,
  };
}

export function loadTargets(env: Env = process.env): ScrapingTargets {
  return {
    categories: parseList(getEnvVar(env, 'SCRAPER_TARGET_CATEGORIES')),
    skipCategories: parseList(getEnvVar(env, 'SCRAPER_SKIP_CATEGORIES')),
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate configuration and return a list of problems (empty when valid)
 */
export function validateConfig(config: ScraperConfig): string[] {
  const errors: string[] = [];

  if (!Number.isFinite(config.minDelayMs) || config.minDelayMs < 0) {
    errors.push('min delay must be a non-negative number');
  }
  if (!Number.isFinite(config.maxDelayMs) || config.maxDelayMs < config.minDelayMs) {
    errors.push('max delay must be >= min delay');
  }
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    errors.push('timeout must be positive');
  }
  if (!isPositiveInteger(config.maxRetries)) {
    errors.push('max retries must be a positive integer');
  }
  if (!Number.isFinite(config.retryDelayMs) || config.retryDelayMs < 0) {
    errors.push('retry delay must be a non-negative number');
  }
  if (!isPositiveInteger(config.rateLimitMaxRetries)) {
    errors.push('rate limit retries must be a positive integer');
  }
  if (!isPositiveInteger(config.maxPagesPerCategory)) {
    errors.push('max pages per category must be a positive integer');
  }
  if (!isPositiveInteger(config.maxCompaniesPerPage)) {
    errors.push('max companies per page must be a positive integer');
  }
  if (!isPositiveInteger(config.maxReviewsPerCompany)) {
    errors.push('max reviews per company must be a positive integer');
  }
  if (!isPositiveInteger(config.maxConsecutiveFailures)) {
    errors.push('max consecutive failures must be a positive integer');
  }
  if (!isPositiveInteger(config.maxTotalFailures)) {
    errors.push('max total failures must be a positive integer');
  }
  if (config.formats.length === 0) {
    errors.push(`at least one export format is required (${EXPORT_FORMATS.join(', ')})`);
  }
  if (!config.outputDirectory) {
    errors.push('output directory is required');
  }

  try {
    const url = new URL(config.baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      errors.push('base URL must use http or https');
    }
  } catch {
    errors.push(`base URL is not a valid URL: ${config.baseUrl}`);
  }

  return errors;
}

export function assertValidConfig(config: ScraperConfig): void {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
}
