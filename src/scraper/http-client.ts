import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { FetchFailureReason, FetchResult, PageFetcher } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { NetworkError, RateLimitError, errorMessage } from '../utils/errors.js';
import { RateLimiter } from '../utils/rate-limiter.js';

export interface HttpClientOptions {
  timeoutMs: number;
  userAgents: string[];
  rateLimiter: RateLimiter;
}

const DEFAULT_HEADERS = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  Connection: 'keep-alive',
  'Upgrade-Insecure-Requests': '1',
};

/**
 * Parse a Retry-After header given in seconds or as an HTTP date
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === 'number') {
    return value >= 0 ? value * 1000 : undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }

  const seconds = Number(value.trim());
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : undefined;
  }

  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function failureReason(status: number): FetchFailureReason {
  if (status === 401 || status === 403) return 'forbidden';
  if (status === 404) return 'not_found';
  return 'client_error';
}

/**
 * Fetches directory pages, one request at a time
 *
 * Every request waits on the shared rate limiter and goes out with the next
 * user agent in the rotation. A single attempt per call: 2xx and terminal
 * 4xx responses are returned, 429, 5xx and transport failures are thrown
 * for the caller's retry policy.
 */
export class HttpClient implements PageFetcher {
  private client: AxiosInstance;
  private rateLimiter: RateLimiter;
  private userAgents: string[];
  private nextAgent = 0;

  constructor(options: HttpClientOptions) {
    this.rateLimiter = options.rateLimiter;
    this.userAgents = options.userAgents;

    this.client = axios.create({
      timeout: options.timeoutMs,
      headers: DEFAULT_HEADERS,
      responseType: 'text',
      validateStatus: () => true,
    });
  }

  async fetchPage(url: string): Promise<FetchResult> {
    await this.rateLimiter.wait();

    const userAgent = this.rotateUserAgent();
    logger.debug('Fetching page', { url });

    const response = await this.request(url, userAgent);
    const status = response.status;

    if (status >= 200 && status < 300) {
      const html = String(response.data ?? '');
      logger.debug('Page fetched', { url, status, htmlLength: html.length });
      return { ok: true, status, html };
    }

    if (status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers['retry-after']);
      logger.warn('Rate limited', { url, retryAfterMs });
      throw new RateLimitError(`Rate limited by ${url}`, { retryAfterMs, url });
    }

    if (status >= 500) {
      logger.warn('Server error', { url, status });
      throw new NetworkError(`Server error ${status} for ${url}`, { status, url });
    }

    const reason = failureReason(status);
    logger.warn('Page not fetchable', { url, status, reason });
    return { ok: false, status, reason };
  }

  private async request(url: string, userAgent: string | undefined): Promise<AxiosResponse<string>> {
    try {
      return await this.client.get<string>(url, {
        headers: userAgent ? { 'User-Agent': userAgent } : undefined,
      });
    } catch (error) {
      const message = errorMessage(error);
      const code = axios.isAxiosError(error) ? error.code : undefined;
      logger.warn('Request failed', { url, error: message, code });
      throw new NetworkError(`Request to ${url} failed: ${message}`, { url });
    }
  }

  private rotateUserAgent(): string | undefined {
    if (this.userAgents.length === 0) {
      return undefined;
    }
    const agent = this.userAgents[this.nextAgent % this.userAgents.length];
    this.nextAgent++;
    return agent;
  }
}
