/**
 * Error taxonomy for the scraper
 *
 * - NetworkError: timeouts, connection failures, 5xx responses (retryable)
 * - RateLimitError: HTTP 429 (retryable under its own budget)
 * - ParseError: expected structure missing; extractors degrade instead of throwing it
 * - ConfigurationError: invalid settings, fatal at startup
 * - ExportError: I/O or encoding failure while writing one output format
 */

export type ErrorKind = 'network' | 'rate_limit' | 'parse' | 'configuration' | 'export' | 'unknown';

export class ScraperError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;

  constructor(message: string, kind: ErrorKind, retryable: boolean) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.retryable = retryable;
  }
}

export class NetworkError extends ScraperError {
  readonly status: number | null;
  readonly url: string | null;

  constructor(message: string, options: { status?: number; url?: string } = {}) {
    super(message, 'network', true);
    this.status = options.status ?? null;
    this.url = options.url ?? null;
  }
}

export class RateLimitError extends ScraperError {
  /** Server-suggested wait from Retry-After, when it sent one */
  readonly retryAfterMs: number | null;
  readonly url: string | null;

  constructor(message: string, options: { retryAfterMs?: number; url?: string } = {}) {
    super(message, 'rate_limit', true);
    this.retryAfterMs = options.retryAfterMs ?? null;
    this.url = options.url ?? null;
  }
}

export class ParseError extends ScraperError {
  readonly element: string | null;

  constructor(message: string, element?: string) {
    super(message, 'parse', false);
    this.element = element ?? null;
  }
}

export class ConfigurationError extends ScraperError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`, 'configuration', false);
    this.errors = errors;
  }
}

export class ExportError extends ScraperError {
  readonly format: string;
  readonly filename: string | null;

  constructor(message: string, format: string, filename?: string) {
    super(message, 'export', false);
    this.format = format;
    this.filename = filename ?? null;
  }
}

/**
 * Convert an unknown thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return new Error(String(error.message));
  }
  return new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return toError(error).message;
}

export function errorKind(error: unknown): ErrorKind {
  return error instanceof ScraperError ? error.kind : 'unknown';
}

/**
 * Per-run count of failures by kind, reported in the run summary
 */
export class ErrorTally {
  private counts = new Map<ErrorKind, number>();

  record(error: unknown): ErrorKind {
    const kind = errorKind(error);
    this.counts.set(kind, (this.counts.get(kind) ?? 0) + 1);
    return kind;
  }

  count(kind: ErrorKind): number {
    return this.counts.get(kind) ?? 0;
  }

  total(): number {
    let sum = 0;
    for (const value of this.counts.values()) {
      sum += value;
    }
    return sum;
  }

  summary(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }

  reset(kind?: ErrorKind): void {
    if (kind) {
      this.counts.delete(kind);
    } else {
      this.counts.clear();
    }
  }
}
