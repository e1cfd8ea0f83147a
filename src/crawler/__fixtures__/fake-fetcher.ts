import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { FetchResult, PageFetcher } from '../../types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export type FakeResponse = FetchResult | Error;

export function loadDirectoryFixture(filename: string): string {
  return fs.readFileSync(
    path.join(__dirname, '..', '..', 'scraper', '__fixtures__', 'directory', filename),
    'utf-8'
  );
}

export function page(html: string): FetchResult {
  return { ok: true, status: 200, html };
}

export const NOT_FOUND: FetchResult = { ok: false, status: 404, reason: 'not_found' };

/**
 * In-memory fetcher keyed by URL
 * A list of responses is served in order, the last one repeating;
 * unknown URLs come back as 404
 */
export class FakeFetcher implements PageFetcher {
  readonly requests: string[] = [];
  private readonly responses = new Map<string, FakeResponse[]>();

  constructor(responses: Record<string, FakeResponse | FakeResponse[]> = {}) {
    for (const [url, response] of Object.entries(responses)) {
      this.set(url, response);
    }
  }

  set(url: string, response: FakeResponse | FakeResponse[]): void {
    this.responses.set(url, Array.isArray(response) ? [...response] : [response]);
  }

  async fetchPage(url: string): Promise<FetchResult> {
    this.requests.push(url);
    const queue = this.responses.get(url);
    if (!queue || queue.length === 0) {
      return NOT_FOUND;
    }

    const response = queue.length > 1 ? queue.shift() : queue[0];
    if (response === undefined) {
      return NOT_FOUND;
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }

  count(url: string): number {
    return this.requests.filter((requested) => requested === url).length;
  }
}
