import { describe, it, expect, vi } from 'vitest';
import { deduplicateRecords } from './deduplicator.js';
import { createReviewerInfo, createScrapedData } from '../scraper/records.js';
import type { ReviewerInfo } from '../types/index.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const jane = createReviewerInfo({ name: 'Jane Doe', company: 'Northwind', jobTitle: 'CTO' });
const sam = createReviewerInfo({ name: 'Sam Lee', company: 'Harbor Goods', jobTitle: 'CEO' });
const anon = createReviewerInfo({ jobTitle: 'Founder' });

function record(name: string | null, subcategory: string, reviewers: ReviewerInfo[] = []) {
  return createScrapedData({
    subcategory,
    competitor: { name },
    reviewers,
    scrapedAt: '2024-03-01T12:00:00.000Z',
  });
}

describe('deduplicateRecords', () => {
  it('should merge companies whose names differ only in case and punctuation', () => {
    const first = record('Acme Inc', 'Web Developers', [jane]);
    const second = record('ACME INC.', 'PHP', [jane, sam]);

    const result = deduplicateRecords([first, second]);

    expect(result).toHaveLength(1);
    expect(result[0].subcategory).toBe('PHP');
    expect(result[0].competitor.name).toBe('ACME INC.');
    expect(result[0].reviewers).toEqual([jane, sam]);
  });

  it('should keep the first record when reviewer counts tie', () => {
    const first = record('Acme', 'Web Developers', [jane]);
    const second = record('acme', 'PHP', [sam]);

    const [merged] = deduplicateRecords([first, second]);

    expect(merged.subcategory).toBe('Web Developers');
    expect(merged.reviewers).toEqual([jane, sam]);
  });

  it('should treat reviewers with missing fields as the same signature', () => {
    const first = record('Acme', 'Web Developers', [anon]);
    const second = record('Acme', 'PHP', [createReviewerInfo({ jobTitle: 'Founder', industry: 'Retail' })]);

    expect(deduplicateRecords([first, second])[0].reviewers).toEqual([anon]);
  });

  it('should pass unnamed records through in place', () => {
    const unnamed = record(null, 'Web Developers');
    const punctuation = record('---', 'PHP');
    const named = record('Blue River', 'Web Developers');

    expect(deduplicateRecords([named, unnamed, punctuation])).toEqual([named, unnamed, punctuation]);
  });

  it('should keep the order of first appearance', () => {
    const a = record('Alpha', 'Web Developers');
    const b = record('Beta', 'Web Developers');
    const a2 = record('alpha', 'PHP', [jane]);

    const names = deduplicateRecords([a, b, a2]).map((r) => r.competitor.name);
    expect(names).toEqual(['alpha', 'Beta']);
  });

  it('should be idempotent', () => {
    const input = [
      record('Acme', 'Web Developers', [jane]),
      record(null, 'PHP'),
      record('ACME', 'PHP', [sam]),
      record('Blue River', 'PHP', [sam]),
    ];

    const once = deduplicateRecords(input);
    expect(deduplicateRecords(once)).toEqual(once);
  });

  it('should not modify the input records', () => {
    const first = record('Acme', 'Web Developers', [jane]);
    const second = record('Acme', 'PHP', [sam]);

    deduplicateRecords([first, second]);

    expect(first.reviewers).toEqual([jane]);
    expect(second.reviewers).toEqual([sam]);
  });
});
