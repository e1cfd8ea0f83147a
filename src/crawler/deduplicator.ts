import { ReviewerInfo, ScrapedData } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { normalizeCompanyName } from '../scraper/normalizer.js';

function reviewerSignature(reviewer: ReviewerInfo): string {
  return JSON.stringify([reviewer.name ?? '', reviewer.company ?? '', reviewer.jobTitle ?? '']);
}

type Slot = { kind: 'group'; key: string } | { kind: 'single'; record: ScrapedData };

/**
 * Merge records of the same company across categories and pages
 *
 * Records group by normalized company name. Each group keeps the record
 * with the most reviewers (first wins ties) carrying the union of the
 * group's reviewers, first occurrence first. Unnamed records pass through.
 * Output follows first appearance; running it twice changes nothing.
 */
export function deduplicateRecords(records: ScrapedData[]): ScrapedData[] {
  const groups = new Map<string, ScrapedData[]>();
  const slots: Slot[] = [];

  for (const record of records) {
    const key = normalizeCompanyName(record.competitor.name);
    if (!key) {
      slots.push({ kind: 'single', record });
      continue;
    }

    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
      slots.push({ kind: 'group', key });
    }
  }

  return slots.map((slot) => {
    if (slot.kind === 'single') {
      return slot.record;
    }
    const group = groups.get(slot.key) ?? [];
    return group.length === 1 ? group[0] : mergeGroup(slot.key, group);
  });
}

function mergeGroup(key: string, group: ScrapedData[]): ScrapedData {
  let primary = group[0];
  for (const record of group) {
    if (record.reviewers.length > primary.reviewers.length) {
      primary = record;
    }
  }

  const seen = new Set<string>();
  const reviewers: ReviewerInfo[] = [];
  for (const record of group) {
    for (const reviewer of record.reviewers) {
      const signature = reviewerSignature(reviewer);
      if (!seen.has(signature)) {
        seen.add(signature);
        reviewers.push(reviewer);
      }
    }
  }

  logger.debug('Merged duplicate company records', { company: key, records: group.length, reviewers: reviewers.length });

  return { ...primary, competitor: { ...primary.competitor }, reviewers };
}
