/**
 * Text and field normalization for scraped values
 *
 * Every function here is pure and total: malformed input degrades to null
 * or to the cleaned text, never to an exception.
 */

import { DateRange } from '../types/index.js';

type MaybeText = string | null | undefined;

/**
 * Collapse whitespace runs and trim; null when nothing is left
 */
export function cleanText(text: MaybeText): string | null {
  if (!text) return null;
  const cleaned = text.replace(/\s+/g, ' ').trim();
  return cleaned.length > 0 ? cleaned : null;
}

/**
 * First decimal number in the text, e.g. "4.8 out of 5" -> 4.8
 */
export function extractNumber(text: MaybeText): number | null {
  if (!text) return null;
  const match = text.match(/(\d+\.?\d*)/);
  if (!match) return null;
  const value = parseFloat(match[1]);
  return Number.isFinite(value) ? value : null;
}

const EMPLOYEE_RANGE_PATTERNS = [
  /(\d[\d,]*)\s*-\s*(\d[\d,]*)\s*employees?/i,
  /(\d[\d,]*)\+?\s*employees?/i,
  /(\d[\d,]*)\s*-\s*(\d[\d,]*)\s*people/i,
  /(\d[\d,]*)\+?\s*people/i,
];

/**
 * Normalize an employer size to "N-M employees" or "N+ employees"
 * Falls back to the cleaned text when no size pattern matches
 */
export function parseEmployeeCount(text: MaybeText): string | null {
  if (!text) return null;

  for (const pattern of EMPLOYEE_RANGE_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return match[2] !== undefined
        ? `${match[1]}-${match[2]} employees`
        : `${match[1]}+ employees`;
    }
  }

  return cleanText(text);
}

/**
 * "Jan 2023 - Jun 2023" -> { start: "Jan 2023", end: "Jun 2023" }
 * A lone "Month Year" becomes the start with no end
 */
export function parseDateRange(text: MaybeText): DateRange {
  if (!text) return { start: null, end: null };

  const range = text.match(/([A-Za-z]+ \d{4})\s*[-–—]\s*([A-Za-z]+ \d{4})/);
  if (range) {
    return { start: range[1], end: range[2] };
  }

  const single = text.match(/([A-Za-z]+ \d{4})/);
  if (single) {
    return { start: single[1], end: null };
  }

  return { start: null, end: null };
}

/**
 * "$50,000 - $100,000" style budgets; otherwise the cleaned text
 */
export function parseProjectSize(text: MaybeText): string | null {
  if (!text) return null;
  const match = text.match(/\$[\d,]+(?:\s*-\s*\$[\d,]+)?/);
  return match ? match[0] : cleanText(text);
}

/**
 * Dedup key for company names: case, punctuation and spacing are ignored
 * "ACME INC." and " Acme  Inc" both become "acme inc"
 */
export function normalizeCompanyName(name: MaybeText): string | null {
  if (!name) return null;
  const normalized = name
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
  return normalized.length > 0 ? normalized : null;
}

/**
 * Parse a score, keeping only values within the 0-5 rating scale
 */
export function parseScore(text: MaybeText): number | null {
  const cleaned = cleanText(text);
  if (!cleaned || !/^\d+(?:\.\d+)?$/.test(cleaned)) return null;
  return toRating(parseFloat(cleaned));
}

export function toRating(value: number): number | null {
  return Number.isFinite(value) && value >= 0 && value <= 5 ? value : null;
}
