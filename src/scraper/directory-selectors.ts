/**
 * CSS selector chains for directory pages
 *
 * Markup on the directory changes often, so each concern has an ordered list:
 * specific, cheap selectors first, broader ones later. The helpers below apply
 * a chain and stop at the first selector that matches anything.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import { Element, isTag } from 'domhandler';

/**
 * Listing elements on a category page, one per company summary
 */
export const LISTING_SELECTORS = [
  'li[itemtype="https://schema.org/Organization"]',
  '.providers__list li',
  'li[class*="provider"]',
  'div[class*="provider"]',
  'li[itemscope]',
  '.company-tile',
  '.provider-card',
];

/**
 * Company name anchors inside a listing element
 * Header links first, then class-based names, then any profile link
 */
export const NAME_SELECTORS = [
  'h2 a',
  'h3 a',
  'h4 a',
  '.company-name a',
  '.provider-name a',
  'a[href*="/profile/"]',
];

/** Marks a link to a company profile page */
export const PROFILE_LINK_SELECTOR = 'a[href*="/profile/"]';

/**
 * Words that tend to appear in a company summary block; the heuristic
 * fallback keeps blocks containing at least LISTING_KEYWORD_THRESHOLD of them
 */
export const LISTING_KEYWORDS = [
  'reviews',
  'rating',
  'stars',
  'location',
  'employees',
  'founded',
  'services',
];

export const LISTING_KEYWORD_THRESHOLD = 2;

/** Fallback scan candidates when no listing selector matches */
export const LISTING_FALLBACK_SELECTOR = 'div';

// Profile page
export const COMPANY_NAME_SELECTORS = ['h1', 'h2'];
export const ADDRESS_SELECTOR = '.detailed-address.location_element';
export const MAX_ADDRESS_BLOCKS = 3;

// Review blocks, paired by position
export const REVIEW_SELECTORS = {
  data: '.profile-review__data',
  content: '.profile-review__content',
  reviewer: '.profile-review__reviewer',
  ratingMetrics: '.profile-review__rating-metrics',
} as const;

export const REVIEWER_SELECTORS = {
  position: '.reviewer_position',
  name: '.reviewer_card--name',
  details: 'ul',
} as const;

// Pagination
export const PAGINATION_NAV_CLASS = 'pagination';
export const CURRENT_PAGE_CLASS = 'current';

/**
 * Apply a selector chain to the whole document
 * Returns the matches of the first selector that finds anything
 */
export function selectFirstMatching(
  $: CheerioAPI,
  selectors: readonly string[]
): { selector: string | null; elements: Element[] } {
  for (const selector of selectors) {
    const elements = $(selector).toArray().filter(isTag);
    if (elements.length > 0) {
      return { selector, elements };
    }
  }
  return { selector: null, elements: [] };
}

/**
 * First descendant of root matched by the earliest selector in the chain
 */
export function findFirst(
  root: Cheerio<Element>,
  selectors: readonly string[]
): Cheerio<Element> | null {
  for (const selector of selectors) {
    const match = root.find(selector).first();
    if (match.length > 0) {
      return match;
    }
  }
  return null;
}
