/**
 * Listing Extractor
 * Finds company summary blocks on a category page and reads their basic info
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import { Element, isTag, isText } from 'domhandler';
import { ListingInfo } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { resolveUrl } from '../utils/canonicalize.js';
import { cleanText } from './normalizer.js';
import {
  findFirst,
  LISTING_FALLBACK_SELECTOR,
  LISTING_KEYWORD_THRESHOLD,
  LISTING_KEYWORDS,
  LISTING_SELECTORS,
  NAME_SELECTORS,
  PROFILE_LINK_SELECTOR,
  selectFirstMatching,
} from './directory-selectors.js';

/** City, ST then City, Country */
const LOCATION_PATTERNS = [/[A-Z][a-z]+,\s*[A-Z]{2}/, /[A-Z][a-z]+,\s*[A-Z][a-z]+/];

const LOCATION_TEXT_NODE_PATTERN = /[A-Z][a-z]+,\s*[A-Z]/;

/**
 * Locate listing elements on a category page
 * Structural selectors first; a keyword/profile-link scan of every div only when none match
 */
export function findListingElements($: CheerioAPI): Element[] {
  const { selector, elements } = selectFirstMatching($, LISTING_SELECTORS);

  if (selector) {
    logger.debug('Listing elements matched selector', { selector, count: elements.length });
    return elements;
  }

  logger.debug('No listing selector matched, using heuristic scan');
  return $(LISTING_FALLBACK_SELECTOR)
    .toArray()
    .filter(isTag)
    .filter((element) => looksLikeListingElement($(element)));
}

/**
 * A block looks like a company summary when it links to a profile
 * or mentions enough company-summary keywords
 */
export function looksLikeListingElement(element: Cheerio<Element>): boolean {
  if (element.find(PROFILE_LINK_SELECTOR).length > 0) {
    return true;
  }

  const text = element.text().toLowerCase();
  const indicatorCount = LISTING_KEYWORDS.filter((keyword) => text.includes(keyword)).length;
  return indicatorCount >= LISTING_KEYWORD_THRESHOLD;
}

/**
 * Name, profile URL and locations of one listing element
 * Returns null when no name can be found
 */
export function extractListingInfo(
  $: CheerioAPI,
  element: Element,
  baseUrl: string
): ListingInfo | null {
  const root = $(element);
  const nameElement = findFirst(root, NAME_SELECTORS);
  if (!nameElement) {
    return null;
  }

  const name = cleanText(nameElement.text());
  if (!name) {
    return null;
  }

  const locationText = extractLocationText(root);

  return {
    name,
    url: resolveUrl(nameElement.attr('href'), baseUrl),
    locations: locationText ? parseLocations(locationText) : [],
  };
}

/**
 * First location-shaped substring of the element text, else the first
 * text node that looks like one
 */
export function extractLocationText(element: Cheerio<Element>): string | null {
  const text = element.text();
  for (const pattern of LOCATION_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return match[0];
    }
  }

  const textNode = element
    .find('*')
    .addBack()
    .contents()
    .toArray()
    .find((node) => isText(node) && LOCATION_TEXT_NODE_PATTERN.test(node.data));

  return textNode && isText(textNode) ? cleanText(textNode.data) : null;
}

/**
 * Split "Austin, TX; Denver, CO" style text into separate locations
 */
export function parseLocations(locationText: string): string[] {
  return locationText
    .split(/[;|]|\sand\s/)
    .map((part) => cleanText(part))
    .filter((part): part is string => part !== null);
}
