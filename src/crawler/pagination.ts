/**
 * Pagination Resolver
 * Reads the current page number and the next-page link of a category page
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { PaginationInfo } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { resolveUrl } from '../utils/canonicalize.js';
import { ParseError } from '../utils/errors.js';
import { cleanText } from '../scraper/normalizer.js';
import { CURRENT_PAGE_CLASS, PAGINATION_NAV_CLASS } from '../scraper/directory-selectors.js';

const NO_NEXT_PAGE: PaginationInfo = { currentPage: 1, hasNext: false, nextUrl: null };

function withClassContaining(
  $: CheerioAPI,
  elements: Cheerio<Element>,
  fragment: string
): Cheerio<Element> {
  return elements
    .filter((_, element) => ($(element).attr('class') ?? '').toLowerCase().includes(fragment))
    .first();
}

export function resolvePagination($: CheerioAPI, baseUrl: string): PaginationInfo {
  try {
    return readPagination($, baseUrl);
  } catch (error) {
    if (error instanceof ParseError) {
      logger.warn('Could not parse pagination', { error: error.message, element: error.element });
      return { ...NO_NEXT_PAGE };
    }
    throw error;
  }
}

function readPagination($: CheerioAPI, baseUrl: string): PaginationInfo {
  const nav = withClassContaining($, $('nav'), PAGINATION_NAV_CLASS);
  if (nav.length === 0) {
    return { ...NO_NEXT_PAGE };
  }

  let currentPage = 1;
  const current = withClassContaining($, nav.find('span'), CURRENT_PAGE_CLASS);
  if (current.length > 0) {
    const text = cleanText(current.text()) ?? '';
    if (!/^\d+$/.test(text)) {
      throw new ParseError(`Current page marker is not a number: "${text}"`, 'pagination');
    }
    currentPage = parseInt(text, 10);
  }

  const next = nav
    .find('a')
    .filter((_, link) => $(link).text().toLowerCase().includes('next'))
    .first();

  const nextUrl = next.length > 0 ? resolveUrl(next.attr('href'), baseUrl) : null;

  return { currentPage, hasNext: nextUrl !== null, nextUrl };
}
