/**
 * Company Extractor
 * Reads the company name and office locations from a profile page
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import { Element, isTag } from 'domhandler';
import { CompanyDetails } from '../types/index.js';
import { cleanText } from './normalizer.js';
import { ADDRESS_SELECTOR, COMPANY_NAME_SELECTORS, MAX_ADDRESS_BLOCKS } from './directory-selectors.js';

/** Span content that is never a bare city name */
const NON_CITY_MARKERS = [',', 'United States', 'CA', 'NY', 'TX'];
const STREET_MARKERS = ['suite', 'blvd'];

export function extractCompanyDetails($: CheerioAPI): CompanyDetails {
  let name: string | null = null;
  for (const selector of COMPANY_NAME_SELECTORS) {
    const heading = $(selector).first();
    if (heading.length > 0) {
      name = cleanText(heading.text());
      break;
    }
  }

  const locations: string[] = [];
  $(ADDRESS_SELECTOR)
    .toArray()
    .filter(isTag)
    .slice(0, MAX_ADDRESS_BLOCKS)
    .forEach((block) => {
      const location = parseAddressBlock($(block));
      if (location && !locations.includes(location)) {
        locations.push(location);
      }
    });

  return { name, locations };
}

/**
 * Turn one address block's spans into "City, ST" or "City"
 *
 * Until a city is known, a span counts as the city when it carries no
 * region/country marker, is not a bare number and is not a street line.
 * A "City, ST" span supplies the state, and the city when still unset.
 */
export function parseAddressBlock(block: Cheerio<Element>): string | null {
  let city: string | null = null;
  let state: string | null = null;

  for (const span of block.find('span').toArray()) {
    const text = cleanText(block.find(span).text());
    if (!text || text.length <= 1) {
      continue;
    }

    if (!city && !NON_CITY_MARKERS.some((marker) => text.includes(marker))) {
      const lower = text.toLowerCase();
      if (!/^\d+$/.test(text) && !STREET_MARKERS.some((marker) => lower.includes(marker))) {
        city = text;
      }
    } else if (text.includes(', ') && !state) {
      const parts = text.split(', ');
      if (parts.length >= 2 && parts[1].length === 2) {
        if (!city) {
          city = parts[0];
        }
        state = parts[1];
      }
    }
  }

  if (city && state) {
    return `${city}, ${state}`;
  }
  return city;
}
