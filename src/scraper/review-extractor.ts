/**
 * Review Extractor
 * Builds reviewer records from the review blocks of a company profile
 *
 * A profile renders each review as sibling blocks (project data, review
 * content, reviewer card, rating metrics) that are paired by position.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import { Element, isTag } from 'domhandler';
import { ProjectInfo, ReviewerInfo } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { cleanText, parseEmployeeCount, parseScore, toRating } from './normalizer.js';
import { createProjectInfo, hasReviewContent } from './records.js';
import { REVIEW_SELECTORS, REVIEWER_SELECTORS } from './directory-selectors.js';

const MAX_SERVICES = 3;

const SERVICE_SKIP_WORDS = ['confidential', 'ongoing'];
const YEAR_PATTERN = /\b20\d{2}\b/;

const DATE_RANGE_PATTERNS = [
  /([A-Za-z]{3,9}\.?\s+\d{4})\s*[-–]\s*([A-Za-z]{3,9}\.?\s+\d{4}|Ongoing)/,
  /([A-Za-z]{3,9})\s*[-–]\s*([A-Za-z]{3,9}\.?\s+\d{4})/,
];

const BUDGET_PATTERN = /\$([0-9,]+(?:\s*to\s*\$[0-9,]+)?)/;

const SCORE_PATTERNS = [
  /(\d+\.?\d*)\s*(?:Quality|Overall|Rating)/i,
  /(\d+\.?\d*)\/5/i,
  /(\d+\.?\d*)\s*stars?/i,
];

type SubScoreField = 'scoreQuality' | 'scoreSchedule' | 'scoreCost' | 'scoreWillingToRefer';

/** Metric label fragment -> sub-score, checked in order */
const RATING_METRICS: ReadonlyArray<[string, SubScoreField]> = [
  ['quality', 'scoreQuality'],
  ['schedule', 'scoreSchedule'],
  ['cost', 'scoreCost'],
  ['refer', 'scoreWillingToRefer'],
];

const REVIEWER_BADGES = ['Verified', 'Online Review', 'Phone Interview'];
const COMPANY_SIZE_PATTERN = /\d[\d,]*(?:\s*-\s*\d[\d,]*)?\+?\s*employees?/i;

const INDUSTRY_KEYWORDS = [
  'Industry',
  'Technology',
  'Consulting',
  'Automotive',
  'Healthcare',
  'Finance',
  'Marketing',
  'Non-profit',
  'Nonprofit',
  'Education',
  'Retail',
  'Manufacturing',
  'Information technology',
  'Consumer Products',
  'Social Networking',
  'Other Industry',
].map((keyword) => keyword.toLowerCase());

const LOCATION_PATTERNS = [/^[A-Za-z\s]+,\s+[A-Za-z\s]+$/, /^[A-Za-z\s]+$/];
const MAX_LOCATION_LENGTH = 50;

const NAME_PATTERNS = [/[A-Z][a-z]+\s+[A-Z][a-z]+/g, /[A-Z][a-z]+/g];
const NAME_BOILERPLATE = ['Anonymous', 'Verified', 'Online', 'Review', 'Phone', 'Interview'];

/**
 * Extract at most maxReviews reviewers from a profile page
 */
export function extractReviews($: CheerioAPI, maxReviews: number): ReviewerInfo[] {
  const dataBlocks = $(REVIEW_SELECTORS.data).toArray().filter(isTag);
  const contentBlocks = $(REVIEW_SELECTORS.content).toArray().filter(isTag);
  const reviewerBlocks = $(REVIEW_SELECTORS.reviewer).toArray().filter(isTag);
  const ratingBlocks = $(REVIEW_SELECTORS.ratingMetrics).toArray().filter(isTag);

  const count = Math.max(
    0,
    Math.min(dataBlocks.length, contentBlocks.length, reviewerBlocks.length, maxReviews)
  );

  logger.debug('Review blocks found', {
    data: dataBlocks.length,
    content: contentBlocks.length,
    reviewers: reviewerBlocks.length,
    ratings: ratingBlocks.length,
    extracting: count,
  });

  const reviewers: ReviewerInfo[] = [];
  for (let i = 0; i < count; i++) {
    const rating = i < ratingBlocks.length ? $(ratingBlocks[i]) : null;
    const reviewer = extractReview(
      $(dataBlocks[i]),
      $(contentBlocks[i]),
      $(reviewerBlocks[i]),
      rating
    );
    if (reviewer) {
      reviewers.push(reviewer);
    }
  }

  return reviewers;
}

/**
 * Build one reviewer from its paired blocks
 * Returns null when the result says nothing about the reviewer or the project
 */
export function extractReview(
  data: Cheerio<Element>,
  content: Cheerio<Element>,
  reviewerBlock: Cheerio<Element>,
  rating: Cheerio<Element> | null = null
): ReviewerInfo | null {
  const project: ProjectInfo = {
    ...createProjectInfo(),
    ...parseProjectData(data),
    score: parseOverallScore(content.text()),
    ...(rating ? parseRatingMetrics(rating) : {}),
  };

  const reviewer = { ...parseReviewerBlock(reviewerBlock), project };
  return hasReviewContent(reviewer) ? reviewer : null;
}

export function parseProjectData(data: Cheerio<Element>): Partial<ProjectInfo> {
  const result: Partial<ProjectInfo> = {};

  const services = data
    .find('li')
    .toArray()
    .map((li) => cleanText(data.find(li).text()))
    .filter((text): text is string => text !== null)
    .filter((text) => {
      const lower = text.toLowerCase();
      return !SERVICE_SKIP_WORDS.some((word) => lower.includes(word)) && !YEAR_PATTERN.test(text);
    });

  if (services.length > 0) {
    result.serviceProvided = services.slice(0, MAX_SERVICES).join(', ');
  }

  const text = cleanText(data.text()) ?? '';

  for (const pattern of DATE_RANGE_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      result.startDate = match[1].trim();
      result.endDate = match[2].trim();
      break;
    }
  }

  const budget = text.match(BUDGET_PATTERN);
  if (budget) {
    result.projectSize = `$${budget[1]}`;
  }

  return result;
}

/**
 * First in-range score mentioned in the review text
 * An out-of-range hit moves on to the next pattern
 */
export function parseOverallScore(text: string): number | null {
  const cleaned = cleanText(text);
  if (!cleaned) return null;

  for (const pattern of SCORE_PATTERNS) {
    const match = cleaned.match(pattern);
    if (!match) continue;
    const score = toRating(parseFloat(match[1]));
    if (score !== null) {
      return score;
    }
  }
  return null;
}

export function parseRatingMetrics(rating: Cheerio<Element>): Partial<ProjectInfo> {
  const scores: Partial<Record<SubScoreField, number>> = {};

  for (const dl of rating.find('dl').toArray()) {
    const pair = rating.find(dl);
    const label = cleanText(pair.find('dt').first().text())?.toLowerCase();
    const value = parseScore(pair.find('dd').first().text());
    if (!label || value === null) {
      continue;
    }

    const metric = RATING_METRICS.find(([fragment]) => label.includes(fragment));
    if (metric) {
      scores[metric[1]] = value;
    }
  }

  return scores;
}

/**
 * Reviewer identity from the reviewer card
 */
export function parseReviewerBlock(block: Cheerio<Element>): Omit<ReviewerInfo, 'project'> {
  const reviewer: Omit<ReviewerInfo, 'project'> = {
    name: null,
    jobTitle: null,
    company: null,
    industry: null,
    location: null,
    companySize: null,
  };

  const position = cleanText(block.find(REVIEWER_SELECTORS.position).first().text());
  if (position) {
    const comma = position.indexOf(',');
    if (comma >= 0) {
      reviewer.jobTitle = cleanText(position.slice(0, comma));
      reviewer.company = cleanText(position.slice(comma + 1));
    } else {
      reviewer.jobTitle = position;
    }
  }

  const nameElement = block.find(REVIEWER_SELECTORS.name).first();
  if (nameElement.length > 0) {
    const name = cleanText(nameElement.text());
    if (name && name !== 'Anonymous') {
      reviewer.name = name;
    }
  }

  const items = block.find(REVIEWER_SELECTORS.details).first().find('li').toArray();
  for (const item of items) {
    const text = cleanText(block.find(item).text());
    if (!text || REVIEWER_BADGES.includes(text)) {
      continue;
    }

    if (COMPANY_SIZE_PATTERN.test(text)) {
      reviewer.companySize = parseEmployeeCount(text);
      continue;
    }

    const lower = text.toLowerCase();
    if (INDUSTRY_KEYWORDS.some((keyword) => lower.includes(keyword))) {
      reviewer.industry = text;
      continue;
    }

    if (text.length < MAX_LOCATION_LENGTH && LOCATION_PATTERNS.some((pattern) => pattern.test(text))) {
      reviewer.location = text;
    }
  }

  // An explicit card, even an anonymous one, rules out guessing from free text
  if (nameElement.length === 0) {
    reviewer.name = guessReviewerName(cleanText(block.text()) ?? '', reviewer.company);
  }

  return reviewer;
}

/**
 * "First Last" or a single capitalized word from the card text,
 * skipping badge words and words of the reviewer's company
 */
export function guessReviewerName(text: string, company: string | null): string | null {
  const rejected = [...NAME_BOILERPLATE, ...(company ? company.split(/\s+/) : [])];

  for (const pattern of NAME_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const words = match[0].split(/\s+/);
      if (!words.some((word) => rejected.includes(word))) {
        return match[0];
      }
    }
  }
  return null;
}
