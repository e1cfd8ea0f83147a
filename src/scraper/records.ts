import {
  CompetitorInfo,
  DEFAULT_CATEGORY,
  FlatColumn,
  FlatRow,
  ProjectInfo,
  ReviewerInfo,
  ScrapedData,
} from '../types/index.js';
import { buildReviewsUrl } from '../utils/canonicalize.js';

/**
 * Export column order shared by every tabular writer
 */
export const FLAT_COLUMNS: readonly FlatColumn[] = [
  'category',
  'subcategory',
  'scraped_at',
  'source_url',
  'source_url_review',
  'competitor_name',
  'competitor_locations',
  'reviewer_name',
  'reviewer_job_title',
  'reviewer_company',
  'reviewer_industry',
  'reviewer_location',
  'reviewer_company_size',
  'project_service_provided',
  'project_size',
  'project_start_date',
  'project_end_date',
  'project_score',
  'project_score_quality',
  'project_score_schedule',
  'project_score_cost',
  'project_score_willing_to_refer',
];

/** Numeric columns; everything else is text */
export const SCORE_COLUMNS: ReadonlySet<FlatColumn> = new Set<FlatColumn>([
  'project_score',
  'project_score_quality',
  'project_score_schedule',
  'project_score_cost',
  'project_score_willing_to_refer',
]);

export function createProjectInfo(partial: Partial<ProjectInfo> = {}): ProjectInfo {
  return {
    serviceProvided: null,
    projectSize: null,
    startDate: null,
    endDate: null,
    score: null,
    scoreQuality: null,
    scoreSchedule: null,
    scoreCost: null,
    scoreWillingToRefer: null,
    ...partial,
  };
}

export function createReviewerInfo(
  partial: Partial<Omit<ReviewerInfo, 'project'>> & { project?: Partial<ProjectInfo> } = {}
): ReviewerInfo {
  return {
    name: null,
    jobTitle: null,
    company: null,
    industry: null,
    location: null,
    companySize: null,
    ...partial,
    project: createProjectInfo(partial.project),
  };
}

export function createCompetitorInfo(partial: Partial<CompetitorInfo> = {}): CompetitorInfo {
  return {
    name: partial.name ?? null,
    locations: partial.locations ? [...partial.locations] : [],
  };
}

/**
 * Assemble a record, filling the timestamp and deriving the review URL
 * from sourceUrl when one was not given explicitly
 */
export function createScrapedData(
  partial: Partial<Omit<ScrapedData, 'competitor'>> & { competitor?: Partial<CompetitorInfo> } = {}
): ScrapedData {
  const sourceUrl = partial.sourceUrl ?? null;
  return {
    category: partial.category ?? DEFAULT_CATEGORY,
    subcategory: partial.subcategory ?? null,
    competitor: createCompetitorInfo(partial.competitor),
    reviewers: partial.reviewers ? [...partial.reviewers] : [],
    scrapedAt: partial.scrapedAt ?? new Date().toISOString(),
    sourceUrl,
    sourceUrlReview: partial.sourceUrlReview ?? (sourceUrl ? buildReviewsUrl(sourceUrl) : null),
  };
}

/**
 * A reviewer is worth keeping when it names someone or says something about the project
 */
export function hasReviewContent(reviewer: ReviewerInfo): boolean {
  return Boolean(
    reviewer.name ||
      reviewer.company ||
      reviewer.project.serviceProvided ||
      reviewer.project.score !== null
  );
}

/**
 * One export row per reviewer; a record without reviewers still yields one row
 */
export function toFlatRows(record: ScrapedData): FlatRow[] {
  const base = {
    category: record.category,
    subcategory: record.subcategory,
    scraped_at: record.scrapedAt,
    source_url: record.sourceUrl,
    source_url_review: record.sourceUrlReview,
    competitor_name: record.competitor.name,
    competitor_locations:
      record.competitor.locations.length > 0 ? record.competitor.locations.join(', ') : null,
  };

  if (record.reviewers.length === 0) {
    return [
      {
        ...base,
        reviewer_name: null,
        reviewer_job_title: null,
        reviewer_company: null,
        reviewer_industry: null,
        reviewer_location: null,
        reviewer_company_size: null,
        project_service_provided: null,
        project_size: null,
        project_start_date: null,
        project_end_date: null,
        project_score: null,
        project_score_quality: null,
        project_score_schedule: null,
        project_score_cost: null,
        project_score_willing_to_refer: null,
      },
    ];
  }

  return record.reviewers.map((reviewer) => ({
    ...base,
    reviewer_name: reviewer.name,
    reviewer_job_title: reviewer.jobTitle,
    reviewer_company: reviewer.company,
    reviewer_industry: reviewer.industry,
    reviewer_location: reviewer.location,
    reviewer_company_size: reviewer.companySize,
    project_service_provided: reviewer.project.serviceProvided,
    project_size: reviewer.project.projectSize,
    project_start_date: reviewer.project.startDate,
    project_end_date: reviewer.project.endDate,
    project_score: reviewer.project.score,
    project_score_quality: reviewer.project.scoreQuality,
    project_score_schedule: reviewer.project.scoreSchedule,
    project_score_cost: reviewer.project.scoreCost,
    project_score_willing_to_refer: reviewer.project.scoreWillingToRefer,
  }));
}
