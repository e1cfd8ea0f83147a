import { writeFile } from 'node:fs/promises';
import { ScrapedData } from '../types/index.js';

const SAMPLE_SIZE = 5;

function percentage(part: number, whole: number): string {
  return `${part}/${whole} (${((part / whole) * 100).toFixed(1)}%)`;
}

/**
 * Plain-text overview of a run's records
 */
export function generateSummaryReport(records: ScrapedData[], generatedAt: Date = new Date()): string {
  const lines = ['DIRECTORY SCRAPING SUMMARY REPORT', '='.repeat(50), ''];
  lines.push(`Generated: ${generatedAt.toISOString()}`);
  lines.push(`Total Records: ${records.length}`, '');

  if (records.length === 0) {
    lines.push('No data to summarize.');
    return lines.join('\n') + '\n';
  }

  const subcategories = new Map<string, number>();
  const companies = new Set<string>();
  const reviewers = new Set<string>();

  for (const record of records) {
    const subcategory = record.subcategory ?? 'Unknown';
    subcategories.set(subcategory, (subcategories.get(subcategory) ?? 0) + 1);
    if (record.competitor.name) {
      companies.add(record.competitor.name);
    }
    for (const reviewer of record.reviewers) {
      if (reviewer.name) {
        reviewers.add(reviewer.name);
      }
    }
  }

  lines.push('BREAKDOWN BY SUBCATEGORY:', '-'.repeat(30));
  for (const name of [...subcategories.keys()].sort()) {
    lines.push(`${name}: ${subcategories.get(name)} records`);
  }

  lines.push('', `UNIQUE COMPANIES: ${companies.size}`, `UNIQUE REVIEWERS: ${reviewers.size}`, '');

  lines.push('SAMPLE RECORDS:', '-'.repeat(20));
  records.slice(0, SAMPLE_SIZE).forEach((record, index) => {
    const names = record.reviewers.map((reviewer) => reviewer.name).filter((name) => name !== null);
    const scores = record.reviewers
      .map((reviewer) => reviewer.project.score)
      .filter((score): score is number => score !== null);
    const average = scores.length > 0 ? (scores.reduce((sum, score) => sum + score, 0) / scores.length).toFixed(2) : 'N/A';

    lines.push('', `Record ${index + 1}:`);
    lines.push(`  Category: ${record.subcategory ?? 'N/A'}`);
    lines.push(`  Company: ${record.competitor.name ?? 'N/A'}`);
    lines.push(`  Reviewers: ${names.length > 0 ? names.join(', ') : 'N/A'}`);
    lines.push(`  Avg Project Score: ${average}`);
  });

  const named = records.filter((record) => record.competitor.name).length;
  const reviewerNames = records.reduce(
    (sum, record) => sum + record.reviewers.filter((reviewer) => reviewer.name).length,
    0
  );
  const projectScores = records.reduce(
    (sum, record) => sum + record.reviewers.filter((reviewer) => reviewer.project.score !== null).length,
    0
  );

  lines.push('', 'DATA QUALITY METRICS:', '-'.repeat(25));
  lines.push(`Company names populated: ${percentage(named, records.length)}`);
  lines.push(`Reviewer names populated: ${percentage(reviewerNames, records.length)}`);
  lines.push(`Project scores populated: ${percentage(projectScores, records.length)}`);

  return lines.join('\n') + '\n';
}

export async function exportSummary(records: ScrapedData[], filePath: string, generatedAt?: Date): Promise<void> {
  await writeFile(filePath, generateSummaryReport(records, generatedAt), 'utf-8');
}
