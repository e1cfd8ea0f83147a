import { writeFile } from 'node:fs/promises';
import { ScrapedData } from '../types/index.js';

export async function exportJson(records: ScrapedData[], filePath: string): Promise<void> {
  await writeFile(filePath, JSON.stringify(records, null, 2), 'utf-8');
}
