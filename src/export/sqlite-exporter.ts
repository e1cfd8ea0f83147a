import { rm } from 'node:fs/promises';
import Database from 'better-sqlite3';
import { ScrapedData } from '../types/index.js';
import { FLAT_COLUMNS, SCORE_COLUMNS, toFlatRows } from '../scraper/records.js';
import { flatRowCells } from './csv-exporter.js';

export const SQLITE_TABLE = 'scraped_data';

export function createTableSql(): string {
  const columns = FLAT_COLUMNS.map(
    (column) => `${column} ${SCORE_COLUMNS.has(column) ? 'REAL' : 'TEXT'}`
  );
  return `CREATE TABLE ${SQLITE_TABLE} (${columns.join(', ')})`;
}

/**
 * Write every flat row into a freshly created database file
 */
export async function exportSqlite(records: ScrapedData[], filePath: string): Promise<void> {
  await rm(filePath, { force: true });

  const db = new Database(filePath);
  try {
    db.exec(createTableSql());

    const insert = db.prepare(
      `INSERT INTO ${SQLITE_TABLE} (${FLAT_COLUMNS.join(', ')}) VALUES (${FLAT_COLUMNS.map(() => '?').join(', ')})`
    );
    const insertAll = db.transaction((rows: ReturnType<typeof flatRowCells>[]) => {
      for (const row of rows) {
        insert.run(...row);
      }
    });

    insertAll(records.flatMap(toFlatRows).map(flatRowCells));
  } finally {
    db.close();
  }
}
