import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

const IN_MEMORY = ':memory:';

/**
 * Opens the service database. Farmer profiles, conversation turns and the
 * webhook de-duplication table share one file.
 */
export function openDatabase(filePath: string = IN_MEMORY): Database.Database {
  if (filePath === IN_MEMORY) {
    return new Database(IN_MEMORY);
  }

  const dbPath = path.resolve(process.cwd(), filePath);
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  return db;
}
