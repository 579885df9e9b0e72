import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';

let db: Database | null = null;

/**
 * Get or create the search history database connection
 */
export async function getDatabase(filename: string = process.env.DATABASE_PATH || path.join(process.cwd(), 'data', 'history.db')): Promise<Database> {
  if (db) {
    return db;
  }

  if (filename !== ':memory:') {
    // Ensure directory exists
    const dir = path.dirname(filename);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  db = await open({
    filename,
    driver: sqlite3.Database
  });

  console.log(`✅ Database opened at ${filename}`);
  return db;
}

/**
 * Close database connection
 */
export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.close();
    db = null;
  }
}
