import { Database } from 'sqlite';
import { SearchHistoryEntry, SearchHistoryRow } from '../types/models';
import { searchHistoryRowToModel, searchHistoryModelToRow } from '../models/transformers';
import { getDatabase } from '../config/database';

/**
 * SearchHistoryRepository handles persistence of past recommendation searches in SQLite
 */
export class SearchHistoryRepository {
  constructor(private db: Database | null = null) {}

  private async getDb(): Promise<Database> {
    if (!this.db) {
      this.db = await getDatabase();
    }
    return this.db;
  }

  /**
   * Insert an entry unless its game is already in the history; returns whether a row was added
   */
  async create(entry: SearchHistoryEntry): Promise<boolean> {
    const db = await this.getDb();
    const row = searchHistoryModelToRow(entry);

    const result = await db.run(`
      INSERT INTO search_history (id, liked_item, top_k, boost_factor, result_count, searched_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(liked_item) DO NOTHING
    `, [row.id, row.liked_item, row.top_k, row.boost_factor, row.result_count, row.searched_at]);

    return (result.changes ?? 0) > 0;
  }

  async findByLikedItem(likedItem: string): Promise<SearchHistoryEntry | null> {
    const db = await this.getDb();
    const row = await db.get<SearchHistoryRow>(
      'SELECT * FROM search_history WHERE liked_item = ?',
      [likedItem]
    );
    return row ? searchHistoryRowToModel(row) : null;
  }

  /**
   * Most recent searches first
   */
  async listRecent(limit: number): Promise<SearchHistoryEntry[]> {
    const db = await this.getDb();
    const rows = await db.all<SearchHistoryRow[]>(`
      SELECT * FROM search_history
      ORDER BY searched_at DESC, rowid DESC
      LIMIT ?
    `, [limit]);

    return rows.map(searchHistoryRowToModel);
  }

  async count(): Promise<number> {
    const db = await this.getDb();
    const result = await db.get<{ count: number }>('SELECT COUNT(*) as count FROM search_history');
    return result?.count ?? 0;
  }

  /**
   * Delete everything except the newest `keep` searches; returns the number deleted
   */
  async pruneTo(keep: number): Promise<number> {
    const db = await this.getDb();
    const result = await db.run(`
      DELETE FROM search_history
      WHERE id NOT IN (
        SELECT id FROM search_history
        ORDER BY searched_at DESC, rowid DESC
        LIMIT ?
      )
    `, [keep]);

    return result.changes ?? 0;
  }

  async clear(): Promise<number> {
    const db = await this.getDb();
    const result = await db.run('DELETE FROM search_history');
    return result.changes ?? 0;
  }
}
