import { v4 as uuidv4 } from 'uuid';
import { SearchHistoryEntry } from '../../types/models';
import { SearchHistoryRepository } from '../../repositories/SearchHistoryRepository';

/**
 * Keeps a bounded list of the distinct games users asked recommendations for.
 * Searching a game already in the list leaves the list as it is.
 */
export class SearchHistoryService {
  constructor(private repository: SearchHistoryRepository, private limit: number = 10) {}

  async record(likedItem: string, topK: number, boostFactor: number, resultCount: number): Promise<SearchHistoryEntry> {
    const entry: SearchHistoryEntry = {
      id: uuidv4(),
      likedItem,
      topK,
      boostFactor,
      resultCount,
      searchedAt: new Date()
    };

    const inserted = await this.repository.create(entry);
    if (!inserted) {
      const existing = await this.repository.findByLikedItem(likedItem);
      if (existing) {
        return existing;
      }
      throw new Error(`Search history entry for "${likedItem}" could not be stored`);
    }

    const pruned = await this.repository.pruneTo(this.limit);
    if (pruned > 0) {
      console.log(`🧹 Pruned ${pruned} old search history entries`);
    }
    return entry;
  }

  async recent(limit: number = this.limit): Promise<SearchHistoryEntry[]> {
    return this.repository.listRecent(Math.min(limit, this.limit));
  }

  async clear(): Promise<number> {
    return this.repository.clear();
  }
}
