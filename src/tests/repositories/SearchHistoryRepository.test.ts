import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import { SearchHistoryRepository } from '../../repositories/SearchHistoryRepository';
import { runMigrations } from '../../database/migrations';
import { SearchHistoryEntry } from '../../types/models';

describe('SearchHistoryRepository', () => {
  let db: Database;
  let repository: SearchHistoryRepository;

  const entry = (id: string, likedItem: string, searchedAt: string): SearchHistoryEntry => ({
    id,
    likedItem,
    topK: 10,
    boostFactor: 1.5,
    resultCount: 3,
    searchedAt: new Date(searchedAt)
  });

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    db = await open({ filename: ':memory:', driver: sqlite3.Database });
    await runMigrations(db);
    repository = new SearchHistoryRepository(db);
  });

  afterEach(async () => {
    await db.close();
    jest.restoreAllMocks();
  });

  describe('create', () => {
    it('should persist an entry', async () => {
      const saved = entry('h1', 'Alpha', '2024-03-01T10:00:00.000Z');
      await repository.create(saved);

      expect(await repository.listRecent(10)).toEqual([saved]);
      expect(await repository.count()).toBe(1);
    });

    it('should report whether a row was added', async () => {
      expect(await repository.create(entry('h1', 'Alpha', '2024-03-01T10:00:00.000Z'))).toBe(true);
      expect(await repository.create(entry('h2', 'Alpha', '2024-03-01T11:00:00.000Z'))).toBe(false);

      expect((await repository.listRecent(10)).map(e => e.id)).toEqual(['h1']);
    });
  });

  describe('findByLikedItem', () => {
    it('should return the stored entry for a game', async () => {
      const saved = entry('h1', 'Alpha', '2024-03-01T10:00:00.000Z');
      await repository.create(saved);

      expect(await repository.findByLikedItem('Alpha')).toEqual(saved);
      expect(await repository.findByLikedItem('Beta')).toBeNull();
    });
  });

  describe('listRecent', () => {
    it('should return the newest searches first', async () => {
      await repository.create(entry('h1', 'Alpha', '2024-03-01T10:00:00.000Z'));
      await repository.create(entry('h2', 'Beta', '2024-03-01T12:00:00.000Z'));
      await repository.create(entry('h3', 'Gamma', '2024-03-01T11:00:00.000Z'));

      const recent = await repository.listRecent(2);
      expect(recent.map(e => e.id)).toEqual(['h2', 'h3']);
    });

    it('should order searches made in the same instant by insertion', async () => {
      await repository.create(entry('h1', 'Alpha', '2024-03-01T10:00:00.000Z'));
      await repository.create(entry('h2', 'Beta', '2024-03-01T10:00:00.000Z'));

      const recent = await repository.listRecent(10);
      expect(recent.map(e => e.id)).toEqual(['h2', 'h1']);
    });
  });

  describe('pruneTo', () => {
    it('should delete all but the newest entries', async () => {
      await repository.create(entry('h1', 'Alpha', '2024-03-01T10:00:00.000Z'));
      await repository.create(entry('h2', 'Beta', '2024-03-01T11:00:00.000Z'));
      await repository.create(entry('h3', 'Gamma', '2024-03-01T12:00:00.000Z'));

      expect(await repository.pruneTo(2)).toBe(1);
      expect((await repository.listRecent(10)).map(e => e.id)).toEqual(['h3', 'h2']);
    });

    it('should delete nothing when under the limit', async () => {
      await repository.create(entry('h1', 'Alpha', '2024-03-01T10:00:00.000Z'));

      expect(await repository.pruneTo(10)).toBe(0);
    });
  });

  describe('clear', () => {
    it('should delete every entry and report how many', async () => {
      await repository.create(entry('h1', 'Alpha', '2024-03-01T10:00:00.000Z'));
      await repository.create(entry('h2', 'Beta', '2024-03-01T11:00:00.000Z'));

      expect(await repository.clear()).toBe(2);
      expect(await repository.count()).toBe(0);
    });
  });
});
