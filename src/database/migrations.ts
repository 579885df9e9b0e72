import { Database } from 'sqlite';

/**
 * Database migration scripts for SQLite schema creation
 */

export interface Migration {
  version: number;
  name: string;
  up: (db: Database) => Promise<void>;
  down: (db: Database) => Promise<void>;
}

export const migrations: Migration[] = [
  {
    version: 1,
    name: 'create_migration_history_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS migration_history (
          version INTEGER PRIMARY KEY,
          name TEXT NOT NULL,
          applied_at TEXT NOT NULL
        );
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS migration_history;');
    }
  },
  {
    version: 2,
    name: 'create_search_history_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS search_history (
          id TEXT PRIMARY KEY,
          liked_item TEXT NOT NULL,
          top_k INTEGER NOT NULL CHECK (top_k >= 0),
          boost_factor REAL NOT NULL,
          result_count INTEGER NOT NULL DEFAULT 0,
          searched_at TEXT NOT NULL
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_search_history_searched_at ON search_history(searched_at);
        CREATE INDEX IF NOT EXISTS idx_search_history_liked_item ON search_history(liked_item);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS search_history;');
    }
  },
  {
    version: 3,
    name: 'unique_search_history_liked_item',
    up: async (db: Database) => {
      // Keep the first search of each game
      await db.exec(`
        DELETE FROM search_history
        WHERE rowid NOT IN (
          SELECT MIN(rowid) FROM search_history GROUP BY liked_item
        );
      `);

      await db.exec(`
        DROP INDEX IF EXISTS idx_search_history_liked_item;
        CREATE UNIQUE INDEX IF NOT EXISTS idx_search_history_liked_item_unique ON search_history(liked_item);
      `);
    },
    down: async (db: Database) => {
      await db.exec(`
        DROP INDEX IF EXISTS idx_search_history_liked_item_unique;
        CREATE INDEX IF NOT EXISTS idx_search_history_liked_item ON search_history(liked_item);
      `);
    }
  }
];

export async function runMigrations(db: Database): Promise<void> {
  console.log('🔄 Running database migrations...');

  // Ensure migration history table exists first
  const migrationHistoryMigration = migrations.find(m => m.name === 'create_migration_history_table');
  if (migrationHistoryMigration) {
    await migrationHistoryMigration.up(db);
  }

  const currentVersion = await getCurrentVersion(db);

  // Run pending migrations
  for (const migration of migrations) {
    if (migration.version > currentVersion) {
      console.log(`🔄 Running migration ${migration.version}: ${migration.name}`);

      try {
        await db.exec('BEGIN TRANSACTION;');
        await migration.up(db);

        await db.run(
          'INSERT INTO migration_history (version, name, applied_at) VALUES (?, ?, ?)',
          [migration.version, migration.name, new Date().toISOString()]
        );

        await db.exec('COMMIT;');
        console.log(`✅ Migration ${migration.version} completed successfully`);
      } catch (error) {
        await db.exec('ROLLBACK;');
        console.error(`❌ Migration ${migration.version} failed:`, error);
        throw error;
      }
    }
  }

  console.log('✅ All migrations completed successfully');
}

export async function rollbackMigration(db: Database, targetVersion: number): Promise<void> {
  console.log(`🔄 Rolling back to migration version ${targetVersion}...`);

  const currentVersion = await getCurrentVersion(db);

  if (targetVersion >= currentVersion) {
    console.log('No rollback needed - target version is current or higher');
    return;
  }

  // The history table itself is never rolled back
  const migrationsToRollback = migrations
    .filter(m => m.version > targetVersion && m.version <= currentVersion && m.name !== 'create_migration_history_table')
    .sort((a, b) => b.version - a.version);

  for (const migration of migrationsToRollback) {
    console.log(`🔄 Rolling back migration ${migration.version}: ${migration.name}`);

    try {
      await db.exec('BEGIN TRANSACTION;');
      await migration.down(db);

      await db.run('DELETE FROM migration_history WHERE version = ?', [migration.version]);

      await db.exec('COMMIT;');
      console.log(`✅ Migration ${migration.version} rolled back successfully`);
    } catch (error) {
      await db.exec('ROLLBACK;');
      console.error(`❌ Rollback of migration ${migration.version} failed:`, error);
      throw error;
    }
  }

  console.log(`✅ Rollback to version ${targetVersion} completed successfully`);
}

async function getCurrentVersion(db: Database): Promise<number> {
  const row = await db.get<{ version: number | null }>(
    'SELECT MAX(version) as version FROM migration_history'
  );
  return row?.version ?? 0;
}
