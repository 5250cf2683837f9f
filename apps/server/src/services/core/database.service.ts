import { injectable, inject } from 'inversify';
import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { TYPES } from '@server/core/types';
import type { IDatabase, IConfig, ILogger } from '@server/core/interfaces';

export interface Migration {
  name: string;
  up: string;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    name: '001_conversations',
    up: `
      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
        role TEXT NOT NULL CHECK(role IN ('system', 'user', 'assistant', 'tool')),
        content TEXT NOT NULL,
        tool_calls TEXT,
        tool_call_id TEXT,
        tool_name TEXT,
        is_error INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id, id);
    `,
  },
];

/**
 * Apply pending migrations to an open database.
 */
export function runMigrations(db: Database.Database, logger?: ILogger): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at INTEGER DEFAULT (strftime('%s', 'now'))
    )
  `);

  const applied = new Set(
    db
      .prepare('SELECT name FROM migrations')
      .pluck()
      .all()
      .filter((name): name is string => typeof name === 'string')
  );

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.name)) {
      continue;
    }

    logger?.info('Applying migration', { name: migration.name });
    db.transaction(() => {
      db.exec(migration.up);
      db.prepare('INSERT INTO migrations (name) VALUES (?)').run(migration.name);
    })();
  }
}

/**
 * SQLite database service using better-sqlite3.
 */
@injectable()
export class SqliteDatabase implements IDatabase {
  private handle: Database.Database | null = null;

  constructor(
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) private logger: ILogger
  ) {}

  get db(): Database.Database {
    return this.handle ?? this.open();
  }

  initialize(): void {
    if (!this.handle) {
      this.open();
    }
  }

  close(): void {
    if (this.handle) {
      this.handle.close();
      this.handle = null;
      this.logger.info('Database connection closed');
    }
  }

  transaction<T>(fn: () => T): T {
    const transaction = this.db.transaction(fn);
    return transaction();
  }

  private open(): Database.Database {
    const dbPath = this.getDatabasePath();
    if (dbPath !== ':memory:') {
      this.ensureDirectory(path.dirname(dbPath));
    }

    this.logger.info('Initializing database', { path: dbPath });

    try {
      const db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('foreign_keys = ON');

      runMigrations(db, this.logger);
      this.handle = db;
      return db;
    } catch (error) {
      this.logger.error('Failed to initialize database', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  private getDatabasePath(): string {
    const dbFile = this.config.get<string>('database.path', 'conversations.db');

    if (dbFile === ':memory:' || path.isAbsolute(dbFile)) {
      return dbFile;
    }

    return path.join(this.config.dataPath, dbFile);
  }

  private ensureDirectory(dir: string): void {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }
}
