/**
 * SQLite Database Infrastructure
 * Manages the connection, schema migrations, and transactions for the test case store
 */

import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';

// ============================================
// Types
// ============================================

export interface DatabaseConfig {
  /** Path to SQLite database file, or ':memory:' */
  path: string;
  /** Enable WAL mode for better concurrent access */
  walMode: boolean;
  /** Busy timeout in milliseconds */
  busyTimeout: number;
}

export interface MigrationInfo {
  version: number;
  appliedAt: number;
  description: string;
}

// ============================================
// Schema Migrations
// ============================================

interface Migration {
  version: number;
  description: string;
  up: string;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Create test_cases table',
    up: `
      CREATE TABLE IF NOT EXISTS test_cases (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        vuln_id TEXT NOT NULL,
        vuln_name TEXT NOT NULL,
        platform TEXT NOT NULL CHECK(platform IN ('LLM', 'web', 'mobile', 'API')),
        analysis_type TEXT,
        owasp_ref TEXT,
        compliance TEXT,
        vuln_abstract TEXT,
        description TEXT,
        recommendation TEXT,
        example TEXT,
        cvss_score REAL CHECK(cvss_score IS NULL OR (cvss_score >= 0 AND cvss_score <= 10)),
        automated INTEGER CHECK(automated IS NULL OR automated IN (0, 1)),
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_test_cases_platform
        ON test_cases(platform);
    `,
  },
  {
    version: 2,
    description: 'Create unique index on vuln_id',
    up: `
      CREATE UNIQUE INDEX IF NOT EXISTS uniq_vuln_id
        ON test_cases(vuln_id);
    `,
  },
];

// ============================================
// Database Manager
// ============================================

export class DatabaseManager {
  private db: DatabaseType | null = null;
  private config: DatabaseConfig;

  constructor(config: Partial<DatabaseConfig> = {}) {
    this.config = {
      path: './data/test_cases.db',
      walMode: true,
      busyTimeout: 5000,
      ...config,
    };
  }

  /**
   * Open the connection and run pending migrations. Safe to call twice.
   */
  initialize(): void {
    if (this.db) {
      return;
    }

    const inMemory = this.config.path === ':memory:';
    if (!inMemory) {
      const dbDir = dirname(this.config.path);
      if (dbDir && !existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(this.config.path);

    if (this.config.walMode && !inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    if (this.config.busyTimeout) {
      this.db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
    }
    this.db.pragma('synchronous = NORMAL');

    this.runMigrations();
  }

  /**
   * Get the database connection
   */
  getDb(): DatabaseType {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Execute a function within a transaction; a throw rolls everything back
   */
  transaction<T>(fn: () => T): T {
    return this.getDb().transaction(fn)();
  }

  /**
   * Round-trip a trivial query; throws when the store is unreachable
   */
  ping(): void {
    this.getDb().prepare('SELECT 1').get();
  }

  private runMigrations(): void {
    const db = this.getDb();

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        applied_at INTEGER NOT NULL,
        description TEXT NOT NULL
      );
    `);

    const current = db.prepare<[], { version: number }>(
      'SELECT COALESCE(MAX(version), 0) as version FROM schema_migrations'
    ).get();
    const currentVersion = current?.version ?? 0;

    for (const migration of MIGRATIONS) {
      if (migration.version <= currentVersion) {
        continue;
      }

      db.transaction(() => {
        db.exec(migration.up);
        db.prepare(
          'INSERT INTO schema_migrations (version, applied_at, description) VALUES (?, ?, ?)'
        ).run(migration.version, Date.now(), migration.description);
      })();

      logger.info('db.migration', { version: migration.version, description: migration.description });
    }
  }

  /**
   * Get applied migrations
   */
  getMigrations(): MigrationInfo[] {
    return this.getDb().prepare<[], MigrationInfo>(
      'SELECT version, applied_at as appliedAt, description FROM schema_migrations ORDER BY version'
    ).all();
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (!this.db) {
      return;
    }

    if (this.config.walMode && this.config.path !== ':memory:') {
      this.db.pragma('wal_checkpoint(TRUNCATE)');
    }
    this.db.close();
    this.db = null;
  }

  isInitialized(): boolean {
    return this.db !== null;
  }

  getPath(): string {
    return this.config.path;
  }
}
