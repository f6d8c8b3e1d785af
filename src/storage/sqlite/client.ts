/**
 * SQLite Client Wrapper
 *
 * Wraps better-sqlite3 with WAL mode, foreign keys and a busy timeout.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';

/**
 * SQLite client configuration
 */
export interface SQLiteClientConfig {
  /** Path to the database file, or ':memory:' */
  dbPath: string;
  /** Enable WAL mode (default: true) */
  walMode?: boolean;
  /** Enable foreign keys (default: true) */
  foreignKeys?: boolean;
  /** Milliseconds to wait on a locked database (default: 5000) */
  busyTimeoutMs?: number;
  /** Open without write access; the file must exist */
  readOnly?: boolean;
}

/**
 * SQLite client wrapper
 */
export class SQLiteClient {
  private db: DatabaseType;
  private readonly config: Required<SQLiteClientConfig>;

  constructor(config: SQLiteClientConfig) {
    this.config = {
      dbPath: config.dbPath,
      walMode: config.walMode ?? true,
      foreignKeys: config.foreignKeys ?? true,
      busyTimeoutMs: config.busyTimeoutMs ?? 5000,
      readOnly: config.readOnly ?? false,
    };

    this.db = new Database(this.config.dbPath, {
      readonly: this.config.readOnly,
      fileMustExist: this.config.readOnly,
      timeout: this.config.busyTimeoutMs,
    });

    // Configure pragmas
    if (this.config.walMode && !this.config.readOnly) {
      this.db.pragma('journal_mode = WAL');
    }
    if (this.config.foreignKeys) {
      this.db.pragma('foreign_keys = ON');
    }
  }

  /**
   * Get the underlying database instance
   */
  get database(): DatabaseType {
    return this.db;
  }

  /**
   * Execute raw SQL
   */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Run a transaction
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Read or write PRAGMA user_version
   */
  get userVersion(): number {
    const value: unknown = this.db.pragma('user_version', { simple: true });
    return typeof value === 'number' ? value : 0;
  }

  set userVersion(version: number) {
    this.db.pragma(`user_version = ${Math.trunc(version)}`);
  }

  get readOnly(): boolean {
    return this.config.readOnly;
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }

  /**
   * Check if the database is open
   */
  get isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Get database file path
   */
  get path(): string {
    return this.db.name;
  }
}
