/**
 * @fileoverview Database wrapper for SQLite with WAL mode and transaction support.
 * Holds the deposit ledger: deposits, conversions and deposit routes.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

/**
 * Database wrapper class that manages the SQLite connection and provides
 * transactions and prepared statements to the repositories.
 */
export class DB {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const finalPath = dbPath || process.env.DB_PATH || './data/convgate.db';

    if (finalPath !== IN_MEMORY) {
      // Ensure directory exists
      const dir = path.dirname(finalPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(finalPath);

    // Enable WAL mode and set pragmas
    if (finalPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.pragma('foreign_keys = ON');
  }

  /**
   * Executes a function within a database transaction.
   * Automatically rolls back on error.
   * @param fn - Function to execute within transaction
   * @returns Result of the function
   */
  runInTransaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Prepares a SQL statement for repeated execution.
   * @param sql - SQL statement to prepare
   * @returns Prepared statement whose get/all return `Row`
   */
  prepare<Row = unknown>(sql: string): Database.Statement<unknown[], Row> {
    return this.db.prepare<unknown[], Row>(sql);
  }

  /**
   * Executes a SQL string directly (for DDL operations).
   * @param sql - SQL to execute
   */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Closes the database connection.
   */
  close(): void {
    this.db.close();
  }
}
