/**
 * @fileoverview Database migration runner for SQLite schema management.
 * Applies schema.sql, which only uses IF NOT EXISTS, so running it on every
 * start is safe.
 */

import fs from 'fs';
import path from 'path';
import { DB } from './database';

/**
 * Runs database migrations to initialize or update the database schema.
 * @param db - Database connection to apply migrations to
 */
export function runMigrations(db: DB): void {
  // Read schema - handle both compiled and source paths
  let schemaPath = path.join(__dirname, 'schema.sql');
  if (!fs.existsSync(schemaPath)) {
    // Try source path when running from dist
    schemaPath = path.join(__dirname, 'schema.sql').replace(`${path.sep}dist${path.sep}`, `${path.sep}`);
  }

  if (!fs.existsSync(schemaPath)) {
    console.error(`[Migrate] Schema file not found! Tried: ${schemaPath}`);
    throw new Error('Database schema not found');
  }

  const schema = fs.readFileSync(schemaPath, 'utf-8');

  try {
    db.exec(schema);
  } catch (error) {
    console.error('[Migrate] Failed to run migrations:', error);
    throw error;
  }
}

// If run directly
if (require.main === module) {
  const db = new DB();
  try {
    runMigrations(db);
    console.log('[Migrate] Database migrations completed successfully');
  } finally {
    db.close();
  }
}
