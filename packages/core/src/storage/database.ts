/**
 * SQLite database initialization with WAL mode and migrations.
 */

import Database from 'better-sqlite3'
import { runMigrations } from './migrations.js'

export function openDatabase(path: string): Database.Database {
  const db = new Database(path)

  // Performance + safety pragmas
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')

  runMigrations(db)

  return db
}
