/**
 * Storage: SQLite database, migrations.
 */

export { openDatabase } from './database.js'
export { runMigrations, currentSchemaVersion } from './migrations.js'
