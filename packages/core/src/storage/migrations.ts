/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

/**
 * Runs SQL statements using the better-sqlite3 Database.exec() method.
 * Note: This is NOT child_process.exec; it's SQLite's native exec for DDL.
 */
function runSQL(db: Database.Database, sql: string): void {
  db.exec(sql)
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Initial schema: documents, anchors, anchor_components, document_anchor_links',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS documents (
          id TEXT PRIMARY KEY,
          source_name TEXT NOT NULL,
          title TEXT NOT NULL DEFAULT '',
          url TEXT NOT NULL DEFAULT '',
          category TEXT NOT NULL,
          published_at TEXT,
          ingested_at TEXT NOT NULL,
          indexed_at TEXT,
          matched_at TEXT,
          enriched_at TEXT,
          org_highlight INTEGER,
          CHECK (indexed_at IS NULL OR ingested_at IS NOT NULL),
          CHECK (matched_at IS NULL OR indexed_at IS NOT NULL),
          CHECK (enriched_at IS NULL OR matched_at IS NOT NULL)
        );

        CREATE INDEX IF NOT EXISTS idx_documents_match_frontier
          ON documents(id) WHERE matched_at IS NULL AND indexed_at IS NOT NULL;
        CREATE INDEX IF NOT EXISTS idx_documents_ingested ON documents(ingested_at);

        CREATE TABLE IF NOT EXISTS anchors (
          id TEXT PRIMARY KEY,
          name TEXT NOT NULL UNIQUE,
          description TEXT NOT NULL DEFAULT '',
          author TEXT NOT NULL DEFAULT '',
          is_active INTEGER NOT NULL DEFAULT 1,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS anchor_components (
          id TEXT PRIMARY KEY,
          anchor_id TEXT NOT NULL,
          component_type TEXT NOT NULL CHECK (component_type IN ('tag', 'kb_item', 'hypothetical_document')),
          component_id TEXT NOT NULL,
          created_at TEXT NOT NULL,
          UNIQUE (anchor_id, component_type, component_id),
          FOREIGN KEY (anchor_id) REFERENCES anchors(id) ON DELETE CASCADE
        );

        CREATE TABLE IF NOT EXISTS document_anchor_links (
          id TEXT PRIMARY KEY,
          document_id TEXT NOT NULL,
          anchor_id TEXT NOT NULL,
          similarity_score REAL NOT NULL CHECK (similarity_score >= 0 AND similarity_score <= 1),
          created_at TEXT NOT NULL,
          anchor_highlight INTEGER,
          org_highlight INTEGER,
          threshold REAL,
          resolved_at TEXT,
          UNIQUE (document_id, anchor_id),
          FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE,
          FOREIGN KEY (anchor_id) REFERENCES anchors(id) ON DELETE CASCADE
        );

        CREATE INDEX IF NOT EXISTS idx_links_unresolved
          ON document_anchor_links(document_id) WHERE anchor_highlight IS NULL;
        CREATE INDEX IF NOT EXISTS idx_links_anchor_created
          ON document_anchor_links(anchor_id, created_at);

        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT NOT NULL
        );
      `,
      )
    },
  },
  {
    version: 2,
    description: 'Threshold statistics snapshot',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS threshold_statistics (
          anchor_id TEXT NOT NULL,
          tier INTEGER NOT NULL CHECK (tier IN (1, 2, 3)),
          mean REAL NOT NULL,
          stddev REAL NOT NULL,
          sample_count INTEGER NOT NULL,
          computed_at TEXT NOT NULL,
          PRIMARY KEY (anchor_id, tier),
          FOREIGN KEY (anchor_id) REFERENCES anchors(id) ON DELETE CASCADE
        );

        CREATE TABLE IF NOT EXISTS statistics_refreshes (
          id TEXT PRIMARY KEY,
          computed_at TEXT NOT NULL,
          window_start TEXT NOT NULL,
          window_end TEXT NOT NULL,
          sample_count INTEGER NOT NULL
        );
      `,
      )
    },
  },
  {
    version: 3,
    description: 'Pipeline run log',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS pipeline_runs (
          id TEXT PRIMARY KEY,
          started_at TEXT NOT NULL,
          ended_at TEXT,
          status TEXT NOT NULL DEFAULT 'running' CHECK (status IN ('running', 'success', 'failure')),
          documents_matched INTEGER NOT NULL DEFAULT 0,
          links_written INTEGER NOT NULL DEFAULT 0,
          links_resolved INTEGER NOT NULL DEFAULT 0,
          highlights_found INTEGER NOT NULL DEFAULT 0,
          error TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_pipeline_runs_started ON pipeline_runs(started_at);
      `,
      )
    },
  },
]

export function runMigrations(db: Database.Database): void {
  // Ensure schema_version table exists for checking current version
  runSQL(
    db,
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`,
  )

  const currentVersion = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get()

  const applied = currentVersion?.version ?? 0

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}

export function currentSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get()
  return row?.version ?? 0
}
