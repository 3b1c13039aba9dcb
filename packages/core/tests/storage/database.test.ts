import { describe, it, expect } from 'vitest'
import { openDatabase, runMigrations, currentSchemaVersion } from '../../src/storage/index.js'

describe('openDatabase', () => {
  it('creates all expected tables', () => {
    const db = openDatabase(':memory:')

    const tableNames = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()
      .map((t) => t.name)

    expect(tableNames).toContain('documents')
    expect(tableNames).toContain('anchors')
    expect(tableNames).toContain('anchor_components')
    expect(tableNames).toContain('document_anchor_links')
    expect(tableNames).toContain('threshold_statistics')
    expect(tableNames).toContain('statistics_refreshes')
    expect(tableNames).toContain('pipeline_runs')
    expect(tableNames).toContain('schema_version')

    db.close()
  })

  it('enables WAL mode (on file-based DBs; in-memory falls back to "memory")', () => {
    const db = openDatabase(':memory:')
    // In-memory DBs cannot use WAL and report "memory".
    expect(db.pragma('journal_mode', { simple: true })).toBe('memory')
    db.close()
  })

  it('enables foreign keys', () => {
    const db = openDatabase(':memory:')
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1)
    db.close()
  })

  it('records schema version and does not reapply migrations', () => {
    const db = openDatabase(':memory:')
    expect(currentSchemaVersion(db)).toBe(3)

    runMigrations(db)
    const rows = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM schema_version').get()
    expect(rows?.count).toBe(3)
    db.close()
  })

  it('rejects a document matched before it was indexed', () => {
    const db = openDatabase(':memory:')
    const insert = db.prepare(
      `INSERT INTO documents (id, source_name, category, ingested_at, matched_at)
       VALUES ('d1', 'src', 'Think Tank', '2026-03-01T00:00:00.000Z', '2026-03-01T00:00:00.000Z')`,
    )
    expect(() => insert.run()).toThrow(/CHECK constraint failed/)
    db.close()
  })

  it('rejects a second link for the same document and anchor', () => {
    const db = openDatabase(':memory:')
    const now = '2026-03-01T00:00:00.000Z'
    db.prepare("INSERT INTO documents (id, source_name, category, ingested_at) VALUES ('d1', 'src', 'Think Tank', ?)").run(now)
    db.prepare("INSERT INTO anchors (id, name, created_at, updated_at) VALUES ('a1', 'A', ?, ?)").run(now, now)
    const link = db.prepare(
      "INSERT INTO document_anchor_links (id, document_id, anchor_id, similarity_score, created_at) VALUES (?, 'd1', 'a1', 0.5, ?)",
    )
    link.run('l1', now)
    expect(() => link.run('l2', now)).toThrow(/UNIQUE constraint failed/)
    db.close()
  })
})
