import { describe, it, expect, beforeEach } from 'vitest'
import type Database from 'better-sqlite3'
import { unwrap } from '../../src/common/index.js'
import { openDatabase } from '../../src/storage/index.js'
import { AnchorRepository } from '../../src/anchors/index.js'
import type { Anchor } from '../../src/anchors/index.js'
import { LinkRepository } from '../../src/links/index.js'
import { HighlightRepository } from '../../src/highlights/index.js'
import { docId, seedDocument } from '../fixtures.js'

const WINDOW = { since: '2026-02-15T00:00:00.000Z', until: '2026-02-28T23:59:59.999Z' }

let db: Database.Database
let links: LinkRepository
let highlights: HighlightRepository
let a: Anchor
let b: Anchor

function resolveLink(n: number, anchor: Anchor, anchorHighlight: boolean): void {
  const link = unwrap(links.get(docId(n), anchor.id))
  unwrap(links.resolve([{ linkId: link.id, anchorHighlight, threshold: 0.2 }], '2026-03-01T00:00:00.000Z'))
}

beforeEach(() => {
  db = openDatabase(':memory:')
  links = new LinkRepository(db)
  highlights = new HighlightRepository(db)
  const anchors = new AnchorRepository(db)
  a = unwrap(anchors.create({ name: 'Alpha' }))
  b = unwrap(anchors.create({ name: 'Beta' }))

  seedDocument(db, { n: 1, category: 'Think Tank', ingestedAt: '2026-02-20T00:00:00.000Z', through: 'match' })
  seedDocument(db, { n: 2, category: 'News & Media', ingestedAt: '2026-02-21T00:00:00.000Z', through: 'match' })
  seedDocument(db, { n: 3, category: 'Think Tank', ingestedAt: '2026-01-10T00:00:00.000Z', through: 'match' })
  seedDocument(db, { n: 4, category: 'Government', ingestedAt: '2026-02-22T00:00:00.000Z', through: 'match' })

  const now = '2026-03-01T00:00:00.000Z'
  links.upsertMany(
    [
      { documentId: docId(1), anchorId: a.id, similarityScore: 0.8 },
      { documentId: docId(1), anchorId: b.id, similarityScore: 0.1 },
      { documentId: docId(2), anchorId: a.id, similarityScore: 0.5 },
      { documentId: docId(3), anchorId: a.id, similarityScore: 0.9 },
      { documentId: docId(4), anchorId: a.id, similarityScore: 0.7 },
    ],
    now,
  )
  resolveLink(1, a, true)
  resolveLink(1, b, false)
  resolveLink(2, a, false)
  resolveLink(3, a, true)
  // Document 4's link stays unresolved.
})

describe('HighlightRepository.listResolved', () => {
  it('returns resolved links ingested inside the window, best score first', () => {
    const views = unwrap(highlights.listResolved(WINDOW))
    expect(views.map((v) => [v.document.id, v.anchor.name, v.similarityScore])).toEqual([
      [docId(1), 'Alpha', 0.8],
      [docId(2), 'Alpha', 0.5],
      [docId(1), 'Beta', 0.1],
    ])
  })

  it('joins document identity, category and tier', () => {
    const [top, second] = unwrap(highlights.listResolved(WINDOW))
    expect(top.document.title).toBe('Document 1')
    expect(top.document.sourceName).toBe('source-1')
    expect(top.document.tier).toBe(1)
    expect(top.anchorHighlight).toBe(true)
    expect(top.orgHighlight).toBe(true)
    expect(top.threshold).toBe(0.2)
    expect(second.document.category).toBe('News & Media')
    expect(second.document.tier).toBe(3)
  })

  it('keeps anchor highlights and links of org-highlighted documents when asked', () => {
    const views = unwrap(highlights.listResolved({ ...WINDOW, highlightedOnly: true }))
    expect(views.map((v) => [v.document.id, v.anchor.name])).toEqual([
      [docId(1), 'Alpha'],
      [docId(1), 'Beta'],
    ])
  })

  it('rejects a window that ends before it starts', () => {
    const result = highlights.listResolved({ since: WINDOW.until, until: WINDOW.since })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('VALIDATION_ERROR')
  })

  it('rejects timestamps that are not ISO-8601', () => {
    expect(highlights.listResolved({ since: 'last week', until: WINDOW.until }).ok).toBe(false)
  })
})

describe('HighlightRepository.summarize', () => {
  it('counts resolved links, anchor highlights and org-highlighted documents', () => {
    expect(highlights.summarize(WINDOW)).toEqual({
      ok: true,
      value: { resolvedLinks: 3, anchorHighlights: 1, orgHighlightedDocuments: 1 },
    })
  })
})
