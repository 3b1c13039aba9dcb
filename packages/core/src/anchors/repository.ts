import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, EngineError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { ComponentTypeSchema } from '../vectors/store.js'
import { CreateAnchorInputSchema, ComponentInputSchema } from './schemas.js'
import type { Anchor, AnchorComponent, CreateAnchorInput, ComponentInput } from './schemas.js'

interface AnchorRow {
  id: string
  name: string
  description: string
  author: string
  is_active: number
  created_at: string
  updated_at: string
}

interface ComponentRow {
  id: string
  anchor_id: string
  component_type: string
  component_id: string
  created_at: string
}

const ANCHOR_COLUMNS = 'id, name, description, author, is_active, created_at, updated_at'

// Stable ordering keeps composite vectors reproducible.
const COMPONENT_ORDER = 'ORDER BY component_type, component_id'

function rowToComponent(row: ComponentRow): AnchorComponent {
  const type = ComponentTypeSchema.safeParse(row.component_type)
  if (!type.success) {
    // The CHECK constraint makes this unreachable for rows written by this package.
    throw EngineError.validation(`Unknown component type on ${row.id}: ${row.component_type}`)
  }
  return {
    id: row.id,
    anchorId: row.anchor_id,
    type: type.data,
    componentId: row.component_id,
    createdAt: row.created_at,
  }
}

function rowToAnchor(row: AnchorRow, components: AnchorComponent[]): Anchor {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    author: row.author,
    isActive: row.is_active === 1,
    components,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function wrap(e: unknown): EngineError {
  return e instanceof EngineError ? e : EngineError.db(errorMessage(e))
}

export class AnchorRepository {
  constructor(private db: Database.Database) {}

  create(input: CreateAnchorInput): Result<Anchor, EngineError> {
    const parsed = CreateAnchorInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(EngineError.validation(parsed.error.message))
    }

    const existing = this.getByName(parsed.data.name)
    if (existing.ok) {
      return Err(EngineError.validation(`Anchor already exists: ${parsed.data.name}`))
    }
    if (existing.error.code !== 'NOT_FOUND') return existing

    const id = uuidv4()
    const now = new Date().toISOString()

    try {
      this.db.transaction(() => {
        this.db
          .prepare(`INSERT INTO anchors (${ANCHOR_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`)
          .run(id, parsed.data.name, parsed.data.description, parsed.data.author, parsed.data.isActive ? 1 : 0, now, now)

        const insert = this.db.prepare(
          `INSERT INTO anchor_components (id, anchor_id, component_type, component_id, created_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(anchor_id, component_type, component_id) DO NOTHING`,
        )
        for (const component of parsed.data.components) {
          insert.run(uuidv4(), id, component.type, component.componentId, now)
        }
      })()
    } catch (e) {
      return Err(wrap(e))
    }

    return this.getById(id)
  }

  getById(id: string): Result<Anchor, EngineError> {
    try {
      const row = this.db
        .prepare<[string], AnchorRow>(`SELECT ${ANCHOR_COLUMNS} FROM anchors WHERE id = ?`)
        .get(id)
      if (!row) return Err(EngineError.notFound('Anchor', id))
      return Ok(rowToAnchor(row, this.componentsOf(row.id)))
    } catch (e) {
      return Err(wrap(e))
    }
  }

  getByName(name: string): Result<Anchor, EngineError> {
    try {
      const row = this.db
        .prepare<[string], AnchorRow>(`SELECT ${ANCHOR_COLUMNS} FROM anchors WHERE name = ?`)
        .get(name.trim())
      if (!row) return Err(EngineError.notFound('Anchor', name))
      return Ok(rowToAnchor(row, this.componentsOf(row.id)))
    } catch (e) {
      return Err(wrap(e))
    }
  }

  /** Active anchors with their components, ordered by name. */
  listActive(): Result<Anchor[], EngineError> {
    return this.list(true)
  }

  listAll(): Result<Anchor[], EngineError> {
    return this.list(false)
  }

  addComponent(anchorId: string, input: ComponentInput): Result<Anchor, EngineError> {
    const parsed = ComponentInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(EngineError.validation(parsed.error.message))
    }

    try {
      const now = new Date().toISOString()
      const exists = this.db.prepare<[string], { id: string }>('SELECT id FROM anchors WHERE id = ?').get(anchorId)
      if (!exists) return Err(EngineError.notFound('Anchor', anchorId))

      this.db.transaction(() => {
        this.db
          .prepare(
            `INSERT INTO anchor_components (id, anchor_id, component_type, component_id, created_at)
             VALUES (?, ?, ?, ?, ?)
             ON CONFLICT(anchor_id, component_type, component_id) DO NOTHING`,
          )
          .run(uuidv4(), anchorId, parsed.data.type, parsed.data.componentId, now)
        this.touch(anchorId, now)
      })()
    } catch (e) {
      return Err(wrap(e))
    }

    return this.getById(anchorId)
  }

  removeComponent(anchorId: string, input: ComponentInput): Result<Anchor, EngineError> {
    try {
      const info = this.db
        .prepare('DELETE FROM anchor_components WHERE anchor_id = ? AND component_type = ? AND component_id = ?')
        .run(anchorId, input.type, input.componentId)
      if (info.changes === 0) {
        return Err(EngineError.notFound('Anchor component', `${anchorId}/${input.type}:${input.componentId}`))
      }
      this.touch(anchorId, new Date().toISOString())
    } catch (e) {
      return Err(wrap(e))
    }

    return this.getById(anchorId)
  }

  setActive(anchorId: string, isActive: boolean): Result<Anchor, EngineError> {
    try {
      const info = this.db
        .prepare('UPDATE anchors SET is_active = ?, updated_at = ? WHERE id = ?')
        .run(isActive ? 1 : 0, new Date().toISOString(), anchorId)
      if (info.changes === 0) return Err(EngineError.notFound('Anchor', anchorId))
    } catch (e) {
      return Err(wrap(e))
    }

    return this.getById(anchorId)
  }

  /** Soft reset: deactivates every active anchor. Returns the number changed. */
  deactivateAll(): Result<number, EngineError> {
    try {
      const info = this.db
        .prepare('UPDATE anchors SET is_active = 0, updated_at = ? WHERE is_active = 1')
        .run(new Date().toISOString())
      return Ok(info.changes)
    } catch (e) {
      return Err(wrap(e))
    }
  }

  private list(activeOnly: boolean): Result<Anchor[], EngineError> {
    try {
      const rows = this.db
        .prepare<[], AnchorRow>(
          `SELECT ${ANCHOR_COLUMNS} FROM anchors ${activeOnly ? 'WHERE is_active = 1' : ''} ORDER BY name`,
        )
        .all()
      if (rows.length === 0) return Ok([])

      const componentRows = this.db
        .prepare<[], ComponentRow>(
          `SELECT id, anchor_id, component_type, component_id, created_at FROM anchor_components ${COMPONENT_ORDER}`,
        )
        .all()
      const byAnchor = new Map<string, AnchorComponent[]>()
      for (const row of componentRows) {
        const list = byAnchor.get(row.anchor_id) ?? []
        list.push(rowToComponent(row))
        byAnchor.set(row.anchor_id, list)
      }

      return Ok(rows.map((row) => rowToAnchor(row, byAnchor.get(row.id) ?? [])))
    } catch (e) {
      return Err(wrap(e))
    }
  }

  private componentsOf(anchorId: string): AnchorComponent[] {
    return this.db
      .prepare<[string], ComponentRow>(
        `SELECT id, anchor_id, component_type, component_id, created_at FROM anchor_components WHERE anchor_id = ? ${COMPONENT_ORDER}`,
      )
      .all(anchorId)
      .map(rowToComponent)
  }

  private touch(anchorId: string, now: string): void {
    this.db.prepare('UPDATE anchors SET updated_at = ? WHERE id = ?').run(now, anchorId)
  }
}
