import type Database from 'better-sqlite3'
import type { Catalog } from '@/lib/sql'
import { CatalogUnavailableError, PlanError } from './errors'

const LIST_TABLES_SQL = "SELECT name FROM sqlite_schema WHERE type = 'table' ORDER BY name ASC"

/**
 * Live schema view over a better-sqlite3 connection. Nothing is cached:
 * every call reads the current schema. Fragments handed to `planColumns`
 * are prepared, never run.
 */
export class SqliteCatalog implements Catalog {
  constructor(private readonly db: Database.Database) {}

  listTables(): string[] {
    this.ensureOpen()
    const names = this.db.prepare(LIST_TABLES_SQL).pluck().all()
    return names.filter((name): name is string => typeof name === 'string')
  }

  planColumns(sql: string): string[] {
    this.ensureOpen()
    try {
      return this.db.prepare(sql).columns().map((column) => column.name)
    } catch (err) {
      throw new PlanError(err instanceof Error ? err.message : String(err), { cause: err })
    }
  }

  private ensureOpen(): void {
    if (!this.db.open) {
      throw new CatalogUnavailableError()
    }
  }
}
