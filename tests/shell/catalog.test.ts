// tests/shell/catalog.test.ts

import { describe, it, expect, beforeAll } from 'vitest'
import { SqliteCatalog } from '../../shell/lib/catalog'
import { openDatabase } from '../../shell/lib/db'
import { CatalogUnavailableError, PlanError } from '../../shell/lib/errors'
import { complete, parseSql, resolveQueryNames, statements } from '../../src/lib/sql/autocomplete'
import { ensureModuleLoaded } from '../../src/lib/sql/core'

describe('SqliteCatalog', () => {
  beforeAll(async () => {
    await ensureModuleLoaded()
  })

  it('lists tables sorted by name', () => {
    const db = openDatabase(':memory:')
    db.exec('CREATE TABLE users (id); CREATE TABLE accounts (id); CREATE VIEW v AS SELECT 1')
    expect(new SqliteCatalog(db).listTables()).toEqual(['accounts', 'users'])
  })

  it('reads the schema on every call', () => {
    const db = openDatabase(':memory:')
    const catalog = new SqliteCatalog(db)
    expect(catalog.listTables()).toEqual([])
    db.exec('CREATE TABLE later (id)')
    expect(catalog.listTables()).toEqual(['later'])
  })

  it('plans output columns', () => {
    const catalog = new SqliteCatalog(openDatabase(':memory:'))
    expect(catalog.planColumns('SELECT 1 AS x, 2 AS y')).toEqual(['x', 'y'])
  })

  it('never executes planned fragments', () => {
    const db = openDatabase(':memory:')
    db.exec('CREATE TABLE t (a); INSERT INTO t VALUES (1)')
    expect(() => new SqliteCatalog(db).planColumns('DELETE FROM t RETURNING a')).not.toThrow()
    expect(db.prepare('SELECT count(*) FROM t').pluck().get()).toBe(1)
  })

  it('wraps planning failures', () => {
    const catalog = new SqliteCatalog(openDatabase(':memory:'))
    expect(() => catalog.planColumns('SELECT nope')).toThrow(PlanError)
    expect(() => catalog.planColumns('SELECT nope')).toThrow('no such column: nope')
  })

  it('fails once the connection is closed', () => {
    const db = openDatabase(':memory:')
    const catalog = new SqliteCatalog(db)
    db.close()
    expect(() => catalog.listTables()).toThrow(CatalogUnavailableError)
  })

  describe('with the completion engine', () => {
    it('resolves CTE columns through earlier CTEs', () => {
      const catalog = new SqliteCatalog(openDatabase(':memory:'))
      const sql = 'WITH a AS (SELECT 1 AS x), b AS (SELECT x, x + 1 AS y FROM a) SELECT * FROM '
      const result = parseSql(sql)
      if (!result.tree) throw new Error(`parse failed: ${result.error}`)

      const names = resolveQueryNames(statements(result.tree)[0], sql, catalog)
      expect(Object.fromEntries(names.ctes)).toEqual({ a: ['x'], b: ['x', 'y'] })
      expect(complete(sql, sql.length, catalog).map((c) => c.text)).toEqual(['a ', 'b '])
    })

    it('degrades to no candidates when the connection is closed', () => {
      const db = openDatabase(':memory:')
      const catalog = new SqliteCatalog(db)
      db.close()
      const errors: unknown[] = []
      expect(complete('SELECT * FROM ', 14, catalog, { onError: (e) => errors.push(e) })).toEqual([])
      expect(errors[0]).toBeInstanceOf(CatalogUnavailableError)
    })
  })
})
