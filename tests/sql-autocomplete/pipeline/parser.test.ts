// tests/sql-autocomplete/pipeline/parser.test.ts

import { describe, it, expect, beforeAll } from 'vitest'
import { parseSql } from '../../../src/lib/sql/autocomplete/parser'
import { ensureModuleLoaded } from '../../../src/lib/sql/core'
import type { SyntaxNode, SyntaxTree } from '../../../src/lib/sql/autocomplete/types'
import type { Scanner } from '../../../src/lib/sql/autocomplete/tokenizer'

// ============================================================================
// TEST HELPERS
// ============================================================================

function parse(sql: string): SyntaxTree {
  const result = parseSql(sql)
  if (!result.tree) throw new Error(`parse failed: ${result.error}`)
  return result.tree
}

function childTypes(node: SyntaxNode): string[] {
  return node.children.map((c) => c.type)
}

function find(node: SyntaxNode, type: string): SyntaxNode[] {
  const found: SyntaxNode[] = node.type === type ? [node] : []
  for (const child of node.children) found.push(...find(child, type))
  return found
}

// Body node of the first top-level statement
function firstBody(tree: SyntaxTree): SyntaxNode {
  const [statement] = tree.root.children
  expect(statement.type).toBe('statement')
  return statement.children[0]
}

// ============================================================================
// TESTS
// ============================================================================

describe('parser', () => {
  beforeAll(async () => {
    await ensureModuleLoaded()
  })

  describe('statement list', () => {
    it('spans the whole source', () => {
      const tree = parse('SELECT 1 ')
      expect(tree.root.type).toBe('statement_list')
      expect([tree.root.start, tree.root.end]).toEqual([0, 9])
    })

    it('splits statements on semicolons', () => {
      const tree = parse('SELECT 1; SELECT 2')
      expect(childTypes(tree.root)).toEqual(['statement', 'statement'])
      expect(tree.root.children.map((c) => c.text)).toEqual(['SELECT 1', 'SELECT 2'])
    })

    it('keeps semicolons inside a trigger body', () => {
      const tree = parse('CREATE TRIGGER tr AFTER INSERT ON t BEGIN SELECT 1; SELECT 2; END; SELECT 3')
      expect(tree.root.children.map((c) => c.text)).toEqual([
        'CREATE TRIGGER tr AFTER INSERT ON t BEGIN SELECT 1; SELECT 2; END',
        'SELECT 3',
      ])
    })

    it('turns an unknown first word into an error leaf', () => {
      const tree = parse('SEL')
      const [error] = tree.root.children
      expect(error.type).toBe('error')
      expect(error.text).toBe('SEL')
      expect(error.isError).toBe(true)
      expect(error.children).toEqual([])
      expect(tree.hasErrors).toBe(true)
      expect(tree.errors).toEqual([error])
    })

    it('sets parent references', () => {
      const tree = parse('SELECT 1')
      const body = firstBody(tree)
      expect(body.parent?.type).toBe('statement')
      expect(body.parent?.parent).toBe(tree.root)
    })

    it('excludes comments from the tree', () => {
      const tree = parse('-- head\nSELECT 1')
      expect(tree.root.children[0].text).toBe('SELECT 1')
    })
  })

  describe('select statements', () => {
    it('splits clauses', () => {
      const body = firstBody(parse('SELECT a FROM t WHERE a > 1 GROUP BY a ORDER BY a LIMIT 5'))
      expect(body.type).toBe('select_statement')
      expect(childTypes(body)).toEqual([
        'select_clause',
        'from_clause',
        'where_clause',
        'group_by_clause',
        'order_by_clause',
        'limit_clause',
      ])
    })

    it('does not split on IS DISTINCT FROM', () => {
      const body = firstBody(parse('SELECT a IS DISTINCT FROM b FROM t'))
      expect(find(body, 'from_clause')).toHaveLength(1)
    })

    it('parses compound selects', () => {
      const body = firstBody(parse('SELECT 1 UNION ALL SELECT 2'))
      expect(childTypes(body)).toEqual(['select_clause', 'compound_operator', 'select_clause'])
      expect(body.children[1].text).toBe('UNION ALL')
    })

    it('parses a table reference', () => {
      const [ref] = find(parse('SELECT * FROM users'), 'table_reference')
      expect(childTypes(ref)).toEqual(['identifier'])
      expect(ref.children[0].text).toBe('users')
    })

    it('parses explicit and implicit aliases', () => {
      const refs = find(parse('SELECT * FROM users AS u JOIN orders o ON u.id = o.user_id'), 'table_reference')
      expect(refs.map(childTypes)).toEqual([
        ['identifier', 'keyword', 'alias'],
        ['identifier', 'alias'],
      ])
      expect(refs.map((r) => r.children[r.children.length - 1].text)).toEqual(['u', 'o'])
    })

    it('parses join operators and constraints', () => {
      const [from] = find(parse('SELECT * FROM a LEFT OUTER JOIN b USING (id)'), 'from_clause')
      expect(childTypes(from)).toEqual(['keyword', 'table_reference', 'join_operator', 'table_reference', 'join_constraint'])
      expect(from.children[2].text).toBe('LEFT OUTER JOIN')
    })

    it('parses schema-qualified names', () => {
      const [ref] = find(parse('SELECT * FROM main.users'), 'table_reference')
      expect(childTypes(ref)).toEqual(['schema_name', 'punctuation', 'identifier'])
    })

    it('parses subqueries in FROM', () => {
      const [ref] = find(parse('SELECT * FROM (SELECT 1) AS s'), 'table_reference')
      expect(childTypes(ref)).toEqual(['subquery', 'keyword', 'alias'])
      expect(childTypes(ref.children[0])).toEqual(['punctuation', 'select_statement', 'punctuation'])
    })

    it('parses table-valued function arguments', () => {
      const [ref] = find(parse("SELECT * FROM json_each('[]') j"), 'table_reference')
      expect(childTypes(ref)).toEqual(['identifier', 'arguments', 'alias'])
    })
  })

  describe('missing table names', () => {
    it('inserts a missing identifier at the end of input', () => {
      const [ref] = find(parse('SELECT * FROM '), 'table_reference')
      const [name] = ref.children
      expect(name.type).toBe('identifier')
      expect(name.isMissing).toBe(true)
      expect([name.start, name.end]).toEqual([14, 14])
      expect(name.text).toBe('')
    })

    it('places the missing identifier at the start of the next clause', () => {
      const [ref] = find(parse('SELECT * FROM WHERE x'), 'table_reference')
      expect(ref.children[0].isMissing).toBe(true)
      expect(ref.children[0].start).toBe(14)
    })

    it('places the missing identifier at the statement terminator', () => {
      const [ref] = find(parse('SELECT * FROM ; SELECT 1'), 'table_reference')
      expect(ref.children[0].isMissing).toBe(true)
      expect(ref.children[0].start).toBe(14)
    })

    it('inserts a missing name after a schema qualifier', () => {
      const [ref] = find(parse('SELECT * FROM main.'), 'table_reference')
      expect(childTypes(ref)).toEqual(['schema_name', 'punctuation', 'identifier'])
      expect(ref.children[2].isMissing).toBe(true)
      expect(ref.children[2].start).toBe(19)
    })

    it('inserts a missing table after a trailing comma', () => {
      const refs = find(parse('SELECT * FROM a, '), 'table_reference')
      expect(refs).toHaveLength(2)
      expect(refs[1].children[0].isMissing).toBe(true)
    })
  })

  describe('common table expressions', () => {
    it('prepends the WITH clause to the main statement', () => {
      const body = firstBody(parse('WITH a AS (SELECT 1) SELECT * FROM a'))
      expect(body.type).toBe('select_statement')
      expect(childTypes(body)).toEqual(['with_clause', 'select_clause', 'from_clause'])
    })

    it('parses CTE parts', () => {
      const [cte] = find(parse('WITH a(x) AS MATERIALIZED (SELECT 1) SELECT * FROM a'), 'common_table_expression')
      expect(childTypes(cte)).toEqual(['identifier', 'column_list', 'keyword', 'keyword', 'subquery'])
      expect(cte.text).toBe('a(x) AS MATERIALIZED (SELECT 1)')
    })

    it('parses several CTEs in order', () => {
      const ctes = find(parse('WITH RECURSIVE a AS (SELECT 1), b AS (SELECT 2) SELECT 3'), 'common_table_expression')
      expect(ctes.map((c) => c.children[0].text)).toEqual(['a', 'b'])
    })

    it('keeps an unclosed CTE body', () => {
      const [cte] = find(parse('WITH a AS (SELECT * FROM '), 'common_table_expression')
      const [ref] = find(cte, 'table_reference')
      expect(ref.children[0].isMissing).toBe(true)
      expect(ref.children[0].start).toBe(25)
    })
  })

  describe('other statements', () => {
    const cases: { sql: string; type: string }[] = [
      { sql: 'INSERT INTO t VALUES (1)', type: 'insert_statement' },
      { sql: 'REPLACE INTO t VALUES (1)', type: 'insert_statement' },
      { sql: 'UPDATE t SET a = 1', type: 'update_statement' },
      { sql: 'DELETE FROM t WHERE a = 1', type: 'delete_statement' },
      { sql: 'CREATE TABLE t (a INTEGER)', type: 'create_statement' },
      { sql: 'DROP TABLE IF EXISTS t', type: 'drop_statement' },
      { sql: 'ALTER TABLE t RENAME TO u', type: 'alter_statement' },
      { sql: 'EXPLAIN QUERY PLAN SELECT 1', type: 'explain_statement' },
      { sql: 'PRAGMA table_info(t)', type: 'pragma_statement' },
      { sql: "ATTACH 'x.db' AS x", type: 'attach_statement' },
      { sql: 'DETACH x', type: 'detach_statement' },
      { sql: 'BEGIN', type: 'transaction_statement' },
      { sql: 'VACUUM', type: 'other_statement' },
    ]

    for (const tc of cases) {
      it(`parses ${tc.sql}`, () => {
        expect(firstBody(parse(tc.sql)).type).toBe(tc.type)
      })
    }

    it('parses table references in DML', () => {
      for (const sql of ['INSERT INTO t VALUES (1)', 'UPDATE t SET a = 1', 'DELETE FROM t', 'DROP TABLE t']) {
        const [ref] = find(parse(sql), 'table_reference')
        expect(ref.children[0].text).toBe('t')
      }
    })

    it('nests the query of INSERT ... SELECT', () => {
      const body = firstBody(parse('INSERT INTO t SELECT * FROM u'))
      expect(find(body, 'select_statement')).toHaveLength(1)
      expect(find(body, 'table_reference').map((r) => r.text)).toEqual(['t', 'u'])
    })

    it('nests the query of CREATE VIEW ... AS SELECT', () => {
      const body = firstBody(parse('CREATE VIEW v AS SELECT * FROM u'))
      expect(body.children[body.children.length - 1].type).toBe('select_statement')
    })

    it('nests the statement under EXPLAIN', () => {
      const body = firstBody(parse('EXPLAIN SELECT * FROM u'))
      expect(childTypes(body)).toEqual(['keyword', 'select_statement'])
    })
  })

  describe('failures', () => {
    it('returns the scan error', () => {
      const scanner: Scanner = { scanSync: () => ({ tokens: [] }), isLoaded: () => false }
      expect(parseSql('SELECT 1', { scanner })).toEqual({ error: 'SQL scanner module is not loaded' })
    })
  })
})
