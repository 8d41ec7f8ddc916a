/**
 * Scope Analyzer Module
 *
 * Resolves the names a statement introduces: CTEs (with their projected
 * columns) and table aliases.
 *
 * CTE columns come from the database engine itself. Each CTE body is planned
 * as a trial fragment prefixed with the CTEs declared before it, so a body
 * that selects from an earlier CTE resolves against it:
 *
 *   WITH a AS (SELECT 1 AS x), b AS (SELECT * FROM a) ...
 *
 *   a → plan("SELECT 1 AS x")                              → ['x']
 *   b → plan("WITH a AS (SELECT 1 AS x) SELECT * FROM a")  → ['x']
 */

import type { SyntaxNode, QueryNames, Catalog, NodePattern } from './types'
import { queryNodes } from './tree'

const CTE_PATTERN: NodePattern = {
  type: 'common_table_expression',
  capture: 'cte',
  children: [{ type: 'identifier', capture: 'name' }],
}

const ALIAS_PATTERN: NodePattern = {
  type: 'table_reference',
  capture: 'ref',
  children: [
    { type: 'identifier', capture: 'table' },
    { type: 'alias', capture: 'alias' },
  ],
}

export interface ScopeAnalyzerOptions {
  /** Receives plan failures, which otherwise degrade to an empty column list */
  onError?: (error: unknown) => void
}

/**
 * The query node inside a CTE's `(...)` body, if any.
 */
function cteBody(cte: SyntaxNode): SyntaxNode | null {
  const subquery = cte.children.find((child) => child.type === 'subquery' || child.type === 'parenthesized')
  if (!subquery) return null
  return subquery.children.find((child) => child.type.endsWith('_statement')) ?? null
}

function explicitColumns(cte: SyntaxNode): string[] | null {
  const list = cte.children.find((child) => child.type === 'column_list')
  if (!list) return null
  return list.children.filter((child) => child.type === 'identifier').map((child) => child.text)
}

function isRecursive(cte: SyntaxNode): boolean {
  return cte.parent?.children.some((child) => child.type === 'keyword' && child.text.toUpperCase() === 'RECURSIVE') ?? false
}

/**
 * Resolve CTE names with their columns, in declaration order.
 */
function resolveCTEs(
  statement: SyntaxNode,
  sql: string,
  catalog: Catalog,
  options?: ScopeAnalyzerOptions
): Map<string, string[]> {
  const ctes = new Map<string, string[]>()
  const previous: string[] = []

  for (const match of queryNodes(statement, CTE_PATTERN)) {
    const cte = match.captures.get('cte')
    const name = match.captures.get('name')
    if (!cte || !name) continue

    const body = cteBody(cte)
    const bodyText = body ? sql.slice(body.start, body.end).trim() : ''
    let columns: string[] = []

    const declared = explicitColumns(cte)
    if (declared) {
      columns = declared
    } else if (bodyText) {
      const fragment = previous.length > 0
        ? `WITH ${isRecursive(cte) ? 'RECURSIVE ' : ''}${previous.join(', ')} ${bodyText}`
        : bodyText
      try {
        columns = catalog.planColumns(fragment)
      } catch (err) {
        options?.onError?.(err)
        columns = []
      }
    }

    ctes.set(name.text, columns)
    previous.push(sql.slice(cte.start, cte.end))
  }

  return ctes
}

/**
 * Resolve `alias → table text` for every table reference that is a plain
 * (optionally schema-qualified) name followed by an alias.
 */
function resolveAliases(statement: SyntaxNode, sql: string): Map<string, string> {
  const aliases = new Map<string, string>()

  for (const match of queryNodes(statement, ALIAS_PATTERN)) {
    const ref = match.captures.get('ref')
    const table = match.captures.get('table')
    const alias = match.captures.get('alias')
    if (!ref || !table || !alias || table.isMissing) continue

    // The alias must directly follow the name (AS aside): skips table-valued functions
    const between = ref.children.slice(ref.children.indexOf(table) + 1, ref.children.indexOf(alias))
    if (between.some((child) => child.type !== 'keyword')) continue

    aliases.set(alias.text, sql.slice(ref.children[0].start, table.end))
  }

  return aliases
}

/**
 * Resolve the names a statement introduces. Never throws.
 */
export function resolveQueryNames(
  statement: SyntaxNode,
  sql: string,
  catalog: Catalog,
  options?: ScopeAnalyzerOptions
): QueryNames {
  return {
    ctes: resolveCTEs(statement, sql, catalog, options),
    aliases: resolveAliases(statement, sql),
  }
}
