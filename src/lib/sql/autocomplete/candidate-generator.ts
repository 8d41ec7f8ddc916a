/**
 * Candidate Generator Module
 *
 * Produces raw candidates for a cursor context. Statement starts get the
 * statement keywords; table references get catalog tables, then CTE names,
 * then alias names.
 */

import type { Candidate, Catalog, CursorContext, QueryNames } from './types'
import { matchCase } from './ranker'

/**
 * Keywords offered at the start of a statement, in offer order.
 */
export const INITIAL_KEYWORDS = [
  'SELECT', 'DELETE', 'CREATE', 'DROP', 'ATTACH', 'DETACH', 'EXPLAIN', 'PRAGMA', 'WITH',
  'UPDATE', 'ALTER', 'BEGIN', 'END', 'COMMIT', 'ROLLBACK',
] as const

/**
 * Generate candidates for the context. `resolveNames` is only called for
 * table-name contexts; catalog errors propagate.
 */
export function generateCandidates(
  context: CursorContext,
  catalog: Catalog,
  resolveNames: () => QueryNames
): Candidate[] {
  switch (context.section) {
    case 'STATEMENT_START':
      return INITIAL_KEYWORDS.map((value): Candidate => ({ type: 'keyword', value }))

    case 'TABLE_NAME': {
      const names = resolveNames()
      return [
        ...catalog.listTables().map((value): Candidate => ({ type: 'table', value })),
        ...[...names.ctes.keys()].map((value): Candidate => ({ type: 'cte', value })),
        ...[...names.aliases.keys()].map((value): Candidate => ({ type: 'alias', value })),
      ]
    }

    default:
      return []
  }
}

/**
 * Text inserted for a candidate: keywords follow the typed case, names are
 * verbatim. Always one trailing space.
 */
export function getInsertText(candidate: Candidate, typed: string): string {
  const value = candidate.type === 'keyword' ? matchCase(typed, candidate.value) : candidate.value
  return `${value} `
}
