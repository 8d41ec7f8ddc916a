/**
 * Statement Splitter
 *
 * Yields the top-level statements of a parsed source in source order.
 * Partial statements are included.
 */

import type { SyntaxNode, SyntaxTree, NodePattern } from './types'
import { queryNodes } from './tree'

export interface StatementsOptions {
  /** Also yield unrecognised top-level input (`error` nodes) in order */
  includeErrors?: boolean
}

const STATEMENT_PATTERN: NodePattern = { type: 'statement', parent: 'statement_list', capture: 'stmt' }
const ERROR_PATTERN: NodePattern = { type: 'error', parent: 'statement_list', capture: 'stmt' }

function captured(root: SyntaxNode, pattern: NodePattern): SyntaxNode[] {
  return queryNodes(root, pattern).flatMap((match) => {
    const node = match.captures.get('stmt')
    return node ? [node] : []
  })
}

export function statements(tree: SyntaxTree, options?: StatementsOptions): SyntaxNode[] {
  const found = captured(tree.root, STATEMENT_PATTERN)
  if (!options?.includeErrors) return found

  return [...found, ...captured(tree.root, ERROR_PATTERN)].sort((a, b) => a.start - b.start)
}
