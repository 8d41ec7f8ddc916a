/**
 * Section Detector Module
 *
 * Locates the syntax node the user is typing and classifies the cursor
 * context from that node's type, its parent's type and whether it has a
 * previous sibling.
 */

import type { SyntaxNode, SyntaxTree, CursorContext, SQLSection } from './types'
import { descendantForPosition, previousSibling, ancestorOfType } from './tree'

/** How far back from the cursor to look for a meaningful node */
export const LOOKBEHIND = 5

/**
 * Find the context node: the smallest node covering one of the offsets
 * `cursor`, `cursor - 1`, ... (up to LOOKBEHIND offsets, never below 0),
 * skipping the root.
 */
export function findContextNode(tree: SyntaxTree, cursor: number): SyntaxNode | null {
  const limit = Math.min(LOOKBEHIND, cursor)
  for (let offset = 0; offset < limit; offset++) {
    const node = descendantForPosition(tree, cursor - offset)
    if (node && node.type !== 'statement_list') {
      return node
    }
  }
  return null
}

const WORD_CHAR = /[A-Za-z0-9_$]/

// A placeholder directly after a word (`FROM|`) needs a space before a name can go there
function isGluedPlaceholder(node: SyntaxNode, source: string): boolean {
  return node.isMissing && node.start > 0 && WORD_CHAR.test(source[node.start - 1])
}

function classify(node: SyntaxNode, source: string): SQLSection {
  if (isGluedPlaceholder(node, source)) return 'UNKNOWN'

  const parentType = node.parent?.type
  const hasPrevious = previousSibling(node) !== null

  if (node.type === 'error' && parentType === 'statement_list' && !hasPrevious) {
    return 'STATEMENT_START'
  }
  if (node.type === 'identifier' && parentType === 'table_reference' && !hasPrevious) {
    return 'TABLE_NAME'
  }
  return 'UNKNOWN'
}

/**
 * Detect the cursor context.
 */
export function detectSection(tree: SyntaxTree, cursor: number): CursorContext {
  const node = findContextNode(tree, cursor)

  if (!node) {
    return { section: 'UNKNOWN', node: null, partialToken: '', replaceFrom: cursor, statement: null }
  }

  return {
    section: classify(node, tree.source),
    node,
    partialToken: node.text,
    replaceFrom: node.start,
    statement: ancestorOfType(node, 'statement'),
  }
}
