/**
 * Syntax tree navigation and structural queries.
 */

import type { SyntaxNode, SyntaxTree, NodePattern, QueryMatch } from './types'

/**
 * True if the node's rightmost descendant chain ends in a missing node.
 */
function endsWithMissing(node: SyntaxNode): boolean {
  let current = node
  while (current.children.length > 0) {
    current = current.children[current.children.length - 1]
  }
  return current.isMissing
}

function covers(node: SyntaxNode, pos: number): boolean {
  if (node.start <= pos && pos < node.end) return true
  // A node ending in a missing placeholder also owns its end offset
  return node.start <= pos && pos === node.end && endsWithMissing(node)
}

/**
 * Deepest node covering `pos`. Where siblings overlap at a boundary the
 * earlier one wins. Returns null when `pos` is outside the root.
 */
export function descendantForPosition(tree: SyntaxTree, pos: number): SyntaxNode | null {
  if (!covers(tree.root, pos)) return null

  let node = tree.root
  for (;;) {
    const next = node.children.find((child) => covers(child, pos))
    if (!next) return node
    node = next
  }
}

export function previousSibling(node: SyntaxNode): SyntaxNode | null {
  if (!node.parent) return null
  const index = node.parent.children.indexOf(node)
  return index > 0 ? node.parent.children[index - 1] : null
}

/**
 * Nearest ancestor (or the node itself) of the given type.
 */
export function ancestorOfType(node: SyntaxNode | null, type: string): SyntaxNode | null {
  let current = node
  while (current) {
    if (current.type === type) return current
    current = current.parent
  }
  return null
}

/**
 * Match `pattern` against direct children of `node` as an ordered subsequence.
 */
function matchChildren(node: SyntaxNode, patterns: NodePattern[], captures: Map<string, SyntaxNode>): boolean {
  let index = 0
  for (const pattern of patterns) {
    let matched = false
    while (index < node.children.length) {
      const child = node.children[index]
      index++
      if (matchNode(child, pattern, captures)) {
        matched = true
        break
      }
    }
    if (!matched) return false
  }
  return true
}

function matchNode(node: SyntaxNode, pattern: NodePattern, captures: Map<string, SyntaxNode>): boolean {
  if (node.type !== pattern.type) return false
  if (pattern.parent !== undefined && node.parent?.type !== pattern.parent) return false

  const local = new Map(captures)
  if (pattern.children && !matchChildren(node, pattern.children, local)) return false
  if (pattern.capture) local.set(pattern.capture, node)

  for (const [name, captured] of local) captures.set(name, captured)
  return true
}

/**
 * All matches of `pattern` in the subtree rooted at `root`, in source order.
 */
export function queryNodes(root: SyntaxNode, pattern: NodePattern): QueryMatch[] {
  const matches: QueryMatch[] = []

  const visit = (node: SyntaxNode): void => {
    const captures = new Map<string, SyntaxNode>()
    if (matchNode(node, pattern, captures)) {
      matches.push({ captures })
    }
    for (const child of node.children) {
      visit(child)
    }
  }

  visit(root)
  return matches
}
