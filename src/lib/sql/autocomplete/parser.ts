/**
 * SQL Parser Module
 *
 * Builds an error-tolerant concrete syntax tree from scanner tokens. The
 * parser recognises statement and clause structure, table references, CTEs
 * and subqueries; everything else becomes leaf nodes. Input that does not
 * start a known statement becomes a single `error` leaf under the root.
 *
 * Where a table name is required but absent (`SELECT * FROM ` at the end of
 * input) a zero-width missing `identifier` is inserted at the start of the
 * next token, or at the end of the statement's extent, so the completion
 * engine can anchor on it.
 */

import type { Token, SyntaxNode, SyntaxTree, TokenizedSQL, ParseOutcome } from './types'
import { tokenize, significantTokens, isWord, isKeyword, type TokenizerOptions } from './tokenizer'

/**
 * Keywords that may start a top-level statement.
 */
export const STATEMENT_KEYWORDS = new Set([
  'SELECT', 'VALUES', 'WITH', 'INSERT', 'REPLACE', 'UPDATE', 'DELETE',
  'CREATE', 'DROP', 'ALTER', 'EXPLAIN', 'PRAGMA', 'ATTACH', 'DETACH',
  'BEGIN', 'END', 'COMMIT', 'ROLLBACK', 'SAVEPOINT', 'RELEASE',
  'VACUUM', 'ANALYZE', 'REINDEX',
])

const SELECT_CLAUSE_KEYWORDS = [
  'SELECT', 'FROM', 'WHERE', 'GROUP', 'HAVING', 'WINDOW',
  'ORDER', 'LIMIT', 'UNION', 'INTERSECT', 'EXCEPT', 'VALUES',
]

const JOIN_KEYWORDS = ['JOIN', 'LEFT', 'RIGHT', 'FULL', 'INNER', 'OUTER', 'CROSS', 'NATURAL']

// Keywords that end a table reference and can never name a table
const TABLE_TERMINATORS = new Set([
  ...JOIN_KEYWORDS,
  'WHERE', 'GROUP', 'HAVING', 'ORDER', 'LIMIT', 'WINDOW', 'ON', 'USING',
  'UNION', 'INTERSECT', 'EXCEPT', 'SET', 'VALUES', 'SELECT', 'RETURNING',
  'INDEXED', 'NOT', 'AS', 'FROM', 'DEFAULT', 'WITH',
])

const TRANSACTION_KEYWORDS = new Set(['BEGIN', 'END', 'COMMIT', 'ROLLBACK', 'SAVEPOINT', 'RELEASE'])

/**
 * Create a syntax node.
 */
function createNode(
  type: string,
  start: number,
  end: number,
  sql: string,
  children: SyntaxNode[] = [],
  isError: boolean = false
): SyntaxNode {
  return {
    type,
    start,
    end,
    text: sql.slice(start, end),
    children,
    isError,
    isMissing: false,
    parent: null,
  }
}

/**
 * Create a node spanning its children. `fallback` positions a node that has none.
 */
function spanNode(type: string, children: SyntaxNode[], sql: string, fallback: number): SyntaxNode {
  if (children.length === 0) {
    return createNode(type, fallback, fallback, sql)
  }
  return createNode(type, children[0].start, children[children.length - 1].end, sql, children)
}

function leaf(token: Token, sql: string, type?: string): SyntaxNode {
  return createNode(type ?? token.type, token.start, token.end, sql)
}

function missingNode(type: string, position: number): SyntaxNode {
  return {
    type,
    start: position,
    end: position,
    text: '',
    children: [],
    isError: false,
    isMissing: true,
    parent: null,
  }
}

function missingTableReference(position: number, sql: string): SyntaxNode {
  return spanNode('table_reference', [missingNode('identifier', position)], sql, position)
}

function firstUpper(tokens: Token[]): string {
  return tokens.length > 0 ? tokens[0].value.toUpperCase() : ''
}

function isTableName(token: Token | undefined): boolean {
  return isWord(token) && !(token?.type === 'keyword' && TABLE_TERMINATORS.has(token.value.toUpperCase()))
}

function startsQuery(tokens: Token[]): boolean {
  return isKeyword(tokens[0], 'SELECT', 'WITH', 'VALUES')
}

/**
 * Index of the parenthesis closing the one at `openIndex`, or -1 if unclosed.
 */
function findClosingParen(tokens: Token[], openIndex: number): number {
  let depth = 0
  for (let i = openIndex; i < tokens.length; i++) {
    if (tokens[i].value === '(') depth++
    if (tokens[i].value === ')') {
      depth--
      if (depth === 0) return i
    }
  }
  return -1
}

/**
 * Build a lightweight syntax tree from tokens.
 */
export function parseFromTokens(tokenized: TokenizedSQL, sql: string): SyntaxTree {
  const tokens = significantTokens(tokenized)
  const children: SyntaxNode[] = []

  for (const group of splitStatements(tokens)) {
    if (group.tokens.length === 0) continue
    const boundary = group.terminator ? group.terminator.start : sql.length

    if (STATEMENT_KEYWORDS.has(firstUpper(group.tokens)) && group.tokens[0].type === 'keyword') {
      const body = parseStatementBody(group.tokens, sql, boundary)
      children.push(createNode('statement', body.start, body.end, sql, [body]))
    } else {
      const first = group.tokens[0]
      const last = group.tokens[group.tokens.length - 1]
      children.push(createNode('error', first.start, last.end, sql, [], true))
    }
  }

  const root = createNode('statement_list', 0, sql.length, sql, children)
  setParentReferences(root)

  const errors: SyntaxNode[] = []
  collectErrors(root, errors)

  return { root, source: sql, errors, hasErrors: errors.length > 0 }
}

/**
 * Tokenize and parse. A scanner failure is a parse failure.
 */
export function parseSql(sql: string, options?: TokenizerOptions): ParseOutcome {
  const tokenized = tokenize(sql, options)
  if (tokenized.scanError !== null) {
    return { error: tokenized.scanError }
  }
  return { tree: parseFromTokens(tokenized, sql) }
}

/**
 * Group tokens into statements on top-level semicolons. Semicolons inside a
 * CREATE TRIGGER body (BEGIN ... END) do not split.
 */
function splitStatements(tokens: Token[]): { tokens: Token[]; terminator: Token | null }[] {
  const groups: { tokens: Token[]; terminator: Token | null }[] = []
  let current: Token[] = []
  let isTrigger = false
  let inTriggerBody = false
  let caseDepth = 0

  for (const token of tokens) {
    if (token.value === ';' && !inTriggerBody) {
      groups.push({ tokens: current, terminator: token })
      current = []
      isTrigger = false
      continue
    }

    current.push(token)

    if (isKeyword(current[0], 'CREATE') && isKeyword(token, 'TRIGGER')) {
      isTrigger = true
    } else if (isTrigger && !inTriggerBody && isKeyword(token, 'BEGIN')) {
      inTriggerBody = true
    } else if (inTriggerBody && isKeyword(token, 'CASE')) {
      caseDepth++
    } else if (inTriggerBody && isKeyword(token, 'END')) {
      if (caseDepth > 0) {
        caseDepth--
      } else {
        inTriggerBody = false
      }
    }
  }

  if (current.length > 0) {
    groups.push({ tokens: current, terminator: null })
  }

  return groups
}

/**
 * Parse one statement (top-level or nested) into its statement-kind node.
 * `boundary` is where a missing trailing node is placed.
 */
function parseStatementBody(tokens: Token[], sql: string, boundary: number): SyntaxNode {
  let withClause: SyntaxNode | null = null
  let rest = tokens

  if (isKeyword(tokens[0], 'WITH')) {
    const parsed = parseWithClause(tokens, sql, boundary)
    withClause = parsed.node
    rest = tokens.slice(parsed.next)
  }

  let statement: SyntaxNode
  switch (firstUpper(rest)) {
    case 'SELECT':
    case 'VALUES':
    case '':
      statement = parseSelectStatement(rest, sql, boundary)
      break
    case 'INSERT':
    case 'REPLACE':
      statement = parseInsertStatement(rest, sql, boundary)
      break
    case 'UPDATE':
      statement = parseUpdateStatement(rest, sql, boundary)
      break
    case 'DELETE':
      statement = parseDeleteStatement(rest, sql, boundary)
      break
    case 'CREATE':
      statement = parseCreateStatement(rest, sql, boundary)
      break
    case 'DROP':
      statement = parseDropStatement(rest, sql, boundary)
      break
    case 'ALTER':
      statement = parseAlterStatement(rest, sql, boundary)
      break
    case 'EXPLAIN':
      statement = parseExplainStatement(rest, sql, boundary)
      break
    default:
      statement = parseSimpleStatement(rest, sql, boundary)
  }

  if (!withClause) return statement
  return spanNode(statement.type, [withClause, ...statement.children], sql, withClause.start)
}

/**
 * WITH [RECURSIVE] name [(columns)] AS [[NOT] MATERIALIZED] (query), ...
 */
function parseWithClause(
  tokens: Token[],
  sql: string,
  boundary: number
): { node: SyntaxNode; next: number } {
  const children: SyntaxNode[] = [leaf(tokens[0], sql)]
  let i = 1

  if (isKeyword(tokens[i], 'RECURSIVE')) {
    children.push(leaf(tokens[i], sql))
    i++
  }

  while (i < tokens.length && isTableName(tokens[i])) {
    const cteChildren: SyntaxNode[] = [leaf(tokens[i], sql, 'identifier')]
    i++

    if (tokens[i]?.value === '(') {
      const close = findClosingParen(tokens, i)
      const end = close === -1 ? tokens.length : close + 1
      cteChildren.push(parseColumnList(tokens.slice(i, end), sql))
      i = end
    }

    if (isKeyword(tokens[i], 'AS')) {
      cteChildren.push(leaf(tokens[i], sql))
      i++
      while (isKeyword(tokens[i], 'NOT', 'MATERIALIZED')) {
        cteChildren.push(leaf(tokens[i], sql))
        i++
      }
      if (tokens[i]?.value === '(') {
        const close = findClosingParen(tokens, i)
        cteChildren.push(parseParenthesized(tokens, i, close, sql, boundary))
        i = close === -1 ? tokens.length : close + 1
      }
    }

    children.push(spanNode('common_table_expression', cteChildren, sql, boundary))

    if (tokens[i]?.value !== ',') break
    children.push(leaf(tokens[i], sql))
    i++
  }

  return { node: spanNode('with_clause', children, sql, boundary), next: i }
}

function parseColumnList(tokens: Token[], sql: string): SyntaxNode {
  const children = tokens.map((t) => leaf(t, sql, isWord(t) ? 'identifier' : undefined))
  return spanNode('column_list', children, sql, tokens[0].start)
}

/**
 * Parse `( ... )` starting at `openIndex`: a subquery when the contents start
 * a query, otherwise a parenthesized expression.
 */
function parseParenthesized(
  tokens: Token[],
  openIndex: number,
  closeIndex: number,
  sql: string,
  boundary: number
): SyntaxNode {
  const inner = tokens.slice(openIndex + 1, closeIndex === -1 ? tokens.length : closeIndex)
  const closeToken = closeIndex === -1 ? null : tokens[closeIndex]
  const innerBoundary = closeToken ? closeToken.start : boundary
  const children: SyntaxNode[] = [leaf(tokens[openIndex], sql)]
  let type = 'parenthesized'

  if (startsQuery(inner)) {
    type = 'subquery'
    children.push(parseStatementBody(inner, sql, innerBoundary))
  } else {
    children.push(...parseExpression(inner, sql, innerBoundary))
  }

  if (closeToken) children.push(leaf(closeToken, sql))
  return spanNode(type, children, sql, tokens[openIndex].start)
}

/**
 * Turn an expression region into leaves, nesting parenthesized groups.
 */
function parseExpression(tokens: Token[], sql: string, boundary: number): SyntaxNode[] {
  const nodes: SyntaxNode[] = []

  for (let i = 0; i < tokens.length; i++) {
    if (tokens[i].value === '(') {
      const close = findClosingParen(tokens, i)
      nodes.push(parseParenthesized(tokens, i, close, sql, boundary))
      if (close === -1) break
      i = close
    } else {
      nodes.push(leaf(tokens[i], sql))
    }
  }

  return nodes
}

/**
 * Split tokens into clauses on top-level keywords.
 */
function splitIntoClauses(tokens: Token[], keywords: string[]): Token[][] {
  const clauses: Token[][] = []
  let currentClause: Token[] = []
  let parenDepth = 0

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i]
    if (token.value === '(') parenDepth++
    if (token.value === ')') parenDepth = Math.max(0, parenDepth - 1)

    const startsClause =
      parenDepth === 0 &&
      token.type === 'keyword' &&
      keywords.includes(token.value.toUpperCase()) &&
      // IS [NOT] DISTINCT FROM
      !(isKeyword(token, 'FROM') && isKeyword(tokens[i - 1], 'DISTINCT'))

    if (startsClause && currentClause.length > 0) {
      clauses.push(currentClause)
      currentClause = []
    }
    currentClause.push(token)
  }

  if (currentClause.length > 0) {
    clauses.push(currentClause)
  }

  return clauses
}

const CLAUSE_NODE_TYPES: Record<string, string> = {
  SELECT: 'select_clause',
  FROM: 'from_clause',
  WHERE: 'where_clause',
  GROUP: 'group_by_clause',
  HAVING: 'having_clause',
  WINDOW: 'window_clause',
  ORDER: 'order_by_clause',
  LIMIT: 'limit_clause',
  UNION: 'compound_operator',
  INTERSECT: 'compound_operator',
  EXCEPT: 'compound_operator',
  VALUES: 'values_clause',
  SET: 'set_clause',
  RETURNING: 'returning_clause',
}

/**
 * Parse a run of clauses into clause nodes.
 */
function parseClauses(
  tokens: Token[],
  keywords: string[],
  sql: string,
  boundary: number
): SyntaxNode[] {
  const clauses = splitIntoClauses(tokens, keywords)
  const nodes: SyntaxNode[] = []

  clauses.forEach((clause, index) => {
    const clauseBoundary = index + 1 < clauses.length ? clauses[index + 1][0].start : boundary
    const nodeType = CLAUSE_NODE_TYPES[firstUpper(clause)] ?? 'unknown_clause'
    const head = leaf(clause[0], sql)

    if (nodeType === 'from_clause') {
      const items = parseFromItems(clause.slice(1), sql, clauseBoundary)
      nodes.push(spanNode(nodeType, [head, ...items], sql, clause[0].start))
    } else if (nodeType === 'unknown_clause') {
      nodes.push(spanNode(nodeType, parseExpression(clause, sql, clauseBoundary), sql, clause[0].start))
    } else {
      const rest = parseExpression(clause.slice(1), sql, clauseBoundary)
      nodes.push(spanNode(nodeType, [head, ...rest], sql, clause[0].start))
    }
  })

  return nodes
}

/**
 * Parse the items of a FROM clause: table references separated by commas or
 * join operators, with ON / USING constraints.
 */
function parseFromItems(tokens: Token[], sql: string, boundary: number): SyntaxNode[] {
  const nodes: SyntaxNode[] = []
  let expectTable = true
  let i = 0

  while (i < tokens.length) {
    const token = tokens[i]

    if (expectTable && (token.value === '(' || isTableName(token))) {
      const parsed = parseTableReference(tokens, i, sql, boundary, true)
      nodes.push(parsed.node)
      i = parsed.next
      expectTable = false
      continue
    }

    if (expectTable) {
      nodes.push(missingTableReference(token.start, sql))
      expectTable = false
    }

    if (token.value === ',') {
      nodes.push(leaf(token, sql))
      expectTable = true
      i++
      continue
    }

    if (token.type === 'keyword' && JOIN_KEYWORDS.includes(token.value.toUpperCase())) {
      const operator: SyntaxNode[] = []
      while (i < tokens.length && isKeyword(tokens[i], ...JOIN_KEYWORDS)) {
        operator.push(leaf(tokens[i], sql))
        i++
        if (isKeyword(tokens[i - 1], 'JOIN')) break
      }
      nodes.push(spanNode('join_operator', operator, sql, token.start))
      expectTable = true
      continue
    }

    if (isKeyword(token, 'ON', 'USING')) {
      let end = i + 1
      let depth = 0
      while (end < tokens.length) {
        const t = tokens[end]
        if (t.value === '(') depth++
        if (t.value === ')') depth--
        if (depth <= 0 && (t.value === ',' || isKeyword(t, ...JOIN_KEYWORDS))) break
        end++
      }
      const constraint = [leaf(token, sql), ...parseExpression(tokens.slice(i + 1, end), sql, boundary)]
      nodes.push(spanNode('join_constraint', constraint, sql, token.start))
      i = end
      continue
    }

    nodes.push(...parseExpression([token], sql, boundary))
    i++
  }

  if (expectTable) {
    nodes.push(missingTableReference(boundary, sql))
  }

  return nodes
}

/**
 * Parse one table reference starting at `start`:
 * [schema.]name [(args)] [[AS] alias] [INDEXED BY name | NOT INDEXED]
 * or a parenthesized subquery / join group with an optional alias.
 */
function parseTableReference(
  tokens: Token[],
  start: number,
  sql: string,
  boundary: number,
  allowAlias: boolean
): { node: SyntaxNode; next: number } {
  const children: SyntaxNode[] = []
  let i = start
  const token = tokens[i]

  if (token === undefined) {
    return { node: missingTableReference(boundary, sql), next: i }
  }

  if (token.value === '(') {
    const close = findClosingParen(tokens, i)
    const inner = tokens.slice(i + 1, close === -1 ? tokens.length : close)
    if (startsQuery(inner)) {
      children.push(parseParenthesized(tokens, i, close, sql, boundary))
    } else {
      const innerBoundary = close === -1 ? boundary : tokens[close].start
      const group = [leaf(token, sql), ...parseFromItems(inner, sql, innerBoundary)]
      if (close !== -1) group.push(leaf(tokens[close], sql))
      children.push(spanNode('parenthesized', group, sql, token.start))
    }
    i = close === -1 ? tokens.length : close + 1
  } else if (tokens[i + 1]?.value === '.') {
    children.push(leaf(token, sql, 'schema_name'), leaf(tokens[i + 1], sql))
    if (isTableName(tokens[i + 2])) {
      children.push(leaf(tokens[i + 2], sql, 'identifier'))
      i += 3
    } else {
      children.push(missingNode('identifier', tokens[i + 2]?.start ?? boundary))
      i += 2
    }
  } else {
    children.push(leaf(token, sql, 'identifier'))
    i++
  }

  // Table-valued function arguments
  if (tokens[i]?.value === '(' && children[children.length - 1].type === 'identifier') {
    const close = findClosingParen(tokens, i)
    const args = parseParenthesized(tokens, i, close, sql, boundary)
    children.push({ ...args, type: 'arguments' })
    i = close === -1 ? tokens.length : close + 1
  }

  if (allowAlias) {
    if (isKeyword(tokens[i], 'AS')) {
      children.push(leaf(tokens[i], sql))
      i++
      if (isTableName(tokens[i])) {
        children.push(leaf(tokens[i], sql, 'alias'))
        i++
      }
    } else if (tokens[i]?.type === 'identifier') {
      children.push(leaf(tokens[i], sql, 'alias'))
      i++
    }
  }

  if (isKeyword(tokens[i], 'INDEXED') && isKeyword(tokens[i + 1], 'BY')) {
    children.push(leaf(tokens[i], sql), leaf(tokens[i + 1], sql))
    i += 2
    if (isWord(tokens[i])) {
      children.push(leaf(tokens[i], sql, 'identifier'))
      i++
    }
  } else if (isKeyword(tokens[i], 'NOT') && isKeyword(tokens[i + 1], 'INDEXED')) {
    children.push(leaf(tokens[i], sql), leaf(tokens[i + 1], sql))
    i += 2
  }

  return { node: spanNode('table_reference', children, sql, token.start), next: i }
}

/**
 * Parse a SELECT / VALUES statement (compound selects included) into clause nodes.
 */
function parseSelectStatement(tokens: Token[], sql: string, boundary: number): SyntaxNode {
  const children = parseClauses(tokens, SELECT_CLAUSE_KEYWORDS, sql, boundary)
  return spanNode('select_statement', children, sql, tokens[0]?.start ?? boundary)
}

/**
 * Keyword leaves up to (and excluding) the first token matching `stop`.
 */
function takeLeavesUntil(
  tokens: Token[],
  start: number,
  sql: string,
  stop: (token: Token) => boolean
): { nodes: SyntaxNode[]; next: number } {
  const nodes: SyntaxNode[] = []
  let i = start
  while (i < tokens.length && !stop(tokens[i])) {
    nodes.push(leaf(tokens[i], sql))
    i++
  }
  return { nodes, next: i }
}

/**
 * [INSERT [OR action] | REPLACE] INTO table [AS alias] [(columns)] VALUES ... | SELECT ... | DEFAULT VALUES
 */
function parseInsertStatement(tokens: Token[], sql: string, boundary: number): SyntaxNode {
  const head = takeLeavesUntil(tokens, 0, sql, (t) => isKeyword(t, 'INTO'))
  const children = head.nodes
  let i = head.next

  if (isKeyword(tokens[i], 'INTO')) {
    children.push(leaf(tokens[i], sql))
    i++
    const table = isTableName(tokens[i])
      ? parseTableReference(tokens, i, sql, boundary, true)
      : { node: missingTableReference(tokens[i]?.start ?? boundary, sql), next: i }
    children.push(table.node)
    i = table.next

    if (tokens[i]?.value === '(') {
      const close = findClosingParen(tokens, i)
      const end = close === -1 ? tokens.length : close + 1
      children.push(parseColumnList(tokens.slice(i, end), sql))
      i = end
    }

    const rest = tokens.slice(i)
    if (startsQuery(rest) && !isKeyword(rest[0], 'VALUES')) {
      children.push(parseStatementBody(rest, sql, boundary))
    } else {
      children.push(...parseClauses(rest, ['VALUES', 'RETURNING'], sql, boundary))
    }
  } else {
    children.push(...parseExpression(tokens.slice(i), sql, boundary))
  }

  return spanNode('insert_statement', children, sql, tokens[0].start)
}

/**
 * UPDATE [OR action] table [[AS] alias] SET ... [FROM ...] [WHERE ...] [RETURNING ...]
 */
function parseUpdateStatement(tokens: Token[], sql: string, boundary: number): SyntaxNode {
  const children: SyntaxNode[] = [leaf(tokens[0], sql)]
  let i = 1

  if (isKeyword(tokens[i], 'OR')) {
    children.push(leaf(tokens[i], sql))
    i++
    if (isWord(tokens[i])) {
      children.push(leaf(tokens[i], sql))
      i++
    }
  }

  const table = isTableName(tokens[i])
    ? parseTableReference(tokens, i, sql, boundary, true)
    : { node: missingTableReference(tokens[i]?.start ?? boundary, sql), next: i }
  children.push(table.node)

  children.push(
    ...parseClauses(tokens.slice(table.next), ['SET', 'FROM', 'WHERE', 'RETURNING', 'ORDER', 'LIMIT'], sql, boundary)
  )
  return spanNode('update_statement', children, sql, tokens[0].start)
}

/**
 * DELETE FROM table [[AS] alias] [WHERE ...] [RETURNING ...]
 */
function parseDeleteStatement(tokens: Token[], sql: string, boundary: number): SyntaxNode {
  const children: SyntaxNode[] = [leaf(tokens[0], sql)]
  let i = 1

  if (isKeyword(tokens[i], 'FROM')) {
    children.push(leaf(tokens[i], sql))
    i++
    const table = isTableName(tokens[i])
      ? parseTableReference(tokens, i, sql, boundary, true)
      : { node: missingTableReference(tokens[i]?.start ?? boundary, sql), next: i }
    children.push(table.node)
    i = table.next
  }

  children.push(...parseClauses(tokens.slice(i), ['WHERE', 'RETURNING', 'ORDER', 'LIMIT'], sql, boundary))
  return spanNode('delete_statement', children, sql, tokens[0].start)
}

/**
 * CREATE ... with an optional `AS SELECT ...` body parsed as a nested query.
 */
function parseCreateStatement(tokens: Token[], sql: string, boundary: number): SyntaxNode {
  let depth = 0
  for (let i = 1; i < tokens.length; i++) {
    if (tokens[i].value === '(') depth++
    if (tokens[i].value === ')') depth--
    if (depth === 0 && isKeyword(tokens[i], 'AS') && startsQuery(tokens.slice(i + 1))) {
      const head = parseExpression(tokens.slice(0, i + 1), sql, tokens[i + 1].start)
      const body = parseStatementBody(tokens.slice(i + 1), sql, boundary)
      return spanNode('create_statement', [...head, body], sql, tokens[0].start)
    }
  }
  return spanNode('create_statement', parseExpression(tokens, sql, boundary), sql, tokens[0].start)
}

/**
 * DROP TABLE|VIEW [IF EXISTS] name, other DROP forms as leaves.
 */
function parseDropStatement(tokens: Token[], sql: string, boundary: number): SyntaxNode {
  if (!isKeyword(tokens[1], 'TABLE', 'VIEW')) {
    return spanNode('drop_statement', parseExpression(tokens, sql, boundary), sql, tokens[0].start)
  }

  const children: SyntaxNode[] = [leaf(tokens[0], sql), leaf(tokens[1], sql)]
  let i = 2
  if (isKeyword(tokens[i], 'IF') && isKeyword(tokens[i + 1], 'EXISTS')) {
    children.push(leaf(tokens[i], sql), leaf(tokens[i + 1], sql))
    i += 2
  }

  const table = isTableName(tokens[i])
    ? parseTableReference(tokens, i, sql, boundary, false)
    : { node: missingTableReference(tokens[i]?.start ?? boundary, sql), next: i }
  children.push(table.node, ...parseExpression(tokens.slice(table.next), sql, boundary))
  return spanNode('drop_statement', children, sql, tokens[0].start)
}

/**
 * ALTER TABLE name ...
 */
function parseAlterStatement(tokens: Token[], sql: string, boundary: number): SyntaxNode {
  if (!isKeyword(tokens[1], 'TABLE')) {
    return spanNode('alter_statement', parseExpression(tokens, sql, boundary), sql, tokens[0].start)
  }

  const table = isTableName(tokens[2])
    ? parseTableReference(tokens, 2, sql, boundary, false)
    : { node: missingTableReference(tokens[2]?.start ?? boundary, sql), next: 2 }
  const children = [leaf(tokens[0], sql), leaf(tokens[1], sql), table.node]
  children.push(...parseExpression(tokens.slice(table.next), sql, boundary))
  return spanNode('alter_statement', children, sql, tokens[0].start)
}

/**
 * EXPLAIN [QUERY PLAN] statement
 */
function parseExplainStatement(tokens: Token[], sql: string, boundary: number): SyntaxNode {
  const head = takeLeavesUntil(tokens, 1, sql, (t) => !isKeyword(t, 'QUERY', 'PLAN'))
  const children = [leaf(tokens[0], sql), ...head.nodes]
  const rest = tokens.slice(head.next)

  if (rest.length > 0 && STATEMENT_KEYWORDS.has(firstUpper(rest)) && rest[0].type === 'keyword') {
    children.push(parseStatementBody(rest, sql, boundary))
  } else {
    children.push(...parseExpression(rest, sql, boundary))
  }
  return spanNode('explain_statement', children, sql, tokens[0].start)
}

/**
 * PRAGMA, ATTACH, DETACH, transaction control and maintenance statements.
 */
function parseSimpleStatement(tokens: Token[], sql: string, boundary: number): SyntaxNode {
  const keyword = firstUpper(tokens)
  let type = 'other_statement'
  if (keyword === 'PRAGMA') type = 'pragma_statement'
  else if (keyword === 'ATTACH') type = 'attach_statement'
  else if (keyword === 'DETACH') type = 'detach_statement'
  else if (TRANSACTION_KEYWORDS.has(keyword)) type = 'transaction_statement'

  return spanNode(type, parseExpression(tokens, sql, boundary), sql, tokens[0]?.start ?? boundary)
}

/**
 * Set parent references for all nodes in the tree.
 */
function setParentReferences(node: SyntaxNode, parent: SyntaxNode | null = null): void {
  node.parent = parent
  for (const child of node.children) {
    setParentReferences(child, node)
  }
}

/**
 * Collect all error nodes from a tree.
 */
function collectErrors(node: SyntaxNode, errors: SyntaxNode[]): void {
  if (node.isError) {
    errors.push(node)
  }
  for (const child of node.children) {
    collectErrors(child, errors)
  }
}
