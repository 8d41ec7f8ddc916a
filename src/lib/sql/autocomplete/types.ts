/**
 * Autocomplete Pipeline Types
 *
 * This file defines all interfaces for the completion pipeline:
 * SQL + Cursor → Tokenizer → Parser → SectionDetector → ScopeAnalyzer → CandidateGenerator → Ranker
 */

// ============================================================================
// 1. TOKENIZER TYPES
// ============================================================================

export type TokenType =
  | 'keyword'
  | 'identifier'
  | 'parameter'
  | 'operator'
  | 'literal'
  | 'punctuation'
  | 'whitespace'
  | 'comment'

export interface Token {
  type: TokenType
  value: string
  start: number
  end: number
  /** Scanner token name (e.g. IDENT, SCONST, ICONST) */
  tokenName: string
}

export interface TokenizedSQL {
  tokens: Token[]
  /** Set when the scanner rejected the input or is not loaded */
  scanError: string | null
}

// ============================================================================
// 2. SYNTAX TREE TYPES
// ============================================================================

export interface SyntaxNode {
  type: string
  start: number
  end: number
  children: SyntaxNode[]
  isError: boolean
  /** Zero-width placeholder for a required node that is absent */
  isMissing: boolean
  text: string
  parent: SyntaxNode | null
}

export interface SyntaxTree {
  root: SyntaxNode
  source: string
  /** All error nodes in the tree */
  errors: SyntaxNode[]
  hasErrors: boolean
}

export type ParseOutcome =
  | { tree: SyntaxTree; error?: undefined }
  | { tree?: undefined; error: string }

/**
 * Structural pattern for {@link queryNodes}. `capture` names the matched node;
 * `children` patterns are matched against distinct direct children in order.
 */
export interface NodePattern {
  type: string
  parent?: string
  capture?: string
  children?: NodePattern[]
}

export interface QueryMatch {
  captures: Map<string, SyntaxNode>
}

// ============================================================================
// 3. SECTION DETECTOR TYPES
// ============================================================================

export type SQLSection =
  | 'STATEMENT_START'
  | 'TABLE_NAME'
  | 'UNKNOWN'

export interface CursorContext {
  section: SQLSection
  /** The syntax node judged to be what the user is typing */
  node: SyntaxNode | null
  /** Text of the context node, used for prefix filtering */
  partialToken: string
  /** Offset where a replacement starts */
  replaceFrom: number
  /** Top-level statement containing the context node */
  statement: SyntaxNode | null
}

// ============================================================================
// 4. SCOPE ANALYZER TYPES
// ============================================================================

export interface QueryNames {
  /** CTE name → projected column names, in declaration order */
  ctes: Map<string, string[]>
  /** Alias → literal text of the table or CTE it aliases */
  aliases: Map<string, string>
}

// ============================================================================
// 5. CANDIDATE TYPES
// ============================================================================

export type CandidateType = 'keyword' | 'table' | 'cte' | 'alias'

export interface Candidate {
  type: CandidateType
  value: string
}

export interface CompletionCandidate {
  /** Offset where the replacement starts; never past the cursor */
  from: number
  /** Replacement for source[from..cursor] */
  text: string
}

// ============================================================================
// CATALOG (input to pipeline)
// ============================================================================

/**
 * Live view of the database schema. Implementations must not cache across
 * calls and must never execute the fragments handed to `planColumns`.
 */
export interface Catalog {
  /** Persisted table names, sorted */
  listTables(): string[]
  /** Output column names of a planned-only statement; throws on failure */
  planColumns(sql: string): string[]
}

// ============================================================================
// PIPELINE OPTIONS
// ============================================================================

export interface CompletionOptions {
  /** Receives errors the pipeline degrades to "no candidates" */
  onError?: (error: unknown) => void
}
