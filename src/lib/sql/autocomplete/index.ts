/**
 * SQL Autocomplete Pipeline
 *
 * A context-sensitive completion engine for SQLite:
 * - Error-tolerant concrete syntax tree
 * - Cursor context detection from the node under the cursor
 * - CTE and alias resolution, with CTE columns planned by the engine
 * - Prefix filtering with case matching
 *
 * @example
 * ```ts
 * import { complete } from './autocomplete'
 *
 * complete('SELECT * FROM u', 15, catalog)
 * // [{ from: 14, text: 'users ' }]
 * ```
 */

// Pipeline
export { complete, hint, createCompleter } from './pipeline'
export type { PipelineOptions, Completer } from './pipeline'

// Types
export type {
  // Token types
  Token,
  TokenType,
  TokenizedSQL,
  // Syntax tree types
  SyntaxNode,
  SyntaxTree,
  ParseOutcome,
  NodePattern,
  QueryMatch,
  // Context types
  SQLSection,
  CursorContext,
  // Scope types
  QueryNames,
  // Candidate types
  CandidateType,
  Candidate,
  CompletionCandidate,
  // Catalog
  Catalog,
  CompletionOptions,
} from './types'

// Module functions (for unit testing and advanced usage)
export { tokenize, significantTokens, SQLITE_KEYWORDS } from './tokenizer'
export type { TokenizerOptions, Scanner } from './tokenizer'
export { parseSql, parseFromTokens, STATEMENT_KEYWORDS } from './parser'
export { descendantForPosition, previousSibling, ancestorOfType, queryNodes } from './tree'
export { statements } from './statements'
export type { StatementsOptions } from './statements'
export { detectSection, findContextNode } from './section-detector'
export { resolveQueryNames } from './scope-analyzer'
export type { ScopeAnalyzerOptions } from './scope-analyzer'
export { generateCandidates, getInsertText, INITIAL_KEYWORDS } from './candidate-generator'
export { isMatch, matchCase, deduplicateCandidates, filterCandidates } from './ranker'
