// Core functions
export { ensureModuleLoaded, isModuleLoaded } from './core'

// Highlight tokenizer
export { tokenize } from './tokenizer'
export type { TokenRange, TokenClass } from './tokenizer'

// Completion pipeline
export { complete, hint, createCompleter, parseSql, statements, resolveQueryNames } from './autocomplete'
export type {
  Catalog,
  Completer,
  CompletionCandidate,
  CompletionOptions,
  PipelineOptions,
  QueryNames,
  SyntaxNode,
  SyntaxTree,
} from './autocomplete'
