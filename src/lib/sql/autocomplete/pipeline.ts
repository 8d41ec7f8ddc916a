/**
 * Autocomplete Pipeline Orchestrator
 *
 * Coordinates all modules to produce completion candidates:
 * SQL + Cursor → Tokenize → Parse → DetectSection → ResolveNames → GenerateCandidates → Filter
 */

import type { Candidate, Catalog, CompletionCandidate, CompletionOptions } from './types'
import type { TokenizerOptions } from './tokenizer'
import { parseSql } from './parser'
import { detectSection } from './section-detector'
import { resolveQueryNames } from './scope-analyzer'
import { generateCandidates, getInsertText } from './candidate-generator'
import { deduplicateCandidates, filterCandidates } from './ranker'

export interface PipelineOptions extends CompletionOptions, TokenizerOptions {}

/**
 * Candidate replacements for the text at `cursor`. Each candidate replaces
 * `source.slice(from, cursor)`. Scan failures and catalog failures yield no
 * candidates.
 */
export function complete(
  source: string,
  cursor: number,
  catalog: Catalog,
  options?: PipelineOptions
): CompletionCandidate[] {
  // 1. Tokenize + parse
  const parsed = parseSql(source, options)
  if (!parsed.tree) {
    return []
  }

  // 2. Detect section
  const context = detectSection(parsed.tree, cursor)
  if (context.section === 'UNKNOWN') {
    return []
  }

  // 3. Resolve names + generate candidates
  let candidates: Candidate[]
  try {
    candidates = generateCandidates(context, catalog, () =>
      context.statement
        ? resolveQueryNames(context.statement, source, catalog, options)
        : { ctes: new Map(), aliases: new Map() }
    )
  } catch (err) {
    options?.onError?.(err)
    return []
  }

  // 4. Filter, dedupe, render
  const matching = deduplicateCandidates(filterCandidates(candidates, context.partialToken))
  return matching.map((candidate) => ({
    from: context.replaceFrom,
    text: getInsertText(candidate, context.partialToken),
  }))
}

/**
 * Remainder of the first candidate after what is already typed, or null.
 */
export function hint(
  source: string,
  cursor: number,
  catalog: Catalog,
  options?: PipelineOptions
): string | null {
  const [first] = complete(source, cursor, catalog, options)
  if (!first) return null

  const remainder = first.text.slice(cursor - first.from)
  return remainder.length > 0 ? remainder : null
}

export interface Completer {
  complete(source: string, cursor: number): CompletionCandidate[]
  hint(source: string, cursor: number): string | null
}

/**
 * Bind a catalog (and options) for repeated use.
 */
export function createCompleter(catalog: Catalog, options?: PipelineOptions): Completer {
  return {
    complete: (source, cursor) => complete(source, cursor, catalog, options),
    hint: (source, cursor) => hint(source, cursor, catalog, options),
  }
}
