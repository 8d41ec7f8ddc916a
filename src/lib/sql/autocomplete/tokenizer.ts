/**
 * SQL Tokenizer Module
 *
 * Uses @libpg-query/parser's scanSync for lexing. SQLite shares the lexical
 * structure the scanner understands (quoting, comments, numbers, operators);
 * keyword classification uses the SQLite keyword list instead of the
 * scanner's own.
 */

import { scanSync as defaultScanSync, type ScanToken } from '@libpg-query/parser'
import { isModuleLoaded as defaultIsModuleLoaded } from '../core'
import SQLITE_KEYWORD_LIST from '../sqlite-keywords.json'
import type { Token, TokenType, TokenizedSQL } from './types'

/**
 * Scanner dependency, injectable for tests.
 */
export interface Scanner {
  scanSync: (sql: string) => { tokens: ScanToken[] }
  isLoaded: () => boolean
}

const defaultScanner: Scanner = {
  scanSync: defaultScanSync,
  isLoaded: defaultIsModuleLoaded,
}

export const SQLITE_KEYWORDS: ReadonlySet<string> = new Set(SQLITE_KEYWORD_LIST)

const OPERATOR_CHARS = ['=', '<', '>', '!', '+', '-', '*', '/', '%', '^', '|', '&', '~', '@', '#']
const PUNCTUATION = ['(', ')', ',', '.', ';', '[', ']', '{', '}', ':']

/**
 * Map a scanner token to our TokenType
 */
function mapTokenType(token: ScanToken, text: string): TokenType {
  if (token.tokenName === 'SQL_COMMENT' || token.tokenName === 'C_COMMENT') {
    return 'comment'
  }

  // String, blob and numeric literals
  if (
    token.tokenName === 'SCONST' ||
    token.tokenName === 'USCONST' ||
    token.tokenName === 'XCONST' ||
    token.tokenName === 'BCONST' ||
    token.tokenName === 'ICONST' ||
    token.tokenName === 'FCONST'
  ) {
    return 'literal'
  }

  if (token.tokenName === 'PARAM' || text === '?') {
    return 'parameter'
  }

  // Operators before words: some operator tokens carry a keyword kind
  if (
    token.tokenName === 'Op' ||
    (text.length <= 2 && OPERATOR_CHARS.some((op) => text.includes(op)))
  ) {
    return 'operator'
  }

  if (token.tokenName === 'IDENT' || token.keywordKind > 0) {
    if (/^["`[]/.test(text)) return 'identifier'
    return SQLITE_KEYWORDS.has(text.toUpperCase()) ? 'keyword' : 'identifier'
  }

  if (PUNCTUATION.includes(text)) {
    return 'punctuation'
  }

  if (/^\s+$/.test(text)) {
    return 'whitespace'
  }

  return 'identifier'
}

export interface TokenizerOptions {
  /** Custom scanner for testing */
  scanner?: Scanner
}

/**
 * Tokenize a SQL string. Never throws: a rejected input is reported through
 * `scanError` with an empty token list.
 */
export function tokenize(sql: string, options?: TokenizerOptions): TokenizedSQL {
  const scanner = options?.scanner ?? defaultScanner

  if (!scanner.isLoaded()) {
    return { tokens: [], scanError: 'SQL scanner module is not loaded' }
  }
  if (!sql.trim()) {
    return { tokens: [], scanError: null }
  }

  try {
    const result = scanner.scanSync(sql)
    const tokens: Token[] = result.tokens.map((scanToken) => {
      const text = sql.slice(scanToken.start, scanToken.end)
      return {
        type: mapTokenType(scanToken, text),
        value: text,
        start: scanToken.start,
        end: scanToken.end,
        tokenName: scanToken.tokenName,
      }
    })
    return { tokens, scanError: null }
  } catch (err) {
    return { tokens: [], scanError: err instanceof Error ? err.message : String(err) }
  }
}

/**
 * Tokens that carry structure (comments dropped).
 */
export function significantTokens(tokenized: TokenizedSQL): Token[] {
  return tokenized.tokens.filter((t) => t.type !== 'comment' && t.type !== 'whitespace')
}

/**
 * True if the token is a bare or quoted name (or a keyword usable as one).
 */
export function isWord(token: Token | undefined): boolean {
  return token !== undefined && (token.type === 'identifier' || token.type === 'keyword')
}

export function isKeyword(token: Token | undefined, ...values: string[]): boolean {
  return token !== undefined && token.type === 'keyword' && values.includes(token.value.toUpperCase())
}
