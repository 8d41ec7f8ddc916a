import { scanSync, type ScanToken } from '@libpg-query/parser'
import { isModuleLoaded } from './core'
import { SQLITE_KEYWORDS } from './autocomplete/tokenizer'

export type TokenClass = 'keyword' | 'number' | 'string' | 'comment' | 'parameter'

export interface TokenRange {
  from: number
  to: number
  class: TokenClass
}

const CONTROL_CHAR_REGEX = /[\x00-\x1F\x7F]/g

function mapTokenToClass(token: ScanToken, sql: string): TokenClass | null {
  const text = sql.slice(token.start, token.end)

  switch (token.tokenName) {
    case 'SQL_COMMENT':
    case 'C_COMMENT':
      return 'comment'
    case 'SCONST':
    case 'USCONST':
    case 'XCONST':
    case 'BCONST':
      return 'string'
    case 'ICONST':
    case 'FCONST':
      return 'number'
    case 'PARAM':
      return 'parameter'
  }

  if (text === '?') return 'parameter'

  // Quoted names are identifiers even when they spell a keyword
  if ((token.tokenName === 'IDENT' || token.keywordKind > 0) && !/^["`[]/.test(text)) {
    return SQLITE_KEYWORDS.has(text.toUpperCase()) ? 'keyword' : null
  }

  return null
}

function tokensToRanges(tokens: ScanToken[], sql: string): TokenRange[] {
  const ranges: TokenRange[] = []
  for (const token of tokens) {
    const tokenClass = mapTokenToClass(token, sql)
    if (tokenClass) {
      ranges.push({ from: token.start, to: token.end, class: tokenClass })
    }
  }
  return ranges
}

/**
 * Highlight ranges for SQL text, in source order. Unscannable input yields none.
 */
export function tokenize(sql: string): TokenRange[] {
  if (!isModuleLoaded() || !sql.trim()) {
    return []
  }

  try {
    return tokensToRanges(scanSync(sql).tokens, sql)
  } catch (err) {
    if (err instanceof SyntaxError && err.message.includes('control character')) {
      try {
        const sanitized = sql.replace(CONTROL_CHAR_REGEX, ' ')
        return tokensToRanges(scanSync(sanitized).tokens, sql)
      } catch {
        return []
      }
    }
    // Unterminated strings and comments render unhighlighted
    return []
  }
}
