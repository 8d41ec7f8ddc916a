import chalk, { type ChalkInstance } from 'chalk'
import { tokenize, type TokenClass } from '@/lib/sql'

function styles(c: ChalkInstance): Record<TokenClass, ChalkInstance> {
  return {
    keyword: c.blue.bold,
    number: c.yellow.bold,
    string: c.magenta.bold,
    comment: c.green.bold,
    parameter: c.magenta.bold,
  }
}

/**
 * Wrap SQL tokens in ANSI colors. Text between tokens is kept as is.
 */
export function highlightSql(sql: string, c: ChalkInstance = chalk): string {
  const palette = styles(c)
  let out = ''
  let pos = 0
  for (const range of tokenize(sql)) {
    out += sql.slice(pos, range.from) + palette[range.class](sql.slice(range.from, range.to))
    pos = range.to
  }
  return out + sql.slice(pos)
}
