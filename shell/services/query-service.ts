import { parseSql, statements } from '@/lib/sql'
import { CommandError } from '../lib/errors'
import { logQueryExecute } from '../lib/log'
import type { Session } from '../lib/session'
import { createOutput, type OutputSettings } from './output'

/**
 * Split input into statement texts. Unrecognised top-level input is kept so
 * the engine reports its syntax error. Unscannable input (an unterminated
 * string, say) is passed through whole.
 */
export function splitStatements(text: string): string[] {
  const parsed = parseSql(text)
  if (!parsed.tree) {
    return text.trim() ? [text.trim()] : []
  }
  return statements(parsed.tree, { includeErrors: true }).map((node) => node.text)
}

export function outputSettings(session: Session): OutputSettings {
  const { config } = session
  return {
    write: session.write,
    tableName: session.tableName,
    highlight: config.highlight,
    pager: config.pager,
    pagerThreshold: config.pager_threshold,
    interactive: session.interactive,
  }
}

/**
 * better-sqlite3 rejects a run without values for the statement's
 * placeholders before touching any row.
 */
function isMissingParameters(err: unknown): boolean {
  return err instanceof RangeError && /too few parameter values/i.test(err.message)
}

/**
 * Execute one statement, streaming any rows to the session's output mode.
 * Returns the number of rows produced (readers) or changed (writers).
 */
export function executeStatement(session: Session, sql: string): number {
  const start = Date.now()
  try {
    const stmt = session.db.prepare(sql)
    let count: number

    if (stmt.reader) {
      const columns = stmt.columns().map((column) => column.name)
      const output = createOutput(session.mode, columns, outputSettings(session))
      count = 0
      for (const row of stmt.safeIntegers(true).raw(true).iterate()) {
        output.addRow(Array.isArray(row) ? row : [row])
        count++
      }
      output.finish()
    } else {
      count = stmt.run().changes
    }

    logQueryExecute(sql, true, Date.now() - start, count)
    return count
  } catch (err) {
    const error = isMissingParameters(err)
      ? new CommandError('cannot run queries that require bind parameters')
      : err
    logQueryExecute(sql, false, Date.now() - start, undefined, error instanceof Error ? error.message : String(error))
    throw error
  }
}

/**
 * Execute every statement in `text` in order, stopping at the first error.
 */
export function executeSql(session: Session, text: string): void {
  for (const sql of splitStatements(text)) {
    executeStatement(session, sql)
  }
}
