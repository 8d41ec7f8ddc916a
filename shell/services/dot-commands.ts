import { existsSync, readFileSync } from 'fs'
import path from 'path'
import { isOutputMode, OUTPUT_MODES } from '../lib/config'
import { CommandError } from '../lib/errors'
import { formatSql } from '../lib/format'
import { highlightSql } from '../lib/highlight'
import { DEFAULT_TABLE_NAME, type Session } from '../lib/session'
import { executeSql } from './query-service'

export type DotCommandResult = 'handled' | 'quit'

const SCHEMA_SQL = "SELECT sql FROM sqlite_schema WHERE type = 'table' AND name = ?"

const HELP_LINES = [
  '.tables              List tables',
  '.schema TABLE        Show the CREATE statement of a table',
  '.mode [MODE [TABLE]] Show or set the output mode (table, csv, sql, null)',
  '.read FILE           Execute SQL statements from a file',
  '.help                Show this help',
  '.quit, .exit         Exit the shell',
]

export function isDotCommand(line: string): boolean {
  return line.trimStart().startsWith('.')
}

function listTables(session: Session): void {
  for (const name of session.catalog.listTables()) {
    session.write(name)
  }
}

function showSchema(session: Session, tableName: string | undefined): void {
  if (!tableName) {
    throw new CommandError('provide a table name')
  }

  const sql = session.db.prepare(SCHEMA_SQL).pluck().get(tableName)
  if (typeof sql !== 'string') {
    throw new CommandError(`table ${tableName} does not exist`)
  }
  const formatted = formatSql(sql)
  session.write(session.config.highlight ? highlightSql(formatted) : formatted)
}

function setMode(session: Session, mode: string | undefined, tableName: string | undefined): void {
  if (mode === undefined) {
    session.write(session.mode === 'sql' ? `sql ${session.tableName}` : session.mode)
    return
  }
  if (!isOutputMode(mode)) {
    throw new CommandError(`unknown mode: ${mode} (expected one of: ${OUTPUT_MODES.join(', ')})`)
  }
  session.mode = mode
  session.tableName = tableName ?? DEFAULT_TABLE_NAME
}

function readFile(session: Session, filePath: string | undefined): void {
  if (!filePath) {
    throw new CommandError('Usage: .read FILE')
  }
  const absPath = path.resolve(filePath)
  if (!existsSync(absPath)) {
    throw new CommandError(`File not found: ${filePath}`)
  }
  executeSql(session, readFileSync(absPath, 'utf-8'))
}

/**
 * Dispatch a dot-command line.
 */
export function executeDotCommand(session: Session, line: string): DotCommandResult {
  const [command, ...args] = line.trim().split(/\s+/)

  switch (command.toLowerCase()) {
    case '.quit':
    case '.exit':
      return 'quit'

    case '.tables':
      listTables(session)
      return 'handled'

    case '.schema':
      showSchema(session, args[0])
      return 'handled'

    case '.mode':
      setMode(session, args[0]?.toLowerCase(), args[1])
      return 'handled'

    case '.read':
      readFile(session, args[0])
      return 'handled'

    case '.help':
      for (const helpLine of HELP_LINES) session.write(helpLine)
      return 'handled'

    default:
      throw new CommandError(`unknown command: ${command} (try .help)`)
  }
}
