import type Database from 'better-sqlite3'
import { SqliteCatalog } from './catalog'
import type { OutputMode, ShellConfig } from './config'

/**
 * Mutable state of one shell run.
 */
export interface Session {
  db: Database.Database
  catalog: SqliteCatalog
  config: ShellConfig
  mode: OutputMode
  /** Target table name for `sql` output mode */
  tableName: string
  /** Line sink for user-visible output */
  write: (text: string) => void
  /** Whether output goes to a terminal (enables the pager) */
  interactive: boolean
}

export const DEFAULT_TABLE_NAME = 'tbl'

export function createSession(
  db: Database.Database,
  config: ShellConfig,
  write: (text: string) => void = (text) => console.log(text)
): Session {
  return {
    db,
    catalog: new SqliteCatalog(db),
    config,
    mode: config.mode,
    tableName: DEFAULT_TABLE_NAME,
    write,
    interactive: process.stdout.isTTY === true,
  }
}
