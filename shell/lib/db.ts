import Database from 'better-sqlite3'
import { installFunctions } from './functions'

/**
 * Open (or create) a SQLite database file. `:memory:` opens a private
 * in-memory database.
 */
export function openDatabase(filename: string): Database.Database {
  const db = new Database(filename)
  installFunctions(db)
  return db
}
