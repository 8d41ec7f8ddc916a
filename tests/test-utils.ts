import { mkdtempSync, writeFileSync } from 'fs'
import os from 'os'
import path from 'path'
import { openDatabase } from '../shell/lib/db'
import { parseConfig } from '../shell/lib/config'
import { createSession, type Session } from '../shell/lib/session'

export interface TestSession extends Session {
  /** Everything written to the session's output */
  lines: string[]
}

/**
 * Session over a fresh in-memory database, with highlighting and the pager off.
 */
export function createTestSession(): TestSession {
  const lines: string[] = []
  const db = openDatabase(':memory:')
  const session = createSession(db, { ...parseConfig(''), highlight: false, pager: '' }, (text) => lines.push(text))
  return { ...session, interactive: false, lines }
}

/**
 * Write `content` to a new file in a fresh temporary directory.
 */
export function writeTempFile(name: string, content: string): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'litesh-test-'))
  const file = path.join(dir, name)
  writeFileSync(file, content, 'utf-8')
  return file
}
