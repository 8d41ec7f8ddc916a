import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import path from 'path'

/**
 * Load history lines, newest first (the order readline keeps them in).
 * The file stores one entry per line, oldest first.
 */
export function loadHistory(filePath: string): string[] {
  if (!existsSync(filePath)) return []
  return readFileSync(filePath, 'utf-8')
    .split('\n')
    .filter((line) => line.length > 0)
    .reverse()
}

/**
 * Save the newest `limit` entries of a newest-first history list.
 */
export function saveHistory(filePath: string, history: readonly string[], limit: number): void {
  const dir = path.dirname(filePath)
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true })
  const lines = history.slice(0, limit).reverse()
  writeFileSync(filePath, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf-8')
}
