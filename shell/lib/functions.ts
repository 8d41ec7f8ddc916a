// Extra SQL functions installed on every connection
import type Database from 'better-sqlite3'

const DECIMAL_UNITS = ['B', 'kB', 'MB', 'GB', 'TB', 'PB', 'EB']

/**
 * Human-readable byte count in decimal (SI) units: 999 → "999 B",
 * 1500 → "1.50 kB", 1000000 → "1 MB".
 */
export function fmtByteSize(n: number | bigint): string {
  const value = Number(n)
  const sign = value < 0 ? '-' : ''
  let size = Math.abs(value)

  if (size < 1000) return `${sign}${size} B`

  let unit = 0
  while (size >= 1000 && unit < DECIMAL_UNITS.length - 1) {
    size /= 1000
    unit++
  }
  return `${sign}${size.toFixed(Number.isInteger(size) ? 0 : 2)} ${DECIMAL_UNITS[unit]}`
}

export function installFunctions(db: Database.Database): void {
  db.function('fmt_byte_size', { deterministic: true }, (value: unknown) => {
    if (typeof value === 'bigint' || (typeof value === 'number' && Number.isInteger(value))) {
      return fmtByteSize(value)
    }
    if (value === null) return null
    throw new TypeError('fmt_byte_size() expects an integer')
  })
}
