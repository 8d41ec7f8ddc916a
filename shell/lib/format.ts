import { format } from 'sql-formatter'

/**
 * Pretty-print a stored schema statement for display.
 */
export function formatSql(sql: string): string {
  return format(sql, { language: 'sqlite' })
}
