/**
 * Result rendering for the output modes.
 *
 * Rows arrive one at a time as raw value arrays (null, bigint, number,
 * string or Buffer). `table` and `csv` buffer until `finish`; `sql` writes
 * each row as it arrives; `null` discards everything.
 */

import { spawnSync } from 'child_process'
import chalk from 'chalk'
import Table from 'cli-table3'
import Papa from 'papaparse'
import type { OutputMode } from '../lib/config'
import { highlightSql } from '../lib/highlight'

export interface OutputRows {
  addRow(row: unknown[]): void
  finish(): void
}

export interface OutputSettings {
  write: (text: string) => void
  /** Target table name for `sql` mode */
  tableName: string
  highlight: boolean
  /** Pager command; empty disables paging */
  pager: string
  pagerThreshold: number
  interactive: boolean
}

// ============================================================================
// Value formatting
// ============================================================================

export function hexBytes(blob: Uint8Array, separator: string): string {
  return Array.from(blob, (byte) => byte.toString(16).padStart(2, '0')).join(separator)
}

function displayValue(value: unknown): string {
  if (value === null || value === undefined) return 'NULL'
  if (value instanceof Uint8Array) return hexBytes(value, ' ')
  return String(value)
}

/**
 * SQL literal for a value: strings quoted with '' escaping, blobs as X'..'.
 */
export function sqlLiteral(value: unknown): string {
  if (value === null || value === undefined) return 'NULL'
  if (typeof value === 'number' || typeof value === 'bigint') return String(value)
  if (value instanceof Uint8Array) return `X'${hexBytes(value, '')}'`
  return `'${String(value).replace(/'/g, "''")}'`
}

// ============================================================================
// Modes
// ============================================================================

class NullOutput implements OutputRows {
  addRow(): void {}
  finish(): void {}
}

class TableOutput implements OutputRows {
  private readonly rows: string[][] = []

  constructor(private readonly columns: string[], private readonly settings: OutputSettings) {}

  addRow(row: unknown[]): void {
    this.rows.push(row.map(formatCell))
  }

  finish(): void {
    const table = new Table({ head: this.columns.map((c) => chalk.bold(c)), style: { head: [], border: [] } })
    for (const row of this.rows) {
      table.push(row)
    }

    const rendered = table.toString()
    const { pager, pagerThreshold, interactive, write } = this.settings
    if (pager && interactive && this.rows.length > pagerThreshold && page(pager, rendered)) {
      return
    }
    write(rendered)
  }
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return chalk.gray('NULL')
  if (typeof value === 'number' || typeof value === 'bigint') return chalk.yellow(String(value))
  return displayValue(value)
}

/**
 * Pipe text through the pager. Returns false if the pager could not start.
 */
function page(pager: string, text: string): boolean {
  const [command, ...args] = pager.split(/\s+/)
  const result = spawnSync(command, args, {
    input: `${text}\n`,
    stdio: ['pipe', 'inherit', 'inherit'],
    env: { ...process.env, LESSCHARSET: 'UTF-8' },
  })
  return result.error === undefined
}

class CsvOutput implements OutputRows {
  private readonly rows: string[][] = []

  constructor(private readonly columns: string[], private readonly settings: OutputSettings) {}

  addRow(row: unknown[]): void {
    this.rows.push(row.map(csvValue))
  }

  finish(): void {
    const csv = Papa.unparse(
      { fields: this.columns, data: this.rows },
      { newline: '\n' }
    )
    this.settings.write(csv)
  }
}

function csvValue(value: unknown): string {
  if (value === null || value === undefined) return ''
  if (value instanceof Uint8Array) return hexBytes(value, '')
  return String(value)
}

class SqlOutput implements OutputRows {
  constructor(private readonly settings: OutputSettings) {}

  addRow(row: unknown[]): void {
    const line = `INSERT INTO ${this.settings.tableName} VALUES(${row.map(sqlLiteral).join(', ')});`
    this.settings.write(this.settings.highlight ? highlightSql(line) : line)
  }

  finish(): void {}
}

/**
 * Create the row sink for an output mode.
 */
export function createOutput(mode: OutputMode, columns: string[], settings: OutputSettings): OutputRows {
  switch (mode) {
    case 'null':
      return new NullOutput()
    case 'table':
      return new TableOutput(columns, settings)
    case 'csv':
      return new CsvOutput(columns, settings)
    case 'sql':
      return new SqlOutput(settings)
  }
}
