// Debug diagnostics - emits JSON lines to stderr when shell.debug is set
import { isDebug } from './config'

interface BaseEvent {
  type: 'debug'
  ts: string
}

interface CompletionErrorEvent extends BaseEvent {
  action: 'completion.error'
  error: string
}

interface QueryExecuteEvent extends BaseEvent {
  action: 'query.execute'
  sql: string
  success: boolean
  duration_ms: number
  row_count?: number
  error?: string
}

type DebugEvent = CompletionErrorEvent | QueryExecuteEvent

function emit(event: DebugEvent): void {
  if (!isDebug()) return
  console.error(JSON.stringify(event))
}

function now(): string {
  return new Date().toISOString()
}

export function logCompletionError(error: unknown): void {
  emit({
    type: 'debug',
    ts: now(),
    action: 'completion.error',
    error: error instanceof Error ? error.message : String(error),
  })
}

export function logQueryExecute(
  sql: string,
  success: boolean,
  duration_ms: number,
  row_count?: number,
  error?: string
): void {
  const event: QueryExecuteEvent = {
    type: 'debug',
    ts: now(),
    action: 'query.execute',
    sql,
    success,
    duration_ms,
  }
  if (row_count !== undefined) event.row_count = row_count
  if (error) event.error = error
  emit(event)
}
