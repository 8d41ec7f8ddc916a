import * as readline from 'readline'
import chalk from 'chalk'
import { createCompleter, type Completer } from '@/lib/sql'
import type { ShellConfig } from './lib/config'
import { errorMessage } from './lib/errors'
import { loadHistory, saveHistory } from './lib/history'
import { logCompletionError } from './lib/log'
import type { Session } from './lib/session'
import { executeDotCommand, isDotCommand, type DotCommandResult } from './services/dot-commands'
import { executeSql } from './services/query-service'

/**
 * Run one line of input: a dot-command or SQL. Errors propagate.
 */
export function runInput(session: Session, line: string): DotCommandResult {
  if (!line.trim()) return 'handled'
  if (isDotCommand(line)) return executeDotCommand(session, line)
  executeSql(session, line)
  return 'handled'
}

export function printError(error: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(error)}`))
}

/**
 * readline completer: candidates for the text before the cursor and the
 * substring they replace.
 */
export function completeLine(completer: Completer, line: string): [string[], string] {
  const candidates = completer.complete(line, line.length)
  if (candidates.length === 0) return [[], line]
  return [candidates.map((c) => c.text), line.slice(candidates[0].from)]
}

/**
 * Inline hint shown dimmed after the cursor, accepted with the right arrow
 * at the end of the line. Returns a function that removes the keypress
 * listener.
 */
export function attachHints(rl: readline.Interface, completer: Completer, output: NodeJS.WriteStream): () => void {
  let current: string | null = null

  const render = (): void => {
    readline.clearLine(output, 1)
    current = rl.cursor === rl.line.length ? completer.hint(rl.line, rl.cursor) : null
    if (current) {
      output.write(chalk.dim(current))
      readline.moveCursor(output, -current.length, 0)
    }
  }

  const onKeypress = (_str: string | undefined, key: readline.Key | undefined): void => {
    if (key?.name === 'right' && current && rl.cursor === rl.line.length) {
      const accepted = current
      current = null
      rl.write(accepted)
    }
    if (key?.name === 'return' || key?.name === 'enter') {
      current = null
      return
    }
    render()
  }

  process.stdin.on('keypress', onKeypress)
  return () => {
    process.stdin.off('keypress', onKeypress)
  }
}

/**
 * Interactive loop. Resolves when the user quits (.quit, Ctrl-C, Ctrl-D);
 * history is saved on the way out.
 */
export function runRepl(session: Session, config: ShellConfig): Promise<void> {
  const completer = createCompleter(session.catalog, { onError: logCompletionError })
  let history = loadHistory(config.history_file)

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: config.prompt,
    terminal: process.stdin.isTTY === true,
    history,
    historySize: config.history_size,
    completer: (line: string) => completeLine(completer, line),
  })

  const detachHints = config.hints && process.stdin.isTTY ? attachHints(rl, completer, process.stdout) : null

  rl.on('history', (lines: string[]) => {
    history = lines
  })

  rl.on('line', (line: string) => {
    let result: DotCommandResult = 'handled'
    try {
      result = runInput(session, line)
    } catch (error) {
      printError(error)
    }
    if (result === 'quit') {
      rl.close()
    } else {
      rl.prompt()
    }
  })

  rl.on('SIGINT', () => rl.close())

  return new Promise((resolve) => {
    rl.on('close', () => {
      detachHints?.()
      try {
        saveHistory(config.history_file, history, config.history_size)
      } catch (error) {
        printError(error)
      }
      resolve()
    })
    rl.prompt()
  })
}
