import path from 'path'
import { ensureModuleLoaded } from '@/lib/sql'
import { loadConfig, isOutputMode, OUTPUT_MODES, type ShellConfig } from './lib/config'
import { parseArgs, USAGE } from './lib/args'
import { openDatabase } from './lib/db'
import { errorMessage } from './lib/errors'
import { createSession } from './lib/session'
import { printError, runInput, runRepl } from './repl'

async function start() {
  const args = parseArgs(process.argv.slice(2))
  if (!args.database) {
    console.error(USAGE)
    process.exit(1)
  }

  let config: ShellConfig
  try {
    config = loadConfig(args.config)
    if (args.config) {
      console.log(`✓ Loaded config from: ${path.resolve(args.config)}`)
    }
  } catch (error) {
    console.error('Failed to load config:', errorMessage(error))
    process.exit(1)
  }

  if (args.mode !== undefined) {
    if (!isOutputMode(args.mode)) {
      console.error(`Unknown mode: ${args.mode} (expected one of: ${OUTPUT_MODES.join(', ')})`)
      process.exit(1)
    }
    config = { ...config, mode: args.mode }
  }

  await ensureModuleLoaded()

  let db: ReturnType<typeof openDatabase>
  try {
    db = openDatabase(args.database)
  } catch (error) {
    console.error(`Failed to open ${args.database}:`, errorMessage(error))
    process.exit(1)
  }

  const session = createSession(db, config)

  if (args.cmd !== undefined) {
    try {
      runInput(session, args.cmd)
    } catch (error) {
      printError(error)
      process.exitCode = 1
    }
  } else {
    await runRepl(session, config)
  }

  db.close()
}

start().catch((error: unknown) => {
  printError(error)
  process.exit(1)
})
